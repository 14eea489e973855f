// ---------------------------------------------------------------------------
// LogVault Interceptor Interface — Middleware around every API call
// ---------------------------------------------------------------------------

import type { HttpMethod } from "../protocol";

/**
 * A request about to be sent to the API.
 */
export interface OutboundRequest {
  /** Client-generated id, stable across retries of the same call. */
  id: string;
  method: HttpMethod;
  path: string;
  query?: Record<string, string>;
  /** JSON body before serialization (POST only). */
  body?: unknown;
}

/**
 * The final HTTP response for a call, after any retries.
 */
export interface InboundResponse {
  id: string;
  method: HttpMethod;
  path: string;
  status: number;
  /** Parsed JSON body, or the raw text when the body is not JSON. */
  body?: unknown;
  /** Attempts made, including the first. */
  attempts: number;
}

/**
 * Context provided to the error handler.
 *
 * - `request` / `response`: an interceptor hook threw.
 * - `serialization`: the request body could not be encoded; nothing was sent.
 * - `transport`: the call failed without an HTTP response (network, timeout).
 */
export interface ErrorContext {
  phase: "request" | "response" | "serialization" | "transport";
  request?: OutboundRequest;
  response?: InboundResponse;
}

/**
 * Interceptor interface for the client middleware chain.
 *
 * Each hook is optional and hooks run in registration order.
 *
 * - `onRequest`: Called once per call before the first attempt. Return `null`
 *   to skip the call entirely.
 * - `onResponse`: Called with the final response, successful or not.
 * - `onError`: Called when a hook throws, the body cannot be encoded, or the
 *   call fails in transport. The last two end the call.
 */
export interface LogVaultInterceptor {
  /** Human-readable name for this interceptor (used in logging/debugging). */
  name: string;

  onRequest?(request: OutboundRequest): Promise<OutboundRequest | null>;

  onResponse?(response: InboundResponse): Promise<InboundResponse>;

  onError?(error: Error, context: ErrorContext): Promise<void>;
}
