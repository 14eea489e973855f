// ---------------------------------------------------------------------------
// LogVault API — Wire types and constants
// ---------------------------------------------------------------------------

import type { Logger } from "./logger";

// ---- Constants ------------------------------------------------------------

export const SDK_VERSION = "0.1.0";

export const DEFAULT_BASE_URL = "https://api.logvault.eu";

export const API_KEY_PREFIXES = ["lv_live_", "lv_test_"] as const;

export const DEFAULT_TIMEOUT_MS = 10_000;
export const DEFAULT_MAX_RETRIES = 3;

/** Upper bound for a serialized event body (UTF-8 bytes). */
export const MAX_PAYLOAD_BYTES = 1024 * 1024;

export const DEFAULT_PAGE_SIZE = 50;
export const MAX_PAGE_SIZE = 100;

export const DEFAULT_SEARCH_LIMIT = 20;
export const MIN_SEARCH_QUERY_LENGTH = 2;

export const RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([429, 500, 502, 503, 504]);

/** Statuses whose `Retry-After` header replaces the computed backoff. */
export const RETRY_AFTER_STATUS_CODES: ReadonlySet<number> = new Set([429, 503]);

/** "domain.event": two or more dot-separated segments of [a-z0-9_]. */
export const ACTION_PATTERN = /^[a-z0-9_]+(\.[a-z0-9_]+)+$/i;

export const EVENT_LEVELS = ["debug", "info", "warning", "error", "critical"] as const;

export const EventsPath = {
  COLLECTION: "/v1/events",
  SEARCH: "/v1/events/search",
  byId: (id: string) => `/v1/events/${encodeURIComponent(id)}`,
  verify: (id: string) => `/v1/events/${encodeURIComponent(id)}/verify`,
} as const;

// ---- Events ---------------------------------------------------------------

export type EventLevel = (typeof EVENT_LEVELS)[number];

export type EventMetadata = Record<string, unknown>;

/** Caller-facing input for `LogVaultClient.log()`. */
export interface LogEventInput {
  /** "domain.event" identifier, e.g. `user.login`. */
  action: string;
  userId?: string | null;
  resource?: string | null;
  metadata?: EventMetadata;
  level?: EventLevel;
  message?: string | null;
  /** Defaults to the time of the call. */
  timestamp?: Date | string;
}

/** Body of `POST /v1/events`. */
export interface AuditEventPayload {
  action: string;
  user_id: string | null;
  resource: string | null;
  metadata: EventMetadata;
  level: EventLevel;
  message: string | null;
  timestamp: string;
}

/** Returned by the API once an event is recorded. */
export interface LogEventResult {
  id: string;
  signature?: string;
  created_at?: string;
}

export interface AuditEventRecord {
  id: string;
  action: string;
  user_id: string | null;
  resource: string | null;
  metadata: EventMetadata;
  level: EventLevel;
  message: string | null;
  timestamp: string;
  signature?: string;
  created_at?: string;
}

// ---- Listing & search -----------------------------------------------------

export interface ListEventsParams {
  /** 1-indexed. Default: 1. */
  page?: number;
  /** Default: 50, capped at 100. */
  pageSize?: number;
  userId?: string;
  /** Exact action or a `*` wildcard pattern such as `user.*`. */
  action?: string;
}

export interface EventPage {
  events: AuditEventRecord[];
  total: number;
  page: number;
  page_size: number;
  has_next: boolean;
}

export interface VerificationResult {
  valid: boolean;
  event_id?: string;
  signature?: string;
  verified_at?: string;
  reason?: string;
}

export interface SearchResult {
  results: AuditEventRecord[];
  count: number;
  has_embeddings: boolean;
}

// ---- Client options -------------------------------------------------------

export interface RetryOptions {
  /** Retries after the first attempt. 0 disables retry. */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Upper bound (exclusive) of the random delay added to each backoff. */
  jitterMs: number;
}

export interface LogVaultClientOptions {
  apiKey: string;
  /** Default: https://api.logvault.eu */
  baseUrl?: string;
  /** Per-attempt timeout. Default: 10 000 ms. */
  timeoutMs?: number;
  /** Shorthand for `retry.maxRetries`. Default: 3. */
  maxRetries?: number;
  retry?: Partial<RetryOptions>;
  /** Send a unique `X-Nonce` header with every request. */
  enableNonce?: boolean;
  logger?: Logger;
}

/** Payload of the client's `"retry"` event. */
export interface RetryEvent {
  attempt: number;
  delayMs: number;
  method: HttpMethod;
  path: string;
  reason: string;
}

export type HttpMethod = "GET" | "POST";
