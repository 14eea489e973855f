// ---------------------------------------------------------------------------
// LogVaultClient — HTTPS client for the LogVault audit-log API
// ---------------------------------------------------------------------------

import { EventEmitter } from "events";
import { v4 as uuidv4 } from "uuid";

import { InterceptorChain } from "./interceptors/chain";
import type { LogVaultInterceptor, OutboundRequest, InboundResponse } from "./interceptors/interface";

import type {
  LogVaultClientOptions,
  LogEventInput,
  LogEventResult,
  AuditEventRecord,
  ListEventsParams,
  EventPage,
  VerificationResult,
  SearchResult,
  RetryOptions,
  RetryEvent,
  HttpMethod,
} from "./protocol";
import { DEFAULT_BASE_URL, DEFAULT_TIMEOUT_MS, EventsPath, RETRY_AFTER_STATUS_CODES } from "./protocol";
import { buildHeaders, validateApiKey } from "./auth";
import { loadClientConfig } from "./config";
import {
  LogVaultError,
  AuthenticationError,
  ValidationError,
  SerializationError,
  RateLimitError,
  APIError,
  APIConnectionError,
  APITimeoutError,
} from "./errors";
import { consoleLogger } from "./logger";
import type { Logger } from "./logger";
import {
  computeBackoffDelay,
  isRetryableStatus,
  parseRetryAfter,
  resolveRetryOptions,
  sleep,
} from "./retry";
import {
  ListEventsParamsSchema,
  SearchParamsSchema,
  assertEventId,
  parseOrThrow,
  serializePayload,
  toEventPayload,
} from "./validation";

// ---- Request plumbing -----------------------------------------------------

interface RequestOptions {
  query?: Record<string, string>;
  body?: unknown;
  /** Message for a 404; without it a 404 is a plain `HTTP 404`. */
  notFoundMessage?: string;
}

// ---- Client ---------------------------------------------------------------

export class LogVaultClient extends EventEmitter {
  readonly baseUrl: string;
  readonly timeoutMs: number;
  readonly enableNonce: boolean;

  private readonly apiKey: string;
  private readonly retryOpts: RetryOptions;
  private readonly logger: Logger;
  private readonly interceptorChain: InterceptorChain;
  private closed = false;

  constructor(options: LogVaultClientOptions, interceptors?: LogVaultInterceptor[]) {
    super();
    this.apiKey = validateApiKey(options.apiKey);
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.enableNonce = options.enableNonce ?? false;
    this.retryOpts = resolveRetryOptions(options.retry, options.maxRetries);
    this.logger = options.logger ?? consoleLogger;
    this.interceptorChain = new InterceptorChain(interceptors);
  }

  /**
   * Build a client from `LOGVAULT_*` environment variables. Explicit
   * overrides win over the environment.
   */
  static fromEnv(
    env: NodeJS.ProcessEnv = process.env,
    overrides?: Partial<LogVaultClientOptions>,
    interceptors?: LogVaultInterceptor[],
  ): LogVaultClient {
    const source = overrides?.apiKey ? { ...env, LOGVAULT_API_KEY: overrides.apiKey } : env;
    const config = loadClientConfig(source);
    return new LogVaultClient(
      {
        ...overrides,
        apiKey: config.apiKey,
        baseUrl: overrides?.baseUrl ?? config.baseUrl,
        timeoutMs: overrides?.timeoutMs ?? config.timeoutMs,
        maxRetries: overrides?.maxRetries ?? config.maxRetries,
        enableNonce: overrides?.enableNonce ?? config.enableNonce,
      },
      interceptors,
    );
  }

  /** Access the interceptor chain for adding/removing interceptors at runtime. */
  get interceptors(): InterceptorChain {
    return this.interceptorChain;
  }

  get retryOptions(): Readonly<RetryOptions> {
    return this.retryOpts;
  }

  isClosed(): boolean {
    return this.closed;
  }

  /** Reject every later call. In-flight calls are not interrupted. */
  async close(): Promise<void> {
    this.closed = true;
    this.removeAllListeners();
  }

  // ------------------------------------------------------------------
  // Events
  // ------------------------------------------------------------------

  /**
   * Record an audit event.
   *
   * Resolves `null` instead of throwing when the event cannot be encoded as
   * JSON (the failure is logged), or when an interceptor skipped the call.
   */
  async log(input: LogEventInput): Promise<LogEventResult | null> {
    this.ensureOpen();
    const payload = toEventPayload(input);

    try {
      return await this.request<LogEventResult>("POST", EventsPath.COLLECTION, { body: payload });
    } catch (err) {
      if (err instanceof SerializationError) {
        this.logger.error(`${err.message} (action=${payload.action})`);
        return null;
      }
      throw err;
    }
  }

  /** List recorded events, newest first, one page at a time. */
  async listEvents(params: ListEventsParams = {}): Promise<EventPage> {
    this.ensureOpen();
    const parsed = parseOrThrow(ListEventsParamsSchema, params);

    const query: Record<string, string> = {
      page: String(parsed.page),
      page_size: String(parsed.pageSize),
    };
    if (parsed.userId) {
      query.user_id = parsed.userId;
    }
    if (parsed.action) {
      query.action = parsed.action;
    }

    return this.expectResult(
      await this.request<EventPage>("GET", EventsPath.COLLECTION, { query }),
      "GET",
      EventsPath.COLLECTION,
    );
  }

  async getEvent(eventId: string): Promise<AuditEventRecord> {
    this.ensureOpen();
    assertEventId(eventId);
    const path = EventsPath.byId(eventId);
    return this.expectResult(
      await this.request<AuditEventRecord>("GET", path, {
        notFoundMessage: `Event not found: ${eventId}`,
      }),
      "GET",
      path,
    );
  }

  /** Ask the API to check the stored signature of an event. */
  async verifyEvent(eventId: string): Promise<VerificationResult> {
    this.ensureOpen();
    assertEventId(eventId);
    const path = EventsPath.verify(eventId);
    return this.expectResult(
      await this.request<VerificationResult>("GET", path, {
        notFoundMessage: `Event not found: ${eventId}`,
      }),
      "GET",
      path,
    );
  }

  /** Natural-language search, e.g. `"failed login attempts"`. */
  async searchEvents(query: string, limit?: number): Promise<SearchResult> {
    this.ensureOpen();
    const parsed = parseOrThrow(SearchParamsSchema, { query, limit });
    return this.expectResult(
      await this.request<SearchResult>("GET", EventsPath.SEARCH, {
        query: { q: parsed.query, limit: String(parsed.limit) },
      }),
      "GET",
      EventsPath.SEARCH,
    );
  }

  // ------------------------------------------------------------------
  // Internals
  // ------------------------------------------------------------------

  private ensureOpen(): void {
    if (this.closed) {
      throw new LogVaultError("Client is closed");
    }
  }

  private expectResult<T>(result: T | null, method: HttpMethod, path: string): T {
    if (result === null) {
      throw new LogVaultError(`Request ${method} ${path} was skipped by an interceptor`);
    }
    return result;
  }

  /**
   * Send one API call with retry. Resolves with the parsed JSON body of a
   * 2xx response, `null` when an interceptor skipped the call, or rejects
   * with a typed error.
   */
  private async request<T>(
    method: HttpMethod,
    path: string,
    options: RequestOptions = {},
  ): Promise<T | null> {
    const outbound: OutboundRequest = { id: uuidv4(), method, path };
    if (options.query !== undefined) {
      outbound.query = options.query;
    }
    if (options.body !== undefined) {
      outbound.body = options.body;
    }

    const processed = await this.interceptorChain.processRequest(outbound);
    if (processed === null) {
      return null;
    }

    let body: string | undefined;
    try {
      body = processed.body !== undefined ? serializePayload(processed.body) : undefined;
    } catch (err) {
      if (err instanceof Error) {
        await this.interceptorChain.processError(err, { phase: "serialization", request: processed });
      }
      throw err;
    }
    const url = this.buildUrl(processed.path, processed.query);
    // One nonce per call: retries of the same call are recognisable server-side.
    const headers = buildHeaders(this.apiKey, { nonce: this.enableNonce });

    let attempt = 0;
    for (;;) {
      attempt++;

      let response: Response;
      let responseBody: unknown;
      try {
        response = await fetch(url, {
          method: processed.method,
          headers,
          body,
          signal: AbortSignal.timeout(this.timeoutMs),
        });
        // The timeout signal also covers the body stream.
        responseBody = await readBody(response);
      } catch (err) {
        const timedOut = isTimeoutError(err);
        if (attempt <= this.retryOpts.maxRetries) {
          await this.backoff(attempt, processed, timedOut ? "timeout" : describeTransportError(err));
          continue;
        }
        const error = timedOut
          ? new APITimeoutError(
            `Request ${processed.method} ${processed.path} timed out after ${this.timeoutMs}ms`,
            { cause: err },
          )
          : new APIConnectionError(
            `Connection failed after ${this.retryOpts.maxRetries} retries: ${describeTransportError(err)}`,
            { cause: err },
          );
        await this.interceptorChain.processError(error, { phase: "transport", request: processed });
        throw error;
      }

      if (isRetryableStatus(response.status) && attempt <= this.retryOpts.maxRetries) {
        const retryAfter = RETRY_AFTER_STATUS_CODES.has(response.status)
          ? parseRetryAfter(response.headers.get("retry-after"))
          : undefined;
        await this.backoff(attempt, processed, `HTTP ${response.status}`, retryAfter);
        continue;
      }

      const inbound = await this.interceptorChain.processResponse({
        id: processed.id,
        method: processed.method,
        path: processed.path,
        status: response.status,
        body: responseBody,
        attempts: attempt,
      });
      return this.toResult<T>(inbound, response.headers, options.notFoundMessage);
    }
  }

  private async backoff(
    attempt: number,
    request: OutboundRequest,
    reason: string,
    retryAfterSeconds?: number,
  ): Promise<void> {
    const delayMs = computeBackoffDelay(attempt, this.retryOpts, retryAfterSeconds);
    const event: RetryEvent = {
      attempt,
      delayMs,
      method: request.method,
      path: request.path,
      reason,
    };
    this.emit("retry", event);
    await sleep(delayMs);
  }

  private toResult<T>(
    response: InboundResponse,
    headers: Headers,
    notFoundMessage?: string,
  ): T {
    const { status, body } = response;

    if (status >= 200 && status < 300) {
      return (body ?? {}) as T;
    }
    if (status === 401) {
      throw new AuthenticationError("Invalid API key", { statusCode: 401 });
    }
    if (status === 404 && notFoundMessage) {
      throw new APIError(notFoundMessage, { statusCode: 404, response: body });
    }
    if (status === 422) {
      throw new ValidationError(`Validation failed: ${bodyText(body)}`, { statusCode: 422 });
    }
    if (status === 429) {
      throw new RateLimitError("Rate limit exceeded", parseRetryAfter(headers.get("retry-after")));
    }
    throw new APIError(`HTTP ${status}`, { statusCode: status, response: body });
  }

  private buildUrl(path: string, query?: Record<string, string>): string {
    const url = new URL(`${this.baseUrl}${path}`);
    if (query) {
      for (const [key, value] of Object.entries(query)) {
        url.searchParams.set(key, value);
      }
    }
    return url.toString();
  }
}

// ---- Helpers ----------------------------------------------------------------

/** Parsed JSON, raw text when the body is not JSON, `undefined` when empty. */
async function readBody(response: Response): Promise<unknown> {
  const text = await response.text();
  if (text === "") {
    return undefined;
  }
  try {
    const parsed: unknown = JSON.parse(text);
    return parsed;
  } catch {
    return text;
  }
}

function bodyText(body: unknown): string {
  if (body === undefined) return "";
  return typeof body === "string" ? body : JSON.stringify(body);
}

function isTimeoutError(err: unknown): boolean {
  return err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
}

/** `ECONNREFUSED` for a refused socket, otherwise the error's name. */
function describeTransportError(err: unknown): string {
  if (!(err instanceof Error)) {
    return String(err);
  }
  const cause = err.cause;
  if (cause instanceof Error && "code" in cause && typeof cause.code === "string") {
    return cause.code;
  }
  return err.name;
}
