// ---------------------------------------------------------------------------
// @logvault/client — Public API
// ---------------------------------------------------------------------------

// Clients
export { LogVaultClient } from "./client";
export { BackgroundLogger } from "./background";
export type { BackgroundLoggerOptions, BackgroundLoggerMetrics } from "./background";

// Interceptors
export * from "./interceptors";

// Auth helpers
export { buildHeaders, maskApiKey, validateApiKey } from "./auth";

// Configuration
export { loadClientConfig } from "./config";
export type { ClientConfig } from "./config";

// Logging
export { consoleLogger, silentLogger } from "./logger";
export type { Logger } from "./logger";

// Retry
export { DEFAULT_RETRY, computeBackoffDelay, isRetryableStatus, parseRetryAfter } from "./retry";

// Validation
export { serializePayload, toEventPayload } from "./validation";

// Errors
export {
  LogVaultError,
  AuthenticationError,
  ValidationError,
  SerializationError,
  RateLimitError,
  APIError,
  APIConnectionError,
  APITimeoutError,
} from "./errors";

// Protocol types & constants
export {
  SDK_VERSION,
  DEFAULT_BASE_URL,
  API_KEY_PREFIXES,
  DEFAULT_TIMEOUT_MS,
  DEFAULT_MAX_RETRIES,
  MAX_PAYLOAD_BYTES,
  DEFAULT_PAGE_SIZE,
  MAX_PAGE_SIZE,
  DEFAULT_SEARCH_LIMIT,
  MIN_SEARCH_QUERY_LENGTH,
  RETRYABLE_STATUS_CODES,
  RETRY_AFTER_STATUS_CODES,
  ACTION_PATTERN,
  EVENT_LEVELS,
} from "./protocol";

export type {
  EventLevel,
  EventMetadata,
  LogEventInput,
  AuditEventPayload,
  LogEventResult,
  AuditEventRecord,
  ListEventsParams,
  EventPage,
  VerificationResult,
  SearchResult,
  RetryOptions,
  RetryEvent,
  HttpMethod,
  LogVaultClientOptions,
} from "./protocol";
