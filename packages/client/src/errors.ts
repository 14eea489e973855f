// ---------------------------------------------------------------------------
// LogVault errors — every failure surfaced by the SDK extends LogVaultError
// ---------------------------------------------------------------------------

export interface LogVaultErrorOptions {
  statusCode?: number;
  cause?: unknown;
}

export class LogVaultError extends Error {
  readonly statusCode?: number;

  constructor(message: string, options?: LogVaultErrorOptions) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = "LogVaultError";
    this.statusCode = options?.statusCode;
  }
}

/** API key is missing, malformed, or rejected by the API (HTTP 401). */
export class AuthenticationError extends LogVaultError {
  constructor(message: string, options?: LogVaultErrorOptions) {
    super(message, options);
    this.name = "AuthenticationError";
  }
}

/** Input rejected locally or by the API (HTTP 422). */
export class ValidationError extends LogVaultError {
  constructor(message: string, options?: LogVaultErrorOptions) {
    super(message, options);
    this.name = "ValidationError";
  }
}

/** The event could not be encoded as JSON (cycles, BigInt values). */
export class SerializationError extends ValidationError {
  constructor(message: string, options?: LogVaultErrorOptions) {
    super(message, options);
    this.name = "SerializationError";
  }
}

/** HTTP 429 that persisted through every retry. */
export class RateLimitError extends LogVaultError {
  /** Seconds the API asked us to wait, from `Retry-After`. */
  readonly retryAfter?: number;

  constructor(message: string, retryAfter?: number, options?: LogVaultErrorOptions) {
    super(message, { statusCode: 429, ...options });
    this.name = "RateLimitError";
    this.retryAfter = retryAfter;
  }
}

export interface APIErrorOptions extends LogVaultErrorOptions {
  response?: unknown;
}

/**
 * Any other failed request. The parsed response body is available on
 * `response` but is left out of `toJSON()` so serialized errors stay small
 * and never echo server payloads into logs.
 */
export class APIError extends LogVaultError {
  readonly response?: unknown;

  constructor(message: string, options?: APIErrorOptions) {
    super(message, options);
    this.name = "APIError";
    this.response = options?.response;
  }

  toJSON(): { name: string; message: string; statusCode?: number } {
    return { name: this.name, message: this.message, statusCode: this.statusCode };
  }
}

/** Network failure after every retry. */
export class APIConnectionError extends APIError {
  constructor(message: string, options?: APIErrorOptions) {
    super(message, options);
    this.name = "APIConnectionError";
  }
}

/** Request timed out after every retry. */
export class APITimeoutError extends APIError {
  constructor(message: string, options?: APIErrorOptions) {
    super(message, options);
    this.name = "APITimeoutError";
  }
}
