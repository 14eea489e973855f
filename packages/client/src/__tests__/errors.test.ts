import {
  LogVaultError,
  AuthenticationError,
  ValidationError,
  SerializationError,
  RateLimitError,
  APIError,
  APIConnectionError,
  APITimeoutError,
} from "../errors";

describe("LogVaultError", () => {
  it("should extend Error", () => {
    const error = new LogVaultError("test error");
    expect(error).toBeInstanceOf(Error);
    expect(error).toBeInstanceOf(LogVaultError);
  });

  it("should have correct name", () => {
    expect(new LogVaultError("test").name).toBe("LogVaultError");
  });

  it("should store message, status code and cause", () => {
    const cause = new Error("socket hang up");
    const error = new LogVaultError("something failed", { statusCode: 503, cause });
    expect(error.message).toBe("something failed");
    expect(error.statusCode).toBe(503);
    expect(error.cause).toBe(cause);
  });
});

describe("AuthenticationError", () => {
  it("should extend LogVaultError", () => {
    const error = new AuthenticationError("Invalid API key");
    expect(error).toBeInstanceOf(LogVaultError);
    expect(error.name).toBe("AuthenticationError");
  });
});

describe("ValidationError", () => {
  it("should extend LogVaultError", () => {
    const error = new ValidationError("bad input");
    expect(error).toBeInstanceOf(LogVaultError);
    expect(error.name).toBe("ValidationError");
  });

  it("should be the parent of SerializationError", () => {
    const error = new SerializationError("Serialization failed: cycle");
    expect(error).toBeInstanceOf(ValidationError);
    expect(error.name).toBe("SerializationError");
  });
});

describe("RateLimitError", () => {
  it("should carry retryAfter and a 429 status", () => {
    const error = new RateLimitError("Rate limit exceeded", 60);
    expect(error).toBeInstanceOf(LogVaultError);
    expect(error.name).toBe("RateLimitError");
    expect(error.retryAfter).toBe(60);
    expect(error.statusCode).toBe(429);
  });

  it("should leave retryAfter undefined when the API gave none", () => {
    expect(new RateLimitError("Rate limit exceeded").retryAfter).toBeUndefined();
  });
});

describe("APIError", () => {
  it("should store status code and response", () => {
    const error = new APIError("HTTP 500", { statusCode: 500, response: { error: "Server error" } });
    expect(error.statusCode).toBe(500);
    expect(error.response).toEqual({ error: "Server error" });
  });

  it("should keep the response body out of JSON output", () => {
    const error = new APIError("HTTP 500", {
      statusCode: 500,
      response: { error: "Server error", key: "lv_test_secret" },
    });
    expect(JSON.parse(JSON.stringify(error))).toEqual({
      name: "APIError",
      message: "HTTP 500",
      statusCode: 500,
    });
  });

  it("should have connection and timeout subclasses", () => {
    const conn = new APIConnectionError("Connection failed after 3 retries: ECONNREFUSED");
    const timeout = new APITimeoutError("Request GET /v1/events timed out after 10ms");

    expect(conn).toBeInstanceOf(APIError);
    expect(conn.name).toBe("APIConnectionError");
    expect(timeout).toBeInstanceOf(APIError);
    expect(timeout.name).toBe("APITimeoutError");
    expect(conn).not.toBeInstanceOf(APITimeoutError);
  });
});

describe("Error hierarchy", () => {
  it("should let every error be caught as LogVaultError", () => {
    const errors = [
      new AuthenticationError("auth"),
      new ValidationError("validation"),
      new RateLimitError("rate"),
      new APIError("api"),
      new APIConnectionError("conn"),
      new APITimeoutError("timeout"),
    ];

    for (const err of errors) {
      expect(err).toBeInstanceOf(LogVaultError);
    }
  });

  it("should be catchable with try/catch", () => {
    try {
      throw new RateLimitError("Rate limit exceeded", 30);
    } catch (err) {
      expect(err).toBeInstanceOf(RateLimitError);
      expect(err).toHaveProperty("retryAfter", 30);
    }
  });
});
