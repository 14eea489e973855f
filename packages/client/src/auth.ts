// ---------------------------------------------------------------------------
// Auth helpers — API key checks and request headers
// ---------------------------------------------------------------------------

import { v4 as uuidv4 } from "uuid";

import { AuthenticationError } from "./errors";
import { API_KEY_PREFIXES, SDK_VERSION } from "./protocol";

export function validateApiKey(apiKey: string | undefined): string {
  if (!apiKey) {
    throw new AuthenticationError("API key is required");
  }
  if (!API_KEY_PREFIXES.some((prefix) => apiKey.startsWith(prefix))) {
    throw new AuthenticationError(
      `API key must start with ${API_KEY_PREFIXES.join(" or ")}`,
    );
  }
  return apiKey;
}

/** `lv_test_abc123xyz` → `lv_test_…3xyz` */
export function maskApiKey(apiKey: string): string {
  const prefix = API_KEY_PREFIXES.find((p) => apiKey.startsWith(p)) ?? "";
  const rest = apiKey.slice(prefix.length);
  if (rest.length <= 4) {
    return `${prefix}…`;
  }
  return `${prefix}…${rest.slice(-4)}`;
}

export interface HeaderOptions {
  /** Attach a fresh `X-Nonce` for server-side replay protection. */
  nonce?: boolean;
}

export function buildHeaders(apiKey: string, options?: HeaderOptions): Record<string, string> {
  const headers: Record<string, string> = {
    Authorization: `Bearer ${apiKey}`,
    "Content-Type": "application/json",
    Accept: "application/json",
    "User-Agent": `logvault-node/${SDK_VERSION}`,
    "X-Client-Version": SDK_VERSION,
  };
  if (options?.nonce) {
    headers["X-Nonce"] = uuidv4();
  }
  return headers;
}
