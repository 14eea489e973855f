// ---------------------------------------------------------------------------
// Environment configuration — LOGVAULT_* variables
// ---------------------------------------------------------------------------

import { z } from "zod";

import { parseOrThrow } from "./validation";

const EnvSchema = z.object({
  LOGVAULT_API_KEY: z.string({ required_error: "LOGVAULT_API_KEY is required" }),
  LOGVAULT_BASE_URL: z.string().url("LOGVAULT_BASE_URL must be a valid URL").optional(),
  LOGVAULT_TIMEOUT_MS: z.coerce
    .number({ invalid_type_error: "LOGVAULT_TIMEOUT_MS must be a number" })
    .int("LOGVAULT_TIMEOUT_MS must be an integer")
    .positive("LOGVAULT_TIMEOUT_MS must be positive")
    .optional(),
  LOGVAULT_MAX_RETRIES: z.coerce
    .number({ invalid_type_error: "LOGVAULT_MAX_RETRIES must be a number" })
    .int("LOGVAULT_MAX_RETRIES must be an integer")
    .min(0, "LOGVAULT_MAX_RETRIES must be >= 0")
    .optional(),
  LOGVAULT_ENABLE_NONCE: z
    .enum(["true", "false", "1", "0"], {
      errorMap: () => ({ message: "LOGVAULT_ENABLE_NONCE must be true, false, 1 or 0" }),
    })
    .transform((value) => value === "true" || value === "1")
    .optional(),
});

export interface ClientConfig {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  maxRetries?: number;
  enableNonce?: boolean;
}

/**
 * Read client settings from the environment. Empty variables count as
 * unset. Throws ValidationError naming every invalid variable.
 */
export function loadClientConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const present: Record<string, string> = {};
  for (const key of Object.keys(EnvSchema.shape)) {
    const value = env[key];
    if (value !== undefined && value.trim() !== "") {
      present[key] = value.trim();
    }
  }

  const parsed = parseOrThrow(EnvSchema, present);
  return {
    apiKey: parsed.LOGVAULT_API_KEY,
    baseUrl: parsed.LOGVAULT_BASE_URL,
    timeoutMs: parsed.LOGVAULT_TIMEOUT_MS,
    maxRetries: parsed.LOGVAULT_MAX_RETRIES,
    enableNonce: parsed.LOGVAULT_ENABLE_NONCE,
  };
}
