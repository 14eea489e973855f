// ---------------------------------------------------------------------------
// Input validation & payload serialization
// ---------------------------------------------------------------------------

import { z } from "zod";

import { SerializationError, ValidationError } from "./errors";
import {
  ACTION_PATTERN,
  DEFAULT_PAGE_SIZE,
  DEFAULT_SEARCH_LIMIT,
  EVENT_LEVELS,
  MAX_PAGE_SIZE,
  MAX_PAYLOAD_BYTES,
  MIN_SEARCH_QUERY_LENGTH,
} from "./protocol";
import type { AuditEventPayload, LogEventInput } from "./protocol";

// ── Schemas ──────────────────────────────────────────────────────────────

const TIMESTAMP_MESSAGE = "timestamp must be a valid Date or ISO-8601 string";

/** Calendar date with optional time, fraction and UTC offset. */
const ISO_8601_PATTERN =
  /^\d{4}-\d{2}-\d{2}(?:T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?(?:Z|[+-]\d{2}:?\d{2})?)?$/;

const nullableText = (field: string) =>
  z
    .string({ invalid_type_error: `${field} must be a string` })
    .nullish()
    .transform((value) => value ?? null);

export const LogEventInputSchema = z.object({
  action: z
    .string({ required_error: "action is required", invalid_type_error: "action must be a string" })
    .refine(
      (action) => ACTION_PATTERN.test(action),
      (action) => ({ message: `Invalid action format '${action}'. Expected 'domain.event'` }),
    ),
  userId: nullableText("userId"),
  resource: nullableText("resource"),
  metadata: z
    .record(z.unknown(), { invalid_type_error: "metadata must be an object" })
    .default({}),
  level: z
    .enum(EVENT_LEVELS, {
      errorMap: () => ({ message: `level must be one of: ${EVENT_LEVELS.join(", ")}` }),
    })
    .default("info"),
  message: nullableText("message"),
  timestamp: z
    .union([
      z.date(),
      z.string().refine(
        (value) => ISO_8601_PATTERN.test(value) && !Number.isNaN(Date.parse(value)),
        TIMESTAMP_MESSAGE,
      ),
    ], { errorMap: () => ({ message: TIMESTAMP_MESSAGE }) })
    .optional(),
});

export const ListEventsParamsSchema = z.object({
  page: z
    .number({ invalid_type_error: "page must be a number" })
    .int("page must be an integer")
    .min(1, "page must be >= 1")
    .default(1),
  pageSize: z
    .number({ invalid_type_error: "pageSize must be a number" })
    .int("pageSize must be an integer")
    .min(1, "pageSize must be >= 1")
    .default(DEFAULT_PAGE_SIZE)
    .transform((size) => Math.min(size, MAX_PAGE_SIZE)),
  userId: z.string({ invalid_type_error: "userId must be a string" }).optional(),
  action: z.string({ invalid_type_error: "action must be a string" }).optional(),
});

export const SearchParamsSchema = z.object({
  query: z
    .string({ invalid_type_error: "query must be a string" })
    .min(MIN_SEARCH_QUERY_LENGTH, `Query must be at least ${MIN_SEARCH_QUERY_LENGTH} characters`),
  limit: z
    .number({ invalid_type_error: "limit must be a number" })
    .int("limit must be an integer")
    .min(1, "limit must be >= 1")
    .default(DEFAULT_SEARCH_LIMIT),
});

export type ListEventsQuery = z.output<typeof ListEventsParamsSchema>;
export type SearchQuery = z.output<typeof SearchParamsSchema>;

// ── Helpers ──────────────────────────────────────────────────────────────

/** Parse `value` or throw a ValidationError carrying every issue message. */
export function parseOrThrow<S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const message = result.error.issues.map((issue) => issue.message).join("; ");
    throw new ValidationError(message, { cause: result.error });
  }
  return result.data;
}

/** Cheap synchronous check used before an event is queued. */
export function assertAction(action: string): void {
  if (typeof action !== "string" || !ACTION_PATTERN.test(action)) {
    throw new ValidationError(`Invalid action format '${String(action)}'. Expected 'domain.event'`);
  }
}

export function assertEventId(eventId: string): void {
  if (typeof eventId !== "string" || eventId.trim() === "") {
    throw new ValidationError("Event id is required");
  }
}

export function toEventPayload(input: LogEventInput, now: Date = new Date()): AuditEventPayload {
  assertAction(input.action);
  const parsed = parseOrThrow(LogEventInputSchema, input);

  let timestamp: string;
  if (parsed.timestamp instanceof Date) {
    timestamp = parsed.timestamp.toISOString();
  } else if (typeof parsed.timestamp === "string") {
    timestamp = parsed.timestamp;
  } else {
    timestamp = now.toISOString();
  }

  return {
    action: parsed.action,
    user_id: parsed.userId,
    resource: parsed.resource,
    metadata: parsed.metadata,
    level: parsed.level,
    message: parsed.message,
    timestamp,
  };
}

/**
 * Encode the payload exactly once. The returned string is what goes on the
 * wire, so the size check matches what the API sees.
 */
export function serializePayload(payload: unknown): string {
  let json: string | undefined;
  try {
    json = JSON.stringify(payload);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SerializationError(`Serialization failed: ${reason}`, { cause: err });
  }
  if (json === undefined) {
    throw new SerializationError("Serialization failed: payload is not JSON-encodable");
  }

  if (Buffer.byteLength(json, "utf8") > MAX_PAYLOAD_BYTES) {
    throw new ValidationError("Payload size exceeds 1MB");
  }
  return json;
}
