import { z } from "zod";
import { EVENT_LEVELS, LogVaultError, ValidationError } from "@logvault/client";
import type { EventLevel, EventMetadata, LogEventInput } from "@logvault/client";
import { withClient, type CommandContext, type GlobalOptions } from "./shared";

export interface LogCommandOptions extends GlobalOptions {
  user?: string;
  resource?: string;
  level?: string;
  message?: string;
  metadata?: string;
}

const MetadataSchema = z.record(z.unknown());

/** Parse the `--metadata` flag. Anything but a JSON object is rejected. */
export function parseMetadata(raw: string | undefined): EventMetadata | undefined {
  if (raw === undefined) return undefined;

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ValidationError(`--metadata is not valid JSON: ${reason}`, { cause: err });
  }

  const result = MetadataSchema.safeParse(parsed);
  if (!result.success) {
    throw new ValidationError("--metadata must be a JSON object");
  }
  return result.data;
}

export function parseLevel(raw: string | undefined): EventLevel | undefined {
  if (raw === undefined) return undefined;
  const level = EVENT_LEVELS.find((candidate) => candidate === raw.toLowerCase());
  if (!level) {
    throw new ValidationError(`level must be one of: ${EVENT_LEVELS.join(", ")}`);
  }
  return level;
}

export async function logCommand(
  action: string,
  options: LogCommandOptions,
  ctx: CommandContext,
): Promise<void> {
  const input: LogEventInput = {
    action,
    userId: options.user,
    resource: options.resource,
    level: parseLevel(options.level),
    message: options.message,
    metadata: parseMetadata(options.metadata),
  };

  const result = await withClient(ctx, options, "Recording event...", (client) => client.log(input));
  if (result === null) {
    throw new LogVaultError(`Event ${action} was not recorded`);
  }

  if (options.json) {
    ctx.output.json(result);
    return;
  }
  ctx.output.success(`Recorded ${action} as ${result.id}`);
  if (result.signature) {
    ctx.output.dim(`signature: ${result.signature}`);
  }
}
