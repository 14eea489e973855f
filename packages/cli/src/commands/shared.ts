import { InvalidArgumentError } from "commander";
import { LogVaultClient } from "@logvault/client";
import type { AuditEventRecord, LogVaultClientOptions } from "@logvault/client";
import type { IOutputService } from "../interfaces/output.interface";

/** Options every command accepts. */
export interface GlobalOptions {
  apiKey?: string;
  baseUrl?: string;
  json?: boolean;
}

export type ClientFactory = (options: GlobalOptions) => LogVaultClient;

export interface CommandContext {
  output: IOutputService;
  createClient: ClientFactory;
}

/**
 * Client from `LOGVAULT_*` variables, with `--api-key` / `--base-url`
 * taking precedence when given.
 */
export function createClientFromEnv(
  options: GlobalOptions,
  env: NodeJS.ProcessEnv = process.env,
): LogVaultClient {
  const overrides: Partial<LogVaultClientOptions> = {};
  if (options.apiKey) overrides.apiKey = options.apiKey;
  if (options.baseUrl) overrides.baseUrl = options.baseUrl;
  return LogVaultClient.fromEnv(env, overrides);
}

/**
 * Run `fn` with a fresh client, showing a spinner unless JSON output was
 * requested. The client is closed afterwards either way.
 */
export async function withClient<T>(
  ctx: CommandContext,
  options: GlobalOptions,
  spinnerText: string,
  fn: (client: LogVaultClient) => Promise<T>,
): Promise<T> {
  const client = ctx.createClient(options);
  const spin = !options.json;
  if (spin) ctx.output.startSpinner(spinnerText);
  try {
    return await fn(client);
  } finally {
    if (spin) ctx.output.stopSpinner();
    await client.close();
  }
}

/** Commander argument parser for whole numbers. */
export function parseInteger(value: string): number {
  if (!/^-?\d+$/.test(value.trim())) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return Number.parseInt(value, 10);
}

/** One-line summary used by `list` and `search`. */
export function formatEventLine(event: AuditEventRecord): string {
  let line = `${event.timestamp} ${event.level.toUpperCase().padEnd(8)} ${event.action} (${event.id})`;
  if (event.user_id) {
    line += ` user=${event.user_id}`;
  }
  return line;
}

/** Field-per-line view used by `get`. */
export function formatEventDetails(event: AuditEventRecord): string[] {
  const lines = [
    `id: ${event.id}`,
    `action: ${event.action}`,
    `level: ${event.level}`,
    `user: ${event.user_id ?? "-"}`,
    `resource: ${event.resource ?? "-"}`,
    `message: ${event.message ?? "-"}`,
    `timestamp: ${event.timestamp}`,
  ];
  if (event.signature) {
    lines.push(`signature: ${event.signature}`);
  }
  if (Object.keys(event.metadata).length > 0) {
    lines.push(`metadata: ${JSON.stringify(event.metadata)}`);
  }
  return lines;
}
