import { LogVaultClient, silentLogger } from "@logvault/client";
import type { AuditEventRecord } from "@logvault/client";
import type { IOutputService } from "../interfaces/output.interface";
import type { CommandContext, GlobalOptions } from "../commands/shared";

/** Output double that records what a command printed. */
export class RecordingOutput implements IOutputService {
  readonly calls: Array<[string, string]> = [];
  readonly jsonValues: unknown[] = [];
  spinnerActive = false;

  header(title: string): void {
    this.calls.push(["header", title]);
  }
  info(message: string): void {
    this.calls.push(["info", message]);
  }
  success(message: string): void {
    this.calls.push(["success", message]);
  }
  warn(message: string): void {
    this.calls.push(["warn", message]);
  }
  error(message: string): void {
    this.calls.push(["error", message]);
  }
  dim(message: string): void {
    this.calls.push(["dim", message]);
  }
  json(value: unknown): void {
    this.jsonValues.push(value);
  }
  newline(): void {
    this.calls.push(["newline", ""]);
  }
  startSpinner(text: string): void {
    this.spinnerActive = true;
    this.calls.push(["spinner", text]);
  }
  stopSpinner(): void {
    this.spinnerActive = false;
  }
}

export const EVENT: AuditEventRecord = {
  id: "evt_1",
  action: "user.login",
  user_id: "user_1",
  resource: null,
  metadata: { ip: "10.0.0.1" },
  level: "info",
  message: null,
  timestamp: "2024-01-15T10:30:00Z",
  signature: "sig_abc",
};

export function setup(): {
  client: LogVaultClient;
  output: RecordingOutput;
  createClient: jest.Mock<LogVaultClient, [GlobalOptions]>;
  ctx: CommandContext;
} {
  const client = new LogVaultClient({ apiKey: "lv_test_abc123xyz", logger: silentLogger });
  const output = new RecordingOutput();
  const createClient = jest.fn<LogVaultClient, [GlobalOptions]>(() => client);
  return { client, output, createClient, ctx: { output, createClient } };
}
