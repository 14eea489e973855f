// ---------------------------------------------------------------------------
// LoggerInterceptor — One log line per API request / response / failure
// ---------------------------------------------------------------------------

import type {
  LogVaultInterceptor,
  OutboundRequest,
  InboundResponse,
  ErrorContext,
} from "./interface";

export interface LoggerInterceptorOptions {
  /** Include request and response bodies. Default: false. */
  verbose?: boolean;
  /** Maximum body length before truncation. Default: 500. */
  maxBodyLength?: number;
  /** Custom log function. Default: console.log. */
  logFn?: (message: string) => void;
  /** Clock used for the `ms=` field. Default: Date.now. */
  now?: () => number;
}

export class LoggerInterceptor implements LogVaultInterceptor {
  readonly name = "logger";

  private readonly verbose: boolean;
  private readonly maxBodyLength: number;
  private readonly logFn: (message: string) => void;
  private readonly now: () => number;
  private readonly startedAt = new Map<string, number>();

  constructor(options?: LoggerInterceptorOptions) {
    this.verbose = options?.verbose ?? false;
    this.maxBodyLength = options?.maxBodyLength ?? 500;
    this.logFn = options?.logFn ?? console.log;
    this.now = options?.now ?? Date.now;
  }

  async onRequest(request: OutboundRequest): Promise<OutboundRequest> {
    this.startedAt.set(request.id, this.now());

    let line = `[LV:REQ] ${request.method} ${request.path} id=${request.id}`;
    if (request.query && Object.keys(request.query).length > 0) {
      line += ` query=${new URLSearchParams(request.query).toString()}`;
    }
    if (this.verbose && request.body !== undefined) {
      line += ` body=${this.truncate(JSON.stringify(request.body))}`;
    }
    this.logFn(line);
    return request;
  }

  async onResponse(response: InboundResponse): Promise<InboundResponse> {
    let line = `[LV:RES] id=${response.id} status=${response.status} attempts=${response.attempts}`;
    const started = this.startedAt.get(response.id);
    if (started !== undefined) {
      this.startedAt.delete(response.id);
      line += ` ms=${this.now() - started}`;
    }
    if (this.verbose && response.body !== undefined) {
      line += ` body=${this.truncate(JSON.stringify(response.body))}`;
    }
    this.logFn(line);
    return response;
  }

  async onError(error: Error, context: ErrorContext): Promise<void> {
    const id = context.request?.id ?? context.response?.id;
    if (id !== undefined && (context.phase === "transport" || context.phase === "serialization")) {
      this.startedAt.delete(id);
    }
    const idPart = id !== undefined ? ` id=${id}` : "";
    this.logFn(`[LV:ERR] phase=${context.phase}${idPart} error=${error.message}`);
  }

  private truncate(value: string): string {
    if (value.length <= this.maxBodyLength) {
      return value;
    }
    return value.slice(0, this.maxBodyLength) + "...(truncated)";
  }
}
