// ---------------------------------------------------------------------------
// TelemetryInterceptor — Per-endpoint latency & error tracking
// ---------------------------------------------------------------------------

import type {
  LogVaultInterceptor,
  OutboundRequest,
  InboundResponse,
  ErrorContext,
} from "./interface";

/** Metrics for a single endpoint (`METHOD /path`). */
export interface EndpointMetrics {
  count: number;
  errorCount: number;
  totalLatencyMs: number;
  p95LatencyMs: number;
}

export type TelemetryMetrics = Record<string, EndpointMetrics>;

const DEFAULT_BUFFER_SIZE = 100;

/** Most recent latency samples for one endpoint, oldest first. */
class LatencyWindow {
  private readonly samples: number[] = [];

  constructor(private readonly size: number) {}

  add(latencyMs: number): void {
    this.samples.push(latencyMs);
    if (this.samples.length > this.size) {
      this.samples.shift();
    }
  }

  /** Nearest-rank percentile; 0 when empty. */
  percentile(p: number): number {
    if (this.samples.length === 0) return 0;
    const sorted = [...this.samples].sort((a, b) => a - b);
    const rank = Math.ceil(sorted.length * p) - 1;
    return sorted[Math.min(sorted.length - 1, Math.max(0, rank))];
  }
}

interface EndpointState {
  count: number;
  errorCount: number;
  totalLatencyMs: number;
  latencies: LatencyWindow;
}

export interface TelemetryInterceptorOptions {
  /** Latency samples kept per endpoint for p95. Default: 100, minimum 1. */
  bufferSize?: number;
  /** Clock used for latency. Default: Date.now. */
  now?: () => number;
}

export class TelemetryInterceptor implements LogVaultInterceptor {
  readonly name = "telemetry";

  private readonly bufferSize: number;
  private readonly now: () => number;
  private readonly endpoints = new Map<string, EndpointState>();
  private readonly pending = new Map<string, { endpoint: string; startTime: number }>();

  constructor(options?: TelemetryInterceptorOptions) {
    this.bufferSize = Math.max(1, Math.floor(options?.bufferSize ?? DEFAULT_BUFFER_SIZE));
    this.now = options?.now ?? Date.now;
  }

  async onRequest(request: OutboundRequest): Promise<OutboundRequest> {
    const endpoint = endpointKey(request.method, request.path);
    this.pending.set(request.id, { endpoint, startTime: this.now() });
    this.ensureEndpoint(endpoint);
    return request;
  }

  async onResponse(response: InboundResponse): Promise<InboundResponse> {
    this.record(response.id, response.status >= 400);
    return response;
  }

  async onError(_error: Error, context: ErrorContext): Promise<void> {
    if (!context.request) return;
    if (context.phase === "transport") {
      this.record(context.request.id, true);
    } else if (context.phase === "serialization") {
      // Never sent: no latency to record.
      this.pending.delete(context.request.id);
    }
  }

  /** Snapshot of all endpoint metrics. */
  getMetrics(): TelemetryMetrics {
    const result: TelemetryMetrics = {};
    for (const [endpoint, state] of this.endpoints) {
      result[endpoint] = {
        count: state.count,
        errorCount: state.errorCount,
        totalLatencyMs: state.totalLatencyMs,
        p95LatencyMs: state.latencies.percentile(0.95),
      };
    }
    return result;
  }

  /** Requests seen by `onRequest` that have not yet finished. */
  get inFlight(): number {
    return this.pending.size;
  }

  resetMetrics(): void {
    this.endpoints.clear();
    this.pending.clear();
  }

  private record(id: string, failed: boolean): void {
    const pending = this.pending.get(id);
    if (!pending) return;
    this.pending.delete(id);

    const state = this.ensureEndpoint(pending.endpoint);
    state.count++;

    const latency = this.now() - pending.startTime;
    state.totalLatencyMs += latency;
    state.latencies.add(latency);

    if (failed) {
      state.errorCount++;
    }
  }

  private ensureEndpoint(endpoint: string): EndpointState {
    let state = this.endpoints.get(endpoint);
    if (!state) {
      state = {
        count: 0,
        errorCount: 0,
        totalLatencyMs: 0,
        latencies: new LatencyWindow(this.bufferSize),
      };
      this.endpoints.set(endpoint, state);
    }
    return state;
  }
}

/** Event ids are collapsed so `/v1/events/abc` and `/v1/events/def` share a bucket. */
function endpointKey(method: string, path: string): string {
  const normalized = path
    .replace(/^\/v1\/events\/(?!search$)[^/]+\/verify$/, "/v1/events/:id/verify")
    .replace(/^\/v1\/events\/(?!search$)[^/]+$/, "/v1/events/:id");
  return `${method} ${normalized}`;
}
