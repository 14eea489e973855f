// ---------------------------------------------------------------------------
// BackgroundLogger — Fire-and-forget event delivery on top of LogVaultClient
// ---------------------------------------------------------------------------

import type { LogVaultClient } from "./client";
import { consoleLogger } from "./logger";
import type { Logger } from "./logger";
import type { LogEventInput } from "./protocol";
import { assertAction } from "./validation";

const DEFAULT_MAX_QUEUE_SIZE = 1_000;
const DEFAULT_CONCURRENCY = 1;

export interface BackgroundLoggerOptions {
  /** Events held in memory before new ones are dropped. Default: 1000. */
  maxQueueSize?: number;
  /** Concurrent deliveries. Default: 1 (preserves submission order). */
  concurrency?: number;
  /** Called for each event that could not be delivered. */
  onError?: (error: Error, input: LogEventInput) => void;
  /** Used when no `onError` is given, and for drop warnings. */
  logger?: Logger;
}

export interface BackgroundLoggerMetrics {
  queued: number;
  inFlight: number;
  delivered: number;
  failed: number;
  dropped: number;
}

export class BackgroundLogger {
  private readonly client: LogVaultClient;
  private readonly maxQueueSize: number;
  private readonly concurrency: number;
  private readonly onError?: (error: Error, input: LogEventInput) => void;
  private readonly logger: Logger;

  private readonly queue: LogEventInput[] = [];
  private readonly idleWaiters: Array<() => void> = [];
  private inFlight = 0;
  private delivered = 0;
  private failed = 0;
  private dropped = 0;
  private closed = false;

  constructor(client: LogVaultClient, options?: BackgroundLoggerOptions) {
    this.client = client;
    this.maxQueueSize = Math.max(1, options?.maxQueueSize ?? DEFAULT_MAX_QUEUE_SIZE);
    this.concurrency = Math.max(1, options?.concurrency ?? DEFAULT_CONCURRENCY);
    this.onError = options?.onError;
    this.logger = options?.logger ?? consoleLogger;
  }

  /**
   * Queue an event and return immediately. The timestamp is fixed now, not
   * at delivery. Returns `false` when the event was dropped.
   *
   * @throws ValidationError when the action is malformed
   */
  log(input: LogEventInput): boolean {
    assertAction(input.action);

    if (this.closed) {
      this.drop(input, "logger is closed");
      return false;
    }
    if (this.queue.length >= this.maxQueueSize) {
      this.drop(input, `queue is full (${this.maxQueueSize})`);
      return false;
    }

    this.queue.push({ ...input, timestamp: input.timestamp ?? new Date() });
    this.pump();
    return true;
  }

  /** Resolves once every queued event has been attempted. */
  flush(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  /** Stop accepting events, deliver what is queued, then close the client. */
  async close(): Promise<void> {
    this.closed = true;
    await this.flush();
    await this.client.close();
  }

  getMetrics(): BackgroundLoggerMetrics {
    return {
      queued: this.queue.length,
      inFlight: this.inFlight,
      delivered: this.delivered,
      failed: this.failed,
      dropped: this.dropped,
    };
  }

  // ------------------------------------------------------------------
  // Internals
  // ------------------------------------------------------------------

  private isIdle(): boolean {
    return this.queue.length === 0 && this.inFlight === 0;
  }

  private pump(): void {
    while (this.inFlight < this.concurrency && this.queue.length > 0) {
      const next = this.queue.shift();
      if (next === undefined) break;
      this.inFlight++;
      void this.deliver(next);
    }

    if (this.isIdle()) {
      const waiters = this.idleWaiters.splice(0);
      for (const resolve of waiters) {
        resolve();
      }
    }
  }

  /** Never rejects: failures are counted and reported. */
  private async deliver(input: LogEventInput): Promise<void> {
    try {
      const result = await this.client.log(input);
      if (result === null) {
        this.failed++;
      } else {
        this.delivered++;
      }
    } catch (err) {
      this.failed++;
      this.report(err instanceof Error ? err : new Error(String(err)), input);
    } finally {
      this.inFlight--;
      this.pump();
    }
  }

  private report(error: Error, input: LogEventInput): void {
    if (!this.onError) {
      this.logger.error(`Failed to deliver event ${input.action}: ${error.message}`);
      return;
    }
    try {
      this.onError(error, input);
    } catch (handlerErr) {
      const message = handlerErr instanceof Error ? handlerErr.message : String(handlerErr);
      this.logger.error(`onError handler threw: ${message}`);
    }
  }

  private drop(input: LogEventInput, reason: string): void {
    this.dropped++;
    this.logger.warn(`Dropped event ${input.action}: ${reason}`);
  }
}
