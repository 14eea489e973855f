// ---------------------------------------------------------------------------
// InterceptorChain — Executes interceptors in registration order
// ---------------------------------------------------------------------------

import type {
  LogVaultInterceptor,
  OutboundRequest,
  InboundResponse,
  ErrorContext,
} from "./interface";

export class InterceptorChain {
  private readonly interceptors: LogVaultInterceptor[] = [];

  constructor(interceptors?: LogVaultInterceptor[]) {
    if (interceptors) {
      this.interceptors.push(...interceptors);
    }
  }

  /** Add an interceptor to the end of the chain. */
  add(interceptor: LogVaultInterceptor): void {
    this.interceptors.push(interceptor);
  }

  /** Remove an interceptor by name. */
  remove(name: string): boolean {
    const idx = this.interceptors.findIndex((i) => i.name === name);
    if (idx !== -1) {
      this.interceptors.splice(idx, 1);
      return true;
    }
    return false;
  }

  get length(): number {
    return this.interceptors.length;
  }

  /**
   * Run all `onRequest` hooks in order. A `null` from any hook stops the
   * chain and is returned: the request must not be sent.
   */
  async processRequest(request: OutboundRequest): Promise<OutboundRequest | null> {
    let current: OutboundRequest = request;

    for (const interceptor of this.interceptors) {
      if (!interceptor.onRequest) continue;
      try {
        const next = await interceptor.onRequest(current);
        if (next === null) {
          return null;
        }
        current = next;
      } catch (err) {
        await this.processError(toError(err), { phase: "request", request: current });
        // Keep the last good request on interceptor failure
      }
    }

    return current;
  }

  /** Run all `onResponse` hooks in order; each may transform the response. */
  async processResponse(response: InboundResponse): Promise<InboundResponse> {
    let current = response;

    for (const interceptor of this.interceptors) {
      if (!interceptor.onResponse) continue;
      try {
        current = await interceptor.onResponse(current);
      } catch (err) {
        await this.processError(toError(err), { phase: "response", response: current });
      }
    }

    return current;
  }

  /**
   * Run all `onError` hooks. Errors thrown by error handlers are dropped so a
   * failing handler cannot recurse into the chain.
   */
  async processError(error: Error, context: ErrorContext): Promise<void> {
    for (const interceptor of this.interceptors) {
      if (!interceptor.onError) continue;
      try {
        await interceptor.onError(error, context);
      } catch {
        // Swallow errors in error handlers to prevent loops
      }
    }
  }
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}
