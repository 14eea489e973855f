// ---------------------------------------------------------------------------
// Interceptors — Barrel exports
// ---------------------------------------------------------------------------

export type {
  LogVaultInterceptor,
  OutboundRequest,
  InboundResponse,
  ErrorContext,
} from "./interface";

export { InterceptorChain } from "./chain";

export { LoggerInterceptor } from "./logger";
export type { LoggerInterceptorOptions } from "./logger";

export { TelemetryInterceptor } from "./telemetry";
export type { TelemetryInterceptorOptions, EndpointMetrics, TelemetryMetrics } from "./telemetry";
