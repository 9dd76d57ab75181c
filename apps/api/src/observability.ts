import { metrics, trace } from "@opentelemetry/api";
import { emitStructuredLog, type LogLevel } from "@ytarchive/recovery";

const meter = metrics.getMeter("ytarchive.api", "0.1.0");
const tracer = trace.getTracer("ytarchive.api", "0.1.0");

export const apiTelemetry = {
  tracer,
  requestLatencyMs: meter.createHistogram("api_request_latency_ms", {
    description: "API request latency in milliseconds",
  }),
  requestErrors: meter.createCounter("api_request_errors_total", {
    description: "API request errors",
  }),
  requestCount: meter.createCounter("api_request_total", {
    description: "Total API requests",
  }),
};

export function logApi(level: LogLevel, message: string, extra: Record<string, unknown>): void {
  emitStructuredLog("api", level, message, extra);
}
