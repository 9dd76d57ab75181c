import { metrics, trace } from "@opentelemetry/api";
import { emitStructuredLog, type LogLevel } from "@ytarchive/recovery";

const meter = metrics.getMeter("ytarchive.jobs", "0.1.0");

export const jobTelemetry = {
  tracer: trace.getTracer("ytarchive.jobs", "0.1.0"),
  runsTotal: meter.createCounter("job_runs_total", {
    description: "Jobs that reached a terminal status",
  }),
  itemFailuresTotal: meter.createCounter("job_item_failures_total", {
    description: "Job items that ended failed",
  }),
  durationMs: meter.createHistogram("job_duration_ms", {
    description: "Wall time from dispatch to terminal status",
  }),
};

export function logJob(level: LogLevel, message: string, extra: Record<string, unknown> = {}): void {
  emitStructuredLog("jobs", level, message, extra);
}
