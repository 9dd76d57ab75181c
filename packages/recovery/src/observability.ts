import { context, metrics, SpanStatusCode, trace } from "@opentelemetry/api";
import { OTLPMetricExporter } from "@opentelemetry/exporter-metrics-otlp-http";
import { OTLPTraceExporter } from "@opentelemetry/exporter-trace-otlp-http";
import { Resource } from "@opentelemetry/resources";
import { MeterProvider, PeriodicExportingMetricReader } from "@opentelemetry/sdk-metrics";
import { NodeTracerProvider } from "@opentelemetry/sdk-trace-node";
import { BatchSpanProcessor } from "@opentelemetry/sdk-trace-base";
import { ATTR_SERVICE_NAME, ATTR_SERVICE_VERSION } from "@opentelemetry/semantic-conventions";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface RecoveryTelemetry {
  attemptsTotal: ReturnType<ReturnType<typeof metrics.getMeter>["createCounter"]>;
  failuresTotal: ReturnType<ReturnType<typeof metrics.getMeter>["createCounter"]>;
  circuitOpenTotal: ReturnType<ReturnType<typeof metrics.getMeter>["createCounter"]>;
  retryDelayMs: ReturnType<ReturnType<typeof metrics.getMeter>["createHistogram"]>;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

function isLogLevel(value: string | undefined): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

const envLevel = process.env.LOG_LEVEL;
let minimumLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "debug";
let tracerProvider: NodeTracerProvider | undefined;
let meterProvider: MeterProvider | undefined;

export function setLogLevel(level: LogLevel): void {
  minimumLevel = level;
}

export async function initOpenTelemetry(serviceName: string, serviceVersion = "0.1.0"): Promise<void> {
  if (tracerProvider || meterProvider) {
    return;
  }

  const endpoint = process.env.OTEL_EXPORTER_OTLP_ENDPOINT ?? "http://127.0.0.1:4318";
  const resource = new Resource({
    [ATTR_SERVICE_NAME]: serviceName,
    [ATTR_SERVICE_VERSION]: serviceVersion,
  });

  const traceExporter = new OTLPTraceExporter({ url: `${endpoint}/v1/traces` });
  tracerProvider = new NodeTracerProvider({ resource });
  tracerProvider.addSpanProcessor(new BatchSpanProcessor(traceExporter));
  tracerProvider.register();

  const metricExporter = new OTLPMetricExporter({ url: `${endpoint}/v1/metrics` });
  const metricReader = new PeriodicExportingMetricReader({
    exporter: metricExporter,
    exportIntervalMillis: 5_000,
  });
  meterProvider = new MeterProvider({ resource, readers: [metricReader] });
  metrics.setGlobalMeterProvider(meterProvider);
}

export async function shutdownOpenTelemetry(): Promise<void> {
  await Promise.all([tracerProvider?.shutdown(), meterProvider?.shutdown()]);
  tracerProvider = undefined;
  meterProvider = undefined;
}

const recoveryMeter = metrics.getMeter("ytarchive.recovery", "0.1.0");
export const recoveryTracer = trace.getTracer("ytarchive.recovery", "0.1.0");

export const recoveryTelemetry: RecoveryTelemetry = {
  attemptsTotal: recoveryMeter.createCounter("recovery_attempts_total", {
    description: "Operation invocations made under retry",
  }),
  failuresTotal: recoveryMeter.createCounter("recovery_failures_total", {
    description: "Recovery calls that ended without a value",
  }),
  circuitOpenTotal: recoveryMeter.createCounter("circuit_open_total", {
    description: "Attempts refused by an open circuit",
  }),
  retryDelayMs: recoveryMeter.createHistogram("recovery_retry_delay_ms", {
    description: "Backoff delay applied before a retry",
  }),
};

export function emitStructuredLog(
  service: string,
  level: LogLevel,
  message: string,
  extra: Record<string, unknown> = {},
): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[minimumLevel]) return;

  const activeSpan = trace.getSpan(context.active());
  const spanContext = activeSpan?.spanContext();
  const entry = {
    timestamp: new Date().toISOString(),
    service_name: service,
    level,
    message,
    traceId: spanContext?.traceId,
    spanId: spanContext?.spanId,
    ...extra,
  };

  process.stdout.write(`${JSON.stringify(entry)}\n`);
}

export function markSpanOk(): void {
  const span = trace.getSpan(context.active());
  span?.setStatus({ code: SpanStatusCode.OK });
}

export function markSpanError(err: unknown): void {
  const span = trace.getSpan(context.active());
  if (!span) {
    return;
  }
  span.recordException(err instanceof Error ? err : new Error(String(err)));
  span.setStatus({
    code: SpanStatusCode.ERROR,
    message: err instanceof Error ? err.message : String(err),
  });
}
