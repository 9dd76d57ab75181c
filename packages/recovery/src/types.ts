import { randomUUID } from "node:crypto";
import { context as otelContext, trace } from "@opentelemetry/api";

/** Category of a failed attempt, derived per attempt by a classifier. */
export type RetryReason =
  | "network"
  | "rate_limit"
  | "quota_exceeded"
  | "resource_unavailable"
  | "validation"
  | "unknown";

export const RETRY_REASONS: readonly RetryReason[] = [
  "network",
  "rate_limit",
  "quota_exceeded",
  "resource_unavailable",
  "validation",
  "unknown",
];

export type ErrorSeverity = "critical" | "high" | "medium" | "low" | "info";

export interface RetryConfig {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly maxDelayMs: number;
  readonly backoffFactor: number;
  /** Fraction of the computed delay used as symmetric jitter (0.2 means ±20%). */
  readonly jitterFraction: number;
  /** HTTP statuses that are worth another attempt. */
  readonly retryableStatuses: readonly number[];
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = Object.freeze({
  maxAttempts: 3,
  baseDelayMs: 1_000,
  maxDelayMs: 300_000,
  backoffFactor: 2,
  jitterFraction: 0.2,
  retryableStatuses: Object.freeze([408, 425, 429, 500, 502, 503, 504]),
});

/**
 * Build a validated, frozen retry configuration.
 *
 * Throws when the values cannot describe a sane retry policy, e.g. a
 * `maxDelayMs` below `baseDelayMs`.
 */
export function createRetryConfig(overrides: Partial<RetryConfig> = {}): RetryConfig {
  const config: RetryConfig = {
    maxAttempts: overrides.maxAttempts ?? DEFAULT_RETRY_CONFIG.maxAttempts,
    baseDelayMs: overrides.baseDelayMs ?? DEFAULT_RETRY_CONFIG.baseDelayMs,
    maxDelayMs: overrides.maxDelayMs ?? Math.max(DEFAULT_RETRY_CONFIG.maxDelayMs, overrides.baseDelayMs ?? 0),
    backoffFactor: overrides.backoffFactor ?? DEFAULT_RETRY_CONFIG.backoffFactor,
    jitterFraction: overrides.jitterFraction ?? DEFAULT_RETRY_CONFIG.jitterFraction,
    retryableStatuses: Object.freeze([...(overrides.retryableStatuses ?? DEFAULT_RETRY_CONFIG.retryableStatuses)]),
  };

  if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
    throw new Error(`maxAttempts must be a positive integer, got ${config.maxAttempts}`);
  }
  if (config.baseDelayMs < 0) {
    throw new Error(`baseDelayMs must be >= 0, got ${config.baseDelayMs}`);
  }
  if (config.maxDelayMs < config.baseDelayMs) {
    throw new Error("maxDelayMs must be greater than or equal to baseDelayMs");
  }
  if (config.backoffFactor < 1) {
    throw new Error(`backoffFactor must be >= 1, got ${config.backoffFactor}`);
  }
  if (config.jitterFraction < 0 || config.jitterFraction > 1) {
    throw new Error(`jitterFraction must be within [0, 1], got ${config.jitterFraction}`);
  }

  return Object.freeze(config);
}

/** One failed invocation inside an {@link ErrorContext}. */
export interface AttemptRecord {
  attempt: number;
  timestamp: string;
  errorName: string;
  errorMessage: string;
  reason: RetryReason;
  retryable: boolean;
  /** Delay applied before the next attempt; 0 when no retry followed. */
  delayMs: number;
  durationMs: number;
}

/** One logical operation under retry. Owned by the call stack that created it. */
export interface ErrorContext {
  operationName: string;
  resourceId: string;
  traceId: string;
  serviceName?: string;
  jobId?: string;
  metadata: Record<string, unknown>;
  attempts: AttemptRecord[];
}

export interface ErrorContextInit {
  operationName: string;
  resourceId: string;
  traceId?: string;
  serviceName?: string;
  jobId?: string;
  metadata?: Record<string, unknown>;
}

export function createErrorContext(init: ErrorContextInit): ErrorContext {
  const spanContext = trace.getSpan(otelContext.active())?.spanContext();
  return {
    operationName: init.operationName,
    resourceId: init.resourceId,
    traceId: init.traceId ?? spanContext?.traceId ?? randomUUID(),
    serviceName: init.serviceName,
    jobId: init.jobId,
    metadata: { ...(init.metadata ?? {}) },
    attempts: [],
  };
}

export type RecoveryStatus =
  | "active"
  | "succeeded"
  | "failed_retryable_exhausted"
  | "failed_nonretryable"
  | "cancelled";

/** Externally observable view of one in-flight retry sequence. */
export interface RecoveryOperation {
  id: string;
  operationName: string;
  resourceId: string;
  traceId: string;
  jobId?: string;
  strategy: string;
  status: RecoveryStatus;
  startedAt: string;
  attempts: number;
}

/**
 * How a recovery call ended without a value.
 *
 * - `exhausted`: the strategy ran out of attempts (or stopped early).
 * - `non_retryable`: the classifier marked the failure as permanent.
 * - `handled`: a service handler took ownership of the failure.
 * - `circuit_open`: the resource's circuit refused the attempt.
 * - `cancelled`: the caller's signal aborted the call.
 */
export type RecoveryFailureKind = "exhausted" | "non_retryable" | "handled" | "circuit_open" | "cancelled";

export interface RecoverySuccess<T> {
  ok: true;
  value: T;
  operationId: string;
  attempts: number;
  context: ErrorContext;
}

export interface RecoveryFailure {
  ok: false;
  kind: RecoveryFailureKind;
  error: unknown;
  reason?: RetryReason;
  operationId: string;
  attempts: number;
  context: ErrorContext;
  reportId?: string;
}

export type RecoveryResult<T> = RecoverySuccess<T> | RecoveryFailure;

export function recoveryStatusFor(kind: RecoveryFailureKind): RecoveryStatus {
  switch (kind) {
    case "exhausted":
      return "failed_retryable_exhausted";
    case "cancelled":
      return "cancelled";
    default:
      return "failed_nonretryable";
  }
}
