import { randomUUID } from "node:crypto";
import { classifyError, isRetryableReason, type ServiceErrorHandler } from "./classifier.js";
import { CircuitOpenError, describeError, errorMessage } from "./errors.js";
import { ErrorReporter } from "./error-reporter.js";
import { KeyedMutex } from "./keyed-lock.js";
import { emitStructuredLog, markSpanError, markSpanOk, recoveryTelemetry, recoveryTracer } from "./observability.js";
import { runAttempt, sleep as defaultSleep, type Sleep } from "./sleep.js";
import { ExponentialBackoffStrategy, type RetryStrategy } from "./strategies.js";
import {
  recoveryStatusFor,
  type AttemptRecord,
  type ErrorContext,
  type RecoveryFailure,
  type RecoveryFailureKind,
  type RecoveryOperation,
  type RecoveryResult,
  type RetryReason,
} from "./types.js";

/** Unit of work under retry. `attempt` starts at 1. */
export type RecoverableOperation<T> = (signal: AbortSignal, attempt: number) => Promise<T>;

export interface RetryNotice {
  attempt: number;
  delayMs: number;
  reason: RetryReason;
  error: unknown;
  context: ErrorContext;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
  /** Per-attempt budget; an attempt that exceeds it counts as a failed network attempt. */
  attemptTimeoutMs?: number;
  /** Called after a failed attempt, before the backoff sleep. */
  onRetry?: (notice: RetryNotice) => void;
}

export interface ErrorRecoveryManagerOptions {
  reporter?: ErrorReporter;
  defaultStrategy?: RetryStrategy;
  sleep?: Sleep;
  now?: () => number;
}

interface Failure {
  kind: RecoveryFailureKind;
  error: unknown;
  reason?: RetryReason;
}

/**
 * Runs operations under a retry strategy and an optional service handler.
 *
 * Calls for the same operation and resource are serialized; calls on
 * different keys run independently. Terminal failures are returned as values
 * and, unless cancelled or refused before any invocation, reported.
 */
export class ErrorRecoveryManager {
  readonly reporter: ErrorReporter;
  private readonly defaultStrategy: RetryStrategy;
  private readonly sleep: Sleep;
  private readonly now: () => number;
  private readonly active = new Map<string, RecoveryOperation>();
  private readonly locks = new KeyedMutex();

  constructor(options?: ErrorRecoveryManagerOptions) {
    this.reporter = options?.reporter ?? new ErrorReporter();
    this.defaultStrategy = options?.defaultStrategy ?? new ExponentialBackoffStrategy();
    this.sleep = options?.sleep ?? defaultSleep;
    this.now = options?.now ?? Date.now;
  }

  async executeWithRetry<T>(
    operation: RecoverableOperation<T>,
    context: ErrorContext,
    strategy: RetryStrategy = this.defaultStrategy,
    handler?: ServiceErrorHandler,
    options: ExecuteOptions = {},
  ): Promise<RecoveryResult<T>> {
    const key = `${context.operationName}:${context.resourceId}`;
    try {
      return await this.locks.runExclusive(key, () => this.track(operation, context, strategy, handler, options), options.signal);
    } catch (err) {
      // only the wait for the key can throw on abort; the loop itself returns a cancelled result
      if (!options.signal?.aborted) throw err;
      emitStructuredLog("recovery", "info", "operation ended: cancelled", {
        operation: context.operationName,
        resource: context.resourceId,
        attempts: 0,
      });
      return { ok: false, kind: "cancelled", error: options.signal.reason, operationId: randomUUID(), attempts: 0, context };
    }
  }

  /** Snapshot of the retry sequences currently in flight. */
  getActiveRecoveries(): RecoveryOperation[] {
    return Array.from(this.active.values(), (op) => ({ ...op }));
  }

  private track<T>(
    operation: RecoverableOperation<T>,
    context: ErrorContext,
    strategy: RetryStrategy,
    handler: ServiceErrorHandler | undefined,
    options: ExecuteOptions,
  ): Promise<RecoveryResult<T>> {
    return recoveryTracer.startActiveSpan(
      `recovery ${context.operationName}`,
      { attributes: { "recovery.resource": context.resourceId, "recovery.strategy": strategy.name } },
      async (span) => {
        const record: RecoveryOperation = {
          id: randomUUID(),
          operationName: context.operationName,
          resourceId: context.resourceId,
          traceId: context.traceId,
          jobId: context.jobId,
          strategy: strategy.name,
          status: "active",
          startedAt: new Date(this.now()).toISOString(),
          attempts: 0,
        };
        this.active.set(record.id, record);
        try {
          return await this.runLoop(operation, context, strategy, handler, options, record);
        } finally {
          this.active.delete(record.id);
          span.setAttribute("recovery.attempts", record.attempts);
          span.end();
        }
      },
    );
  }

  private async runLoop<T>(
    operation: RecoverableOperation<T>,
    context: ErrorContext,
    strategy: RetryStrategy,
    handler: ServiceErrorHandler | undefined,
    options: ExecuteOptions,
    record: RecoveryOperation,
  ): Promise<RecoveryResult<T>> {
    const { signal } = options;
    const metricAttrs = { operation: context.operationName, strategy: strategy.name };

    for (;;) {
      if (signal?.aborted) {
        return this.fail(record, context, handler, { kind: "cancelled", error: signal.reason });
      }
      if (!strategy.admit(context)) {
        recoveryTelemetry.circuitOpenTotal.add(1, metricAttrs);
        return this.fail(record, context, handler, {
          kind: "circuit_open",
          error: new CircuitOpenError(context.serviceName ?? context.resourceId),
        });
      }

      record.attempts += 1;
      const attempt = record.attempts;
      recoveryTelemetry.attemptsTotal.add(1, metricAttrs);
      const startedAt = this.now();

      try {
        const value = await runAttempt((attemptSignal) => operation(attemptSignal, attempt), signal, options.attemptTimeoutMs);
        strategy.recordOutcome(context, { status: "success", latencyMs: this.now() - startedAt });
        record.status = "succeeded";
        markSpanOk();
        if (attempt > 1) {
          emitStructuredLog("recovery", "info", "operation recovered", {
            operation: context.operationName,
            resource: context.resourceId,
            attempts: attempt,
          });
        }
        return { ok: true, value, operationId: record.id, attempts: attempt, context };
      } catch (error) {
        const durationMs = this.now() - startedAt;
        if (signal?.aborted) {
          strategy.recordOutcome(context, { status: "cancelled", latencyMs: durationMs });
          return this.fail(record, context, handler, { kind: "cancelled", error: signal.reason });
        }
        const reason = handler ? handler.classify(error) : classifyError(error, strategy.config);
        const retryable = isRetryableReason(reason, error, strategy.config);
        // a private video or a malformed request says nothing about the resource's health
        strategy.recordOutcome(context, { status: retryable ? "failure" : "rejected", latencyMs: durationMs });
        const { name, message, retryAfterMs } = describeError(error);
        const attemptRecord: AttemptRecord = {
          attempt,
          timestamp: new Date(startedAt).toISOString(),
          errorName: name,
          errorMessage: message,
          reason,
          retryable,
          delayMs: 0,
          durationMs,
        };
        context.attempts.push(attemptRecord);

        emitStructuredLog("recovery", "warn", `attempt ${attempt} failed`, {
          operation: context.operationName,
          resource: context.resourceId,
          reason,
          retryable,
          error: message,
        });

        if (handler && (await this.handledByService(handler, error, context))) {
          return this.fail(record, context, handler, { kind: "handled", error, reason });
        }
        if (!retryable) {
          return this.fail(record, context, handler, { kind: "non_retryable", error, reason });
        }

        const decision = strategy.nextDecision(context);
        if (!decision.retry) {
          return this.fail(record, context, handler, {
            kind: decision.stop === "circuit_open" ? "circuit_open" : "exhausted",
            error,
            reason,
          });
        }

        const hintMs = Math.min(retryAfterMs ?? 0, strategy.config.maxDelayMs);
        const delayMs = Math.max(decision.delayMs, hintMs);
        attemptRecord.delayMs = delayMs;
        recoveryTelemetry.retryDelayMs.record(delayMs, metricAttrs);
        options.onRetry?.({ attempt, delayMs, reason, error, context });

        try {
          await this.sleep(delayMs, signal);
        } catch (sleepError) {
          if (signal?.aborted) {
            return this.fail(record, context, handler, { kind: "cancelled", error: signal.reason });
          }
          throw sleepError;
        }
      }
    }
  }

  /** A handler that throws is logged and treated as declining the error. */
  private async handledByService(handler: ServiceErrorHandler, error: unknown, context: ErrorContext): Promise<boolean> {
    try {
      return await handler.handleError(error, context);
    } catch (handlerError) {
      emitStructuredLog("recovery", "error", "service error handler failed", {
        service: handler.serviceName,
        operation: context.operationName,
        error: errorMessage(handlerError),
      });
      return false;
    }
  }

  private suggestionsFrom(handler: ServiceErrorHandler, context: ErrorContext): string[] | undefined {
    try {
      return handler.getRecoverySuggestions(context);
    } catch (handlerError) {
      emitStructuredLog("recovery", "error", "service error handler failed to suggest actions", {
        service: handler.serviceName,
        operation: context.operationName,
        error: errorMessage(handlerError),
      });
      return undefined;
    }
  }

  private async fail(
    record: RecoveryOperation,
    context: ErrorContext,
    handler: ServiceErrorHandler | undefined,
    failure: Failure,
  ): Promise<RecoveryFailure> {
    record.status = recoveryStatusFor(failure.kind);
    recoveryTelemetry.failuresTotal.add(1, { operation: context.operationName, kind: failure.kind });
    markSpanError(failure.error);

    let reportId: string | undefined;
    if (failure.kind !== "cancelled" && context.attempts.length > 0) {
      reportId = await this.reporter.report(context, failure.error, {
        kind: failure.kind,
        reason: failure.reason,
        suggestions: handler ? this.suggestionsFrom(handler, context) : undefined,
      });
    } else {
      emitStructuredLog("recovery", "info", `operation ended: ${failure.kind}`, {
        operation: context.operationName,
        resource: context.resourceId,
        attempts: record.attempts,
      });
    }

    return {
      ok: false,
      kind: failure.kind,
      error: failure.error,
      reason: failure.reason,
      operationId: record.id,
      attempts: record.attempts,
      context,
      reportId,
    };
  }
}
