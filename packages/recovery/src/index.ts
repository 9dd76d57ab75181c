export { ErrorRecoveryManager } from "./recovery-manager.js";
export type { ErrorRecoveryManagerOptions, ExecuteOptions, RecoverableOperation, RetryNotice } from "./recovery-manager.js";

export {
  AdaptiveStrategy,
  CircuitBreakerStrategy,
  ExponentialBackoffStrategy,
  FixedDelayStrategy,
  STRATEGY_NAMES,
  createRetryStrategy,
  isStrategyName,
} from "./strategies.js";
export type {
  AdaptiveStrategyOptions,
  AttemptOutcome,
  CircuitBreakerStrategyOptions,
  RetryDecision,
  RetryStrategy,
  StopReason,
  StrategyFactoryOptions,
  StrategyName,
  StrategyOptions,
} from "./strategies.js";

export { AdaptiveMetrics, CircuitBreakerState, DEFAULT_CIRCUIT_OPTIONS, KeyedState } from "./resource-state.js";
export type { CircuitBreakerOptions, CircuitSnapshot, CircuitState, OutcomeSample } from "./resource-state.js";

export { classifyError, isRetryableReason } from "./classifier.js";
export type { ServiceErrorHandler } from "./classifier.js";
export { DownloadErrorHandler, MetadataErrorHandler, StorageErrorHandler } from "./service-handlers.js";

export { ErrorReporter, JsonlReportSink, MemoryReportSink, genericSuggestions } from "./error-reporter.js";
export type { ErrorReport, ErrorReporterOptions, ErrorSummary, ReportDetails, ReportSink } from "./error-reporter.js";

export { AttemptTimeoutError, CircuitOpenError, ServiceError, describeError, errorMessage } from "./errors.js";
export type { ErrorDescription, ServiceErrorOptions } from "./errors.js";

export { KeyedMutex } from "./keyed-lock.js";
export { runAttempt, sleep } from "./sleep.js";
export type { Sleep } from "./sleep.js";

export {
  DEFAULT_RETRY_CONFIG,
  RETRY_REASONS,
  createErrorContext,
  createRetryConfig,
  recoveryStatusFor,
} from "./types.js";
export type {
  AttemptRecord,
  ErrorContext,
  ErrorContextInit,
  ErrorSeverity,
  RecoveryFailure,
  RecoveryFailureKind,
  RecoveryOperation,
  RecoveryResult,
  RecoveryStatus,
  RecoverySuccess,
  RetryConfig,
  RetryReason,
} from "./types.js";

export {
  emitStructuredLog,
  initOpenTelemetry,
  markSpanError,
  markSpanOk,
  recoveryTelemetry,
  recoveryTracer,
  setLogLevel,
  shutdownOpenTelemetry,
} from "./observability.js";
export type { LogLevel, RecoveryTelemetry } from "./observability.js";
