import { emitStructuredLog } from "./observability.js";
import {
  AdaptiveMetrics,
  CircuitBreakerState,
  DEFAULT_CIRCUIT_OPTIONS,
  KeyedState,
  type CircuitSnapshot,
} from "./resource-state.js";
import { createRetryConfig, type ErrorContext, type RetryConfig } from "./types.js";

export type StrategyName = "fixed" | "exponential" | "circuit_breaker" | "adaptive";

export const STRATEGY_NAMES: readonly StrategyName[] = ["fixed", "exponential", "circuit_breaker", "adaptive"];

export type StopReason = "max_attempts" | "circuit_open" | "low_success_rate";

export interface RetryDecision {
  retry: boolean;
  delayMs: number;
  stop?: StopReason;
}

export interface AttemptOutcome {
  /** `rejected`: a non-retryable answer (unavailable resource, bad input); not a health signal. */
  status: "success" | "failure" | "rejected" | "cancelled";
  latencyMs: number;
}

/**
 * Decides whether a failed operation should run again and how long to wait.
 *
 * `nextDecision` never throws and always refuses once the context holds
 * `maxAttempts` failed attempts.
 */
export interface RetryStrategy {
  readonly name: StrategyName;
  readonly config: RetryConfig;
  /** Checked before every invocation; `false` means fail fast without calling the operation. */
  admit(context: ErrorContext): boolean;
  recordOutcome(context: ErrorContext, outcome: AttemptOutcome): void;
  nextDecision(context: ErrorContext): RetryDecision;
}

export interface StrategyOptions {
  random?: () => number;
  now?: () => number;
  /** Key used for shared per-resource state. Defaults to the context's resource id. */
  keyOf?: (context: ErrorContext) => string;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

abstract class BaseRetryStrategy implements RetryStrategy {
  abstract readonly name: StrategyName;
  readonly config: RetryConfig;
  protected readonly random: () => number;
  protected readonly now: () => number;
  protected readonly keyOf: (context: ErrorContext) => string;

  constructor(config: Partial<RetryConfig> = {}, options: StrategyOptions = {}) {
    this.config = createRetryConfig(config);
    this.random = options.random ?? Math.random;
    this.now = options.now ?? Date.now;
    this.keyOf = options.keyOf ?? ((context) => context.resourceId);
  }

  admit(_context: ErrorContext): boolean {
    return true;
  }

  recordOutcome(_context: ErrorContext, _outcome: AttemptOutcome): void {}

  nextDecision(context: ErrorContext): RetryDecision {
    if (context.attempts.length >= this.config.maxAttempts) {
      return { retry: false, delayMs: 0, stop: "max_attempts" };
    }
    try {
      return this.decide(context);
    } catch (err) {
      emitStructuredLog("recovery", "error", "retry strategy failed to decide", {
        strategy: this.name,
        operation: context.operationName,
        resource: context.resourceId,
        error: err instanceof Error ? err.message : String(err),
      });
      return { retry: false, delayMs: 0, stop: "max_attempts" };
    }
  }

  protected abstract decide(context: ErrorContext): RetryDecision;

  /** `min(base * factor^(attempts-1), max)` for the number of failed attempts so far. */
  protected backoff(attempts: number): number {
    const exponent = Math.max(attempts - 1, 0);
    return Math.min(this.config.baseDelayMs * this.config.backoffFactor ** exponent, this.config.maxDelayMs);
  }

  /** Symmetric jitter of ±jitterFraction around `delayMs`, kept within [0, maxDelayMs]. */
  protected jitter(delayMs: number): number {
    const spread = delayMs * this.config.jitterFraction;
    return clamp(delayMs + spread * (2 * this.random() - 1), 0, this.config.maxDelayMs);
  }
}

export class FixedDelayStrategy extends BaseRetryStrategy {
  readonly name = "fixed" as const;

  protected decide(): RetryDecision {
    return { retry: true, delayMs: this.jitter(this.config.baseDelayMs) };
  }
}

export class ExponentialBackoffStrategy extends BaseRetryStrategy {
  readonly name = "exponential" as const;

  protected decide(context: ErrorContext): RetryDecision {
    return { retry: true, delayMs: this.jitter(this.backoff(context.attempts.length)) };
  }
}

export interface CircuitBreakerStrategyOptions extends StrategyOptions {
  failureThreshold?: number;
  resetTimeoutMs?: number;
}

/**
 * Retries with exponential backoff until the resource's circuit opens, then
 * fails fast without delay until `resetTimeoutMs` has elapsed.
 */
export class CircuitBreakerStrategy extends BaseRetryStrategy {
  readonly name = "circuit_breaker" as const;
  private readonly circuits: KeyedState<CircuitBreakerState>;

  constructor(config: Partial<RetryConfig> = {}, options: CircuitBreakerStrategyOptions = {}) {
    super(config, options);
    const circuitOptions = {
      failureThreshold: options.failureThreshold ?? DEFAULT_CIRCUIT_OPTIONS.failureThreshold,
      resetTimeoutMs: options.resetTimeoutMs ?? DEFAULT_CIRCUIT_OPTIONS.resetTimeoutMs,
    };
    this.circuits = new KeyedState(() => new CircuitBreakerState(circuitOptions));
  }

  override admit(context: ErrorContext): boolean {
    return this.circuits.get(this.keyOf(context)).admit(this.now());
  }

  override recordOutcome(context: ErrorContext, outcome: AttemptOutcome): void {
    const circuit = this.circuits.get(this.keyOf(context));
    if (outcome.status === "success") circuit.recordSuccess();
    else if (outcome.status === "failure") circuit.recordFailure(this.now());
    else circuit.abandonTrial();
  }

  protected decide(context: ErrorContext): RetryDecision {
    const circuit = this.circuits.get(this.keyOf(context));
    if (circuit.isRejecting(this.now())) {
      return { retry: false, delayMs: 0, stop: "circuit_open" };
    }
    return { retry: true, delayMs: this.jitter(this.backoff(context.attempts.length)) };
  }

  getCircuit(key: string): CircuitSnapshot | undefined {
    return this.circuits.peek(key)?.snapshot();
  }
}

export interface AdaptiveStrategyOptions extends StrategyOptions {
  windowSize?: number;
  /** Samples required before early termination may trigger. */
  minSamples?: number;
  /** Success rate below which retrying stops early. */
  successFloor?: number;
  minMultiplier?: number;
  maxMultiplier?: number;
}

/**
 * Scales backoff by the resource's recent success rate: 0.5x when every
 * recent attempt succeeded, 2x when none did. Gives up early on resources
 * that are clearly failing.
 */
export class AdaptiveStrategy extends BaseRetryStrategy {
  readonly name = "adaptive" as const;
  private readonly windows: KeyedState<AdaptiveMetrics>;
  private readonly minSamples: number;
  private readonly successFloor: number;
  private readonly minMultiplier: number;
  private readonly maxMultiplier: number;

  constructor(config: Partial<RetryConfig> = {}, options: AdaptiveStrategyOptions = {}) {
    super(config, options);
    const windowSize = options.windowSize ?? 10;
    this.windows = new KeyedState(() => new AdaptiveMetrics(windowSize));
    this.minSamples = options.minSamples ?? 5;
    this.successFloor = options.successFloor ?? 0.1;
    this.minMultiplier = options.minMultiplier ?? 0.5;
    this.maxMultiplier = options.maxMultiplier ?? 2;
    if (this.minMultiplier > this.maxMultiplier) {
      throw new Error("minMultiplier must not exceed maxMultiplier");
    }
  }

  override recordOutcome(context: ErrorContext, outcome: AttemptOutcome): void {
    if (outcome.status !== "success" && outcome.status !== "failure") return;
    this.windows.get(this.keyOf(context)).record({
      success: outcome.status === "success",
      latencyMs: outcome.latencyMs,
    });
  }

  /** Delay before jitter; non-increasing in `successRate`. */
  computeDelay(successRate: number, attempts: number): number {
    const rate = clamp(successRate, 0, 1);
    const multiplier = this.maxMultiplier - (this.maxMultiplier - this.minMultiplier) * rate;
    const exponent = Math.max(attempts - 1, 0);
    const raw = this.config.baseDelayMs * this.config.backoffFactor ** exponent * multiplier;
    return clamp(raw, this.config.baseDelayMs, this.config.maxDelayMs);
  }

  protected decide(context: ErrorContext): RetryDecision {
    const window = this.windows.get(this.keyOf(context));
    if (window.sampleCount >= this.minSamples && window.successRate < this.successFloor) {
      return { retry: false, delayMs: 0, stop: "low_success_rate" };
    }
    const delay = this.jitter(this.computeDelay(window.successRate, context.attempts.length));
    return { retry: true, delayMs: clamp(delay, this.config.baseDelayMs, this.config.maxDelayMs) };
  }

  getMetrics(key: string): { successRate: number; sampleCount: number } | undefined {
    const window = this.windows.peek(key);
    return window ? { successRate: window.successRate, sampleCount: window.sampleCount } : undefined;
  }
}

export type StrategyFactoryOptions = CircuitBreakerStrategyOptions & AdaptiveStrategyOptions;

export function isStrategyName(value: unknown): value is StrategyName {
  return typeof value === "string" && STRATEGY_NAMES.some((name) => name === value);
}

/** Build a strategy by name, e.g. from a job's options. */
export function createRetryStrategy(
  name: StrategyName,
  config: Partial<RetryConfig> = {},
  options: StrategyFactoryOptions = {},
): RetryStrategy {
  switch (name) {
    case "fixed":
      return new FixedDelayStrategy(config, options);
    case "exponential":
      return new ExponentialBackoffStrategy(config, options);
    case "circuit_breaker":
      return new CircuitBreakerStrategy(config, options);
    case "adaptive":
      return new AdaptiveStrategy(config, options);
  }
}
