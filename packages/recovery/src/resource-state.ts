export type CircuitState = "closed" | "open" | "half_open";

const CIRCUIT_TRANSITIONS: Record<CircuitState, readonly CircuitState[]> = {
  closed: ["open"],
  open: ["half_open"],
  half_open: ["closed", "open"],
};

export interface CircuitBreakerOptions {
  failureThreshold: number;
  resetTimeoutMs: number;
}

export const DEFAULT_CIRCUIT_OPTIONS: CircuitBreakerOptions = {
  failureThreshold: 5,
  resetTimeoutMs: 60_000,
};

export interface CircuitSnapshot {
  state: CircuitState;
  consecutiveFailures: number;
  openedAt?: number;
  failureThreshold: number;
  resetTimeoutMs: number;
}

/**
 * Failure budget for one resource key.
 *
 * Every method is a synchronous read-modify-write, so concurrent workers on
 * the event loop cannot lose an update between reading and writing a counter.
 */
export class CircuitBreakerState {
  private state: CircuitState = "closed";
  private consecutiveFailures = 0;
  private openedAt?: number;
  private trialInFlight = false;

  constructor(private readonly options: CircuitBreakerOptions = DEFAULT_CIRCUIT_OPTIONS) {}

  get current(): CircuitState {
    return this.state;
  }

  /** Whether an attempt may run now. Moves OPEN to HALF_OPEN once the timeout has elapsed. */
  admit(now: number): boolean {
    if (this.state === "closed") return true;

    if (this.state === "open") {
      if (this.openedAt !== undefined && now - this.openedAt < this.options.resetTimeoutMs) {
        return false;
      }
      this.transition("half_open");
      this.trialInFlight = true;
      return true;
    }

    // half_open admits a single trial
    if (this.trialInFlight) return false;
    this.trialInFlight = true;
    return true;
  }

  /** True while the circuit refuses attempts at `now`. Does not change state. */
  isRejecting(now: number): boolean {
    if (this.state === "closed") return false;
    if (this.state === "half_open") return this.trialInFlight;
    return this.openedAt !== undefined && now - this.openedAt < this.options.resetTimeoutMs;
  }

  recordSuccess(): void {
    if (this.state === "half_open") {
      this.transition("closed");
      this.trialInFlight = false;
      this.openedAt = undefined;
    }
    this.consecutiveFailures = 0;
  }

  recordFailure(now: number): void {
    if (this.state === "half_open") {
      this.transition("open");
      this.trialInFlight = false;
      this.openedAt = now;
      return;
    }
    if (this.state === "open") return;

    this.consecutiveFailures += 1;
    if (this.consecutiveFailures >= this.options.failureThreshold) {
      this.transition("open");
      this.openedAt = now;
    }
  }

  /** Give back a HALF_OPEN trial slot whose attempt ended without a health signal. */
  abandonTrial(): void {
    if (this.state === "half_open") this.trialInFlight = false;
  }

  snapshot(): CircuitSnapshot {
    return {
      state: this.state,
      consecutiveFailures: this.consecutiveFailures,
      openedAt: this.openedAt,
      failureThreshold: this.options.failureThreshold,
      resetTimeoutMs: this.options.resetTimeoutMs,
    };
  }

  private transition(next: CircuitState): void {
    if (!CIRCUIT_TRANSITIONS[this.state].includes(next)) {
      throw new Error(`Invalid circuit transition: ${this.state} -> ${next}`);
    }
    this.state = next;
  }
}

export interface OutcomeSample {
  success: boolean;
  latencyMs: number;
}

/**
 * Fixed-capacity ring buffer of recent outcomes for one resource key.
 * Inserting at capacity overwrites the oldest sample.
 */
export class AdaptiveMetrics {
  private readonly samples: (OutcomeSample | undefined)[];
  private next = 0;
  private size = 0;
  private successes = 0;

  constructor(readonly capacity: number = 10) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new Error(`capacity must be a positive integer, got ${capacity}`);
    }
    this.samples = new Array<OutcomeSample | undefined>(capacity).fill(undefined);
  }

  get sampleCount(): number {
    return this.size;
  }

  /** Share of successful samples in the window; 1 when no samples exist yet. */
  get successRate(): number {
    return this.size === 0 ? 1 : this.successes / this.size;
  }

  record(sample: OutcomeSample): void {
    const evicted = this.samples[this.next];
    if (evicted?.success) this.successes -= 1;
    if (!evicted) this.size += 1;

    this.samples[this.next] = sample;
    if (sample.success) this.successes += 1;
    this.next = (this.next + 1) % this.capacity;
  }

  averageLatencyMs(): number {
    let total = 0;
    for (const sample of this.samples) {
      if (sample) total += sample.latencyMs;
    }
    return this.size === 0 ? 0 : total / this.size;
  }

  /** Samples from oldest to newest. */
  toArray(): OutcomeSample[] {
    const ordered: OutcomeSample[] = [];
    for (let i = 0; i < this.capacity; i += 1) {
      const sample = this.samples[(this.next + i) % this.capacity];
      if (sample) ordered.push(sample);
    }
    return ordered;
  }
}

/** Explicit per-resource state map, created lazily from a factory. */
export class KeyedState<T> {
  private readonly entries = new Map<string, T>();

  constructor(private readonly factory: (key: string) => T) {}

  get(key: string): T {
    let entry = this.entries.get(key);
    if (!entry) {
      entry = this.factory(key);
      this.entries.set(key, entry);
    }
    return entry;
  }

  peek(key: string): T | undefined {
    return this.entries.get(key);
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }
}
