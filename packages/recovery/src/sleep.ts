import { setTimeout as delay } from "node:timers/promises";
import { AttemptTimeoutError } from "./errors.js";

/** Waits `ms` milliseconds; rejects as soon as `signal` aborts. */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = async (ms, signal) => {
  signal?.throwIfAborted();
  if (ms <= 0) return;
  await delay(ms, undefined, { signal });
};

/**
 * Run one attempt with its own signal, aborted by the caller's signal or by
 * the per-attempt timeout. Settles on abort even if `fn` ignores its signal.
 */
export async function runAttempt<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  parent?: AbortSignal,
  timeoutMs?: number,
): Promise<T> {
  const controller = new AbortController();
  const forwardAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) controller.abort(parent.reason);
  else parent?.addEventListener("abort", forwardAbort, { once: true });

  const aborted = new Promise<never>((_, reject) => {
    if (controller.signal.aborted) reject(controller.signal.reason);
    else controller.signal.addEventListener("abort", () => reject(controller.signal.reason), { once: true });
  });

  const timer =
    timeoutMs !== undefined && timeoutMs > 0
      ? setTimeout(() => controller.abort(new AttemptTimeoutError(timeoutMs)), timeoutMs)
      : undefined;

  try {
    return await Promise.race([fn(controller.signal), aborted]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", forwardAbort);
  }
}
