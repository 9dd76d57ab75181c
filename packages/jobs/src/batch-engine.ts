export interface BatchOverrides {
  maxConcurrent?: number;
  chunkSize?: number;
}

export interface BatchPlan {
  total: number;
  concurrency: number;
  chunkSize: number;
  chunks: number;
}

export interface ChunkProgress {
  chunkIndex: number;
  chunks: number;
  /** Items dispatched so far, across all drained chunks. */
  processed: number;
  total: number;
}

export interface RunBatchOptions {
  plan: BatchPlan;
  signal?: AbortSignal;
  /** Awaited once per drained chunk, before the next chunk starts. */
  onChunk?: (progress: ChunkProgress) => void | Promise<void>;
}

export interface BatchOutcome {
  processed: number;
  aborted: boolean;
}

const MIN_CONCURRENCY = 1;
const MAX_CONCURRENCY = 10;

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}

/**
 * Pick a worker pool size and chunk size for `total` items.
 * Concurrency is 3, or 5 above 100 items; chunks hold a fifth of the batch,
 * kept between 10 and 50 items.
 */
export function planBatch(total: number, overrides: BatchOverrides = {}): BatchPlan {
  const concurrency =
    overrides.maxConcurrent !== undefined
      ? clamp(Math.floor(overrides.maxConcurrent), MIN_CONCURRENCY, MAX_CONCURRENCY)
      : total > 100
        ? 5
        : 3;
  const chunkSize =
    overrides.chunkSize !== undefined
      ? Math.max(1, Math.floor(overrides.chunkSize))
      : clamp(Math.ceil(total / 5), 10, 50);

  return { total, concurrency, chunkSize, chunks: total === 0 ? 0 : Math.ceil(total / chunkSize) };
}

export function chunkItems<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Process `items` chunk by chunk with at most `plan.concurrency` workers in
 * flight. A chunk drains completely before the next one starts; once
 * `signal` aborts no further items are dispatched.
 *
 * A worker that throws does not stop its siblings; the first error is
 * rethrown after the chunk has drained.
 */
export async function runBatch<T>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<void>,
  options: RunBatchOptions,
): Promise<BatchOutcome> {
  const { plan, signal } = options;
  const chunks = chunkItems(items, plan.chunkSize);
  let processed = 0;

  for (const [chunkIndex, chunk] of chunks.entries()) {
    if (signal?.aborted) return { processed, aborted: true };

    const offset = chunkIndex * plan.chunkSize;
    let next = 0;
    const runWorker = async (): Promise<void> => {
      while (next < chunk.length && !signal?.aborted) {
        const position = next;
        next += 1;
        processed += 1;
        await worker(chunk[position], offset + position);
      }
    };

    const workers = Array.from({ length: Math.min(plan.concurrency, chunk.length) }, () => runWorker());
    const settled = await Promise.allSettled(workers);
    const rejected = settled.find((result): result is PromiseRejectedResult => result.status === "rejected");
    if (rejected) throw rejected.reason;

    await options.onChunk?.({ chunkIndex, chunks: chunks.length, processed, total: items.length });
  }

  return { processed, aborted: signal?.aborted ?? false };
}
