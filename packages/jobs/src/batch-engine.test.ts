import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { setTimeout as delay } from "node:timers/promises";

import { chunkItems, planBatch, runBatch, type ChunkProgress } from "./batch-engine.js";

describe("planBatch", () => {
  it("uses three workers and ten-item chunks for small batches", () => {
    assert.deepEqual(planBatch(30), { total: 30, concurrency: 3, chunkSize: 10, chunks: 3 });
  });

  it("uses five workers above a hundred items", () => {
    assert.deepEqual(planBatch(120), { total: 120, concurrency: 5, chunkSize: 24, chunks: 5 });
  });

  it("caps chunks at fifty items", () => {
    assert.equal(planBatch(1_000).chunkSize, 50);
  });

  it("clamps overrides", () => {
    assert.equal(planBatch(10, { maxConcurrent: 50 }).concurrency, 10);
    assert.equal(planBatch(10, { maxConcurrent: 0 }).concurrency, 1);
    assert.equal(planBatch(10, { chunkSize: 0 }).chunkSize, 1);
    assert.deepEqual(planBatch(120, { maxConcurrent: 5, chunkSize: 20 }), {
      total: 120,
      concurrency: 5,
      chunkSize: 20,
      chunks: 6,
    });
  });

  it("plans nothing for an empty batch", () => {
    assert.equal(planBatch(0).chunks, 0);
  });
});

describe("chunkItems", () => {
  it("keeps order and leaves a short final chunk", () => {
    assert.deepEqual(chunkItems([1, 2, 3, 4, 5], 2), [[1, 2], [3, 4], [5]]);
  });
});

describe("runBatch", () => {
  it("never exceeds the worker pool and reports every chunk", async () => {
    const items = Array.from({ length: 25 }, (_, i) => i);
    let inFlight = 0;
    let peak = 0;
    const seen: number[] = [];
    const chunks: ChunkProgress[] = [];

    const outcome = await runBatch(
      items,
      async (item) => {
        inFlight += 1;
        peak = Math.max(peak, inFlight);
        await delay(1);
        seen.push(item);
        inFlight -= 1;
      },
      { plan: planBatch(items.length, { maxConcurrent: 4, chunkSize: 10 }), onChunk: (progress) => void chunks.push(progress) },
    );

    assert.deepEqual(outcome, { processed: 25, aborted: false });
    assert.equal(peak, 4);
    assert.deepEqual([...seen].sort((a, b) => a - b), items);
    assert.deepEqual(
      chunks.map((c) => [c.chunkIndex, c.processed]),
      [
        [0, 10],
        [1, 20],
        [2, 25],
      ],
    );
  });

  it("stops dispatching once the signal aborts", async () => {
    const controller = new AbortController();
    const seen: number[] = [];

    const outcome = await runBatch(
      [1, 2, 3, 4, 5, 6],
      async (item) => {
        seen.push(item);
        if (item === 2) controller.abort();
      },
      { plan: planBatch(6, { maxConcurrent: 1, chunkSize: 3 }), signal: controller.signal },
    );

    assert.deepEqual(seen, [1, 2]);
    assert.deepEqual(outcome, { processed: 2, aborted: true });
  });

  it("lets siblings finish before rethrowing a worker error", async () => {
    const seen: number[] = [];
    await assert.rejects(
      runBatch(
        [1, 2, 3],
        async (item) => {
          if (item === 1) throw new Error("boom");
          seen.push(item);
        },
        { plan: planBatch(3, { maxConcurrent: 2 }) },
      ),
      /boom/,
    );
    assert.deepEqual(seen, [2, 3]);
  });
});
