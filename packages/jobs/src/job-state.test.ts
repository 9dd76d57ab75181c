import { describe, it } from "node:test";
import assert from "node:assert/strict";

import {
  InvalidJobTransitionError,
  canTransition,
  defaultCompletionPolicy,
  isTerminal,
  resolveFinalStatus,
  transitionJob,
} from "./job-state.js";
import { emptyProgress, type Job, type JobResult } from "./types.js";

function job(status: Job["status"] = "CREATED"): Job {
  return {
    id: "job-1",
    type: "VIDEO_DOWNLOAD",
    status,
    urls: ["https://youtu.be/abc"],
    options: {},
    results: [],
    progress: emptyProgress(1),
    createdAt: "2026-01-01T00:00:00.000Z",
    updatedAt: "2026-01-01T00:00:00.000Z",
  };
}

function result(status: JobResult["status"]): JobResult {
  return {
    itemId: status,
    status,
    attempts: 1,
    retryDelaysMs: [],
    startedAt: "2026-01-01T00:00:00.000Z",
    completedAt: "2026-01-01T00:00:01.000Z",
    durationMs: 1_000,
    metadataSaved: false,
    videoDownloaded: status === "success",
  };
}

describe("job lifecycle", () => {
  it("allows the forward path and the retry loop", () => {
    assert.equal(canTransition("CREATED", "QUEUED"), true);
    assert.equal(canTransition("QUEUED", "RUNNING"), true);
    assert.equal(canTransition("RUNNING", "RETRYING"), true);
    assert.equal(canTransition("RETRYING", "RUNNING"), true);
    assert.equal(canTransition("RETRYING", "COMPLETED"), true);
    assert.equal(canTransition("CREATED", "CANCELLED"), true);
  });

  it("rejects skipping states and leaving terminal states", () => {
    assert.equal(canTransition("CREATED", "RUNNING"), false);
    assert.equal(canTransition("QUEUED", "COMPLETED"), false);
    assert.equal(canTransition("COMPLETED", "RUNNING"), false);
    assert.equal(canTransition("CANCELLED", "CANCELLED"), false);
    assert.equal(isTerminal("FAILED"), true);
    assert.equal(isTerminal("RETRYING"), false);
  });

  it("stamps startedAt once and completedAt on terminal states", () => {
    const subject = job("QUEUED");
    transitionJob(subject, "RUNNING", new Date("2026-01-01T00:00:05.000Z"));
    transitionJob(subject, "RETRYING", new Date("2026-01-01T00:00:06.000Z"));
    transitionJob(subject, "RUNNING", new Date("2026-01-01T00:00:07.000Z"));
    transitionJob(subject, "COMPLETED", new Date("2026-01-01T00:00:09.000Z"));

    assert.equal(subject.startedAt, "2026-01-01T00:00:05.000Z");
    assert.equal(subject.completedAt, "2026-01-01T00:00:09.000Z");
    assert.equal(subject.updatedAt, "2026-01-01T00:00:09.000Z");
  });

  it("throws a typed error for an invalid transition and leaves the job untouched", () => {
    const subject = job("COMPLETED");
    assert.throws(
      () => transitionJob(subject, "RUNNING"),
      (err: unknown) =>
        err instanceof InvalidJobTransitionError &&
        err.message === "Invalid job transition for job-1: COMPLETED -> RUNNING" &&
        err.from === "COMPLETED",
    );
    assert.equal(subject.status, "COMPLETED");
  });
});

describe("resolveFinalStatus", () => {
  it("completes a best-effort batch with partial failures", () => {
    assert.equal(resolveFinalStatus([result("success"), result("failed"), result("skipped")], "best_effort"), "COMPLETED");
  });

  it("fails a best-effort batch when every item failed", () => {
    assert.equal(resolveFinalStatus([result("failed"), result("failed")], "best_effort"), "FAILED");
  });

  it("fails on any failed item under fail_on_any", () => {
    assert.equal(resolveFinalStatus([result("success"), result("failed")], "fail_on_any"), "FAILED");
    assert.equal(resolveFinalStatus([result("success"), result("skipped")], "fail_on_any"), "COMPLETED");
  });

  it("defaults playlists to best effort", () => {
    assert.equal(defaultCompletionPolicy("PLAYLIST_DOWNLOAD"), "best_effort");
    assert.equal(defaultCompletionPolicy("VIDEO_DOWNLOAD"), "fail_on_any");
    assert.equal(defaultCompletionPolicy("METADATA_ONLY"), "fail_on_any");
  });
});
