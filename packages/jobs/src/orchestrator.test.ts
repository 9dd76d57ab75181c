import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { setTimeout as delay } from "node:timers/promises";
import { ServiceError } from "@ytarchive/recovery";

import type {
  DownloadClient,
  DownloadOutcome,
  DownloadRequest,
  MetadataClient,
  PlaylistMetadata,
  StorageClient,
  StoredVideo,
  VideoMetadata,
} from "./clients.js";
import { InvalidJobTransitionError } from "./job-state.js";
import { MemoryJobStore } from "./job-store.js";
import { JobOrchestrator, JobValidationError, type JobOrchestratorOptions } from "./orchestrator.js";
import { MemoryRecoveryPlanStore } from "./recovery-plan-store.js";
import { emptyProgress, type Job } from "./types.js";

class FakeMetadata implements MetadataClient {
  readonly playlists = new Map<string, PlaylistMetadata>();
  readonly videoCalls: string[] = [];
  failVideo?: (videoId: string) => unknown;

  async fetchVideo(videoId: string): Promise<VideoMetadata> {
    this.videoCalls.push(videoId);
    const failure = this.failVideo?.(videoId);
    if (failure) throw failure;
    return { videoId, title: `Title ${videoId}` };
  }

  async fetchPlaylist(playlistId: string): Promise<PlaylistMetadata> {
    const playlist = this.playlists.get(playlistId);
    if (!playlist) {
      throw new ServiceError("metadata service error: 404 - Playlist not found", { service: "metadata", status: 404 });
    }
    return playlist;
  }
}

class FakeDownload implements DownloadClient {
  readonly calls: string[] = [];
  inFlight = 0;
  peak = 0;
  /** Error to throw for the n-th call (1-based) for a video, if any. */
  failWith?: (videoId: string, call: number) => unknown;

  async download(request: DownloadRequest, signal?: AbortSignal): Promise<DownloadOutcome> {
    this.calls.push(request.videoId);
    const call = this.calls.filter((id) => id === request.videoId).length;
    this.inFlight += 1;
    this.peak = Math.max(this.peak, this.inFlight);
    try {
      await delay(1, undefined, { signal });
      const failure = this.failWith?.(request.videoId, call);
      if (failure) throw failure;
      return { filePath: `${request.outputPath}/${request.videoId}.mp4`, fileSize: 1_024 };
    } finally {
      this.inFlight -= 1;
    }
  }
}

class FakeStorage implements StorageClient {
  readonly videos: StoredVideo[] = [];
  readonly metadata: string[] = [];
  readonly metadataRecords = new Map<string, VideoMetadata>();
  failMetadataWith?: unknown;

  async saveVideo(record: StoredVideo): Promise<void> {
    this.videos.push(record);
  }

  async saveMetadata(videoId: string, metadata: VideoMetadata): Promise<void> {
    if (this.failMetadataWith) throw this.failMetadataWith;
    this.metadata.push(videoId);
    this.metadataRecords.set(videoId, metadata);
  }
}

function setup(overrides: Partial<JobOrchestratorOptions> = {}) {
  const metadata = new FakeMetadata();
  const download = new FakeDownload();
  const storage = new FakeStorage();
  const store = new MemoryJobStore();
  const planStore = new MemoryRecoveryPlanStore();
  const orchestrator = new JobOrchestrator({
    metadata,
    download,
    storage,
    store,
    planStore,
    retry: { jitterFraction: 0 },
    outputDir: "/archive",
    ...overrides,
  });
  return { orchestrator, metadata, download, storage, store, planStore };
}

async function until(check: () => boolean, timeoutMs = 2_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!check()) {
    if (Date.now() > deadline) throw new Error("condition not met in time");
    await delay(5);
  }
}

function storedJob(id: string, status: Job["status"], extra: Partial<Job> = {}): Job {
  return {
    id,
    type: "VIDEO_DOWNLOAD",
    status,
    urls: [],
    options: {},
    results: [],
    progress: emptyProgress(0),
    createdAt: "2026-01-01T00:00:00.000Z",
    updatedAt: "2026-01-01T00:00:00.000Z",
    ...extra,
  };
}

const networkError = () =>
  new ServiceError("download service unreachable: fetch failed", { service: "download", code: "ECONNREFUSED" });
const privateVideoError = () => new ServiceError("Download failed: ERROR: Private video", { service: "download" });

describe("JobOrchestrator", () => {
  it("archives a large playlist with private videos and a flaky download", async () => {
    const { orchestrator, metadata, download, storage, store, planStore } = setup();
    metadata.playlists.set("PLbig", {
      playlistId: "PLbig",
      title: "Big",
      videos: Array.from({ length: 120 }, (_, i) => ({
        videoId: `video-${i + 1}`,
        position: i,
        title: `Video ${i + 1}`,
        isAvailable: true,
      })),
    });
    download.failWith = (videoId, call) => {
      if (videoId === "video-37" || videoId === "video-88") return privateVideoError();
      if (videoId === "video-10" && call <= 2) return networkError();
      return undefined;
    };

    const created = await orchestrator.createJob({
      type: "PLAYLIST_DOWNLOAD",
      urls: ["https://www.youtube.com/playlist?list=PLbig"],
      options: { maxConcurrent: 5, chunkSize: 20, retryStrategy: "exponential", maxAttempts: 3, baseDelayMs: 5 },
    });
    assert.equal(created.status, "CREATED");

    const job = await orchestrator.executeJob(created.id);

    assert.equal(job.status, "COMPLETED");
    assert.deepEqual(job.progress, { total: 120, completed: 120, succeeded: 118, failed: 2, skipped: 0, percent: 100 });
    assert.equal(job.results.length, 120);
    assert.equal(download.peak, 5);
    assert.equal(download.calls.length, 122);
    assert.equal(storage.videos.length, 118);

    const flaky = job.results.find((result) => result.itemId === "video-10");
    assert.equal(flaky?.status, "success");
    assert.equal(flaky?.attempts, 3);
    assert.deepEqual(flaky?.retryDelaysMs, [5, 10]);
    assert.equal(flaky?.filePath, "/archive/video-10.mp4");

    const privateResult = job.results.find((result) => result.itemId === "video-37");
    assert.equal(privateResult?.status, "failed");
    assert.equal(privateResult?.errorCode, "E002");
    assert.equal(privateResult?.attempts, 1);

    const plan = await planStore.list({ jobId: job.id });
    assert.deepEqual(
      plan.map((entry) => [entry.itemId, entry.kind, entry.errorCode, entry.attempts]),
      [
        ["video-37", "unavailable", "E002", 1],
        ["video-88", "unavailable", "E002", 1],
      ],
    );
    assert.equal(plan[0].retryAfter, undefined);
    assert.equal((await store.load(job.id))?.status, "COMPLETED");
  });

  it("downloads single videos and records them in storage", async () => {
    const { orchestrator, storage } = setup();
    const { id } = await orchestrator.createJob({
      type: "VIDEO_DOWNLOAD",
      urls: ["https://youtu.be/aaa111", "https://www.youtube.com/watch?v=bbb222"],
      options: { quality: "720p" },
    });

    const job = await orchestrator.executeJob(id);

    assert.equal(job.status, "COMPLETED");
    assert.deepEqual(job.results.map((result) => result.itemId).sort(), ["aaa111", "bbb222"]);
    assert.ok(job.results.every((result) => result.videoDownloaded && !result.metadataSaved));
    assert.deepEqual(storage.videos.map((video) => video.quality), ["720p", "720p"]);
    assert.ok(job.startedAt);
    assert.ok(job.completedAt);
    assert.deepEqual(
      orchestrator.listJobs("COMPLETED").map((listed) => listed.id),
      [id],
    );
    assert.deepEqual(orchestrator.getActiveRecoveries(), []);
  });

  it("fails a video job on an unparseable URL and records it in the plan", async () => {
    const { orchestrator, download, planStore } = setup();
    const { id } = await orchestrator.createJob({
      type: "VIDEO_DOWNLOAD",
      urls: ["not-a-url", "https://youtu.be/ccc333"],
    });

    const job = await orchestrator.executeJob(id);

    assert.equal(job.status, "FAILED");
    assert.equal(job.error, "1 of 2 items failed");
    assert.deepEqual(download.calls, ["ccc333"]);
    const invalid = job.results.find((result) => result.itemId === "not-a-url");
    assert.equal(invalid?.errorCode, "E007");
    assert.equal(invalid?.attempts, 0);
    assert.equal(invalid?.message, "Could not extract video ID from URL: not-a-url");

    const [entry] = await planStore.list();
    assert.equal(entry.itemId, "not-a-url");
    assert.equal(entry.kind, "failed");
    assert.equal(entry.reason, "validation");
  });

  it("stops a metadata job when storage reports a full disk", async () => {
    const { orchestrator, storage, planStore } = setup();
    storage.failMetadataWith = Object.assign(new Error("ENOSPC: no space left on device, write"), { code: "ENOSPC" });
    const { id } = await orchestrator.createJob({ type: "METADATA_ONLY", urls: ["https://youtu.be/ddd444"] });

    const job = await orchestrator.executeJob(id);

    assert.equal(job.status, "FAILED");
    const [result] = job.results;
    assert.equal(result.status, "failed");
    assert.equal(result.errorCode, "E004");
    assert.equal(result.attempts, 1);
    assert.equal(result.message, "ENOSPC: no space left on device, write");

    const [entry] = await planStore.list();
    assert.equal(entry.kind, "failed");
    assert.equal(entry.errorCode, "E004");
    assert.ok(entry.retryAfter);
  });

  it("does not retry an exhausted quota without a reset hint", async () => {
    const { orchestrator, metadata } = setup();
    metadata.failVideo = () => new ServiceError("quotaExceeded: daily quota used up", { service: "metadata", status: 403 });
    const { id } = await orchestrator.createJob({ type: "METADATA_ONLY", urls: ["https://youtu.be/eee555"] });

    const job = await orchestrator.executeJob(id);

    assert.equal(job.status, "FAILED");
    assert.equal(job.results[0].errorCode, "E001");
    assert.deepEqual(metadata.videoCalls, ["eee555"]);
  });

  it("skips unavailable playlist entries and fails playlists that cannot be fetched", async () => {
    const { orchestrator, metadata, planStore } = setup();
    metadata.playlists.set("PLsmall", {
      playlistId: "PLsmall",
      title: "Small",
      videos: [
        { videoId: "fff001", position: 0, title: "One", isAvailable: true },
        { videoId: "fff002", position: 1, title: "Hidden", isAvailable: false },
        { videoId: "fff003", position: 2, title: "Three", isAvailable: true },
      ],
    });
    const { id } = await orchestrator.createJob({
      type: "PLAYLIST_DOWNLOAD",
      urls: ["https://www.youtube.com/playlist?list=PLsmall", "https://www.youtube.com/playlist?list=PLmissing"],
    });

    const job = await orchestrator.executeJob(id);

    assert.equal(job.status, "COMPLETED");
    assert.deepEqual(job.progress, { total: 4, completed: 4, succeeded: 2, failed: 1, skipped: 1, percent: 100 });
    const skipped = job.results.find((result) => result.itemId === "fff002");
    assert.equal(skipped?.status, "skipped");
    assert.equal(skipped?.errorCode, "E002");
    const missing = job.results.find((result) => result.itemId === "playlist:PLmissing");
    assert.equal(missing?.status, "failed");
    assert.equal(missing?.errorCode, "E002");

    assert.deepEqual(
      (await planStore.list({ kind: "unavailable" })).map((entry) => entry.itemId),
      ["fff002", "playlist:PLmissing"],
    );
  });

  it("keeps archiving healthy videos after a run of private ones under a circuit breaker", async () => {
    const { orchestrator, metadata, download, planStore } = setup();
    metadata.playlists.set("PLmixed", {
      playlistId: "PLmixed",
      title: "Mixed",
      videos: Array.from({ length: 12 }, (_, i) => ({
        videoId: `cb-${i + 1}`,
        position: i,
        title: `Clip ${i + 1}`,
        isAvailable: true,
      })),
    });
    const privateIds = new Set(["cb-1", "cb-2", "cb-3", "cb-4", "cb-5"]);
    download.failWith = (videoId) => (privateIds.has(videoId) ? privateVideoError() : undefined);
    const { id } = await orchestrator.createJob({
      type: "PLAYLIST_DOWNLOAD",
      urls: ["https://www.youtube.com/playlist?list=PLmixed"],
      options: { retryStrategy: "circuit_breaker", maxConcurrent: 1 },
    });

    const job = await orchestrator.executeJob(id);

    assert.equal(job.status, "COMPLETED");
    assert.deepEqual(job.progress, { total: 12, completed: 12, succeeded: 7, failed: 5, skipped: 0, percent: 100 });
    assert.equal(download.calls.length, 12);
    assert.ok(job.results.filter((result) => result.status === "failed").every((result) => result.errorCode === "E002"));
    assert.equal((await planStore.list({ kind: "unavailable" })).length, 5);
  });

  it("summarizes each playlist and stores the summary", async () => {
    const { orchestrator, metadata, download, storage } = setup();
    metadata.playlists.set("PLsum", {
      playlistId: "PLsum",
      title: "Summary",
      videos: [
        { videoId: "sum001", position: 0, title: "One", isAvailable: true },
        { videoId: "sum002", position: 1, title: "Hidden", isAvailable: false },
        { videoId: "sum003", position: 2, title: "Private", isAvailable: true },
      ],
    });
    download.failWith = (videoId) => (videoId === "sum003" ? privateVideoError() : undefined);
    const { id } = await orchestrator.createJob({
      type: "PLAYLIST_DOWNLOAD",
      urls: ["https://www.youtube.com/playlist?list=PLsum", "https://www.youtube.com/playlist?list=PLgone"],
    });

    const job = await orchestrator.executeJob(id);

    assert.equal(job.status, "COMPLETED");
    assert.ok(job.playlistSummary);
    const { playlists, ...totalsSeen } = job.playlistSummary;
    assert.deepEqual(playlists, [
      {
        playlistId: "PLsum",
        title: "Summary",
        totalVideos: 3,
        successful: 1,
        failed: 1,
        skipped: 1,
        successRate: 33.33,
        videos: [
          { videoId: "sum001", status: "success", filePath: "/archive/sum001.mp4" },
          { videoId: "sum002", status: "skipped", errorCode: "E002" },
          { videoId: "sum003", status: "failed", errorCode: "E002" },
        ],
      },
    ]);
    const totals = {
      totalPlaylists: 2,
      successfulPlaylists: 1,
      failedPlaylists: 1,
      totalVideos: 3,
      successfulDownloads: 1,
      failedDownloads: 1,
      overallSuccessRate: 33.33,
      generatedAt: job.playlistSummary.generatedAt,
    };
    assert.deepEqual(totalsSeen, totals);

    const stored = storage.metadataRecords.get(`playlist_job_${id}`);
    assert.equal(stored?.type, "playlist_job_summary");
    assert.equal(stored?.jobId, id);
    assert.deepEqual(stored?.summary, totals);
    assert.equal((await orchestrator.waitForJob(id)).playlistSummary?.overallSuccessRate, 33.33);
  });

  it("cancels a job while it waits out a retry", async () => {
    const { orchestrator, download, planStore } = setup();
    download.failWith = () => networkError();
    const { id } = await orchestrator.createJob({
      type: "VIDEO_DOWNLOAD",
      urls: ["https://youtu.be/ggg777"],
      options: { retryStrategy: "fixed", baseDelayMs: 10_000, maxAttempts: 5 },
    });

    const started = await orchestrator.startJob(id);
    assert.equal(started.status, "RUNNING");
    await until(() => orchestrator.getJob(id)?.status === "RETRYING");

    const before = Date.now();
    const cancelled = await orchestrator.cancelJob(id);

    assert.ok(Date.now() - before < 1_000);
    assert.equal(cancelled.status, "CANCELLED");
    assert.equal(cancelled.error, "Cancelled by request");
    assert.deepEqual(cancelled.results, []);
    assert.deepEqual(download.calls, ["ggg777"]);
    assert.deepEqual(orchestrator.getActiveRecoveries(), []);
    assert.deepEqual(await planStore.list(), []);

    await assert.rejects(orchestrator.cancelJob(id), InvalidJobTransitionError);
    await assert.rejects(orchestrator.executeJob(id), InvalidJobTransitionError);
  });

  it("rejects invalid job requests", async () => {
    const { orchestrator } = setup();

    await assert.rejects(orchestrator.createJob({ type: "VIDEO_DOWNLOAD", urls: [] }), {
      name: "JobValidationError",
      message: "At least one URL is required",
    });
    await assert.rejects(
      orchestrator.createJob({ type: "VIDEO_DOWNLOAD", urls: ["https://youtu.be/a"], options: { maxAttempts: 0 } }),
      (err: unknown) => err instanceof JobValidationError && err.message === "maxAttempts must be a positive integer, got 0",
    );
    await assert.rejects(orchestrator.executeJob("missing"), { name: "JobNotFoundError", message: "Job not found: missing" });
  });

  it("resumes interrupted jobs without repeating finished items", async () => {
    const store = new MemoryJobStore();
    await store.save(
      storedJob("job-resume", "RUNNING", {
        urls: ["https://youtu.be/hhh001", "https://youtu.be/hhh002"],
        results: [
          {
            itemId: "hhh001",
            status: "success",
            attempts: 1,
            retryDelaysMs: [],
            startedAt: "2026-01-01T00:00:00.000Z",
            completedAt: "2026-01-01T00:00:01.000Z",
            durationMs: 1_000,
            metadataSaved: false,
            videoDownloaded: true,
          },
        ],
      }),
    );
    const { orchestrator, download } = setup({ store });

    await orchestrator.initialize();
    const job = await orchestrator.waitForJob("job-resume");

    assert.equal(job.status, "COMPLETED");
    assert.deepEqual(download.calls, ["hhh002"]);
    assert.equal(job.results.length, 2);
    assert.equal(job.progress.total, 2);
  });

  it("removes terminal jobs past the retention window", async () => {
    const store = new MemoryJobStore();
    await store.save(storedJob("job-old", "COMPLETED", { completedAt: "2020-01-01T00:00:00.000Z" }));
    const { orchestrator } = setup({ store, retentionMs: 24 * 60 * 60 * 1_000 });

    await orchestrator.initialize();
    assert.equal(orchestrator.getJob("job-old")?.status, "COMPLETED");

    const { id } = await orchestrator.createJob({ type: "METADATA_ONLY", urls: ["https://youtu.be/iii001"] });
    await orchestrator.executeJob(id);

    assert.equal(orchestrator.getJob("job-old"), undefined);
    assert.equal(await store.load("job-old"), undefined);
    assert.equal((await store.load(id))?.status, "COMPLETED");
  });
});
