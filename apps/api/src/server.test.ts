import { describe, it, before, after } from "node:test";
import assert from "node:assert/strict";
import {
  JobOrchestrator,
  type DownloadClient,
  type Job,
  type MetadataClient,
  type PlaylistMetadata,
  type StorageClient,
  type VideoMetadata,
} from "@ytarchive/jobs";
import { ErrorRecoveryManager, ErrorReporter } from "@ytarchive/recovery";
import { BadRequestError, createApp, defaultRoutes, matchPath } from "./server.js";

class StubMetadata implements MetadataClient {
  async fetchVideo(videoId: string): Promise<VideoMetadata> {
    return { videoId, title: "Stub" };
  }

  async fetchPlaylist(playlistId: string): Promise<PlaylistMetadata> {
    return { playlistId, title: "Stub", videos: [] };
  }
}

const download: DownloadClient = {
  download: async (request) => ({ filePath: `/archive/${request.videoId}.mp4`, fileSize: 10 }),
};

const storage: StorageClient = {
  saveVideo: async () => undefined,
  saveMetadata: async () => undefined,
};

interface ErrorBody {
  error: string;
}

describe("matchPath", () => {
  it("captures placeholders", () => {
    assert.deepEqual(matchPath("/api/v1/jobs/:id/execute", "/api/v1/jobs/abc-1/execute"), { id: "abc-1" });
  });

  it("rejects different shapes", () => {
    assert.equal(matchPath("/api/v1/jobs/:id", "/api/v1/jobs"), undefined);
    assert.equal(matchPath("/api/v1/jobs/:id", "/api/v1/jobs/"), undefined);
    assert.equal(matchPath("/health", "/routes"), undefined);
  });

  it("rejects malformed percent-escapes in captured segments", () => {
    assert.throws(
      () => matchPath("/api/v1/jobs/:id", "/api/v1/jobs/%E0"),
      (err: unknown) => err instanceof BadRequestError && err.message === "Malformed URL path: /api/v1/jobs/%E0",
    );
  });
});

describe("API Server", () => {
  const reporter = new ErrorReporter();
  const orchestrator = new JobOrchestrator({
    metadata: new StubMetadata(),
    download,
    storage,
    recovery: new ErrorRecoveryManager({ reporter }),
  });
  const routes = defaultRoutes({ orchestrator, reporter });
  const server = createApp(routes);
  let baseUrl = "";

  async function call<T>(method: string, path: string, body?: string): Promise<{ status: number; body: T }> {
    const res = await fetch(`${baseUrl}${path}`, {
      method,
      body,
      headers: body === undefined ? undefined : { "Content-Type": "application/json" },
    });
    return { status: res.status, body: JSON.parse(await res.text()) as T };
  }

  before(async () => {
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    assert.ok(typeof address === "object" && address !== null);
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  after(() => {
    server.closeAllConnections();
    server.close();
  });

  it("GET /health returns 200 with status ok", async () => {
    const res = await call<{ status: string; timestamp: string }>("GET", "/health");
    assert.equal(res.status, 200);
    assert.equal(res.body.status, "ok");
    assert.ok(res.body.timestamp);
  });

  it("GET /routes lists the job routes", async () => {
    const res = await call<{ routes: Array<{ method: string; path: string }> }>("GET", "/routes");
    assert.equal(res.status, 200);
    assert.equal(res.body.routes.length, 10);
    assert.ok(res.body.routes.some((route) => route.method === "PUT" && route.path === "/api/v1/jobs/:id/execute"));
  });

  it("GET /nonexistent returns 404", async () => {
    const res = await call<ErrorBody>("GET", "/nonexistent");
    assert.equal(res.status, 404);
    assert.equal(res.body.error, "Not Found");
  });

  it("rejects unknown job types and malformed bodies with 400", async () => {
    const badType = await call<ErrorBody>("POST", "/api/v1/jobs", JSON.stringify({ type: "AUDIO", urls: ["x"] }));
    assert.equal(badType.status, 400);
    assert.equal(badType.body.error, "Unknown job type: AUDIO");

    const badJson = await call<ErrorBody>("POST", "/api/v1/jobs", "{not json");
    assert.equal(badJson.status, 400);
    assert.equal(badJson.body.error, "Request body is not valid JSON");

    const badOptions = await call<ErrorBody>(
      "POST",
      "/api/v1/jobs",
      JSON.stringify({ type: "VIDEO_DOWNLOAD", urls: ["https://youtu.be/a"], options: { retryStrategy: "linear" } }),
    );
    assert.equal(badOptions.status, 400);
    assert.equal(badOptions.body.error, "Unknown retry strategy: linear");
  });

  it("creates, executes and refuses to cancel a finished job", async () => {
    const created = await call<Job>(
      "POST",
      "/api/v1/jobs",
      JSON.stringify({ type: "VIDEO_DOWNLOAD", urls: ["https://youtu.be/api001"], options: { quality: "480p" } }),
    );
    assert.equal(created.status, 201);
    assert.equal(created.body.status, "CREATED");
    assert.equal(created.body.options.quality, "480p");
    const id = created.body.id;

    const started = await call<Job>("PUT", `/api/v1/jobs/${id}/execute`);
    assert.equal(started.status, 202);

    await orchestrator.waitForJob(id);
    const fetched = await call<Job>("GET", `/api/v1/jobs/${id}`);
    assert.equal(fetched.status, 200);
    assert.equal(fetched.body.status, "COMPLETED");
    assert.equal(fetched.body.results[0].filePath, "/archive/api001.mp4");

    const cancel = await call<ErrorBody>("POST", `/api/v1/jobs/${id}/cancel`);
    assert.equal(cancel.status, 409);
    assert.equal(cancel.body.error, `Invalid job transition for ${id}: COMPLETED -> CANCELLED`);

    const listed = await call<{ jobs: Job[] }>("GET", "/api/v1/jobs?status=COMPLETED");
    assert.deepEqual(
      listed.body.jobs.map((job) => job.id),
      [id],
    );
  });

  it("cancels a job that has not started", async () => {
    const created = await call<Job>("POST", "/api/v1/jobs", JSON.stringify({ type: "METADATA_ONLY", urls: ["https://youtu.be/api002"] }));
    const cancelled = await call<Job>("POST", `/api/v1/jobs/${created.body.id}/cancel`);
    assert.equal(cancelled.status, 200);
    assert.equal(cancelled.body.status, "CANCELLED");
  });

  it("answers a malformed job id with 400 and keeps serving", async () => {
    const malformed = await call<ErrorBody>("GET", "/api/v1/jobs/%E0");
    assert.equal(malformed.status, 400);
    assert.equal(malformed.body.error, "Malformed URL path: /api/v1/jobs/%E0");

    const health = await call<{ status: string }>("GET", "/health");
    assert.equal(health.status, 200);
  });

  it("returns 404 for unknown jobs and 400 for unknown status filters", async () => {
    const missing = await call<ErrorBody>("GET", "/api/v1/jobs/missing");
    assert.equal(missing.status, 404);
    assert.equal(missing.body.error, "Job not found: missing");

    const badStatus = await call<ErrorBody>("GET", "/api/v1/jobs?status=BOGUS");
    assert.equal(badStatus.status, 400);
    assert.equal(badStatus.body.error, "Unknown job status: BOGUS");
  });

  it("exposes recoveries, the recovery plan and the error summary", async () => {
    const recoveries = await call<{ recoveries: unknown[] }>("GET", "/api/v1/recoveries");
    assert.deepEqual(recoveries.body.recoveries, []);

    const plan = await call<{ entries: unknown[] }>("GET", "/api/v1/recovery-plan?kind=unavailable");
    assert.equal(plan.status, 200);
    assert.deepEqual(plan.body.entries, []);

    const summary = await call<{ timeRangeHours: number; totalErrors: number }>("GET", "/api/v1/errors/summary?hours=6");
    assert.equal(summary.status, 200);
    assert.equal(summary.body.timeRangeHours, 6);
    assert.equal(summary.body.totalErrors, 0);

    const badHours = await call<ErrorBody>("GET", "/api/v1/errors/summary?hours=-1");
    assert.equal(badHours.status, 400);
  });
});
