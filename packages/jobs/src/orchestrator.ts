import { randomUUID } from "node:crypto";
import { homedir } from "node:os";
import { join } from "node:path";
import {
  DownloadErrorHandler,
  ErrorRecoveryManager,
  MetadataErrorHandler,
  StorageErrorHandler,
  createErrorContext,
  createRetryConfig,
  createRetryStrategy,
  describeError,
  errorMessage,
  isStrategyName,
  markSpanError,
  type RecoverableOperation,
  type RecoveryFailure,
  type RecoveryFailureKind,
  type RecoveryOperation,
  type RecoveryResult,
  type RetryConfig,
  type RetryStrategy,
  type ServiceErrorHandler,
  type StrategyFactoryOptions,
} from "@ytarchive/recovery";
import { planBatch, runBatch } from "./batch-engine.js";
import type { DownloadClient, MetadataClient, PlaylistMetadata, StorageClient } from "./clients.js";
import { MemoryJobStore, type JobStore } from "./job-store.js";
import {
  InvalidJobTransitionError,
  JobNotFoundError,
  defaultCompletionPolicy,
  isTerminal,
  resolveFinalStatus,
  transitionJob,
} from "./job-state.js";
import { jobTelemetry, logJob } from "./observability.js";
import { MemoryRecoveryPlanStore, type RecoveryPlanQuery, type RecoveryPlanStore } from "./recovery-plan-store.js";
import {
  ERROR_CODES,
  emptyProgress,
  errorCodeFor,
  isJobType,
  type ErrorCode,
  type Job,
  type JobOptions,
  type JobProgress,
  type JobResult,
  type JobStatus,
  type JobType,
  type PlaylistJobSummary,
  type PlaylistSummary,
  type PlaylistVideoOutcome,
  type RecoveryPlanEntry,
} from "./types.js";
import { extractPlaylistId, extractVideoId } from "./url.js";

export type CollaboratorName = "metadata" | "download" | "storage";

export interface CreateJobRequest {
  type: JobType;
  urls: string[];
  options?: JobOptions;
}

export class JobValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "JobValidationError";
  }
}

export interface JobOrchestratorOptions {
  metadata: MetadataClient;
  download: DownloadClient;
  storage: StorageClient;
  store?: JobStore;
  planStore?: RecoveryPlanStore;
  recovery?: ErrorRecoveryManager;
  handlers?: Partial<Record<CollaboratorName, ServiceErrorHandler>>;
  /** Defaults for every job; a job's own options take precedence. */
  retry?: Partial<RetryConfig>;
  strategyOptions?: StrategyFactoryOptions;
  /** Terminal jobs older than this are deleted after the next terminal transition. */
  retentionMs?: number;
  outputDir?: string;
  /** Suggested wait before re-submitting a failed item. */
  retryAfterHintMs?: number;
  now?: () => Date;
}

interface WorkItem {
  itemId: string;
  videoId: string;
  url: string;
}

interface TrackedRecovery<T> {
  result: RecoveryResult<T>;
  retryDelaysMs: number[];
}

type ItemOutcome = Pick<JobResult, "status" | "attempts" | "retryDelaysMs" | "metadataSaved" | "videoDownloaded"> &
  Partial<Pick<JobResult, "errorCode" | "message" | "filePath" | "fileSize">>;

const DEFAULT_RETENTION_MS = 30 * 24 * 60 * 60 * 1_000;

function computeProgress(total: number, results: readonly JobResult[]): JobProgress {
  const progress = emptyProgress(total);
  for (const result of results) {
    progress.completed += 1;
    if (result.status === "success") progress.succeeded += 1;
    else if (result.status === "failed") progress.failed += 1;
    else progress.skipped += 1;
  }
  progress.percent = total === 0 ? 100 : Math.round((progress.completed / total) * 100);
  return progress;
}

function percent(part: number, whole: number): number {
  return whole === 0 ? 0 : Math.round((part / whole) * 10_000) / 100;
}

/** Per-playlist outcomes, read back from the job's results. */
export function summarizePlaylists(job: Job, playlists: readonly PlaylistMetadata[], at: Date): PlaylistJobSummary {
  const byItem = new Map(job.results.map((result) => [result.itemId, result]));

  const summaries = playlists.map((playlist): PlaylistSummary => {
    const videos = playlist.videos.flatMap((video): PlaylistVideoOutcome[] => {
      const result = byItem.get(video.videoId);
      if (!result) return [];
      const outcome: PlaylistVideoOutcome = { videoId: video.videoId, status: result.status };
      if (result.errorCode) outcome.errorCode = result.errorCode;
      if (result.filePath) outcome.filePath = result.filePath;
      return [outcome];
    });
    const successful = videos.filter((video) => video.status === "success").length;
    const failed = videos.filter((video) => video.status === "failed").length;
    return {
      playlistId: playlist.playlistId,
      title: playlist.title,
      totalVideos: playlist.videos.length,
      successful,
      failed,
      skipped: videos.length - successful - failed,
      successRate: percent(successful, playlist.videos.length),
      videos,
    };
  });

  const failedPlaylists = job.results.filter((result) => result.itemId.startsWith("playlist:")).length;
  const totalVideos = summaries.reduce((sum, playlist) => sum + playlist.totalVideos, 0);
  const successfulDownloads = summaries.reduce((sum, playlist) => sum + playlist.successful, 0);
  return {
    totalPlaylists: summaries.length + failedPlaylists,
    successfulPlaylists: summaries.length,
    failedPlaylists,
    totalVideos,
    successfulDownloads,
    failedDownloads: summaries.reduce((sum, playlist) => sum + playlist.failed, 0),
    overallSuccessRate: percent(successfulDownloads, totalVideos),
    playlists: summaries,
    generatedAt: at.toISOString(),
  };
}

/**
 * Owns job lifecycles and drives their items through the recovery manager.
 *
 * Each running job has one AbortController; cancelling the job aborts every
 * in-flight recovery call and backoff sleep for that job.
 */
export class JobOrchestrator {
  private readonly jobs = new Map<string, Job>();
  private readonly controllers = new Map<string, AbortController>();
  private readonly running = new Map<string, Promise<Job>>();
  private readonly inBackoff = new Map<string, Set<string>>();
  private readonly strategies = new Map<string, RetryStrategy>();
  private readonly store: JobStore;
  private readonly planStore: RecoveryPlanStore;
  private readonly recovery: ErrorRecoveryManager;
  private readonly handlers: Record<CollaboratorName, ServiceErrorHandler>;
  private readonly retryDefaults: Partial<RetryConfig>;
  private readonly strategyOptions: StrategyFactoryOptions;
  private readonly retentionMs: number;
  private readonly outputDir: string;
  private readonly retryAfterHintMs: number;
  private readonly now: () => Date;

  constructor(private readonly options: JobOrchestratorOptions) {
    this.store = options.store ?? new MemoryJobStore();
    this.planStore = options.planStore ?? new MemoryRecoveryPlanStore();
    this.recovery = options.recovery ?? new ErrorRecoveryManager();
    this.handlers = {
      metadata: options.handlers?.metadata ?? new MetadataErrorHandler(),
      download: options.handlers?.download ?? new DownloadErrorHandler(),
      storage: options.handlers?.storage ?? new StorageErrorHandler(),
    };
    this.retryDefaults = options.retry ?? {};
    this.strategyOptions = options.strategyOptions ?? {};
    this.retentionMs = options.retentionMs ?? DEFAULT_RETENTION_MS;
    this.outputDir = options.outputDir ?? join(homedir(), "YTArchive", "videos");
    this.retryAfterHintMs = options.retryAfterHintMs ?? 3_600_000;
    this.now = options.now ?? (() => new Date());
  }

  /** Reload persisted jobs and resume the ones that were dispatched but never finished. */
  async initialize(): Promise<void> {
    for (const job of await this.store.list()) {
      this.jobs.set(job.id, job);
    }
    for (const job of this.jobs.values()) {
      if (job.status === "RETRYING") this.transition(job, "RUNNING");
      if (job.status === "QUEUED" || job.status === "RUNNING") {
        logJob("info", "resuming job", { jobId: job.id, status: job.status, results: job.results.length });
        // settles on its own; tracked in `running`
        void this.launch(job);
      }
    }
  }

  async createJob(request: CreateJobRequest): Promise<Job> {
    this.validate(request);
    const stamp = this.now().toISOString();
    const job: Job = {
      id: randomUUID(),
      type: request.type,
      status: "CREATED",
      urls: [...request.urls],
      options: { ...(request.options ?? {}) },
      results: [],
      progress: emptyProgress(request.urls.length),
      createdAt: stamp,
      updatedAt: stamp,
    };
    this.jobs.set(job.id, job);
    await this.persist(job);
    logJob("info", "job created", { jobId: job.id, type: job.type, urls: job.urls.length });
    return structuredClone(job);
  }

  /** Run a job to a terminal status and return it. */
  async executeJob(id: string): Promise<Job> {
    return this.dispatch(id);
  }

  /** Dispatch a job in the background and return it as soon as it is running. */
  async startJob(id: string): Promise<Job> {
    // settles on its own; tracked in `running`
    void this.dispatch(id);
    return this.snapshot(id);
  }

  /** Resolve once the job is no longer running. */
  async waitForJob(id: string): Promise<Job> {
    const inFlight = this.running.get(id);
    return inFlight ? inFlight : this.snapshot(id);
  }

  getJob(id: string): Job | undefined {
    const job = this.jobs.get(id);
    return job ? structuredClone(job) : undefined;
  }

  listJobs(status?: JobStatus): Job[] {
    return Array.from(this.jobs.values())
      .filter((job) => !status || job.status === status)
      .sort((a, b) => a.createdAt.localeCompare(b.createdAt))
      .map((job) => structuredClone(job));
  }

  /**
   * Move a job to CANCELLED and abort its in-flight work. Results already
   * written stay. Throws {@link InvalidJobTransitionError} for terminal jobs.
   */
  async cancelJob(id: string): Promise<Job> {
    const job = this.require(id);
    this.transition(job, "CANCELLED");
    job.error = "Cancelled by request";
    this.controllers.get(id)?.abort();
    await this.persist(job);
    logJob("info", "job cancelled", { jobId: id, results: job.results.length });

    await this.running.get(id);
    await this.cleanupExpired();
    return this.snapshot(id);
  }

  getActiveRecoveries(): RecoveryOperation[] {
    return this.recovery.getActiveRecoveries();
  }

  async getRecoveryPlan(query?: RecoveryPlanQuery): Promise<RecoveryPlanEntry[]> {
    return this.planStore.list(query);
  }

  private validate(request: CreateJobRequest): void {
    if (!isJobType(request.type)) {
      throw new JobValidationError(`Unknown job type: ${String(request.type)}`);
    }
    if (!Array.isArray(request.urls) || request.urls.length === 0) {
      throw new JobValidationError("At least one URL is required");
    }
    if (request.urls.some((url) => typeof url !== "string" || url.trim() === "")) {
      throw new JobValidationError("URLs must be non-empty strings");
    }
    const options = request.options ?? {};
    if (options.retryStrategy !== undefined && !isStrategyName(options.retryStrategy)) {
      throw new JobValidationError(`Unknown retry strategy: ${String(options.retryStrategy)}`);
    }
    if (options.completionPolicy !== undefined && !["best_effort", "fail_on_any"].includes(options.completionPolicy)) {
      throw new JobValidationError(`Unknown completion policy: ${String(options.completionPolicy)}`);
    }
    try {
      createRetryConfig(this.retryConfigFor(options));
    } catch (err) {
      throw new JobValidationError(errorMessage(err));
    }
  }

  /** Synchronous up to `launch` so two callers cannot dispatch the same job twice. */
  private dispatch(id: string): Promise<Job> {
    const job = this.require(id);
    const inFlight = this.running.get(id);
    if (inFlight) return inFlight;

    if (job.status === "CREATED") this.transition(job, "QUEUED");
    if (job.status !== "QUEUED") {
      throw new InvalidJobTransitionError(id, job.status, "RUNNING");
    }
    return this.launch(job);
  }

  private launch(job: Job): Promise<Job> {
    const controller = new AbortController();
    this.controllers.set(job.id, controller);
    const run = this.run(job, controller.signal).finally(() => {
      this.controllers.delete(job.id);
      this.running.delete(job.id);
      this.inBackoff.delete(job.id);
    });
    this.running.set(job.id, run);
    return run;
  }

  private run(job: Job, signal: AbortSignal): Promise<Job> {
    return jobTelemetry.tracer.startActiveSpan(
      `job ${job.type}`,
      { attributes: { "job.id": job.id, "job.type": job.type } },
      async (span) => {
        const started = this.now().getTime();
        try {
          if (job.status === "QUEUED") this.transition(job, "RUNNING");
          await this.persist(job);
          logJob("info", "job started", { jobId: job.id, type: job.type });

          await this.process(job, signal);

          if (!isTerminal(job.status)) {
            const policy = job.options.completionPolicy ?? defaultCompletionPolicy(job.type);
            const status = resolveFinalStatus(job.results, policy);
            if (status === "FAILED") {
              job.error = `${job.progress.failed} of ${job.results.length} items failed`;
            }
            this.transition(job, status);
          }
        } catch (err) {
          markSpanError(err);
          logJob("error", "job aborted by an unexpected error", { jobId: job.id, error: errorMessage(err) });
          if (!isTerminal(job.status)) {
            job.error = errorMessage(err);
            this.transition(job, "FAILED");
          }
        } finally {
          span.setAttribute("job.status", job.status);
          span.end();
        }

        await this.persist(job);
        jobTelemetry.runsTotal.add(1, { type: job.type, status: job.status });
        jobTelemetry.durationMs.record(this.now().getTime() - started, { type: job.type });
        logJob(job.status === "FAILED" ? "warn" : "info", "job finished", {
          jobId: job.id,
          status: job.status,
          ...job.progress,
        });
        await this.cleanupExpired();
        return structuredClone(job);
      },
    );
  }

  private async process(job: Job, signal: AbortSignal): Promise<void> {
    const done = new Set(job.results.map((result) => result.itemId));
    const playlists: PlaylistMetadata[] = [];
    const items =
      job.type === "PLAYLIST_DOWNLOAD"
        ? await this.expandPlaylists(job, signal, done, playlists)
        : await this.videoItems(job, done);
    const pending = items.filter((item) => !done.has(item.itemId));
    const total = job.results.length + pending.length;
    job.progress = computeProgress(total, job.results);

    const plan = planBatch(pending.length, {
      maxConcurrent: job.options.maxConcurrent,
      chunkSize: job.options.chunkSize,
    });
    logJob("debug", "batch planned", { jobId: job.id, ...plan });

    await runBatch(pending, (item) => this.processItem(job, item, signal), {
      plan,
      signal,
      onChunk: async ({ chunkIndex, chunks }) => {
        job.progress = computeProgress(total, job.results);
        job.updatedAt = this.now().toISOString();
        await this.persist(job);
        logJob("info", "job progress", { jobId: job.id, chunk: chunkIndex + 1, chunks, ...job.progress });
      },
    });
    job.progress = computeProgress(total, job.results);

    if (job.type === "PLAYLIST_DOWNLOAD" && !signal.aborted) {
      job.playlistSummary = summarizePlaylists(job, playlists, this.now());
      await this.storePlaylistSummary(job, job.playlistSummary, signal);
    }
  }

  /** Best-effort copy of the playlist summary in the Storage service. */
  private async storePlaylistSummary(job: Job, summary: PlaylistJobSummary, signal: AbortSignal): Promise<void> {
    const recordId = `playlist_job_${job.id}`;
    const { playlists, ...totals } = summary;
    const stored = await this.recover(job, recordId, recordId, "storage", "store_playlist_summary", signal, (s) =>
      this.options.storage.saveMetadata(
        recordId,
        {
          videoId: recordId,
          title: "Playlist job summary",
          type: "playlist_job_summary",
          jobId: job.id,
          summary: totals,
          playlists: playlists.map(({ videos, ...rest }) => rest),
          timestamp: summary.generatedAt,
        },
        s,
      ),
    );
    if (!stored.result.ok && stored.result.kind !== "cancelled") {
      logJob("warn", "could not store playlist summary", { jobId: job.id, error: errorMessage(stored.result.error) });
    }
  }

  /** Items for video and metadata jobs; URLs without a video id fail at once. */
  private async videoItems(job: Job, done: Set<string>): Promise<WorkItem[]> {
    const items: WorkItem[] = [];
    for (const url of job.urls) {
      const videoId = extractVideoId(url);
      if (!videoId) {
        if (!done.has(url)) {
          await this.recordInvalidUrl(job, url, `Could not extract video ID from URL: ${url}`);
          done.add(url);
        }
        continue;
      }
      items.push({ itemId: videoId, videoId, url });
    }
    return items;
  }

  /** Work items for every fetched playlist; each fetched playlist is also pushed to `fetched`. */
  private async expandPlaylists(
    job: Job,
    signal: AbortSignal,
    done: Set<string>,
    fetched: PlaylistMetadata[],
  ): Promise<WorkItem[]> {
    const items: WorkItem[] = [];
    for (const url of job.urls) {
      if (signal.aborted) break;
      const playlistId = extractPlaylistId(url);
      if (!playlistId) {
        if (!done.has(url)) {
          await this.recordInvalidUrl(job, url, `Could not extract playlist ID from URL: ${url}`);
          done.add(url);
        }
        continue;
      }

      const itemId = `playlist:${playlistId}`;
      const startedAt = this.now();
      const response = await this.recover(job, itemId, playlistId, "metadata", "fetch_playlist", signal, (s) =>
        this.options.metadata.fetchPlaylist(playlistId, s),
      );
      if (signal.aborted) break;
      if (!response.result.ok) {
        if (!done.has(itemId)) {
          const outcome = await this.failedOutcome(job, itemId, response.result, response.retryDelaysMs);
          this.writeResult(job, itemId, startedAt, outcome);
          done.add(itemId);
        }
        continue;
      }

      const playlist = response.result.value;
      fetched.push(playlist);
      logJob("info", "playlist expanded", { jobId: job.id, playlistId, videos: playlist.videos.length });
      for (const video of playlist.videos) {
        if (video.isAvailable) {
          items.push({ itemId: video.videoId, videoId: video.videoId, url: `https://www.youtube.com/watch?v=${video.videoId}` });
        } else if (!done.has(video.videoId)) {
          await this.recordUnavailableEntry(job, video.videoId);
          done.add(video.videoId);
        }
      }
    }
    return items;
  }

  private async processItem(job: Job, item: WorkItem, signal: AbortSignal): Promise<void> {
    const startedAt = this.now();
    const outcome = job.type === "METADATA_ONLY" ? await this.archiveMetadata(job, item, signal) : await this.archiveVideo(job, item, signal);

    // a cancelled job keeps only the results written before cancellation
    if (signal.aborted || isTerminal(job.status)) return;
    this.writeResult(job, item.itemId, startedAt, outcome);
  }

  private async archiveVideo(job: Job, item: WorkItem, signal: AbortSignal): Promise<ItemOutcome> {
    const downloaded = await this.recover(job, item.itemId, item.videoId, "download", "download_video", signal, (s) =>
      this.options.download.download(
        {
          videoId: item.videoId,
          outputPath: job.options.outputDir ?? this.outputDir,
          quality: job.options.quality ?? "1080p",
          includeCaptions: job.options.includeCaptions ?? true,
          captionLanguages: job.options.captionLanguages ?? ["en"],
          resume: true,
        },
        s,
      ),
    );
    if (!downloaded.result.ok) {
      return this.failedOutcome(job, item.itemId, downloaded.result, downloaded.retryDelaysMs);
    }

    const file = downloaded.result.value;
    const stored = await this.recover(job, item.itemId, item.videoId, "storage", "store_video", signal, (s) =>
      this.options.storage.saveVideo(
        { videoId: item.videoId, filePath: file.filePath, fileSize: file.fileSize, quality: job.options.quality ?? "1080p" },
        s,
      ),
    );
    if (!stored.result.ok && stored.result.kind !== "cancelled") {
      logJob("warn", "could not record downloaded video in storage", {
        jobId: job.id,
        videoId: item.videoId,
        error: errorMessage(stored.result.error),
      });
    }

    return {
      status: "success",
      attempts: downloaded.result.attempts,
      retryDelaysMs: downloaded.retryDelaysMs,
      metadataSaved: false,
      videoDownloaded: true,
      filePath: file.filePath,
      fileSize: file.fileSize,
    };
  }

  private async archiveMetadata(job: Job, item: WorkItem, signal: AbortSignal): Promise<ItemOutcome> {
    const fetched = await this.recover(job, item.itemId, item.videoId, "metadata", "fetch_metadata", signal, (s) =>
      this.options.metadata.fetchVideo(item.videoId, s),
    );
    if (!fetched.result.ok) return this.failedOutcome(job, item.itemId, fetched.result, fetched.retryDelaysMs);

    const metadata = fetched.result.value;
    const saved = await this.recover(job, item.itemId, item.videoId, "storage", "store_metadata", signal, (s) =>
      this.options.storage.saveMetadata(item.videoId, metadata, s),
    );
    if (!saved.result.ok) {
      const failed = await this.failedOutcome(job, item.itemId, saved.result, saved.retryDelaysMs);
      return { ...failed, attempts: fetched.result.attempts, retryDelaysMs: fetched.retryDelaysMs };
    }

    return {
      status: "success",
      attempts: fetched.result.attempts,
      retryDelaysMs: fetched.retryDelaysMs,
      metadataSaved: true,
      videoDownloaded: false,
    };
  }

  /** One recovery-managed call on behalf of a job item, with backoff tracking for RETRYING. */
  private async recover<T>(
    job: Job,
    itemId: string,
    resourceId: string,
    service: CollaboratorName,
    operationName: string,
    signal: AbortSignal,
    call: (signal: AbortSignal) => Promise<T>,
  ): Promise<TrackedRecovery<T>> {
    const context = createErrorContext({ operationName, resourceId, serviceName: service, jobId: job.id });
    const operation: RecoverableOperation<T> = (attemptSignal) => {
      this.leaveBackoff(job, itemId);
      return call(attemptSignal);
    };

    let result: RecoveryResult<T>;
    try {
      result = await this.recovery.executeWithRetry(operation, context, this.strategyFor(job), this.handlers[service], {
        signal,
        attemptTimeoutMs: job.options.attemptTimeoutMs,
        onRetry: () => this.enterBackoff(job, itemId),
      });
    } finally {
      this.leaveBackoff(job, itemId);
    }

    const retryDelaysMs = context.attempts.map((attempt) => attempt.delayMs);
    // the terminal failed attempt was not followed by a retry
    if (!result.ok) retryDelaysMs.pop();
    return { result, retryDelaysMs };
  }

  private enterBackoff(job: Job, itemId: string): void {
    let items = this.inBackoff.get(job.id);
    if (!items) {
      items = new Set();
      this.inBackoff.set(job.id, items);
    }
    items.add(itemId);
    if (job.status === "RUNNING") this.transition(job, "RETRYING");
  }

  private leaveBackoff(job: Job, itemId: string): void {
    const items = this.inBackoff.get(job.id);
    if (!items?.delete(itemId)) return;
    if (items.size === 0 && job.status === "RETRYING") this.transition(job, "RUNNING");
  }

  private strategyFor(job: Job): RetryStrategy {
    const name = job.options.retryStrategy ?? "exponential";
    const config = createRetryConfig(this.retryConfigFor(job.options));
    const key = [name, config.maxAttempts, config.baseDelayMs, config.maxDelayMs, config.backoffFactor, config.jitterFraction].join(":");

    let strategy = this.strategies.get(key);
    if (!strategy) {
      strategy = createRetryStrategy(name, config, {
        // one circuit / window per collaborator and video
        keyOf: (context) => (context.serviceName ? `${context.serviceName}:${context.resourceId}` : context.resourceId),
        ...this.strategyOptions,
      });
      this.strategies.set(key, strategy);
    }
    return strategy;
  }

  private retryConfigFor(options: JobOptions): Partial<RetryConfig> {
    return {
      ...this.retryDefaults,
      ...(options.maxAttempts !== undefined ? { maxAttempts: options.maxAttempts } : {}),
      ...(options.baseDelayMs !== undefined ? { baseDelayMs: options.baseDelayMs } : {}),
      ...(options.maxDelayMs !== undefined ? { maxDelayMs: options.maxDelayMs } : {}),
    };
  }

  private async failedOutcome(
    job: Job,
    itemId: string,
    result: RecoveryFailure,
    retryDelaysMs: number[],
  ): Promise<ItemOutcome> {
    const errorCode = errorCodeFor(result.kind, result.reason, result.context.serviceName);
    const message = errorMessage(result.error);

    if (result.kind !== "cancelled") {
      jobTelemetry.itemFailuresTotal.add(1, { type: job.type, code: errorCode });
      await this.appendPlanEntry({
        itemId,
        jobId: job.id,
        kind: result.kind === "non_retryable" && result.reason === "resource_unavailable" ? "unavailable" : "failed",
        reason: result.reason,
        errorCode,
        firstDetectedAt: result.context.attempts[0]?.timestamp ?? this.now().toISOString(),
        lastAttemptAt: this.now().toISOString(),
        attempts: result.attempts,
        retryAfter: this.retryAfterFor(result.kind, result.error),
        errors: result.context.attempts.map((attempt) => attempt.errorMessage),
      });
    }

    return {
      status: "failed",
      errorCode,
      message,
      attempts: result.attempts,
      retryDelaysMs,
      metadataSaved: false,
      videoDownloaded: false,
    };
  }

  private retryAfterFor(kind: RecoveryFailureKind, error: unknown): string | undefined {
    const { retryAfterMs } = describeError(error);
    if (retryAfterMs !== undefined) return new Date(this.now().getTime() + retryAfterMs).toISOString();
    if (kind === "non_retryable") return undefined;
    return new Date(this.now().getTime() + this.retryAfterHintMs).toISOString();
  }

  private async recordInvalidUrl(job: Job, url: string, message: string): Promise<void> {
    const stamp = this.now();
    logJob("warn", "invalid url", { jobId: job.id, url });
    this.writeResult(job, url, stamp, {
      status: "failed",
      errorCode: ERROR_CODES.INVALID_REQUEST,
      message,
      attempts: 0,
      retryDelaysMs: [],
      metadataSaved: false,
      videoDownloaded: false,
    });
    await this.appendPlanEntry({
      itemId: url,
      jobId: job.id,
      kind: "failed",
      reason: "validation",
      errorCode: ERROR_CODES.INVALID_REQUEST,
      firstDetectedAt: stamp.toISOString(),
      lastAttemptAt: stamp.toISOString(),
      attempts: 0,
      errors: [message],
    });
  }

  private async recordUnavailableEntry(job: Job, videoId: string): Promise<void> {
    const stamp = this.now();
    const errorCode: ErrorCode = ERROR_CODES.VIDEO_UNAVAILABLE;
    this.writeResult(job, videoId, stamp, {
      status: "skipped",
      errorCode,
      message: "Video is unavailable in the playlist",
      attempts: 0,
      retryDelaysMs: [],
      metadataSaved: false,
      videoDownloaded: false,
    });
    await this.appendPlanEntry({
      itemId: videoId,
      jobId: job.id,
      kind: "unavailable",
      reason: "resource_unavailable",
      errorCode,
      firstDetectedAt: stamp.toISOString(),
      lastAttemptAt: stamp.toISOString(),
      attempts: 0,
      errors: ["Video is unavailable in the playlist"],
    });
  }

  private writeResult(job: Job, itemId: string, startedAt: Date, outcome: ItemOutcome): void {
    const completedAt = this.now();
    job.results.push({
      itemId,
      ...outcome,
      startedAt: startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      durationMs: completedAt.getTime() - startedAt.getTime(),
    });
  }

  /** Plan writes are logged on failure; they never fail the item. */
  private async appendPlanEntry(entry: RecoveryPlanEntry): Promise<void> {
    try {
      await this.planStore.append(entry);
    } catch (err) {
      logJob("error", "failed to append recovery plan entry", { itemId: entry.itemId, error: errorMessage(err) });
    }
  }

  private transition(job: Job, to: JobStatus): void {
    const from = job.status;
    transitionJob(job, to, this.now());
    logJob("debug", "job transition", { jobId: job.id, from, to });
  }

  private async persist(job: Job): Promise<void> {
    try {
      await this.store.save(job);
    } catch (err) {
      logJob("error", "failed to persist job", { jobId: job.id, error: errorMessage(err) });
    }
  }

  private async cleanupExpired(): Promise<void> {
    const cutoff = this.now().getTime() - this.retentionMs;
    for (const job of Array.from(this.jobs.values())) {
      if (!isTerminal(job.status) || !job.completedAt || Date.parse(job.completedAt) >= cutoff) continue;
      this.jobs.delete(job.id);
      try {
        await this.store.delete(job.id);
        logJob("info", "expired job removed", { jobId: job.id, completedAt: job.completedAt });
      } catch (err) {
        logJob("error", "failed to remove expired job", { jobId: job.id, error: errorMessage(err) });
      }
    }
  }

  private require(id: string): Job {
    const job = this.jobs.get(id);
    if (!job) throw new JobNotFoundError(id);
    return job;
  }

  private snapshot(id: string): Job {
    return structuredClone(this.require(id));
  }
}
