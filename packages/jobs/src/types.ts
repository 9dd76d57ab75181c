import type { RecoveryFailureKind, RetryReason, StrategyName } from "@ytarchive/recovery";

export type JobType = "VIDEO_DOWNLOAD" | "PLAYLIST_DOWNLOAD" | "METADATA_ONLY";

export const JOB_TYPES: readonly JobType[] = ["VIDEO_DOWNLOAD", "PLAYLIST_DOWNLOAD", "METADATA_ONLY"];

export type JobStatus = "CREATED" | "QUEUED" | "RUNNING" | "RETRYING" | "COMPLETED" | "FAILED" | "CANCELLED";

export const JOB_STATUSES: readonly JobStatus[] = [
  "CREATED",
  "QUEUED",
  "RUNNING",
  "RETRYING",
  "COMPLETED",
  "FAILED",
  "CANCELLED",
];

/**
 * - `best_effort`: finish COMPLETED with partial results unless every item failed.
 * - `fail_on_any`: finish FAILED as soon as one item failed.
 */
export type CompletionPolicy = "best_effort" | "fail_on_any";

export interface JobOptions {
  outputDir?: string;
  quality?: string;
  includeCaptions?: boolean;
  captionLanguages?: string[];
  /** Worker pool size for batches; clamped to [1, 10]. */
  maxConcurrent?: number;
  chunkSize?: number;
  retryStrategy?: StrategyName;
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  attemptTimeoutMs?: number;
  completionPolicy?: CompletionPolicy;
}

export const ERROR_CODES = {
  API_QUOTA_EXCEEDED: "E001",
  VIDEO_UNAVAILABLE: "E002",
  NETWORK_TIMEOUT: "E003",
  STORAGE_FULL: "E004",
  INVALID_CREDENTIALS: "E005",
  SERVICE_UNAVAILABLE: "E006",
  INVALID_REQUEST: "E007",
  INTERNAL_ERROR: "E999",
} as const;

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

export type JobResultStatus = "success" | "failed" | "skipped";

/** Outcome of one item. Written once, never updated. */
export interface JobResult {
  itemId: string;
  status: JobResultStatus;
  errorCode?: ErrorCode;
  message?: string;
  /** Invocations of the item's primary operation. */
  attempts: number;
  /** Backoff applied before each retry of the primary operation. */
  retryDelaysMs: number[];
  startedAt: string;
  completedAt: string;
  durationMs: number;
  metadataSaved: boolean;
  videoDownloaded: boolean;
  filePath?: string;
  fileSize?: number;
}

export interface JobProgress {
  total: number;
  completed: number;
  succeeded: number;
  failed: number;
  skipped: number;
  percent: number;
}

export interface PlaylistVideoOutcome {
  videoId: string;
  status: JobResultStatus;
  errorCode?: ErrorCode;
  filePath?: string;
}

export interface PlaylistSummary {
  playlistId: string;
  title: string;
  totalVideos: number;
  successful: number;
  failed: number;
  skipped: number;
  /** Percent of the playlist's videos archived, rounded to two decimals. */
  successRate: number;
  videos: PlaylistVideoOutcome[];
}

/** Written once a playlist job's batch has drained. */
export interface PlaylistJobSummary {
  totalPlaylists: number;
  successfulPlaylists: number;
  failedPlaylists: number;
  totalVideos: number;
  successfulDownloads: number;
  failedDownloads: number;
  overallSuccessRate: number;
  playlists: PlaylistSummary[];
  generatedAt: string;
}

export interface Job {
  id: string;
  type: JobType;
  status: JobStatus;
  urls: string[];
  options: JobOptions;
  results: JobResult[];
  progress: JobProgress;
  error?: string;
  createdAt: string;
  updatedAt: string;
  startedAt?: string;
  completedAt?: string;
  playlistSummary?: PlaylistJobSummary;
}

export type RecoveryPlanKind = "unavailable" | "failed";

/** Durable record of an item that could not be archived. Never removed automatically. */
export interface RecoveryPlanEntry {
  itemId: string;
  jobId: string;
  kind: RecoveryPlanKind;
  reason?: RetryReason;
  errorCode: ErrorCode;
  firstDetectedAt: string;
  lastAttemptAt: string;
  attempts: number;
  retryAfter?: string;
  errors: string[];
}

export function emptyProgress(total = 0): JobProgress {
  return { total, completed: 0, succeeded: 0, failed: 0, skipped: 0, percent: 0 };
}

export function isJobType(value: unknown): value is JobType {
  return typeof value === "string" && JOB_TYPES.some((type) => type === value);
}

export function isJobStatus(value: unknown): value is JobStatus {
  return typeof value === "string" && JOB_STATUSES.some((status) => status === value);
}

/** Map a terminal recovery failure onto the archive's error codes. */
export function errorCodeFor(kind: RecoveryFailureKind, reason: RetryReason | undefined, serviceName?: string): ErrorCode {
  if (kind === "circuit_open") return ERROR_CODES.SERVICE_UNAVAILABLE;
  if (kind === "handled") {
    return serviceName === "metadata" ? ERROR_CODES.INVALID_CREDENTIALS : ERROR_CODES.STORAGE_FULL;
  }
  switch (reason) {
    case "quota_exceeded":
      return ERROR_CODES.API_QUOTA_EXCEEDED;
    case "resource_unavailable":
      return ERROR_CODES.VIDEO_UNAVAILABLE;
    case "network":
      return ERROR_CODES.NETWORK_TIMEOUT;
    case "rate_limit":
      return ERROR_CODES.SERVICE_UNAVAILABLE;
    case "validation":
      return ERROR_CODES.INVALID_REQUEST;
    default:
      return ERROR_CODES.INTERNAL_ERROR;
  }
}
