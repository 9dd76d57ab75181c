export { JobOrchestrator, JobValidationError, summarizePlaylists } from "./orchestrator.js";
export type { CollaboratorName, CreateJobRequest, JobOrchestratorOptions } from "./orchestrator.js";

export {
  InvalidJobTransitionError,
  JobNotFoundError,
  canTransition,
  defaultCompletionPolicy,
  isTerminal,
  resolveFinalStatus,
  transitionJob,
} from "./job-state.js";

export { FileJobStore, MemoryJobStore } from "./job-store.js";
export type { JobStore } from "./job-store.js";

export { JsonlRecoveryPlanStore, MemoryRecoveryPlanStore, collapsePlanEntries } from "./recovery-plan-store.js";
export type { RecoveryPlanQuery, RecoveryPlanStore } from "./recovery-plan-store.js";

export { chunkItems, planBatch, runBatch } from "./batch-engine.js";
export type { BatchOutcome, BatchOverrides, BatchPlan, ChunkProgress, RunBatchOptions } from "./batch-engine.js";

export { HttpDownloadClient, HttpMetadataClient, HttpStorageClient, parseRetryAfter } from "./clients.js";
export type {
  DownloadClient,
  DownloadOutcome,
  DownloadRequest,
  FetchLike,
  HttpClientOptions,
  HttpDownloadClientOptions,
  MetadataClient,
  PlaylistMetadata,
  PlaylistVideo,
  StorageClient,
  StoredVideo,
  VideoMetadata,
} from "./clients.js";

export { extractPlaylistId, extractVideoId } from "./url.js";
export { jobTelemetry } from "./observability.js";

export {
  ERROR_CODES,
  JOB_STATUSES,
  JOB_TYPES,
  emptyProgress,
  errorCodeFor,
  isJobStatus,
  isJobType,
} from "./types.js";
export type {
  CompletionPolicy,
  ErrorCode,
  Job,
  JobOptions,
  JobProgress,
  JobResult,
  JobResultStatus,
  JobStatus,
  JobType,
  PlaylistJobSummary,
  PlaylistSummary,
  PlaylistVideoOutcome,
  RecoveryPlanEntry,
  RecoveryPlanKind,
} from "./types.js";
