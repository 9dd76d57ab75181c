import type { CompletionPolicy, Job, JobResult, JobStatus, JobType } from "./types.js";

const TRANSITIONS: Record<JobStatus, readonly JobStatus[]> = {
  CREATED: ["QUEUED", "CANCELLED"],
  QUEUED: ["RUNNING", "CANCELLED"],
  RUNNING: ["RETRYING", "COMPLETED", "FAILED", "CANCELLED"],
  RETRYING: ["RUNNING", "COMPLETED", "FAILED", "CANCELLED"],
  COMPLETED: [],
  FAILED: [],
  CANCELLED: [],
};

export class InvalidJobTransitionError extends Error {
  constructor(
    readonly jobId: string,
    readonly from: JobStatus,
    readonly to: JobStatus,
  ) {
    super(`Invalid job transition for ${jobId}: ${from} -> ${to}`);
    this.name = "InvalidJobTransitionError";
  }
}

export class JobNotFoundError extends Error {
  constructor(readonly jobId: string) {
    super(`Job not found: ${jobId}`);
    this.name = "JobNotFoundError";
  }
}

export function canTransition(from: JobStatus, to: JobStatus): boolean {
  return TRANSITIONS[from].includes(to);
}

export function isTerminal(status: JobStatus): boolean {
  return TRANSITIONS[status].length === 0;
}

/** Move `job` to `to`, stamping timestamps. Throws {@link InvalidJobTransitionError}. */
export function transitionJob(job: Job, to: JobStatus, now: Date = new Date()): void {
  if (!canTransition(job.status, to)) {
    throw new InvalidJobTransitionError(job.id, job.status, to);
  }
  const stamp = now.toISOString();
  job.status = to;
  job.updatedAt = stamp;
  if (to === "RUNNING") job.startedAt ??= stamp;
  if (isTerminal(to)) job.completedAt = stamp;
}

export function defaultCompletionPolicy(type: JobType): CompletionPolicy {
  return type === "PLAYLIST_DOWNLOAD" ? "best_effort" : "fail_on_any";
}

/** Terminal status once every item has a result. */
export function resolveFinalStatus(results: readonly JobResult[], policy: CompletionPolicy): "COMPLETED" | "FAILED" {
  const failed = results.filter((result) => result.status === "failed").length;
  if (failed === 0) return "COMPLETED";
  if (policy === "fail_on_any") return "FAILED";
  return failed === results.length ? "FAILED" : "COMPLETED";
}
