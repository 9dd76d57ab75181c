import { mkdir, writeFile } from "node:fs/promises";
import { dirname, join, resolve } from "node:path";
import {
  JsonlRecoveryPlanStore,
  isJobStatus,
  isJobType,
  type FetchLike,
  type Job,
  type JobOptions,
  type RecoveryPlanEntry,
  type RecoveryPlanQuery,
} from "@ytarchive/jobs";
import { isStrategyName } from "@ytarchive/recovery";

export interface CliOptions {
  apiBaseUrl: string;
  dataDir: string;
  fetch?: FetchLike;
  /** Receives each JSON output line, newline included. */
  write?: (line: string) => void;
}

export interface RecoveryPlanExport {
  generatedAt: string;
  total: number;
  entries: RecoveryPlanEntry[];
}

/** Raised for bad command-line input; reported without a stack. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

type Emit = (level: "info" | "error", event: string, message: string, context?: Record<string, unknown>) => void;

function emitter(write: (line: string) => void): Emit {
  return (level, event, message, context) => {
    const payload = {
      timestamp: new Date().toISOString(),
      level,
      event,
      message,
      ...(context ? { context } : {}),
    };
    write(`${JSON.stringify(payload)}\n`);
  };
}

/** Parse CLI arguments into a command and flags. */
export function parseArgs(argv: string[]): { command: string; args: string[] } {
  const args = argv.slice(2);

  if ((args[0] === "jobs" || args[0] === "plan") && args[1] !== undefined && !args[1].startsWith("--")) {
    return { command: `${args[0]}:${args[1]}`, args: args.slice(2) };
  }

  return { command: args[0] ?? "help", args: args.slice(1) };
}

/** Values of `--name=value` or `--name value`, in order. */
export function getFlagValues(args: string[], name: string): string[] {
  const values: string[] = [];
  for (const [index, arg] of args.entries()) {
    if (arg.startsWith(`${name}=`)) {
      values.push(arg.slice(name.length + 1));
    } else if (arg === name && args[index + 1] !== undefined) {
      values.push(args[index + 1]);
    }
  }
  return values;
}

function getFlagValue(args: string[], name: string): string | undefined {
  return getFlagValues(args, name).at(-1);
}

function positional(args: string[], what: string): string {
  const value = args.find((arg, index) => {
    const previous = index > 0 ? args[index - 1] : "";
    return !arg.startsWith("--") && !(previous.startsWith("--") && !previous.includes("="));
  });
  if (!value) throw new UsageError(`Missing ${what}`);
  return value;
}

function numericFlag(args: string[], name: string): number | undefined {
  const raw = getFlagValue(args, name);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) throw new UsageError(`${name} must be a number, got ${raw}`);
  return value;
}

/** Job options from `--max-attempts=3 --strategy=adaptive ...`. */
export function parseJobOptions(args: string[]): JobOptions {
  const strategy = getFlagValue(args, "--strategy");
  if (strategy !== undefined && !isStrategyName(strategy)) {
    throw new UsageError(`Unknown retry strategy: ${strategy}`);
  }
  return {
    outputDir: getFlagValue(args, "--output-dir"),
    quality: getFlagValue(args, "--quality"),
    retryStrategy: strategy,
    maxAttempts: numericFlag(args, "--max-attempts"),
    baseDelayMs: numericFlag(args, "--base-delay-ms"),
    maxConcurrent: numericFlag(args, "--max-concurrent"),
    chunkSize: numericFlag(args, "--chunk-size"),
  };
}

/** Thin client for the job API. */
export class JobApiClient {
  private readonly fetchImpl: FetchLike;

  constructor(
    private readonly baseUrl: string,
    fetchImpl?: FetchLike,
  ) {
    this.fetchImpl = fetchImpl ?? fetch;
  }

  async listJobs(status?: string): Promise<Job[]> {
    const query = status ? `?status=${encodeURIComponent(status)}` : "";
    const body = await this.call<{ jobs: Job[] }>("GET", `/api/v1/jobs${query}`);
    return body.jobs;
  }

  getJob(id: string): Promise<Job> {
    return this.call<Job>("GET", `/api/v1/jobs/${encodeURIComponent(id)}`);
  }

  createJob(type: string, urls: string[], options: JobOptions): Promise<Job> {
    return this.call<Job>("POST", "/api/v1/jobs", { type, urls, options });
  }

  executeJob(id: string): Promise<Job> {
    return this.call<Job>("PUT", `/api/v1/jobs/${encodeURIComponent(id)}/execute`);
  }

  cancelJob(id: string): Promise<Job> {
    return this.call<Job>("POST", `/api/v1/jobs/${encodeURIComponent(id)}/cancel`);
  }

  private async call<T>(method: string, path: string, body?: unknown): Promise<T> {
    const res = await this.fetchImpl(`${this.baseUrl}${path}`, {
      method,
      headers: body === undefined ? undefined : { "Content-Type": "application/json" },
      body: body === undefined ? undefined : JSON.stringify(body),
    });
    const text = await res.text();
    if (!res.ok) {
      let detail = text;
      try {
        const parsed = JSON.parse(text) as { error?: string };
        detail = parsed.error ?? text;
      } catch {
        detail = text || res.statusText;
      }
      throw new Error(`API error ${res.status}: ${detail}`);
    }
    return JSON.parse(text) as T;
  }
}

export function recoveryPlanPath(dataDir: string): string {
  return join(dataDir, "recovery_plan.jsonl");
}

function planQuery(args: string[]): RecoveryPlanQuery {
  const kind = getFlagValue(args, "--kind");
  if (kind !== undefined && kind !== "unavailable" && kind !== "failed") {
    throw new UsageError(`--kind must be unavailable or failed, got ${kind}`);
  }
  return { jobId: getFlagValue(args, "--job"), kind };
}

/** Write the recovery plan as one JSON document. */
export async function exportRecoveryPlan(dataDir: string, outPath: string, query: RecoveryPlanQuery = {}): Promise<RecoveryPlanExport> {
  const entries = await new JsonlRecoveryPlanStore(recoveryPlanPath(dataDir)).list(query);
  const document: RecoveryPlanExport = { generatedAt: new Date().toISOString(), total: entries.length, entries };
  await mkdir(dirname(outPath), { recursive: true });
  await writeFile(outPath, `${JSON.stringify(document, null, 2)}\n`, "utf-8");
  return document;
}

const USAGE = [
  "ytarchive jobs list [--status=S]          List jobs, optionally by status",
  "ytarchive jobs get <id>                   Show one job",
  "ytarchive jobs create --type=T --url=U... Create a job (repeat --url)",
  "ytarchive jobs execute <id>               Start a created or queued job",
  "ytarchive jobs cancel <id>                Cancel a job",
  "ytarchive plan list [--job=ID] [--kind=K] Show the recovery plan",
  "ytarchive plan export --out=FILE          Write the recovery plan to a JSON file",
  "ytarchive help                            Show this help message",
];

/** Main CLI entry point. Returns exit code. */
export async function run(argv: string[], options: CliOptions): Promise<number> {
  const emit = emitter(options.write ?? ((line) => process.stdout.write(line)));
  const { command, args } = parseArgs(argv);
  const api = new JobApiClient(options.apiBaseUrl, options.fetch);

  try {
    switch (command) {
      case "jobs:list": {
        const status = getFlagValue(args, "--status");
        if (status !== undefined && !isJobStatus(status)) throw new UsageError(`Unknown job status: ${status}`);
        const jobs = await api.listJobs(status);
        emit("info", "cli.jobs.list", `${jobs.length} job(s).`, {
          jobs: jobs.map((job) => ({ id: job.id, type: job.type, status: job.status, progress: job.progress })),
        });
        return 0;
      }

      case "jobs:get": {
        const job = await api.getJob(positional(args, "job id"));
        emit("info", "cli.jobs.get", `Job ${job.id} is ${job.status}.`, { job });
        return 0;
      }

      case "jobs:create": {
        const type = getFlagValue(args, "--type");
        if (!isJobType(type)) throw new UsageError("--type must be VIDEO_DOWNLOAD, PLAYLIST_DOWNLOAD or METADATA_ONLY");
        const urls = getFlagValues(args, "--url");
        if (urls.length === 0) throw new UsageError("At least one --url is required");
        const job = await api.createJob(type, urls, parseJobOptions(args));
        emit("info", "cli.jobs.create", `Created job ${job.id}.`, { job });
        return 0;
      }

      case "jobs:execute": {
        const job = await api.executeJob(positional(args, "job id"));
        emit("info", "cli.jobs.execute", `Job ${job.id} is ${job.status}.`, { job });
        return 0;
      }

      case "jobs:cancel": {
        const job = await api.cancelJob(positional(args, "job id"));
        emit("info", "cli.jobs.cancel", `Job ${job.id} is ${job.status}.`, { job });
        return 0;
      }

      case "plan:list": {
        const entries = await new JsonlRecoveryPlanStore(recoveryPlanPath(options.dataDir)).list(planQuery(args));
        emit("info", "cli.plan.list", `${entries.length} item(s) need attention.`, { entries });
        return 0;
      }

      case "plan:export": {
        const out = getFlagValue(args, "--out");
        if (!out) throw new UsageError("--out is required");
        const outPath = resolve(out);
        const exported = await exportRecoveryPlan(options.dataDir, outPath, planQuery(args));
        emit("info", "cli.plan.export", "Recovery plan exported.", { path: outPath, total: exported.total });
        return 0;
      }

      case "help":
      default:
        emit("info", "cli.help", "CLI usage output.", { usage: USAGE });
        return 0;
    }
  } catch (err) {
    emit("error", "cli.error", err instanceof Error ? err.message : String(err), { command });
    return 1;
  }
}
