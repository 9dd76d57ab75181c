import { mkdir, readdir, readFile, rm, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { Job, JobStatus } from "./types.js";

/** Persistence sink for job state. */
export interface JobStore {
  save(job: Job): Promise<void>;
  load(id: string): Promise<Job | undefined>;
  list(status?: JobStatus): Promise<Job[]>;
  delete(id: string): Promise<void>;
}

function byCreatedAt(a: Job, b: Job): number {
  return a.createdAt.localeCompare(b.createdAt);
}

export class MemoryJobStore implements JobStore {
  private readonly jobs = new Map<string, Job>();

  async save(job: Job): Promise<void> {
    this.jobs.set(job.id, structuredClone(job));
  }

  async load(id: string): Promise<Job | undefined> {
    const job = this.jobs.get(id);
    return job ? structuredClone(job) : undefined;
  }

  async list(status?: JobStatus): Promise<Job[]> {
    return Array.from(this.jobs.values())
      .filter((job) => !status || job.status === status)
      .map((job) => structuredClone(job))
      .sort(byCreatedAt);
  }

  async delete(id: string): Promise<void> {
    this.jobs.delete(id);
  }
}

/** One pretty-printed JSON file per job under `dir`. */
export class FileJobStore implements JobStore {
  constructor(private readonly dir: string) {}

  async save(job: Job): Promise<void> {
    await mkdir(this.dir, { recursive: true });
    await writeFile(this.pathFor(job.id), JSON.stringify(job, null, 2), "utf8");
  }

  async load(id: string): Promise<Job | undefined> {
    try {
      const raw = await readFile(this.pathFor(id), "utf8");
      return JSON.parse(raw) as Job;
    } catch {
      return undefined;
    }
  }

  async list(status?: JobStatus): Promise<Job[]> {
    let names: string[];
    try {
      names = await readdir(this.dir);
    } catch {
      return [];
    }
    const jobs: Job[] = [];
    for (const name of names.filter((entry) => entry.endsWith(".json"))) {
      const job = await this.load(name.slice(0, -".json".length));
      if (job && (!status || job.status === status)) jobs.push(job);
    }
    return jobs.sort(byCreatedAt);
  }

  async delete(id: string): Promise<void> {
    await rm(this.pathFor(id), { force: true });
  }

  private pathFor(id: string): string {
    if (!/^[\w-]+$/.test(id)) {
      throw new Error(`Invalid job id: ${id}`);
    }
    return join(this.dir, `${id}.json`);
  }
}
