import { appendFile, mkdir, readFile } from "node:fs/promises";
import { dirname } from "node:path";
import type { RecoveryPlanEntry, RecoveryPlanKind } from "./types.js";

export interface RecoveryPlanQuery {
  jobId?: string;
  kind?: RecoveryPlanKind;
}

/** Append-only record of items that need attention. */
export interface RecoveryPlanStore {
  append(entry: RecoveryPlanEntry): Promise<void>;
  /** One entry per item: the earliest detection, the latest attempt and every error seen. */
  list(query?: RecoveryPlanQuery): Promise<RecoveryPlanEntry[]>;
}

export function collapsePlanEntries(entries: readonly RecoveryPlanEntry[]): RecoveryPlanEntry[] {
  const byItem = new Map<string, RecoveryPlanEntry>();
  for (const entry of entries) {
    const existing = byItem.get(entry.itemId);
    if (!existing) {
      byItem.set(entry.itemId, { ...entry, errors: [...entry.errors] });
      continue;
    }
    const latest = entry.lastAttemptAt >= existing.lastAttemptAt ? entry : existing;
    byItem.set(entry.itemId, {
      ...latest,
      firstDetectedAt: existing.firstDetectedAt <= entry.firstDetectedAt ? existing.firstDetectedAt : entry.firstDetectedAt,
      errors: [...existing.errors, ...entry.errors],
    });
  }
  return Array.from(byItem.values());
}

function matches(entry: RecoveryPlanEntry, query: RecoveryPlanQuery): boolean {
  if (query.jobId && entry.jobId !== query.jobId) return false;
  if (query.kind && entry.kind !== query.kind) return false;
  return true;
}

export class MemoryRecoveryPlanStore implements RecoveryPlanStore {
  private readonly entries: RecoveryPlanEntry[] = [];

  async append(entry: RecoveryPlanEntry): Promise<void> {
    this.entries.push({ ...entry, errors: [...entry.errors] });
  }

  async list(query: RecoveryPlanQuery = {}): Promise<RecoveryPlanEntry[]> {
    return collapsePlanEntries(this.entries).filter((entry) => matches(entry, query));
  }
}

export class JsonlRecoveryPlanStore implements RecoveryPlanStore {
  constructor(private readonly filePath: string) {}

  async append(entry: RecoveryPlanEntry): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await appendFile(this.filePath, `${JSON.stringify(entry)}\n`, "utf8");
  }

  async list(query: RecoveryPlanQuery = {}): Promise<RecoveryPlanEntry[]> {
    return collapsePlanEntries(await this.readAll()).filter((entry) => matches(entry, query));
  }

  private async readAll(): Promise<RecoveryPlanEntry[]> {
    let data: string;
    try {
      data = await readFile(this.filePath, "utf8");
    } catch {
      return [];
    }
    return data
      .split("\n")
      .map((line) => line.trim())
      .filter(Boolean)
      .map((line) => JSON.parse(line) as RecoveryPlanEntry);
  }
}
