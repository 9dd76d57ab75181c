import { randomUUID } from "node:crypto";
import { appendFile, mkdir, readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { describeError } from "./errors.js";
import { emitStructuredLog } from "./observability.js";
import type { AttemptRecord, ErrorContext, ErrorSeverity, RecoveryFailureKind, RetryReason } from "./types.js";

export interface ErrorReport {
  id: string;
  timestamp: string;
  severity: ErrorSeverity;
  title: string;
  message: string;
  errorName: string;
  operationName: string;
  resourceId: string;
  traceId: string;
  serviceName?: string;
  jobId?: string;
  reason?: RetryReason;
  kind?: RecoveryFailureKind;
  attempts: AttemptRecord[];
  suggestedActions: string[];
  recoveryPossible: boolean;
  retryRecommended: boolean;
}

export interface ReportSink {
  append(report: ErrorReport): Promise<void>;
}

export class MemoryReportSink implements ReportSink {
  readonly reports: ErrorReport[] = [];

  async append(report: ErrorReport): Promise<void> {
    this.reports.push(report);
  }
}

/** Appends reports as JSON lines, one file per UTC day. */
export class JsonlReportSink implements ReportSink {
  constructor(private readonly reportsDir: string) {}

  async append(report: ErrorReport): Promise<void> {
    await mkdir(this.reportsDir, { recursive: true });
    const file = join(this.reportsDir, `${report.timestamp.slice(0, 10)}.jsonl`);
    await appendFile(file, `${JSON.stringify(report)}\n`, "utf8");
  }

  async readAll(): Promise<ErrorReport[]> {
    let files: string[];
    try {
      files = (await readdir(this.reportsDir)).filter((name) => name.endsWith(".jsonl")).sort();
    } catch {
      return [];
    }
    const reports: ErrorReport[] = [];
    for (const name of files) {
      const data = await readFile(join(this.reportsDir, name), "utf8");
      for (const line of data.split("\n")) {
        const trimmed = line.trim();
        if (trimmed) reports.push(JSON.parse(trimmed) as ErrorReport);
      }
    }
    return reports;
  }
}

export interface ReportDetails {
  severity?: ErrorSeverity;
  reason?: RetryReason;
  kind?: RecoveryFailureKind;
  /** Service-specific suggestions; generic ones are derived from the message otherwise. */
  suggestions?: string[];
}

export interface ErrorSummary {
  timeRangeHours: number;
  totalErrors: number;
  severityBreakdown: Record<ErrorSeverity, number>;
  recentErrors: { id: string; severity: ErrorSeverity; title: string; timestamp: string }[];
}

export interface ErrorReporterOptions {
  historySize?: number;
  now?: () => Date;
}

const NON_RECOVERABLE_PATTERNS = ["video unavailable", "private video", "deleted", "copyright", "authentication failed"];
const RETRY_PATTERNS = ["timeout", "temporary", "rate limit", "connection", "server error"];

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

function reportId(at: Date): string {
  const date = `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}`;
  const time = `${pad(at.getUTCHours())}${pad(at.getUTCMinutes())}${pad(at.getUTCSeconds())}`;
  return `ERR_${date}_${time}_${randomUUID().slice(0, 8)}`;
}

export function genericSuggestions(errorName: string, message: string): string[] {
  const text = message.toLowerCase();
  const suggestions: string[] = [];

  if (text.includes("network") || text.includes("connection")) {
    suggestions.push("Check internet connection", "Verify proxy settings if using a proxy", "Try again in a few minutes");
  }
  if (text.includes("timeout")) {
    suggestions.push("Increase timeout settings", "Check network stability");
  }
  if (text.includes("permission") || text.includes("access")) {
    suggestions.push("Check file/directory permissions", "Verify path exists and is accessible");
  }

  if (suggestions.length === 0) {
    if (errorName === "TypeError" || errorName === "RangeError") {
      suggestions.push("Check input parameters and data format", "Verify configuration settings");
    } else {
      suggestions.push("Review error details and logs", "Try the operation again", "Check system resources and configuration");
    }
  }
  return suggestions.slice(0, 5);
}

function defaultSeverity(kind: RecoveryFailureKind | undefined): ErrorSeverity {
  if (kind === "handled") return "critical";
  if (kind === "exhausted" || kind === "non_retryable") return "high";
  return "medium";
}

/**
 * Durable record of terminal failures. `report` never rejects: the caller is
 * already on a failure path, so sink errors are logged and dropped.
 */
export class ErrorReporter {
  private readonly history: ErrorReport[] = [];
  private readonly historySize: number;
  private readonly now: () => Date;

  constructor(
    private readonly sink: ReportSink = new MemoryReportSink(),
    options: ErrorReporterOptions = {},
  ) {
    this.historySize = options.historySize ?? 100;
    this.now = options.now ?? (() => new Date());
  }

  async report(context: ErrorContext, error: unknown, details: ReportDetails = {}): Promise<string> {
    const at = this.now();
    const id = reportId(at);

    try {
      const report = this.buildReport(id, at, context, error, details);
      this.history.push(report);
      if (this.history.length > this.historySize) this.history.shift();

      emitStructuredLog("recovery", report.severity === "critical" ? "error" : "warn", report.title, {
        reportId: id,
        operation: report.operationName,
        resource: report.resourceId,
        reason: report.reason,
        attempts: report.attempts.length,
      });

      await this.sink.append(report);
    } catch (err) {
      emitStructuredLog("recovery", "error", "failed to save error report", {
        reportId: id,
        error: err instanceof Error ? err.message : String(err),
      });
    }
    return id;
  }

  getSummary(hours = 24): ErrorSummary {
    const cutoff = this.now().getTime() - hours * 3_600_000;
    const recent = this.history.filter((report) => Date.parse(report.timestamp) > cutoff);

    const severityBreakdown: Record<ErrorSeverity, number> = { critical: 0, high: 0, medium: 0, low: 0, info: 0 };
    for (const report of recent) severityBreakdown[report.severity] += 1;

    return {
      timeRangeHours: hours,
      totalErrors: recent.length,
      severityBreakdown,
      recentErrors: recent.slice(-10).map((report) => ({
        id: report.id,
        severity: report.severity,
        title: report.title,
        timestamp: report.timestamp,
      })),
    };
  }

  recentReports(): ErrorReport[] {
    return [...this.history];
  }

  private buildReport(id: string, at: Date, context: ErrorContext, error: unknown, details: ReportDetails): ErrorReport {
    const { name, message } = describeError(error);
    const text = message.toLowerCase();
    const recoveryPossible =
      details.reason !== "resource_unavailable" && !NON_RECOVERABLE_PATTERNS.some((pattern) => text.includes(pattern));
    const retryRecommended =
      recoveryPossible &&
      (details.reason === "network" ||
        details.reason === "rate_limit" ||
        RETRY_PATTERNS.some((pattern) => text.includes(pattern)));

    return {
      id,
      timestamp: at.toISOString(),
      severity: details.severity ?? defaultSeverity(details.kind),
      title: `${name}: ${message.slice(0, 100)}`,
      message,
      errorName: name,
      operationName: context.operationName,
      resourceId: context.resourceId,
      traceId: context.traceId,
      serviceName: context.serviceName,
      jobId: context.jobId,
      reason: details.reason,
      kind: details.kind,
      attempts: context.attempts.map((attempt) => ({ ...attempt })),
      suggestedActions: (details.suggestions?.length ? details.suggestions : genericSuggestions(name, message)).slice(0, 5),
      recoveryPossible,
      retryRecommended,
    };
  }
}
