import type { ServiceErrorHandler } from "./classifier.js";
import { AttemptTimeoutError, describeError, type ErrorDescription } from "./errors.js";
import { emitStructuredLog } from "./observability.js";
import type { ErrorContext, RetryReason } from "./types.js";

const NETWORK_KEYWORDS = [
  "timeout",
  "timed out",
  "connection",
  "network",
  "dns",
  "resolve",
  "unreachable",
  "refused",
  "reset",
  "broken pipe",
  "http error",
  "server error",
  "service unavailable",
];

const UNAVAILABLE_CONTENT_KEYWORDS = [
  "video unavailable",
  "private video",
  "is private",
  "deleted",
  "removed",
  "region",
  "age restricted",
  "copyright",
];

const DISK_FULL_CODES = new Set(["ENOSPC", "EDQUOT"]);
const PERMISSION_CODES = new Set(["EACCES", "EPERM", "EROFS"]);
const TRANSIENT_FS_CODES = new Set(["EBUSY", "EAGAIN", "EMFILE", "ENFILE"]);

function includesAny(text: string, keywords: readonly string[]): boolean {
  return keywords.some((keyword) => text.includes(keyword));
}

function isNetworkFailure(error: unknown, details: ErrorDescription, text: string): boolean {
  if (error instanceof AttemptTimeoutError) return true;
  if (details.status !== undefined && details.status >= 500) return true;
  return includesAny(text, NETWORK_KEYWORDS);
}

function isDiskFull(details: ErrorDescription, text: string): boolean {
  return (
    (details.code !== undefined && DISK_FULL_CODES.has(details.code)) ||
    details.status === 507 ||
    text.includes("no space") ||
    text.includes("disk full")
  );
}

/** Shared plumbing for the per-collaborator handlers. */
abstract class CollaboratorErrorHandler implements ServiceErrorHandler {
  abstract readonly serviceName: string;

  abstract classify(error: unknown): RetryReason;

  /** Whether the failure must escalate instead of being retried. */
  protected abstract escalates(details: ErrorDescription, text: string): boolean;

  protected abstract suggestionsFor(reason: RetryReason, text: string): string[];

  async handleError(error: unknown, context: ErrorContext): Promise<boolean> {
    const details = describeError(error);
    const handled = this.escalates(details, details.message.toLowerCase());
    if (handled) {
      emitStructuredLog(this.serviceName, "warn", "escalating failure without retry", {
        operation: context.operationName,
        resource: context.resourceId,
        error: details.message,
        code: details.code,
      });
    }
    return handled;
  }

  getRecoverySuggestions(context: ErrorContext): string[] {
    const last = context.attempts[context.attempts.length - 1];
    if (!last) return ["Check logs for more details", "Retry the operation"];
    return this.suggestionsFor(last.reason, last.errorMessage.toLowerCase());
  }
}

export class MetadataErrorHandler extends CollaboratorErrorHandler {
  readonly serviceName = "metadata";

  classify(error: unknown): RetryReason {
    const details = describeError(error);
    const text = details.message.toLowerCase();

    if (this.isCredentialFailure(details, text)) return "validation";
    if (text.includes("quota") || text.includes("dailylimitexceeded")) return "quota_exceeded";
    if (details.status === 429 || text.includes("ratelimitexceeded") || text.includes("rate limit")) return "rate_limit";
    if (details.status === 404 || text.includes("not found") || includesAny(text, UNAVAILABLE_CONTENT_KEYWORDS)) {
      return "resource_unavailable";
    }
    if (details.status === 400 || text.includes("invalid")) return "validation";
    if (isNetworkFailure(error, details, text)) return "network";
    return "unknown";
  }

  protected escalates(details: ErrorDescription, text: string): boolean {
    return this.isCredentialFailure(details, text);
  }

  protected suggestionsFor(reason: RetryReason, text: string): string[] {
    if (text.includes("api key") || text.includes("keyinvalid")) {
      return ["Verify the YouTube API key in the environment", "Check that the key has not been revoked"];
    }
    switch (reason) {
      case "quota_exceeded":
        return ["Wait for the daily API quota to reset", "Reduce batch size for metadata requests"];
      case "rate_limit":
        return ["Lower the job's max_concurrent option", "Try again in a few minutes"];
      case "resource_unavailable":
        return ["Verify the video or playlist ID is correct", "Check whether the content was made private or removed"];
      case "network":
        return ["Check internet connectivity", "Verify the metadata service is running"];
      default:
        return ["Check metadata service logs for details", "Retry the operation"];
    }
  }

  private isCredentialFailure(details: ErrorDescription, text: string): boolean {
    return details.status === 401 || text.includes("api key") || text.includes("keyinvalid") || text.includes("keyrevoked");
  }
}

export class DownloadErrorHandler extends CollaboratorErrorHandler {
  readonly serviceName = "download";

  classify(error: unknown): RetryReason {
    const details = describeError(error);
    const text = details.message.toLowerCase();

    if (includesAny(text, UNAVAILABLE_CONTENT_KEYWORDS)) return "resource_unavailable";
    if (details.status === 429 || text.includes("rate limit") || text.includes("too many requests")) return "rate_limit";
    if (
      (details.code !== undefined && PERMISSION_CODES.has(details.code)) ||
      text.includes("permission denied") ||
      text.includes("read-only")
    ) {
      return "validation";
    }
    if (isNetworkFailure(error, details, text)) return "network";
    return "unknown";
  }

  protected escalates(details: ErrorDescription, text: string): boolean {
    return isDiskFull(details, text);
  }

  protected suggestionsFor(reason: RetryReason, text: string): string[] {
    if (text.includes("no space") || text.includes("disk full") || text.includes("enospc")) {
      return [
        "Check available disk space in output directory",
        "Consider cleaning up old downloads",
        "Move downloads to a different location with more space",
      ];
    }
    switch (reason) {
      case "network":
        return [
          "Check internet connectivity",
          "Try a different network connection",
          "Verify YouTube is accessible from your location",
        ];
      case "resource_unavailable":
        return [
          "Verify the video URL is correct and accessible",
          "Check if the video is available in your region",
          "Try accessing the video in a web browser",
        ];
      case "rate_limit":
        return ["Lower the job's max_concurrent option", "Try again later"];
      case "validation":
        return ["Check permissions of the output directory", "Verify the output path is writable"];
      default:
        return ["Update the downloader to the latest version", "Try a different video quality"];
    }
  }
}

export class StorageErrorHandler extends CollaboratorErrorHandler {
  readonly serviceName = "storage";

  classify(error: unknown): RetryReason {
    const details = describeError(error);
    const text = details.message.toLowerCase();

    if (
      (details.code !== undefined && PERMISSION_CODES.has(details.code)) ||
      details.code === "ENOENT" ||
      text.includes("permission denied") ||
      text.includes("read-only")
    ) {
      return "validation";
    }
    if (details.code !== undefined && TRANSIENT_FS_CODES.has(details.code)) return "network";
    if (isNetworkFailure(error, details, text)) return "network";
    return "unknown";
  }

  protected escalates(details: ErrorDescription, text: string): boolean {
    return isDiskFull(details, text);
  }

  protected suggestionsFor(reason: RetryReason, text: string): string[] {
    if (text.includes("no space") || text.includes("disk full") || text.includes("enospc")) {
      return ["Free disk space on the archive volume", "Point YTARCHIVE_DATA_DIR at a larger volume"];
    }
    if (reason === "validation") {
      return ["Check permissions of the archive directory", "Verify the archive directory exists"];
    }
    return ["Verify the storage service is running", "Retry the operation"];
  }
}
