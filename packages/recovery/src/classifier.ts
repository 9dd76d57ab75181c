import { AttemptTimeoutError, describeError } from "./errors.js";
import type { ErrorContext, RetryConfig, RetryReason } from "./types.js";

/**
 * Capability implemented once per downstream collaborator.
 *
 * `handleError` returning `true` means the service has taken ownership of the
 * failure and the generic retry loop must stop. `false` falls through to
 * classification and the retry strategy.
 */
export interface ServiceErrorHandler {
  readonly serviceName: string;
  classify(error: unknown): RetryReason;
  handleError(error: unknown, context: ErrorContext): Promise<boolean>;
  getRecoverySuggestions(context: ErrorContext): string[];
}

const NETWORK_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
  "EPIPE",
  "ENOTFOUND",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "ENETUNREACH",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
]);

const NETWORK_KEYWORDS = ["timeout", "timed out", "connection", "network", "socket hang up", "unreachable", "reset"];

/** Default mapping used when no service handler is supplied. */
export function classifyError(error: unknown, config?: Pick<RetryConfig, "retryableStatuses">): RetryReason {
  if (error instanceof AttemptTimeoutError) return "network";

  const { message, code, status } = describeError(error);
  const text = message.toLowerCase();

  if (status === 429 || text.includes("rate limit") || text.includes("too many requests")) return "rate_limit";
  if (text.includes("quota")) return "quota_exceeded";
  if (status === 404 || status === 410 || (text.includes("unavailable") && text.includes("video"))) {
    return "resource_unavailable";
  }
  if (status === 400 || status === 422 || text.includes("invalid")) return "validation";
  if (code && NETWORK_CODES.has(code)) return "network";
  if (status !== undefined && (config?.retryableStatuses ?? []).includes(status)) return "network";
  if (status !== undefined && status >= 500) return "network";
  if (NETWORK_KEYWORDS.some((keyword) => text.includes(keyword))) return "network";
  return "unknown";
}

/**
 * Whether a classified failure may be attempted again.
 *
 * A quota error is only retryable when the error says when the quota resets
 * and that wait fits inside `maxDelayMs`.
 */
export function isRetryableReason(reason: RetryReason, error: unknown, config: Pick<RetryConfig, "maxDelayMs">): boolean {
  switch (reason) {
    case "resource_unavailable":
    case "validation":
      return false;
    case "quota_exceeded": {
      const { retryAfterMs } = describeError(error);
      return retryAfterMs !== undefined && retryAfterMs <= config.maxDelayMs;
    }
    default:
      return true;
  }
}
