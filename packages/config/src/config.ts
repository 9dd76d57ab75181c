/** Supported deployment environments. */
export type Environment = "development" | "staging" | "production";

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Shape of application configuration. */
export interface AppConfig {
  /** Current environment. */
  env: Environment;
  /** Port for the job API to listen on. */
  port: number;
  /** Application log level. */
  logLevel: LogLevel;
  /** Base URL of the job API, used by the CLI. */
  apiBaseUrl: string;
  /** Root for job files, error reports and the recovery plan. */
  dataDir: string;
  metadataServiceUrl: string;
  downloadServiceUrl: string;
  storageServiceUrl: string;
  /** Attempts per operation when a job does not set its own. */
  retryMaxAttempts: number;
  retryBaseDelayMs: number;
  /** Terminal jobs are removed after this many days. */
  jobRetentionDays: number;
}

const LOCAL_SERVICES = {
  metadataServiceUrl: "http://localhost:8001",
  downloadServiceUrl: "http://localhost:8002",
  storageServiceUrl: "http://localhost:8003",
};

const DEFAULTS: Record<Environment, AppConfig> = {
  development: {
    env: "development",
    port: 8000,
    logLevel: "debug",
    apiBaseUrl: "http://localhost:8000",
    dataDir: ".ytarchive",
    ...LOCAL_SERVICES,
    retryMaxAttempts: 3,
    retryBaseDelayMs: 1_000,
    jobRetentionDays: 30,
  },
  staging: {
    env: "staging",
    port: 8080,
    logLevel: "info",
    apiBaseUrl: "http://localhost:8080",
    dataDir: "/var/lib/ytarchive",
    ...LOCAL_SERVICES,
    retryMaxAttempts: 3,
    retryBaseDelayMs: 1_000,
    jobRetentionDays: 7,
  },
  production: {
    env: "production",
    port: 8080,
    logLevel: "warn",
    apiBaseUrl: "http://localhost:8080",
    dataDir: "/var/lib/ytarchive",
    ...LOCAL_SERVICES,
    retryMaxAttempts: 5,
    retryBaseDelayMs: 2_000,
    jobRetentionDays: 30,
  },
};

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

function isEnvironment(value: string): value is Environment {
  return value === "development" || value === "staging" || value === "production";
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/** Positive integer from the environment, or undefined when unset or malformed. */
function positiveInt(raw: string | undefined): number | undefined {
  if (!raw) return undefined;
  const parsed = Number(raw);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : undefined;
}

/**
 * Load configuration for the given (or detected) environment.
 *
 * Resolution order:
 *  1. Explicit `overrides` argument.
 *  2. Environment variables (`PORT`, `LOG_LEVEL`, `YTARCHIVE_DATA_DIR`, ...).
 *  3. Defaults for `NODE_ENV`, falling back to `"development"`.
 */
export function loadConfig(overrides: Partial<AppConfig> = {}, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const envRaw = overrides.env ?? env.NODE_ENV ?? "development";
  const environment: Environment = isEnvironment(envRaw) ? envRaw : "development";

  const base = { ...DEFAULTS[environment] };

  base.port = positiveInt(env.PORT) ?? base.port;
  if (env.LOG_LEVEL && isLogLevel(env.LOG_LEVEL)) {
    base.logLevel = env.LOG_LEVEL;
  }
  base.apiBaseUrl = env.API_BASE_URL || base.apiBaseUrl;
  base.dataDir = env.YTARCHIVE_DATA_DIR || base.dataDir;
  base.metadataServiceUrl = env.METADATA_SERVICE_URL || base.metadataServiceUrl;
  base.downloadServiceUrl = env.DOWNLOAD_SERVICE_URL || base.downloadServiceUrl;
  base.storageServiceUrl = env.STORAGE_SERVICE_URL || base.storageServiceUrl;
  base.retryMaxAttempts = positiveInt(env.RETRY_MAX_ATTEMPTS) ?? base.retryMaxAttempts;
  base.retryBaseDelayMs = positiveInt(env.RETRY_BASE_DELAY_MS) ?? base.retryBaseDelayMs;
  base.jobRetentionDays = positiveInt(env.JOB_RETENTION_DAYS) ?? base.jobRetentionDays;

  return { ...base, ...overrides, env: environment };
}
