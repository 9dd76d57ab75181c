import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { loadConfig } from "./config.js";

describe("loadConfig", () => {
  it("returns development defaults when no overrides given", () => {
    const cfg = loadConfig({}, {});
    assert.equal(cfg.env, "development");
    assert.equal(cfg.port, 8000);
    assert.equal(cfg.logLevel, "debug");
    assert.equal(cfg.metadataServiceUrl, "http://localhost:8001");
    assert.equal(cfg.retryMaxAttempts, 3);
    assert.equal(cfg.jobRetentionDays, 30);
  });

  it("applies overrides", () => {
    const cfg = loadConfig({ port: 9999, logLevel: "error" }, {});
    assert.equal(cfg.port, 9999);
    assert.equal(cfg.logLevel, "error");
  });

  it("selects staging defaults when env is staging", () => {
    const cfg = loadConfig({ env: "staging" }, {});
    assert.equal(cfg.env, "staging");
    assert.equal(cfg.logLevel, "info");
    assert.equal(cfg.jobRetentionDays, 7);
  });

  it("selects production defaults from NODE_ENV", () => {
    const cfg = loadConfig({}, { NODE_ENV: "production" });
    assert.equal(cfg.env, "production");
    assert.equal(cfg.logLevel, "warn");
    assert.equal(cfg.retryMaxAttempts, 5);
  });

  it("falls back to development for unknown env", () => {
    const cfg = loadConfig({}, { NODE_ENV: "qa" });
    assert.equal(cfg.env, "development");
  });

  it("reads service and retry settings from the environment", () => {
    const cfg = loadConfig(
      {},
      {
        PORT: "9100",
        LOG_LEVEL: "warn",
        YTARCHIVE_DATA_DIR: "/data/archive",
        DOWNLOAD_SERVICE_URL: "http://downloads.internal:9002",
        RETRY_MAX_ATTEMPTS: "4",
        RETRY_BASE_DELAY_MS: "250",
        JOB_RETENTION_DAYS: "3",
      },
    );
    assert.equal(cfg.port, 9100);
    assert.equal(cfg.logLevel, "warn");
    assert.equal(cfg.dataDir, "/data/archive");
    assert.equal(cfg.downloadServiceUrl, "http://downloads.internal:9002");
    assert.equal(cfg.storageServiceUrl, "http://localhost:8003");
    assert.equal(cfg.retryMaxAttempts, 4);
    assert.equal(cfg.retryBaseDelayMs, 250);
    assert.equal(cfg.jobRetentionDays, 3);
  });

  it("ignores malformed numbers and unknown log levels", () => {
    const cfg = loadConfig({}, { PORT: "eighty", RETRY_MAX_ATTEMPTS: "-2", LOG_LEVEL: "verbose" });
    assert.equal(cfg.port, 8000);
    assert.equal(cfg.retryMaxAttempts, 3);
    assert.equal(cfg.logLevel, "debug");
  });
});
