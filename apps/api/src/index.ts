import { join } from "node:path";
import { loadConfig } from "@ytarchive/config";
import {
  FileJobStore,
  HttpDownloadClient,
  HttpMetadataClient,
  HttpStorageClient,
  JobOrchestrator,
  JsonlRecoveryPlanStore,
} from "@ytarchive/jobs";
import {
  ErrorRecoveryManager,
  ErrorReporter,
  JsonlReportSink,
  errorMessage,
  initOpenTelemetry,
  setLogLevel,
  shutdownOpenTelemetry,
} from "@ytarchive/recovery";
import { logApi } from "./observability.js";
import { createApp, defaultRoutes } from "./server.js";

const config = loadConfig();
setLogLevel(config.logLevel);

await initOpenTelemetry("ytarchive-jobs");

const reporter = new ErrorReporter(new JsonlReportSink(join(config.dataDir, "error_reports")));
const orchestrator = new JobOrchestrator({
  metadata: new HttpMetadataClient(config.metadataServiceUrl),
  download: new HttpDownloadClient(config.downloadServiceUrl),
  storage: new HttpStorageClient(config.storageServiceUrl),
  store: new FileJobStore(join(config.dataDir, "jobs")),
  planStore: new JsonlRecoveryPlanStore(join(config.dataDir, "recovery_plan.jsonl")),
  recovery: new ErrorRecoveryManager({ reporter }),
  retry: { maxAttempts: config.retryMaxAttempts, baseDelayMs: config.retryBaseDelayMs },
  retentionMs: config.jobRetentionDays * 24 * 60 * 60 * 1_000,
});
await orchestrator.initialize();

const routes = defaultRoutes({ orchestrator, reporter });
const server = createApp(routes);

server.listen(config.port, () => {
  logApi("info", "job API is listening", {
    port: config.port,
    env: config.env,
    dataDir: config.dataDir,
    routes: routes.map((route) => ({ method: route.method, path: route.path })),
  });
});

for (const signal of ["SIGINT", "SIGTERM"]) {
  process.on(signal, () => {
    server.close(() => {
      void shutdownOpenTelemetry()
        .catch((err: unknown) => logApi("error", "telemetry shutdown failed", { error: errorMessage(err) }))
        .finally(() => process.exit(0));
    });
  });
}
