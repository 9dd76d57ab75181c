import { createServer, IncomingMessage, Server, ServerResponse } from "node:http";
import { SpanStatusCode } from "@opentelemetry/api";
import {
  InvalidJobTransitionError,
  JobNotFoundError,
  JobValidationError,
  isJobStatus,
  isJobType,
  type CompletionPolicy,
  type JobOptions,
  type JobOrchestrator,
  type RecoveryPlanKind,
} from "@ytarchive/jobs";
import { errorMessage, isStrategyName, type ErrorReporter } from "@ytarchive/recovery";
import { apiTelemetry, logApi } from "./observability.js";

export type RouteParams = Record<string, string>;

export interface Route {
  method: string;
  /** Literal segments and `:name` placeholders, e.g. `/api/v1/jobs/:id`. */
  path: string;
  handler: (req: IncomingMessage, res: ServerResponse, params: RouteParams, url: URL) => void | Promise<void>;
}

/** Raised by handlers for malformed requests; answered with 400. */
export class BadRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BadRequestError";
  }
}

/** Send a JSON response. */
export function json(res: ServerResponse, status: number, body: unknown): void {
  const payload = JSON.stringify(body);
  res.writeHead(status, {
    "Content-Type": "application/json",
    "Content-Length": Buffer.byteLength(payload),
  });
  res.end(payload);
}

/** Read the request body as parsed JSON. */
export function readBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    req.on("data", (chunk: Buffer) => chunks.push(chunk));
    req.on("end", () => {
      try {
        const text = Buffer.concat(chunks).toString();
        resolve(text.length > 0 ? JSON.parse(text) : undefined);
      } catch {
        reject(new BadRequestError("Request body is not valid JSON"));
      }
    });
    req.on("error", reject);
  });
}

function decodeSegment(value: string, pathname: string): string {
  try {
    return decodeURIComponent(value);
  } catch (err) {
    if (err instanceof URIError) throw new BadRequestError(`Malformed URL path: ${pathname}`);
    throw err;
  }
}

function findRoute(routes: Route[], method: string, pathname: string): { route: Route; params: RouteParams } | undefined {
  for (const route of routes) {
    const params = route.method === method ? matchPath(route.path, pathname) : undefined;
    if (params) return { route, params };
  }
  return undefined;
}

/**
 * Match `pathname` against a route pattern, returning the captured params.
 * Throws {@link BadRequestError} when a captured segment is not valid percent-encoding.
 */
export function matchPath(pattern: string, pathname: string): RouteParams | undefined {
  const expected = pattern.split("/");
  const actual = pathname.split("/");
  if (expected.length !== actual.length) return undefined;

  const params: RouteParams = {};
  for (const [index, segment] of expected.entries()) {
    const value = actual[index];
    if (segment.startsWith(":")) {
      if (value.length === 0) return undefined;
      params[segment.slice(1)] = decodeSegment(value, pathname);
    } else if (segment !== value) {
      return undefined;
    }
  }
  return params;
}

function statusFor(err: unknown): number {
  if (err instanceof BadRequestError || err instanceof JobValidationError) return 400;
  if (err instanceof JobNotFoundError) return 404;
  if (err instanceof InvalidJobTransitionError) return 409;
  return 500;
}

/** Health status response. */
export function healthHandler(_req: IncomingMessage, res: ServerResponse): void {
  json(res, 200, { status: "ok", timestamp: new Date().toISOString() });
}

/** List available API routes. */
export function routesHandler(routes: Route[]) {
  return (_req: IncomingMessage, res: ServerResponse): void => {
    const list = routes.map((r) => ({ method: r.method, path: r.path }));
    json(res, 200, { routes: list });
  };
}

/** Create the HTTP server with the given routes. */
export function createApp(routes: Route[]): Server {
  const server = createServer(async (req, res) => {
    const start = process.hrtime.bigint();
    const url = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
    const method = req.method ?? "GET";

    let matched: { route: Route; params: RouteParams } | undefined;
    let lookupError: unknown;
    try {
      matched = findRoute(routes, method, url.pathname);
    } catch (err) {
      // answered inside the span below
      lookupError = err;
    }
    const routePath = matched?.route.path ?? url.pathname;

    await apiTelemetry.tracer.startActiveSpan(
      "http.request",
      {
        attributes: {
          "http.method": method,
          "http.route": routePath,
        },
      },
      async (span) => {
        try {
          apiTelemetry.requestCount.add(1, { method, path: routePath });
          if (lookupError !== undefined) throw lookupError;
          if (matched) {
            await matched.route.handler(req, res, matched.params, url);
            span.setStatus({ code: SpanStatusCode.OK });
          } else {
            json(res, 404, { error: "Not Found" });
            apiTelemetry.requestErrors.add(1, { method, path: routePath, status: "404" });
            span.setStatus({ code: SpanStatusCode.ERROR, message: "route_not_found" });
          }
        } catch (err) {
          const status = statusFor(err);
          span.recordException(err instanceof Error ? err : new Error(String(err)));
          span.setStatus({ code: SpanStatusCode.ERROR, message: status === 500 ? "handler_error" : "request_rejected" });
          apiTelemetry.requestErrors.add(1, { method, path: routePath, status: String(status) });
          logApi(status === 500 ? "error" : "warn", "request handler failure", {
            method,
            path: url.pathname,
            status,
            error: errorMessage(err),
          });
          json(res, status, { error: status === 500 ? "Internal Server Error" : errorMessage(err) });
        } finally {
          const statusCode = String(res.statusCode || 0);
          const durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;
          apiTelemetry.requestLatencyMs.record(durationMs, { method, path: routePath, status: statusCode });
          logApi("info", "request completed", {
            method,
            path: url.pathname,
            statusCode: res.statusCode,
            durationMs,
          });
          span.setAttribute("http.status_code", res.statusCode || 0);
          span.end();
        }
      },
    );
  });

  return server;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalNumber(raw: Record<string, unknown>, key: string): number | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number" || !Number.isFinite(value)) {
    throw new BadRequestError(`options.${key} must be a number`);
  }
  return value;
}

function optionalString(raw: Record<string, unknown>, key: string): string | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (typeof value !== "string") throw new BadRequestError(`options.${key} must be a string`);
  return value;
}

function optionalStringList(raw: Record<string, unknown>, key: string): string[] | undefined {
  const value = raw[key];
  if (value === undefined) return undefined;
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === "string")) {
    throw new BadRequestError(`options.${key} must be a list of strings`);
  }
  return value;
}

function completionPolicy(value: string | undefined): CompletionPolicy | undefined {
  if (value === undefined || value === "best_effort" || value === "fail_on_any") return value;
  throw new BadRequestError(`Unknown completion policy: ${value}`);
}

/** Pick the known job options out of a request body. */
export function parseJobOptions(raw: unknown): JobOptions {
  if (raw === undefined) return {};
  if (!isRecord(raw)) throw new BadRequestError("options must be an object");

  const retryStrategy = optionalString(raw, "retryStrategy");
  if (retryStrategy !== undefined && !isStrategyName(retryStrategy)) {
    throw new BadRequestError(`Unknown retry strategy: ${retryStrategy}`);
  }
  const includeCaptions = raw.includeCaptions;
  if (includeCaptions !== undefined && typeof includeCaptions !== "boolean") {
    throw new BadRequestError("options.includeCaptions must be a boolean");
  }

  const options: JobOptions = {
    outputDir: optionalString(raw, "outputDir"),
    quality: optionalString(raw, "quality"),
    includeCaptions,
    captionLanguages: optionalStringList(raw, "captionLanguages"),
    maxConcurrent: optionalNumber(raw, "maxConcurrent"),
    chunkSize: optionalNumber(raw, "chunkSize"),
    retryStrategy,
    maxAttempts: optionalNumber(raw, "maxAttempts"),
    baseDelayMs: optionalNumber(raw, "baseDelayMs"),
    maxDelayMs: optionalNumber(raw, "maxDelayMs"),
    attemptTimeoutMs: optionalNumber(raw, "attemptTimeoutMs"),
    completionPolicy: completionPolicy(optionalString(raw, "completionPolicy")),
  };
  return options;
}

export interface JobRouteDeps {
  orchestrator: JobOrchestrator;
  reporter: ErrorReporter;
}

/** Job, recovery and error-report endpoints under `/api/v1`. */
export function jobRoutes({ orchestrator, reporter }: JobRouteDeps): Route[] {
  return [
    {
      method: "POST",
      path: "/api/v1/jobs",
      handler: async (req, res) => {
        const body = await readBody(req);
        if (!isRecord(body)) throw new BadRequestError("Request body must be a JSON object");
        const type = body.type;
        if (!isJobType(type)) throw new BadRequestError(`Unknown job type: ${String(type)}`);
        const urls = body.urls;
        if (!Array.isArray(urls) || !urls.every((url): url is string => typeof url === "string")) {
          throw new BadRequestError("urls must be a list of strings");
        }
        const job = await orchestrator.createJob({ type, urls, options: parseJobOptions(body.options) });
        json(res, 201, job);
      },
    },
    {
      method: "GET",
      path: "/api/v1/jobs",
      handler: (_req, res, _params, url) => {
        const status = url.searchParams.get("status") ?? undefined;
        if (status !== undefined && !isJobStatus(status)) {
          throw new BadRequestError(`Unknown job status: ${status}`);
        }
        json(res, 200, { jobs: orchestrator.listJobs(status) });
      },
    },
    {
      method: "GET",
      path: "/api/v1/jobs/:id",
      handler: (_req, res, params) => {
        const job = orchestrator.getJob(params.id);
        if (!job) throw new JobNotFoundError(params.id);
        json(res, 200, job);
      },
    },
    {
      method: "PUT",
      path: "/api/v1/jobs/:id/execute",
      handler: async (_req, res, params) => {
        json(res, 202, await orchestrator.startJob(params.id));
      },
    },
    {
      method: "POST",
      path: "/api/v1/jobs/:id/cancel",
      handler: async (_req, res, params) => {
        json(res, 200, await orchestrator.cancelJob(params.id));
      },
    },
    {
      method: "GET",
      path: "/api/v1/recoveries",
      handler: (_req, res) => {
        json(res, 200, { recoveries: orchestrator.getActiveRecoveries() });
      },
    },
    {
      method: "GET",
      path: "/api/v1/recovery-plan",
      handler: async (_req, res, _params, url) => {
        const kind = url.searchParams.get("kind") ?? undefined;
        if (kind !== undefined && kind !== "unavailable" && kind !== "failed") {
          throw new BadRequestError(`Unknown plan entry kind: ${kind}`);
        }
        const planKind: RecoveryPlanKind | undefined = kind;
        const entries = await orchestrator.getRecoveryPlan({
          jobId: url.searchParams.get("jobId") ?? undefined,
          kind: planKind,
        });
        json(res, 200, { entries });
      },
    },
    {
      method: "GET",
      path: "/api/v1/errors/summary",
      handler: (_req, res, _params, url) => {
        const raw = url.searchParams.get("hours");
        const hours = raw === null ? 24 : Number(raw);
        if (!Number.isFinite(hours) || hours <= 0) throw new BadRequestError("hours must be a positive number");
        json(res, 200, reporter.getSummary(hours));
      },
    },
  ];
}

/** Default routes for the API; job routes are added when their dependencies are given. */
export function defaultRoutes(deps?: JobRouteDeps): Route[] {
  const routes: Route[] = [{ method: "GET", path: "/health", handler: healthHandler }];
  if (deps) routes.push(...jobRoutes(deps));
  // Self-referential: list routes
  routes.push({ method: "GET", path: "/routes", handler: routesHandler(routes) });
  return routes;
}
