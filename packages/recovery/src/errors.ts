export interface ServiceErrorOptions {
  service?: string;
  status?: number;
  code?: string;
  /** Server-provided hint (Retry-After, quota reset) in milliseconds. */
  retryAfterMs?: number;
  cause?: unknown;
}

/** Failure raised by a downstream collaborator (metadata, download, storage). */
export class ServiceError extends Error {
  readonly service?: string;
  readonly status?: number;
  readonly code?: string;
  readonly retryAfterMs?: number;

  constructor(message: string, options: ServiceErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ServiceError";
    this.service = options.service;
    this.status = options.status;
    this.code = options.code;
    this.retryAfterMs = options.retryAfterMs;
  }
}

/** A single attempt exceeded its time budget. Counts as one failed network attempt. */
export class AttemptTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Attempt timeout after ${timeoutMs}ms`);
    this.name = "AttemptTimeoutError";
  }
}

/** Raised in place of an invocation the resource's circuit refused. */
export class CircuitOpenError extends Error {
  constructor(readonly resourceKey: string) {
    super(`Circuit open for ${resourceKey}`);
    this.name = "CircuitOpenError";
  }
}

export interface ErrorDescription {
  name: string;
  message: string;
  code?: string;
  status?: number;
  retryAfterMs?: number;
}

function readField(error: object, key: string): unknown {
  return key in error ? Reflect.get(error, key) : undefined;
}

/** Flatten anything thrown into the fields classifiers and reports look at. */
export function describeError(error: unknown): ErrorDescription {
  if (error instanceof ServiceError) {
    return {
      name: error.name,
      message: error.message,
      code: error.code,
      status: error.status,
      retryAfterMs: error.retryAfterMs,
    };
  }
  if (error instanceof Error) {
    const code = readField(error, "code");
    const status = readField(error, "status");
    return {
      name: error.name,
      message: error.message,
      code: typeof code === "string" ? code : undefined,
      status: typeof status === "number" ? status : undefined,
    };
  }
  return { name: "NonError", message: String(error) };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
