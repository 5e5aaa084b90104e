/**
 * Error taxonomy for a pipeline run.
 *
 * Source- and item-level errors are recovered inside the run and counted in the
 * RunSummary. Store I/O errors abort the run.
 */

export class FetchError extends Error {
  public readonly sourceId: string;
  public readonly status?: number;

  constructor(sourceId: string, message: string, opts?: { status?: number; cause?: unknown }) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = "FetchError";
    this.sourceId = sourceId;
    this.status = opts?.status;
  }
}

export type PublishErrorKind = "rateLimited" | "authFailed" | "rejected" | "transient";

export class PublishError extends Error {
  public readonly kind: PublishErrorKind;
  public readonly retryAfterMs?: number;

  constructor(kind: PublishErrorKind, message: string, opts?: { retryAfterMs?: number; cause?: unknown }) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = "PublishError";
    this.kind = kind;
    this.retryAfterMs = opts?.retryAfterMs;
  }
}

export class StoreCorruptError extends Error {
  public readonly path: string;

  constructor(path: string, message: string) {
    super(message);
    this.name = "StoreCorruptError";
    this.path = path;
  }
}

export class StoreIOError extends Error {
  public readonly path: string;

  constructor(path: string, message: string, opts?: { cause?: unknown }) {
    super(message, opts?.cause !== undefined ? { cause: opts.cause } : undefined);
    this.name = "StoreIOError";
    this.path = path;
  }
}

export class TimeoutError extends Error {
  public readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}
