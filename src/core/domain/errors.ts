/**
 * Error taxonomy shared by extraction, retry and merge code.
 */

export type FailureClass = "transient" | "permanent" | "timeout";

export class PipelineError extends Error {
  readonly code: string;

  constructor(code: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PipelineError";
    this.code = code;
  }
}

/** Malformed numeric or code text. The field is left blank, the row kept. */
export class NormalizationError extends PipelineError {
  constructor(
    message: string,
    readonly input: string,
  ) {
    super("NORMALIZATION", message);
    this.name = "NormalizationError";
  }
}

/** A strategy yielded nothing for a page; triggers the next strategy. */
export class ExtractionEmptyError extends PipelineError {
  constructor(message: string) {
    super("EXTRACTION_EMPTY", message);
    this.name = "ExtractionEmptyError";
  }
}

export class RemoteCallError extends PipelineError {
  readonly classification: FailureClass;
  readonly statusCode?: number;

  constructor(
    classification: FailureClass,
    message: string,
    options?: { cause?: unknown; statusCode?: number },
  ) {
    super(`REMOTE_${classification.toUpperCase()}`, message, options);
    this.name = "RemoteCallError";
    this.classification = classification;
    this.statusCode = options?.statusCode;
  }
}

/** Rate limit, 502-504, connection reset or request timeout. */
export class RemoteTransientError extends RemoteCallError {
  constructor(message: string, options?: { cause?: unknown; statusCode?: number }) {
    super("transient", message, options);
    this.name = "RemoteTransientError";
  }
}

/** Auth or malformed request. Aborts the current document. */
export class RemotePermanentError extends RemoteCallError {
  constructor(message: string, options?: { cause?: unknown; statusCode?: number }) {
    super("permanent", message, options);
    this.name = "RemotePermanentError";
  }
}

/** The caller's deadline elapsed; remaining retries were abandoned. */
export class RemoteTimeoutError extends RemoteCallError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("timeout", message, options);
    this.name = "RemoteTimeoutError";
  }
}

/**
 * Two writers reached the same (brand, year, month) triple. The per-triple
 * lock makes this unreachable; seeing it means the lock was bypassed.
 */
export class MergeConflictError extends PipelineError {
  constructor(readonly tripleKeys: string[]) {
    super("MERGE_CONFLICT", `Concurrent merge on ${tripleKeys.join(", ")}`);
    this.name = "MergeConflictError";
  }
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
