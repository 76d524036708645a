/**
 * Error taxonomy for ingestion and moderation.
 *
 * Pipeline errors never leave the pipeline: their messages become the
 * record's `processing_error`. Admin-facing errors are thrown to the caller.
 */

/** Extension outside the allow-list. Not retryable without a new upload. */
export class UnsupportedTypeError extends Error {
  constructor(public readonly extension: string) {
    super(
      extension
        ? `Unsupported file type: .${extension}`
        : "Unsupported file type: no extension"
    );
    this.name = "UnsupportedTypeError";
  }
}

/** Media could not be read by the transform. */
export class DecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DecodeError";
  }
}

/** A video frame could not be produced at the requested offset. */
export class SeekError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SeekError";
  }
}

export class TranscodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "TranscodeError";
  }
}

/** Duration probing failed. Logged only; the pipeline carries on. */
export class ProbeFailure extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ProbeFailure";
  }
}

/** Move, put, fetch or delete against disk or the object store failed. */
export class StorageError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "StorageError";
  }
}

export class TransformTimeoutError extends Error {
  constructor(label: string, public readonly timeoutMs: number) {
    super(
      `${label} timed out after ${
        timeoutMs >= 1000 ? `${Math.round(timeoutMs / 1000)}s` : `${timeoutMs}ms`
      }`
    );
    this.name = "TransformTimeoutError";
  }
}

export class NotFoundError extends Error {
  constructor(public readonly recordId: string) {
    super(`Example not found: ${recordId}`);
    this.name = "NotFoundError";
  }
}

export class NoRecoverableSourceError extends Error {
  constructor(public readonly recordId: string) {
    super(`No recoverable source file for example ${recordId}; cannot retry.`);
    this.name = "NoRecoverableSourceError";
  }
}

/** Retry asked for while a run for the record is still in progress. */
export class AlreadyProcessingError extends Error {
  constructor(public readonly recordId: string) {
    super(`Example ${recordId} is still processing.`);
    this.name = "AlreadyProcessingError";
  }
}

export class NotApprovableError extends Error {
  constructor(public readonly recordId: string, reason: string) {
    super(`Example ${recordId} cannot be approved: ${reason}`);
    this.name = "NotApprovableError";
  }
}

/** Upload refused before any file or record was written. */
export class UploadRejectedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UploadRejectedError";
  }
}

/** Message text for anything caught at a boundary. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}
