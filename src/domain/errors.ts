export type ErrorCode =
  | "UNSUPPORTED_FORMAT"
  | "CORRUPT_DOCUMENT"
  | "NOT_FOUND"
  | "INVALID_FILENAME"
  | "INVALID_QUERY"
  | "DOCUMENT_LIMIT"
  | "INVALID_REQUEST"
  | "EMBEDDING_SERVICE"
  | "VECTOR_STORE"
  | "GENERATION_SERVICE";

/**
 * Base class for every error the service raises on purpose. `code` is stable
 * and safe to expose; `message` is written for the client when
 * `clientFacing` is true and for operators otherwise.
 */
export abstract class AppError extends Error {
  abstract readonly code: ErrorCode;

  abstract readonly clientFacing: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnsupportedFormatError extends AppError {
  readonly code = "UNSUPPORTED_FORMAT";

  readonly clientFacing = true;

  constructor(
    readonly extension: string,
    readonly allowed: readonly string[],
  ) {
    super(
      `Unsupported file type: ${extension || "(none)"}. Allowed: ${allowed.join(", ")}`,
    );
  }
}

export class CorruptDocumentError extends AppError {
  readonly code = "CORRUPT_DOCUMENT";

  readonly clientFacing = true;

  constructor(
    readonly filename: string,
    reason: string,
    options?: { cause?: unknown },
  ) {
    super(`Could not read ${filename}: ${reason}`, options);
  }
}

export class NotFoundError extends AppError {
  readonly code = "NOT_FOUND";

  readonly clientFacing = true;

  constructor(readonly filename: string) {
    super(`Document not found: ${filename}`);
  }
}

export class InvalidFilenameError extends AppError {
  readonly code = "INVALID_FILENAME";

  readonly clientFacing = true;

  constructor(
    readonly filename: string,
    reason: string,
  ) {
    super(`Invalid filename "${filename}": ${reason}`);
  }
}

export class InvalidQueryError extends AppError {
  readonly code = "INVALID_QUERY";

  readonly clientFacing = true;
}

export class DocumentLimitError extends AppError {
  readonly code = "DOCUMENT_LIMIT";

  readonly clientFacing = true;

  constructor(readonly limit: number) {
    super(`Upload limit reached. Maximum ${limit} documents allowed.`);
  }
}

/** Malformed request body or path, as opposed to a bad document or query. */
export class InvalidRequestError extends AppError {
  readonly code = "INVALID_REQUEST";

  readonly clientFacing = true;
}

export class EmbeddingServiceError extends AppError {
  readonly code = "EMBEDDING_SERVICE";

  readonly clientFacing = false;

  constructor(
    message: string,
    readonly retryable: boolean,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export type VectorStoreErrorKind = "missing_collection" | "transient" | "fatal";

export class VectorStoreError extends AppError {
  readonly code = "VECTOR_STORE";

  readonly clientFacing = false;

  constructor(
    message: string,
    readonly kind: VectorStoreErrorKind,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }

  get retryable(): boolean {
    return this.kind === "transient";
  }
}

export class GenerationServiceError extends AppError {
  readonly code = "GENERATION_SERVICE";

  readonly clientFacing = false;

  constructor(
    message: string,
    readonly retryable: boolean,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export function isMissingCollection(error: unknown): error is VectorStoreError {
  return error instanceof VectorStoreError && error.kind === "missing_collection";
}

export function isRetryableError(error: unknown): boolean {
  if (
    error instanceof EmbeddingServiceError ||
    error instanceof GenerationServiceError ||
    error instanceof VectorStoreError
  ) {
    return error.retryable;
  }
  return false;
}

export function toHttpStatus(error: unknown): number {
  if (!(error instanceof AppError)) {
    return 500;
  }
  switch (error.code) {
    case "NOT_FOUND":
      return 404;
    case "UNSUPPORTED_FORMAT":
      return 415;
    case "CORRUPT_DOCUMENT":
      return 422;
    case "INVALID_FILENAME":
    case "INVALID_QUERY":
    case "DOCUMENT_LIMIT":
    case "INVALID_REQUEST":
      return 400;
    case "EMBEDDING_SERVICE":
    case "VECTOR_STORE":
    case "GENERATION_SERVICE":
      return 503;
  }
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : "unknown error";
}
