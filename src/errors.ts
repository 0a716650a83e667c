/**
 * Error taxonomy for the retrieval core.
 *
 * Storage, embedding and index failures are separate classes because the HTTP
 * boundary and the prompt client report them with different messages.
 */

export enum ErrorCode {
  STORAGE_INIT = "STORAGE_INIT",
  STORAGE = "STORAGE",
  EMBEDDING = "EMBEDDING",
  INDEX_WRITE = "INDEX_WRITE",
  INDEX_QUERY = "INDEX_QUERY",
  INVALID_ARGUMENT = "INVALID_ARGUMENT",
  DUPLICATE_ID = "DUPLICATE_ID",
  LLM = "LLM",
}

export class RetrievalError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    cause?: unknown
  ) {
    super(message);
    this.name = "RetrievalError";
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/** The storage location could not be opened or created. */
export class StorageInitError extends RetrievalError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.STORAGE_INIT, message, cause);
    this.name = "StorageInitError";
  }
}

export class StorageError extends RetrievalError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.STORAGE, message, cause);
    this.name = "StorageError";
  }
}

/** The embedding provider was unreachable or returned something unusable. */
export class EmbeddingError extends RetrievalError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.EMBEDDING, message, cause);
    this.name = "EmbeddingError";
  }
}

export abstract class IndexError extends RetrievalError {}

export class IndexWriteError extends IndexError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.INDEX_WRITE, message, cause);
    this.name = "IndexWriteError";
  }
}

export class IndexQueryError extends IndexError {
  constructor(message: string, cause?: unknown) {
    super(ErrorCode.INDEX_QUERY, message, cause);
    this.name = "IndexQueryError";
  }
}

export class InvalidArgumentError extends RetrievalError {
  constructor(message: string, code: ErrorCode = ErrorCode.INVALID_ARGUMENT) {
    super(code, message);
    this.name = "InvalidArgumentError";
  }
}

export class DuplicateIdError extends InvalidArgumentError {
  constructor(public readonly ids: string[]) {
    super(`Document ids already exist: ${ids.join(", ")}`, ErrorCode.DUPLICATE_ID);
    this.name = "DuplicateIdError";
  }
}

export class LlmError extends RetrievalError {
  constructor(
    message: string,
    public readonly unreachable: boolean,
    cause?: unknown
  ) {
    super(ErrorCode.LLM, message, cause);
    this.name = "LlmError";
  }
}

export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "object" && error !== null && "message" in error && typeof error.message === "string") {
    return error.message;
  }
  return String(error);
}
