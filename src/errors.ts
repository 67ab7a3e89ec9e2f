/**
 * Error taxonomy shared by the index, retrieval and orchestration layers.
 * Every error carries a stable `code` so transports can map it without
 * `instanceof` chains.
 */
export type RagErrorCode =
  | "VALIDATION"
  | "EMPTY_CORPUS"
  | "INDEX_NOT_FOUND"
  | "INDEX_FORMAT"
  | "INDEX_NOT_LOADED"
  | "NOT_FITTED"
  | "REBUILD_IN_PROGRESS"
  | "OPERATION_FAILED";

export class RagError extends Error {
  public readonly code: RagErrorCode;

  public constructor(code: RagErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.code = code;
    this.name = "RagError";
  }
}

/** Malformed query request. Reported to the caller, never retried. */
export class ValidationError extends RagError {
  public readonly issues: string[];

  public constructor(issues: string[]) {
    super("VALIDATION", `Invalid request: ${issues.join("; ")}`);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

/** No indexable content. Build aborts and the previous index is untouched. */
export class EmptyCorpusError extends RagError {
  public constructor(detail = "No indexable documents found") {
    super("EMPTY_CORPUS", detail);
    this.name = "EmptyCorpusError";
  }
}

export class IndexNotFoundError extends RagError {
  public readonly indexPath: string;

  public constructor(indexPath: string) {
    super("INDEX_NOT_FOUND", `Index file not found: ${indexPath}`);
    this.name = "IndexNotFoundError";
    this.indexPath = indexPath;
  }
}

export class IndexFormatError extends RagError {
  public constructor(indexPath: string, detail: string) {
    super("INDEX_FORMAT", `Index file ${indexPath} is not a valid index: ${detail}`);
    this.name = "IndexFormatError";
  }
}

/** Query issued while the service has no live index. */
export class IndexNotLoadedError extends RagError {
  public constructor() {
    super("INDEX_NOT_LOADED", "Index not loaded on server; rebuild the index first");
    this.name = "IndexNotLoadedError";
  }
}

/** Thrown when attempting to embed before fit(). */
export class NotFittedError extends RagError {
  public constructor() {
    super("NOT_FITTED", "Vectorizer not fitted. Call fit() first.");
    this.name = "NotFittedError";
  }
}

export class RebuildInProgressError extends RagError {
  public constructor() {
    super("REBUILD_IN_PROGRESS", "Index rebuild already in progress");
    this.name = "RebuildInProgressError";
  }
}

/** Unexpected failure inside an orchestrator operation; the original error is kept as `cause`. */
export class OperationFailedError extends RagError {
  public readonly operation: string;

  public constructor(operation: string, cause: unknown) {
    super("OPERATION_FAILED", `Failed to ${operation}: ${describeError(cause)}`, { cause });
    this.name = "OperationFailedError";
    this.operation = operation;
  }
}

/** Best-effort human readable message for an unknown thrown value. */
export function describeError(e: unknown): string {
  if (e instanceof Error) return e.message;
  if (typeof e === "string") return e;
  try {
    return JSON.stringify(e) ?? String(e);
  } catch {
    // Circular or BigInt-bearing values.
    return String(e);
  }
}
