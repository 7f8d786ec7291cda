export type PatternErrorCode =
  | "PATH_TRAVERSAL"
  | "PARSE_ERROR"
  | "EMBEDDING_ERROR"
  | "STORE_UNAVAILABLE"
  | "INVALID_QUERY";

/** Base class for every failure the index surfaces by name. */
export class PatternIndexError extends Error {
  public readonly code: PatternErrorCode;

  public constructor(code: PatternErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PatternIndexError";
    this.code = code;
  }
}

/** A path resolved outside its root, or crossed a symlink while symlinks are disallowed. */
export class PathTraversalError extends PatternIndexError {
  public constructor(message: string) {
    super("PATH_TRAVERSAL", message);
    this.name = "PathTraversalError";
  }
}

/** A file could not be read as its content type's format at all. */
export class ParseError extends PatternIndexError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super("PARSE_ERROR", message, options);
    this.name = "ParseError";
  }
}

/** The embedding backend failed, timed out, or produced an unusable vector. */
export class EmbeddingError extends PatternIndexError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super("EMBEDDING_ERROR", message, options);
    this.name = "EmbeddingError";
  }
}

/** The index store cannot be opened, read or committed. Fatal to a build or query. */
export class StoreUnavailableError extends PatternIndexError {
  public constructor(message: string, options?: { cause?: unknown }) {
    super("STORE_UNAVAILABLE", message, options);
    this.name = "StoreUnavailableError";
  }
}

export class InvalidQueryError extends PatternIndexError {
  public constructor(message: string) {
    super("INVALID_QUERY", message);
    this.name = "InvalidQueryError";
  }
}

/** Human-readable one-liner for reports and logs. */
export function describeError(e: unknown): string {
  if (e instanceof Error) return e.message;
  return String(e);
}
