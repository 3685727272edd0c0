/**
 * Errors raised by workspace operations on a single named file.
 * Corpus scans never raise these; they skip the offending file.
 */

export type WorkspaceErrorCode =
  | "ACCESS_DENIED"
  | "NOT_FOUND"
  | "READ_ERROR"
  | "PARSE_ERROR";

export class WorkspaceError extends Error {
  readonly code: WorkspaceErrorCode;
  /** Path as the caller supplied it */
  readonly path: string;

  constructor(code: WorkspaceErrorCode, path: string, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "WorkspaceError";
    this.code = code;
    this.path = path;
  }
}

export class AccessDeniedError extends WorkspaceError {
  constructor(path: string) {
    super("ACCESS_DENIED", path, `Access outside data dir is not allowed: ${path}`);
    this.name = "AccessDeniedError";
  }
}

export class NotFoundError extends WorkspaceError {
  constructor(path: string) {
    super("NOT_FOUND", path, `File not found: ${path}`);
    this.name = "NotFoundError";
  }
}

export class ReadError extends WorkspaceError {
  constructor(path: string, cause: unknown) {
    super("READ_ERROR", path, `Failed to read ${path}: ${describeCause(cause)}`, { cause });
    this.name = "ReadError";
  }
}

export class ParseError extends WorkspaceError {
  constructor(path: string, cause: unknown) {
    super("PARSE_ERROR", path, `Failed to parse ${path}: ${describeCause(cause)}`, { cause });
    this.name = "ParseError";
  }
}

export function isWorkspaceError(err: unknown): err is WorkspaceError {
  return err instanceof WorkspaceError;
}

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
