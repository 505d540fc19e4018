// ============================================================
// Error taxonomy
// ============================================================

export type TailerErrorCode = "INVALID_OPTIONS" | "NOT_A_DIRECTORY" | "CLOSED";

/** Base class for errors raised by the tailer itself (not by the filesystem). */
export class TailerError extends Error {
  readonly code: TailerErrorCode;

  constructor(code: TailerErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TailerError";
    this.code = code;
  }
}

/** Bad construction options. Fatal, raised before any file is opened. */
export class ConfigurationError extends TailerError {
  constructor(
    code: "INVALID_OPTIONS" | "NOT_A_DIRECTORY",
    message: string,
    options?: { cause?: unknown },
  ) {
    super(code, message, options);
    this.name = "ConfigurationError";
  }
}

export class NotADirectoryError extends ConfigurationError {
  /** The path as given by the caller. */
  readonly path: string;

  constructor(path: string, options?: { cause?: unknown }) {
    super("NOT_A_DIRECTORY", `Not a directory: ${path}`, options);
    this.name = "NotADirectoryError";
    this.path = path;
  }
}

/** Raised when polling an engine after close(). */
export class ClosedError extends TailerError {
  constructor() {
    super("CLOSED", "Tail engine is closed");
    this.name = "ClosedError";
  }
}

// ============================================================
// errno helpers
// ============================================================

/** The errno code ("ENOENT", "EACCES", ...) of a Node filesystem error, if any. */
export function errnoCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

/**
 * True when the error means "the file no longer exists". This is the only
 * I/O condition the tailer absorbs; everything else propagates.
 */
export function isNotFound(err: unknown): boolean {
  return errnoCode(err) === "ENOENT";
}
