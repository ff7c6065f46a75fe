export type ErrorCode =
  | "input-missing"
  | "corrupt-media"
  | "document-malformed"
  | "document-write"
  | "analysis-unavailable"
  | "corrupt-track"
  | "operation-in-progress";

export class LibraryError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class InputMissingError extends LibraryError {
  constructor(readonly path: string, what = "File") {
    super("input-missing", `${what} does not exist: ${path}`);
  }
}

/** Container could not be parsed. Never escapes the metadata resolver. */
export class CorruptMediaError extends LibraryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("corrupt-media", message, options);
  }
}

export class DocumentError extends LibraryError {
  constructor(readonly path: string, reason: string, options?: { cause?: unknown }) {
    super("document-malformed", `Cannot read ${path}: ${reason}`, options);
  }
}

export class DocumentWriteError extends LibraryError {
  constructor(readonly path: string, reason: string, options?: { cause?: unknown }) {
    super("document-write", `Cannot write ${path}: ${reason}`, options);
  }
}

export class AnalysisError extends LibraryError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("analysis-unavailable", message, options);
  }
}

export class CorruptTrackError extends LibraryError {
  constructor(readonly filePath: string, reason: string) {
    super("corrupt-track", `Track is corrupt and cannot be played: ${filePath} (${reason})`);
  }
}

export class OperationInProgressError extends LibraryError {
  constructor(running: string) {
    super("operation-in-progress", `Another operation is still running: ${running}`);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
