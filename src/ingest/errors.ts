export type LogLoadErrorCode =
  | "LOG_NOT_FOUND"
  | "LOG_UNREADABLE"
  | "MALFORMED_RECORD";

export interface LogLoadErrorOptions {
  filepath?: string;
  lineNumber?: number;
  cause?: unknown;
}

export class LogLoadError extends Error {
  readonly code: LogLoadErrorCode;
  readonly filepath?: string;
  readonly lineNumber?: number;

  constructor(message: string, code: LogLoadErrorCode, options: LogLoadErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "LogLoadError";
    this.code = code;
    this.filepath = options.filepath;
    this.lineNumber = options.lineNumber;
  }
}

export class MalformedRecordError extends LogLoadError {
  constructor(message: string, options: LogLoadErrorOptions = {}) {
    super(message, "MALFORMED_RECORD", options);
    this.name = "MalformedRecordError";
  }
}

export function notFoundMessage(filepath?: string): string {
  return filepath ? `Log file ${filepath} not found` : "Log file not found";
}

export function isLogLoadError(error: unknown): error is LogLoadError {
  return error instanceof LogLoadError;
}

export function normalizeReadError(
  error: unknown,
  context: { filepath?: string } = {},
): LogLoadError {
  if (error instanceof LogLoadError) {
    return error;
  }

  if (error instanceof Error) {
    const code = "code" in error && typeof error.code === "string" ? error.code : undefined;
    if (code === "ENOENT") {
      return new LogLoadError(notFoundMessage(context.filepath), "LOG_NOT_FOUND", {
        filepath: context.filepath,
        cause: error,
      });
    }
    return new LogLoadError(error.message, "LOG_UNREADABLE", {
      filepath: context.filepath,
      cause: error,
    });
  }

  return new LogLoadError("Unknown error while reading log", "LOG_UNREADABLE", {
    filepath: context.filepath,
    cause: error,
  });
}
