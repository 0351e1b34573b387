/**
 * Standard error classes for EduHub
 */

export enum ErrorCode {
  GENERAL_ERROR = "GENERAL_ERROR",
  MONGO_CONNECTION_ERROR = "MONGO_CONNECTION_ERROR",
  FILE_IO_ERROR = "FILE_IO_ERROR",
  CONFIG_ERROR = "CONFIG_ERROR",
  VALIDATION_ERROR = "VALIDATION_ERROR",
  SETUP_ERROR = "SETUP_ERROR",
  QUERY_ERROR = "QUERY_ERROR",
}

export interface ErrorResponse {
  status: "error";
  phase: string;
  error: {
    code: ErrorCode;
    message: string;
    details?: unknown;
    cause?: string;
  };
}

export class EduHubError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: unknown,
    options?: ErrorOptions,
  ) {
    super(message, options);
    this.name = "EduHubError";
  }

  /**
   * Convert error to a format suitable for CLI output
   */
  toResponse(phase: string): ErrorResponse {
    return {
      status: "error",
      phase,
      error: {
        code: this.code,
        message: this.message,
        ...(this.details ? { details: this.details } : {}),
        ...(this.cause ? { cause: String(this.cause) } : {}),
      },
    };
  }
}

export class MongoConnectionError extends EduHubError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.MONGO_CONNECTION_ERROR, message, details, options);
    this.name = "MongoConnectionError";
  }
}

export class ConfigError extends EduHubError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.CONFIG_ERROR, message, details, options);
    this.name = "ConfigError";
  }
}

export class FileIOError extends EduHubError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.FILE_IO_ERROR, message, details, options);
    this.name = "FileIOError";
  }
}

export class ValidationError extends EduHubError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.VALIDATION_ERROR, message, details, options);
    this.name = "ValidationError";
  }
}

export class SetupError extends EduHubError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.SETUP_ERROR, message, details, options);
    this.name = "SetupError";
  }
}

export class QueryError extends EduHubError {
  constructor(message: string, details?: unknown, options?: ErrorOptions) {
    super(ErrorCode.QUERY_ERROR, message, details, options);
    this.name = "QueryError";
  }
}

/**
 * Wrap an unknown thrown value so callers always deal with EduHubError
 */
export function toEduHubError(error: unknown): EduHubError {
  if (error instanceof EduHubError) {
    return error;
  }
  return new EduHubError(
    ErrorCode.GENERAL_ERROR,
    error instanceof Error ? error.message : String(error),
    undefined,
    { cause: error },
  );
}

/**
 * Node's ENOENT check for fs errors
 */
export function isFileNotFound(error: unknown): boolean {
  return (
    error instanceof Error && "code" in error && error.code === "ENOENT"
  );
}
