/**
 * Error codes for all fetchtree error types.
 * Each code maps to a specific error scenario with predefined messaging.
 */
export type ErrorCode =
  // Input file errors
  | "FILE_NOT_FOUND"
  | "FILE_NOT_READABLE"
  // Validation errors
  | "VALIDATION_MISSING_ARG"
  | "VALIDATION_INVALID_OPTION"
  | "VALIDATION_INVALID_URI"
  | "VALIDATION_CONFIG_INVALID"
  // Download errors
  | "TRANSFER_FAILED"
  | "FILESYSTEM_ERROR"
  // Network errors
  | "NETWORK_OFFLINE"
  | "NETWORK_TIMEOUT"
  // Generic
  | "UNKNOWN_ERROR";

export interface CLIErrorOptions {
  suggestion?: string;
  example?: string;
  details?: string;
  cause?: unknown;
}

/**
 * Extended Error class for CLI-specific errors with helpful context.
 */
export class CLIError extends Error {
  readonly code: ErrorCode;
  readonly suggestion?: string;
  readonly example?: string;
  readonly details?: string;

  constructor(code: ErrorCode, message: string, options: CLIErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = "CLIError";
    this.code = code;
    this.suggestion = options.suggestion;
    this.example = options.example;
    this.details = options.details;
  }
}

/**
 * Raised when the bytes of a resource could not be fetched or fully written.
 * The HTTP layer has already spent its retry budget by the time this is thrown.
 */
export class TransferError extends CLIError {
  readonly uri: string;

  constructor(uri: string, message: string, options: CLIErrorOptions = {}) {
    super("TRANSFER_FAILED", message, options);
    this.name = "TransferError";
    this.uri = uri;
  }
}

/** Directory creation or file write failed. */
export class FilesystemError extends CLIError {
  readonly path: string;

  constructor(path: string, message: string, options: CLIErrorOptions = {}) {
    super("FILESYSTEM_ERROR", message, options);
    this.name = "FilesystemError";
    this.path = path;
  }
}

/**
 * Type guard to check if an error is a CLIError.
 */
export function isCLIError(error: unknown): error is CLIError {
  return error instanceof CLIError;
}

/** Message of any thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
