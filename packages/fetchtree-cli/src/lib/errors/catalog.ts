import {
  CLIError,
  FilesystemError,
  TransferError,
  errorMessage,
} from "./types.js";

/**
 * Error catalog - factory functions for creating CLIErrors with helpful context.
 */

// ============================================================================
// Input File Errors
// ============================================================================

export function fileNotFound(path: string): CLIError {
  return new CLIError("FILE_NOT_FOUND", `Can't find "${path}"`, {
    suggestion: "Check the file path exists and try again",
  });
}

export function fileNotReadable(path: string, reason?: string): CLIError {
  return new CLIError("FILE_NOT_READABLE", `Can't read "${path}"`, {
    suggestion: "Check file permissions",
    details: reason,
  });
}

// ============================================================================
// Validation Errors
// ============================================================================

export function missingArgument(argName: string, command: string): CLIError {
  return new CLIError("VALIDATION_MISSING_ARG", `Missing ${argName}`, {
    suggestion: `The "${command}" command requires ${argName}`,
    example: `fetchtree ${command} --help`,
  });
}

export function invalidOption(optionName: string, reason: string): CLIError {
  return new CLIError(
    "VALIDATION_INVALID_OPTION",
    `Invalid --${optionName}: ${reason}`
  );
}

export function invalidUri(uri: string, reason: string): CLIError {
  return new CLIError("VALIDATION_INVALID_URI", `Not an absolute http(s) URI: "${uri}"`, {
    suggestion: "Pass fully qualified URIs such as https://example.com/file.bin",
    details: reason,
  });
}

export function pathOutsideDownloadDir(uri: string, downloadDir: string): CLIError {
  return new CLIError("VALIDATION_INVALID_URI", `URI does not map inside ${downloadDir}: "${uri}"`, {
    details: "Its sanitized path would leave the download directory",
  });
}

export function invalidConfig(path: string, issues: string[]): CLIError {
  const details = issues.length > 1
    ? issues.map((i) => `• ${i}`).join("\n")
    : issues[0];
  return new CLIError("VALIDATION_CONFIG_INVALID", `Config file ${path} has errors`, {
    suggestion: "Fix the issues below and try again",
    details,
  });
}

// ============================================================================
// Download Errors
// ============================================================================

export function transferFailed(uri: string, cause: unknown): TransferError {
  return new TransferError(uri, `Download failed for ${uri}`, {
    suggestion: "The resource stayed unreachable after all retry attempts",
    details: errorMessage(cause),
    cause,
  });
}

/**
 * Convert a final non-2xx response into a TransferError.
 */
export function fromHttpStatus(
  uri: string,
  status: number,
  statusText: string
): TransferError {
  let suggestion: string;
  if (status === 404 || status === 410) {
    suggestion = "Check the URI is correct";
  } else if (status === 401 || status === 403) {
    suggestion = "The server refused access; it may require different headers";
  } else if (status >= 500) {
    suggestion = "The server kept failing; try again later or raise retry.maxAttempts";
  } else {
    suggestion = "Check the URI and try again";
  }
  return new TransferError(uri, `Download failed for ${uri} (${status} ${statusText})`, {
    suggestion,
  });
}

export function filesystemError(path: string, cause: unknown): FilesystemError {
  return new FilesystemError(path, `Can't write "${path}"`, {
    suggestion: "Check the download directory is writable and has free space",
    details: errorMessage(cause),
    cause,
  });
}

// ============================================================================
// Network Errors
// ============================================================================

export function networkOffline(host: string, cause?: unknown): CLIError {
  return new CLIError("NETWORK_OFFLINE", `Can't connect to ${host}`, {
    suggestion: "Check your internet connection and try again",
    details: cause === undefined ? undefined : errorMessage(cause),
    cause,
  });
}

export function networkTimeout(url: string, timeoutMs: number): CLIError {
  return new CLIError("NETWORK_TIMEOUT", `Request timed out after ${timeoutMs}ms`, {
    suggestion: "The server might be busy. Raise --timeout or try again",
    details: url,
  });
}

// ============================================================================
// Generic Error
// ============================================================================

export function unknownError(error: unknown): CLIError {
  return new CLIError("UNKNOWN_ERROR", errorMessage(error), {
    cause: error instanceof Error ? error : undefined,
  });
}
