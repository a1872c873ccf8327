/**
 * JSON output utilities for machine-readable CLI output.
 * Provides consistent schemas and output helpers.
 */

import { isJsonMode } from "./cli-context.js";
import type { DownloadOutcome, RefetchReason } from "./download-coordinator.js";
import type { ErrorCode } from "./errors/types.js";

// ============================================================================
// Base Types
// ============================================================================

export interface JsonSuccess<T> {
  success: true;
  data: T;
  meta?: {
    duration?: number;
    version?: string;
  };
}

// ============================================================================
// Command-Specific Schemas
// ============================================================================

export interface DownloadResultJson {
  files: Array<{
    uri: string;
    path: string;
    outcome: DownloadOutcome;
    reason?: RefetchReason;
    bytesWritten?: number;
  }>;
  failures: Array<{
    uri: string;
    path?: string;
    code: ErrorCode;
    message: string;
    details?: string;
  }>;
  summary: {
    total: number;
    skipped: number;
    verified: number;
    refetched: number;
    failed: number;
  };
}

export interface MapResultJson {
  downloadDir: string;
  mappings: Array<{
    uri: string;
    path: string;
  }>;
}

// ============================================================================
// Output Functions
// ============================================================================

/**
 * Output a successful JSON result to stdout.
 */
export function outputSuccess<T>(data: T, meta?: JsonSuccess<T>["meta"]): void {
  const result: JsonSuccess<T> = {
    success: true,
    data,
    ...(meta && { meta }),
  };
  console.log(JSON.stringify(result, null, 2));
}

/**
 * Conditionally output JSON or return false for human output.
 */
export function maybeOutputJson<T>(data: T, meta?: JsonSuccess<T>["meta"]): boolean {
  if (isJsonMode()) {
    outputSuccess(data, meta);
    return true;
  }
  return false;
}
