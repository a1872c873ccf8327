import { createWriteStream } from "fs";
import { mkdir, stat } from "fs/promises";
import { dirname } from "path";
import { pipeline } from "stream/promises";
import type { HttpClient, StreamedResponse } from "./ports/http.js";
import { createNoopLogger, type Logger } from "./logger.js";
import { mapToLocalPath as mapUri, ReplacementSchema } from "./path-mapper.js";
import { CHUNK_SIZE_BYTES } from "./adapters/node-fetch-http.js";
import {
  filesystemError,
  fromHttpStatus,
  invalidOption,
  transferFailed,
} from "./errors/catalog.js";
import { errorMessage } from "./errors/types.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/**
 * What `download` did for a URI.
 * - `skipped`: already downloaded to the same path in this session
 * - `verified-complete`: file on disk matched the remote Content-Length
 * - `refetched`: body was downloaded and written
 */
export type DownloadOutcome = "skipped" | "verified-complete" | "refetched";

/** Why a URI was (re)fetched */
export type RefetchReason = "missing" | "size-mismatch" | "metadata-unavailable";

export interface DownloadResult {
  uri: string;
  path: string;
  outcome: DownloadOutcome;
  reason?: RefetchReason;
  bytesWritten?: number;
}

export interface DownloadCoordinatorOptions {
  /** Root of the local tree; fixed for the coordinator's lifetime */
  downloadDir: string;
  httpClient: HttpClient;
  /** Advisory concurrency for embedders; not used internally */
  workers?: number;
  /** Replacement character for unsafe file name characters */
  replacement?: string;
  logger?: Logger;
}

export interface DownloadCoordinator {
  readonly downloadDir: string;
  readonly workers: number;
  /** Decide and perform the download of one URI */
  download(uri: string): Promise<DownloadResult>;
  /** Same as `download`, resolving to the local path only */
  downloadOne(uri: string): Promise<string>;
  mapToLocalPath(uri: string): string;
  /** Copy of the URI to path record, in insertion order */
  downloadedRecord(): Map<string, string>;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Create a download coordinator.
 *
 * Intended for sequential use. It holds no locks: embedders that call it
 * from several workers must keep two calls from targeting the same path
 * at once.
 */
export function createDownloadCoordinator(
  options: DownloadCoordinatorOptions
): DownloadCoordinator {
  const { downloadDir, httpClient, workers = 1, replacement } = options;
  const log = (options.logger ?? createNoopLogger()).child({
    component: "coordinator",
  });

  if (!Number.isInteger(workers) || workers < 1) {
    throw invalidOption("workers", `expected a positive integer, got ${workers}`);
  }

  if (replacement !== undefined) {
    const checked = ReplacementSchema.safeParse(replacement);
    if (!checked.success) {
      throw invalidOption("replacement", checked.error.issues[0].message);
    }
  }

  const record = new Map<string, string>();

  function mapToLocalPath(uri: string): string {
    return mapUri(downloadDir, uri, { replacement });
  }

  /** Size of the regular file at `path`, or undefined when there is none. */
  async function localFileSize(path: string): Promise<number | undefined> {
    try {
      const stats = await stat(path);
      return stats.isFile() ? stats.size : undefined;
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === "ENOENT") {
        return undefined;
      }
      throw filesystemError(path, error);
    }
  }

  /**
   * Compare an existing file against the server's Content-Length.
   * Returns undefined when the file is complete.
   */
  async function checkExisting(
    uri: string,
    path: string,
    localSize: number
  ): Promise<RefetchReason | undefined> {
    let remoteSize: number | undefined;
    try {
      const metadata = await httpClient.head(uri);
      remoteSize = metadata.ok ? metadata.contentLength : undefined;
    } catch (error) {
      log.error("Metadata request failed", { uri, error: errorMessage(error) });
      throw transferFailed(uri, error);
    }

    if (remoteSize === undefined) {
      log.warn("No Content-Length for resource, re-fetching", { uri, path });
      return "metadata-unavailable";
    }

    if (remoteSize - localSize === 0) {
      return undefined;
    }

    log.warn("Local file and remote size mismatch, re-fetching", {
      uri,
      path,
      localSize,
      remoteSize,
    });
    return "size-mismatch";
  }

  async function ensureParentDir(path: string): Promise<void> {
    const dir = dirname(path);
    try {
      await mkdir(dir, { recursive: true });
    } catch (error) {
      throw filesystemError(dir, error);
    }
  }

  /**
   * Stream the body of `uri` into `path`, truncating it.
   * Resolves to the number of bytes written.
   */
  async function fetchToFile(uri: string, path: string): Promise<number> {
    log.info("Downloading", { uri, path });
    const startedAt = Date.now();

    let response: StreamedResponse;
    try {
      response = await httpClient.get(uri);
    } catch (error) {
      log.error("Request failed", { uri, error: errorMessage(error) });
      throw transferFailed(uri, error);
    }

    if (!response.ok) {
      log.error("Request failed", { uri, statusCode: response.status });
      throw fromHttpStatus(uri, response.status, response.statusText);
    }

    let bytesWritten = 0;
    const readState: { failed: boolean; error?: unknown } = { failed: false };

    async function* countedBody(body: AsyncIterable<Uint8Array>) {
      try {
        for await (const chunk of body) {
          bytesWritten += chunk.byteLength;
          yield chunk;
        }
      } catch (error) {
        readState.failed = true;
        readState.error = error;
        throw error;
      }
    }

    try {
      await pipeline(
        countedBody(response.body),
        createWriteStream(path, { highWaterMark: CHUNK_SIZE_BYTES })
      );
    } catch (error) {
      if (readState.failed) {
        log.error("Transfer interrupted, partial file left on disk", {
          uri,
          path,
          bytesWritten,
          error: errorMessage(error),
        });
        throw transferFailed(uri, readState.error);
      }
      throw filesystemError(path, error);
    }

    log.debug("Transfer finished", {
      uri,
      bytes: bytesWritten,
      durationMs: Date.now() - startedAt,
    });
    return bytesWritten;
  }

  async function download(uri: string): Promise<DownloadResult> {
    const path = mapToLocalPath(uri);

    // Several references (e.g. byte ranges) can resolve to the same file
    if (record.get(uri) === path) {
      log.debug("Already downloaded in this session", { uri, path });
      return { uri, path, outcome: "skipped" };
    }

    const localSize = await localFileSize(path);
    let reason: RefetchReason | undefined = "missing";
    if (localSize !== undefined) {
      reason = await checkExisting(uri, path, localSize);
    }

    if (reason === undefined) {
      record.set(uri, path);
      log.info("File already complete", { uri, path });
      return { uri, path, outcome: "verified-complete" };
    }

    await ensureParentDir(path);
    const bytesWritten = await fetchToFile(uri, path);

    record.set(uri, path);
    log.info("Downloaded", { uri, path, reason });
    return { uri, path, outcome: "refetched", reason, bytesWritten };
  }

  return {
    downloadDir,
    workers,
    download,
    downloadOne: async (uri) => (await download(uri)).path,
    mapToLocalPath,
    downloadedRecord: () => new Map(record),
  };
}
