import { Command } from "commander";
import chalk from "chalk";
import { resolve } from "path";
import { loadConfig, toRetryPolicy } from "../lib/config.js";
import { getRetryCount, getTimeout } from "../lib/cli-context.js";
import { createLogger, type Logger } from "../lib/logger.js";
import { startProgress } from "../lib/spinner.js";
import { createQueue } from "../lib/queue.js";
import { maybeOutputJson, type DownloadResultJson } from "../lib/json-output.js";
import { partitionUris, readUriFile, type InvalidUri } from "../lib/uri-list.js";
import { createNodeFetchHttpClient } from "../lib/adapters/index.js";
import type { HttpClient } from "../lib/ports/index.js";
import {
  createDownloadCoordinator,
  type DownloadCoordinator,
  type DownloadResult,
} from "../lib/download-coordinator.js";
import { invalidOption, missingArgument, unknownError } from "../lib/errors/catalog.js";
import { FilesystemError, isCLIError, type CLIError } from "../lib/errors/types.js";
import { formatStaticError } from "../lib/errors/renderer.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DownloadOptions {
  dir?: string;
  workers?: string;
  input?: string;
  replacement?: string;
  config?: string;
}

export type UriOutcome =
  | { uri: string; ok: true; result: DownloadResult }
  | { uri: string; ok: false; error: CLIError };

export interface DownloadReport {
  /** One entry per input URI, in input order */
  outcomes: UriOutcome[];
}

export interface RunDownloadsOptions {
  logger: Logger;
  onProgress?: (done: number, total: number) => void;
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerDownloadCommands(program: Command): void {
  program
    .command("download")
    .description("Mirror remote resources into a local directory tree")
    .argument("[uris...]", "Absolute http(s) URIs to download")
    .option("-d, --dir <path>", "Download directory")
    .option("-w, --workers <n>", "Number of parallel downloads")
    .option("-i, --input <file>", "Read URIs from a file, one per line")
    .option("-r, --replacement <char>", "Replacement for unsafe file name characters")
    .option("-c, --config <path>", "Config file to use instead of the default locations")
    .action(async (uris: string[], options: DownloadOptions) => {
      await downloadCommand(uris, options);
    });
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

function parseWorkers(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value) || parseInt(value, 10) < 1) {
    throw invalidOption("workers", `expected a positive integer, got "${value}"`);
  }
  return parseInt(value, 10);
}

/**
 * Download every URI through a bounded queue. URIs that map to the same
 * local path share one task and run in order, so no two workers ever
 * write the same file.
 */
export async function runDownloads(
  uris: string[],
  coordinator: DownloadCoordinator,
  { logger, onProgress }: RunDownloadsOptions
): Promise<DownloadReport> {
  const groups = new Map<string, number[]>();
  uris.forEach((uri, index) => {
    const path = coordinator.mapToLocalPath(uri);
    const group = groups.get(path);
    if (group) {
      group.push(index);
    } else {
      groups.set(path, [index]);
    }
  });

  const outcomes = new Array<UriOutcome | undefined>(uris.length).fill(undefined);
  let done = 0;

  const queue = createQueue<void>({
    concurrency: coordinator.workers,
    logger,
    onSettled: (outcome) => {
      if (!outcome.ok) {
        logger.error("Download task crashed", { taskId: outcome.id });
      }
    },
  });

  for (const [path, indices] of groups) {
    queue.enqueue({
      id: path,
      execute: async () => {
        for (const index of indices) {
          const uri = uris[index];
          try {
            const result = await coordinator.download(uri);
            outcomes[index] = { uri, ok: true, result };
          } catch (error) {
            outcomes[index] = {
              uri,
              ok: false,
              error: isCLIError(error) ? error : unknownError(error),
            };
          }
          done++;
          onProgress?.(done, uris.length);
        }
      },
    });
  }

  await queue.drain();

  return {
    outcomes: outcomes.map(
      (outcome, index): UriOutcome =>
        outcome ?? {
          uri: uris[index],
          ok: false,
          error: unknownError(new Error("Download task did not run")),
        }
    ),
  };
}

export function toDownloadJson(
  report: DownloadReport,
  rejected: InvalidUri[] = []
): DownloadResultJson {
  const files: DownloadResultJson["files"] = [];
  const failures: DownloadResultJson["failures"] = rejected.map(({ uri, error }) => ({
    uri,
    code: error.code,
    message: error.message,
    details: error.details,
  }));

  for (const outcome of report.outcomes) {
    if (outcome.ok) {
      files.push(outcome.result);
    } else {
      const { error } = outcome;
      failures.push({
        uri: outcome.uri,
        path: error instanceof FilesystemError ? error.path : undefined,
        code: error.code,
        message: error.message,
        details: error.details,
      });
    }
  }

  const count = (outcome: DownloadResult["outcome"]) =>
    files.filter((f) => f.outcome === outcome).length;

  return {
    files,
    failures,
    summary: {
      total: files.length + failures.length,
      skipped: count("skipped"),
      verified: count("verified-complete"),
      refetched: count("refetched"),
      failed: failures.length,
    },
  };
}

function describeResult(result: DownloadResult): string {
  switch (result.outcome) {
    case "skipped":
      return chalk.gray(`= ${result.uri} (already downloaded)`);
    case "verified-complete":
      return `${chalk.cyan("✓")} ${result.uri} ${chalk.gray(`→ ${result.path} (complete)`)}`;
    case "refetched":
      return `${chalk.green("↓")} ${result.uri} ${chalk.gray(
        `→ ${result.path} (${result.reason ?? "missing"}, ${result.bytesWritten ?? 0} bytes)`
      )}`;
  }
}

/**
 * Entry point behind `fetchtree download`. The HTTP client can be injected
 * for tests; by default it is built from the resolved config.
 */
export async function downloadCommand(
  uris: string[],
  options: DownloadOptions,
  httpClient?: HttpClient
): Promise<void> {
  const fromFile = options.input ? await readUriFile(options.input) : [];
  const requested = [...uris, ...fromFile];
  if (requested.length === 0) {
    throw missingArgument("at least one URI", "download");
  }

  const { config } = loadConfig(options.config, {
    downloadDir: options.dir,
    workers: parseWorkers(options.workers),
    replacement: options.replacement,
    timeoutMs: getTimeout(),
    retryAttempts: getRetryCount(),
  });
  const logger = createLogger({ level: config.logLevel, json: config.logJson });

  const { valid, invalid } = partitionUris(requested);
  for (const { uri, error } of invalid) {
    logger.debug("Skipping invalid URI", { uri, details: error.details });
  }

  const client =
    httpClient ??
    createNodeFetchHttpClient({
      retry: toRetryPolicy(config),
      headers: { "User-Agent": config.userAgent, ...config.headers },
      getTimeoutMs: config.timeoutMs,
      headTimeoutMs: config.headTimeoutMs,
      logger,
    });

  const coordinator = createDownloadCoordinator({
    downloadDir: resolve(config.downloadDir),
    httpClient: client,
    workers: config.workers,
    replacement: config.replacement,
    logger,
  });

  const startedAt = Date.now();
  const progress = startProgress("Downloading", valid.length);
  const report = await runDownloads(valid, coordinator, {
    logger,
    onProgress: (done) => progress.update(done),
  });

  const json = toDownloadJson(report, invalid);
  if (json.summary.failed > 0) {
    progress.fail(`${json.summary.failed} of ${json.summary.total} downloads failed`);
    process.exitCode = 1;
  } else {
    progress.succeed(`Downloaded ${json.summary.total} resources`);
  }

  if (maybeOutputJson(json, { duration: Date.now() - startedAt })) {
    return;
  }

  for (const outcome of report.outcomes) {
    if (outcome.ok) {
      console.log(describeResult(outcome.result));
    } else {
      for (const line of formatStaticError(outcome.error)) {
        console.error(line);
      }
    }
  }
  for (const { error } of invalid) {
    for (const line of formatStaticError(error)) {
      console.error(line);
    }
  }
}
