import { z } from "zod";
import { readFileSync, existsSync } from "fs";
import { parse as parseYaml } from "yaml";
import { homedir } from "os";
import { join } from "path";
import { LOG_LEVEL_NAMES, type LogLevel } from "./logger.js";
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from "./retry-policy.js";
import { DEFAULT_REPLACEMENT, ReplacementSchema } from "./path-mapper.js";
import {
  DEFAULT_GET_TIMEOUT_MS,
  DEFAULT_HEAD_TIMEOUT_MS,
  DEFAULT_USER_AGENT,
} from "./adapters/node-fetch-http.js";
import { fileNotReadable, invalidConfig, invalidOption } from "./errors/catalog.js";
import { errorMessage } from "./errors/types.js";

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** System-wide configuration path */
export const SYSTEM_CONFIG_PATH = "/etc/fetchtree/config.yaml";

/** User-level configuration path (XDG Base Directory Specification) */
export const USER_CONFIG_PATH = join(
  homedir(),
  ".config",
  "fetchtree",
  "config.yaml"
);

/** Default values for all configuration options */
export const CONFIG_DEFAULTS = {
  downloadDir: "./downloads",
  workers: 4,
  replacement: DEFAULT_REPLACEMENT,
  timeoutMs: DEFAULT_GET_TIMEOUT_MS,
  headTimeoutMs: DEFAULT_HEAD_TIMEOUT_MS,
  userAgent: DEFAULT_USER_AGENT,
  retryAttempts: DEFAULT_RETRY_POLICY.maxAttempts,
  backoffFactor: DEFAULT_RETRY_POLICY.backoffFactor,
  maxBackoffMs: DEFAULT_RETRY_POLICY.maxBackoffMs,
  retryStatusCodes: DEFAULT_RETRY_POLICY.retriableStatusCodes,
} as const;

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

// Bounds shared by config files and command-line overrides
const DirSchema = z.string().min(1);
const WorkersSchema = z.number().int().min(1).max(64);
const TimeoutMsSchema = z.number().int().min(100).max(600000);
const MaxAttemptsSchema = z.number().int().min(1).max(100);

const DownloadSchema = z.object({
  dir: DirSchema.optional(),
  workers: WorkersSchema.optional(),
  replacement: ReplacementSchema.optional(),
});

const HttpSchema = z.object({
  timeoutMs: TimeoutMsSchema.optional(),
  headTimeoutMs: TimeoutMsSchema.optional(),
  userAgent: z.string().min(1).optional(),
  headers: z.record(z.string()).optional(),
});

const RetrySchema = z.object({
  maxAttempts: MaxAttemptsSchema.optional(),
  backoffFactor: z.number().min(0).max(60).optional(),
  maxBackoffMs: z.number().int().min(0).max(600000).optional(),
  statusCodes: z.array(z.number().int().min(100).max(599)).optional(),
});

/** Complete configuration file schema */
export const ConfigFileSchema = z.object({
  download: DownloadSchema.optional(),
  http: HttpSchema.optional(),
  retry: RetrySchema.optional(),
  logging: z
    .object({
      level: z.enum(LOG_LEVEL_NAMES).optional(),
      json: z.boolean().optional(),
    })
    .optional(),
});

/** Settings that command-line flags may override, keyed by their flag */
const CLI_OVERRIDE_FLAGS = {
  downloadDir: "dir",
  workers: "workers",
  replacement: "replacement",
  timeoutMs: "timeout",
  retryAttempts: "retry",
} as const;

const CliOverridesSchema = z.object({
  downloadDir: DirSchema.optional(),
  workers: WorkersSchema.optional(),
  replacement: ReplacementSchema.optional(),
  timeoutMs: TimeoutMsSchema.optional(),
  retryAttempts: MaxAttemptsSchema.optional(),
});

/** Type derived from the Zod schema */
export type ConfigFile = z.infer<typeof ConfigFileSchema>;

/** Resolved configuration with all defaults applied */
export interface ResolvedConfig {
  downloadDir: string;
  workers: number;
  replacement: string;
  timeoutMs: number;
  headTimeoutMs: number;
  userAgent: string;
  headers: Record<string, string>;
  retryAttempts: number;
  backoffFactor: number;
  maxBackoffMs: number;
  retryStatusCodes: number[];
  logLevel: LogLevel;
  logJson: boolean;
}

// ---------------------------------------------------------------------------
// Loader Functions
// ---------------------------------------------------------------------------

/**
 * Load a YAML config file from disk.
 * Returns undefined if file doesn't exist.
 */
export function loadConfigFile(path: string): ConfigFile | undefined {
  if (!existsSync(path)) {
    return undefined;
  }

  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (err) {
    throw fileNotReadable(path, errorMessage(err));
  }

  let parsed: unknown;
  try {
    parsed = parseYaml(content);
  } catch (err) {
    throw invalidConfig(path, [`Invalid YAML: ${errorMessage(err)}`]);
  }

  // Empty file
  if (parsed === null || parsed === undefined) {
    return {};
  }

  const result = ConfigFileSchema.safeParse(parsed);
  if (!result.success) {
    throw invalidConfig(
      path,
      result.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }

  return result.data;
}

/**
 * Apply values from a config file to a resolved config object.
 * Only overrides values that are explicitly set in the source.
 */
function applyConfigFile(target: ResolvedConfig, source: ConfigFile): void {
  const { download, http, retry, logging } = source;

  if (download?.dir !== undefined) target.downloadDir = download.dir;
  if (download?.workers !== undefined) target.workers = download.workers;
  if (download?.replacement !== undefined) target.replacement = download.replacement;

  if (http?.timeoutMs !== undefined) target.timeoutMs = http.timeoutMs;
  if (http?.headTimeoutMs !== undefined) target.headTimeoutMs = http.headTimeoutMs;
  if (http?.userAgent !== undefined) target.userAgent = http.userAgent;
  if (http?.headers !== undefined) {
    target.headers = { ...target.headers, ...http.headers };
  }

  if (retry?.maxAttempts !== undefined) target.retryAttempts = retry.maxAttempts;
  if (retry?.backoffFactor !== undefined) target.backoffFactor = retry.backoffFactor;
  if (retry?.maxBackoffMs !== undefined) target.maxBackoffMs = retry.maxBackoffMs;
  if (retry?.statusCodes !== undefined) target.retryStatusCodes = [...retry.statusCodes];

  if (logging?.level !== undefined) target.logLevel = logging.level;
  if (logging?.json !== undefined) target.logJson = logging.json;
}

/**
 * Filter out undefined values from an object.
 */
function filterUndefined<T extends object>(obj: T): Partial<T> {
  return Object.fromEntries(
    Object.entries(obj).filter(([, v]) => v !== undefined)
  ) as Partial<T>;
}

/**
 * Merge configuration sources with proper precedence:
 * CLI args > User config > System config > Defaults
 */
export function resolveConfig(
  cliOptions: Partial<ResolvedConfig> = {},
  userConfig: ConfigFile | undefined = undefined,
  systemConfig: ConfigFile | undefined = undefined
): ResolvedConfig {
  const config: ResolvedConfig = {
    downloadDir: CONFIG_DEFAULTS.downloadDir,
    workers: CONFIG_DEFAULTS.workers,
    replacement: CONFIG_DEFAULTS.replacement,
    timeoutMs: CONFIG_DEFAULTS.timeoutMs,
    headTimeoutMs: CONFIG_DEFAULTS.headTimeoutMs,
    userAgent: CONFIG_DEFAULTS.userAgent,
    headers: {},
    retryAttempts: CONFIG_DEFAULTS.retryAttempts,
    backoffFactor: CONFIG_DEFAULTS.backoffFactor,
    maxBackoffMs: CONFIG_DEFAULTS.maxBackoffMs,
    retryStatusCodes: [...CONFIG_DEFAULTS.retryStatusCodes],
    logLevel: "info",
    logJson: false,
  };

  if (systemConfig) {
    applyConfigFile(config, systemConfig);
  }

  if (userConfig) {
    applyConfigFile(config, userConfig);
  }

  Object.assign(config, filterUndefined(cliOptions));

  return config;
}

function isOverrideKey(key: unknown): key is keyof typeof CLI_OVERRIDE_FLAGS {
  return typeof key === "string" && Object.hasOwn(CLI_OVERRIDE_FLAGS, key);
}

/**
 * Check flag and environment overrides against the bounds config files obey.
 * Throws an invalid-option error naming the offending flag.
 */
export function checkCliOverrides(cliOptions: Partial<ResolvedConfig>): void {
  const result = CliOverridesSchema.safeParse(filterUndefined(cliOptions));
  if (result.success) return;

  const [issue] = result.error.issues;
  const key = issue.path[0];
  throw invalidOption(isOverrideKey(key) ? CLI_OVERRIDE_FLAGS[key] : String(key), issue.message);
}

/**
 * Load configuration from all sources.
 *
 * @param explicitPath - Config file named on the command line; replaces the user config
 * @returns The resolved config and the files that were loaded
 */
export function loadConfig(
  explicitPath?: string,
  cliOptions: Partial<ResolvedConfig> = {}
): {
  config: ResolvedConfig;
  sources: string[];
} {
  checkCliOverrides(cliOptions);

  const sources: string[] = [];

  let systemConfig: ConfigFile | undefined;
  let userConfig: ConfigFile | undefined;

  if (explicitPath) {
    userConfig = loadConfigFile(explicitPath);
    if (!userConfig) throw fileNotReadable(explicitPath, "File does not exist");
    sources.push(explicitPath);
  } else {
    systemConfig = loadConfigFile(SYSTEM_CONFIG_PATH);
    if (systemConfig) sources.push(SYSTEM_CONFIG_PATH);

    userConfig = loadConfigFile(USER_CONFIG_PATH);
    if (userConfig) sources.push(USER_CONFIG_PATH);
  }

  const config = resolveConfig(cliOptions, userConfig, systemConfig);

  return { config, sources };
}

/**
 * Build the HTTP retry policy from resolved settings.
 */
export function toRetryPolicy(config: ResolvedConfig): RetryPolicy {
  return {
    maxAttempts: config.retryAttempts,
    backoffFactor: config.backoffFactor,
    maxBackoffMs: config.maxBackoffMs,
    retriableStatusCodes: config.retryStatusCodes,
  };
}
