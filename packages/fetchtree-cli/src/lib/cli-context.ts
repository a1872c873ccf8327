/**
 * Global CLI context for shared options and state.
 * Provides consistent behavior across all commands.
 */

export interface CLIContext {
  /** Output JSON instead of human-readable text */
  json: boolean;
  /** Suppress spinners and progress indicators */
  quiet: boolean;
  /** Per-request timeout in milliseconds; unset falls through to config */
  timeout?: number;
  /** Total HTTP attempts per request; unset falls through to config */
  retry?: number;
}

const DEFAULT_CONTEXT: CLIContext = {
  json: false,
  quiet: false,
};

let currentContext: CLIContext = { ...DEFAULT_CONTEXT };

function isTruthyFlag(value: string | undefined): boolean {
  return value === "1" || value === "true";
}

function parsePositiveInt(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const parsed = parseInt(value, 10);
  return !isNaN(parsed) && parsed > 0 ? parsed : undefined;
}

function optionValue(argv: string[], flag: string): string | undefined {
  const idx = argv.findIndex((arg) => arg === flag);
  if (idx !== -1) return argv[idx + 1];
  const inline = argv.find((arg) => arg.startsWith(`${flag}=`));
  return inline?.slice(flag.length + 1);
}

/**
 * Initialize CLI context from command line arguments and environment.
 */
export function initContext(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): CLIContext {
  currentContext = { ...DEFAULT_CONTEXT };

  // Environment first, flags win
  if (isTruthyFlag(env.FETCHTREE_JSON)) {
    currentContext.json = true;
    currentContext.quiet = true;
  }

  if (isTruthyFlag(env.FETCHTREE_QUIET)) {
    currentContext.quiet = true;
  }

  currentContext.timeout = parsePositiveInt(env.FETCHTREE_TIMEOUT);
  currentContext.retry = parsePositiveInt(env.FETCHTREE_RETRY);

  if (argv.includes("--json")) {
    currentContext.json = true;
    currentContext.quiet = true; // JSON mode implies quiet
  }

  if (argv.includes("--quiet") || argv.includes("-q")) {
    currentContext.quiet = true;
  }

  const timeout = parsePositiveInt(optionValue(argv, "--timeout"));
  if (timeout !== undefined) currentContext.timeout = timeout;

  const retry = parsePositiveInt(optionValue(argv, "--retry"));
  if (retry !== undefined) currentContext.retry = retry;

  return currentContext;
}

/**
 * Get the current CLI context.
 */
export function getContext(): CLIContext {
  return currentContext;
}

/**
 * Check if we're in JSON output mode.
 */
export function isJsonMode(): boolean {
  return currentContext.json;
}

/**
 * Check if we're in quiet mode (no spinners/progress).
 */
export function isQuietMode(): boolean {
  return currentContext.quiet;
}

/**
 * Get the request timeout override in milliseconds.
 */
export function getTimeout(): number | undefined {
  return currentContext.timeout;
}

/**
 * Get the retry attempts override.
 */
export function getRetryCount(): number | undefined {
  return currentContext.retry;
}

/**
 * Reset context to defaults (for testing).
 */
export function resetContext(): void {
  currentContext = { ...DEFAULT_CONTEXT };
}
