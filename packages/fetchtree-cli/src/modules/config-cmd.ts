import { Command } from "commander";
import { existsSync, mkdirSync, writeFileSync } from "fs";
import { dirname } from "path";
import chalk from "chalk";
import {
  loadConfig,
  loadConfigFile,
  USER_CONFIG_PATH,
  SYSTEM_CONFIG_PATH,
  type ResolvedConfig,
} from "../lib/config.js";
import { maybeOutputJson } from "../lib/json-output.js";
import { errorMessage, isCLIError } from "../lib/errors/types.js";

// ---------------------------------------------------------------------------
// Example Configuration Content
// ---------------------------------------------------------------------------

const EXAMPLE_CONFIG = `# fetchtree configuration
# Place at ~/.config/fetchtree/config.yaml (user) or /etc/fetchtree/config.yaml (system)
#
# Configuration precedence (highest to lowest):
# 1. CLI flags
# 2. User config (~/.config/fetchtree/config.yaml)
# 3. System config (/etc/fetchtree/config.yaml)
# 4. Built-in defaults

download:
  # Root of the mirrored tree (can be overridden with --dir)
  dir: ./downloads

  # Parallel downloads (1-64)
  workers: 4

  # Single character substituted for unsafe file name characters
  replacement: "_"

http:
  # Wait for response headers, and for each body chunk after that (ms)
  timeoutMs: 15000

  # Timeout for the HEAD request that checks existing files (ms)
  headTimeoutMs: 15000

  # Extra request headers, merged over the default User-Agent
  # headers:
  #   Referer: "https://example.com/"

retry:
  # Total attempts per request, including the first
  maxAttempts: 10

  # Retry n waits backoffFactor * 2^(n-1) seconds
  backoffFactor: 0.3

  # Upper bound for a single wait (ms)
  maxBackoffMs: 120000

  # Response statuses that are retried
  statusCodes: [500, 502, 504]

logging:
  # Log level: debug, info, warn, error
  level: info

  # Output JSON logs
  json: false
`;

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function printLoadError(prefix: string, error: unknown): void {
  console.error(chalk.red(`${prefix}: ${errorMessage(error)}`));
  if (isCLIError(error) && error.details) {
    for (const line of error.details.split("\n")) {
      console.error(chalk.gray(`    ${line}`));
    }
  }
}

function printSection(title: string, entries: Array<[string, unknown]>): void {
  console.log();
  console.log(chalk.bold(`${title}:`));
  for (const [key, value] of entries) {
    const shown = typeof value === "object" ? JSON.stringify(value) : String(value);
    console.log(`  ${`${key}:`.padEnd(16)}${shown}`);
  }
}

function printResolved(resolved: ResolvedConfig): void {
  printSection("Download", [
    ["dir", resolved.downloadDir],
    ["workers", resolved.workers],
    ["replacement", resolved.replacement],
  ]);
  printSection("HTTP", [
    ["timeoutMs", resolved.timeoutMs],
    ["headTimeoutMs", resolved.headTimeoutMs],
    ["userAgent", resolved.userAgent],
    ["headers", resolved.headers],
  ]);
  printSection("Retry", [
    ["maxAttempts", resolved.retryAttempts],
    ["backoffFactor", resolved.backoffFactor],
    ["maxBackoffMs", resolved.maxBackoffMs],
    ["statusCodes", resolved.retryStatusCodes.join(", ")],
  ]);
  printSection("Logging", [
    ["level", resolved.logLevel],
    ["json", resolved.logJson],
  ]);
}

// ---------------------------------------------------------------------------
// Command Registration
// ---------------------------------------------------------------------------

export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Manage fetchtree configuration");

  config
    .command("init")
    .description("Create an example configuration file")
    .option(
      "-g, --global",
      "Create system-wide config at /etc/fetchtree/config.yaml"
    )
    .action((options: { global?: boolean }) => {
      const targetPath = options.global ? SYSTEM_CONFIG_PATH : USER_CONFIG_PATH;

      if (existsSync(targetPath)) {
        console.error(chalk.yellow(`Config file already exists: ${targetPath}`));
        console.error(
          chalk.gray("Use a text editor to modify it, or delete it first.")
        );
        process.exitCode = 1;
        return;
      }

      try {
        mkdirSync(dirname(targetPath), { recursive: true });
        writeFileSync(targetPath, EXAMPLE_CONFIG, "utf-8");
        console.log(chalk.green(`Created config file: ${targetPath}`));
        console.log(chalk.gray("Edit this file to customize your settings."));
      } catch (error) {
        console.error(chalk.red(`Failed to create config: ${errorMessage(error)}`));
        if (options.global) {
          console.error(chalk.gray("System config may require sudo."));
        }
        process.exitCode = 1;
      }
    });

  config
    .command("validate")
    .description("Validate configuration file(s)")
    .option("-c, --config <path>", "Specific config file to validate")
    .action((options: { config?: string }) => {
      const pathsToCheck = options.config
        ? [options.config]
        : [SYSTEM_CONFIG_PATH, USER_CONFIG_PATH];

      let hasErrors = false;
      let foundAny = false;

      for (const path of pathsToCheck) {
        if (!existsSync(path)) {
          if (options.config) {
            console.error(chalk.red(`File not found: ${path}`));
            hasErrors = true;
          }
          continue;
        }

        foundAny = true;
        console.log(chalk.cyan(`Checking ${path}...`));

        try {
          loadConfigFile(path);
          console.log(chalk.green(`  ✓ Valid`));
        } catch (error) {
          printLoadError("  ✗ Invalid", error);
          hasErrors = true;
        }
      }

      if (!foundAny && !options.config) {
        console.log(chalk.yellow("No configuration files found."));
        console.log(chalk.gray(`Run 'fetchtree config init' to create one.`));
      } else if (hasErrors) {
        process.exitCode = 1;
      } else if (foundAny) {
        console.log(chalk.green("\nAll configuration files are valid."));
      }
    });

  config
    .command("show")
    .description("Display the effective configuration")
    .option("-c, --config <path>", "Specific config file to use")
    .action((options: { config?: string }) => {
      try {
        const { config: resolved, sources } = loadConfig(options.config);

        if (maybeOutputJson({ effective: resolved, sources })) {
          return;
        }

        console.log(chalk.cyan("Effective Configuration:"));
        console.log(chalk.gray("─".repeat(40)));

        if (sources.length > 0) {
          console.log(chalk.gray(`Sources: ${sources.join(", ")}`));
        } else {
          console.log(chalk.gray("Sources: (defaults only)"));
        }

        printResolved(resolved);
      } catch (error) {
        printLoadError("Failed to load config", error);
        process.exitCode = 1;
      }
    });

  config
    .command("path")
    .description("Show configuration file paths")
    .action(() => {
      console.log(chalk.cyan("Configuration file locations:"));
      console.log();
      console.log(chalk.bold("User config:"));
      console.log(`  ${USER_CONFIG_PATH}`);
      console.log(
        `  ${existsSync(USER_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`
      );
      console.log();
      console.log(chalk.bold("System config:"));
      console.log(`  ${SYSTEM_CONFIG_PATH}`);
      console.log(
        `  ${existsSync(SYSTEM_CONFIG_PATH) ? chalk.green("(exists)") : chalk.gray("(not found)")}`
      );
    });
}
