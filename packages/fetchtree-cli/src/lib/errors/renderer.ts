import chalk from "chalk";
import { CLIError, isCLIError } from "./types.js";
import { unknownError } from "./catalog.js";
import { getOutputMode, type OutputMode } from "../output/mode.js";

const SYM = {
  error: "✗",
  arrow: "→",
};

/**
 * Lines of a human-readable error block, without trailing newline.
 */
export function formatStaticError(error: CLIError): string[] {
  const output: string[] = [`${chalk.red(SYM.error)} ${chalk.red.bold(error.message)}`];

  if (error.details) {
    for (const line of error.details.split("\n")) {
      output.push(`  ${chalk.dim(line)}`);
    }
  }

  if (error.suggestion) {
    output.push(`  ${chalk.yellow(SYM.arrow)} ${error.suggestion}`);
  }

  if (error.example) {
    output.push(`  ${chalk.dim("Try:")} ${chalk.cyan(error.example)}`);
  }

  return output;
}

function renderJSONError(error: CLIError): void {
  const output = {
    error: true,
    code: error.code,
    message: error.message,
    suggestion: error.suggestion,
    example: error.example,
    details: error.details,
  };

  const cleaned = Object.fromEntries(
    Object.entries(output).filter(([, v]) => v !== undefined)
  );

  console.error(JSON.stringify(cleaned, null, 2));
}

/**
 * Render an error based on the current output mode. Always goes to stderr.
 */
export function renderError(error: CLIError, mode?: OutputMode): void {
  const outputMode = mode ?? getOutputMode();

  if (outputMode === "json") {
    renderJSONError(error);
    return;
  }

  for (const line of formatStaticError(error)) {
    console.error(line);
  }
}

/**
 * Convert an unknown error to a CLIError and render it.
 */
export function renderUnknownError(error: unknown, mode?: OutputMode): void {
  renderError(isCLIError(error) ? error : unknownError(error), mode);
}
