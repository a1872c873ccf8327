/**
 * Output mode detection for deciding how errors and results are rendered.
 */

export type OutputMode = "tty" | "static" | "json";

/**
 * - `tty`: interactive terminal, colors and spinners
 * - `static`: plain text (CI, pipes)
 * - `json`: structured output for scripting
 */
export function getOutputMode(argv: string[] = process.argv): OutputMode {
  const envJson = process.env.FETCHTREE_JSON;
  if (argv.includes("--json") || envJson === "1" || envJson === "true") {
    return "json";
  }

  if (process.env.CI || !process.stdout.isTTY || process.env.TERM === "dumb") {
    return "static";
  }

  return "tty";
}
