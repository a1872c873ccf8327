import ora from "ora";
import { isQuietMode, isJsonMode } from "./cli-context.js";

/** Progress of a batch of downloads, shown on stderr. */
export interface Progress {
  update(done: number): void;
  succeed(text: string): void;
  fail(text: string): void;
}

const silentProgress: Progress = {
  update: () => {},
  succeed: () => {},
  fail: () => {},
};

export function progressText(label: string, done: number, total: number): string {
  return `${label} ${done}/${total}`;
}

/**
 * Start an ora spinner reading `label done/total`. Quiet and JSON mode get
 * a progress that prints nothing.
 */
export function startProgress(label: string, total: number): Progress {
  if (isQuietMode() || isJsonMode()) {
    return silentProgress;
  }

  const spinner = ora({
    text: progressText(label, 0, total),
    stream: process.stderr,
  }).start();

  return {
    update: (done) => {
      spinner.text = progressText(label, done, total);
    },
    succeed: (text) => {
      spinner.succeed(text);
    },
    fail: (text) => {
      spinner.fail(text);
    },
  };
}
