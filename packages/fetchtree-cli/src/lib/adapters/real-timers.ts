import type { TimerService, DelayFn } from "../ports/timer.js";

export const realTimerService: TimerService = {
  setTimeout: (fn, ms) => globalThis.setTimeout(fn, ms),
  clearTimeout: (id) => globalThis.clearTimeout(id),
};

/**
 * Resolves after `ms`; zero or negative waits resolve on the next tick.
 */
export const realDelay: DelayFn = (ms) =>
  ms <= 0
    ? Promise.resolve()
    : new Promise((resolve) => globalThis.setTimeout(resolve, ms));
