/**
 * Timers behind request timeouts. Tests swap in fake timers.
 */
export interface TimerService {
  setTimeout(fn: () => void, ms: number): NodeJS.Timeout;
  clearTimeout(id: NodeJS.Timeout): void;
}

/** Waits between retry attempts */
export type DelayFn = (ms: number) => Promise<void>;
