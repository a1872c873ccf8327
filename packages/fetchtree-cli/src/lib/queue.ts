import type { Logger } from "./logger.js";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface QueueTask<T> {
  /** Label used in logs and outcomes */
  id: string;
  execute: () => Promise<T>;
}

export type TaskOutcome<T> =
  | { id: string; ok: true; value: T }
  | { id: string; ok: false; error: unknown };

export interface QueueOptions<T> {
  /** Maximum number of tasks in flight */
  concurrency: number;
  logger: Logger;
  /** Called once per task when it resolves or rejects */
  onSettled?: (outcome: TaskOutcome<T>) => void;
}

export interface ProcessingQueue<T> {
  enqueue(task: QueueTask<T>): void;
  /** Resolves once nothing is waiting or running */
  drain(): Promise<void>;
}

// ---------------------------------------------------------------------------
// Implementation
// ---------------------------------------------------------------------------

/**
 * Bounded FIFO runner. A failed task is reported through `onSettled` and
 * never retried.
 */
export function createQueue<T>(options: QueueOptions<T>): ProcessingQueue<T> {
  const { concurrency, logger, onSettled } = options;

  const waiting: QueueTask<T>[] = [];
  let running = 0;
  let idleWaiters: Array<() => void> = [];

  const isIdle = () => waiting.length === 0 && running === 0;

  async function run(task: QueueTask<T>): Promise<void> {
    const { id } = task;
    logger.debug("Task started", { taskId: id, waiting: waiting.length });

    let outcome: TaskOutcome<T>;
    try {
      outcome = { id, ok: true, value: await task.execute() };
    } catch (error) {
      logger.debug("Task failed", { taskId: id, error: String(error) });
      outcome = { id, ok: false, error };
    }

    running--;
    onSettled?.(outcome);
    pump();
  }

  function pump(): void {
    while (running < concurrency && waiting.length > 0) {
      const task = waiting.shift();
      if (!task) break;
      running++;
      void run(task);
    }

    if (isIdle()) {
      const waiters = idleWaiters;
      idleWaiters = [];
      for (const resolve of waiters) resolve();
    }
  }

  return {
    enqueue(task) {
      waiting.push(task);
      pump();
    },
    drain() {
      if (isIdle()) return Promise.resolve();
      return new Promise((resolve) => {
        idleWaiters.push(resolve);
      });
    },
  };
}
