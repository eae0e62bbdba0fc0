import { describeError, logError } from "../../observability/logger";

export type JobTask = () => Promise<void>;

/** Schedules processing runs. `execute` returns once the task is queued, not when it finishes. */
export type JobExecutor = {
  execute(task: JobTask): Promise<void>;
};

export type BackgroundExecutor = JobExecutor & {
  inFlight(): number;
  /** Resolves once every task scheduled so far has settled. */
  drain(): Promise<void>;
};

export function createBackgroundExecutor(): BackgroundExecutor {
  const running = new Set<Promise<void>>();

  return {
    async execute(task) {
      const run = new Promise<void>((resolve) => {
        setImmediate(resolve);
      })
        .then(task)
        .catch((error: unknown) => {
          logError("omr_executor_task_failed", { error: describeError(error) });
        })
        .finally(() => {
          running.delete(run);
        });
      running.add(run);
    },

    inFlight() {
      return running.size;
    },

    async drain() {
      while (running.size > 0) {
        await Promise.all([...running]);
      }
    },
  };
}

/** Runs the task to completion before `execute` resolves. Used by tests and one-shot scripts. */
export const inlineExecutor: JobExecutor = {
  async execute(task) {
    await task();
  },
};
