import { AsyncLocalStorage } from "async_hooks";
import { randomUUID } from "crypto";

export type JobContext = {
  jobId: string;
  runId: string;
  start: number;
};

const storage = new AsyncLocalStorage<JobContext>();

/** Runs `fn` with a fresh processing-run context so every log line it emits carries the job id. */
export function runWithJobContext<T>(jobId: string, fn: () => T): T {
  const store: JobContext = {
    jobId,
    runId: randomUUID(),
    start: Date.now(),
  };
  return storage.run(store, fn);
}

export function getContextJobId(): string | undefined {
  return storage.getStore()?.jobId;
}

export function getContextRunId(): string | undefined {
  return storage.getStore()?.runId;
}

export function getRunDurationMs(): number | null {
  const store = storage.getStore();
  return store ? Date.now() - store.start : null;
}
