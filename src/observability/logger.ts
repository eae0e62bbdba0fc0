import { getContextJobId, getContextRunId } from "./jobContext";

type LogLevel = "info" | "warn" | "error";

type LogFields = {
  jobId?: string;
  runId?: string;
  [key: string]: unknown;
};

function buildPayload(level: LogLevel, event: string, fields: LogFields = {}): Record<string, unknown> {
  const { jobId, runId, ...rest } = fields;
  const payload: Record<string, unknown> = {
    timestamp: new Date().toISOString(),
    level,
    event,
  };
  const contextJobId = jobId ?? getContextJobId();
  const contextRunId = runId ?? getContextRunId();
  if (contextJobId) {
    payload.jobId = contextJobId;
  }
  if (contextRunId) {
    payload.runId = contextRunId;
  }
  return { ...payload, ...rest };
}

function serialize(payload: Record<string, unknown>): string {
  try {
    return JSON.stringify(payload);
  } catch {
    return JSON.stringify({
      timestamp: payload.timestamp,
      level: payload.level,
      event: payload.event,
      serializationFailed: true,
    });
  }
}

function writeLog(level: LogLevel, event: string, fields?: LogFields): void {
  if (process.env.NODE_ENV === "test" && process.env.TEST_LOGGING !== "true") {
    return;
  }
  const output = serialize(buildPayload(level, event, fields));
  if (level === "error") {
    process.stderr.write(`${output}\n`);
  } else {
    process.stdout.write(`${output}\n`);
  }
}

export function logInfo(event: string, fields?: LogFields): void {
  writeLog("info", event, fields);
}

export function logWarn(event: string, fields?: LogFields): void {
  writeLog("warn", event, fields);
}

export function logError(event: string, fields?: LogFields): void {
  writeLog("error", event, fields);
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return typeof error === "string" ? error : "unknown_error";
}
