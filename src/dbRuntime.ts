const connectionFailureCodes = new Set([
  "57P01",
  "57P02",
  "57P03",
  "08006",
  "08003",
  "08001",
  "ECONNRESET",
  "ECONNREFUSED",
  "ETIMEDOUT",
]);

const constraintViolationCodes = new Set(["23502", "23503", "23505", "23514"]);

export type DbFailureCategory =
  | "pool_exhausted"
  | "connection_failure"
  | "constraint_violation";

function getErrorCode(err: Error): string | undefined {
  const code: unknown = Reflect.get(err, "code");
  return typeof code === "string" ? code : undefined;
}

export function isDbConnectionFailure(err: unknown): boolean {
  if (!(err instanceof Error)) {
    return false;
  }
  const code = getErrorCode(err);
  if (code && connectionFailureCodes.has(code)) {
    return true;
  }
  const message = err.message.toLowerCase();
  return (
    message.includes("terminating connection") ||
    message.includes("connection terminated") ||
    message.includes("connection refused") ||
    message.includes("connection reset") ||
    message.includes("could not connect") ||
    message.includes("timeout")
  );
}

export function isConstraintViolation(err: unknown): boolean {
  if (!(err instanceof Error)) {
    return false;
  }
  const code = getErrorCode(err);
  return code !== undefined && constraintViolationCodes.has(code);
}

export function getDbFailureCategory(err: unknown): DbFailureCategory | null {
  if (!(err instanceof Error)) {
    return null;
  }
  if (getErrorCode(err) === "53300") {
    return "pool_exhausted";
  }
  if (isDbConnectionFailure(err)) {
    return "connection_failure";
  }
  if (isConstraintViolation(err)) {
    return "constraint_violation";
  }
  if (err.message.toLowerCase().includes("too many clients")) {
    return "pool_exhausted";
  }
  return null;
}
