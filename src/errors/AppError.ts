import { type ZodIssue } from "zod";

export class AppError extends Error {
  public code: string;
  public status: number;
  public details?: Record<string, unknown>;

  constructor(code: string, message: string, status = 400, details?: Record<string, unknown>) {
    super(message);
    this.name = "AppError";
    this.code = code;
    this.status = status;
    this.details = details;
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

export function validationError(message: string, issues: ZodIssue[] = []): AppError {
  return new AppError("validation_error", message, 400, {
    issues: issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    })),
  });
}

export function notFoundError(entity: string, id: string): AppError {
  return new AppError(`${entity}_not_found`, `${entity} ${id} not found.`, 404, { id });
}

export function persistenceError(message: string, cause: unknown): AppError {
  const error = new AppError("persistence_error", message, 503, {
    cause: cause instanceof Error ? cause.message : String(cause),
  });
  error.cause = cause;
  return error;
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

/** A persisted row that does not decode into its entity (unknown enum literal, malformed JSON, broken invariant). */
export class RowDecodeError extends Error {
  readonly table: string;
  readonly rowId: string | null;

  constructor(table: string, rowId: string | null, reason: string) {
    super(`invalid_${table}_row:${reason}`);
    this.name = "RowDecodeError";
    this.table = table;
    this.rowId = rowId;
    Object.setPrototypeOf(this, RowDecodeError.prototype);
  }
}
