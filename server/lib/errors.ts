import { ZodError } from "zod";

export type ErrorCode =
  | "VALIDATION_ERROR"
  | "FORBIDDEN"
  | "NOT_FOUND"
  | "CONFLICT"
  | "INTERNAL_ERROR";

export interface ValidationIssue {
  path: string;
  message: string;
}

export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: ErrorCode;
  public readonly details?: unknown;

  constructor(
    statusCode: number,
    code: ErrorCode,
    message: string,
    details?: unknown,
    cause?: unknown
  ) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = "AppError";
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
    Object.setPrototypeOf(this, AppError.prototype);
  }

  static badRequest(message: string, details?: unknown): AppError {
    return new AppError(400, "VALIDATION_ERROR", message, details);
  }

  static forbidden(message = "Access denied"): AppError {
    return new AppError(403, "FORBIDDEN", message);
  }

  /**
   * Absent and cross-tenant resources produce the same error, so callers
   * cannot learn whether another tenant's row exists.
   */
  static notFound(message = "Resource not found"): AppError {
    return new AppError(404, "NOT_FOUND", message);
  }

  static conflict(message: string, details?: unknown): AppError {
    return new AppError(409, "CONFLICT", message, details);
  }

  static internal(message = "Internal server error", details?: unknown, cause?: unknown): AppError {
    return new AppError(500, "INTERNAL_ERROR", message, details, cause);
  }
}

export function isAppError(err: unknown, code?: ErrorCode): err is AppError {
  return err instanceof AppError && (code === undefined || err.code === code);
}

export function formatZodError(error: ZodError): ValidationIssue[] {
  return error.errors.map((e) => ({
    path: e.path.join("."),
    message: e.message,
  }));
}

const PG_UNIQUE_VIOLATION = "23505";
const PG_FOREIGN_KEY_VIOLATION = "23503";

/** SQLSTATE of a driver error, looking through one level of wrapping. */
export function pgErrorCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null) return undefined;
  if ("code" in err && typeof err.code === "string") return err.code;
  if ("cause" in err) return pgErrorCode(err.cause);
  return undefined;
}

export function isAbortError(err: unknown): err is Error {
  return err instanceof Error && err.name === "AbortError";
}

/**
 * The single place where raw storage failures become AppErrors.
 * Domain errors and aborts pass through untouched.
 */
export function wrapStorageError(operation: string, err: unknown): Error {
  if (err instanceof AppError || isAbortError(err)) {
    return err;
  }

  switch (pgErrorCode(err)) {
    case PG_UNIQUE_VIOLATION:
      return AppError.conflict(`${operation}: a record with the same identity already exists`, { operation });
    case PG_FOREIGN_KEY_VIOLATION:
      return AppError.conflict(`${operation}: referenced record is missing or still in use`, { operation });
  }

  const reason = err instanceof Error ? err.message : String(err);
  return AppError.internal(`${operation} failed: ${reason}`, { operation }, err);
}
