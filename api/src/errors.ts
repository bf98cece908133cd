export type ErrorCode =
  | "BAD_REQUEST"
  | "CONFIG_ERROR"
  | "INTERNAL_ERROR";

export interface ErrorDetail {
  field?: string;
  message: string;
}

export interface SerializedError {
  code: ErrorCode;
  message: string;
  details?: ErrorDetail[];
}

/**
 * Base class for errors that are surfaced to callers with a stable code and
 * HTTP status. Anything else reaching the HTTP layer is reported as
 * INTERNAL_ERROR.
 */
export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: ErrorDetail[],
  ) {
    super(message);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): SerializedError {
    return {
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

/**
 * Invalid pipeline options (negative counts, zero reading speed, ...).
 * The only failure the pipeline rejects instead of degrading.
 */
export class ConfigError extends AppError {
  constructor(details: ErrorDetail[]) {
    const summary = details.map((d) => (d.field ? `${d.field}: ${d.message}` : d.message)).join("; ");
    super("CONFIG_ERROR", `Invalid metadata options: ${summary}`, 400, details);
  }
}

export class BadRequestError extends AppError {
  constructor(message = "Bad request", details?: ErrorDetail[]) {
    super("BAD_REQUEST", message, 400, details);
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }
  const message = error instanceof Error ? error.message : "An unexpected error occurred";
  return new AppError("INTERNAL_ERROR", message, 500);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
