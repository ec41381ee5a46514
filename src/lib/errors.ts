/**
 * Custom error classes for structured error handling.
 *
 * Usage:
 *   throw new NetworkError("Request timed out", { url })
 *   throw new IoError("Cannot read source file", path, { cause })
 *   throw new ValidationError("Invalid options", [{ field: "maxRetries", message: "Too small" }])
 *
 * At the CLI boundary:
 *   catch (error) {
 *     const appError = toAppError(error)
 *     console.error(appError.toJSON())
 *   }
 */

export type ErrorCode =
  | "VALIDATION_ERROR"
  | "INTERNAL_ERROR"
  // Download pipeline
  | "NETWORK_ERROR"
  | "RETRIES_EXHAUSTED"
  // Filesystem
  | "IO_ERROR"

export interface ErrorDetail {
  field?: string
  message: string
  code?: string
}

export interface SerializedError {
  code: ErrorCode
  message: string
  details?: ErrorDetail[]
}

/**
 * Base application error class.
 * All custom errors extend this for consistent handling.
 */
export class AppError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetail[],
    options?: { cause?: unknown }
  ) {
    super(message, options)
    this.name = this.constructor.name
    Object.setPrototypeOf(this, new.target.prototype)
    Error.captureStackTrace(this, this.constructor)
  }

  toJSON(): SerializedError {
    return {
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    }
  }
}

/**
 * Input validation failed (options, environment, remote payloads)
 */
export class ValidationError extends AppError {
  constructor(message = "Validation failed", details?: ErrorDetail[]) {
    super("VALIDATION_ERROR", message, details)
  }

  static fromZodError(
    error: { issues: Array<{ path: PropertyKey[]; message: string }> },
    message = "Validation failed"
  ): ValidationError {
    const details = error.issues.map((e) => ({
      field: e.path.map(String).join("."),
      message: e.message,
    }))
    return new ValidationError(message, details)
  }
}

/**
 * A single HTTP attempt failed: connection error, timeout, or non-2xx status.
 */
export class NetworkError extends AppError {
  public readonly url?: string
  public readonly status?: number

  constructor(
    message = "Network request failed",
    options: { url?: string; status?: number; cause?: unknown } = {}
  ) {
    super("NETWORK_ERROR", message, undefined, { cause: options.cause })
    this.url = options.url
    this.status = options.status
  }
}

/**
 * Every allowed attempt failed. The last failure is kept as `cause`.
 */
export class RetriesExhaustedError extends AppError {
  constructor(
    message: string,
    public readonly attempts: number,
    cause?: unknown
  ) {
    super("RETRIES_EXHAUSTED", message, undefined, { cause })
  }
}

/**
 * Reading or writing a local file failed
 */
export class IoError extends AppError {
  constructor(
    message: string,
    public readonly path: string,
    options: { cause?: unknown } = {}
  ) {
    super("IO_ERROR", message, undefined, options)
  }
}

/**
 * Unexpected failure
 */
export class InternalError extends AppError {
  constructor(message = "An unexpected error occurred", cause?: unknown) {
    super("INTERNAL_ERROR", message, undefined, { cause })
  }
}

/**
 * Type guard to check if an error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError
}

/**
 * Convert any error to an AppError for consistent handling.
 * Preserves AppErrors, wraps others in InternalError.
 */
export function toAppError(error: unknown): AppError {
  if (isAppError(error)) {
    return error
  }

  if (error instanceof Error) {
    return new InternalError(error.message, error)
  }

  return new InternalError("An unexpected error occurred", error)
}

/**
 * Message of any thrown value, for log attributes.
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
