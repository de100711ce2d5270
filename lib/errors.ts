/**
 * Error classes for the extraction validation core.
 *
 * Usage:
 *   throw new ConfigurationError("Unknown similarity method: fuzzy")
 *   throw new SecondaryExtractionError("Secondary extraction failed", { cause: err })
 *
 * At the orchestration boundary:
 *   catch (error) {
 *     const appError = toAppError(error)
 *     return { status: appError.statusCode, body: appError.toJSON() }
 *   }
 */

export type ErrorCode =
  | "CONFIGURATION_ERROR"
  | "SECONDARY_EXTRACTION_FAILED"
  | "ENCRYPTED_DOCUMENT"
  | "CORRUPT_DOCUMENT"
  | "INTERNAL_ERROR"

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
  public readonly isOperational = true

  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly statusCode: number = 500,
    public readonly details?: ErrorDetail[],
    options?: ErrorOptions
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
 * Invalid similarity method, out-of-range threshold or bad environment.
 * Raised before any computation starts.
 */
export class ConfigurationError extends AppError {
  constructor(message = "Invalid configuration", details?: ErrorDetail[]) {
    super("CONFIGURATION_ERROR", message, 500, details)
  }

  static fromZodError(error: {
    issues: ReadonlyArray<{ path: PropertyKey[]; message: string }>
  }): ConfigurationError {
    const details = error.issues.map((issue) => ({
      field: issue.path.map(String).join("."),
      message: issue.message,
    }))
    return new ConfigurationError("Invalid configuration", details)
  }
}

/**
 * The secondary extractor rejected during validation. The original
 * rejection is kept as `cause`.
 */
export class SecondaryExtractionError extends AppError {
  constructor(message = "Secondary extraction failed", options?: ErrorOptions) {
    super("SECONDARY_EXTRACTION_FAILED", message, 502, undefined, options)
  }
}

/**
 * 422 - Password-protected PDF
 */
export class EncryptedDocumentError extends AppError {
  constructor(message = "Document is password-protected") {
    super("ENCRYPTED_DOCUMENT", message, 422)
  }
}

/**
 * 422 - Unreadable or malformed PDF
 */
export class CorruptDocumentError extends AppError {
  constructor(message = "Document is corrupt or not a valid PDF") {
    super("CORRUPT_DOCUMENT", message, 422)
  }
}

/**
 * 500 Internal Error - Unexpected failure
 */
export class InternalError extends AppError {
  constructor(message = "An unexpected error occurred", options?: ErrorOptions) {
    super("INTERNAL_ERROR", message, 500, undefined, options)
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError
}

/**
 * Convert any error to an AppError.
 * Preserves AppErrors, wraps others in InternalError.
 */
export function toAppError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error
  }

  if (error instanceof Error) {
    const message =
      process.env.NODE_ENV === "production"
        ? "An unexpected error occurred"
        : error.message

    return new InternalError(message, { cause: error })
  }

  return new InternalError("An unexpected error occurred")
}
