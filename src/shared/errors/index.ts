/**
 * Shared Error Classes
 */

export class AppError extends Error {
  constructor(
    message: string,
    public statusCode: number = 500,
    public code?: string
  ) {
    super(message)
    this.name = this.constructor.name
    Error.captureStackTrace(this, this.constructor)
  }
}

export class ValidationError extends AppError {
  constructor(message: string, public field?: string) {
    super(message, 400, "VALIDATION_ERROR")
  }
}

export class ConfigurationError extends AppError {
  constructor(message: string, public variable?: string) {
    super(message, 500, "CONFIGURATION_ERROR")
  }
}

/**
 * Raised by vendor adapters when the monitoring API refuses or fails a request
 */
export class VendorApiError extends AppError {
  constructor(message: string, public status?: number) {
    super(message, 502, "VENDOR_API_ERROR")
  }
}

export class PersistenceError extends AppError {
  constructor(message: string, public cause?: unknown) {
    super(message, 500, "PERSISTENCE_ERROR")
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message || error.name
  }
  return String(error)
}
