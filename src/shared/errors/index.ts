/**
 * Shared Error Classes
 *
 * Every failure coming back from the InfluxDB API is mapped onto one of
 * these, so handlers can branch on the error kind instead of its text.
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

export class AuthenticationError extends AppError {
  constructor(message: string = "Unauthorized") {
    super(message, 401, "AUTHENTICATION_ERROR")
  }
}

export class AuthorizationError extends AppError {
  constructor(message: string = "Forbidden") {
    super(message, 403, "AUTHORIZATION_ERROR")
  }
}

export class NotFoundError extends AppError {
  constructor(resource: string = "Resource", message?: string) {
    super(message ?? `${resource} not found`, 404, "NOT_FOUND")
  }
}

export class ConflictError extends AppError {
  constructor(message: string) {
    super(message, 409, "CONFLICT")
  }
}

/**
 * Non-2xx response the other classes don't cover. `code` carries the
 * backend's own error code (e.g. "internal error").
 */
export class ApiError extends AppError {
  constructor(message: string, statusCode: number, code?: string) {
    super(message, statusCode, code ?? "API_ERROR")
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message
  }
  return String(error)
}

/**
 * True when the error means "the entity does not exist".
 *
 * Collaborators outside this package may only signal absence through the
 * message, so a plain Error mentioning "not found" counts as well.
 */
export function isNotFoundError(error: unknown): boolean {
  if (error instanceof NotFoundError) {
    return true
  }
  if (error instanceof AppError) {
    return false
  }
  return error instanceof Error && error.message.includes("not found")
}
