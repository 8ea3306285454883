/**
 * Base Error Classes
 *
 * Error hierarchy shared by the request handlers and the HTTP runtime.
 */

export interface ErrorContext {
  [key: string]: unknown
}

/**
 * Base application error class
 */
export abstract class AppError extends Error {
  public readonly code: string
  public readonly statusCode: number
  public readonly isOperational: boolean
  public readonly context?: ErrorContext

  constructor(
    message: string,
    code: string,
    statusCode: number = 500,
    isOperational: boolean = true,
    context?: ErrorContext
  ) {
    super(message)
    Object.setPrototypeOf(this, new.target.prototype)

    this.name = this.constructor.name
    this.code = code
    this.statusCode = statusCode
    this.isOperational = isOperational
    this.context = context

    Error.captureStackTrace(this)
  }

  toJSON() {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      statusCode: this.statusCode,
      context: this.context,
    }
  }
}

/**
 * Validation Error - 400
 */
export class ValidationError extends AppError {
  constructor(message: string = 'Validation failed', context?: ErrorContext) {
    super(message, 'VALIDATION_ERROR', 400, true, context)
  }
}

/**
 * CSRF Error - 403
 */
export class CsrfError extends AppError {
  constructor(message: string = 'CSRF verification failed', context?: ErrorContext) {
    super(message, 'CSRF_ERROR', 403, true, context)
  }
}

/**
 * Not Found Error - 404
 */
export class NotFoundError extends AppError {
  constructor(resource: string, context?: ErrorContext) {
    super(`${resource} not found`, 'NOT_FOUND', 404, true, context)
  }
}

/**
 * Conflict Error - 409
 */
export class ConflictError extends AppError {
  constructor(message: string = 'Resource conflict', context?: ErrorContext) {
    super(message, 'CONFLICT', 409, true, context)
  }
}
