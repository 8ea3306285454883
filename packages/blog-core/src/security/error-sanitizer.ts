/**
 * Error Sanitizer
 *
 * Sanitizes error messages to prevent information disclosure.
 * Stack traces, file paths and SQL never reach the rendered error page.
 */

import { AppError } from '../errors/base-error.js'

export interface SanitizedError {
  error: string
  message: string
  code?: string
  statusCode: number
}

export class ErrorSanitizer {
  private isDevelopment: boolean

  constructor(isDevelopment = false) {
    this.isDevelopment = isDevelopment
  }

  /**
   * Sanitize error for client response
   */
  sanitize(error: unknown, defaultMessage = 'An error occurred'): SanitizedError {
    if (this.isDevelopment) {
      return this.sanitizeForDevelopment(error, defaultMessage)
    }

    return this.sanitizeForProduction(error, defaultMessage)
  }

  private sanitizeForProduction(error: unknown, defaultMessage: string): SanitizedError {
    if (error instanceof Error) {
      const statusCode = this.getStatusCode(error)

      return {
        error: this.getErrorType(statusCode),
        message: this.getSafeMessage(error, defaultMessage),
        statusCode,
      }
    }

    return {
      error: 'Internal Server Error',
      message: defaultMessage,
      statusCode: 500,
    }
  }

  private sanitizeForDevelopment(error: unknown, defaultMessage: string): SanitizedError {
    if (error instanceof Error) {
      const statusCode = this.getStatusCode(error)
      const message = this.removeSensitivePatterns(error.message || defaultMessage)

      return {
        error: error.name || this.getErrorType(statusCode),
        message,
        code: error instanceof AppError ? error.code : undefined,
        statusCode,
      }
    }

    return {
      error: 'Error',
      message: String(error || defaultMessage),
      statusCode: 500,
    }
  }

  /**
   * Get HTTP status code from error
   */
  getStatusCode(error: unknown): number {
    if (error instanceof AppError) {
      return error.statusCode
    }

    if (error instanceof Error && 'statusCode' in error && typeof error.statusCode === 'number') {
      return error.statusCode
    }

    return 500
  }

  private getSafeMessage(error: Error, defaultMessage: string): string {
    const statusCode = this.getStatusCode(error)

    // Client errors keep their (sanitized) message
    if (statusCode >= 400 && statusCode < 500) {
      const message = this.removeSensitivePatterns(error.message || defaultMessage)
      return message || this.getDefaultMessage(statusCode)
    }

    return this.getDefaultMessage(statusCode)
  }

  private getDefaultMessage(statusCode: number): string {
    const messages: Record<number, string> = {
      400: 'Bad Request',
      401: 'Authentication required',
      403: 'Access denied',
      404: 'Not found',
      409: 'Conflict',
      500: 'Internal server error',
      503: 'Service unavailable',
    }

    return messages[statusCode] || 'An error occurred'
  }

  private getErrorType(statusCode: number): string {
    if (statusCode >= 400 && statusCode < 500) {
      return 'Client Error'
    }

    if (statusCode >= 500) {
      return 'Server Error'
    }

    return 'Error'
  }

  private removeSensitivePatterns(message: string): string {
    // File paths
    message = message.replace(/\/[^\s]+\.(ts|js|json)/g, '[PATH]')
    message = message.replace(/[A-Z]:\\[^\s]+/g, '[PATH]')

    // SQL details
    message = message.replace(/SQL[^:]*:/gi, 'Database:')
    message = message.replace(/SQLITE_\w+/gi, 'DATABASE_ERROR')

    // Stack frames
    message = message.replace(/at\s+\w+\s+\([^)]+\)/g, '')
    message = message.replace(/at\s+[^\s]+:\d+:\d+/g, '')

    // Tokens and addresses
    message = message.replace(/[a-f0-9]{32,}/gi, '[TOKEN]')
    message = message.replace(/[^\s@]+@[^\s@]+\.[^\s@]+/g, '[EMAIL]')
    message = message.replace(/\b\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}\b/g, '[IP]')

    return message.trim()
  }

  /**
   * Check if error should be logged (vs just returned to client)
   */
  shouldLog(error: unknown): boolean {
    const statusCode = this.getStatusCode(error)
    return statusCode >= 500 || statusCode === 403
  }

  /**
   * Get full error details for logging (not for client)
   */
  getLogDetails(error: unknown): Record<string, unknown> {
    if (error instanceof Error) {
      return {
        name: error.name,
        message: error.message,
        stack: error.stack,
        ...(error.cause !== undefined && { cause: error.cause }),
      }
    }

    return {
      error: String(error),
    }
  }
}
