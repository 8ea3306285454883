/**
 * Error Handler
 *
 * Last-resort handling for errors that escape the request handler:
 * logs them with the request id and renders the matching error page.
 */

import type { Context } from 'hono'
import {
  AppError,
  CsrfError,
  type BlogPage,
  type ErrorSanitizer,
  type RendererPort,
  type SanitizedError,
} from '@scrivener/blog-core'
import type { BlogEnv } from '../types/index.js'

/**
 * Structured logger (pino-style argument order)
 */
export interface ErrorLogger {
  error(context: Record<string, unknown>, message: string): void
}

export interface ErrorHandlerOptions {
  sanitizer: ErrorSanitizer
  renderer: RendererPort
  logger?: ErrorLogger
  /**
   * Show the sanitized message on the 500 page
   */
  showDetails?: boolean
  onError?: (error: Error, request: Request) => void | Promise<void>
}

export class ErrorHandler {
  constructor(private options: ErrorHandlerOptions) {}

  async handle(error: Error, request: Request, requestId?: string): Promise<Response> {
    const id = requestId || request.headers.get('x-request-id') || 'unknown'
    const { sanitizer } = this.options

    if (sanitizer.shouldLog(error)) {
      const logContext: Record<string, unknown> = {
        requestId: id,
        method: request.method,
        url: request.url,
        ...sanitizer.getLogDetails(error),
      }
      if (error instanceof AppError && error.context) {
        logContext.errorContext = error.context
      }

      if (this.options.logger) {
        this.options.logger.error(logContext, 'Request error')
      } else {
        console.error('Request error:', logContext)
      }
    }

    if (this.options.onError) {
      try {
        await this.options.onError(error, request)
      } catch (err) {
        console.error('Error in custom error handler:', err)
      }
    }

    const sanitized = sanitizer.sanitize(error)
    const path = new URL(request.url).pathname
    const body = this.options.renderer.renderPage(this.pageFor(error, sanitized, path), {
      viewer: null,
      currentPath: path,
    })

    return new Response(body, {
      status: sanitized.statusCode,
      headers: {
        'Content-Type': 'text/html; charset=utf-8',
        'X-Request-ID': id,
      },
    })
  }

  /**
   * Adapter for Hono's onError hook
   */
  toHonoHandler() {
    return async (error: Error, c: Context<BlogEnv>): Promise<Response> => {
      return this.handle(error, c.req.raw, c.get('requestId'))
    }
  }

  private pageFor(
    error: Error,
    sanitized: SanitizedError,
    path: string
  ): BlogPage {
    if (error instanceof CsrfError) {
      return { kind: 'csrf-failure', reason: error.message }
    }
    if (sanitized.statusCode === 404) {
      return { kind: 'not-found', path }
    }
    if (sanitized.statusCode >= 500) {
      return { kind: 'server-error', detail: this.options.showDetails ? sanitized.message : undefined }
    }
    return { kind: 'error', statusCode: sanitized.statusCode, title: sanitized.error, message: sanitized.message }
  }
}
