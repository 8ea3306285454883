import { describe, it, expect, vi } from 'vitest'
import { Hono } from 'hono'
import {
  CsrfError,
  ErrorSanitizer,
  NotFoundError,
  ValidationError,
  type BlogPage,
  type PageContext,
} from '@scrivener/blog-core'
import { ErrorHandler } from './error-handler.js'
import type { BlogEnv } from '../types/index.js'

function makeRenderer() {
  return {
    renderPage: vi.fn((page: BlogPage, _context: PageContext) => JSON.stringify(page)),
  }
}

describe('ErrorHandler', () => {
  it('renders the 500 page and logs with the request id', async () => {
    const renderer = makeRenderer()
    const logger = { error: vi.fn() }
    const handler = new ErrorHandler({ sanitizer: new ErrorSanitizer(false), renderer, logger })

    const req = new Request('http://example.com/posts/', {
      method: 'POST',
      headers: { 'x-request-id': 'req-123' },
    })
    const res = await handler.handle(new Error('SQLITE_BUSY: database is locked'), req)

    expect(res.status).toBe(500)
    expect(res.headers.get('X-Request-ID')).toBe('req-123')
    expect(res.headers.get('Content-Type')).toBe('text/html; charset=utf-8')
    expect(await res.text()).toBe(JSON.stringify({ kind: 'server-error' }))
    expect(renderer.renderPage).toHaveBeenCalledWith({ kind: 'server-error', detail: undefined }, {
      viewer: null,
      currentPath: '/posts/',
    })
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({ requestId: 'req-123', method: 'POST', message: 'SQLITE_BUSY: database is locked' }),
      'Request error'
    )
  })

  it('shows sanitized details when asked to', async () => {
    const renderer = makeRenderer()
    const handler = new ErrorHandler({ sanitizer: new ErrorSanitizer(true), renderer, showDetails: true })
    const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => {})

    await handler.handle(new Error('failed at /srv/app/db.ts'), new Request('http://example.com/'))

    expect(renderer.renderPage.mock.calls[0]?.[0]).toEqual({ kind: 'server-error', detail: 'failed at [PATH]' })
    consoleSpy.mockRestore()
  })

  it('renders the not-found page for NotFoundError', async () => {
    const renderer = makeRenderer()
    const handler = new ErrorHandler({ sanitizer: new ErrorSanitizer(false), renderer })

    const res = await handler.handle(new NotFoundError('Post'), new Request('http://example.com/posts/9/'))

    expect(res.status).toBe(404)
    expect(renderer.renderPage.mock.calls[0]?.[0]).toEqual({ kind: 'not-found', path: '/posts/9/' })
  })

  it('renders the CSRF page for CsrfError', async () => {
    const renderer = makeRenderer()
    const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
    const handler = new ErrorHandler({ sanitizer: new ErrorSanitizer(false), renderer })

    const res = await handler.handle(new CsrfError('CSRF token missing.'), new Request('http://example.com/'))

    expect(res.status).toBe(403)
    expect(renderer.renderPage.mock.calls[0]?.[0]).toEqual({ kind: 'csrf-failure', reason: 'CSRF token missing.' })
    consoleSpy.mockRestore()
  })

  it('renders a generic error page for other client errors', async () => {
    const renderer = makeRenderer()
    const handler = new ErrorHandler({ sanitizer: new ErrorSanitizer(false), renderer })

    const res = await handler.handle(new ValidationError('bad input'), new Request('http://example.com/'))

    expect(res.status).toBe(400)
    expect(renderer.renderPage.mock.calls[0]?.[0]).toEqual({
      kind: 'error',
      statusCode: 400,
      title: 'Client Error',
      message: 'bad input',
    })
  })

  it('invokes custom onError and survives its failures', async () => {
    const onError = vi.fn(async () => {
      throw new Error('handler fail')
    })
    const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
    const handler = new ErrorHandler({ sanitizer: new ErrorSanitizer(false), renderer: makeRenderer(), onError })

    const res = await handler.handle(new Error('boom'), new Request('http://example.com/'))

    expect(res.status).toBe(500)
    expect(onError).toHaveBeenCalled()
    expect(consoleSpy).toHaveBeenCalledWith('Error in custom error handler:', expect.any(Error))
    consoleSpy.mockRestore()
  })

  it('plugs into Hono through toHonoHandler', async () => {
    const consoleSpy = vi.spyOn(console, 'error').mockImplementation(() => {})
    const handler = new ErrorHandler({ sanitizer: new ErrorSanitizer(false), renderer: makeRenderer() })
    const app = new Hono<BlogEnv>()
    app.use('*', async (c, next) => {
      c.set('requestId', 'hono-1')
      await next()
    })
    app.get('/fail', () => {
      throw new Error('fail')
    })
    app.onError(handler.toHonoHandler())

    const res = await app.request('/fail')

    expect(res.status).toBe(500)
    expect(res.headers.get('X-Request-ID')).toBe('hono-1')
    consoleSpy.mockRestore()
  })
})
