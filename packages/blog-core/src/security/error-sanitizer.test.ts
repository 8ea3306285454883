import { describe, it, expect } from 'vitest'
import { ErrorSanitizer } from './error-sanitizer.js'
import { ConflictError, CsrfError, NotFoundError, ValidationError } from '../errors/base-error.js'

describe('ErrorSanitizer', () => {
  describe('production mode', () => {
    const sanitizer = new ErrorSanitizer(false)

    it('keeps the message of a client error', () => {
      expect(sanitizer.sanitize(new NotFoundError('Post'))).toEqual({
        error: 'Client Error',
        message: 'Post not found',
        statusCode: 404,
      })
    })

    it('hides server error details', () => {
      expect(sanitizer.sanitize(new Error('disk failed at /srv/app/db.ts'))).toEqual({
        error: 'Server Error',
        message: 'Internal server error',
        statusCode: 500,
      })
    })

    it('strips email addresses from client messages', () => {
      const result = sanitizer.sanitize(new ValidationError('Bad address bob@example.com'))
      expect(result.message).toBe('Bad address [EMAIL]')
    })

    it('treats thrown non-errors as server errors', () => {
      expect(sanitizer.sanitize('boom')).toEqual({
        error: 'Internal Server Error',
        message: 'An error occurred',
        statusCode: 500,
      })
    })

    it('honours a statusCode property on plain errors', () => {
      const error = Object.assign(new Error('Slow down'), { statusCode: 429 })
      expect(sanitizer.getStatusCode(error)).toBe(429)
    })
  })

  describe('development mode', () => {
    const sanitizer = new ErrorSanitizer(true)

    it('includes the error name and code', () => {
      expect(sanitizer.sanitize(new ConflictError('Username already taken'))).toEqual({
        error: 'ConflictError',
        message: 'Username already taken',
        code: 'CONFLICT',
        statusCode: 409,
      })
    })

    it('still removes file paths and database error names', () => {
      expect(sanitizer.sanitize(new Error('Failed at /srv/app/db.ts')).message).toBe('Failed at [PATH]')
      expect(sanitizer.sanitize(new Error('SQLITE_CONSTRAINT: UNIQUE constraint failed')).message).toBe(
        'Database: UNIQUE constraint failed'
      )
    })
  })

  describe('shouldLog', () => {
    const sanitizer = new ErrorSanitizer()

    it('logs server errors and forbidden requests', () => {
      expect(sanitizer.shouldLog(new Error('boom'))).toBe(true)
      expect(sanitizer.shouldLog(new CsrfError())).toBe(true)
    })

    it('does not log missing pages', () => {
      expect(sanitizer.shouldLog(new NotFoundError('Page'))).toBe(false)
    })
  })

  describe('getLogDetails', () => {
    it('includes the cause when there is one', () => {
      const details = new ErrorSanitizer().getLogDetails(new Error('outer', { cause: 'inner' }))
      expect(details.message).toBe('outer')
      expect(details.cause).toBe('inner')
    })
  })
})
