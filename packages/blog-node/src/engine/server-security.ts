import type { Context } from 'hono'
import { getCookie, setCookie } from 'hono/cookie'
import { randomUUID, timingSafeEqual } from 'node:crypto'
import { CSRF_COOKIE, CSRF_FIELD, CSRF_HEADER } from '@scrivener/blog-core'
import type { BlogEnv } from '../types/index.js'

export type CsrfCheck =
  | { ok: true; issuedToken?: string }
  | { ok: false; reason: string }

export interface CsrfOptions {
  cookieName?: string
  secure?: boolean
}

const SAFE_METHODS = new Set(['GET', 'HEAD', 'OPTIONS', 'TRACE'])

export function getClientIp(c: Context<BlogEnv>): string {
  const forwarded = c.req.header('x-forwarded-for')
  if (forwarded) {
    return forwarded.split(',')[0]?.trim() || 'unknown'
  }
  return c.env?.incoming?.socket.remoteAddress || 'unknown'
}

/**
 * Token submitted with a form post, from the `_csrf` field
 */
export async function extractCsrfToken(c: Context<BlogEnv>): Promise<string | undefined> {
  const contentType = c.req.header('content-type') || ''
  if (
    !contentType.includes('application/x-www-form-urlencoded') &&
    !contentType.includes('multipart/form-data')
  ) {
    return undefined
  }

  try {
    const form = await c.req.raw.clone().formData()
    const value = form.get(CSRF_FIELD)
    return typeof value === 'string' ? value : undefined
  } catch (error) {
    console.warn('Could not read form body for CSRF token:', error)
    return undefined
  }
}

export function normalizeCsrfToken(value: string | undefined): string | undefined {
  if (!value) {
    return undefined
  }
  const trimmed = value.trim()
  if (!trimmed) {
    return undefined
  }
  if ((trimmed.startsWith('"') && trimmed.endsWith('"')) || (trimmed.startsWith("'") && trimmed.endsWith("'"))) {
    return trimmed.slice(1, -1)
  }
  return trimmed
}

function tokensMatch(expected: string, submitted: string): boolean {
  const a = Buffer.from(expected)
  const b = Buffer.from(submitted)
  return a.length === b.length && timingSafeEqual(a, b)
}

/**
 * Double-submit CSRF check. Safe requests expose the current token as the
 * `csrfToken` variable, minting one when the client has none
 * (`issuedToken`, to be sent with `setCsrfCookie`); unsafe ones must echo
 * the cookie value in the `_csrf` field or the header.
 */
export async function applyCsrfProtection(c: Context<BlogEnv>, options: CsrfOptions = {}): Promise<CsrfCheck> {
  const cookieName = options.cookieName ?? CSRF_COOKIE
  const existingToken = normalizeCsrfToken(getCookie(c, cookieName))

  if (SAFE_METHODS.has(c.req.method.toUpperCase())) {
    if (existingToken) {
      c.set('csrfToken', existingToken)
      return { ok: true }
    }
    const issuedToken = randomUUID()
    c.set('csrfToken', issuedToken)
    return { ok: true, issuedToken }
  }

  if (!existingToken) {
    return { ok: false, reason: 'CSRF cookie not set.' }
  }

  const submittedToken = normalizeCsrfToken(c.req.header(CSRF_HEADER) || (await extractCsrfToken(c)))
  if (!submittedToken) {
    return { ok: false, reason: 'CSRF token missing.' }
  }
  if (!tokensMatch(existingToken, submittedToken)) {
    return { ok: false, reason: 'CSRF token incorrect.' }
  }

  c.set('csrfToken', existingToken)
  return { ok: true }
}

export function setCsrfCookie(c: Context<BlogEnv>, token: string, options: CsrfOptions = {}): void {
  setCookie(c, options.cookieName ?? CSRF_COOKIE, token, {
    httpOnly: true,
    sameSite: 'Lax',
    secure: options.secure ?? false,
    path: '/',
    maxAge: 60 * 60 * 24 * 365,
  })
}

export function applySecurityHeaders(c: Context<BlogEnv>, requestId: string): void {
  const csp = [
    "default-src 'self'",
    "script-src 'self'",
    "style-src 'self' 'unsafe-inline' https://cdn.jsdelivr.net",
    "img-src 'self' data:",
    "form-action 'self'",
    "frame-ancestors 'none'",
  ].join('; ')

  c.header('X-Request-ID', requestId)
  c.header('Content-Security-Policy', csp)
  c.header('X-Content-Type-Options', 'nosniff')
  c.header('X-Frame-Options', 'DENY')
  c.header('Referrer-Policy', 'same-origin')
}
