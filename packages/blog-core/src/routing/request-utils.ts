/**
 * Request Utilities
 *
 * Standalone helpers for response building, cookie and flash handling.
 */

import type { FlashMessage, HttpRequest, HttpResponse } from './request-ports.js'

export const FLASH_COOKIE = 'flash'
export const CSRF_COOKIE = 'csrf-token'
export const CSRF_FIELD = '_csrf'
export const CSRF_HEADER = 'x-csrf-token'
/**
 * Set by the HTTP layer when it issues a token during the current request
 */
export const CSRF_ISSUED_HEADER = 'x-scrivener-csrf-token'

export function htmlResponse(
  status: number,
  html: string,
  headers: Record<string, string> = {},
  cookies: string[] = []
): HttpResponse {
  return {
    status,
    headers: { 'Content-Type': 'text/html; charset=utf-8', ...headers },
    cookies,
    body: html,
  }
}

export function redirectResponse(location: string, cookies: string[] = []): HttpResponse {
  return {
    status: 303,
    headers: { Location: location },
    cookies,
    body: '',
  }
}

export function parseCookies(cookieHeader: string): Record<string, string> {
  return cookieHeader.split(';').reduce<Record<string, string>>((acc, part) => {
    const [name, ...rest] = part.split('=')
    if (!name?.trim()) return acc
    acc[name.trim()] = rest.join('=').trim()
    return acc
  }, {})
}

export function getCookie(request: HttpRequest, name: string): string | undefined {
  const cookieHeader = request.headers['cookie'] ?? request.headers['Cookie']
  if (!cookieHeader) {
    return undefined
  }
  return parseCookies(cookieHeader)[name]
}

export function getFlashMessage(request: HttpRequest): FlashMessage | undefined {
  const raw = getCookie(request, FLASH_COOKIE)
  if (!raw) {
    return undefined
  }

  try {
    const parsed: unknown = JSON.parse(decodeURIComponent(raw))
    if (isFlashMessage(parsed)) {
      return parsed
    }
  } catch {
    // A mangled flash cookie is dropped
    return undefined
  }

  return undefined
}

function isFlashMessage(value: unknown): value is FlashMessage {
  if (typeof value !== 'object' || value === null) {
    return false
  }
  const type = 'type' in value ? value.type : undefined
  const text = 'text' in value ? value.text : undefined
  return typeof text === 'string' && (type === 'success' || type === 'error' || type === 'info')
}

export function flashCookieHeader(message: FlashMessage): string {
  return `${FLASH_COOKIE}=${encodeURIComponent(JSON.stringify(message))}; Path=/; HttpOnly; SameSite=Lax`
}

export function clearFlashCookieHeader(): string {
  return `${FLASH_COOKIE}=; Path=/; Max-Age=0; HttpOnly; SameSite=Lax`
}

/**
 * CSRF token issued to this client, if any
 */
export function getCsrfToken(request: HttpRequest): string | undefined {
  const issued = request.headers[CSRF_ISSUED_HEADER]
  if (issued) {
    return issued
  }
  return getCookie(request, CSRF_COOKIE)
}

export function extractIp(request: HttpRequest): string {
  return request.headers['x-forwarded-for']?.split(',')[0]?.trim() ||
    request.headers['x-real-ip'] ||
    'unknown'
}

export function getPathname(request: HttpRequest): string {
  return new URL(request.url, 'http://localhost').pathname
}

export function getSearchParam(request: HttpRequest, name: string): string | null {
  return new URL(request.url, 'http://localhost').searchParams.get(name)
}

const REDIRECT_ORIGIN = 'http://localhost'

// Browsers drop tabs and newlines from URLs before resolving them
const URL_IGNORED_CHARACTERS = /[\t\n\r]/

/**
 * Only same-site absolute paths are accepted as redirect targets
 */
export function isSafeRedirect(target: string | null | undefined): target is string {
  if (!target || !target.startsWith('/') || URL_IGNORED_CHARACTERS.test(target)) {
    return false
  }
  if (target.startsWith('//') || target.startsWith('/\\')) {
    return false
  }
  try {
    return new URL(target, REDIRECT_ORIGIN).origin === REDIRECT_ORIGIN
  } catch {
    return false
  }
}
