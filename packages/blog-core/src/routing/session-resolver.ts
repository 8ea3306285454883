/**
 * Session Resolver
 *
 * Session retrieval and login redirect building.
 */

import type { UserSession } from '../auth/provider.js'
import type { Viewer } from '../types/blog.js'
import type { HttpRequest, SessionManagerPort } from './request-ports.js'

export const LOGIN_PATH = '/auth/login/'

/**
 * Resolve the current session from the request.
 * A failing session store is treated as anonymous.
 */
export async function resolveSession(
  request: HttpRequest,
  sessionManager?: SessionManagerPort
): Promise<UserSession | null> {
  if (!sessionManager) {
    return null
  }

  try {
    return await sessionManager.getSession(request)
  } catch (error) {
    console.error('Session retrieval error:', error)
    return null
  }
}

export function viewerOf(session: UserSession | null): Viewer {
  return session ? { id: session.user.id, username: session.user.username } : null
}

/**
 * Path plus query string of the request, used as the `next` target
 */
export function getCallbackPath(request: HttpRequest): string {
  const url = new URL(request.url, 'http://localhost')
  return url.pathname + url.search
}

export function buildLoginRedirect(request: HttpRequest): string {
  return `${LOGIN_PATH}?next=${encodeURIComponent(getCallbackPath(request))}`
}
