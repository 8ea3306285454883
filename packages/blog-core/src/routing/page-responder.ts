/**
 * Page Responder
 *
 * Builds an HTML response for a rendered page with the per-request chrome:
 * viewer, CSRF token and the one-shot flash message.
 */

import type { UserSession } from '../auth/provider.js'
import type { BlogPage } from '../renderer/html-renderer.js'
import type { PageContext } from '../renderer/document-wrapper.js'
import type { HttpRequest, HttpResponse, RendererPort } from './request-ports.js'
import { clearFlashCookieHeader, getCsrfToken, getFlashMessage, getPathname, htmlResponse } from './request-utils.js'
import { viewerOf } from './session-resolver.js'

export function buildPageContext(request: HttpRequest, session: UserSession | null): PageContext {
  return {
    viewer: viewerOf(session),
    currentPath: getPathname(request),
    csrfToken: getCsrfToken(request),
    flash: getFlashMessage(request),
  }
}

export function respondWithPage(
  renderer: RendererPort,
  request: HttpRequest,
  session: UserSession | null,
  page: BlogPage,
  status = 200,
  cookies: string[] = []
): HttpResponse {
  const context = buildPageContext(request, session)
  const body = renderer.renderPage(page, context)
  const outgoing = context.flash ? [...cookies, clearFlashCookieHeader()] : cookies
  return htmlResponse(status, body, {}, outgoing)
}
