import {
  BlogRequestHandler,
  CSRF_ISSUED_HEADER,
  type BlogRequestHandlerConfig,
  type FormBody,
  type HttpRequest,
  type HttpResponse,
} from '@scrivener/blog-core'
import type { MiddlewareHandler } from 'hono'
import type { BlogEnv } from '../types/index.js'
import { getClientIp } from '../engine/server-security.js'

/**
 * Per-request facts established by the HTTP middleware
 */
export interface RequestExtras {
  requestId?: string
  csrfToken?: string
  clientIp?: string
}

/**
 * Bridges fetch-style requests to the core BlogRequestHandler.
 */
export class BlogHttpAdapter {
  private requestHandler: BlogRequestHandler

  constructor(config: BlogRequestHandlerConfig | BlogRequestHandler) {
    this.requestHandler = config instanceof BlogRequestHandler ? config : new BlogRequestHandler(config)
  }

  /**
   * Convenience helper to plug the adapter directly into a Hono route.
   */
  toMiddleware(): MiddlewareHandler<BlogEnv> {
    return async (c) => {
      return this.handle(c.req.raw, {
        requestId: c.get('requestId'),
        csrfToken: c.get('csrfToken'),
        clientIp: getClientIp(c),
      })
    }
  }

  async handle(request: Request, extras: RequestExtras = {}): Promise<Response> {
    const httpRequest = await this.convertRequest(request, extras)
    const httpResponse = await this.requestHandler.handle(httpRequest)
    return this.convertResponse(httpResponse)
  }

  /**
   * Convert Request to the HttpRequest the core handler expects.
   * Headers the middleware owns are overwritten, never taken from the client.
   */
  private async convertRequest(request: Request, extras: RequestExtras): Promise<HttpRequest> {
    const headers: Record<string, string | undefined> = {}
    request.headers.forEach((value, key) => {
      headers[key] = value
    })
    headers[CSRF_ISSUED_HEADER] = extras.csrfToken
    if (extras.requestId) {
      headers['x-request-id'] = extras.requestId
    }
    if (extras.clientIp && extras.clientIp !== 'unknown') {
      headers['x-real-ip'] = extras.clientIp
    }

    return {
      method: request.method,
      url: request.url,
      headers,
      body: await this.readForm(request),
    }
  }

  private async readForm(request: Request): Promise<FormBody | undefined> {
    const method = request.method.toUpperCase()
    const contentType = request.headers.get('content-type') || ''
    if (method === 'GET' || method === 'HEAD') {
      return undefined
    }
    if (
      !contentType.includes('application/x-www-form-urlencoded') &&
      !contentType.includes('multipart/form-data')
    ) {
      return {}
    }

    const formData = await request.formData()
    const body: FormBody = {}
    formData.forEach((value, key) => {
      if (key in body) {
        return
      }
      if (typeof value === 'string') {
        body[key] = value
      } else if (value.name !== '' || value.size > 0) {
        // An empty file input arrives as a nameless, empty file
        body[key] = value
      }
    })
    return body
  }

  private convertResponse(httpResponse: HttpResponse): Response {
    const headers = new Headers()
    for (const [key, value] of Object.entries(httpResponse.headers)) {
      headers.set(key, value)
    }
    for (const cookie of httpResponse.cookies ?? []) {
      headers.append('Set-Cookie', cookie)
    }

    return new Response(httpResponse.body || null, {
      status: httpResponse.status,
      headers,
    })
  }
}
