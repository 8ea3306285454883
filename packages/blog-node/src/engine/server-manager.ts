import { Hono } from 'hono'
import type { Context } from 'hono'
import { serve, type ServerType } from '@hono/node-server'
import { ulid } from 'ulid'
import { promises as fs } from 'node:fs'
import { CsrfError, type AuditLoggerPort, type BlogPage, type RendererPort } from '@scrivener/blog-core'
import type { BlogEnv, EngineConfig, HealthStatus } from '../types/index.js'
import type { ErrorHandler } from '../errors/index.js'
import type { FileStorage } from '../storage/index.js'
import type { BlogHttpAdapter } from '../server/blog-http-adapter.js'
import { applyCsrfProtection, applySecurityHeaders, getClientIp, setCsrfCookie } from './server-security.js'

export interface ServerManagerDependencies {
  config: Pick<EngineConfig, 'port' | 'host' | 'environment'>
  adapter: BlogHttpAdapter
  renderer: RendererPort
  errorHandler: ErrorHandler
  imageStorage: FileStorage
  auditLogger?: AuditLoggerPort
  getHealthStatus: () => Promise<HealthStatus>
}

export class ServerManager {
  private server?: ServerType
  private secureCookies: boolean

  constructor(private deps: ServerManagerDependencies) {
    this.secureCookies = deps.config.environment === 'production'
  }

  /**
   * Build the Hono application without binding a port
   */
  createApp(): Hono<BlogEnv> {
    const app = new Hono<BlogEnv>()
    app.onError(this.deps.errorHandler.toHonoHandler())
    this.registerGlobalMiddleware(app)
    this.registerRoutes(app)
    return app
  }

  async start(): Promise<ServerType> {
    const app = this.createApp()
    const { port, host } = this.deps.config

    this.server = serve(
      {
        fetch: app.fetch,
        port,
        hostname: host,
      },
      () => {
        console.log(`✅ HTTP Server listening on ${host}:${port}`)
      }
    )

    return this.server
  }

  async stop(): Promise<void> {
    const server = this.server
    if (!server) {
      return
    }

    await new Promise<void>((resolve, reject) => {
      server.close((err?: Error) => {
        if (err) reject(err)
        else resolve()
      })
    })
    this.server = undefined
  }

  getServer(): ServerType | undefined {
    return this.server
  }

  private registerGlobalMiddleware(app: Hono<BlogEnv>): void {
    app.use('*', async (c, next) => {
      const requestId = ulid()
      c.set('requestId', requestId)

      const csrf = await applyCsrfProtection(c, { secure: this.secureCookies })
      try {
        if (csrf.ok) {
          await next()
        } else {
          this.deps.auditLogger?.log({
            eventType: 'CSRF_VIOLATION',
            severity: 'WARNING',
            action: `CSRF check failed: ${csrf.reason}`,
            resource: c.req.path,
            success: false,
            ipAddress: getClientIp(c),
            userAgent: c.req.header('user-agent'),
          })
          c.res = await this.deps.errorHandler.handle(new CsrfError(csrf.reason), c.req.raw, requestId)
        }
      } finally {
        // Set after the handler so the cookie survives its Response
        if (csrf.ok && csrf.issuedToken) {
          setCsrfCookie(c, csrf.issuedToken, { secure: this.secureCookies })
        }
        applySecurityHeaders(c, requestId)
      }
    })
  }

  private registerRoutes(app: Hono<BlogEnv>): void {
    app.get('/health', async () => {
      const health = await this.deps.getHealthStatus()
      return Response.json(health, { status: health.healthy ? 200 : 503 })
    })

    app.get('/uploads/*', async (c) => {
      const file = await this.deps.imageStorage.getFile(c.req.path)
      if (!file) {
        return this.renderPage(c, { kind: 'not-found', path: c.req.path }, 404)
      }
      const data = await fs.readFile(file.path)
      return new Response(new Uint8Array(data), {
        status: 200,
        headers: { 'Content-Type': file.mimeType },
      })
    })

    app.all('*', this.deps.adapter.toMiddleware())
  }

  private renderPage(c: Context<BlogEnv>, page: BlogPage, status: number): Response {
    const body = this.deps.renderer.renderPage(page, {
      viewer: null,
      currentPath: c.req.path,
      csrfToken: c.get('csrfToken'),
    })
    return new Response(body, {
      status,
      headers: { 'Content-Type': 'text/html; charset=utf-8' },
    })
  }
}
