/**
 * Scrivener Blog Engine
 *
 * Wires storage, authentication, rendering and the HTTP server together.
 */

import type { Hono } from 'hono'
import type { ServerType } from '@hono/node-server'
import { BlogRequestHandler, ErrorSanitizer, HTMLRenderer, type RendererPort } from '@scrivener/blog-core'
import { DatabaseConnection, DrizzleBlogRepository } from './database/index.js'
import { SessionAuthProvider } from './auth/index.js'
import { AuditLogger } from './security/index.js'
import { ErrorHandler } from './errors/index.js'
import { FileStorage } from './storage/index.js'
import { BlogHttpAdapter } from './server/blog-http-adapter.js'
import { ServerManager } from './engine/index.js'
import type { BlogEnv, EngineConfig, EngineState, HealthStatus } from './types/index.js'

const ENGINE_VERSION = '0.1.0'

export interface BlogEngineOptions {
  renderer?: RendererPort
  clock?: () => Date
}

export class BlogEngine {
  private state: EngineState
  private config: EngineConfig
  private renderer: RendererPort
  private clock?: () => Date
  private database: DatabaseConnection
  private auditLogger: AuditLogger
  private errorSanitizer: ErrorSanitizer
  private errorHandler: ErrorHandler
  private fileStorage: FileStorage
  private authProvider?: SessionAuthProvider
  private serverManager?: ServerManager
  private server?: ServerType

  constructor(config: EngineConfig, options: BlogEngineOptions = {}) {
    this.config = config
    this.state = {
      status: 'stopped',
      version: ENGINE_VERSION,
    }
    this.renderer = options.renderer ?? new HTMLRenderer(config.siteName)
    this.clock = options.clock

    this.database = new DatabaseConnection({ path: config.databasePath })
    this.fileStorage = new FileStorage({ uploadDir: config.uploadDir })
    this.auditLogger = new AuditLogger({
      logPath: config.auditLogPath,
      enabled: config.environment !== 'test',
      echo: config.environment === 'development',
    })
    this.errorSanitizer = new ErrorSanitizer(config.environment !== 'production')
    this.errorHandler = new ErrorHandler({
      sanitizer: this.errorSanitizer,
      renderer: this.renderer,
      showDetails: config.environment === 'development',
    })
  }

  /**
   * Open storage and build the HTTP application without listening
   */
  async initialize(): Promise<Hono<BlogEnv>> {
    const db = this.database.connect()
    await this.fileStorage.initialize()

    this.authProvider = new SessionAuthProvider({
      database: this.database,
      secret: this.config.authSecret,
      baseURL: this.config.baseUrl,
      sessionTtlSeconds: this.config.sessionTtlSeconds,
      secureCookies: this.config.environment === 'production',
    })

    const adapter = new BlogHttpAdapter(
      new BlogRequestHandler({
        repository: new DrizzleBlogRepository(db),
        authProvider: this.authProvider,
        renderer: this.renderer,
        auditLogger: this.auditLogger,
        imageStorage: this.fileStorage,
        errorSanitizer: this.errorSanitizer,
        postsPerPage: this.config.postsPerPage,
        showErrorDetails: this.config.environment === 'development',
        clock: this.clock,
      })
    )

    this.serverManager = new ServerManager({
      config: this.config,
      adapter,
      renderer: this.renderer,
      errorHandler: this.errorHandler,
      imageStorage: this.fileStorage,
      auditLogger: this.auditLogger,
      getHealthStatus: () => this.getHealth(),
    })

    return this.serverManager.createApp()
  }

  /**
   * Start the engine
   */
  async start(): Promise<void> {
    console.log('🚀 Starting Scrivener...\n')

    try {
      this.state.status = 'starting'
      await this.initialize()
      if (!this.serverManager) {
        throw new Error('Server manager not initialized')
      }
      this.server = await this.serverManager.start()

      // Sessions that expired while the server was down
      await this.authProvider?.cleanup()

      this.state.status = 'running'
      this.state.startedAt = new Date()

      console.log('\n✅ Engine ready!')
      console.log(`📱 Server: http://${this.config.host}:${this.config.port}`)
      console.log()
    } catch (error) {
      console.error('❌ Failed to start engine:', error)
      this.state.status = 'stopped'
      this.database.close()
      throw error
    }
  }

  /**
   * Stop the engine
   */
  async stop(): Promise<void> {
    if (this.state.status === 'stopping') {
      return
    }

    console.log('👋 Stopping Scrivener...')
    this.state.status = 'stopping'

    await this.serverManager?.stop()
    await this.authProvider?.cleanup()
    this.database.close()
    this.server = undefined

    this.state.status = 'stopped'
    console.log('✅ Engine stopped')
  }

  getState(): EngineState {
    return { ...this.state }
  }

  getServer(): ServerType | undefined {
    return this.server
  }

  async getHealth(): Promise<HealthStatus> {
    const database = this.database.healthCheck()
    return {
      healthy: database,
      database,
      uptime: this.state.startedAt ? Date.now() - this.state.startedAt.getTime() : 0,
      memory: process.memoryUsage(),
    }
  }
}
