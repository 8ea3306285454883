/**
 * Engine Types
 *
 * Configuration and state of the blog runtime.
 */

import type { HttpBindings } from '@hono/node-server'

export type Environment = 'development' | 'production' | 'test'

export interface EngineConfig {
  port: number
  host: string
  databasePath: string
  uploadDir: string
  auditLogPath: string
  postsPerPage: number
  sessionTtlSeconds: number
  /**
   * Signs session cookies
   */
  authSecret: string
  /**
   * Public origin the site is served from
   */
  baseUrl: string
  environment: Environment
  siteName: string
}

export interface EngineState {
  status: 'starting' | 'running' | 'stopping' | 'stopped'
  startedAt?: Date
  version: string
}

export interface HealthStatus {
  healthy: boolean
  database: boolean
  uptime: number
  memory: NodeJS.MemoryUsage
}

/**
 * Hono environment shared by the middleware and routes. Bindings are
 * present only when served by @hono/node-server.
 */
export interface BlogEnv {
  Bindings: Partial<HttpBindings>
  Variables: {
    requestId: string
    csrfToken: string | undefined
  }
}
