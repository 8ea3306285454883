/**
 * Scrivener Blog Node Runtime
 *
 * SQLite storage, session authentication and the Hono HTTP server.
 */

export { BlogEngine, type BlogEngineOptions } from './engine.js'
export * from './types/index.js'
export * from './config/config.js'
export * from './database/index.js'
export * from './auth/index.js'
export * from './security/index.js'
export * from './errors/index.js'
export * from './storage/index.js'
export * from './engine/index.js'
export * from './server/blog-http-adapter.js'
