/**
 * Serve Command
 *
 * Runs the blog HTTP server until interrupted.
 */

import { resolve } from 'node:path'
import { BlogEngine, loadConfig } from '@scrivener/blog-node'

export interface ServeOptions {
  port?: number
  host?: string
  database?: string
}

export async function serveCommand(options: ServeOptions = {}): Promise<void> {
  const config = loadConfig(process.env, {
    port: options.port,
    host: options.host,
    databasePath: options.database ? resolve(process.cwd(), options.database) : undefined,
  })

  const engine = new BlogEngine(config)

  const shutdown = async () => {
    console.log('\n\n👋 Shutting down...')
    await engine.stop()
    process.exit(0)
  }

  // Handle shutdown gracefully
  process.on('SIGINT', shutdown)
  process.on('SIGTERM', shutdown)

  try {
    await engine.start()
  } catch (error) {
    console.error('Failed to start engine:', error)
    process.exit(1)
  }
}
