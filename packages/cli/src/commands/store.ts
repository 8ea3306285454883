/**
 * Opens the blog database for one-off administrative commands.
 */

import { resolve } from 'node:path'
import {
  DatabaseConnection,
  DrizzleBlogRepository,
  SessionAuthProvider,
  loadConfig,
} from '@scrivener/blog-node'

export interface StoreOptions {
  database?: string
}

export interface BlogStore {
  repository: DrizzleBlogRepository
  authProvider: SessionAuthProvider
  close(): void
}

export function openStore(options: StoreOptions = {}): BlogStore {
  const config = loadConfig()
  const databasePath = options.database ? resolve(process.cwd(), options.database) : config.databasePath

  const connection = new DatabaseConnection({ path: databasePath })
  const db = connection.connect()

  return {
    repository: new DrizzleBlogRepository(db),
    authProvider: new SessionAuthProvider({
      database: connection,
      secret: config.authSecret,
      baseURL: config.baseUrl,
    }),
    close: () => connection.close(),
  }
}

/**
 * Run `fn` against an open store and always close it afterwards
 */
export async function withStore<T>(options: StoreOptions, fn: (store: BlogStore) => Promise<T>): Promise<T> {
  const store = openStore(options)
  try {
    return await fn(store)
  } finally {
    store.close()
  }
}
