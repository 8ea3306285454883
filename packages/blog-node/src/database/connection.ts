/**
 * Database Connection
 *
 * Opens the SQLite database through better-sqlite3, enables foreign keys
 * and applies pending migrations.
 */

import Database from 'better-sqlite3'
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3'
import { sql } from 'drizzle-orm'
import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import * as schema from './schema.js'
import { runMigrations } from './migrations.js'

export type BlogDatabase = BetterSQLite3Database<typeof schema>

export interface DatabaseConfig {
  /**
   * File path, or `:memory:`
   */
  path: string
  migrationsDir?: string
}

export const IN_MEMORY = ':memory:'

export class DatabaseConnection {
  private sqlite?: Database.Database
  private database?: BlogDatabase

  constructor(private config: DatabaseConfig) {}

  /**
   * Open the database and bring its schema up to date
   */
  connect(): BlogDatabase {
    if (this.database) {
      return this.database
    }

    const { path } = this.config
    if (path !== IN_MEMORY) {
      mkdirSync(dirname(path), { recursive: true })
    }

    const sqlite = new Database(path)
    sqlite.pragma('foreign_keys = ON')
    if (path !== IN_MEMORY) {
      sqlite.pragma('journal_mode = WAL')
    }

    const database = drizzle(sqlite, { schema })
    const applied = runMigrations(database, this.config.migrationsDir)
    this.sqlite = sqlite
    this.database = database

    if (path !== IN_MEMORY) {
      console.log(`✅ Connected to SQLite database: ${path}`)
    }
    if (applied > 0 && path !== IN_MEMORY) {
      console.log(`✅ Applied ${applied} migration(s)`)
    }

    return database
  }

  /**
   * The underlying better-sqlite3 handle, shared with better-auth
   */
  get client(): Database.Database {
    if (!this.sqlite) {
      throw new Error('Database connection not initialized')
    }
    return this.sqlite
  }

  get db(): BlogDatabase {
    if (!this.database) {
      throw new Error('Database connection not initialized')
    }
    return this.database
  }

  /**
   * Lightweight health check to ensure the database connection is alive
   */
  healthCheck(): boolean {
    try {
      this.db.get(sql`SELECT 1`)
      return true
    } catch (error) {
      console.error('Database health check failed:', error)
      return false
    }
  }

  close(): void {
    this.sqlite?.close()
    this.sqlite = undefined
    this.database = undefined
  }
}
