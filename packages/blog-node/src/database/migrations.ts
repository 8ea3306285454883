/**
 * Schema Migrations
 *
 * Applies the SQL files listed in `migrations/meta/_journal.json` through
 * drizzle's migrator. Applied files are recorded in the
 * `__scrivener_migrations` table, so each runs at most once per database.
 */

import { fileURLToPath } from 'node:url'
import { sql } from 'drizzle-orm'
import { migrate } from 'drizzle-orm/better-sqlite3/migrator'
import type { BlogDatabase } from './connection.js'

export const MIGRATIONS_TABLE = '__scrivener_migrations'

export const DEFAULT_MIGRATIONS_DIR = fileURLToPath(new URL('../../migrations/', import.meta.url))

/**
 * Apply pending migrations and return how many ran
 */
export function runMigrations(db: BlogDatabase, migrationsFolder: string = DEFAULT_MIGRATIONS_DIR): number {
  const before = countAppliedMigrations(db)
  migrate(db, { migrationsFolder, migrationsTable: MIGRATIONS_TABLE })
  return countAppliedMigrations(db) - before
}

export function countAppliedMigrations(db: BlogDatabase): number {
  const table = db.get<{ name: string } | undefined>(
    sql`SELECT name FROM sqlite_master WHERE type = 'table' AND name = ${MIGRATIONS_TABLE}`
  )
  if (!table) {
    return 0
  }
  const row = db.get<{ count: number }>(sql`SELECT count(*) AS count FROM ${sql.identifier(MIGRATIONS_TABLE)}`)
  return row.count
}
