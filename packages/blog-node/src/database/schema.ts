/**
 * Database Schema
 *
 * Drizzle table definitions for the blog. Foreign keys carry the deletion
 * policy: removing a user cascades to their posts, comments, sessions and
 * accounts; removing a category or location only clears the reference on
 * posts.
 *
 * `users`, `sessions`, `accounts` and `verifications` are shared with
 * better-auth, which writes them through its own adapter.
 */

import { sql } from 'drizzle-orm'
import { customType, index, integer, sqliteTable, text } from 'drizzle-orm/sqlite-core'

const createdAt = () =>
  integer('created_at', { mode: 'timestamp_ms' })
    .notNull()
    .default(sql`(cast(unixepoch('subsec') * 1000 as integer))`)

const isPublished = () => integer('is_published', { mode: 'boolean' }).notNull().default(true)

/**
 * Instant stored as ISO-8601 text, the format better-auth writes on SQLite
 */
const isoTimestamp = customType<{ data: Date; driverData: string }>({
  dataType() {
    return 'text'
  },
  toDriver(value) {
    return value.toISOString()
  },
  fromDriver(value) {
    return new Date(value)
  },
})

const authTimestamps = () => ({
  createdAt: isoTimestamp('created_at')
    .notNull()
    .$defaultFn(() => new Date()),
  updatedAt: isoTimestamp('updated_at')
    .notNull()
    .$defaultFn(() => new Date())
    .$onUpdateFn(() => new Date()),
})

export const users = sqliteTable('users', {
  id: text('id').primaryKey(),
  name: text('name').notNull().default(''),
  email: text('email').notNull().default(''),
  emailVerified: integer('email_verified', { mode: 'boolean' }).notNull().default(false),
  image: text('image'),
  username: text('username').notNull().unique(),
  displayUsername: text('display_username'),
  firstName: text('first_name').notNull().default(''),
  lastName: text('last_name').notNull().default(''),
  ...authTimestamps(),
})

export const sessions = sqliteTable(
  'sessions',
  {
    id: text('id').primaryKey(),
    token: text('token').notNull().unique(),
    userId: text('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    expiresAt: isoTimestamp('expires_at').notNull(),
    ipAddress: text('ip_address'),
    userAgent: text('user_agent'),
    ...authTimestamps(),
  },
  (table) => ({
    userIdx: index('sessions_user_id_idx').on(table.userId),
  })
)

/**
 * Credentials per sign-in method; email and password keeps the hash in `password`
 */
export const accounts = sqliteTable(
  'accounts',
  {
    id: text('id').primaryKey(),
    accountId: text('account_id').notNull(),
    providerId: text('provider_id').notNull(),
    userId: text('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    accessToken: text('access_token'),
    refreshToken: text('refresh_token'),
    idToken: text('id_token'),
    accessTokenExpiresAt: isoTimestamp('access_token_expires_at'),
    refreshTokenExpiresAt: isoTimestamp('refresh_token_expires_at'),
    scope: text('scope'),
    password: text('password'),
    ...authTimestamps(),
  },
  (table) => ({
    userIdx: index('accounts_user_id_idx').on(table.userId),
  })
)

export const verifications = sqliteTable('verifications', {
  id: text('id').primaryKey(),
  identifier: text('identifier').notNull(),
  value: text('value').notNull(),
  expiresAt: isoTimestamp('expires_at').notNull(),
  createdAt: isoTimestamp('created_at'),
  updatedAt: isoTimestamp('updated_at'),
})

export const locations = sqliteTable('locations', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  name: text('name').notNull(),
  isPublished: isPublished(),
  createdAt: createdAt(),
})

export const categories = sqliteTable('categories', {
  id: integer('id').primaryKey({ autoIncrement: true }),
  title: text('title').notNull(),
  description: text('description').notNull(),
  slug: text('slug').notNull().unique(),
  isPublished: isPublished(),
  createdAt: createdAt(),
})

export const posts = sqliteTable(
  'posts',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    title: text('title').notNull(),
    text: text('text').notNull(),
    pubDate: integer('pub_date', { mode: 'timestamp_ms' }).notNull(),
    authorId: text('author_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    locationId: integer('location_id').references(() => locations.id, { onDelete: 'set null' }),
    categoryId: integer('category_id').references(() => categories.id, { onDelete: 'set null' }),
    image: text('image'),
    isPublished: isPublished(),
    createdAt: createdAt(),
  },
  (table) => ({
    authorIdx: index('posts_author_id_idx').on(table.authorId),
    categoryIdx: index('posts_category_id_idx').on(table.categoryId),
    pubDateIdx: index('posts_pub_date_idx').on(table.pubDate),
  })
)

export const comments = sqliteTable(
  'comments',
  {
    id: integer('id').primaryKey({ autoIncrement: true }),
    text: text('text').notNull(),
    postId: integer('post_id')
      .notNull()
      .references(() => posts.id, { onDelete: 'cascade' }),
    authorId: text('author_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    createdAt: createdAt(),
  },
  (table) => ({
    postIdx: index('comments_post_id_idx').on(table.postId),
  })
)
