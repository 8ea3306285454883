/**
 * Better Auth Configuration
 *
 * Configures Better Auth on the blog's own SQLite database: username and
 * password sign-in, sessions in the `sessions` table, snake_case columns.
 */

import { betterAuth } from 'better-auth'
import { username } from 'better-auth/plugins'
import type Database from 'better-sqlite3'
import { MIN_PASSWORD_LENGTH, NAME_MAX_LENGTH, USERNAME_PATTERN } from '@scrivener/blog-core'

export const AUTH_COOKIE_PREFIX = 'scrivener'
export const SESSION_COOKIE = `${AUTH_COOKIE_PREFIX}.session_token`
export const DEFAULT_SESSION_TTL_SECONDS = 60 * 60 * 24 * 14 // 14 days

export interface BlogAuthConfig {
  database: Database.Database
  secret: string
  baseURL: string
  sessionTtlSeconds?: number
  secureCookies?: boolean
}

/**
 * Create the Better Auth instance for the blog
 */
export function createBlogAuth(config: BlogAuthConfig) {
  return betterAuth({
    database: config.database,
    baseURL: config.baseURL,
    secret: config.secret,
    emailAndPassword: {
      enabled: true,
      minPasswordLength: MIN_PASSWORD_LENGTH,
      maxPasswordLength: 128,
      autoSignIn: false,
    },
    user: {
      modelName: 'users',
      fields: {
        emailVerified: 'email_verified',
        createdAt: 'created_at',
        updatedAt: 'updated_at',
      },
      additionalFields: {
        firstName: { type: 'string', required: false, defaultValue: '', fieldName: 'first_name' },
        lastName: { type: 'string', required: false, defaultValue: '', fieldName: 'last_name' },
      },
    },
    session: {
      modelName: 'sessions',
      expiresIn: config.sessionTtlSeconds ?? DEFAULT_SESSION_TTL_SECONDS,
      updateAge: 60 * 60 * 24, // 1 day
      fields: {
        userId: 'user_id',
        expiresAt: 'expires_at',
        ipAddress: 'ip_address',
        userAgent: 'user_agent',
        createdAt: 'created_at',
        updatedAt: 'updated_at',
      },
    },
    account: {
      modelName: 'accounts',
      fields: {
        accountId: 'account_id',
        providerId: 'provider_id',
        userId: 'user_id',
        accessToken: 'access_token',
        refreshToken: 'refresh_token',
        idToken: 'id_token',
        accessTokenExpiresAt: 'access_token_expires_at',
        refreshTokenExpiresAt: 'refresh_token_expires_at',
        createdAt: 'created_at',
        updatedAt: 'updated_at',
      },
    },
    verification: {
      modelName: 'verifications',
      fields: {
        expiresAt: 'expires_at',
        createdAt: 'created_at',
        updatedAt: 'updated_at',
      },
    },
    advanced: {
      cookiePrefix: AUTH_COOKIE_PREFIX,
      useSecureCookies: config.secureCookies ?? false,
    },
    plugins: [
      username({
        minUsernameLength: 1,
        maxUsernameLength: NAME_MAX_LENGTH,
        usernameValidator: (value) => USERNAME_PATTERN.test(value),
        schema: {
          user: {
            fields: {
              displayUsername: 'display_username',
            },
          },
        },
      }),
    ],
  })
}

export type BlogAuth = ReturnType<typeof createBlogAuth>

export type BlogAuthSession = BlogAuth['$Infer']['Session']
