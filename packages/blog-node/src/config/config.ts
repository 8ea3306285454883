/**
 * Configuration
 *
 * Reads the runtime settings from environment variables.
 */

import { z, type ZodIssue } from 'zod'
import { DEFAULT_SITE_NAME, ValidationError } from '@scrivener/blog-core'
import type { EngineConfig } from '../types/index.js'

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  HOST: z.string().min(1).default('0.0.0.0'),
  DATABASE_PATH: z.string().min(1).default('./data/scrivener.db'),
  UPLOAD_DIR: z.string().min(1).default('./data/uploads'),
  AUDIT_LOG_PATH: z.string().min(1).default('./data/audit.log'),
  POSTS_PER_PAGE: z.coerce.number().int().positive().default(10),
  SESSION_TTL_SECONDS: z.coerce.number().int().positive().default(60 * 60 * 24 * 14),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  SITE_NAME: z.string().min(1).default(DEFAULT_SITE_NAME),
  AUTH_SECRET: z.string().min(1).optional(),
  BASE_URL: z.string().url().optional(),
})

/**
 * Used outside production when AUTH_SECRET is unset
 */
export const DEVELOPMENT_AUTH_SECRET = 'scrivener-development-secret'

export type EnvSettings = z.infer<typeof envSchema>

/**
 * Build the engine configuration from the environment. Empty variables
 * count as unset; `overrides` (command-line flags) win over both.
 * @throws ValidationError listing every invalid variable
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  overrides: Partial<EngineConfig> = {}
): EngineConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
  )

  const result = envSchema.safeParse(present)
  if (!result.success) {
    const details = result.error.issues.map(formatIssue)
    throw new ValidationError(`Invalid configuration: ${details.join('; ')}`, { issues: details })
  }

  const settings = result.data
  const environment = overrides.environment ?? settings.NODE_ENV
  const authSecret = overrides.authSecret ?? settings.AUTH_SECRET
  if (authSecret === undefined && environment === 'production') {
    throw new ValidationError('Invalid configuration: AUTH_SECRET: Required in production', {
      issues: ['AUTH_SECRET: Required in production'],
    })
  }

  const port = overrides.port ?? settings.PORT
  return {
    port,
    host: overrides.host ?? settings.HOST,
    databasePath: overrides.databasePath ?? settings.DATABASE_PATH,
    uploadDir: overrides.uploadDir ?? settings.UPLOAD_DIR,
    auditLogPath: overrides.auditLogPath ?? settings.AUDIT_LOG_PATH,
    postsPerPage: overrides.postsPerPage ?? settings.POSTS_PER_PAGE,
    sessionTtlSeconds: overrides.sessionTtlSeconds ?? settings.SESSION_TTL_SECONDS,
    authSecret: authSecret ?? DEVELOPMENT_AUTH_SECRET,
    baseUrl: overrides.baseUrl ?? settings.BASE_URL ?? `http://localhost:${port}`,
    environment,
    siteName: overrides.siteName ?? settings.SITE_NAME,
  }
}

function formatIssue(issue: ZodIssue): string {
  return `${issue.path.join('.')}: ${issue.message}`
}
