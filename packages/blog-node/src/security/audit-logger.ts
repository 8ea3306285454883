/**
 * Security Audit Logger
 *
 * Append-only JSON-lines trail of sign-ins, registrations, denied access
 * and content changes. Separate from the console log.
 */

import { appendFileSync, existsSync, mkdirSync } from 'node:fs'
import { dirname } from 'node:path'
import type { AuditContext, AuditLoggerPort, LogEvent } from '@scrivener/blog-core'

export interface AuditLogEntry extends LogEvent {
  timestamp: string
  entityType?: string
  entityId?: number | string
  requestId?: string
}

export interface AuditLoggerConfig {
  logPath?: string
  enabled?: boolean
  /**
   * Echo each entry to the console as well
   */
  echo?: boolean
  maxEntrySize?: number
}

const SENSITIVE_FIELDS = ['password', 'secret', 'token', 'csrf', 'session']

export class AuditLogger implements AuditLoggerPort {
  private config: Required<AuditLoggerConfig>

  constructor(config: AuditLoggerConfig = {}) {
    this.config = {
      logPath: config.logPath ?? './data/audit.log',
      enabled: config.enabled !== false,
      echo: config.echo ?? false,
      maxEntrySize: config.maxEntrySize ?? 10_000,
    }

    if (this.config.enabled) {
      this.ensureLogDirectory()
    }
  }

  get logPath(): string {
    return this.config.logPath
  }

  log(event: LogEvent & Partial<AuditLogEntry>): void {
    if (!this.config.enabled) {
      return
    }

    try {
      const entry: AuditLogEntry = {
        ...event,
        timestamp: new Date().toISOString(),
        metadata: this.sanitizeMetadata(event.metadata),
      }
      appendFileSync(this.config.logPath, JSON.stringify(entry) + '\n', { encoding: 'utf8', mode: 0o644 })

      if (this.config.echo) {
        console.log(`[AUDIT] ${event.eventType}: ${event.action}`)
      }
    } catch (error) {
      // Never throw from the audit logger
      console.error('[AUDIT ERROR] Failed to write audit log:', error)
    }
  }

  logAccessDenied(resource: string, action: string, userId?: string, context?: AuditContext): void {
    this.log({
      eventType: 'ACCESS_DENIED',
      severity: 'WARNING',
      action: `Access denied: ${action}`,
      resource,
      userId,
      success: false,
      ...context,
    })
  }

  logDataAccess(
    action: 'create' | 'update' | 'delete',
    entity: string,
    recordId: number | string | undefined,
    userId: string | undefined,
    context?: AuditContext
  ): void {
    this.log({
      eventType: `DATA_${action.toUpperCase()}`,
      severity: 'INFO',
      action: `Data ${action}`,
      resource: entity,
      entityType: entity,
      entityId: recordId,
      userId,
      success: true,
      ...context,
    })
  }

  private sanitizeMetadata(metadata?: Record<string, unknown>): Record<string, unknown> | undefined {
    if (!metadata) {
      return undefined
    }

    const sanitized: Record<string, unknown> = {}
    let totalSize = 0

    for (const [key, value] of Object.entries(metadata)) {
      const lower = key.toLowerCase()
      if (SENSITIVE_FIELDS.some((field) => lower.includes(field))) {
        sanitized[key] = '[REDACTED]'
        continue
      }

      const size = JSON.stringify(value)?.length ?? 0
      if (totalSize + size > this.config.maxEntrySize) {
        sanitized[key] = '[TRUNCATED]'
        break
      }

      sanitized[key] = value
      totalSize += size
    }

    return sanitized
  }

  private ensureLogDirectory(): void {
    const dir = dirname(this.config.logPath)
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true })
    }
  }
}
