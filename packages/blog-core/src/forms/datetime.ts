/**
 * `datetime-local` values are read and written as UTC.
 */

const DATETIME_LOCAL = /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2}))?)?$/

export function parseDateTimeLocal(value: string): Date | null {
  const match = DATETIME_LOCAL.exec(value.trim())
  if (!match) {
    return null
  }

  const [year, month, day, hour, minute, second] = match
    .slice(1)
    .map((part) => (part === undefined ? 0 : Number.parseInt(part, 10)))
  const timestamp = Date.UTC(year ?? 0, (month ?? 1) - 1, day ?? 1, hour ?? 0, minute ?? 0, second ?? 0)
  const date = new Date(timestamp)

  // Reject dates Date.UTC silently rolled over, such as 2024-02-30
  if (date.getUTCMonth() !== (month ?? 1) - 1 || date.getUTCDate() !== day) {
    return null
  }
  if ((hour ?? 0) > 23 || (minute ?? 0) > 59 || (second ?? 0) > 59) {
    return null
  }

  return date
}

export function formatDateTimeLocal(date: Date): string {
  return date.toISOString().slice(0, 16)
}

/**
 * Human-readable form used on pages, e.g. `2024-01-01 09:30`
 */
export function formatDisplayDate(date: Date): string {
  return date.toISOString().slice(0, 16).replace('T', ' ')
}
