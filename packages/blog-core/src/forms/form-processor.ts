/**
 * Form Processor
 *
 * Runs a submitted form body through its schema and collects field errors
 * for re-rendering.
 */

import type { z } from 'zod'
import type { FormBody } from '../routing/request-ports.js'

/**
 * Field name to messages; errors not tied to a field sit under `__all__`
 */
export type FieldErrors = Record<string, string[]>

export const NON_FIELD_ERRORS = '__all__'

export type FormResult<T> =
  | { ok: true; data: T }
  | { ok: false; errors: FieldErrors }

/**
 * Text values of a form body, used to refill a form after a failed submit
 */
export type FormValues = Record<string, string>

const CSRF_FIELD = '_csrf'

export function validateForm<S extends z.ZodTypeAny>(schema: S, body: FormBody | undefined): FormResult<z.output<S>> {
  const result = schema.safeParse(textFields(body))
  if (result.success) {
    return { ok: true, data: result.data }
  }

  const errors: FieldErrors = {}
  for (const issue of result.error.issues) {
    const field = typeof issue.path[0] === 'string' ? issue.path[0] : NON_FIELD_ERRORS
    const messages = errors[field] ?? []
    if (!messages.includes(issue.message)) {
      messages.push(issue.message)
    }
    errors[field] = messages
  }
  return { ok: false, errors }
}

export function textFields(body: FormBody | undefined): FormValues {
  const values: FormValues = {}
  if (!body) {
    return values
  }
  for (const [name, value] of Object.entries(body)) {
    if (typeof value === 'string' && name !== CSRF_FIELD) {
      values[name] = value
    }
  }
  return values
}

export function addFieldError(errors: FieldErrors, field: string, message: string): FieldErrors {
  return { ...errors, [field]: [...(errors[field] ?? []), message] }
}
