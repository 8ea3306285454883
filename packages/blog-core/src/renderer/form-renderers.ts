/**
 * Form Renderers
 *
 * Standalone form field and input rendering functions.
 */

import type { Theme } from './theme.js'
import type { FieldErrors, FormValues } from '../forms/form-processor.js'
import { NON_FIELD_ERRORS } from '../forms/form-processor.js'
import { attr, html, safe, type SafeHtml } from '../security/html-escape.js'

export interface SelectOption {
  value: string
  label: string
}

export type FieldType =
  | 'text'
  | 'email'
  | 'password'
  | 'textarea'
  | 'datetime-local'
  | 'select'
  | 'checkbox'
  | 'file'

export interface FieldSpec {
  name: string
  label: string
  type: FieldType
  required?: boolean
  maxLength?: number
  options?: SelectOption[]
  accept?: string
  autocomplete?: string
  help?: string
}

/**
 * Form state handed to a renderer: submitted (or initial) values and errors
 */
export interface FormState {
  values: FormValues
  errors: FieldErrors
}

export function emptyFormState(values: FormValues = {}): FormState {
  return { values, errors: {} }
}

export function renderInput(field: FieldSpec, value: string, theme: Theme, errorId?: string): SafeHtml {
  const common = html`id="${field.name}" name="${field.name}"${attr('required', field.required === true && field.type !== 'file')}${attr('aria-invalid', errorId ? 'true' : null)}${attr('aria-describedby', errorId)}${attr('autocomplete', field.autocomplete)}`

  switch (field.type) {
    case 'textarea':
      return html`<textarea ${common} rows="6" class="${theme.textarea}">${value}</textarea>`

    case 'select': {
      const options = (field.options ?? []).map(
        (option) => html`<option value="${option.value}"${attr('selected', option.value === value)}>${option.label}</option>`
      )
      return html`<select ${common} class="${theme.select}">${options}</select>`
    }

    case 'checkbox':
      return html`<input type="checkbox" ${common}${attr('checked', value === 'on' || value === 'true')} class="rounded border-gray-300 text-blue-600 focus:ring-blue-500">`

    case 'file':
      return html`<input type="file" ${common}${attr('accept', field.accept)} class="${theme.fileInput}">`

    case 'password':
      return html`<input type="password" ${common} class="${theme.input}">`

    default:
      return html`<input type="${field.type}" ${common} value="${value}"${attr('maxlength', field.maxLength)} class="${theme.input}">`
  }
}

/**
 * Render form field with label, input, and error message
 */
export function renderFormField(field: FieldSpec, state: FormState, theme: Theme): SafeHtml {
  const value = state.values[field.name] ?? ''
  const errors = state.errors[field.name] ?? []
  const errorId = errors.length > 0 ? `${field.name}-error` : undefined

  return html`
    <div class="${theme.formField}">
      <label for="${field.name}" class="${theme.label}">
        ${field.label}
        ${field.required ? safe('<span class="text-red-500" aria-label="required">*</span>') : ''}
      </label>
      ${renderInput(field, value, theme, errorId)}
      ${field.help ? html`<p class="${theme.postMeta}">${field.help}</p>` : ''}
      ${errorId ? html`<p id="${errorId}" class="${theme.fieldError}" data-error="${field.name}" role="alert">${errors.join(' ')}</p>` : ''}
    </div>`
}

export function renderNonFieldErrors(errors: FieldErrors, theme: Theme): SafeHtml {
  const messages = errors[NON_FIELD_ERRORS] ?? []
  if (messages.length === 0) {
    return safe('')
  }
  return html`<div class="${theme.errorState}" role="alert">${messages.map((message) => html`<p>${message}</p>`)}</div>`
}
