/**
 * HTML Escaping & XSS Protection
 *
 * Every value interpolated into a page goes through here.
 */

const HTML_ENTITIES: Record<string, string> = {
  '&': '&amp;',
  '<': '&lt;',
  '>': '&gt;',
  '"': '&quot;',
  "'": '&#x27;',
}

const HTML_ENTITIES_REGEX = /[&<>"']/g

export type Escapable = string | number | boolean | null | undefined

/**
 * Escape HTML entities to prevent XSS
 */
export function escapeHtml(unsafe: Escapable): string {
  if (unsafe === null || unsafe === undefined) {
    return ''
  }

  const str = String(unsafe)
  return str.replace(HTML_ENTITIES_REGEX, char => HTML_ENTITIES[char] || char)
}

/**
 * Escape HTML attribute value
 */
function escapeHtmlAttr(unsafe: Escapable): string {
  if (unsafe === null || unsafe === undefined) {
    return ''
  }

  return escapeHtml(unsafe)
    .replace(/\n/g, '&#10;')
    .replace(/\r/g, '&#13;')
    .replace(/\t/g, '&#9;')
}

/**
 * Sanitize URL to prevent javascript: and data: URLs
 */
export function sanitizeUrl(url: string | null | undefined): string {
  if (!url) {
    return ''
  }

  const trimmed = url.trim().toLowerCase()
  const dangerous = ['javascript:', 'data:', 'vbscript:', 'file:', 'about:']

  for (const proto of dangerous) {
    if (trimmed.startsWith(proto)) {
      return ''
    }
  }

  return url
}

/**
 * SafeHtml wrapper class to mark strings as safe HTML (already escaped/sanitized)
 */
export class SafeHtml {
  constructor(public readonly html: string) {}

  toString(): string {
    return this.html
  }
}

/**
 * Create a SafeHtml instance (for marking pre-escaped HTML as safe)
 */
export function safe(html: string): SafeHtml {
  return new SafeHtml(html)
}

export type HtmlValue = Escapable | SafeHtml | HtmlValue[]

function renderValue(value: HtmlValue): string {
  if (value instanceof SafeHtml) {
    return value.html
  }
  if (Array.isArray(value)) {
    return value.map(renderValue).join('')
  }
  return escapeHtml(value)
}

/**
 * Template literal tag for safe HTML
 * Usage: html`<div>${unsafeVariable}</div>`
 *
 * SafeHtml values (and arrays of them) are inserted as-is, so fragments
 * compose without double-escaping.
 */
export function html(strings: TemplateStringsArray, ...values: HtmlValue[]): SafeHtml {
  let result = strings[0] ?? ''

  for (let i = 0; i < values.length; i++) {
    const value = values[i]
    result += value === undefined ? '' : renderValue(value)
    result += strings[i + 1] ?? ''
  }

  return new SafeHtml(result)
}

/**
 * Create safe HTML attributes
 */
export function attr(name: string, value: Escapable): SafeHtml {
  if (value === null || value === undefined || value === false) {
    return safe('')
  }

  if (value === true) {
    return safe(` ${name}`)
  }

  return safe(` ${name}="${escapeHtmlAttr(value)}"`)
}
