import { describe, it, expect } from 'vitest'
import { attr, escapeHtml, html, safe, sanitizeUrl, SafeHtml } from './html-escape.js'

describe('escapeHtml', () => {
  it('escapes the five HTML special characters', () => {
    expect(escapeHtml(`<a href="x">'&`)).toBe('&lt;a href=&quot;x&quot;&gt;&#x27;&amp;')
  })

  it('renders numbers and booleans as text', () => {
    expect(escapeHtml(42)).toBe('42')
    expect(escapeHtml(false)).toBe('false')
  })

  it('renders null and undefined as empty strings', () => {
    expect(escapeHtml(null)).toBe('')
    expect(escapeHtml(undefined)).toBe('')
  })
})

describe('sanitizeUrl', () => {
  it('keeps relative and http URLs', () => {
    expect(sanitizeUrl('/uploads/posts/a.png')).toBe('/uploads/posts/a.png')
    expect(sanitizeUrl('https://example.com/a.png')).toBe('https://example.com/a.png')
  })

  it('blocks script and data URLs regardless of case', () => {
    expect(sanitizeUrl('JavaScript:alert(1)')).toBe('')
    expect(sanitizeUrl(' data:text/html,x')).toBe('')
  })
})

describe('html template tag', () => {
  it('escapes interpolated strings', () => {
    expect(html`<p>${'<script>'}</p>`.html).toBe('<p>&lt;script&gt;</p>')
  })

  it('inserts SafeHtml fragments without escaping them again', () => {
    const inner = html`<b>${'a & b'}</b>`
    expect(html`<p>${inner}</p>`.html).toBe('<p><b>a &amp; b</b></p>')
  })

  it('joins arrays, escaping plain items', () => {
    expect(html`<ul>${['<a>', safe('<li>ok</li>')]}</ul>`.html).toBe('<ul>&lt;a&gt;<li>ok</li></ul>')
  })

  it('returns a SafeHtml instance', () => {
    expect(html`x`).toBeInstanceOf(SafeHtml)
    expect(String(html`x${1}`)).toBe('x1')
  })
})

describe('attr', () => {
  it('renders boolean attributes by presence', () => {
    expect(attr('required', true).html).toBe(' required')
    expect(attr('required', false).html).toBe('')
    expect(attr('required', null).html).toBe('')
  })

  it('quotes and escapes values', () => {
    expect(attr('value', 'say "hi"').html).toBe(' value="say &quot;hi&quot;"')
  })

  it('escapes whitespace control characters in values', () => {
    expect(attr('title', 'a\nb\tc').html).toBe(' title="a&#10;b&#9;c"')
  })
})
