/**
 * Document Wrapper
 *
 * HTML document structure, navigation, flash message and footer
 */

import type { Theme } from './theme.js'
import type { FlashMessage } from '../routing/request-ports.js'
import type { Viewer } from '../types/blog.js'
import { html, safe, type SafeHtml } from '../security/html-escape.js'

/**
 * Per-request data every page needs
 */
export interface PageContext {
  viewer: Viewer
  currentPath: string
  csrfToken?: string
  flash?: FlashMessage
}

export class DocumentWrapper {
  constructor(
    private siteName: string,
    private theme: Theme
  ) {}

  /**
   * Wrap content in complete HTML document
   */
  wrapInDocument(title: string, content: SafeHtml, context: PageContext): string {
    return html`<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>${title} - ${this.siteName}</title>
    <link rel="stylesheet" href="https://cdn.jsdelivr.net/npm/tailwindcss@2/dist/tailwind.min.css">
  </head>
  <body class="${this.theme.body}">
    ${this.renderNav(context)}
    <main id="main-content" role="main" class="${this.theme.container}">
      ${this.renderFlash(context.flash)}
      ${content}
    </main>
    ${this.renderFooter()}
  </body>
</html>`.html
  }

  private renderNav(context: PageContext): SafeHtml {
    const { viewer } = context
    const links = viewer
      ? html`
          <a href="/posts/create/" class="${this.theme.navLink}">New post</a>
          <a href="/profile/${encodeURIComponent(viewer.username)}/" class="${this.theme.navLink}">${viewer.username}</a>
          <form method="post" action="/auth/logout/" class="inline">
            ${csrfField(context.csrfToken)}
            <button type="submit" class="${this.theme.linkSecondary}">Log out</button>
          </form>`
      : html`
          <a href="/auth/login/" class="${this.theme.linkPrimary}">Log in</a>
          <a href="/auth/registration/" class="${this.theme.navLink}">Sign up</a>`

    return html`
      <nav aria-label="Primary navigation" class="${this.theme.nav}">
        <div class="container mx-auto px-4">
          <div class="${this.theme.navContent}">
            <a href="/" class="${this.theme.navBrand}">${this.siteName}</a>
            <div class="${this.theme.navLinks} items-center">${links}</div>
          </div>
        </div>
      </nav>`
  }

  private renderFooter(): SafeHtml {
    return html`
      <footer class="border-t border-gray-200 mt-12 py-6">
        <p class="text-center text-sm text-gray-500">${this.siteName}</p>
      </footer>`
  }

  private renderFlash(flash?: FlashMessage): SafeHtml {
    if (!flash || !flash.text) {
      return safe('')
    }

    const baseClasses = 'mx-auto mb-6 max-w-3xl rounded-lg border px-4 py-3 text-sm'
    let variantClasses: string

    switch (flash.type) {
      case 'success':
        variantClasses = 'border-green-300 bg-green-50 text-green-800'
        break
      case 'error':
        variantClasses = 'border-red-300 bg-red-50 text-red-800'
        break
      default:
        variantClasses = 'border-blue-200 bg-blue-50 text-blue-800'
        break
    }

    return html`<div role="status" aria-live="polite" class="${baseClasses} ${variantClasses}">${flash.text}</div>`
  }
}

/**
 * Hidden input carrying the CSRF token for POST forms
 */
export function csrfField(token: string | undefined): SafeHtml {
  return token ? html`<input type="hidden" name="_csrf" value="${token}">` : safe('')
}
