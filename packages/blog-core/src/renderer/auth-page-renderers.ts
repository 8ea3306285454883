/**
 * Auth Page Renderers
 *
 * Log in, registration and logged-out pages
 */

import type { Theme } from './theme.js'
import type { FieldSpec, FormState } from './form-renderers.js'
import type { RenderedPage } from './post-renderers.js'
import { renderFormField, renderNonFieldErrors } from './form-renderers.js'
import { csrfField } from './document-wrapper.js'
import { NAME_MAX_LENGTH, MIN_PASSWORD_LENGTH } from '../forms/form-schemas.js'
import { html } from '../security/html-escape.js'

export class AuthPageRenderers {
  constructor(private theme: Theme) {}

  renderLogin(form: FormState, next: string | null, csrfToken: string | undefined): RenderedPage {
    const fields: FieldSpec[] = [
      { name: 'username', label: 'Username', type: 'text', required: true, autocomplete: 'username' },
      { name: 'password', label: 'Password', type: 'password', required: true, autocomplete: 'current-password' },
    ]

    const content = html`
      <div class="${this.theme.containerNarrow} mx-auto">
        <h1 class="${this.theme.heading1}">Log in</h1>
        <form method="post" action="/auth/login/" class="${this.theme.form}">
          ${csrfField(csrfToken)}
          ${next ? html`<input type="hidden" name="next" value="${next}">` : ''}
          ${renderNonFieldErrors(form.errors, this.theme)}
          ${fields.map((field) => renderFormField(field, form, this.theme))}
          <div class="${this.theme.formActions}">
            <a href="/auth/registration/" class="${this.theme.linkSecondary}">Create an account</a>
            <button type="submit" class="${this.theme.buttonPrimary}">Log in</button>
          </div>
        </form>
      </div>`

    return { title: 'Log in', content }
  }

  renderRegistration(form: FormState, csrfToken: string | undefined): RenderedPage {
    const fields: FieldSpec[] = [
      { name: 'username', label: 'Username', type: 'text', required: true, maxLength: NAME_MAX_LENGTH, autocomplete: 'username' },
      { name: 'first_name', label: 'First name', type: 'text', maxLength: NAME_MAX_LENGTH, autocomplete: 'given-name' },
      { name: 'last_name', label: 'Last name', type: 'text', maxLength: NAME_MAX_LENGTH, autocomplete: 'family-name' },
      { name: 'email', label: 'Email', type: 'email', autocomplete: 'email' },
      {
        name: 'password',
        label: 'Password',
        type: 'password',
        required: true,
        autocomplete: 'new-password',
        help: `At least ${MIN_PASSWORD_LENGTH} characters, not entirely numeric.`,
      },
      { name: 'password_confirmation', label: 'Password confirmation', type: 'password', required: true, autocomplete: 'new-password' },
    ]

    const content = html`
      <div class="${this.theme.containerNarrow} mx-auto">
        <h1 class="${this.theme.heading1}">Sign up</h1>
        <form method="post" action="/auth/registration/" class="${this.theme.form}">
          ${csrfField(csrfToken)}
          ${renderNonFieldErrors(form.errors, this.theme)}
          ${fields.map((field) => renderFormField(field, form, this.theme))}
          <div class="${this.theme.formActions}">
            <button type="submit" class="${this.theme.buttonPrimary}">Sign up</button>
          </div>
        </form>
      </div>`

    return { title: 'Sign up', content }
  }

  renderLoggedOut(): RenderedPage {
    const content = html`
      <div class="${this.theme.containerNarrow} mx-auto ${this.theme.card} p-12 text-center">
        <h1 class="${this.theme.heading2}">You have been logged out</h1>
        <a href="/auth/login/" class="${this.theme.buttonPrimary}">Log in again</a>
      </div>`

    return { title: 'Logged out', content }
  }
}
