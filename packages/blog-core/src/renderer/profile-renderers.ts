/**
 * Profile Renderers
 */

import type { Theme } from './theme.js'
import type { User } from '../types/blog.js'
import type { FieldSpec, FormState } from './form-renderers.js'
import type { PostListView, PostRenderers, RenderedPage } from './post-renderers.js'
import { renderFormField, renderNonFieldErrors } from './form-renderers.js'
import { csrfField } from './document-wrapper.js'
import { authorName, profilePath } from './post-renderers.js'
import { formatDisplayDate } from '../forms/datetime.js'
import { NAME_MAX_LENGTH } from '../forms/form-schemas.js'
import { html } from '../security/html-escape.js'

export interface ProfileView {
  profile: User
  isOwner: boolean
  list: Omit<PostListView, 'heading'>
}

export class ProfileRenderers {
  constructor(
    private theme: Theme,
    private posts: PostRenderers
  ) {}

  renderProfile(view: ProfileView): RenderedPage {
    const { profile } = view
    const name = authorName(profile)
    const basePath = profilePath(profile.username)

    const content = html`
      <div class="${this.theme.containerNarrow} mx-auto space-y-6">
        <section class="${this.theme.card} p-6">
          <h1 class="${this.theme.heading1}">${name}</h1>
          <p class="${this.theme.textSecondary}">@${profile.username}</p>
          <p class="${this.theme.postMeta}">Joined ${formatDisplayDate(profile.createdAt)}</p>
          ${view.isOwner
            ? html`<p class="mt-4"><a href="/personal_info/" class="${this.theme.buttonSecondary}">Edit profile</a></p>`
            : ''}
        </section>
        <div class="space-y-6">
          ${view.list.posts.length === 0
            ? html`<p class="${this.theme.emptyState}">No posts yet.</p>`
            : view.list.posts.map((post) => this.posts.renderPostCard(post, view.list.showStatus === true))}
        </div>
        ${this.posts.renderPagination(view.list.page, basePath)}
      </div>`

    return { title: name, content }
  }

  renderProfileForm(form: FormState, csrfToken: string | undefined): RenderedPage {
    const fields: FieldSpec[] = [
      { name: 'username', label: 'Username', type: 'text', required: true, maxLength: NAME_MAX_LENGTH, autocomplete: 'username' },
      { name: 'first_name', label: 'First name', type: 'text', maxLength: NAME_MAX_LENGTH, autocomplete: 'given-name' },
      { name: 'last_name', label: 'Last name', type: 'text', maxLength: NAME_MAX_LENGTH, autocomplete: 'family-name' },
      { name: 'email', label: 'Email', type: 'email', autocomplete: 'email' },
    ]

    const content = html`
      <div class="${this.theme.containerNarrow} mx-auto">
        <h1 class="${this.theme.heading1}">Edit profile</h1>
        <form method="post" action="/personal_info/" class="${this.theme.form}">
          ${csrfField(csrfToken)}
          ${renderNonFieldErrors(form.errors, this.theme)}
          ${fields.map((field) => renderFormField(field, form, this.theme))}
          <div class="${this.theme.formActions}">
            <button type="submit" class="${this.theme.buttonPrimary}">Save</button>
          </div>
        </form>
      </div>`

    return { title: 'Edit profile', content }
  }
}
