/**
 * Comment Renderers
 *
 * Edit form and delete confirmation for a single comment.
 */

import type { Theme } from './theme.js'
import type { Comment } from '../types/blog.js'
import type { FormState } from './form-renderers.js'
import type { RenderedPage } from './post-renderers.js'
import { renderFormField } from './form-renderers.js'
import { csrfField } from './document-wrapper.js'
import { postDetailPath } from '../auth/ownership-guard.js'
import { html } from '../security/html-escape.js'

export class CommentRenderers {
  constructor(private theme: Theme) {}

  renderCommentForm(comment: Comment, form: FormState, csrfToken: string | undefined): RenderedPage {
    const content = html`
      <div class="${this.theme.containerNarrow} mx-auto">
        <h1 class="${this.theme.heading1}">Edit comment</h1>
        <form method="post" action="/posts/${comment.postId}/edit_comment/${comment.id}/" class="${this.theme.form}">
          ${csrfField(csrfToken)}
          ${renderFormField({ name: 'text', label: 'Comment', type: 'textarea', required: true }, form, this.theme)}
          <div class="${this.theme.formActions}">
            <a href="${postDetailPath(comment.postId)}" class="${this.theme.buttonSecondary}">Cancel</a>
            <button type="submit" class="${this.theme.buttonPrimary}">Save</button>
          </div>
        </form>
      </div>`

    return { title: 'Edit comment', content }
  }

  renderCommentDelete(comment: Comment, csrfToken: string | undefined): RenderedPage {
    const content = html`
      <div class="${this.theme.containerNarrow} mx-auto">
        <h1 class="${this.theme.heading1}">Delete comment</h1>
        <div class="${this.theme.postCard}">
          <p class="${this.theme.postText}">${comment.text}</p>
        </div>
        <form method="post" action="/posts/${comment.postId}/delete_comment/${comment.id}/" class="${this.theme.formActions}">
          ${csrfField(csrfToken)}
          <a href="${postDetailPath(comment.postId)}" class="${this.theme.buttonSecondary}">Cancel</a>
          <button type="submit" class="${this.theme.buttonDanger}">Delete</button>
        </form>
      </div>`

    return { title: 'Delete comment', content }
  }
}
