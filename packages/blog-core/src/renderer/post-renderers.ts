/**
 * Post Renderers
 *
 * Post lists, the detail page with its comments, the post form and the
 * delete confirmation.
 */

import type { Theme } from './theme.js'
import type { Category, CommentView, Location, PostView, User } from '../types/blog.js'
import type { Page } from '../pagination/paginator.js'
import type { FieldSpec, FormState } from './form-renderers.js'
import { renderFormField, renderNonFieldErrors } from './form-renderers.js'
import { csrfField } from './document-wrapper.js'
import { formatDisplayDate } from '../forms/datetime.js'
import { MAX_LENGTH } from '../forms/form-schemas.js'
import { html, safe, sanitizeUrl, type SafeHtml } from '../security/html-escape.js'
import { postDetailPath } from '../auth/ownership-guard.js'

export interface RenderedPage {
  title: string
  content: SafeHtml
}

export interface PostListView {
  heading: string
  description?: string
  posts: PostView[]
  page: Page
  /**
   * Mark unpublished or scheduled posts (own profile)
   */
  showStatus?: boolean
}

export interface PostDetailView {
  post: PostView
  comments: CommentView[]
  commentForm: FormState
  canEdit: boolean
  viewerId: string | null
}

export interface PostFormView {
  mode: 'create' | 'edit'
  postId?: number
  currentImage?: string | null
  form: FormState
  categories: Category[]
  locations: Location[]
}

export function authorName(author: Pick<User, 'username' | 'firstName' | 'lastName'>): string {
  const fullName = `${author.firstName} ${author.lastName}`.trim()
  return fullName || author.username
}

export function profilePath(username: string): string {
  return `/profile/${encodeURIComponent(username)}/`
}

export class PostRenderers {
  constructor(private theme: Theme) {}

  renderPostList(view: PostListView, basePath: string): RenderedPage {
    const items = view.posts.length === 0
      ? html`<p class="${this.theme.emptyState}">No posts yet.</p>`
      : view.posts.map((post) => this.renderPostCard(post, view.showStatus === true))

    const content = html`
      <div class="${this.theme.containerNarrow} mx-auto">
        <div class="${this.theme.pageHeader}">
          <h1 class="${this.theme.heading1}">${view.heading}</h1>
        </div>
        ${view.description ? html`<p class="${this.theme.textSecondary} mb-6">${view.description}</p>` : ''}
        <div class="space-y-6">${items}</div>
        ${this.renderPagination(view.page, basePath)}
      </div>`

    return { title: view.heading, content }
  }

  renderPostCard(post: PostView, showStatus: boolean): SafeHtml {
    const comments = post.commentCount ?? 0
    return html`
      <article class="${this.theme.postCard}">
        <h2 class="${this.theme.heading3}"><a href="${postDetailPath(post.id)}" class="${this.theme.linkPrimary}">${post.title}</a></h2>
        ${this.renderMeta(post)}
        ${showStatus ? this.renderStatus(post) : ''}
        ${post.image ? html`<img src="${sanitizeUrl(post.image)}" alt="${post.title}" class="${this.theme.postImage}">` : ''}
        <p class="${this.theme.postText}">${excerpt(post.text)}</p>
        <p class="${this.theme.postMeta}">Comments: ${comments}</p>
      </article>`
  }

  renderPostDetail(view: PostDetailView, csrfToken: string | undefined): RenderedPage {
    const { post } = view
    const actions = view.canEdit
      ? html`
        <div class="flex gap-3">
          <a href="/posts/${post.id}/edit/" class="${this.theme.buttonSecondary}">Edit</a>
          <a href="/posts/${post.id}/delete/" class="${this.theme.buttonDanger}">Delete</a>
        </div>`
      : ''

    const content = html`
      <div class="${this.theme.containerNarrow} mx-auto space-y-6">
        <article class="${this.theme.postCard}">
          <h1 class="${this.theme.heading1}">${post.title}</h1>
          ${this.renderMeta(post)}
          ${view.canEdit ? this.renderStatus(post) : ''}
          ${post.image ? html`<img src="${sanitizeUrl(post.image)}" alt="${post.title}" class="${this.theme.postImage}">` : ''}
          <div class="${this.theme.postText}">${post.text}</div>
          ${actions}
        </article>
        <section class="${this.theme.card} p-6">
          <h2 class="${this.theme.heading2}">Comments</h2>
          ${view.comments.length === 0
            ? html`<p class="${this.theme.emptyState}">No comments yet.</p>`
            : view.comments.map((comment) => this.renderComment(comment, view.viewerId))}
          ${view.viewerId !== null ? this.renderCommentForm(post.id, view.commentForm, csrfToken) : html`<p class="${this.theme.textSecondary}"><a href="/auth/login/?next=${encodeURIComponent(postDetailPath(post.id))}" class="${this.theme.linkPrimary}">Log in</a> to leave a comment.</p>`}
        </section>
      </div>`

    return { title: post.title, content }
  }

  private renderComment(comment: CommentView, viewerId: string | null): SafeHtml {
    const own = viewerId !== null && comment.authorId === viewerId
    return html`
      <div class="${this.theme.comment}" id="comment-${comment.id}">
        <p class="${this.theme.postMeta}">
          <a href="${profilePath(comment.author.username)}" class="${this.theme.linkSecondary}">${comment.author.username}</a>
          · ${formatDisplayDate(comment.createdAt)}
        </p>
        <p class="${this.theme.postText}">${comment.text}</p>
        ${own
          ? html`<p class="text-sm space-x-3">
              <a href="/posts/${comment.postId}/edit_comment/${comment.id}/" class="${this.theme.linkSecondary}">Edit</a>
              <a href="/posts/${comment.postId}/delete_comment/${comment.id}/" class="${this.theme.linkSecondary}">Delete</a>
            </p>`
          : ''}
      </div>`
  }

  private renderCommentForm(postId: number, form: FormState, csrfToken: string | undefined): SafeHtml {
    return html`
      <form method="post" action="/posts/${postId}/comment/" class="mt-6 space-y-4">
        ${csrfField(csrfToken)}
        ${renderFormField({ name: 'text', label: 'Add a comment', type: 'textarea', required: true }, form, this.theme)}
        <div class="${this.theme.formActions}">
          <button type="submit" class="${this.theme.buttonPrimary}">Send</button>
        </div>
      </form>`
  }

  renderPostForm(view: PostFormView, csrfToken: string | undefined): RenderedPage {
    const fields: FieldSpec[] = [
      { name: 'title', label: 'Title', type: 'text', required: true, maxLength: MAX_LENGTH },
      { name: 'text', label: 'Text', type: 'textarea', required: true },
      {
        name: 'pub_date',
        label: 'Publication date',
        type: 'datetime-local',
        required: true,
        help: 'Times are in UTC. A date in the future schedules the post.',
      },
      {
        name: 'location',
        label: 'Location',
        type: 'select',
        options: [
          { value: '', label: '---------' },
          ...view.locations.map((location) => ({ value: String(location.id), label: location.name })),
        ],
      },
      {
        name: 'category',
        label: 'Category',
        type: 'select',
        required: true,
        options: [
          { value: '', label: '---------' },
          ...view.categories.map((category) => ({ value: String(category.id), label: category.title })),
        ],
      },
      { name: 'is_published', label: 'Published', type: 'checkbox' },
      { name: 'image', label: 'Image', type: 'file', accept: 'image/jpeg,image/png,image/gif,image/webp' },
    ]

    const action = view.mode === 'create' ? '/posts/create/' : `/posts/${view.postId ?? ''}/edit/`
    const heading = view.mode === 'create' ? 'New post' : 'Edit post'
    const currentImage = view.currentImage
      ? html`
        <div class="${this.theme.formField}">
          <p class="${this.theme.postMeta}">Current image: <a href="${sanitizeUrl(view.currentImage)}" class="${this.theme.linkSecondary}">${view.currentImage}</a></p>
          <label class="${this.theme.label}"><input type="checkbox" name="image-clear" id="image-clear"> Remove image</label>
        </div>`
      : ''

    const content = html`
      <div class="${this.theme.containerNarrow} mx-auto">
        <h1 class="${this.theme.heading1}">${heading}</h1>
        <form method="post" action="${action}" enctype="multipart/form-data" class="${this.theme.form}">
          ${csrfField(csrfToken)}
          ${renderNonFieldErrors(view.form.errors, this.theme)}
          ${fields.map((field) => renderFormField(field, view.form, this.theme))}
          ${currentImage}
          <div class="${this.theme.formActions}">
            <button type="submit" class="${this.theme.buttonPrimary}">Save</button>
          </div>
        </form>
      </div>`

    return { title: heading, content }
  }

  renderPostDelete(post: PostView, csrfToken: string | undefined): RenderedPage {
    const content = html`
      <div class="${this.theme.containerNarrow} mx-auto">
        <h1 class="${this.theme.heading1}">Delete post</h1>
        <div class="${this.theme.postCard}">
          <h2 class="${this.theme.heading3}">${post.title}</h2>
          ${this.renderMeta(post)}
          <p class="${this.theme.postText}">${excerpt(post.text)}</p>
        </div>
        <form method="post" action="/posts/${post.id}/delete/" class="${this.theme.formActions}">
          ${csrfField(csrfToken)}
          <a href="${postDetailPath(post.id)}" class="${this.theme.buttonSecondary}">Cancel</a>
          <button type="submit" class="${this.theme.buttonDanger}">Delete</button>
        </form>
      </div>`

    return { title: 'Delete post', content }
  }

  private renderMeta(post: PostView): SafeHtml {
    return html`
      <p class="${this.theme.postMeta}">
        ${formatDisplayDate(post.pubDate)}
        · <a href="${profilePath(post.author.username)}" class="${this.theme.linkSecondary}">${authorName(post.author)}</a>
        ${post.location && post.location.isPublished ? html`· ${post.location.name}` : ''}
        ${post.category ? html`· <a href="/category/${encodeURIComponent(post.category.slug)}/" class="${this.theme.linkSecondary}">${post.category.title}</a>` : ''}
      </p>`
  }

  private renderStatus(post: PostView): SafeHtml {
    const notes: string[] = []
    if (!post.isPublished) {
      notes.push('Unpublished')
    }
    if (post.category === null) {
      notes.push('No category')
    } else if (!post.category.isPublished) {
      notes.push('Category hidden')
    }
    if (post.pubDate.getTime() > Date.now()) {
      notes.push('Scheduled')
    }
    return notes.length === 0 ? safe('') : html`<p>${notes.map((note) => html`<span class="${this.theme.badge} mr-2">${note}</span>`)}</p>`
  }

  renderPagination(page: Page, basePath: string): SafeHtml {
    if (page.numPages <= 1) {
      return safe('')
    }

    return html`
      <nav class="${this.theme.pagination}" aria-label="Pagination">
        ${page.hasPrevious ? html`<a href="${basePath}?page=1" class="${this.theme.linkSecondary}">« first</a> <a href="${basePath}?page=${page.number - 1}" class="${this.theme.linkSecondary}">previous</a>` : ''}
        <span>Page ${page.number} of ${page.numPages}</span>
        ${page.hasNext ? html`<a href="${basePath}?page=${page.number + 1}" class="${this.theme.linkSecondary}">next</a> <a href="${basePath}?page=last" class="${this.theme.linkSecondary}">last »</a>` : ''}
      </nav>`
  }
}

function excerpt(text: string, words = 40): string {
  const parts = text.split(/\s+/).filter(Boolean)
  return parts.length <= words ? text : `${parts.slice(0, words).join(' ')} …`
}
