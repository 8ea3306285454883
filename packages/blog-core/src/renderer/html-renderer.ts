/**
 * HTML Renderer
 *
 * Server-side HTML rendering for blog pages. No client build step.
 *
 * SECURITY: All user-generated content is HTML-escaped to prevent XSS.
 */

import type { Comment, PostView } from '../types/blog.js'
import type { RendererPort } from '../routing/request-ports.js'
import type { Theme } from './theme.js'
import type { FormState } from './form-renderers.js'
import type { PostDetailView, PostFormView, PostListView, RenderedPage } from './post-renderers.js'
import type { ProfileView } from './profile-renderers.js'
import { defaultTheme } from './theme.js'
import { DocumentWrapper, type PageContext } from './document-wrapper.js'
import { PostRenderers } from './post-renderers.js'
import { CommentRenderers } from './comment-renderers.js'
import { ProfileRenderers } from './profile-renderers.js'
import { AuthPageRenderers } from './auth-page-renderers.js'
import { ErrorPageRenderers } from './error-page-renderers.js'

/**
 * Every page the blog renders, tagged by kind
 */
export type BlogPage =
  | { kind: 'post-list'; view: PostListView; basePath: string }
  | { kind: 'profile'; view: ProfileView }
  | { kind: 'post-detail'; view: PostDetailView }
  | { kind: 'post-form'; view: PostFormView }
  | { kind: 'post-delete'; post: PostView }
  | { kind: 'comment-form'; comment: Comment; form: FormState }
  | { kind: 'comment-delete'; comment: Comment }
  | { kind: 'profile-form'; form: FormState }
  | { kind: 'login'; form: FormState; next: string | null }
  | { kind: 'registration'; form: FormState }
  | { kind: 'logged-out' }
  | { kind: 'not-found'; path: string }
  | { kind: 'csrf-failure'; reason: string }
  | { kind: 'server-error'; detail?: string }
  | { kind: 'error'; statusCode: number; title: string; message: string }

export const DEFAULT_SITE_NAME = 'Scrivener'

export class HTMLRenderer implements RendererPort {
  private documentWrapper: DocumentWrapper
  private postRenderers: PostRenderers
  private commentRenderers: CommentRenderers
  private profileRenderers: ProfileRenderers
  private authPageRenderers: AuthPageRenderers
  private errorPageRenderers: ErrorPageRenderers

  constructor(siteName: string = DEFAULT_SITE_NAME, theme: Theme = defaultTheme) {
    this.documentWrapper = new DocumentWrapper(siteName, theme)
    this.postRenderers = new PostRenderers(theme)
    this.commentRenderers = new CommentRenderers(theme)
    this.profileRenderers = new ProfileRenderers(theme, this.postRenderers)
    this.authPageRenderers = new AuthPageRenderers(theme)
    this.errorPageRenderers = new ErrorPageRenderers(theme)
  }

  /**
   * Render complete HTML page
   */
  renderPage(page: BlogPage, context: PageContext): string {
    const { title, content } = this.renderContent(page, context.csrfToken)
    return this.documentWrapper.wrapInDocument(title, content, context)
  }

  private renderContent(page: BlogPage, csrfToken: string | undefined): RenderedPage {
    switch (page.kind) {
      case 'post-list':
        return this.postRenderers.renderPostList(page.view, page.basePath)
      case 'profile':
        return this.profileRenderers.renderProfile(page.view)
      case 'post-detail':
        return this.postRenderers.renderPostDetail(page.view, csrfToken)
      case 'post-form':
        return this.postRenderers.renderPostForm(page.view, csrfToken)
      case 'post-delete':
        return this.postRenderers.renderPostDelete(page.post, csrfToken)
      case 'comment-form':
        return this.commentRenderers.renderCommentForm(page.comment, page.form, csrfToken)
      case 'comment-delete':
        return this.commentRenderers.renderCommentDelete(page.comment, csrfToken)
      case 'profile-form':
        return this.profileRenderers.renderProfileForm(page.form, csrfToken)
      case 'login':
        return this.authPageRenderers.renderLogin(page.form, page.next, csrfToken)
      case 'registration':
        return this.authPageRenderers.renderRegistration(page.form, csrfToken)
      case 'logged-out':
        return this.authPageRenderers.renderLoggedOut()
      case 'not-found':
        return this.errorPageRenderers.render404(page.path)
      case 'csrf-failure':
        return this.errorPageRenderers.render403Csrf(page.reason)
      case 'server-error':
        return this.errorPageRenderers.render500(page.detail)
      case 'error':
        return this.errorPageRenderers.renderErrorPage(page.statusCode, page.title, page.message)
    }
  }
}
