/**
 * Blog Request Handler (Platform-Agnostic)
 *
 * Dispatches HTTP requests to the blog operations: post lists, post detail,
 * post and comment mutations, and the profile pages. Authentication pages
 * are delegated to AuthRequestHandler. Platform-specific adapters wrap this
 * core logic.
 */

import type { AuthProvider, UserSession } from '../auth/provider.js'
import type { Comment, PostView, User, Viewer } from '../types/blog.js'
import type { BlogPage } from '../renderer/html-renderer.js'
import type { FormState } from '../renderer/form-renderers.js'
import type { PostListView } from '../renderer/post-renderers.js'
import type {
  AuditContext,
  AuditLoggerPort,
  BlogRepositoryPort,
  FlashMessage,
  FormBody,
  HttpRequest,
  HttpResponse,
  ImageStoragePort,
  RendererPort,
  SessionManagerPort,
  UploadedImage,
} from './request-ports.js'
import type { RouteMatch, RouteMethod } from './route-matcher.js'
import { RouteMatcher } from './route-matcher.js'
import { HTMLRenderer } from '../renderer/html-renderer.js'
import { emptyFormState } from '../renderer/form-renderers.js'
import { profilePath } from '../renderer/post-renderers.js'
import { ErrorSanitizer } from '../security/error-sanitizer.js'
import { AppError, ConflictError, NotFoundError } from '../errors/base-error.js'
import { defaultMutationGuards, postDetailPath, type MutationGuards } from '../auth/ownership-guard.js'
import { buildPostQuery, canViewPost, profileScope, type PostQuery } from '../visibility/post-query.js'
import { DEFAULT_POSTS_PER_PAGE, paginate } from '../pagination/paginator.js'
import { addFieldError, textFields, validateForm, type FieldErrors, type FormValues } from '../forms/form-processor.js'
import { commentFormSchema, postFormSchema, profileFormSchema, type PostFormData } from '../forms/form-schemas.js'
import { formatDateTimeLocal } from '../forms/datetime.js'
import { AuthRequestHandler } from './auth-request-handler.js'
import { respondWithPage } from './page-responder.js'
import { buildLoginRedirect, resolveSession, viewerOf } from './session-resolver.js'
import {
  extractIp,
  flashCookieHeader,
  getPathname,
  getSearchParam,
  htmlResponse,
  redirectResponse,
} from './request-utils.js'

export interface BlogRequestHandlerConfig {
  repository: BlogRepositoryPort
  authProvider?: AuthProvider
  /**
   * Defaults to the auth provider
   */
  sessionManager?: SessionManagerPort
  renderer?: RendererPort
  auditLogger?: AuditLoggerPort
  imageStorage?: ImageStoragePort
  errorSanitizer?: ErrorSanitizer
  guards?: MutationGuards
  postsPerPage?: number
  /**
   * Show sanitized error details on the 500 page
   */
  showErrorDetails?: boolean
  clock?: () => Date
}

/**
 * Everything an operation needs about the current request
 */
interface RequestState {
  request: HttpRequest
  match: RouteMatch
  session: UserSession | null
  viewer: Viewer
  now: Date
}

type SignedInState = RequestState & { viewer: NonNullable<Viewer> }

export class BlogRequestHandler {
  private repository: BlogRepositoryPort
  private sessionManager?: SessionManagerPort
  private renderer: RendererPort
  private auditLogger?: AuditLoggerPort
  private imageStorage?: ImageStoragePort
  private errorSanitizer: ErrorSanitizer
  private guards: MutationGuards
  private postsPerPage: number
  private showErrorDetails: boolean
  private clock: () => Date
  private routeMatcher = new RouteMatcher()
  private authHandler?: AuthRequestHandler

  constructor(config: BlogRequestHandlerConfig) {
    this.repository = config.repository
    this.sessionManager = config.sessionManager ?? config.authProvider
    this.renderer = config.renderer ?? new HTMLRenderer()
    this.auditLogger = config.auditLogger
    this.imageStorage = config.imageStorage
    this.errorSanitizer = config.errorSanitizer ?? new ErrorSanitizer()
    this.guards = config.guards ?? defaultMutationGuards
    this.postsPerPage = config.postsPerPage ?? DEFAULT_POSTS_PER_PAGE
    this.showErrorDetails = config.showErrorDetails ?? false
    this.clock = config.clock ?? (() => new Date())

    if (config.authProvider) {
      this.authHandler = new AuthRequestHandler({
        authProvider: config.authProvider,
        renderer: this.renderer,
        auditLogger: config.auditLogger,
      })
    }
  }

  /**
   * Handle any request: match the route, resolve the session, run the operation
   */
  async handle(request: HttpRequest): Promise<HttpResponse> {
    const session = await resolveSession(request, this.sessionManager)
    const match = this.routeMatcher.match(getPathname(request))

    try {
      if (!match) {
        throw new NotFoundError('Page', { path: getPathname(request) })
      }

      const method = routeMethod(request.method)
      if (method === null || !match.methods.includes(method)) {
        return methodNotAllowed(match)
      }

      const state: RequestState = { request, match, session, viewer: viewerOf(session), now: this.clock() }
      return await this.dispatch(state, method === 'POST')
    } catch (error) {
      return this.handleError(error, request, session)
    }
  }

  private async dispatch(state: RequestState, isPost: boolean): Promise<HttpResponse> {
    switch (state.match.name) {
      case 'home':
        return this.listHomePosts(state)
      case 'category':
        return this.listCategoryPosts(state)
      case 'profile':
        return this.viewProfile(state)
      case 'post-detail':
        return this.viewPost(state)
      case 'post-create':
        return this.withViewer(state, (signedIn) => this.createPost(signedIn, isPost))
      case 'post-edit':
        return this.withViewer(state, (signedIn) => this.updatePost(signedIn, isPost))
      case 'post-delete':
        return this.withViewer(state, (signedIn) => this.deletePost(signedIn, isPost))
      case 'comment-add':
        return this.withViewer(state, (signedIn) => this.addComment(signedIn))
      case 'comment-edit':
        return this.withViewer(state, (signedIn) => this.updateComment(signedIn, isPost))
      case 'comment-delete':
        return this.withViewer(state, (signedIn) => this.deleteComment(signedIn, isPost))
      case 'profile-edit':
        return this.withViewer(state, (signedIn) => this.updateProfile(signedIn, isPost))
      case 'login':
      case 'logout':
      case 'registration':
        if (!this.authHandler) {
          throw new NotFoundError('Page', { path: getPathname(state.request) })
        }
        return this.authHandler.handle(state.match.name, state.request, state.session, isPost)
    }
  }

  // ==========================================================================
  // Lists
  // ==========================================================================

  private async listHomePosts(state: RequestState): Promise<HttpResponse> {
    const query = buildPostQuery({ scope: 'public', now: state.now })
    return this.renderPostList(state, query, { heading: 'Latest posts' }, '/')
  }

  private async listCategoryPosts(state: RequestState): Promise<HttpResponse> {
    const slug = state.match.params.slug ?? ''
    const category = await this.repository.findCategoryBySlug(slug)
    if (!category || !category.isPublished) {
      throw new NotFoundError('Category', { slug })
    }

    const query = buildPostQuery({ scope: 'public', now: state.now, categoryId: category.id })
    return this.renderPostList(
      state,
      query,
      { heading: category.title, description: category.description },
      `/category/${encodeURIComponent(category.slug)}/`
    )
  }

  private async viewProfile(state: RequestState): Promise<HttpResponse> {
    const username = state.match.params.username ?? ''
    const profile = await this.repository.findUserByUsername(username)
    if (!profile) {
      throw new NotFoundError('Profile', { username })
    }

    const scope = profileScope(state.viewer, profile.id)
    const query = buildPostQuery({ scope, now: state.now, authorId: profile.id })
    const { posts, page } = await this.loadPage(state, query)

    return this.render(state, {
      kind: 'profile',
      view: { profile, isOwner: scope === 'all', list: { posts, page, showStatus: scope === 'all' } },
    })
  }

  private async renderPostList(
    state: RequestState,
    query: PostQuery,
    heading: Pick<PostListView, 'heading' | 'description'>,
    basePath: string
  ): Promise<HttpResponse> {
    const { posts, page } = await this.loadPage(state, query)
    return this.render(state, { kind: 'post-list', view: { ...heading, posts, page }, basePath })
  }

  private async loadPage(state: RequestState, query: PostQuery) {
    const total = await this.repository.countPosts(query)
    const page = paginate(total, getSearchParam(state.request, 'page'), this.postsPerPage)
    const posts = await this.repository.findPosts(query, page.window)
    return { posts, page }
  }

  // ==========================================================================
  // Posts
  // ==========================================================================

  private async viewPost(state: RequestState, commentForm: FormState = emptyFormState(), status = 200): Promise<HttpResponse> {
    const post = await this.loadVisiblePost(state)
    const comments = await this.repository.findComments(post.id)
    const viewerId = state.viewer?.id ?? null

    return this.render(
      state,
      {
        kind: 'post-detail',
        view: { post, comments, commentForm, canEdit: viewerId === post.authorId, viewerId },
      },
      status
    )
  }

  private async createPost(state: SignedInState, isPost: boolean): Promise<HttpResponse> {
    if (!isPost) {
      return this.renderPostForm(state, 'create', emptyFormState({
        pub_date: formatDateTimeLocal(state.now),
        is_published: 'on',
      }))
    }

    const body = state.request.body
    const outcome = await this.validatePostForm(body)
    if (!outcome.ok) {
      return this.renderPostForm(state, 'create', { values: outcome.values, errors: outcome.errors }, null, 400)
    }

    const image = await this.saveUpload(outcome.upload)
    const post = await this.repository.createPost({
      title: outcome.data.title,
      text: outcome.data.text,
      pubDate: outcome.data.pub_date,
      authorId: state.viewer.id,
      locationId: outcome.data.location,
      categoryId: outcome.data.category,
      image,
      isPublished: outcome.data.is_published,
    })

    this.auditLogger?.logDataAccess('create', 'Post', post.id, state.viewer.id, this.auditContext(state.request))
    return redirectResponse(profilePath(state.viewer.username), [flash('success', 'Post created.')])
  }

  private async updatePost(state: SignedInState, isPost: boolean): Promise<HttpResponse> {
    const post = await this.loadPost(state)
    const decision = this.guards.post.authorize(post, state.viewer)
    if (!decision.allowed) {
      this.denied(state, 'Post', 'update')
      return redirectResponse(decision.redirectTo)
    }

    if (!isPost) {
      return this.renderPostForm(state, 'edit', emptyFormState(postFormValues(post)), post)
    }

    const outcome = await this.validatePostForm(state.request.body)
    if (!outcome.ok) {
      return this.renderPostForm(state, 'edit', { values: outcome.values, errors: outcome.errors }, post, 400)
    }

    let image = post.image
    if (outcome.upload) {
      image = await this.saveUpload(outcome.upload)
    } else if (outcome.data['image-clear']) {
      image = null
    }

    await this.repository.updatePost(post.id, {
      title: outcome.data.title,
      text: outcome.data.text,
      pubDate: outcome.data.pub_date,
      locationId: outcome.data.location,
      categoryId: outcome.data.category,
      image,
      isPublished: outcome.data.is_published,
    })
    if (post.image && post.image !== image) {
      await this.imageStorage?.deleteImage?.(post.image)
    }

    this.auditLogger?.logDataAccess('update', 'Post', post.id, state.viewer.id, this.auditContext(state.request))
    return redirectResponse(postDetailPath(post.id), [flash('success', 'Post updated.')])
  }

  private async deletePost(state: SignedInState, isPost: boolean): Promise<HttpResponse> {
    const post = await this.loadPost(state)
    const decision = this.guards.post.authorize(post, state.viewer)
    if (!decision.allowed) {
      this.denied(state, 'Post', 'delete')
      return redirectResponse(decision.redirectTo)
    }

    if (!isPost) {
      return this.render(state, { kind: 'post-delete', post })
    }

    await this.repository.deletePost(post.id)
    if (post.image) {
      await this.imageStorage?.deleteImage?.(post.image)
    }

    this.auditLogger?.logDataAccess('delete', 'Post', post.id, state.viewer.id, this.auditContext(state.request))
    return redirectResponse(profilePath(state.viewer.username), [flash('success', 'Post deleted.')])
  }

  private async renderPostForm(
    state: RequestState,
    mode: 'create' | 'edit',
    form: FormState,
    post: PostView | null = null,
    status = 200
  ): Promise<HttpResponse> {
    const [categories, locations] = await Promise.all([
      this.repository.listCategories(),
      this.repository.listLocations(),
    ])

    return this.render(
      state,
      {
        kind: 'post-form',
        view: { mode, postId: post?.id, currentImage: post?.image ?? null, form, categories, locations },
      },
      status
    )
  }

  private async validatePostForm(body: FormBody | undefined): Promise<PostFormOutcome> {
    const result = validateForm(postFormSchema, body)
    const values = textFields(body)
    let errors: FieldErrors = result.ok ? {} : result.errors

    if (result.ok) {
      const category = await this.repository.findCategoryById(result.data.category)
      if (!category) {
        errors = addFieldError(errors, 'category', 'Select a valid choice.')
      }
      if (result.data.location !== null && !(await this.repository.findLocationById(result.data.location))) {
        errors = addFieldError(errors, 'location', 'Select a valid choice.')
      }
    }

    const upload = uploadedImage(body)
    if (upload) {
      if (!this.imageStorage) {
        errors = addFieldError(errors, 'image', 'Image uploads are not available.')
      } else {
        const check = this.imageStorage.validateImage(upload)
        if (!check.valid) {
          errors = addFieldError(errors, 'image', check.error ?? 'Upload a valid image.')
        }
      }
    }

    if (!result.ok || Object.keys(errors).length > 0) {
      return { ok: false, values, errors }
    }
    return { ok: true, data: result.data, upload }
  }

  private async saveUpload(upload: UploadedImage | null): Promise<string | null> {
    if (!upload || !this.imageStorage) {
      return null
    }
    const saved = await this.imageStorage.saveImage(upload)
    return saved.url
  }

  // ==========================================================================
  // Comments
  // ==========================================================================

  private async addComment(state: SignedInState): Promise<HttpResponse> {
    const post = await this.loadVisiblePost(state)

    const result = validateForm(commentFormSchema, state.request.body)
    if (!result.ok) {
      return this.viewPost(state, { values: textFields(state.request.body), errors: result.errors }, 400)
    }

    const comment = await this.repository.createComment({
      text: result.data.text,
      postId: post.id,
      authorId: state.viewer.id,
    })

    this.auditLogger?.logDataAccess('create', 'Comment', comment.id, state.viewer.id, this.auditContext(state.request))
    return redirectResponse(postDetailPath(post.id), [flash('success', 'Comment added.')])
  }

  private async updateComment(state: SignedInState, isPost: boolean): Promise<HttpResponse> {
    const comment = await this.loadComment(state)
    const decision = this.guards.comment.authorize(comment, state.viewer)
    if (!decision.allowed) {
      this.denied(state, 'Comment', 'update')
      return redirectResponse(decision.redirectTo)
    }

    if (!isPost) {
      return this.render(state, { kind: 'comment-form', comment, form: emptyFormState({ text: comment.text }) })
    }

    const result = validateForm(commentFormSchema, state.request.body)
    if (!result.ok) {
      return this.render(
        state,
        { kind: 'comment-form', comment, form: { values: textFields(state.request.body), errors: result.errors } },
        400
      )
    }

    await this.repository.updateComment(comment.id, result.data.text)
    this.auditLogger?.logDataAccess('update', 'Comment', comment.id, state.viewer.id, this.auditContext(state.request))
    return redirectResponse(postDetailPath(comment.postId), [flash('success', 'Comment updated.')])
  }

  private async deleteComment(state: SignedInState, isPost: boolean): Promise<HttpResponse> {
    const comment = await this.loadComment(state)
    const decision = this.guards.comment.authorize(comment, state.viewer)
    if (!decision.allowed) {
      this.denied(state, 'Comment', 'delete')
      return redirectResponse(decision.redirectTo)
    }

    if (!isPost) {
      return this.render(state, { kind: 'comment-delete', comment })
    }

    await this.repository.deleteComment(comment.id)
    this.auditLogger?.logDataAccess('delete', 'Comment', comment.id, state.viewer.id, this.auditContext(state.request))
    return redirectResponse(postDetailPath(comment.postId), [flash('success', 'Comment deleted.')])
  }

  // ==========================================================================
  // Profile
  // ==========================================================================

  private async updateProfile(state: SignedInState, isPost: boolean): Promise<HttpResponse> {
    const user = await this.repository.findUserById(state.viewer.id)
    if (!user) {
      throw new NotFoundError('Profile', { userId: state.viewer.id })
    }

    if (!isPost) {
      return this.render(state, { kind: 'profile-form', form: emptyFormState(profileFormValues(user)) })
    }

    const values = textFields(state.request.body)
    const result = validateForm(profileFormSchema, state.request.body)
    if (!result.ok) {
      return this.render(state, { kind: 'profile-form', form: { values, errors: result.errors } }, 400)
    }

    const taken = await this.repository.findUserByUsername(result.data.username)
    if (taken && taken.id !== user.id) {
      return this.render(
        state,
        { kind: 'profile-form', form: { values, errors: { username: [USERNAME_TAKEN] } } },
        400
      )
    }

    let updated: User
    try {
      updated = await this.repository.updateUser(user.id, {
        username: result.data.username,
        email: result.data.email,
        firstName: result.data.first_name,
        lastName: result.data.last_name,
      })
    } catch (error) {
      if (error instanceof ConflictError) {
        return this.render(
          state,
          { kind: 'profile-form', form: { values, errors: { username: [USERNAME_TAKEN] } } },
          400
        )
      }
      throw error
    }

    this.auditLogger?.logDataAccess('update', 'User', user.id, user.id, this.auditContext(state.request))
    return redirectResponse(profilePath(updated.username), [flash('success', 'Profile updated.')])
  }

  // ==========================================================================
  // Helper Methods
  // ==========================================================================

  private async withViewer(
    state: RequestState,
    operation: (state: SignedInState) => Promise<HttpResponse>
  ): Promise<HttpResponse> {
    const { viewer } = state
    if (viewer === null) {
      return redirectResponse(buildLoginRedirect(state.request))
    }
    return operation({ ...state, viewer })
  }

  private async loadPost(state: RequestState): Promise<PostView> {
    const id = Number.parseInt(state.match.params.id ?? '', 10)
    const post = Number.isNaN(id) ? null : await this.repository.findPostById(id)
    if (!post) {
      throw new NotFoundError('Post', { id: state.match.params.id })
    }
    return post
  }

  /**
   * Load a post the viewer may see; an invisible post is reported as missing
   */
  private async loadVisiblePost(state: RequestState): Promise<PostView> {
    const post = await this.loadPost(state)
    if (!canViewPost(post, state.viewer, state.now)) {
      throw new NotFoundError('Post', { id: post.id })
    }
    return post
  }

  private async loadComment(state: RequestState): Promise<Comment> {
    const postId = Number.parseInt(state.match.params.id ?? '', 10)
    const commentId = Number.parseInt(state.match.params.cid ?? '', 10)
    const comment = Number.isNaN(postId) || Number.isNaN(commentId)
      ? null
      : await this.repository.findComment(postId, commentId)
    if (!comment) {
      throw new NotFoundError('Comment', { postId: state.match.params.id, commentId: state.match.params.cid })
    }
    return comment
  }

  private render(state: RequestState, page: BlogPage, status = 200): HttpResponse {
    return respondWithPage(this.renderer, state.request, state.session, page, status)
  }

  private denied(state: SignedInState, resource: string, action: string): void {
    this.auditLogger?.logAccessDenied(
      `${resource} ${getPathname(state.request)}`,
      action,
      state.viewer.id,
      this.auditContext(state.request)
    )
  }

  private auditContext(request: HttpRequest): AuditContext {
    return {
      ipAddress: extractIp(request),
      userAgent: request.headers['user-agent'],
      requestId: request.headers['x-request-id'],
    }
  }

  private handleError(error: unknown, request: HttpRequest, session: UserSession | null): HttpResponse {
    const sanitized = this.errorSanitizer.sanitize(error)
    const path = getPathname(request)

    if (this.errorSanitizer.shouldLog(error)) {
      console.error(`Request failed: ${request.method} ${path}`, this.errorSanitizer.getLogDetails(error))
      this.auditLogger?.log({
        eventType: 'ERROR',
        severity: 'ERROR',
        action: `Error on ${path}`,
        resource: path,
        success: false,
        userId: session?.user.id,
        ipAddress: extractIp(request),
        metadata: { code: error instanceof AppError ? error.code : undefined, statusCode: sanitized.statusCode },
      })
    }

    let page: BlogPage
    if (sanitized.statusCode === 404) {
      page = { kind: 'not-found', path }
    } else if (sanitized.statusCode >= 500) {
      page = { kind: 'server-error', detail: this.showErrorDetails ? sanitized.message : undefined }
    } else {
      page = { kind: 'error', statusCode: sanitized.statusCode, title: sanitized.error, message: sanitized.message }
    }

    return respondWithPage(this.renderer, request, session, page, sanitized.statusCode)
  }
}

const USERNAME_TAKEN = 'A user with that username already exists.'

type PostFormOutcome =
  | { ok: true; data: PostFormData; upload: UploadedImage | null }
  | { ok: false; values: FormValues; errors: FieldErrors }

function routeMethod(method: string): RouteMethod | null {
  switch (method.toUpperCase()) {
    case 'GET':
    case 'HEAD':
      return 'GET'
    case 'POST':
      return 'POST'
    default:
      return null
  }
}

function methodNotAllowed(match: RouteMatch): HttpResponse {
  return htmlResponse(405, '', { Allow: match.methods.join(', ') })
}

function flash(type: FlashMessage['type'], text: string): string {
  return flashCookieHeader({ type, text })
}

function uploadedImage(body: FormBody | undefined): UploadedImage | null {
  const value = body?.image
  if (value === undefined || typeof value === 'string' || value.size === 0) {
    return null
  }
  return value
}

function postFormValues(post: PostView): FormValues {
  return {
    title: post.title,
    text: post.text,
    pub_date: formatDateTimeLocal(post.pubDate),
    location: post.locationId === null ? '' : String(post.locationId),
    category: post.categoryId === null ? '' : String(post.categoryId),
    is_published: post.isPublished ? 'on' : '',
  }
}

function profileFormValues(user: User): FormValues {
  return {
    username: user.username,
    first_name: user.firstName,
    last_name: user.lastName,
    email: user.email,
  }
}
