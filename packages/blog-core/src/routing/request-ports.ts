/**
 * Request Handler Ports
 *
 * Platform-agnostic interfaces for HTTP request handling.
 * The Node runtime provides the concrete implementations.
 */

import type { UserSession } from '../auth/provider.js'
import type {
  Category,
  Comment,
  CommentView,
  Location,
  NewCategory,
  NewComment,
  NewLocation,
  NewPost,
  Post,
  PostChanges,
  PostView,
  ProfileChanges,
  User,
} from '../types/blog.js'
import type { PostQuery } from '../visibility/post-query.js'
import type { BlogPage } from '../renderer/html-renderer.js'
import type { PageContext } from '../renderer/document-wrapper.js'

/**
 * Uploaded file as handed over by the HTTP layer (a Web `File` fits)
 */
export interface UploadedImage {
  name: string
  type: string
  size: number
  arrayBuffer(): Promise<ArrayBuffer>
}

export type FormValue = string | UploadedImage

export type FormBody = Record<string, FormValue>

/**
 * Generic HTTP request interface
 */
export interface HttpRequest {
  method: string
  url: string
  headers: Record<string, string | undefined>
  body?: FormBody
}

/**
 * Generic HTTP response interface
 */
export interface HttpResponse {
  status: number
  headers: Record<string, string>
  cookies?: string[]
  body: string
}

export interface FlashMessage {
  type: 'success' | 'error' | 'info'
  text: string
}

export interface PageWindow {
  limit: number
  offset: number
}

/**
 * Storage port - everything the handlers read and write
 */
export interface BlogRepositoryPort {
  findPosts(query: PostQuery, window: PageWindow): Promise<PostView[]>
  countPosts(query: PostQuery): Promise<number>
  findPostById(id: number): Promise<PostView | null>
  createPost(data: NewPost): Promise<Post>
  updatePost(id: number, changes: PostChanges): Promise<Post>
  deletePost(id: number): Promise<void>

  findComments(postId: number): Promise<CommentView[]>
  findComment(postId: number, commentId: number): Promise<Comment | null>
  createComment(data: NewComment): Promise<Comment>
  updateComment(id: number, text: string): Promise<Comment>
  deleteComment(id: number): Promise<void>

  findCategoryBySlug(slug: string): Promise<Category | null>
  findCategoryById(id: number): Promise<Category | null>
  listCategories(): Promise<Category[]>
  createCategory(data: NewCategory): Promise<Category>
  setCategoryPublished(slug: string, isPublished: boolean): Promise<Category | null>
  deleteCategory(slug: string): Promise<boolean>

  findLocationById(id: number): Promise<Location | null>
  listLocations(): Promise<Location[]>
  createLocation(data: NewLocation): Promise<Location>
  deleteLocation(id: number): Promise<boolean>

  findUserByUsername(username: string): Promise<User | null>
  findUserById(id: string): Promise<User | null>
  updateUser(id: string, changes: ProfileChanges): Promise<User>
}

/**
 * Session manager port - resolves the current user
 */
export interface SessionManagerPort {
  getSession(request: HttpRequest): Promise<UserSession | null>
}

/**
 * Renderer port - turns a page description into a full HTML document
 */
export interface RendererPort {
  renderPage(page: BlogPage, context: PageContext): string
}

/**
 * Image storage port - handles post image uploads
 */
export interface ImageStoragePort {
  validateImage(file: UploadedImage): { valid: boolean; error?: string }
  saveImage(file: UploadedImage): Promise<{ url: string }>
  deleteImage?(url: string): Promise<void>
}

/**
 * Audit logger port - logs security events
 */
export interface AuditLoggerPort {
  log(event: LogEvent): void
  logAccessDenied(resource: string, action: string, userId?: string, context?: AuditContext): void
  logDataAccess(
    action: 'create' | 'update' | 'delete',
    entity: string,
    recordId: number | string | undefined,
    userId: string | undefined,
    context?: AuditContext
  ): void
}

export interface AuditContext {
  ipAddress?: string
  userAgent?: string
  requestId?: string
}

export interface LogEvent {
  eventType: string
  severity: 'INFO' | 'WARNING' | 'ERROR'
  action: string
  resource?: string
  success: boolean
  userId?: string
  ipAddress?: string
  userAgent?: string
  metadata?: Record<string, unknown>
}
