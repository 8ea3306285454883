/**
 * Drizzle Blog Repository
 *
 * SQLite implementation of BlogRepositoryPort. A post query description
 * becomes one SELECT joining author, category and location, with a
 * correlated subquery for the comment count.
 */

import { and, asc, count, desc, eq, lte, sql, type SQL } from 'drizzle-orm'
import type { SQLiteColumn } from 'drizzle-orm/sqlite-core'
import {
  ConflictError,
  NotFoundError,
  type AuthorRef,
  type BlogRepositoryPort,
  type Category,
  type Comment,
  type CommentView,
  type Location,
  type NewCategory,
  type NewComment,
  type NewLocation,
  type NewPost,
  type PageWindow,
  type Post,
  type PostChanges,
  type PostFilter,
  type PostOrder,
  type PostOrderField,
  type PostQuery,
  type PostView,
  type ProfileChanges,
  type User,
} from '@scrivener/blog-core'
import type { BlogDatabase } from './connection.js'
import { categories, comments, locations, posts, users } from './schema.js'

const ORDER_COLUMNS: Record<PostOrderField, SQLiteColumn> = {
  pubDate: posts.pubDate,
  title: posts.title,
  createdAt: posts.createdAt,
}

const authorColumns = {
  id: users.id,
  username: users.username,
  firstName: users.firstName,
  lastName: users.lastName,
}

const userColumns = {
  id: users.id,
  username: users.username,
  email: users.email,
  firstName: users.firstName,
  lastName: users.lastName,
  createdAt: users.createdAt,
}

export class DrizzleBlogRepository implements BlogRepositoryPort {
  constructor(private db: BlogDatabase) {}

  // ==========================================================================
  // Posts
  // ==========================================================================

  async findPosts(query: PostQuery, window: PageWindow): Promise<PostView[]> {
    const rows = this.selectPosts(query.annotations.commentCount)
      .where(whereClause(query.filters))
      .orderBy(...orderClause(query.orderBy))
      .limit(window.limit)
      .offset(window.offset)
      .all()
    return rows.map(toPostView)
  }

  async countPosts(query: PostQuery): Promise<number> {
    const row = this.db
      .select({ total: count() })
      .from(posts)
      .leftJoin(categories, eq(posts.categoryId, categories.id))
      .where(whereClause(query.filters))
      .get()
    return row?.total ?? 0
  }

  async findPostById(id: number): Promise<PostView | null> {
    const row = this.selectPosts(true).where(eq(posts.id, id)).get()
    return row ? toPostView(row) : null
  }

  async createPost(data: NewPost): Promise<Post> {
    return this.db
      .insert(posts)
      .values({ ...data, createdAt: new Date() })
      .returning()
      .get()
  }

  async updatePost(id: number, changes: PostChanges): Promise<Post> {
    const row = this.db.update(posts).set(changes).where(eq(posts.id, id)).returning().get()
    if (!row) {
      throw new NotFoundError('Post', { id })
    }
    return row
  }

  async deletePost(id: number): Promise<void> {
    this.db.delete(posts).where(eq(posts.id, id)).run()
  }

  private selectPosts(withCommentCount: boolean) {
    const commentCount: SQL<number | null> = withCommentCount
      ? sql<number>`(select count(*) from ${comments} where ${comments.postId} = ${posts.id})`.mapWith(Number)
      : sql<null>`null`

    return this.db
      .select({
        post: posts,
        author: authorColumns,
        category: categories,
        location: locations,
        commentCount,
      })
      .from(posts)
      .innerJoin(users, eq(posts.authorId, users.id))
      .leftJoin(categories, eq(posts.categoryId, categories.id))
      .leftJoin(locations, eq(posts.locationId, locations.id))
  }

  // ==========================================================================
  // Comments
  // ==========================================================================

  async findComments(postId: number): Promise<CommentView[]> {
    return this.db
      .select({ comment: comments, author: authorColumns })
      .from(comments)
      .innerJoin(users, eq(comments.authorId, users.id))
      .where(eq(comments.postId, postId))
      .orderBy(asc(comments.createdAt), asc(comments.id))
      .all()
      .map(({ comment, author }) => ({ ...comment, author }))
  }

  async findComment(postId: number, commentId: number): Promise<Comment | null> {
    const row = this.db
      .select()
      .from(comments)
      .where(and(eq(comments.id, commentId), eq(comments.postId, postId)))
      .get()
    return row ?? null
  }

  async createComment(data: NewComment): Promise<Comment> {
    return this.db
      .insert(comments)
      .values({ ...data, createdAt: new Date() })
      .returning()
      .get()
  }

  async updateComment(id: number, text: string): Promise<Comment> {
    const row = this.db.update(comments).set({ text }).where(eq(comments.id, id)).returning().get()
    if (!row) {
      throw new NotFoundError('Comment', { id })
    }
    return row
  }

  async deleteComment(id: number): Promise<void> {
    this.db.delete(comments).where(eq(comments.id, id)).run()
  }

  // ==========================================================================
  // Categories & Locations
  // ==========================================================================

  async findCategoryBySlug(slug: string): Promise<Category | null> {
    return this.db.select().from(categories).where(eq(categories.slug, slug)).get() ?? null
  }

  async findCategoryById(id: number): Promise<Category | null> {
    return this.db.select().from(categories).where(eq(categories.id, id)).get() ?? null
  }

  async listCategories(): Promise<Category[]> {
    return this.db.select().from(categories).orderBy(asc(categories.title)).all()
  }

  async createCategory(data: NewCategory): Promise<Category> {
    try {
      return this.db
        .insert(categories)
        .values({ ...data, isPublished: data.isPublished ?? true, createdAt: new Date() })
        .returning()
        .get()
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError(`A category with slug "${data.slug}" already exists`, { slug: data.slug })
      }
      throw error
    }
  }

  async setCategoryPublished(slug: string, isPublished: boolean): Promise<Category | null> {
    const row = this.db
      .update(categories)
      .set({ isPublished })
      .where(eq(categories.slug, slug))
      .returning()
      .get()
    return row ?? null
  }

  async deleteCategory(slug: string): Promise<boolean> {
    const deleted = this.db
      .delete(categories)
      .where(eq(categories.slug, slug))
      .returning({ id: categories.id })
      .all()
    return deleted.length > 0
  }

  async findLocationById(id: number): Promise<Location | null> {
    return this.db.select().from(locations).where(eq(locations.id, id)).get() ?? null
  }

  async listLocations(): Promise<Location[]> {
    return this.db.select().from(locations).orderBy(asc(locations.name)).all()
  }

  async createLocation(data: NewLocation): Promise<Location> {
    return this.db
      .insert(locations)
      .values({ name: data.name, isPublished: data.isPublished ?? true, createdAt: new Date() })
      .returning()
      .get()
  }

  async deleteLocation(id: number): Promise<boolean> {
    const deleted = this.db
      .delete(locations)
      .where(eq(locations.id, id))
      .returning({ id: locations.id })
      .all()
    return deleted.length > 0
  }

  // ==========================================================================
  // Users
  // ==========================================================================

  async findUserByUsername(username: string): Promise<User | null> {
    return this.db.select(userColumns).from(users).where(eq(users.username, username.toLowerCase())).get() ?? null
  }

  async findUserById(id: string): Promise<User | null> {
    return this.db.select(userColumns).from(users).where(eq(users.id, id)).get() ?? null
  }

  async updateUser(id: string, changes: ProfileChanges): Promise<User> {
    const name = [changes.firstName, changes.lastName].filter(Boolean).join(' ')
    let row: User | undefined
    try {
      row = this.db
        .update(users)
        .set({ ...changes, name })
        .where(eq(users.id, id))
        .returning(userColumns)
        .get()
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('Username already taken', { username: changes.username })
      }
      throw error
    }
    if (!row) {
      throw new NotFoundError('User', { id })
    }
    return row
  }
}

function filterCondition(filter: PostFilter): SQL {
  switch (filter.kind) {
    case 'published':
      return eq(posts.isPublished, true)
    case 'categoryPublished':
      // A post without a category joins NULL here and drops out
      return eq(categories.isPublished, true)
    case 'pubDateReached':
      return lte(posts.pubDate, filter.now)
    case 'category':
      return eq(posts.categoryId, filter.categoryId)
    case 'author':
      return eq(posts.authorId, filter.authorId)
  }
}

function whereClause(filters: PostFilter[]): SQL | undefined {
  return and(...filters.map(filterCondition))
}

function orderClause(orderBy: readonly PostOrder[]): SQL[] {
  return orderBy.map(({ field, direction }) =>
    direction === 'asc' ? asc(ORDER_COLUMNS[field]) : desc(ORDER_COLUMNS[field])
  )
}

interface PostRow {
  post: Post
  author: AuthorRef
  category: Category | null
  location: Location | null
  commentCount: number | null
}

function toPostView(row: PostRow): PostView {
  return {
    ...row.post,
    author: row.author,
    category: row.category,
    location: row.location,
    ...(row.commentCount !== null && { commentCount: row.commentCount }),
  }
}

/**
 * better-sqlite3 reports constraint failures with a SQLITE_CONSTRAINT_* code
 */
export function isUniqueViolation(error: unknown): boolean {
  return (
    error instanceof Error &&
    'code' in error &&
    (error.code === 'SQLITE_CONSTRAINT_UNIQUE' || error.code === 'SQLITE_CONSTRAINT_PRIMARYKEY')
  )
}
