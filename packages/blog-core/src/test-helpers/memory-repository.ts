/**
 * In-memory BlogRepositoryPort for handler tests.
 * Evaluates post queries with the same in-memory evaluators the core uses
 * for single-post decisions.
 */

import type { UserSession } from '../auth/provider.js'
import type {
  BlogRepositoryPort,
  PageWindow,
  SessionManagerPort,
} from '../routing/request-ports.js'
import type {
  AuthorRef,
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
import { ConflictError, NotFoundError } from '../errors/base-error.js'
import { comparePosts, matchesQuery, type PostQuery } from '../visibility/post-query.js'

const EPOCH = new Date('2024-01-01T00:00:00Z')

export class MemoryBlogRepository implements BlogRepositoryPort {
  users: User[] = []
  categories: Category[] = []
  locations: Location[] = []
  posts: Post[] = []
  comments: Comment[] = []
  private nextId = 1

  // --------------------------------------------------------------------------
  // Seeding
  // --------------------------------------------------------------------------

  addUser(username: string, overrides: Partial<User> = {}): User {
    const user: User = {
      id: `user-${username}`,
      username,
      email: `${username}@example.com`,
      firstName: '',
      lastName: '',
      createdAt: EPOCH,
      ...overrides,
    }
    this.users.push(user)
    return user
  }

  addCategory(slug: string, overrides: Partial<Category> = {}): Category {
    const category: Category = {
      id: this.nextId++,
      title: slug,
      description: `About ${slug}`,
      slug,
      isPublished: true,
      createdAt: EPOCH,
      ...overrides,
    }
    this.categories.push(category)
    return category
  }

  addLocation(name: string, overrides: Partial<Location> = {}): Location {
    const location: Location = { id: this.nextId++, name, isPublished: true, createdAt: EPOCH, ...overrides }
    this.locations.push(location)
    return location
  }

  addPost(author: User, category: Category | null, overrides: Partial<Post> = {}): Post {
    const post: Post = {
      id: this.nextId++,
      title: 'Untitled',
      text: 'Body',
      pubDate: EPOCH,
      authorId: author.id,
      locationId: null,
      categoryId: category?.id ?? null,
      image: null,
      isPublished: true,
      createdAt: EPOCH,
      ...overrides,
    }
    this.posts.push(post)
    return post
  }

  addComment(post: Post, author: User, text: string, overrides: Partial<Comment> = {}): Comment {
    const comment: Comment = {
      id: this.nextId++,
      text,
      postId: post.id,
      authorId: author.id,
      createdAt: EPOCH,
      ...overrides,
    }
    this.comments.push(comment)
    return comment
  }

  // --------------------------------------------------------------------------
  // Posts
  // --------------------------------------------------------------------------

  async findPosts(query: PostQuery, window: PageWindow): Promise<PostView[]> {
    return this.select(query)
      .sort(comparePosts(query.orderBy))
      .slice(window.offset, window.offset + window.limit)
  }

  async countPosts(query: PostQuery): Promise<number> {
    return this.select(query).length
  }

  async findPostById(id: number): Promise<PostView | null> {
    const post = this.posts.find((candidate) => candidate.id === id)
    return post ? this.toView(post, true) : null
  }

  async createPost(data: NewPost): Promise<Post> {
    const post: Post = { id: this.nextId++, createdAt: new Date(), ...data }
    this.posts.push(post)
    return post
  }

  async updatePost(id: number, changes: PostChanges): Promise<Post> {
    const post = this.posts.find((candidate) => candidate.id === id)
    if (!post) {
      throw new NotFoundError('Post', { id })
    }
    Object.assign(post, changes)
    return post
  }

  async deletePost(id: number): Promise<void> {
    this.posts = this.posts.filter((post) => post.id !== id)
    this.comments = this.comments.filter((comment) => comment.postId !== id)
  }

  // --------------------------------------------------------------------------
  // Comments
  // --------------------------------------------------------------------------

  async findComments(postId: number): Promise<CommentView[]> {
    return this.comments
      .filter((comment) => comment.postId === postId)
      .sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime())
      .map((comment) => ({ ...comment, author: this.authorRef(comment.authorId) }))
  }

  async findComment(postId: number, commentId: number): Promise<Comment | null> {
    return this.comments.find((comment) => comment.id === commentId && comment.postId === postId) ?? null
  }

  async createComment(data: NewComment): Promise<Comment> {
    const comment: Comment = { id: this.nextId++, createdAt: new Date(), ...data }
    this.comments.push(comment)
    return comment
  }

  async updateComment(id: number, text: string): Promise<Comment> {
    const comment = this.comments.find((candidate) => candidate.id === id)
    if (!comment) {
      throw new NotFoundError('Comment', { id })
    }
    comment.text = text
    return comment
  }

  async deleteComment(id: number): Promise<void> {
    this.comments = this.comments.filter((comment) => comment.id !== id)
  }

  // --------------------------------------------------------------------------
  // Categories & Locations
  // --------------------------------------------------------------------------

  async findCategoryBySlug(slug: string): Promise<Category | null> {
    return this.categories.find((category) => category.slug === slug) ?? null
  }

  async findCategoryById(id: number): Promise<Category | null> {
    return this.categories.find((category) => category.id === id) ?? null
  }

  async listCategories(): Promise<Category[]> {
    return [...this.categories]
  }

  async createCategory(data: NewCategory): Promise<Category> {
    return this.addCategory(data.slug, { ...data, isPublished: data.isPublished ?? true })
  }

  async setCategoryPublished(slug: string, isPublished: boolean): Promise<Category | null> {
    const category = this.categories.find((candidate) => candidate.slug === slug)
    if (!category) {
      return null
    }
    category.isPublished = isPublished
    return category
  }

  async deleteCategory(slug: string): Promise<boolean> {
    const category = this.categories.find((candidate) => candidate.slug === slug)
    if (!category) {
      return false
    }
    this.categories = this.categories.filter((candidate) => candidate.id !== category.id)
    for (const post of this.posts) {
      if (post.categoryId === category.id) {
        post.categoryId = null
      }
    }
    return true
  }

  async findLocationById(id: number): Promise<Location | null> {
    return this.locations.find((location) => location.id === id) ?? null
  }

  async listLocations(): Promise<Location[]> {
    return [...this.locations]
  }

  async createLocation(data: NewLocation): Promise<Location> {
    return this.addLocation(data.name, { isPublished: data.isPublished ?? true })
  }

  async deleteLocation(id: number): Promise<boolean> {
    const before = this.locations.length
    this.locations = this.locations.filter((location) => location.id !== id)
    for (const post of this.posts) {
      if (post.locationId === id) {
        post.locationId = null
      }
    }
    return this.locations.length < before
  }

  // --------------------------------------------------------------------------
  // Users
  // --------------------------------------------------------------------------

  async findUserByUsername(username: string): Promise<User | null> {
    return this.users.find((user) => user.username === username) ?? null
  }

  async findUserById(id: string): Promise<User | null> {
    return this.users.find((user) => user.id === id) ?? null
  }

  async updateUser(id: string, changes: ProfileChanges): Promise<User> {
    const user = this.users.find((candidate) => candidate.id === id)
    if (!user) {
      throw new NotFoundError('User', { id })
    }
    if (this.users.some((other) => other.id !== id && other.username === changes.username)) {
      throw new ConflictError('Username already taken')
    }
    Object.assign(user, changes)
    return user
  }

  // --------------------------------------------------------------------------
  // Helpers
  // --------------------------------------------------------------------------

  private select(query: PostQuery): PostView[] {
    return this.posts
      .map((post) => this.toView(post, query.annotations.commentCount))
      .filter((post) => matchesQuery(post, query))
  }

  private toView(post: Post, withCommentCount: boolean): PostView {
    return {
      ...post,
      author: this.authorRef(post.authorId),
      category: this.categories.find((category) => category.id === post.categoryId) ?? null,
      location: this.locations.find((location) => location.id === post.locationId) ?? null,
      ...(withCommentCount && {
        commentCount: this.comments.filter((comment) => comment.postId === post.id).length,
      }),
    }
  }

  private authorRef(userId: string): AuthorRef {
    const user = this.users.find((candidate) => candidate.id === userId)
    if (!user) {
      throw new NotFoundError('User', { id: userId })
    }
    return { id: user.id, username: user.username, firstName: user.firstName, lastName: user.lastName }
  }
}

/**
 * Session manager that always reports the given user as signed in
 */
export function sessionManagerFor(user: User | null): SessionManagerPort {
  return {
    async getSession(): Promise<UserSession | null> {
      if (!user) {
        return null
      }
      return {
        id: `session-${user.id}`,
        userId: user.id,
        user: {
          id: user.id,
          username: user.username,
          email: user.email,
          firstName: user.firstName,
          lastName: user.lastName,
        },
        expiresAt: new Date('2099-01-01T00:00:00Z'),
        createdAt: EPOCH,
      }
    },
  }
}
