/**
 * Post Query Composition
 *
 * Builds the query description that decides which posts a viewer sees.
 * Storage adapters translate the description into one statement; the
 * in-memory evaluators below apply the same rules to a single loaded post.
 */

import type { Category, Post, PostView, Viewer } from '../types/blog.js'

export type PostScope = 'public' | 'all'

export type PostFilter =
  | { kind: 'published' }
  | { kind: 'categoryPublished' }
  | { kind: 'pubDateReached'; now: Date }
  | { kind: 'category'; categoryId: number }
  | { kind: 'author'; authorId: string }

export type PostOrderField = 'pubDate' | 'title' | 'createdAt'

export interface PostOrder {
  field: PostOrderField
  direction: 'asc' | 'desc'
}

export interface PostQuery {
  filters: PostFilter[]
  orderBy: PostOrder[]
  annotations: {
    commentCount: boolean
  }
}

export interface PostQueryOptions {
  scope: PostScope
  now: Date
  categoryId?: number
  authorId?: string
  withCommentCount?: boolean
}

/**
 * Ordering used by every list page: newest publication first, title breaks ties
 */
export const LIST_ORDERING: readonly PostOrder[] = [
  { field: 'pubDate', direction: 'desc' },
  { field: 'title', direction: 'asc' },
]

/**
 * The three filters making up the public visibility predicate
 */
export function publicFilters(now: Date): PostFilter[] {
  return [
    { kind: 'published' },
    { kind: 'categoryPublished' },
    { kind: 'pubDateReached', now },
  ]
}

export function buildPostQuery(options: PostQueryOptions): PostQuery {
  const filters: PostFilter[] = options.scope === 'public' ? publicFilters(options.now) : []

  if (options.categoryId !== undefined) {
    filters.push({ kind: 'category', categoryId: options.categoryId })
  }

  if (options.authorId !== undefined) {
    filters.push({ kind: 'author', authorId: options.authorId })
  }

  return {
    filters,
    orderBy: [...LIST_ORDERING],
    annotations: {
      commentCount: options.withCommentCount ?? true,
    },
  }
}

/**
 * A user looking at their own profile sees every post they wrote
 */
export function profileScope(viewer: Viewer, ownerId: string): PostScope {
  return viewer !== null && viewer.id === ownerId ? 'all' : 'public'
}

type FilterablePost = Pick<Post, 'isPublished' | 'pubDate' | 'authorId' | 'categoryId'> & {
  category: Pick<Category, 'isPublished'> | null
}

export function matchesFilter(post: FilterablePost, filter: PostFilter): boolean {
  switch (filter.kind) {
    case 'published':
      return post.isPublished
    case 'categoryPublished':
      // Uncategorized posts never pass
      return post.category?.isPublished === true
    case 'pubDateReached':
      return post.pubDate.getTime() <= filter.now.getTime()
    case 'category':
      return post.categoryId === filter.categoryId
    case 'author':
      return post.authorId === filter.authorId
  }
}

export function matchesQuery(post: FilterablePost, query: PostQuery): boolean {
  return query.filters.every((filter) => matchesFilter(post, filter))
}

export function isPubliclyVisible(post: FilterablePost, now: Date): boolean {
  return publicFilters(now).every((filter) => matchesFilter(post, filter))
}

export function canViewPost(post: FilterablePost, viewer: Viewer, now: Date): boolean {
  if (viewer !== null && viewer.id === post.authorId) {
    return true
  }
  return isPubliclyVisible(post, now)
}

/**
 * Comparator honouring a query's ordering
 */
export function comparePosts(
  orderBy: readonly PostOrder[]
): (a: Pick<PostView, PostOrderField>, b: Pick<PostView, PostOrderField>) => number {
  return (a, b) => {
    for (const { field, direction } of orderBy) {
      const left = a[field]
      const right = b[field]
      let result = 0
      if (left instanceof Date && right instanceof Date) {
        result = left.getTime() - right.getTime()
      } else if (typeof left === 'string' && typeof right === 'string') {
        result = left < right ? -1 : left > right ? 1 : 0
      }
      if (result !== 0) {
        return direction === 'asc' ? result : -result
      }
    }
    return 0
  }
}
