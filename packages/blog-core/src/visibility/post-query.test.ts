import { describe, it, expect } from 'vitest'
import {
  buildPostQuery,
  canViewPost,
  comparePosts,
  isPubliclyVisible,
  LIST_ORDERING,
  matchesQuery,
  profileScope,
} from './post-query.js'

const now = new Date('2024-06-01T12:00:00Z')

function makePost(overrides: Partial<Parameters<typeof isPubliclyVisible>[0]> = {}) {
  return {
    isPublished: true,
    pubDate: new Date('2024-05-01T00:00:00Z'),
    authorId: 'user-1',
    categoryId: 10,
    category: { isPublished: true },
    ...overrides,
  }
}

describe('buildPostQuery', () => {
  it('adds the three visibility filters for the public scope', () => {
    const query = buildPostQuery({ scope: 'public', now })

    expect(query.filters).toEqual([
      { kind: 'published' },
      { kind: 'categoryPublished' },
      { kind: 'pubDateReached', now },
    ])
    expect(query.orderBy).toEqual([
      { field: 'pubDate', direction: 'desc' },
      { field: 'title', direction: 'asc' },
    ])
    expect(query.annotations.commentCount).toBe(true)
  })

  it('adds no visibility filters for the full scope', () => {
    const query = buildPostQuery({ scope: 'all', now, authorId: 'user-7' })
    expect(query.filters).toEqual([{ kind: 'author', authorId: 'user-7' }])
  })

  it('narrows by category after the visibility filters', () => {
    const query = buildPostQuery({ scope: 'public', now, categoryId: 3 })
    expect(query.filters.at(-1)).toEqual({ kind: 'category', categoryId: 3 })
    expect(query.filters).toHaveLength(4)
  })

  it('can skip the comment count annotation', () => {
    const query = buildPostQuery({ scope: 'all', now, withCommentCount: false })
    expect(query.annotations.commentCount).toBe(false)
  })

  it('returns a fresh ordering array each time', () => {
    const query = buildPostQuery({ scope: 'public', now })
    query.orderBy.pop()
    expect(LIST_ORDERING).toHaveLength(2)
  })
})

describe('profileScope', () => {
  it('is full for the owner', () => {
    expect(profileScope({ id: 'user-4', username: 'alice' }, 'user-4')).toBe('all')
  })

  it('is public for other users and anonymous viewers', () => {
    expect(profileScope({ id: 'user-5', username: 'bob' }, 'user-4')).toBe('public')
    expect(profileScope(null, 'user-4')).toBe('public')
  })
})

describe('isPubliclyVisible', () => {
  it('accepts a published post in a published category with a past date', () => {
    expect(isPubliclyVisible(makePost(), now)).toBe(true)
  })

  it('accepts a post dated exactly now', () => {
    expect(isPubliclyVisible(makePost({ pubDate: new Date(now) }), now)).toBe(true)
  })

  it('rejects an unpublished post', () => {
    expect(isPubliclyVisible(makePost({ isPublished: false }), now)).toBe(false)
  })

  it('rejects a post whose category is hidden', () => {
    expect(isPubliclyVisible(makePost({ category: { isPublished: false } }), now)).toBe(false)
  })

  it('rejects a post scheduled one millisecond ahead', () => {
    expect(isPubliclyVisible(makePost({ pubDate: new Date(now.getTime() + 1) }), now)).toBe(false)
  })

  it('rejects a post without a category', () => {
    expect(isPubliclyVisible(makePost({ categoryId: null, category: null }), now)).toBe(false)
  })
})

describe('canViewPost', () => {
  const hidden = makePost({ isPublished: false, authorId: 'user-9' })

  it('lets the author see a hidden post', () => {
    expect(canViewPost(hidden, { id: 'user-9', username: 'author' }, now)).toBe(true)
  })

  it('hides it from everyone else', () => {
    expect(canViewPost(hidden, { id: 'user-2', username: 'other' }, now)).toBe(false)
    expect(canViewPost(hidden, null, now)).toBe(false)
  })
})

describe('matchesQuery', () => {
  it('applies author and category filters', () => {
    const query = buildPostQuery({ scope: 'all', now, authorId: 'user-1', categoryId: 10 })
    expect(matchesQuery(makePost(), query)).toBe(true)
    expect(matchesQuery(makePost({ authorId: 'user-2' }), query)).toBe(false)
    expect(matchesQuery(makePost({ categoryId: 11 }), query)).toBe(false)
  })
})

describe('comparePosts', () => {
  it('orders by publication date descending, then title ascending', () => {
    const day = new Date('2024-01-01T00:00:00Z')
    const posts = [
      { title: 'B', pubDate: day, createdAt: day },
      { title: 'A', pubDate: day, createdAt: day },
      { title: 'C', pubDate: new Date('2023-12-31T00:00:00Z'), createdAt: day },
    ]

    const titles = [...posts].sort(comparePosts(LIST_ORDERING)).map((post) => post.title)
    expect(titles).toEqual(['A', 'B', 'C'])
  })
})
