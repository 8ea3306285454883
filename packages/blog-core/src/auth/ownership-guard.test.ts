import { describe, it, expect } from 'vitest'
import {
  commentOwnershipGuard,
  createOwnershipGuard,
  postDetailPath,
  postOwnershipGuard,
} from './ownership-guard.js'

describe('postOwnershipGuard', () => {
  const post = { id: 5, authorId: 'user-1' }

  it('allows the author', () => {
    expect(postOwnershipGuard.authorize(post, { id: 'user-1' })).toEqual({ allowed: true })
  })

  it('sends anyone else back to the post page', () => {
    expect(postOwnershipGuard.authorize(post, { id: 'user-2' })).toEqual({
      allowed: false,
      redirectTo: '/posts/5/',
    })
  })

  it('refuses an anonymous actor', () => {
    expect(postOwnershipGuard.authorize(post, null)).toEqual({
      allowed: false,
      redirectTo: '/posts/5/',
    })
  })
})

describe('commentOwnershipGuard', () => {
  it('redirects to the parent post of the comment', () => {
    const comment = { postId: 12, authorId: 'user-3' }
    expect(commentOwnershipGuard.authorize(comment, { id: 'user-4' })).toEqual({
      allowed: false,
      redirectTo: '/posts/12/',
    })
    expect(commentOwnershipGuard.authorize(comment, { id: 'user-3' })).toEqual({ allowed: true })
  })
})

describe('createOwnershipGuard', () => {
  it('uses the given fallback page', () => {
    const guard = createOwnershipGuard<{ authorId: string; slug: string }>((item) => `/items/${item.slug}/`)
    expect(guard.authorize({ authorId: 'user-1', slug: 'x' }, { id: 'user-2' })).toEqual({
      allowed: false,
      redirectTo: '/items/x/',
    })
  })
})

describe('postDetailPath', () => {
  it('builds the detail URL with a trailing slash', () => {
    expect(postDetailPath(42)).toBe('/posts/42/')
  })
})
