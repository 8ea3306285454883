/**
 * Ownership Guard
 *
 * Decides whether an actor may change a resource. A refusal is not an
 * error: it carries the page the actor is sent back to.
 */

import type { Comment, Post } from '../types/blog.js'

export interface Owned {
  authorId: string
}

export interface Actor {
  id: string
}

export type AuthorizationDecision =
  | { allowed: true }
  | { allowed: false; redirectTo: string }

export interface OwnershipGuard<R extends Owned> {
  authorize(resource: R, actor: Actor | null): AuthorizationDecision
}

/**
 * Create a guard that allows only the resource's author.
 * `fallback` names the parent detail page used when access is refused.
 */
export function createOwnershipGuard<R extends Owned>(
  fallback: (resource: R) => string
): OwnershipGuard<R> {
  return {
    authorize(resource, actor) {
      if (actor !== null && resource.authorId === actor.id) {
        return { allowed: true }
      }
      return { allowed: false, redirectTo: fallback(resource) }
    },
  }
}

export function postDetailPath(postId: number): string {
  return `/posts/${postId}/`
}

export const postOwnershipGuard: OwnershipGuard<Pick<Post, 'id' | 'authorId'>> =
  createOwnershipGuard((post) => postDetailPath(post.id))

export const commentOwnershipGuard: OwnershipGuard<Pick<Comment, 'postId' | 'authorId'>> =
  createOwnershipGuard((comment) => postDetailPath(comment.postId))

export interface MutationGuards {
  post: OwnershipGuard<Pick<Post, 'id' | 'authorId'>>
  comment: OwnershipGuard<Pick<Comment, 'postId' | 'authorId'>>
}

export const defaultMutationGuards: MutationGuards = {
  post: postOwnershipGuard,
  comment: commentOwnershipGuard,
}
