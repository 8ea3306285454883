/**
 * Blog Domain Types
 *
 * Entities stored by the blog and the projections the request handlers read.
 */

/**
 * Shared trait of entities that can be hidden from the public
 */
export interface PublishedModel {
  isPublished: boolean
  createdAt: Date
}

export interface Location extends PublishedModel {
  id: number
  name: string
}

export interface Category extends PublishedModel {
  id: number
  title: string
  description: string
  slug: string
}

export interface User {
  id: string
  username: string
  email: string
  firstName: string
  lastName: string
  createdAt: Date
}

export interface Post extends PublishedModel {
  id: number
  title: string
  text: string
  pubDate: Date
  authorId: string
  locationId: number | null
  categoryId: number | null
  image: string | null
}

export interface Comment {
  id: number
  text: string
  postId: number
  authorId: string
  createdAt: Date
}

/**
 * Minimal author projection joined onto posts and comments
 */
export interface AuthorRef {
  id: string
  username: string
  firstName: string
  lastName: string
}

/**
 * Post with its relations loaded, as shown on list and detail pages
 */
export interface PostView extends Post {
  author: AuthorRef
  category: Category | null
  location: Location | null
  commentCount?: number
}

export interface CommentView extends Comment {
  author: AuthorRef
}

/**
 * Anyone anonymous is `null`
 */
export type Viewer = Pick<User, 'id' | 'username'> | null

export interface NewPost {
  title: string
  text: string
  pubDate: Date
  authorId: string
  locationId: number | null
  categoryId: number | null
  image: string | null
  isPublished: boolean
}

export type PostChanges = Omit<NewPost, 'authorId'>

export interface NewComment {
  text: string
  postId: number
  authorId: string
}

export interface NewCategory {
  title: string
  description: string
  slug: string
  isPublished?: boolean
}

export interface NewLocation {
  name: string
  isPublished?: boolean
}

export interface ProfileChanges {
  username: string
  email: string
  firstName: string
  lastName: string
}

export interface NewUser extends ProfileChanges {
  password: string
}
