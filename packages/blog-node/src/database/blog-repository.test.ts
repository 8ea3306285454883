import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { eq } from 'drizzle-orm'
import { ConflictError, NotFoundError, buildPostQuery, type Category, type NewPost, type User } from '@scrivener/blog-core'
import { DatabaseConnection, IN_MEMORY, type BlogDatabase } from './connection.js'
import { DrizzleBlogRepository } from './blog-repository.js'
import { accounts, comments, posts, sessions, users } from './schema.js'

const now = new Date('2024-06-01T12:00:00Z')

describe('DrizzleBlogRepository', () => {
  let connection: DatabaseConnection
  let db: BlogDatabase
  let repo: DrizzleBlogRepository
  let alice: User
  let bob: User
  let travel: Category

  function addUser(username: string): User {
    return db
      .insert(users)
      .values({ id: `user-${username}`, username, email: `${username}@example.com` })
      .returning({
        id: users.id,
        username: users.username,
        email: users.email,
        firstName: users.firstName,
        lastName: users.lastName,
        createdAt: users.createdAt,
      })
      .get()
  }

  function newPost(overrides: Partial<NewPost> = {}): NewPost {
    return {
      title: 'Untitled',
      text: 'Body',
      pubDate: new Date('2024-05-01T00:00:00Z'),
      authorId: alice.id,
      locationId: null,
      categoryId: travel.id,
      image: null,
      isPublished: true,
      ...overrides,
    }
  }

  beforeEach(async () => {
    connection = new DatabaseConnection({ path: IN_MEMORY })
    db = connection.connect()
    repo = new DrizzleBlogRepository(db)
    alice = addUser('alice')
    bob = addUser('bob')
    travel = await repo.createCategory({ title: 'Travel', description: 'Trips', slug: 'travel' })
  })

  afterEach(() => {
    connection.close()
  })

  describe('post queries', () => {
    it('applies the public visibility filters', async () => {
      const hidden = await repo.createCategory({
        title: 'Hidden',
        description: 'Drafts',
        slug: 'hidden',
        isPublished: false,
      })
      await repo.createPost(newPost({ title: 'Visible' }))
      await repo.createPost(newPost({ title: 'Unpublished', isPublished: false }))
      await repo.createPost(newPost({ title: 'Future', pubDate: new Date('2024-06-01T12:00:00.001Z') }))
      await repo.createPost(newPost({ title: 'Hidden category', categoryId: hidden.id }))
      await repo.createPost(newPost({ title: 'No category', categoryId: null }))

      const query = buildPostQuery({ scope: 'public', now })
      const found = await repo.findPosts(query, { offset: 0, limit: 10 })

      expect(found.map((post) => post.title)).toEqual(['Visible'])
      expect(await repo.countPosts(query)).toBe(1)
    })

    it('orders by publication date descending, then title', async () => {
      const day = new Date('2024-05-01T00:00:00Z')
      await repo.createPost(newPost({ title: 'B', pubDate: day }))
      await repo.createPost(newPost({ title: 'A', pubDate: day }))
      await repo.createPost(newPost({ title: 'C', pubDate: new Date('2024-04-01T00:00:00Z') }))

      const found = await repo.findPosts(buildPostQuery({ scope: 'public', now }), { offset: 0, limit: 10 })
      expect(found.map((post) => post.title)).toEqual(['A', 'B', 'C'])
    })

    it('applies the page window', async () => {
      for (const title of ['A', 'B', 'C']) {
        await repo.createPost(newPost({ title }))
      }

      const found = await repo.findPosts(buildPostQuery({ scope: 'public', now }), { offset: 1, limit: 1 })
      expect(found.map((post) => post.title)).toEqual(['B'])
    })

    it('joins author, category and location and counts comments', async () => {
      const harbour = await repo.createLocation({ name: 'Harbour' })
      const post = await repo.createPost(newPost({ title: 'Trip', locationId: harbour.id }))
      await repo.createComment({ text: 'Nice', postId: post.id, authorId: bob.id })
      await repo.createComment({ text: 'Thanks', postId: post.id, authorId: alice.id })

      const [found] = await repo.findPosts(buildPostQuery({ scope: 'public', now }), { offset: 0, limit: 10 })

      expect(found?.author).toEqual({ id: alice.id, username: 'alice', firstName: '', lastName: '' })
      expect(found?.category?.slug).toBe('travel')
      expect(found?.location?.name).toBe('Harbour')
      expect(found?.commentCount).toBe(2)
    })

    it('omits the comment count when not requested', async () => {
      await repo.createPost(newPost())

      const [found] = await repo.findPosts(
        buildPostQuery({ scope: 'all', now, withCommentCount: false }),
        { offset: 0, limit: 10 }
      )
      expect(found).toBeDefined()
      expect(found?.commentCount).toBeUndefined()
    })

    it('shows the owner scope every post of that author', async () => {
      await repo.createPost(newPost({ title: 'Draft', isPublished: false }))
      await repo.createPost(newPost({ title: 'Orphan', categoryId: null }))
      await repo.createPost(newPost({ title: 'Bob', authorId: bob.id }))

      const query = buildPostQuery({ scope: 'all', now, authorId: alice.id })
      const found = await repo.findPosts(query, { offset: 0, limit: 10 })

      expect(found.map((post) => post.title)).toEqual(['Draft', 'Orphan'])
      expect(await repo.countPosts(query)).toBe(2)
    })

    it('narrows by category', async () => {
      const food = await repo.createCategory({ title: 'Food', description: 'Meals', slug: 'food' })
      await repo.createPost(newPost({ title: 'Trip' }))
      await repo.createPost(newPost({ title: 'Lunch', categoryId: food.id }))

      const found = await repo.findPosts(
        buildPostQuery({ scope: 'public', now, categoryId: food.id }),
        { offset: 0, limit: 10 }
      )
      expect(found.map((post) => post.title)).toEqual(['Lunch'])
    })
  })

  describe('posts', () => {
    it('finds a post by id with its comment count', async () => {
      const post = await repo.createPost(newPost({ title: 'Trip' }))
      await repo.createComment({ text: 'Nice', postId: post.id, authorId: bob.id })

      const found = await repo.findPostById(post.id)
      expect(found?.title).toBe('Trip')
      expect(found?.commentCount).toBe(1)
      expect(await repo.findPostById(999)).toBeNull()
    })

    it('updates a post', async () => {
      const post = await repo.createPost(newPost())
      const { authorId: _authorId, ...changes } = newPost({ title: 'Edited', image: '/uploads/posts/a.png' })

      const updated = await repo.updatePost(post.id, changes)
      expect(updated.title).toBe('Edited')
      expect(updated.image).toBe('/uploads/posts/a.png')
      expect(updated.authorId).toBe(alice.id)
    })

    it('throws NotFoundError when updating a missing post', async () => {
      const { authorId: _authorId, ...changes } = newPost()
      await expect(repo.updatePost(999, changes)).rejects.toBeInstanceOf(NotFoundError)
    })

    it('removes comments together with their post', async () => {
      const post = await repo.createPost(newPost())
      await repo.createComment({ text: 'Nice', postId: post.id, authorId: bob.id })

      await repo.deletePost(post.id)

      expect(await repo.findPostById(post.id)).toBeNull()
      expect(db.select().from(comments).all()).toEqual([])
    })

    it('clears the category of posts when the category is deleted', async () => {
      const post = await repo.createPost(newPost())

      expect(await repo.deleteCategory('travel')).toBe(true)
      expect(await repo.deleteCategory('travel')).toBe(false)

      const found = await repo.findPostById(post.id)
      expect(found?.categoryId).toBeNull()
      expect(found?.category).toBeNull()
    })

    it('clears the location of posts when the location is deleted', async () => {
      const harbour = await repo.createLocation({ name: 'Harbour' })
      const post = await repo.createPost(newPost({ locationId: harbour.id }))

      expect(await repo.deleteLocation(harbour.id)).toBe(true)
      expect((await repo.findPostById(post.id))?.locationId).toBeNull()
    })
  })

  describe('comments', () => {
    it('lists comments oldest first with their authors', async () => {
      const post = await repo.createPost(newPost())
      await repo.createComment({ text: 'First', postId: post.id, authorId: bob.id })
      await repo.createComment({ text: 'Second', postId: post.id, authorId: alice.id })

      const found = await repo.findComments(post.id)
      expect(found.map((comment) => [comment.text, comment.author.username])).toEqual([
        ['First', 'bob'],
        ['Second', 'alice'],
      ])
    })

    it('finds a comment only under its own post', async () => {
      const first = await repo.createPost(newPost())
      const second = await repo.createPost(newPost())
      const comment = await repo.createComment({ text: 'Nice', postId: first.id, authorId: bob.id })

      expect((await repo.findComment(first.id, comment.id))?.text).toBe('Nice')
      expect(await repo.findComment(second.id, comment.id)).toBeNull()
    })

    it('updates and deletes a comment', async () => {
      const post = await repo.createPost(newPost())
      const comment = await repo.createComment({ text: 'Nice', postId: post.id, authorId: bob.id })

      expect((await repo.updateComment(comment.id, 'Nicer')).text).toBe('Nicer')
      await repo.deleteComment(comment.id)
      expect(await repo.findComments(post.id)).toEqual([])
    })
  })

  describe('categories and locations', () => {
    it('rejects a duplicate slug', async () => {
      await expect(
        repo.createCategory({ title: 'Again', description: 'Dup', slug: 'travel' })
      ).rejects.toBeInstanceOf(ConflictError)
    })

    it('toggles publication of a category', async () => {
      expect((await repo.setCategoryPublished('travel', false))?.isPublished).toBe(false)
      expect((await repo.findCategoryBySlug('travel'))?.isPublished).toBe(false)
      expect(await repo.setCategoryPublished('missing', true)).toBeNull()
    })

    it('lists categories by title and locations by name', async () => {
      await repo.createCategory({ title: 'Art', description: 'Pictures', slug: 'art' })
      await repo.createLocation({ name: 'Town' })
      await repo.createLocation({ name: 'Beach' })

      expect((await repo.listCategories()).map((category) => category.slug)).toEqual(['art', 'travel'])
      expect((await repo.listLocations()).map((location) => location.name)).toEqual(['Beach', 'Town'])
    })
  })

  describe('users', () => {
    it('finds users without exposing auth columns', async () => {
      const found = await repo.findUserByUsername('alice')
      expect(found).toEqual(alice)
      expect(await repo.findUserByUsername('Alice')).toEqual(alice)
      expect(await repo.findUserById(bob.id)).toEqual(bob)
      expect(await repo.findUserByUsername('carol')).toBeNull()
    })

    it('updates a profile', async () => {
      const updated = await repo.updateUser(alice.id, {
        username: 'alicia',
        email: 'alicia@example.com',
        firstName: 'Alicia',
        lastName: 'Liddell',
      })
      expect(updated.username).toBe('alicia')
      expect(updated.firstName).toBe('Alicia')
    })

    it('rejects a username that is already taken', async () => {
      await expect(
        repo.updateUser(alice.id, { username: 'bob', email: '', firstName: '', lastName: '' })
      ).rejects.toBeInstanceOf(ConflictError)
    })
  })

  describe('deleting a user', () => {
    it('removes their posts with every comment on them, their own comments and their sessions', async () => {
      const alicesPost = await repo.createPost(newPost({ title: 'Alice post' }))
      const bobsPost = await repo.createPost(newPost({ title: 'Bob post', authorId: bob.id }))
      await repo.createComment({ text: 'bob on alice', postId: alicesPost.id, authorId: bob.id })
      await repo.createComment({ text: 'alice on bob', postId: bobsPost.id, authorId: alice.id })
      await repo.createComment({ text: 'bob on bob', postId: bobsPost.id, authorId: bob.id })
      db.insert(sessions)
        .values([
          { id: 'alice-session', token: 'alice-token', userId: alice.id, expiresAt: new Date('2099-01-01T00:00:00Z') },
          { id: 'bob-session', token: 'bob-token', userId: bob.id, expiresAt: new Date('2099-01-01T00:00:00Z') },
        ])
        .run()
      db.insert(accounts)
        .values({ id: 'alice-account', accountId: alice.id, providerId: 'credential', userId: alice.id, password: 'test-hash' })
        .run()

      db.delete(users).where(eq(users.id, alice.id)).run()

      expect(db.select({ title: posts.title }).from(posts).all()).toEqual([{ title: 'Bob post' }])
      expect(db.select({ text: comments.text }).from(comments).all()).toEqual([{ text: 'bob on bob' }])
      expect(db.select({ id: sessions.id }).from(sessions).all()).toEqual([{ id: 'bob-session' }])
      expect(db.select().from(accounts).all()).toEqual([])
      expect(await repo.findUserById(alice.id)).toBeNull()
      expect(await repo.findUserById(bob.id)).toEqual(bob)
    })
  })
})
