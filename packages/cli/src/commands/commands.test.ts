import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { mkdtempSync, rmSync } from 'node:fs'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { categoryCreateCommand, categoryDeleteCommand, categoryPublishCommand } from './category.js'
import { locationCreateCommand, locationDeleteCommand } from './location.js'
import { userCreateCommand } from './user.js'
import { withStore } from './store.js'

describe('administrative commands', () => {
  let dir: string
  let database: string

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'scrivener-cli-'))
    database = join(dir, 'blog.db')
    vi.spyOn(console, 'log').mockImplementation(() => {})
  })

  afterEach(() => {
    vi.restoreAllMocks()
    rmSync(dir, { recursive: true, force: true })
  })

  describe('category', () => {
    it('creates a published category', async () => {
      const category = await categoryCreateCommand('news', { title: 'News', description: 'Daily news', database })

      expect(category).toMatchObject({ slug: 'news', title: 'News', description: 'Daily news', isPublished: true })
      expect(console.log).toHaveBeenCalledWith('✅ Created category "News" (/category/news/)')
    })

    it('creates a hidden category', async () => {
      const category = await categoryCreateCommand('drafts', {
        title: 'Drafts',
        description: 'Work in progress',
        hidden: true,
        database,
      })
      expect(category.isPublished).toBe(false)
    })

    it('rejects an invalid slug', async () => {
      await expect(
        categoryCreateCommand('not a slug', { title: 'X', description: 'Y', database })
      ).rejects.toThrow('Invalid slug "not a slug": use only letters, digits, hyphens and underscores')
    })

    it('rejects a duplicate slug', async () => {
      await categoryCreateCommand('news', { title: 'News', description: 'Daily news', database })
      await expect(
        categoryCreateCommand('news', { title: 'Other', description: 'Other', database })
      ).rejects.toMatchObject({ code: 'CONFLICT' })
    })

    it('toggles publication', async () => {
      await categoryCreateCommand('news', { title: 'News', description: 'Daily news', database })

      const hidden = await categoryPublishCommand('news', false, { database })
      expect(hidden.isPublished).toBe(false)

      const stored = await withStore({ database }, ({ repository }) => repository.findCategoryBySlug('news'))
      expect(stored?.isPublished).toBe(false)
    })

    it('fails to publish or delete an unknown category', async () => {
      await expect(categoryPublishCommand('missing', true, { database })).rejects.toThrow('Category not found')
      await expect(categoryDeleteCommand('missing', { database })).rejects.toThrow('Category not found')
    })

    it('deletes a category', async () => {
      await categoryCreateCommand('news', { title: 'News', description: 'Daily news', database })
      await categoryDeleteCommand('news', { database })

      const stored = await withStore({ database }, ({ repository }) => repository.findCategoryBySlug('news'))
      expect(stored).toBeNull()
    })
  })

  describe('location', () => {
    it('creates and deletes a location', async () => {
      const location = await locationCreateCommand('Lisbon', { database })
      expect(location).toMatchObject({ name: 'Lisbon', isPublished: true })

      await locationDeleteCommand(location.id, { database })
      const stored = await withStore({ database }, ({ repository }) => repository.findLocationById(location.id))
      expect(stored).toBeNull()
    })

    it('fails to delete an unknown location', async () => {
      await expect(locationDeleteCommand(99, { database })).rejects.toThrow('Location not found')
    })
  })

  describe('user', () => {
    it('creates a user who can sign in', async () => {
      const user = await userCreateCommand('alice', {
        password: 'correct-horse',
        email: 'alice@example.com',
        firstName: 'Alice',
        database,
      })

      expect(user).toMatchObject({ username: 'alice', email: 'alice@example.com', firstName: 'Alice', lastName: '' })

      const signedIn = await withStore({ database }, ({ authProvider }) => authProvider.signIn('alice', 'correct-horse'))
      expect(signedIn?.session.userId).toBe(user.id)
    })

    it('applies the registration password rules', async () => {
      await expect(userCreateCommand('bob', { password: 'short', email: 'bob@example.com', database })).rejects.toThrow(
        'password: This password is too short. It must contain at least 8 characters.'
      )
    })

    it('requires an email address', async () => {
      await expect(userCreateCommand('bob', { password: 'correct-horse', email: '', database })).rejects.toThrow(
        'email: This field is required.'
      )
    })

    it('refuses a taken username', async () => {
      await userCreateCommand('alice', { password: 'correct-horse', email: 'alice@example.com', database })
      await expect(
        userCreateCommand('alice', { password: 'another-pass', email: 'other@example.com', database })
      ).rejects.toThrow(
        'A user with that username already exists.'
      )
    })
  })
})
