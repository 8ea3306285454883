import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { eq } from 'drizzle-orm'
import { ConflictError, NON_FIELD_ERRORS, type HttpRequest, type NewUser } from '@scrivener/blog-core'
import { DatabaseConnection, IN_MEMORY, type BlogDatabase } from '../database/connection.js'
import { accounts, sessions } from '../database/schema.js'
import { SESSION_COOKIE } from './better-auth.js'
import { SessionAuthProvider } from './session-auth-provider.js'

const alice: NewUser = {
  username: 'alice',
  email: 'alice@example.com',
  firstName: 'Alice',
  lastName: '',
  password: 'correct-horse',
}

function requestWithCookie(cookie: string): HttpRequest {
  return { method: 'GET', url: '/', headers: { cookie } }
}

function sessionCookie(cookies: string[]): string {
  const header = cookies.find((cookie) => cookie.startsWith(`${SESSION_COOKIE}=`)) ?? ''
  return header.split(';', 1)[0] ?? ''
}

describe('SessionAuthProvider', () => {
  let connection: DatabaseConnection
  let db: BlogDatabase
  let provider: SessionAuthProvider

  beforeEach(() => {
    connection = new DatabaseConnection({ path: IN_MEMORY })
    db = connection.connect()
    provider = new SessionAuthProvider({
      database: connection,
      secret: 'test-secret',
      baseURL: 'http://localhost:3000',
      sessionTtlSeconds: 3600,
    })
  })

  afterEach(() => {
    connection.close()
  })

  async function signInAlice() {
    const signedIn = await provider.signIn('alice', 'correct-horse')
    if (!signedIn) {
      throw new Error('expected a session')
    }
    return signedIn
  }

  describe('register', () => {
    it('creates a user without exposing the password', async () => {
      const result = await provider.register(alice)

      expect(result.ok).toBe(true)
      if (result.ok) {
        expect(result.user).toMatchObject({
          username: 'alice',
          email: 'alice@example.com',
          firstName: 'Alice',
          lastName: '',
        })
        expect(Object.keys(result.user).sort()).toEqual(['createdAt', 'email', 'firstName', 'id', 'lastName', 'username'])
        expect(result.user.createdAt).toBeInstanceOf(Date)
      }
    })

    it('keeps a password hash in the credential account', async () => {
      const result = await provider.register(alice)
      const userId = result.ok ? result.user.id : ''

      const [account] = db.select().from(accounts).where(eq(accounts.userId, userId)).all()
      expect(account?.providerId).toBe('credential')
      expect(account?.password).toBeTruthy()
      expect(account?.password).not.toBe('correct-horse')
    })

    it('reports a taken username as a field error', async () => {
      await provider.register(alice)

      const result = await provider.register({ ...alice, email: 'other@example.com' })
      expect(result).toEqual({
        ok: false,
        errors: { username: ['A user with that username already exists.'] },
      })
    })

    it('compares emails case-insensitively', async () => {
      await provider.register(alice)

      const result = await provider.register({ ...alice, username: 'alice2', email: 'Alice@Example.com' })
      expect(result).toEqual({
        ok: false,
        errors: { email: ['A user with that email already exists.'] },
      })
    })

    it('reports an account Better Auth refuses as a form-wide error', async () => {
      const result = await provider.register({ ...alice, email: 'not-an-email' })

      expect(result.ok).toBe(false)
      if (!result.ok) {
        expect(Object.keys(result.errors)).toEqual([NON_FIELD_ERRORS])
      }
    })

    it('throws ConflictError from createUser for a taken username', async () => {
      await provider.createUser(alice)
      await expect(provider.createUser(alice)).rejects.toBeInstanceOf(ConflictError)
    })
  })

  describe('signIn', () => {
    beforeEach(async () => {
      await provider.createUser(alice)
    })

    it('opens a session and returns its cookie', async () => {
      const before = Date.now()
      const result = await signInAlice()

      expect(result.session.user.username).toBe('alice')
      expect(sessionCookie(result.cookies)).toMatch(new RegExp(`^${SESSION_COOKIE}=.+`))
      const ttl = result.session.expiresAt.getTime() - before
      expect(ttl).toBeGreaterThanOrEqual(3600 * 1000 - 1000)
      expect(ttl).toBeLessThanOrEqual(3600 * 1000 + 5000)
    })

    it('accepts the username in any case', async () => {
      expect(await provider.signIn('ALICE', 'correct-horse')).not.toBeNull()
    })

    it('returns null for a wrong password or unknown user', async () => {
      expect(await provider.signIn('alice', 'wrong-horse')).toBeNull()
      expect(await provider.signIn('nobody', 'correct-horse')).toBeNull()
    })
  })

  describe('getSession', () => {
    beforeEach(async () => {
      await provider.createUser(alice)
    })

    it('resolves the session from the cookie', async () => {
      const signedIn = await signInAlice()

      const session = await provider.getSession(requestWithCookie(sessionCookie(signedIn.cookies)))
      expect(session?.id).toBe(signedIn.session.id)
      expect(session?.userId).toBe(signedIn.session.user.id)
      expect(session?.user).toEqual({
        id: signedIn.session.user.id,
        username: 'alice',
        email: 'alice@example.com',
        firstName: 'Alice',
        lastName: '',
      })
    })

    it('returns null without a cookie or for an unknown token', async () => {
      expect(await provider.getSession({ method: 'GET', url: '/', headers: {} })).toBeNull()
      expect(await provider.getSession(requestWithCookie(`${SESSION_COOKIE}=unknown`))).toBeNull()
    })

    it('ignores an expired session', async () => {
      const signedIn = await signInAlice()
      db.update(sessions)
        .set({ expiresAt: new Date(Date.now() - 1000) })
        .where(eq(sessions.id, signedIn.session.id))
        .run()

      expect(await provider.getSession(requestWithCookie(sessionCookie(signedIn.cookies)))).toBeNull()
    })
  })

  describe('signOut', () => {
    it('destroys the session and clears the cookie', async () => {
      await provider.createUser(alice)
      const signedIn = await signInAlice()
      const request = requestWithCookie(sessionCookie(signedIn.cookies))

      const cookies = await provider.signOut(request)

      const cleared = cookies.find((cookie) => cookie.startsWith(`${SESSION_COOKIE}=;`))
      expect(cleared).toContain('Max-Age=0')
      expect(db.select().from(sessions).all()).toEqual([])
      expect(await provider.getSession(request)).toBeNull()
    })

    it('clears nothing without a cookie', async () => {
      expect(await provider.signOut({ method: 'GET', url: '/', headers: {} })).toEqual([])
    })
  })

  describe('cleanup', () => {
    it('removes only expired sessions', async () => {
      const user = await provider.createUser(alice)
      const now = Date.now()
      db.insert(sessions)
        .values([
          { id: 'expired', token: 'expired-token', userId: user.id, expiresAt: new Date(now - 60_000) },
          { id: 'current', token: 'current-token', userId: user.id, expiresAt: new Date(now + 60_000) },
        ])
        .run()

      await provider.cleanup()

      expect(db.select({ id: sessions.id }).from(sessions).all()).toEqual([{ id: 'current' }])
    })
  })
})
