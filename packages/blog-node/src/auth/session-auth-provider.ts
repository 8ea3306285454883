/**
 * Session Auth Provider
 *
 * Implements the AuthProvider interface with Better Auth. Better Auth owns
 * password hashing, session tokens and their cookies; profile reads and
 * the duplicate checks behind the registration form go through drizzle.
 */

import { and, eq, lte, ne, sql } from 'drizzle-orm'
import { APIError } from 'better-auth/api'
import {
  ConflictError,
  getCookie,
  NON_FIELD_ERRORS,
  NotFoundError,
  ValidationError,
  type AuthProvider,
  type HttpRequest,
  type NewUser,
  type RegistrationResult,
  type SignInResult,
  type User,
  type UserSession,
} from '@scrivener/blog-core'
import type { DatabaseConnection } from '../database/connection.js'
import { sessions, users } from '../database/schema.js'
import { SESSION_COOKIE, createBlogAuth, type BlogAuth, type BlogAuthSession } from './better-auth.js'

const USERNAME_TAKEN = 'A user with that username already exists.'
const EMAIL_TAKEN = 'A user with that email already exists.'

export interface SessionAuthProviderConfig {
  database: DatabaseConnection
  secret: string
  baseURL: string
  sessionTtlSeconds?: number
  secureCookies?: boolean
}

const userColumns = {
  id: users.id,
  username: users.username,
  email: users.email,
  firstName: users.firstName,
  lastName: users.lastName,
  createdAt: users.createdAt,
}

export class SessionAuthProvider implements AuthProvider {
  private auth: BlogAuth
  private database: DatabaseConnection
  private sessionCookie: string

  constructor(config: SessionAuthProviderConfig) {
    this.database = config.database
    // Better Auth prefixes secure cookies
    this.sessionCookie = config.secureCookies ? `__Secure-${SESSION_COOKIE}` : SESSION_COOKIE
    this.auth = createBlogAuth({
      database: config.database.client,
      secret: config.secret,
      baseURL: config.baseURL,
      sessionTtlSeconds: config.sessionTtlSeconds,
      secureCookies: config.secureCookies,
    })
  }

  async getSession(request: HttpRequest): Promise<UserSession | null> {
    const cookie = request.headers['cookie']
    if (!cookie || !getCookie(request, this.sessionCookie)) {
      return null
    }

    const result = await this.auth.api.getSession({ headers: new Headers({ cookie }) })
    return result ? toUserSession(result) : null
  }

  async signIn(username: string, password: string): Promise<SignInResult | null> {
    let response: Response
    try {
      response = await this.auth.api.signInUsername({ body: { username, password }, asResponse: true })
    } catch (error) {
      if (error instanceof APIError) {
        return null
      }
      throw error
    }
    if (!response.ok) {
      return null
    }

    const cookies = response.headers.getSetCookie()
    const result = await this.auth.api.getSession({ headers: new Headers({ cookie: toCookieHeader(cookies) }) })
    if (!result) {
      return null
    }
    return { session: toUserSession(result), cookies }
  }

  async signOut(request: HttpRequest): Promise<string[]> {
    const cookie = request.headers['cookie']
    if (!cookie) {
      return []
    }
    const response = await this.auth.api.signOut({ headers: new Headers({ cookie }), asResponse: true })
    return response.headers.getSetCookie()
  }

  async register(newUser: NewUser): Promise<RegistrationResult> {
    const errors = this.findTakenFields(newUser)
    if (Object.keys(errors).length > 0) {
      return { ok: false, errors }
    }

    try {
      return { ok: true, user: await this.signUp(newUser) }
    } catch (error) {
      if (error instanceof APIError) {
        return { ok: false, errors: { [NON_FIELD_ERRORS]: [error.message] } }
      }
      throw error
    }
  }

  /**
   * Create a user account outside a request
   * @throws ConflictError when the username or email is taken
   * @throws ValidationError when Better Auth rejects the account
   */
  async createUser(newUser: NewUser): Promise<User> {
    const [taken] = Object.values(this.findTakenFields(newUser)).flat()
    if (taken !== undefined) {
      throw new ConflictError(taken, { username: newUser.username })
    }

    try {
      return await this.signUp(newUser)
    } catch (error) {
      if (error instanceof APIError) {
        throw new ValidationError(error.message, { username: newUser.username })
      }
      throw error
    }
  }

  /**
   * Drop expired sessions
   */
  async cleanup(): Promise<void> {
    this.database.db.delete(sessions).where(lte(sessions.expiresAt, new Date())).run()
  }

  private async signUp(newUser: NewUser): Promise<User> {
    const { user } = await this.auth.api.signUpEmail({
      body: {
        name: [newUser.firstName, newUser.lastName].filter(Boolean).join(' '),
        email: newUser.email,
        password: newUser.password,
        username: newUser.username,
        firstName: newUser.firstName,
        lastName: newUser.lastName,
      },
    })

    const created = this.database.db.select(userColumns).from(users).where(eq(users.id, user.id)).get()
    if (!created) {
      throw new NotFoundError('User', { id: user.id })
    }
    return created
  }

  /**
   * Field errors for a username or email another account already uses.
   * Both are compared case-insensitively.
   */
  private findTakenFields(newUser: NewUser): Record<string, string[]> {
    const { db } = this.database
    const errors: Record<string, string[]> = {}

    const byUsername = db
      .select({ id: users.id })
      .from(users)
      .where(eq(users.username, newUser.username.toLowerCase()))
      .get()
    if (byUsername) {
      errors.username = [USERNAME_TAKEN]
    }

    const email = newUser.email.toLowerCase()
    if (email !== '') {
      const byEmail = db
        .select({ id: users.id })
        .from(users)
        .where(and(ne(users.email, ''), eq(sql`lower(${users.email})`, email)))
        .get()
      if (byEmail) {
        errors.email = [EMAIL_TAKEN]
      }
    }

    return errors
  }
}

/**
 * `name=value` pairs of Set-Cookie headers, joined as a Cookie header
 */
function toCookieHeader(setCookies: string[]): string {
  return setCookies.map((header) => header.split(';', 1)[0]).join('; ')
}

function toUserSession({ session, user }: BlogAuthSession): UserSession {
  return {
    id: session.id,
    userId: session.userId,
    user: {
      id: user.id,
      username: user.username ?? '',
      email: user.email,
      firstName: user.firstName ?? '',
      lastName: user.lastName ?? '',
    },
    expiresAt: session.expiresAt,
    createdAt: session.createdAt,
  }
}
