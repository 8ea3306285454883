/**
 * AuthProvider Interface
 *
 * Defines the contract for the authentication subsystem that owns users and
 * sessions. The blog core only reads the session and asks the provider to
 * sign users in and out.
 */

import type { HttpRequest } from '../routing/request-ports.js'
import type { NewUser, User } from '../types/blog.js'

/**
 * User session information returned by authentication providers
 */
export interface UserSession {
  id: string
  userId: string
  user: Pick<User, 'id' | 'username' | 'email' | 'firstName' | 'lastName'>
  expiresAt: Date
  createdAt: Date
}

export interface SignInResult {
  session: UserSession
  /**
   * Set-Cookie header values carrying the session token
   */
  cookies: string[]
}

export type RegistrationResult =
  | { ok: true; user: User }
  | { ok: false; errors: Record<string, string[]> }

/**
 * AuthProvider interface
 *
 * All authentication providers must implement this interface.
 */
export interface AuthProvider {
  /**
   * Get session from request
   * Returns null if no valid session exists
   */
  getSession(request: HttpRequest): Promise<UserSession | null>

  /**
   * Verify credentials and open a session
   * Returns null when the credentials do not match
   */
  signIn(username: string, password: string): Promise<SignInResult | null>

  /**
   * Destroy the request's session and return the Set-Cookie headers that clear it
   */
  signOut(request: HttpRequest): Promise<string[]>

  /**
   * Create a user account
   */
  register(user: NewUser): Promise<RegistrationResult>

  /**
   * Cleanup/shutdown the auth provider
   */
  cleanup?(): Promise<void>
}
