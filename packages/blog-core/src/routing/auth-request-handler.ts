/**
 * Auth Request Handler
 *
 * Log in, log out and registration pages backed by an AuthProvider.
 */

import type { AuthProvider, UserSession } from '../auth/provider.js'
import type { AuditLoggerPort, HttpRequest, HttpResponse, RendererPort } from './request-ports.js'
import { emptyFormState } from '../renderer/form-renderers.js'
import { NON_FIELD_ERRORS, textFields, validateForm } from '../forms/form-processor.js'
import { loginFormSchema, registrationFormSchema } from '../forms/form-schemas.js'
import { respondWithPage } from './page-responder.js'
import { LOGIN_PATH } from './session-resolver.js'
import { extractIp, flashCookieHeader, getSearchParam, isSafeRedirect, redirectResponse } from './request-utils.js'

export type AuthRouteName = 'login' | 'logout' | 'registration'

export interface AuthRequestHandlerConfig {
  authProvider: AuthProvider
  renderer: RendererPort
  auditLogger?: AuditLoggerPort
}

const INVALID_LOGIN = 'Please enter a correct username and password. Note that both fields may be case-sensitive.'

export class AuthRequestHandler {
  private authProvider: AuthProvider
  private renderer: RendererPort
  private auditLogger?: AuditLoggerPort

  constructor(config: AuthRequestHandlerConfig) {
    this.authProvider = config.authProvider
    this.renderer = config.renderer
    this.auditLogger = config.auditLogger
  }

  async handle(
    route: AuthRouteName,
    request: HttpRequest,
    session: UserSession | null,
    isPost: boolean
  ): Promise<HttpResponse> {
    switch (route) {
      case 'login':
        return this.login(request, session, isPost)
      case 'logout':
        return this.logout(request, session)
      case 'registration':
        return this.register(request, session, isPost)
    }
  }

  private async login(request: HttpRequest, session: UserSession | null, isPost: boolean): Promise<HttpResponse> {
    const nextParam = isPost ? textFields(request.body).next : getSearchParam(request, 'next')
    const next = isSafeRedirect(nextParam) ? nextParam : null

    if (!isPost) {
      return respondWithPage(this.renderer, request, session, { kind: 'login', form: emptyFormState(), next })
    }

    const values = textFields(request.body)
    delete values.password
    const result = validateForm(loginFormSchema, request.body)
    if (!result.ok) {
      return respondWithPage(this.renderer, request, session, { kind: 'login', form: { values, errors: result.errors }, next }, 400)
    }

    const signedIn = await this.authProvider.signIn(result.data.username, result.data.password)
    if (!signedIn) {
      this.auditLogger?.log({
        eventType: 'LOGIN_FAILURE',
        severity: 'WARNING',
        action: 'Login failed',
        success: false,
        ipAddress: extractIp(request),
        userAgent: request.headers['user-agent'],
        metadata: { username: result.data.username },
      })
      return respondWithPage(
        this.renderer,
        request,
        session,
        { kind: 'login', form: { values, errors: { [NON_FIELD_ERRORS]: [INVALID_LOGIN] } }, next },
        400
      )
    }

    this.auditLogger?.log({
      eventType: 'LOGIN_SUCCESS',
      severity: 'INFO',
      action: 'Login',
      success: true,
      userId: signedIn.session.userId,
      ipAddress: extractIp(request),
      userAgent: request.headers['user-agent'],
    })
    return redirectResponse(next ?? '/', signedIn.cookies)
  }

  private async logout(request: HttpRequest, session: UserSession | null): Promise<HttpResponse> {
    const cookies: string[] = []
    if (session) {
      cookies.push(...(await this.authProvider.signOut(request)))
      this.auditLogger?.log({
        eventType: 'LOGOUT',
        severity: 'INFO',
        action: 'Logout',
        success: true,
        userId: session.userId,
        ipAddress: extractIp(request),
        userAgent: request.headers['user-agent'],
      })
    }

    return respondWithPage(this.renderer, request, null, { kind: 'logged-out' }, 200, cookies)
  }

  private async register(request: HttpRequest, session: UserSession | null, isPost: boolean): Promise<HttpResponse> {
    if (!isPost) {
      return respondWithPage(this.renderer, request, session, { kind: 'registration', form: emptyFormState() })
    }

    const values = textFields(request.body)
    delete values.password
    delete values.password_confirmation

    const result = validateForm(registrationFormSchema, request.body)
    if (!result.ok) {
      return respondWithPage(this.renderer, request, session, { kind: 'registration', form: { values, errors: result.errors } }, 400)
    }

    const registration = await this.authProvider.register({
      username: result.data.username,
      email: result.data.email,
      firstName: result.data.first_name,
      lastName: result.data.last_name,
      password: result.data.password,
    })
    if (!registration.ok) {
      return respondWithPage(this.renderer, request, session, { kind: 'registration', form: { values, errors: registration.errors } }, 400)
    }

    this.auditLogger?.log({
      eventType: 'REGISTRATION',
      severity: 'INFO',
      action: 'User registered',
      resource: 'User',
      success: true,
      userId: registration.user.id,
      ipAddress: extractIp(request),
      userAgent: request.headers['user-agent'],
    })
    return redirectResponse(LOGIN_PATH, [flashCookieHeader({ type: 'success', text: 'Account created. You can log in now.' })])
  }
}
