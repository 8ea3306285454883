import { afterEach, beforeEach, describe, expect, it } from 'vitest'
import { mkdtemp, rm } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import path from 'node:path'
import type { Hono } from 'hono'
import { BlogEngine } from '../src/engine.js'
import { DatabaseConnection, DrizzleBlogRepository } from '../src/database/index.js'
import type { BlogEnv, EngineConfig } from '../src/types/index.js'

/**
 * In-process tests of the assembled application through app.request()
 */

type FormFields = Record<string, string | File>

class CookieJar {
  private cookies = new Map<string, string>()

  store(response: Response): void {
    for (const header of response.headers.getSetCookie()) {
      const [pair = '', ...attributes] = header.split(';')
      const separator = pair.indexOf('=')
      const name = pair.slice(0, separator).trim()
      const value = pair.slice(separator + 1).trim()
      const expired = attributes.some((attribute) => attribute.trim().toLowerCase() === 'max-age=0')
      if (expired) {
        this.cookies.delete(name)
      } else {
        this.cookies.set(name, value)
      }
    }
  }

  get(name: string): string | undefined {
    return this.cookies.get(name)
  }

  header(): string {
    return [...this.cookies].map(([name, value]) => `${name}=${value}`).join('; ')
  }
}

describe('HTTP application', () => {
  let dir: string
  let engine: BlogEngine
  let app: Hono<BlogEnv>
  let jar: CookieJar
  let categoryId: number

  async function get(url: string): Promise<Response> {
    const response = await app.request(url, { headers: { cookie: jar.header() } })
    jar.store(response)
    return response
  }

  async function post(url: string, fields: FormFields, options: { multipart?: boolean; csrf?: boolean } = {}) {
    const withToken: FormFields = { ...fields }
    const token = jar.get('csrf-token')
    if (options.csrf !== false && token) {
      withToken._csrf = token
    }

    let body: FormData | URLSearchParams
    if (options.multipart) {
      body = new FormData()
      for (const [key, value] of Object.entries(withToken)) {
        body.append(key, value)
      }
    } else {
      body = new URLSearchParams()
      for (const [key, value] of Object.entries(withToken)) {
        if (typeof value === 'string') body.append(key, value)
      }
    }

    const response = await app.request(url, { method: 'POST', body, headers: { cookie: jar.header() } })
    jar.store(response)
    return response
  }

  async function signUpAndLogIn(username: string): Promise<void> {
    await get('/auth/registration/')
    const registered = await post('/auth/registration/', {
      username,
      email: `${username}@example.com`,
      first_name: '',
      last_name: '',
      password: 'correct-horse',
      password_confirmation: 'correct-horse',
    })
    expect(registered.status).toBe(303)
    expect(registered.headers.get('Location')).toBe('/auth/login/')

    const loggedIn = await post('/auth/login/', { username, password: 'correct-horse' })
    expect(loggedIn.status).toBe(303)
    expect(loggedIn.headers.get('Location')).toBe('/')
    expect(jar.get('scrivener.session_token')).toBeTruthy()
  }

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'scrivener-http-'))
    const config: EngineConfig = {
      port: 0,
      host: '127.0.0.1',
      databasePath: path.join(dir, 'blog.db'),
      uploadDir: path.join(dir, 'uploads'),
      auditLogPath: path.join(dir, 'audit.log'),
      postsPerPage: 10,
      sessionTtlSeconds: 3600,
      authSecret: 'test-secret',
      baseUrl: 'http://localhost:3000',
      environment: 'test',
      siteName: 'Test Blog',
    }
    engine = new BlogEngine(config, { clock: () => new Date('2024-06-01T12:00:00Z') })
    app = await engine.initialize()
    jar = new CookieJar()

    const seed = new DatabaseConnection({ path: config.databasePath })
    const category = await new DrizzleBlogRepository(seed.connect()).createCategory({
      title: 'Travel',
      description: 'Trips',
      slug: 'travel',
    })
    categoryId = category.id
    seed.close()
  })

  afterEach(async () => {
    await engine.stop()
    await rm(dir, { recursive: true, force: true })
  })

  it('serves the home page with security headers and a CSRF cookie', async () => {
    const res = await get('/')

    expect(res.status).toBe(200)
    expect(res.headers.get('Content-Type')).toBe('text/html; charset=utf-8')
    expect(res.headers.get('X-Request-ID')).toMatch(/^[0-9A-HJKMNP-TV-Z]{26}$/)
    expect(res.headers.get('X-Frame-Options')).toBe('DENY')
    expect(res.headers.get('X-Content-Type-Options')).toBe('nosniff')
    expect(res.headers.get('Content-Security-Policy')).toContain("frame-ancestors 'none'")

    expect(jar.get('csrf-token')).toMatch(/^[0-9a-f-]{36}$/)
  })

  it('embeds the issued CSRF token in forms', async () => {
    const res = await get('/auth/login/')
    const token = jar.get('csrf-token')

    expect(await res.text()).toContain(`<input type="hidden" name="_csrf" value="${token}">`)
  })

  it('keeps an existing CSRF cookie', async () => {
    await get('/')
    const second = await get('/')
    expect(second.headers.getSetCookie()).toEqual([])
  })

  it('reports health as JSON', async () => {
    const res = await get('/health')

    expect(res.status).toBe(200)
    expect(await res.json()).toMatchObject({ healthy: true, database: true })
  })

  describe('CSRF protection', () => {
    it('rejects a post without the cookie', async () => {
      const res = await post('/auth/login/', { username: 'alice', password: 'x' })

      expect(res.status).toBe(403)
      expect(await res.text()).toContain('CSRF cookie not set.')
    })

    it('rejects a post without the token', async () => {
      await get('/auth/login/')
      const res = await post('/auth/login/', { username: 'alice', password: 'x' }, { csrf: false })

      expect(res.status).toBe(403)
      expect(await res.text()).toContain('CSRF token missing.')
    })

    it('rejects a post with a different token', async () => {
      await get('/auth/login/')
      const res = await post('/auth/login/', { username: 'alice', password: 'x', _csrf: 'forged' }, { csrf: false })

      expect(res.status).toBe(403)
      expect(await res.text()).toContain('CSRF token incorrect.')
    })

    it('accepts the token in the x-csrf-token header', async () => {
      await get('/auth/login/')
      const res = await app.request('/auth/login/', {
        method: 'POST',
        body: new URLSearchParams({ username: 'alice', password: 'wrong-horse' }),
        headers: { cookie: jar.header(), 'x-csrf-token': jar.get('csrf-token') ?? '' },
      })

      expect(res.status).toBe(400)
      expect(await res.text()).toContain('Please enter a correct username and password.')
    })
  })

  it('runs the publish flow from registration to comment', async () => {
    await signUpAndLogIn('alice')

    await get('/posts/create/')
    const image = new File(['png-bytes'], 'photo.png', { type: 'image/png' })
    const created = await post(
      '/posts/create/',
      {
        title: 'Harbour walk',
        text: 'Boats and gulls',
        pub_date: '2024-01-01T10:00',
        category: String(categoryId),
        location: '',
        is_published: 'on',
        image,
      },
      { multipart: true }
    )
    expect(created.status).toBe(303)
    expect(created.headers.get('Location')).toBe('/profile/alice/')

    const home = await (await get('/')).text()
    expect(home).toContain('Harbour walk')
    expect(home).toContain('Post created.')

    const imageUrl = /\/uploads\/posts\/[0-9A-Z]{26}\.png/.exec(home)?.[0]
    expect(imageUrl).toBeDefined()
    const served = await get(imageUrl ?? '')
    expect(served.status).toBe(200)
    expect(served.headers.get('Content-Type')).toBe('image/png')
    expect(await served.text()).toBe('png-bytes')

    const commented = await post('/posts/1/comment/', { text: 'Lovely light' })
    expect(commented.status).toBe(303)
    expect(commented.headers.get('Location')).toBe('/posts/1/')
    expect(await (await get('/posts/1/')).text()).toContain('Lovely light')

    const loggedOut = await post('/auth/logout/', {})
    expect(loggedOut.status).toBe(200)
    expect(jar.get('scrivener.session_token')).toBeUndefined()
  })

  it('redirects anonymous visitors to the login page', async () => {
    const res = await get('/posts/create/')

    expect(res.status).toBe(303)
    expect(res.headers.get('Location')).toBe('/auth/login/?next=%2Fposts%2Fcreate%2F')
  })

  it('renders the 404 page for unknown paths and missing uploads', async () => {
    const page = await get('/nowhere/')
    expect(page.status).toBe(404)
    expect(await page.text()).toContain('Page Not Found')

    const upload = await get('/uploads/posts/missing.png')
    expect(upload.status).toBe(404)

    const malformed = await get('/uploads/%E0%A4%A')
    expect(malformed.status).toBe(404)
  })
})
