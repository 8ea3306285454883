/**
 * Route Matcher
 *
 * Matches request paths against the blog's route table and extracts
 * parameters. Numeric parameters only match digits.
 */

export type RouteName =
  | 'home'
  | 'category'
  | 'profile'
  | 'post-detail'
  | 'post-create'
  | 'post-edit'
  | 'post-delete'
  | 'comment-add'
  | 'comment-edit'
  | 'comment-delete'
  | 'profile-edit'
  | 'login'
  | 'logout'
  | 'registration'

export type RouteMethod = 'GET' | 'POST'

export interface RouteDefinition {
  name: RouteName
  pattern: string
  methods: readonly RouteMethod[]
}

export interface RouteMatch {
  name: RouteName
  params: Record<string, string>
  methods: readonly RouteMethod[]
}

const READ: readonly RouteMethod[] = ['GET']
const FORM: readonly RouteMethod[] = ['GET', 'POST']
const SUBMIT: readonly RouteMethod[] = ['POST']

export const BLOG_ROUTES: readonly RouteDefinition[] = [
  { name: 'home', pattern: '/', methods: READ },
  { name: 'category', pattern: '/category/:slug/', methods: READ },
  { name: 'profile', pattern: '/profile/:username/', methods: READ },
  { name: 'post-create', pattern: '/posts/create/', methods: FORM },
  { name: 'post-detail', pattern: '/posts/:id/', methods: READ },
  { name: 'post-edit', pattern: '/posts/:id/edit/', methods: FORM },
  { name: 'post-delete', pattern: '/posts/:id/delete/', methods: FORM },
  { name: 'comment-add', pattern: '/posts/:id/comment/', methods: SUBMIT },
  { name: 'comment-edit', pattern: '/posts/:id/edit_comment/:cid/', methods: FORM },
  { name: 'comment-delete', pattern: '/posts/:id/delete_comment/:cid/', methods: FORM },
  { name: 'profile-edit', pattern: '/personal_info/', methods: FORM },
  { name: 'login', pattern: '/auth/login/', methods: FORM },
  { name: 'logout', pattern: '/auth/logout/', methods: FORM },
  { name: 'registration', pattern: '/auth/registration/', methods: FORM },
]

const NUMERIC_PARAMS = new Set(['id', 'cid'])

interface CompiledRoute {
  name: RouteName
  methods: readonly RouteMethod[]
  regex: RegExp
  paramNames: string[]
}

export class RouteMatcher {
  private compiled: CompiledRoute[]

  constructor(routes: readonly RouteDefinition[] = BLOG_ROUTES) {
    this.compiled = routes.map((route) => compile(route))
  }

  /**
   * Match a URL path (query string ignored) to a route
   */
  match(path: string): RouteMatch | null {
    const pathname = path.split('?')[0] ?? ''

    for (const route of this.compiled) {
      const match = route.regex.exec(pathname)
      if (!match) {
        continue
      }

      const params: Record<string, string> = {}
      route.paramNames.forEach((name, index) => {
        const value = match[index + 1]
        if (value !== undefined) {
          params[name] = safeDecode(value)
        }
      })
      return { name: route.name, params, methods: route.methods }
    }

    return null
  }
}

function compile(route: RouteDefinition): CompiledRoute {
  const paramNames: string[] = []
  const source = route.pattern
    .replace(/[.*+?^${}()|[\]\\]/g, '\\$&')
    .replace(/:([a-zA-Z_][a-zA-Z0-9_]*)/g, (_, name: string) => {
      paramNames.push(name)
      return NUMERIC_PARAMS.has(name) ? '(\\d+)' : '([^/]+)'
    })

  return { name: route.name, methods: route.methods, regex: new RegExp(`^${source}$`), paramNames }
}

function safeDecode(value: string): string {
  try {
    return decodeURIComponent(value)
  } catch {
    return value
  }
}
