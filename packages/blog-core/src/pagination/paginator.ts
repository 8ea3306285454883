/**
 * Paginator
 *
 * Turns a total count and the `page` query parameter into a window.
 */

import { NotFoundError } from '../errors/base-error.js'
import type { PageWindow } from '../routing/request-ports.js'

export const DEFAULT_POSTS_PER_PAGE = 10

export interface Page {
  number: number
  numPages: number
  perPage: number
  total: number
  hasPrevious: boolean
  hasNext: boolean
  window: PageWindow
}

/**
 * Resolve the requested page.
 * Throws NotFoundError for a malformed or out-of-range page; page 1 of an
 * empty list is always valid.
 */
export function paginate(total: number, requested: string | null | undefined, perPage: number): Page {
  const numPages = Math.max(1, Math.ceil(total / perPage))
  const number = parsePageNumber(requested, numPages)

  if (number > numPages) {
    throw new NotFoundError('Page', { page: number, numPages })
  }

  return {
    number,
    numPages,
    perPage,
    total,
    hasPrevious: number > 1,
    hasNext: number < numPages,
    window: {
      limit: perPage,
      offset: (number - 1) * perPage,
    },
  }
}

function parsePageNumber(requested: string | null | undefined, numPages: number): number {
  if (requested === null || requested === undefined || requested === '') {
    return 1
  }

  if (requested === 'last') {
    return numPages
  }

  if (!/^\d+$/.test(requested)) {
    throw new NotFoundError('Page', { page: requested })
  }

  const number = Number.parseInt(requested, 10)
  if (number < 1) {
    throw new NotFoundError('Page', { page: requested })
  }

  return number
}
