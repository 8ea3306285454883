/**
 * Category Commands
 *
 * Categories are managed by administrators only, from the command line.
 */

import { NotFoundError, type Category } from '@scrivener/blog-core'
import { withStore, type StoreOptions } from './store.js'

export interface CategoryCreateOptions extends StoreOptions {
  title: string
  description: string
  hidden?: boolean
}

const SLUG_PATTERN = /^[-a-zA-Z0-9_]+$/

export async function categoryCreateCommand(slug: string, options: CategoryCreateOptions): Promise<Category> {
  if (!SLUG_PATTERN.test(slug)) {
    throw new Error(`Invalid slug "${slug}": use only letters, digits, hyphens and underscores`)
  }

  const category = await withStore(options, ({ repository }) =>
    repository.createCategory({
      slug,
      title: options.title,
      description: options.description,
      isPublished: !options.hidden,
    })
  )

  console.log(`✅ Created category "${category.title}" (/category/${category.slug}/)`)
  return category
}

export async function categoryDeleteCommand(slug: string, options: StoreOptions = {}): Promise<void> {
  const deleted = await withStore(options, ({ repository }) => repository.deleteCategory(slug))
  if (!deleted) {
    throw new NotFoundError('Category', { slug })
  }
  console.log(`✅ Deleted category "${slug}"; its posts are now uncategorized`)
}

export async function categoryPublishCommand(
  slug: string,
  isPublished: boolean,
  options: StoreOptions = {}
): Promise<Category> {
  const category = await withStore(options, ({ repository }) => repository.setCategoryPublished(slug, isPublished))
  if (!category) {
    throw new NotFoundError('Category', { slug })
  }
  console.log(`✅ Category "${slug}" is now ${isPublished ? 'published' : 'hidden'}`)
  return category
}
