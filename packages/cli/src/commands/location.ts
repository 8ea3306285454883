import { NotFoundError, type Location } from '@scrivener/blog-core'
import { withStore, type StoreOptions } from './store.js'

export interface LocationCreateOptions extends StoreOptions {
  hidden?: boolean
}

export async function locationCreateCommand(name: string, options: LocationCreateOptions = {}): Promise<Location> {
  const location = await withStore(options, ({ repository }) =>
    repository.createLocation({ name, isPublished: !options.hidden })
  )
  console.log(`✅ Created location "${location.name}" (id ${location.id})`)
  return location
}

export async function locationDeleteCommand(id: number, options: StoreOptions = {}): Promise<void> {
  const deleted = await withStore(options, ({ repository }) => repository.deleteLocation(id))
  if (!deleted) {
    throw new NotFoundError('Location', { id })
  }
  console.log(`✅ Deleted location ${id}`)
}
