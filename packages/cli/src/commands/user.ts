/**
 * User Command
 *
 * Creates accounts with the same rules as the registration form.
 */

import { ValidationError, registrationFormSchema, validateForm, type User } from '@scrivener/blog-core'
import { withStore, type StoreOptions } from './store.js'

export interface UserCreateOptions extends StoreOptions {
  password: string
  email: string
  firstName?: string
  lastName?: string
}

export async function userCreateCommand(username: string, options: UserCreateOptions): Promise<User> {
  const result = validateForm(registrationFormSchema, {
    username,
    email: options.email,
    first_name: options.firstName ?? '',
    last_name: options.lastName ?? '',
    password: options.password,
    password_confirmation: options.password,
  })
  if (!result.ok) {
    const problems = Object.entries(result.errors).map(([field, messages]) => `${field}: ${messages.join(' ')}`)
    throw new ValidationError(problems.join('; '), { errors: result.errors })
  }

  const user = await withStore(options, ({ authProvider }) =>
    authProvider.createUser({
      username: result.data.username,
      email: result.data.email,
      firstName: result.data.first_name,
      lastName: result.data.last_name,
      password: result.data.password,
    })
  )

  console.log(`✅ Created user "${user.username}" (id ${user.id})`)
  return user
}
