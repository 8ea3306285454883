/**
 * Builds the `scrivener` command tree.
 */

import { Command, InvalidArgumentError } from 'commander'
import {
  categoryCreateCommand,
  categoryDeleteCommand,
  categoryPublishCommand,
  locationCreateCommand,
  locationDeleteCommand,
  serveCommand,
  userCreateCommand,
} from './commands/index.js'

function parseInteger(value: string): number {
  const parsed = Number.parseInt(value, 10)
  if (!Number.isInteger(parsed) || parsed < 0 || String(parsed) !== value.trim()) {
    throw new InvalidArgumentError('Not a non-negative integer.')
  }
  return parsed
}

/**
 * Print a failed command's message and flag the process as failed
 */
function run<A extends unknown[]>(fn: (...args: A) => Promise<unknown>): (...args: A) => Promise<void> {
  return async (...args: A) => {
    try {
      await fn(...args)
    } catch (error) {
      console.error(`❌ ${error instanceof Error ? error.message : String(error)}`)
      process.exitCode = 1
    }
  }
}

export function createProgram(): Command {
  const program = new Command()

  program
    .name('scrivener')
    .description('Scrivener - a small multi-author blog')
    .version('0.1.0')

  program
    .command('serve')
    .description('Start the blog server')
    .option('-p, --port <port>', 'Port to listen on', parseInteger)
    .option('--host <host>', 'Host to bind to')
    .option('-d, --database <path>', 'Path to the SQLite database file')
    .action(async (options: { port?: number; host?: string; database?: string }) => {
      await serveCommand(options)
    })

  const category = program.command('category').description('Manage categories')

  category
    .command('create <slug>')
    .description('Create a category')
    .requiredOption('-t, --title <title>', 'Category title')
    .requiredOption('--description <text>', 'Category description')
    .option('--hidden', 'Create the category unpublished', false)
    .option('-d, --database <path>', 'Path to the SQLite database file')
    .action(
      run((slug: string, options: { title: string; description: string; hidden: boolean; database?: string }) =>
        categoryCreateCommand(slug, options)
      )
    )

  category
    .command('delete <slug>')
    .description('Delete a category; its posts become uncategorized')
    .option('-d, --database <path>', 'Path to the SQLite database file')
    .action(run((slug: string, options: { database?: string }) => categoryDeleteCommand(slug, options)))

  category
    .command('publish <slug>')
    .description('Show a category and its posts publicly')
    .option('-d, --database <path>', 'Path to the SQLite database file')
    .action(run((slug: string, options: { database?: string }) => categoryPublishCommand(slug, true, options)))

  category
    .command('unpublish <slug>')
    .description('Hide a category and its posts from the public')
    .option('-d, --database <path>', 'Path to the SQLite database file')
    .action(run((slug: string, options: { database?: string }) => categoryPublishCommand(slug, false, options)))

  const location = program.command('location').description('Manage locations')

  location
    .command('create <name>')
    .description('Create a location')
    .option('--hidden', 'Create the location unpublished', false)
    .option('-d, --database <path>', 'Path to the SQLite database file')
    .action(run((name: string, options: { hidden: boolean; database?: string }) => locationCreateCommand(name, options)))

  location
    .command('delete <id>')
    .description('Delete a location; its posts lose their location')
    .option('-d, --database <path>', 'Path to the SQLite database file')
    .action(
      run(async (id: string, options: { database?: string }) => locationDeleteCommand(parseInteger(id), options))
    )

  program
    .command('user')
    .description('Manage users')
    .command('create <username>')
    .description('Create a user account')
    .requiredOption('--password <password>', 'Account password')
    .requiredOption('--email <email>', 'Email address')
    .option('--first-name <name>', 'First name')
    .option('--last-name <name>', 'Last name')
    .option('-d, --database <path>', 'Path to the SQLite database file')
    .action(
      run(
        (
          username: string,
          options: { password: string; email: string; firstName?: string; lastName?: string; database?: string }
        ) => userCreateCommand(username, options)
      )
    )

  return program
}
