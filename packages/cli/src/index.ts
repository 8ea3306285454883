#!/usr/bin/env tsx

/**
 * Scrivener CLI
 */

import { createProgram } from './program.js'

await createProgram().parseAsync()
