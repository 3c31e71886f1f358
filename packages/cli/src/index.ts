#!/usr/bin/env tsx

import 'dotenv/config'
import { Command } from 'commander'
import { readFileSync } from 'node:fs'
import { fileURLToPath } from 'node:url'
import { dirname, join } from 'node:path'
import { extractCommand } from './commands/extract.js'
import { locateCommand } from './commands/locate.js'

const __dirname = dirname(fileURLToPath(import.meta.url))
const pkg: { version: string } = JSON.parse(
  readFileSync(join(__dirname, '..', 'package.json'), 'utf-8')
)

const program = new Command()

program
  .name('nlm-auth')
  .description('Extract NotebookLM session credentials from a signed-in Chrome profile')
  .version(pkg.version)

program.addCommand(extractCommand, { isDefault: true })
program.addCommand(locateCommand)

await program.parseAsync()
