import { Command } from 'commander'
import chalk from 'chalk'
import { createLogger, extractAuth } from '@nlm-auth/core'
import { saveAuthToEnvFile } from '../env-file.js'
import { parseExtractOptions, PROFILE_ENV_VAR } from '../options.js'
import { handleError, writeAuthResult } from '../output.js'
import { createCliProgress } from '../progress.js'

export const extractCommand = new Command('extract')
  .description('Extract the NotebookLM session token and cookies from a signed-in Chrome profile')
  .argument('[profile]', `Chrome profile directory name (default: $${PROFILE_ENV_VAR} or "Default")`)
  .option('--debug', 'Show the browser window and log every step')
  .option('--no-env', 'Do not save the credentials to ~/.nlm/env')
  .option('-o, --output <file>', 'Write the credentials JSON to a file instead of stdout')
  .option('--channel <channel>', 'Browser build whose profile is used: chrome or chromium', 'chrome')
  .option('--session-timeout <seconds>', 'Time limit for the whole browser session', '60')
  .option('--poll-timeout <seconds>', 'Time to wait for a signed-in session', '30')
  .option('--user-agent <ua>', 'User-Agent override')
  .addHelpText(
    'after',
    `
Examples:
  $ nlm-auth
  $ nlm-auth "Profile 1" -o ~/.nlm/auth.json
  $ nlm-auth --debug`
  )
  .action(async (profile: string | undefined, rawOptions: unknown) => {
    let debug = false
    try {
      const options = parseExtractOptions(profile, rawOptions)
      debug = options.debug

      const result = await extractAuth({
        profileName: options.profileName,
        channel: options.channel,
        debug: options.debug,
        userAgent: options.userAgent,
        sessionTimeoutMs: options.sessionTimeoutMs,
        pollTimeoutMs: options.pollTimeoutMs,
        logger: createLogger({ level: options.debug ? 'debug' : 'warn', prefix: 'nlm-auth' }),
        progress: createCliProgress(),
      })

      if (options.env) {
        try {
          const envPath = await saveAuthToEnvFile(result, options.profileName)
          console.error(chalk.green(`Credentials saved to ${envPath}`))
        } catch (error) {
          const message = error instanceof Error ? error.message : String(error)
          console.error(chalk.yellow(`Warning: could not save credentials to ~/.nlm/env: ${message}`))
        }
      }

      await writeAuthResult(result, options.output)
      console.error(
        chalk.green(options.output ? `Credentials saved to ${options.output}` : 'Authenticated')
      )
    } catch (error) {
      handleError(error, { debug })
    }
  })
