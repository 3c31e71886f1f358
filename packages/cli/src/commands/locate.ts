import { existsSync } from 'node:fs'
import { Command } from 'commander'
import chalk from 'chalk'
import { resolveProfilePath } from '@nlm-auth/core'
import { parseLocateOptions } from '../options.js'
import { handleError } from '../output.js'

export const locateCommand = new Command('locate')
  .description('Print the Chrome profile directory credentials would be read from')
  .argument('[profile]', 'Chrome profile directory name')
  .option('--channel <channel>', 'Browser build: chrome or chromium', 'chrome')
  .action((profile: string | undefined, rawOptions: unknown) => {
    try {
      const options = parseLocateOptions(profile, rawOptions)
      const profilePath = resolveProfilePath(options.profileName, { channel: options.channel })

      console.log(profilePath)
      if (!existsSync(profilePath)) {
        console.error(chalk.yellow('Warning: this directory does not exist'))
      }
    } catch (error) {
      handleError(error)
    }
  })
