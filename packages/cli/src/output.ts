import { chmod, writeFile } from 'node:fs/promises'
import chalk from 'chalk'
import { ErrorCodes, getErrorCode, type AuthErrorCode, type AuthResult } from '@nlm-auth/core'
import { PROFILE_ENV_VAR } from './options.js'

/**
 * Wire shape of the credentials handed to the NotebookLM client
 */
export interface SerializedAuthResult {
  auth_token: string
  cookies: string
}

export function formatAuthResult(result: AuthResult): string {
  const serialized: SerializedAuthResult = {
    auth_token: result.token,
    cookies: result.cookies,
  }
  return `${JSON.stringify(serialized, null, 2)}\n`
}

/**
 * Write the credentials to `outputPath` (owner-only), or to stdout
 */
export async function writeAuthResult(result: AuthResult, outputPath?: string): Promise<void> {
  const text = formatAuthResult(result)
  if (outputPath) {
    await writeFile(outputPath, text, { encoding: 'utf-8', mode: 0o600 })
    await chmod(outputPath, 0o600)
    return
  }
  process.stdout.write(text)
}

const HINTS: Record<AuthErrorCode, string> = {
  [ErrorCodes.UNSUPPORTED_PLATFORM]: 'Only macOS, Linux and Windows are supported.',
  [ErrorCodes.PROFILE_NOT_FOUND]: `Check the profile name (chrome://version shows it), pass it as the first argument or set ${PROFILE_ENV_VAR}.`,
  [ErrorCodes.PROFILE_COPY_FAILED]: 'Close Chrome and try again; the profile files may be locked.',
  [ErrorCodes.BROWSER_LAUNCH_FAILED]: 'Make sure Google Chrome is installed, or try --channel chromium.',
  [ErrorCodes.NAVIGATION_FAILED]: 'Check your network connection and try again.',
  [ErrorCodes.EVALUATION_FAILED]: 'The browser closed unexpectedly. Run with --debug to watch it.',
  [ErrorCodes.SESSION_TIMEOUT]: 'The browser did not respond in time. Run with --debug or raise --session-timeout.',
  [ErrorCodes.AUTH_NOT_FOUND]: 'Sign in to NotebookLM in Chrome with this profile, then run again.',
  [ErrorCodes.EXTRACTION_FAILED]: 'The session looks incomplete. Sign in to NotebookLM again in Chrome.',
}

export function getHint(error: unknown): string | undefined {
  const code = getErrorCode(error)
  return code ? HINTS[code] : undefined
}

/**
 * Lines printed for a failed run; the stack only in debug mode
 */
export function formatError(error: unknown, options: { debug?: boolean } = {}): string[] {
  const message = error instanceof Error ? error.message : String(error)
  const lines = [chalk.red(`Error: ${message}`)]

  const hint = getHint(error)
  if (hint) {
    lines.push(chalk.yellow(`Hint: ${hint}`))
  }
  if (options.debug && error instanceof Error && error.stack) {
    lines.push(chalk.gray(error.stack))
  }
  return lines
}

export function handleError(error: unknown, options: { debug?: boolean } = {}): never {
  for (const line of formatError(error, options)) {
    console.error(line)
  }
  process.exit(1)
}
