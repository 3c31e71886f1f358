import type { PageSession } from '@nlm-auth/browser'
import { NOTEBOOKLM_TARGET, type AuthTarget } from './constants.js'
import { formatCookies } from './cookies.js'
import { ExtractionFailedError } from './errors.js'

export interface AuthResult {
  /** Session token read from the page */
  token: string
  /** Cookie header value for the target origin */
  cookies: string
}

export function presenceExpression(target: AuthTarget): string {
  return `!!window.${target.sessionGlobal}`
}

export function tokenExpression(target: AuthTarget): string {
  return `window.${target.sessionGlobal}.${target.tokenField}`
}

/**
 * Read the session token and the target's cookies from a signed-in page.
 * Resolves only with both non-empty.
 */
export async function extractSession(
  session: Pick<PageSession, 'evaluate' | 'getCookies'>,
  target: AuthTarget = NOTEBOOKLM_TARGET
): Promise<AuthResult> {
  const value = await session.evaluate(tokenExpression(target))
  const token = typeof value === 'string' ? value : ''
  if (!token) {
    throw new ExtractionFailedError('empty-token', target.url)
  }

  const cookies = formatCookies(await session.getCookies([target.url]))
  if (!cookies) {
    throw new ExtractionFailedError('empty-cookies', target.url)
  }

  return { token, cookies }
}
