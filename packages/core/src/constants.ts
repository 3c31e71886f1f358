/**
 * Web application whose session is extracted
 */
export interface AuthTarget {
  /** Page loaded in the browser; its origin scopes the cookie read */
  url: string
  /** Page global that appears once the user is signed in */
  sessionGlobal: string
  /** Field of the session global holding the session token */
  tokenField: string
}

export const NOTEBOOKLM_TARGET: AuthTarget = {
  url: 'https://notebooklm.google.com',
  sessionGlobal: 'WIZ_global_data',
  tokenField: 'SNlM0e',
}

export const DEFAULT_POLL_TIMEOUT_MS = 30_000
export const DEFAULT_POLL_INTERVAL_MS = 2_000
