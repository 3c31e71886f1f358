/**
 * Stable codes of every error an extraction run can end with
 */
export const ErrorCodes = {
  UNSUPPORTED_PLATFORM: 'UNSUPPORTED_PLATFORM',
  PROFILE_NOT_FOUND: 'PROFILE_NOT_FOUND',
  PROFILE_COPY_FAILED: 'PROFILE_COPY_FAILED',
  BROWSER_LAUNCH_FAILED: 'BROWSER_LAUNCH_FAILED',
  NAVIGATION_FAILED: 'NAVIGATION_FAILED',
  EVALUATION_FAILED: 'EVALUATION_FAILED',
  SESSION_TIMEOUT: 'SESSION_TIMEOUT',
  AUTH_NOT_FOUND: 'AUTH_NOT_FOUND',
  EXTRACTION_FAILED: 'EXTRACTION_FAILED',
} as const

export type AuthErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes]

const KNOWN_CODES: ReadonlySet<string> = new Set(Object.values(ErrorCodes))

export function isAuthErrorCode(code: string): code is AuthErrorCode {
  return KNOWN_CODES.has(code)
}

/**
 * Code of a known extraction error, undefined for anything else
 */
export function getErrorCode(error: unknown): AuthErrorCode | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return isAuthErrorCode(error.code) ? error.code : undefined
  }
  return undefined
}

/**
 * The page never exposed a usable session before the poll deadline
 */
export class AuthNotFoundError extends Error {
  readonly code = ErrorCodes.AUTH_NOT_FOUND

  constructor(
    /** Page URL when the deadline expired, e.g. a sign-in redirect */
    public readonly url: string,
    /** Whether the session global appeared without a token */
    public readonly sessionGlobalSeen: boolean,
    public readonly timeoutMs: number
  ) {
    super(
      sessionGlobalSeen
        ? `Session token not available after ${timeoutMs / 1000} seconds (page: ${url})`
        : `Not signed in: no session found after ${timeoutMs / 1000} seconds (page: ${url})`
    )
    this.name = 'AuthNotFoundError'
  }
}

export type ExtractionFailureReason = 'empty-token' | 'empty-cookies'

/**
 * The session global was present but token or cookies came back empty
 */
export class ExtractionFailedError extends Error {
  readonly code = ErrorCodes.EXTRACTION_FAILED

  constructor(
    public readonly reason: ExtractionFailureReason,
    public readonly url: string
  ) {
    super(
      reason === 'empty-token'
        ? 'Extraction failed: session token is empty'
        : `Extraction failed: no cookies for ${url}`
    )
    this.name = 'ExtractionFailedError'
  }
}
