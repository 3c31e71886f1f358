/**
 * @nlm-auth/core
 *
 * Session extraction for NotebookLM from a signed-in Chrome profile.
 */

export { extractAuth, type ExtractAuthOptions } from './extract-auth.js'
export { AuthPoller, type AuthPollerOptions, type PollerState } from './auth-poller.js'
export {
  extractSession,
  presenceExpression,
  tokenExpression,
  type AuthResult,
} from './extractor.js'
export { formatCookies, type CookiePair } from './cookies.js'
export {
  NOTEBOOKLM_TARGET,
  DEFAULT_POLL_TIMEOUT_MS,
  DEFAULT_POLL_INTERVAL_MS,
  type AuthTarget,
} from './constants.js'
export {
  ErrorCodes,
  AuthNotFoundError,
  ExtractionFailedError,
  getErrorCode,
  isAuthErrorCode,
  type AuthErrorCode,
  type ExtractionFailureReason,
} from './errors.js'
export { silentProgress, type AuthStage, type ProgressReporter } from './progress.js'

export {
  BrowserLaunchError,
  NavigationFailedError,
  EvaluationFailedError,
  SessionTimeoutError,
  DEFAULT_SESSION_TIMEOUT_MS,
  createLogger,
  type LogFunction,
  type LogLevel,
} from '@nlm-auth/browser'
export {
  UnsupportedPlatformError,
  ProfileNotFoundError,
  ProfileCopyFailedError,
  DEFAULT_PROFILE_NAME,
  getUserDataRoot,
  resolveProfilePath,
  type BrowserChannel,
  type LocateOptions,
} from '@nlm-auth/browser-profile'
