/**
 * Errors raised by browser adapters and the session controller
 */

/**
 * Error class for a browser that could not be started
 */
export class BrowserLaunchError extends Error {
  readonly code = 'BROWSER_LAUNCH_FAILED';

  constructor(
    message: string,
    public readonly userDataDir: string,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'BrowserLaunchError';
  }
}

/**
 * Error class for page load failures
 */
export class NavigationFailedError extends Error {
  readonly code = 'NAVIGATION_FAILED';

  constructor(
    message: string,
    public readonly url: string,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'NavigationFailedError';
  }
}

/**
 * Error class for script evaluation and cookie-store failures
 */
export class EvaluationFailedError extends Error {
  readonly code = 'EVALUATION_FAILED';

  constructor(
    message: string,
    /** True when the page is still alive and a later attempt may succeed */
    public readonly recoverable: boolean,
    public readonly expression?: string,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'EvaluationFailedError';
  }
}

/**
 * Error class for a session that outlived its wall-clock budget
 */
export class SessionTimeoutError extends Error {
  readonly code = 'SESSION_TIMEOUT';

  constructor(public readonly timeoutMs: number) {
    super(`Browser session timed out after ${timeoutMs / 1000} seconds`);
    this.name = 'SessionTimeoutError';
  }
}
