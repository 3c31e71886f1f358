/**
 * AuthPoller - Waits for a loaded page to expose a signed-in session
 *
 * Checks for the session global every `pollIntervalMs` (first check one
 * interval after start) until it yields a token and cookies or the poll
 * deadline expires. The poll deadline runs inside the session deadline:
 * whichever expires first ends the wait.
 */

import {
  Deadline,
  EvaluationFailedError,
  silentLogger,
  sleep,
  withScope,
  type LogFunction,
  type PageSession,
} from '@nlm-auth/browser'
import {
  DEFAULT_POLL_INTERVAL_MS,
  DEFAULT_POLL_TIMEOUT_MS,
  NOTEBOOKLM_TARGET,
  type AuthTarget,
} from './constants.js'
import { AuthNotFoundError, ExtractionFailedError } from './errors.js'
import { extractSession, presenceExpression, type AuthResult } from './extractor.js'
import { silentProgress, type ProgressReporter } from './progress.js'

export type PollerState = 'polling' | 'found' | 'timedOut' | 'error'

export interface AuthPollerOptions {
  target?: AuthTarget
  /** default: 30000 */
  pollTimeoutMs?: number
  /** default: 2000 */
  pollIntervalMs?: number
  logger?: LogFunction
  progress?: ProgressReporter
}

export class AuthPoller {
  private readonly target: AuthTarget
  private readonly pollTimeoutMs: number
  private readonly pollIntervalMs: number
  private readonly logger: LogFunction
  private readonly progress: ProgressReporter
  private state: PollerState = 'polling'
  private started = false
  private sessionGlobalSeen = false

  constructor(
    private readonly session: PageSession,
    options: AuthPollerOptions = {}
  ) {
    this.target = options.target ?? NOTEBOOKLM_TARGET
    this.pollTimeoutMs = options.pollTimeoutMs ?? DEFAULT_POLL_TIMEOUT_MS
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS
    this.logger = withScope(options.logger ?? silentLogger, 'AuthPoller')
    this.progress = options.progress ?? silentProgress
  }

  getState(): PollerState {
    return this.state
  }

  /**
   * Poll until the session is found. Resolves in state `found`; rejects with
   * AuthNotFoundError in state `timedOut`, or with the failure in state `error`.
   */
  async run(): Promise<AuthResult> {
    if (this.started) {
      throw new Error('AuthPoller can only run once')
    }
    this.started = true

    const deadline = new Deadline(
      this.pollTimeoutMs,
      () => new AuthNotFoundError(this.session.getUrl(), this.sessionGlobalSeen, this.pollTimeoutMs)
    )
    this.logger(
      'debug',
      `Waiting up to ${this.pollTimeoutMs}ms for ${this.target.sessionGlobal} (every ${this.pollIntervalMs}ms)`
    )

    try {
      const result = await this.poll(deadline)
      this.state = 'found'
      this.logger('info', 'Session found')
      return result
    } catch (error) {
      this.state = error instanceof AuthNotFoundError ? 'timedOut' : 'error'
      throw error
    } finally {
      deadline.dispose()
    }
  }

  private async poll(deadline: Deadline): Promise<AuthResult> {
    for (let tick = 1; ; tick += 1) {
      await this.session.within(deadline.race(sleep(this.pollIntervalMs, deadline.signal)))
      const result = await this.session.within(deadline.race(this.check(tick)))
      if (result) {
        return result
      }
    }
  }

  private secondsLeft(): number {
    return Math.ceil(this.session.remainingMs() / 1000)
  }

  /**
   * One tick: null means keep polling
   */
  private async check(tick: number): Promise<AuthResult | null> {
    this.progress.waiting(tick)

    try {
      const present = await this.session.evaluate(presenceExpression(this.target))
      if (!present) {
        this.logger(
          'debug',
          `Tick ${tick}: ${this.target.sessionGlobal} not present (${this.secondsLeft()}s left in session)`
        )
        return null
      }

      this.sessionGlobalSeen = true
      return await extractSession(this.session, this.target)
    } catch (error) {
      if (error instanceof EvaluationFailedError && error.recoverable) {
        this.logger('debug', `Tick ${tick}: ${error.message}`)
        return null
      }
      if (error instanceof ExtractionFailedError && error.reason === 'empty-token') {
        this.logger('debug', `Tick ${tick}: ${this.target.sessionGlobal} present without a token`)
        return null
      }
      throw error
    }
  }
}
