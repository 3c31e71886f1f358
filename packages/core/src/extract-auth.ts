import {
  BrowserSessionController,
  DEFAULT_SESSION_TIMEOUT_MS,
  PlaywrightBrowser,
  silentLogger,
  type BrowserAdapter,
  type LogFunction,
} from '@nlm-auth/browser'
import {
  BrowserProfileManager,
  DEFAULT_PROFILE_NAME,
  resolveProfilePath,
  type LocateOptions,
} from '@nlm-auth/browser-profile'
import { AuthPoller } from './auth-poller.js'
import { NOTEBOOKLM_TARGET, type AuthTarget } from './constants.js'
import type { AuthResult } from './extractor.js'
import { silentProgress, type ProgressReporter } from './progress.js'

export interface ExtractAuthOptions extends LocateOptions {
  /** Chrome profile directory name, default: 'Default' */
  profileName?: string
  /** Full profile path; skips profile location */
  profilePath?: string
  /** Headed browser and verbose driver logging */
  debug?: boolean
  userAgent?: string
  /** Browser binary to run instead of the channel's */
  executablePath?: string
  /** default: 60000 */
  sessionTimeoutMs?: number
  /** default: 30000 */
  pollTimeoutMs?: number
  /** default: 2000 */
  pollIntervalMs?: number
  target?: AuthTarget
  /** Browser to drive, default: PlaywrightBrowser on the chosen channel */
  browser?: BrowserAdapter
  profileManager?: BrowserProfileManager
  logger?: LogFunction
  progress?: ProgressReporter
}

/**
 * Extract the session token and cookies of a signed-in Chrome profile.
 *
 * Clones the profile into a scratch dir, opens the target in a browser on
 * that clone and waits for the session. The browser is closed and the
 * scratch dir removed before this resolves or rejects.
 *
 * @example
 * const { token, cookies } = await extractAuth({ profileName: 'Profile 1' })
 */
export async function extractAuth(options: ExtractAuthOptions = {}): Promise<AuthResult> {
  const logger = options.logger ?? silentLogger
  const progress = options.progress ?? silentProgress
  const target = options.target ?? NOTEBOOKLM_TARGET
  const debug = options.debug ?? false

  progress.stage('locating')
  const profilePath =
    options.profilePath ?? resolveProfilePath(options.profileName ?? DEFAULT_PROFILE_NAME, options)
  logger('info', `Using profile: ${profilePath}`)

  const profileManager = options.profileManager ?? new BrowserProfileManager({ logger })

  progress.stage('cloning', profilePath)
  return profileManager.withScratchProfile(profilePath, async (scratchDir) => {
    const browser =
      options.browser ??
      new PlaywrightBrowser({
        channel: options.channel,
        executablePath: options.executablePath,
        userAgent: options.userAgent,
        logger,
      })
    const session = new BrowserSessionController(browser, {
      timeoutMs: options.sessionTimeoutMs ?? DEFAULT_SESSION_TIMEOUT_MS,
      logger,
    })

    try {
      progress.stage('launching')
      await session.launch(scratchDir, { headless: !debug, verbose: debug })

      progress.stage('navigating', target.url)
      await session.navigate(target.url)

      progress.stage('waiting')
      const poller = new AuthPoller(session, {
        target,
        pollTimeoutMs: options.pollTimeoutMs,
        pollIntervalMs: options.pollIntervalMs,
        logger,
        progress,
      })
      return await poller.run()
    } finally {
      progress.stage('closing')
      await session.close()
    }
  })
}
