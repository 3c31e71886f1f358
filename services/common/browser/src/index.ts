/**
 * @nlm-auth/browser
 *
 * Browser control for scratch-profile automation:
 * - PlaywrightBrowser: real Chrome through a Playwright persistent context
 * - InMemoryBrowser: scriptable stand-in for tests
 * - BrowserSessionController: one bounded session over either of them
 *
 * @example
 * import { BrowserSessionController, createBrowser } from '@nlm-auth/browser';
 *
 * const session = new BrowserSessionController(createBrowser('playwright'));
 * try {
 *   await session.launch(userDataDir, { headless: true });
 *   await session.navigate('https://example.com');
 *   const title = await session.evaluate('document.title');
 * } finally {
 *   await session.close();
 * }
 */

// ============================================
// Types
// ============================================

export type {
  BrowserConfig,
  WindowSize,
  LaunchOptions,
  NavigateOptions,
  BrowserCookie,
  BrowserType,
} from './types/index.js';

// ============================================
// Adapters (Interfaces)
// ============================================

export type { BrowserAdapter } from './adapters/index.js';

// ============================================
// Implementations
// ============================================

export {
  PlaywrightBrowser,
  buildLaunchArgs,
  InMemoryBrowser,
  type InMemoryBrowserOptions,
  type InMemoryBrowserCalls,
  type EvaluateHook,
} from './implementations/index.js';

// ============================================
// Session
// ============================================

export {
  BrowserSessionController,
  DEFAULT_SESSION_TIMEOUT_MS,
  type PageSession,
  type SessionControllerOptions,
} from './session/index.js';

// ============================================
// Errors
// ============================================

export {
  BrowserLaunchError,
  NavigationFailedError,
  EvaluationFailedError,
  SessionTimeoutError,
} from './errors.js';

// ============================================
// Utilities
// ============================================

export {
  createLogger,
  silentLogger,
  withScope,
  Deadline,
  sleep,
  type LogLevel,
  type LogFunction,
  type LoggerOptions,
} from './utils/index.js';

// ============================================
// Factory Functions
// ============================================

import type { BrowserAdapter } from './adapters/index.js';
import type { BrowserConfig, BrowserType } from './types/index.js';
import { InMemoryBrowser, PlaywrightBrowser } from './implementations/index.js';

/**
 * Create a browser adapter of the specified type
 *
 * @param type - 'playwright' for real Chrome, 'memory' for the in-process stand-in
 * @param config - Browser configuration (ignored by 'memory')
 */
export function createBrowser(type: BrowserType, config?: BrowserConfig): BrowserAdapter {
  switch (type) {
    case 'playwright':
      return new PlaywrightBrowser(config);

    case 'memory':
      return new InMemoryBrowser();

    default:
      throw new Error(`Unknown browser type: ${String(type)}`);
  }
}
