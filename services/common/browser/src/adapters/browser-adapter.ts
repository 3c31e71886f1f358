/**
 * BrowserAdapter - Capability interface for driving one browser process
 *
 * Implementations:
 * - PlaywrightBrowser: real Chrome via Playwright persistent context
 * - InMemoryBrowser: scriptable stand-in with no process, for tests
 *
 * Adapters report failures with the typed errors from ../errors.ts so callers
 * can tell a script that threw apart from a browser that went away.
 */

import type { BrowserCookie, LaunchOptions, NavigateOptions } from '../types/index.js';

/**
 * Unified browser adapter interface
 *
 * - Lifecycle: launch, close
 * - Navigation: navigate
 * - Page: evaluate, getUrl
 * - Cookie store: getCookies
 */
export interface BrowserAdapter {
  // ============================================
  // Lifecycle
  // ============================================

  /**
   * Start the browser on the given user-data dir
   * Must be called before any other operations
   */
  launch(userDataDir: string, options: LaunchOptions): Promise<void>;

  /**
   * Close the browser and release resources
   * Safe to call more than once and before launch
   */
  close(): Promise<void>;

  // ============================================
  // Navigation
  // ============================================

  /**
   * Load a URL and wait until the ready selector is visible
   * @throws NavigationFailedError
   */
  navigate(url: string, options?: NavigateOptions): Promise<void>;

  // ============================================
  // Page
  // ============================================

  /**
   * Evaluate a JavaScript expression in the page and return its value
   *
   * @throws EvaluationFailedError - `recoverable` is true when the script itself
   *   threw (or the page was mid-navigation), false when the page or browser is gone
   */
  evaluate(expression: string): Promise<unknown>;

  /**
   * Get the current page URL ('about:blank' before navigation)
   */
  getUrl(): string;

  // ============================================
  // Cookie Store
  // ============================================

  /**
   * Read cookies that would be sent to any of the given URLs,
   * including HTTP-only ones, in store order
   */
  getCookies(urls: string[]): Promise<BrowserCookie[]>;
}
