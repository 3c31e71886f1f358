/**
 * Browser Types - Configuration, options, and cookie types
 */

import type { LogFunction } from '../utils/logger.js';

// ============================================
// Browser Configuration
// ============================================

/**
 * Playwright-backed browser configuration
 */
export interface BrowserConfig {
  /**
   * Browser distribution to drive, default: 'chrome' (the installed Google Chrome).
   * Cookies in a cloned profile are only readable by the build that wrote them.
   */
  channel?: 'chrome' | 'chromium' | 'chrome-beta' | 'msedge';
  /** Explicit browser binary, overrides channel */
  executablePath?: string;
  /** User-Agent override */
  userAgent?: string;
  /** Window size in pixels, default: 1280x800 */
  windowSize?: WindowSize;
  /** Default navigation timeout in milliseconds */
  timeout?: number;
  /** Logger for lifecycle and (when verbose) Playwright protocol messages */
  logger?: LogFunction;
}

export interface WindowSize {
  width: number;
  height: number;
}

/**
 * Per-launch options
 */
export interface LaunchOptions {
  /** Run without a visible window */
  headless: boolean;
  /** Forward the driver's own logs to the logger at debug level */
  verbose?: boolean;
}

// ============================================
// Navigation
// ============================================

/**
 * Navigation options
 */
export interface NavigateOptions {
  /** Navigation timeout in milliseconds */
  timeout?: number;
  /** When to consider navigation complete */
  waitUntil?: 'load' | 'domcontentloaded' | 'networkidle';
  /** Selector that must be visible before navigation resolves, default: 'body' */
  readySelector?: string;
}

// ============================================
// Cookies
// ============================================

/**
 * Cookie as reported by the browser's cookie store
 */
export interface BrowserCookie {
  name: string;
  value: string;
  domain?: string;
  path?: string;
  expires?: number;
  httpOnly?: boolean;
  secure?: boolean;
  sameSite?: 'Strict' | 'Lax' | 'None';
}

/**
 * Browser type identifier
 */
export type BrowserType = 'playwright' | 'memory';
