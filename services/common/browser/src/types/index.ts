/**
 * Browser Types - Re-exports all type definitions
 */

export type {
  // Browser Configuration
  BrowserConfig,
  WindowSize,
  LaunchOptions,
  // Navigation
  NavigateOptions,
  // Cookies
  BrowserCookie,
  BrowserType,
} from './browser.js';
