/**
 * Browser Implementations
 */

export { PlaywrightBrowser, buildLaunchArgs } from './playwright-browser.js';

export {
  InMemoryBrowser,
  type InMemoryBrowserOptions,
  type InMemoryBrowserCalls,
  type EvaluateHook,
} from './in-memory-browser.js';
