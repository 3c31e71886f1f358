/**
 * Browser Adapters (Interfaces)
 */

export type { BrowserAdapter } from './browser-adapter.js';
