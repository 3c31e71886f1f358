export {
  BrowserSessionController,
  DEFAULT_SESSION_TIMEOUT_MS,
  type PageSession,
  type SessionControllerOptions,
} from './browser-session-controller.js';
