/**
 * Browser Utilities
 */

export {
  createLogger,
  silentLogger,
  withScope,
  type LogLevel,
  type LogFunction,
  type LoggerOptions,
} from './logger.js';

export { Deadline, sleep } from './deadline.js';
