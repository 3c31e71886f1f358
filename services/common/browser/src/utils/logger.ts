/**
 * Logger utility for browser package
 *
 * Loggers are plain functions created per run and passed down through
 * component options, so verbosity is decided by the caller rather than
 * by process-wide state.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type LogFunction = (level: LogLevel, message: string) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export interface LoggerOptions {
  /** Emit debug-level messages */
  verbose?: boolean;
  /** Lowest level written, overrides verbose */
  level?: LogLevel;
  /** Tag prepended to every line, e.g. 'nlm-auth' */
  prefix?: string;
}

/**
 * Create a console logger.
 * Every level goes to stderr so stdout stays free for command output.
 */
export function createLogger(options: LoggerOptions = {}): LogFunction {
  const tag = options.prefix ? ` [${options.prefix}]` : '';
  const threshold = LEVEL_ORDER[options.level ?? (options.verbose ? 'debug' : 'info')];

  return (level: LogLevel, message: string) => {
    if (LEVEL_ORDER[level] < threshold) {
      return;
    }
    const timestamp = new Date().toISOString();
    console.error(`[${timestamp}] [${level.toUpperCase()}]${tag} ${message}`);
  };
}

/**
 * Logger that drops everything
 */
export const silentLogger: LogFunction = () => {};

/**
 * Wrap a logger so every message carries a component tag
 */
export function withScope(logger: LogFunction, scope: string): LogFunction {
  return (level, message) => logger(level, `[${scope}] ${message}`);
}
