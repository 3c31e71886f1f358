/**
 * BrowserSessionController - Owns one browser for the lifetime of one run
 *
 * Starts a wall-clock deadline at launch; every operation issued through the
 * controller is raced against it and rejects with SessionTimeoutError once it
 * expires, even if the underlying driver call never returns.
 */

import type { BrowserAdapter } from '../adapters/browser-adapter.js';
import type { BrowserCookie, LaunchOptions, NavigateOptions } from '../types/index.js';
import { SessionTimeoutError } from '../errors.js';
import { Deadline, silentLogger, withScope, type LogFunction } from '../utils/index.js';

export const DEFAULT_SESSION_TIMEOUT_MS = 60_000;

export interface SessionControllerOptions {
  /** Budget for the whole session, counted from launch(), default: 60000 */
  timeoutMs?: number;
  logger?: LogFunction;
}

/**
 * Page-level operations the auth poller and extractor rely on
 */
export interface PageSession {
  evaluate(expression: string): Promise<unknown>;
  getCookies(urls: string[]): Promise<BrowserCookie[]>;
  getUrl(): string;
  /** Race any wait against the session deadline */
  within<T>(operation: Promise<T>): Promise<T>;
  /** Milliseconds left before the session times out */
  remainingMs(): number;
}

export class BrowserSessionController implements PageSession {
  private readonly timeoutMs: number;
  private readonly logger: LogFunction;
  private deadline: Deadline | null = null;

  constructor(
    private readonly browser: BrowserAdapter,
    options: SessionControllerOptions = {}
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_SESSION_TIMEOUT_MS;
    this.logger = withScope(options.logger ?? silentLogger, 'BrowserSession');
  }

  /**
   * Launch the browser on `userDataDir` and start the session clock
   */
  async launch(userDataDir: string, options: LaunchOptions): Promise<void> {
    if (this.deadline) {
      throw new Error('Session already launched');
    }
    this.deadline = new Deadline(this.timeoutMs, () => new SessionTimeoutError(this.timeoutMs));
    this.logger('debug', `Launching browser (timeout: ${this.timeoutMs}ms)`);
    await this.guard(() => this.browser.launch(userDataDir, options));
  }

  /**
   * Load `url` and wait for the page body to be visible
   */
  async navigate(url: string, options?: NavigateOptions): Promise<void> {
    this.logger('debug', `Navigating to ${url}`);
    await this.guard(() => this.browser.navigate(url, options));
  }

  evaluate(expression: string): Promise<unknown> {
    return this.guard(() => this.browser.evaluate(expression));
  }

  getCookies(urls: string[]): Promise<BrowserCookie[]> {
    return this.guard(() => this.browser.getCookies(urls));
  }

  getUrl(): string {
    return this.browser.getUrl();
  }

  async within<T>(operation: Promise<T>): Promise<T> {
    return this.requireDeadline().race(operation);
  }

  remainingMs(): number {
    return this.deadline?.remainingMs() ?? this.timeoutMs;
  }

  private async guard<T>(operation: () => Promise<T>): Promise<T> {
    const deadline = this.requireDeadline();
    return deadline.race(operation());
  }

  private requireDeadline(): Deadline {
    if (!this.deadline) {
      throw new Error('Session not launched. Call launch() first.');
    }
    return this.deadline;
  }

  /**
   * Stop the clock and close the browser.
   * A close failure is logged at warn level and not rethrown.
   */
  async close(): Promise<void> {
    this.deadline?.dispose();
    try {
      await this.browser.close();
      this.logger('debug', 'Browser closed');
    } catch (error) {
      this.logger(
        'warn',
        `Failed to close browser: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }
}
