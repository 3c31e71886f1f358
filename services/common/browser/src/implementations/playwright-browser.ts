/**
 * PlaywrightBrowser - Real Chrome driven through a Playwright persistent context
 *
 * Implements BrowserAdapter on top of chromium.launchPersistentContext so the
 * browser runs directly on a (scratch) user-data dir and sees its cookies.
 */

import { chromium, type BrowserContext, type Page } from 'playwright';
import {
  ANTI_DETECTION_ARGS,
  IGNORE_DEFAULT_ARGS,
  SESSION_ARGS,
} from '@nlm-auth/browser-profile';
import type { BrowserAdapter } from '../adapters/browser-adapter.js';
import type {
  BrowserConfig,
  BrowserCookie,
  LaunchOptions,
  NavigateOptions,
  WindowSize,
} from '../types/index.js';
import {
  BrowserLaunchError,
  EvaluationFailedError,
  NavigationFailedError,
} from '../errors.js';
import { silentLogger, type LogFunction } from '../utils/index.js';

const DEFAULT_WINDOW_SIZE: WindowSize = { width: 1280, height: 800 };

/**
 * Playwright error messages meaning the page or browser is gone for good
 */
const SESSION_LOST_PATTERN =
  /Target (page, context or browser )?(has been )?closed|Target crashed|Browser has been closed|browser has disconnected/i;

/**
 * Build Chrome command-line flags for a scratch-profile session
 */
export function buildLaunchArgs(windowSize: WindowSize = DEFAULT_WINDOW_SIZE): string[] {
  return [
    ...ANTI_DETECTION_ARGS,
    ...SESSION_ARGS,
    `--window-size=${windowSize.width},${windowSize.height}`,
  ];
}

export class PlaywrightBrowser implements BrowserAdapter {
  private context: BrowserContext | null = null;
  private page: Page | null = null;
  /** Set by close(); a launch still in flight discards its context */
  private closed = false;
  private readonly config: BrowserConfig & { windowSize: WindowSize; timeout: number };
  private readonly logger: LogFunction;

  constructor(config: BrowserConfig = {}) {
    this.config = {
      ...config,
      channel: config.channel ?? (config.executablePath ? undefined : 'chrome'),
      windowSize: config.windowSize ?? DEFAULT_WINDOW_SIZE,
      timeout: config.timeout ?? 30000,
    };
    this.logger = config.logger ?? silentLogger;
  }

  // ============================================
  // Lifecycle
  // ============================================

  async launch(userDataDir: string, options: LaunchOptions): Promise<void> {
    if (this.context) {
      return;
    }

    this.logger(
      'debug',
      `[PlaywrightBrowser] Launching ${this.config.executablePath ?? this.config.channel} (headless: ${options.headless})`
    );

    this.closed = false;
    let context: BrowserContext;
    try {
      context = await chromium.launchPersistentContext(userDataDir, {
        headless: options.headless,
        channel: this.config.channel,
        executablePath: this.config.executablePath,
        args: buildLaunchArgs(this.config.windowSize),
        ignoreDefaultArgs: IGNORE_DEFAULT_ARGS,
        viewport: this.config.windowSize,
        userAgent: this.config.userAgent,
        logger: options.verbose ? this.createPlaywrightLogger() : undefined,
      });
    } catch (error) {
      throw new BrowserLaunchError(
        `Failed to launch browser: ${describeError(error)}`,
        userDataDir,
        error
      );
    }

    let page: Page;
    try {
      page = context.pages()[0] ?? (await context.newPage());
    } catch (error) {
      await context.close();
      throw new BrowserLaunchError(
        `Failed to open a page: ${describeError(error)}`,
        userDataDir,
        error
      );
    }

    if (this.closed) {
      this.logger('debug', '[PlaywrightBrowser] Closed during launch, discarding browser');
      await context.close();
      throw new BrowserLaunchError('Browser was closed while launching', userDataDir);
    }

    this.context = context;
    this.page = page;
    this.logger('debug', '[PlaywrightBrowser] Browser launched');
  }

  async close(): Promise<void> {
    this.closed = true;
    if (this.context) {
      this.logger('debug', '[PlaywrightBrowser] Closing browser');
      const context = this.context;
      this.context = null;
      this.page = null;
      await context.close();
    }
  }

  // ============================================
  // Navigation
  // ============================================

  async navigate(url: string, options?: NavigateOptions): Promise<void> {
    if (!this.page) {
      throw new NavigationFailedError('Browser not launched. Call launch() first.', url);
    }

    const timeout = options?.timeout ?? this.config.timeout;
    try {
      await this.page.goto(url, {
        waitUntil: options?.waitUntil ?? 'domcontentloaded',
        timeout,
      });
      await this.page.waitForSelector(options?.readySelector ?? 'body', {
        state: 'visible',
        timeout,
      });
    } catch (error) {
      throw new NavigationFailedError(
        `Failed to load ${url}: ${describeError(error)}`,
        url,
        error
      );
    }
    this.logger('debug', `[PlaywrightBrowser] Loaded: ${this.page.url()}`);
  }

  // ============================================
  // Page
  // ============================================

  async evaluate(expression: string): Promise<unknown> {
    if (!this.page) {
      throw new EvaluationFailedError(
        'Browser not launched. Call launch() first.',
        false,
        expression
      );
    }

    try {
      const value: unknown = await this.page.evaluate(expression);
      return value;
    } catch (error) {
      throw this.toEvaluationError(error, expression);
    }
  }

  getUrl(): string {
    return this.page?.url() ?? 'about:blank';
  }

  // ============================================
  // Cookie Store
  // ============================================

  async getCookies(urls: string[]): Promise<BrowserCookie[]> {
    if (!this.context) {
      throw new EvaluationFailedError('Browser not launched. Call launch() first.', false);
    }

    try {
      const cookies = await this.context.cookies(urls);
      return cookies.map((cookie) => ({
        name: cookie.name,
        value: cookie.value,
        domain: cookie.domain,
        path: cookie.path,
        expires: cookie.expires,
        httpOnly: cookie.httpOnly,
        secure: cookie.secure,
        sameSite: cookie.sameSite,
      }));
    } catch (error) {
      throw this.toEvaluationError(error);
    }
  }

  // ============================================
  // Internal helpers
  // ============================================

  private toEvaluationError(error: unknown, expression?: string): EvaluationFailedError {
    const message = describeError(error);
    const sessionLost =
      this.page === null || this.page.isClosed() || SESSION_LOST_PATTERN.test(message);
    return new EvaluationFailedError(
      `Evaluation failed: ${message}`,
      !sessionLost,
      expression,
      error
    );
  }

  /**
   * Route Playwright's internal log lines to our logger
   */
  private createPlaywrightLogger() {
    return {
      isEnabled: () => true,
      log: (name: string, severity: 'verbose' | 'info' | 'warning' | 'error', message: string | Error) => {
        const text = message instanceof Error ? message.message : message;
        this.logger(severity === 'error' ? 'warn' : 'debug', `[playwright:${name}] ${text}`);
      },
    };
  }
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
