/**
 * InMemoryBrowser - Scriptable BrowserAdapter with no browser process
 *
 * Page globals live in a node:vm context, so expressions evaluate with real
 * JavaScript semantics (a missing global throws ReferenceError, `!!window.x`
 * is false). Tests mutate `globals`, the cookie jar and the URL between
 * evaluations to play out a page that signs in over time.
 */

import vm from 'node:vm';
import type { BrowserAdapter } from '../adapters/browser-adapter.js';
import type { BrowserCookie, LaunchOptions, NavigateOptions } from '../types/index.js';
import {
  BrowserLaunchError,
  EvaluationFailedError,
  NavigationFailedError,
} from '../errors.js';
import { sleep } from '../utils/index.js';

/**
 * Called before each evaluation with its 1-based sequence number
 */
export type EvaluateHook = (call: number, browser: InMemoryBrowser) => void | Promise<void>;

export interface InMemoryBrowserOptions {
  /** Where navigate() lands instead of the requested URL, e.g. a login redirect */
  redirects?: Record<string, string>;
  /** Cookies per origin, e.g. { 'https://example.com': [...] } */
  cookies?: Record<string, BrowserCookie[]>;
  /** Runs before every evaluate() */
  onEvaluate?: EvaluateHook;
  /** Runs at launch with the user-data dir, while the profile is on disk */
  onLaunch?: (userDataDir: string) => void | Promise<void>;
  /** Make launch() fail */
  failLaunch?: boolean;
  /** Make navigate() fail */
  failNavigation?: boolean;
  /** Simulated latency per operation in milliseconds */
  latencyMs?: number;
}

/**
 * Record of calls made against the fake, for assertions
 */
export interface InMemoryBrowserCalls {
  launches: Array<{ userDataDir: string; options: LaunchOptions }>;
  navigations: string[];
  evaluations: string[];
  cookieReads: string[][];
  closes: number;
}

export class InMemoryBrowser implements BrowserAdapter {
  /** Globals visible to evaluated expressions, also reachable as `window` */
  readonly globals: Record<string, unknown>;
  readonly calls: InMemoryBrowserCalls = {
    launches: [],
    navigations: [],
    evaluations: [],
    cookieReads: [],
    closes: 0,
  };

  private readonly context: vm.Context;
  private readonly cookieJar = new Map<string, BrowserCookie[]>();
  private url = 'about:blank';
  private launched = false;
  private crashed = false;

  constructor(private readonly options: InMemoryBrowserOptions = {}) {
    this.globals = {};
    this.context = vm.createContext(this.globals);
    this.globals.window = this.globals;

    for (const [origin, cookies] of Object.entries(options.cookies ?? {})) {
      this.setCookies(origin, cookies);
    }
  }

  // ============================================
  // Test controls
  // ============================================

  get isRunning(): boolean {
    return this.launched;
  }

  setUrl(url: string): void {
    this.url = url;
  }

  setCookies(url: string, cookies: BrowserCookie[]): void {
    this.cookieJar.set(new URL(url).origin, [...cookies]);
  }

  /**
   * Simulate the browser process dying; later calls fail unrecoverably
   */
  crash(): void {
    this.crashed = true;
  }

  // ============================================
  // BrowserAdapter
  // ============================================

  async launch(userDataDir: string, options: LaunchOptions): Promise<void> {
    this.calls.launches.push({ userDataDir, options });
    await this.delay();
    if (this.options.failLaunch) {
      throw new BrowserLaunchError('Failed to launch browser: simulated failure', userDataDir);
    }
    await this.options.onLaunch?.(userDataDir);
    this.launched = true;
  }

  async close(): Promise<void> {
    this.calls.closes += 1;
    this.launched = false;
  }

  async navigate(url: string, _options?: NavigateOptions): Promise<void> {
    this.calls.navigations.push(url);
    if (!this.launched || this.crashed) {
      throw new NavigationFailedError(`Failed to load ${url}: browser is not running`, url);
    }
    await this.delay();
    if (this.options.failNavigation) {
      throw new NavigationFailedError(`Failed to load ${url}: net::ERR_NAME_NOT_RESOLVED`, url);
    }
    this.url = this.options.redirects?.[url] ?? url;
  }

  async evaluate(expression: string): Promise<unknown> {
    this.calls.evaluations.push(expression);
    this.assertAlive(expression);
    await this.options.onEvaluate?.(this.calls.evaluations.length, this);
    await this.delay();
    this.assertAlive(expression);

    try {
      const value: unknown = vm.runInContext(expression, this.context);
      return value;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new EvaluationFailedError(`Evaluation failed: ${message}`, true, expression, error);
    }
  }

  getUrl(): string {
    return this.url;
  }

  async getCookies(urls: string[]): Promise<BrowserCookie[]> {
    this.calls.cookieReads.push([...urls]);
    this.assertAlive();
    await this.delay();

    const origins = new Set(urls.map((url) => new URL(url).origin));
    return [...origins].flatMap((origin) => this.cookieJar.get(origin) ?? []);
  }

  // ============================================
  // Internal helpers
  // ============================================

  private assertAlive(expression?: string): void {
    if (!this.launched || this.crashed) {
      throw new EvaluationFailedError(
        'Evaluation failed: Target page, context or browser has been closed',
        false,
        expression
      );
    }
  }

  private async delay(): Promise<void> {
    if (this.options.latencyMs) {
      await sleep(this.options.latencyMs);
    }
  }
}
