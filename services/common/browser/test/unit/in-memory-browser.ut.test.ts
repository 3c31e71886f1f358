/**
 * InMemoryBrowser - Unit Tests
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import { InMemoryBrowser } from '../../src/implementations/in-memory-browser.js';
import {
  BrowserLaunchError,
  EvaluationFailedError,
  NavigationFailedError,
} from '../../src/errors.js';

describe('InMemoryBrowser', () => {
  let browser: InMemoryBrowser;

  beforeEach(async () => {
    browser = new InMemoryBrowser({
      redirects: { 'https://app.example.com/': 'https://accounts.example.com/signin' },
    });
    await browser.launch('/tmp/scratch', { headless: true });
  });

  // ============================================
  // Lifecycle
  // ============================================

  describe('Lifecycle', () => {
    it('records launches and closes', async () => {
      await browser.close();

      expect(browser.calls.launches).toEqual([
        { userDataDir: '/tmp/scratch', options: { headless: true } },
      ]);
      expect(browser.calls.closes).toBe(1);
      expect(browser.isRunning).toBe(false);
    });

    it('runs the launch hook with the user-data dir', async () => {
      const onLaunch = vi.fn();
      const hooked = new InMemoryBrowser({ onLaunch });

      await hooked.launch('/tmp/other', { headless: false });

      expect(onLaunch).toHaveBeenCalledWith('/tmp/other');
    });

    it('can be made to fail at launch', async () => {
      const failing = new InMemoryBrowser({ failLaunch: true });

      await expect(failing.launch('/tmp/scratch', { headless: true })).rejects.toBeInstanceOf(
        BrowserLaunchError
      );
      expect(failing.isRunning).toBe(false);
    });
  });

  // ============================================
  // Navigation
  // ============================================

  describe('Navigation', () => {
    it('starts on about:blank', () => {
      expect(new InMemoryBrowser().getUrl()).toBe('about:blank');
    });

    it('lands on the requested URL', async () => {
      await browser.navigate('https://app.example.com/home');

      expect(browser.getUrl()).toBe('https://app.example.com/home');
    });

    it('follows configured redirects', async () => {
      await browser.navigate('https://app.example.com/');

      expect(browser.getUrl()).toBe('https://accounts.example.com/signin');
    });

    it('fails before launch', async () => {
      const idle = new InMemoryBrowser();

      await expect(idle.navigate('https://app.example.com/')).rejects.toBeInstanceOf(
        NavigationFailedError
      );
    });

    it('can be made to fail', async () => {
      const failing = new InMemoryBrowser({ failNavigation: true });
      await failing.launch('/tmp/scratch', { headless: true });

      await expect(failing.navigate('https://app.example.com/')).rejects.toMatchObject({
        code: 'NAVIGATION_FAILED',
        url: 'https://app.example.com/',
      });
    });
  });

  // ============================================
  // Evaluation
  // ============================================

  describe('Evaluation', () => {
    it('evaluates presence checks of missing globals to false', async () => {
      await expect(browser.evaluate('!!window.WIZ_global_data')).resolves.toBe(false);
    });

    it('raises a recoverable error for a missing global reference', async () => {
      const result = browser.evaluate('WIZ_global_data.SNlM0e');

      await expect(result).rejects.toBeInstanceOf(EvaluationFailedError);
      await expect(result).rejects.toMatchObject({
        recoverable: true,
        expression: 'WIZ_global_data.SNlM0e',
      });
      await expect(result).rejects.toThrow('WIZ_global_data is not defined');
    });

    it('sees globals set by the test', async () => {
      browser.globals.WIZ_global_data = { SNlM0e: 'token-123' };

      await expect(browser.evaluate('!!window.WIZ_global_data')).resolves.toBe(true);
      await expect(browser.evaluate('window.WIZ_global_data.SNlM0e')).resolves.toBe('token-123');
    });

    it('numbers evaluations for the hook', async () => {
      const seen: number[] = [];
      const hooked = new InMemoryBrowser({
        onEvaluate: (call, page) => {
          seen.push(call);
          if (call === 2) {
            page.globals.ready = true;
          }
        },
      });
      await hooked.launch('/tmp/scratch', { headless: true });

      await expect(hooked.evaluate('!!window.ready')).resolves.toBe(false);
      await expect(hooked.evaluate('!!window.ready')).resolves.toBe(true);
      expect(seen).toEqual([1, 2]);
    });

    it('fails unrecoverably once crashed', async () => {
      browser.crash();

      await expect(browser.evaluate('1 + 1')).rejects.toMatchObject({
        code: 'EVALUATION_FAILED',
        recoverable: false,
      });
    });

    it('fails unrecoverably after close', async () => {
      await browser.close();

      await expect(browser.evaluate('1 + 1')).rejects.toMatchObject({ recoverable: false });
    });
  });

  // ============================================
  // Cookie Store
  // ============================================

  describe('Cookie Store', () => {
    it('returns cookies of the requested origin in store order', async () => {
      browser.setCookies('https://app.example.com', [
        { name: 'SID', value: 's1', httpOnly: true },
        { name: 'HSID', value: 'h1' },
      ]);
      browser.setCookies('https://other.example.com', [{ name: 'X', value: 'x' }]);

      const cookies = await browser.getCookies(['https://app.example.com/some/path']);

      expect(cookies).toEqual([
        { name: 'SID', value: 's1', httpOnly: true },
        { name: 'HSID', value: 'h1' },
      ]);
      expect(browser.calls.cookieReads).toEqual([['https://app.example.com/some/path']]);
    });

    it('returns an empty list for an origin without cookies', async () => {
      await expect(browser.getCookies(['https://app.example.com'])).resolves.toEqual([]);
    });

    it('accepts cookies through options', async () => {
      const seeded = new InMemoryBrowser({
        cookies: { 'https://app.example.com/': [{ name: 'a', value: '1' }] },
      });
      await seeded.launch('/tmp/scratch', { headless: true });

      await expect(seeded.getCookies(['https://app.example.com'])).resolves.toEqual([
        { name: 'a', value: '1' },
      ]);
    });
  });
});
