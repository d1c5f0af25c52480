import { chromium, errors } from 'playwright-core';
import type { Browser, Download, Locator, Page } from 'playwright-core';
import { logBrowserAction, log } from './utils/logger.js';
import { describeError } from './errors.js';

/** A browser operation ran past its timeout. */
export class BrowserTimeout extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'BrowserTimeout';
  }
}

/** Navigation failed for a reason other than a timeout (DNS, HTTP error page, closed target). */
export class NavigationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'NavigationError';
  }
}

export type WaitUntil = 'load' | 'domcontentloaded' | 'networkidle';

export interface PageElement {
  count(): Promise<number>;
  /** Trimmed inner text of the first match. */
  text(): Promise<string>;
  attribute(name: string): Promise<string | null>;
  click(): Promise<void>;
  isVisible(): Promise<boolean>;
  all(): Promise<PageElement[]>;
  locate(selector: string): PageElement;
}

export interface DownloadHandle {
  suggestedFilename(): string;
  saveAs(filePath: string): Promise<void>;
}

export interface BrowserSession {
  goto(url: string, options: { waitUntil: WaitUntil; timeoutMs: number }): Promise<void>;
  locate(selector: string): PageElement;
  /** Resolves false instead of throwing when the selector never shows up. */
  waitFor(selector: string, timeoutMs: number): Promise<boolean>;
  pause(ms: number): Promise<void>;
  expectDownload(trigger: () => Promise<void>, timeoutMs: number): Promise<DownloadHandle>;
}

export interface SessionOptions {
  acceptDownloads?: boolean;
  signal?: AbortSignal;
}

export interface BrowserProvider {
  /** Opens a session, runs `fn`, and closes the session on every exit path. */
  withSession<T>(fn: (session: BrowserSession) => Promise<T>, options?: SessionOptions): Promise<T>;
}

export interface PlaywrightProviderOptions {
  headless: boolean;
  executablePath?: string;
  actionTimeoutMs: number;
  userAgent?: string;
}

const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36';

function translateError(error: unknown, what: string): Error {
  if (error instanceof errors.TimeoutError) {
    return new BrowserTimeout(`${what} timed out`, { cause: error });
  }
  return error instanceof Error ? error : new Error(`${what} failed: ${describeError(error)}`);
}

class PlaywrightElement implements PageElement {
  constructor(private readonly locator: Locator, private readonly timeoutMs: number) {}

  async count(): Promise<number> {
    return this.locator.count();
  }

  async text(): Promise<string> {
    try {
      const text = await this.locator.first().innerText({ timeout: this.timeoutMs });
      return text.trim();
    } catch (error) {
      throw translateError(error, 'Reading element text');
    }
  }

  async attribute(name: string): Promise<string | null> {
    try {
      return await this.locator.first().getAttribute(name, { timeout: this.timeoutMs });
    } catch (error) {
      throw translateError(error, `Reading attribute ${name}`);
    }
  }

  async click(): Promise<void> {
    try {
      await this.locator.first().click({ timeout: this.timeoutMs });
    } catch (error) {
      throw translateError(error, 'Click');
    }
  }

  async isVisible(): Promise<boolean> {
    return this.locator.first().isVisible();
  }

  async all(): Promise<PageElement[]> {
    const matches = await this.locator.all();
    return matches.map(match => new PlaywrightElement(match, this.timeoutMs));
  }

  locate(selector: string): PageElement {
    return new PlaywrightElement(this.locator.locator(selector), this.timeoutMs);
  }
}

class PlaywrightSession implements BrowserSession {
  constructor(private readonly page: Page, private readonly actionTimeoutMs: number) {}

  async goto(url: string, options: { waitUntil: WaitUntil; timeoutMs: number }): Promise<void> {
    logBrowserAction('NAVIGATE', { url, message: `waitUntil=${options.waitUntil}` });
    try {
      await this.page.goto(url, { waitUntil: options.waitUntil, timeout: options.timeoutMs });
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        throw new BrowserTimeout(`Navigation to ${url} timed out after ${options.timeoutMs}ms`, { cause: error });
      }
      throw new NavigationError(`Navigation to ${url} failed: ${describeError(error)}`, { cause: error });
    }
  }

  locate(selector: string): PageElement {
    return new PlaywrightElement(this.page.locator(selector), this.actionTimeoutMs);
  }

  async waitFor(selector: string, timeoutMs: number): Promise<boolean> {
    logBrowserAction('WAIT', { selector });
    try {
      await this.page.waitForSelector(selector, { state: 'visible', timeout: timeoutMs });
      return true;
    } catch (error) {
      if (error instanceof errors.TimeoutError) {
        return false;
      }
      throw error;
    }
  }

  async pause(ms: number): Promise<void> {
    await this.page.waitForTimeout(ms);
  }

  async expectDownload(trigger: () => Promise<void>, timeoutMs: number): Promise<DownloadHandle> {
    logBrowserAction('DOWNLOAD', { message: `waiting up to ${timeoutMs}ms` });
    try {
      const [download] = await Promise.all([
        this.page.waitForEvent('download', { timeout: timeoutMs }),
        trigger()
      ]);
      return wrapDownload(download);
    } catch (error) {
      throw translateError(error, 'Download');
    }
  }
}

function wrapDownload(download: Download): DownloadHandle {
  return {
    suggestedFilename: () => download.suggestedFilename(),
    saveAs: (filePath: string) => download.saveAs(filePath)
  };
}

/**
 * Chromium through playwright-core. The browser binary is not downloaded by
 * the package; point BROWSER_EXECUTABLE_PATH at an installed Chrome/Chromium.
 */
export class PlaywrightBrowserProvider implements BrowserProvider {
  constructor(private readonly options: PlaywrightProviderOptions) {}

  async withSession<T>(fn: (session: BrowserSession) => Promise<T>, options: SessionOptions = {}): Promise<T> {
    const { signal } = options;
    if (signal?.aborted) {
      throw new NavigationError('Session was cancelled before it opened');
    }

    const browser: Browser = await chromium.launch({
      headless: this.options.headless,
      executablePath: this.options.executablePath
    });

    if (signal?.aborted) {
      await browser.close();
      logBrowserAction('CLOSE', { message: 'Run cancelled while the browser was launching' });
      throw new NavigationError('Session was cancelled');
    }

    const closeOnAbort = () => {
      logBrowserAction('CLOSE', { message: 'Run cancelled, closing browser' });
      browser.close().catch(error => log('WARN', 'Browser close after cancellation failed', describeError(error)));
    };
    signal?.addEventListener('abort', closeOnAbort, { once: true });

    try {
      const context = await browser.newContext({
        acceptDownloads: options.acceptDownloads ?? false,
        userAgent: this.options.userAgent ?? DEFAULT_USER_AGENT,
        viewport: { width: 1280, height: 800 }
      });
      const page = await context.newPage();
      return await fn(new PlaywrightSession(page, this.options.actionTimeoutMs));
    } finally {
      signal?.removeEventListener('abort', closeOnAbort);
      if (browser.isConnected()) {
        await browser.close();
      }
      logBrowserAction('CLOSE', { message: 'Browser session closed' });
    }
  }
}
