import { describe, it, expect, vi, beforeEach } from 'vitest';
import { NavigationError, PlaywrightBrowserProvider } from '../browser.js';

const { launch } = vi.hoisted(() => ({ launch: vi.fn() }));

vi.mock('playwright-core', async importOriginal => {
  const actual = await importOriginal<typeof import('playwright-core')>();
  return { ...actual, chromium: { launch } };
});

function fakeBrowser() {
  const page = {};
  return {
    close: vi.fn(async () => undefined),
    isConnected: vi.fn(() => true),
    newContext: vi.fn(async () => ({ newPage: async () => page }))
  };
}

const provider = new PlaywrightBrowserProvider({ headless: true, actionTimeoutMs: 1000 });

describe('PlaywrightBrowserProvider.withSession', () => {
  beforeEach(() => {
    launch.mockReset();
  });

  it('runs the body and closes the browser', async () => {
    const browser = fakeBrowser();
    launch.mockResolvedValue(browser);

    expect(await provider.withSession(async () => 'scraped')).toBe('scraped');
    expect(launch).toHaveBeenCalledWith({ headless: true, executablePath: undefined });
    expect(browser.close).toHaveBeenCalledTimes(1);
  });

  it('does not open a session when cancelled before launch', async () => {
    const body = vi.fn(async () => 'scraped');
    const controller = new AbortController();
    controller.abort();

    await expect(provider.withSession(body, { signal: controller.signal })).rejects.toBeInstanceOf(NavigationError);
    expect(launch).not.toHaveBeenCalled();
    expect(body).not.toHaveBeenCalled();
  });

  it('closes the browser without running the body when cancelled during launch', async () => {
    const browser = fakeBrowser();
    let finishLaunch: (value: unknown) => void = () => undefined;
    launch.mockImplementation(() => new Promise<unknown>(resolve => {
      finishLaunch = resolve;
    }));
    const body = vi.fn(async () => 'scraped');
    const controller = new AbortController();

    const run = provider.withSession(body, { signal: controller.signal });
    controller.abort();
    finishLaunch(browser);

    await expect(run).rejects.toBeInstanceOf(NavigationError);
    expect(body).not.toHaveBeenCalled();
    expect(browser.newContext).not.toHaveBeenCalled();
    expect(browser.close).toHaveBeenCalledTimes(1);
  });
});
