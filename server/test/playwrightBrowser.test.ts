import { beforeEach, describe, expect, it, vi } from 'vitest';
import { PlaywrightBrowserFactory } from '../src/browser/playwrightBrowser.js';
import type { PageEvent } from '../src/browser/types.js';

const pw = vi.hoisted(() => {
  const handlers = new Map<string, Array<(arg?: unknown) => void>>();
  const mainFrame = { name: 'main' };
  const state = { url: 'about:blank' };
  const page = {
    on: (event: string, handler: (arg?: unknown) => void) => {
      handlers.set(event, [...(handlers.get(event) ?? []), handler]);
    },
    mainFrame: () => mainFrame,
    url: () => state.url,
    isClosed: () => false,
    goto: vi.fn(async (url: string) => {
      state.url = url;
    }),
    reload: vi.fn(async () => undefined),
    screenshot: vi.fn(async () => Buffer.from('jpeg-bytes')),
    setViewportSize: vi.fn(async () => undefined),
    bringToFront: vi.fn(async () => undefined),
    mouse: {
      move: vi.fn(async () => undefined),
      click: vi.fn(async () => undefined),
      down: vi.fn(async () => undefined),
      up: vi.fn(async () => undefined),
      wheel: vi.fn(async () => undefined),
    },
    keyboard: {
      press: vi.fn(async () => undefined),
      type: vi.fn(async () => undefined),
    },
  };
  const context = {
    newPage: vi.fn(async () => page),
    close: vi.fn(async () => undefined),
  };
  const browser = {
    newContext: vi.fn(async () => context),
    version: () => '120.0.0.0',
    on: vi.fn(),
    isConnected: () => true,
    close: vi.fn(async () => undefined),
  };
  return {
    page,
    context,
    browser,
    mainFrame,
    state,
    launch: vi.fn(async () => browser),
    emit(event: string, arg?: unknown) {
      handlers.get(event)?.forEach((handler) => handler(arg));
    },
    reset() {
      handlers.clear();
      state.url = 'about:blank';
    },
  };
});

vi.mock('playwright-core', () => ({
  chromium: { launch: pw.launch },
}));

const VIEWPORT = { width: 1280, height: 720 };

function factory(startUrl = 'about:blank') {
  return new PlaywrightBrowserFactory({ headless: true, startUrl, navigationTimeoutMs: 5000 });
}

describe('PlaywrightBrowserFactory', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    pw.reset();
  });

  it('launches one browser and gives each session its own context', async () => {
    const browsers = factory();

    await browsers.open('a', VIEWPORT);
    await browsers.open('b', { width: 800, height: 600 });

    expect(pw.launch).toHaveBeenCalledTimes(1);
    expect(pw.launch).toHaveBeenCalledWith({
      headless: true,
      args: expect.arrayContaining(['--no-sandbox', '--disable-dev-shm-usage']),
      executablePath: undefined,
    });
    expect(pw.browser.newContext.mock.calls).toEqual([
      [{ viewport: VIEWPORT, deviceScaleFactor: 1 }],
      [{ viewport: { width: 800, height: 600 }, deviceScaleFactor: 1 }],
    ]);
  });

  it('loads the start page unless it is about:blank', async () => {
    await factory().open('a', VIEWPORT);
    expect(pw.page.goto).not.toHaveBeenCalled();

    await factory('https://example.com').open('b', VIEWPORT);
    expect(pw.page.goto).toHaveBeenCalledWith('https://example.com', {
      waitUntil: 'domcontentloaded',
      timeout: 5000,
    });
  });

  it('still opens the tab when the start page fails to load', async () => {
    pw.page.goto.mockRejectedValueOnce(new Error('net::ERR_NAME_NOT_RESOLVED'));

    const tab = await factory('https://unreachable.test').open('a', VIEWPORT);

    expect(tab.isClosed()).toBe(false);
  });

  it('closes the shared browser on shutdown', async () => {
    const browsers = factory();
    await browsers.open('a', VIEWPORT);

    await browsers.shutdown();

    expect(pw.browser.close).toHaveBeenCalledTimes(1);
  });
});

describe('PlaywrightTab', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    pw.reset();
  });

  it('captures JPEG screenshots with the configured quality and timeout', async () => {
    const tab = await factory().open('a', VIEWPORT);

    const image = await tab.capture({ quality: 70, timeoutMs: 500 });

    expect(image.toString()).toBe('jpeg-bytes');
    expect(pw.page.screenshot).toHaveBeenCalledWith({ type: 'jpeg', quality: 70, timeout: 500 });
  });

  it('joins modifiers and key into one chord', async () => {
    const tab = await factory().open('a', VIEWPORT);

    await tab.keyPress('a', ['Shift', 'Control']);
    await tab.keyPress('Enter', []);

    expect(pw.page.keyboard.press.mock.calls).toEqual([['Shift+Control+a'], ['Enter']]);
  });

  it('navigates and reloads with the given timeout', async () => {
    const tab = await factory().open('a', VIEWPORT);

    await tab.navigate('https://example.org/', 3000);
    await tab.reload(3000);

    expect(pw.page.goto).toHaveBeenCalledWith('https://example.org/', { waitUntil: 'domcontentloaded', timeout: 3000 });
    expect(pw.page.reload).toHaveBeenCalledWith({ waitUntil: 'domcontentloaded', timeout: 3000 });
    expect(tab.currentUrl()).toBe('https://example.org/');
  });

  it('reports main-frame navigations and loads as page events', async () => {
    const tab = await factory().open('a', VIEWPORT);
    const events: PageEvent[] = [];
    tab.onPageEvent((event) => events.push(event));
    pw.state.url = 'https://example.com/';

    pw.emit('framenavigated', { name: 'child' });
    pw.emit('framenavigated', pw.mainFrame);
    pw.emit('load');

    expect(events).toEqual([
      { state: 'loading', url: 'https://example.com/' },
      { state: 'loaded', url: 'https://example.com/' },
    ]);
  });

  it('closes its context', async () => {
    const tab = await factory().open('a', VIEWPORT);

    await tab.close();

    expect(pw.context.close).toHaveBeenCalledTimes(1);
  });
});
