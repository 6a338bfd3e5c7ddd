import { chromium, type Browser, type BrowserContext, type Frame, type Page } from 'playwright-core';
import { componentLogger, type Logger } from '../lib/logger.js';
import { describeError } from '../lib/errors.js';
import type {
  BrowserCapability,
  BrowserFactory,
  CaptureOptions,
  Modifier,
  PageEventListener,
  Viewport,
} from './types.js';

export interface PlaywrightFactoryOptions {
  headless: boolean;
  startUrl: string;
  navigationTimeoutMs: number;
  executablePath?: string;
  logger?: Logger;
}

const LAUNCH_ARGS = [
  '--disable-dev-shm-usage',
  '--no-sandbox',
  '--disable-audio-output',
  '--disable-background-networking',
  '--disable-extensions',
  '--disable-background-timer-throttling',
];

class PlaywrightTab implements BrowserCapability {
  private readonly listeners = new Set<PageEventListener>();

  constructor(
    private readonly context: BrowserContext,
    private readonly page: Page,
  ) {
    page.on('framenavigated', (frame: Frame) => {
      if (frame === page.mainFrame()) this.emit('loading');
    });
    page.on('domcontentloaded', () => this.emit('loading'));
    page.on('load', () => this.emit('loaded'));
  }

  async capture({ quality, timeoutMs }: CaptureOptions): Promise<Buffer> {
    return this.page.screenshot({ type: 'jpeg', quality, timeout: timeoutMs });
  }

  async mouseMove(x: number, y: number): Promise<void> {
    await this.page.mouse.move(x, y);
  }

  async mouseClick(x: number, y: number): Promise<void> {
    await this.page.mouse.click(x, y);
  }

  async mouseDown(): Promise<void> {
    await this.page.mouse.down();
  }

  async mouseUp(): Promise<void> {
    await this.page.mouse.up();
  }

  async keyPress(key: string, modifiers: readonly Modifier[]): Promise<void> {
    await this.page.keyboard.press([...modifiers, key].join('+'));
  }

  async typeText(text: string): Promise<void> {
    await this.page.keyboard.type(text);
  }

  async wheel(deltaX: number, deltaY: number): Promise<void> {
    await this.page.mouse.wheel(deltaX, deltaY);
  }

  async navigate(url: string, timeoutMs: number): Promise<void> {
    await this.page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
  }

  async reload(timeoutMs: number): Promise<void> {
    await this.page.reload({ waitUntil: 'domcontentloaded', timeout: timeoutMs });
  }

  async setViewport(viewport: Viewport): Promise<void> {
    await this.page.setViewportSize(viewport);
  }

  async bringToFront(): Promise<void> {
    await this.page.bringToFront();
  }

  currentUrl(): string {
    return this.page.url();
  }

  isClosed(): boolean {
    return this.page.isClosed();
  }

  onPageEvent(listener: PageEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async close(): Promise<void> {
    this.listeners.clear();
    await this.context.close();
  }

  private emit(state: 'loading' | 'loaded'): void {
    const event = { state, url: this.page.url() };
    this.listeners.forEach((listener) => listener(event));
  }
}

/**
 * Shares one Chromium process between sessions; each session gets its own
 * context and a single page.
 */
export class PlaywrightBrowserFactory implements BrowserFactory {
  private browser: Promise<Browser> | undefined;
  private readonly log: Logger;

  constructor(private readonly options: PlaywrightFactoryOptions) {
    this.log = options.logger ?? componentLogger('browser');
  }

  async open(sessionId: string, viewport: Viewport): Promise<BrowserCapability> {
    const browser = await this.launch();
    const context = await browser.newContext({ viewport, deviceScaleFactor: 1 });
    try {
      const page = await context.newPage();
      const tab = new PlaywrightTab(context, page);
      if (this.options.startUrl !== 'about:blank') {
        await page
          .goto(this.options.startUrl, {
            waitUntil: 'domcontentloaded',
            timeout: this.options.navigationTimeoutMs,
          })
          .catch((error: unknown) => {
            this.log.warn({ sessionId, error: describeError(error) }, 'start_url_failed');
          });
      }
      this.log.info({ sessionId, viewport }, 'tab_opened');
      return tab;
    } catch (error) {
      await context.close().catch((closeError: unknown) => {
        this.log.warn({ sessionId, error: describeError(closeError) }, 'context_close_failed');
      });
      throw error;
    }
  }

  async shutdown(): Promise<void> {
    const pending = this.browser;
    this.browser = undefined;
    if (!pending) return;
    // A failed launch was already logged.
    const browser = await pending.catch(() => undefined);
    if (browser?.isConnected()) {
      await browser.close();
      this.log.info('browser_closed');
    }
  }

  private launch(): Promise<Browser> {
    if (!this.browser) {
      const launching = chromium.launch({
        headless: this.options.headless,
        args: LAUNCH_ARGS,
        executablePath: this.options.executablePath,
      });
      this.browser = launching;
      launching.then(
        (browser) => {
          this.log.info({ version: browser.version() }, 'browser_launched');
          browser.on('disconnected', () => {
            if (this.browser === launching) this.browser = undefined;
            this.log.warn('browser_disconnected');
          });
        },
        (error: unknown) => {
          if (this.browser === launching) this.browser = undefined;
          this.log.error({ error: describeError(error) }, 'browser_launch_failed');
        },
      );
    }
    return this.browser;
  }
}
