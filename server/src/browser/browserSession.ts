import { BrowserClosedError, CaptureError, InputDispatchError } from '../lib/errors.js';
import { SerialQueue } from '../lib/serialQueue.js';
import type {
  BrowserCapability,
  CaptureOptions,
  Modifier,
  PageEvent,
  PageEventListener,
  Viewport,
} from './types.js';

export interface BrowserSessionOptions {
  viewport: Viewport;
  capture: CaptureOptions;
  navigationTimeoutMs: number;
}

/**
 * Owns one tab. Every command goes through a single queue so the tab never
 * sees two commands at once.
 */
export class BrowserSession {
  private readonly queue = new SerialQueue();
  private readonly listeners = new Set<PageEventListener>();
  private readonly unsubscribe: () => void;
  private closing: Promise<void> | undefined;
  private viewportSize: Viewport;
  private page: PageEvent;

  constructor(
    private readonly tab: BrowserCapability,
    private readonly options: BrowserSessionOptions,
  ) {
    this.viewportSize = { ...options.viewport };
    this.page = { state: 'loaded', url: tab.currentUrl() };
    this.unsubscribe = tab.onPageEvent((event) => {
      this.page = event;
      this.listeners.forEach((listener) => listener(event));
    });
  }

  get viewport(): Viewport {
    return { ...this.viewportSize };
  }

  get pageState(): PageEvent {
    return { ...this.page };
  }

  get closed(): boolean {
    return this.closing !== undefined || this.tab.isClosed();
  }

  onPageEvent(listener: PageEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Fails with CaptureError, or BrowserClosedError once the tab is gone. */
  capture(): Promise<Buffer> {
    return this.exec(async () => {
      let image: Buffer;
      try {
        image = await this.tab.capture(this.options.capture);
      } catch (error) {
        if (this.closed) throw new BrowserClosedError(undefined, { cause: error });
        throw new CaptureError('Screenshot failed', { cause: error });
      }
      if (image.length === 0) {
        throw new CaptureError('Screenshot returned an empty payload');
      }
      return image;
    });
  }

  mouseMove(x: number, y: number): Promise<void> {
    return this.dispatch('mouse move', () => this.tab.mouseMove(x, y));
  }

  mouseClick(x: number, y: number): Promise<void> {
    return this.dispatch('mouse click', () => this.tab.mouseClick(x, y));
  }

  mouseDown(): Promise<void> {
    return this.dispatch('mouse down', () => this.tab.mouseDown());
  }

  mouseUp(): Promise<void> {
    return this.dispatch('mouse up', () => this.tab.mouseUp());
  }

  keyPress(key: string, modifiers: readonly Modifier[]): Promise<void> {
    return this.dispatch(`key ${key}`, async () => {
      await this.tab.bringToFront();
      await this.tab.keyPress(key, modifiers);
    });
  }

  typeText(text: string): Promise<void> {
    return this.dispatch('text input', async () => {
      await this.tab.bringToFront();
      await this.tab.typeText(text);
    });
  }

  wheel(deltaX: number, deltaY: number): Promise<void> {
    return this.dispatch('wheel', () => this.tab.wheel(deltaX, deltaY));
  }

  navigate(url: string): Promise<void> {
    return this.dispatch('navigation', () => this.tab.navigate(url, this.options.navigationTimeoutMs));
  }

  reload(): Promise<void> {
    return this.dispatch('reload', () => this.tab.reload(this.options.navigationTimeoutMs));
  }

  setViewport(viewport: Viewport): Promise<void> {
    return this.dispatch('resize', async () => {
      await this.tab.setViewport(viewport);
      this.viewportSize = { ...viewport };
    });
  }

  /**
   * Idempotent. Does not wait for queued commands: closing the tab makes an
   * in-flight command fail, and anything still queued rejects with BrowserClosedError.
   */
  close(): Promise<void> {
    if (!this.closing) {
      this.unsubscribe();
      this.listeners.clear();
      this.closing = this.tab.close();
    }
    return this.closing;
  }

  private async dispatch(action: string, command: () => Promise<void>): Promise<void> {
    try {
      await this.exec(command);
    } catch (error) {
      throw new InputDispatchError(action, { cause: error });
    }
  }

  private exec<T>(command: () => Promise<T>): Promise<T> {
    return this.queue.run(async () => {
      if (this.closed) throw new BrowserClosedError();
      return command();
    });
  }
}
