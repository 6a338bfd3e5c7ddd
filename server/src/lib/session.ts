import type { BrowserSession } from '../browser/browserSession.js';
import { BrowserClosedError, FrameLoopBusyError } from './errors.js';

/** A running frame consumer: the polling push loop or a media track. */
export interface FrameLoop {
  readonly kind: 'polling' | 'media';
  /** Cancels the loop and resolves once it has exited. */
  stop(): Promise<void>;
}

export type SessionCloseListener = (reason: string) => void;

export class Session {
  readonly createdAt = Date.now();
  /** Written only by the frame loop. */
  lastFrameHash: string | undefined;
  /** Written only by the input translator. */
  mouseDown = false;

  private loop: FrameLoop | undefined;
  private readonly closeListeners = new Set<SessionCloseListener>();
  private ended = false;

  constructor(
    readonly id: string,
    readonly browser: BrowserSession,
  ) {}

  get frameLoop(): FrameLoop | undefined {
    return this.loop;
  }

  get isClosed(): boolean {
    return this.ended;
  }

  attachFrameLoop(loop: FrameLoop): void {
    if (this.ended) throw new BrowserClosedError(`Session ${this.id} is closed`);
    if (this.loop) throw new FrameLoopBusyError(this.id);
    this.loop = loop;
  }

  async detachFrameLoop(loop: FrameLoop): Promise<void> {
    if (this.loop !== loop) return;
    this.loop = undefined;
    await loop.stop();
  }

  onClose(listener: SessionCloseListener): () => void {
    this.closeListeners.add(listener);
    return () => {
      this.closeListeners.delete(listener);
    };
  }

  /**
   * Stops the frame loop, waits for it, then releases the tab. Called by the
   * registry only.
   */
  async release(reason: string): Promise<void> {
    if (this.ended) return;
    this.ended = true;
    const loop = this.loop;
    this.loop = undefined;
    try {
      if (loop) await loop.stop();
    } finally {
      try {
        await this.browser.close();
      } finally {
        const listeners = [...this.closeListeners];
        this.closeListeners.clear();
        listeners.forEach((listener) => listener(reason));
      }
    }
  }
}
