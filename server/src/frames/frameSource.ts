import { createHash } from 'node:crypto';
import type { BrowserSession } from '../browser/browserSession.js';
import { abortable, AbortedError } from '../lib/abort.js';
import { type Clock, systemClock } from '../lib/clock.js';
import { BrowserClosedError, CaptureError, describeError } from '../lib/errors.js';
import { componentLogger, type Logger } from '../lib/logger.js';
import type { FrameLoop, Session } from '../lib/session.js';

export interface Frame {
  readonly data: Buffer;
  readonly mime: 'image/jpeg';
  readonly fingerprint: string;
  readonly sequence: number;
  readonly capturedAt: number;
}

/**
 * `sent` records the frame as delivered; `skipped` leaves it unrecorded so an
 * identical frame is offered again; `closed` ends the loop.
 */
export type FrameDelivery = 'sent' | 'skipped' | 'closed';

export type FrameHandler = (frame: Frame) => FrameDelivery | Promise<FrameDelivery>;

export type LoopExit = 'aborted' | 'channel-closed' | 'browser-closed' | 'failed';

export interface RunLoopOptions {
  signal: AbortSignal;
  onCaptureError?: (error: CaptureError) => void;
}

export interface FrameSourceOptions {
  targetIntervalMs: number;
  clock?: Clock;
  logger?: Logger;
}

export function fingerprint(data: Buffer): string {
  return createHash('sha1').update(data).digest('hex');
}

export class FrameSource {
  private sequence = 0;
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(
    private readonly browser: BrowserSession,
    private readonly options: FrameSourceOptions,
  ) {
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? componentLogger('frames');
  }

  async captureOnce(): Promise<Frame> {
    const data = await this.browser.capture();
    this.sequence += 1;
    return {
      data,
      mime: 'image/jpeg',
      fingerprint: fingerprint(data),
      sequence: this.sequence,
      capturedAt: Date.now(),
    };
  }

  /**
   * Captures at most once per target interval until aborted, the handler
   * reports the channel gone, or the tab disappears. An in-flight capture is
   * abandoned, not awaited, on abort.
   */
  async runLoop(session: Session, onFrame: FrameHandler, options: RunLoopOptions): Promise<LoopExit> {
    const { signal } = options;
    session.lastFrameHash = undefined;

    while (!signal.aborted) {
      const started = this.clock.now();
      try {
        const frame = await abortable(this.captureOnce(), signal);
        if (frame.fingerprint !== session.lastFrameHash) {
          const delivery = await onFrame(frame);
          if (delivery === 'closed') return 'channel-closed';
          if (delivery === 'sent') session.lastFrameHash = frame.fingerprint;
        }
      } catch (error) {
        if (error instanceof AbortedError) break;
        if (error instanceof BrowserClosedError) {
          this.log.warn({ sessionId: session.id }, 'capture_browser_closed');
          return 'browser-closed';
        }
        if (!(error instanceof CaptureError)) throw error;
        session.lastFrameHash = undefined;
        this.log.warn({ sessionId: session.id, error: describeError(error.cause ?? error) }, 'capture_failed');
        options.onCaptureError?.(error);
      }

      const elapsed = this.clock.now() - started;
      await this.clock.sleep(Math.max(0, this.options.targetIntervalMs - elapsed), signal);
    }
    return 'aborted';
  }

  /** Runs the loop in the background and hands back a handle to stop it. */
  start(
    session: Session,
    onFrame: FrameHandler,
    options: Omit<RunLoopOptions, 'signal'> & {
      kind?: FrameLoop['kind'];
      onExit?: (exit: LoopExit) => void;
    } = {},
  ): FrameLoop & { done: Promise<LoopExit> } {
    const controller = new AbortController();
    const done = this.runLoop(session, onFrame, { ...options, signal: controller.signal }).then(
      (exit) => {
        if (exit !== 'aborted') options.onExit?.(exit);
        return exit;
      },
      (error: unknown) => {
        this.log.error({ sessionId: session.id, error: describeError(error) }, 'frame_loop_crashed');
        options.onExit?.('failed');
        return 'failed' as const;
      },
    );
    return {
      kind: options.kind ?? 'polling',
      done,
      async stop() {
        controller.abort();
        await done;
      },
    };
  }
}
