import { type Clock, systemClock } from '../lib/clock.js';
import { describeError } from '../lib/errors.js';
import { componentLogger, type Logger } from '../lib/logger.js';
import type { FrameLoop, Session } from '../lib/session.js';
import type { Frame, FrameDelivery, FrameSource, LoopExit } from './frameSource.js';
import type { FrameImaging, FrameSize } from './imaging.js';

/** RTP video clock. */
export const VIDEO_CLOCK_RATE = 90_000;
export const PLACEHOLDER_LABEL = 'Capture Error';

export interface TimedFrame {
  readonly data: Buffer;
  readonly mime: 'image/jpeg';
  readonly width: number;
  readonly height: number;
  /** Presentation timestamp in units of `timeBase` seconds. */
  readonly pts: number;
  readonly timeBase: number;
  readonly placeholder: boolean;
}

export interface MediaTrackOptions {
  size: FrameSize;
  fps: number;
  imaging: FrameImaging;
  clock?: Clock;
  logger?: Logger;
}

export class TrackEndedError extends Error {
  constructor() {
    super('Media track has ended');
    this.name = 'TrackEndedError';
  }
}

/**
 * Pull-driven video source for the real-time transport. Captures run in the
 * background through the session's FrameSource; `recv` always returns a frame
 * at the negotiated size, on a fixed frame clock.
 */
export class MediaTrackAdapter implements FrameLoop {
  readonly kind = 'media';

  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly frameTicks: number;
  private placeholderImage: Buffer | undefined;
  private current: Buffer | undefined;
  private failing = false;
  private loop: FrameLoop | undefined;
  private startedAt: number | undefined;
  private timestamp = 0;
  private ended = false;

  constructor(
    private readonly session: Session,
    private readonly source: FrameSource,
    private readonly options: MediaTrackOptions,
  ) {
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? componentLogger('media-track');
    this.frameTicks = Math.round(VIDEO_CLOCK_RATE / options.fps);
  }

  get ready(): boolean {
    return this.placeholderImage !== undefined && !this.ended;
  }

  get size(): FrameSize {
    return { ...this.options.size };
  }

  /** Renders the placeholder, claims the session's frame slot and starts capturing. */
  async start(): Promise<void> {
    if (this.loop || this.ended) return;
    this.placeholderImage = await this.options.imaging.placeholder(this.options.size, PLACEHOLDER_LABEL);
    this.session.attachFrameLoop(this);
    this.loop = this.source.start(this.session, (frame) => this.accept(frame), {
      kind: 'media',
      onCaptureError: () => {
        this.failing = true;
      },
      onExit: (exit: LoopExit) => {
        this.failing = true;
        this.log.warn({ sessionId: this.session.id, exit }, 'media_capture_stopped');
      },
    });
    this.log.info({ sessionId: this.session.id, size: this.options.size, fps: this.options.fps }, 'media_track_started');
  }

  async recv(): Promise<TimedFrame> {
    if (this.ended) throw new TrackEndedError();

    if (this.startedAt === undefined) {
      this.startedAt = this.clock.now();
      this.timestamp = 0;
    } else {
      this.timestamp += this.frameTicks;
      const due = this.startedAt + (this.timestamp / VIDEO_CLOCK_RATE) * 1000;
      const wait = due - this.clock.now();
      if (wait > 0) await this.clock.sleep(wait);
    }

    const usePlaceholder = this.failing || this.current === undefined;
    const data = usePlaceholder ? this.placeholderImage : this.current;
    if (!data) throw new TrackEndedError();

    return {
      data,
      mime: 'image/jpeg',
      width: this.options.size.width,
      height: this.options.size.height,
      pts: this.timestamp,
      timeBase: 1 / VIDEO_CLOCK_RATE,
      placeholder: usePlaceholder,
    };
  }

  /** Idempotent; resolves once the capture loop has exited. */
  async stop(): Promise<void> {
    if (this.ended) return;
    this.ended = true;
    const loop = this.loop;
    this.loop = undefined;
    if (loop) await loop.stop();
    await this.session.detachFrameLoop(this);
    this.log.info({ sessionId: this.session.id }, 'media_track_stopped');
  }

  private async accept(frame: Frame): Promise<FrameDelivery> {
    if (this.ended) return 'closed';
    try {
      this.current = await this.options.imaging.fit(frame.data, this.options.size);
      this.failing = false;
      return 'sent';
    } catch (error) {
      this.failing = true;
      this.log.warn({ sessionId: this.session.id, error: describeError(error) }, 'frame_resize_failed');
      return 'skipped';
    }
  }
}
