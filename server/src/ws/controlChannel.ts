import { FrameSource, type Frame, type FrameDelivery, type LoopExit } from '../frames/frameSource.js';
import { InputTranslator, type InputTranslatorOptions } from '../input/inputTranslator.js';
import type { Clock } from '../lib/clock.js';
import { describeError, FrameLoopBusyError } from '../lib/errors.js';
import { componentLogger, type Logger } from '../lib/logger.js';
import { SerialQueue } from '../lib/serialQueue.js';
import type { Session } from '../lib/session.js';
import type { SessionRegistry } from '../lib/sessionRegistry.js';
import { controlMessageSchema, toInputEvent } from './schemas.js';
import { type ChannelSocket, closeSocket, CloseCode, isOpen, parseJson, send } from './utils.js';

export interface ControlChannelOptions {
  sessionId: string;
  socket: ChannelSocket;
  registry: SessionRegistry;
  frameIntervalMs: number;
  maxBufferedBytes: number;
  input: Omit<InputTranslatorOptions, 'logger'>;
  clock?: Clock;
  logger?: Logger;
}

/**
 * Polling transport for one WebSocket: pushes changed screenshots and feeds
 * inbound input, in arrival order, to the session's translator.
 */
export class ControlChannel {
  private readonly queue = new SerialQueue();
  private readonly log: Logger;
  private readonly cleanups: Array<() => void> = [];
  private translator: InputTranslator | undefined;
  private owns = false;
  private ended = false;

  constructor(private readonly options: ControlChannelOptions) {
    this.log = options.logger ?? componentLogger('control');
  }

  get sessionId(): string {
    return this.options.sessionId;
  }

  /** Resolves once the session is attached, or the attempt has been refused. */
  open(): Promise<void> {
    return this.queue.run(() => this.attach());
  }

  /** Queued behind `open` and earlier messages. */
  handleMessage(raw: string): Promise<void> {
    return this.queue.run(() => this.process(raw));
  }

  /** Same teardown for a clean close, an abrupt disconnect and a dead heartbeat. */
  async close(reason: string): Promise<void> {
    if (this.ended) return;
    this.ended = true;
    this.cleanups.splice(0).forEach((cleanup) => cleanup());
    this.translator = undefined;
    if (this.owns) {
      await this.options.registry.destroy(this.options.sessionId, reason);
    }
  }

  private async attach(): Promise<void> {
    const { registry, sessionId, socket } = this.options;
    let session: Session;
    try {
      session = await registry.getOrCreate(sessionId);
    } catch (error) {
      this.log.error({ sessionId, error: describeError(error) }, 'session_setup_failed');
      send(socket, { type: 'error', message: 'Browser session could not be started' });
      closeSocket(socket, CloseCode.SETUP_FAILED, 'Session setup failed');
      return;
    }

    if (session.frameLoop) {
      const busy = new FrameLoopBusyError(sessionId);
      this.log.warn({ sessionId }, 'session_attach_refused');
      send(socket, { type: 'error', message: busy.message });
      closeSocket(socket, CloseCode.SESSION_BUSY, 'Session busy');
      return;
    }

    const source = new FrameSource(session.browser, {
      targetIntervalMs: this.options.frameIntervalMs,
      clock: this.options.clock,
      logger: this.log,
    });
    const loop = source.start(session, (frame) => this.deliver(frame), {
      kind: 'polling',
      onExit: (exit) => this.onLoopExit(exit),
    });
    try {
      session.attachFrameLoop(loop);
    } catch (error) {
      await loop.stop();
      this.log.warn({ sessionId, error: describeError(error) }, 'session_attach_failed');
      closeSocket(socket, CloseCode.SETUP_FAILED, 'Session setup failed');
      return;
    }
    this.owns = true;

    if (this.ended) {
      await registry.destroy(sessionId, 'disconnected');
      return;
    }

    this.translator = new InputTranslator(session, { ...this.options.input, logger: this.log });
    this.cleanups.push(
      session.browser.onPageEvent((event) => send(socket, { type: 'page', ...event })),
      session.onClose(() => closeSocket(socket, CloseCode.SESSION_CLOSED, 'Session closed')),
    );
    send(socket, { type: 'session', sessionId, viewport: session.browser.viewport });
    this.log.info({ sessionId }, 'control_attached');
  }

  private deliver(frame: Frame): FrameDelivery {
    const { socket, maxBufferedBytes } = this.options;
    if (this.ended || !isOpen(socket)) return 'closed';
    if (socket.bufferedAmount > maxBufferedBytes) return 'skipped';
    send(socket, { type: 'screenshot', data: `data:${frame.mime};base64,${frame.data.toString('base64')}` });
    return 'sent';
  }

  private onLoopExit(exit: LoopExit): void {
    if (this.ended || exit === 'channel-closed') return;
    this.log.warn({ sessionId: this.options.sessionId, exit }, 'frame_loop_ended');
    closeSocket(this.options.socket, CloseCode.SESSION_CLOSED, 'Browser session ended');
  }

  private async process(raw: string): Promise<void> {
    const translator = this.translator;
    if (!translator || this.ended) return;

    const json = parseJson(raw);
    const parsed = json.ok ? controlMessageSchema.safeParse(json.value) : undefined;
    if (!parsed?.success) {
      this.log.warn({ sessionId: this.options.sessionId, raw: raw.slice(0, 200) }, 'control_invalid_message');
      send(this.options.socket, { type: 'error', message: 'Invalid message' });
      return;
    }

    const event = toInputEvent(parsed.data);
    const outcome = await translator.apply(event);
    this.log.debug({ sessionId: this.options.sessionId, event: event.kind, outcome }, 'input_applied');
  }
}
