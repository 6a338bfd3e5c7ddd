import type { FrameImaging, FrameSize } from '../frames/imaging.js';
import { FrameSource } from '../frames/frameSource.js';
import { MediaTrackAdapter } from '../frames/mediaTrack.js';
import type { Clock } from '../lib/clock.js';
import { describeError, FrameLoopBusyError, MalformedOfferError, RelayError } from '../lib/errors.js';
import { componentLogger, type Logger } from '../lib/logger.js';
import { SerialQueue } from '../lib/serialQueue.js';
import type { SessionRegistry } from '../lib/sessionRegistry.js';
import { PeerConnectionSet, SignalingSession, type SignalingTrack } from '../signaling/signalingSession.js';
import type { PeerConnectionFactory } from '../signaling/types.js';
import { type ChannelSocket, closeSocket, CloseCode, parseJson, send } from './utils.js';

export interface MediaSettings {
  size: FrameSize;
  fps: number;
  imaging: FrameImaging;
}

export interface SignalingChannelOptions {
  sessionId: string;
  socket: ChannelSocket;
  registry: SessionRegistry;
  peerFactory: PeerConnectionFactory;
  peers: PeerConnectionSet;
  media: MediaSettings;
  clock?: Clock;
  logger?: Logger;
}

/** Real-time transport for one WebSocket: offer in, answer out, then candidates. */
export class SignalingChannel {
  private readonly queue = new SerialQueue();
  private readonly log: Logger;
  readonly signaling: SignalingSession;
  private owns = false;
  private ended = false;

  constructor(private readonly options: SignalingChannelOptions) {
    this.log = options.logger ?? componentLogger('signaling');
    this.signaling = new SignalingSession({
      sessionId: options.sessionId,
      peer: options.peerFactory.create(),
      peers: options.peers,
      prepareMedia: () => this.prepareMedia(),
      sendAnswer: (answer) => send(options.socket, answer),
      onClosed: async (reason) => {
        if (this.owns) await options.registry.destroy(options.sessionId, reason);
      },
      logger: this.log,
    });
  }

  handleMessage(raw: string): Promise<void> {
    return this.queue.run(() => this.process(raw));
  }

  async close(reason: string): Promise<void> {
    this.ended = true;
    await this.signaling.close(reason);
  }

  private async process(raw: string): Promise<void> {
    if (this.ended) return;
    const json = parseJson(raw);
    if (!json.ok) {
      if (this.signaling.state === 'no-offer') {
        await this.fail(new MalformedOfferError('Offer is not valid JSON'));
      } else {
        this.log.debug({ sessionId: this.options.sessionId }, 'candidate_discarded');
      }
      return;
    }

    try {
      await this.signaling.handleMessage(json.value);
    } catch (error) {
      await this.fail(error);
    }
  }

  private async fail(error: unknown): Promise<void> {
    const { socket, sessionId } = this.options;
    const code = error instanceof RelayError ? error.code : 'INTERNAL';
    this.log.warn({ sessionId, code, error: describeError(error) }, 'signaling_failed');
    send(socket, { type: 'error', code, message: describeError(error) });
    const closeCode =
      error instanceof MalformedOfferError
        ? CloseCode.BAD_REQUEST
        : error instanceof FrameLoopBusyError
          ? CloseCode.SESSION_BUSY
          : CloseCode.SETUP_FAILED;
    closeSocket(socket, closeCode, code);
    await this.close(code.toLowerCase());
  }

  private async prepareMedia(): Promise<SignalingTrack> {
    const { registry, sessionId, media, clock } = this.options;
    const session = await registry.getOrCreate(sessionId);
    const source = new FrameSource(session.browser, {
      targetIntervalMs: 1000 / media.fps,
      clock,
      logger: this.log,
    });
    const track = new MediaTrackAdapter(session, source, { ...media, clock, logger: this.log });
    try {
      await track.start();
    } catch (error) {
      if (!(error instanceof FrameLoopBusyError)) this.owns = true;
      throw error;
    }
    this.owns = true;
    if (this.ended) await registry.destroy(sessionId, 'disconnected');
    return track;
  }
}
