import { RTCIceCandidate, RTCPeerConnection, type RTCDataChannel } from 'werift';
import { TrackEndedError, type TimedFrame } from '../frames/mediaTrack.js';
import { describeError } from '../lib/errors.js';
import { componentLogger, type Logger } from '../lib/logger.js';
import type {
  IceCandidateInit,
  PeerConnection,
  PeerConnectionFactory,
  PeerConnectionState,
  SessionDescription,
  VideoTrackSource,
} from './types.js';

/** Label of the data channel the client opens to receive frames. */
export const FRAME_CHANNEL_LABEL = 'frames';
export const FRAME_HEADER_BYTES = 12;

/**
 * Frame packet: 6-byte big-endian pts (90 kHz), 2-byte width, 2-byte height,
 * 1-byte placeholder flag, 1 reserved byte, then the JPEG payload.
 */
export function encodeFramePacket(frame: TimedFrame): Buffer {
  const header = Buffer.alloc(FRAME_HEADER_BYTES);
  header.writeUIntBE(frame.pts, 0, 6);
  header.writeUInt16BE(frame.width, 6);
  header.writeUInt16BE(frame.height, 8);
  header.writeUInt8(frame.placeholder ? 1 : 0, 10);
  return Buffer.concat([header, frame.data]);
}

export interface WeriftPeerOptions {
  iceServers: string[];
  /** Frames are dropped while the data channel holds more than this. */
  maxBufferedBytes: number;
  logger?: Logger;
}

/**
 * werift carries no video encoder, so frames travel as JPEG packets over the
 * data channel the client negotiates in its offer, pulled at the track's pace.
 */
class WeriftPeerConnection implements PeerConnection {
  private readonly pc: RTCPeerConnection;
  private track: VideoTrackSource | undefined;
  private channel: RTCDataChannel | undefined;
  private pumping: Promise<void> | undefined;
  private closed = false;

  constructor(
    private readonly options: WeriftPeerOptions,
    private readonly log: Logger,
  ) {
    this.pc = new RTCPeerConnection({
      iceServers: options.iceServers.map((urls) => ({ urls })),
    });
    this.pc.onDataChannel.subscribe((channel) => {
      if (channel.label !== FRAME_CHANNEL_LABEL) return;
      this.channel = channel;
      this.startPump();
    });
  }

  get localDescription(): { sdp?: string | null; type: string } | undefined {
    return this.pc.localDescription;
  }

  addTrack(track: VideoTrackSource): void {
    this.track = track;
    this.startPump();
  }

  async setRemoteDescription(description: SessionDescription): Promise<void> {
    await this.pc.setRemoteDescription({ type: description.type, sdp: description.sdp });
  }

  async createAnswer(): Promise<{ sdp?: string | null; type: string } | undefined> {
    return this.pc.createAnswer();
  }

  async setLocalDescription(description: { sdp?: string | null; type: string }): Promise<void> {
    if (typeof description.sdp !== 'string' || description.type !== 'answer') {
      throw new Error('Local description must be an answer with sdp');
    }
    await this.pc.setLocalDescription({ type: 'answer', sdp: description.sdp });
  }

  async addIceCandidate(candidate: IceCandidateInit): Promise<void> {
    await this.pc.addIceCandidate(
      new RTCIceCandidate({
        candidate: candidate.candidate,
        sdpMid: candidate.sdpMid ?? undefined,
        sdpMLineIndex: candidate.sdpMLineIndex ?? undefined,
      }),
    );
  }

  onConnectionStateChange(listener: (state: PeerConnectionState) => void): () => void {
    const { unSubscribe } = this.pc.connectionStateChange.subscribe((state) => listener(state));
    return unSubscribe;
  }

  async close(): Promise<void> {
    this.closed = true;
    await this.pc.close();
    await this.pumping;
  }

  private startPump(): void {
    const { track, channel } = this;
    if (this.pumping || this.closed || !track || !channel) return;
    this.pumping = this.pump(track, channel).catch((error: unknown) => {
      if (error instanceof TrackEndedError) return;
      this.log.warn({ error: describeError(error) }, 'frame_pump_failed');
    });
  }

  private async pump(track: VideoTrackSource, channel: RTCDataChannel): Promise<void> {
    while (!this.closed && channel.readyState !== 'closing' && channel.readyState !== 'closed') {
      const frame = await track.recv();
      if (this.closed || channel.readyState !== 'open') continue;
      if (channel.bufferedAmount > this.options.maxBufferedBytes) {
        this.log.debug({ bufferedAmount: channel.bufferedAmount, pts: frame.pts }, 'frame_dropped_backpressure');
        continue;
      }
      channel.send(encodeFramePacket(frame));
    }
  }
}

export function createWeriftPeerFactory(options: WeriftPeerOptions): PeerConnectionFactory {
  const log = options.logger ?? componentLogger('webrtc');
  return {
    create: () => new WeriftPeerConnection(options, log),
  };
}
