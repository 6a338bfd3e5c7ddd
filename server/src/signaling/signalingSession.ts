import { AnswerGenerationError, describeError, RelayError } from '../lib/errors.js';
import { componentLogger, type Logger } from '../lib/logger.js';
import { parseCandidate, parseOffer } from './messages.js';
import type { IceCandidateInit, PeerConnection, PeerConnectionState, SessionDescription, VideoTrackSource } from './types.js';

export type SignalingState = 'no-offer' | 'offer-received' | 'answer-sent' | 'connected' | 'closed';

export type CandidateOutcome = 'accepted' | 'queued' | 'discarded';

/** A started media track the peer connection can pull from. */
export interface SignalingTrack extends VideoTrackSource {
  stop(): Promise<void>;
}

export interface SignalingSessionOptions {
  sessionId: string;
  peer: PeerConnection;
  peers: PeerConnectionSet;
  /** Provisions the browser session and returns a started track. */
  prepareMedia: () => Promise<SignalingTrack>;
  sendAnswer: (answer: SessionDescription) => void;
  /** Runs once, after the peer connection and track are released. */
  onClosed?: (reason: string) => Promise<void>;
  logger?: Logger;
}

/**
 * Offer/answer/candidate handshake for one control connection. Every exit
 * path funnels into `close`, which releases the peer connection, its entry in
 * the active set and the media track exactly once.
 */
export class SignalingSession {
  private current: SignalingState = 'no-offer';
  private track: SignalingTrack | undefined;
  private pending: IceCandidateInit[] = [];
  private closing: Promise<void> | undefined;
  private readonly unsubscribe: () => void;
  private readonly log: Logger;

  constructor(private readonly options: SignalingSessionOptions) {
    this.log = options.logger ?? componentLogger('signaling');
    options.peers.add(this);
    this.unsubscribe = options.peer.onConnectionStateChange((state) => this.onPeerState(state));
  }

  get sessionId(): string {
    return this.options.sessionId;
  }

  get state(): SignalingState {
    return this.current;
  }

  get pendingCandidates(): number {
    return this.pending.length;
  }

  /**
   * Routes an inbound message by state. Offer rejection and answer failures
   * throw; the caller is expected to close.
   */
  async handleMessage(raw: unknown): Promise<void> {
    if (this.current === 'closed') return;
    if (this.current === 'no-offer') {
      await this.handleOffer(raw);
      return;
    }
    await this.handleCandidate(raw);
  }

  async handleOffer(raw: unknown): Promise<void> {
    const offer = parseOffer(raw);
    this.transition('offer-received');
    const { peer, sessionId } = this.options;

    try {
      const track = await this.options.prepareMedia();
      if (this.isClosed()) {
        await track.stop();
        return;
      }
      this.track = track;
      if (!track.ready) throw new AnswerGenerationError('Media track is not ready');
      peer.addTrack(track);

      await peer.setRemoteDescription(offer);
      const answer = await peer.createAnswer();
      if (!answer) throw new AnswerGenerationError('Peer connection produced no answer');
      await peer.setLocalDescription(answer);
    } catch (error) {
      if (error instanceof RelayError) throw error;
      throw new AnswerGenerationError(`Answer generation failed: ${describeError(error)}`, { cause: error });
    }

    const local = peer.localDescription;
    if (!local) throw new AnswerGenerationError('Local description is missing');
    if (typeof local.sdp !== 'string') throw new AnswerGenerationError('Local description has no sdp');
    if (this.isClosed()) return;

    this.options.sendAnswer({ sdp: local.sdp, type: 'answer' });
    this.transition('answer-sent');
    this.log.info({ sessionId }, 'answer_sent');
    await this.flushPending();
  }

  async handleCandidate(raw: unknown): Promise<CandidateOutcome> {
    const parsed = parseCandidate(raw);
    if (!parsed.ok) {
      this.log.debug({ sessionId: this.options.sessionId, reason: parsed.error.message }, 'candidate_discarded');
      return 'discarded';
    }
    if (this.current === 'closed') return 'discarded';
    if (this.current === 'no-offer' || this.current === 'offer-received') {
      this.pending.push(parsed.candidate);
      return 'queued';
    }
    return (await this.addCandidate(parsed.candidate)) ? 'accepted' : 'discarded';
  }

  /** Idempotent; later calls resolve with the first close. */
  close(reason: string): Promise<void> {
    if (!this.closing) {
      this.closing = this.release(reason);
    }
    return this.closing;
  }

  private async release(reason: string): Promise<void> {
    this.current = 'closed';
    this.unsubscribe();
    this.pending = [];
    const { peer, peers, sessionId } = this.options;

    try {
      await peer.close();
    } catch (error) {
      this.log.warn({ sessionId, error: describeError(error) }, 'peer_close_failed');
    }
    peers.delete(this);

    const track = this.track;
    this.track = undefined;
    if (track) {
      try {
        await track.stop();
      } catch (error) {
        this.log.warn({ sessionId, error: describeError(error) }, 'track_stop_failed');
      }
    }

    try {
      await this.options.onClosed?.(reason);
    } catch (error) {
      this.log.warn({ sessionId, error: describeError(error) }, 'signaling_on_closed_failed');
    }
    this.log.info({ sessionId, reason }, 'signaling_closed');
  }

  private async flushPending(): Promise<void> {
    const queued = this.pending;
    this.pending = [];
    for (const candidate of queued) {
      await this.addCandidate(candidate);
    }
  }

  private async addCandidate(candidate: IceCandidateInit): Promise<boolean> {
    try {
      await this.options.peer.addIceCandidate(candidate);
      return true;
    } catch (error) {
      this.log.debug({ sessionId: this.options.sessionId, error: describeError(error) }, 'candidate_rejected');
      return false;
    }
  }

  private onPeerState(state: PeerConnectionState): void {
    this.log.debug({ sessionId: this.options.sessionId, state }, 'peer_state');
    if (state === 'connected' && this.current === 'answer-sent') {
      this.transition('connected');
    } else if (state === 'failed' || state === 'closed') {
      this.close(`peer-${state}`).catch((error: unknown) => {
        this.log.error({ sessionId: this.options.sessionId, error: describeError(error) }, 'signaling_close_failed');
      });
    }
  }

  private isClosed(): boolean {
    return this.current === 'closed';
  }

  private transition(next: SignalingState): void {
    if (this.current === 'closed') return;
    this.log.debug({ sessionId: this.options.sessionId, from: this.current, to: next }, 'signaling_transition');
    this.current = next;
  }
}

/** Peer connections currently alive, for shutdown. */
export class PeerConnectionSet {
  private readonly members = new Set<SignalingSession>();

  get size(): number {
    return this.members.size;
  }

  has(session: SignalingSession): boolean {
    return this.members.has(session);
  }

  add(session: SignalingSession): void {
    this.members.add(session);
  }

  delete(session: SignalingSession): void {
    this.members.delete(session);
  }

  async closeAll(reason = 'shutdown'): Promise<void> {
    await Promise.all([...this.members].map((session) => session.close(reason)));
  }
}
