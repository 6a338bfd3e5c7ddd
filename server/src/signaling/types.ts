import type { TimedFrame } from '../frames/mediaTrack.js';

export interface SessionDescription {
  sdp: string;
  type: 'offer' | 'answer';
}

export interface IceCandidateInit {
  candidate: string;
  sdpMid: string | null;
  sdpMLineIndex?: number | null;
}

export type PeerConnectionState = 'new' | 'connecting' | 'connected' | 'disconnected' | 'failed' | 'closed';

/** What a peer connection pulls video from. */
export interface VideoTrackSource {
  readonly ready: boolean;
  recv(): Promise<TimedFrame>;
}

/** The slice of a WebRTC peer connection the signaling machine drives. */
export interface PeerConnection {
  addTrack(track: VideoTrackSource): void;
  setRemoteDescription(description: SessionDescription): Promise<void>;
  createAnswer(): Promise<{ sdp?: string | null; type: string } | undefined>;
  setLocalDescription(description: { sdp?: string | null; type: string }): Promise<void>;
  readonly localDescription: { sdp?: string | null; type: string } | null | undefined;
  addIceCandidate(candidate: IceCandidateInit): Promise<void>;
  /** Returns an unsubscribe function. */
  onConnectionStateChange(listener: (state: PeerConnectionState) => void): () => void;
  close(): Promise<void>;
}

export interface PeerConnectionFactory {
  create(): PeerConnection;
}
