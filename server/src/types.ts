import type WebSocket from 'ws';

export type TransportKind = 'polling' | 'rtc';

export interface ClientContext {
  id: string;
  sessionId: string;
  transport: TransportKind;
  socket: WebSocket;
  connectedAt: number;
  isAlive: boolean;
}

export type ChannelRoute = { transport: TransportKind; sessionId: string | undefined };
