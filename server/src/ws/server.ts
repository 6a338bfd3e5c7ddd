import type { IncomingMessage, Server } from 'node:http';
import { nanoid } from 'nanoid';
import { v4 as uuid } from 'uuid';
import { WebSocketServer, type RawData } from 'ws';
import type { InputTranslatorOptions } from '../input/inputTranslator.js';
import { logger } from '../lib/logger.js';
import type { SessionRegistry } from '../lib/sessionRegistry.js';
import type { PeerConnectionSet } from '../signaling/signalingSession.js';
import type { PeerConnectionFactory } from '../signaling/types.js';
import type { ChannelRoute, ClientContext } from '../types.js';
import { ControlChannel } from './controlChannel.js';
import { type MediaSettings, SignalingChannel } from './signalingChannel.js';

export interface WebSocketDeps {
  registry: SessionRegistry;
  peers: PeerConnectionSet;
  peerFactory: PeerConnectionFactory;
  heartbeatMs: number;
  polling: {
    frameIntervalMs: number;
    maxBufferedBytes: number;
  };
  input: Omit<InputTranslatorOptions, 'logger'>;
  media: MediaSettings;
}

const SESSION_ID = /^[A-Za-z0-9_-]{1,64}$/;

/** `/ws/:sessionId` is the polling transport, `/rtc` and `/rtc/:sessionId` the real-time one. */
export function matchRoute(url: string | undefined): ChannelRoute | undefined {
  if (!url) return undefined;
  const path = url.split('?')[0] ?? '';
  const [, prefix, sessionId, ...rest] = path.split('/');
  if (rest.length > 0) return undefined;
  if (sessionId !== undefined && !SESSION_ID.test(sessionId)) return undefined;
  if (prefix === 'ws' && sessionId) return { transport: 'polling', sessionId };
  if (prefix === 'rtc') return { transport: 'rtc', sessionId };
  return undefined;
}

function text(raw: RawData): string {
  if (Array.isArray(raw)) return Buffer.concat(raw).toString('utf8');
  if (raw instanceof ArrayBuffer) return Buffer.from(raw).toString('utf8');
  return raw.toString('utf8');
}

export function registerWebSocketServer(httpServer: Server, deps: WebSocketDeps): WebSocketServer {
  const wss = new WebSocketServer({ noServer: true });
  const clients = new Set<ClientContext>();

  httpServer.on('upgrade', (request, socket, head) => {
    const route = matchRoute(request.url);
    if (!route) {
      socket.destroy();
      return;
    }
    wss.handleUpgrade(request, socket, head, (client) => {
      wss.emit('connection', client, request);
    });
  });

  wss.on('connection', (socket, request: IncomingMessage) => {
    const route = matchRoute(request.url);
    if (!route) {
      socket.close();
      return;
    }
    const ctx: ClientContext = {
      id: uuid(),
      sessionId: route.sessionId ?? nanoid(12),
      transport: route.transport,
      socket,
      connectedAt: Date.now(),
      isAlive: true,
    };
    clients.add(ctx);
    const log = logger.child({ clientId: ctx.id, sessionId: ctx.sessionId, transport: ctx.transport });
    log.info({ ip: request.socket.remoteAddress }, 'ws_connected');

    const channel =
      ctx.transport === 'polling'
        ? new ControlChannel({
            sessionId: ctx.sessionId,
            socket,
            registry: deps.registry,
            frameIntervalMs: deps.polling.frameIntervalMs,
            maxBufferedBytes: deps.polling.maxBufferedBytes,
            input: deps.input,
            logger: log,
          })
        : new SignalingChannel({
            sessionId: ctx.sessionId,
            socket,
            registry: deps.registry,
            peerFactory: deps.peerFactory,
            peers: deps.peers,
            media: deps.media,
            logger: log,
          });

    const report = (stage: string) => (error: unknown) => {
      log.error({ err: error, stage }, 'ws_channel_error');
    };

    if (channel instanceof ControlChannel) {
      channel.open().catch(report('open'));
    }

    socket.on('pong', () => {
      ctx.isAlive = true;
    });

    socket.on('message', (raw) => {
      channel.handleMessage(text(raw)).catch(report('message'));
    });

    socket.on('close', (code) => {
      clients.delete(ctx);
      channel.close('disconnected').catch(report('close'));
      log.info({ code }, 'ws_disconnected');
    });

    socket.on('error', (err) => {
      log.error({ err }, 'ws_error');
      socket.close();
    });
  });

  const heartbeat = setInterval(() => {
    clients.forEach((ctx) => {
      if (!ctx.isAlive) {
        logger.warn({ clientId: ctx.id, sessionId: ctx.sessionId }, 'ws_heartbeat_missed');
        ctx.socket.terminate();
        return;
      }
      ctx.isAlive = false;
      ctx.socket.ping();
    });
  }, deps.heartbeatMs);
  heartbeat.unref();

  wss.on('close', () => clearInterval(heartbeat));

  return wss;
}
