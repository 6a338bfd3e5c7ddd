import type { AddressInfo } from 'node:net';
import { createServer, type Server } from 'node:http';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createApp } from '../src/app.js';
import { SessionRegistry } from '../src/lib/sessionRegistry.js';
import { PeerConnectionSet } from '../src/signaling/signalingSession.js';
import { FakeBrowserFactory, SESSION_OPTIONS } from './helpers/fakes.js';

describe('HTTP routes', () => {
  let server: Server;
  let baseUrl: string;
  let factory: FakeBrowserFactory;
  let registry: SessionRegistry;

  beforeEach(async () => {
    factory = new FakeBrowserFactory();
    registry = new SessionRegistry(factory, SESSION_OPTIONS);
    server = createServer(createApp({ registry, peers: new PeerConnectionSet(), corsOrigins: ['http://localhost:5173'] }));
    await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
    const address: AddressInfo | string | null = server.address();
    if (!address || typeof address === 'string') throw new Error('server has no port');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
  });

  it('reports live session and peer counts on /health', async () => {
    await registry.getOrCreate('s1');

    const response = await fetch(`${baseUrl}/health`);
    const body: unknown = await response.json();

    expect(response.status).toBe(200);
    expect(body).toMatchObject({ status: 'ok', sessions: 1, peerConnections: 0 });
  });

  it('lists sessions and describes one', async () => {
    const session = await registry.getOrCreate('s1');

    const list: unknown = await (await fetch(`${baseUrl}/api/sessions`)).json();
    const one: unknown = await (await fetch(`${baseUrl}/api/sessions/s1`)).json();

    const summary = {
      id: 's1',
      createdAt: session.createdAt,
      viewport: { width: 1280, height: 720 },
      url: 'about:blank',
      streaming: null,
    };
    expect(list).toEqual({ sessions: [summary] });
    expect(one).toEqual(summary);
  });

  it('answers 404 for unknown sessions', async () => {
    const response = await fetch(`${baseUrl}/api/sessions/missing`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'SESSION_NOT_FOUND' });
  });

  it('destroys a session on DELETE', async () => {
    await registry.getOrCreate('s1');

    const response = await fetch(`${baseUrl}/api/sessions/s1`, { method: 'DELETE' });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: 'closed' });
    expect(registry.size).toBe(0);
    expect(factory.last().closed).toBe(true);
  });
});
