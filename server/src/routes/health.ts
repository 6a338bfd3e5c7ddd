import os from 'node:os';
import { Router } from 'express';
import type { SessionRegistry } from '../lib/sessionRegistry.js';
import type { PeerConnectionSet } from '../signaling/signalingSession.js';

export function healthRouter(registry: SessionRegistry, peers: PeerConnectionSet): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const memory = process.memoryUsage();
    res.json({
      status: 'ok',
      uptime: process.uptime(),
      sessions: registry.size,
      peerConnections: peers.size,
      load: os.loadavg(),
      memory: {
        rss: memory.rss,
        heapUsed: memory.heapUsed,
      },
    });
  });

  return router;
}
