import express, { type Express } from 'express';
import cors from 'cors';
import { healthRouter } from './routes/health.js';
import { sessionRouter } from './routes/sessionRoutes.js';
import type { SessionRegistry } from './lib/sessionRegistry.js';
import type { PeerConnectionSet } from './signaling/signalingSession.js';

export interface AppDeps {
  registry: SessionRegistry;
  peers: PeerConnectionSet;
  corsOrigins: string[];
}

export function createApp({ registry, peers, corsOrigins }: AppDeps): Express {
  const app = express();

  app.use(
    cors({
      origin: corsOrigins,
      credentials: true,
    }),
  );
  app.use(express.json({ limit: '64kb' }));

  app.get('/', (_req, res) => {
    res.json({
      name: 'Tabrelay',
      version: '0.1.0',
      transports: { polling: '/ws/:sessionId', rtc: '/rtc/:sessionId?' },
    });
  });

  app.use('/health', healthRouter(registry, peers));
  app.use('/api/sessions', sessionRouter(registry));

  return app;
}
