import http from 'node:http';
import { config } from './config.js';
import { createApp } from './app.js';
import { PlaywrightBrowserFactory } from './browser/playwrightBrowser.js';
import { createSharpImaging } from './frames/imaging.js';
import { SessionRegistry } from './lib/sessionRegistry.js';
import { componentLogger, logger } from './lib/logger.js';
import { PeerConnectionSet } from './signaling/signalingSession.js';
import { createWeriftPeerFactory } from './signaling/weriftPeer.js';
import { registerWebSocketServer } from './ws/server.js';

logger.level = config.logLevel;

const browsers = new PlaywrightBrowserFactory({
  headless: config.browser.headless,
  startUrl: config.browser.startUrl,
  navigationTimeoutMs: config.browser.navigationTimeoutMs,
  executablePath: config.browser.executablePath,
});

const registry = new SessionRegistry(browsers, {
  viewport: config.browser.viewport,
  capture: { quality: config.jpegQuality, timeoutMs: config.browser.captureTimeoutMs },
  navigationTimeoutMs: config.browser.navigationTimeoutMs,
  logger: componentLogger('registry'),
});
const peers = new PeerConnectionSet();

const app = createApp({ registry, peers, corsOrigins: config.corsOrigins });
const server = http.createServer(app);

const wss = registerWebSocketServer(server, {
  registry,
  peers,
  peerFactory: createWeriftPeerFactory({
    iceServers: config.rtc.iceServers,
    maxBufferedBytes: config.rtc.maxBufferedBytes,
  }),
  heartbeatMs: config.heartbeatMs,
  polling: config.polling,
  input: {
    doubleClickDelayMs: config.doubleClickDelayMs,
    maxViewport: config.browser.maxViewport,
  },
  media: {
    size: config.rtc.size,
    fps: config.rtc.fps,
    imaging: createSharpImaging(config.jpegQuality),
  },
});

server.listen(config.port, () => {
  logger.info({ port: config.port }, 'server_started');
});

let stopping = false;

async function shutdown(signal: string): Promise<void> {
  if (stopping) return;
  stopping = true;
  logger.info({ signal }, 'shutting_down');
  server.close();
  wss.clients.forEach((client) => client.close(1001, 'Server shutting down'));
  await peers.closeAll();
  await registry.destroyAll();
  await browsers.shutdown();
  wss.close();
}

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.on(signal, () => {
    shutdown(signal).then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error({ err: error }, 'shutdown_failed');
        process.exit(1);
      },
    );
  });
}
