import path from 'node:path';
import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv({
  path: path.resolve(process.cwd(), '.env'),
});

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  CORS_ORIGINS: z.string().default('http://localhost:5173,http://127.0.0.1:5173'),
  LOG_LEVEL: z.string().default('info'),
  WS_HEARTBEAT_MS: z.coerce.number().int().positive().default(15_000),
  BROWSER_HEADLESS: booleanFlag.default('true'),
  BROWSER_EXECUTABLE: z.string().optional(),
  START_URL: z.string().default('about:blank'),
  VIEWPORT_WIDTH: z.coerce.number().int().positive().default(1280),
  VIEWPORT_HEIGHT: z.coerce.number().int().positive().default(720),
  MAX_VIEWPORT: z.coerce.number().int().positive().default(4096),
  POLL_FPS: z.coerce.number().positive().max(60).default(15),
  JPEG_QUALITY: z.coerce.number().int().min(1).max(100).default(80),
  CAPTURE_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
  NAVIGATION_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  DOUBLE_CLICK_DELAY_MS: z.coerce.number().int().min(0).default(100),
  MAX_BUFFERED_BYTES: z.coerce.number().int().positive().default(4 * 1024 * 1024),
  RTC_FPS: z.coerce.number().positive().max(60).default(30),
  RTC_FRAME_WIDTH: z.coerce.number().int().positive().default(1280),
  RTC_FRAME_HEIGHT: z.coerce.number().int().positive().default(720),
  ICE_SERVERS: z.string().default('stun:stun.l.google.com:19302'),
});

const parsed = envSchema.parse(process.env);

function list(value: string): string[] {
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export const config = {
  port: parsed.PORT,
  corsOrigins: list(parsed.CORS_ORIGINS),
  logLevel: parsed.LOG_LEVEL,
  heartbeatMs: parsed.WS_HEARTBEAT_MS,
  browser: {
    headless: parsed.BROWSER_HEADLESS,
    executablePath: parsed.BROWSER_EXECUTABLE,
    startUrl: parsed.START_URL,
    viewport: { width: parsed.VIEWPORT_WIDTH, height: parsed.VIEWPORT_HEIGHT },
    maxViewport: parsed.MAX_VIEWPORT,
    captureTimeoutMs: parsed.CAPTURE_TIMEOUT_MS,
    navigationTimeoutMs: parsed.NAVIGATION_TIMEOUT_MS,
  },
  polling: {
    frameIntervalMs: 1000 / parsed.POLL_FPS,
    maxBufferedBytes: parsed.MAX_BUFFERED_BYTES,
  },
  jpegQuality: parsed.JPEG_QUALITY,
  doubleClickDelayMs: parsed.DOUBLE_CLICK_DELAY_MS,
  rtc: {
    fps: parsed.RTC_FPS,
    size: { width: parsed.RTC_FRAME_WIDTH, height: parsed.RTC_FRAME_HEIGHT },
    iceServers: list(parsed.ICE_SERVERS),
    maxBufferedBytes: parsed.MAX_BUFFERED_BYTES,
  },
};

export type Config = typeof config;
