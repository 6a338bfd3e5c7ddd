import { BrowserSession, type BrowserSessionOptions } from '../browser/browserSession.js';
import type { BrowserFactory } from '../browser/types.js';
import { describeError, SessionNotFoundError } from './errors.js';
import { componentLogger, type Logger } from './logger.js';
import { SerialQueue } from './serialQueue.js';
import { Session } from './session.js';

export interface SessionRegistryOptions extends BrowserSessionOptions {
  logger?: Logger;
}

export interface SessionSummary {
  id: string;
  createdAt: number;
  viewport: { width: number; height: number };
  url: string;
  streaming: 'polling' | 'media' | null;
}

/**
 * Owns every live Session. Mutations for one id run through that id's queue,
 * so a caller never observes a half-built session; different ids never wait
 * on each other.
 */
export class SessionRegistry {
  private readonly sessions = new Map<string, Session>();
  private readonly locks = new Map<string, SerialQueue>();
  private readonly log: Logger;

  constructor(
    private readonly factory: BrowserFactory,
    private readonly options: SessionRegistryOptions,
  ) {
    this.log = options.logger ?? componentLogger('registry');
  }

  get size(): number {
    return this.sessions.size;
  }

  get(id: string): Session | undefined {
    return this.sessions.get(id);
  }

  require(id: string): Session {
    const session = this.sessions.get(id);
    if (!session) throw new SessionNotFoundError(id);
    return session;
  }

  getOrCreate(id: string): Promise<Session> {
    return this.withLock(id, async () => {
      const existing = this.sessions.get(id);
      if (existing) return existing;

      const tab = await this.factory.open(id, this.options.viewport);
      const session = new Session(id, new BrowserSession(tab, this.options));
      this.sessions.set(id, session);
      this.log.info({ sessionId: id }, 'session_created');
      return session;
    });
  }

  /** No-op for unknown ids. */
  destroy(id: string, reason = 'destroyed'): Promise<void> {
    return this.withLock(id, async () => {
      const session = this.sessions.get(id);
      if (!session) {
        this.log.debug({ sessionId: id }, 'session_destroy_unknown');
        return;
      }
      this.sessions.delete(id);
      try {
        await session.release(reason);
      } catch (error) {
        this.log.warn({ sessionId: id, error: describeError(error) }, 'session_release_failed');
      }
      this.log.info({ sessionId: id, reason }, 'session_destroyed');
    });
  }

  async destroyAll(reason = 'shutdown'): Promise<void> {
    await Promise.all([...this.sessions.keys()].map((id) => this.destroy(id, reason)));
  }

  list(): SessionSummary[] {
    return [...this.sessions.values()].map((session) => summarize(session));
  }

  private async withLock<T>(id: string, task: () => Promise<T>): Promise<T> {
    let lock = this.locks.get(id);
    if (!lock) {
      lock = new SerialQueue();
      this.locks.set(id, lock);
    }
    try {
      return await lock.run(task);
    } finally {
      if (lock.pending === 0 && this.locks.get(id) === lock) {
        this.locks.delete(id);
      }
    }
  }
}

export function summarize(session: Session): SessionSummary {
  return {
    id: session.id,
    createdAt: session.createdAt,
    viewport: session.browser.viewport,
    url: session.browser.pageState.url,
    streaming: session.frameLoop?.kind ?? null,
  };
}
