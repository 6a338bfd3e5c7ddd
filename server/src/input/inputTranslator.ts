import { type Clock, systemClock } from '../lib/clock.js';
import { describeError, InputDispatchError } from '../lib/errors.js';
import { componentLogger, type Logger } from '../lib/logger.js';
import type { Session } from '../lib/session.js';
import type { InputEvent, InputOutcome } from './events.js';
import { resolveKey } from './keymap.js';

export interface InputTranslatorOptions {
  doubleClickDelayMs: number;
  maxViewport: number;
  clock?: Clock;
  logger?: Logger;
}

const URL_SCHEME = /^[a-z][a-z\d+.-]*:\/\//i;

/**
 * Bare hosts get `https://`. Returns undefined for anything that is not an
 * http(s) URL with a host.
 */
export function normalizeUrl(raw: string): string | undefined {
  const trimmed = raw.trim();
  if (!trimmed) return undefined;
  const candidate = URL_SCHEME.test(trimmed) ? trimmed : `https://${trimmed}`;
  let parsed: URL;
  try {
    parsed = new URL(candidate);
  } catch {
    return undefined;
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') return undefined;
  if (!parsed.hostname) return undefined;
  return candidate;
}

/**
 * Replays client input against the session's tab. Sole writer of
 * `session.mouseDown`. A failed dispatch is logged and reported, never thrown.
 */
export class InputTranslator {
  private readonly clock: Clock;
  private readonly log: Logger;

  constructor(
    private readonly session: Session,
    private readonly options: InputTranslatorOptions,
  ) {
    this.clock = options.clock ?? systemClock;
    this.log = options.logger ?? componentLogger('input');
  }

  async apply(event: InputEvent): Promise<InputOutcome> {
    try {
      return await this.translate(event);
    } catch (error) {
      if (!(error instanceof InputDispatchError)) throw error;
      this.log.warn(
        { sessionId: this.session.id, event: event.kind, error: describeError(error) },
        'input_dispatch_failed',
      );
      return 'failed';
    }
  }

  private async translate(event: InputEvent): Promise<InputOutcome> {
    const { browser } = this.session;

    switch (event.kind) {
      case 'pointer-down':
        this.session.mouseDown = true;
        await browser.mouseMove(event.x, event.y);
        await browser.mouseClick(event.x, event.y);
        return 'dispatched';

      case 'pointer-up':
        this.session.mouseDown = false;
        await browser.mouseMove(event.x, event.y);
        await browser.mouseUp();
        return 'dispatched';

      case 'pointer-move':
        if (!this.session.mouseDown) return 'ignored';
        await browser.mouseMove(event.x, event.y);
        return 'dispatched';

      case 'double-click':
        this.session.mouseDown = false;
        await browser.mouseMove(event.x, event.y);
        await browser.mouseDown();
        await browser.mouseUp();
        await this.clock.sleep(this.options.doubleClickDelayMs);
        await browser.mouseDown();
        await browser.mouseUp();
        return 'dispatched';

      case 'key-down':
        return this.keyDown(event);

      case 'key-up':
        return 'ignored';

      case 'scroll':
        await browser.wheel(event.deltaX, event.deltaY);
        return 'dispatched';

      case 'navigate': {
        const url = normalizeUrl(event.url);
        if (!url) {
          this.log.warn({ sessionId: this.session.id, url: event.url }, 'navigation_rejected');
          return 'ignored';
        }
        await browser.navigate(url);
        this.log.info({ sessionId: this.session.id, url }, 'navigated');
        return 'dispatched';
      }

      case 'resize': {
        const { width, height } = event;
        const max = this.options.maxViewport;
        const valid = (value: number) => Number.isInteger(value) && value > 0 && value <= max;
        if (!valid(width) || !valid(height)) {
          this.log.warn({ sessionId: this.session.id, width, height }, 'resize_rejected');
          return 'ignored';
        }
        await browser.setViewport({ width, height });
        return 'dispatched';
      }
    }
  }

  private async keyDown(event: Extract<InputEvent, { kind: 'key-down' }>): Promise<InputOutcome> {
    const { browser } = this.session;
    const action = resolveKey(event.key, event.modifiers);
    switch (action.type) {
      case 'press':
        await browser.keyPress(action.key, action.modifiers);
        return 'dispatched';
      case 'type':
        await browser.typeText(action.text);
        return 'dispatched';
      case 'reload':
        await browser.reload();
        return 'dispatched';
      case 'unhandled':
        this.log.debug({ sessionId: this.session.id, key: action.key, code: event.code }, 'key_unhandled');
        return 'unhandled';
    }
  }
}
