import { describe, expect, it, vi } from 'vitest';
import { fingerprint, FrameSource, type Frame, type FrameDelivery } from '../src/frames/frameSource.js';
import { CaptureError } from '../src/lib/errors.js';
import { deferred, flush, makeSession, ManualClock } from './helpers/fakes.js';

const A = Buffer.from('frame-a');
const B = Buffer.from('frame-b');

/** Serves `frames` (an Error entry throws), then aborts on the capture after the last. */
function scripted(frames: Array<Buffer | Error>, controller: AbortController, clock?: ManualClock, cost = 0) {
  let index = 0;
  const times: number[] = [];
  const capture = async (): Promise<Buffer> => {
    times.push(clock?.now() ?? 0);
    clock?.advance(cost);
    const next = frames[index];
    index += 1;
    if (next === undefined) {
      controller.abort();
      return A;
    }
    if (next instanceof Error) throw next;
    return next;
  };
  return { capture, times };
}

describe('FrameSource', () => {
  describe('captureOnce', () => {
    it('numbers frames and fingerprints their content', async () => {
      const { session, tab } = makeSession();
      tab.frames = [A, B];
      const source = new FrameSource(session.browser, { targetIntervalMs: 50 });

      const first = await source.captureOnce();
      const second = await source.captureOnce();

      expect(first.sequence).toBe(1);
      expect(second.sequence).toBe(2);
      expect(first.fingerprint).toBe(fingerprint(A));
      expect(first.fingerprint).not.toBe(second.fingerprint);
      expect(first.data.toString()).toBe('frame-a');
    });

    it('fails with CaptureError on an empty payload', async () => {
      const { session, tab } = makeSession();
      tab.frames = [Buffer.alloc(0)];
      const source = new FrameSource(session.browser, { targetIntervalMs: 50 });

      await expect(source.captureOnce()).rejects.toBeInstanceOf(CaptureError);
    });

    it('fails with CaptureError when the screenshot throws', async () => {
      const { session, tab } = makeSession();
      tab.failing.add('capture');
      const source = new FrameSource(session.browser, { targetIntervalMs: 50 });

      await expect(source.captureOnce()).rejects.toThrow('Screenshot failed');
    });
  });

  describe('runLoop', () => {
    it('forwards the first frame and then only changed ones', async () => {
      const { session, tab } = makeSession();
      session.lastFrameHash = fingerprint(A);
      const controller = new AbortController();
      const clock = new ManualClock();
      tab.captureImpl = scripted([A, A, B, B, A], controller, clock).capture;
      const forwarded: Frame[] = [];
      const source = new FrameSource(session.browser, { targetIntervalMs: 50, clock });

      const exit = await source.runLoop(
        session,
        (frame) => {
          forwarded.push(frame);
          return 'sent';
        },
        { signal: controller.signal },
      );

      expect(exit).toBe('aborted');
      expect(forwarded.map((frame) => frame.data.toString())).toEqual(['frame-a', 'frame-b', 'frame-a']);
      expect(forwarded.map((frame) => frame.sequence)).toEqual([1, 3, 5]);
      expect(session.lastFrameHash).toBe(fingerprint(A));
    });

    it('never captures faster than the target interval when capture is instant', async () => {
      const { session, tab } = makeSession();
      const controller = new AbortController();
      const clock = new ManualClock();
      const script = scripted([A, B, A, B], controller, clock);
      tab.captureImpl = script.capture;
      const source = new FrameSource(session.browser, { targetIntervalMs: 100, clock });

      await source.runLoop(session, () => 'sent', { signal: controller.signal });

      expect(script.times).toEqual([0, 100, 200, 300, 400]);
      expect(clock.sleeps).toEqual([100, 100, 100, 100]);
    });

    it('subtracts capture time from the sleep and never sleeps a negative amount', async () => {
      const { session, tab } = makeSession();
      const controller = new AbortController();
      const clock = new ManualClock();
      tab.captureImpl = scripted([A, B], controller, clock, 30).capture;
      const source = new FrameSource(session.browser, { targetIntervalMs: 100, clock });
      await source.runLoop(session, () => 'sent', { signal: controller.signal });
      expect(clock.sleeps).toEqual([70, 70]);

      const slow = new AbortController();
      const slowClock = new ManualClock();
      tab.captureImpl = scripted([A, B], slow, slowClock, 150).capture;
      const slowSource = new FrameSource(session.browser, { targetIntervalMs: 100, clock: slowClock });
      await slowSource.runLoop(session, () => 'sent', { signal: slow.signal });
      expect(slowClock.sleeps).toEqual([0, 0]);
    });

    it('survives a failed capture and re-forwards the next frame even if unchanged', async () => {
      const { session, tab } = makeSession();
      const controller = new AbortController();
      const clock = new ManualClock();
      tab.captureImpl = scripted([A, new Error('renderer busy'), A], controller, clock).capture;
      const onCaptureError = vi.fn();
      const forwarded: string[] = [];
      const source = new FrameSource(session.browser, { targetIntervalMs: 50, clock });

      await source.runLoop(
        session,
        (frame) => {
          forwarded.push(frame.data.toString());
          return 'sent';
        },
        { signal: controller.signal, onCaptureError },
      );

      expect(forwarded).toEqual(['frame-a', 'frame-a']);
      expect(onCaptureError).toHaveBeenCalledTimes(1);
      expect(onCaptureError.mock.calls[0]?.[0]).toBeInstanceOf(CaptureError);
    });

    it('offers a skipped frame again on the next tick', async () => {
      const { session, tab } = makeSession();
      const controller = new AbortController();
      const clock = new ManualClock();
      tab.captureImpl = scripted([A, A, A], controller, clock).capture;
      const deliveries: FrameDelivery[] = ['skipped', 'sent'];
      const offered: number[] = [];
      const source = new FrameSource(session.browser, { targetIntervalMs: 50, clock });

      await source.runLoop(
        session,
        (frame) => {
          offered.push(frame.sequence);
          return deliveries.shift() ?? 'sent';
        },
        { signal: controller.signal },
      );

      expect(offered).toEqual([1, 2]);
    });

    it('stops when the channel reports it is gone', async () => {
      const { session, tab } = makeSession();
      tab.frames = [A, B];
      const onFrame = vi.fn((): FrameDelivery => 'closed');
      const source = new FrameSource(session.browser, { targetIntervalMs: 50, clock: new ManualClock() });

      const exit = await source.runLoop(session, onFrame, { signal: new AbortController().signal });

      expect(exit).toBe('channel-closed');
      expect(onFrame).toHaveBeenCalledTimes(1);
    });

    it('stops when the tab has gone away', async () => {
      const { session, tab } = makeSession();
      tab.captureImpl = async () => {
        tab.closed = true;
        throw new Error('Target closed');
      };
      const source = new FrameSource(session.browser, { targetIntervalMs: 50, clock: new ManualClock() });

      const exit = await source.runLoop(session, () => 'sent', { signal: new AbortController().signal });

      expect(exit).toBe('browser-closed');
    });
  });

  describe('start', () => {
    it('abandons an in-flight capture when stopped', async () => {
      const { session, tab } = makeSession();
      const pending = deferred<Buffer>();
      tab.captureImpl = () => pending.promise;
      const onFrame = vi.fn((): FrameDelivery => 'sent');
      const onExit = vi.fn();
      const source = new FrameSource(session.browser, { targetIntervalMs: 50 });

      const loop = source.start(session, onFrame, { onExit });
      await flush();
      await loop.stop();

      await expect(loop.done).resolves.toBe('aborted');
      expect(onExit).not.toHaveBeenCalled();

      pending.resolve(A);
      await flush();
      expect(onFrame).not.toHaveBeenCalled();
    });

    it('reports a non-abort exit', async () => {
      const { session } = makeSession();
      const onExit = vi.fn();
      const source = new FrameSource(session.browser, { targetIntervalMs: 50 });

      const loop = source.start(session, () => 'closed', { onExit });

      await expect(loop.done).resolves.toBe('channel-closed');
      expect(onExit).toHaveBeenCalledWith('channel-closed');
    });
  });
});
