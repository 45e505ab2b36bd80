/**
 * Backoff Utility Tests
 */

import { ExponentialBackoff, sleep } from '../../src/utils/backoff';

describe('ExponentialBackoff', () => {
  it('should double the delay up to the maximum', () => {
    const backoff = new ExponentialBackoff({ initialMs: 1000, maxMs: 30000 });

    const delays = Array.from({ length: 7 }, () => backoff.next());

    expect(delays).toEqual([1000, 2000, 4000, 8000, 16000, 30000, 30000]);
    expect(backoff.attempt).toBe(7);
  });

  it('should start over after reset', () => {
    const backoff = new ExponentialBackoff({ initialMs: 500, maxMs: 10000, factor: 3 });
    backoff.next();
    backoff.next();

    backoff.reset();

    expect(backoff.attempt).toBe(0);
    expect(backoff.next()).toBe(500);
  });
});

describe('sleep', () => {
  it('should resolve after the delay', async () => {
    jest.useFakeTimers();
    try {
      const done = jest.fn();
      const pending = sleep(1000).then(done);

      jest.advanceTimersByTime(999);
      await Promise.resolve();
      expect(done).not.toHaveBeenCalled();

      jest.advanceTimersByTime(1);
      await pending;
      expect(done).toHaveBeenCalled();
    } finally {
      jest.useRealTimers();
    }
  });

  it('should resolve as soon as the signal aborts', async () => {
    const controller = new AbortController();
    const pending = sleep(60000, controller.signal);

    controller.abort();

    await expect(pending).resolves.toBeUndefined();
  });

  it('should resolve immediately for an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort();

    await expect(sleep(60000, controller.signal)).resolves.toBeUndefined();
  });
});
