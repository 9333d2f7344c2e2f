import { describe, it, expect, vi } from 'vitest';
import { pollUntil } from '../poller.js';
import { ManualClock } from '../../__tests__/support/fakes.js';

describe('pollUntil', () => {
  it('should make exactly three attempts on a budget of three intervals', async () => {
    const clock = new ManualClock();
    const predicate = vi.fn(async () => false);

    const outcome = await pollUntil(predicate, { intervalMs: 5000, timeoutMs: 15000, clock });

    expect(outcome).toEqual({ status: 'timed-out', attempts: 3, elapsedMs: 10000, lastError: undefined });
    expect(predicate).toHaveBeenCalledTimes(3);
    expect(clock.sleeps).toEqual([5000, 5000]);
  });

  it('should report ready within one interval of the target becoming ready', async () => {
    const clock = new ManualClock();
    const readyAt = 7000;

    const outcome = await pollUntil(async () => clock.now() >= readyAt, { intervalMs: 5000, timeoutMs: 60000, clock });

    expect(outcome.status).toBe('ready');
    expect(outcome.elapsedMs).toBe(10000);
    expect(outcome.elapsedMs - readyAt).toBeLessThanOrEqual(5000);
  });

  it('should not sleep when the first attempt succeeds', async () => {
    const clock = new ManualClock();

    const outcome = await pollUntil(async () => true, { intervalMs: 5000, timeoutMs: 15000, clock });

    expect(outcome).toEqual({ status: 'ready', attempts: 1, elapsedMs: 0 });
    expect(clock.sleeps).toEqual([]);
  });

  it('should treat a throwing predicate as not ready and keep the last error', async () => {
    const clock = new ManualClock();
    const predicate = vi
      .fn<() => Promise<boolean>>()
      .mockRejectedValueOnce(new Error('connection refused'))
      .mockRejectedValueOnce(new Error('connection reset'));

    const outcome = await pollUntil(predicate, { intervalMs: 1000, timeoutMs: 2000, clock });

    expect(outcome).toEqual({ status: 'timed-out', attempts: 2, elapsedMs: 1000, lastError: 'connection reset' });
  });

  it('should report every attempt', async () => {
    const clock = new ManualClock();
    const onAttempt = vi.fn();
    let calls = 0;

    await pollUntil(async () => ++calls === 2, { intervalMs: 1000, timeoutMs: 10000, clock, onAttempt });

    expect(onAttempt.mock.calls).toEqual([
      [1, false],
      [2, true]
    ]);
  });

  it('should give up on an attempt that never settles once the budget is spent', async () => {
    const clock = new ManualClock();

    const outcome = await pollUntil(() => new Promise<boolean>(() => undefined), { intervalMs: 1000, timeoutMs: 3000, clock });

    expect(outcome).toEqual({
      status: 'timed-out',
      attempts: 1,
      elapsedMs: 3000,
      lastError: 'attempt did not finish within 3000ms'
    });
  });

  it('should hand each attempt the time left', async () => {
    const clock = new ManualClock();
    const predicate = vi.fn(async (_limitMs: number) => false);

    await pollUntil(predicate, { intervalMs: 1000, timeoutMs: 3000, clock });

    expect(predicate.mock.calls).toEqual([[3000], [2000], [1000]]);
  });
});
