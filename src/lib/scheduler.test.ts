import { describe, expect, it, vi } from 'vitest';
import { ConfigError } from './errors.js';
import { MAX_TIMER_DELAY, nextOccurrence, runOnSchedule, validateCron } from './scheduler.js';

describe('nextOccurrence', () => {
  it('returns the next matching minute after the given time', () => {
    const from = new Date(2026, 0, 1, 10, 2, 0);
    expect(nextOccurrence('*/5 * * * *', from)).toEqual(new Date(2026, 0, 1, 10, 5, 0));
  });

  it('rolls over to the next day', () => {
    const from = new Date(2026, 0, 1, 23, 30, 0);
    expect(nextOccurrence('0 6 * * *', from)).toEqual(new Date(2026, 0, 2, 6, 0, 0));
  });
});

describe('validateCron', () => {
  it('accepts standard expressions', () => {
    expect(() => validateCron('0 */6 * * *')).not.toThrow();
  });

  it('rejects malformed expressions', () => {
    expect(() => validateCron('every hour')).toThrow(ConfigError);
    expect(() => validateCron('every hour')).toThrow('Invalid cron expression "every hour"');
  });
});

describe('runOnSchedule', () => {
  it('runs immediately, then sleeps until each next occurrence', async () => {
    const controller = new AbortController();
    const job = vi.fn(async () => {});
    const sleep = vi.fn(async () => {
      if (job.mock.calls.length >= 2) controller.abort();
    });

    const runs = await runOnSchedule('*/5 * * * *', job, {
      signal: controller.signal,
      now: () => new Date(2026, 0, 1, 10, 2, 0),
      sleep,
    });

    expect(runs).toBe(2);
    expect(job).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(sleep).toHaveBeenCalledWith(180_000, controller.signal);
  });

  it('splits waits longer than a timer allows into several sleeps', async () => {
    const controller = new AbortController();
    const job = vi.fn(async () => {});
    const sleep = vi.fn<(ms: number, signal?: AbortSignal) => Promise<void>>(async () => {
      if (job.mock.calls.length >= 2) controller.abort();
    });

    const runs = await runOnSchedule('0 0 1 * *', job, {
      signal: controller.signal,
      now: () => new Date(2026, 0, 1, 0, 1, 0),
      sleep,
    });

    expect(runs).toBe(2);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([MAX_TIMER_DELAY, 530_856_353, MAX_TIMER_DELAY]);
  });

  it('runs a monthly job once while waiting for the next month', async () => {
    const controller = new AbortController();
    const job = vi.fn(async () => {});
    setTimeout(() => controller.abort(), 50);

    const runs = await runOnSchedule('0 0 1 * *', job, {
      signal: controller.signal,
      now: () => new Date(2026, 0, 1, 0, 1, 0),
    });

    expect(runs).toBe(1);
    expect(job).toHaveBeenCalledTimes(1);
  });

  it('keeps going after a failed run', async () => {
    const controller = new AbortController();
    const job = vi
      .fn<() => Promise<void>>()
      .mockRejectedValueOnce(new Error('front page down'))
      .mockImplementation(async () => {
        controller.abort();
      });

    const runs = await runOnSchedule('* * * * *', job, {
      signal: controller.signal,
      sleep: async () => {},
    });

    expect(runs).toBe(2);
  });

  it('does not run when already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const job = vi.fn(async () => {});

    const runs = await runOnSchedule('* * * * *', job, { signal: controller.signal });

    expect(runs).toBe(0);
    expect(job).not.toHaveBeenCalled();
  });

  it('rejects an invalid expression before running anything', async () => {
    const job = vi.fn(async () => {});

    await expect(runOnSchedule('not a cron', job)).rejects.toThrow(ConfigError);
    expect(job).not.toHaveBeenCalled();
  });

  it('stops a real sleep when the signal aborts', async () => {
    const controller = new AbortController();
    const job = vi.fn(async () => {
      setTimeout(() => controller.abort(), 5);
    });

    const runs = await runOnSchedule('0 0 1 1 *', job, { signal: controller.signal });

    expect(runs).toBe(1);
  });
});
