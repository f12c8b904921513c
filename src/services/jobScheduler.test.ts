import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

const cronMocks = vi.hoisted(() => ({
  schedule: vi.fn(),
  validate: vi.fn(),
  stop: vi.fn(),
}));

vi.mock('node-cron', () => ({
  schedule: cronMocks.schedule,
  validate: cronMocks.validate,
}));

import { JobScheduler, cronExpression } from './jobScheduler';

const NOW = new Date('2026-10-18T10:00:00Z');
const flush = () => new Promise<void>(resolve => setImmediate(resolve));

function scheduledCallback(call = 0): () => void {
  const callback: unknown = cronMocks.schedule.mock.calls[call]?.[1];
  if (typeof callback !== 'function') {
    throw new Error(`cron.schedule call ${call} has no callback`);
  }
  return () => callback();
}

describe('cronExpression', () => {
  it('builds a daily expression', () => {
    expect(cronExpression({ hour: 8, minute: 15 })).toBe('15 8 * * *');
  });

  it('lists unique sorted weekdays', () => {
    expect(cronExpression({ hour: 18, minute: 30, days: [3, 0, 3] })).toBe('30 18 * * 0,3');
    expect(cronExpression({ hour: 18, minute: 30, days: [] })).toBe('30 18 * * *');
  });
});

describe('JobScheduler', () => {
  let scheduler: JobScheduler;

  beforeEach(() => {
    vi.useFakeTimers({ toFake: ['setTimeout', 'clearTimeout', 'Date'] });
    vi.setSystemTime(NOW);
    cronMocks.schedule.mockReset().mockImplementation(() => ({ stop: cronMocks.stop }));
    cronMocks.validate.mockReset().mockReturnValue(true);
    cronMocks.stop.mockReset();
    scheduler = new JobScheduler('Asia/Kolkata');
  });

  afterEach(() => {
    scheduler.stopAll();
    vi.useRealTimers();
  });

  describe('runDaily', () => {
    it('registers a cron job in the configured zone', () => {
      expect(scheduler.runDaily('morning', { hour: 8, minute: 0 }, () => undefined)).toBe('0 8 * * *');

      expect(cronMocks.schedule).toHaveBeenCalledWith('0 8 * * *', expect.any(Function), { timezone: 'Asia/Kolkata' });
      expect(scheduler.names('daily')).toEqual(['morning']);
      expect(scheduler.describe('morning')).toBe('0 8 * * *');
    });

    it('runs the task when cron fires', async () => {
      const task = vi.fn();
      scheduler.runDaily('morning', { hour: 8, minute: 0 }, task);

      scheduledCallback()();
      await flush();

      expect(task).toHaveBeenCalledTimes(1);
    });

    it('survives a failing task', async () => {
      const task = vi.fn().mockRejectedValue(new Error('boom'));
      scheduler.runDaily('morning', { hour: 8, minute: 0 }, task);

      scheduledCallback()();
      await flush();

      expect(task).toHaveBeenCalledTimes(1);
      expect(scheduler.has('morning')).toBe(true);
    });

    it('replaces a job with the same name', () => {
      scheduler.runDaily('morning', { hour: 8, minute: 0 }, () => undefined);
      scheduler.runDaily('morning', { hour: 9, minute: 0 }, () => undefined);

      expect(cronMocks.stop).toHaveBeenCalledTimes(1);
      expect(scheduler.names()).toEqual(['morning']);
      expect(scheduler.describe('morning')).toBe('0 9 * * *');
    });

    it('rejects an expression cron does not accept', () => {
      cronMocks.validate.mockReturnValue(false);

      expect(() => scheduler.runDaily('bad', { hour: 8, minute: 0 }, () => undefined)).toThrow(RangeError);
      expect(scheduler.has('bad')).toBe(false);
    });
  });

  describe('runOnce', () => {
    it('fires once at the given time and forgets the job', async () => {
      const task = vi.fn();
      scheduler.runOnce('ping', new Date(NOW.getTime() + 90_000), task, NOW);
      expect(scheduler.describe('ping')).toBe('2026-10-18T10:01:30.000Z');

      await vi.advanceTimersByTimeAsync(89_999);
      expect(task).not.toHaveBeenCalled();

      await vi.advanceTimersByTimeAsync(1);
      await flush();
      expect(task).toHaveBeenCalledTimes(1);
      expect(scheduler.has('ping')).toBe(false);
    });

    it('runs a past time right away', async () => {
      const task = vi.fn();
      scheduler.runOnce('late', new Date(NOW.getTime() - 1000), task, NOW);

      await vi.advanceTimersByTimeAsync(0);
      await flush();
      expect(task).toHaveBeenCalledTimes(1);
    });

    it('refuses times a timer cannot reach', () => {
      expect(() => scheduler.runOnce('far', new Date(NOW.getTime() + 2 ** 31), () => undefined, NOW)).toThrow(RangeError);
    });

    it('can be cancelled', async () => {
      const task = vi.fn();
      scheduler.runOnce('ping', new Date(NOW.getTime() + 1000), task, NOW);

      expect(scheduler.cancel('ping')).toBe(true);
      expect(scheduler.cancel('ping')).toBe(false);
      await vi.advanceTimersByTimeAsync(2000);
      expect(task).not.toHaveBeenCalled();
    });
  });

  it('stops every job', async () => {
    const task = vi.fn();
    scheduler.runDaily('morning', { hour: 8, minute: 0 }, () => undefined);
    scheduler.runOnce('ping', new Date(NOW.getTime() + 1000), task, NOW);

    scheduler.stopAll();

    expect(cronMocks.stop).toHaveBeenCalledTimes(1);
    expect(scheduler.names()).toEqual([]);
    await vi.advanceTimersByTimeAsync(2000);
    expect(task).not.toHaveBeenCalled();
  });
});
