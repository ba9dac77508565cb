import { afterEach, describe, expect, it, vi } from 'vitest';
import cron, { type ScheduledTask } from 'node-cron';
import { scheduleSync } from '../src/schedule';
import { createTestLogger } from './helpers';

describe('scheduleSync', () => {
  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('starts a run immediately', () => {
    vi.useFakeTimers();
    const { log, entries } = createTestLogger();
    const run = vi.fn(async () => {});

    const schedule = scheduleSync(run, { periodMs: 60_000, log });

    expect(run).toHaveBeenCalledTimes(1);
    expect(entries[0]).toMatchObject({
      msg: 'Customer sync scheduled, starting initial run',
      schedule: 'every 60000ms',
    });
    schedule.stop();
  });

  it('runs on any fixed period', () => {
    vi.useFakeTimers();
    const { log } = createTestLogger();
    const run = vi.fn(async () => {});

    const schedule = scheduleSync(run, { periodMs: 90_000, log });
    vi.advanceTimersByTime(89_999);
    expect(run).toHaveBeenCalledTimes(1);
    vi.advanceTimersByTime(1);
    expect(run).toHaveBeenCalledTimes(2);
    vi.advanceTimersByTime(180_000);
    expect(run).toHaveBeenCalledTimes(4);

    schedule.stop();
    vi.advanceTimersByTime(900_000);
    expect(run).toHaveBeenCalledTimes(4);
  });

  it('waits for in-flight runs, including the initial one', async () => {
    vi.useFakeTimers();
    const { log } = createTestLogger();
    let release: () => void = () => {};
    const run = vi.fn(() => new Promise<void>((r) => (release = r)));

    const schedule = scheduleSync(run, { periodMs: 1_500, log });
    schedule.stop();

    let idle = false;
    const waiting = schedule.idle().then(() => {
      idle = true;
    });
    await Promise.resolve();
    expect(idle).toBe(false);

    release();
    await waiting;
    expect(idle).toBe(true);
  });

  it('logs a rejected run instead of throwing', async () => {
    vi.useFakeTimers();
    const { log, entries } = createTestLogger();
    const schedule = scheduleSync(async () => Promise.reject(new Error('boom')), { periodMs: 60_000, log });
    schedule.stop();

    await schedule.idle();

    expect(entries.at(-1)).toMatchObject({ msg: 'Scheduled sync run failed', err: { message: 'boom' } });
  });

  it('uses node-cron for an explicit cron expression', () => {
    const stop = vi.fn();
    let tick: (() => void) | undefined;
    vi.spyOn(cron, 'schedule').mockImplementation((_expression, fn) => {
      if (typeof fn === 'function') tick = () => fn(new Date());
      return { start: vi.fn(), stop } as unknown as ScheduledTask;
    });
    const { log } = createTestLogger();
    const run = vi.fn(async () => {});

    const schedule = scheduleSync(run, { periodMs: 60_000, cron: '0 0 2 * * *', log });

    expect(schedule.description).toBe('0 0 2 * * *');
    expect(cron.schedule).toHaveBeenCalledWith('0 0 2 * * *', expect.any(Function));
    expect(run).toHaveBeenCalledTimes(1);
    tick?.();
    expect(run).toHaveBeenCalledTimes(2);

    schedule.stop();
    expect(stop).toHaveBeenCalledTimes(1);
  });
});
