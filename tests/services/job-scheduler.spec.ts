import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { JobScheduler, toCronExpression } from '../../src/services/job-scheduler.js';
import type { SchedulerEvent } from '../../src/types/scheduler.js';

const cronMock = vi.hoisted(() => {
  const ticks: Array<() => Promise<void>> = [];
  const stop = vi.fn();
  return {
    ticks,
    stop,
    schedule: vi.fn((_expression: string, tick: () => Promise<void>) => {
      ticks.push(tick);
      return { stop };
    }),
    validate: vi.fn(() => true),
  };
});

vi.mock('node-cron', () => ({
  default: { schedule: cronMock.schedule, validate: cronMock.validate },
}));

vi.mock('../../src/utils/logger.js', () => ({
  logThought: vi.fn().mockResolvedValue(undefined),
}));

describe('toCronExpression', () => {
  it('pins the local second, minute, hour, day and month', () => {
    expect(toCronExpression(new Date(2024, 2, 5, 9, 7, 30))).toBe('30 7 9 5 3 *');
  });
});

describe('JobScheduler', () => {
  const runAt = new Date(2024, 2, 5, 9, 7, 30);
  let now: Date;
  let scheduler: JobScheduler;

  beforeEach(() => {
    cronMock.ticks.length = 0;
    cronMock.stop.mockClear();
    cronMock.schedule.mockClear();
    now = new Date(2024, 2, 5, 9, 0, 0);
    scheduler = new JobScheduler(() => now);
  });

  afterEach(() => {
    scheduler.stopAll();
  });

  it('registers a cron task for the run time', () => {
    scheduler.scheduleOnce({ id: 'job-1', runAt, description: 'Start', handler: vi.fn() });

    expect(cronMock.schedule).toHaveBeenCalledWith('30 7 9 5 3 *', expect.any(Function));
    expect(scheduler.listTimers()).toEqual([
      {
        id: 'job-1',
        runAt: runAt.toISOString(),
        cronExpression: '30 7 9 5 3 *',
        description: 'Start',
        status: 'waiting',
        lastError: null,
      },
    ]);
  });

  it('rejects duplicates and times that have passed', () => {
    scheduler.scheduleOnce({ id: 'job-1', runAt, description: 'Start', handler: vi.fn() });

    expect(() => scheduler.scheduleOnce({ id: 'job-1', runAt, description: 'Again', handler: vi.fn() })).toThrow(
      "[JobScheduler] Timer 'job-1' is already registered.",
    );
    expect(() =>
      scheduler.scheduleOnce({ id: 'job-2', runAt: new Date(2024, 2, 5, 8, 0, 0), description: 'Late', handler: vi.fn() }),
    ).toThrow(/^\[JobScheduler\] Timer 'job-2' is due in the past/);
  });

  it('fires once on the due tick and forgets the timer', async () => {
    const handler = vi.fn();
    const events: SchedulerEvent['type'][] = [];
    scheduler.on('timer:fire', (event) => events.push(event.type));
    scheduler.on('timer:done', (event) => events.push(event.type));
    scheduler.scheduleOnce({ id: 'job-1', runAt, description: 'Start', handler });

    await cronMock.ticks[0]?.();
    expect(handler).not.toHaveBeenCalled();

    now = runAt;
    await cronMock.ticks[0]?.();
    await cronMock.ticks[0]?.();

    expect(handler).toHaveBeenCalledTimes(1);
    expect(cronMock.stop).toHaveBeenCalledTimes(1);
    expect(events).toEqual(['timer:fire', 'timer:done']);
    expect(scheduler.listTimers()).toEqual([]);
  });

  it('reports handler failures as timer:error', async () => {
    const consoleError = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const errors: Array<string | undefined> = [];
    scheduler.on('timer:error', (event) => errors.push(event.error));
    scheduler.scheduleOnce({
      id: 'job-1',
      runAt,
      description: 'Start',
      handler: () => {
        throw new Error('capacity reached');
      },
    });

    now = runAt;
    await cronMock.ticks[0]?.();

    expect(errors).toEqual(['capacity reached']);
    expect(consoleError).toHaveBeenCalledWith("[JobScheduler] Timer 'job-1' failed:", 'capacity reached');
    consoleError.mockRestore();
  });

  it('unregisters a timer and stops its task', () => {
    scheduler.scheduleOnce({ id: 'job-1', runAt, description: 'Start', handler: vi.fn() });

    expect(scheduler.unregister('job-1')).toBe(true);
    expect(scheduler.unregister('job-1')).toBe(false);
    expect(cronMock.stop).toHaveBeenCalledTimes(1);
  });
});
