/**
 * Tick Scheduler Tests
 */

import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { TickScheduler, type TickSchedulerOptions } from './TickScheduler';

describe('TickScheduler', () => {
  const logger = { log: vi.fn(), warn: vi.fn(), error: vi.fn() };

  function createScheduler(overrides: Partial<TickSchedulerOptions> = {}): TickScheduler {
    return new TickScheduler({
      interval: 4,
      onTick: () => {},
      debug: false,
      logger,
      ...overrides,
    });
  }

  beforeEach(() => {
    vi.useFakeTimers();
    logger.error.mockClear();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test('should tick on every interval once started', () => {
    const onTick = vi.fn();
    const scheduler = createScheduler({ onTick });

    scheduler.start();
    vi.advanceTimersByTime(10);

    expect(onTick).toHaveBeenCalledTimes(2);
    expect(scheduler.tickCount).toBe(2);
    expect(scheduler.isRunning).toBe(true);
    scheduler.stop();
  });

  test('should skip ticks while busy', () => {
    const onTick = vi.fn();
    let busy = true;
    const scheduler = createScheduler({ onTick, isBusy: () => busy });

    scheduler.tick();
    busy = false;
    scheduler.tick();

    expect(onTick).toHaveBeenCalledTimes(1);
    expect(scheduler.skippedCount).toBe(1);
    expect(scheduler.tickCount).toBe(1);
  });

  test('should log a throwing callback and keep its cadence', () => {
    const scheduler = createScheduler({
      onTick: () => {
        throw new Error('tick failed');
      },
    });

    scheduler.start();
    vi.advanceTimersByTime(8);
    scheduler.stop();

    expect(scheduler.tickCount).toBe(2);
    expect(logger.error).toHaveBeenCalledTimes(2);
    expect(logger.error).toHaveBeenCalledWith(
      '[blueprint:TickScheduler] tick callback error:',
      expect.any(Error)
    );
  });

  test('should stop ticking after stop()', () => {
    const onTick = vi.fn();
    const scheduler = createScheduler({ onTick });

    scheduler.start();
    vi.advanceTimersByTime(4);
    scheduler.stop();
    vi.advanceTimersByTime(40);

    expect(onTick).toHaveBeenCalledTimes(1);
    expect(scheduler.isRunning).toBe(false);
  });

  test('restarting should reset the phase', () => {
    const onTick = vi.fn();
    const scheduler = createScheduler({ onTick });

    scheduler.start();
    vi.advanceTimersByTime(3);
    scheduler.start();
    vi.advanceTimersByTime(3);

    expect(onTick).not.toHaveBeenCalled();
    scheduler.stop();
  });
});
