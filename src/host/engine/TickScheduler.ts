/**
 * Tick Scheduler
 *
 * Drives the script's scheduler interrupt on a fixed interval.
 * A tick that fires while the script is already running is skipped.
 */

import type { Logger } from './types';

export interface TickSchedulerOptions {
  /** Tick period (milliseconds) */
  interval: number;
  onTick: () => void;
  /** Returns true while a script call is in progress */
  isBusy?: () => boolean;
  debug: boolean;
  logger: Logger;
}

export class TickScheduler {
  private handle: ReturnType<typeof setInterval> | null = null;
  private _tickCount = 0;
  private _skippedCount = 0;

  constructor(private options: TickSchedulerOptions) {}

  get isRunning(): boolean {
    return this.handle !== null;
  }

  /** Ticks delivered since creation */
  get tickCount(): number {
    return this._tickCount;
  }

  /** Ticks dropped because the script was busy */
  get skippedCount(): number {
    return this._skippedCount;
  }

  /**
   * Start ticking. Restarting an active scheduler resets its phase.
   */
  start(): void {
    this.stop();
    this.handle = setInterval(() => this.tick(), this.options.interval);
    if (this.options.debug) {
      this.options.logger.log(`[blueprint:TickScheduler] Started (${this.options.interval}ms)`);
    }
  }

  stop(): void {
    if (this.handle === null) return;
    clearInterval(this.handle);
    this.handle = null;
    if (this.options.debug) {
      this.options.logger.log(
        `[blueprint:TickScheduler] Stopped after ${this._tickCount} ticks (${this._skippedCount} skipped)`
      );
    }
  }

  /**
   * Deliver one tick now, subject to the busy guard
   */
  tick(): void {
    if (this.options.isBusy?.()) {
      this._skippedCount++;
      return;
    }
    this._tickCount++;
    try {
      this.options.onTick();
    } catch (e) {
      const error = e instanceof Error ? e : new Error(String(e));
      this.options.logger.error('[blueprint:TickScheduler] tick callback error:', error);
    }
  }
}
