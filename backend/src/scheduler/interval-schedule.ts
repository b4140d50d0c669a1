import type { Logger } from '../logger.js';
import type { RunQueue } from './run-queue.js';

/** Longest interval a Node timer can hold without firing immediately. */
export const MAX_INTERVAL_MINUTES = Math.floor((2 ** 31 - 1) / 60000);

/**
 * Queues a scheduled run every `intervalMinutes`. Runs are manual-only when
 * the interval is zero.
 */
export class IntervalSchedule {
  private intervalId: NodeJS.Timeout | null = null;
  private readonly queue: RunQueue;
  private readonly intervalMinutes: number;
  private readonly logger: Logger;

  constructor(queue: RunQueue, intervalMinutes: number, logger: Logger) {
    if (!(intervalMinutes >= 0 && intervalMinutes <= MAX_INTERVAL_MINUTES)) {
      throw new RangeError(`schedule interval must be between 0 and ${MAX_INTERVAL_MINUTES} minutes`);
    }
    this.queue = queue;
    this.intervalMinutes = intervalMinutes;
    this.logger = logger;
  }

  get enabled(): boolean {
    return this.intervalMinutes > 0;
  }

  start(): void {
    if (!this.enabled) {
      this.logger.info('no schedule interval configured; runs are triggered manually');
      return;
    }
    if (this.intervalId) {
      this.logger.warn('schedule already running');
      return;
    }

    this.intervalId = setInterval(() => {
      this.queue.trigger('schedule').catch((error: unknown) => {
        this.logger.error({ err: error }, 'failed to queue scheduled run');
      });
    }, this.intervalMinutes * 60 * 1000);

    this.logger.info({ intervalMinutes: this.intervalMinutes }, 'schedule started');
  }

  stop(): void {
    if (this.intervalId) {
      clearInterval(this.intervalId);
      this.intervalId = null;
      this.logger.info('schedule stopped');
    }
  }
}
