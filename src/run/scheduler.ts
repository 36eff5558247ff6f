/**
 * Daily scheduler
 *
 * Fires at fixed wall-clock times in one timezone. Each next instant is
 * resolved through the zone's current offset, so DST changes move the UTC
 * fire time rather than the local one.
 */

import { getZonedParts, zonedWallTimeToUtc } from '@/core/time';
import type { RunOutcome } from '@/types/job';
import { createChildLogger } from '@/utils/logger';

const logger = createChildLogger('scheduler');

export const DEFAULT_RUN_TIMES = ['07:00', '09:30', '12:00', '14:45'] as const;

export interface ClockTime {
  hour: number;
  minute: number;
}

export function parseClockTime(value: string): ClockTime {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid schedule time "${value}", expected HH:mm`);
  }
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) {
    throw new Error(`Invalid schedule time "${value}", expected HH:mm`);
  }
  return { hour, minute };
}

export interface SchedulerOptions {
  times?: readonly string[];
  timeZone: string;
  onFire: () => Promise<RunOutcome>;
  now?: () => Date;
}

export class DailyScheduler {
  private readonly times: ClockTime[];
  private readonly timeZone: string;
  private readonly onFire: () => Promise<RunOutcome>;
  private readonly now: () => Date;
  private timer: NodeJS.Timeout | null = null;
  private nextAt: Date | null = null;

  constructor(options: SchedulerOptions) {
    this.times = (options.times ?? DEFAULT_RUN_TIMES).map(parseClockTime);
    if (this.times.length === 0) {
      throw new Error('Scheduler needs at least one run time');
    }
    this.timeZone = options.timeZone;
    this.onFire = options.onFire;
    this.now = options.now ?? (() => new Date());
  }

  /** First scheduled instant strictly after `from` */
  nextRun(from: Date): Date {
    const today = getZonedParts(from, this.timeZone);
    let best: Date | null = null;

    // Two days covers every case, including a last slot already past today
    for (let offset = 0; offset <= 2; offset++) {
      for (const time of this.times) {
        const candidate = zonedWallTimeToUtc(
          { year: today.year, month: today.month, day: today.day + offset, ...time },
          this.timeZone
        );
        if (candidate.getTime() > from.getTime() && (!best || candidate < best)) {
          best = candidate;
        }
      }
      if (best) return best;
    }

    throw new Error(`No upcoming run time found after ${from.toISOString()}`);
  }

  getNextRunAt(): Date | null {
    return this.nextAt;
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.arm(this.now());
  }

  stop(): void {
    if (this.timer) {
      clearTimeout(this.timer);
    }
    this.timer = null;
    this.nextAt = null;
  }

  private arm(from: Date): void {
    const nextAt = this.nextRun(from);
    this.nextAt = nextAt;
    const delayMs = Math.max(0, nextAt.getTime() - this.now().getTime());
    this.timer = setTimeout(() => this.fire(nextAt), delayMs);
    logger.info({ nextAt: nextAt.toISOString(), timeZone: this.timeZone }, 'Next scheduled run armed');
  }

  private fire(scheduledAt: Date): void {
    // A timer firing a hair early must not pick the same slot again
    const from = new Date(Math.max(this.now().getTime(), scheduledAt.getTime()));
    this.arm(from);

    this.onFire()
      .then((outcome) => {
        if (outcome.status === 'busy') {
          logger.warn({ runningSince: outcome.runningSince }, 'Scheduled run skipped, a run is already in flight');
        } else {
          logger.info({ status: outcome.status }, 'Scheduled run finished');
        }
      })
      .catch((error: unknown) => {
        logger.error({ err: error }, 'Scheduled run crashed');
      });
  }
}
