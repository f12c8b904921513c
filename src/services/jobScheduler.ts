import * as cron from 'node-cron';
import { schedulerLogger } from '../logger';
import { errorMessage } from '../errors';
import type { ClockTime } from '../types';

export type JobTask = () => Promise<unknown> | unknown;

export interface DailyTime extends ClockTime {
  /** Days of week, 0 = Sunday. Omitted means every day. */
  days?: number[];
}

interface ScheduledJob {
  kind: 'daily' | 'once';
  description: string;
  cancel: () => void;
}

// setTimeout stores its delay in a signed 32-bit int
const MAX_TIMEOUT_MS = 2 ** 31 - 1;

export function cronExpression({ hour, minute, days }: DailyTime): string {
  const dow = days && days.length ? [...new Set(days)].sort((a, b) => a - b).join(',') : '*';
  return `${minute} ${hour} * * ${dow}`;
}

/**
 * Named recurring and one-off jobs. Reusing a name replaces the earlier job.
 * A failing task is logged and never takes the process down.
 */
export class JobScheduler {
  private readonly jobs = new Map<string, ScheduledJob>();

  constructor(private readonly timezone: string) {}

  runDaily(name: string, at: DailyTime, task: JobTask): string {
    const expression = cronExpression(at);
    if (!cron.validate(expression)) {
      throw new RangeError(`Invalid daily time for job ${name}: ${expression}`);
    }
    this.cancel(name);
    const scheduled = cron.schedule(expression, () => void this.execute(name, task), {
      timezone: this.timezone,
    });
    this.jobs.set(name, { kind: 'daily', description: expression, cancel: () => scheduled.stop() });
    schedulerLogger.info({ name, expression, timezone: this.timezone }, 'Daily job registered');
    return expression;
  }

  runOnce(name: string, when: Date, task: JobTask, now: Date = new Date()): void {
    const delay = Math.max(0, when.getTime() - now.getTime());
    if (delay > MAX_TIMEOUT_MS) {
      throw new RangeError(`Job ${name} is too far in the future`);
    }
    this.cancel(name);
    const timer = setTimeout(() => {
      this.jobs.delete(name);
      void this.execute(name, task);
    }, delay);
    this.jobs.set(name, { kind: 'once', description: when.toISOString(), cancel: () => clearTimeout(timer) });
    schedulerLogger.info({ name, at: when.toISOString(), delayMs: delay }, 'One-off job registered');
  }

  cancel(name: string): boolean {
    const job = this.jobs.get(name);
    if (!job) return false;
    job.cancel();
    this.jobs.delete(name);
    return true;
  }

  has(name: string): boolean {
    return this.jobs.has(name);
  }

  names(kind?: ScheduledJob['kind']): string[] {
    return [...this.jobs.entries()].filter(([, job]) => !kind || job.kind === kind).map(([name]) => name);
  }

  describe(name: string): string | undefined {
    return this.jobs.get(name)?.description;
  }

  stopAll(): void {
    for (const job of this.jobs.values()) {
      job.cancel();
    }
    this.jobs.clear();
  }

  private async execute(name: string, task: JobTask): Promise<void> {
    const startedAt = Date.now();
    try {
      await task();
      schedulerLogger.info({ name, durationMs: Date.now() - startedAt }, 'Job finished');
    } catch (error) {
      schedulerLogger.error({ name, error: errorMessage(error) }, 'Job failed');
    }
  }
}
