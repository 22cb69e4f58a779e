/**
 * Scheduler - Repeats the pipeline on a cron schedule
 *
 * Runs the job immediately, then sleeps until each following occurrence
 * of the cron expression. A failed run is logged and the loop carries on;
 * only the abort signal (or process exit) stops it.
 */
import { setTimeout as delay } from 'node:timers/promises';
import { CronExpressionParser } from 'cron-parser';
import { ConfigError, describeError } from './errors.js';
import { createLogger } from './logger.js';

const log = createLogger('scheduler');

/** Longest delay a Node timer accepts; longer ones fire after 1 ms */
export const MAX_TIMER_DELAY = 2 ** 31 - 1;

export interface ScheduleOptions {
  signal?: AbortSignal;
  now?: () => Date;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/**
 * Next time the cron expression fires strictly after `from`
 */
export function nextOccurrence(cronExpression: string, from: Date): Date {
  const expr = CronExpressionParser.parse(cronExpression, { currentDate: from });
  return expr.next().toDate();
}

export function validateCron(cronExpression: string): void {
  try {
    CronExpressionParser.parse(cronExpression);
  } catch (err) {
    throw new ConfigError(`Invalid cron expression "${cronExpression}"`, [describeError(err)]);
  }
}

async function sleepUntilAborted(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (signal?.aborted) return;
    throw err;
  }
}

/**
 * Run `job` now and at every later occurrence. Resolves with the number
 * of runs once the signal aborts.
 */
export async function runOnSchedule(
  cronExpression: string,
  job: () => Promise<void>,
  options: ScheduleOptions = {}
): Promise<number> {
  validateCron(cronExpression);
  const now = options.now ?? (() => new Date());
  const sleep = options.sleep ?? sleepUntilAborted;
  const { signal } = options;

  log.info(`Scheduling runs on "${cronExpression}"`);
  let runs = 0;

  while (!signal?.aborted) {
    try {
      await job();
    } catch (err) {
      log.error(`Scheduled run failed: ${describeError(err)}`);
    }
    runs++;

    if (signal?.aborted) break;

    const current = now();
    const next = nextOccurrence(cronExpression, current);
    log.info(`Next run at ${next.toISOString()}`);
    let remaining = next.getTime() - current.getTime();
    while (remaining > 0 && !signal?.aborted) {
      const chunk = Math.min(remaining, MAX_TIMER_DELAY);
      await sleep(chunk, signal);
      remaining -= chunk;
    }
  }

  log.info(`Scheduler stopped after ${runs} run(s)`);
  return runs;
}
