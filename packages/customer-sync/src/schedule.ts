/**
 * Timer wiring for the sync: a fixed period runs on setInterval, an explicit
 * cron expression on node-cron. Either way one run starts immediately.
 */
import cron from 'node-cron';
import type { Logger } from '@customer-sync/shared';

export interface SyncScheduleOptions {
  periodMs: number;
  /** Overrides `periodMs` when set. */
  cron?: string;
  log: Logger;
}

export interface SyncSchedule {
  /** Human-readable schedule, e.g. "every 60000ms" or the cron expression. */
  description: string;
  stop(): void;
  /** Resolves once every run started by this schedule has finished. */
  idle(): Promise<void>;
}

/** Fire `run` now and on every tick. Runs that overlap are allowed; they share no state. */
export function scheduleSync(run: () => Promise<void>, options: SyncScheduleOptions): SyncSchedule {
  const { log } = options;
  const inFlight = new Set<Promise<void>>();

  const tick = (): void => {
    const p = run()
      .catch((err) => log.error({ err }, 'Scheduled sync run failed'))
      .finally(() => inFlight.delete(p));
    inFlight.add(p);
  };

  let description: string;
  let stop: () => void;
  if (options.cron) {
    const task = cron.schedule(options.cron, tick);
    description = options.cron;
    stop = () => task.stop();
  } else {
    const timer = setInterval(tick, options.periodMs);
    description = `every ${options.periodMs}ms`;
    stop = () => clearInterval(timer);
  }
  log.info({ schedule: description }, 'Customer sync scheduled, starting initial run');
  tick();

  return {
    description,
    stop,
    idle: async () => {
      await Promise.all([...inFlight]);
    },
  };
}
