/**
 * Daily job scheduling
 */

import * as cron from 'node-cron';

import { resetDailyRuntime } from '@features/runtime-tracker';
import { formatLocalDate, localDayWindow } from '@utils/time';

import { runEtCycle } from './et-cycle';

import type { EtReport } from '@system/state';
import type { Scheduler, SchedulerDependencies } from './types';

/**
 * Create the scheduler
 *
 * The cron job fires in the configured timezone and always processes the
 * previous local day, so a missed or repeated run is absorbed by the
 * ledger's per-date guard.
 *
 * @param deps - ET cycle collaborators plus the cron settings
 */
export function createScheduler(deps: SchedulerDependencies): Scheduler {
  const logger = deps.logger;
  let job: cron.ScheduledTask | null = null;

  async function runSafely(trigger: string): Promise<EtReport | null> {
    try {
      return await runEtCycle(deps);
    } catch (err) {
      logger.critical(trigger + ' ET cycle failed: ' + (err instanceof Error ? err.message : String(err)));
      return null;
    }
  }

  async function runDaily(): Promise<EtReport | null> {
    const trackers = deps.state.trackers;
    Object.keys(trackers).forEach((zoneId) => {
      trackers[zoneId] = resetDailyRuntime(trackers[zoneId]);
    });
    deps.onChange();

    return runSafely('Scheduled');
  }

  function start(): void {
    if (job !== null) return;

    job = cron.schedule(deps.config.ET_CRON, async () => {
      logger.info('Running daily ET cycle');
      await runDaily();
    }, {
      scheduled: true,
      timezone: deps.config.TIMEZONE,
    });

    logger.info('Daily ET cycle scheduled: "' + deps.config.ET_CRON + '" (' + deps.config.TIMEZONE + ')');
  }

  function stop(): void {
    if (job === null) return;
    job.stop();
    job = null;
  }

  // Runtime counted before today's local midnight belongs to a day whose
  // reset was missed while the process was down.
  function resetStaleRuntime(): void {
    const timeZone = deps.config.TIMEZONE;
    const midnight = localDayWindow(formatLocalDate(deps.timeSource(), timeZone), timeZone).start;
    const trackers = deps.state.trackers;
    let changed = false;

    Object.keys(trackers).forEach((zoneId) => {
      const tracker = trackers[zoneId];
      if (tracker.runtimeTodaySec > 0 && (tracker.lastOffAt === null || tracker.lastOffAt < midnight)) {
        logger.info('Zone ' + zoneId + ': clearing runtime-today left from before ' + formatLocalDate(midnight, timeZone));
        trackers[zoneId] = resetDailyRuntime(tracker);
        changed = true;
      }
    });

    if (changed) deps.onChange();
  }

  function catchUp(): Promise<EtReport | null> {
    if (!deps.config.ET_CATCH_UP_ON_BOOT) {
      return Promise.resolve(null);
    }
    resetStaleRuntime();
    return runSafely('Catch-up');
  }

  return {
    start: start,
    stop: stop,
    catchUp: catchUp,
    runDaily: runDaily
  };
}
