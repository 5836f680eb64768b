/**
 * Service initialization
 */

import { createLogger, createConsoleSink, createSlackSink } from '@logging';
import { createController } from '@system/control';
import { createDispatcher } from '@system/dispatcher';
import { createHistoryRecorder } from '@system/history';
import { createLedger } from '@system/ledger';
import { createScheduler, runEtCycle } from '@system/scheduler';
import { createInitialState, restoreState, restoredBalances, toPersistedState } from '@system/state';
import { validateConfig } from '@validation';

import type { IrrigationConfig } from '$types/config';
import type { Logger, SinkWithLevel } from '@logging';
import type { ControllerState } from '@system/state';
import type { ZoneBalance } from '@system/ledger';
import type { InitDependencies, Service } from './types';

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function createServiceLogger(config: IrrigationConfig, deps: InitDependencies): Logger {
  const sinks: SinkWithLevel[] = [];

  if (config.CONSOLE_ENABLED) {
    const consoleSink = createConsoleSink(deps.timer, deps.console, {
      bufferSize: config.CONSOLE_BUFFER_SIZE,
      drainInterval: config.CONSOLE_INTERVAL_MS
    });
    sinks.push({ sink: consoleSink, minLevel: config.CONSOLE_LOG_LEVEL });
  }

  if (config.SLACK_ENABLED) {
    const slackSink = createSlackSink({ fetch: deps.fetch, timer: deps.timer, console: deps.console }, {
      enabled: config.SLACK_ENABLED,
      webhookUrl: config.SLACK_WEBHOOK_URL,
      bufferSize: config.SLACK_BUFFER_SIZE,
      retryDelayMs: config.SLACK_RETRY_DELAY_SEC * 1000,
      maxRetries: config.SLACK_MAX_RETRIES
    });
    sinks.push({ sink: slackSink, minLevel: config.SLACK_LOG_LEVEL });
  }

  return createLogger({
    level: config.GLOBAL_LOG_LEVEL,
    demoteHours: config.GLOBAL_LOG_AUTO_DEMOTE_HOURS
  }, {
    timeSource: deps.timeSource,
    sinks: sinks
  }, config.LOG_LEVELS);
}

/**
 * Validate the configuration and wire every component
 *
 * @param config - Loaded configuration
 * @param deps - Host services
 * @returns The running service, or null when the configuration or the state file is unusable
 */
export async function initialize(config: IrrigationConfig, deps: InitDependencies): Promise<Service | null> {
  // Validate configuration
  const validation = validateConfig(config);

  if (!validation.valid) {
    deps.console.error('INIT FAIL: Invalid configuration');
    validation.errors.forEach(function(err) {
      deps.console.error('  [' + err.field + ']: ' + err.message);
    });
    return null;
  }

  // Setup logging
  const logger = createServiceLogger(config, deps);
  const messages = await logger.initialize();

  const zoneIds = config.ZONES.map((z) => z.id);
  logger.info('🚀 Irrigation balance service');
  logger.info(
    '📍 ' + config.LATITUDE + ', ' + config.LONGITUDE + ' @ ' + config.ELEVATION_M + 'm (' + config.TIMEZONE + ')' +
    ' | 🌱 ' + zoneIds.join(', ') + ' | ⏰ ET "' + config.ET_CRON + '"'
  );

  // Sink and config warnings after the banner
  messages.forEach(function(msg) {
    if (!msg.success) logger.warning(msg.message);
  });
  validation.warnings.forEach(function(warn) {
    logger.warning('[' + warn.field + ']: ' + warn.message);
  });

  // Restore state
  let state: ControllerState;
  let balances: Record<string, ZoneBalance> = {};
  try {
    const persisted = await deps.store.load();
    if (persisted === null) {
      logger.info('No state file, all zones start at 0.00mm');
      state = createInitialState(zoneIds);
    } else {
      const restored = restoreState(zoneIds, persisted);
      restored.discarded.forEach((error) => {
        logger.warning(error.message);
      });
      state = restored.state;
      balances = restoredBalances(persisted);
    }
  } catch (err) {
    logger.critical('INIT FAIL: ' + errorMessage(err));
    await logger.close();
    return null;
  }

  const store = deps.store;
  const timeSource = deps.timeSource;

  function persist(): void {
    store.save(toPersistedState(state, ledger, timeSource())).catch((err: unknown) => {
      logger.warning('State save failed: ' + errorMessage(err));
    });
  }

  const ledger = createLedger(config.ZONES, {
    overrideResetsEtGuard: config.OVERRIDE_RESETS_ET_GUARD,
    etRetentionDays: config.ET_RECORD_RETENTION_DAYS,
    onChange: persist
  }, balances);

  const history = createHistoryRecorder({ retentionSec: config.HISTORY_RETENTION_SEC, timeSource: timeSource });

  const dispatcher = createDispatcher({
    config: config,
    ledger: ledger,
    state: state,
    history: history,
    logger: logger.scoped('events'),
    onChange: persist
  });

  const cycleDeps = {
    config: config,
    ledger: ledger,
    state: state,
    history: history,
    logger: logger.scoped('et'),
    timeSource: timeSource,
    onChange: persist
  };
  const scheduler = createScheduler(cycleDeps);

  const controller = createController({
    config: config,
    ledger: ledger,
    state: state,
    dispatcher: dispatcher,
    runCycle: (request) => runEtCycle(cycleDeps, request),
    logger: logger,
    timeSource: timeSource
  });

  // Save once so dropped zones and discarded runs are not restored again
  persist();

  return {
    config: config,
    logger: logger,
    state: state,
    ledger: ledger,
    history: history,
    dispatcher: dispatcher,
    scheduler: scheduler,
    controller: controller,
    store: store,
    persist: persist
  };
}
