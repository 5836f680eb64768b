/**
 * Main logger coordinator
 *
 * Routes messages through the level filter and formatter, then writes them to
 * every sink whose minimum level they meet.
 *
 * Features:
 * - Multiple log levels (DEBUG, INFO, WARNING, CRITICAL)
 * - Auto-demotion of INFO logs after configurable uptime
 * - Multiple output sinks (console, Slack)
 * - Scoped child loggers sharing one level and sink set
 */

import { formatLogMessage, shouldLog } from './helpers';

import type { LogLevel, LogLevels, Logger, LoggerConfig, LoggerDependencies, InitMessage, SinkWithLevel } from './types';

/**
 * Create a logger instance
 *
 * @param config - Logger configuration (level, demoteHours)
 * @param dependencies - External dependencies (timeSource, sinks)
 * @param logLevels - Log level constants object
 * @returns Logger instance with log methods
 *
 * @example
 * ```typescript
 * const logger = createLogger(
 *   { level: LOG_LEVELS.INFO, demoteHours: 24 },
 *   {
 *     timeSource: now,
 *     sinks: [
 *       { sink: consoleSink, minLevel: LOG_LEVELS.INFO },
 *       { sink: slackSink, minLevel: LOG_LEVELS.WARNING }
 *     ]
 *   },
 *   LOG_LEVELS
 * );
 *
 * logger.scoped('ledger').info('Zone lawn: balance -4.00mm');
 * ```
 */
export function createLogger(
  config: LoggerConfig,
  dependencies: LoggerDependencies,
  logLevels: LogLevels
): Logger {
  let currentLevel = config.level;
  const timeSource = dependencies.timeSource;
  const sinks: SinkWithLevel[] = dependencies.sinks;
  const startTime = timeSource();

  function write(level: LogLevel, msg: string): void {
    const context = {
      currentLevel: currentLevel,
      uptime: timeSource() - startTime,
      demoteHours: config.demoteHours
    };
    if (!shouldLog(level, context, logLevels)) {
      return;
    }

    const formattedMessage = formatLogMessage(level, msg, logLevels);

    for (let i = 0; i < sinks.length; i++) {
      if (level < sinks[i].minLevel) {
        continue;
      }

      try {
        sinks[i].sink.write(formattedMessage);
      } catch (err) {
        // A broken sink must not take the caller down with it
        console.warn('Logger sink error: ' + String(err));
      }
    }
  }

  function setLevel(newLevel: LogLevel): void {
    currentLevel = newLevel;
  }

  function getLevel(): LogLevel {
    return currentLevel;
  }

  async function initialize(): Promise<InitMessage[]> {
    const pending: Promise<InitMessage>[] = [];
    for (let i = 0; i < sinks.length; i++) {
      const sink = sinks[i].sink;
      if (sink.initialize) {
        pending.push(sink.initialize());
      }
    }
    return Promise.all(pending);
  }

  async function close(): Promise<void> {
    const pending: Promise<void>[] = [];
    for (let i = 0; i < sinks.length; i++) {
      const sink = sinks[i].sink;
      if (sink.close) {
        pending.push(sink.close());
      }
    }
    await Promise.all(pending);
  }

  /**
   * Build the public logger around a message prefix
   * @param prefix - Text prepended to every message ('' for the root logger)
   * @returns Logger view
   */
  function view(prefix: string): Logger {
    function log(level: LogLevel, msg: string): void {
      write(level, prefix + msg);
    }

    return {
      log: log,
      debug: function(msg: string) { log(logLevels.DEBUG, msg); },
      info: function(msg: string) { log(logLevels.INFO, msg); },
      warning: function(msg: string) { log(logLevels.WARNING, msg); },
      critical: function(msg: string) { log(logLevels.CRITICAL, msg); },
      setLevel: setLevel,
      getLevel: getLevel,
      scoped: function(scope: string) { return view(prefix + '[' + scope + '] '); },
      initialize: initialize,
      close: close
    };
  }

  return view('');
}
