/**
 * Logging module barrel export
 *
 * The logging system includes:
 * - Logger coordinator (createLogger)
 * - Console sink with buffering (createConsoleSink)
 * - Slack sink with webhook retry (createSlackSink)
 * - Pure filter and format functions
 */

export { formatLogMessage, shouldLog, fmtMm, parseLogLevel } from './helpers';
export { createConsoleSink } from './console';
export { createSlackSink } from './slack';
export { createLogger } from './logger';

export type {
  LogLevel,
  LogLevels,
  Logger,
  LoggerConfig,
  LoggerDependencies,
  SinkWithLevel,
  LogSink,
  ConsoleSink,
  ConsoleSinkConfig,
  ConsoleAPI,
  SlackSink,
  SlackSinkConfig,
  SlackSinkDependencies,
  FetchLike,
  FilterContext,
  InitMessage
} from './types';
