/**
 * Logging type definitions
 *
 * Types for the logging system including:
 * - Logger interface and configuration
 * - Sink interfaces (console, slack)
 * - Filter context
 * - Initialization messages
 */

import type { TimerAPI } from '$types/host';

// ═══════════════════════════════════════════════════════════════
// LOG LEVEL TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Log level (matches CONFIG.LOG_LEVELS values)
 */
export type LogLevel = 0 | 1 | 2 | 3; // DEBUG | INFO | WARNING | CRITICAL

/**
 * Log level constants structure
 * Passed to pure functions instead of importing CONFIG
 */
export interface LogLevels {
  DEBUG: 0;
  INFO: 1;
  WARNING: 2;
  CRITICAL: 3;
}

// ═══════════════════════════════════════════════════════════════
// LOGGER TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Main logger interface
 * Provides leveled logging methods and runtime configuration
 */
export interface Logger {
  /** Log at specified level */
  log(level: LogLevel, msg: string): void;
  debug(msg: string): void;
  info(msg: string): void;
  warning(msg: string): void;
  critical(msg: string): void;
  /** Update log level at runtime (shared with scoped loggers) */
  setLevel(newLevel: LogLevel): void;
  getLevel(): LogLevel;
  /** Logger that prefixes every message with "[scope] " */
  scoped(scope: string): Logger;
  /** Initialize all sinks, resolving with one message per sink */
  initialize(): Promise<InitMessage[]>;
  /** Flush and stop all sinks */
  close(): Promise<void>;
}

/**
 * Logger configuration
 */
export interface LoggerConfig {
  /** Current log level (0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL) */
  level: LogLevel;
  /** Hours after which to auto-demote INFO logs (0 to disable) */
  demoteHours: number;
}

/**
 * Sink with its minimum log level
 */
export interface SinkWithLevel {
  sink: LogSink;
  /** Minimum level this sink receives (filters before buffering) */
  minLevel: LogLevel;
}

/**
 * Logger external dependencies
 */
export interface LoggerDependencies {
  /** Function returning current time in seconds */
  timeSource: () => number;
  sinks: SinkWithLevel[];
}

// ═══════════════════════════════════════════════════════════════
// SINK TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Base sink interface
 * Level filtering happens in logger before write() is called
 */
export interface LogSink {
  /** Write formatted message to sink (already filtered by level) */
  write(formattedMessage: string): void;
  /** Optional initialization (e.g. start timers, check a webhook) */
  initialize?(): Promise<InitMessage>;
  /** Optional shutdown: deliver what is buffered, stop timers */
  close?(): Promise<void>;
}

/**
 * Console sink interface
 * Buffers messages and drains at fixed interval
 */
export interface ConsoleSink extends LogSink {
  initialize(): Promise<InitMessage>;
  close(): Promise<void>;
  /** Write every buffered message immediately */
  flush(): void;
  getBufferSize(): number;
}

/**
 * Console sink configuration
 */
export interface ConsoleSinkConfig {
  /** Maximum messages in buffer before dropping */
  bufferSize: number;
  /** Interval between draining messages (ms) */
  drainInterval: number;
}

/**
 * Console API interface
 * Abstraction over global console for testability
 */
export interface ConsoleAPI {
  log(message: string): void;
  warn(message: string): void;
}

/**
 * Slack sink interface
 * Buffers failed messages and retries with exponential backoff
 */
export interface SlackSink extends LogSink {
  initialize(): Promise<InitMessage>;
  close(): Promise<void>;
  isInitialized(): boolean;
  getBufferSize(): number;
}

/**
 * Slack sink configuration
 */
export interface SlackSinkConfig {
  enabled: boolean;
  /** Incoming webhook URL (empty when not configured) */
  webhookUrl: string;
  /** Maximum messages in retry buffer before dropping oldest */
  bufferSize: number;
  /** Initial retry delay in ms (exponential: 1000 -> 2000 -> 4000...) */
  retryDelayMs: number;
  /** Maximum retry attempts before dropping message */
  maxRetries: number;
}

/**
 * Minimal fetch signature used by the Slack sink
 */
export type FetchLike = (url: string, init: { method: string; headers: Record<string, string>; body: string }) => Promise<{ ok: boolean; status: number }>;

/**
 * Slack sink external dependencies
 */
export interface SlackSinkDependencies {
  fetch: FetchLike;
  timer: TimerAPI;
  console: ConsoleAPI;
}

// ═══════════════════════════════════════════════════════════════
// FILTER TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Context for log filtering decisions
 */
export interface FilterContext {
  currentLevel: LogLevel;
  /** System uptime in seconds */
  uptime: number;
  /** Hours after which to demote INFO logs */
  demoteHours: number;
}

// ═══════════════════════════════════════════════════════════════
// INITIALIZATION TYPES
// ═══════════════════════════════════════════════════════════════

/**
 * Initialization result message
 * Returned by sinks during initialization
 */
export interface InitMessage {
  success: boolean;
  /** Human-readable status message */
  message: string;
}
