/**
 * Logging helper functions
 */

import type { LogLevel, LogLevels, FilterContext } from './types';

/**
 * Format a water depth for log lines
 * @param mm - Depth in millimetres (null when unknown)
 * @returns Signed value with two decimals, e.g. "-4.25mm"
 */
export function fmtMm(mm: number | null): string {
  if (mm === null) return 'n/a';
  return mm.toFixed(2) + 'mm';
}

/**
 * Format log message with level tag
 *
 * - DEBUG: "[DEBUG]    "
 * - INFO: "ℹ️ [INFO]     "
 * - WARNING: "⚠️ [WARNING]  "
 * - CRITICAL: "🚨 [CRITICAL] "
 *
 * @param level - Log level (0=DEBUG, 1=INFO, 2=WARNING, 3=CRITICAL)
 * @param msg - Message to format
 * @param logLevels - Log level constants object
 * @returns Formatted log line with level tag prefix
 */
export function formatLogMessage(level: LogLevel, msg: string, logLevels: LogLevels): string {
  let tag = '[DEBUG]    ';
  if (level === logLevels.INFO) tag = 'ℹ️ [INFO]     ';
  if (level === logLevels.WARNING) tag = '⚠️ [WARNING]  ';
  if (level === logLevels.CRITICAL) tag = '🚨 [CRITICAL] ';

  return tag + msg;
}

/**
 * Check if message should be logged based on level and auto-demotion
 *
 * Filtering rules:
 * 1. Message level must be >= current level
 * 2. INFO logs are suppressed after demoteHours uptime
 *    (only when not in DEBUG mode, and demoteHours > 0)
 *
 * @param level - Log level to check
 * @param context - Filtering context with currentLevel, uptime, demoteHours
 * @param logLevels - Log level constants object
 * @returns True if message should be logged, false to suppress
 */
export function shouldLog(level: LogLevel, context: FilterContext, logLevels: LogLevels): boolean {
  if (level < context.currentLevel) {
    return false;
  }

  if (level === logLevels.INFO &&
      context.currentLevel > logLevels.DEBUG &&
      context.demoteHours > 0) {
    if (context.uptime > context.demoteHours * 3600) {
      return false;
    }
  }

  return true;
}

/**
 * Narrow a number or level name to a LogLevel
 * @param value - 0-3 or DEBUG/INFO/WARNING/CRITICAL (case-insensitive)
 * @returns Log level, or null when the value is not a level
 */
export function parseLogLevel(value: unknown): LogLevel | null {
  if (typeof value === 'string') {
    const name = value.trim().toUpperCase();
    if (name === 'DEBUG') return 0;
    if (name === 'INFO') return 1;
    if (name === 'WARNING' || name === 'WARN') return 2;
    if (name === 'CRITICAL') return 3;
    if (name === '') return null;
    return parseLogLevel(Number(name));
  }

  if (value === 0 || value === 1 || value === 2 || value === 3) {
    return value;
  }

  return null;
}
