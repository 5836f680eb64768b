/**
 * Validation helper functions
 * Reusable checks for configuration and untyped JSON input
 */

import { isFiniteNumber, isInteger } from '@utils/number';

import type { IssueCollector, NumberRange } from './types';

// ═══════════════════════════════════════════════════════════════
// COLLECTOR
// ═══════════════════════════════════════════════════════════════

export function createCollector(): IssueCollector {
  return { errors: [], warnings: [] };
}

/**
 * Record a problem that stops the service from starting
 */
export function addError(out: IssueCollector, field: string, message: string): void {
  out.errors.push({ field: field, message: message });
}

/**
 * Record a value that works but is probably a mistake
 */
export function addWarning(out: IssueCollector, field: string, message: string): void {
  out.warnings.push({ field: field, message: message });
}

// ═══════════════════════════════════════════════════════════════
// FIELD CHECKS
// Each check skips undefined; required fields are checked by the caller.
// ═══════════════════════════════════════════════════════════════

export function checkBoolean(out: IssueCollector, field: string, value: unknown): void {
  if (value !== undefined && typeof value !== 'boolean') {
    addError(out, field, `${field} must be a boolean (got ${typeof value})`);
  }
}

export function checkNonEmptyString(out: IssueCollector, field: string, value: unknown): void {
  if (value === undefined) return;

  if (typeof value !== 'string' || value.trim() === '') {
    addError(out, field, `${field} must be a non-empty string`);
  }
}

/**
 * Check a number against hard bounds, then the recommended pair
 *
 * Out-of-bounds, NaN and Infinity are errors; outside the recommended
 * pair is a warning.
 *
 * @param out - Collector to append to
 * @param field - Dotted field path
 * @param value - Value to check
 * @param range - Accepted bounds
 */
export function checkRange(out: IssueCollector, field: string, value: number | undefined, range: NumberRange): void {
  if (value === undefined) return;

  if (range.integer && isFiniteNumber(value) && !isInteger(value)) {
    addError(out, field, `${field} must be an integer (got ${value})`);
    return;
  }

  if (!isFiniteNumber(value) || value < range.min || value > range.max) {
    addError(out, field, `${field} must be between ${range.min} and ${range.max} (got ${value})`);
    return;
  }

  const recommended = range.recommended;
  if (recommended !== undefined && (value < recommended[0] || value > recommended[1])) {
    addWarning(out, field, `${field} is outside recommended range ${recommended[0]}-${recommended[1]} (got ${value})`);
  }
}

// ═══════════════════════════════════════════════════════════════
// SHAPE VALIDATORS
// ═══════════════════════════════════════════════════════════════

/**
 * Check that a value is a plain object
 * @param value - Value to check
 * @returns True for non-null, non-array objects
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
