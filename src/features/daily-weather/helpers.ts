/**
 * Helper functions for daily weather aggregation
 */

import type { Reading } from '$types/common';
import type { FieldAccumulator } from './types';

/**
 * Update min/max tracking for a reading
 */
export function updateMinMax(
  current: Reading,
  min: Reading,
  max: Reading
): { min: Reading; max: Reading } {
  if (current === null) {
    return { min, max };
  }

  return {
    min: min === null || current < min ? current : min,
    max: max === null || current > max ? current : max,
  };
}

export function createAccumulator(): FieldAccumulator {
  return { sum: 0, count: 0, min: null, max: null };
}

/**
 * Add one value to an accumulator (MUTABLE)
 */
export function accumulate(acc: FieldAccumulator, value: number): void {
  const range = updateMinMax(value, acc.min, acc.max);
  acc.sum += value;
  acc.count++;
  acc.min = range.min;
  acc.max = range.max;
}

export function meanOf(acc: FieldAccumulator): Reading {
  return acc.count > 0 ? acc.sum / acc.count : null;
}

/**
 * Format a value for display, handling null values
 */
export function formatValue(value: Reading, decimals: number, unit: string): string {
  return value !== null ? value.toFixed(decimals) + unit : 'n/a';
}
