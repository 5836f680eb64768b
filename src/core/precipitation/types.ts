/**
 * Type definitions for cumulative precipitation counters
 */

import type { AnomalousDeltaError } from '$types/errors';

/**
 * Result of comparing a counter reading with the previous baseline.
 * Every variant carries the baseline to use for the next reading.
 */
export type CounterUpdate =
  | { readonly kind: 'baseline'; readonly baseline: number }
  | { readonly kind: 'unchanged'; readonly baseline: number }
  | { readonly kind: 'rain'; readonly mm: number; readonly baseline: number }
  | { readonly kind: 'rollover'; readonly previous: number; readonly baseline: number }
  | { readonly kind: 'anomaly'; readonly error: AnomalousDeltaError; readonly baseline: number };

/**
 * Rainfall summed over a sequence of counter readings
 */
export interface CounterTotal {
  readonly totalMm: number;
  readonly anomalies: readonly AnomalousDeltaError[];
  readonly rollovers: number;
}
