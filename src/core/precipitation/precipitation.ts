/**
 * Cumulative precipitation counter handling
 *
 * Rain gauges report a running total. Rainfall is the increase between
 * consecutive readings; a decrease is a counter reset and an implausibly large
 * jump is a sensor fault. In both cases the new reading becomes the baseline.
 */

import { AnomalousDeltaError } from '$types/errors';

import type { CounterTotal, CounterUpdate } from './types';

/**
 * Largest increase between two readings accepted as real rainfall (mm)
 */
export const MAX_PRECIPITATION_DELTA_MM = 200;

/**
 * Compare a counter reading with the previous one
 * @param previous - Previous accepted reading (null before the first one)
 * @param current - New reading, already range-validated
 * @param maxDeltaMm - Anomaly threshold
 * @returns What the reading means for the balance
 */
export function evaluateCounterReading(
  previous: number | null,
  current: number,
  maxDeltaMm: number = MAX_PRECIPITATION_DELTA_MM
): CounterUpdate {
  if (previous === null) {
    return { kind: 'baseline', baseline: current };
  }

  const delta = current - previous;

  if (delta === 0) {
    return { kind: 'unchanged', baseline: current };
  }

  if (delta < 0) {
    return { kind: 'rollover', previous: previous, baseline: current };
  }

  if (delta > maxDeltaMm) {
    return {
      kind: 'anomaly',
      baseline: current,
      error: new AnomalousDeltaError(
        'Precipitation counter jumped ' + delta.toFixed(1) + 'mm (' + previous + ' -> ' + current + '), limit ' + maxDeltaMm + 'mm'
      )
    };
  }

  return { kind: 'rain', mm: delta, baseline: current };
}

/**
 * Sum the rainfall represented by chronologically ordered counter readings
 * @param readings - Counter values, oldest first
 * @param maxDeltaMm - Anomaly threshold
 * @returns Total rain plus the anomalies and rollovers seen
 */
export function sumCounterIncreases(
  readings: readonly number[],
  maxDeltaMm: number = MAX_PRECIPITATION_DELTA_MM
): CounterTotal {
  let previous: number | null = null;
  let totalMm = 0;
  let rollovers = 0;
  const anomalies: AnomalousDeltaError[] = [];

  for (let i = 0; i < readings.length; i++) {
    const update = evaluateCounterReading(previous, readings[i], maxDeltaMm);

    if (update.kind === 'rain') {
      totalMm += update.mm;
    } else if (update.kind === 'rollover') {
      rollovers++;
    } else if (update.kind === 'anomaly') {
      anomalies.push(update.error);
    }

    previous = update.baseline;
  }

  return { totalMm: totalMm, anomalies: anomalies, rollovers: rollovers };
}
