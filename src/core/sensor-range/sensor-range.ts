/**
 * Sensor range validation
 *
 * Shared by the live push path and the historical query path: a reading that
 * fails here never reaches the ledger or the daily aggregate.
 */

import { SensorRangeError } from '$types/errors';
import { isFiniteNumber } from '@utils/number';

import type { SensorKind, SensorRangeTable, WeatherSample } from '$types/common';
import type { RangeCheck } from './types';

/**
 * Physically plausible bounds, inclusive
 */
export const SENSOR_RANGES: SensorRangeTable = {
  temperature: { min: -50, max: 60, unit: '°C' },
  humidity: { min: 0, max: 100, unit: '%' },
  precipitation: { min: 0, max: 500, unit: 'mm' },
  wind: { min: 0, max: 200, unit: 'km/h' },
  solar: { min: 0, max: 1500, unit: 'W/m²' },
  pressure: { min: 800, max: 1100, unit: 'hPa' },
};

/**
 * Validate one reading against its kind's range
 * @param kind - Sensor kind
 * @param value - Raw value
 * @param ranges - Range table (defaults to SENSOR_RANGES)
 * @returns The value unchanged, or the rejection
 */
export function validateReading(kind: SensorKind, value: number, ranges: SensorRangeTable = SENSOR_RANGES): RangeCheck {
  const range = ranges[kind];

  if (!isFiniteNumber(value)) {
    return { valid: false, error: new SensorRangeError(kind + ' reading is not a finite number (got ' + value + ')') };
  }

  if (value < range.min || value > range.max) {
    return {
      valid: false,
      error: new SensorRangeError(
        kind + ' reading ' + value + range.unit + ' outside ' + range.min + '..' + range.max + range.unit
      )
    };
  }

  return { valid: true, value: value };
}

/**
 * Keep only samples that pass validation
 * @param samples - Candidate samples
 * @param onReject - Called once per rejected sample
 * @param ranges - Range table (defaults to SENSOR_RANGES)
 * @returns Samples in their original order
 */
export function filterValidSamples(
  samples: readonly WeatherSample[],
  onReject: (sample: WeatherSample, error: SensorRangeError) => void,
  ranges: SensorRangeTable = SENSOR_RANGES
): WeatherSample[] {
  const accepted: WeatherSample[] = [];

  for (let i = 0; i < samples.length; i++) {
    const check = validateReading(samples[i].kind, samples[i].value, ranges);
    if (check.valid) {
      accepted.push(samples[i]);
    } else {
      onReject(samples[i], check.error);
    }
  }

  return accepted;
}
