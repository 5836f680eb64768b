/**
 * Daily weather aggregation
 *
 * Turns the validated samples of one day into the statistics the ET formulas
 * consume. Sampling may be irregular and optional sensors may be missing
 * entirely; missing kinds simply stay null.
 */

import { MAX_PRECIPITATION_DELTA_MM, sumCounterIncreases } from '@core/precipitation';

import { accumulate, createAccumulator, formatValue, meanOf } from './helpers';

import type { SensorKind, TimeWindow, WeatherSample } from '$types/common';
import type { AnomalousDeltaError } from '$types/errors';
import type { DailyWeatherAggregate, FieldAccumulator } from './types';

/**
 * Aggregate validated samples over a window
 *
 * Temperature, humidity, wind, solar and pressure are averaged. Precipitation
 * is the sum of counter increases between consecutive readings, using the same
 * anomaly and rollover rules as live rain updates.
 *
 * @param samples - Validated samples in any order
 * @param window - [start, end) in epoch seconds; samples outside are ignored
 * @param onAnomaly - Called for each discarded precipitation jump
 * @param maxDeltaMm - Precipitation anomaly threshold
 * @returns Daily aggregate
 */
export function aggregateDailyWeather(
  samples: readonly WeatherSample[],
  window: TimeWindow,
  onAnomaly?: (error: AnomalousDeltaError) => void,
  maxDeltaMm: number = MAX_PRECIPITATION_DELTA_MM
): DailyWeatherAggregate {
  const fields: Record<SensorKind, FieldAccumulator> = {
    temperature: createAccumulator(),
    humidity: createAccumulator(),
    precipitation: createAccumulator(),
    wind: createAccumulator(),
    solar: createAccumulator(),
    pressure: createAccumulator(),
  };
  const rain: WeatherSample[] = [];

  for (let i = 0; i < samples.length; i++) {
    const sample = samples[i];
    if (sample.timestamp < window.start || sample.timestamp >= window.end) {
      continue;
    }

    accumulate(fields[sample.kind], sample.value);
    if (sample.kind === 'precipitation') {
      rain.push(sample);
    }
  }

  let precipitationMm: number | null = null;
  if (rain.length > 0) {
    rain.sort(function(a, b) { return a.timestamp - b.timestamp; });
    const total = sumCounterIncreases(rain.map(function(s) { return s.value; }), maxDeltaMm);
    precipitationMm = total.totalMm;
    if (onAnomaly) {
      total.anomalies.forEach(onAnomaly);
    }
  }

  return {
    window: window,
    temperatureMean: meanOf(fields.temperature),
    temperatureMin: fields.temperature.min,
    temperatureMax: fields.temperature.max,
    humidityMean: meanOf(fields.humidity),
    precipitationMm: precipitationMm,
    windMean: meanOf(fields.wind),
    solarMean: meanOf(fields.solar),
    pressureMean: meanOf(fields.pressure),
    counts: {
      temperature: fields.temperature.count,
      humidity: fields.humidity.count,
      precipitation: fields.precipitation.count,
      wind: fields.wind.count,
      solar: fields.solar.count,
      pressure: fields.pressure.count,
    },
  };
}

/**
 * Format an aggregate for logging
 * @param aggregate - Daily aggregate
 * @param date - Date string (YYYY-MM-DD format)
 * @returns One-line summary
 */
export function formatDailyWeather(aggregate: DailyWeatherAggregate, date: string): string {
  return 'Weather (' + date + '): T ' + formatValue(aggregate.temperatureMean, 1, 'C') +
    ' [' + formatValue(aggregate.temperatureMin, 1, '') + '/' + formatValue(aggregate.temperatureMax, 1, '') + ']' +
    ', RH ' + formatValue(aggregate.humidityMean, 0, '%') +
    ', Rain ' + formatValue(aggregate.precipitationMm, 1, 'mm') +
    ', Wind ' + formatValue(aggregate.windMean, 1, 'km/h') +
    ', Solar ' + formatValue(aggregate.solarMean, 0, 'W/m2') +
    ', P ' + formatValue(aggregate.pressureMean, 0, 'hPa') +
    ' (' + aggregate.counts.temperature + ' samples)';
}
