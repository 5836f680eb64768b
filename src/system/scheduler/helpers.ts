/**
 * History collection for the daily cycle
 */

import { filterValidSamples } from '@core/sensor-range';

import type { SensorKind, SensorRangeTable, TimeWindow, WeatherSample } from '$types/common';
import type { SensorEntities } from '$types/config';
import type { HistoryAPI } from '$types/host';
import type { SensorRangeError } from '$types/errors';

/**
 * Configured weather sensors with the kind each one measures
 * @param entities - Configured sensor entities
 * @returns Pairs in canonical kind order; the forecast entity is not a weather sensor
 */
export function configuredSensors(entities: SensorEntities): { kind: SensorKind; entityId: string }[] {
  const sensors: { kind: SensorKind; entityId: string }[] = [
    { kind: 'temperature', entityId: entities.temperature },
    { kind: 'humidity', entityId: entities.humidity },
    { kind: 'precipitation', entityId: entities.precipitation },
  ];

  if (entities.wind !== undefined) sensors.push({ kind: 'wind', entityId: entities.wind });
  if (entities.solar !== undefined) sensors.push({ kind: 'solar', entityId: entities.solar });
  if (entities.pressure !== undefined) sensors.push({ kind: 'pressure', entityId: entities.pressure });

  return sensors;
}

/**
 * Query every configured sensor for a window and keep the valid samples
 * @param history - Historical query collaborator
 * @param entities - Configured sensor entities
 * @param window - [start, end) in epoch seconds
 * @param onReject - Called once per discarded sample
 * @param ranges - Range table
 */
export async function collectSamples(
  history: HistoryAPI,
  entities: SensorEntities,
  window: TimeWindow,
  onReject: (sample: WeatherSample, error: SensorRangeError) => void,
  ranges: SensorRangeTable
): Promise<WeatherSample[]> {
  const sensors = configuredSensors(entities);
  const series = await Promise.all(sensors.map((s) => history.query(s.entityId, window.start, window.end)));

  const samples: WeatherSample[] = [];
  series.forEach((points, i) => {
    points.forEach((p) => {
      samples.push({ kind: sensors[i].kind, value: p.value, timestamp: p.timestamp });
    });
  });

  return filterValidSamples(samples, onReject, ranges);
}
