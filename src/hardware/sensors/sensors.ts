/**
 * Weather sensor entity parsing
 */

import { isFiniteNumber } from '@utils/number';

import type { SensorEntities } from '$types/config';
import type { EntityState } from '../types';
import type { EntityKind } from './types';

const UNAVAILABLE_STATES = ['unknown', 'unavailable', 'none', ''];

/**
 * Parse a numeric entity state
 * @param state - Raw state
 * @returns The number, or null when the entity has no usable value
 */
export function parseNumericState(state: EntityState): number | null {
  if (typeof state === 'number') {
    return isFiniteNumber(state) ? state : null;
  }
  if (typeof state !== 'string') {
    return null;
  }

  const trimmed = state.trim();
  if (UNAVAILABLE_STATES.indexOf(trimmed.toLowerCase()) !== -1) {
    return null;
  }

  const value = Number(trimmed);
  return isFiniteNumber(value) ? value : null;
}

/**
 * Find what a configured entity measures
 * @param entityId - Entity id from an inbound event
 * @param entities - Configured sensor entities
 * @returns The kind, or null for an entity that is not configured
 */
export function resolveSensorKind(entityId: string, entities: SensorEntities): EntityKind | null {
  if (entityId === entities.temperature) return 'temperature';
  if (entityId === entities.humidity) return 'humidity';
  if (entityId === entities.precipitation) return 'precipitation';
  if (entities.wind !== undefined && entityId === entities.wind) return 'wind';
  if (entities.solar !== undefined && entityId === entities.solar) return 'solar';
  if (entities.pressure !== undefined && entityId === entities.pressure) return 'pressure';
  if (entities.forecastRain !== undefined && entityId === entities.forecastRain) return 'forecast_rain';
  return null;
}
