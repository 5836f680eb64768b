/**
 * Valve/switch entity parsing
 */

import type { ZoneConfig } from '$types/config';
import type { EntityState } from '../types';

/**
 * Parse a switch state
 * @param state - Raw state
 * @returns true for on, false for off, null for anything else
 */
export function parseSwitchState(state: EntityState): boolean | null {
  if (typeof state === 'boolean') return state;
  if (typeof state !== 'string') return null;

  const normalised = state.trim().toLowerCase();
  if (normalised === 'on') return true;
  if (normalised === 'off') return false;
  return null;
}

/**
 * Find the zone driven by a valve entity
 */
export function findZoneByValve(valveEntity: string, zones: readonly ZoneConfig[]): ZoneConfig | null {
  for (const zone of zones) {
    if (zone.valveEntity === valveEntity) return zone;
  }
  return null;
}
