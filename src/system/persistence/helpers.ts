/**
 * State file shape checks
 */

import { isFiniteNumber } from '@utils/number';
import { isIsoDate } from '@utils/time';
import { isRecord } from '@validation';

import type { RuntimeTrackerState } from '@features/runtime-tracker';
import type { ZoneBalance } from '@system/ledger';
import type { EtReport, PersistedState, ZoneEtReport } from '@system/state';
import type { EtMethod } from '$types/common';

function isNullableNumber(value: unknown): value is number | null {
  return value === null || isFiniteNumber(value);
}

function isEtMethod(value: unknown): value is EtMethod {
  return value === 'penman_monteith' || value === 'priestley_taylor' || value === 'hargreaves';
}

export function isZoneBalance(value: unknown): value is ZoneBalance {
  if (!isRecord(value) || !isFiniteNumber(value.balanceMm)) return false;
  if (value.lastEtDate !== null && !isIsoDate(value.lastEtDate)) return false;

  const record = value.etApplied;
  if (!isRecord(record)) return false;
  return Object.keys(record).every((date) => isIsoDate(date) && isFiniteNumber(record[date]));
}

export function isTrackerState(value: unknown): value is RuntimeTrackerState {
  return isRecord(value) &&
    isNullableNumber(value.openRunStart) &&
    isNullableNumber(value.lastOffAt) &&
    isFiniteNumber(value.runtimeTodaySec);
}

function isZoneEtReport(value: unknown): value is ZoneEtReport {
  return isRecord(value) &&
    typeof value.zoneId === 'string' &&
    isFiniteNumber(value.etcMm) &&
    (value.outcome === 'applied' || value.outcome === 'replaced' || value.outcome === 'skipped');
}

export function isEtReport(value: unknown): value is EtReport {
  return isRecord(value) &&
    isIsoDate(value.date) &&
    (value.method === null || isEtMethod(value.method)) &&
    isNullableNumber(value.et0Mm) &&
    Array.isArray(value.zones) && value.zones.every(isZoneEtReport) &&
    (value.skippedReason === null || typeof value.skippedReason === 'string') &&
    isFiniteNumber(value.computedAt);
}

/**
 * Check a parsed state file
 * @param value - Parsed JSON
 * @returns True when every field has the expected type
 */
export function isPersistedState(value: unknown): value is PersistedState {
  if (!isRecord(value) || value.version !== 1 || !isFiniteNumber(value.savedAt)) return false;
  if (!isNullableNumber(value.precipitationBaseline)) return false;
  if (value.lastEtReport !== null && !isEtReport(value.lastEtReport)) return false;

  const zones = value.zones;
  if (!isRecord(zones)) return false;
  return Object.keys(zones).every((zoneId) => {
    const zone = zones[zoneId];
    return isRecord(zone) && isZoneBalance(zone.balance) && isTrackerState(zone.runtime);
  });
}
