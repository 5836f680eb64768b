/**
 * Zone balance ledger
 *
 * The only place balances change. Every operation is synchronous, so a
 * mutation for one zone can never interleave with another; callers do their
 * I/O and ET arithmetic first and hand the ledger a finished delta.
 */

import { differenceInCalendarDays, parseISO } from 'date-fns';

import { calculateRuntimeSeconds } from '@core/irrigation-runtime';
import { ValidationError, ZoneNotFoundError } from '$types/errors';
import { isIsoDate } from '@utils/time';
import { isFiniteNumber } from '@utils/number';

import type { ApplyEtOutcome, Ledger, LedgerOptions, LedgerZones, ZoneBalance } from './types';

/**
 * Fresh balance for a newly configured zone
 */
export function createZoneBalance(): ZoneBalance {
  return { balanceMm: 0, lastEtDate: null, etApplied: {} };
}

function copyZone(zone: ZoneBalance): ZoneBalance {
  return { balanceMm: zone.balanceMm, lastEtDate: zone.lastEtDate, etApplied: { ...zone.etApplied } };
}

function requireFlux(mm: number, label: string): void {
  if (!isFiniteNumber(mm) || mm < 0) {
    throw new ValidationError(label + ' must be a non-negative number (got ' + mm + ')');
  }
}

function withinRetention(date: string, latest: string, retentionDays: number): boolean {
  return differenceInCalendarDays(parseISO(latest), parseISO(date)) <= retentionDays;
}

function pruneEtRecord(record: Record<string, number>, latest: string, retentionDays: number): Record<string, number> {
  const kept: Record<string, number> = {};
  Object.keys(record).forEach((date) => {
    if (withinRetention(date, latest, retentionDays)) {
      kept[date] = record[date];
    }
  });
  return kept;
}

/**
 * Create a ledger for the configured zones
 * @param zones - Configured zones (id and precipitation rate)
 * @param options - Override policy, retention and change hook
 * @param restored - Balances loaded from the state file; unknown zones are dropped
 */
export function createLedger(
  zones: LedgerZones,
  options: LedgerOptions,
  restored: Record<string, ZoneBalance> = {}
): Ledger {
  const rates = new Map<string, number>();
  const balances = new Map<string, ZoneBalance>();

  zones.forEach((zone) => {
    rates.set(zone.id, zone.precipitationRate);
    const saved = restored[zone.id];
    balances.set(zone.id, saved === undefined ? createZoneBalance() : copyZone(saved));
  });

  function zoneOf(zoneId: string): ZoneBalance {
    const zone = balances.get(zoneId);
    if (zone === undefined) {
      throw new ZoneNotFoundError(zoneId);
    }
    return zone;
  }

  function changed(zoneId: string): void {
    if (options.onChange) options.onChange(zoneId);
  }

  function addRain(zoneId: string, mm: number): void {
    requireFlux(mm, 'Rain');
    zoneOf(zoneId).balanceMm += mm;
    changed(zoneId);
  }

  function addRainAll(mm: number): void {
    requireFlux(mm, 'Rain');
    balances.forEach((zone, zoneId) => {
      zone.balanceMm += mm;
      changed(zoneId);
    });
  }

  function addIrrigation(zoneId: string, mm: number): void {
    requireFlux(mm, 'Irrigation');
    zoneOf(zoneId).balanceMm += mm;
    changed(zoneId);
  }

  function applyEt(zoneId: string, date: string, etcMm: number, force: boolean = false): ApplyEtOutcome {
    const zone = zoneOf(zoneId);
    if (!isIsoDate(date)) {
      throw new ValidationError('ET date must be YYYY-MM-DD (got ' + date + ')');
    }
    requireFlux(etcMm, 'ETc');

    if (!force && zone.lastEtDate !== null && date <= zone.lastEtDate) {
      return { kind: 'skipped', lastEtDate: zone.lastEtDate };
    }
    // No record would survive for a forced date this old, so it could not be replaced later
    if (force && zone.lastEtDate !== null && !withinRetention(date, zone.lastEtDate, options.etRetentionDays)) {
      return { kind: 'skipped', lastEtDate: zone.lastEtDate };
    }

    const previous = zone.etApplied[date];
    const previousMm = force && previous !== undefined ? previous : 0;

    zone.balanceMm += previousMm - etcMm;
    zone.lastEtDate = zone.lastEtDate !== null && zone.lastEtDate > date ? zone.lastEtDate : date;
    zone.etApplied[date] = etcMm;
    zone.etApplied = pruneEtRecord(zone.etApplied, zone.lastEtDate, options.etRetentionDays);
    changed(zoneId);

    if (force && previous !== undefined) {
      return { kind: 'replaced', deltaMm: previousMm - etcMm, previousMm: previousMm };
    }
    return { kind: 'applied', deltaMm: -etcMm };
  }

  function setBalance(zoneId: string, mm: number): void {
    const zone = zoneOf(zoneId);
    if (!isFiniteNumber(mm)) {
      throw new ValidationError('Balance must be a finite number (got ' + mm + ')');
    }

    zone.balanceMm = mm;
    if (options.overrideResetsEtGuard) {
      zone.lastEtDate = null;
      zone.etApplied = {};
    }
    changed(zoneId);
  }

  function requiredRuntimeSeconds(zoneId: string): number {
    const zone = zoneOf(zoneId);
    return calculateRuntimeSeconds(-zone.balanceMm, rates.get(zoneId) ?? 0);
  }

  return {
    addRain: addRain,
    addRainAll: addRainAll,
    addIrrigation: addIrrigation,
    applyEt: applyEt,
    setBalance: setBalance,
    getBalance: function(zoneId) {
      return zoneOf(zoneId).balanceMm;
    },
    getZone: function(zoneId) {
      return copyZone(zoneOf(zoneId));
    },
    requiredRuntimeSeconds: requiredRuntimeSeconds,
    zoneIds: function() {
      return Array.from(balances.keys());
    },
    snapshot: function() {
      const out: Record<string, ZoneBalance> = {};
      balances.forEach((zone, zoneId) => {
        out[zoneId] = copyZone(zone);
      });
      return out;
    }
  };
}
