/**
 * Daily ET cycle
 *
 * history -> validation -> daily aggregate -> method -> ET₀ -> per-zone ETc
 * -> ledger. The scheduled job, the boot catch-up and the on-demand trigger
 * all run this same function. History queries and the formulas finish
 * before any balance changes; each applyEt is a single synchronous call.
 */

import { ET_METHOD_LABELS, selectEtMethod } from '@core/et-method';
import { computeEt0, computeZoneEt } from '@core/evapotranspiration';
import { aggregateDailyWeather, formatDailyWeather } from '@features/daily-weather';
import { InsufficientDataError, ValidationError, ZoneNotFoundError } from '$types/errors';
import { fmtMm } from '@logging';
import { roundTo } from '@utils/number';
import { formatLocalDate, isIsoDate, localDayWindow, previousLocalDate } from '@utils/time';

import { collectSamples } from './helpers';

import type { ZoneConfig } from '$types/config';
import type { ApplyEtOutcome } from '@system/ledger';
import type { EtReport, ZoneEtReport } from '@system/state';
import type { EtCycleDependencies, EtCycleRequest } from './types';

function targetZones(zones: readonly ZoneConfig[], zoneId: string | undefined): readonly ZoneConfig[] {
  if (zoneId === undefined) return zones;

  const zone = zones.find((z) => z.id === zoneId);
  if (zone === undefined) {
    throw new ZoneNotFoundError(zoneId);
  }
  return [zone];
}

function resolveDate(request: EtCycleRequest, timestamp: number, timeZone: string): string {
  if (request.date === undefined) {
    return previousLocalDate(timestamp, timeZone);
  }
  if (!isIsoDate(request.date)) {
    throw new ValidationError('Date must be YYYY-MM-DD (got "' + request.date + '")');
  }

  // The current local day is still accumulating samples
  const today = formatLocalDate(timestamp, timeZone);
  if (request.date >= today) {
    throw new ValidationError('Date must be before ' + today + ' (got "' + request.date + '")');
  }
  return request.date;
}

function skipDay(deps: EtCycleDependencies, date: string, error: InsufficientDataError): EtReport {
  deps.logger.warning('ET skipped for ' + date + ': ' + error.message);

  const skipped: EtReport = {
    date: date,
    method: null,
    et0Mm: null,
    zones: [],
    skippedReason: error.message,
    computedAt: deps.timeSource(),
  };
  deps.state.lastEtReport = skipped;
  deps.onChange();
  return skipped;
}

function describeOutcome(zoneId: string, date: string, etcMm: number, outcome: ApplyEtOutcome): string {
  switch (outcome.kind) {
    case 'applied':
      return 'Zone ' + zoneId + ': ETc ' + fmtMm(etcMm) + ' applied for ' + date;
    case 'replaced':
      return 'Zone ' + zoneId + ': ETc ' + fmtMm(etcMm) + ' replaced ' + fmtMm(outcome.previousMm) + ' for ' + date;
    case 'skipped':
      return 'Zone ' + zoneId + ': ET for ' + date + ' already applied (last ' + outcome.lastEtDate + ')';
  }
}

/**
 * Run the ET pipeline for one local day
 * @param deps - Collaborators and shared state
 * @param request - Optional zone, date and force flag
 * @returns Report of what was applied; also stored as the last ET report
 * @throws ZoneNotFoundError for an unknown zone, ValidationError for a malformed, current or future date
 */
export async function runEtCycle(deps: EtCycleDependencies, request: EtCycleRequest = {}): Promise<EtReport> {
  const config = deps.config;
  const logger = deps.logger;

  const zones = targetZones(config.ZONES, request.zoneId);
  const date = resolveDate(request, deps.timeSource(), config.TIMEZONE);
  const force = request.force === true;

  // ═══════════════════════════════════════════════════════════════
  // WEATHER
  // ═══════════════════════════════════════════════════════════════

  const window = localDayWindow(date, config.TIMEZONE);
  const availableSince = deps.history.availableSince();
  if (availableSince > window.start) {
    return skipDay(deps, date, new InsufficientDataError(
      'History only available since ' + availableSince + ', after the start of the day; ET cannot be computed'
    ));
  }

  const samples = await collectSamples(
    deps.history,
    config.SENSOR_ENTITIES,
    window,
    (sample, error) => {
      logger.warning('History sample at ' + sample.timestamp + ' discarded: ' + error.message);
    },
    config.SENSOR_RANGES
  );

  const aggregate = aggregateDailyWeather(
    samples,
    window,
    (error) => {
      logger.warning(error.message + ', excluded from ' + date);
    },
    config.MAX_PRECIPITATION_DELTA_MM
  );
  logger.info(formatDailyWeather(aggregate, date));

  // ═══════════════════════════════════════════════════════════════
  // METHOD
  // ═══════════════════════════════════════════════════════════════

  const selection = selectEtMethod(aggregate);
  if (!selection.ok) {
    return skipDay(deps, date, selection.error);
  }

  // ═══════════════════════════════════════════════════════════════
  // ET₀ AND ZONES
  // ═══════════════════════════════════════════════════════════════

  const location = { latitude: config.LATITUDE, longitude: config.LONGITUDE, elevation: config.ELEVATION_M };
  const et0Mm = computeEt0(aggregate, location, selection.method);
  logger.info('ET₀ ' + fmtMm(et0Mm) + ' for ' + date + ' (' + ET_METHOD_LABELS[selection.method] + ')');

  const zoneReports: ZoneEtReport[] = [];
  zones.forEach((zone) => {
    const result = computeZoneEt(selection.method, et0Mm, zone.cropCoefficient);
    const outcome = deps.ledger.applyEt(zone.id, date, result.etcMm, force);
    const line = describeOutcome(zone.id, date, result.etcMm, outcome);

    if (outcome.kind === 'skipped') {
      logger.debug(line);
    } else {
      logger.info(line + ' (balance ' + fmtMm(deps.ledger.getBalance(zone.id)) + ')');
    }

    zoneReports.push({ zoneId: zone.id, etcMm: roundTo(result.etcMm, 2), outcome: outcome.kind });
  });

  const report: EtReport = {
    date: date,
    method: selection.method,
    et0Mm: roundTo(et0Mm, 2),
    zones: zoneReports,
    skippedReason: null,
    computedAt: deps.timeSource(),
  };
  deps.state.lastEtReport = report;
  deps.onChange();

  return report;
}
