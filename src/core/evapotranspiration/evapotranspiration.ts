/**
 * Reference evapotranspiration
 *
 * Three daily ET₀ formulas over one DailyWeatherAggregate. Only temperature
 * and humidity are mandatory; every other input has a fallback so no formula
 * throws on a missing optional sensor:
 * - pressure: standard atmosphere at the site elevation
 * - solar: estimated from the temperature range
 * - wind: 2 m/s, the FAO-56 global default
 * Results are clamped at 0 mm/day.
 */

import { InsufficientDataError } from '$types/errors';
import { isFiniteNumber } from '@utils/number';

import {
  atmosphericPressure,
  clearSkyRadiation,
  dayOfYearUtc,
  degreesToRadians,
  estimateSolarRadiation,
  extraterrestrialRadiation,
  kmhToMs,
  meanSaturationVapourPressure,
  netLongwaveRadiation,
  netShortwaveRadiation,
  psychrometricConstant,
  saturationSlope,
  wattsToDailyMegajoules
} from './helpers';

import type { EtMethod, Location } from '$types/common';
import type { DailyWeatherAggregate } from '@features/daily-weather';
import type { EtInputs, EtResult } from './types';

const DEFAULT_WIND_MS = 2;
const PRIESTLEY_TAYLOR_ALPHA = 1.26;
/** Latent heat of vaporisation (MJ/kg) */
const LAMBDA = 2.45;

/**
 * Convert an aggregate into FAO-56 inputs
 * @param aggregate - Daily weather aggregate
 * @param location - Site location
 * @returns Inputs in formula units
 * @throws InsufficientDataError when temperature or humidity is missing
 */
export function toEtInputs(aggregate: DailyWeatherAggregate, location: Location): EtInputs {
  const tMean = aggregate.temperatureMean;
  const rhMean = aggregate.humidityMean;
  if (tMean === null || rhMean === null) {
    throw new InsufficientDataError('Temperature and humidity are required for ET');
  }

  const midpoint = (aggregate.window.start + aggregate.window.end) / 2;

  return {
    tMean: tMean,
    tMin: aggregate.temperatureMin ?? tMean,
    tMax: aggregate.temperatureMax ?? tMean,
    rhMean: rhMean,
    windMs: aggregate.windMean === null ? null : kmhToMs(aggregate.windMean),
    solarMj: aggregate.solarMean === null ? null : wattsToDailyMegajoules(aggregate.solarMean),
    pressureKpa: aggregate.pressureMean === null ? atmosphericPressure(location.elevation) : aggregate.pressureMean / 10,
    latitudeRad: degreesToRadians(location.latitude),
    elevation: location.elevation,
    dayOfYear: dayOfYearUtc(midpoint),
  };
}

/**
 * Net radiation Rn with measured or estimated solar radiation
 * @param inputs - Daily inputs
 * @returns Rn (MJ/m²/day)
 */
export function netRadiation(inputs: EtInputs): number {
  const ra = extraterrestrialRadiation(inputs.latitudeRad, inputs.dayOfYear);
  const rso = clearSkyRadiation(ra, inputs.elevation);
  const rs = inputs.solarMj ?? estimateSolarRadiation(ra, inputs.tMin, inputs.tMax);
  const es = meanSaturationVapourPressure(inputs.tMin, inputs.tMax);
  const ea = (inputs.rhMean / 100) * es;

  return netShortwaveRadiation(rs) - netLongwaveRadiation(inputs.tMin, inputs.tMax, ea, rs, rso);
}

/**
 * FAO-56 Penman-Monteith (eq. 6, soil heat flux 0 for daily steps)
 */
export function penmanMonteith(inputs: EtInputs): number {
  const delta = saturationSlope(inputs.tMean);
  const gamma = psychrometricConstant(inputs.pressureKpa);
  const u2 = inputs.windMs ?? DEFAULT_WIND_MS;
  const es = meanSaturationVapourPressure(inputs.tMin, inputs.tMax);
  const ea = (inputs.rhMean / 100) * es;
  const rn = netRadiation(inputs);

  const numerator = 0.408 * delta * rn + gamma * (900 / (inputs.tMean + 273)) * u2 * (es - ea);
  const denominator = delta + gamma * (1 + 0.34 * u2);
  return numerator / denominator;
}

/**
 * Priestley-Taylor with α = 1.26
 */
export function priestleyTaylor(inputs: EtInputs): number {
  const delta = saturationSlope(inputs.tMean);
  const gamma = psychrometricConstant(inputs.pressureKpa);

  return PRIESTLEY_TAYLOR_ALPHA * (delta / (delta + gamma)) * netRadiation(inputs) / LAMBDA;
}

/**
 * Hargreaves-Samani (eq. 52)
 */
export function hargreaves(inputs: EtInputs): number {
  const ra = extraterrestrialRadiation(inputs.latitudeRad, inputs.dayOfYear);
  return 0.0023 * (inputs.tMean + 17.8) * Math.sqrt(Math.max(0, inputs.tMax - inputs.tMin)) * 0.408 * ra;
}

/**
 * Compute reference ET for one day
 * @param aggregate - Daily weather aggregate
 * @param location - Site location
 * @param method - Formula chosen by the selector
 * @returns ET₀ in mm/day, never negative
 * @throws InsufficientDataError when temperature or humidity is missing
 */
export function computeEt0(aggregate: DailyWeatherAggregate, location: Location, method: EtMethod): number {
  const inputs = toEtInputs(aggregate, location);

  let et0: number;
  if (method === 'penman_monteith') {
    et0 = penmanMonteith(inputs);
  } else if (method === 'priestley_taylor') {
    et0 = priestleyTaylor(inputs);
  } else {
    et0 = hargreaves(inputs);
  }

  return isFiniteNumber(et0) ? Math.max(0, et0) : 0;
}

/**
 * Scale reference ET by a zone's crop coefficient
 * @param method - Formula used for et0Mm
 * @param et0Mm - Reference ET (mm/day)
 * @param cropCoefficient - Zone Kc
 * @returns Zone ET result
 */
export function computeZoneEt(method: EtMethod, et0Mm: number, cropCoefficient: number): EtResult {
  return {
    method: method,
    et0Mm: et0Mm,
    cropCoefficient: cropCoefficient,
    etcMm: et0Mm * cropCoefficient,
  };
}
