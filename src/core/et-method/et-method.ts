/**
 * ET method selection
 *
 * | wind | solar | method           |
 * |------|-------|------------------|
 * | yes  | yes   | Penman-Monteith  |
 * | no   | yes   | Priestley-Taylor |
 * | yes  | no    | Priestley-Taylor |
 * | no   | no    | Hargreaves       |
 *
 * Wind alone does not unlock Penman-Monteith. Priestley-Taylor without a solar
 * sensor estimates radiation from the temperature range.
 */

import { InsufficientDataError } from '$types/errors';

import type { EtMethod } from '$types/common';
import type { DailyWeatherAggregate } from '@features/daily-weather';
import type { InputAvailability, MethodSelection, RequiredField } from './types';

export const ET_METHOD_LABELS: Readonly<Record<EtMethod, string>> = {
  penman_monteith: 'Penman-Monteith',
  priestley_taylor: 'Priestley-Taylor',
  hargreaves: 'Hargreaves',
};

/**
 * Pick a method from input availability alone
 * @param inputs - Whether wind and solar are present
 * @returns Most complete method the inputs support
 */
export function methodFor(inputs: InputAvailability): EtMethod {
  if (inputs.solar && inputs.wind) return 'penman_monteith';
  if (inputs.solar || inputs.wind) return 'priestley_taylor';
  return 'hargreaves';
}

/**
 * Select the ET method for a daily aggregate
 * @param aggregate - Daily weather aggregate
 * @returns Selected method, or the missing mandatory fields
 */
export function selectEtMethod(aggregate: DailyWeatherAggregate): MethodSelection {
  const missing: RequiredField[] = [];
  if (aggregate.temperatureMean === null) missing.push('temperature');
  if (aggregate.humidityMean === null) missing.push('humidity');

  if (missing.length > 0) {
    return {
      ok: false,
      missing: missing,
      error: new InsufficientDataError('No ' + missing.join(' or ') + ' samples in window; ET cannot be computed')
    };
  }

  return {
    ok: true,
    method: methodFor({ wind: aggregate.windMean !== null, solar: aggregate.solarMean !== null })
  };
}
