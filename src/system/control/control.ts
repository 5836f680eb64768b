/**
 * Control facade
 *
 * Single entry point for the outer surfaces: inbound events, zone status,
 * manual overrides and the on-demand ET trigger.
 */

import { calculateZoneRuntime } from '@core/irrigation-runtime';
import { MESSAGE_TYPES } from '@events/types';
import { ValidationError, ZoneNotFoundError } from '$types/errors';
import { fmtMm } from '@logging';
import { isFiniteNumber } from '@utils/number';

import type { ZoneConfig } from '$types/config';
import type { Controller, ControllerDependencies, ZoneStatus } from './types';

export function createController(deps: ControllerDependencies): Controller {
  const config = deps.config;
  const state = deps.state;

  function findZone(zoneId: string): ZoneConfig {
    const zone = config.ZONES.find((z) => z.id === zoneId);
    if (zone === undefined) {
      throw new ZoneNotFoundError(zoneId);
    }
    return zone;
  }

  function statusOf(zone: ZoneConfig): ZoneStatus {
    const balance = deps.ledger.getZone(zone.id);
    const tracker = state.trackers[zone.id];
    const lastOffAt = tracker === undefined ? null : tracker.lastOffAt;
    const forecast = state.latest.forecast_rain;

    return {
      id: zone.id,
      name: zone.name,
      valveEntity: zone.valveEntity,
      precipitationRate: zone.precipitationRate,
      cropCoefficient: zone.cropCoefficient,
      balanceMm: balance.balanceMm,
      lastEtDate: balance.lastEtDate,
      requiredRuntimeSec: deps.ledger.requiredRuntimeSeconds(zone.id),
      plan: calculateZoneRuntime(
        {
          balanceMm: balance.balanceMm,
          forecastRainMm: forecast === undefined ? 0 : forecast.value,
          lastOffAt: lastOffAt,
          now: deps.timeSource()
        },
        zone
      ),
      runtimeTodaySec: tracker === undefined ? 0 : tracker.runtimeTodaySec,
      valveOpen: tracker !== undefined && tracker.openRunStart !== null,
      lastOffAt: lastOffAt,
    };
  }

  return {
    handleSensorEvent: function(entityId, entityState, timestamp) {
      return deps.dispatcher.dispatch({
        type: MESSAGE_TYPES.SENSOR,
        entityId: entityId,
        state: entityState,
        timestamp: timestamp ?? deps.timeSource()
      });
    },

    handleValveEvent: function(entityId, entityState, timestamp) {
      return deps.dispatcher.dispatch({
        type: MESSAGE_TYPES.VALVE,
        entityId: entityId,
        state: entityState,
        timestamp: timestamp ?? deps.timeSource()
      });
    },

    listZones: function() {
      return config.ZONES.map(statusOf);
    },

    getZone: function(zoneId) {
      return statusOf(findZone(zoneId));
    },

    setBalance: function(zoneId, balanceMm) {
      const zone = findZone(zoneId);
      const min = config.BALANCE_OVERRIDE_MIN_MM;
      const max = config.BALANCE_OVERRIDE_MAX_MM;
      if (!isFiniteNumber(balanceMm) || balanceMm < min || balanceMm > max) {
        throw new ValidationError('Balance must be between ' + min + ' and ' + max + ' mm (got ' + balanceMm + ')');
      }

      deps.ledger.setBalance(zone.id, balanceMm);
      deps.logger.info('Zone ' + zone.id + ': balance set to ' + fmtMm(balanceMm) + ' by override');
      return statusOf(zone);
    },

    calculateEt: function(request) {
      return deps.runCycle(request);
    },

    getWeather: function() {
      return {
        latest: { ...state.latest },
        lastEtReport: state.lastEtReport
      };
    }
  };
}
