/**
 * Inbound event dispatcher
 *
 * Routes sensor and valve messages to the history, the precipitation counter,
 * the runtime trackers and the ledger. Every handler runs synchronously, so a
 * message is applied completely before the next one or any ET application.
 */

import { evaluateCounterReading } from '@core/precipitation';
import { validateReading } from '@core/sensor-range';
import { createRuntimeTrackerState, handleValveTransition } from '@features/runtime-tracker';
import { parseNumericState, resolveSensorKind } from '@hardware/sensors';
import { findZoneByValve, parseSwitchState } from '@hardware/valves';
import { MESSAGE_TYPES } from '@events/types';
import { fmtMm } from '@logging';

import type { SensorKind } from '$types/common';
import type { SensorStateMessage, ValveStateMessage } from '@events/types';
import type { Dispatcher, DispatcherDependencies, DispatchOutcome } from './types';

/**
 * Create the dispatcher
 * @param deps - Shared state and collaborators
 */
export function createDispatcher(deps: DispatcherDependencies): Dispatcher {
  const config = deps.config;
  const logger = deps.logger;

  // ═══════════════════════════════════════════════════════════════
  // PRECIPITATION COUNTER
  // ═══════════════════════════════════════════════════════════════

  function handlePrecipitation(value: number, timestamp: number): DispatchOutcome {
    const update = evaluateCounterReading(deps.state.precipitationBaseline, value, config.MAX_PRECIPITATION_DELTA_MM);
    deps.state.precipitationBaseline = update.baseline;
    deps.state.latest.precipitation = { value: value, timestamp: timestamp };
    deps.onChange();

    switch (update.kind) {
      case 'rain':
        deps.ledger.addRainAll(update.mm);
        logger.info('Rain +' + fmtMm(update.mm) + ' credited to ' + config.ZONES.length + ' zone(s)');
        return { kind: 'rain', mm: update.mm };
      case 'anomaly':
        logger.warning(update.error.message + ', discarded');
        return { kind: 'rejected', error: update.error };
      case 'rollover':
        logger.info('Precipitation counter reset (' + update.previous + ' -> ' + value + '), baseline re-anchored');
        break;
      case 'baseline':
        logger.debug('Precipitation baseline ' + fmtMm(value));
        break;
      case 'unchanged':
        break;
    }

    return { kind: 'recorded', sensor: 'precipitation', value: value };
  }

  // ═══════════════════════════════════════════════════════════════
  // SENSOR STREAM
  // ═══════════════════════════════════════════════════════════════

  function handleSensor(message: SensorStateMessage): DispatchOutcome {
    const kind = resolveSensorKind(message.entityId, config.SENSOR_ENTITIES);
    if (kind === null) {
      logger.debug('Ignoring unconfigured entity ' + message.entityId);
      return { kind: 'ignored', reason: 'Entity not configured' };
    }

    const value = parseNumericState(message.state);
    if (value === null) {
      logger.debug(message.entityId + ': state ' + JSON.stringify(message.state) + ' is not numeric, ignored');
      return { kind: 'ignored', reason: 'State is not numeric' };
    }

    if (kind === 'forecast_rain') {
      const forecast = Math.max(0, value);
      deps.state.latest.forecast_rain = { value: forecast, timestamp: message.timestamp };
      logger.debug('Forecast rain ' + fmtMm(forecast));
      return { kind: 'recorded', sensor: kind, value: forecast };
    }

    // Raw values go to history; the daily cycle validates them again
    deps.history.record(message.entityId, value, message.timestamp);

    const sensorKind: SensorKind = kind;
    const check = validateReading(sensorKind, value, config.SENSOR_RANGES);
    if (!check.valid) {
      logger.warning(message.entityId + ': ' + check.error.message + ', discarded');
      return { kind: 'rejected', error: check.error };
    }

    if (sensorKind === 'precipitation') {
      return handlePrecipitation(check.value, message.timestamp);
    }

    deps.state.latest[sensorKind] = { value: check.value, timestamp: message.timestamp };
    logger.debug(message.entityId + ' = ' + check.value);
    return { kind: 'recorded', sensor: sensorKind, value: check.value };
  }

  // ═══════════════════════════════════════════════════════════════
  // VALVE STREAM
  // ═══════════════════════════════════════════════════════════════

  function handleValve(message: ValveStateMessage): DispatchOutcome {
    const zone = findZoneByValve(message.entityId, config.ZONES);
    if (zone === null) {
      logger.debug('Ignoring valve ' + message.entityId + ' (no zone)');
      return { kind: 'ignored', reason: 'Valve not assigned to a zone' };
    }

    const on = parseSwitchState(message.state);
    if (on === null) {
      logger.debug('Zone ' + zone.id + ': valve state ' + JSON.stringify(message.state) + ' ignored');
      return { kind: 'ignored', reason: 'State is not on/off' };
    }

    const tracker = deps.state.trackers[zone.id] ?? createRuntimeTrackerState();
    const result = handleValveTransition(tracker, on, message.timestamp, zone.precipitationRate);
    deps.state.trackers[zone.id] = result.state;

    const transition = result.transition;
    switch (transition.kind) {
      case 'opened':
        logger.info('Zone ' + zone.id + ': valve opened');
        break;
      case 'extended':
        logger.debug('Zone ' + zone.id + ': valve already open since ' + transition.start);
        break;
      case 'closed':
        deps.ledger.addIrrigation(zone.id, transition.waterAddedMm);
        logger.info(
          'Zone ' + zone.id + ': valve closed after ' + transition.run.durationSec + 's, +' + fmtMm(transition.waterAddedMm)
        );
        break;
      case 'ignored':
        logger.debug('Zone ' + zone.id + ': valve off without an open run');
        break;
    }

    deps.onChange();
    return { kind: 'valve', zoneId: zone.id, transition: transition };
  }

  return {
    dispatch: function(message) {
      if (message.type === MESSAGE_TYPES.SENSOR) {
        return handleSensor(message);
      }
      return handleValve(message);
    }
  };
}
