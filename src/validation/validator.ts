/**
 * Configuration validator
 *
 * Critical violations are errors and stop the service from starting;
 * values outside the recommended ranges are warnings.
 */

import * as cron from 'node-cron';

import { isValidTimeZone } from '@utils/time';

import { addError, addWarning, checkBoolean, checkNonEmptyString, checkRange, createCollector } from './helpers';

import type { IrrigationUserConfig, SensorEntities, ZoneConfig } from '$types/config';
import type { IssueCollector, NumberRange, ValidationResult } from './types';

const LOG_LEVEL_RANGE: NumberRange = { min: 0, max: 3, integer: true };

const SENSOR_ENTITY_FIELDS: readonly (keyof SensorEntities)[] = [
  'temperature',
  'humidity',
  'precipitation',
  'wind',
  'solar',
  'pressure',
  'forecastRain'
];

function validateSensorEntities(out: IssueCollector, entities: SensorEntities): void {
  const seen = new Map<string, string>();

  SENSOR_ENTITY_FIELDS.forEach((key) => {
    const field = 'SENSOR_ENTITIES.' + key;
    const entityId = entities[key];

    if (entityId === undefined) {
      if (key === 'temperature' || key === 'humidity' || key === 'precipitation') {
        addError(out, field, `${field} is required`);
      }
      return;
    }

    checkNonEmptyString(out, field, entityId);

    const other = seen.get(entityId);
    if (other !== undefined) {
      addError(out, field, `${field} duplicates ${other} (${entityId})`);
    }
    seen.set(entityId, field);
  });
}

function validateZone(out: IssueCollector, zone: ZoneConfig, index: number): void {
  const prefix = 'ZONES[' + index + '].';

  checkNonEmptyString(out, prefix + 'id', zone.id);
  checkNonEmptyString(out, prefix + 'name', zone.name);
  checkNonEmptyString(out, prefix + 'valveEntity', zone.valveEntity);

  checkRange(out, prefix + 'precipitationRate', zone.precipitationRate, { min: 0.1, max: 200, recommended: [2, 60] });
  checkRange(out, prefix + 'cropCoefficient', zone.cropCoefficient, { min: 0.4, max: 2.0, recommended: [0.5, 1.2] });
  checkRange(out, prefix + 'minRuntimeSec', zone.minRuntimeSec, { min: 0, max: 86400, integer: true });
  checkRange(out, prefix + 'maxRuntimeSec', zone.maxRuntimeSec, { min: 1, max: 86400, recommended: [300, 7200], integer: true });
  checkRange(out, prefix + 'minimumIntervalSec', zone.minimumIntervalSec, { min: 0, max: 604800, integer: true });

  if (zone.maxRuntimeSec < zone.minRuntimeSec) {
    addError(out, prefix + 'maxRuntimeSec', `${prefix}maxRuntimeSec must be at least minRuntimeSec (${zone.minRuntimeSec})`);
  }
}

function validateZones(out: IssueCollector, zones: readonly ZoneConfig[]): void {
  if (zones.length === 0) {
    addError(out, 'ZONES', 'At least one zone must be configured');
    return;
  }

  const ids = new Set<string>();
  const valves = new Set<string>();

  zones.forEach((zone, index) => {
    validateZone(out, zone, index);

    if (ids.has(zone.id)) {
      addError(out, 'ZONES[' + index + '].id', `Duplicate zone id ${zone.id}`);
    }
    if (valves.has(zone.valveEntity)) {
      addError(out, 'ZONES[' + index + '].valveEntity', `Valve ${zone.valveEntity} drives more than one zone`);
    }
    ids.add(zone.id);
    valves.add(zone.valveEntity);
  });
}

/**
 * Validate user configuration
 * @param config - Merged user configuration
 * @returns Errors and warnings; valid when there are no errors
 */
export function validateConfig(config: IrrigationUserConfig): ValidationResult {
  const out = createCollector();

  // Location
  checkRange(out, 'LATITUDE', config.LATITUDE, { min: -90, max: 90 });
  checkRange(out, 'LONGITUDE', config.LONGITUDE, { min: -180, max: 180 });
  checkRange(out, 'ELEVATION_M', config.ELEVATION_M, { min: -500, max: 9000, recommended: [-100, 4000] });
  checkNonEmptyString(out, 'TIMEZONE', config.TIMEZONE);
  if (config.TIMEZONE && !isValidTimeZone(config.TIMEZONE)) {
    addError(out, 'TIMEZONE', `Unknown timezone ${config.TIMEZONE}`);
  }

  // Sensors and zones
  validateSensorEntities(out, config.SENSOR_ENTITIES);
  validateZones(out, config.ZONES);

  // Daily cycle
  if (!cron.validate(config.ET_CRON)) {
    addError(out, 'ET_CRON', `ET_CRON is not a valid cron expression (${config.ET_CRON})`);
  }
  checkBoolean(out, 'ET_CATCH_UP_ON_BOOT', config.ET_CATCH_UP_ON_BOOT);
  checkBoolean(out, 'OVERRIDE_RESETS_ET_GUARD', config.OVERRIDE_RESETS_ET_GUARD);

  // Persistence and API
  checkNonEmptyString(out, 'STATE_FILE', config.STATE_FILE);
  checkRange(out, 'HTTP_PORT', config.HTTP_PORT, { min: 1, max: 65535, integer: true });
  if (!config.API_TOKEN) {
    addWarning(out, 'API_TOKEN', 'API_TOKEN is not set; /api routes will refuse every request');
  }

  // Logging
  checkBoolean(out, 'SLACK_ENABLED', config.SLACK_ENABLED);
  checkRange(out, 'SLACK_LOG_LEVEL', config.SLACK_LOG_LEVEL, LOG_LEVEL_RANGE);
  checkRange(out, 'SLACK_BUFFER_SIZE', config.SLACK_BUFFER_SIZE, { min: 1, max: 100, integer: true });
  checkRange(out, 'SLACK_RETRY_DELAY_SEC', config.SLACK_RETRY_DELAY_SEC, { min: 1, max: 3600, recommended: [5, 300] });
  if (config.SLACK_ENABLED && !config.SLACK_WEBHOOK_URL) {
    addWarning(out, 'SLACK_WEBHOOK_URL', 'SLACK_ENABLED is true but SLACK_WEBHOOK_URL is empty');
  }

  checkBoolean(out, 'CONSOLE_ENABLED', config.CONSOLE_ENABLED);
  checkRange(out, 'CONSOLE_LOG_LEVEL', config.CONSOLE_LOG_LEVEL, LOG_LEVEL_RANGE);
  checkRange(out, 'CONSOLE_BUFFER_SIZE', config.CONSOLE_BUFFER_SIZE, { min: 1, max: 1000, integer: true });
  checkRange(out, 'CONSOLE_INTERVAL_MS', config.CONSOLE_INTERVAL_MS, { min: 1, max: 10000, integer: true });

  checkRange(out, 'GLOBAL_LOG_LEVEL', config.GLOBAL_LOG_LEVEL, LOG_LEVEL_RANGE);
  checkRange(out, 'GLOBAL_LOG_AUTO_DEMOTE_HOURS', config.GLOBAL_LOG_AUTO_DEMOTE_HOURS, { min: 0, max: 168 });

  return {
    valid: out.errors.length === 0,
    errors: out.errors,
    warnings: out.warnings
  };
}
