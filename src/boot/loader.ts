/**
 * Configuration loader
 *
 * Layers, lowest first: USER_CONFIG defaults, the JSON config file,
 * environment variables. The result is not validated here; init runs
 * validateConfig on it.
 */

import fs from 'node:fs';

import { ConfigValidationError } from '$types/errors';
import { parseLogLevel } from '@logging';
import { isFiniteNumber } from '@utils/number';
import { isRecord } from '@validation';

import { APP_CONSTANTS, USER_CONFIG, ZONE_DEFAULTS } from './config';

import type { IrrigationConfig, IrrigationUserConfig, SensorEntities, ZoneConfig } from '$types/config';
import type { LogLevel } from '@logging';

export const DEFAULT_CONFIG_PATH = 'config/irrigation.json';

type Env = Readonly<Record<string, string | undefined>>;
type Fields = Record<string, unknown>;

// ═══════════════════════════════════════════════════════════════
// FIELD READERS
// ═══════════════════════════════════════════════════════════════

function readNumber(source: Fields, key: string, fallback: number): number {
  const value = source[key];
  if (value === undefined) return fallback;
  if (!isFiniteNumber(value)) {
    throw new ConfigValidationError(key + ' must be a number');
  }
  return value;
}

function readString(source: Fields, key: string, fallback: string): string {
  const value = source[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'string') {
    throw new ConfigValidationError(key + ' must be a string');
  }
  return value;
}

function readOptionalString(source: Fields, key: string): string | undefined {
  const value = source[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigValidationError(key + ' must be a string');
  }
  return value;
}

function readBoolean(source: Fields, key: string, fallback: boolean): boolean {
  const value = source[key];
  if (value === undefined) return fallback;
  if (typeof value !== 'boolean') {
    throw new ConfigValidationError(key + ' must be a boolean');
  }
  return value;
}

function readLogLevel(source: Fields, key: string, fallback: LogLevel): LogLevel {
  const value = source[key];
  if (value === undefined) return fallback;
  const level = parseLogLevel(value);
  if (level === null) {
    throw new ConfigValidationError(key + ' must be a log level (0-3 or DEBUG/INFO/WARNING/CRITICAL)');
  }
  return level;
}

// ═══════════════════════════════════════════════════════════════
// SECTIONS
// ═══════════════════════════════════════════════════════════════

function readSensorEntities(value: unknown, fallback: SensorEntities): SensorEntities {
  if (value === undefined) return fallback;
  if (!isRecord(value)) {
    throw new ConfigValidationError('SENSOR_ENTITIES must be an object');
  }

  return {
    temperature: readString(value, 'temperature', fallback.temperature),
    humidity: readString(value, 'humidity', fallback.humidity),
    precipitation: readString(value, 'precipitation', fallback.precipitation),
    wind: readOptionalString(value, 'wind'),
    solar: readOptionalString(value, 'solar'),
    pressure: readOptionalString(value, 'pressure'),
    forecastRain: readOptionalString(value, 'forecastRain'),
  };
}

/**
 * Build a zone from its JSON entry, filling ZONE_DEFAULTS
 * @param value - Entry from the ZONES array
 * @param index - Position for error messages
 */
export function readZone(value: unknown, index: number): ZoneConfig {
  if (!isRecord(value)) {
    throw new ConfigValidationError('ZONES[' + index + '] must be an object');
  }

  const id = readString(value, 'id', '');
  if (id === '') {
    throw new ConfigValidationError('ZONES[' + index + '].id is required');
  }

  return {
    id: id,
    name: readString(value, 'name', id),
    valveEntity: readString(value, 'valveEntity', ''),
    precipitationRate: readNumber(value, 'precipitationRate', ZONE_DEFAULTS.precipitationRate),
    cropCoefficient: readNumber(value, 'cropCoefficient', ZONE_DEFAULTS.cropCoefficient),
    minRuntimeSec: readNumber(value, 'minRuntimeSec', ZONE_DEFAULTS.minRuntimeSec),
    maxRuntimeSec: readNumber(value, 'maxRuntimeSec', ZONE_DEFAULTS.maxRuntimeSec),
    minimumIntervalSec: readNumber(value, 'minimumIntervalSec', ZONE_DEFAULTS.minimumIntervalSec),
  };
}

function readZones(value: unknown, fallback: readonly ZoneConfig[]): readonly ZoneConfig[] {
  if (value === undefined) return fallback;
  if (!Array.isArray(value)) {
    throw new ConfigValidationError('ZONES must be an array');
  }
  return value.map(readZone);
}

/**
 * Apply a parsed JSON config file over the defaults
 * @param file - Parsed file contents
 * @param base - Defaults
 */
export function applyFileConfig(file: unknown, base: IrrigationUserConfig = USER_CONFIG): IrrigationUserConfig {
  if (!isRecord(file)) {
    throw new ConfigValidationError('Config file must contain a JSON object');
  }

  return {
    LATITUDE: readNumber(file, 'LATITUDE', base.LATITUDE),
    LONGITUDE: readNumber(file, 'LONGITUDE', base.LONGITUDE),
    ELEVATION_M: readNumber(file, 'ELEVATION_M', base.ELEVATION_M),
    TIMEZONE: readString(file, 'TIMEZONE', base.TIMEZONE),
    SENSOR_ENTITIES: readSensorEntities(file.SENSOR_ENTITIES, base.SENSOR_ENTITIES),
    ZONES: readZones(file.ZONES, base.ZONES),
    ET_CRON: readString(file, 'ET_CRON', base.ET_CRON),
    ET_CATCH_UP_ON_BOOT: readBoolean(file, 'ET_CATCH_UP_ON_BOOT', base.ET_CATCH_UP_ON_BOOT),
    OVERRIDE_RESETS_ET_GUARD: readBoolean(file, 'OVERRIDE_RESETS_ET_GUARD', base.OVERRIDE_RESETS_ET_GUARD),
    STATE_FILE: readString(file, 'STATE_FILE', base.STATE_FILE),
    HTTP_PORT: readNumber(file, 'HTTP_PORT', base.HTTP_PORT),
    API_TOKEN: readString(file, 'API_TOKEN', base.API_TOKEN),
    SLACK_ENABLED: readBoolean(file, 'SLACK_ENABLED', base.SLACK_ENABLED),
    SLACK_LOG_LEVEL: readLogLevel(file, 'SLACK_LOG_LEVEL', base.SLACK_LOG_LEVEL),
    SLACK_WEBHOOK_URL: readString(file, 'SLACK_WEBHOOK_URL', base.SLACK_WEBHOOK_URL),
    SLACK_BUFFER_SIZE: readNumber(file, 'SLACK_BUFFER_SIZE', base.SLACK_BUFFER_SIZE),
    SLACK_RETRY_DELAY_SEC: readNumber(file, 'SLACK_RETRY_DELAY_SEC', base.SLACK_RETRY_DELAY_SEC),
    CONSOLE_ENABLED: readBoolean(file, 'CONSOLE_ENABLED', base.CONSOLE_ENABLED),
    CONSOLE_LOG_LEVEL: readLogLevel(file, 'CONSOLE_LOG_LEVEL', base.CONSOLE_LOG_LEVEL),
    CONSOLE_BUFFER_SIZE: readNumber(file, 'CONSOLE_BUFFER_SIZE', base.CONSOLE_BUFFER_SIZE),
    CONSOLE_INTERVAL_MS: readNumber(file, 'CONSOLE_INTERVAL_MS', base.CONSOLE_INTERVAL_MS),
    GLOBAL_LOG_LEVEL: readLogLevel(file, 'GLOBAL_LOG_LEVEL', base.GLOBAL_LOG_LEVEL),
    GLOBAL_LOG_AUTO_DEMOTE_HOURS: readNumber(file, 'GLOBAL_LOG_AUTO_DEMOTE_HOURS', base.GLOBAL_LOG_AUTO_DEMOTE_HOURS),
  };
}

// ═══════════════════════════════════════════════════════════════
// ENVIRONMENT
// ═══════════════════════════════════════════════════════════════

function envNumber(env: Env, key: string, fallback: number): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!isFiniteNumber(value)) {
    throw new ConfigValidationError(key + ' must be a number (got "' + raw + '")');
  }
  return value;
}

function envString(env: Env, key: string, fallback: string): string {
  const raw = env[key];
  return raw === undefined || raw === '' ? fallback : raw;
}

/**
 * Apply environment overrides
 * @param config - Configuration after the file layer
 * @param env - Environment (process.env after dotenv)
 */
export function applyEnvOverrides(config: IrrigationUserConfig, env: Env): IrrigationUserConfig {
  const webhook = envString(env, 'SLACK_WEBHOOK_URL', config.SLACK_WEBHOOK_URL);
  const logLevelRaw = env.LOG_LEVEL;
  let logLevel = config.GLOBAL_LOG_LEVEL;
  if (logLevelRaw !== undefined && logLevelRaw !== '') {
    const parsed = parseLogLevel(logLevelRaw);
    if (parsed === null) {
      throw new ConfigValidationError('LOG_LEVEL must be a log level (got "' + logLevelRaw + '")');
    }
    logLevel = parsed;
  }

  return {
    ...config,
    LATITUDE: envNumber(env, 'LATITUDE', config.LATITUDE),
    LONGITUDE: envNumber(env, 'LONGITUDE', config.LONGITUDE),
    ELEVATION_M: envNumber(env, 'ELEVATION_M', config.ELEVATION_M),
    TIMEZONE: envString(env, 'TIMEZONE', config.TIMEZONE),
    HTTP_PORT: envNumber(env, 'PORT', config.HTTP_PORT),
    API_TOKEN: envString(env, 'API_TOKEN', config.API_TOKEN),
    GLOBAL_LOG_LEVEL: logLevel,
    SLACK_WEBHOOK_URL: webhook,
    SLACK_ENABLED: config.SLACK_ENABLED || (env.SLACK_WEBHOOK_URL !== undefined && env.SLACK_WEBHOOK_URL !== ''),
    STATE_FILE: envString(env, 'STATE_FILE', config.STATE_FILE),
    ET_CRON: envString(env, 'ET_CRON', config.ET_CRON),
  };
}

/**
 * Load the complete configuration
 * @param env - Environment (process.env after dotenv)
 * @returns Defaults overridden by the config file and the environment, plus app constants
 * @throws ConfigValidationError when the file or an override has the wrong type
 */
export function loadConfig(env: Env): IrrigationConfig {
  const path = envString(env, 'IRRIGATION_CONFIG', DEFAULT_CONFIG_PATH);

  let user: IrrigationUserConfig = USER_CONFIG;
  if (fs.existsSync(path)) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(path, 'utf8'));
    } catch (err) {
      throw new ConfigValidationError('Cannot parse ' + path + ': ' + String(err));
    }
    user = applyFileConfig(parsed);
  } else if (env.IRRIGATION_CONFIG !== undefined) {
    throw new ConfigValidationError('Config file not found: ' + path);
  }

  return { ...APP_CONSTANTS, ...applyEnvOverrides(user, env) };
}
