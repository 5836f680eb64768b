/**
 * Type definition for irrigation balance configuration
 */

import type { LogLevel, LogLevels } from '@logging';
import type { SensorRangeTable } from './common';

/**
 * One irrigation zone (one valve, one balance)
 */
export interface ZoneConfig {
  /** Stable identifier used in the API and state file */
  readonly id: string;
  readonly name: string;
  /** Entity id of the valve/switch driving this zone */
  readonly valveEntity: string;
  /** Sprinkler delivery rate in mm/hour (>0) */
  readonly precipitationRate: number;
  /** Crop coefficient Kc (0.4-2.0) */
  readonly cropCoefficient: number;
  readonly minRuntimeSec: number;
  readonly maxRuntimeSec: number;
  /** Minimum time after the valve closes before the zone may run again */
  readonly minimumIntervalSec: number;
}

/**
 * Entity ids of the weather sensors
 * Temperature, humidity and precipitation are mandatory
 */
export interface SensorEntities {
  readonly temperature: string;
  readonly humidity: string;
  readonly precipitation: string;
  readonly wind?: string;
  readonly solar?: string;
  readonly pressure?: string;
  /** Forecast rainfall (mm) used to shrink the effective deficit */
  readonly forecastRain?: string;
}

/**
 * User-configurable settings
 */
export interface IrrigationUserConfig {
  // ───────── LOCATION ─────────
  readonly LATITUDE: number;
  readonly LONGITUDE: number;
  readonly ELEVATION_M: number;
  readonly TIMEZONE: string;

  // ───────── SENSORS & ZONES ─────────
  readonly SENSOR_ENTITIES: SensorEntities;
  readonly ZONES: readonly ZoneConfig[];

  // ───────── DAILY ET CYCLE ─────────
  readonly ET_CRON: string;
  readonly ET_CATCH_UP_ON_BOOT: boolean;
  readonly OVERRIDE_RESETS_ET_GUARD: boolean;

  // ───────── PERSISTENCE ─────────
  readonly STATE_FILE: string;

  // ───────── HTTP API ─────────
  readonly HTTP_PORT: number;
  readonly API_TOKEN: string;

  // ───────── SLACK ─────────
  readonly SLACK_ENABLED: boolean;
  readonly SLACK_LOG_LEVEL: LogLevel;
  readonly SLACK_WEBHOOK_URL: string;
  readonly SLACK_BUFFER_SIZE: number;
  readonly SLACK_RETRY_DELAY_SEC: number;

  // ───────── CONSOLE ─────────
  readonly CONSOLE_ENABLED: boolean;
  readonly CONSOLE_LOG_LEVEL: LogLevel;
  readonly CONSOLE_BUFFER_SIZE: number;
  readonly CONSOLE_INTERVAL_MS: number;

  // ───────── GLOBAL LOGGING ─────────
  readonly GLOBAL_LOG_LEVEL: LogLevel;
  readonly GLOBAL_LOG_AUTO_DEMOTE_HOURS: number;
}

/**
 * Application constants
 * Engine constants that should rarely change
 */
export interface IrrigationAppConstants {
  readonly LOG_LEVELS: LogLevels;
  readonly SENSOR_RANGES: SensorRangeTable;
  readonly MAX_PRECIPITATION_DELTA_MM: number;
  readonly BALANCE_OVERRIDE_MIN_MM: number;
  readonly BALANCE_OVERRIDE_MAX_MM: number;
  readonly ET_RECORD_RETENTION_DAYS: number;
  readonly HISTORY_RETENTION_SEC: number;
  readonly SLACK_MAX_RETRIES: number;
}

/**
 * Complete configuration (user settings + app constants)
 */
export type IrrigationConfig = IrrigationUserConfig & IrrigationAppConstants;
