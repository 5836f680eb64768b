/**
 * Common type definitions used throughout the project
 */

/**
 * Meteorological quantity a sensor reports
 */
export type SensorKind = 'temperature' | 'humidity' | 'precipitation' | 'wind' | 'solar' | 'pressure';

/**
 * All sensor kinds in canonical order
 */
export const SENSOR_KINDS: readonly SensorKind[] = ['temperature', 'humidity', 'precipitation', 'wind', 'solar', 'pressure'];

/**
 * Sensor reading - null when the entity is unknown/unavailable
 */
export type Reading = number | null;

/**
 * One validated reading. Timestamp is epoch seconds.
 */
export interface WeatherSample {
  readonly kind: SensorKind;
  readonly value: number;
  readonly timestamp: number;
}

/**
 * Reference evapotranspiration formula
 */
export type EtMethod = 'penman_monteith' | 'priestley_taylor' | 'hargreaves';

/**
 * Static site location
 */
export interface Location {
  /** Decimal degrees, north positive */
  readonly latitude: number;
  /** Decimal degrees, east positive */
  readonly longitude: number;
  /** Metres above sea level */
  readonly elevation: number;
}

/**
 * Half-open time window [start, end) in epoch seconds
 */
export interface TimeWindow {
  readonly start: number;
  readonly end: number;
}

/**
 * Inclusive physical bounds for one sensor kind
 */
export interface SensorRange {
  readonly min: number;
  readonly max: number;
  readonly unit: string;
}

/**
 * Range table keyed by sensor kind
 */
export type SensorRangeTable = Readonly<Record<SensorKind, SensorRange>>;
