import type { SensorKind } from '$types/common';

/**
 * What a configured entity id measures. The forecast entity feeds the runtime
 * plan and is never validated against a sensor range.
 */
export type EntityKind = SensorKind | 'forecast_rain';
