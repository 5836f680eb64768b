export { SENSOR_RANGES, validateReading, filterValidSamples } from './sensor-range';
export type { RangeCheck } from './types';
