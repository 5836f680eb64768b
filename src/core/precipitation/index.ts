export { MAX_PRECIPITATION_DELTA_MM, evaluateCounterReading, sumCounterIncreases } from './precipitation';
export type { CounterUpdate, CounterTotal } from './types';
