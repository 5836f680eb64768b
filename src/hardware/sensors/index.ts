export { parseNumericState, resolveSensorKind } from './sensors';
export type { EntityKind } from './types';
