export { createInitialState, restoreState, restoredBalances, toPersistedState } from './state';
export type { ControllerState, EtReport, LatestReading, PersistedState, ZoneEtReport } from './types';
