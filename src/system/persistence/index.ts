export { createStateStore, readStateFile, writeStateFile } from './persistence';
export { isPersistedState } from './helpers';
export type { StateStore } from './types';
