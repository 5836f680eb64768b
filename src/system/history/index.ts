export { createHistoryRecorder } from './history';
export type { HistoryRecorder, HistoryRecorderConfig } from './types';
