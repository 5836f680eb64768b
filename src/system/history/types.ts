import type { HistoryAPI } from '$types/host';

export interface HistoryRecorderConfig {
  /** Samples older than this (s) are pruned on the next record */
  readonly retentionSec: number;
  /** Current time in epoch seconds */
  readonly timeSource: () => number;
  /** Start of complete coverage; the creation time when absent */
  readonly availableSince?: number;
}

/**
 * In-process store behind the historical query interface
 */
export interface HistoryRecorder extends HistoryAPI {
  record(entityId: string, value: number, timestamp: number): void;
}
