/**
 * Host service abstractions
 *
 * Injected into modules instead of reaching for globals so tests can
 * substitute fakes.
 */

/**
 * Handle returned by TimerAPI.set
 */
export type TimerHandle = number;

/**
 * Timer API (setTimeout/setInterval wrapper)
 */
export interface TimerAPI {
  /**
   * Schedule a callback
   * @param ms - Delay in milliseconds
   * @param repeat - Whether to repeat at the same interval
   * @param callback - Function to call
   */
  set(ms: number, repeat: boolean, callback: () => void): TimerHandle;
  /** Cancel a scheduled callback */
  clear(handle: TimerHandle): void;
}

/**
 * One stored value from the historical time-series collaborator
 */
export interface HistoryPoint {
  readonly value: number;
  readonly timestamp: number;
}

/**
 * Historical time-series query collaborator
 */
export interface HistoryAPI {
  /** Values recorded for an entity in [start, end), oldest first */
  query(entityId: string, start: number, end: number): Promise<HistoryPoint[]>;
  /** Epoch seconds from which the series are complete */
  availableSince(): number;
}
