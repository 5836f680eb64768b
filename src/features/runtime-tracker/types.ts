import type { IncompleteRunError } from '$types/errors';

/**
 * One closed valve-on to valve-off interval
 */
export interface IrrigationRun {
  readonly start: number;
  readonly end: number;
  readonly durationSec: number;
}

/**
 * Runtime tracking state for one zone
 */
export interface RuntimeTrackerState {
  /** Start of the open run, null while the valve is closed */
  readonly openRunStart: number | null;
  /** When the valve last closed, null if never */
  readonly lastOffAt: number | null;
  /** Seconds of closed runs since the last daily reset */
  readonly runtimeTodaySec: number;
}

/**
 * What a valve transition meant
 */
export type ValveTransition =
  | { readonly kind: 'opened'; readonly start: number }
  | { readonly kind: 'extended'; readonly start: number }
  | { readonly kind: 'closed'; readonly run: IrrigationRun; readonly waterAddedMm: number }
  | { readonly kind: 'ignored' };

export interface TransitionResult {
  readonly state: RuntimeTrackerState;
  readonly transition: ValveTransition;
}

/**
 * Outcome of discarding runs left open by a previous process
 */
export interface DiscardResult {
  readonly state: RuntimeTrackerState;
  readonly error: IncompleteRunError | null;
}
