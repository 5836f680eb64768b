/**
 * Sprinkler runtime tracking
 *
 * Converts valve on/off edges into applied water. A run is credited only when
 * its closing edge is observed; a run still open when the process stops is
 * discarded on the next start.
 */

import { IncompleteRunError } from '$types/errors';
import { SECONDS_PER_HOUR } from '@utils/time';

import type { DiscardResult, RuntimeTrackerState, TransitionResult } from './types';

/**
 * Fresh tracker state for a new zone
 */
export function createRuntimeTrackerState(): RuntimeTrackerState {
  return {
    openRunStart: null,
    lastOffAt: null,
    runtimeTodaySec: 0,
  };
}

/**
 * Water delivered by a run
 * @param durationSec - Run length
 * @param precipitationRate - Sprinkler rate (mm/h)
 * @returns Depth in mm
 */
export function waterForDuration(durationSec: number, precipitationRate: number): number {
  return (durationSec / SECONDS_PER_HOUR) * precipitationRate;
}

/**
 * Apply one valve transition
 * @param state - Current tracker state
 * @param on - New valve state
 * @param timestamp - Time of the transition
 * @param precipitationRate - Zone sprinkler rate (mm/h)
 * @returns New state and what the edge meant (immutable)
 */
export function handleValveTransition(
  state: RuntimeTrackerState,
  on: boolean,
  timestamp: number,
  precipitationRate: number
): TransitionResult {
  if (on) {
    if (state.openRunStart !== null) {
      // Same run; keep the original start
      return { state: state, transition: { kind: 'extended', start: state.openRunStart } };
    }
    return {
      state: { ...state, openRunStart: timestamp },
      transition: { kind: 'opened', start: timestamp }
    };
  }

  if (state.openRunStart === null) {
    return { state: state, transition: { kind: 'ignored' } };
  }

  const durationSec = Math.max(0, timestamp - state.openRunStart);

  return {
    state: {
      openRunStart: null,
      lastOffAt: timestamp,
      runtimeTodaySec: state.runtimeTodaySec + durationSec,
    },
    transition: {
      kind: 'closed',
      run: { start: state.openRunStart, end: timestamp, durationSec: durationSec },
      waterAddedMm: waterForDuration(durationSec, precipitationRate),
    }
  };
}

/**
 * Drop a run restored from a previous process
 * @param state - Restored tracker state
 * @param zoneId - Zone for the error message
 */
export function discardIncompleteRun(state: RuntimeTrackerState, zoneId: string): DiscardResult {
  if (state.openRunStart === null) {
    return { state: state, error: null };
  }

  return {
    state: { ...state, openRunStart: null },
    error: new IncompleteRunError(
      'Zone ' + zoneId + ': run started at ' + state.openRunStart + ' has no closing edge, discarded'
    )
  };
}

/**
 * Start a new runtime-today period
 */
export function resetDailyRuntime(state: RuntimeTrackerState): RuntimeTrackerState {
  if (state.runtimeTodaySec === 0) return state;
  return { ...state, runtimeTodaySec: 0 };
}
