/**
 * Service state
 *
 * Creates the mutable state the dispatcher and scheduler share, either fresh
 * or restored from the state file. Runs left open by the previous process are
 * dropped here.
 */

import { createRuntimeTrackerState, discardIncompleteRun } from '@features/runtime-tracker';

import type { IncompleteRunError } from '$types/errors';
import type { Ledger, ZoneBalance } from '@system/ledger';
import type { ControllerState, PersistedState } from './types';

export * from './types';

/**
 * Create initial service state
 * @param zoneIds - Configured zone ids
 * @returns State with idle trackers and no precipitation baseline
 */
export function createInitialState(zoneIds: readonly string[]): ControllerState {
  const trackers: ControllerState['trackers'] = {};
  zoneIds.forEach((zoneId) => {
    trackers[zoneId] = createRuntimeTrackerState();
  });

  return {
    trackers: trackers,
    precipitationBaseline: null,
    latest: {},
    lastEtReport: null,
  };
}

/**
 * Restore state from the state file
 * @param zoneIds - Configured zone ids; other zones in the file are dropped
 * @param persisted - File contents
 * @returns Restored state and one error per discarded open run
 */
export function restoreState(
  zoneIds: readonly string[],
  persisted: PersistedState
): { state: ControllerState; discarded: IncompleteRunError[] } {
  const state = createInitialState(zoneIds);
  const discarded: IncompleteRunError[] = [];

  zoneIds.forEach((zoneId) => {
    const saved = persisted.zones[zoneId];
    if (saved === undefined) return;

    const result = discardIncompleteRun(saved.runtime, zoneId);
    state.trackers[zoneId] = result.state;
    if (result.error !== null) discarded.push(result.error);
  });

  state.precipitationBaseline = persisted.precipitationBaseline;
  state.lastEtReport = persisted.lastEtReport;

  return { state: state, discarded: discarded };
}

/**
 * Balances to seed the ledger with
 */
export function restoredBalances(persisted: PersistedState): Record<string, ZoneBalance> {
  const balances: Record<string, ZoneBalance> = {};
  Object.keys(persisted.zones).forEach((zoneId) => {
    balances[zoneId] = persisted.zones[zoneId].balance;
  });
  return balances;
}

/**
 * Build the state file contents
 * @param state - Service state
 * @param ledger - Zone ledger
 * @param savedAt - Epoch seconds
 */
export function toPersistedState(state: ControllerState, ledger: Ledger, savedAt: number): PersistedState {
  const balances = ledger.snapshot();
  const zones: PersistedState['zones'] = {};

  Object.keys(balances).forEach((zoneId) => {
    zones[zoneId] = {
      balance: balances[zoneId],
      runtime: state.trackers[zoneId] ?? createRuntimeTrackerState(),
    };
  });

  return {
    version: 1,
    savedAt: savedAt,
    zones: zones,
    precipitationBaseline: state.precipitationBaseline,
    lastEtReport: state.lastEtReport,
  };
}
