/**
 * Unit tests for service state
 */

import { IncompleteRunError } from '$types/errors';
import { createLedger } from '@system/ledger';

import { createInitialState, restoreState, restoredBalances, toPersistedState } from './state';

import type { PersistedState } from './types';

const PERSISTED: PersistedState = {
  version: 1,
  savedAt: 5000,
  zones: {
    front: {
      balance: { balanceMm: -12, lastEtDate: '2024-06-14', etApplied: { '2024-06-14': 4 } },
      runtime: { openRunStart: 4000, lastOffAt: 3000, runtimeTodaySec: 600 }
    },
    removed: {
      balance: { balanceMm: 3, lastEtDate: null, etApplied: {} },
      runtime: { openRunStart: null, lastOffAt: null, runtimeTodaySec: 0 }
    }
  },
  precipitationBaseline: 42.5,
  lastEtReport: null
};

describe('State', () => {
  describe('createInitialState', () => {
    it('should create an idle tracker per zone', () => {
      const state = createInitialState(['front', 'back']);

      expect(state.trackers).toEqual({
        front: { openRunStart: null, lastOffAt: null, runtimeTodaySec: 0 },
        back: { openRunStart: null, lastOffAt: null, runtimeTodaySec: 0 }
      });
      expect(state.precipitationBaseline).toBeNull();
      expect(state.latest).toEqual({});
    });
  });

  describe('restoreState', () => {
    it('should discard open runs and keep the rest', () => {
      const { state, discarded } = restoreState(['front', 'back'], PERSISTED);

      expect(state.trackers.front).toEqual({ openRunStart: null, lastOffAt: 3000, runtimeTodaySec: 600 });
      expect(state.trackers.back).toEqual({ openRunStart: null, lastOffAt: null, runtimeTodaySec: 0 });
      expect(state.trackers.removed).toBeUndefined();
      expect(state.precipitationBaseline).toBe(42.5);
      expect(discarded).toHaveLength(1);
      expect(discarded[0]).toBeInstanceOf(IncompleteRunError);
    });
  });

  describe('toPersistedState', () => {
    it('should combine ledger balances with tracker state', () => {
      const ledger = createLedger(
        [{ id: 'front', precipitationRate: 10 }],
        { overrideResetsEtGuard: false, etRetentionDays: 30 },
        restoredBalances(PERSISTED)
      );
      const { state } = restoreState(['front'], PERSISTED);

      expect(toPersistedState(state, ledger, 6000)).toEqual({
        version: 1,
        savedAt: 6000,
        zones: {
          front: {
            balance: { balanceMm: -12, lastEtDate: '2024-06-14', etApplied: { '2024-06-14': 4 } },
            runtime: { openRunStart: null, lastOffAt: 3000, runtimeTodaySec: 600 }
          }
        },
        precipitationBaseline: 42.5,
        lastEtReport: null
      });
    });
  });
});
