import type { EtMethod } from '$types/common';
import type { EntityKind } from '@hardware/sensors';
import type { RuntimeTrackerState } from '@features/runtime-tracker';
import type { ApplyEtOutcome, ZoneBalance } from '@system/ledger';

/**
 * Most recent accepted value of one sensor kind
 */
export interface LatestReading {
  value: number;
  timestamp: number;
}

/**
 * Per-zone line of an ET report
 */
export interface ZoneEtReport {
  zoneId: string;
  etcMm: number;
  outcome: ApplyEtOutcome['kind'];
}

/**
 * Result of one daily ET cycle
 */
export interface EtReport {
  /** Local date the ET belongs to (YYYY-MM-DD) */
  date: string;
  method: EtMethod | null;
  /** Reference ET rounded to 2 decimals, null when the day was skipped */
  et0Mm: number | null;
  zones: ZoneEtReport[];
  /** Why no ET was applied, null on success */
  skippedReason: string | null;
  computedAt: number;
}

/**
 * Mutable service state outside the ledger
 */
export interface ControllerState {
  // ═══════════════════════════════════════════════════════════════
  // RUNTIME TRACKING (per zone)
  // ═══════════════════════════════════════════════════════════════
  trackers: Record<string, RuntimeTrackerState>;

  // ═══════════════════════════════════════════════════════════════
  // PRECIPITATION COUNTER
  // ═══════════════════════════════════════════════════════════════
  precipitationBaseline: number | null;

  // ═══════════════════════════════════════════════════════════════
  // STATUS
  // ═══════════════════════════════════════════════════════════════
  latest: Partial<Record<EntityKind, LatestReading>>;
  lastEtReport: EtReport | null;
}

/**
 * State file contents
 */
export interface PersistedState {
  version: 1;
  savedAt: number;
  zones: Record<string, { balance: ZoneBalance; runtime: RuntimeTrackerState }>;
  precipitationBaseline: number | null;
  lastEtReport: EtReport | null;
}
