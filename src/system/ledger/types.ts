import type { ZoneConfig } from '$types/config';

/**
 * Balance state for one zone, owned by the ledger
 */
export interface ZoneBalance {
  /** Signed balance (mm); negative = deficit, positive = excess */
  balanceMm: number;
  /** Last date ET was applied (YYYY-MM-DD), null before the first */
  lastEtDate: string | null;
  /** ETc applied per date, kept so a forced recompute can replace it */
  etApplied: Record<string, number>;
}

/**
 * Outcome of an ET application
 * - applied: first ET for this date
 * - replaced: forced recompute; the previous value for the date was added back
 * - skipped: the date is on or before lastEtDate
 */
export type ApplyEtOutcome =
  | { readonly kind: 'applied'; readonly deltaMm: number }
  | { readonly kind: 'replaced'; readonly deltaMm: number; readonly previousMm: number }
  | { readonly kind: 'skipped'; readonly lastEtDate: string };

export interface LedgerOptions {
  /** Manual override clears lastEtDate and the applied-ET record */
  readonly overrideResetsEtGuard: boolean;
  /** Days of applied ET kept for forced recomputes */
  readonly etRetentionDays: number;
  /** Called after every mutation with the zone that changed */
  readonly onChange?: (zoneId: string) => void;
}

export interface Ledger {
  addRain(zoneId: string, mm: number): void;
  /** Credit rain to every zone */
  addRainAll(mm: number): void;
  addIrrigation(zoneId: string, mm: number): void;
  applyEt(zoneId: string, date: string, etcMm: number, force?: boolean): ApplyEtOutcome;
  setBalance(zoneId: string, mm: number): void;
  getBalance(zoneId: string): number;
  getZone(zoneId: string): Readonly<ZoneBalance>;
  /** Runtime to bring the balance back to 0 (s), ignoring forecasts and limits */
  requiredRuntimeSeconds(zoneId: string): number;
  zoneIds(): string[];
  /** Deep copy of every zone's state, keyed by zone id */
  snapshot(): Record<string, ZoneBalance>;
}

export type LedgerZones = readonly Pick<ZoneConfig, 'id' | 'precipitationRate'>[];
