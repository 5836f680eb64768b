import type { ZoneConfig } from '$types/config';

/**
 * Zone limits used when planning a run
 */
export type RuntimeLimits = Pick<ZoneConfig, 'precipitationRate' | 'minRuntimeSec' | 'maxRuntimeSec' | 'minimumIntervalSec'>;

/**
 * Inputs for one planning pass
 */
export interface RuntimePlanInput {
  /** Current balance (mm), negative = deficit */
  readonly balanceMm: number;
  /** Forecast rain (mm), clamped at 0 */
  readonly forecastRainMm: number;
  /** When the valve last closed, null if never */
  readonly lastOffAt: number | null;
  readonly now: number;
}

/**
 * Result of the can-run evaluation
 */
export interface CanRunDecision {
  readonly canRun: boolean;
  readonly reason: string;
}

/**
 * Derived runtime figures for one zone
 */
export interface RuntimePlan extends CanRunDecision {
  readonly effectiveDeficitMm: number;
  readonly forecastRainMm: number;
  /** Runtime to cover the effective deficit (s) */
  readonly requiredRuntimeSec: number;
  /** requiredRuntimeSec held inside the zone's min/max, 0 when nothing is required */
  readonly clampedRuntimeSec: number;
}
