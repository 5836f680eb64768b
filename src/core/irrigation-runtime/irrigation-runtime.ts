/**
 * Irrigation runtime planning
 *
 * Turns a zone balance into a recommended sprinkler runtime. Forecast rain is
 * subtracted from the deficit first, then the runtime is held inside the
 * zone's limits. The can-run checks are ordered; the first failing one gives
 * the reason.
 */

import { SECONDS_PER_HOUR } from '@utils/time';

import type { CanRunDecision, RuntimeLimits, RuntimePlan, RuntimePlanInput } from './types';

/**
 * Deficit left after forecast rain
 * @param balanceMm - Current balance, negative = deficit
 * @param forecastRainMm - Expected rain
 * @returns Deficit in mm, 0 when the zone is not in deficit
 */
export function calculateEffectiveDeficit(balanceMm: number, forecastRainMm: number): number {
  if (balanceMm >= 0) return 0;
  return Math.max(0, Math.abs(balanceMm) - Math.max(0, forecastRainMm));
}

/**
 * Seconds of irrigation needed to apply a depth of water
 * @param deficitMm - Water to apply
 * @param precipitationRate - Sprinkler rate (mm/h)
 */
export function calculateRuntimeSeconds(deficitMm: number, precipitationRate: number): number {
  if (deficitMm <= 0 || precipitationRate <= 0) return 0;
  return (deficitMm / precipitationRate) * SECONDS_PER_HOUR;
}

/**
 * Hold a required runtime inside the zone limits
 */
export function clampRuntime(requiredSec: number, limits: RuntimeLimits): number {
  if (requiredSec <= 0) return 0;
  return Math.max(limits.minRuntimeSec, Math.min(requiredSec, limits.maxRuntimeSec));
}

/**
 * Decide whether the zone should run now
 */
export function evaluateCanRun(
  input: RuntimePlanInput,
  effectiveDeficitMm: number,
  requiredRuntimeSec: number,
  limits: RuntimeLimits
): CanRunDecision {
  if (input.lastOffAt !== null) {
    const sinceOff = input.now - input.lastOffAt;
    if (sinceOff < limits.minimumIntervalSec) {
      return {
        canRun: false,
        reason: 'Minimum interval not met (' + sinceOff.toFixed(0) + 's < ' + limits.minimumIntervalSec + 's)'
      };
    }
  }

  if (input.balanceMm >= 0) {
    return { canRun: false, reason: 'No moisture deficit' };
  }

  if (effectiveDeficitMm <= 0) {
    return { canRun: false, reason: 'Forecasted rain (' + input.forecastRainMm.toFixed(1) + 'mm) covers deficit' };
  }

  if (requiredRuntimeSec < limits.minRuntimeSec) {
    return {
      canRun: false,
      reason: 'Runtime too short (' + requiredRuntimeSec.toFixed(0) + 's < ' + limits.minRuntimeSec + 's minimum)'
    };
  }

  return { canRun: true, reason: 'Ready to run' };
}

/**
 * Full runtime plan for one zone
 * @param input - Balance, forecast and timing
 * @param limits - Zone rate and runtime limits
 */
export function calculateZoneRuntime(input: RuntimePlanInput, limits: RuntimeLimits): RuntimePlan {
  const forecastRainMm = Math.max(0, input.forecastRainMm);
  const normalised = { ...input, forecastRainMm: forecastRainMm };
  const effectiveDeficitMm = calculateEffectiveDeficit(input.balanceMm, forecastRainMm);
  const requiredRuntimeSec = calculateRuntimeSeconds(effectiveDeficitMm, limits.precipitationRate);
  const decision = evaluateCanRun(normalised, effectiveDeficitMm, requiredRuntimeSec, limits);

  return {
    canRun: decision.canRun,
    reason: decision.reason,
    effectiveDeficitMm: effectiveDeficitMm,
    forecastRainMm: forecastRainMm,
    requiredRuntimeSec: requiredRuntimeSec,
    clampedRuntimeSec: clampRuntime(requiredRuntimeSec, limits),
  };
}
