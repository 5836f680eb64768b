/**
 * Type definitions for sensor range validation
 */

import type { SensorRangeError } from '$types/errors';

/**
 * Outcome of validating one reading
 */
export type RangeCheck =
  | { readonly valid: true; readonly value: number }
  | { readonly valid: false; readonly error: SensorRangeError };
