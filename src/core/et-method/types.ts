import type { EtMethod } from '$types/common';
import type { InsufficientDataError } from '$types/errors';

/**
 * Mandatory aggregate field that can block ET computation
 */
export type RequiredField = 'temperature' | 'humidity';

/**
 * Outcome of method selection
 */
export type MethodSelection =
  | { readonly ok: true; readonly method: EtMethod }
  | { readonly ok: false; readonly missing: readonly RequiredField[]; readonly error: InsufficientDataError };

/**
 * Which optional inputs a day provides
 */
export interface InputAvailability {
  readonly wind: boolean;
  readonly solar: boolean;
}
