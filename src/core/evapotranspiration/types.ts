import type { EtMethod } from '$types/common';

/**
 * Daily meteorological inputs in FAO-56 units
 */
export interface EtInputs {
  /** Mean air temperature (°C) */
  readonly tMean: number;
  readonly tMin: number;
  readonly tMax: number;
  /** Mean relative humidity (%) */
  readonly rhMean: number;
  /** Wind speed at 2 m (m/s), null when not measured */
  readonly windMs: number | null;
  /** Incoming shortwave radiation (MJ/m²/day), null when not measured */
  readonly solarMj: number | null;
  /** Atmospheric pressure (kPa) */
  readonly pressureKpa: number;
  /** Latitude in radians */
  readonly latitudeRad: number;
  /** Elevation (m) */
  readonly elevation: number;
  /** Day of year (1-366) */
  readonly dayOfYear: number;
}

/**
 * Reference and crop ET for one zone and day
 */
export interface EtResult {
  readonly method: EtMethod;
  /** Reference evapotranspiration (mm/day) */
  readonly et0Mm: number;
  readonly cropCoefficient: number;
  /** et0Mm × Kc, the value subtracted from the balance */
  readonly etcMm: number;
}
