/**
 * FAO-56 building blocks
 *
 * Equation numbers refer to FAO Irrigation and Drainage Paper 56.
 * Radiation terms are MJ/m²/day, pressures kPa, temperatures °C.
 */

/** Solar constant (MJ/m²/min) */
const GSC = 0.082;
/** Stefan-Boltzmann constant (MJ/K⁴/m²/day) */
const SIGMA = 4.903e-9;
/** Albedo of the grass reference crop */
const ALBEDO = 0.23;
/** Hargreaves radiation adjustment for interior locations */
const KRS_INTERIOR = 0.16;

/**
 * Atmospheric pressure from elevation (eq. 7)
 */
export function atmosphericPressure(elevation: number): number {
  return 101.3 * Math.pow((293 - 0.0065 * elevation) / 293, 5.26);
}

/**
 * Psychrometric constant γ (eq. 8)
 */
export function psychrometricConstant(pressureKpa: number): number {
  return 0.000665 * pressureKpa;
}

/**
 * Saturation vapour pressure e°(T) (eq. 11)
 */
export function saturationVapourPressure(t: number): number {
  return 0.6108 * Math.exp((17.27 * t) / (t + 237.3));
}

/**
 * Mean saturation vapour pressure es (eq. 12)
 */
export function meanSaturationVapourPressure(tMin: number, tMax: number): number {
  return (saturationVapourPressure(tMax) + saturationVapourPressure(tMin)) / 2;
}

/**
 * Slope of the saturation vapour pressure curve Δ (eq. 13)
 */
export function saturationSlope(t: number): number {
  return (4098 * saturationVapourPressure(t)) / Math.pow(t + 237.3, 2);
}

/**
 * Extraterrestrial radiation Ra (eqs. 21-25)
 * @param latitudeRad - Latitude in radians
 * @param dayOfYear - Day of year (1-366)
 */
export function extraterrestrialRadiation(latitudeRad: number, dayOfYear: number): number {
  const dr = 1 + 0.033 * Math.cos((2 * Math.PI / 365) * dayOfYear);
  const declination = 0.409 * Math.sin((2 * Math.PI / 365) * dayOfYear - 1.39);
  // Polar day/night push the argument outside [-1, 1]
  const cosWs = Math.max(-1, Math.min(1, -Math.tan(latitudeRad) * Math.tan(declination)));
  const ws = Math.acos(cosWs);

  const ra = (24 * 60 / Math.PI) * GSC * dr * (
    ws * Math.sin(latitudeRad) * Math.sin(declination) +
    Math.cos(latitudeRad) * Math.cos(declination) * Math.sin(ws)
  );
  return Math.max(0, ra);
}

/**
 * Clear-sky radiation Rso (eq. 37)
 */
export function clearSkyRadiation(ra: number, elevation: number): number {
  return (0.75 + 2e-5 * elevation) * ra;
}

/**
 * Solar radiation estimated from the temperature range (eq. 50)
 */
export function estimateSolarRadiation(ra: number, tMin: number, tMax: number): number {
  return KRS_INTERIOR * Math.sqrt(Math.max(0, tMax - tMin)) * ra;
}

/**
 * Net shortwave radiation Rns (eq. 38)
 */
export function netShortwaveRadiation(rs: number): number {
  return (1 - ALBEDO) * rs;
}

/**
 * Net outgoing longwave radiation Rnl (eq. 39)
 */
export function netLongwaveRadiation(tMin: number, tMax: number, ea: number, rs: number, rso: number): number {
  const ratio = rso > 0 ? Math.max(0.3, Math.min(1, rs / rso)) : 0.3;
  const tK4 = (Math.pow(tMax + 273.16, 4) + Math.pow(tMin + 273.16, 4)) / 2;
  return SIGMA * tK4 * (0.34 - 0.14 * Math.sqrt(ea)) * (1.35 * ratio - 0.35);
}

/**
 * Convert mean irradiance (W/m²) to a daily total (MJ/m²/day)
 */
export function wattsToDailyMegajoules(wm2: number): number {
  return wm2 * 0.0864;
}

/**
 * Convert km/h to m/s
 */
export function kmhToMs(kmh: number): number {
  return kmh / 3.6;
}

export function degreesToRadians(deg: number): number {
  return deg * Math.PI / 180;
}

/**
 * Day of year (1-366) of a timestamp, in UTC
 * @param timestamp - Epoch seconds
 */
export function dayOfYearUtc(timestamp: number): number {
  const date = new Date(timestamp * 1000);
  const startOfYear = Date.UTC(date.getUTCFullYear(), 0, 1);
  const startOfDay = Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
  return Math.floor((startOfDay - startOfYear) / 86400000) + 1;
}
