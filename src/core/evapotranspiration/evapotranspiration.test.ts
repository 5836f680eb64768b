/**
 * Tests for the ET formulas
 */

import { InsufficientDataError } from '$types/errors';

import { computeEt0, computeZoneEt, toEtInputs } from './evapotranspiration';
import {
  atmosphericPressure,
  dayOfYearUtc,
  extraterrestrialRadiation,
  saturationSlope,
  saturationVapourPressure
} from './helpers';

import type { DailyWeatherAggregate } from '@features/daily-weather';
import type { Location } from '$types/common';

// 2024-06-15 UTC, day 167
const WINDOW = { start: 1718409600, end: 1718496000 };
const SITE: Location = { latitude: 45, longitude: 7, elevation: 100 };

function aggregate(overrides: Partial<DailyWeatherAggregate> = {}): DailyWeatherAggregate {
  return {
    window: WINDOW,
    temperatureMean: 20,
    temperatureMin: 12,
    temperatureMax: 28,
    humidityMean: 60,
    precipitationMm: null,
    windMean: null,
    solarMean: null,
    pressureMean: null,
    counts: { temperature: 24, humidity: 24, precipitation: 0, wind: 0, solar: 0, pressure: 0 },
    ...overrides
  };
}

// ═══════════════════════════════════════════════════════════════
// FAO-56 building blocks
// ═══════════════════════════════════════════════════════════════

describe('FAO-56 helpers', () => {
  it('should match the published worked values', () => {
    expect(atmosphericPressure(1800)).toBeCloseTo(81.8, 1);
    expect(saturationVapourPressure(25)).toBeCloseTo(3.168, 3);
    expect(saturationSlope(25)).toBeCloseTo(0.189, 3);
    expect(extraterrestrialRadiation(-20 * Math.PI / 180, 246)).toBeCloseTo(32.2, 1);
  });

  it('should return zero radiation during polar night', () => {
    expect(extraterrestrialRadiation(80 * Math.PI / 180, 355)).toBe(0);
  });

  it('should number days from 1 in UTC', () => {
    expect(dayOfYearUtc(1704067200)).toBe(1);
    expect(dayOfYearUtc(WINDOW.start + 43200)).toBe(167);
  });
});

// ═══════════════════════════════════════════════════════════════
// Inputs
// ═══════════════════════════════════════════════════════════════

describe('toEtInputs', () => {
  it('should convert units', () => {
    const inputs = toEtInputs(aggregate({ windMean: 7.2, solarMean: 250, pressureMean: 1013 }), SITE);

    expect(inputs.windMs).toBeCloseTo(2, 10);
    expect(inputs.solarMj).toBeCloseTo(21.6, 10);
    expect(inputs.pressureKpa).toBeCloseTo(101.3, 10);
    expect(inputs.dayOfYear).toBe(167);
  });

  it('should derive pressure from elevation when unmeasured', () => {
    const inputs = toEtInputs(aggregate(), { latitude: 0, longitude: 0, elevation: 1800 });

    expect(inputs.pressureKpa).toBeCloseTo(81.76, 2);
  });

  it('should fall back to the mean when extremes are missing', () => {
    const inputs = toEtInputs(aggregate({ temperatureMin: null, temperatureMax: null }), SITE);

    expect(inputs.tMin).toBe(20);
    expect(inputs.tMax).toBe(20);
  });

  it('should refuse missing temperature or humidity', () => {
    expect(() => toEtInputs(aggregate({ temperatureMean: null }), SITE)).toThrow(InsufficientDataError);
    expect(() => toEtInputs(aggregate({ humidityMean: null }), SITE)).toThrow(InsufficientDataError);
  });
});

// ═══════════════════════════════════════════════════════════════
// Methods
// ═══════════════════════════════════════════════════════════════

describe('computeEt0', () => {
  it('should compute Hargreaves from temperature alone', () => {
    expect(computeEt0(aggregate(), SITE, 'hargreaves')).toBeCloseTo(5.9421, 3);
  });

  it('should compute Priestley-Taylor with measured solar radiation', () => {
    expect(computeEt0(aggregate({ solarMean: 250 }), SITE, 'priestley_taylor')).toBeCloseTo(4.6378, 3);
  });

  it('should estimate solar radiation for Priestley-Taylor when only wind is measured', () => {
    expect(computeEt0(aggregate({ windMean: 7.2 }), SITE, 'priestley_taylor')).toBeCloseTo(5.5762, 3);
  });

  it('should compute Penman-Monteith with measured pressure', () => {
    const day = aggregate({ windMean: 7.2, solarMean: 250, pressureMean: 1013 });

    expect(computeEt0(day, SITE, 'penman_monteith')).toBeCloseTo(4.6778, 3);
  });

  it('should compute Penman-Monteith with elevation pressure', () => {
    const day = aggregate({ windMean: 7.2, solarMean: 250 });

    expect(computeEt0(day, SITE, 'penman_monteith')).toBeCloseTo(4.6824, 3);
  });

  it('should never return a negative value', () => {
    const polar = aggregate({
      window: { start: 1734739200, end: 1734825600 },
      temperatureMean: -40,
      temperatureMin: -45,
      temperatureMax: -35,
      humidityMean: 100
    });
    const arctic: Location = { latitude: 80, longitude: 0, elevation: 100 };

    expect(computeEt0(polar, arctic, 'priestley_taylor')).toBe(0);
    expect(computeEt0(polar, arctic, 'hargreaves')).toBe(0);
  });
});

describe('computeZoneEt', () => {
  it('should scale by the crop coefficient', () => {
    expect(computeZoneEt('hargreaves', 5, 0.8)).toEqual({
      method: 'hargreaves',
      et0Mm: 5,
      cropCoefficient: 0.8,
      etcMm: 4
    });
  });
});
