/**
 * Tests for configuration validator
 */

import { USER_CONFIG } from '@boot/config';

import { validateConfig } from './validator';

import type { IrrigationUserConfig, ZoneConfig } from '$types/config';

const ZONE: ZoneConfig = {
  id: 'front',
  name: 'Front lawn',
  valveEntity: 'switch.front_valve',
  precipitationRate: 10,
  cropCoefficient: 1.0,
  minRuntimeSec: 60,
  maxRuntimeSec: 3600,
  minimumIntervalSec: 3600
};

const validConfig: IrrigationUserConfig = {
  ...USER_CONFIG,
  LATITUDE: 52.52,
  LONGITUDE: 13.4,
  ELEVATION_M: 34,
  TIMEZONE: 'Europe/Berlin',
  ZONES: [ZONE],
  API_TOKEN: 'test-secret'
};

function fields(config: IrrigationUserConfig): string[] {
  return validateConfig(config).errors.map((e) => e.field);
}

describe('validateConfig', () => {
  it('should accept a complete configuration', () => {
    const result = validateConfig(validConfig);

    expect(result.valid).toBe(true);
    expect(result.errors).toEqual([]);
    expect(result.warnings).toEqual([]);
  });

  // ═══════════════════════════════════════════════════════════════
  // Location
  // ═══════════════════════════════════════════════════════════════

  describe('location', () => {
    it('should reject out-of-range coordinates', () => {
      expect(fields({ ...validConfig, LATITUDE: 91, LONGITUDE: -181 })).toEqual(['LATITUDE', 'LONGITUDE']);
    });

    it('should reject an unknown timezone', () => {
      const result = validateConfig({ ...validConfig, TIMEZONE: 'Mars/Olympus' });

      expect(result.errors).toEqual([{ field: 'TIMEZONE', message: 'Unknown timezone Mars/Olympus' }]);
    });

    it('should warn on extreme elevations', () => {
      const result = validateConfig({ ...validConfig, ELEVATION_M: 5000 });

      expect(result.valid).toBe(true);
      expect(result.warnings.map((w) => w.field)).toEqual(['ELEVATION_M']);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // Sensors and zones
  // ═══════════════════════════════════════════════════════════════

  describe('sensors', () => {
    it('should reject an entity used for two sensors', () => {
      const result = validateConfig({
        ...validConfig,
        SENSOR_ENTITIES: { ...validConfig.SENSOR_ENTITIES, wind: validConfig.SENSOR_ENTITIES.temperature }
      });

      expect(result.errors[0].message).toBe(
        'SENSOR_ENTITIES.wind duplicates SENSOR_ENTITIES.temperature (sensor.outdoor_temperature)'
      );
    });

    it('should reject a blank mandatory entity', () => {
      expect(fields({ ...validConfig, SENSOR_ENTITIES: { ...validConfig.SENSOR_ENTITIES, humidity: '' } }))
        .toEqual(['SENSOR_ENTITIES.humidity']);
    });
  });

  describe('zones', () => {
    it('should require at least one zone', () => {
      expect(fields({ ...validConfig, ZONES: [] })).toEqual(['ZONES']);
    });

    it('should bound the crop coefficient', () => {
      expect(fields({ ...validConfig, ZONES: [{ ...ZONE, cropCoefficient: 2.5 }] })).toEqual(['ZONES[0].cropCoefficient']);
    });

    it('should reject a zero precipitation rate', () => {
      expect(fields({ ...validConfig, ZONES: [{ ...ZONE, precipitationRate: 0 }] })).toEqual(['ZONES[0].precipitationRate']);
    });

    it('should reject a maximum runtime below the minimum', () => {
      expect(fields({ ...validConfig, ZONES: [{ ...ZONE, minRuntimeSec: 600, maxRuntimeSec: 300 }] }))
        .toEqual(['ZONES[0].maxRuntimeSec']);
    });

    it('should reject duplicate ids and shared valves', () => {
      const second = { ...ZONE, name: 'Copy' };

      expect(fields({ ...validConfig, ZONES: [ZONE, second] })).toEqual(['ZONES[1].id', 'ZONES[1].valveEntity']);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // Cycle, API and logging
  // ═══════════════════════════════════════════════════════════════

  describe('service settings', () => {
    it('should reject an invalid cron expression', () => {
      expect(fields({ ...validConfig, ET_CRON: 'every midnight' })).toEqual(['ET_CRON']);
    });

    it('should reject an invalid port', () => {
      expect(fields({ ...validConfig, HTTP_PORT: 0 })).toEqual(['HTTP_PORT']);
    });

    it('should warn when no API token is set', () => {
      const result = validateConfig({ ...validConfig, API_TOKEN: '' });

      expect(result.valid).toBe(true);
      expect(result.warnings.map((w) => w.field)).toEqual(['API_TOKEN']);
    });

    it('should warn when Slack is enabled without a webhook', () => {
      const result = validateConfig({ ...validConfig, SLACK_ENABLED: true, SLACK_WEBHOOK_URL: '' });

      expect(result.warnings.map((w) => w.field)).toEqual(['SLACK_WEBHOOK_URL']);
    });
  });
});
