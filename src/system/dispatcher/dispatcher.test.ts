/**
 * Tests for the inbound event dispatcher
 */

import { SENSOR_RANGES } from '@core/sensor-range';
import { MESSAGE_TYPES } from '@events/types';
import { createHistoryRecorder } from '@system/history';
import { createLedger } from '@system/ledger';
import { createInitialState } from '@system/state';
import { createRecordingLogger } from '../../test-utils/fakes';

import { createDispatcher } from './dispatcher';

import type { ZoneConfig } from '$types/config';
import type { SensorStateMessage, ValveStateMessage } from '@events/types';
import type { EntityState } from '@hardware/types';
import type { DispatcherConfig } from './types';

const ZONES: ZoneConfig[] = [
  {
    id: 'front',
    name: 'Front lawn',
    valveEntity: 'switch.front_valve',
    precipitationRate: 10,
    cropCoefficient: 1,
    minRuntimeSec: 60,
    maxRuntimeSec: 3600,
    minimumIntervalSec: 3600
  },
  {
    id: 'back',
    name: 'Back beds',
    valveEntity: 'switch.back_valve',
    precipitationRate: 20,
    cropCoefficient: 0.8,
    minRuntimeSec: 60,
    maxRuntimeSec: 3600,
    minimumIntervalSec: 3600
  }
];

const CONFIG: DispatcherConfig = {
  SENSOR_ENTITIES: {
    temperature: 'sensor.temp',
    humidity: 'sensor.rh',
    precipitation: 'sensor.rain_total',
    forecastRain: 'sensor.rain_forecast'
  },
  ZONES: ZONES,
  SENSOR_RANGES: SENSOR_RANGES,
  MAX_PRECIPITATION_DELTA_MM: 200
};

function setup() {
  const recorder = createRecordingLogger();
  const ledger = createLedger(ZONES, { overrideResetsEtGuard: false, etRetentionDays: 30 });
  const state = createInitialState(['front', 'back']);
  const history = createHistoryRecorder({ retentionSec: 172800, timeSource: () => 10000 });
  const onChange = vi.fn();
  const dispatcher = createDispatcher({
    config: CONFIG,
    ledger: ledger,
    state: state,
    history: history,
    logger: recorder.logger,
    onChange: onChange
  });

  return { dispatcher, ledger, state, history, onChange, lines: recorder.lines };
}

function sensor(entityId: string, state: EntityState, timestamp = 5000): SensorStateMessage {
  return { type: MESSAGE_TYPES.SENSOR, entityId: entityId, state: state, timestamp: timestamp };
}

function valve(entityId: string, state: EntityState, timestamp: number): ValveStateMessage {
  return { type: MESSAGE_TYPES.VALVE, entityId: entityId, state: state, timestamp: timestamp };
}

describe('Dispatcher', () => {
  // ═══════════════════════════════════════════════════════════════
  // Sensor stream
  // ═══════════════════════════════════════════════════════════════

  describe('sensor messages', () => {
    it('should ignore entities that are not configured', async () => {
      const ctx = setup();
      const outcome = ctx.dispatcher.dispatch(sensor('sensor.kitchen', '21'));

      expect(outcome).toEqual({ kind: 'ignored', reason: 'Entity not configured' });
      expect(await ctx.history.query('sensor.kitchen', 0, 10000)).toEqual([]);
      expect(ctx.lines).toEqual(['[DEBUG]    Ignoring unconfigured entity sensor.kitchen']);
    });

    it('should ignore unavailable states without recording them', async () => {
      const ctx = setup();
      const outcome = ctx.dispatcher.dispatch(sensor('sensor.temp', 'unavailable'));

      expect(outcome).toEqual({ kind: 'ignored', reason: 'State is not numeric' });
      expect(await ctx.history.query('sensor.temp', 0, 10000)).toEqual([]);
      expect(ctx.state.latest.temperature).toBeUndefined();
    });

    it('should record a valid reading in history and as the latest value', async () => {
      const ctx = setup();
      const outcome = ctx.dispatcher.dispatch(sensor('sensor.temp', '21.5', 5000));

      expect(outcome).toEqual({ kind: 'recorded', sensor: 'temperature', value: 21.5 });
      expect(ctx.state.latest.temperature).toEqual({ value: 21.5, timestamp: 5000 });
      expect(await ctx.history.query('sensor.temp', 0, 10000)).toEqual([{ value: 21.5, timestamp: 5000 }]);
    });

    it('should reject an out-of-range reading with a warning', () => {
      const ctx = setup();
      const outcome = ctx.dispatcher.dispatch(sensor('sensor.temp', 75));

      expect(outcome.kind).toBe('rejected');
      expect(ctx.state.latest.temperature).toBeUndefined();
      expect(ctx.lines).toEqual(['⚠️ [WARNING]  sensor.temp: temperature reading 75°C outside -50..60°C, discarded']);
    });

    it('should keep the raw value in history so the daily cycle can validate it', async () => {
      const ctx = setup();
      ctx.dispatcher.dispatch(sensor('sensor.rh', 140));

      expect(await ctx.history.query('sensor.rh', 0, 10000)).toEqual([{ value: 140, timestamp: 5000 }]);
    });

    it('should clamp forecast rain at zero and keep it out of history', async () => {
      const ctx = setup();
      const outcome = ctx.dispatcher.dispatch(sensor('sensor.rain_forecast', '-3'));

      expect(outcome).toEqual({ kind: 'recorded', sensor: 'forecast_rain', value: 0 });
      expect(ctx.state.latest.forecast_rain).toEqual({ value: 0, timestamp: 5000 });
      expect(await ctx.history.query('sensor.rain_forecast', 0, 10000)).toEqual([]);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // Precipitation counter
  // ═══════════════════════════════════════════════════════════════

  describe('precipitation counter', () => {
    it('should anchor the baseline on the first reading without crediting rain', () => {
      const ctx = setup();
      const outcome = ctx.dispatcher.dispatch(sensor('sensor.rain_total', 120));

      expect(outcome).toEqual({ kind: 'recorded', sensor: 'precipitation', value: 120 });
      expect(ctx.state.precipitationBaseline).toBe(120);
      expect(ctx.ledger.getBalance('front')).toBe(0);
      expect(ctx.lines).toEqual(['[DEBUG]    Precipitation baseline 120.00mm']);
    });

    it('should credit counter increases to every zone', () => {
      const ctx = setup();
      ctx.dispatcher.dispatch(sensor('sensor.rain_total', 120));
      const outcome = ctx.dispatcher.dispatch(sensor('sensor.rain_total', 122.5, 5100));

      expect(outcome).toEqual({ kind: 'rain', mm: 2.5 });
      expect(ctx.ledger.getBalance('front')).toBe(2.5);
      expect(ctx.ledger.getBalance('back')).toBe(2.5);
      expect(ctx.lines[1]).toBe('ℹ️ [INFO]     Rain +2.50mm credited to 2 zone(s)');
    });

    it('should discard a jump above 200mm and re-anchor the baseline', () => {
      const ctx = setup();
      ctx.dispatcher.dispatch(sensor('sensor.rain_total', 120));
      const outcome = ctx.dispatcher.dispatch(sensor('sensor.rain_total', 340, 5100));

      expect(outcome.kind).toBe('rejected');
      expect(ctx.ledger.getBalance('front')).toBe(0);
      expect(ctx.state.precipitationBaseline).toBe(340);
      expect(ctx.lines[1]).toBe('⚠️ [WARNING]  Precipitation counter jumped 220.0mm (120 -> 340), limit 200mm, discarded');
    });

    it('should treat a decrease as a rollover, not negative rain', () => {
      const ctx = setup();
      ctx.dispatcher.dispatch(sensor('sensor.rain_total', 340));
      const outcome = ctx.dispatcher.dispatch(sensor('sensor.rain_total', 5, 5100));

      expect(outcome).toEqual({ kind: 'recorded', sensor: 'precipitation', value: 5 });
      expect(ctx.ledger.getBalance('front')).toBe(0);
      expect(ctx.state.precipitationBaseline).toBe(5);
      expect(ctx.lines[1]).toBe('ℹ️ [INFO]     Precipitation counter reset (340 -> 5), baseline re-anchored');
    });

    it('should report state changes', () => {
      const ctx = setup();
      ctx.dispatcher.dispatch(sensor('sensor.rain_total', 120));

      expect(ctx.onChange).toHaveBeenCalledTimes(1);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // Valve stream
  // ═══════════════════════════════════════════════════════════════

  describe('valve messages', () => {
    it('should credit irrigation when a run closes', () => {
      const ctx = setup();
      ctx.ledger.setBalance('front', -10);

      ctx.dispatcher.dispatch(valve('switch.front_valve', 'on', 1000));
      const outcome = ctx.dispatcher.dispatch(valve('switch.front_valve', 'off', 2800));

      expect(outcome).toEqual({
        kind: 'valve',
        zoneId: 'front',
        transition: { kind: 'closed', run: { start: 1000, end: 2800, durationSec: 1800 }, waterAddedMm: 5 }
      });
      expect(ctx.ledger.getBalance('front')).toBe(-5);
      expect(ctx.ledger.getBalance('back')).toBe(0);
      expect(ctx.state.trackers.front).toEqual({ openRunStart: null, lastOffAt: 2800, runtimeTodaySec: 1800 });
      expect(ctx.lines).toEqual([
        'ℹ️ [INFO]     Zone front: valve opened',
        'ℹ️ [INFO]     Zone front: valve closed after 1800s, +5.00mm'
      ]);
    });

    it('should keep the first start when on is repeated', () => {
      const ctx = setup();
      ctx.dispatcher.dispatch(valve('switch.back_valve', true, 1000));
      ctx.dispatcher.dispatch(valve('switch.back_valve', true, 1500));
      ctx.dispatcher.dispatch(valve('switch.back_valve', false, 1900));

      // 900 s at 20 mm/h
      expect(ctx.ledger.getBalance('back')).toBe(5);
    });

    it('should ignore an off edge without an open run', () => {
      const ctx = setup();
      const outcome = ctx.dispatcher.dispatch(valve('switch.front_valve', 'off', 1000));

      expect(outcome).toEqual({ kind: 'valve', zoneId: 'front', transition: { kind: 'ignored' } });
      expect(ctx.ledger.getBalance('front')).toBe(0);
    });

    it('should ignore valves that belong to no zone', () => {
      const ctx = setup();
      const outcome = ctx.dispatcher.dispatch(valve('switch.pool_pump', 'on', 1000));

      expect(outcome).toEqual({ kind: 'ignored', reason: 'Valve not assigned to a zone' });
      expect(ctx.onChange).not.toHaveBeenCalled();
    });

    it('should ignore states that are neither on nor off', () => {
      const ctx = setup();
      const outcome = ctx.dispatcher.dispatch(valve('switch.front_valve', 'unavailable', 1000));

      expect(outcome).toEqual({ kind: 'ignored', reason: 'State is not on/off' });
      expect(ctx.state.trackers.front.openRunStart).toBeNull();
    });
  });
});
