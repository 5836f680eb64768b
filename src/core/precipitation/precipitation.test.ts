/**
 * Tests for precipitation counter handling
 */

import { AnomalousDeltaError } from '$types/errors';

import { evaluateCounterReading, sumCounterIncreases } from './precipitation';

describe('evaluateCounterReading', () => {
  it('should anchor the first reading without crediting rain', () => {
    expect(evaluateCounterReading(null, 42.5)).toEqual({ kind: 'baseline', baseline: 42.5 });
  });

  it('should credit a positive increase', () => {
    expect(evaluateCounterReading(10, 12.5)).toEqual({ kind: 'rain', mm: 2.5, baseline: 12.5 });
  });

  it('should report an unchanged counter', () => {
    expect(evaluateCounterReading(10, 10)).toEqual({ kind: 'unchanged', baseline: 10 });
  });

  it('should treat a decrease as a rollover, never negative rain', () => {
    expect(evaluateCounterReading(87.3, 0.4)).toEqual({ kind: 'rollover', previous: 87.3, baseline: 0.4 });
  });

  it('should reject a 220mm jump as anomalous and re-anchor', () => {
    const update = evaluateCounterReading(120, 340);

    expect(update.kind).toBe('anomaly');
    expect(update.baseline).toBe(340);
    if (update.kind === 'anomaly') {
      expect(update.error).toBeInstanceOf(AnomalousDeltaError);
      expect(update.error.message).toBe('Precipitation counter jumped 220.0mm (120 -> 340), limit 200mm');
    }
  });

  it('should accept an increase of exactly the limit', () => {
    expect(evaluateCounterReading(0, 200)).toEqual({ kind: 'rain', mm: 200, baseline: 200 });
  });

  it('should honour a custom limit', () => {
    expect(evaluateCounterReading(0, 60, 50).kind).toBe('anomaly');
  });
});

describe('sumCounterIncreases', () => {
  it('should sum increases between consecutive readings', () => {
    const total = sumCounterIncreases([1, 3, 3, 7]);

    expect(total.totalMm).toBe(6);
    expect(total.rollovers).toBe(0);
    expect(total.anomalies).toEqual([]);
  });

  it('should continue counting after a rollover', () => {
    const total = sumCounterIncreases([98, 99, 0, 2]);

    expect(total.totalMm).toBe(3);
    expect(total.rollovers).toBe(1);
  });

  it('should skip anomalous jumps and count from the new level', () => {
    const total = sumCounterIncreases([120, 340, 345]);

    expect(total.totalMm).toBe(5);
    expect(total.anomalies).toHaveLength(1);
  });

  it('should return zero for zero or one reading', () => {
    expect(sumCounterIncreases([]).totalMm).toBe(0);
    expect(sumCounterIncreases([25]).totalMm).toBe(0);
  });
});
