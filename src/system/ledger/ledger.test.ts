/**
 * Tests for the zone balance ledger
 */

import { ValidationError, ZoneNotFoundError } from '$types/errors';

import { createLedger } from './ledger';

import type { LedgerOptions } from './types';

const ZONES = [
  { id: 'front', precipitationRate: 10 },
  { id: 'back', precipitationRate: 20 }
];

const OPTIONS: LedgerOptions = { overrideResetsEtGuard: false, etRetentionDays: 30 };

describe('Ledger', () => {
  // ═══════════════════════════════════════════════════════════════
  // Fluxes
  // ═══════════════════════════════════════════════════════════════

  describe('rain and irrigation', () => {
    it('should start every zone at zero', () => {
      const ledger = createLedger(ZONES, OPTIONS);

      expect(ledger.getBalance('front')).toBe(0);
      expect(ledger.getZone('back')).toEqual({ balanceMm: 0, lastEtDate: null, etApplied: {} });
    });

    it('should add rain without an upper bound', () => {
      const ledger = createLedger(ZONES, OPTIONS);
      ledger.addRain('front', 150);
      ledger.addRain('front', 150);

      expect(ledger.getBalance('front')).toBe(300);
      expect(ledger.getBalance('back')).toBe(0);
    });

    it('should credit rain to every zone', () => {
      const ledger = createLedger(ZONES, OPTIONS);
      ledger.addRainAll(2.5);

      expect(ledger.getBalance('front')).toBe(2.5);
      expect(ledger.getBalance('back')).toBe(2.5);
    });

    it('should add irrigation exactly', () => {
      const ledger = createLedger(ZONES, OPTIONS);
      ledger.setBalance('front', -25);
      ledger.addIrrigation('front', (9000 / 3600) * 10);

      expect(ledger.getBalance('front')).toBe(0);
    });

    it('should reject negative or non-finite fluxes', () => {
      const ledger = createLedger(ZONES, OPTIONS);

      expect(() => ledger.addRain('front', -1)).toThrow(ValidationError);
      expect(() => ledger.addIrrigation('front', Number.NaN)).toThrow('Irrigation must be a non-negative number (got NaN)');
      expect(ledger.getBalance('front')).toBe(0);
    });

    it('should reject unknown zones', () => {
      const ledger = createLedger(ZONES, OPTIONS);

      expect(() => ledger.addRain('side', 1)).toThrow(ZoneNotFoundError);
      expect(() => ledger.getBalance('side')).toThrow('Unknown zone: side');
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // ET application
  // ═══════════════════════════════════════════════════════════════

  describe('applyEt', () => {
    it('should subtract ET once per date', () => {
      const ledger = createLedger(ZONES, OPTIONS);

      expect(ledger.applyEt('front', '2024-06-14', 4)).toEqual({ kind: 'applied', deltaMm: -4 });
      expect(ledger.applyEt('front', '2024-06-14', 4)).toEqual({ kind: 'skipped', lastEtDate: '2024-06-14' });
      expect(ledger.getBalance('front')).toBe(-4);
    });

    it('should not apply a date older than the last one', () => {
      const ledger = createLedger(ZONES, OPTIONS);
      ledger.applyEt('front', '2024-06-14', 4);

      expect(ledger.applyEt('front', '2024-06-13', 3).kind).toBe('skipped');
      expect(ledger.getZone('front').lastEtDate).toBe('2024-06-14');
    });

    it('should replace rather than stack a forced recompute', () => {
      const ledger = createLedger(ZONES, OPTIONS);
      ledger.applyEt('front', '2024-06-14', 4);

      expect(ledger.applyEt('front', '2024-06-14', 5, true)).toEqual({ kind: 'replaced', deltaMm: -1, previousMm: 4 });
      expect(ledger.getBalance('front')).toBe(-5);
      expect(ledger.getZone('front').etApplied).toEqual({ '2024-06-14': 5 });
    });

    it('should keep lastEtDate when forcing an earlier date', () => {
      const ledger = createLedger(ZONES, OPTIONS);
      ledger.applyEt('front', '2024-06-13', 3);
      ledger.applyEt('front', '2024-06-14', 4);
      ledger.applyEt('front', '2024-06-13', 2, true);

      expect(ledger.getBalance('front')).toBe(-6);
      expect(ledger.getZone('front').lastEtDate).toBe('2024-06-14');
    });

    it('should leave other zones alone', () => {
      const ledger = createLedger(ZONES, OPTIONS);
      ledger.applyEt('front', '2024-06-14', 4);

      expect(ledger.applyEt('back', '2024-06-14', 4).kind).toBe('applied');
    });

    it('should drop applied ET older than the retention', () => {
      const ledger = createLedger(ZONES, { ...OPTIONS, etRetentionDays: 2 });
      ledger.applyEt('front', '2024-06-10', 1);
      ledger.applyEt('front', '2024-06-12', 1);
      ledger.applyEt('front', '2024-06-13', 1);

      expect(Object.keys(ledger.getZone('front').etApplied)).toEqual(['2024-06-12', '2024-06-13']);
    });

    it('should skip a forced date older than the retention instead of subtracting it again', () => {
      const ledger = createLedger(ZONES, OPTIONS);
      ledger.applyEt('front', '2024-06-15', 4);

      const first = ledger.applyEt('front', '2024-05-01', 3, true);
      const second = ledger.applyEt('front', '2024-05-01', 3, true);

      expect(first).toEqual({ kind: 'skipped', lastEtDate: '2024-06-15' });
      expect(second).toEqual({ kind: 'skipped', lastEtDate: '2024-06-15' });
      expect(ledger.getZone('front')).toEqual({ balanceMm: -4, lastEtDate: '2024-06-15', etApplied: { '2024-06-15': 4 } });
    });

    it('should replace a forced date at the edge of the retention', () => {
      const ledger = createLedger(ZONES, OPTIONS);
      ledger.applyEt('front', '2024-06-15', 4);
      ledger.applyEt('front', '2024-05-16', 3, true);

      const outcome = ledger.applyEt('front', '2024-05-16', 2, true);

      expect(outcome).toEqual({ kind: 'replaced', deltaMm: 1, previousMm: 3 });
      expect(ledger.getBalance('front')).toBe(-6);
    });

    it('should reject malformed dates', () => {
      const ledger = createLedger(ZONES, OPTIONS);

      expect(() => ledger.applyEt('front', '14/06/2024', 4)).toThrow(ValidationError);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // Manual override
  // ═══════════════════════════════════════════════════════════════

  describe('setBalance', () => {
    it('should keep the ET guard by default', () => {
      const ledger = createLedger(ZONES, OPTIONS);
      ledger.applyEt('front', '2024-06-14', 4);
      ledger.setBalance('front', 10);

      expect(ledger.applyEt('front', '2024-06-14', 4).kind).toBe('skipped');
      expect(ledger.getBalance('front')).toBe(10);
    });

    it('should clear the ET guard when configured to', () => {
      const ledger = createLedger(ZONES, { ...OPTIONS, overrideResetsEtGuard: true });
      ledger.applyEt('front', '2024-06-14', 4);
      ledger.setBalance('front', 10);

      expect(ledger.getZone('front')).toEqual({ balanceMm: 10, lastEtDate: null, etApplied: {} });
      expect(ledger.applyEt('front', '2024-06-14', 4).kind).toBe('applied');
      expect(ledger.getBalance('front')).toBe(6);
    });

    it('should reject a non-finite balance', () => {
      const ledger = createLedger(ZONES, OPTIONS);

      expect(() => ledger.setBalance('front', Number.POSITIVE_INFINITY)).toThrow(ValidationError);
    });
  });

  // ═══════════════════════════════════════════════════════════════
  // Derived values and lifecycle
  // ═══════════════════════════════════════════════════════════════

  describe('requiredRuntimeSeconds', () => {
    it('should convert a deficit into seconds', () => {
      const ledger = createLedger(ZONES, OPTIONS);
      ledger.setBalance('front', -25);

      expect(ledger.requiredRuntimeSeconds('front')).toBe(9000);
    });

    it('should be zero at or above the optimum', () => {
      const ledger = createLedger(ZONES, OPTIONS);
      ledger.setBalance('back', 3);

      expect(ledger.requiredRuntimeSeconds('front')).toBe(0);
      expect(ledger.requiredRuntimeSeconds('back')).toBe(0);
    });

    it('should not increase as the balance rises', () => {
      const ledger = createLedger(ZONES, OPTIONS);
      const runtimes = [-40, -20, -5, 0, 5].map((mm) => {
        ledger.setBalance('front', mm);
        return ledger.requiredRuntimeSeconds('front');
      });

      expect(runtimes).toEqual([14400, 7200, 1800, 0, 0]);
    });
  });

  describe('restore and change hook', () => {
    it('should restore known zones and drop unknown ones', () => {
      const ledger = createLedger(ZONES, OPTIONS, {
        front: { balanceMm: -7, lastEtDate: '2024-06-14', etApplied: { '2024-06-14': 3 } },
        removed: { balanceMm: 4, lastEtDate: null, etApplied: {} }
      });

      expect(ledger.getBalance('front')).toBe(-7);
      expect(ledger.getBalance('back')).toBe(0);
      expect(ledger.zoneIds()).toEqual(['front', 'back']);
      expect(Object.keys(ledger.snapshot())).toEqual(['front', 'back']);
    });

    it('should report every mutation', () => {
      const onChange = vi.fn();
      const ledger = createLedger(ZONES, { ...OPTIONS, onChange: onChange });
      ledger.addRain('front', 1);
      ledger.applyEt('back', '2024-06-14', 1);
      ledger.applyEt('back', '2024-06-14', 1);

      expect(onChange.mock.calls).toEqual([['front'], ['back']]);
    });

    it('should hand out copies', () => {
      const ledger = createLedger(ZONES, OPTIONS);
      const snapshot = ledger.snapshot();
      snapshot.front.balanceMm = 99;

      expect(ledger.getBalance('front')).toBe(0);
    });
  });
});
