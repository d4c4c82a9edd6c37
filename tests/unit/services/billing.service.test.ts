/**
 * BillingEngine Unit Tests
 *
 * SCOPE: Unit registry, operation routing and monthly reporting
 */

import { describe, it, expect, beforeEach } from 'vitest';

import type { BillingEngine } from '@/services/billing.service.js';
import { createBillingEngine } from '@/services/billing.service.js';
import type { OperationRecord } from '@/types/index.js';

import {
  ceilingPlan,
  paidOnlyPlan,
  standardPlan,
} from '../../fixtures/index.js';
import {
  at,
  createTestEngine,
  expectSuccess,
} from '../../helpers/test-utils.js';

// ─────────────────────────────────────────────────────────────
// TEST FIXTURES
// ─────────────────────────────────────────────────────────────

const UNIT_ID = 'storage_A1';

function upload(
  timestamp: string,
  fileId: string,
  sizeMB: number,
  unitId: string = UNIT_ID
): OperationRecord {
  return { kind: 'UPLOAD', timestamp: at(timestamp), unitId, fileId, sizeMB };
}

function update(
  timestamp: string,
  fileId: string,
  sizeMB: number,
  unitId: string = UNIT_ID
): OperationRecord {
  return { kind: 'UPDATE', timestamp: at(timestamp), unitId, fileId, sizeMB };
}

function remove(
  timestamp: string,
  fileId: string,
  unitId: string = UNIT_ID
): OperationRecord {
  return { kind: 'DELETE', timestamp: at(timestamp), unitId, fileId };
}

function calc(timestamp: string, unitId: string = UNIT_ID): OperationRecord {
  return { kind: 'CALC', timestamp: at(timestamp), unitId };
}

// ─────────────────────────────────────────────────────────────
// TESTS
// ─────────────────────────────────────────────────────────────

describe('BillingEngine', () => {
  let engine: BillingEngine;

  beforeEach(() => {
    engine = createTestEngine();
  });

  describe('registerUnit()', () => {
    it('should register a unit with an empty inventory', () => {
      const fresh = createBillingEngine();

      const result = expectSuccess(fresh.registerUnit('storage_X', standardPlan));

      expect(result).toEqual({
        unitId: 'storage_X',
        planId: 'standard',
        currentUsageMB: 0,
        lastOperationAt: null,
        files: [],
        months: [],
      });
    });

    it('should reject a unit id that is already registered', () => {
      const result = engine.registerUnit(UNIT_ID, paidOnlyPlan);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('DUPLICATE_UNIT');
      }
      expect(expectSuccess(engine.getUnit(UNIT_ID)).planId).toBe('standard');
    });

    it('should default to the free tier', () => {
      expect(createBillingEngine().accountTier).toBe('free');
    });
  });

  describe('apply()', () => {
    it('should report 50 in storage fees for 5000 MB at 0.01', () => {
      const uploaded = expectSuccess(
        engine.apply(upload('2060-04-01T00:00', 'file123', 5000))
      );
      const calculated = expectSuccess(engine.apply(calc('2060-04-30T00:00')));

      expect(uploaded).toMatchObject({
        kind: 'UPLOAD',
        unitId: UNIT_ID,
        fileId: 'file123',
        at: at('2060-04-01T00:00'),
        currentUsageMB: 5000,
      });
      expect(calculated.kind).toBe('CALC');
      if (calculated.kind === 'CALC') {
        expect(calculated.report.storageFee).toBe(50);
        expect(calculated.report.updateFee).toBe(0);
      }
    });

    it('should track peak usage and update volume through an UPDATE', () => {
      engine.apply(upload('2060-04-01T00:00', 'file123', 5000));
      engine.apply(update('2060-04-05T00:00', 'file123', 7000));

      const report = expectSuccess(engine.calculate(UNIT_ID, 2060, 4));

      expect(report.maxUsageMB).toBe(7000);
      expect(report.updateVolumeMB).toBe(2000);
    });

    it('should retain the peak after a DELETE empties the unit', () => {
      engine.apply(upload('2060-04-01T00:00', 'file123', 5000));
      engine.apply(update('2060-04-05T00:00', 'file123', 7000));
      engine.apply(remove('2060-04-10T00:00', 'file123'));

      const result = expectSuccess(engine.apply(calc('2060-04-30T00:00')));

      expect(result).toEqual({
        kind: 'CALC',
        unitId: UNIT_ID,
        report: {
          unitId: UNIT_ID,
          period: '2060-04',
          maxUsageMB: 7000,
          updateVolumeMB: 2000,
          currentUsageMB: 0,
          storageFee: 70,
          updateFee: 1,
          usageFee: 71,
        },
      });
      expect(expectSuccess(engine.getUnit(UNIT_ID)).files).toEqual([]);
    });

    it('should fail for a unit that is not registered', () => {
      const result = engine.apply(
        upload('2060-04-01T00:00', 'file999', 1000, 'storage_Z9')
      );

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('UNIT_NOT_FOUND');
        expect(result.error.message).toBe('Storage unit not found: storage_Z9');
      }
    });

    it('should reject a second UPLOAD of the same file', () => {
      engine.apply(upload('2060-04-01T00:00', 'fileA', 10));

      const result = engine.apply(upload('2060-04-02T00:00', 'fileA', 20));

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('DUPLICATE_FILE');
      }
    });

    it('should not move the unit clock on CALC', () => {
      engine.apply(upload('2060-04-01T00:00', 'fileA', 10));
      engine.apply(calc('2060-04-30T00:00'));

      const result = engine.apply(upload('2060-04-20T00:00', 'fileB', 10));

      expect(result.success).toBe(true);
    });

    it('should read the CALC month from its own timestamp', () => {
      engine.apply(upload('2060-04-01T00:00', 'fileA', 10));

      const result = engine.apply(calc('2060-05-01T00:00'));

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('NO_DATA_FOR_MONTH');
      }
    });

    it('should check timestamp order per unit', () => {
      const twoUnits = createTestEngine({
        storage_A1: standardPlan,
        storage_A2: standardPlan,
      });
      twoUnits.apply(upload('2060-04-10T00:00', 'fileA', 10, 'storage_A1'));

      const other = twoUnits.apply(
        upload('2060-04-01T00:00', 'fileB', 10, 'storage_A2')
      );
      const same = twoUnits.apply(
        upload('2060-04-01T00:00', 'fileC', 10, 'storage_A1')
      );

      expect(other.success).toBe(true);
      expect(same.success).toBe(false);
      if (!same.success) {
        expect(same.error.code).toBe('OUT_OF_ORDER_OPERATION');
      }
    });
  });

  describe('account tier', () => {
    it('should reject mutations on a paid-only plan for a free account', () => {
      const free = createTestEngine({ storage_B1: paidOnlyPlan });

      const result = free.apply(
        upload('2060-04-01T00:00', 'fileA', 10, 'storage_B1')
      );

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('PLAN_NOT_AVAILABLE');
      }
      expect(expectSuccess(free.getUnit('storage_B1')).files).toEqual([]);
    });

    it('should still answer CALC on a paid-only plan for a free account', () => {
      const free = createTestEngine({ storage_B1: paidOnlyPlan });

      const result = free.apply(calc('2060-04-30T00:00', 'storage_B1'));

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('NO_DATA_FOR_MONTH');
      }
    });

    it('should accept mutations on a paid-only plan for a paid account', () => {
      const paid = createTestEngine(
        { storage_B1: paidOnlyPlan },
        { accountTier: 'paid' }
      );

      const result = paid.apply(
        upload('2060-04-01T00:00', 'fileA', 10, 'storage_B1')
      );

      expect(result.success).toBe(true);
    });
  });

  describe('free tier fee limit', () => {
    it('should total the month fees of every free-tier unit', () => {
      const free = createTestEngine({
        storage_C1: ceilingPlan,
        storage_C2: ceilingPlan,
      });
      expectSuccess(free.apply(upload('2060-04-01T00:00', 'fileA', 600, 'storage_C1')));

      const result = free.apply(upload('2060-04-01T00:00', 'fileB', 500, 'storage_C2'));

      expect(result).toEqual({
        success: false,
        error: {
          code: 'FEE_LIMIT_EXCEEDED',
          message: 'Monthly fees of 11 would exceed the free tier limit of 10',
          details: {
            unitId: 'storage_C2',
            period: '2060-04',
            accountUsageFee: 11,
            monthlyFeeCeiling: 10,
          },
        },
      });
      expect(expectSuccess(free.getUnit('storage_C2')).files).toEqual([]);
    });

    it('should accept fees landing exactly on the limit', () => {
      const free = createTestEngine({
        storage_C1: ceilingPlan,
        storage_C2: ceilingPlan,
      });
      free.apply(upload('2060-04-01T00:00', 'fileA', 600, 'storage_C1'));

      const result = free.apply(upload('2060-04-01T00:00', 'fileB', 400, 'storage_C2'));

      expect(result.success).toBe(true);
    });

    it('should count units whose plan sets no ceiling', () => {
      const free = createTestEngine({
        storage_A1: standardPlan,
        storage_C1: ceilingPlan,
      });
      expectSuccess(free.apply(upload('2060-04-01T00:00', 'fileA', 800)));

      const limited = free.apply(upload('2060-04-02T00:00', 'fileB', 300, 'storage_C1'));
      const unlimited = free.apply(upload('2060-04-03T00:00', 'fileC', 5000));

      expect(limited.success).toBe(false);
      if (!limited.success) {
        expect(limited.error.details?.accountUsageFee).toBe(11);
      }
      expect(unlimited.success).toBe(true);
    });

    it('should count inventory carried into an untouched month', () => {
      const free = createTestEngine({
        storage_C1: ceilingPlan,
        storage_C2: ceilingPlan,
      });
      free.apply(upload('2060-04-01T00:00', 'fileA', 600, 'storage_C1'));

      const result = free.apply(upload('2060-05-01T00:00', 'fileB', 500, 'storage_C2'));

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.details?.period).toBe('2060-05');
      }
    });

    it('should not limit a paid account', () => {
      const paid = createTestEngine(
        { storage_C1: ceilingPlan, storage_C2: ceilingPlan },
        { accountTier: 'paid' }
      );
      paid.apply(upload('2060-04-01T00:00', 'fileA', 600, 'storage_C1'));

      const result = paid.apply(upload('2060-04-01T00:00', 'fileB', 5000, 'storage_C2'));

      expect(expectSuccess(result)).toMatchObject({ currentUsageMB: 5000 });
    });
  });

  describe('getUnit() / listUnits()', () => {
    it('should fail for an unknown unit', () => {
      const result = engine.getUnit('nope');

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.code).toBe('UNIT_NOT_FOUND');
      }
    });

    it('should list units in registration order', () => {
      const twoUnits = createTestEngine({
        storage_A1: standardPlan,
        storage_B1: paidOnlyPlan,
      });

      expect(twoUnits.listUnits().map((unit) => unit.unitId)).toEqual([
        'storage_A1',
        'storage_B1',
      ]);
    });

    it('should return copies that do not expose internal state', () => {
      engine.apply(upload('2060-04-01T00:00', 'fileA', 10));

      const snapshot = expectSuccess(engine.getUnit(UNIT_ID));
      snapshot.files.pop();

      expect(expectSuccess(engine.getUnit(UNIT_ID)).files).toHaveLength(1);
    });
  });

  describe('summarize()', () => {
    it('should include only units active in the month and total their fees', () => {
      const account = createTestEngine({
        storage_A1: standardPlan,
        storage_A2: standardPlan,
        storage_A3: standardPlan,
      });
      account.apply(upload('2060-04-01T00:00', 'fileA', 5000, 'storage_A1'));
      account.apply(upload('2060-04-02T00:00', 'fileB', 2000, 'storage_A2'));
      account.apply(upload('2060-05-02T00:00', 'fileC', 100, 'storage_A3'));

      const summary = account.summarize(2060, 4);

      expect(summary.period).toBe('2060-04');
      expect(summary.units.map((report) => report.unitId)).toEqual([
        'storage_A1',
        'storage_A2',
      ]);
      expect(summary.totals).toEqual({
        storageFee: 70,
        updateFee: 0,
        usageFee: 70,
      });
    });

    it('should return an empty summary for a quiet month', () => {
      const summary = engine.summarize(2060, 1);

      expect(summary).toEqual({
        period: '2060-01',
        units: [],
        totals: { storageFee: 0, updateFee: 0, usageFee: 0 },
      });
    });
  });

  describe('finalize()', () => {
    it('should settle every touched month of every unit', () => {
      const account = createTestEngine({
        storage_A1: standardPlan,
        storage_A2: standardPlan,
      });
      account.apply(upload('2060-04-01T00:00', 'fileA', 5000, 'storage_A1'));
      account.apply(update('2060-05-01T00:00', 'fileA', 5500, 'storage_A1'));
      account.apply(upload('2060-04-02T00:00', 'fileB', 2000, 'storage_A2'));

      const reports = account.finalize();

      expect(
        reports.map((report) => `${report.unitId}@${report.period}`)
      ).toEqual([
        'storage_A1@2060-04',
        'storage_A1@2060-05',
        'storage_A2@2060-04',
      ]);
      expect(reports[1]?.usageFee).toBe(55.25);
    });
  });
});
