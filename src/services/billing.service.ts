/**
 * BillingEngine Implementation
 *
 * SCOPE: Owns the storage units of one account and routes operations to them
 *
 * RULES:
 * - Records are applied in the order supplied, never re-sorted
 * - Per-unit timestamp order is enforced by the unit itself
 * - On a free account, units whose plan is paid-only reject mutations
 * - On a free account, a mutation may not lift the month's fees, summed over
 *   every free-tier unit, above the ceiling of the mutated unit's plan
 * - CALC reads the month of its own timestamp and never mutates state
 *
 * Dependencies: StorageUnit
 */

import type {
  AccountTier,
  ApplyResult,
  BillingSummary,
  CalcResult,
  Failure,
  FeeBreakdown,
  FeeReport,
  OperationRecord,
  OperationResult,
  Plan,
  Result,
  StorageUnitSnapshot,
} from '../types/index.js';
import { failure, success } from '../types/index.js';

import { exceedsCeiling, sumFees } from './fees.js';
import { formatPeriod, monthKeyOf } from './period.js';
import type { StorageUnit, StorageUnitMutation } from './storage-unit.service.js';
import { createStorageUnit } from './storage-unit.service.js';

/**
 * BillingEngine interface
 */
export interface BillingEngine {
  readonly accountTier: AccountTier;
  registerUnit(unitId: string, plan: Plan): Result<StorageUnitSnapshot>;
  apply(record: OperationRecord): Result<ApplyResult>;
  calculate(unitId: string, year: number, month: number): Result<FeeReport>;
  getUnit(unitId: string): Result<StorageUnitSnapshot>;
  listUnits(): StorageUnitSnapshot[];
  /**
   * Fee reports of every unit active in the month, with account totals
   */
  summarize(year: number, month: number): BillingSummary;
  /**
   * Settle every touched month of every unit (end of run)
   */
  finalize(): FeeReport[];
}

export interface BillingEngineOptions {
  accountTier?: AccountTier;
}

/**
 * Create BillingEngine instance
 */
export function createBillingEngine(
  options: BillingEngineOptions = {}
): BillingEngine {
  const accountTier = options.accountTier ?? 'free';
  const units = new Map<string, StorageUnit>();

  // ─────────────────────────────────────────────────────────────
  // HELPER FUNCTIONS
  // ─────────────────────────────────────────────────────────────

  function findUnit(unitId: string): Result<StorageUnit> {
    const unit = units.get(unitId);
    if (unit === undefined) {
      return failure('UNIT_NOT_FOUND', `Storage unit not found: ${unitId}`, {
        unitId,
      });
    }
    return success(unit);
  }

  function isAvailable(plan: Plan): boolean {
    return accountTier === 'paid' || plan.freeTierAvailable;
  }

  /**
   * Free-tier fee limit, checked by a unit just before it commits
   */
  function checkFeeLimit(
    unitId: string,
    plan: Plan,
    period: string,
    fees: FeeBreakdown
  ): Failure | null {
    if (accountTier === 'paid' || plan.monthlyFeeCeiling === null) {
      return null;
    }

    const others = [...units.values()]
      .filter((unit) => unit.id !== unitId && unit.plan.freeTierAvailable)
      .map((unit) => unit.projectedFees(period));
    const total = sumFees([fees, ...others]);

    if (exceedsCeiling(plan, total)) {
      return failure(
        'FEE_LIMIT_EXCEEDED',
        `Monthly fees of ${total.usageFee} would exceed the free tier limit of ${plan.monthlyFeeCeiling}`,
        {
          unitId,
          period,
          accountUsageFee: total.usageFee,
          monthlyFeeCeiling: plan.monthlyFeeCeiling,
        }
      );
    }
    return null;
  }

  function toOperationResult(
    record: Exclude<OperationRecord, { kind: 'CALC' }>,
    mutation: Result<StorageUnitMutation>
  ): Result<ApplyResult> {
    if (!mutation.success) {
      return mutation;
    }
    const result: OperationResult = {
      kind: record.kind,
      unitId: record.unitId,
      fileId: record.fileId,
      at: record.timestamp,
      currentUsageMB: mutation.data.currentUsageMB,
      fees: mutation.data.fees,
    };
    return success(result);
  }

  // ─────────────────────────────────────────────────────────────
  // ENGINE IMPLEMENTATION
  // ─────────────────────────────────────────────────────────────

  return {
    accountTier,

    registerUnit(unitId: string, plan: Plan): Result<StorageUnitSnapshot> {
      if (units.has(unitId)) {
        return failure(
          'DUPLICATE_UNIT',
          `Storage unit already registered: ${unitId}`,
          { unitId }
        );
      }
      const unit = createStorageUnit({
        id: unitId,
        plan,
        feeGuard: (period, fees) => checkFeeLimit(unitId, plan, period, fees),
      });
      units.set(unitId, unit);
      return success(unit.snapshot());
    },

    apply(record: OperationRecord): Result<ApplyResult> {
      const found = findUnit(record.unitId);
      if (!found.success) {
        return found;
      }
      const unit = found.data;

      if (record.kind === 'CALC') {
        const { year, month } = monthKeyOf(record.timestamp);
        const report = unit.calculate(year, month);
        if (!report.success) {
          return report;
        }
        const result: CalcResult = {
          kind: 'CALC',
          unitId: record.unitId,
          report: report.data,
        };
        return success(result);
      }

      if (!isAvailable(unit.plan)) {
        return failure(
          'PLAN_NOT_AVAILABLE',
          `Plan ${unit.plan.id} of unit ${unit.id} is not available on the ${accountTier} tier`,
          { unitId: unit.id, planId: unit.plan.id, accountTier }
        );
      }

      switch (record.kind) {
        case 'UPLOAD':
          return toOperationResult(
            record,
            unit.upload(record.fileId, record.sizeMB, record.timestamp)
          );
        case 'DELETE':
          return toOperationResult(
            record,
            unit.delete(record.fileId, record.timestamp)
          );
        case 'UPDATE':
          return toOperationResult(
            record,
            unit.update(record.fileId, record.sizeMB, record.timestamp)
          );
        default: {
          const unhandled: never = record;
          return failure('INTERNAL_ERROR', 'Unhandled operation kind', {
            record: unhandled,
          });
        }
      }
    },

    calculate(unitId: string, year: number, month: number): Result<FeeReport> {
      const found = findUnit(unitId);
      if (!found.success) {
        return found;
      }
      return found.data.calculate(year, month);
    },

    getUnit(unitId: string): Result<StorageUnitSnapshot> {
      const found = findUnit(unitId);
      if (!found.success) {
        return found;
      }
      return success(found.data.snapshot());
    },

    listUnits(): StorageUnitSnapshot[] {
      return [...units.values()].map((unit) => unit.snapshot());
    },

    summarize(year: number, month: number): BillingSummary {
      const reports: FeeReport[] = [];
      for (const unit of units.values()) {
        if (!unit.hasActivity(year, month)) {
          continue;
        }
        const report = unit.calculate(year, month);
        if (report.success) {
          reports.push(report.data);
        }
      }
      return {
        period: formatPeriod({ year, month }),
        units: reports,
        totals: sumFees(reports),
      };
    },

    finalize(): FeeReport[] {
      return [...units.values()].flatMap((unit) => unit.finalize());
    },
  };
}
