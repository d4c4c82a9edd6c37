/**
 * StorageUnit Implementation
 *
 * SCOPE: File inventory and monthly statistics of one storage unit
 *
 * RULES:
 * - Mutations must arrive in non-decreasing timestamp order
 * - maxUsageMB is a running maximum of post-operation inventory totals
 * - A month first touched starts from the inventory carried into it
 * - updateVolumeMB grows only through UPDATE, by |newSize - oldSize|
 * - Every check runs before any state changes, the fee guard last
 */

import type {
  FeeBreakdown,
  FeeReport,
  Failure,
  MonthStat,
  Plan,
  Result,
  StorageUnitSnapshot,
  StoredFile,
} from '../types/index.js';
import { failure, success } from '../types/index.js';

import { computeFees } from './fees.js';
import { formatPeriod, periodOf } from './period.js';

/**
 * State of the unit after a successful mutation
 */
export interface StorageUnitMutation {
  currentUsageMB: number;
  fees: FeeReport;
}

/**
 * Veto on the fees a mutation would leave its month at
 */
export type FeeGuard = (period: string, fees: FeeBreakdown) => Failure | null;

/**
 * StorageUnit interface
 */
export interface StorageUnit {
  readonly id: string;
  readonly plan: Plan;
  upload(fileId: string, sizeMB: number, at: Date): Result<StorageUnitMutation>;
  delete(fileId: string, at: Date): Result<StorageUnitMutation>;
  update(
    fileId: string,
    newSizeMB: number,
    at: Date
  ): Result<StorageUnitMutation>;
  calculate(year: number, month: number): Result<FeeReport>;
  /**
   * Fees the month stands at now. A month the unit has not touched is
   * priced on the inventory it holds.
   */
  projectedFees(period: string): FeeBreakdown;
  hasActivity(year: number, month: number): boolean;
  /**
   * Calculate and cache the fees of every month the unit touched
   */
  finalize(): FeeReport[];
  snapshot(): StorageUnitSnapshot;
}

/**
 * A validated change waiting to be committed
 */
interface PendingChange {
  at: Date;
  usageDeltaMB: number;
  updateVolumeMB: number;
  apply: () => void;
}

/**
 * Create StorageUnit instance
 */
export function createStorageUnit(deps: {
  id: string;
  plan: Plan;
  feeGuard?: FeeGuard;
}): StorageUnit {
  const { id, plan, feeGuard } = deps;
  const files = new Map<string, StoredFile>();
  const monthlyStats = new Map<string, MonthStat>();
  let currentUsageMB = 0;
  let lastOperationAt: Date | null = null;

  // ─────────────────────────────────────────────────────────────
  // HELPER FUNCTIONS
  // ─────────────────────────────────────────────────────────────

  function checkOrder(at: Date): Failure | null {
    if (Number.isNaN(at.getTime())) {
      return failure('VALIDATION_ERROR', `Invalid timestamp on unit ${id}`, {
        unitId: id,
      });
    }
    if (lastOperationAt !== null && at.getTime() < lastOperationAt.getTime()) {
      return failure(
        'OUT_OF_ORDER_OPERATION',
        `Operation at ${at.toISOString()} precedes last operation at ${lastOperationAt.toISOString()} on unit ${id}`,
        {
          unitId: id,
          at: at.toISOString(),
          lastOperationAt: lastOperationAt.toISOString(),
        }
      );
    }
    return null;
  }

  function checkSize(fileId: string, sizeMB: number): Failure | null {
    if (!Number.isFinite(sizeMB) || sizeMB < 0) {
      return failure('INVALID_SIZE', `Invalid size for ${fileId}: ${sizeMB}`, {
        unitId: id,
        fileId,
        sizeMB,
      });
    }
    return null;
  }

  function fileNotFound(fileId: string): Failure {
    return failure(
      'FILE_NOT_FOUND',
      `File ${fileId} does not exist in unit ${id}`,
      { unitId: id, fileId }
    );
  }

  function openMonth(period: string): MonthStat {
    return (
      monthlyStats.get(period) ?? {
        maxUsageMB: currentUsageMB,
        updateVolumeMB: 0,
        storageFee: null,
        updateFee: null,
        usageFee: null,
      }
    );
  }

  function toReport(
    period: string,
    stat: MonthStat,
    fees: FeeBreakdown
  ): FeeReport {
    return {
      unitId: id,
      period,
      maxUsageMB: stat.maxUsageMB,
      updateVolumeMB: stat.updateVolumeMB,
      currentUsageMB,
      storageFee: fees.storageFee,
      updateFee: fees.updateFee,
      usageFee: fees.usageFee,
    };
  }

  /**
   * Compute the month's fees once and cache them on the stat
   */
  function settle(period: string, stat: MonthStat): FeeReport {
    if (
      stat.storageFee === null ||
      stat.updateFee === null ||
      stat.usageFee === null
    ) {
      const fees = computeFees(plan, stat.maxUsageMB, stat.updateVolumeMB);
      stat.storageFee = fees.storageFee;
      stat.updateFee = fees.updateFee;
      stat.usageFee = fees.usageFee;
      return toReport(period, stat, fees);
    }
    return toReport(period, stat, {
      storageFee: stat.storageFee,
      updateFee: stat.updateFee,
      usageFee: stat.usageFee,
    });
  }

  function commit(change: PendingChange): Result<StorageUnitMutation> {
    const period = periodOf(change.at);
    const current = openMonth(period);
    const nextUsageMB = currentUsageMB + change.usageDeltaMB;
    const next: MonthStat = {
      maxUsageMB: Math.max(current.maxUsageMB, nextUsageMB),
      updateVolumeMB: current.updateVolumeMB + change.updateVolumeMB,
      storageFee: null,
      updateFee: null,
      usageFee: null,
    };
    const fees = computeFees(plan, next.maxUsageMB, next.updateVolumeMB);

    const veto = feeGuard?.(period, fees) ?? null;
    if (veto !== null) {
      return veto;
    }

    change.apply();
    currentUsageMB = nextUsageMB;
    lastOperationAt = change.at;
    monthlyStats.set(period, next);

    return success({
      currentUsageMB,
      fees: toReport(period, next, fees),
    });
  }

  // ─────────────────────────────────────────────────────────────
  // UNIT IMPLEMENTATION
  // ─────────────────────────────────────────────────────────────

  return {
    id,
    plan,

    upload(
      fileId: string,
      sizeMB: number,
      at: Date
    ): Result<StorageUnitMutation> {
      const rejection = checkOrder(at) ?? checkSize(fileId, sizeMB);
      if (rejection !== null) {
        return rejection;
      }
      if (files.has(fileId)) {
        return failure(
          'DUPLICATE_FILE',
          `File ${fileId} already exists in unit ${id}`,
          { unitId: id, fileId }
        );
      }

      return commit({
        at,
        usageDeltaMB: sizeMB,
        updateVolumeMB: 0,
        apply: () => {
          files.set(fileId, {
            id: fileId,
            sizeMB,
            createdAt: at,
            lastModifiedAt: at,
          });
        },
      });
    },

    delete(fileId: string, at: Date): Result<StorageUnitMutation> {
      const rejection = checkOrder(at);
      if (rejection !== null) {
        return rejection;
      }
      const file = files.get(fileId);
      if (file === undefined) {
        return fileNotFound(fileId);
      }

      return commit({
        at,
        usageDeltaMB: -file.sizeMB,
        updateVolumeMB: 0,
        apply: () => {
          files.delete(fileId);
        },
      });
    },

    update(
      fileId: string,
      newSizeMB: number,
      at: Date
    ): Result<StorageUnitMutation> {
      const rejection = checkOrder(at);
      if (rejection !== null) {
        return rejection;
      }
      const file = files.get(fileId);
      if (file === undefined) {
        return fileNotFound(fileId);
      }
      const sizeRejection = checkSize(fileId, newSizeMB);
      if (sizeRejection !== null) {
        return sizeRejection;
      }

      return commit({
        at,
        usageDeltaMB: newSizeMB - file.sizeMB,
        updateVolumeMB: Math.abs(newSizeMB - file.sizeMB),
        apply: () => {
          files.set(fileId, {
            ...file,
            sizeMB: newSizeMB,
            lastModifiedAt: at,
          });
        },
      });
    },

    calculate(year: number, month: number): Result<FeeReport> {
      if (
        !Number.isInteger(year) ||
        !Number.isInteger(month) ||
        month < 1 ||
        month > 12
      ) {
        return failure('VALIDATION_ERROR', `Invalid month: ${year}-${month}`, {
          year,
          month,
        });
      }

      const period = formatPeriod({ year, month });
      const stat = monthlyStats.get(period);
      if (stat === undefined) {
        return failure(
          'NO_DATA_FOR_MONTH',
          `Unit ${id} has no activity in ${period}`,
          { unitId: id, period }
        );
      }
      return success(settle(period, stat));
    },

    projectedFees(period: string): FeeBreakdown {
      const stat = monthlyStats.get(period);
      if (stat === undefined) {
        return computeFees(plan, currentUsageMB, 0);
      }
      return computeFees(plan, stat.maxUsageMB, stat.updateVolumeMB);
    },

    hasActivity(year: number, month: number): boolean {
      return monthlyStats.has(formatPeriod({ year, month }));
    },

    finalize(): FeeReport[] {
      return [...monthlyStats.entries()]
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([period, stat]) => settle(period, stat));
    },

    snapshot(): StorageUnitSnapshot {
      return {
        unitId: id,
        planId: plan.id,
        currentUsageMB,
        lastOperationAt,
        files: [...files.values()].map((file) => ({ ...file })),
        months: [...monthlyStats.entries()]
          .sort(([a], [b]) => a.localeCompare(b))
          .map(([period, stat]) => ({ period, ...stat })),
      };
    },
  };
}
