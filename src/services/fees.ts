/**
 * Fee arithmetic
 *
 * Storage fee is charged on the month's peak usage, update fee on the month's
 * update volume. A plan's free cap waives each fee type on its own: the cap is
 * compared with the peak for the storage fee and with the volume for the
 * update fee, never with their sum.
 */

import type { FeeBreakdown, Plan } from '../types/index.js';

const FEE_PRECISION = 1_000_000;

/**
 * Round to 6 decimal places, dropping binary floating-point residue
 */
export function roundFee(value: number): number {
  return Math.round(value * FEE_PRECISION) / FEE_PRECISION;
}

function isWaived(plan: Plan, volumeMB: number): boolean {
  return plan.freeMonthlyFeeCapMB !== null && volumeMB <= plan.freeMonthlyFeeCapMB;
}

export function computeFees(
  plan: Plan,
  maxUsageMB: number,
  updateVolumeMB: number
): FeeBreakdown {
  const storageFee = isWaived(plan, maxUsageMB)
    ? 0
    : roundFee(maxUsageMB * plan.storagePricePerMB);
  const updateFee = isWaived(plan, updateVolumeMB)
    ? 0
    : roundFee(updateVolumeMB * plan.updatePricePerMB);

  return {
    storageFee,
    updateFee,
    usageFee: roundFee(storageFee + updateFee),
  };
}

export function exceedsCeiling(plan: Plan, fees: FeeBreakdown): boolean {
  return plan.monthlyFeeCeiling !== null && fees.usageFee > plan.monthlyFeeCeiling;
}

export function sumFees(items: FeeBreakdown[]): FeeBreakdown {
  const totals = items.reduce(
    (acc, item) => ({
      storageFee: acc.storageFee + item.storageFee,
      updateFee: acc.updateFee + item.updateFee,
      usageFee: acc.usageFee + item.usageFee,
    }),
    { storageFee: 0, updateFee: 0, usageFee: 0 }
  );
  return {
    storageFee: roundFee(totals.storageFee),
    updateFee: roundFee(totals.updateFee),
    usageFee: roundFee(totals.usageFee),
  };
}
