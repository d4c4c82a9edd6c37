/**
 * Output formatting for the replay CLI
 */

import type {
  ApplyResult,
  BillingError,
  BillingSummary,
  FeeBreakdown,
  OperationRecord,
  Plan,
} from '../types/index.js';

function formatFees(fees: FeeBreakdown): string {
  return `storage=${fees.storageFee} update=${fees.updateFee} usage_fee=${fees.usageFee}`;
}

/**
 * One line per applied operation
 */
export function formatResult(result: ApplyResult): string {
  if (result.kind === 'CALC') {
    const report = result.report;
    return (
      `CALC ${report.unitId} ${report.period}: ` +
      `max=${report.maxUsageMB}MB current=${report.currentUsageMB}MB ` +
      `updates=${report.updateVolumeMB}MB ${formatFees(report)}`
    );
  }

  return (
    `${result.kind} ${result.unitId} ${result.fileId}: ` +
    `usage=${result.currentUsageMB}MB ${formatFees(result.fees)}`
  );
}

export function formatError(lineNumber: number, error: BillingError): string {
  return `ERROR line ${lineNumber}: ${error.code} ${error.message}`;
}

/**
 * Echo of a parsed record, for --verbose
 */
export function formatRecord(record: OperationRecord): string {
  const fields: string[] = [
    record.timestamp.toISOString(),
    record.kind,
    record.unitId,
  ];
  if (record.kind !== 'CALC') {
    fields.push(record.fileId);
  }
  if (record.kind === 'UPLOAD' || record.kind === 'UPDATE') {
    fields.push(String(record.sizeMB));
  }
  return fields.join(' ');
}

export function formatSummary(summary: BillingSummary): string[] {
  return [
    `SUMMARY ${summary.period}: ${formatFees(summary.totals)}`,
    ...summary.units.map(
      (report) =>
        `  ${report.unitId}: max=${report.maxUsageMB}MB ` +
        `updates=${report.updateVolumeMB}MB ${formatFees(report)}`
    ),
  ];
}

export function formatPlan(plan: Plan): string {
  return (
    `${plan.id} ${plan.name}: ` +
    `storage=${plan.storagePricePerMB}/MB update=${plan.updatePricePerMB}/MB ` +
    `free_cap=${plan.freeMonthlyFeeCapMB === null ? 'none' : `${plan.freeMonthlyFeeCapMB}MB`} ` +
    `ceiling=${plan.monthlyFeeCeiling ?? 'none'} ` +
    `tier=${plan.freeTierAvailable ? 'free' : 'paid'}`
  );
}
