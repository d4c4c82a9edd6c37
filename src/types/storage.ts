/**
 * Storage Domain Types
 *
 * SCOPE: File inventory, monthly statistics and fee reports of a unit
 */

/**
 * A file held by a storage unit
 */
export interface StoredFile {
  id: string;
  sizeMB: number;
  createdAt: Date;
  lastModifiedAt: Date;
}

/**
 * Calendar month, month is 1-12
 */
export interface MonthKey {
  year: number;
  month: number;
}

/**
 * Per-unit, per-month aggregate.
 * Fees stay null until the month is calculated and reset on every mutation.
 */
export interface MonthStat {
  maxUsageMB: number;
  updateVolumeMB: number;
  storageFee: number | null;
  updateFee: number | null;
  usageFee: number | null;
}

export interface FeeBreakdown {
  storageFee: number;
  updateFee: number;
  usageFee: number;
}

/**
 * Fee report for one unit and month
 */
export interface FeeReport extends FeeBreakdown {
  unitId: string;
  /** YYYY-MM */
  period: string;
  maxUsageMB: number;
  updateVolumeMB: number;
  currentUsageMB: number;
}

export interface MonthStatSnapshot extends MonthStat {
  period: string;
}

/**
 * Read-only view of a unit for diagnostics
 */
export interface StorageUnitSnapshot {
  unitId: string;
  planId: string;
  currentUsageMB: number;
  lastOperationAt: Date | null;
  files: StoredFile[];
  months: MonthStatSnapshot[];
}

/**
 * Account-wide fees for one month
 */
export interface BillingSummary {
  period: string;
  units: FeeReport[];
  totals: FeeBreakdown;
}
