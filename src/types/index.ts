/**
 * Core type definitions for the storage fee simulator
 * This file exports all shared types used across the application
 */

export type {
  Result,
  Success,
  Failure,
  BillingError,
  BillingErrorCode,
} from './result.js';
export { success, failure, isSuccess, isFailure } from './result.js';
export type { AccountTier, Plan, PlanFile, UnitProvisioning } from './plan.js';
export type {
  StoredFile,
  MonthKey,
  MonthStat,
  MonthStatSnapshot,
  FeeBreakdown,
  FeeReport,
  StorageUnitSnapshot,
  BillingSummary,
} from './storage.js';
export type {
  OperationKind,
  MutationKind,
  UploadRecord,
  DeleteRecord,
  UpdateRecord,
  CalcRecord,
  OperationRecord,
  OperationResult,
  CalcResult,
  ApplyResult,
} from './operation.js';
export { OPERATION_KINDS } from './operation.js';
