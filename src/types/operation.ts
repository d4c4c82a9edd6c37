/**
 * Operation Domain Types
 *
 * An OperationRecord is one validated, time-stamped instruction. It is built
 * by the CLI parser or the HTTP layer and consumed by the billing engine.
 */

import type { FeeReport } from './storage.js';

export const OPERATION_KINDS = ['UPLOAD', 'DELETE', 'UPDATE', 'CALC'] as const;

export type OperationKind = (typeof OPERATION_KINDS)[number];

export type MutationKind = Exclude<OperationKind, 'CALC'>;

interface RecordBase {
  timestamp: Date;
  unitId: string;
}

export interface UploadRecord extends RecordBase {
  kind: 'UPLOAD';
  fileId: string;
  sizeMB: number;
}

export interface DeleteRecord extends RecordBase {
  kind: 'DELETE';
  fileId: string;
}

export interface UpdateRecord extends RecordBase {
  kind: 'UPDATE';
  fileId: string;
  sizeMB: number;
}

export interface CalcRecord extends RecordBase {
  kind: 'CALC';
}

export type OperationRecord =
  | UploadRecord
  | DeleteRecord
  | UpdateRecord
  | CalcRecord;

/**
 * Outcome of UPLOAD, DELETE or UPDATE
 */
export interface OperationResult {
  kind: MutationKind;
  unitId: string;
  fileId: string;
  at: Date;
  currentUsageMB: number;
  /** Running fees of the month the operation fell in */
  fees: FeeReport;
}

/**
 * Outcome of CALC
 */
export interface CalcResult {
  kind: 'CALC';
  unitId: string;
  report: FeeReport;
}

export type ApplyResult = OperationResult | CalcResult;
