/**
 * Operation line parser
 *
 * Turns `<timestamp> <KIND> <unitId> [fileId] [sizeMB]` into an
 * OperationRecord. Blank lines and `#` comments parse to null.
 */

import { z } from 'zod';

import { parseTimestamp } from '../services/index.js';
import type {
  CalcRecord,
  DeleteRecord,
  OperationKind,
  OperationRecord,
  Result,
  UpdateRecord,
  UploadRecord,
} from '../types/index.js';
import { OPERATION_KINDS, failure, success } from '../types/index.js';

const FIELD_COUNTS: Record<OperationKind, number> = {
  UPLOAD: 5,
  DELETE: 4,
  UPDATE: 5,
  CALC: 3,
};

// Zod Schemas
const kindSchema = z
  .string()
  .transform((value) => value.toUpperCase())
  .pipe(z.enum(OPERATION_KINDS));

// Negative sizes parse; the storage unit rejects them as INVALID_SIZE
const sizeSchema = z
  .string()
  .regex(/^-?\d+(\.\d+)?$/, 'Size must be a decimal number of MB')
  .transform(Number);

function invalid(
  lineNumber: number,
  message: string,
  details: Record<string, unknown> = {}
): Result<OperationRecord | null> {
  return failure('VALIDATION_ERROR', message, { line: lineNumber, ...details });
}

function parseSize(lineNumber: number, raw: string): Result<number> {
  const validation = sizeSchema.safeParse(raw);
  if (!validation.success) {
    return failure(
      'VALIDATION_ERROR',
      validation.error.issues[0]?.message ?? 'Invalid size',
      { line: lineNumber, size: raw }
    );
  }
  return success(validation.data);
}

/**
 * Parse one input line
 */
export function parseLine(
  line: string,
  lineNumber: number
): Result<OperationRecord | null> {
  const trimmed = line.trim();
  if (trimmed === '' || trimmed.startsWith('#')) {
    return success(null);
  }

  const fields = trimmed.split(/\s+/);
  const [rawTimestamp = '', rawKind = '', unitId = '', fileId = '', rawSize = ''] =
    fields;

  const timestamp = parseTimestamp(rawTimestamp);
  if (!timestamp.success) {
    return invalid(lineNumber, timestamp.error.message, {
      timestamp: rawTimestamp,
    });
  }

  const kind = kindSchema.safeParse(rawKind);
  if (!kind.success) {
    return invalid(lineNumber, `Unknown operation: ${rawKind}`, {
      kind: rawKind,
    });
  }

  const expected = FIELD_COUNTS[kind.data];
  if (fields.length !== expected) {
    return invalid(
      lineNumber,
      `${kind.data} expects ${expected} fields, got ${fields.length}`,
      { kind: kind.data }
    );
  }

  switch (kind.data) {
    case 'CALC': {
      const record: CalcRecord = {
        kind: 'CALC',
        timestamp: timestamp.data,
        unitId,
      };
      return success(record);
    }
    case 'DELETE': {
      const record: DeleteRecord = {
        kind: 'DELETE',
        timestamp: timestamp.data,
        unitId,
        fileId,
      };
      return success(record);
    }
    case 'UPLOAD': {
      const size = parseSize(lineNumber, rawSize);
      if (!size.success) {
        return size;
      }
      const record: UploadRecord = {
        kind: 'UPLOAD',
        timestamp: timestamp.data,
        unitId,
        fileId,
        sizeMB: size.data,
      };
      return success(record);
    }
    case 'UPDATE': {
      const size = parseSize(lineNumber, rawSize);
      if (!size.success) {
        return size;
      }
      const record: UpdateRecord = {
        kind: 'UPDATE',
        timestamp: timestamp.data,
        unitId,
        fileId,
        sizeMB: size.data,
      };
      return success(record);
    }
  }
}
