/**
 * Operation Routes
 * Apply one operation record to the engine
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type { BillingEngine } from '../../services/index.js';
import { parseTimestamp } from '../../services/index.js';
import type { ApplyResult, OperationRecord } from '../../types/index.js';
import {
  errorResponse,
  formatDate,
  getRequestId,
  readJsonBody,
  successResponse,
  validationErrorResponse,
} from '../utils/response.js';

interface OperationRoutesDeps {
  engine: Pick<BillingEngine, 'apply'>;
}

// Zod Schemas
const recordFields = {
  timestamp: z.string().min(1, 'timestamp is required'),
  unitId: z.string().min(1, 'unitId is required'),
};
const fileIdSchema = z.string().min(1, 'fileId is required');
const sizeSchema = z.number({ invalid_type_error: 'sizeMB must be a number' });

const operationSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('UPLOAD'),
    ...recordFields,
    fileId: fileIdSchema,
    sizeMB: sizeSchema,
  }),
  z.object({
    kind: z.literal('DELETE'),
    ...recordFields,
    fileId: fileIdSchema,
  }),
  z.object({
    kind: z.literal('UPDATE'),
    ...recordFields,
    fileId: fileIdSchema,
    sizeMB: sizeSchema,
  }),
  z.object({
    kind: z.literal('CALC'),
    ...recordFields,
  }),
]);

function serializeResult(result: ApplyResult) {
  if (result.kind === 'CALC') {
    return result;
  }
  return { ...result, at: formatDate(result.at) };
}

/**
 * Create operation routes
 */
export function createOperationRoutes(deps: OperationRoutesDeps): Hono {
  const { engine } = deps;
  const app = new Hono();

  /**
   * POST /operations
   * Apply UPLOAD, DELETE, UPDATE or CALC
   */
  app.post('/operations', async (c) => {
    const requestId = getRequestId(c);

    const validation = operationSchema.safeParse(await readJsonBody(c));
    if (!validation.success) {
      return validationErrorResponse(
        c,
        validation.error.issues[0]?.message ?? 'Invalid operation',
        requestId
      );
    }

    const timestamp = parseTimestamp(validation.data.timestamp);
    if (!timestamp.success) {
      return errorResponse(c, timestamp.error, requestId);
    }

    const record: OperationRecord = {
      ...validation.data,
      timestamp: timestamp.data,
    };
    const result = engine.apply(record);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, serializeResult(result.data), requestId);
  });

  return app;
}
