/**
 * Unit Routes
 * Unit provisioning, inventory inspection and monthly fee reports
 */

import { Hono } from 'hono';
import { z } from 'zod';

import type { BillingEngine, PlanCatalog } from '../../services/index.js';
import { parsePeriod } from '../../services/index.js';
import type { StorageUnitSnapshot } from '../../types/index.js';
import {
  errorResponse,
  formatDate,
  getRequestId,
  readJsonBody,
  successResponse,
  validationErrorResponse,
} from '../utils/response.js';

interface UnitRoutesDeps {
  engine: Pick<
    BillingEngine,
    'registerUnit' | 'getUnit' | 'listUnits' | 'calculate'
  >;
  catalog: Pick<PlanCatalog, 'getPlan'>;
}

// Zod Schemas
const registerUnitSchema = z.object({
  unitId: z
    .string()
    .min(1, 'unitId is required')
    .regex(/^\S+$/, 'unitId must not contain spaces'),
  planId: z.string().min(1, 'planId is required'),
});

/**
 * Dates as ISO strings
 */
function serializeUnit(unit: StorageUnitSnapshot) {
  return {
    unitId: unit.unitId,
    planId: unit.planId,
    currentUsageMB: unit.currentUsageMB,
    lastOperationAt:
      unit.lastOperationAt !== null ? formatDate(unit.lastOperationAt) : null,
    files: unit.files.map((file) => ({
      id: file.id,
      sizeMB: file.sizeMB,
      createdAt: formatDate(file.createdAt),
      lastModifiedAt: formatDate(file.lastModifiedAt),
    })),
    months: unit.months,
  };
}

/**
 * Create unit routes
 */
export function createUnitRoutes(deps: UnitRoutesDeps): Hono {
  const { engine, catalog } = deps;
  const app = new Hono();

  /**
   * POST /units
   * Register a unit with a catalog plan
   */
  app.post('/units', async (c) => {
    const requestId = getRequestId(c);

    const validation = registerUnitSchema.safeParse(await readJsonBody(c));
    if (!validation.success) {
      return validationErrorResponse(
        c,
        validation.error.issues[0]?.message ?? 'Invalid unit data',
        requestId
      );
    }

    const plan = catalog.getPlan(validation.data.planId);
    if (!plan.success) {
      return errorResponse(c, plan.error, requestId);
    }

    const result = engine.registerUnit(validation.data.unitId, plan.data);
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, serializeUnit(result.data), requestId, 201);
  });

  /**
   * GET /units
   * List every unit
   */
  app.get('/units', (c) => {
    return successResponse(
      c,
      engine.listUnits().map(serializeUnit),
      getRequestId(c)
    );
  });

  /**
   * GET /units/:unitId
   * Inventory and monthly statistics of one unit
   */
  app.get('/units/:unitId', (c) => {
    const requestId = getRequestId(c);
    const result = engine.getUnit(c.req.param('unitId'));

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, serializeUnit(result.data), requestId);
  });

  /**
   * GET /units/:unitId/fees/:period
   * Fee report of one unit for a YYYY-MM month
   */
  app.get('/units/:unitId/fees/:period', (c) => {
    const requestId = getRequestId(c);

    const period = parsePeriod(c.req.param('period'));
    if (!period.success) {
      return errorResponse(c, period.error, requestId);
    }

    const result = engine.calculate(
      c.req.param('unitId'),
      period.data.year,
      period.data.month
    );
    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data, requestId);
  });

  return app;
}
