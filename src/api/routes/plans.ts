/**
 * Plan Routes
 * Read-only access to the plan catalog
 */

import { Hono } from 'hono';

import type { PlanCatalog } from '../../services/index.js';
import {
  errorResponse,
  getRequestId,
  successResponse,
} from '../utils/response.js';

interface PlanRoutesDeps {
  catalog: Pick<PlanCatalog, 'listPlans' | 'getPlan'>;
}

/**
 * Create plan routes
 */
export function createPlanRoutes(deps: PlanRoutesDeps): Hono {
  const { catalog } = deps;
  const app = new Hono();

  /**
   * GET /plans
   * List every plan
   */
  app.get('/plans', (c) => {
    return successResponse(c, catalog.listPlans(), getRequestId(c));
  });

  /**
   * GET /plans/:planId
   * Get one plan
   */
  app.get('/plans/:planId', (c) => {
    const requestId = getRequestId(c);
    const result = catalog.getPlan(c.req.param('planId'));

    if (!result.success) {
      return errorResponse(c, result.error, requestId);
    }

    return successResponse(c, result.data, requestId);
  });

  return app;
}
