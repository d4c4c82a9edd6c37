/**
 * Billing Routes
 * Account-wide monthly summary
 */

import { Hono } from 'hono';

import type { BillingEngine } from '../../services/index.js';
import { parsePeriod } from '../../services/index.js';
import {
  errorResponse,
  getRequestId,
  successResponse,
} from '../utils/response.js';

interface BillingRoutesDeps {
  engine: Pick<BillingEngine, 'summarize'>;
}

/**
 * Create billing routes
 */
export function createBillingRoutes(deps: BillingRoutesDeps): Hono {
  const { engine } = deps;
  const app = new Hono();

  /**
   * GET /billing/:period
   * Fees of every unit active in a YYYY-MM month, with totals
   */
  app.get('/billing/:period', (c) => {
    const requestId = getRequestId(c);

    const period = parsePeriod(c.req.param('period'));
    if (!period.success) {
      return errorResponse(c, period.error, requestId);
    }

    return successResponse(
      c,
      engine.summarize(period.data.year, period.data.month),
      requestId
    );
  });

  return app;
}
