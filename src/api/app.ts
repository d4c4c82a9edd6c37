/**
 * Main Hono Application
 * Wires together all routes and middleware
 */

import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';

import type { BillingEngine, PlanCatalog } from '../services/index.js';

import { createRequestIdMiddleware } from './middleware/request-id.js';
import { createBillingRoutes } from './routes/billing.js';
import { createHealthRoutes } from './routes/health.js';
import { createOperationRoutes } from './routes/operations.js';
import { createPlanRoutes } from './routes/plans.js';
import { createUnitRoutes } from './routes/units.js';

/**
 * App configuration
 */
interface AppConfig {
  engine: BillingEngine;
  catalog: PlanCatalog;
  allowedOrigins?: string[];
  /**
   * Request logging; off in tests
   */
  logRequests?: boolean;
}

/**
 * Create the main Hono application
 */
export function createApp(config: AppConfig): Hono {
  const { engine, catalog, allowedOrigins, logRequests } = config;
  const app = new Hono();

  // Global middleware
  if (logRequests !== false) {
    app.use('*', logger());
  }
  app.use(
    '*',
    cors({
      origin: allowedOrigins ?? ['http://localhost:3000'],
    })
  );
  app.use('*', createRequestIdMiddleware());

  app.route('/api/v1', createHealthRoutes());
  app.route('/api/v1', createPlanRoutes({ catalog }));
  app.route('/api/v1', createUnitRoutes({ engine, catalog }));
  app.route('/api/v1', createOperationRoutes({ engine }));
  app.route('/api/v1', createBillingRoutes({ engine }));

  // 404 handler
  app.notFound((c) => {
    return c.json(
      {
        error: {
          code: 'NOT_FOUND',
          message: 'Endpoint not found',
          requestId: c.get('requestId') ?? 'unknown',
        },
      },
      404
    );
  });

  // Global error handler
  app.onError((err, c) => {
    console.error('Unhandled error:', err);

    return c.json(
      {
        error: {
          code: 'INTERNAL_ERROR',
          message: 'An unexpected error occurred',
          requestId: c.get('requestId') ?? 'unknown',
        },
      },
      500
    );
  });

  return app;
}
