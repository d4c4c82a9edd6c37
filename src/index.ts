/**
 * Storage Fee Simulator API Entry Point
 *
 * Loads configuration, provisions the catalog units and serves the Hono app.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';

import { createApp } from './api/index.js';
import { createBillingContext } from './bootstrap.js';
import { loadConfig } from './config/index.js';

// Validate environment
const config = loadConfig(process.env);
if (!config.success) {
  console.error(config.error.message, config.error.details ?? {});
  process.exit(1);
}

const context = createBillingContext({
  plansFile: config.data.plansFile,
  accountTier: config.data.accountTier,
});
if (!context.success) {
  console.error(context.error.message, context.error.details ?? {});
  process.exit(1);
}

// Create the API application
const app = createApp({
  engine: context.data.engine,
  catalog: context.data.catalog,
  allowedOrigins: config.data.allowedOrigins,
});

const port = config.data.port;

console.error(
  `Server starting on port ${port} (${config.data.accountTier} tier, plans from ${config.data.plansFile})`
);

serve({
  fetch: app.fetch,
  port,
});
