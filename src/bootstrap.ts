/**
 * Shared wiring for the CLI and the HTTP server
 */

import { loadPlanFile } from './config/index.js';
import type { BillingEngine, PlanCatalog } from './services/index.js';
import {
  createBillingEngine,
  createPlanCatalog,
  provisionUnits,
} from './services/index.js';
import type { AccountTier, Result } from './types/index.js';
import { success } from './types/index.js';

export interface BillingContext {
  engine: BillingEngine;
  catalog: PlanCatalog;
}

export interface BillingContextOptions {
  plansFile: string;
  accountTier: AccountTier;
}

/**
 * Load the catalog, create the engine and register the catalog's units
 */
export function createBillingContext(
  options: BillingContextOptions
): Result<BillingContext> {
  const planFile = loadPlanFile(options.plansFile);
  if (!planFile.success) {
    return planFile;
  }

  const catalog = createPlanCatalog(planFile.data);
  const engine = createBillingEngine({ accountTier: options.accountTier });

  const provisioned = provisionUnits(engine, catalog);
  if (!provisioned.success) {
    return provisioned;
  }

  return success({ engine, catalog });
}
