/**
 * PlanCatalog Implementation
 *
 * SCOPE: The fixed set of plans the simulator models and the units
 * provisioned with them at startup
 */

import type {
  Plan,
  PlanFile,
  Result,
  StorageUnitSnapshot,
  UnitProvisioning,
} from '../types/index.js';
import { failure, success } from '../types/index.js';

import type { BillingEngine } from './billing.service.js';

/**
 * PlanCatalog interface
 */
export interface PlanCatalog {
  listPlans(): Plan[];
  getPlan(planId: string): Result<Plan>;
  listProvisioning(): UnitProvisioning[];
}

/**
 * Create PlanCatalog instance
 */
export function createPlanCatalog(file: PlanFile): PlanCatalog {
  const plans = new Map<string, Plan>(
    file.plans.map((plan) => [plan.id, Object.freeze({ ...plan })])
  );
  const provisioning = file.units.map((unit) => ({ ...unit }));

  return {
    listPlans(): Plan[] {
      return [...plans.values()];
    },

    getPlan(planId: string): Result<Plan> {
      const plan = plans.get(planId);
      if (plan === undefined) {
        return failure('PLAN_NOT_FOUND', `Plan not found: ${planId}`, {
          planId,
        });
      }
      return success(plan);
    },

    listProvisioning(): UnitProvisioning[] {
      return provisioning.map((unit) => ({ ...unit }));
    },
  };
}

/**
 * Register every catalog unit with the engine, stopping at the first failure
 */
export function provisionUnits(
  engine: BillingEngine,
  catalog: PlanCatalog
): Result<StorageUnitSnapshot[]> {
  const registered: StorageUnitSnapshot[] = [];
  for (const { unitId, planId } of catalog.listProvisioning()) {
    const plan = catalog.getPlan(planId);
    if (!plan.success) {
      return plan;
    }
    const unit = engine.registerUnit(unitId, plan.data);
    if (!unit.success) {
      return unit;
    }
    registered.push(unit.data);
  }
  return success(registered);
}
