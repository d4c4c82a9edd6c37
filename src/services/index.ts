/**
 * Service Layer Exports
 *
 * The billing core: storage units, the engine that routes operations to
 * them, and the plan catalog they are priced by.
 */

// StorageUnit
export type {
  FeeGuard,
  StorageUnit,
  StorageUnitMutation,
} from './storage-unit.service.js';
export { createStorageUnit } from './storage-unit.service.js';

// BillingEngine
export type {
  BillingEngine,
  BillingEngineOptions,
} from './billing.service.js';
export { createBillingEngine } from './billing.service.js';

// PlanCatalog
export type { PlanCatalog } from './plan-catalog.service.js';
export { createPlanCatalog, provisionUnits } from './plan-catalog.service.js';

// Helpers
export { computeFees, exceedsCeiling, roundFee, sumFees } from './fees.js';
export {
  formatPeriod,
  monthKeyOf,
  parsePeriod,
  parseTimestamp,
  periodOf,
} from './period.js';
