/**
 * Plan Domain Types
 *
 * SCOPE: Pricing and free-tier policy attached to a storage unit
 */

/**
 * Account tier the simulation runs for
 */
export type AccountTier = 'free' | 'paid';

/**
 * Plan - immutable fee rates and policy, shared read-only by units
 */
export interface Plan {
  readonly id: string;
  readonly name: string;
  readonly storagePricePerMB: number;
  readonly updatePricePerMB: number;
  /** MB volume at or under which a fee type is waived; null = no free cap */
  readonly freeMonthlyFeeCapMB: number | null;
  /**
   * On a free account, highest usage fee the free-tier units may reach
   * together in one month; null = unlimited
   */
  readonly monthlyFeeCeiling: number | null;
  readonly freeTierAvailable: boolean;
}

/**
 * A unit to register at startup
 */
export interface UnitProvisioning {
  unitId: string;
  planId: string;
}

/**
 * Contents of the plan catalog file
 */
export interface PlanFile {
  plans: Plan[];
  units: UnitProvisioning[];
}
