/**
 * Plan file loading
 *
 * The catalog file lists the plans and the units provisioned with them.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';

import { z } from 'zod';

import type { PlanFile, Result } from '../types/index.js';
import { failure, success } from '../types/index.js';

export const DEFAULT_PLANS_FILE = fileURLToPath(
  new URL('../../config/plans.json', import.meta.url)
);

// Zod Schemas
const planSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  storagePricePerMB: z.number().nonnegative(),
  updatePricePerMB: z.number().nonnegative(),
  freeMonthlyFeeCapMB: z.number().nonnegative().nullable().default(null),
  monthlyFeeCeiling: z.number().nonnegative().nullable().default(null),
  freeTierAvailable: z.boolean().default(true),
});

const unitSchema = z.object({
  unitId: z.string().min(1).regex(/^\S+$/, 'Unit id must not contain spaces'),
  planId: z.string().min(1),
});

const planFileSchema = z
  .object({
    plans: z.array(planSchema).min(1),
    units: z.array(unitSchema).default([]),
  })
  .superRefine((file, ctx) => {
    const planIds = new Set<string>();
    file.plans.forEach((plan, index) => {
      if (planIds.has(plan.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['plans', index, 'id'],
          message: `Duplicate plan id ${plan.id}`,
        });
      }
      planIds.add(plan.id);
    });

    const unitIds = new Set<string>();
    file.units.forEach((unit, index) => {
      if (unitIds.has(unit.unitId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['units', index, 'unitId'],
          message: `Duplicate unit id ${unit.unitId}`,
        });
      }
      if (!planIds.has(unit.planId)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['units', index, 'planId'],
          message: `Unknown plan ${unit.planId}`,
        });
      }
      unitIds.add(unit.unitId);
    });
  });

/**
 * Validate raw catalog JSON
 */
export function parsePlanFile(raw: unknown): Result<PlanFile> {
  const validation = planFileSchema.safeParse(raw);
  if (!validation.success) {
    return failure('VALIDATION_ERROR', 'Invalid plan file', {
      issues: validation.error.issues.map(
        (issue) => `${issue.path.join('.')}: ${issue.message}`
      ),
    });
  }
  return success(validation.data);
}

/**
 * Read and validate a catalog file
 */
export function loadPlanFile(path: string = DEFAULT_PLANS_FILE): Result<PlanFile> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    return failure(
      'VALIDATION_ERROR',
      `Cannot read plan file ${path}: ${error instanceof Error ? error.message : String(error)}`,
      { path }
    );
  }
  return parsePlanFile(raw);
}
