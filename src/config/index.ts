/**
 * Application configuration
 *
 * Read from the environment (dotenv loads .env first in the entry points).
 */

import { z } from 'zod';

import type { AccountTier, Result } from '../types/index.js';
import { failure, success } from '../types/index.js';

import { DEFAULT_PLANS_FILE } from './plans.js';

export { DEFAULT_PLANS_FILE, loadPlanFile, parsePlanFile } from './plans.js';

export interface AppConfig {
  port: number;
  plansFile: string;
  accountTier: AccountTier;
  allowedOrigins: string[];
}

// Zod Schemas
const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  PLANS_FILE: z.string().optional(),
  ACCOUNT_TIER: z.enum(['free', 'paid']).default('free'),
  ALLOWED_ORIGINS: z.string().optional(),
});

/**
 * Validate the environment. Empty variables count as unset.
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env
): Result<AppConfig> {
  const defined = Object.fromEntries(
    Object.entries(env).filter(
      ([, value]) => value !== undefined && value.trim() !== ''
    )
  );

  const validation = envSchema.safeParse(defined);
  if (!validation.success) {
    return failure('VALIDATION_ERROR', 'Invalid environment configuration', {
      keys: [
        ...new Set(validation.error.issues.map((issue) => issue.path.join('.'))),
      ],
    });
  }

  const vars = validation.data;
  return success({
    port: vars.PORT,
    plansFile: vars.PLANS_FILE ?? DEFAULT_PLANS_FILE,
    accountTier: vars.ACCOUNT_TIER,
    allowedOrigins: (vars.ALLOWED_ORIGINS ?? 'http://localhost:3000')
      .split(',')
      .map((origin) => origin.trim())
      .filter((origin) => origin !== ''),
  });
}
