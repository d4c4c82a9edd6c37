/**
 * API Response Helpers
 * Standardized response formatting
 */

import type { Context } from 'hono';

import type { BillingError } from '../../types/index.js';
import { getErrorStatus } from '../types.js';

/**
 * Helper to get request ID from context
 */
export function getRequestId(c: Context): string {
  return c.get('requestId');
}

/**
 * Format date to ISO string
 */
export function formatDate(date: Date): string {
  return date.toISOString();
}

/**
 * Create error response from service error
 */
export function errorResponse(
  c: Context,
  error: BillingError,
  requestId: string
): Response {
  return c.json(
    {
      error: {
        code: error.code,
        message: error.message,
        details: error.details,
        requestId,
      },
    },
    getErrorStatus(error.code)
  );
}

/**
 * Create a VALIDATION_ERROR response from the first zod issue
 */
export function validationErrorResponse(
  c: Context,
  message: string,
  requestId: string
): Response {
  return errorResponse(c, { code: 'VALIDATION_ERROR', message }, requestId);
}

/**
 * Create success response with data
 */
export function successResponse<T>(
  c: Context,
  data: T,
  requestId: string,
  status: 200 | 201 = 200
): Response {
  return c.json(
    {
      data,
      meta: { requestId },
    },
    status
  );
}

/**
 * Read a JSON body, or undefined when the body is not JSON
 */
export async function readJsonBody(c: Context): Promise<unknown> {
  try {
    return await c.req.json();
  } catch {
    return undefined;
  }
}
