/**
 * API Layer Types
 * Types specific to the HTTP/API layer
 */

import type { BillingErrorCode } from '../types/index.js';

/**
 * Extended Hono context with the request id
 */
declare module 'hono' {
  interface ContextVariableMap {
    requestId: string;
  }
}

/**
 * Standard success response format
 */
export interface SuccessResponse<T> {
  data: T;
  meta: {
    requestId: string;
  };
}

/**
 * Standard error response format
 */
export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: unknown;
    requestId: string;
  };
}

export type ErrorStatus = 400 | 402 | 403 | 404 | 409 | 500;

/**
 * Error code to HTTP status mapping
 */
export const ERROR_STATUS_MAP: Record<BillingErrorCode, ErrorStatus> = {
  DUPLICATE_UNIT: 409,
  UNIT_NOT_FOUND: 404,
  DUPLICATE_FILE: 409,
  FILE_NOT_FOUND: 404,
  INVALID_SIZE: 400,
  OUT_OF_ORDER_OPERATION: 409,
  NO_DATA_FOR_MONTH: 404,
  PLAN_NOT_FOUND: 404,
  PLAN_NOT_AVAILABLE: 403,
  FEE_LIMIT_EXCEEDED: 402,
  VALIDATION_ERROR: 400,
  INTERNAL_ERROR: 500,
};

/**
 * Get HTTP status code from error code
 */
export function getErrorStatus(code: BillingErrorCode): ErrorStatus {
  return ERROR_STATUS_MAP[code];
}
