/**
 * Result Pattern Implementation
 *
 * Billing operations return Result<T> - domain failures are values, never
 * thrown exceptions. A failed operation leaves every unit untouched.
 */

/**
 * Stable failure codes surfaced to the CLI and HTTP layers
 */
export type BillingErrorCode =
  | 'DUPLICATE_UNIT'
  | 'UNIT_NOT_FOUND'
  | 'DUPLICATE_FILE'
  | 'FILE_NOT_FOUND'
  | 'INVALID_SIZE'
  | 'OUT_OF_ORDER_OPERATION'
  | 'NO_DATA_FOR_MONTH'
  | 'PLAN_NOT_FOUND'
  | 'PLAN_NOT_AVAILABLE'
  | 'FEE_LIMIT_EXCEEDED'
  | 'VALIDATION_ERROR'
  | 'INTERNAL_ERROR';

export interface BillingError {
  code: BillingErrorCode;
  message: string;
  details?: Record<string, unknown>;
}

export interface Success<T> {
  success: true;
  data: T;
}

export interface Failure {
  success: false;
  error: BillingError;
}

export type Result<T> = Success<T> | Failure;

/**
 * Helper function to create a success result
 */
export function success<T>(data: T): Success<T> {
  return { success: true, data };
}

/**
 * Helper function to create a failure result
 */
export function failure(
  code: BillingErrorCode,
  message: string,
  details?: Record<string, unknown>
): Failure {
  const error: BillingError = { code, message };
  if (details !== undefined) {
    error.details = details;
  }
  return {
    success: false,
    error,
  };
}

/**
 * Type guard to check if result is success
 */
export function isSuccess<T>(result: Result<T>): result is Success<T> {
  return result.success === true;
}

/**
 * Type guard to check if result is failure
 */
export function isFailure<T>(result: Result<T>): result is Failure {
  return result.success === false;
}
