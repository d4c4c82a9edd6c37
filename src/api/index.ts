/**
 * API Layer Exports
 *
 * API layer is thin - delegates to the billing engine for all business logic.
 */

export { createApp } from './app.js';
export type { ErrorResponse, ErrorStatus, SuccessResponse } from './types.js';
export { ERROR_STATUS_MAP, getErrorStatus } from './types.js';
