/**
 * Error Codes for the booth ledger API
 *
 * Categorized by error type:
 * - 2xxx: Validation errors
 * - 3xxx: Business logic errors
 * - 5xxx: System errors
 */

export enum ErrorCode {
  // Validation errors (2xxx)
  VALIDATION_ERROR = 2001,
  EMPTY_BASKET = 2003,

  // Business errors (3xxx)
  PRODUCT_NOT_FOUND = 3001,
  EVENT_NOT_FOUND = 3002,
  TRANSACTION_NOT_FOUND = 3003,
  NO_EVENT_SELECTED = 3004,
  INSUFFICIENT_STOCK = 3005,
  EXPORT_NOT_FOUND = 3006,
  RESOURCE_NOT_FOUND = 3010,

  // System errors (5xxx)
  INTERNAL_ERROR = 5001,
}

/**
 * Error code to HTTP status code mapping
 */
export const errorCodeToStatus: Record<ErrorCode, number> = {
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.EMPTY_BASKET]: 400,

  [ErrorCode.PRODUCT_NOT_FOUND]: 404,
  [ErrorCode.EVENT_NOT_FOUND]: 404,
  [ErrorCode.TRANSACTION_NOT_FOUND]: 404,
  [ErrorCode.NO_EVENT_SELECTED]: 409,
  [ErrorCode.INSUFFICIENT_STOCK]: 409,
  [ErrorCode.EXPORT_NOT_FOUND]: 404,
  [ErrorCode.RESOURCE_NOT_FOUND]: 404,

  [ErrorCode.INTERNAL_ERROR]: 500,
};

/**
 * Standard error response format
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, string[]>;
    timestamp: string;
    correlationId?: string;
  };
}
