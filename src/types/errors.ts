/**
 * Error Codes for the QuickPay logging service
 *
 * Categorized by error type:
 * - 2xxx: Validation errors
 * - 3xxx: Business logic errors
 * - 5xxx: System errors (including degraded logging pipeline outcomes)
 */

export enum ErrorCode {
  // Validation errors (2xxx)
  VALIDATION_FAILED = 2001,
  INVALID_ARGUMENT = 2002,
  INVALID_AMOUNT = 2003,

  // Business errors (3xxx)
  PAYMENT_NOT_FOUND = 3001,
  RESOURCE_NOT_FOUND = 3002,

  // System errors (5xxx)
  INTERNAL_ERROR = 5001,
  RESOLUTION_FAILED = 5002,
  SERIALIZATION_DEGRADED = 5003,
  CONFIGURATION_ERROR = 5004,
}

/**
 * Error code to HTTP status code mapping
 */
export const errorCodeToStatus: Record<ErrorCode, number> = {
  [ErrorCode.VALIDATION_FAILED]: 400,
  [ErrorCode.INVALID_ARGUMENT]: 400,
  [ErrorCode.INVALID_AMOUNT]: 400,

  [ErrorCode.PAYMENT_NOT_FOUND]: 404,
  [ErrorCode.RESOURCE_NOT_FOUND]: 404,

  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.RESOLUTION_FAILED]: 500,
  [ErrorCode.SERIALIZATION_DEGRADED]: 500,
  [ErrorCode.CONFIGURATION_ERROR]: 500,
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
