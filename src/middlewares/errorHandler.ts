/**
 * Error Handling Middleware
 *
 * Provides centralized error handling with consistent error response format,
 * correlated error logging, and error sanitization for production.
 */

import { Request, Response, NextFunction } from 'express';
import { config } from '../config';
import { contextStore, createLogger, PipelineError } from '../observability';
import { ErrorCode, ErrorResponse, errorCodeToStatus } from '../types/errors';

const log = createLogger('ErrorHandler');

/**
 * Extended Error interface with additional properties
 */
export interface AppError extends Error {
  statusCode?: number;
  errorCode?: ErrorCode;
  isOperational?: boolean;
  validationErrors?: Record<string, string[]>;
}

/**
 * Main error handler middleware
 *
 * Catches all errors and returns a consistent JSON response format.
 * The record it logs carries the request's correlation id from the bound context.
 */
export const errorHandler = (
  err: AppError,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const correlationId = contextStore.correlationId();

  const errorCode =
    err.errorCode ?? (err instanceof PipelineError ? err.errorCode : ErrorCode.INTERNAL_ERROR);
  const statusCode = err.statusCode ?? errorCodeToStatus[errorCode] ?? 500;

  if (statusCode >= 500) {
    log.error('Request {} {} failed with {}', req.method, req.path, statusCode, err);
  } else {
    log.warn('Request {} {} rejected with {}: {}', req.method, req.path, statusCode, err.message);
  }

  // Sanitize error message for production 5xx errors
  const message =
    config.isProduction && statusCode >= 500
      ? 'Internal server error'
      : err.message || 'An error occurred';

  const response: ErrorResponse = {
    success: false,
    error: {
      code: errorCode,
      message,
      timestamp: new Date().toISOString(),
      ...(correlationId !== undefined && { correlationId }),
    },
  };

  if (err.validationErrors) {
    response.error.details = err.validationErrors;
  }

  res.status(statusCode).json(response);
};

/**
 * Not found handler for unmatched routes
 */
export const notFoundHandler = (
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const correlationId = contextStore.correlationId();

  const response: ErrorResponse = {
    success: false,
    error: {
      code: ErrorCode.RESOURCE_NOT_FOUND,
      message: `Route ${req.method} ${req.path} not found`,
      timestamp: new Date().toISOString(),
      ...(correlationId !== undefined && { correlationId }),
    },
  };

  res.status(404).json(response);
};

/**
 * API Error class for throwing operational errors
 */
export class ApiError extends Error implements AppError {
  statusCode: number;
  errorCode: ErrorCode;
  isOperational: boolean;
  validationErrors?: Record<string, string[]>;

  constructor(
    errorCode: ErrorCode,
    message: string,
    options?: {
      statusCode?: number;
      isOperational?: boolean;
      validationErrors?: Record<string, string[]>;
    }
  ) {
    super(message);
    this.name = 'ApiError';
    this.errorCode = errorCode;
    this.statusCode = options?.statusCode ?? errorCodeToStatus[errorCode] ?? 500;
    this.isOperational = options?.isOperational ?? true;
    this.validationErrors = options?.validationErrors;
    Error.captureStackTrace(this, this.constructor);
  }

  static validationFailed(
    message: string,
    validationErrors?: Record<string, string[]>
  ): ApiError {
    return new ApiError(ErrorCode.VALIDATION_FAILED, message, { validationErrors });
  }

  static invalidAmount(message = 'Invalid amount'): ApiError {
    return new ApiError(ErrorCode.INVALID_AMOUNT, message);
  }

  static notFound(resource: string): ApiError {
    const code = resource.toLowerCase() === 'payment' ? ErrorCode.PAYMENT_NOT_FOUND : ErrorCode.RESOURCE_NOT_FOUND;
    return new ApiError(code, `${resource} not found`);
  }
}

/**
 * Async handler wrapper to catch errors in async route handlers
 */
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};
