/**
 * Environment Configuration
 *
 * Central place for environment detection and process-level values that are not
 * part of the layered logging configuration (see ./logging for those).
 *
 * Usage:
 *   import { isProduction, API_CONFIG } from './environments';
 */

// =============================================================================
// ENVIRONMENT FLAGS
// =============================================================================

/**
 * Current environment from NODE_ENV
 * Defaults to 'development' if not set
 */
export const NODE_ENV = process.env.NODE_ENV || 'development';

/**
 * Environment detection flags
 * Use these instead of checking NODE_ENV directly
 */
export const isProduction = NODE_ENV === 'production';
export const isDevelopment = NODE_ENV === 'development';
export const isTest = NODE_ENV === 'test';

// =============================================================================
// API CONFIGURATION
// =============================================================================

export const API_CONFIG = {
  bodyLimit: process.env.API_BODY_LIMIT || '10kb',
  port: parseInt(process.env.PORT || '3000', 10),
  shutdownTimeoutMs: parseInt(process.env.SHUTDOWN_TIMEOUT_MS || '10000', 10),
};

// =============================================================================
// DIAGNOSTICS LOGGING
// =============================================================================

/**
 * Internal diagnostics logger (pino, stderr). Structured application records are
 * configured through the quickpay.logging.* keys instead.
 */
export const LOG_CONFIG = {
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : isTest ? 'silent' : 'debug'),
  prettyPrint: isDevelopment,
};

// =============================================================================
// PAYMENTS
// =============================================================================

/**
 * Sample payment endpoint settings
 */
export const PAYMENT_CONFIG = {
  // amounts above this are declined with LIMIT_EXCEEDED
  limit: parseFloat(process.env.PAYMENT_LIMIT || '10000'),
  defaultCurrency: process.env.PAYMENT_DEFAULT_CURRENCY || 'USD',
};

// =============================================================================
// DEBUG / INFO
// =============================================================================

/**
 * Get current environment info (for logging/debugging)
 */
export const getEnvironmentInfo = () => ({
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  port: API_CONFIG.port,
});
