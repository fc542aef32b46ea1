import dotenv from 'dotenv';

// Load environment variables first
dotenv.config();

import {
  NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  API_CONFIG,
  LOG_CONFIG,
  PAYMENT_CONFIG,
  getEnvironmentInfo,
} from './environments';

export { isProduction, isDevelopment, isTest, getEnvironmentInfo };

export * from './environments';

/**
 * Main application configuration object
 *
 * Process-level settings only. Logging, correlation and masking switches live in
 * the layered source chain built by ./logging so the precedence enforcer can lock
 * them.
 */
export const config = {
  // Environment
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,

  // Server
  port: API_CONFIG.port,
  shutdownTimeoutMs: API_CONFIG.shutdownTimeoutMs,

  // API
  api: {
    bodyLimit: API_CONFIG.bodyLimit,
  },

  // Diagnostics
  logging: LOG_CONFIG,

  // Payments
  payment: PAYMENT_CONFIG,
};
