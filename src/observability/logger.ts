import pino from 'pino';

import { config } from '../config';

/**
 * Pino logger for the pipeline's own diagnostics (startup, degraded records,
 * host resolution). Written to stderr so it never interleaves with the
 * structured records on stdout.
 * - Production: JSON at info level
 * - Development: pretty printed at debug level
 * - Test: silent unless LOG_LEVEL is set
 */
export const diagnostics = pino({
  name: 'quickpay-logging',
  level: config.logging.level,
  formatters: {
    level: (label) => ({ level: label }),
  },
  base: {
    env: config.nodeEnv,
  },
  ...(config.logging.prettyPrint
    ? {
        transport: {
          target: 'pino-pretty',
          options: {
            colorize: true,
            translateTime: 'SYS:standard',
            ignore: 'pid,hostname',
            destination: 2,
          },
        },
      }
    : {}),
}, config.logging.prettyPrint ? undefined : pino.destination(2));

export type DiagnosticsLogger = Pick<pino.Logger, 'debug' | 'info' | 'warn' | 'error'>;

// Child logger factory for component-specific diagnostics
export const createDiagnosticsLogger = (component: string): pino.Logger => {
  return diagnostics.child({ component });
};
