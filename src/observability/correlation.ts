import { Request, Response, NextFunction, RequestHandler } from 'express';

import { DEFAULT_HEADER_NAME } from '../config/logging';
import { ContextBinding, ContextPropagationStore, contextStore } from './context-store';
import { generateCorrelationId } from './correlation-id';
import { createLogger, StructuredLogger } from './pipeline';
import { TransactionContext } from './transaction-context';

export const CORRELATION_ID_HEADER = 'X-Correlation-ID';
export const TRACE_ID_HEADER = 'X-Trace-ID';

export interface CorrelationMiddlewareOptions {
  serviceId: string;
  headerName?: string;
  generateIfMissing?: boolean;
  addToResponse?: boolean;
  store?: ContextPropagationStore;
  logger?: StructuredLogger;
}

export type CorrelationState = 'NoContext' | 'ContextEstablished' | 'Cleared';

/**
 * First non-blank value among the configured header and the two fallbacks
 */
export const extractCorrelationId = (req: Request, headerName: string = DEFAULT_HEADER_NAME): string | undefined => {
  const carriers = [headerName, CORRELATION_ID_HEADER, TRACE_ID_HEADER];
  for (const carrier of carriers) {
    const value = req.get(carrier)?.trim();
    if (value) {
      return value;
    }
  }
  return undefined;
};

/**
 * Correlation middleware
 * - Reads the correlation id from the inbound carriers, or generates one
 * - Binds a TransactionContext for the request's async flow
 * - Echoes the id on the response when configured
 * - Clears the binding once the response finishes or the client goes away
 */
export const createCorrelationMiddleware = (options: CorrelationMiddlewareOptions): RequestHandler => {
  const headerName = options.headerName ?? DEFAULT_HEADER_NAME;
  const generateIfMissing = options.generateIfMissing ?? true;
  const addToResponse = options.addToResponse ?? true;
  const store = options.store ?? contextStore;
  const log = options.logger ?? createLogger('CorrelationMiddleware');

  return (req: Request, res: Response, next: NextFunction): void => {
    store.runIsolated(() => {
      const correlationId =
        extractCorrelationId(req, headerName) ?? (generateIfMissing ? generateCorrelationId() : undefined);

      let state: CorrelationState = 'NoContext';
      let binding: ContextBinding | undefined;

      if (correlationId !== undefined) {
        binding = store.bind(TransactionContext.of(correlationId, options.serviceId));
        state = 'ContextEstablished';
        if (addToResponse) {
          res.setHeader(headerName, correlationId);
        }
        log.debug('Transaction context established for {} {}', req.method, req.path);
      }

      const clear = (): void => {
        if (state === 'Cleared') {
          return;
        }
        if (binding) {
          binding.run(() => log.debug('Request completed with status {}', res.statusCode));
          binding.release();
        }
        state = 'Cleared';
      };

      res.once('finish', clear);
      res.once('close', clear);

      try {
        next();
      } catch (error) {
        clear();
        throw error;
      }
    });
  };
};
