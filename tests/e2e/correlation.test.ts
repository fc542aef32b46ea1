/**
 * End-to-end tests for the correlation middleware
 *
 * A small Express app logs from inside its routes so every record written during
 * a request can be checked against the id the request carried.
 */

import express, { Application } from 'express';
import request from 'supertest';
import {
  contextStore,
  createCorrelationMiddleware,
  CorrelationMiddlewareOptions,
  createLogger,
  isValidCorrelationIdFormat,
} from '../../src/observability';
import { MemorySink, setupTestLogging } from '../helpers';

const CORRELATION_ID = 'txn_1700000000000_abc123';

const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

const log = createLogger('OrderController');

const buildApp = (options: Partial<CorrelationMiddlewareOptions> = {}): Application => {
  const app = express();
  app.use(createCorrelationMiddleware({ serviceId: 'quickpay-service', ...options }));

  app.get('/orders/:id', async (req, res) => {
    await sleep(Number(req.query.delay ?? 0));
    log.info('processed {}', req.params.id);
    res.json({ correlationId: contextStore.correlationId() ?? null });
  });

  return app;
};

describe('Correlation middleware', () => {
  let sink: MemorySink;

  beforeEach(() => {
    sink = setupTestLogging().sink;
  });

  describe('inbound id', () => {
    it('should bind the id from X-Transaction-ID to every record of the request', async () => {
      const response = await request(buildApp()).get('/orders/order-9').set('X-Transaction-ID', CORRELATION_ID);

      const records = sink.recordsFrom('OrderController');
      expect(response.status).toBe(200);
      expect(records).toHaveLength(1);
      expect(records[0].correlation).toEqual({ id: CORRELATION_ID });
      expect(records[0].message).toBe('processed order-9');
      expect(records[0]).not.toHaveProperty('labels');
      expect(response.body).toEqual({ correlationId: CORRELATION_ID });
    });

    it('should echo the id on the response', async () => {
      const response = await request(buildApp()).get('/orders/order-9').set('X-Transaction-ID', CORRELATION_ID);

      expect(response.headers['x-transaction-id']).toBe(CORRELATION_ID);
    });

    it.each(['X-Correlation-ID', 'X-Trace-ID'])('should fall back to %s', async (header) => {
      const response = await request(buildApp()).get('/orders/order-9').set(header, 'upstream-42');

      expect(response.body).toEqual({ correlationId: 'upstream-42' });
      expect(response.headers['x-transaction-id']).toBe('upstream-42');
    });

    it('should prefer the configured header over the fallbacks', async () => {
      const response = await request(buildApp())
        .get('/orders/order-9')
        .set('X-Trace-ID', 'trace-1')
        .set('X-Correlation-ID', 'corr-1')
        .set('X-Transaction-ID', CORRELATION_ID);

      expect(response.body).toEqual({ correlationId: CORRELATION_ID });
    });

    it('should skip a blank header value', async () => {
      const response = await request(buildApp())
        .get('/orders/order-9')
        .set('X-Transaction-ID', '   ')
        .set('X-Correlation-ID', 'corr-1');

      expect(response.body).toEqual({ correlationId: 'corr-1' });
    });

    it('should read and echo a custom header name', async () => {
      const response = await request(buildApp({ headerName: 'X-Request-ID' }))
        .get('/orders/order-9')
        .set('X-Request-ID', 'req-7');

      expect(response.body).toEqual({ correlationId: 'req-7' });
      expect(response.headers['x-request-id']).toBe('req-7');
      expect(response.headers['x-transaction-id']).toBeUndefined();
    });
  });

  describe('generated id', () => {
    it('should generate a distinct id for each request without one', async () => {
      const app = buildApp();

      const first = await request(app).get('/orders/order-1');
      const second = await request(app).get('/orders/order-2');

      const [firstRecord, secondRecord] = sink.recordsFrom('OrderController');
      const firstId = firstRecord.correlation?.id;
      const secondId = secondRecord.correlation?.id;

      expect(firstId).toMatch(/^txn_\d+_[A-Za-z0-9_-]+$/);
      expect(isValidCorrelationIdFormat(secondId)).toBe(true);
      expect(firstId).not.toBe(secondId);
      expect(first.headers['x-transaction-id']).toBe(firstId);
      expect(second.headers['x-transaction-id']).toBe(secondId);
    });

    it('should bind nothing when generation is disabled and no id arrives', async () => {
      const response = await request(buildApp({ generateIfMissing: false })).get('/orders/order-9');

      const [record] = sink.recordsFrom('OrderController');
      expect(record).not.toHaveProperty('correlation');
      expect(response.body).toEqual({ correlationId: null });
      expect(response.headers['x-transaction-id']).toBeUndefined();
    });

    it('should still use an inbound id when generation is disabled', async () => {
      const response = await request(buildApp({ generateIfMissing: false }))
        .get('/orders/order-9')
        .set('X-Transaction-ID', CORRELATION_ID);

      expect(response.body).toEqual({ correlationId: CORRELATION_ID });
    });
  });

  describe('response header', () => {
    it('should not echo the id when disabled', async () => {
      const response = await request(buildApp({ addToResponse: false }))
        .get('/orders/order-9')
        .set('X-Transaction-ID', CORRELATION_ID);

      expect(response.headers['x-transaction-id']).toBeUndefined();
      expect(sink.recordsFrom('OrderController')[0].correlation).toEqual({ id: CORRELATION_ID });
    });
  });

  describe('isolation', () => {
    it('should keep concurrent requests apart', async () => {
      const app = buildApp();
      const delays = [30, 5, 20, 0, 15, 10, 25, 1];

      await Promise.all(
        delays.map((delay, i) =>
          request(app).get(`/orders/order-${i}?delay=${delay}`).set('X-Transaction-ID', `txn_1700000000000_r${i}`)
        )
      );

      const records = sink.recordsFrom('OrderController');
      expect(records).toHaveLength(delays.length);
      for (const record of records) {
        const index = record.message.replace('processed order-', '');
        expect(record.correlation).toEqual({ id: `txn_1700000000000_r${index}` });
      }
    });

    it('should release the binding once the response has finished', async () => {
      let afterResponse: Promise<void> = Promise.resolve();
      const app = buildApp();
      app.get('/late', (_req, res) => {
        afterResponse = new Promise<void>((resolve) => {
          res.on('finish', () => {
            setTimeout(() => {
              log.info('after response');
              resolve();
            }, 10);
          });
        });
        res.json({ ok: true });
      });

      await request(app).get('/late').set('X-Transaction-ID', CORRELATION_ID);
      await afterResponse;

      const [record] = sink.recordsFrom('OrderController');
      expect(record.message).toBe('after response');
      expect(record).not.toHaveProperty('correlation');
    });

    it('should not leave a binding behind in the caller', async () => {
      await request(buildApp()).get('/orders/order-9').set('X-Transaction-ID', CORRELATION_ID);

      expect(contextStore.current()).toBeUndefined();
    });
  });

  describe('lifecycle records', () => {
    it('should log establishment and completion at debug level', async () => {
      sink = setupTestLogging({ QUICKPAY_LOGGING_LEVEL: 'debug' }).sink;

      await request(buildApp()).get('/orders/order-9').set('X-Transaction-ID', CORRELATION_ID);
      await sleep(20);

      const records = sink.recordsFrom('CorrelationMiddleware');
      expect(records.map((record) => record.message)).toEqual([
        'Transaction context established for GET /orders/order-9',
        'Request completed with status 200',
      ]);
      expect(records.every((record) => record.correlation?.id === CORRELATION_ID)).toBe(true);
      expect(records.every((record) => record.log.level === 'DEBUG')).toBe(true);
    });

    it('should clear once when the route throws', async () => {
      sink = setupTestLogging({ QUICKPAY_LOGGING_LEVEL: 'debug' }).sink;
      let afterFailure: Promise<void> = Promise.resolve();
      const app = buildApp();
      app.get('/fail', () => {
        afterFailure = sleep(30).then(() => log.info('after failure'));
        throw new Error('boom');
      });

      const response = await request(app).get('/fail').set('X-Transaction-ID', CORRELATION_ID);
      await afterFailure;

      expect(response.status).toBe(500);
      expect(sink.recordsFrom('CorrelationMiddleware').map((record) => record.message)).toEqual([
        'Transaction context established for GET /fail',
        'Request completed with status 500',
      ]);
      const [later] = sink.recordsFrom('OrderController');
      expect(later.message).toBe('after failure');
      expect(later).not.toHaveProperty('correlation');
    });

    it('should clear once when the client disconnects before the response', async () => {
      sink = setupTestLogging({ QUICKPAY_LOGGING_LEVEL: 'debug' }).sink;
      let handled: Promise<void> = Promise.resolve();
      const app = buildApp();
      app.get('/slow', (_req, res) => {
        handled = sleep(60).then(() => {
          log.info('after disconnect');
          res.json({ ok: true });
        });
      });

      await expect(request(app).get('/slow').set('X-Transaction-ID', CORRELATION_ID).timeout(10)).rejects.toThrow();
      await sleep(20);
      await handled;
      await sleep(20);

      expect(sink.recordsFrom('CorrelationMiddleware').map((record) => record.message)).toEqual([
        'Transaction context established for GET /slow',
        'Request completed with status 200',
      ]);
      const [later] = sink.recordsFrom('OrderController');
      expect(later.message).toBe('after disconnect');
      expect(later).not.toHaveProperty('correlation');
    });
  });
});
