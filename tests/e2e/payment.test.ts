/**
 * End-to-end tests for the payment endpoints and the records they write
 */

import { Application } from 'express';
import request from 'supertest';
import { createTestApp, MemorySink, setupTestLogging } from '../helpers';

const CORRELATION_ID = 'txn_1700000000000_abc123';

const validPayment = {
  customerId: 'cust-42',
  amount: 125.5,
  method: 'ACH',
  description: 'Order 9',
};

describe('Payment Endpoints', () => {
  let app: Application;
  let sink: MemorySink;

  beforeEach(() => {
    const logging = setupTestLogging();
    sink = logging.sink;
    app = createTestApp(logging.settings);
  });

  describe('POST /payments', () => {
    it('should process a payment under the request correlation id', async () => {
      const response = await request(app)
        .post('/payments')
        .set('X-Transaction-ID', CORRELATION_ID)
        .send(validPayment);

      expect(response.status).toBe(201);
      expect(response.body.success).toBe(true);
      expect(response.body.data.payment).toMatchObject({
        transactionId: CORRELATION_ID,
        customerId: 'cust-42',
        amount: 125.5,
        currency: 'USD',
        method: 'ACH',
        description: 'Order 9',
        status: 'COMPLETED',
      });
      expect(response.body.data.payment.authorizationCode).toMatch(/^AUTH-[0-9A-F]{8}$/);
      expect(response.headers['x-transaction-id']).toBe(CORRELATION_ID);
    });

    it('should write a success record carrying the customer as user', async () => {
      await request(app).post('/payments').set('X-Transaction-ID', CORRELATION_ID).send(validPayment);

      const [record] = sink.recordsFrom('PaymentLogger');
      expect(record.log.level).toBe('INFO');
      expect(record.correlation).toEqual({ id: CORRELATION_ID });
      expect(record.user).toEqual({ id: 'cust-42' });
      expect(record.message).toBe(`Payment ${CORRELATION_ID} processed`);
      expect(record.labels).toMatchObject({
        'payment.amount': '125.50 USD',
        'payment.method': 'ACH',
        'event.outcome': 'success',
      });
      expect(record.labels?.['payment.authorizationCode']).toMatch(/^AU\*{9}[0-9A-F]{2}$/);
    });

    it('should mask card based methods in the record', async () => {
      await request(app)
        .post('/payments')
        .set('X-Transaction-ID', CORRELATION_ID)
        .send({ ...validPayment, method: 'CREDIT_CARD' });

      const [record] = sink.recordsFrom('PaymentLogger');
      expect(record.labels?.['payment.method']).toBe('CR*******RD');
    });

    it('should decline a payment above the limit', async () => {
      const response = await request(app)
        .post('/payments')
        .set('X-Transaction-ID', CORRELATION_ID)
        .send({ ...validPayment, amount: 20000 });

      expect(response.status).toBe(402);
      expect(response.body.success).toBe(false);
      expect(response.body.data.payment).toMatchObject({ status: 'FAILED', failureReason: 'LIMIT_EXCEEDED' });

      const [record] = sink.recordsFrom('PaymentLogger');
      expect(record.log.level).toBe('ERROR');
      expect(record.message).toBe(`Payment ${CORRELATION_ID} failed: Transaction limit exceeded`);
      expect(record.labels).toMatchObject({ 'payment.failureReason': 'LIMIT_EXCEEDED', 'payment.retryable': 'false' });
    });

    it('should reject an invalid body with the correlation id in the error', async () => {
      const response = await request(app)
        .post('/payments')
        .set('X-Transaction-ID', CORRELATION_ID)
        .send({ ...validPayment, amount: -5 });

      expect(response.status).toBe(400);
      expect(response.body.success).toBe(false);
      expect(response.body.error).toMatchObject({
        code: 2001,
        message: 'Validation failed',
        correlationId: CORRELATION_ID,
        details: { amount: ['Amount must be a positive number greater than 0'] },
      });

      const [record] = sink.recordsFrom('ErrorHandler');
      expect(record.log.level).toBe('WARN');
      expect(record.message).toBe('Request POST /payments rejected with 400: Validation failed');
      expect(record.correlation).toEqual({ id: CORRELATION_ID });
    });

    it('should generate an id when none is sent', async () => {
      const response = await request(app).post('/payments').send(validPayment);

      const generated = response.headers['x-transaction-id'];
      expect(generated).toMatch(/^txn_\d+_[A-Za-z0-9_-]+$/);
      expect(response.body.data.payment.transactionId).toBe(generated);
    });
  });

  describe('GET /payments/:id', () => {
    it('should return a processed payment', async () => {
      const created = await request(app).post('/payments').send(validPayment);
      const paymentId = created.body.data.payment.paymentId;

      const response = await request(app).get(`/payments/${paymentId}`);

      expect(response.status).toBe(200);
      expect(response.body.data.payment.paymentId).toBe(paymentId);
    });

    it('should return 404 for an unknown payment', async () => {
      const response = await request(app).get('/payments/pay_missing').set('X-Transaction-ID', CORRELATION_ID);

      expect(response.status).toBe(404);
      expect(response.body.error).toMatchObject({
        code: 3001,
        message: 'Payment not found',
        correlationId: CORRELATION_ID,
      });
    });
  });
});
