import request from 'supertest';
import { buildTestSettings, createTestApp, setupTestLogging } from '../helpers';

describe('Health Endpoints', () => {
  const { settings } = setupTestLogging();
  const app = createTestApp(settings);

  describe('GET /', () => {
    it('should return API info', async () => {
      const response = await request(app).get('/');

      expect(response.status).toBe(200);
      expect(response.body).toHaveProperty('name', 'quickpay-service');
      expect(response.body).toHaveProperty('version', '1.0.0');
      expect(response.body).toHaveProperty('description');
    });
  });

  describe('GET /health', () => {
    it('should report the service identity and logging switches', async () => {
      const response = await request(app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        status: 'healthy',
        service: { name: 'quickpay-service', version: '1.0.0', environment: 'test' },
        logging: { enabled: true, level: 'INFO', format: 'ecs', piiMasking: true, correlation: true },
      });
      expect(response.body).toHaveProperty('timestamp');
    });
  });

  describe('GET /health/live', () => {
    it('should return alive status', async () => {
      const response = await request(app).get('/health/live');

      expect(response.status).toBe(200);
      expect(response.body).toHaveProperty('status', 'alive');
      expect(response.body).toHaveProperty('timestamp');
    });
  });

  describe('GET /health/ready', () => {
    it('should return readiness status', async () => {
      const response = await request(app).get('/health/ready');

      expect(response.status).toBe(200);
      expect(response.body).toHaveProperty('status', 'ready');
    });
  });

  describe('404 Handler', () => {
    it('should return 404 with the generated correlation id', async () => {
      const response = await request(app).get('/unknown-route');

      expect(response.status).toBe(404);
      expect(response.body).toHaveProperty('success', false);
      expect(response.body.error).toMatchObject({
        code: 3002,
        message: 'Route GET /unknown-route not found',
        correlationId: response.headers['x-transaction-id'],
      });
    });
  });

  describe('with correlation disabled', () => {
    const uncorrelated = createTestApp(buildTestSettings({ QUICKPAY_LOGGING_CORRELATION_ENABLED: 'false' }));

    it('should neither read nor echo correlation ids', async () => {
      const response = await request(uncorrelated).get('/unknown-route').set('X-Transaction-ID', 'txn_1_a');

      expect(response.headers['x-transaction-id']).toBeUndefined();
      expect(response.body.error).not.toHaveProperty('correlationId');
    });
  });
});
