import request from 'supertest';
import { Application } from 'express';
import { createTestApp } from '../helpers';

describe('Health Endpoints', () => {
  let app: Application;

  beforeAll(async () => {
    ({ app } = await createTestApp());
  });

  describe('GET /', () => {
    it('should return API info', async () => {
      const response = await request(app).get('/');

      expect(response.status).toBe(200);
      expect(response.body).toHaveProperty('name', 'Booth Ledger API');
      expect(response.body).toHaveProperty('version', '1.0.0');
      expect(response.body).toHaveProperty('description');
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

  describe('GET /health', () => {
    it('should report the storage driver', async () => {
      const response = await request(app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('healthy');
      expect(response.body.services.storage).toEqual({ driver: 'memory', ready: true });
    });
  });

  describe('GET /health/ready', () => {
    it('should return readiness status', async () => {
      const response = await request(app).get('/health/ready');

      expect(response.status).toBe(200);
      expect(response.body.status).toBe('ready');
    });
  });

  describe('GET /metrics', () => {
    it('should expose Prometheus metrics', async () => {
      const response = await request(app).get('/metrics');

      expect(response.status).toBe(200);
      expect(response.text).toContain('sales_committed_total');
    });
  });

  describe('404 Handler', () => {
    it('should return 404 for unknown routes', async () => {
      const response = await request(app).get('/unknown-route');

      expect(response.status).toBe(404);
      expect(response.body).toHaveProperty('success', false);
      expect(response.body.error.message).toBe('Route GET /unknown-route not found');
    });

    it('should echo the correlation id header', async () => {
      const response = await request(app).get('/health/live').set('x-correlation-id', 'corr-123');

      expect(response.headers['x-correlation-id']).toBe('corr-123');
    });
  });
});
