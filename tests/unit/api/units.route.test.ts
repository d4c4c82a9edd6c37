/**
 * Unit Routes Unit Tests
 */

import { describe, it, expect } from 'vitest';

import { at, createTestApp, jsonBody } from '../../helpers/test-utils.js';

describe('Unit Routes', () => {
  describe('POST /units', () => {
    it('should register a unit with a catalog plan', async () => {
      const { app, engine } = createTestApp();

      const res = await app.request(
        '/api/v1/units',
        jsonBody({ unitId: 'storage_N1', planId: 'standard' })
      );

      expect(res.status).toBe(201);
      const body = await res.json();
      expect(body.data).toEqual({
        unitId: 'storage_N1',
        planId: 'standard',
        currentUsageMB: 0,
        lastOperationAt: null,
        files: [],
        months: [],
      });
      expect(engine.getUnit('storage_N1').success).toBe(true);
    });

    it('should return 409 for a registered unit id', async () => {
      const { app } = createTestApp();

      const res = await app.request(
        '/api/v1/units',
        jsonBody({ unitId: 'storage_A1', planId: 'standard' })
      );

      expect(res.status).toBe(409);
      const body = await res.json();
      expect(body.error.code).toBe('DUPLICATE_UNIT');
    });

    it('should return 404 for an unknown plan', async () => {
      const { app } = createTestApp();

      const res = await app.request(
        '/api/v1/units',
        jsonBody({ unitId: 'storage_N1', planId: 'gold' })
      );

      expect(res.status).toBe(404);
      const body = await res.json();
      expect(body.error.code).toBe('PLAN_NOT_FOUND');
    });

    it('should return 400 for a unit id with spaces', async () => {
      const { app } = createTestApp();

      const res = await app.request(
        '/api/v1/units',
        jsonBody({ unitId: 'storage N1', planId: 'standard' })
      );

      expect(res.status).toBe(400);
      const body = await res.json();
      expect(body.error).toMatchObject({
        code: 'VALIDATION_ERROR',
        message: 'unitId must not contain spaces',
      });
    });

    it('should return 400 for a body that is not JSON', async () => {
      const { app } = createTestApp();

      const res = await app.request('/api/v1/units', {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: 'not json',
      });

      expect(res.status).toBe(400);
      const body = await res.json();
      expect(body.error.code).toBe('VALIDATION_ERROR');
    });
  });

  describe('GET /units', () => {
    it('should list the provisioned units', async () => {
      const { app } = createTestApp();

      const res = await app.request('/api/v1/units');

      expect(res.status).toBe(200);
      const body = await res.json();
      expect(body.data.map((unit: { unitId: string }) => unit.unitId)).toEqual([
        'storage_A1',
        'storage_B1',
      ]);
    });
  });

  describe('GET /units/:unitId', () => {
    it('should return inventory with ISO dates', async () => {
      const { app, engine } = createTestApp();
      engine.apply({
        kind: 'UPLOAD',
        timestamp: at('2060-04-01T00:00'),
        unitId: 'storage_A1',
        fileId: 'file123',
        sizeMB: 5000,
      });

      const res = await app.request('/api/v1/units/storage_A1');

      expect(res.status).toBe(200);
      const body = await res.json();
      expect(body.data).toEqual({
        unitId: 'storage_A1',
        planId: 'standard',
        currentUsageMB: 5000,
        lastOperationAt: '2060-04-01T00:00:00.000Z',
        files: [
          {
            id: 'file123',
            sizeMB: 5000,
            createdAt: '2060-04-01T00:00:00.000Z',
            lastModifiedAt: '2060-04-01T00:00:00.000Z',
          },
        ],
        months: [
          {
            period: '2060-04',
            maxUsageMB: 5000,
            updateVolumeMB: 0,
            storageFee: null,
            updateFee: null,
            usageFee: null,
          },
        ],
      });
    });

    it('should return 404 for an unknown unit', async () => {
      const { app } = createTestApp();

      const res = await app.request('/api/v1/units/storage_Z9');

      expect(res.status).toBe(404);
      const body = await res.json();
      expect(body.error.code).toBe('UNIT_NOT_FOUND');
    });
  });

  describe('GET /units/:unitId/fees/:period', () => {
    it('should return the month report', async () => {
      const { app, engine } = createTestApp();
      engine.apply({
        kind: 'UPLOAD',
        timestamp: at('2060-04-01T00:00'),
        unitId: 'storage_A1',
        fileId: 'file123',
        sizeMB: 5000,
      });

      const res = await app.request('/api/v1/units/storage_A1/fees/2060-04');

      expect(res.status).toBe(200);
      const body = await res.json();
      expect(body.data).toEqual({
        unitId: 'storage_A1',
        period: '2060-04',
        maxUsageMB: 5000,
        updateVolumeMB: 0,
        currentUsageMB: 5000,
        storageFee: 50,
        updateFee: 0,
        usageFee: 50,
      });
    });

    it('should return 404 for a month without activity', async () => {
      const { app } = createTestApp();

      const res = await app.request('/api/v1/units/storage_A1/fees/2060-04');

      expect(res.status).toBe(404);
      const body = await res.json();
      expect(body.error.code).toBe('NO_DATA_FOR_MONTH');
    });

    it('should return 400 for a malformed period', async () => {
      const { app } = createTestApp();

      const res = await app.request('/api/v1/units/storage_A1/fees/April');

      expect(res.status).toBe(400);
      const body = await res.json();
      expect(body.error.message).toBe('Invalid period: April');
    });
  });
});
