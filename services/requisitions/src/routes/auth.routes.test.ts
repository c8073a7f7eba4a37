import request from 'supertest';
import { beforeAll, beforeEach, describe, expect, it } from 'vitest';
import type { Express } from 'express';
import { hashPassword, verifyAccessToken } from '@stockroom/auth-utils';
import { createApp } from '../app.js';
import { bearer, seedWarehouse, testLifecycleOptions, type Warehouse } from '../test/fixtures.js';

describe('auth routes and health', () => {
  let passwordHash: string;
  let w: Warehouse;
  let app: Express;

  beforeAll(async () => {
    passwordHash = await hashPassword('test-password');
  });

  beforeEach(() => {
    w = seedWarehouse();
    w.store.addUser({ username: 'clerk', fullName: 'Night Clerk', role: 'requester', passwordHash });
    app = createApp({ store: w.store, lifecycle: testLifecycleOptions() });
  });

  describe('GET /health', () => {
    it('should report a reachable store', async () => {
      const res = await request(app).get('/health');
      expect(res.status).toBe(200);
      expect(res.body).toMatchObject({ status: 'ok', service: 'requisitions', checks: { database: 'ok' } });
    });

    it('should report a degraded store', async () => {
      w.store.failOn('ping', new Error('connection refused'));
      const res = await request(app).get('/health');
      expect(res.status).toBe(503);
      expect(res.body).toMatchObject({ status: 'degraded', checks: { database: 'down' } });
    });
  });

  describe('POST /auth/login', () => {
    it('should issue a token for valid credentials', async () => {
      const res = await request(app).post('/auth/login').send({ username: 'clerk', password: 'test-password' });

      expect(res.status).toBe(200);
      expect(res.body.data.user).toMatchObject({ username: 'clerk', fullName: 'Night Clerk', role: 'requester' });
      expect(res.body.data.user).not.toHaveProperty('passwordHash');
      expect(verifyAccessToken(res.body.data.accessToken)).toMatchObject({ username: 'clerk', role: 'requester' });
    });

    it('should refuse a wrong password and an unknown user alike', async () => {
      const wrong = await request(app).post('/auth/login').send({ username: 'clerk', password: 'wrong-password' });
      const unknown = await request(app).post('/auth/login').send({ username: 'nobody', password: 'test-password' });

      for (const res of [wrong, unknown]) {
        expect(res.status).toBe(401);
        expect(res.body).toEqual({ error: 'Invalid username or password', code: 'UNAUTHORIZED' });
      }
    });

    it('should validate the body', async () => {
      const res = await request(app).post('/auth/login').send({ username: 'clerk' });
      expect(res.status).toBe(400);
      expect(res.body.code).toBe('INVALID_REQUEST');
    });
  });

  describe('GET /auth/me', () => {
    it('should return the caller with their permissions', async () => {
      const res = await request(app).get('/auth/me').set('Authorization', bearer(w.approver));

      expect(res.status).toBe(200);
      expect(res.body.data).toMatchObject({ id: w.approver.id, username: 'bodega1', role: 'approver' });
      expect(res.body.data.permissions).toContain('requisitions:requisitions:decide');
      expect(res.body.data.permissions).not.toContain('requisitions:requisitions:create');
    });

    it('should reject tokens of deleted users', async () => {
      const ghost = { id: 'ffffffff-ffff-4fff-8fff-ffffffffffff', username: 'ghost', role: 'requester' as const };
      const res = await request(app).get('/auth/me').set('Authorization', bearer(ghost));

      expect(res.status).toBe(401);
      expect(res.body).toEqual({ error: 'User no longer exists', code: 'UNAUTHORIZED' });
    });
  });
});
