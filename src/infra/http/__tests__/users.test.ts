import { describe, it, expect, beforeEach } from 'vitest';
import type { Express } from 'express';
import request from 'supertest';
import { MemoryDatabase } from '../../../testing/memoryDatabase.js';
import { TEST_NOW, bearerToken, createTestApp } from '../../../testing/testApp.js';

const ADA_ID = '11111111-1111-4111-8111-111111111111';
const BOB_ID = '22222222-2222-4222-8222-222222222222';

describe('Users API', () => {
  let app: Express;
  let db: MemoryDatabase;
  let auth: string;

  beforeEach(() => {
    ({ app, db } = createTestApp());
    db.seedUser({ id: ADA_ID, email: 'ada@example.com', firstName: 'Ada', lastName: 'Lovelace' });
    db.seedUser({ id: BOB_ID, email: 'bob@example.com', isActive: false });
    auth = bearerToken({ userId: ADA_ID, email: 'ada@example.com' });
  });

  describe('authentication', () => {
    it('should reject a request without a token', async () => {
      const response = await request(app).get('/api/users');

      expect(response.status).toBe(401);
      expect(response.body).toEqual({ code: 'UNAUTHORIZED', message: 'Missing or invalid authorization header' });
    });

    it('should reject a token signed with another secret', async () => {
      const response = await request(app)
        .get('/api/users')
        .set('Authorization', bearerToken({ userId: ADA_ID, email: 'ada@example.com' }, 'other-secret'));

      expect(response.status).toBe(401);
      expect(response.body).toEqual({ code: 'UNAUTHORIZED', message: 'Invalid or expired token' });
    });

    it('should reject a token without a user id claim', async () => {
      const response = await request(app)
        .get('/api/users')
        .set('Authorization', bearerToken({ email: 'ada@example.com' }));

      expect(response.status).toBe(401);
      expect(response.body.message).toBe('Invalid or expired token');
    });
  });

  describe('GET /api/users', () => {
    it('should list users ordered by email', async () => {
      const response = await request(app).get('/api/users').set('Authorization', auth);

      expect(response.status).toBe(200);
      expect(response.body.map((u: { email: string }) => u.email)).toEqual(['ada@example.com', 'bob@example.com']);
    });

    it('should filter by activity', async () => {
      const response = await request(app).get('/api/users?isActive=false').set('Authorization', auth);

      expect(response.body.map((u: { id: string }) => u.id)).toEqual([BOB_ID]);
    });

    it('should reject too many records per page', async () => {
      const response = await request(app).get('/api/users?recordsPerPage=101').set('Authorization', auth);

      expect(response.status).toBe(400);
      expect(response.body.errors).toEqual({ recordsPerPage: ['You cannot return more than 100 records.'] });
    });
  });

  describe('GET /api/users/current', () => {
    it('should return the caller', async () => {
      const response = await request(app).get('/api/users/current').set('Authorization', auth);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        id: ADA_ID,
        email: 'ada@example.com',
        userName: 'ada@example.com',
        firstName: 'Ada',
        lastName: 'Lovelace',
        profilePicture: null,
        isActive: true,
        displayName: 'Ada Lovelace',
      });
    });

    it('should 404 when the caller has no record', async () => {
      const response = await request(app)
        .get('/api/users/current')
        .set('Authorization', bearerToken({ userId: 'missing-user', email: 'ghost@example.com' }));

      expect(response.status).toBe(404);
      expect(response.body).toEqual({ code: 'NOT_FOUND', message: 'User not found' });
    });
  });

  describe('PUT /api/users/profile', () => {
    it('should update the caller and stamp the modification', async () => {
      const response = await request(app)
        .put('/api/users/profile')
        .set('Authorization', auth)
        .send({ firstName: 'Augusta', lastName: 'King', profilePicture: 'https://example.com/ada.png' });

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        firstName: 'Augusta',
        lastName: 'King',
        profilePicture: 'https://example.com/ada.png',
        displayName: 'Augusta King',
        modifiedAt: TEST_NOW,
        modifiedBy: 'system',
      });
      expect(db.user(ADA_ID)?.modifiedAt?.toISOString()).toBe(TEST_NOW);
    });

    it('should reject an invalid profile picture', async () => {
      const response = await request(app)
        .put('/api/users/profile')
        .set('Authorization', auth)
        .send({ profilePicture: 'not a url' });

      expect(response.status).toBe(400);
      expect(response.body.errors).toEqual({ profilePicture: ['Profile picture must be a valid URL.'] });
      expect(db.user(ADA_ID)?.modifiedAt).toBeNull();
    });
  });

  describe('/api/users/:id', () => {
    it('should return a user by id', async () => {
      const response = await request(app).get(`/api/users/${BOB_ID}`).set('Authorization', auth);

      expect(response.status).toBe(200);
      expect(response.body.displayName).toBe('bob@example.com');
    });

    it('should 404 for an unknown user', async () => {
      const response = await request(app).get('/api/users/nobody').set('Authorization', auth);

      expect(response.status).toBe(404);
    });

    it('should update another user', async () => {
      const response = await request(app)
        .put(`/api/users/${BOB_ID}`)
        .set('Authorization', auth)
        .send({ firstName: 'Bob' });

      expect(response.status).toBe(200);
      expect(db.user(BOB_ID)?.firstName).toBe('Bob');
    });

    it('should deactivate a user', async () => {
      const response = await request(app).delete(`/api/users/${ADA_ID}`).set('Authorization', auth);

      expect(response.status).toBe(204);
      expect(db.user(ADA_ID)?.isActive).toBe(false);
      expect(db.user(ADA_ID)?.modifiedAt?.toISOString()).toBe(TEST_NOW);
    });
  });
});
