import { randomUUID } from 'crypto';
import request from 'supertest';
import { isKeywardError } from 'keyward-core';
import { User } from '../../models/users-model';
import { seedUser } from '../helpers/test-services';
import { authDelete, authGet, authPost, buildTestApp, INVALID_CREDENTIALS, TestApp } from './setup';

async function sessionFor(t: TestApp, user: User): Promise<string> {
  const token = await t.services.tokens.signIn(user);
  if (isKeywardError(token)) throw new Error(token.message);
  return token;
}

describe('API key routes', () => {
  let t: TestApp;
  let owner: User;
  let session: string;

  beforeEach(async () => {
    t = buildTestApp();
    owner = await seedUser(t, 'owner@example.test');
    session = await sessionFor(t, owner);
  });

  async function createKey(ttlSeconds: number, credential = session): Promise<{ key: string; id: string }> {
    const res = await authPost(t.app, '/api-keys', credential).send({ ttlSeconds }).expect(201);
    return { key: res.body.key, id: res.body.apiKey.id };
  }

  describe('POST /api-keys', () => {
    it('returns the plaintext key once with its public record', async () => {
      const res = await authPost(t.app, '/api-keys', session).send({ ttlSeconds: 3600 }).expect(201);

      expect(res.body.key).toMatch(/^keyward_[A-Za-z0-9_-]{43}$/);
      expect(res.body.apiKey).toEqual({
        id: expect.any(String),
        userId: owner.id,
        expiresAt: '2026-03-01T13:00:00.000Z',
        createdAt: '2026-03-01T12:00:00.000Z',
        valid: true,
      });
    });

    it('answers 400 for a ttl that is not a positive whole number', async () => {
      const zero = await authPost(t.app, '/api-keys', session).send({ ttlSeconds: 0 }).expect(400);
      const text = await authPost(t.app, '/api-keys', session).send({ ttlSeconds: '60' }).expect(400);

      expect(zero.body).toEqual({
        error: 'Bad Request',
        message: 'ttl must be a positive whole number of seconds',
      });
      expect(text.body).toEqual({
        error: 'Bad Request',
        message: 'ttlSeconds Expected number, received string',
      });
    });

    it('answers 400 for a ttl above the maximum and stores nothing', async () => {
      const res = await authPost(t.app, '/api-keys', session).send({ ttlSeconds: 1e13 }).expect(400);

      expect(res.body).toEqual({
        error: 'Bad Request',
        message: 'ttl must not exceed 31536000 seconds',
      });
      expect(t.stores.apiKeys.rows.size).toBe(0);
    });

    it('answers 401 without credentials', async () => {
      const res = await request(t.app).post('/api-keys').send({ ttlSeconds: 60 }).expect(401);

      expect(res.body).toEqual(INVALID_CREDENTIALS);
    });
  });

  describe('authenticating with a key', () => {
    it('accepts the key as a bearer token and in x-api-key', async () => {
      const { key } = await createKey(3600);

      const viaBearer = await authGet(t.app, '/me', key).expect(200);
      const viaHeader = await request(t.app).get('/me').set('x-api-key', key).expect(200);

      expect(viaBearer.body.user.id).toBe(owner.id);
      expect(viaHeader.body.user.id).toBe(owner.id);
    });

    it('rejects an expired key with the generic answer', async () => {
      const { key } = await createKey(60);
      t.clock.advance(61);

      const res = await authGet(t.app, '/me', key).expect(401);

      expect(res.body).toEqual(INVALID_CREDENTIALS);
    });

    it('rejects a key that was never issued', async () => {
      const res = await authGet(t.app, '/me', 'keyward_made-up').expect(401);

      expect(res.body).toEqual(INVALID_CREDENTIALS);
    });
  });

  describe('GET /api-keys', () => {
    it("lists only the caller's keys", async () => {
      const mine = await createKey(3600);
      const stranger = await seedUser(t, 'stranger@example.test');
      await createKey(3600, await sessionFor(t, stranger));

      const res = await authGet(t.app, '/api-keys', session).expect(200);

      expect(res.body.apiKeys.map((key: { id: string }) => key.id)).toEqual([mine.id]);
    });
  });

  describe('DELETE /api-keys/:id', () => {
    it('destroys an owned key', async () => {
      const { key, id } = await createKey(3600);

      await authDelete(t.app, `/api-keys/${id}`, session).expect(204);

      await authGet(t.app, '/me', key).expect(401);
    });

    it("refuses to destroy someone else's key", async () => {
      const stranger = await seedUser(t, 'stranger@example.test');
      const theirs = await createKey(3600, await sessionFor(t, stranger));

      const res = await authDelete(t.app, `/api-keys/${theirs.id}`, session).expect(403);

      expect(res.body).toEqual({ error: 'Forbidden', message: 'not owner' });
      await authGet(t.app, '/me', theirs.key).expect(200);
    });

    it('answers 404 for a key that does not exist', async () => {
      await authDelete(t.app, `/api-keys/${randomUUID()}`, session).expect(404);
      await authDelete(t.app, '/api-keys/not-a-uuid', session).expect(404);
    });
  });
});
