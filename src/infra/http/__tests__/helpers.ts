import request from 'supertest';
import type express from 'express';
import { createApp } from '../app.js';
import { createMemoryStorage, type Storage } from '../../storage.js';
import { createLogger } from '../../logger.js';

export const TEST_SECRET = 'test-secret-for-tokens';
export const TEST_PASSWORD = 'Password123';

export interface TestApp {
  app: express.Express;
  storage: Storage;
}

export function buildTestApp(options: { clock?: () => Date } = {}): TestApp {
  const storage = createMemoryStorage(options.clock);
  const app = createApp({
    config: {
      jwt: { secret: TEST_SECRET, ttlSeconds: 3600, clockSkewSeconds: 30 },
      passwordHash: { timeCost: 2, memoryCost: 4096 },
    },
    storage,
    logger: createLogger('silent'),
    clock: options.clock,
  });
  return { app, storage };
}

export async function registerUser(
  app: express.Express,
  name: string,
  email: string
): Promise<{ token: string; userId: string }> {
  const response = await request(app)
    .post('/api/auth/register')
    .send({ name, email, password: TEST_PASSWORD })
    .expect(201);

  return { token: response.body.data.token, userId: response.body.data.user.id };
}
