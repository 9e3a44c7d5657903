import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import { randomUUID } from 'crypto';
import { createPool } from '../pool.js';
import { runMigrations } from '../migrate.js';
import { PgUserRepo } from '../userRepo.js';
import { PgPostRepo } from '../postRepo.js';

const describeDb = process.env.DATABASE_URL ? describe : describe.skip;

describeDb('PgPostRepo', () => {
  const pool = createPool(process.env.DATABASE_URL ?? '');
  const users = new PgUserRepo(pool);
  const repo = new PgPostRepo(pool);
  let aliceId: string;
  let bobId: string;

  beforeAll(async () => {
    await runMigrations(pool);
  });

  beforeEach(async () => {
    const tag = randomUUID().slice(0, 8);
    const alice = await users.create({
      name: 'Alice',
      email: `alice-${tag}@example.com`,
      passwordHash: 'hash',
    });
    const bob = await users.create({ name: 'Bob', email: `bob-${tag}@example.com`, passwordHash: 'hash' });
    aliceId = alice.id;
    bobId = bob.id;
  });

  afterEach(async () => {
    // Posts go with their owners
    await pool.query('DELETE FROM users WHERE id = ANY($1)', [[aliceId, bobId]]);
  });

  afterAll(async () => {
    await pool.end();
  });

  it('should list an owner posts newest first', async () => {
    await repo.create({ ownerId: aliceId, title: 'First', body: 'a' });
    await repo.create({ ownerId: bobId, title: 'Other', body: 'b' });
    await repo.create({ ownerId: aliceId, title: 'Second', body: 'c' });

    const posts = await repo.listByOwner(aliceId);

    expect(posts.map((p) => p.title)).toEqual(['Second', 'First']);
  });

  it('should join the author profile on reads', async () => {
    const post = await repo.create({ ownerId: aliceId, title: 'Hi', body: 'World' });

    const found = await repo.findById(post.id);

    expect(found?.author.id).toBe(aliceId);
    expect(found?.author.name).toBe('Alice');
    expect(found?.author).not.toHaveProperty('passwordHash');
  });

  it('should update a post for its owner', async () => {
    const post = await repo.create({ ownerId: aliceId, title: 'Hi', body: 'World' });

    const result = await repo.updateOwned(post.id, aliceId, { title: 'Hello' });

    expect(result.status).toBe('ok');
    if (result.status === 'ok') {
      expect(result.post.title).toBe('Hello');
      expect(result.post.body).toBe('World');
    }
  });

  it('should refuse an update from another user and leave the row untouched', async () => {
    const post = await repo.create({ ownerId: aliceId, title: 'Hi', body: 'World' });

    const result = await repo.updateOwned(post.id, bobId, { title: 'Hijacked' });

    expect(result).toEqual({ status: 'forbidden' });
    expect((await repo.findById(post.id))?.title).toBe('Hi');
  });

  it('should report not_found before ownership', async () => {
    expect(await repo.updateOwned(randomUUID(), bobId, { title: 'x' })).toEqual({
      status: 'not_found',
    });
    expect(await repo.deleteOwned(randomUUID(), bobId)).toEqual({ status: 'not_found' });
  });

  it('should delete only for the owner', async () => {
    const post = await repo.create({ ownerId: aliceId, title: 'Hi', body: 'World' });

    expect(await repo.deleteOwned(post.id, bobId)).toEqual({ status: 'forbidden' });
    expect((await repo.deleteOwned(post.id, aliceId)).status).toBe('ok');
    expect(await repo.findById(post.id)).toBeNull();
  });

  it('should let one of two concurrent deletes win', async () => {
    const post = await repo.create({ ownerId: aliceId, title: 'Hi', body: 'World' });

    const results = await Promise.all([
      repo.deleteOwned(post.id, aliceId),
      repo.deleteOwned(post.id, aliceId),
    ]);

    expect(results.map((r) => r.status).sort()).toEqual(['not_found', 'ok']);
  });
});
