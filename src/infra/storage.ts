import type { UserRepository } from '../domain/auth/user.js';
import type { PostRepository } from '../domain/posts/post.js';
import { createPool } from './db/pool.js';
import { PgUserRepo } from './db/userRepo.js';
import { PgPostRepo } from './db/postRepo.js';
import { InMemoryUserRepo } from './memory/userRepo.js';
import { InMemoryPostRepo } from './memory/postRepo.js';

/**
 * The persistence collaborators the core depends on, plus the hooks the
 * server needs around them.
 */
export interface Storage {
  readonly kind: 'postgres' | 'memory';
  readonly users: UserRepository;
  readonly posts: PostRepository;
  /** Rejects when the backing store is unreachable. */
  ping(): Promise<void>;
  close(): Promise<void>;
}

export function createPostgresStorage(connectionString: string): Storage {
  const pool = createPool(connectionString);
  return {
    kind: 'postgres',
    users: new PgUserRepo(pool),
    posts: new PgPostRepo(pool),
    ping: async () => {
      await pool.query('SELECT 1');
    },
    close: () => pool.end(),
  };
}

export function createMemoryStorage(clock?: () => Date): Storage {
  const users = new InMemoryUserRepo(clock);
  return {
    kind: 'memory',
    users,
    posts: new InMemoryPostRepo(users, clock),
    ping: async () => {},
    close: async () => {},
  };
}
