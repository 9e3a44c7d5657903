import { randomUUID } from 'crypto';
import {
  NewUser,
  User,
  UserPatch,
  UserRepository,
  isEmptyPatch,
  normalizeEmail,
} from '../../domain/auth/user.js';
import { ConflictError } from '../../application/errors.js';

/**
 * In-process credential store.
 *
 * Every uniqueness check and the write that depends on it run in the same
 * synchronous block, so concurrent requests cannot interleave between them.
 */
export class InMemoryUserRepo implements UserRepository {
  private readonly users = new Map<string, User>();
  private readonly idsByEmail = new Map<string, string>();

  constructor(private readonly clock: () => Date = () => new Date()) {}

  async create(input: NewUser): Promise<User> {
    const email = normalizeEmail(input.email);
    if (this.idsByEmail.has(email)) {
      throw new ConflictError('User with this email already exists');
    }

    const now = this.clock();
    const user: User = {
      id: randomUUID(),
      name: input.name,
      email,
      passwordHash: input.passwordHash,
      createdAt: now,
      updatedAt: now,
    };

    this.users.set(user.id, user);
    this.idsByEmail.set(email, user.id);
    return user;
  }

  async findByEmail(email: string): Promise<User | null> {
    const id = this.idsByEmail.get(normalizeEmail(email));
    return id ? (this.users.get(id) ?? null) : null;
  }

  async findById(id: string): Promise<User | null> {
    return this.users.get(id) ?? null;
  }

  async update(id: string, patch: UserPatch): Promise<User | null> {
    const existing = this.users.get(id);
    if (!existing) {
      return null;
    }
    if (isEmptyPatch(patch)) {
      return existing;
    }

    const email = patch.email === undefined ? existing.email : normalizeEmail(patch.email);
    if (email !== existing.email) {
      const holder = this.idsByEmail.get(email);
      if (holder && holder !== id) {
        throw new ConflictError('User with this email already exists');
      }
    }

    const updated: User = {
      ...existing,
      name: patch.name ?? existing.name,
      email,
      passwordHash: patch.passwordHash ?? existing.passwordHash,
      updatedAt: this.clock(),
    };

    if (email !== existing.email) {
      this.idsByEmail.delete(existing.email);
      this.idsByEmail.set(email, id);
    }
    this.users.set(id, updated);
    return updated;
  }
}
