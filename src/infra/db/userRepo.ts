import type { DbPool } from './pool.js';
import { isUniqueViolation } from './pool.js';
import {
  NewUser,
  User,
  UserPatch,
  UserRepository,
  isEmptyPatch,
  normalizeEmail,
} from '../../domain/auth/user.js';
import { ConflictError } from '../../application/errors.js';

interface UserRow {
  id: string;
  name: string;
  email: string;
  password_hash: string;
  created_at: Date;
  updated_at: Date;
}

const USER_COLUMNS = 'id, name, email, password_hash, created_at, updated_at';

function toUser(row: UserRow): User {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    passwordHash: row.password_hash,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

/**
 * PostgreSQL credential store. Email uniqueness is enforced by the unique
 * index on lower(email); a violation surfaces as ConflictError.
 */
export class PgUserRepo implements UserRepository {
  constructor(private pool: DbPool) {}

  async findByEmail(email: string): Promise<User | null> {
    const result = await this.pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE lower(email) = $1`,
      [normalizeEmail(email)]
    );

    if (result.rows.length === 0) {
      return null;
    }
    return toUser(result.rows[0]);
  }

  async findById(id: string): Promise<User | null> {
    const result = await this.pool.query<UserRow>(
      `SELECT ${USER_COLUMNS} FROM users WHERE id = $1`,
      [id]
    );

    if (result.rows.length === 0) {
      return null;
    }
    return toUser(result.rows[0]);
  }

  async create(input: NewUser): Promise<User> {
    try {
      const result = await this.pool.query<UserRow>(
        `INSERT INTO users (name, email, password_hash)
         VALUES ($1, $2, $3)
         RETURNING ${USER_COLUMNS}`,
        [input.name, normalizeEmail(input.email), input.passwordHash]
      );
      return toUser(result.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('User with this email already exists');
      }
      throw error;
    }
  }

  async update(id: string, patch: UserPatch): Promise<User | null> {
    if (isEmptyPatch(patch)) {
      return this.findById(id);
    }

    try {
      const result = await this.pool.query<UserRow>(
        `UPDATE users
         SET name = COALESCE($2, name),
             email = COALESCE($3, email),
             password_hash = COALESCE($4, password_hash),
             updated_at = NOW()
         WHERE id = $1
         RETURNING ${USER_COLUMNS}`,
        [
          id,
          patch.name ?? null,
          patch.email === undefined ? null : normalizeEmail(patch.email),
          patch.passwordHash ?? null,
        ]
      );

      if (result.rows.length === 0) {
        return null;
      }
      return toUser(result.rows[0]);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('User with this email already exists');
      }
      throw error;
    }
  }
}
