import { describe, it, expect } from 'vitest';
import { isEmptyPatch, normalizeEmail, toProfile, User } from '../user.js';

describe('User', () => {
  it('should normalize emails by trimming and lower-casing', () => {
    expect(normalizeEmail('  Alice@Example.COM ')).toBe('alice@example.com');
  });

  it('should drop the password hash from the outward profile', () => {
    const createdAt = new Date('2024-01-01T00:00:00Z');
    const user: User = {
      id: 'user-1',
      name: 'Alice',
      email: 'a@x.com',
      passwordHash: '$argon2id$placeholder',
      createdAt,
      updatedAt: createdAt,
    };

    expect(toProfile(user)).toEqual({
      id: 'user-1',
      name: 'Alice',
      email: 'a@x.com',
      createdAt,
      updatedAt: createdAt,
    });
  });

  it('should treat a patch with no fields as empty', () => {
    expect(isEmptyPatch({})).toBe(true);
    expect(isEmptyPatch({ name: 'Alice' })).toBe(false);
  });
});
