/**
 * User domain entity. `passwordHash` is an argon2 PHC string and must never
 * leave the service; use {@link toProfile} for anything serialized outward.
 */
export interface User {
  readonly id: string;
  readonly name: string;
  readonly email: string;
  readonly passwordHash: string;
  readonly createdAt: Date;
  readonly updatedAt: Date;
}

export interface UserProfile {
  id: string;
  name: string;
  email: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface NewUser {
  name: string;
  email: string;
  passwordHash: string;
}

/**
 * Partial update of the mutable fields. An absent field is left untouched.
 */
export interface UserPatch {
  name?: string;
  email?: string;
  passwordHash?: string;
}

/**
 * Credential store contract. Implementations must make `create` (and an
 * email-changing `update`) atomic with respect to the email uniqueness check,
 * throwing `ConflictError` for the loser of a race.
 */
export interface UserRepository {
  create(user: NewUser): Promise<User>;
  findByEmail(email: string): Promise<User | null>;
  findById(id: string): Promise<User | null>;
  update(id: string, patch: UserPatch): Promise<User | null>;
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

export function toProfile(user: User): UserProfile {
  return {
    id: user.id,
    name: user.name,
    email: user.email,
    createdAt: user.createdAt,
    updatedAt: user.updatedAt,
  };
}

export function isEmptyPatch(patch: UserPatch): boolean {
  return (
    patch.name === undefined &&
    patch.email === undefined &&
    patch.passwordHash === undefined
  );
}
