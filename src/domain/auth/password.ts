import { argon2id, hash, needsRehash, verify } from 'argon2';

export interface PasswordHashOptions {
  /** Number of argon2 iterations. */
  timeCost: number;
  /** Memory usage in KiB. */
  memoryCost: number;
}

/**
 * Password hashing using Argon2id.
 *
 * Cost parameters are fixed per instance. Every digest carries its own salt and
 * parameters, so hashes produced under an older configuration still verify.
 */
export class PasswordHasher {
  constructor(private readonly options: PasswordHashOptions) {}

  /**
   * Hash a plain text password.
   */
  async hash(plainPassword: string): Promise<string> {
    return await hash(plainPassword, {
      type: argon2id,
      timeCost: this.options.timeCost,
      memoryCost: this.options.memoryCost,
    });
  }

  /**
   * Verify a plain password against a stored hash. Malformed hashes verify as
   * false.
   */
  async verify(plainPassword: string, storedHash: string): Promise<boolean> {
    try {
      return await verify(storedHash, plainPassword);
    } catch {
      return false;
    }
  }

  /**
   * Whether a stored hash was produced under different cost parameters.
   */
  needsRehash(storedHash: string): boolean {
    try {
      return needsRehash(storedHash, {
        timeCost: this.options.timeCost,
        memoryCost: this.options.memoryCost,
      });
    } catch {
      return true;
    }
  }
}
