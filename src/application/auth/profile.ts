import { PasswordHasher } from '../../domain/auth/password.js';
import {
  UserPatch,
  UserProfile,
  UserRepository,
  normalizeEmail,
  toProfile,
} from '../../domain/auth/user.js';
import { ConflictError, NotFoundError } from '../errors.js';
import type { Identity } from './identity.js';

export class GetProfileUseCase {
  constructor(private userRepo: UserRepository) {}

  async execute(identity: Identity): Promise<UserProfile> {
    const user = await this.userRepo.findById(identity.userId);
    if (!user) {
      throw new NotFoundError('User not found');
    }
    return toProfile(user);
  }
}

/**
 * `null` and `undefined` both mean "leave unchanged".
 */
export interface UpdateProfileCommand {
  name?: string | null;
  email?: string | null;
  password?: string | null;
}

export class UpdateProfileUseCase {
  constructor(
    private userRepo: UserRepository,
    private hasher: PasswordHasher
  ) {}

  async execute(identity: Identity, command: UpdateProfileCommand): Promise<UserProfile> {
    const patch: UserPatch = {};

    if (command.name != null) {
      patch.name = command.name.trim();
    }

    if (command.email != null) {
      const email = normalizeEmail(command.email);
      const holder = await this.userRepo.findByEmail(email);
      if (holder && holder.id !== identity.userId) {
        throw new ConflictError('User with this email already exists');
      }
      patch.email = email;
    }

    if (command.password != null) {
      patch.passwordHash = await this.hasher.hash(command.password);
    }

    const user = await this.userRepo.update(identity.userId, patch);
    if (!user) {
      throw new NotFoundError('User not found');
    }
    return toProfile(user);
  }
}
