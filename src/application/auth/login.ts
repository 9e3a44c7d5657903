import { PasswordHasher } from '../../domain/auth/password.js';
import { UserRepository, normalizeEmail, toProfile } from '../../domain/auth/user.js';
import { UnauthorizedError } from '../errors.js';
import { TokenService } from './tokenService.js';
import type { AuthResult } from './register.js';
import { logger as rootLogger, type Logger } from '../../infra/logger.js';

export interface LoginCommand {
  email: string;
  password: string;
}

const INVALID_CREDENTIALS = 'Invalid email or password';

export class LoginUseCase {
  private readonly log: Logger;

  constructor(
    private userRepo: UserRepository,
    private hasher: PasswordHasher,
    private tokens: TokenService,
    logger: Logger = rootLogger
  ) {
    this.log = logger.child({ useCase: 'login' });
  }

  async execute(command: LoginCommand): Promise<AuthResult> {
    const user = await this.userRepo.findByEmail(normalizeEmail(command.email));
    if (!user) {
      throw new UnauthorizedError(INVALID_CREDENTIALS);
    }

    const isValid = await this.hasher.verify(command.password, user.passwordHash);
    if (!isValid) {
      this.log.debug({ userId: user.id }, 'Password mismatch');
      throw new UnauthorizedError(INVALID_CREDENTIALS);
    }

    // Upgrade hashes created under older cost parameters
    let current = user;
    if (this.hasher.needsRehash(user.passwordHash)) {
      const passwordHash = await this.hasher.hash(command.password);
      current = (await this.userRepo.update(user.id, { passwordHash })) ?? user;
      this.log.info({ userId: user.id }, 'Password hash upgraded');
    }

    const { token, expiresAt } = this.tokens.issue(current.id);

    return {
      token,
      expiresAt,
      user: toProfile(current),
    };
  }
}
