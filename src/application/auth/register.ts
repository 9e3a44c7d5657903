import { PasswordHasher } from '../../domain/auth/password.js';
import { UserRepository, UserProfile, normalizeEmail, toProfile } from '../../domain/auth/user.js';
import { ConflictError } from '../errors.js';
import { TokenService } from './tokenService.js';
import { logger as rootLogger, type Logger } from '../../infra/logger.js';

export interface RegisterCommand {
  name: string;
  email: string;
  password: string;
}

export interface AuthResult {
  token: string;
  expiresAt: Date;
  user: UserProfile;
}

export class RegisterUseCase {
  private readonly log: Logger;

  constructor(
    private userRepo: UserRepository,
    private hasher: PasswordHasher,
    private tokens: TokenService,
    logger: Logger = rootLogger
  ) {
    this.log = logger.child({ useCase: 'register' });
  }

  async execute(command: RegisterCommand): Promise<AuthResult> {
    const email = normalizeEmail(command.email);

    // Fast path; the store re-checks atomically on create
    const existing = await this.userRepo.findByEmail(email);
    if (existing) {
      throw new ConflictError('User with this email already exists');
    }

    const passwordHash = await this.hasher.hash(command.password);

    const user = await this.userRepo.create({
      name: command.name.trim(),
      email,
      passwordHash,
    });
    this.log.info({ userId: user.id }, 'User registered');

    const { token, expiresAt } = this.tokens.issue(user.id);

    return {
      token,
      expiresAt,
      user: toProfile(user),
    };
  }
}
