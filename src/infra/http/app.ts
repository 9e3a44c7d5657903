import express from 'express';
import type { AppConfig } from '../../config.js';
import { PasswordHasher } from '../../domain/auth/password.js';
import { TokenService } from '../../application/auth/tokenService.js';
import { RegisterUseCase } from '../../application/auth/register.js';
import { LoginUseCase } from '../../application/auth/login.js';
import { GetProfileUseCase, UpdateProfileUseCase } from '../../application/auth/profile.js';
import { CreatePostUseCase } from '../../application/posts/createPost.js';
import { UpdatePostUseCase } from '../../application/posts/updatePost.js';
import { DeletePostUseCase } from '../../application/posts/deletePost.js';
import { PostQueries } from '../../application/posts/queries.js';
import type { Storage } from '../storage.js';
import type { Logger } from '../logger.js';
import { createAuthRoutes } from './routes/auth.js';
import { createPostRoutes } from './routes/posts.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { errorHandler, notFoundHandler } from './middleware/errorHandler.js';
import { requestLogger } from './middleware/requestLogger.js';

export interface AppDeps {
  config: Pick<AppConfig, 'jwt' | 'passwordHash'>;
  storage: Storage;
  logger: Logger;
  /** Clock for token issue/validation; defaults to the system clock. */
  clock?: () => Date;
}

/**
 * Helper to add timeout to a promise.
 */
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  return Promise.race([
    promise,
    new Promise<T>((_, reject) => {
      timer = setTimeout(() => reject(new Error('timeout')), ms);
    }),
  ]).finally(() => clearTimeout(timer));
}

export function createApp(deps: AppDeps): express.Express {
  const { config, storage, logger } = deps;

  const hasher = new PasswordHasher(config.passwordHash);
  const tokens = new TokenService({
    secret: config.jwt.secret,
    ttlSeconds: config.jwt.ttlSeconds,
    clockSkewSeconds: config.jwt.clockSkewSeconds,
    clock: deps.clock,
  });

  const app = express();
  app.disable('x-powered-by');

  app.use(requestLogger(logger));
  app.use(express.json());

  // Health check endpoint (no auth required)
  app.get('/healthz', (_req, res) => {
    void withTimeout(storage.ping(), 2000)
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch(() => {
        res.status(500).json({
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        });
      });
  });

  app.use(createSwaggerRoutes());

  app.use(
    '/api/auth',
    createAuthRoutes({
      tokens,
      register: new RegisterUseCase(storage.users, hasher, tokens, logger),
      login: new LoginUseCase(storage.users, hasher, tokens, logger),
      getProfile: new GetProfileUseCase(storage.users),
      updateProfile: new UpdateProfileUseCase(storage.users, hasher),
    })
  );

  app.use(
    '/api/posts',
    createPostRoutes({
      tokens,
      createPost: new CreatePostUseCase(storage.posts, logger),
      updatePost: new UpdatePostUseCase(storage.posts, logger),
      deletePost: new DeletePostUseCase(storage.posts, logger),
      queries: new PostQueries(storage.posts),
    })
  );

  app.use(notFoundHandler);
  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
