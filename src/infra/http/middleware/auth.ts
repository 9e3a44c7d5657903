import type { Request, Response, NextFunction } from 'express';
import type { TokenService } from '../../../application/auth/tokenService.js';
import type { Identity } from '../../../application/auth/identity.js';
import { UnauthorizedError } from '../../../application/errors.js';

export interface AuthRequest extends Request {
  identity?: Identity;
}

const BEARER_PREFIX = 'Bearer ';

/**
 * Single external message for every rejection so callers cannot tell an
 * absent token from a forged or expired one.
 */
export const AUTHENTICATION_REQUIRED = 'Authentication required';

export function extractBearerToken(header: string | undefined): string | null {
  if (!header || !header.startsWith(BEARER_PREFIX)) {
    return null;
  }
  const token = header.substring(BEARER_PREFIX.length).trim();
  return token.length > 0 ? token : null;
}

/**
 * Establishes who is calling. It makes no decision about what the caller
 * may do; that belongs to each resource operation.
 */
export function authGate(tokens: TokenService) {
  return (req: AuthRequest, _res: Response, next: NextFunction): void => {
    const token = extractBearerToken(req.headers.authorization);
    if (!token) {
      req.log.debug('Missing or malformed authorization header');
      next(new UnauthorizedError(AUTHENTICATION_REQUIRED));
      return;
    }

    const result = tokens.validate(token);
    if (!result.valid) {
      req.log.debug({ reason: result.reason }, 'Token rejected');
      next(new UnauthorizedError(AUTHENTICATION_REQUIRED));
      return;
    }

    req.identity = { userId: result.userId };
    next();
  };
}

/**
 * Identity set by {@link authGate}. Throws when the route is not behind the gate.
 */
export function requireIdentity(req: AuthRequest): Identity {
  if (!req.identity) {
    throw new UnauthorizedError(AUTHENTICATION_REQUIRED);
  }
  return req.identity;
}
