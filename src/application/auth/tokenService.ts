import jwt, { type JwtPayload } from 'jsonwebtoken';

export interface TokenServiceOptions {
  secret: string;
  ttlSeconds: number;
  /** Grace window applied to `exp` only. */
  clockSkewSeconds: number;
  clock?: () => Date;
}

export interface IssuedToken {
  token: string;
  expiresAt: Date;
}

export type TokenRejection = 'malformed' | 'signature' | 'expired';

export type TokenValidation =
  | { valid: true; userId: string; issuedAt: Date; expiresAt: Date }
  | { valid: false; reason: TokenRejection };

const ALGORITHM = 'HS256';

function toEpochSeconds(date: Date): number {
  return Math.floor(date.getTime() / 1000);
}

/**
 * Issues and validates stateless HS256 tokens carrying the user id as `sub`.
 *
 * Nothing is stored server-side: a token stays valid until it expires or the
 * secret is rotated.
 */
export class TokenService {
  private readonly clock: () => Date;

  constructor(private readonly options: TokenServiceOptions) {
    if (!options.secret) {
      throw new Error('Token signing secret is required');
    }
    this.clock = options.clock ?? (() => new Date());
  }

  issue(userId: string): IssuedToken {
    const issuedAt = toEpochSeconds(this.clock());
    const token = jwt.sign({ sub: userId, iat: issuedAt }, this.options.secret, {
      algorithm: ALGORITHM,
      expiresIn: this.options.ttlSeconds,
    });

    return {
      token,
      expiresAt: new Date((issuedAt + this.options.ttlSeconds) * 1000),
    };
  }

  validate(token: string): TokenValidation {
    const now = toEpochSeconds(this.clock());

    let payload: string | JwtPayload;
    try {
      payload = jwt.verify(token, this.options.secret, {
        algorithms: [ALGORITHM],
        clockTimestamp: now,
        clockTolerance: this.options.clockSkewSeconds,
      });
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        return { valid: false, reason: 'expired' };
      }
      if (error instanceof jwt.JsonWebTokenError && error.message === 'invalid signature') {
        return { valid: false, reason: 'signature' };
      }
      return { valid: false, reason: 'malformed' };
    }

    if (
      typeof payload === 'string' ||
      typeof payload.sub !== 'string' ||
      payload.sub.length === 0 ||
      typeof payload.iat !== 'number' ||
      typeof payload.exp !== 'number'
    ) {
      return { valid: false, reason: 'malformed' };
    }

    // No grace for tokens minted in the future.
    if (payload.iat > now) {
      return { valid: false, reason: 'malformed' };
    }

    return {
      valid: true,
      userId: payload.sub,
      issuedAt: new Date(payload.iat * 1000),
      expiresAt: new Date(payload.exp * 1000),
    };
  }
}
