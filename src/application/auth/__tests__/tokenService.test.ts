import { describe, it, expect, beforeEach } from 'vitest';
import jwt from 'jsonwebtoken';
import { TokenService } from '../tokenService.js';

const SECRET = 'test-secret';
const TTL_SECONDS = 3600;
const SKEW_SECONDS = 30;

function base64url(value: object): string {
  return Buffer.from(JSON.stringify(value)).toString('base64url');
}

describe('TokenService', () => {
  const start = new Date('2024-01-01T00:00:00Z');
  let now: Date;
  let service: TokenService;

  const advance = (seconds: number) => {
    now = new Date(start.getTime() + seconds * 1000);
  };

  beforeEach(() => {
    now = start;
    service = new TokenService({
      secret: SECRET,
      ttlSeconds: TTL_SECONDS,
      clockSkewSeconds: SKEW_SECONDS,
      clock: () => now,
    });
  });

  it('should issue a token that validates to the original subject', () => {
    const { token, expiresAt } = service.issue('user-1');

    expect(expiresAt).toEqual(new Date('2024-01-01T01:00:00Z'));
    expect(service.validate(token)).toEqual({
      valid: true,
      userId: 'user-1',
      issuedAt: start,
      expiresAt: new Date('2024-01-01T01:00:00Z'),
    });
  });

  it('should embed only sub, iat and exp claims', () => {
    const { token } = service.issue('user-1');

    expect(jwt.decode(token)).toEqual({
      sub: 'user-1',
      iat: start.getTime() / 1000,
      exp: start.getTime() / 1000 + TTL_SECONDS,
    });
  });

  it('should still accept a token shortly before expiry', () => {
    const { token } = service.issue('user-1');
    advance(TTL_SECONDS - 1);

    expect(service.validate(token)).toMatchObject({ valid: true, userId: 'user-1' });
  });

  it('should accept a token inside the clock skew grace window', () => {
    const { token } = service.issue('user-1');
    advance(TTL_SECONDS + SKEW_SECONDS - 1);

    expect(service.validate(token)).toMatchObject({ valid: true, userId: 'user-1' });
  });

  it('should reject a token once TTL and grace have elapsed', () => {
    const { token } = service.issue('user-1');
    advance(TTL_SECONDS + SKEW_SECONDS);

    expect(service.validate(token)).toEqual({ valid: false, reason: 'expired' });
  });

  it('should reject a token whose signature was tampered with', () => {
    const { token } = service.issue('user-1');
    const [header, payload, signature] = token.split('.');
    const flipped = signature[10] === 'A' ? 'B' : 'A';
    const tampered = `${header}.${payload}.${signature.slice(0, 10)}${flipped}${signature.slice(11)}`;

    expect(service.validate(tampered)).toEqual({ valid: false, reason: 'signature' });
  });

  it('should reject a token whose claims were rewritten', () => {
    const { token } = service.issue('user-1');
    const [header, , signature] = token.split('.');
    const forgedPayload = base64url({
      sub: 'user-2',
      iat: start.getTime() / 1000,
      exp: start.getTime() / 1000 + TTL_SECONDS,
    });

    expect(service.validate(`${header}.${forgedPayload}.${signature}`)).toEqual({
      valid: false,
      reason: 'signature',
    });
  });

  it('should reject every token after the secret is rotated', () => {
    const { token } = service.issue('user-1');
    const rotated = new TokenService({
      secret: 'test-secret-rotated',
      ttlSeconds: TTL_SECONDS,
      clockSkewSeconds: SKEW_SECONDS,
      clock: () => now,
    });

    expect(rotated.validate(token)).toEqual({ valid: false, reason: 'signature' });
  });

  it('should reject structurally malformed tokens', () => {
    expect(service.validate('not-a-token')).toEqual({ valid: false, reason: 'malformed' });
    expect(service.validate('')).toEqual({ valid: false, reason: 'malformed' });
  });

  it('should reject unsigned tokens', () => {
    const unsigned = `${base64url({ alg: 'none', typ: 'JWT' })}.${base64url({
      sub: 'user-1',
      iat: start.getTime() / 1000,
      exp: start.getTime() / 1000 + TTL_SECONDS,
    })}.`;

    expect(service.validate(unsigned)).toEqual({ valid: false, reason: 'malformed' });
  });

  it('should reject a token without a subject', () => {
    const token = jwt.sign({ iat: start.getTime() / 1000 }, SECRET, { expiresIn: TTL_SECONDS });

    expect(service.validate(token)).toEqual({ valid: false, reason: 'malformed' });
  });

  it('should give no grace to a token issued in the future', () => {
    const token = jwt.sign({ sub: 'user-1', iat: start.getTime() / 1000 + 5 }, SECRET, {
      expiresIn: TTL_SECONDS,
    });

    expect(service.validate(token)).toEqual({ valid: false, reason: 'malformed' });
  });

  it('should refuse to start without a secret', () => {
    expect(
      () => new TokenService({ secret: '', ttlSeconds: TTL_SECONDS, clockSkewSeconds: SKEW_SECONDS })
    ).toThrow('Token signing secret is required');
  });
});
