import { describe, it, expect } from 'vitest';
import { ConfigError, loadConfig } from '../config.js';

const SECRET = 'test-secret-0123456789';

describe('loadConfig', () => {
  it('should apply defaults when only the secret is set', () => {
    const config = loadConfig({ JWT_SECRET: SECRET });

    expect(config).toEqual({
      port: 3000,
      jwt: { secret: SECRET, ttlSeconds: 86400, clockSkewSeconds: 30 },
      passwordHash: { timeCost: 3, memoryCost: 65536 },
      databaseUrl: undefined,
      logLevel: 'info',
    });
  });

  it('should coerce numeric variables', () => {
    const config = loadConfig({
      JWT_SECRET: SECRET,
      PORT: '8080',
      JWT_TTL_SECONDS: '600',
      JWT_CLOCK_SKEW_SECONDS: '0',
    });

    expect(config.port).toBe(8080);
    expect(config.jwt.ttlSeconds).toBe(600);
    expect(config.jwt.clockSkewSeconds).toBe(0);
  });

  it('should treat an empty DATABASE_URL as unset', () => {
    expect(loadConfig({ JWT_SECRET: SECRET, DATABASE_URL: '' }).databaseUrl).toBeUndefined();
    expect(
      loadConfig({ JWT_SECRET: SECRET, DATABASE_URL: 'postgres://localhost/postbox' }).databaseUrl
    ).toBe('postgres://localhost/postbox');
  });

  it('should refuse to start without a secret', () => {
    expect(() => loadConfig({})).toThrow(ConfigError);
    expect(() => loadConfig({})).toThrow(
      'Invalid configuration: JWT_SECRET: JWT_SECRET environment variable is required'
    );
  });

  it('should refuse a short or blank secret', () => {
    expect(() => loadConfig({ JWT_SECRET: 'short' })).toThrow(
      'JWT_SECRET must be at least 16 characters'
    );
    expect(() => loadConfig({ JWT_SECRET: '                    ' })).toThrow(ConfigError);
  });

  it('should reject an unknown log level', () => {
    expect(() => loadConfig({ JWT_SECRET: SECRET, LOG_LEVEL: 'loud' })).toThrow(ConfigError);
  });
});
