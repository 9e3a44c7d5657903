import { z } from 'zod';

/**
 * Raised when the process environment cannot produce a usable configuration.
 * Startup treats it as fatal.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(3000),
  JWT_SECRET: z
    .string({ required_error: 'JWT_SECRET environment variable is required' })
    .trim()
    .min(16, 'JWT_SECRET must be at least 16 characters'),
  JWT_TTL_SECONDS: z.coerce.number().int().positive().default(24 * 60 * 60),
  JWT_CLOCK_SKEW_SECONDS: z.coerce.number().int().min(0).default(30),
  PASSWORD_HASH_TIME_COST: z.coerce.number().int().min(2).default(3),
  PASSWORD_HASH_MEMORY_COST: z.coerce.number().int().min(1024).default(65536),
  DATABASE_URL: z
    .string()
    .trim()
    .optional()
    .transform((val) => (val ? val : undefined)),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
});

export interface AppConfig {
  port: number;
  jwt: {
    secret: string;
    ttlSeconds: number;
    clockSkewSeconds: number;
  };
  passwordHash: {
    timeCost: number;
    memoryCost: number;
  };
  databaseUrl?: string;
  logLevel: z.infer<typeof envSchema>['LOG_LEVEL'];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.errors
      .map((e) => `${e.path.join('.')}: ${e.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }

  const vars = parsed.data;
  return {
    port: vars.PORT,
    jwt: {
      secret: vars.JWT_SECRET,
      ttlSeconds: vars.JWT_TTL_SECONDS,
      clockSkewSeconds: vars.JWT_CLOCK_SKEW_SECONDS,
    },
    passwordHash: {
      timeCost: vars.PASSWORD_HASH_TIME_COST,
      memoryCost: vars.PASSWORD_HASH_MEMORY_COST,
    },
    databaseUrl: vars.DATABASE_URL,
    logLevel: vars.LOG_LEVEL,
  };
}
