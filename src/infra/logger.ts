import { pino, type Logger, type LevelWithSilent } from 'pino';

export type { Logger };

/**
 * Root logger. Authorization headers and credential fields are redacted
 * wherever they appear in a log object.
 */
export function createLogger(level: LevelWithSilent = 'info'): Logger {
  return pino({
    level,
    base: { service: 'postbox-api' },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: {
      paths: [
        'req.headers.authorization',
        'password',
        'passwordHash',
        '*.password',
        '*.passwordHash',
        'token',
        '*.token',
      ],
      censor: '[redacted]',
    },
  });
}

export const logger: Logger = createLogger(
  process.env.NODE_ENV === 'test' ? 'silent' : 'info'
);
