import { randomUUID } from 'crypto';
import type { IncomingMessage, ServerResponse } from 'http';
import { pinoHttp, type HttpLogger } from 'pino-http';
import type { Logger } from '../../logger.js';

const IGNORED_PATHS = new Set(['/healthz', '/favicon.ico']);

/**
 * Per-request logger. Reuses an incoming x-request-id or mints one, and echoes
 * it back on the response.
 */
export function requestLogger(logger: Logger): HttpLogger {
  return pinoHttp({
    logger,
    genReqId: (req: IncomingMessage, res: ServerResponse) => {
      const header = req.headers['x-request-id'];
      const id = (Array.isArray(header) ? header[0] : header) || randomUUID();
      res.setHeader('x-request-id', id);
      return id;
    },
    customLogLevel: (_req: IncomingMessage, res: ServerResponse, err?: Error) => {
      if (err || res.statusCode >= 500) return 'error';
      if (res.statusCode >= 400) return 'warn';
      return 'info';
    },
    autoLogging: {
      ignore: (req: IncomingMessage) => IGNORED_PATHS.has(req.url ?? ''),
    },
    serializers: {
      req(req: IncomingMessage & { id?: unknown }) {
        return { id: req.id, method: req.method, url: req.url };
      },
      res(res: ServerResponse) {
        return { statusCode: res.statusCode };
      },
    },
  });
}
