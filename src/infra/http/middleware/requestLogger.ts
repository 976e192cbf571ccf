import { randomUUID } from 'crypto';
import { pinoHttp } from 'pino-http';
import type { Logger } from 'pino';

const QUIET_PATHS = new Set(['/healthz', '/readyz', '/metrics']);

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Request logging. Reuses an incoming x-request-id (or x-correlation-id)
 * and echoes it back; probes and scrapes are not logged.
 */
export function createRequestLogger(logger: Logger) {
  return pinoHttp({
    logger,
    genReqId: (req, res) => {
      const id =
        headerValue(req.headers['x-request-id']) ??
        headerValue(req.headers['x-correlation-id']) ??
        randomUUID();
      res.setHeader('x-request-id', id);
      return id;
    },
    customLogLevel: (_req, res, err) => {
      if (err || res.statusCode >= 500) return 'error';
      if (res.statusCode >= 400) return 'warn';
      return 'info';
    },
    autoLogging: {
      ignore: (req) => QUIET_PATHS.has(req.url?.split('?')[0] ?? ''),
    },
  });
}
