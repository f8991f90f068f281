import type { IncomingMessage, ServerResponse } from 'http';
import { randomUUID } from 'crypto';
import { pinoHttp } from 'pino-http';
import type { Logger } from 'pino';

/**
 * Request logging. Reuses an incoming x-request-id when present and echoes
 * it back; severity follows the response status.
 */
export function httpLogger(logger: Logger) {
  return pinoHttp({
    logger,
    genReqId: (req: IncomingMessage, res: ServerResponse) => {
      const header = req.headers['x-request-id'];
      const id = (Array.isArray(header) ? header[0] : header) || randomUUID();
      res.setHeader('x-request-id', id);
      return id;
    },
    customLogLevel: (_req: IncomingMessage, res: ServerResponse, err?: Error) => {
      if (err || res.statusCode >= 500) {
        return 'error';
      }
      if (res.statusCode >= 400) {
        return 'warn';
      }
      return 'info';
    },
    autoLogging: {
      ignore: (req: IncomingMessage) => req.url === '/healthz',
    },
  });
}
