import { randomUUID } from 'node:crypto';
import type { Logger } from '@marketsync/integrations-domain';
import type { MiddlewareHandler } from 'hono';
import type { AppEnv } from '../env.js';

export function loggingMiddleware(baseLogger: Logger): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const requestId = c.req.header('X-Request-Id') ?? randomUUID();
    c.set('requestId', requestId);
    c.header('X-Request-Id', requestId);

    const logger = baseLogger.child({ requestId });
    c.set('logger', logger);

    const start = Date.now();
    await next();

    const statusCode = c.res.status;
    const fields = {
      method: c.req.method,
      path: c.req.path,
      statusCode,
      durationMs: Date.now() - start,
    };

    if (statusCode >= 500) {
      logger.error(fields, 'request');
    } else if (statusCode >= 400) {
      logger.warn(fields, 'request');
    } else {
      logger.info(fields, 'request');
    }
  };
}
