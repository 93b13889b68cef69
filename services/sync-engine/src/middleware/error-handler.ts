import { DomainError } from '@marketsync/domain-kernel';
import type { Logger } from '@marketsync/integrations-domain';
import type { ErrorHandler } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { AppEnv } from '../env.js';

function errorStatus(code: number): ContentfulStatusCode | null {
  switch (code) {
    case 400:
    case 401:
    case 403:
    case 404:
    case 409:
    case 422:
    case 429:
    case 501:
    case 502:
    case 503:
      return code;
    default:
      return null;
  }
}

/** `app.onError` handler: domain errors keep their status, anything else is a logged 500. */
export function errorHandler(fallbackLogger: Logger): ErrorHandler<AppEnv> {
  return (err, c) => {
    const requestId = c.get('requestId') ?? 'unknown';

    if (err instanceof DomainError) {
      const status = errorStatus(err.statusCode);
      if (status) {
        return c.json(
          {
            error: err.code,
            message: err.message,
            details: err.details,
            requestId,
          },
          status,
        );
      }
    }

    (c.get('logger') ?? fallbackLogger).error({ err, requestId }, 'Unhandled error');

    return c.json(
      {
        error: 'INTERNAL_ERROR',
        message: 'An unexpected error occurred',
        requestId,
      },
      500,
    );
  };
}
