import { Result } from '@marketsync/domain-kernel';
import type { z } from 'zod';
import {
  AuthError,
  RateLimitedError,
  RemoteValidationError,
  TransientNetworkError,
  type ConnectorError,
} from '../errors/connector-errors.js';
import { silentLogger, type Logger } from '../logger.js';

export type FetchLike = typeof fetch;

export interface HttpRequest {
  method: 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';
  path: string;
  query?: Record<string, string | number | undefined>;
  headers?: Record<string, string>;
  /** Serialized as JSON unless `body` is given. */
  json?: unknown;
  body?: string;
  signal: AbortSignal;
}

export interface HttpResponse {
  status: number;
  headers: Headers;
  text: string;
}

export interface HttpTransportOptions {
  baseUrl: string;
  fetch?: FetchLike;
  headers?: () => Record<string, string>;
  logger?: Logger;
  now?: () => number;
}

const REMOTE_VALIDATION_STATUSES = new Set([400, 404, 409, 422]);

/**
 * Reads Retry-After (seconds or HTTP date) or X-RateLimit-Reset (epoch
 * seconds, or seconds from now when small).
 */
export function parseRetryAfter(headers: Headers, now: number = Date.now()): number | null {
  const retryAfter = headers.get('retry-after');
  if (retryAfter !== null) {
    const seconds = Number(retryAfter);
    if (Number.isFinite(seconds)) return Math.max(0, seconds * 1000);
    const date = Date.parse(retryAfter);
    if (!Number.isNaN(date)) return Math.max(0, date - now);
  }
  const reset = headers.get('x-ratelimit-reset');
  if (reset !== null) {
    const value = Number(reset);
    if (Number.isFinite(value)) {
      return value > 1_000_000_000 ? Math.max(0, value * 1000 - now) : Math.max(0, value * 1000);
    }
  }
  return null;
}

export function errorForStatus(
  status: number,
  headers: Headers,
  body: string,
  now: number = Date.now(),
): ConnectorError | null {
  if (status >= 200 && status < 300) return null;
  const excerpt = body.slice(0, 300);
  if (status === 401 || status === 403) {
    return new AuthError(`Remote rejected credentials (HTTP ${status})`, { status });
  }
  if (status === 429) {
    return new RateLimitedError('Remote rate limit exceeded (HTTP 429)', {
      retryAfterMs: parseRetryAfter(headers, now),
      source: 'remote',
    });
  }
  if (REMOTE_VALIDATION_STATUSES.has(status)) {
    return new RemoteValidationError(`Remote rejected request (HTTP ${status})`, {
      status,
      body: excerpt,
    });
  }
  if (status >= 500) {
    return new TransientNetworkError(`Remote server error (HTTP ${status})`);
  }
  return new RemoteValidationError(`Unexpected HTTP ${status}`, { status, body: excerpt });
}

/** fetch wrapper that never throws for transport failures. */
export class HttpTransport {
  private readonly fetchFn: FetchLike;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(private readonly options: HttpTransportOptions) {
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.logger = options.logger ?? silentLogger;
    this.now = options.now ?? Date.now;
  }

  url(path: string, query?: HttpRequest['query']): string {
    const url = new URL(this.options.baseUrl.replace(/\/$/, '') + path);
    for (const [key, value] of Object.entries(query ?? {})) {
      if (value !== undefined) url.searchParams.set(key, String(value));
    }
    return url.toString();
  }

  async send(request: HttpRequest): Promise<Result<HttpResponse, ConnectorError>> {
    const url = this.url(request.path, request.query);
    const headers: Record<string, string> = {
      accept: 'application/json',
      ...this.options.headers?.(),
      ...request.headers,
    };
    let body = request.body;
    if (body === undefined && request.json !== undefined) {
      body = JSON.stringify(request.json);
      headers['content-type'] = 'application/json';
    }

    let response: Response;
    try {
      response = await this.fetchFn(url, {
        method: request.method,
        headers,
        body,
        signal: request.signal,
      });
    } catch (error) {
      const aborted = request.signal.aborted;
      this.logger.debug({ method: request.method, path: request.path, aborted }, 'request failed');
      return Result.fail(
        new TransientNetworkError(
          aborted ? 'Request aborted' : `Network error: ${error instanceof Error ? error.message : String(error)}`,
          error,
        ),
      );
    }

    let text: string;
    try {
      text = await response.text();
    } catch (error) {
      return Result.fail(new TransientNetworkError('Response body could not be read', error));
    }

    const failure = errorForStatus(response.status, response.headers, text, this.now());
    if (failure) {
      this.logger.debug(
        { method: request.method, path: request.path, status: response.status, kind: failure.kind },
        'remote returned an error status',
      );
      return Result.fail(failure);
    }
    return Result.ok({ status: response.status, headers: response.headers, text });
  }

  /** Sends and validates a JSON response body against `schema`. */
  async json<T>(
    request: HttpRequest,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  ): Promise<Result<T, ConnectorError>> {
    const sent = await this.send(request);
    if (sent.isFailure) return Result.fail(sent.getError());
    return parseJsonBody(sent.getValue().text, schema);
  }
}

export function parseJsonBody<T>(
  text: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Result<T, ConnectorError> {
  let data: unknown;
  try {
    data = text.length > 0 ? JSON.parse(text) : null;
  } catch {
    return Result.fail(new RemoteValidationError('Response body is not JSON', { body: text.slice(0, 300) }));
  }
  const parsed = schema.safeParse(data);
  if (!parsed.success) {
    return Result.fail(
      new RemoteValidationError('Response did not match the expected shape', {
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      }),
    );
  }
  return Result.ok(parsed.data);
}
