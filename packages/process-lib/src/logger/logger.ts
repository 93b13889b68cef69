import pino, { type Logger, type LevelWithSilent } from 'pino';

/**
 * Keys that may carry secret material anywhere in a log record. Values are
 * replaced before serialization so plaintext credentials never reach a sink.
 */
export const REDACTED_PATHS = [
  'apiKey',
  'apiSecret',
  'secretKey',
  'password',
  'accessToken',
  'refreshToken',
  'clientSecret',
  'webhookSecret',
  'authorization',
  '*.apiKey',
  '*.apiSecret',
  '*.secretKey',
  '*.password',
  '*.accessToken',
  '*.refreshToken',
  '*.clientSecret',
  '*.webhookSecret',
  '*.authorization',
  'headers.authorization',
  'req.headers.authorization',
];

/** The slice of a logger that process plumbing writes to. */
export interface LogSink {
  info(data: Record<string, unknown>, msg: string): void;
  error(data: Record<string, unknown>, msg: string): void;
}

export interface CreateLoggerOptions {
  level?: LevelWithSilent;
  base?: Record<string, unknown>;
}

export function createLogger(name: string, options: CreateLoggerOptions = {}): Logger {
  return pino({
    name,
    level: options.level ?? 'info',
    base: { service: name, ...options.base },
    redact: { paths: REDACTED_PATHS, censor: '[redacted]' },
    timestamp: pino.stdTimeFunctions.isoTime,
  });
}
