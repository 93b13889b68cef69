import { ConflictError, DomainError } from '@marketsync/domain-kernel';

export type ConnectorErrorKind =
  | 'auth'
  | 'rate_limited'
  | 'transient_network'
  | 'remote_validation'
  | 'circuit_open'
  | 'unsupported_operation'
  | 'not_configured';

/**
 * Closed failure taxonomy for every outbound call. Connectors map
 * protocol-specific failures onto these; nothing above the connector
 * boundary inspects platform payloads.
 */
export abstract class ConnectorError extends DomainError {
  abstract readonly kind: ConnectorErrorKind;
}

export class AuthError extends ConnectorError {
  readonly kind = 'auth' as const;

  constructor(message: string, details?: Record<string, unknown>) {
    super('AUTH_ERROR', message, 502, details);
    this.name = 'AuthError';
  }
}

export type RateLimitSource = 'remote' | 'local';

export class RateLimitedError extends ConnectorError {
  readonly kind = 'rate_limited' as const;
  readonly retryAfterMs: number | null;
  readonly source: RateLimitSource;

  constructor(
    message: string,
    options: { retryAfterMs?: number | null; source?: RateLimitSource } = {},
  ) {
    super('RATE_LIMITED', message, 503, {
      retryAfterMs: options.retryAfterMs ?? null,
      source: options.source ?? 'remote',
    });
    this.name = 'RateLimitedError';
    this.retryAfterMs = options.retryAfterMs ?? null;
    this.source = options.source ?? 'remote';
  }
}

export class TransientNetworkError extends ConnectorError {
  readonly kind = 'transient_network' as const;

  constructor(message: string, cause?: unknown) {
    super('TRANSIENT_NETWORK_ERROR', message, 502);
    this.name = 'TransientNetworkError';
    if (cause !== undefined) this.cause = cause;
  }
}

export class RemoteValidationError extends ConnectorError {
  readonly kind = 'remote_validation' as const;

  constructor(message: string, details?: Record<string, unknown>) {
    super('REMOTE_VALIDATION_ERROR', message, 422, details);
    this.name = 'RemoteValidationError';
  }
}

export class CircuitOpenError extends ConnectorError {
  readonly kind = 'circuit_open' as const;

  constructor(
    readonly integrationId: string,
    readonly nextTrialAt: Date | null,
  ) {
    super(
      'CIRCUIT_OPEN',
      nextTrialAt
        ? `Circuit for integration ${integrationId} is open until ${nextTrialAt.toISOString()}`
        : `Circuit for integration ${integrationId} is probing`,
      503,
      { integrationId, nextTrialAt: nextTrialAt?.toISOString() ?? null },
    );
    this.name = 'CircuitOpenError';
  }
}

export class UnsupportedOperationError extends ConnectorError {
  readonly kind = 'unsupported_operation' as const;

  constructor(platformName: string, operation: string) {
    super(
      'UNSUPPORTED_OPERATION',
      `${platformName} does not support ${operation}`,
      501,
      { platformName, operation },
    );
    this.name = 'UnsupportedOperationError';
  }
}

export class NotConfiguredError extends ConnectorError {
  readonly kind = 'not_configured' as const;

  constructor(integrationId: string, reason: string) {
    super('NOT_CONFIGURED', `Integration ${integrationId} is not configured: ${reason}`, 409, {
      integrationId,
    });
    this.name = 'NotConfiguredError';
  }
}

/** Raised when a mapping write would duplicate a row or re-parent an external id. */
export class MappingConflictError extends ConflictError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, details);
    this.name = 'MappingConflictError';
  }
}

export function isConnectorError(value: unknown): value is ConnectorError {
  return value instanceof ConnectorError;
}

/** Failures that say the remote side is unhealthy. */
export function countsTowardCircuit(error: ConnectorError): boolean {
  if (error instanceof RateLimitedError) return error.source === 'remote';
  return error.kind === 'transient_network';
}
