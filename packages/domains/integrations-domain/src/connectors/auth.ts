import { Result } from '@marketsync/domain-kernel';
import { AuthError, type ConnectorError } from '../errors/connector-errors.js';
import { systemClock, type Clock } from '../resilience/clock.js';
import type { CredentialHandle } from '../vault/credential-handle.js';

/** Fixed key sent with every request (HTTP Basic, API key, SDK secret). */
export class StaticKeyAuth<C extends object> {
  readonly kind = 'static_key' as const;

  constructor(
    private readonly handle: CredentialHandle<C>,
    private readonly toHeaders: (credentials: Readonly<C>) => Record<string, string>,
  ) {}

  headers(): Record<string, string> {
    return this.handle.use(this.toHeaders);
  }

  /** Reads a credential for SDK construction; the value must not outlive the call. */
  secret<R>(fn: (credentials: Readonly<C>) => R): R {
    return this.handle.use(fn);
  }
}

/** Request bodies carry a signature computed over their content. */
export class SignedRequestAuth<C extends object> {
  readonly kind = 'signed_request' as const;

  constructor(
    private readonly handle: CredentialHandle<C>,
    private readonly signer: (credentials: Readonly<C>, payload: string) => Record<string, string>,
  ) {}

  sign(payload: string): Record<string, string> {
    return this.handle.use((credentials) => this.signer(credentials, payload));
  }
}

export interface OAuth2Tokens {
  accessToken: string;
  refreshToken: string;
  expiresAt: Date | null;
}

export type TokenRefresher = (refreshToken: string) => Promise<Result<OAuth2Tokens, ConnectorError>>;

export interface OAuth2RefreshAuthOptions {
  tokens: OAuth2Tokens;
  refresher: TokenRefresher;
  /** Persists rotated tokens; called once per successful refresh. */
  onRotated?: (tokens: OAuth2Tokens) => Promise<void>;
  /** Refresh this long before the recorded expiry. */
  skewMs?: number;
  clock?: Clock;
}

/**
 * Bearer token with refresh. Concurrent callers share a single in-flight
 * refresh.
 */
export class OAuth2RefreshAuth {
  readonly kind = 'oauth2_refresh' as const;
  private tokens: OAuth2Tokens;
  private inflight: Promise<Result<void, ConnectorError>> | null = null;
  private readonly skewMs: number;
  private readonly clock: Clock;

  constructor(private readonly options: OAuth2RefreshAuthOptions) {
    this.tokens = { ...options.tokens };
    this.skewMs = options.skewMs ?? 60_000;
    this.clock = options.clock ?? systemClock;
  }

  bearer(): string {
    return `Bearer ${this.tokens.accessToken}`;
  }

  isExpired(): boolean {
    if (this.tokens.expiresAt === null) return false;
    return this.clock.now() >= this.tokens.expiresAt.getTime() - this.skewMs;
  }

  async refreshIfExpired(): Promise<Result<void, ConnectorError>> {
    if (!this.isExpired()) return Result.ok(undefined);
    return this.forceRefresh();
  }

  forceRefresh(): Promise<Result<void, ConnectorError>> {
    if (!this.inflight) {
      this.inflight = this.refresh().finally(() => {
        this.inflight = null;
      });
    }
    return this.inflight;
  }

  private async refresh(): Promise<Result<void, ConnectorError>> {
    const refreshed = await this.options.refresher(this.tokens.refreshToken);
    if (refreshed.isFailure) {
      const error = refreshed.getError();
      // A rejected refresh token is terminal.
      return Result.fail(
        error.kind === 'remote_validation' ? new AuthError(`Token refresh rejected: ${error.message}`) : error,
      );
    }
    this.tokens = refreshed.getValue();
    if (this.options.onRotated) await this.options.onRotated({ ...this.tokens });
    return Result.ok(undefined);
  }
}

/** What the resilience layer needs to know about a connector's auth. */
export type ConnectorAuth = { readonly kind: 'static_key' | 'signed_request' } | OAuth2RefreshAuth;
