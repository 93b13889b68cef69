import { NotFoundError, Result, ValidationError } from '@marketsync/domain-kernel';
import type { PlatformCatalog } from '../connectors/catalog.js';
import type { PlatformName } from '../entities/integration.js';
import { NotConfiguredError } from '../errors/connector-errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { CredentialRepository } from '../repositories/credential-repository.js';
import type { IntegrationRepository } from '../repositories/integration-repository.js';
import type { CredentialCipher } from './cipher.js';
import { CredentialHandle } from './credential-handle.js';
import {
  validateCredentials,
  type CredentialValidationResult,
} from './credential-validation.js';

export type Credentials = Record<string, unknown>;

export interface CredentialVaultDeps {
  integrations: IntegrationRepository;
  credentials: CredentialRepository;
  cipher: CredentialCipher;
  platforms: PlatformCatalog;
  logger?: Logger;
}

const KEY_VERSION = 1;

/**
 * Owns credential plaintext. Secrets are encrypted before they reach the
 * repository and leave only wrapped in a `CredentialHandle`.
 */
export class CredentialVault {
  private readonly cache = new Map<string, { stamp: number; handle: CredentialHandle<Credentials> }>();
  private readonly logger: Logger;

  constructor(private readonly deps: CredentialVaultDeps) {
    this.logger = deps.logger ?? silentLogger;
  }

  validate(platformName: PlatformName, credentials: unknown): CredentialValidationResult {
    return validateCredentials(this.deps.platforms.get(platformName).credentialsSchema, credentials);
  }

  async get(integrationId: string): Promise<Result<CredentialHandle<Credentials>, NotConfiguredError>> {
    const integration = await this.deps.integrations.findById(integrationId);
    if (!integration || integration.deletedAt) {
      return Result.fail(new NotConfiguredError(integrationId, 'integration not found'));
    }
    const stored = await this.deps.credentials.findByIntegration(integrationId);
    if (!stored) {
      return Result.fail(new NotConfiguredError(integrationId, 'no credentials stored'));
    }

    const cached = this.cache.get(integrationId);
    if (cached && cached.stamp === stored.updatedAt.getTime()) return Result.ok(cached.handle);

    let plaintext: unknown;
    try {
      plaintext = JSON.parse(this.deps.cipher.decrypt(stored.ciphertext));
    } catch (error) {
      this.logger.error(
        { integrationId, keyVersion: stored.keyVersion, err: error instanceof Error ? error.name : 'unknown' },
        'stored credentials could not be decrypted',
      );
      return Result.fail(new NotConfiguredError(integrationId, 'stored credentials cannot be decrypted'));
    }

    const schema = this.deps.platforms.get(integration.platformName).credentialsSchema;
    const parsed = schema.safeParse(plaintext);
    if (!parsed.success) {
      return Result.fail(
        new NotConfiguredError(
          integrationId,
          `stored credentials are invalid (${parsed.error.issues.map((issue) => issue.path.join('.')).join(', ')})`,
        ),
      );
    }

    const handle = CredentialHandle.wrap(integrationId, integration.platformName, parsed.data);
    this.cache.set(integrationId, { stamp: stored.updatedAt.getTime(), handle });
    return Result.ok(handle);
  }

  /** Validates, encrypts and stores a full credential set. */
  async store(
    integrationId: string,
    credentials: unknown,
  ): Promise<Result<CredentialValidationResult, ValidationError | NotFoundError>> {
    const integration = await this.deps.integrations.findById(integrationId);
    if (!integration || integration.deletedAt) {
      return Result.fail(new NotFoundError('Integration', integrationId));
    }
    const validation = this.validate(integration.platformName, credentials);
    if (!validation.valid) {
      return Result.fail(
        new ValidationError('Credentials failed validation', {
          errors: validation.errors,
          warnings: validation.warnings,
        }),
      );
    }

    const ref = await this.write(integrationId, credentials);
    if (integration.credentialsRef !== ref) {
      integration.attachCredentials(ref);
      await this.deps.integrations.update(integration);
    }
    this.logger.info({ integrationId, platformName: integration.platformName }, 'credentials stored');
    return Result.ok(validation);
  }

  /**
   * Merges rotated secrets (such as refreshed OAuth tokens) into the stored
   * set. Skips placeholder checks: the values come from the platform.
   */
  async rotate(integrationId: string, patch: Credentials): Promise<void> {
    const current = await this.get(integrationId);
    if (current.isFailure) throw current.getError();
    const merged = current.getValue().use((credentials) => ({ ...credentials, ...patch }));
    await this.write(integrationId, merged);
    this.logger.info({ integrationId, fields: Object.keys(patch) }, 'credentials rotated');
  }

  invalidate(integrationId: string): void {
    this.cache.delete(integrationId);
  }

  private async write(integrationId: string, credentials: unknown): Promise<string> {
    const ref = `vault:${integrationId}`;
    await this.deps.credentials.upsert({
      ref,
      integrationId,
      ciphertext: this.deps.cipher.encrypt(JSON.stringify(credentials)),
      keyVersion: KEY_VERSION,
      updatedAt: new Date(),
    });
    this.cache.delete(integrationId);
    return ref;
  }
}
