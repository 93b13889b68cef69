import { Result } from '@marketsync/domain-kernel';
import type { PlatformCatalog, PlatformDefinition } from '../connectors/catalog.js';
import type { Connector } from '../connectors/connector.js';
import type { FetchLike } from '../connectors/http-transport.js';
import type { Integration } from '../entities/integration.js';
import {
  resolveSettings,
  type IntegrationSettings,
} from '../entities/integration-settings.js';
import { NotConfiguredError } from '../errors/connector-errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { IntegrationRepository } from '../repositories/integration-repository.js';
import type { InvocationTarget } from '../resilience/resilience-layer.js';
import type { CredentialHandle } from '../vault/credential-handle.js';
import type { CredentialVault, Credentials } from '../vault/credential-vault.js';

export interface ResolvedIntegration {
  integration: Integration;
  definition: PlatformDefinition;
  connector: Connector;
  settings: IntegrationSettings;
  target: InvocationTarget;
}

export interface IntegrationRegistryDeps {
  integrations: IntegrationRepository;
  vault: CredentialVault;
  platforms: PlatformCatalog;
  logger?: Logger;
  fetch?: FetchLike;
}

interface CacheEntry {
  updatedAt: number;
  handle: CredentialHandle<Credentials>;
  resolved: ResolvedIntegration;
}

/**
 * Builds connectors for configured integrations. Entries are rebuilt when
 * the integration row or its credentials change.
 */
export class IntegrationRegistry {
  private readonly cache = new Map<string, CacheEntry>();
  private readonly logger: Logger;

  constructor(private readonly deps: IntegrationRegistryDeps) {
    this.logger = deps.logger ?? silentLogger;
  }

  get platforms(): PlatformCatalog {
    return this.deps.platforms;
  }

  async resolve(integrationId: string): Promise<Result<ResolvedIntegration, NotConfiguredError>> {
    const integration = await this.deps.integrations.findById(integrationId);
    if (!integration || integration.deletedAt) {
      return Result.fail(new NotConfiguredError(integrationId, 'integration not found'));
    }
    if (!integration.enabled) {
      return Result.fail(new NotConfiguredError(integrationId, 'integration is disabled'));
    }
    const handle = await this.deps.vault.get(integrationId);
    if (handle.isFailure) return Result.fail(handle.getError());

    const cached = this.cache.get(integrationId);
    if (
      cached &&
      cached.updatedAt === integration.updatedAt.getTime() &&
      cached.handle === handle.getValue()
    ) {
      return Result.ok(cached.resolved);
    }

    const definition = this.deps.platforms.get(integration.platformName);
    const settings = resolveSettings(definition.defaults, integration.settingsOverrides);
    const connector = definition.create(handle.getValue(), {
      settings,
      logger: this.logger.child({ integrationId, platformName: integration.platformName }),
      fetch: this.deps.fetch,
      rotateCredentials: (patch) => this.deps.vault.rotate(integrationId, patch),
    });
    const resolved: ResolvedIntegration = {
      integration,
      definition,
      connector,
      settings,
      target: {
        integrationId,
        platformName: integration.platformName,
        auth: connector.auth,
        settings,
      },
    };
    this.cache.set(integrationId, {
      updatedAt: integration.updatedAt.getTime(),
      handle: handle.getValue(),
      resolved,
    });
    this.logger.debug({ integrationId, platformName: integration.platformName }, 'connector built');
    return Result.ok(resolved);
  }

  /** Active integrations, optionally narrowed to `ids`. */
  async active(ids: string[] = []): Promise<Integration[]> {
    const all = await this.deps.integrations.findAll();
    const wanted = new Set(ids);
    return all.filter((integration) => integration.isActive() && (ids.length === 0 || wanted.has(integration.id)));
  }

  invalidate(integrationId: string): void {
    this.cache.delete(integrationId);
    this.deps.vault.invalidate(integrationId);
  }
}
