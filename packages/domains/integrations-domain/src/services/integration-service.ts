import { NotFoundError, Result, type ValidationError } from '@marketsync/domain-kernel';
import type { PlatformCatalog } from '../connectors/catalog.js';
import { capabilitiesOf, type Capability } from '../connectors/connector.js';
import type { CircuitState } from '../entities/circuit-breaker-state.js';
import {
  Integration,
  type HealthState,
  type IntegrationCategory,
  type PlatformName,
} from '../entities/integration.js';
import { resolveSettings, type IntegrationSettings } from '../entities/integration-settings.js';
import type { CreateIntegrationCommand } from '../commands/create-integration.js';
import type { UpdateSettingsCommand } from '../commands/update-settings.js';
import type { ConfigureCredentialsCommand } from '../commands/configure-credentials.js';
import { silentLogger, type Logger } from '../logger.js';
import type { IntegrationRepository } from '../repositories/integration-repository.js';
import type { CircuitBreaker } from '../resilience/circuit-breaker.js';
import type { ResilienceLayer } from '../resilience/resilience-layer.js';
import type { CredentialValidationResult } from '../vault/credential-validation.js';
import type { CredentialVault } from '../vault/credential-vault.js';
import type { IntegrationRegistry } from './integration-registry.js';

export interface IntegrationStatus {
  id: string;
  platformName: PlatformName;
  category: IntegrationCategory;
  name: string;
  enabled: boolean;
  sandboxMode: boolean;
  credentialsConfigured: boolean;
  credentialsValid: boolean;
  credentialsError: string | null;
  circuitState: CircuitState;
  healthState: HealthState;
  lastHealthCheckAt: Date | null;
  lastSyncAt: Date | null;
  capabilities: Capability[];
  settings: IntegrationSettings;
}

export interface HealthCheckResult {
  healthState: HealthState;
  error: string | null;
  durationMs: number;
}

export interface IntegrationServiceDeps {
  integrations: IntegrationRepository;
  vault: CredentialVault;
  registry: IntegrationRegistry;
  breaker: CircuitBreaker;
  resilience: ResilienceLayer;
  platforms: PlatformCatalog;
  logger?: Logger;
}

export class IntegrationService {
  private readonly logger: Logger;

  constructor(private readonly deps: IntegrationServiceDeps) {
    this.logger = deps.logger ?? silentLogger;
  }

  async create(command: CreateIntegrationCommand): Promise<Integration> {
    const definition = this.deps.platforms.get(command.platformName);
    const integration = Integration.create({
      platformName: command.platformName,
      category: definition.category,
      name: command.name ?? command.platformName,
      settings: command.settings,
    });
    await this.deps.integrations.save(integration);
    await this.deps.breaker.reset(integration.id);
    this.logger.info(
      { integrationId: integration.id, platformName: integration.platformName },
      'integration created',
    );
    return integration;
  }

  async list(): Promise<IntegrationStatus[]> {
    const integrations = await this.deps.integrations.findAll();
    return Promise.all(integrations.map((integration) => this.describe(integration)));
  }

  async status(integrationId: string): Promise<IntegrationStatus> {
    return this.describe(await this.load(integrationId));
  }

  async updateSettings(command: UpdateSettingsCommand): Promise<Integration> {
    const integration = await this.load(command.integrationId);
    integration.updateSettings(command.settings);
    if (command.name) integration.rename(command.name);
    await this.deps.integrations.update(integration);
    this.forget(integration.id);
    this.logger.info(
      { integrationId: integration.id, fields: Object.keys(command.settings) },
      'integration settings updated',
    );
    return integration;
  }

  async configureCredentials(
    command: ConfigureCredentialsCommand,
  ): Promise<Result<CredentialValidationResult, ValidationError | NotFoundError>> {
    const stored = await this.deps.vault.store(command.integrationId, command.credentials);
    if (stored.isSuccess) this.deps.registry.invalidate(command.integrationId);
    return stored;
  }

  async remove(integrationId: string): Promise<void> {
    const integration = await this.load(integrationId);
    integration.softDelete();
    await this.deps.integrations.update(integration);
    this.forget(integrationId);
    this.logger.info({ integrationId }, 'integration removed');
  }

  /** Runs `testConnection` through the resilience layer and records the result. */
  async healthCheck(integrationId: string): Promise<HealthCheckResult> {
    await this.load(integrationId);
    const resolved = await this.deps.registry.resolve(integrationId);

    let result: HealthCheckResult;
    if (resolved.isFailure) {
      result = { healthState: 'degraded', error: resolved.getError().message, durationMs: 0 };
    } else {
      const { connector, target } = resolved.getValue();
      const outcome = await this.deps.resilience.invoke(target, 'testConnection', (ctx) =>
        connector.testConnection({ signal: ctx.signal }),
      );
      if (outcome.result.isSuccess) {
        result = { healthState: 'healthy', error: null, durationMs: outcome.durationMs };
      } else {
        const error = outcome.result.getError();
        const unreachable = error.kind === 'transient_network' || error.kind === 'circuit_open';
        result = {
          healthState: unreachable ? 'unreachable' : 'degraded',
          error: error.message,
          durationMs: outcome.durationMs,
        };
      }
    }

    // The call can outlive edits made meanwhile, so write onto the current row.
    const current = await this.deps.integrations.findById(integrationId);
    if (current && !current.deletedAt) {
      current.recordHealth(result.healthState);
      await this.deps.integrations.update(current);
    }
    this.logger.info({ integrationId, healthState: result.healthState }, 'health check finished');
    return result;
  }

  private async load(integrationId: string): Promise<Integration> {
    const integration = await this.deps.integrations.findById(integrationId);
    if (!integration || integration.deletedAt) throw new NotFoundError('Integration', integrationId);
    return integration;
  }

  private forget(integrationId: string): void {
    this.deps.registry.invalidate(integrationId);
    this.deps.resilience.forget(integrationId);
  }

  private async describe(integration: Integration): Promise<IntegrationStatus> {
    const definition = this.deps.platforms.get(integration.platformName);
    const credentials = await this.deps.vault.get(integration.id);
    const circuit = await this.deps.breaker.getState(integration.id);
    const resolved = await this.deps.registry.resolve(integration.id);
    return {
      id: integration.id,
      platformName: integration.platformName,
      category: integration.category,
      name: integration.name,
      enabled: integration.enabled,
      sandboxMode: integration.sandboxMode,
      credentialsConfigured: integration.credentialsRef !== null,
      credentialsValid: credentials.isSuccess,
      credentialsError: credentials.isFailure ? credentials.getError().message : null,
      circuitState: circuit.state,
      healthState: integration.healthState,
      lastHealthCheckAt: integration.lastHealthCheckAt,
      lastSyncAt: integration.lastSyncAt,
      capabilities: resolved.isSuccess ? capabilitiesOf(resolved.getValue().connector) : [],
      settings: resolveSettings(definition.defaults, integration.settingsOverrides),
    };
  }
}
