import { NotFoundError } from '@marketsync/domain-kernel';
import type { z } from 'zod';
import type {
  IntegrationCategory,
  PlatformName,
} from '../entities/integration.js';
import type {
  IntegrationSettings,
  IntegrationSettingsPatch,
} from '../entities/integration-settings.js';
import type { Logger } from '../logger.js';
import { CredentialHandle } from '../vault/credential-handle.js';
import type { Connector } from './connector.js';
import type { FetchLike } from './http-transport.js';

export type CredentialsSchema = z.ZodType<Record<string, unknown>, z.ZodTypeDef, unknown>;

export interface ConnectorRuntime {
  settings: IntegrationSettings;
  logger: Logger;
  fetch?: FetchLike;
  /** Persists rotated secrets (refreshed OAuth tokens) through the vault. */
  rotateCredentials?: (patch: Record<string, unknown>) => Promise<void>;
}

export interface ConnectorBuildContext<C extends object> extends ConnectorRuntime {
  integrationId: string;
  credentials: CredentialHandle<C>;
  baseUrl: string;
}

export interface PlatformDefinition {
  readonly platformName: PlatformName;
  readonly category: IntegrationCategory;
  readonly credentialsSchema: CredentialsSchema;
  readonly defaults: IntegrationSettingsPatch;
  readonly baseUrls: { production: string; sandbox: string };
  create(credentials: CredentialHandle<Record<string, unknown>>, runtime: ConnectorRuntime): Connector;
}

/**
 * Pairs a platform's credential schema with its connector factory. The
 * untyped handle from the vault is re-parsed here, so factories see their
 * own credential type.
 */
export function definePlatform<C extends Record<string, unknown>>(definition: {
  platformName: PlatformName;
  category: IntegrationCategory;
  credentialsSchema: z.ZodType<C, z.ZodTypeDef, unknown>;
  defaults: IntegrationSettingsPatch;
  baseUrls: { production: string; sandbox: string };
  build(context: ConnectorBuildContext<C>): Connector;
}): PlatformDefinition {
  return {
    platformName: definition.platformName,
    category: definition.category,
    credentialsSchema: definition.credentialsSchema,
    defaults: definition.defaults,
    baseUrls: definition.baseUrls,
    create(credentials, runtime) {
      const typed = CredentialHandle.wrap(
        credentials.integrationId,
        credentials.platformName,
        credentials.use((raw) => definition.credentialsSchema.parse(raw)),
      );
      const baseUrl =
        runtime.settings.baseUrl ??
        (runtime.settings.sandboxMode ? definition.baseUrls.sandbox : definition.baseUrls.production);
      return definition.build({
        ...runtime,
        integrationId: credentials.integrationId,
        credentials: typed,
        baseUrl,
      });
    },
  };
}

export class PlatformCatalog {
  private readonly definitions = new Map<PlatformName, PlatformDefinition>();

  constructor(definitions: PlatformDefinition[]) {
    for (const definition of definitions) {
      this.definitions.set(definition.platformName, definition);
    }
  }

  get(platformName: PlatformName): PlatformDefinition {
    const definition = this.definitions.get(platformName);
    if (!definition) throw new NotFoundError('Platform', platformName);
    return definition;
  }

  has(platformName: string): platformName is PlatformName {
    for (const name of this.definitions.keys()) {
      if (name === platformName) return true;
    }
    return false;
  }

  list(): PlatformDefinition[] {
    return [...this.definitions.values()];
  }
}
