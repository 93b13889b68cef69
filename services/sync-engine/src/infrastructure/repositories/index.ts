import type { IntegrationCoreRepositories } from '@marketsync/integrations-domain';
import type { Database } from '@marketsync/process-lib';
import { DrizzleCatalog } from './drizzle-catalog.js';
import { DrizzleCircuitBreakerStateRepository } from './drizzle-circuit-breaker-state-repository.js';
import { DrizzleCredentialRepository } from './drizzle-credential-repository.js';
import { DrizzleIntegrationRepository } from './drizzle-integration-repository.js';
import { DrizzleMappingRepository } from './drizzle-mapping-repository.js';
import { DrizzleSyncJobRepository } from './drizzle-sync-job-repository.js';
import { DrizzleSyncLogRepository } from './drizzle-sync-log-repository.js';
import { DrizzleWebhookEventRepository } from './drizzle-webhook-event-repository.js';

export function createDrizzleRepositories(db: Database): IntegrationCoreRepositories {
  const catalog = new DrizzleCatalog(db);
  return {
    integrations: new DrizzleIntegrationRepository(db),
    credentials: new DrizzleCredentialRepository(db),
    mappings: new DrizzleMappingRepository(db),
    jobs: new DrizzleSyncJobRepository(db),
    logs: new DrizzleSyncLogRepository(db),
    circuits: new DrizzleCircuitBreakerStateRepository(db),
    webhookEvents: new DrizzleWebhookEventRepository(db),
    catalog,
    orders: catalog,
  };
}
