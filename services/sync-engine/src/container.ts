import {
  createIntegrationCore,
  InMemoryCatalog,
  InMemoryCircuitBreakerStateRepository,
  InMemoryCredentialRepository,
  InMemoryIntegrationRepository,
  InMemoryMappingRepository,
  InMemorySyncJobRepository,
  InMemorySyncLogRepository,
  InMemoryWebhookEventRepository,
  type IntegrationCore,
  type IntegrationCoreRepositories,
  type Logger,
} from '@marketsync/integrations-domain';
import { createDatabase, getRedis } from '@marketsync/process-lib';
import type { Config } from './config.js';
import { createDrizzleRepositories } from './infrastructure/repositories/index.js';
import {
  BullSyncDispatcher,
  BullWebhookQueue,
  InlineSyncDispatcher,
  type SyncDispatcher,
} from './infrastructure/queues.js';

export interface Container {
  core: IntegrationCore;
  dispatcher: SyncDispatcher;
  /** Postgres-backed stores; false means process-local memory. */
  durable: boolean;
  /** Redis-backed queues; false means jobs and webhooks run in this process. */
  queued: boolean;
}

export function createMemoryRepositories(): IntegrationCoreRepositories {
  const catalog = new InMemoryCatalog();
  return {
    integrations: new InMemoryIntegrationRepository(),
    credentials: new InMemoryCredentialRepository(),
    mappings: new InMemoryMappingRepository(),
    jobs: new InMemorySyncJobRepository(),
    logs: new InMemorySyncLogRepository(),
    circuits: new InMemoryCircuitBreakerStateRepository(),
    webhookEvents: new InMemoryWebhookEventRepository(),
    catalog,
    orders: catalog,
  };
}

export function createContainer(config: Config, logger: Logger): Container {
  const durable = config.DATABASE_URL !== undefined;
  const queued = config.REDIS_URL !== undefined;
  // Initializes the shared connection that every queue and worker reuses.
  if (config.REDIS_URL) getRedis({ url: config.REDIS_URL, logger });
  const repositories = config.DATABASE_URL
    ? createDrizzleRepositories(createDatabase(config.DATABASE_URL))
    : createMemoryRepositories();

  const core = createIntegrationCore({
    repositories,
    encryptionKey: config.CREDENTIALS_ENCRYPTION_KEY,
    logger,
    globalConcurrency: config.SYNC_GLOBAL_CONCURRENCY,
    cancelPollIntervalMs: queued ? 2_000 : undefined,
    createWebhookQueue: queued ? () => new BullWebhookQueue() : undefined,
  });

  const dispatcher: SyncDispatcher = queued
    ? new BullSyncDispatcher()
    : new InlineSyncDispatcher((jobId) => core.orchestrator.executeJob(jobId), logger.child({ component: 'sync' }));

  return { core, dispatcher, durable, queued };
}
