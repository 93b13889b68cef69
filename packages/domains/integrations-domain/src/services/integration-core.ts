import type { PlatformCatalog } from '../connectors/catalog.js';
import type { FetchLike } from '../connectors/http-transport.js';
import { createPlatformCatalog } from '../connectors/platforms.js';
import { silentLogger, type Logger } from '../logger.js';
import type { CatalogSource, OrderStateStore } from '../repositories/catalog-source.js';
import type { CircuitBreakerStateRepository } from '../repositories/circuit-breaker-state-repository.js';
import type { CredentialRepository } from '../repositories/credential-repository.js';
import type { IntegrationRepository } from '../repositories/integration-repository.js';
import type { MappingRepository } from '../repositories/mapping-repository.js';
import type { SyncJobRepository } from '../repositories/sync-job-repository.js';
import type { SyncLogRepository } from '../repositories/sync-log-repository.js';
import type { WebhookEventRepository } from '../repositories/webhook-event-repository.js';
import { CircuitBreaker } from '../resilience/circuit-breaker.js';
import type { Clock } from '../resilience/clock.js';
import { ResilienceLayer } from '../resilience/resilience-layer.js';
import { CredentialCipher } from '../vault/cipher.js';
import { CredentialVault } from '../vault/credential-vault.js';
import { IntegrationRegistry } from './integration-registry.js';
import { IntegrationService } from './integration-service.js';
import { MappingStore } from './mapping-store.js';
import { OrderImporter } from './order-import.js';
import { OrderStatusReconciler, registerOrderStatusHandlers } from './order-status-reconciler.js';
import { SyncOrchestrator } from './sync-orchestrator.js';
import { WebhookHandlerRegistry } from './webhook-handlers.js';
import { InlineWebhookQueue, WebhookIngestion, type WebhookDispatchQueue } from './webhook-ingestion.js';

export interface IntegrationCoreRepositories {
  integrations: IntegrationRepository;
  credentials: CredentialRepository;
  mappings: MappingRepository;
  jobs: SyncJobRepository;
  logs: SyncLogRepository;
  circuits: CircuitBreakerStateRepository;
  webhookEvents: WebhookEventRepository;
  catalog: CatalogSource;
  orders: OrderStateStore;
}

export interface IntegrationCoreOptions {
  repositories: IntegrationCoreRepositories;
  /** Base64 of 32 random bytes. */
  encryptionKey: string;
  logger?: Logger;
  fetch?: FetchLike;
  clock?: Clock;
  random?: () => number;
  platforms?: PlatformCatalog;
  globalConcurrency?: number;
  cancelPollIntervalMs?: number;
  /** Builds the queue that runs webhook processing; defaults to in-process. */
  createWebhookQueue?: (process: (eventId: string) => Promise<unknown>) => WebhookDispatchQueue;
}

export interface IntegrationCore {
  platforms: PlatformCatalog;
  vault: CredentialVault;
  registry: IntegrationRegistry;
  breaker: CircuitBreaker;
  resilience: ResilienceLayer;
  mappings: MappingStore;
  orchestrator: SyncOrchestrator;
  handlers: WebhookHandlerRegistry;
  orderImport: OrderImporter;
  webhooks: WebhookIngestion;
  webhookQueue: WebhookDispatchQueue;
  integrations: IntegrationService;
}

export function createIntegrationCore(options: IntegrationCoreOptions): IntegrationCore {
  const { repositories: repos } = options;
  const logger = options.logger ?? silentLogger;
  const platforms = options.platforms ?? createPlatformCatalog();

  const vault = new CredentialVault({
    integrations: repos.integrations,
    credentials: repos.credentials,
    cipher: new CredentialCipher(options.encryptionKey),
    platforms,
    logger: logger.child({ component: 'vault' }),
  });
  const registry = new IntegrationRegistry({
    integrations: repos.integrations,
    vault,
    platforms,
    logger: logger.child({ component: 'connector' }),
    fetch: options.fetch,
  });
  const breaker = new CircuitBreaker({
    repository: repos.circuits,
    clock: options.clock,
    logger: logger.child({ component: 'circuit-breaker' }),
  });
  const resilience = new ResilienceLayer({
    breaker,
    clock: options.clock,
    random: options.random,
    logger: logger.child({ component: 'resilience' }),
  });
  const mappings = new MappingStore(repos.mappings);

  const orchestrator = new SyncOrchestrator({
    jobs: repos.jobs,
    logs: repos.logs,
    integrations: repos.integrations,
    registry,
    resilience,
    mappings,
    catalog: repos.catalog,
    logger: logger.child({ component: 'sync' }),
    globalConcurrency: options.globalConcurrency,
    cancelPollIntervalMs: options.cancelPollIntervalMs,
  });

  const ordersLogger = logger.child({ component: 'orders' });
  const reconciler = new OrderStatusReconciler({ orders: repos.orders, mappings, logger: ordersLogger });
  const handlers = new WebhookHandlerRegistry();
  registerOrderStatusHandlers(handlers, reconciler);
  const orderImport = new OrderImporter({ registry, resilience, reconciler, logger: ordersLogger });
  const webhookLogger = logger.child({ component: 'webhooks' });
  const processEvent = (eventId: string) => webhooks.process(eventId);
  const webhookQueue = options.createWebhookQueue
    ? options.createWebhookQueue(processEvent)
    : new InlineWebhookQueue(processEvent, webhookLogger);
  const webhooks: WebhookIngestion = new WebhookIngestion({
    events: repos.webhookEvents,
    integrations: repos.integrations,
    registry,
    handlers,
    queue: webhookQueue,
    logger: webhookLogger,
  });

  const integrations = new IntegrationService({
    integrations: repos.integrations,
    vault,
    registry,
    breaker,
    resilience,
    platforms,
    logger: logger.child({ component: 'integrations' }),
  });

  return {
    platforms,
    vault,
    registry,
    breaker,
    resilience,
    mappings,
    orchestrator,
    handlers,
    orderImport,
    webhooks,
    webhookQueue,
    integrations,
  };
}
