import type { PlatformName } from '../entities/integration.js';
import type { IntegrationSettingsPatch } from '../entities/integration-settings.js';
import type { Logger } from '../logger.js';
import { InMemoryCatalog } from '../repositories/in-memory/in-memory-catalog.js';
import { InMemoryCircuitBreakerStateRepository } from '../repositories/in-memory/in-memory-circuit-breaker-state-repository.js';
import { InMemoryCredentialRepository } from '../repositories/in-memory/in-memory-credential-repository.js';
import { InMemoryIntegrationRepository } from '../repositories/in-memory/in-memory-integration-repository.js';
import { InMemoryMappingRepository } from '../repositories/in-memory/in-memory-mapping-repository.js';
import { InMemorySyncJobRepository } from '../repositories/in-memory/in-memory-sync-job-repository.js';
import { InMemorySyncLogRepository } from '../repositories/in-memory/in-memory-sync-log-repository.js';
import { InMemoryWebhookEventRepository } from '../repositories/in-memory/in-memory-webhook-event-repository.js';
import { createIntegrationCore, type IntegrationCore } from '../services/integration-core.js';
import { InlineWebhookQueue } from '../services/webhook-ingestion.js';
import { fakeFetch, jsonResponse, type FakeHandler, type RecordedRequest } from './fake-fetch.js';
import { ManualClock } from './manual-clock.js';
import { recordingLogger, type LogEntry } from './recording-logger.js';

export const TEST_ENCRYPTION_KEY = Buffer.alloc(32, 7).toString('base64');

/** Settings that keep in-memory runs fast: no rate-limit waits, one attempt. */
export const FAST_SETTINGS: IntegrationSettingsPatch = {
  rateLimitPerSecond: 1_000,
  retryMaxAttempts: 1,
  requestTimeoutMs: 1_000,
};

export const TEST_CREDENTIALS: Record<PlatformName, Record<string, unknown>> = {
  trendyol: { apiKey: 'test-key', apiSecret: 'test-secret', supplierId: 1234, webhookSecret: 'test-webhook-secret' },
  n11: { apiKey: 'test-key', apiSecret: 'test-secret' },
  etsy: { clientId: 'test-client', accessToken: 'test-access-1', refreshToken: 'test-refresh-1', shopId: 42 },
  stripe: { secretKey: 'test-secret-key', webhookSecret: 'test-webhook-secret' },
};

export interface TestCore extends IntegrationCore {
  repositories: {
    integrations: InMemoryIntegrationRepository;
    credentials: InMemoryCredentialRepository;
    mappings: InMemoryMappingRepository;
    jobs: InMemorySyncJobRepository;
    logs: InMemorySyncLogRepository;
    circuits: InMemoryCircuitBreakerStateRepository;
    webhookEvents: InMemoryWebhookEventRepository;
    catalog: InMemoryCatalog;
    orders: InMemoryCatalog;
  };
  catalog: InMemoryCatalog;
  clock: ManualClock;
  requests: RecordedRequest[];
  queue: InlineWebhookQueue;
  logger: Logger;
  logEntries: LogEntry[];
  /** Creates an integration with test credentials and fast settings. */
  addIntegration(platformName: PlatformName, settings?: IntegrationSettingsPatch): Promise<string>;
}

/** The whole core over in-memory stores, a manual clock and a fake fetch. */
export function createTestCore(
  handler: FakeHandler = () => jsonResponse({ batchRequestId: 'batch-1' }),
  options: { cancelPollIntervalMs?: number; globalConcurrency?: number } = {},
): TestCore {
  const catalog = new InMemoryCatalog();
  const repositories = {
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
  const clock = new ManualClock();
  const { fetch, requests } = fakeFetch(handler);
  const { logger, entries } = recordingLogger();
  const holder: { queue?: InlineWebhookQueue } = {};

  const core = createIntegrationCore({
    repositories,
    encryptionKey: TEST_ENCRYPTION_KEY,
    logger,
    fetch,
    clock,
    random: () => 0,
    cancelPollIntervalMs: options.cancelPollIntervalMs,
    globalConcurrency: options.globalConcurrency,
    createWebhookQueue: (processEvent) => {
      holder.queue = new InlineWebhookQueue(processEvent, logger);
      return holder.queue;
    },
  });
  const inline = holder.queue;
  if (!inline) throw new Error('webhook queue was not created');

  return {
    ...core,
    repositories,
    catalog,
    clock,
    requests,
    queue: inline,
    logger,
    logEntries: entries,
    async addIntegration(platformName, settings = {}) {
      const integration = await core.integrations.create({
        platformName,
        settings: { ...FAST_SETTINGS, ...settings },
      });
      const stored = await core.integrations.configureCredentials({
        integrationId: integration.id,
        credentials: TEST_CREDENTIALS[platformName],
      });
      if (stored.isFailure) throw stored.getError();
      return integration.id;
    },
  };
}
