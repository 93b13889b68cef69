import { NotFoundError } from '@marketsync/domain-kernel';
import type { WebhookRejectionReason } from '../connectors/types.js';
import type { PlatformName } from '../entities/integration.js';
import {
  WebhookEvent,
  webhookIdempotencyKey,
  type WebhookOutcome,
} from '../entities/webhook-event.js';
import { silentLogger, type Logger } from '../logger.js';
import type { IntegrationRepository } from '../repositories/integration-repository.js';
import type { WebhookEventRepository } from '../repositories/webhook-event-repository.js';
import { KeyedMutex } from '../resilience/keyed-mutex.js';
import type { IntegrationRegistry } from './integration-registry.js';
import type { WebhookHandlerRegistry } from './webhook-handlers.js';

export type WebhookReceipt =
  | { kind: 'ack'; eventId: string; duplicate: boolean }
  | { kind: 'reject'; reason: 'unknown_integration' | WebhookRejectionReason; message: string };

/** Hands persisted events to whatever runs `WebhookIngestion.process`. */
export interface WebhookDispatchQueue {
  enqueue(eventId: string): Promise<void>;
}

export interface WebhookIngestionDeps {
  events: WebhookEventRepository;
  integrations: IntegrationRepository;
  registry: IntegrationRegistry;
  handlers: WebhookHandlerRegistry;
  queue: WebhookDispatchQueue;
  logger?: Logger;
}

/**
 * Verifies, de-duplicates and persists inbound webhooks, then defers
 * processing to the dispatch queue. Events whose handler fails stay
 * unprocessed until `sweep` re-queues them.
 */
export class WebhookIngestion {
  private readonly mutex = new KeyedMutex();
  private readonly logger: Logger;

  constructor(private readonly deps: WebhookIngestionDeps) {
    this.logger = deps.logger ?? silentLogger;
  }

  async receive(
    integrationId: string,
    rawBody: string,
    headers: Record<string, string>,
  ): Promise<WebhookReceipt> {
    const integration = await this.deps.integrations.findById(integrationId);
    if (!integration || integration.deletedAt) {
      return { kind: 'reject', reason: 'unknown_integration', message: `Unknown integration ${integrationId}` };
    }
    const resolved = await this.deps.registry.resolve(integrationId);
    if (resolved.isFailure) {
      return { kind: 'reject', reason: 'not_configured', message: resolved.getError().message };
    }
    const verifier = resolved.getValue().connector.webhooks;
    if (!verifier) {
      return {
        kind: 'reject',
        reason: 'not_configured',
        message: `${integration.platformName} does not deliver webhooks`,
      };
    }

    const verified = verifier.verify(rawBody, headers);
    if (verified.isFailure) {
      const rejection = verified.getError();
      this.logger.warn(
        { integrationId, platformName: integration.platformName, reason: rejection.reason },
        'webhook rejected',
      );
      return { kind: 'reject', ...rejection };
    }

    const parsed = verified.getValue();
    const key = webhookIdempotencyKey(integrationId, parsed.platformEventId);
    const existing = await this.deps.events.findByIdempotencyKey(key);
    if (existing) return { kind: 'ack', eventId: existing.id, duplicate: true };

    const event = WebhookEvent.receive({
      integrationId,
      platformEventId: parsed.platformEventId,
      eventType: parsed.eventType,
      payload: parsed.payload,
      event: parsed.event,
    });
    if (!(await this.deps.events.insert(event))) {
      const winner = await this.deps.events.findByIdempotencyKey(key);
      return { kind: 'ack', eventId: winner?.id ?? event.id, duplicate: true };
    }

    this.logger.info(
      { integrationId, eventId: event.id, eventType: event.eventType },
      'webhook accepted',
    );
    try {
      await this.deps.queue.enqueue(event.id);
    } catch (error) {
      this.logger.error({ err: error, eventId: event.id }, 'webhook enqueue failed, left for sweep');
    }
    return { kind: 'ack', eventId: event.id, duplicate: false };
  }

  /**
   * Platform-level endpoint. Without an explicit integration id the single
   * active integration of the platform receives the delivery.
   */
  async receiveForPlatform(
    platformName: PlatformName,
    rawBody: string,
    headers: Record<string, string>,
    integrationId?: string,
  ): Promise<WebhookReceipt> {
    if (integrationId) {
      const integration = await this.deps.integrations.findById(integrationId);
      if (!integration || integration.platformName !== platformName) {
        return { kind: 'reject', reason: 'unknown_integration', message: `Unknown ${platformName} integration ${integrationId}` };
      }
      return this.receive(integrationId, rawBody, headers);
    }
    const candidates = (await this.deps.integrations.findByPlatform(platformName)).filter((integration) =>
      integration.isActive(),
    );
    if (candidates.length !== 1) {
      return {
        kind: 'reject',
        reason: 'unknown_integration',
        message:
          candidates.length === 0
            ? `No active ${platformName} integration`
            : `Several ${platformName} integrations are active; pass integrationId`,
      };
    }
    return this.receive(candidates[0].id, rawBody, headers);
  }

  /** Returns the outcome, or null when the handler failed and the event stays unprocessed. */
  async process(eventId: string): Promise<WebhookOutcome | null> {
    return this.mutex.run(eventId, async () => {
      const event = await this.deps.events.findById(eventId);
      if (!event) throw new NotFoundError('WebhookEvent', eventId);
      if (event.isProcessed()) return event.outcome;

      const log = this.logger.child({ eventId, integrationId: event.integrationId });
      let outcome: WebhookOutcome;
      try {
        outcome = await this.dispatch(event);
      } catch (error) {
        event.recordFailure(error instanceof Error ? error.message : String(error));
        await this.deps.events.update(event);
        log.warn({ err: error, attempts: event.attempts }, 'webhook handler failed');
        return null;
      }
      event.markProcessed(outcome, new Date());
      await this.deps.events.update(event);
      log.info({ outcome, eventType: event.eventType }, 'webhook processed');
      return outcome;
    });
  }

  /**
   * Re-queues events left unprocessed for longer than `minAgeMs` and returns
   * how many were queued. An event that cannot be queued stays for the next sweep.
   */
  async sweep(options: { minAgeMs: number; limit?: number; now?: Date }): Promise<number> {
    const now = options.now ?? new Date();
    const stale = await this.deps.events.findUnprocessed({
      receivedBefore: new Date(now.getTime() - options.minAgeMs),
      limit: options.limit ?? 100,
    });
    let queued = 0;
    for (const event of stale) {
      try {
        await this.deps.queue.enqueue(event.id);
        queued++;
      } catch (error) {
        this.logger.error({ err: error, eventId: event.id }, 'webhook re-queue failed');
      }
    }
    if (stale.length > 0) {
      this.logger.info({ count: queued, failed: stale.length - queued }, 'unprocessed webhooks re-queued');
    }
    return queued;
  }

  private async dispatch(event: WebhookEvent): Promise<WebhookOutcome> {
    const inbound = event.event;
    if (!inbound) return 'ignored';
    const handler = this.deps.handlers.resolve(event.integrationId, inbound.type);
    if (!handler) return 'ignored';
    return handler(inbound, { integrationId: event.integrationId, eventId: event.id });
  }
}

/**
 * Runs processing in the same process, after the caller has returned.
 * Used when no Redis is configured, and in tests.
 */
export class InlineWebhookQueue implements WebhookDispatchQueue {
  private readonly pending = new Set<Promise<void>>();

  constructor(
    private readonly handler: (eventId: string) => Promise<unknown>,
    private readonly logger: Logger = silentLogger,
  ) {}

  async enqueue(eventId: string): Promise<void> {
    const task = Promise.resolve()
      .then(() => this.handler(eventId))
      .then(
        () => undefined,
        (error: unknown) => {
          this.logger.error({ err: error, eventId }, 'inline webhook processing failed');
        },
      );
    this.pending.add(task);
    void task.then(() => this.pending.delete(task));
  }

  /** Resolves once every queued event has been handled. */
  async drain(): Promise<void> {
    while (this.pending.size > 0) await Promise.all([...this.pending]);
  }
}
