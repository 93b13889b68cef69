import type { InboundEvent, InboundEventType, OrderStatus } from '../connectors/types.js';
import type { WebhookOutcome } from '../entities/webhook-event.js';
import { MappingConflictError } from '../errors/connector-errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { OrderStateStore } from '../repositories/catalog-source.js';
import type { MappingStore } from './mapping-store.js';
import { payloadHash, projectOrderStatus } from './sync-entities.js';
import type { WebhookHandlerContext, WebhookHandlerRegistry } from './webhook-handlers.js';

/** An order state observed on a platform. */
export interface ExternalOrderState {
  externalId: string;
  status: OrderStatus;
  occurredAt: Date;
}

export type ReconcileOutcome = 'created' | 'updated' | 'unchanged' | 'stale' | 'unmapped';

/**
 * Applies inbound order and payment status events to the internal order
 * store. The mapping is marked synced with the applied status so the next
 * outbound order-status sync does not echo it back.
 */
export class OrderStatusReconciler {
  private readonly logger: Logger;

  constructor(
    private readonly deps: { orders: OrderStateStore; mappings: MappingStore; logger?: Logger },
  ) {
    this.logger = deps.logger ?? silentLogger;
  }

  async handle(event: InboundEvent, context: WebhookHandlerContext): Promise<WebhookOutcome> {
    const outcome = await this.reconcile(context.integrationId, event, {
      createMissing: event.type === 'order.created',
    });
    switch (outcome) {
      case 'unmapped':
        return 'unmapped';
      case 'stale':
        this.logger.debug(
          { integrationId: context.integrationId, externalId: event.externalId, eventId: context.eventId },
          'stale order event ignored',
        );
        return 'ignored';
      default:
        return 'processed';
    }
  }

  /**
   * Applies one platform order state. With `createMissing`, an order the
   * platform knows but nothing maps yet gets a fresh internal id and a
   * mapping to its external id.
   */
  async reconcile(
    integrationId: string,
    state: ExternalOrderState,
    options: { createMissing: boolean },
  ): Promise<ReconcileOutcome> {
    let mapping = await this.deps.mappings.findByExternalId(integrationId, state.externalId);
    let created = false;
    if (!mapping && options.createMissing) {
      const linked = await this.linkNewOrder(integrationId, state.externalId);
      mapping = linked.mapping;
      created = linked.created;
    }
    if (!mapping || mapping.entityKind !== 'order') {
      this.logger.info({ integrationId, externalId: state.externalId }, 'no order mapped to external order');
      return 'unmapped';
    }

    const orderId = mapping.internalEntityId;
    return this.deps.mappings.withLock<ReconcileOutcome>(integrationId, orderId, async () => {
      const before = await this.deps.orders.get(orderId);
      const applied = await this.deps.orders.apply({
        orderId,
        status: state.status,
        source: { integrationId, externalId: state.externalId },
        occurredAt: state.occurredAt,
      });
      if (!applied) return 'stale';

      const order = await this.deps.orders.get(orderId);
      if (order) {
        await this.deps.mappings.recordSuccess({
          internalEntityId: orderId,
          entityKind: 'order',
          integrationId,
          externalId: state.externalId,
          hashes: { order_status: payloadHash(projectOrderStatus(order)) },
          at: state.occurredAt,
        });
      }
      this.logger.info({ integrationId, orderId, status: state.status, created }, 'order status applied');
      if (created) return 'created';
      return before?.status === state.status ? 'unchanged' : 'updated';
    });
  }

  private async linkNewOrder(integrationId: string, externalId: string) {
    return this.deps.mappings.withExternalLock(integrationId, externalId, async () => {
      const existing = await this.deps.mappings.findByExternalId(integrationId, externalId);
      if (existing) return { mapping: existing, created: false };
      try {
        const mapping = await this.deps.mappings.link({
          internalEntityId: crypto.randomUUID(),
          entityKind: 'order',
          integrationId,
          externalId,
        });
        return { mapping, created: true };
      } catch (error) {
        // Another process linked the same platform order first.
        if (!(error instanceof MappingConflictError)) throw error;
        const winner = await this.deps.mappings.findByExternalId(integrationId, externalId);
        if (!winner) throw error;
        return { mapping: winner, created: false };
      }
    });
  }
}

const ORDER_EVENTS: readonly InboundEventType[] = [
  'order.created',
  'order.status_changed',
  'order.cancelled',
  'payment.succeeded',
  'payment.refunded',
  'payment.cancelled',
];

export function registerOrderStatusHandlers(
  registry: WebhookHandlerRegistry,
  reconciler: OrderStatusReconciler,
): void {
  for (const type of ORDER_EVENTS) {
    registry.register(type, (event, context) => reconciler.handle(event, context));
  }
}
