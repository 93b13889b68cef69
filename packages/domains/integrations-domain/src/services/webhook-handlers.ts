import type { InboundEvent, InboundEventType } from '../connectors/types.js';
import type { WebhookOutcome } from '../entities/webhook-event.js';

export interface WebhookHandlerContext {
  integrationId: string;
  eventId: string;
}

export type WebhookHandler = (
  event: InboundEvent,
  context: WebhookHandlerContext,
) => Promise<WebhookOutcome>;

/**
 * Handlers keyed by event type, optionally narrowed to one integration.
 * An integration-specific handler wins over the shared one.
 */
export class WebhookHandlerRegistry {
  private readonly handlers = new Map<string, WebhookHandler>();

  register(type: InboundEventType, handler: WebhookHandler, options: { integrationId?: string } = {}): void {
    this.handlers.set(this.key(type, options.integrationId), handler);
  }

  resolve(integrationId: string, type: InboundEventType): WebhookHandler | null {
    return this.handlers.get(this.key(type, integrationId)) ?? this.handlers.get(this.key(type)) ?? null;
  }

  private key(type: InboundEventType, integrationId = '*'): string {
    return `${integrationId}:${type}`;
  }
}
