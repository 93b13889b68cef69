import type { WebhookEvent } from '../entities/webhook-event.js';

export interface WebhookEventRepository {
  /** Returns false when an event with the same idempotency key already exists. */
  insert(event: WebhookEvent): Promise<boolean>;
  findById(id: string): Promise<WebhookEvent | null>;
  findByIdempotencyKey(idempotencyKey: string): Promise<WebhookEvent | null>;
  update(event: WebhookEvent): Promise<void>;
  findUnprocessed(options: { receivedBefore: Date; limit: number }): Promise<WebhookEvent[]>;
}
