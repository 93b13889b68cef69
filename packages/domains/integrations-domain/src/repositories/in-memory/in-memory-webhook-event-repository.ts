import { WebhookEvent, type WebhookEventProps } from '../../entities/webhook-event.js';
import type { WebhookEventRepository } from '../webhook-event-repository.js';

export class InMemoryWebhookEventRepository implements WebhookEventRepository {
  private readonly rows = new Map<string, WebhookEventProps>();

  async insert(event: WebhookEvent): Promise<boolean> {
    for (const row of this.rows.values()) {
      if (row.idempotencyKey === event.idempotencyKey) return false;
    }
    this.rows.set(event.id, event.toProps());
    return true;
  }

  async findById(id: string): Promise<WebhookEvent | null> {
    const row = this.rows.get(id);
    return row ? WebhookEvent.reconstitute(row) : null;
  }

  async findByIdempotencyKey(idempotencyKey: string): Promise<WebhookEvent | null> {
    for (const row of this.rows.values()) {
      if (row.idempotencyKey === idempotencyKey) return WebhookEvent.reconstitute(row);
    }
    return null;
  }

  async update(event: WebhookEvent): Promise<void> {
    this.rows.set(event.id, event.toProps());
  }

  async findUnprocessed(options: { receivedBefore: Date; limit: number }): Promise<WebhookEvent[]> {
    return [...this.rows.values()]
      .filter((row) => row.processedAt === null && row.receivedAt < options.receivedBefore)
      .sort((a, b) => a.receivedAt.getTime() - b.receivedAt.getTime())
      .slice(0, options.limit)
      .map((row) => WebhookEvent.reconstitute(row));
  }
}
