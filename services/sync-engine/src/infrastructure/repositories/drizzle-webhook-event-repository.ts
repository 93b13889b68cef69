import {
  WebhookEvent,
  WebhookEventPropsSchema,
  type WebhookEventRepository,
} from '@marketsync/integrations-domain';
import { webhookEvents } from '@marketsync/integrations-domain/drizzle';
import type { Database } from '@marketsync/process-lib';
import { and, asc, eq, isNull, lt } from 'drizzle-orm';

type WebhookEventRow = typeof webhookEvents.$inferSelect;

function toWebhookEvent(row: WebhookEventRow): WebhookEvent {
  return WebhookEvent.reconstitute(WebhookEventPropsSchema.parse(row));
}

export class DrizzleWebhookEventRepository implements WebhookEventRepository {
  constructor(private readonly db: Database) {}

  async insert(event: WebhookEvent): Promise<boolean> {
    const props = event.toProps();
    const inserted = await this.db
      .insert(webhookEvents)
      .values({ ...props, payload: props.payload ?? null })
      .onConflictDoNothing({ target: webhookEvents.idempotencyKey })
      .returning({ id: webhookEvents.id });
    return inserted.length > 0;
  }

  async findById(id: string): Promise<WebhookEvent | null> {
    const [row] = await this.db.select().from(webhookEvents).where(eq(webhookEvents.id, id));
    return row ? toWebhookEvent(row) : null;
  }

  async findByIdempotencyKey(idempotencyKey: string): Promise<WebhookEvent | null> {
    const [row] = await this.db
      .select()
      .from(webhookEvents)
      .where(eq(webhookEvents.idempotencyKey, idempotencyKey));
    return row ? toWebhookEvent(row) : null;
  }

  async update(event: WebhookEvent): Promise<void> {
    const props = event.toProps();
    await this.db
      .update(webhookEvents)
      .set({
        processedAt: props.processedAt,
        outcome: props.outcome,
        attempts: props.attempts,
        lastError: props.lastError,
      })
      .where(eq(webhookEvents.id, props.id));
  }

  async findUnprocessed(options: { receivedBefore: Date; limit: number }): Promise<WebhookEvent[]> {
    const rows = await this.db
      .select()
      .from(webhookEvents)
      .where(and(isNull(webhookEvents.processedAt), lt(webhookEvents.receivedAt, options.receivedBefore)))
      .orderBy(asc(webhookEvents.receivedAt))
      .limit(options.limit);
    return rows.map(toWebhookEvent);
  }
}
