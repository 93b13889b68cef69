import { z } from 'zod';
import { InvariantViolation } from '@marketsync/domain-kernel';
import { InboundEventSchema, type InboundEvent } from '../connectors/types.js';

export const WebhookOutcomeSchema = z.enum(['processed', 'ignored', 'unmapped']);
export type WebhookOutcome = z.infer<typeof WebhookOutcomeSchema>;

export const WebhookEventPropsSchema = z.object({
  id: z.string().uuid(),
  integrationId: z.string().uuid(),
  platformEventId: z.string().min(1),
  idempotencyKey: z.string().min(1),
  eventType: z.string().min(1),
  signatureValid: z.boolean(),
  payload: z.unknown(),
  event: InboundEventSchema.nullable(),
  receivedAt: z.coerce.date(),
  processedAt: z.coerce.date().nullable(),
  outcome: WebhookOutcomeSchema.nullable(),
  attempts: z.number().int().nonnegative(),
  lastError: z.string().nullable(),
});

export type WebhookEventProps = z.infer<typeof WebhookEventPropsSchema>;

export function webhookIdempotencyKey(integrationId: string, platformEventId: string): string {
  return `${integrationId}:${platformEventId}`;
}

export class WebhookEvent {
  private constructor(private props: WebhookEventProps) {}

  /** Only verified deliveries become events. */
  static receive(input: {
    integrationId: string;
    platformEventId: string;
    eventType: string;
    payload: unknown;
    event: InboundEvent | null;
    receivedAt?: Date;
  }): WebhookEvent {
    return new WebhookEvent(
      WebhookEventPropsSchema.parse({
        id: crypto.randomUUID(),
        integrationId: input.integrationId,
        platformEventId: input.platformEventId,
        idempotencyKey: webhookIdempotencyKey(input.integrationId, input.platformEventId),
        eventType: input.eventType,
        signatureValid: true,
        payload: input.payload,
        event: input.event,
        receivedAt: input.receivedAt ?? new Date(),
        processedAt: null,
        outcome: null,
        attempts: 0,
        lastError: null,
      }),
    );
  }

  static reconstitute(props: WebhookEventProps): WebhookEvent {
    return new WebhookEvent(WebhookEventPropsSchema.parse(props));
  }

  get id(): string {
    return this.props.id;
  }
  get integrationId(): string {
    return this.props.integrationId;
  }
  get platformEventId(): string {
    return this.props.platformEventId;
  }
  get idempotencyKey(): string {
    return this.props.idempotencyKey;
  }
  get eventType(): string {
    return this.props.eventType;
  }
  get payload(): unknown {
    return this.props.payload;
  }
  get event(): InboundEvent | null {
    return this.props.event;
  }
  get receivedAt(): Date {
    return this.props.receivedAt;
  }
  get processedAt(): Date | null {
    return this.props.processedAt;
  }
  get outcome(): WebhookOutcome | null {
    return this.props.outcome;
  }
  get attempts(): number {
    return this.props.attempts;
  }
  get lastError(): string | null {
    return this.props.lastError;
  }

  isProcessed(): boolean {
    return this.props.processedAt !== null;
  }

  markProcessed(outcome: WebhookOutcome, at: Date = new Date()): void {
    this.assertOpen();
    this.props.attempts += 1;
    this.props.processedAt = at;
    this.props.outcome = outcome;
    this.props.lastError = null;
  }

  recordFailure(message: string): void {
    this.assertOpen();
    this.props.attempts += 1;
    this.props.lastError = message;
  }

  toProps(): Readonly<WebhookEventProps> {
    return Object.freeze({ ...this.props });
  }

  private assertOpen(): void {
    if (this.props.processedAt) {
      throw new InvariantViolation(`Webhook event ${this.props.idempotencyKey} is already processed`);
    }
  }
}
