import { Result } from '@marketsync/domain-kernel';
import Stripe from 'stripe';
import { z } from 'zod';
import {
  AuthError,
  RateLimitedError,
  RemoteValidationError,
  TransientNetworkError,
  type ConnectorError,
} from '../errors/connector-errors.js';
import { StaticKeyAuth } from './auth.js';
import { definePlatform, type ConnectorBuildContext } from './catalog.js';
import {
  rejectWebhook,
  type Connector,
  type ConnectorOperations,
  type ConnectorResult,
  type WebhookVerifier,
} from './connector.js';
import { headerValue } from './signing.js';
import type {
  CancelOrderRequest,
  ExternalRef,
  InboundEvent,
  ParsedWebhook,
  PaymentRef,
  RefundRequest,
  WebhookRejection,
} from './types.js';

export const StripeCredentialsSchema = z.object({
  secretKey: z.string().min(1),
  webhookSecret: z.string().min(1),
});
export type StripeCredentials = z.infer<typeof StripeCredentialsSchema>;

export const STRIPE_SIGNATURE_HEADER = 'stripe-signature';

/** Maps SDK exceptions onto the connector taxonomy; anything else is rethrown. */
export function mapStripeError(error: unknown): ConnectorError {
  if (!(error instanceof Stripe.errors.StripeError)) throw error;
  if (
    error instanceof Stripe.errors.StripeAuthenticationError ||
    error instanceof Stripe.errors.StripePermissionError
  ) {
    return new AuthError(error.message, { requestId: error.requestId });
  }
  if (error instanceof Stripe.errors.StripeRateLimitError) {
    const retryAfter = Number(error.headers?.['retry-after']);
    return new RateLimitedError(error.message, {
      retryAfterMs: Number.isFinite(retryAfter) ? retryAfter * 1000 : null,
      source: 'remote',
    });
  }
  if (error instanceof Stripe.errors.StripeConnectionError || (error.statusCode ?? 0) >= 500) {
    return new TransientNetworkError(error.message, error);
  }
  return new RemoteValidationError(error.message, {
    type: error.type,
    code: error.code ?? null,
    requestId: error.requestId,
  });
}

function paymentIntentId(value: string | Stripe.PaymentIntent | null): string | null {
  if (value === null) return null;
  return typeof value === 'string' ? value : value.id;
}

function normalize(event: Stripe.Event): InboundEvent | null {
  const occurredAt = new Date(event.created * 1000);
  switch (event.type) {
    case 'payment_intent.succeeded':
      return { type: 'payment.succeeded', externalId: event.data.object.id, status: 'paid', occurredAt };
    case 'payment_intent.canceled':
      return { type: 'payment.cancelled', externalId: event.data.object.id, status: 'cancelled', occurredAt };
    case 'charge.refunded': {
      const externalId = paymentIntentId(event.data.object.payment_intent);
      if (!externalId) return null;
      return {
        type: 'payment.refunded',
        externalId,
        status: event.data.object.refunded ? 'refunded' : 'paid',
        occurredAt,
      };
    }
    default:
      return null;
  }
}

/** Payment platform reached through the official SDK. */
export class StripeConnector implements Connector {
  readonly platformName = 'stripe' as const;
  readonly auth: StaticKeyAuth<StripeCredentials>;
  readonly operations: Partial<ConnectorOperations>;
  readonly webhooks: WebhookVerifier;
  private readonly stripe: Stripe;

  constructor(private readonly context: ConnectorBuildContext<StripeCredentials>) {
    this.auth = new StaticKeyAuth(context.credentials, (credentials) => ({
      authorization: `Bearer ${credentials.secretKey}`,
    }));
    const endpoint = context.settings.baseUrl ? new URL(context.settings.baseUrl) : null;
    this.stripe = this.auth.secret(
      (credentials) =>
        new Stripe(credentials.secretKey, {
          // Retries belong to the resilience layer.
          maxNetworkRetries: 0,
          timeout: context.settings.requestTimeoutMs,
          httpClient: Stripe.createFetchHttpClient(context.fetch),
          ...(endpoint
            ? {
                host: endpoint.hostname,
                port: endpoint.port ? Number(endpoint.port) : undefined,
                protocol: endpoint.protocol === 'http:' ? 'http' : 'https',
              }
            : {}),
        }),
    );
    this.operations = {
      refund: (request, ref) => this.refund(request, ref),
      cancelOrder: (request, ref) => this.cancelOrder(request, ref),
    };
    this.webhooks = { verify: (rawBody, headers) => this.verifyWebhook(rawBody, headers) };
  }

  async testConnection(): ConnectorResult<void> {
    try {
      await this.stripe.balance.retrieve();
      return Result.ok(undefined);
    } catch (error) {
      return Result.fail(mapStripeError(error));
    }
  }

  private async refund(request: RefundRequest, ref: ExternalRef): ConnectorResult<PaymentRef> {
    if (ref.externalId === null) {
      return Result.fail(new RemoteValidationError(`Order ${request.id} has no stripe payment`));
    }
    try {
      const refund = await this.stripe.refunds.create(
        {
          payment_intent: ref.externalId,
          amount: request.amount,
          reason: 'requested_by_customer',
          metadata: { orderId: request.id, note: request.reason ?? '' },
        },
        { idempotencyKey: `refund:${request.id}:${request.amount ?? 'full'}` },
      );
      return Result.ok({ externalId: refund.id, status: refund.status ?? 'pending' });
    } catch (error) {
      return Result.fail(mapStripeError(error));
    }
  }

  private async cancelOrder(request: CancelOrderRequest, ref: ExternalRef): ConnectorResult<PaymentRef> {
    if (ref.externalId === null) {
      return Result.fail(new RemoteValidationError(`Order ${request.id} has no stripe payment`));
    }
    try {
      const intent = await this.stripe.paymentIntents.cancel(
        ref.externalId,
        { cancellation_reason: 'requested_by_customer' },
        { idempotencyKey: `cancel:${request.id}` },
      );
      return Result.ok({ externalId: intent.id, status: intent.status });
    } catch (error) {
      return Result.fail(mapStripeError(error));
    }
  }

  private verifyWebhook(
    rawBody: string,
    headers: Record<string, string>,
  ): Result<ParsedWebhook, WebhookRejection> {
    const signature = headerValue(headers, STRIPE_SIGNATURE_HEADER);
    if (!signature) return rejectWebhook('invalid_signature', 'Missing Stripe-Signature header');

    let event: Stripe.Event;
    try {
      event = this.context.credentials.use((credentials) =>
        this.stripe.webhooks.constructEvent(rawBody, signature, credentials.webhookSecret),
      );
    } catch (error) {
      if (error instanceof Stripe.errors.StripeSignatureVerificationError) {
        return rejectWebhook('invalid_signature', 'Signature mismatch');
      }
      return rejectWebhook('malformed_payload', error instanceof Error ? error.message : 'Invalid payload');
    }

    return Result.ok({
      platformEventId: event.id,
      eventType: event.type,
      payload: event,
      event: normalize(event),
    });
  }
}

export const stripePlatform = definePlatform({
  platformName: 'stripe',
  category: 'payment',
  credentialsSchema: StripeCredentialsSchema,
  defaults: { rateLimitPerSecond: 25, requestTimeoutMs: 20_000 },
  baseUrls: { production: 'https://api.stripe.com', sandbox: 'https://api.stripe.com' },
  build: (context) => new StripeConnector(context),
});
