import { z } from 'zod';

// Normalized shapes exchanged with connectors. Nothing outside a connector
// sees a platform payload.

export const OrderStatusSchema = z.enum([
  'created',
  'paid',
  'processing',
  'shipped',
  'delivered',
  'cancelled',
  'refunded',
  'returned',
]);
export type OrderStatus = z.infer<typeof OrderStatusSchema>;

export const NormalizedProductSchema = z.object({
  id: z.string().min(1),
  sku: z.string().min(1),
  title: z.string().min(1),
  description: z.string().default(''),
  barcode: z.string().optional(),
  brand: z.string().optional(),
  categoryId: z.string().optional(),
  price: z.number().nonnegative(),
  listPrice: z.number().nonnegative().optional(),
  currency: z.string().length(3).default('TRY'),
  stock: z.number().int().nonnegative(),
  vatRate: z.number().nonnegative().default(20),
  images: z.array(z.string().url()).default([]),
  attributes: z.record(z.string(), z.string()).default({}),
});
export type NormalizedProduct = z.infer<typeof NormalizedProductSchema>;

export interface StockUpdate {
  id: string;
  sku: string;
  quantity: number;
}

export interface PriceUpdate {
  id: string;
  sku: string;
  price: number;
  listPrice?: number;
  currency: string;
}

export interface OrderStatusUpdate {
  /** Internal order id. */
  id: string;
  status: OrderStatus;
  trackingNumber?: string;
  carrier?: string;
}

export interface OrderLine {
  sku: string;
  quantity: number;
  unitPrice: number;
}

export interface NormalizedOrder {
  externalId: string;
  orderNumber: string;
  status: OrderStatus;
  currency: string;
  total: number;
  lines: OrderLine[];
  createdAt: Date;
}

export interface ExternalProduct {
  externalId: string;
  sku: string;
  title: string;
  price: number;
  stock: number;
}

export interface Category {
  externalId: string;
  name: string;
  parentExternalId: string | null;
}

/** Outcome of a write. `externalId` is null when the platform acknowledges without an id. */
export interface ExternalRef {
  externalId: string | null;
}

export interface PageRequest {
  cursor?: string | null;
  pageSize?: number;
  since?: Date;
}

export interface Page<T> {
  items: T[];
  nextCursor: string | null;
}

export interface RefundRequest {
  /** Internal order id the payment belongs to. */
  id: string;
  amount?: number;
  reason?: string;
}

export interface CancelOrderRequest {
  id: string;
  reason?: string;
}

export interface PaymentRef {
  externalId: string;
  status: string;
}

export const InboundEventTypeSchema = z.enum([
  'order.created',
  'order.status_changed',
  'order.cancelled',
  'payment.succeeded',
  'payment.refunded',
  'payment.cancelled',
]);
export type InboundEventType = z.infer<typeof InboundEventTypeSchema>;

export const InboundEventSchema = z.object({
  type: InboundEventTypeSchema,
  /** External order or payment id the event is about. */
  externalId: z.string().min(1),
  status: OrderStatusSchema,
  occurredAt: z.coerce.date(),
});
export type InboundEvent = z.infer<typeof InboundEventSchema>;

/** A verified webhook delivery. `event` is null for types the core does not handle. */
export interface ParsedWebhook {
  platformEventId: string;
  eventType: string;
  payload: unknown;
  event: InboundEvent | null;
}

export type WebhookRejectionReason = 'invalid_signature' | 'malformed_payload' | 'not_configured';

export interface WebhookRejection {
  reason: WebhookRejectionReason;
  message: string;
}
