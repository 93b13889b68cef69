import { Result } from '@marketsync/domain-kernel';
import type { PlatformName } from '../entities/integration.js';
import type { ConnectorError } from '../errors/connector-errors.js';
import type { ConnectorAuth } from './auth.js';
import type {
  CancelOrderRequest,
  Category,
  ExternalProduct,
  ExternalRef,
  NormalizedOrder,
  NormalizedProduct,
  OrderStatusUpdate,
  Page,
  PageRequest,
  ParsedWebhook,
  PaymentRef,
  PriceUpdate,
  RefundRequest,
  StockUpdate,
  WebhookRejection,
  WebhookRejectionReason,
} from './types.js';

export interface OperationContext {
  signal: AbortSignal;
}

export type ConnectorResult<T> = Promise<Result<T, ConnectorError>>;

/**
 * The full capability set. A connector implements the subset its platform
 * supports; writes receive the current mapping's external reference.
 */
export interface ConnectorOperations {
  listProducts(page: PageRequest, ctx: OperationContext): ConnectorResult<Page<ExternalProduct>>;
  upsertProduct(product: NormalizedProduct, ref: ExternalRef, ctx: OperationContext): ConnectorResult<ExternalRef>;
  updateStock(update: StockUpdate, ref: ExternalRef, ctx: OperationContext): ConnectorResult<ExternalRef>;
  updatePrice(update: PriceUpdate, ref: ExternalRef, ctx: OperationContext): ConnectorResult<ExternalRef>;
  listOrders(page: PageRequest, ctx: OperationContext): ConnectorResult<Page<NormalizedOrder>>;
  updateOrderStatus(update: OrderStatusUpdate, ref: ExternalRef, ctx: OperationContext): ConnectorResult<ExternalRef>;
  cancelOrder(request: CancelOrderRequest, ref: ExternalRef, ctx: OperationContext): ConnectorResult<PaymentRef>;
  refund(request: RefundRequest, ref: ExternalRef, ctx: OperationContext): ConnectorResult<PaymentRef>;
  listCategories(page: PageRequest, ctx: OperationContext): ConnectorResult<Page<Category>>;
}

export type Capability = keyof ConnectorOperations;

export const CAPABILITIES: readonly Capability[] = [
  'listProducts',
  'upsertProduct',
  'updateStock',
  'updatePrice',
  'listOrders',
  'updateOrderStatus',
  'cancelOrder',
  'refund',
  'listCategories',
];

export interface WebhookVerifier {
  /** Verifies authenticity against the raw body, then normalizes the event. */
  verify(rawBody: string, headers: Record<string, string>): Result<ParsedWebhook, WebhookRejection>;
}

export interface Connector {
  readonly platformName: PlatformName;
  readonly auth: ConnectorAuth;
  readonly operations: Partial<ConnectorOperations>;
  readonly webhooks?: WebhookVerifier;
  testConnection(ctx: OperationContext): ConnectorResult<void>;
}

export function supports(connector: Connector, capability: Capability): boolean {
  return connector.operations[capability] !== undefined;
}

export function capabilitiesOf(connector: Connector): Capability[] {
  return CAPABILITIES.filter((capability) => supports(connector, capability));
}

export function rejectWebhook(
  reason: WebhookRejectionReason,
  message: string,
): Result<ParsedWebhook, WebhookRejection> {
  return Result.fail({ reason, message });
}
