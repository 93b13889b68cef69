import { Result } from '@marketsync/domain-kernel';
import { z } from 'zod';
import {
  RemoteValidationError,
  type ConnectorError,
} from '../errors/connector-errors.js';
import { StaticKeyAuth } from './auth.js';
import { definePlatform, type ConnectorBuildContext } from './catalog.js';
import {
  rejectWebhook,
  type Connector,
  type ConnectorOperations,
  type ConnectorResult,
  type OperationContext,
  type WebhookVerifier,
} from './connector.js';
import { HttpTransport } from './http-transport.js';
import { constantTimeEqual, headerValue, hmac } from './signing.js';
import type {
  Category,
  ExternalProduct,
  ExternalRef,
  InboundEvent,
  NormalizedOrder,
  NormalizedProduct,
  OrderStatus,
  OrderStatusUpdate,
  Page,
  PageRequest,
  ParsedWebhook,
  PriceUpdate,
  StockUpdate,
  WebhookRejection,
} from './types.js';

const idString = z.union([z.string().min(1), z.number().int()]).transform(String);

export const TrendyolCredentialsSchema = z.object({
  apiKey: z.string().min(1),
  apiSecret: z.string().min(1),
  supplierId: idString,
  webhookSecret: z.string().min(1).optional(),
});
export type TrendyolCredentials = z.infer<typeof TrendyolCredentialsSchema>;

export const TRENDYOL_SIGNATURE_HEADER = 'x-trendyol-signature';
const DEFAULT_PAGE_SIZE = 50;

const BatchResponseSchema = z.object({ batchRequestId: z.string() }).passthrough();

const ProductPageSchema = z.object({
  page: z.number().int(),
  totalPages: z.number().int(),
  content: z.array(
    z.object({
      barcode: z.string(),
      title: z.string(),
      stockCode: z.string().nullish(),
      salePrice: z.number(),
      quantity: z.number(),
    }),
  ),
});

const OrderPageSchema = z.object({
  page: z.number().int(),
  totalPages: z.number().int(),
  content: z.array(
    z.object({
      orderNumber: idString,
      status: z.string(),
      currencyCode: z.string().default('TRY'),
      totalPrice: z.number(),
      orderDate: z.number(),
      lines: z
        .array(z.object({ merchantSku: z.string(), quantity: z.number(), price: z.number() }))
        .default([]),
    }),
  ),
});

interface TrendyolCategory {
  id: number;
  name: string;
  subCategories?: TrendyolCategory[];
}

const CategorySchema: z.ZodType<TrendyolCategory> = z.lazy(() =>
  z.object({
    id: z.number().int(),
    name: z.string(),
    subCategories: z.array(CategorySchema).optional(),
  }),
);

const WebhookPayloadSchema = z.object({
  eventId: idString,
  eventType: z.string().min(1),
  orderNumber: idString,
  status: z.string().optional(),
  timestamp: z.union([z.number(), z.string()]),
});

const INBOUND_STATUS: Record<string, OrderStatus> = {
  Created: 'created',
  Awaiting: 'created',
  Picking: 'processing',
  Invoiced: 'processing',
  Shipped: 'shipped',
  AtCollectionPoint: 'shipped',
  Delivered: 'delivered',
  UnDelivered: 'shipped',
  Cancelled: 'cancelled',
  UnSupplied: 'cancelled',
  Returned: 'returned',
};

const OUTBOUND_STATUS: Partial<Record<OrderStatus, string>> = {
  processing: 'Picking',
  shipped: 'Shipped',
  delivered: 'Delivered',
  cancelled: 'UnSupplied',
};

function toInboundStatus(status: string | undefined): OrderStatus {
  return (status !== undefined ? INBOUND_STATUS[status] : undefined) ?? 'processing';
}

function toItem(product: NormalizedProduct) {
  return {
    barcode: product.barcode ?? product.sku,
    title: product.title,
    productMainId: product.sku,
    stockCode: product.sku,
    brand: product.brand,
    categoryId: product.categoryId,
    description: product.description,
    currencyType: product.currency,
    listPrice: product.listPrice ?? product.price,
    salePrice: product.price,
    vatRate: product.vatRate,
    quantity: product.stock,
    images: product.images.map((url) => ({ url })),
    attributes: Object.entries(product.attributes).map(([attributeId, value]) => ({
      attributeId,
      customAttributeValue: value,
    })),
  };
}

function flattenCategories(nodes: TrendyolCategory[], parent: string | null, out: Category[]): Category[] {
  for (const node of nodes) {
    const externalId = String(node.id);
    out.push({ externalId, name: node.name, parentExternalId: parent });
    flattenCategories(node.subCategories ?? [], externalId, out);
  }
  return out;
}

function unlisted(sku: string): ConnectorError {
  return new RemoteValidationError(`Product ${sku} is not listed on trendyol`, { sku });
}

/** REST+JSON marketplace with HTTP Basic auth scoped to a supplier. */
export class TrendyolConnector implements Connector {
  readonly platformName = 'trendyol' as const;
  readonly auth: StaticKeyAuth<TrendyolCredentials>;
  readonly operations: Partial<ConnectorOperations>;
  readonly webhooks: WebhookVerifier;
  private readonly http: HttpTransport;
  private readonly supplierPath: string;

  constructor(private readonly context: ConnectorBuildContext<TrendyolCredentials>) {
    this.auth = new StaticKeyAuth(context.credentials, (credentials) => ({
      authorization: `Basic ${Buffer.from(`${credentials.apiKey}:${credentials.apiSecret}`).toString('base64')}`,
      'user-agent': `${credentials.supplierId} - SelfIntegration`,
    }));
    this.supplierPath = `/suppliers/${context.credentials.use((credentials) => credentials.supplierId)}`;
    this.http = new HttpTransport({
      baseUrl: context.baseUrl,
      fetch: context.fetch,
      headers: () => this.auth.headers(),
      logger: context.logger,
    });
    this.operations = {
      listProducts: (page, ctx) => this.listProducts(page, ctx),
      upsertProduct: (product, ref, ctx) => this.upsertProduct(product, ref, ctx),
      updateStock: (update, ref, ctx) => this.updateStock(update, ref, ctx),
      updatePrice: (update, ref, ctx) => this.updatePrice(update, ref, ctx),
      listOrders: (page, ctx) => this.listOrders(page, ctx),
      updateOrderStatus: (update, ref, ctx) => this.updateOrderStatus(update, ref, ctx),
      listCategories: (page, ctx) => this.listCategories(page, ctx),
    };
    this.webhooks = { verify: (rawBody, headers) => this.verifyWebhook(rawBody, headers) };
  }

  async testConnection(ctx: OperationContext): ConnectorResult<void> {
    const sent = await this.http.send({
      method: 'GET',
      path: `${this.supplierPath}/products`,
      query: { page: 0, size: 1 },
      signal: ctx.signal,
    });
    return sent.isSuccess ? Result.ok(undefined) : Result.fail(sent.getError());
  }

  private async listProducts(page: PageRequest, ctx: OperationContext): ConnectorResult<Page<ExternalProduct>> {
    const response = await this.http.json(
      {
        method: 'GET',
        path: `${this.supplierPath}/products`,
        query: { page: Number(page.cursor ?? 0), size: page.pageSize ?? DEFAULT_PAGE_SIZE },
        signal: ctx.signal,
      },
      ProductPageSchema,
    );
    return response.map((body) => ({
      items: body.content.map((item) => ({
        externalId: item.barcode,
        sku: item.stockCode ?? item.barcode,
        title: item.title,
        price: item.salePrice,
        stock: item.quantity,
      })),
      nextCursor: body.page + 1 < body.totalPages ? String(body.page + 1) : null,
    }));
  }

  private async upsertProduct(
    product: NormalizedProduct,
    ref: ExternalRef,
    ctx: OperationContext,
  ): ConnectorResult<ExternalRef> {
    const response = await this.http.json(
      {
        method: ref.externalId === null ? 'POST' : 'PUT',
        path: `${this.supplierPath}/v2/products`,
        json: { items: [toItem(product)] },
        signal: ctx.signal,
      },
      BatchResponseSchema,
    );
    return response.map(() => ({ externalId: ref.externalId ?? product.barcode ?? product.sku }));
  }

  private async updateStock(update: StockUpdate, ref: ExternalRef, ctx: OperationContext): ConnectorResult<ExternalRef> {
    if (ref.externalId === null) return Result.fail(unlisted(update.sku));
    return this.priceAndInventory({ barcode: ref.externalId, quantity: update.quantity }, ref, ctx);
  }

  private async updatePrice(update: PriceUpdate, ref: ExternalRef, ctx: OperationContext): ConnectorResult<ExternalRef> {
    if (ref.externalId === null) return Result.fail(unlisted(update.sku));
    return this.priceAndInventory(
      { barcode: ref.externalId, salePrice: update.price, listPrice: update.listPrice ?? update.price },
      ref,
      ctx,
    );
  }

  private async priceAndInventory(
    item: Record<string, string | number>,
    ref: ExternalRef,
    ctx: OperationContext,
  ): ConnectorResult<ExternalRef> {
    const response = await this.http.json(
      {
        method: 'POST',
        path: `${this.supplierPath}/products/price-and-inventory`,
        json: { items: [item] },
        signal: ctx.signal,
      },
      BatchResponseSchema,
    );
    return response.map(() => ref);
  }

  private async listOrders(page: PageRequest, ctx: OperationContext): ConnectorResult<Page<NormalizedOrder>> {
    const response = await this.http.json(
      {
        method: 'GET',
        path: `${this.supplierPath}/orders`,
        query: {
          page: Number(page.cursor ?? 0),
          size: page.pageSize ?? DEFAULT_PAGE_SIZE,
          startDate: page.since?.getTime(),
        },
        signal: ctx.signal,
      },
      OrderPageSchema,
    );
    return response.map((body) => ({
      items: body.content.map((order) => ({
        externalId: order.orderNumber,
        orderNumber: order.orderNumber,
        status: toInboundStatus(order.status),
        currency: order.currencyCode,
        total: order.totalPrice,
        createdAt: new Date(order.orderDate),
        lines: order.lines.map((line) => ({
          sku: line.merchantSku,
          quantity: line.quantity,
          unitPrice: line.price,
        })),
      })),
      nextCursor: body.page + 1 < body.totalPages ? String(body.page + 1) : null,
    }));
  }

  private async updateOrderStatus(
    update: OrderStatusUpdate,
    ref: ExternalRef,
    ctx: OperationContext,
  ): ConnectorResult<ExternalRef> {
    if (ref.externalId === null) {
      return Result.fail(new RemoteValidationError(`Order ${update.id} has no trendyol order number`));
    }
    const status = OUTBOUND_STATUS[update.status];
    if (!status) {
      return Result.fail(
        new RemoteValidationError(`trendyol does not accept order status ${update.status} from sellers`),
      );
    }
    const sent = await this.http.send({
      method: 'PUT',
      path: `${this.supplierPath}/orders/${encodeURIComponent(ref.externalId)}/status`,
      json: { status, trackingNumber: update.trackingNumber },
      signal: ctx.signal,
    });
    return sent.isSuccess ? Result.ok(ref) : Result.fail(sent.getError());
  }

  private async listCategories(_page: PageRequest, ctx: OperationContext): ConnectorResult<Page<Category>> {
    const response = await this.http.json(
      { method: 'GET', path: '/product-categories', signal: ctx.signal },
      z.object({ categories: z.array(CategorySchema) }),
    );
    return response.map((body) => ({
      items: flattenCategories(body.categories, null, []),
      nextCursor: null,
    }));
  }

  private verifyWebhook(
    rawBody: string,
    headers: Record<string, string>,
  ): Result<ParsedWebhook, WebhookRejection> {
    const secret = this.context.credentials.use((credentials) => credentials.webhookSecret);
    if (!secret) {
      return rejectWebhook('not_configured', 'No webhook secret configured');
    }
    const signature = headerValue(headers, TRENDYOL_SIGNATURE_HEADER);
    if (!signature || !constantTimeEqual(signature.toLowerCase(), hmac('sha256', secret, rawBody, 'hex'))) {
      return rejectWebhook('invalid_signature', 'Signature mismatch');
    }

    let json: unknown;
    try {
      json = JSON.parse(rawBody);
    } catch {
      return rejectWebhook('malformed_payload', 'Body is not JSON');
    }
    const parsed = WebhookPayloadSchema.safeParse(json);
    if (!parsed.success) {
      return rejectWebhook('malformed_payload', parsed.error.issues[0]?.message ?? 'Invalid payload');
    }

    const payload = parsed.data;
    const occurredAt = new Date(payload.timestamp);
    let event: InboundEvent | null = null;
    switch (payload.eventType) {
      case 'OrderCreated':
        event = { type: 'order.created', externalId: payload.orderNumber, status: 'created', occurredAt };
        break;
      case 'OrderStatusChanged':
        event = {
          type: 'order.status_changed',
          externalId: payload.orderNumber,
          status: toInboundStatus(payload.status),
          occurredAt,
        };
        break;
      case 'OrderCancelled':
        event = { type: 'order.cancelled', externalId: payload.orderNumber, status: 'cancelled', occurredAt };
        break;
    }
    return Result.ok({
      platformEventId: payload.eventId,
      eventType: payload.eventType,
      payload: json,
      event,
    });
  }
}

export const trendyolPlatform = definePlatform({
  platformName: 'trendyol',
  category: 'marketplace',
  credentialsSchema: TrendyolCredentialsSchema,
  defaults: { rateLimitPerSecond: 10, requestTimeoutMs: 30_000 },
  baseUrls: {
    production: 'https://api.trendyol.com/sapigw',
    sandbox: 'https://stageapi.trendyol.com/stagesapigw',
  },
  build: (context) => new TrendyolConnector(context),
});
