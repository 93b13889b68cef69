import { Result } from '@marketsync/domain-kernel';
import { z } from 'zod';
import { RemoteValidationError } from '../errors/connector-errors.js';
import { OAuth2RefreshAuth, type OAuth2Tokens } from './auth.js';
import { definePlatform, type ConnectorBuildContext } from './catalog.js';
import type {
  Connector,
  ConnectorOperations,
  ConnectorResult,
  OperationContext,
} from './connector.js';
import { HttpTransport } from './http-transport.js';
import type {
  ExternalProduct,
  ExternalRef,
  NormalizedOrder,
  NormalizedProduct,
  OrderStatus,
  OrderStatusUpdate,
  Page,
  PageRequest,
  PriceUpdate,
  StockUpdate,
} from './types.js';

const idString = z.union([z.string().min(1), z.number().int()]).transform(String);

export const EtsyCredentialsSchema = z.object({
  clientId: z.string().min(1),
  clientSecret: z.string().min(1).optional(),
  accessToken: z.string().min(1),
  refreshToken: z.string().min(1),
  expiresAt: z.coerce.date().optional(),
  shopId: idString,
});
export type EtsyCredentials = z.infer<typeof EtsyCredentialsSchema>;

export const ETSY_TOKEN_URL = 'https://api.etsy.com/v3/public/oauth/token';
const DEFAULT_PAGE_SIZE = 25;

const MoneySchema = z.object({
  amount: z.number(),
  divisor: z.number().positive(),
  currency_code: z.string().default('USD'),
});

const money = (value: z.infer<typeof MoneySchema>) => value.amount / value.divisor;

const TokenResponseSchema = z.object({
  access_token: z.string(),
  refresh_token: z.string(),
  expires_in: z.number(),
});

const ListingSchema = z.object({
  listing_id: idString,
  title: z.string(),
  quantity: z.number(),
  price: MoneySchema,
  skus: z.array(z.string()).default([]),
});

const ListingPageSchema = z.object({ count: z.number(), results: z.array(ListingSchema) });

const ReceiptPageSchema = z.object({
  count: z.number(),
  results: z.array(
    z.object({
      receipt_id: idString,
      status: z.string(),
      grandtotal: MoneySchema,
      create_timestamp: z.number(),
      transactions: z
        .array(z.object({ sku: z.string().nullable(), quantity: z.number(), price: MoneySchema }))
        .default([]),
    }),
  ),
});

const RECEIPT_STATUS: Record<string, OrderStatus> = {
  open: 'created',
  'payment processing': 'created',
  paid: 'paid',
  completed: 'delivered',
  canceled: 'cancelled',
  'fully refunded': 'refunded',
  'partially refunded': 'paid',
};

const offsetOf = (page: PageRequest) => Number(page.cursor ?? 0);

function nextOffset(page: PageRequest, count: number): string | null {
  const next = offsetOf(page) + (page.pageSize ?? DEFAULT_PAGE_SIZE);
  return next < count ? String(next) : null;
}

/** REST+JSON marketplace behind OAuth2 with refresh tokens. */
export class EtsyConnector implements Connector {
  readonly platformName = 'etsy' as const;
  readonly auth: OAuth2RefreshAuth;
  readonly operations: Partial<ConnectorOperations>;
  private readonly http: HttpTransport;
  private readonly shopPath: string;

  constructor(context: ConnectorBuildContext<EtsyCredentials>) {
    const clientId = context.credentials.use((credentials) => credentials.clientId);
    const tokenHttp = new HttpTransport({ baseUrl: ETSY_TOKEN_URL, fetch: context.fetch, logger: context.logger });

    this.auth = new OAuth2RefreshAuth({
      tokens: context.credentials.use((credentials) => ({
        accessToken: credentials.accessToken,
        refreshToken: credentials.refreshToken,
        expiresAt: credentials.expiresAt ?? null,
      })),
      refresher: async (refreshToken) => {
        const response = await tokenHttp.json(
          {
            method: 'POST',
            path: '',
            headers: { 'content-type': 'application/x-www-form-urlencoded' },
            body: new URLSearchParams({
              grant_type: 'refresh_token',
              client_id: clientId,
              refresh_token: refreshToken,
            }).toString(),
            signal: AbortSignal.timeout(context.settings.requestTimeoutMs),
          },
          TokenResponseSchema,
        );
        return response.map(
          (body): OAuth2Tokens => ({
            accessToken: body.access_token,
            refreshToken: body.refresh_token,
            expiresAt: new Date(Date.now() + body.expires_in * 1000),
          }),
        );
      },
      onRotated: async (tokens) => {
        context.logger.info({ integrationId: context.integrationId }, 'etsy tokens rotated');
        await context.rotateCredentials?.({
          accessToken: tokens.accessToken,
          refreshToken: tokens.refreshToken,
          expiresAt: tokens.expiresAt?.toISOString(),
        });
      },
    });

    this.shopPath = `/shops/${context.credentials.use((credentials) => credentials.shopId)}`;
    this.http = new HttpTransport({
      baseUrl: context.baseUrl,
      fetch: context.fetch,
      headers: () => ({ authorization: this.auth.bearer(), 'x-api-key': clientId }),
      logger: context.logger,
    });
    this.operations = {
      listProducts: (page, ctx) => this.listProducts(page, ctx),
      upsertProduct: (product, ref, ctx) => this.upsertProduct(product, ref, ctx),
      updateStock: (update, ref, ctx) => this.updateStock(update, ref, ctx),
      updatePrice: (update, ref, ctx) => this.updatePrice(update, ref, ctx),
      listOrders: (page, ctx) => this.listOrders(page, ctx),
      updateOrderStatus: (update, ref, ctx) => this.updateOrderStatus(update, ref, ctx),
    };
  }

  async testConnection(ctx: OperationContext): ConnectorResult<void> {
    const sent = await this.http.send({ method: 'GET', path: this.shopPath, signal: ctx.signal });
    return sent.isSuccess ? Result.ok(undefined) : Result.fail(sent.getError());
  }

  private async listProducts(page: PageRequest, ctx: OperationContext): ConnectorResult<Page<ExternalProduct>> {
    const response = await this.http.json(
      {
        method: 'GET',
        path: `${this.shopPath}/listings`,
        query: { limit: page.pageSize ?? DEFAULT_PAGE_SIZE, offset: offsetOf(page) },
        signal: ctx.signal,
      },
      ListingPageSchema,
    );
    return response.map((body) => ({
      items: body.results.map((listing) => ({
        externalId: listing.listing_id,
        sku: listing.skus[0] ?? listing.listing_id,
        title: listing.title,
        price: money(listing.price),
        stock: listing.quantity,
      })),
      nextCursor: nextOffset(page, body.count),
    }));
  }

  private async upsertProduct(
    product: NormalizedProduct,
    ref: ExternalRef,
    ctx: OperationContext,
  ): ConnectorResult<ExternalRef> {
    const fields = {
      title: product.title,
      description: product.description,
      price: product.price,
      quantity: product.stock,
      taxonomy_id: product.categoryId ? Number(product.categoryId) : undefined,
    };
    const response = await this.http.json(
      ref.externalId === null
        ? {
            method: 'POST',
            path: `${this.shopPath}/listings`,
            json: { ...fields, who_made: 'i_did', when_made: 'made_to_order', is_supply: false },
            signal: ctx.signal,
          }
        : {
            method: 'PATCH',
            path: `${this.shopPath}/listings/${encodeURIComponent(ref.externalId)}`,
            json: fields,
            signal: ctx.signal,
          },
      z.object({ listing_id: idString }),
    );
    return response.map((body) => ({ externalId: ref.externalId ?? body.listing_id }));
  }

  private async updateStock(update: StockUpdate, ref: ExternalRef, ctx: OperationContext): ConnectorResult<ExternalRef> {
    if (ref.externalId === null) return Result.fail(this.unlisted(update.sku));
    const sent = await this.http.send({
      method: 'PUT',
      path: `/listings/${encodeURIComponent(ref.externalId)}/inventory`,
      json: { products: [{ sku: update.sku, offerings: [{ quantity: update.quantity, is_enabled: true }] }] },
      signal: ctx.signal,
    });
    return sent.isSuccess ? Result.ok(ref) : Result.fail(sent.getError());
  }

  private async updatePrice(update: PriceUpdate, ref: ExternalRef, ctx: OperationContext): ConnectorResult<ExternalRef> {
    if (ref.externalId === null) return Result.fail(this.unlisted(update.sku));
    const sent = await this.http.send({
      method: 'PATCH',
      path: `${this.shopPath}/listings/${encodeURIComponent(ref.externalId)}`,
      json: { price: update.price },
      signal: ctx.signal,
    });
    return sent.isSuccess ? Result.ok(ref) : Result.fail(sent.getError());
  }

  private async listOrders(page: PageRequest, ctx: OperationContext): ConnectorResult<Page<NormalizedOrder>> {
    const response = await this.http.json(
      {
        method: 'GET',
        path: `${this.shopPath}/receipts`,
        query: {
          limit: page.pageSize ?? DEFAULT_PAGE_SIZE,
          offset: offsetOf(page),
          min_created: page.since ? Math.floor(page.since.getTime() / 1000) : undefined,
        },
        signal: ctx.signal,
      },
      ReceiptPageSchema,
    );
    return response.map((body) => ({
      items: body.results.map((receipt) => ({
        externalId: receipt.receipt_id,
        orderNumber: receipt.receipt_id,
        status: RECEIPT_STATUS[receipt.status.toLowerCase()] ?? 'processing',
        currency: receipt.grandtotal.currency_code,
        total: money(receipt.grandtotal),
        createdAt: new Date(receipt.create_timestamp * 1000),
        lines: receipt.transactions.map((transaction) => ({
          sku: transaction.sku ?? '',
          quantity: transaction.quantity,
          unitPrice: money(transaction.price),
        })),
      })),
      nextCursor: nextOffset(page, body.count),
    }));
  }

  private async updateOrderStatus(
    update: OrderStatusUpdate,
    ref: ExternalRef,
    ctx: OperationContext,
  ): ConnectorResult<ExternalRef> {
    if (ref.externalId === null) {
      return Result.fail(new RemoteValidationError(`Order ${update.id} has no etsy receipt`));
    }
    if (update.status !== 'shipped') {
      return Result.fail(
        new RemoteValidationError(`etsy only accepts shipment updates, got ${update.status}`),
      );
    }
    const sent = await this.http.send({
      method: 'POST',
      path: `${this.shopPath}/receipts/${encodeURIComponent(ref.externalId)}/tracking`,
      json: { tracking_code: update.trackingNumber, carrier_name: update.carrier },
      signal: ctx.signal,
    });
    return sent.isSuccess ? Result.ok(ref) : Result.fail(sent.getError());
  }

  private unlisted(sku: string): RemoteValidationError {
    return new RemoteValidationError(`Product ${sku} is not listed on etsy`, { sku });
  }
}

export const etsyPlatform = definePlatform({
  platformName: 'etsy',
  category: 'marketplace',
  credentialsSchema: EtsyCredentialsSchema,
  defaults: { rateLimitPerSecond: 5, rateLimitBurst: 10 },
  baseUrls: {
    production: 'https://openapi.etsy.com/v3/application',
    sandbox: 'https://openapi.etsy.com/v3/application',
  },
  build: (context) => new EtsyConnector(context),
});
