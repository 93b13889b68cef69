import { Result } from '@marketsync/domain-kernel';
import { XMLBuilder, XMLParser, XMLValidator } from 'fast-xml-parser';
import { z } from 'zod';
import {
  RemoteValidationError,
  type ConnectorError,
} from '../errors/connector-errors.js';
import { SignedRequestAuth } from './auth.js';
import { definePlatform, type ConnectorBuildContext } from './catalog.js';
import type {
  Connector,
  ConnectorOperations,
  ConnectorResult,
  OperationContext,
} from './connector.js';
import { HttpTransport } from './http-transport.js';
import { hmac } from './signing.js';
import type {
  Category,
  ExternalProduct,
  ExternalRef,
  NormalizedOrder,
  NormalizedProduct,
  OrderStatus,
  Page,
  PageRequest,
  StockUpdate,
} from './types.js';

export const N11CredentialsSchema = z.object({
  apiKey: z.string().min(1),
  apiSecret: z.string().min(1),
});
export type N11Credentials = z.infer<typeof N11CredentialsSchema>;

const idString = z.union([z.string().min(1), z.number()]).transform(String);
const DEFAULT_PAGE_SIZE = 50;

// Elements that repeat; the parser returns them as arrays even when single.
const REPEATED = new Set(['product', 'order', 'item', 'category', 'image']);

const parser = new XMLParser({
  ignoreAttributes: true,
  parseTagValue: true,
  isArray: (name) => REPEATED.has(name),
});

const builder = new XMLBuilder({ ignoreAttributes: true, suppressEmptyNode: true });

const ResultSchema = z.object({
  status: z.string(),
  errorCode: z.union([z.string(), z.number()]).optional(),
  errorMessage: z.string().optional(),
});

const PagingSchema = z.object({ currentPage: z.number().int(), pageCount: z.number().int() });

const ProductListSchema = z.object({
  products: z
    .object({
      product: z
        .array(
          z.object({
            id: idString,
            productSellerCode: idString,
            title: z.string(),
            price: z.number(),
            quantity: z.number().default(0),
          }),
        )
        .default([]),
    })
    .default({}),
  pagingData: PagingSchema,
});

const SaveProductSchema = z.object({ product: z.object({ id: idString }) });

const OrderListSchema = z.object({
  orderList: z
    .object({
      order: z
        .array(
          z.object({
            id: idString,
            orderNumber: idString,
            status: idString,
            createDate: z.string(),
            totalAmount: z.number(),
            itemList: z
              .object({
                item: z
                  .array(z.object({ productSellerCode: idString, quantity: z.number(), price: z.number() }))
                  .default([]),
              })
              .default({}),
          }),
        )
        .default([]),
    })
    .default({}),
  pagingData: PagingSchema,
});

const CategoryListSchema = z.object({
  categoryList: z
    .object({ category: z.array(z.object({ id: idString, name: z.string() })).default([]) })
    .default({}),
});

const ORDER_STATUS: Record<string, OrderStatus> = {
  '1': 'created',
  '2': 'processing',
  '3': 'cancelled',
  '4': 'cancelled',
  '5': 'processing',
  '6': 'shipped',
  '7': 'delivered',
  '10': 'returned',
};

/** Parses a response envelope; `failure` results become remote validation errors. */
export function parseN11Response<T>(
  xml: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
): Result<T, ConnectorError> {
  if (XMLValidator.validate(xml) !== true) {
    return Result.fail(new RemoteValidationError('n11 returned malformed XML'));
  }
  const document: unknown = parser.parse(xml);
  const envelope = z
    .object({ response: z.object({ result: ResultSchema }).passthrough() })
    .safeParse(document);
  if (!envelope.success) {
    return Result.fail(new RemoteValidationError('n11 response has no result element'));
  }
  const { result } = envelope.data.response;
  if (result.status !== 'success') {
    return Result.fail(
      new RemoteValidationError(result.errorMessage || 'n11 rejected the request', {
        errorCode: result.errorCode ?? null,
      }),
    );
  }
  const body = schema.safeParse(envelope.data.response);
  if (!body.success) {
    return Result.fail(
      new RemoteValidationError('n11 response did not match the expected shape', {
        issues: body.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      }),
    );
  }
  return Result.ok(body.data);
}

/** XML marketplace; every request carries an HMAC-SHA1 signature of its payload. */
export class N11Connector implements Connector {
  readonly platformName = 'n11' as const;
  readonly auth: SignedRequestAuth<N11Credentials>;
  readonly operations: Partial<ConnectorOperations>;
  private readonly http: HttpTransport;

  constructor(context: ConnectorBuildContext<N11Credentials>) {
    this.auth = new SignedRequestAuth(context.credentials, (credentials, payload) => ({
      appKey: credentials.apiKey,
      signature: hmac('sha1', credentials.apiSecret, credentials.apiKey + payload, 'base64'),
    }));
    this.http = new HttpTransport({
      baseUrl: context.baseUrl,
      fetch: context.fetch,
      logger: context.logger,
    });
    this.operations = {
      listProducts: (page, ctx) => this.listProducts(page, ctx),
      upsertProduct: (product, ref, ctx) => this.upsertProduct(product, ref, ctx),
      updateStock: (update, ref, ctx) => this.updateStock(update, ref, ctx),
      listOrders: (page, ctx) => this.listOrders(page, ctx),
      listCategories: (page, ctx) => this.listCategories(page, ctx),
    };
  }

  async testConnection(ctx: OperationContext): ConnectorResult<void> {
    const response = await this.call('CategoryService', 'GetTopLevelCategories', {}, CategoryListSchema, ctx);
    return response.map(() => undefined);
  }

  private async call<T>(
    service: string,
    operation: string,
    payload: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    ctx: OperationContext,
  ): Promise<Result<T, ConnectorError>> {
    const auth = this.auth.sign(builder.build(payload));
    const sent = await this.http.send({
      method: 'POST',
      path: `/${service}/${operation}`,
      headers: { 'content-type': 'application/xml', accept: 'application/xml' },
      body: builder.build({ request: { auth, ...payload } }),
      signal: ctx.signal,
    });
    if (sent.isFailure) return Result.fail(sent.getError());
    return parseN11Response(sent.getValue().text, schema);
  }

  private async listProducts(page: PageRequest, ctx: OperationContext): ConnectorResult<Page<ExternalProduct>> {
    const currentPage = Number(page.cursor ?? 0);
    const response = await this.call(
      'ProductService',
      'GetProductList',
      { pagingData: { currentPage, pageSize: page.pageSize ?? DEFAULT_PAGE_SIZE } },
      ProductListSchema,
      ctx,
    );
    return response.map((body) => ({
      items: body.products.product.map((product) => ({
        externalId: product.id,
        sku: product.productSellerCode,
        title: product.title,
        price: product.price,
        stock: product.quantity,
      })),
      nextCursor:
        body.pagingData.currentPage + 1 < body.pagingData.pageCount
          ? String(body.pagingData.currentPage + 1)
          : null,
    }));
  }

  private async upsertProduct(
    product: NormalizedProduct,
    ref: ExternalRef,
    ctx: OperationContext,
  ): ConnectorResult<ExternalRef> {
    const response = await this.call(
      'ProductService',
      'SaveProduct',
      {
        product: {
          productSellerCode: product.sku,
          title: product.title,
          description: product.description,
          category: product.categoryId ? { id: product.categoryId } : undefined,
          price: product.price,
          currencyType: product.currency,
          images: { image: product.images.map((url, index) => ({ url, order: index + 1 })) },
          stockItems: {
            stockItem: { sellerStockCode: product.sku, quantity: product.stock, gtin: product.barcode },
          },
        },
      },
      SaveProductSchema,
      ctx,
    );
    return response.map((body) => ({ externalId: ref.externalId ?? body.product.id }));
  }

  private async updateStock(update: StockUpdate, ref: ExternalRef, ctx: OperationContext): ConnectorResult<ExternalRef> {
    if (ref.externalId === null) {
      return Result.fail(new RemoteValidationError(`Product ${update.sku} is not listed on n11`, { sku: update.sku }));
    }
    const response = await this.call(
      'ProductStockService',
      'UpdateStockByStockSellerCode',
      { stockItems: { stockItem: { sellerStockCode: update.sku, quantity: update.quantity } } },
      z.object({}).passthrough(),
      ctx,
    );
    return response.map(() => ref);
  }

  private async listOrders(page: PageRequest, ctx: OperationContext): ConnectorResult<Page<NormalizedOrder>> {
    const currentPage = Number(page.cursor ?? 0);
    const response = await this.call(
      'OrderService',
      'OrderList',
      {
        searchData: page.since ? { period: { startDate: page.since.toISOString() } } : undefined,
        pagingData: { currentPage, pageSize: page.pageSize ?? DEFAULT_PAGE_SIZE },
      },
      OrderListSchema,
      ctx,
    );
    return response.map((body) => ({
      items: body.orderList.order.map((order) => {
        const lines = order.itemList.item.map((item) => ({
          sku: item.productSellerCode,
          quantity: item.quantity,
          unitPrice: item.price,
        }));
        return {
          externalId: order.id,
          orderNumber: order.orderNumber,
          status: ORDER_STATUS[order.status] ?? 'processing',
          currency: 'TRY',
          total: order.totalAmount,
          createdAt: new Date(order.createDate),
          lines,
        };
      }),
      nextCursor:
        body.pagingData.currentPage + 1 < body.pagingData.pageCount
          ? String(body.pagingData.currentPage + 1)
          : null,
    }));
  }

  private async listCategories(_page: PageRequest, ctx: OperationContext): ConnectorResult<Page<Category>> {
    const response = await this.call('CategoryService', 'GetTopLevelCategories', {}, CategoryListSchema, ctx);
    return response.map((body) => ({
      items: body.categoryList.category.map((category) => ({
        externalId: category.id,
        name: category.name,
        parentExternalId: null,
      })),
      nextCursor: null,
    }));
  }
}

export const n11Platform = definePlatform({
  platformName: 'n11',
  category: 'marketplace',
  credentialsSchema: N11CredentialsSchema,
  defaults: { rateLimitPerSecond: 5, requestTimeoutMs: 30_000 },
  baseUrls: {
    production: 'https://api.n11.com/ws',
    sandbox: 'https://api.sandbox.n11.com/ws',
  },
  build: (context) => new N11Connector(context),
});
