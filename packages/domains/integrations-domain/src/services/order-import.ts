import { Result } from '@marketsync/domain-kernel';
import {
  UnsupportedOperationError,
  type ConnectorErrorKind,
  type NotConfiguredError,
} from '../errors/connector-errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { PageRequest } from '../connectors/types.js';
import type { ResilienceLayer } from '../resilience/resilience-layer.js';
import type { IntegrationRegistry } from './integration-registry.js';
import type { OrderStatusReconciler } from './order-status-reconciler.js';

export interface OrderImportOptions {
  /** Only orders the platform reports after this instant. */
  since?: Date;
  pageSize?: number;
}

export interface OrderImportSummary {
  integrationId: string;
  pages: number;
  fetched: number;
  created: number;
  updated: number;
  unchanged: number;
  stale: number;
  /** Platform ids already linked to a non-order entity. */
  unmapped: number;
  /** Set when a page call failed; counts cover the pages read before it. */
  error: { kind: ConnectorErrorKind; message: string } | null;
}

export interface OrderImporterDeps {
  registry: IntegrationRegistry;
  resilience: ResilienceLayer;
  reconciler: OrderStatusReconciler;
  logger?: Logger;
  maxPages?: number;
}

const DEFAULT_MAX_PAGES = 100;

/**
 * Pulls orders from a platform and links each one to an internal order,
 * creating the order and its mapping the first time it is seen.
 */
export class OrderImporter {
  private readonly logger: Logger;
  private readonly maxPages: number;

  constructor(private readonly deps: OrderImporterDeps) {
    this.logger = deps.logger ?? silentLogger;
    this.maxPages = deps.maxPages ?? DEFAULT_MAX_PAGES;
  }

  async importOrders(
    integrationId: string,
    options: OrderImportOptions = {},
  ): Promise<Result<OrderImportSummary, NotConfiguredError | UnsupportedOperationError>> {
    const resolved = await this.deps.registry.resolve(integrationId);
    if (resolved.isFailure) return Result.fail(resolved.getError());
    const { integration, connector, target } = resolved.getValue();
    const listOrders = connector.operations.listOrders;
    if (!listOrders) {
      return Result.fail(new UnsupportedOperationError(integration.platformName, 'listOrders'));
    }

    const summary: OrderImportSummary = {
      integrationId,
      pages: 0,
      fetched: 0,
      created: 0,
      updated: 0,
      unchanged: 0,
      stale: 0,
      unmapped: 0,
      error: null,
    };
    let cursor: string | null = null;
    do {
      const request: PageRequest = { cursor, since: options.since, pageSize: options.pageSize };
      const outcome = await this.deps.resilience.invoke(target, 'listOrders', (ctx) =>
        listOrders(request, { signal: ctx.signal }),
      );
      if (outcome.result.isFailure) {
        const error = outcome.result.getError();
        summary.error = { kind: error.kind, message: error.message };
        this.logger.warn({ integrationId, page: summary.pages, err: error }, 'order import page failed');
        break;
      }

      const page = outcome.result.getValue();
      summary.pages += 1;
      for (const order of page.items) {
        summary.fetched += 1;
        const result = await this.deps.reconciler.reconcile(
          integrationId,
          { externalId: order.externalId, status: order.status, occurredAt: order.createdAt },
          { createMissing: true },
        );
        summary[result] += 1;
      }
      cursor = page.nextCursor;
    } while (cursor !== null && summary.pages < this.maxPages);

    this.logger.info({ ...summary, error: summary.error?.message ?? null }, 'order import finished');
    return Result.ok(summary);
  }
}
