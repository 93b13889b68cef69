import type {
  IntegrationService,
  Logger,
  OrderImporter,
  SyncOrchestrator,
  WebhookIngestion,
} from '@marketsync/integrations-domain';
import { Hono } from 'hono';
import type { AppEnv } from './env.js';
import type { SyncDispatcher } from './infrastructure/queues.js';
import { integrationRoutes } from './interface/integration-routes.js';
import { syncRoutes } from './interface/sync-routes.js';
import { webhookRoutes } from './interface/webhook-routes.js';
import { errorHandler } from './middleware/error-handler.js';
import { loggingMiddleware } from './middleware/logging.js';

export interface AppDeps {
  integrations: IntegrationService;
  orderImport: OrderImporter;
  orchestrator: SyncOrchestrator;
  webhooks: WebhookIngestion;
  dispatcher: SyncDispatcher;
  logger: Logger;
}

export function createApp(deps: AppDeps) {
  const app = new Hono<AppEnv>();

  // Global middleware
  app.use('*', loggingMiddleware(deps.logger));
  app.onError(errorHandler(deps.logger));

  // Health check
  app.get('/health', (c) => c.json({ status: 'ok', service: 'sync-engine' }));

  // Mount API routes
  app.route('/', syncRoutes(deps));
  app.route('/', integrationRoutes(deps));
  app.route('/', webhookRoutes(deps));

  app.notFound((c) =>
    c.json({ error: 'NOT_FOUND', message: `No route for ${c.req.method} ${c.req.path}` }, 404),
  );

  return app;
}
