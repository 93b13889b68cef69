import {
  ConfigureCredentialsCommandSchema,
  CreateIntegrationCommandSchema,
  IntegrationSettingsPatchSchema,
  UpdateSettingsCommandSchema,
  type IntegrationService,
  type IntegrationStatus,
  type OrderImporter,
} from '@marketsync/integrations-domain';
import { Hono } from 'hono';
import { z } from 'zod';
import type { AppEnv } from '../env.js';
import { parseId, parseInput, readJson } from './request.js';

const SettingsBodySchema = z.object({
  name: z.string().min(1).optional(),
  settings: IntegrationSettingsPatchSchema.default({}),
});

const OrderImportBodySchema = z.object({
  since: z.string().datetime().optional(),
  pageSize: z.number().int().min(1).max(200).optional(),
});

export function presentStatus(status: IntegrationStatus) {
  return {
    ...status,
    lastHealthCheckAt: status.lastHealthCheckAt?.toISOString() ?? null,
    lastSyncAt: status.lastSyncAt?.toISOString() ?? null,
  };
}

export function integrationRoutes(deps: { integrations: IntegrationService; orderImport: OrderImporter }) {
  const routes = new Hono<AppEnv>();

  // POST /integrations - Create an integration with a closed circuit
  routes.post('/integrations', async (c) => {
    const command = parseInput(CreateIntegrationCommandSchema, await readJson(c));
    const integration = await deps.integrations.create(command);
    return c.json(presentStatus(await deps.integrations.status(integration.id)), 201);
  });

  // GET /integrations - Every integration with credential, circuit and health state
  routes.get('/integrations', async (c) => {
    const statuses = await deps.integrations.list();
    return c.json({ data: statuses.map(presentStatus), total: statuses.length });
  });

  // GET /integrations/:id
  routes.get('/integrations/:id', async (c) => {
    const status = await deps.integrations.status(parseId('Integration', c.req.param('id')));
    return c.json(presentStatus(status));
  });

  // PUT /integrations/:id/credentials - Validate, encrypt and store
  routes.put('/integrations/:id/credentials', async (c) => {
    const command = parseInput(ConfigureCredentialsCommandSchema, {
      integrationId: parseId('Integration', c.req.param('id')),
      credentials: await readJson(c),
    });
    const result = await deps.integrations.configureCredentials(command);
    if (result.isFailure) throw result.getError();
    const validation = result.getValue();
    return c.json({ valid: validation.valid, warnings: validation.warnings });
  });

  // PUT /integrations/:id/settings - Applied on the next call, no restart
  routes.put('/integrations/:id/settings', async (c) => {
    const body = parseInput(SettingsBodySchema, await readJson(c));
    const command = parseInput(UpdateSettingsCommandSchema, {
      integrationId: parseId('Integration', c.req.param('id')),
      name: body.name,
      settings: body.settings,
    });
    const integration = await deps.integrations.updateSettings(command);
    return c.json(presentStatus(await deps.integrations.status(integration.id)));
  });

  // DELETE /integrations/:id - Soft delete
  routes.delete('/integrations/:id', async (c) => {
    await deps.integrations.remove(parseId('Integration', c.req.param('id')));
    return c.body(null, 204);
  });

  // POST /integrations/:id/health-check
  routes.post('/integrations/:id/health-check', async (c) => {
    const result = await deps.integrations.healthCheck(parseId('Integration', c.req.param('id')));
    return c.json(result);
  });

  // POST /integrations/:id/orders/import - Pull platform orders and link new ones
  routes.post('/integrations/:id/orders/import', async (c) => {
    const integrationId = parseId('Integration', c.req.param('id'));
    const body = parseInput(OrderImportBodySchema, await readJson(c));
    const result = await deps.orderImport.importOrders(integrationId, {
      since: body.since ? new Date(body.since) : undefined,
      pageSize: body.pageSize,
    });
    if (result.isFailure) throw result.getError();
    return c.json(result.getValue());
  });

  return routes;
}
