import {
  PlatformNameSchema,
  type WebhookIngestion,
  type WebhookReceipt,
} from '@marketsync/integrations-domain';
import { Hono } from 'hono';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import { z } from 'zod';
import type { AppEnv } from '../env.js';

type Rejection = Extract<WebhookReceipt, { kind: 'reject' }>;

const REJECTION_STATUS: Record<Rejection['reason'], ContentfulStatusCode> = {
  invalid_signature: 401,
  malformed_payload: 400,
  unknown_integration: 404,
  not_configured: 404,
};

export function webhookRoutes(deps: { webhooks: WebhookIngestion }) {
  const routes = new Hono<AppEnv>();

  // POST /webhook/:platformName - Verify, persist and acknowledge; processing is queued
  routes.post('/webhook/:platformName', async (c) => {
    const platform = PlatformNameSchema.safeParse(c.req.param('platformName'));
    if (!platform.success) {
      return c.json({ error: 'unknown_platform', message: `No receiver for ${c.req.param('platformName')}` }, 404);
    }

    const integrationId = c.req.query('integrationId');
    if (integrationId !== undefined && !z.string().uuid().safeParse(integrationId).success) {
      return c.json({ error: 'unknown_integration', message: `Unknown integration ${integrationId}` }, 404);
    }

    const rawBody = await c.req.text();
    const receipt = await deps.webhooks.receiveForPlatform(
      platform.data,
      rawBody,
      c.req.header(),
      integrationId,
    );

    if (receipt.kind === 'reject') {
      return c.json({ error: receipt.reason, message: receipt.message }, REJECTION_STATUS[receipt.reason]);
    }
    return c.json({ received: true, eventId: receipt.eventId, duplicate: receipt.duplicate });
  });

  return routes;
}
