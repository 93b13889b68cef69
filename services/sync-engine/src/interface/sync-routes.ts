import { NotFoundError } from '@marketsync/domain-kernel';
import {
  SyncScopeSchema,
  TriggerDeltaSyncCommandSchema,
  TriggerSyncCommandSchema,
  type SyncJob,
  type SyncLogEntry,
  type SyncOrchestrator,
} from '@marketsync/integrations-domain';
import { Hono } from 'hono';
import { z } from 'zod';
import type { AppEnv } from '../env.js';
import type { SyncDispatcher } from '../infrastructure/queues.js';
import { parseId, parseInput, readJson } from './request.js';

const SyncBodySchema = z.object({
  scope: SyncScopeSchema.optional(),
  integrations: z.array(z.string()).optional(),
});

const DeltaBodySchema = z.object({
  integrations: z.array(z.string()).optional(),
});

export function presentJob(job: SyncJob) {
  const props = job.toProps();
  return {
    id: props.id,
    entityType: props.entityType,
    scope: props.scope,
    integrationIds: props.integrationIds,
    trigger: props.trigger,
    status: props.status,
    counts: props.counts,
    error: props.error,
    requestedAt: props.requestedAt.toISOString(),
    startedAt: props.startedAt?.toISOString() ?? null,
    completedAt: props.completedAt?.toISOString() ?? null,
    cancelRequestedAt: props.cancelRequestedAt?.toISOString() ?? null,
  };
}

function presentEntry(entry: SyncLogEntry) {
  return {
    integrationId: entry.integrationId,
    itemId: entry.itemId,
    status: entry.status,
    errorKind: entry.errorKind,
    errorMessage: entry.errorMessage,
    externalId: entry.externalId,
    attempt: entry.attempt,
    durationMs: entry.durationMs,
  };
}

export function syncRoutes(deps: { orchestrator: SyncOrchestrator; dispatcher: SyncDispatcher }) {
  const routes = new Hono<AppEnv>();

  // POST /sync/jobs/:jobId/cancel - Cancel a pending or running job
  routes.post('/sync/jobs/:jobId/cancel', async (c) => {
    const job = await deps.orchestrator.cancel(parseId('SyncJob', c.req.param('jobId')));
    return c.json(presentJob(job));
  });

  // GET /sync/jobs/:jobId - Job with per-pair status
  routes.get('/sync/jobs/:jobId', async (c) => {
    const jobId = parseId('SyncJob', c.req.param('jobId'));
    const result = await deps.orchestrator.getJob(jobId);
    if (!result) throw new NotFoundError('SyncJob', jobId);
    return c.json({ ...presentJob(result.job), entries: result.entries.map(presentEntry) });
  });

  // POST /sync/:entityType/delta - Changed and previously failed items only
  routes.post('/sync/:entityType/delta', async (c) => {
    const body = parseInput(DeltaBodySchema, await readJson(c));
    const command = parseInput(TriggerDeltaSyncCommandSchema, {
      entityType: c.req.param('entityType'),
      integrationIds: body.integrations,
    });
    const job = await deps.orchestrator.createDeltaJob(command.entityType, command.integrationIds);
    await deps.dispatcher.dispatch(job.id);
    return c.json({ jobId: job.id, status: job.status, scope: job.scope.kind }, 202);
  });

  // POST /sync/:entityType - Trigger a sync job
  routes.post('/sync/:entityType', async (c) => {
    const body = parseInput(SyncBodySchema, await readJson(c));
    const command = parseInput(TriggerSyncCommandSchema, {
      entityType: c.req.param('entityType'),
      scope: body.scope,
      integrationIds: body.integrations,
    });
    const job = await deps.orchestrator.createJob(command);
    await deps.dispatcher.dispatch(job.id);
    return c.json({ jobId: job.id, status: job.status }, 202);
  });

  return routes;
}
