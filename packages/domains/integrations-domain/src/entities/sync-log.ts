import { z } from 'zod';
import { SyncEntityTypeSchema, type SyncEntityType } from './sync-job.js';

export const SyncLogStatusSchema = z.enum(['success', 'failed', 'skipped']);
export type SyncLogStatus = z.infer<typeof SyncLogStatusSchema>;

/**
 * Connector failure kinds plus the orchestrator's own reasons for skipping
 * or failing a pair without a network call.
 */
export const SyncErrorKindSchema = z.enum([
  'auth',
  'rate_limited',
  'transient_network',
  'remote_validation',
  'circuit_open',
  'unsupported_operation',
  'not_configured',
  'unmapped',
  'mapping_conflict',
  'cancelled',
  'unchanged',
  'internal',
]);
export type SyncErrorKind = z.infer<typeof SyncErrorKindSchema>;

export const SyncLogEntrySchema = z.object({
  id: z.string().uuid(),
  jobId: z.string().uuid(),
  integrationId: z.string().uuid(),
  itemId: z.string().min(1),
  entityType: SyncEntityTypeSchema,
  status: SyncLogStatusSchema,
  errorKind: SyncErrorKindSchema.nullable(),
  errorMessage: z.string().nullable(),
  externalId: z.string().nullable(),
  attempt: z.number().int().nonnegative(),
  durationMs: z.number().int().nonnegative(),
  createdAt: z.coerce.date(),
});

export type SyncLogEntry = z.infer<typeof SyncLogEntrySchema>;

export function createSyncLogEntry(input: {
  jobId: string;
  integrationId: string;
  itemId: string;
  entityType: SyncEntityType;
  status: SyncLogStatus;
  errorKind?: SyncErrorKind | null;
  errorMessage?: string | null;
  externalId?: string | null;
  attempt?: number;
  durationMs?: number;
}): SyncLogEntry {
  return SyncLogEntrySchema.parse({
    id: crypto.randomUUID(),
    jobId: input.jobId,
    integrationId: input.integrationId,
    itemId: input.itemId,
    entityType: input.entityType,
    status: input.status,
    errorKind: input.errorKind ?? null,
    errorMessage: input.errorMessage ?? null,
    externalId: input.externalId ?? null,
    attempt: input.attempt ?? 0,
    durationMs: Math.max(0, Math.round(input.durationMs ?? 0)),
    createdAt: new Date(),
  });
}
