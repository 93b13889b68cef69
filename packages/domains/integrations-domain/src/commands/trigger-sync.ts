import { z } from 'zod';
import { SyncEntityTypeSchema, SyncScopeSchema } from '../entities/sync-job.js';

export const TriggerSyncCommandSchema = z.object({
  entityType: SyncEntityTypeSchema,
  scope: SyncScopeSchema.default({ kind: 'all' }),
  integrationIds: z.array(z.string().uuid()).default([]),
});

export type TriggerSyncCommand = z.infer<typeof TriggerSyncCommandSchema>;

export function triggerSyncCommand(input: z.input<typeof TriggerSyncCommandSchema>): TriggerSyncCommand {
  return TriggerSyncCommandSchema.parse(input);
}

export const TriggerDeltaSyncCommandSchema = z.object({
  entityType: SyncEntityTypeSchema,
  integrationIds: z.array(z.string().uuid()).default([]),
});

export type TriggerDeltaSyncCommand = z.infer<typeof TriggerDeltaSyncCommandSchema>;

export function triggerDeltaSyncCommand(
  input: z.input<typeof TriggerDeltaSyncCommandSchema>,
): TriggerDeltaSyncCommand {
  return TriggerDeltaSyncCommandSchema.parse(input);
}
