import { z } from 'zod';
import { InvariantViolation } from '@marketsync/domain-kernel';

export const SyncEntityTypeSchema = z.enum(['product', 'stock', 'price', 'order_status']);
export type SyncEntityType = z.infer<typeof SyncEntityTypeSchema>;

export const SyncScopeSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('all') }),
  z.object({ kind: z.literal('ids'), ids: z.array(z.string().min(1)).min(1) }),
  z.object({ kind: z.literal('changed_since'), since: z.coerce.date() }),
]);
export type SyncScope = z.infer<typeof SyncScopeSchema>;

export const SyncTriggerSchema = z.enum(['manual', 'delta', 'schedule']);
export type SyncTrigger = z.infer<typeof SyncTriggerSchema>;

export const SyncStatusSchema = z.enum([
  'pending',
  'running',
  'completed',
  'partially_completed',
  'failed',
  'cancelled',
]);
export type SyncStatus = z.infer<typeof SyncStatusSchema>;

export const SyncCountsSchema = z.object({
  total: z.number().int().nonnegative(),
  succeeded: z.number().int().nonnegative(),
  failed: z.number().int().nonnegative(),
  skipped: z.number().int().nonnegative(),
});
export type SyncCounts = z.infer<typeof SyncCountsSchema>;

export const SyncJobPropsSchema = z.object({
  id: z.string().uuid(),
  entityType: SyncEntityTypeSchema,
  scope: SyncScopeSchema,
  integrationIds: z.array(z.string().uuid()),
  trigger: SyncTriggerSchema,
  status: SyncStatusSchema,
  counts: SyncCountsSchema,
  error: z.string().nullable(),
  requestedAt: z.coerce.date(),
  startedAt: z.coerce.date().nullable(),
  completedAt: z.coerce.date().nullable(),
  cancelRequestedAt: z.coerce.date().nullable(),
});

export type SyncJobProps = z.infer<typeof SyncJobPropsSchema>;

const TERMINAL: ReadonlySet<SyncStatus> = new Set([
  'completed',
  'partially_completed',
  'failed',
  'cancelled',
]);

export class SyncJob {
  private constructor(private props: SyncJobProps) {}

  /** An empty `integrationIds` targets every active integration. */
  static create(input: {
    entityType: SyncEntityType;
    scope: SyncScope;
    integrationIds?: string[];
    trigger?: SyncTrigger;
    requestedAt?: Date;
  }): SyncJob {
    return new SyncJob(
      SyncJobPropsSchema.parse({
        id: crypto.randomUUID(),
        entityType: input.entityType,
        scope: input.scope,
        integrationIds: input.integrationIds ?? [],
        trigger: input.trigger ?? 'manual',
        status: 'pending',
        counts: { total: 0, succeeded: 0, failed: 0, skipped: 0 },
        error: null,
        requestedAt: input.requestedAt ?? new Date(),
        startedAt: null,
        completedAt: null,
        cancelRequestedAt: null,
      }),
    );
  }

  static reconstitute(props: SyncJobProps): SyncJob {
    return new SyncJob(SyncJobPropsSchema.parse(props));
  }

  get id(): string {
    return this.props.id;
  }
  get entityType(): SyncEntityType {
    return this.props.entityType;
  }
  get scope(): SyncScope {
    return this.props.scope;
  }
  get integrationIds(): string[] {
    return this.props.integrationIds;
  }
  get trigger(): SyncTrigger {
    return this.props.trigger;
  }
  get status(): SyncStatus {
    return this.props.status;
  }
  get counts(): SyncCounts {
    return this.props.counts;
  }
  get error(): string | null {
    return this.props.error;
  }
  get requestedAt(): Date {
    return this.props.requestedAt;
  }
  get startedAt(): Date | null {
    return this.props.startedAt;
  }
  get completedAt(): Date | null {
    return this.props.completedAt;
  }
  get cancelRequestedAt(): Date | null {
    return this.props.cancelRequestedAt;
  }

  isTerminal(): boolean {
    return TERMINAL.has(this.props.status);
  }

  start(): void {
    if (this.props.status !== 'pending') {
      throw new InvariantViolation(`Sync job ${this.props.id} cannot start from ${this.props.status}`);
    }
    this.props.status = 'running';
    this.props.startedAt = new Date();
  }

  requestCancel(): void {
    if (this.isTerminal()) return;
    if (!this.props.cancelRequestedAt) this.props.cancelRequestedAt = new Date();
    if (this.props.status === 'pending') {
      this.props.status = 'cancelled';
      this.props.completedAt = new Date();
    }
  }

  /** Closes the job with its per-pair tally; the status follows from the counts. */
  complete(counts: SyncCounts): void {
    if (this.isTerminal()) {
      throw new InvariantViolation(`Sync job ${this.props.id} is already ${this.props.status}`);
    }
    this.props.counts = SyncCountsSchema.parse(counts);
    this.props.status = this.props.cancelRequestedAt ? 'cancelled' : deriveStatus(counts);
    this.props.completedAt = new Date();
  }

  fail(message: string, counts?: SyncCounts): void {
    if (this.isTerminal()) return;
    if (counts) this.props.counts = SyncCountsSchema.parse(counts);
    this.props.status = 'failed';
    this.props.error = message;
    this.props.completedAt = new Date();
  }

  toProps(): Readonly<SyncJobProps> {
    return Object.freeze({ ...this.props });
  }
}

export function deriveStatus(counts: SyncCounts): SyncStatus {
  if (counts.failed === 0) return 'completed';
  if (counts.succeeded === 0 && counts.skipped === 0) return 'failed';
  return 'partially_completed';
}
