import { SyncJob, SyncJobPropsSchema, type SyncJobRepository } from '@marketsync/integrations-domain';
import { syncJobs } from '@marketsync/integrations-domain/drizzle';
import type { Database } from '@marketsync/process-lib';
import { desc, eq, sql } from 'drizzle-orm';

type SyncJobRow = typeof syncJobs.$inferSelect;

function toSyncJob(row: SyncJobRow): SyncJob {
  const { total, succeeded, failed, skipped, ...rest } = row;
  return SyncJob.reconstitute(
    SyncJobPropsSchema.parse({ ...rest, counts: { total, succeeded, failed, skipped } }),
  );
}

function toRow(job: SyncJob) {
  const { counts, ...props } = job.toProps();
  return { ...props, ...counts };
}

export class DrizzleSyncJobRepository implements SyncJobRepository {
  constructor(private readonly db: Database) {}

  async save(syncJob: SyncJob): Promise<void> {
    await this.db.insert(syncJobs).values(toRow(syncJob));
  }

  async findById(id: string): Promise<SyncJob | null> {
    const [row] = await this.db.select().from(syncJobs).where(eq(syncJobs.id, id));
    return row ? toSyncJob(row) : null;
  }

  async findRecent(pagination: {
    page: number;
    limit: number;
  }): Promise<{ data: SyncJob[]; total: number }> {
    const { page, limit } = pagination;
    const [rows, countResult] = await Promise.all([
      this.db
        .select()
        .from(syncJobs)
        .orderBy(desc(syncJobs.requestedAt))
        .limit(limit)
        .offset((page - 1) * limit),
      this.db.select({ count: sql<number>`count(*)::int` }).from(syncJobs),
    ]);
    return { data: rows.map(toSyncJob), total: countResult[0]?.count ?? 0 };
  }

  async update(syncJob: SyncJob): Promise<void> {
    const { id, ...changes } = toRow(syncJob);
    await this.db.update(syncJobs).set(changes).where(eq(syncJobs.id, id));
  }
}
