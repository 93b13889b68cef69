import { ConflictError } from '@marketsync/domain-kernel';
import {
  SyncLogEntrySchema,
  type SyncLogEntry,
  type SyncLogRepository,
} from '@marketsync/integrations-domain';
import { syncLogs } from '@marketsync/integrations-domain/drizzle';
import type { Database } from '@marketsync/process-lib';
import { asc, eq } from 'drizzle-orm';
import { isUniqueViolation } from './pg-errors.js';

export class DrizzleSyncLogRepository implements SyncLogRepository {
  constructor(private readonly db: Database) {}

  async append(entry: SyncLogEntry): Promise<void> {
    try {
      await this.db.insert(syncLogs).values(entry);
    } catch (error) {
      if (!isUniqueViolation(error)) throw error;
      throw new ConflictError(
        `Sync log for ${entry.jobId}:${entry.integrationId}:${entry.itemId} already written`,
      );
    }
  }

  async findByJob(jobId: string): Promise<SyncLogEntry[]> {
    const rows = await this.db
      .select()
      .from(syncLogs)
      .where(eq(syncLogs.jobId, jobId))
      .orderBy(asc(syncLogs.createdAt));
    return rows.map((row) => SyncLogEntrySchema.parse(row));
  }
}
