import type { SyncLogEntry } from '../entities/sync-log.js';

export interface SyncLogRepository {
  /** Rejects a second entry for the same (jobId, integrationId, itemId). */
  append(entry: SyncLogEntry): Promise<void>;
  findByJob(jobId: string): Promise<SyncLogEntry[]>;
}
