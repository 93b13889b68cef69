import { ConflictError } from '@marketsync/domain-kernel';
import type { SyncLogEntry } from '../../entities/sync-log.js';
import type { SyncLogRepository } from '../sync-log-repository.js';

export class InMemorySyncLogRepository implements SyncLogRepository {
  private readonly rows = new Map<string, SyncLogEntry>();

  async append(entry: SyncLogEntry): Promise<void> {
    const key = `${entry.jobId}:${entry.integrationId}:${entry.itemId}`;
    if (this.rows.has(key)) {
      throw new ConflictError(`Sync log for ${key} already written`);
    }
    this.rows.set(key, { ...entry });
  }

  async findByJob(jobId: string): Promise<SyncLogEntry[]> {
    return [...this.rows.values()].filter((entry) => entry.jobId === jobId);
  }
}
