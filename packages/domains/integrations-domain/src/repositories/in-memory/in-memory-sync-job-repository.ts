import { SyncJob, type SyncJobProps } from '../../entities/sync-job.js';
import type { SyncJobRepository } from '../sync-job-repository.js';

export class InMemorySyncJobRepository implements SyncJobRepository {
  private readonly rows = new Map<string, SyncJobProps>();

  async save(syncJob: SyncJob): Promise<void> {
    this.rows.set(syncJob.id, syncJob.toProps());
  }

  async findById(id: string): Promise<SyncJob | null> {
    const row = this.rows.get(id);
    return row ? SyncJob.reconstitute(row) : null;
  }

  async findRecent(pagination: {
    page: number;
    limit: number;
  }): Promise<{ data: SyncJob[]; total: number }> {
    const all = [...this.rows.values()].sort(
      (a, b) => b.requestedAt.getTime() - a.requestedAt.getTime(),
    );
    const start = (pagination.page - 1) * pagination.limit;
    return {
      data: all.slice(start, start + pagination.limit).map((row) => SyncJob.reconstitute(row)),
      total: all.length,
    };
  }

  async update(syncJob: SyncJob): Promise<void> {
    await this.save(syncJob);
  }
}
