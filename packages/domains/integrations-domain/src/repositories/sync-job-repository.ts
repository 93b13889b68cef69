import type { SyncJob } from '../entities/sync-job.js';

export interface SyncJobRepository {
  save(syncJob: SyncJob): Promise<void>;
  findById(id: string): Promise<SyncJob | null>;
  findRecent(pagination: { page: number; limit: number }): Promise<{ data: SyncJob[]; total: number }>;
  update(syncJob: SyncJob): Promise<void>;
}
