import type { MappingRecord, SyncAspect } from '../entities/mapping-record.js';

export interface MappingRepository {
  find(internalEntityId: string, integrationId: string): Promise<MappingRecord | null>;
  findByExternalId(integrationId: string, externalId: string): Promise<MappingRecord | null>;
  /**
   * Throws `MappingConflictError` when the (internalEntityId, integrationId)
   * pair exists or the external id is already linked to another entity.
   */
  insert(record: MappingRecord): Promise<void>;
  update(record: MappingRecord): Promise<void>;
  /** Entity ids whose `aspect` has not been pushed yet or failed last time. */
  findUnsynced(integrationId: string, aspect: SyncAspect): Promise<string[]>;
  findByIntegration(integrationId: string): Promise<MappingRecord[]>;
}
