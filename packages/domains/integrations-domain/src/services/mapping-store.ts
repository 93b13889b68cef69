import {
  MappingRecord,
  type EntityKind,
  type SyncAspect,
} from '../entities/mapping-record.js';
import type { MappingRepository } from '../repositories/mapping-repository.js';
import { KeyedMutex } from '../resilience/keyed-mutex.js';

/**
 * Lock-guarded access to mapping records. Callers hold `withLock` for the
 * whole call-and-update of one (entity, integration) pair; the record
 * methods assume the lock is held.
 */
export class MappingStore {
  private readonly mutex = new KeyedMutex();

  constructor(private readonly repository: MappingRepository) {}

  withLock<T>(integrationId: string, internalEntityId: string, fn: () => Promise<T>): Promise<T> {
    return this.mutex.run(`${integrationId}:${internalEntityId}`, fn);
  }

  /** Serializes work keyed by a platform id before any internal entity exists. */
  withExternalLock<T>(integrationId: string, externalId: string, fn: () => Promise<T>): Promise<T> {
    return this.mutex.run(`${integrationId}:external:${externalId}`, fn);
  }

  find(internalEntityId: string, integrationId: string): Promise<MappingRecord | null> {
    return this.repository.find(internalEntityId, integrationId);
  }

  findByExternalId(integrationId: string, externalId: string): Promise<MappingRecord | null> {
    return this.repository.findByExternalId(integrationId, externalId);
  }

  findUnsynced(integrationId: string, aspect: SyncAspect): Promise<string[]> {
    return this.repository.findUnsynced(integrationId, aspect);
  }

  /** Throws `MappingConflictError` when the external id would change. */
  async recordSuccess(input: {
    internalEntityId: string;
    entityKind: EntityKind;
    integrationId: string;
    externalId: string | null;
    hashes: Partial<Record<SyncAspect, string>>;
    at?: Date;
  }): Promise<MappingRecord> {
    const existing = await this.repository.find(input.internalEntityId, input.integrationId);
    const record =
      existing ??
      MappingRecord.create({
        internalEntityId: input.internalEntityId,
        entityKind: input.entityKind,
        integrationId: input.integrationId,
      });
    record.markSynced({ hashes: input.hashes, externalId: input.externalId, at: input.at });
    if (existing) await this.repository.update(record);
    else await this.repository.insert(record);
    return record;
  }

  async recordFailure(input: {
    internalEntityId: string;
    entityKind: EntityKind;
    integrationId: string;
    aspect: SyncAspect;
    message: string;
  }): Promise<MappingRecord> {
    const existing = await this.repository.find(input.internalEntityId, input.integrationId);
    const record =
      existing ??
      MappingRecord.create({
        internalEntityId: input.internalEntityId,
        entityKind: input.entityKind,
        integrationId: input.integrationId,
      });
    record.markFailed(input.aspect, input.message);
    if (existing) await this.repository.update(record);
    else await this.repository.insert(record);
    return record;
  }

  /** Links an entity to a record created on the platform side. */
  async link(input: {
    internalEntityId: string;
    entityKind: EntityKind;
    integrationId: string;
    externalId: string;
  }): Promise<MappingRecord> {
    const existing = await this.repository.find(input.internalEntityId, input.integrationId);
    if (existing) {
      existing.assignExternalId(input.externalId);
      await this.repository.update(existing);
      return existing;
    }
    const record = MappingRecord.create(input);
    await this.repository.insert(record);
    return record;
  }
}
