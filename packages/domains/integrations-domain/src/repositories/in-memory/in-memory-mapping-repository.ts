import {
  ASPECT_KIND,
  MappingRecord,
  type MappingRecordProps,
  type SyncAspect,
} from '../../entities/mapping-record.js';
import { MappingConflictError } from '../../errors/connector-errors.js';
import type { MappingRepository } from '../mapping-repository.js';

const keyOf = (internalEntityId: string, integrationId: string) =>
  `${integrationId}:${internalEntityId}`;

export class InMemoryMappingRepository implements MappingRepository {
  private readonly rows = new Map<string, MappingRecordProps>();

  async find(internalEntityId: string, integrationId: string): Promise<MappingRecord | null> {
    const row = this.rows.get(keyOf(internalEntityId, integrationId));
    return row ? MappingRecord.reconstitute(row) : null;
  }

  async findByExternalId(integrationId: string, externalId: string): Promise<MappingRecord | null> {
    for (const row of this.rows.values()) {
      if (row.integrationId === integrationId && row.externalId === externalId) {
        return MappingRecord.reconstitute(row);
      }
    }
    return null;
  }

  async insert(record: MappingRecord): Promise<void> {
    const key = keyOf(record.internalEntityId, record.integrationId);
    if (this.rows.has(key)) {
      throw new MappingConflictError(
        `Mapping for ${record.internalEntityId} on integration ${record.integrationId} already exists`,
        { internalEntityId: record.internalEntityId, integrationId: record.integrationId },
      );
    }
    const { externalId } = record;
    if (externalId !== null && (await this.findByExternalId(record.integrationId, externalId))) {
      throw new MappingConflictError(
        `External id ${externalId} on integration ${record.integrationId} is already linked`,
        { integrationId: record.integrationId, externalId },
      );
    }
    this.rows.set(key, record.toProps());
  }

  async update(record: MappingRecord): Promise<void> {
    const key = keyOf(record.internalEntityId, record.integrationId);
    const existing = this.rows.get(key);
    if (existing?.externalId && existing.externalId !== record.externalId) {
      throw new MappingConflictError(`External id of ${record.internalEntityId} cannot change`, {
        internalEntityId: record.internalEntityId,
        integrationId: record.integrationId,
      });
    }
    const { externalId } = record;
    const holder = externalId === null ? null : await this.findByExternalId(record.integrationId, externalId);
    if (holder && holder.internalEntityId !== record.internalEntityId) {
      throw new MappingConflictError(
        `External id ${externalId} on integration ${record.integrationId} is already linked`,
        { integrationId: record.integrationId, externalId },
      );
    }
    this.rows.set(key, record.toProps());
  }

  async findUnsynced(integrationId: string, aspect: SyncAspect): Promise<string[]> {
    return [...this.rows.values()]
      .filter(
        (row) =>
          row.integrationId === integrationId &&
          row.entityKind === ASPECT_KIND[aspect] &&
          row.aspectStates[aspect] !== 'synced',
      )
      .map((row) => row.internalEntityId);
  }

  async findByIntegration(integrationId: string): Promise<MappingRecord[]> {
    return [...this.rows.values()]
      .filter((row) => row.integrationId === integrationId)
      .map((row) => MappingRecord.reconstitute(row));
  }
}
