import {
  ASPECT_KIND,
  MappingConflictError,
  MappingRecord,
  MappingRecordPropsSchema,
  type MappingRepository,
  type SyncAspect,
} from '@marketsync/integrations-domain';
import { mappingRecords } from '@marketsync/integrations-domain/drizzle';
import { withTransaction, type Database } from '@marketsync/process-lib';
import { and, eq, isNull, or, sql } from 'drizzle-orm';
import { isUniqueViolation } from './pg-errors.js';

type MappingRow = typeof mappingRecords.$inferSelect;

function toMapping(row: MappingRow): MappingRecord {
  return MappingRecord.reconstitute(MappingRecordPropsSchema.parse(row));
}

function conflict(record: MappingRecord, message: string): MappingConflictError {
  return new MappingConflictError(message, {
    internalEntityId: record.internalEntityId,
    integrationId: record.integrationId,
    externalId: record.externalId,
  });
}

export class DrizzleMappingRepository implements MappingRepository {
  constructor(private readonly db: Database) {}

  async find(internalEntityId: string, integrationId: string): Promise<MappingRecord | null> {
    const [row] = await this.db
      .select()
      .from(mappingRecords)
      .where(
        and(
          eq(mappingRecords.internalEntityId, internalEntityId),
          eq(mappingRecords.integrationId, integrationId),
        ),
      );
    return row ? toMapping(row) : null;
  }

  async findByExternalId(integrationId: string, externalId: string): Promise<MappingRecord | null> {
    const [row] = await this.db
      .select()
      .from(mappingRecords)
      .where(
        and(eq(mappingRecords.integrationId, integrationId), eq(mappingRecords.externalId, externalId)),
      )
      .limit(1);
    return row ? toMapping(row) : null;
  }

  async insert(record: MappingRecord): Promise<void> {
    try {
      await this.db.insert(mappingRecords).values({ ...record.toProps() });
    } catch (error) {
      if (!isUniqueViolation(error)) throw error;
      throw conflict(
        record,
        `Mapping for ${record.internalEntityId} on integration ${record.integrationId} already exists`,
      );
    }
  }

  /**
   * The write only lands while the stored external id is unset or equal to
   * the record's, so two processes cannot re-point a mapping.
   */
  async update(record: MappingRecord): Promise<void> {
    const props = record.toProps();
    const externalIdUnchanged =
      props.externalId === null
        ? isNull(mappingRecords.externalId)
        : or(isNull(mappingRecords.externalId), eq(mappingRecords.externalId, props.externalId));

    try {
      await withTransaction(this.db, async (tx) => {
        const updated = await tx
          .update(mappingRecords)
          .set({
            externalId: props.externalId,
            payloadHashes: props.payloadHashes,
            aspectStates: props.aspectStates,
            lastSyncedAt: props.lastSyncedAt,
            syncState: props.syncState,
            lastError: props.lastError,
            updatedAt: props.updatedAt,
          })
          .where(and(eq(mappingRecords.id, props.id), externalIdUnchanged))
          .returning({ id: mappingRecords.id });
        if (updated.length === 0) {
          throw conflict(record, `External id of ${props.internalEntityId} cannot change`);
        }
      });
    } catch (error) {
      if (!isUniqueViolation(error)) throw error;
      throw conflict(
        record,
        `External id ${props.externalId} on integration ${props.integrationId} is already linked`,
      );
    }
  }

  async findUnsynced(integrationId: string, aspect: SyncAspect): Promise<string[]> {
    const rows = await this.db
      .select({ internalEntityId: mappingRecords.internalEntityId })
      .from(mappingRecords)
      .where(
        and(
          eq(mappingRecords.integrationId, integrationId),
          eq(mappingRecords.entityKind, ASPECT_KIND[aspect]),
          sql`coalesce(${mappingRecords.aspectStates} ->> ${aspect}, 'pending') <> 'synced'`,
        ),
      );
    return rows.map((row) => row.internalEntityId);
  }

  async findByIntegration(integrationId: string): Promise<MappingRecord[]> {
    const rows = await this.db
      .select()
      .from(mappingRecords)
      .where(eq(mappingRecords.integrationId, integrationId));
    return rows.map(toMapping);
  }
}
