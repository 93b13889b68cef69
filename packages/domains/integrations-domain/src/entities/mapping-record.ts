import { z } from 'zod';
import { MappingConflictError } from '../errors/connector-errors.js';

export const EntityKindSchema = z.enum(['product', 'order']);
export type EntityKind = z.infer<typeof EntityKindSchema>;

/** Independently hashed slices of an entity; a price change must not mask a stock change. */
export const SyncAspectSchema = z.enum(['product', 'stock', 'price', 'order_status']);
export type SyncAspect = z.infer<typeof SyncAspectSchema>;

/** Entity kind each aspect belongs to. */
export const ASPECT_KIND: Record<SyncAspect, EntityKind> = {
  product: 'product',
  stock: 'product',
  price: 'product',
  order_status: 'order',
};

export const MappingSyncStateSchema = z.enum(['pending', 'synced', 'error']);
export type MappingSyncState = z.infer<typeof MappingSyncStateSchema>;

export const AspectStateSchema = z.enum(['synced', 'error']);
export type AspectState = z.infer<typeof AspectStateSchema>;

type AspectStates = Partial<Record<SyncAspect, AspectState>>;

// Row-level summary: any failed aspect marks the row, a row with no outcome yet is pending.
function summarize(states: AspectStates): MappingSyncState {
  const values = Object.values(states);
  if (values.includes('error')) return 'error';
  return values.length > 0 ? 'synced' : 'pending';
}

export const MappingRecordPropsSchema = z.object({
  id: z.string().uuid(),
  internalEntityId: z.string().min(1),
  entityKind: EntityKindSchema,
  integrationId: z.string().uuid(),
  externalId: z.string().min(1).nullable(),
  payloadHashes: z.record(SyncAspectSchema, z.string()),
  aspectStates: z.record(SyncAspectSchema, AspectStateSchema).default({}),
  lastSyncedAt: z.coerce.date().nullable(),
  syncState: MappingSyncStateSchema,
  lastError: z.string().nullable(),
  createdAt: z.coerce.date(),
  updatedAt: z.coerce.date(),
});

export type MappingRecordProps = z.infer<typeof MappingRecordPropsSchema>;

export class MappingRecord {
  private constructor(private props: MappingRecordProps) {}

  static create(input: {
    internalEntityId: string;
    entityKind: EntityKind;
    integrationId: string;
    externalId?: string | null;
  }): MappingRecord {
    return new MappingRecord(
      MappingRecordPropsSchema.parse({
        id: crypto.randomUUID(),
        internalEntityId: input.internalEntityId,
        entityKind: input.entityKind,
        integrationId: input.integrationId,
        externalId: input.externalId ?? null,
        payloadHashes: {},
        aspectStates: {},
        lastSyncedAt: null,
        syncState: 'pending',
        lastError: null,
        createdAt: new Date(),
        updatedAt: new Date(),
      }),
    );
  }

  static reconstitute(props: MappingRecordProps): MappingRecord {
    return new MappingRecord(MappingRecordPropsSchema.parse(props));
  }

  get id(): string {
    return this.props.id;
  }
  get internalEntityId(): string {
    return this.props.internalEntityId;
  }
  get entityKind(): EntityKind {
    return this.props.entityKind;
  }
  get integrationId(): string {
    return this.props.integrationId;
  }
  get externalId(): string | null {
    return this.props.externalId;
  }
  get lastSyncedAt(): Date | null {
    return this.props.lastSyncedAt;
  }
  get syncState(): MappingSyncState {
    return this.props.syncState;
  }
  get lastError(): string | null {
    return this.props.lastError;
  }

  hashFor(aspect: SyncAspect): string | null {
    return this.props.payloadHashes[aspect] ?? null;
  }

  stateOf(aspect: SyncAspect): MappingSyncState {
    return this.props.aspectStates[aspect] ?? 'pending';
  }

  /** True when the last push of `aspect` succeeded and carried the same payload. */
  isUpToDate(aspect: SyncAspect, payloadHash: string): boolean {
    return this.stateOf(aspect) === 'synced' && this.props.payloadHashes[aspect] === payloadHash;
  }

  /**
   * Records a successful push of every aspect in `hashes`. `externalId` may
   * be learned on the first success but never changes afterwards.
   */
  markSynced(input: {
    hashes: Partial<Record<SyncAspect, string>>;
    externalId?: string | null;
    at?: Date;
  }): void {
    if (input.externalId) this.assignExternalId(input.externalId);
    const states: AspectStates = { ...this.props.aspectStates };
    for (const aspect of SyncAspectSchema.options) {
      if (input.hashes[aspect] !== undefined) states[aspect] = 'synced';
    }
    this.props.payloadHashes = { ...this.props.payloadHashes, ...input.hashes };
    this.props.aspectStates = states;
    this.props.syncState = summarize(states);
    if (this.props.syncState !== 'error') this.props.lastError = null;
    this.props.lastSyncedAt = input.at ?? new Date();
    this.props.updatedAt = new Date();
  }

  /** A failed push leaves the other aspects' state untouched. */
  markFailed(aspect: SyncAspect, message: string): void {
    this.props.aspectStates = { ...this.props.aspectStates, [aspect]: 'error' };
    this.props.syncState = 'error';
    this.props.lastError = message;
    this.props.updatedAt = new Date();
  }

  assignExternalId(externalId: string): void {
    if (this.props.externalId === externalId) return;
    if (this.props.externalId !== null) {
      throw new MappingConflictError(
        `Mapping ${this.props.internalEntityId}@${this.props.integrationId} already points at ${this.props.externalId}`,
        {
          internalEntityId: this.props.internalEntityId,
          integrationId: this.props.integrationId,
          externalId: this.props.externalId,
          attemptedExternalId: externalId,
        },
      );
    }
    this.props.externalId = externalId;
    this.props.updatedAt = new Date();
  }

  toProps(): Readonly<MappingRecordProps> {
    return Object.freeze({
      ...this.props,
      payloadHashes: { ...this.props.payloadHashes },
      aspectStates: { ...this.props.aspectStates },
    });
  }
}
