import { describe, expect, it } from 'vitest';
import { MappingConflictError } from '../errors/connector-errors.js';
import { InMemoryMappingRepository } from '../repositories/in-memory/in-memory-mapping-repository.js';
import { MappingRecord } from './mapping-record.js';

const integrationId = '6f2a8c1e-3b4d-4e5f-9a0b-1c2d3e4f5a6b';

const fresh = () => MappingRecord.create({ internalEntityId: 'p1', entityKind: 'product', integrationId });

describe('MappingRecord', () => {
  it('starts pending without an external id', () => {
    const record = fresh();
    expect(record.syncState).toBe('pending');
    expect(record.externalId).toBeNull();
    expect(record.isUpToDate('stock', 'h1')).toBe(false);
  });

  it('tracks a hash per aspect', () => {
    const record = fresh();
    record.markSynced({ hashes: { stock: 'h-stock' }, externalId: 'ext-1' });
    record.markSynced({ hashes: { price: 'h-price' } });

    expect(record.isUpToDate('stock', 'h-stock')).toBe(true);
    expect(record.isUpToDate('price', 'h-price')).toBe(true);
    expect(record.isUpToDate('stock', 'h-other')).toBe(false);
    expect(record.hashFor('product')).toBeNull();
  });

  it('is not up to date after a failure', () => {
    const record = fresh();
    record.markSynced({ hashes: { stock: 'h1' } });
    record.markFailed('stock', 'boom');
    expect(record.syncState).toBe('error');
    expect(record.lastError).toBe('boom');
    expect(record.isUpToDate('stock', 'h1')).toBe(false);
  });

  it('keeps a failed aspect in error when another aspect succeeds', () => {
    const record = fresh();
    record.markSynced({ hashes: { product: 'h-product', stock: 'h-stock', price: 'h-price' }, externalId: 'ext-1' });
    record.markFailed('stock', 'stock rejected');
    record.markSynced({ hashes: { price: 'h-price-2' } });

    expect(record.stateOf('stock')).toBe('error');
    expect(record.stateOf('price')).toBe('synced');
    expect(record.syncState).toBe('error');
    expect(record.lastError).toBe('stock rejected');
    expect(record.isUpToDate('stock', 'h-stock')).toBe(false);

    record.markSynced({ hashes: { stock: 'h-stock-2' } });
    expect(record.syncState).toBe('synced');
    expect(record.lastError).toBeNull();
  });

  it('never re-points an external id', () => {
    const record = fresh();
    record.assignExternalId('ext-1');
    record.assignExternalId('ext-1');
    expect(() => record.assignExternalId('ext-2')).toThrow(MappingConflictError);
    expect(record.externalId).toBe('ext-1');
  });
});

describe('InMemoryMappingRepository', () => {
  it('keeps one row per entity and integration', async () => {
    const repository = new InMemoryMappingRepository();
    await repository.insert(fresh());
    await expect(repository.insert(fresh())).rejects.toBeInstanceOf(MappingConflictError);
  });

  it('refuses an update that changes a stored external id', async () => {
    const repository = new InMemoryMappingRepository();
    const record = fresh();
    record.assignExternalId('ext-1');
    await repository.insert(record);

    const stale = fresh();
    stale.assignExternalId('ext-2');
    await expect(repository.update(stale)).rejects.toBeInstanceOf(MappingConflictError);
    expect((await repository.find('p1', integrationId))?.externalId).toBe('ext-1');
    expect((await repository.findByExternalId(integrationId, 'ext-1'))?.internalEntityId).toBe('p1');
  });

  it('lists entities that are not synced', async () => {
    const repository = new InMemoryMappingRepository();
    const synced = MappingRecord.create({ internalEntityId: 'p1', entityKind: 'product', integrationId });
    synced.markSynced({ hashes: { stock: 'h' } });
    const failed = MappingRecord.create({ internalEntityId: 'p2', entityKind: 'product', integrationId });
    failed.markFailed('stock', 'boom');
    const order = MappingRecord.create({ internalEntityId: 'o1', entityKind: 'order', integrationId });
    await Promise.all([synced, failed, order].map((record) => repository.insert(record)));

    expect(await repository.findUnsynced(integrationId, 'stock')).toEqual(['p2']);
    expect(await repository.findUnsynced(integrationId, 'order_status')).toEqual(['o1']);
  });

  it('filters unsynced entities by aspect', async () => {
    const repository = new InMemoryMappingRepository();
    const record = fresh();
    record.markSynced({ hashes: { product: 'h1', stock: 'h2', price: 'h3' }, externalId: 'ext-1' });
    record.markFailed('stock', 'boom');
    record.markSynced({ hashes: { price: 'h4' } });
    await repository.insert(record);

    expect(await repository.findUnsynced(integrationId, 'stock')).toEqual(['p1']);
    expect(await repository.findUnsynced(integrationId, 'price')).toEqual([]);
    expect(await repository.findUnsynced(integrationId, 'product')).toEqual([]);
  });

  it('links an external id to one entity only', async () => {
    const repository = new InMemoryMappingRepository();
    await repository.insert(
      MappingRecord.create({ internalEntityId: 'o1', entityKind: 'order', integrationId, externalId: 'ORD-1' }),
    );
    const other = MappingRecord.create({ internalEntityId: 'o2', entityKind: 'order', integrationId, externalId: 'ORD-1' });
    await expect(repository.insert(other)).rejects.toBeInstanceOf(MappingConflictError);
  });
});
