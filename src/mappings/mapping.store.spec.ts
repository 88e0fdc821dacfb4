import { MappingConflictError } from '../common/errors/sync.errors';
import { InMemoryMappingStore } from '../../test/fakes/in-memory-mapping.store';

describe('MappingStore.upsert', () => {
  let store: InMemoryMappingStore;

  beforeEach(() => {
    store = new InMemoryMappingStore();
  });

  it('creates a mapping the first time a pair is seen', async () => {
    const mapping = await store.upsert('integration-1', 'product', 'product-1', 10);

    expect(mapping).toMatchObject({
      integrationId: 'integration-1',
      entity: 'product',
      localId: 'product-1',
      remoteId: 10,
    });
    expect(await store.findByRemote('integration-1', 'product', 10)).toMatchObject({
      localId: 'product-1',
    });
  });

  it('refreshes an existing identical pair', async () => {
    store.seed({ integrationId: 'integration-1', entity: 'product', localId: 'product-1', remoteId: 10 });

    await store.upsert('integration-1', 'product', 'product-1', 10);

    expect(store.mappings).toHaveLength(1);
    expect(store.mappings[0].lastSyncAt.getTime()).toBeGreaterThan(0);
  });

  it('refuses to map a local record to a second remote record', async () => {
    store.seed({ integrationId: 'integration-1', entity: 'product', localId: 'product-1', remoteId: 10 });

    const upsert = store.upsert('integration-1', 'product', 'product-1', 11);

    await expect(upsert).rejects.toBeInstanceOf(MappingConflictError);
    await expect(upsert).rejects.toThrow(
      'Cannot map product product-1 to remote 11: local record is already mapped to remote 10',
    );
  });

  it('refuses to map a remote record to a second local record', async () => {
    store.seed({ integrationId: 'integration-1', entity: 'product', localId: 'product-1', remoteId: 10 });

    await expect(store.upsert('integration-1', 'product', 'product-2', 10)).rejects.toThrow(
      'Cannot map product product-2 to remote 10: remote record is already mapped to local product-1',
    );
  });

  it('keeps entity kinds and integrations apart', async () => {
    store.seed({ integrationId: 'integration-1', entity: 'product', localId: 'x-1', remoteId: 10 });

    await store.upsert('integration-1', 'customer', 'x-1', 10);
    await store.upsert('integration-2', 'product', 'x-1', 10);

    expect(store.mappings).toHaveLength(3);
  });
});
