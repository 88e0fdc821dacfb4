import { getModelToken } from '@nestjs/mongoose';
import { Test } from '@nestjs/testing';
import { mongo } from 'mongoose';
import { MappingConflictError } from '../common/errors/sync.errors';
import type { SyncEntity } from '../integrations/integration.types';
import { MappingStore } from './mapping.store';
import { MongoMappingStore } from './mongo-mapping.store';
import { MAPPING_MODELS } from './schemas/identity-mapping.schema';

interface StoredMapping {
  integrationId: string;
  localId: string;
  remoteId: number;
  lastSyncAt: Date;
}

function mappingModel() {
  return {
    findOne: jest.fn((): { exec: () => Promise<StoredMapping | null> } => ({
      exec: async () => null,
    })),
    updateOne: jest.fn(() => ({ exec: async () => ({ matchedCount: 1 }) })),
    create: jest.fn(async (values: StoredMapping): Promise<StoredMapping> => values),
  };
}

describe('MongoMappingStore', () => {
  let models: Record<SyncEntity, ReturnType<typeof mappingModel>>;
  let store: MappingStore;

  beforeEach(async () => {
    models = {
      customer: mappingModel(),
      product: mappingModel(),
      order: mappingModel(),
      invoice: mappingModel(),
    };

    const moduleRef = await Test.createTestingModule({
      providers: [
        { provide: MappingStore, useClass: MongoMappingStore },
        { provide: getModelToken(MAPPING_MODELS.customer.name), useValue: models.customer },
        { provide: getModelToken(MAPPING_MODELS.product.name), useValue: models.product },
        { provide: getModelToken(MAPPING_MODELS.order.name), useValue: models.order },
        { provide: getModelToken(MAPPING_MODELS.invoice.name), useValue: models.invoice },
      ],
    }).compile();
    store = moduleRef.get(MappingStore);
  });

  it('inserts a new mapping into the collection of its entity', async () => {
    const mapping = await store.upsert('integration-1', 'product', 'product-1', 7);

    expect(mapping).toEqual({
      integrationId: 'integration-1',
      entity: 'product',
      localId: 'product-1',
      remoteId: 7,
      lastSyncAt: expect.any(Date),
    });
    expect(models.product.create).toHaveBeenCalledWith({
      integrationId: 'integration-1',
      localId: 'product-1',
      remoteId: 7,
      lastSyncAt: expect.any(Date),
    });
    expect(models.customer.create).not.toHaveBeenCalled();
  });

  it('looks mappings up by integration and id', async () => {
    const lastSyncAt = new Date(Date.UTC(2024, 2, 1));
    models.order.findOne.mockReturnValueOnce({
      exec: async () => ({
        integrationId: 'integration-1',
        localId: 'order-1',
        remoteId: 3,
        lastSyncAt,
      }),
    });

    await expect(store.findByRemote('integration-1', 'order', 3)).resolves.toEqual({
      integrationId: 'integration-1',
      entity: 'order',
      localId: 'order-1',
      remoteId: 3,
      lastSyncAt,
    });
    expect(models.order.findOne).toHaveBeenCalledWith({
      integrationId: 'integration-1',
      remoteId: 3,
    });
  });

  it('reports a unique index violation from a concurrent writer as MappingConflictError', async () => {
    models.customer.create.mockRejectedValueOnce(
      new mongo.MongoServerError({ message: 'E11000 duplicate key error', code: 11000 }),
    );

    const upsert = store.upsert('integration-1', 'customer', 'customer-1', 12);

    await expect(upsert).rejects.toBeInstanceOf(MappingConflictError);
    await expect(upsert).rejects.toThrow(
      'Cannot map customer customer-1 to remote 12: a concurrent writer created a conflicting mapping',
    );
  });

  it('lets other insert failures through', async () => {
    const failure = new Error('connection reset');
    models.invoice.create.mockRejectedValueOnce(failure);

    await expect(store.upsert('integration-1', 'invoice', 'invoice-1', 4)).rejects.toBe(failure);
  });

  it('touches lastSyncAt of the existing pair', async () => {
    await store.touch('integration-1', 'product', 'product-1');

    expect(models.product.updateOne).toHaveBeenCalledWith(
      { integrationId: 'integration-1', localId: 'product-1' },
      { $set: { lastSyncAt: expect.any(Date) } },
    );
  });
});
