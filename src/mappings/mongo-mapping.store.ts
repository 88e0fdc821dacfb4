import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { Model } from 'mongoose';
import { MappingConflictError } from '../common/errors/sync.errors';
import { isDuplicateKeyError } from '../common/mongo/duplicate-key';
import type { PerEntity, SyncEntity } from '../integrations/integration.types';
import { IdentityMapping } from './identity-mapping';
import { MappingStore } from './mapping.store';
import {
  IdentityMappingDocument,
  IdentityMappingRecord,
  MAPPING_MODELS,
} from './schemas/identity-mapping.schema';

@Injectable()
export class MongoMappingStore extends MappingStore {
  private readonly models: PerEntity<Model<IdentityMappingRecord>>;

  constructor(
    @InjectModel(MAPPING_MODELS.customer.name)
    customerMappings: Model<IdentityMappingRecord>,
    @InjectModel(MAPPING_MODELS.product.name)
    productMappings: Model<IdentityMappingRecord>,
    @InjectModel(MAPPING_MODELS.order.name)
    orderMappings: Model<IdentityMappingRecord>,
    @InjectModel(MAPPING_MODELS.invoice.name)
    invoiceMappings: Model<IdentityMappingRecord>,
  ) {
    super();
    this.models = {
      customer: customerMappings,
      product: productMappings,
      order: orderMappings,
      invoice: invoiceMappings,
    };
  }

  async findByLocal(
    integrationId: string,
    entity: SyncEntity,
    localId: string,
  ): Promise<IdentityMapping | null> {
    const doc = await this.models[entity]
      .findOne({ integrationId, localId })
      .exec();
    return doc ? toMapping(entity, doc) : null;
  }

  async findByRemote(
    integrationId: string,
    entity: SyncEntity,
    remoteId: number,
  ): Promise<IdentityMapping | null> {
    const doc = await this.models[entity]
      .findOne({ integrationId, remoteId })
      .exec();
    return doc ? toMapping(entity, doc) : null;
  }

  async touch(
    integrationId: string,
    entity: SyncEntity,
    localId: string,
  ): Promise<void> {
    await this.models[entity]
      .updateOne({ integrationId, localId }, { $set: { lastSyncAt: new Date() } })
      .exec();
  }

  protected async insert(mapping: IdentityMapping): Promise<IdentityMapping> {
    try {
      const doc = await this.models[mapping.entity].create({
        integrationId: mapping.integrationId,
        localId: mapping.localId,
        remoteId: mapping.remoteId,
        lastSyncAt: mapping.lastSyncAt,
      });
      return toMapping(mapping.entity, doc);
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        throw new MappingConflictError(
          mapping.entity,
          mapping.localId,
          mapping.remoteId,
          'a concurrent writer created a conflicting mapping',
        );
      }
      throw error;
    }
  }
}

function toMapping(
  entity: SyncEntity,
  doc: IdentityMappingDocument,
): IdentityMapping {
  return {
    integrationId: doc.integrationId,
    entity,
    localId: doc.localId,
    remoteId: doc.remoteId,
    lastSyncAt: doc.lastSyncAt,
  };
}
