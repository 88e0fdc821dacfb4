import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { SYNC_ENTITIES } from '../integrations/integration.types';
import { MappingStore } from './mapping.store';
import { MongoMappingStore } from './mongo-mapping.store';
import {
  IdentityMappingSchema,
  MAPPING_MODELS,
} from './schemas/identity-mapping.schema';

@Module({
  imports: [
    MongooseModule.forFeature(
      SYNC_ENTITIES.map((entity) => ({
        name: MAPPING_MODELS[entity].name,
        schema: IdentityMappingSchema,
        collection: MAPPING_MODELS[entity].collection,
      })),
    ),
  ],
  providers: [{ provide: MappingStore, useClass: MongoMappingStore }],
  exports: [MappingStore],
})
export class MappingsModule {}
