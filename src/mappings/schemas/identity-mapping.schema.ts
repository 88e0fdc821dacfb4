import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';
import type { SyncEntity } from '../../integrations/integration.types';

export type IdentityMappingDocument = HydratedDocument<IdentityMappingRecord>;

@Schema({ timestamps: true })
export class IdentityMappingRecord {
  @Prop({ required: true, index: true })
  integrationId!: string;

  @Prop({ required: true })
  localId!: string;

  @Prop({ required: true })
  remoteId!: number;

  @Prop({ required: true, default: () => new Date() })
  lastSyncAt!: Date;
}

export const IdentityMappingSchema = SchemaFactory.createForClass(
  IdentityMappingRecord,
);

IdentityMappingSchema.index({ integrationId: 1, localId: 1 }, { unique: true });
IdentityMappingSchema.index({ integrationId: 1, remoteId: 1 }, { unique: true });

/** One collection per entity kind, all sharing the same shape. */
export const MAPPING_MODELS: Record<SyncEntity, { name: string; collection: string }> = {
  customer: { name: 'CustomerMapping', collection: 'customer_mappings' },
  product: { name: 'ProductMapping', collection: 'product_mappings' },
  order: { name: 'OrderMapping', collection: 'order_mappings' },
  invoice: { name: 'InvoiceMapping', collection: 'invoice_mappings' },
};
