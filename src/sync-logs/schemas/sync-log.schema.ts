import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';
import {
  SYNC_DIRECTIONS,
  SYNC_ENTITIES,
  SyncDirection,
  SyncEntity,
} from '../../integrations/integration.types';
import { SYNC_STATUSES, SyncLogDetails, SyncStatus } from '../sync-log.types';

export type SyncLogDocument = HydratedDocument<SyncLog>;

@Schema({ timestamps: true, collection: 'sync_logs' })
export class SyncLog {
  @Prop({ required: true, index: true })
  integrationId!: string;

  @Prop({ required: true, enum: [...SYNC_ENTITIES] })
  entity!: SyncEntity;

  @Prop({ required: true, enum: [...SYNC_DIRECTIONS] })
  direction!: SyncDirection;

  @Prop({ required: true, enum: [...SYNC_STATUSES] })
  status!: SyncStatus;

  @Prop({ required: true, index: true })
  startedAt!: Date;

  @Prop({ default: 0 })
  recordsProcessed!: number;

  @Prop({ default: 0 })
  recordsSucceeded!: number;

  @Prop({ default: 0 })
  recordsFailed!: number;

  @Prop({ type: Object, default: () => ({ succeeded: [], failed: [] }) })
  details!: SyncLogDetails;

  @Prop({ type: String, default: null })
  errorMessage!: string | null;

  @Prop({ type: Date, default: null })
  finalizedAt!: Date | null;
}

export const SyncLogSchema = SchemaFactory.createForClass(SyncLog);

SyncLogSchema.index({ integrationId: 1, entity: 1, startedAt: -1 });
