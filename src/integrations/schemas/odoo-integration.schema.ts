import { Prop, Schema, SchemaFactory, raw } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';
import { DEFAULT_INTERVALS, PerEntity } from '../integration.types';

export type OdooIntegrationDocument = HydratedDocument<OdooIntegration>;

@Schema({ timestamps: true, collection: 'odoo_integrations' })
export class OdooIntegration {
  @Prop({ required: true })
  name!: string;

  @Prop({ default: true })
  active!: boolean;

  @Prop({ required: true })
  url!: string;

  @Prop({ required: true })
  database!: string;

  @Prop({ required: true })
  username!: string;

  @Prop({ required: true })
  apiKey!: string; // API key or password

  @Prop({ default: 1 })
  companyId!: number;

  @Prop({ default: '16.0' })
  version!: string;

  @Prop(
    raw({
      customer: { type: Boolean, default: true },
      product: { type: Boolean, default: true },
      order: { type: Boolean, default: true },
      invoice: { type: Boolean, default: true },
    }),
  )
  enabled!: PerEntity<boolean>;

  @Prop(
    raw({
      customer: { type: Number, default: DEFAULT_INTERVALS.customer },
      product: { type: Number, default: DEFAULT_INTERVALS.product },
      order: { type: Number, default: DEFAULT_INTERVALS.order },
      invoice: { type: Number, default: DEFAULT_INTERVALS.invoice },
    }),
  )
  intervals!: PerEntity<number>;

  @Prop(
    raw({
      customer: { type: Date, default: null },
      product: { type: Date, default: null },
      order: { type: Date, default: null },
      invoice: { type: Date, default: null },
    }),
  )
  watermarks!: PerEntity<Date | null>;
}

export const OdooIntegrationSchema = SchemaFactory.createForClass(OdooIntegration);
