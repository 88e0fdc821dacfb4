import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';
import { INVOICE_STATUSES, InvoiceStatus } from '../rental.types';

@Schema({ _id: false })
export class InvoiceLine {
  @Prop({ type: String, default: null })
  productId!: string | null;

  @Prop({ required: true })
  name!: string;

  @Prop({ default: '' })
  description!: string;

  @Prop({ required: true, min: 0 })
  quantity!: number;

  @Prop({ required: true })
  unitPrice!: number;

  @Prop({ required: true })
  total!: number;
}

export const InvoiceLineSchema = SchemaFactory.createForClass(InvoiceLine);

export type InvoiceDocument = HydratedDocument<InvoiceRecord>;

@Schema({ timestamps: true, collection: 'invoices' })
export class InvoiceRecord {
  @Prop({ required: true, unique: true })
  code!: string;

  @Prop({ required: true, unique: true })
  number!: string;

  @Prop({ required: true, index: true })
  customerId!: string;

  @Prop({ type: String, default: null })
  orderId!: string | null;

  @Prop({ required: true })
  issueDate!: Date;

  @Prop({ required: true })
  dueDate!: Date;

  @Prop({ enum: [...INVOICE_STATUSES], default: 'draft' })
  status!: InvoiceStatus;

  @Prop({ required: true, default: 0 })
  amount!: number;

  @Prop({ default: 0 })
  paidAmount!: number;

  @Prop({ type: [InvoiceLineSchema], default: [] })
  items!: InvoiceLine[];

  @Prop({ default: '' })
  notes!: string;

  updatedAt!: Date;
}

export const InvoiceSchema = SchemaFactory.createForClass(InvoiceRecord);

InvoiceSchema.index({ updatedAt: 1 });
