import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';
import {
  ORDER_STATUSES,
  OrderStatus,
  PAYMENT_STATUSES,
  PaymentStatus,
} from '../rental.types';

@Schema({ _id: false })
export class OrderLine {
  @Prop({ required: true })
  productId!: string;

  @Prop({ default: '' })
  name!: string;

  @Prop({ required: true, min: 1 })
  quantity!: number;

  @Prop({ required: true, min: 0 })
  price!: number;

  @Prop({ required: true, min: 0 })
  subtotal!: number;
}

export const OrderLineSchema = SchemaFactory.createForClass(OrderLine);

export type OrderDocument = HydratedDocument<OrderRecord>;

@Schema({ timestamps: true, collection: 'orders' })
export class OrderRecord {
  @Prop({ required: true, unique: true })
  code!: string;

  @Prop({ required: true, index: true })
  customerId!: string;

  @Prop({ required: true })
  orderDate!: Date;

  @Prop({ enum: [...ORDER_STATUSES], default: 'pending' })
  status!: OrderStatus;

  @Prop({ type: [OrderLineSchema], default: [] })
  items!: OrderLine[];

  @Prop({ default: 0, min: 0 })
  subtotal!: number;

  @Prop({ default: 0, min: 0 })
  tax!: number;

  @Prop({ default: 0, min: 0 })
  deliveryFee!: number;

  @Prop({ default: 0, min: 0 })
  totalAmount!: number;

  @Prop({ enum: [...PAYMENT_STATUSES], default: 'pending' })
  paymentStatus!: PaymentStatus;

  @Prop({ default: '' })
  notes!: string;

  updatedAt!: Date;
}

export const OrderSchema = SchemaFactory.createForClass(OrderRecord);

OrderSchema.index({ updatedAt: 1 });
