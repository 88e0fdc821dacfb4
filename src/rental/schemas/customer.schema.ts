import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';

export type CustomerDocument = HydratedDocument<CustomerRecord>;

@Schema({ timestamps: true, collection: 'customers' })
export class CustomerRecord {
  @Prop({ required: true, unique: true })
  username!: string;

  @Prop({ default: '' })
  firstName!: string;

  @Prop({ default: '' })
  lastName!: string;

  @Prop({ default: '', lowercase: true, trim: true, index: true })
  email!: string;

  @Prop({ default: '' })
  phone!: string;

  @Prop({ default: '' })
  address!: string;

  @Prop({ default: 'customer', enum: ['customer'] })
  role!: 'customer';

  @Prop({ default: 'active', enum: ['active', 'inactive'] })
  status!: 'active' | 'inactive';

  updatedAt!: Date;
}

export const CustomerSchema = SchemaFactory.createForClass(CustomerRecord);

CustomerSchema.index({ role: 1, updatedAt: 1 });
