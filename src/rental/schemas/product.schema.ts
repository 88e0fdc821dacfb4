import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { HydratedDocument } from 'mongoose';
import { PRODUCT_STATUSES, ProductStatus } from '../rental.types';

export type ProductDocument = HydratedDocument<ProductRecord>;

@Schema({ timestamps: true, collection: 'products' })
export class ProductRecord {
  @Prop({ required: true, unique: true })
  code!: string;

  @Prop({ required: true })
  name!: string;

  @Prop({ required: true, unique: true })
  sku!: string;

  @Prop({ default: '' })
  category!: string;

  @Prop({ default: '' })
  description!: string;

  @Prop({ required: true, min: 0 })
  rentalPrice!: number;

  @Prop({ required: true, min: 0 })
  replacementValue!: number;

  @Prop({ default: 0, min: 0 })
  stock!: number;

  @Prop({ default: 0, min: 0 })
  availableForRent!: number;

  @Prop({ enum: [...PRODUCT_STATUSES], default: 'active' })
  status!: ProductStatus;

  updatedAt!: Date;
}

export const ProductSchema = SchemaFactory.createForClass(ProductRecord);

ProductSchema.index({ updatedAt: 1 });
