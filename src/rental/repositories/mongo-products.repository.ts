import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { isValidObjectId, Model } from 'mongoose';
import { notFound, persist } from '../../common/mongo/persist';
import { ProductsRepository } from '../rental.repositories';
import { nextSequentialCode, Product, ProductInput } from '../rental.types';
import { ProductDocument, ProductRecord } from '../schemas/product.schema';

@Injectable()
export class MongoProductsRepository extends ProductsRepository {
  constructor(
    @InjectModel(ProductRecord.name) private productModel: Model<ProductRecord>,
  ) {
    super();
  }

  async findChangedSince(since: Date | null): Promise<Product[]> {
    const docs = await this.productModel
      .find(since ? { updatedAt: { $gt: since } } : {})
      .sort({ updatedAt: 1, _id: 1 })
      .exec();
    return docs.map(toProduct);
  }

  async findById(id: string): Promise<Product | null> {
    if (!isValidObjectId(id)) {
      return null;
    }
    const doc = await this.productModel.findById(id).exec();
    return doc ? toProduct(doc) : null;
  }

  create(input: ProductInput): Promise<Product> {
    return persist('product', 'create', async () =>
      toProduct(await this.productModel.create(input)),
    );
  }

  update(id: string, patch: Partial<ProductInput>): Promise<Product> {
    return persist('product', 'update', async () => {
      const doc = await this.productModel
        .findByIdAndUpdate(id, { $set: patch }, { new: true, runValidators: true })
        .exec();
      if (!doc) {
        throw notFound('product', id);
      }
      return toProduct(doc);
    });
  }

  nextCode(): Promise<string> {
    return nextSequentialCode(
      'PRD',
      3,
      () => this.productModel.countDocuments().exec(),
      async (code) => (await this.productModel.exists({ code })) !== null,
    );
  }
}

function toProduct(doc: ProductDocument): Product {
  return {
    id: String(doc._id),
    code: doc.code,
    name: doc.name,
    sku: doc.sku,
    category: doc.category,
    description: doc.description,
    rentalPrice: doc.rentalPrice,
    replacementValue: doc.replacementValue,
    stock: doc.stock,
    availableForRent: doc.availableForRent,
    status: doc.status,
    updatedAt: doc.updatedAt,
  };
}
