import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { isValidObjectId, Model } from 'mongoose';
import { notFound, persist } from '../../common/mongo/persist';
import { OrdersRepository } from '../rental.repositories';
import {
  nextSequentialCode,
  Order,
  OrderInput,
  priceOrderItems,
} from '../rental.types';
import { OrderDocument, OrderRecord } from '../schemas/order.schema';

@Injectable()
export class MongoOrdersRepository extends OrdersRepository {
  constructor(
    @InjectModel(OrderRecord.name) private orderModel: Model<OrderRecord>,
  ) {
    super();
  }

  async findChangedSince(since: Date | null): Promise<Order[]> {
    const docs = await this.orderModel
      .find(since ? { updatedAt: { $gt: since } } : {})
      .sort({ updatedAt: 1, _id: 1 })
      .exec();
    return docs.map(toOrder);
  }

  async findById(id: string): Promise<Order | null> {
    if (!isValidObjectId(id)) {
      return null;
    }
    const doc = await this.orderModel.findById(id).exec();
    return doc ? toOrder(doc) : null;
  }

  async findByCode(code: string): Promise<Order | null> {
    const doc = await this.orderModel.findOne({ code }).exec();
    return doc ? toOrder(doc) : null;
  }

  create(input: OrderInput): Promise<Order> {
    return persist('order', 'create', async () => {
      const { items, ...fields } = input;
      const doc = await this.orderModel.create({
        ...fields,
        ...priceOrderItems(items, fields.tax, fields.deliveryFee),
      });
      return toOrder(doc);
    });
  }

  update(id: string, patch: Partial<OrderInput>): Promise<Order> {
    return persist('order', 'update', async () => {
      const doc = await this.orderModel.findById(id).exec();
      if (!doc) {
        throw notFound('order', id);
      }

      const { items, ...fields } = patch;
      doc.set(fields);
      const lines =
        items ??
        doc.items.map(({ productId, name, quantity, price }) => ({
          productId,
          name,
          quantity,
          price,
        }));
      doc.set(priceOrderItems(lines, doc.tax, doc.deliveryFee));

      return toOrder(await doc.save());
    });
  }

  nextCode(): Promise<string> {
    return nextSequentialCode(
      'ORD',
      3,
      () => this.orderModel.countDocuments().exec(),
      async (code) => (await this.orderModel.exists({ code })) !== null,
    );
  }
}

function toOrder(doc: OrderDocument): Order {
  return {
    id: String(doc._id),
    code: doc.code,
    customerId: doc.customerId,
    orderDate: doc.orderDate,
    status: doc.status,
    items: doc.items.map((item) => ({
      productId: item.productId,
      name: item.name,
      quantity: item.quantity,
      price: item.price,
      subtotal: item.subtotal,
    })),
    subtotal: doc.subtotal,
    tax: doc.tax,
    deliveryFee: doc.deliveryFee,
    totalAmount: doc.totalAmount,
    paymentStatus: doc.paymentStatus,
    notes: doc.notes,
    updatedAt: doc.updatedAt,
  };
}
