import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { isValidObjectId, Model } from 'mongoose';
import { notFound, persist } from '../../common/mongo/persist';
import { InvoicesRepository } from '../rental.repositories';
import {
  Invoice,
  InvoiceInput,
  nextSequentialCode,
  priceInvoiceItems,
} from '../rental.types';
import { InvoiceDocument, InvoiceRecord } from '../schemas/invoice.schema';

@Injectable()
export class MongoInvoicesRepository extends InvoicesRepository {
  constructor(
    @InjectModel(InvoiceRecord.name) private invoiceModel: Model<InvoiceRecord>,
  ) {
    super();
  }

  async findChangedSince(since: Date | null): Promise<Invoice[]> {
    const docs = await this.invoiceModel
      .find(since ? { updatedAt: { $gt: since } } : {})
      .sort({ updatedAt: 1, _id: 1 })
      .exec();
    return docs.map(toInvoice);
  }

  async findById(id: string): Promise<Invoice | null> {
    if (!isValidObjectId(id)) {
      return null;
    }
    const doc = await this.invoiceModel.findById(id).exec();
    return doc ? toInvoice(doc) : null;
  }

  create(input: InvoiceInput): Promise<Invoice> {
    return persist('invoice', 'create', async () => {
      const doc = await this.invoiceModel.create({
        ...input,
        items: priceInvoiceItems(input.items),
      });
      return toInvoice(doc);
    });
  }

  update(id: string, patch: Partial<InvoiceInput>): Promise<Invoice> {
    return persist('invoice', 'update', async () => {
      const doc = await this.invoiceModel.findById(id).exec();
      if (!doc) {
        throw notFound('invoice', id);
      }

      const { items, ...fields } = patch;
      doc.set(fields);
      if (items) {
        doc.set({ items: priceInvoiceItems(items) });
      }

      return toInvoice(await doc.save());
    });
  }

  nextCode(): Promise<string> {
    return nextSequentialCode(
      'INV',
      3,
      () => this.invoiceModel.countDocuments().exec(),
      async (code) => (await this.invoiceModel.exists({ code })) !== null,
    );
  }

  nextNumber(): Promise<string> {
    return nextSequentialCode(
      'INV',
      6,
      () => this.invoiceModel.countDocuments().exec(),
      async (number) => (await this.invoiceModel.exists({ number })) !== null,
    );
  }
}

function toInvoice(doc: InvoiceDocument): Invoice {
  return {
    id: String(doc._id),
    code: doc.code,
    number: doc.number,
    customerId: doc.customerId,
    orderId: doc.orderId,
    issueDate: doc.issueDate,
    dueDate: doc.dueDate,
    status: doc.status,
    amount: doc.amount,
    paidAmount: doc.paidAmount,
    items: doc.items.map((item) => ({
      productId: item.productId,
      name: item.name,
      description: item.description,
      quantity: item.quantity,
      unitPrice: item.unitPrice,
      total: item.total,
    })),
    notes: doc.notes,
    updatedAt: doc.updatedAt,
  };
}
