import { Injectable } from '@nestjs/common';
import { InjectModel } from '@nestjs/mongoose';
import { isValidObjectId, Model } from 'mongoose';
import { notFound, persist } from '../../common/mongo/persist';
import { CustomersRepository } from '../rental.repositories';
import { Customer, CustomerInput } from '../rental.types';
import { CustomerDocument, CustomerRecord } from '../schemas/customer.schema';

@Injectable()
export class MongoCustomersRepository extends CustomersRepository {
  constructor(
    @InjectModel(CustomerRecord.name)
    private customerModel: Model<CustomerRecord>,
  ) {
    super();
  }

  async findChangedSince(since: Date | null): Promise<Customer[]> {
    const docs = await this.customerModel
      .find({
        role: 'customer',
        ...(since ? { updatedAt: { $gt: since } } : {}),
      })
      .sort({ updatedAt: 1, _id: 1 })
      .exec();
    return docs.map(toCustomer);
  }

  async findById(id: string): Promise<Customer | null> {
    if (!isValidObjectId(id)) {
      return null;
    }
    const doc = await this.customerModel.findById(id).exec();
    return doc ? toCustomer(doc) : null;
  }

  async findByEmail(email: string): Promise<Customer | null> {
    const normalized = email.trim().toLowerCase();
    if (!normalized) {
      return null;
    }
    const doc = await this.customerModel.findOne({ email: normalized }).exec();
    return doc ? toCustomer(doc) : null;
  }

  async usernameExists(username: string): Promise<boolean> {
    return (await this.customerModel.exists({ username })) !== null;
  }

  create(input: CustomerInput): Promise<Customer> {
    return persist('customer', 'create', async () =>
      toCustomer(await this.customerModel.create(input)),
    );
  }

  update(id: string, patch: Partial<CustomerInput>): Promise<Customer> {
    return persist('customer', 'update', async () => {
      const doc = await this.customerModel
        .findByIdAndUpdate(id, { $set: patch }, { new: true, runValidators: true })
        .exec();
      if (!doc) {
        throw notFound('customer', id);
      }
      return toCustomer(doc);
    });
  }
}

function toCustomer(doc: CustomerDocument): Customer {
  return {
    id: String(doc._id),
    username: doc.username,
    firstName: doc.firstName,
    lastName: doc.lastName,
    email: doc.email,
    phone: doc.phone,
    address: doc.address,
    role: doc.role,
    status: doc.status,
    updatedAt: doc.updatedAt,
  };
}
