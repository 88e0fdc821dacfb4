import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import {
  CustomersRepository,
  InvoicesRepository,
  OrdersRepository,
  ProductsRepository,
} from './rental.repositories';
import { MongoCustomersRepository } from './repositories/mongo-customers.repository';
import { MongoInvoicesRepository } from './repositories/mongo-invoices.repository';
import { MongoOrdersRepository } from './repositories/mongo-orders.repository';
import { MongoProductsRepository } from './repositories/mongo-products.repository';
import { CustomerRecord, CustomerSchema } from './schemas/customer.schema';
import { InvoiceRecord, InvoiceSchema } from './schemas/invoice.schema';
import { OrderRecord, OrderSchema } from './schemas/order.schema';
import { ProductRecord, ProductSchema } from './schemas/product.schema';

@Module({
  imports: [
    MongooseModule.forFeature([
      { name: ProductRecord.name, schema: ProductSchema },
      { name: CustomerRecord.name, schema: CustomerSchema },
      { name: OrderRecord.name, schema: OrderSchema },
      { name: InvoiceRecord.name, schema: InvoiceSchema },
    ]),
  ],
  providers: [
    { provide: ProductsRepository, useClass: MongoProductsRepository },
    { provide: CustomersRepository, useClass: MongoCustomersRepository },
    { provide: OrdersRepository, useClass: MongoOrdersRepository },
    { provide: InvoicesRepository, useClass: MongoInvoicesRepository },
  ],
  exports: [
    ProductsRepository,
    CustomersRepository,
    OrdersRepository,
    InvoicesRepository,
  ],
})
export class RentalModule {}
