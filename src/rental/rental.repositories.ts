import {
  Customer,
  CustomerInput,
  Invoice,
  InvoiceInput,
  Order,
  OrderInput,
  Product,
  ProductInput,
} from './rental.types';

/*
 * Persistence ports for the rental domain. Writes that break an entity's own
 * rules are rejected with LocalPersistenceError.
 */

export abstract class ProductsRepository {
  /** Every product when `since` is null, else those updated strictly after it. */
  abstract findChangedSince(since: Date | null): Promise<Product[]>;
  abstract findById(id: string): Promise<Product | null>;
  abstract create(input: ProductInput): Promise<Product>;
  abstract update(id: string, patch: Partial<ProductInput>): Promise<Product>;
  abstract nextCode(): Promise<string>;
}

export abstract class CustomersRepository {
  abstract findChangedSince(since: Date | null): Promise<Customer[]>;
  abstract findById(id: string): Promise<Customer | null>;
  abstract findByEmail(email: string): Promise<Customer | null>;
  abstract usernameExists(username: string): Promise<boolean>;
  abstract create(input: CustomerInput): Promise<Customer>;
  abstract update(id: string, patch: Partial<CustomerInput>): Promise<Customer>;
}

export abstract class OrdersRepository {
  abstract findChangedSince(since: Date | null): Promise<Order[]>;
  abstract findById(id: string): Promise<Order | null>;
  abstract findByCode(code: string): Promise<Order | null>;
  abstract create(input: OrderInput): Promise<Order>;
  /** Passing `items` replaces all of them and recomputes the totals. */
  abstract update(id: string, patch: Partial<OrderInput>): Promise<Order>;
  abstract nextCode(): Promise<string>;
}

export abstract class InvoicesRepository {
  abstract findChangedSince(since: Date | null): Promise<Invoice[]>;
  abstract findById(id: string): Promise<Invoice | null>;
  abstract create(input: InvoiceInput): Promise<Invoice>;
  /** Passing `items` replaces all of them. */
  abstract update(id: string, patch: Partial<InvoiceInput>): Promise<Invoice>;
  abstract nextCode(): Promise<string>;
  abstract nextNumber(): Promise<string>;
}
