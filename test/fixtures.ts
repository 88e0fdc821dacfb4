import {
  DEFAULT_INTERVALS,
  IntegrationConfig,
} from '../src/integrations/integration.types';
import {
  CustomerInput,
  InvoiceInput,
  OrderInput,
  ProductInput,
} from '../src/rental/rental.types';

export function productInput(overrides: Partial<ProductInput> = {}): ProductInput {
  return {
    code: 'PRD-001',
    name: 'Folding chair',
    sku: 'CHAIR-01',
    category: 'Furniture',
    description: 'White folding chair',
    rentalPrice: 2.5,
    replacementValue: 30,
    stock: 100,
    availableForRent: 100,
    status: 'active',
    ...overrides,
  };
}

export function customerInput(overrides: Partial<CustomerInput> = {}): CustomerInput {
  return {
    username: 'ada',
    firstName: 'Ada',
    lastName: 'Lovelace',
    email: 'ada@example.com',
    phone: '555-0100',
    address: '12 Analytical St',
    role: 'customer',
    status: 'active',
    ...overrides,
  };
}

export function orderInput(
  customerId: string,
  productId: string,
  overrides: Partial<OrderInput> = {},
): OrderInput {
  return {
    code: 'ORD-001',
    customerId,
    orderDate: new Date(Date.UTC(2024, 2, 1, 10, 30, 0)),
    status: 'confirmed',
    items: [{ productId, name: 'Folding chair', quantity: 10, price: 2.5 }],
    tax: 4,
    deliveryFee: 15,
    paymentStatus: 'pending',
    notes: 'Deliver to the garden',
    ...overrides,
  };
}

export function invoiceInput(
  customerId: string,
  overrides: Partial<InvoiceInput> = {},
): InvoiceInput {
  return {
    code: 'INV-001',
    number: 'INV-000001',
    customerId,
    orderId: null,
    issueDate: new Date(Date.UTC(2024, 2, 2)),
    dueDate: new Date(Date.UTC(2024, 3, 1)),
    status: 'sent',
    amount: 44,
    paidAmount: 0,
    items: [
      {
        productId: null,
        name: 'Chair rental',
        description: 'Chair rental, 10 units',
        quantity: 10,
        unitPrice: 2.5,
      },
    ],
    notes: '',
    ...overrides,
  };
}

export function integrationConfig(version = '16.0'): IntegrationConfig {
  return {
    id: 'integration-1',
    name: 'Main Odoo',
    active: true,
    connection: {
      url: 'http://odoo.test',
      database: 'rental',
      username: 'admin',
      apiKey: 'test-secret',
      companyId: 1,
      version,
    },
    enabled: { customer: true, product: true, order: true, invoice: true },
    intervals: { ...DEFAULT_INTERVALS },
    watermarks: { customer: null, product: null, order: null, invoice: null },
  };
}
