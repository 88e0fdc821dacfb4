export const PRODUCT_STATUSES = ['active', 'inactive', 'discontinued'] as const;
export type ProductStatus = (typeof PRODUCT_STATUSES)[number];

export const ORDER_STATUSES = [
  'pending',
  'confirmed',
  'in_progress',
  'completed',
  'cancelled',
] as const;
export type OrderStatus = (typeof ORDER_STATUSES)[number];

export const PAYMENT_STATUSES = ['pending', 'paid', 'refunded', 'failed'] as const;
export type PaymentStatus = (typeof PAYMENT_STATUSES)[number];

export const INVOICE_STATUSES = [
  'draft',
  'sent',
  'paid',
  'partial',
  'overdue',
  'cancelled',
  'refunded',
] as const;
export type InvoiceStatus = (typeof INVOICE_STATUSES)[number];

export interface Product {
  id: string;
  code: string;
  name: string;
  sku: string;
  category: string;
  description: string;
  rentalPrice: number;
  replacementValue: number;
  stock: number;
  availableForRent: number;
  status: ProductStatus;
  updatedAt: Date;
}

export interface Customer {
  id: string;
  username: string;
  firstName: string;
  lastName: string;
  email: string;
  phone: string;
  address: string;
  role: 'customer';
  status: 'active' | 'inactive';
  updatedAt: Date;
}

export interface OrderItem {
  productId: string;
  name: string;
  quantity: number;
  price: number;
  subtotal: number;
}

export interface Order {
  id: string;
  code: string;
  customerId: string;
  orderDate: Date;
  status: OrderStatus;
  items: OrderItem[];
  subtotal: number;
  tax: number;
  deliveryFee: number;
  totalAmount: number;
  paymentStatus: PaymentStatus;
  notes: string;
  updatedAt: Date;
}

export interface InvoiceItem {
  productId: string | null;
  name: string;
  description: string;
  quantity: number;
  unitPrice: number;
  total: number;
}

export interface Invoice {
  id: string;
  code: string;
  number: string;
  customerId: string;
  orderId: string | null;
  issueDate: Date;
  dueDate: Date;
  status: InvoiceStatus;
  amount: number;
  paidAmount: number;
  items: InvoiceItem[];
  notes: string;
  updatedAt: Date;
}

export type ProductInput = Omit<Product, 'id' | 'updatedAt'>;
export type CustomerInput = Omit<Customer, 'id' | 'updatedAt'>;

export type OrderItemInput = Omit<OrderItem, 'subtotal'>;
export type OrderInput = Omit<
  Order,
  'id' | 'updatedAt' | 'items' | 'subtotal' | 'totalAmount'
> & { items: OrderItemInput[] };

export type InvoiceItemInput = Omit<InvoiceItem, 'total'>;
export type InvoiceInput = Omit<Invoice, 'id' | 'updatedAt' | 'items'> & {
  items: InvoiceItemInput[];
};

export function roundMoney(value: number): number {
  return Math.round(value * 100) / 100;
}

/** Order amounts always derive from the items; callers never set them directly. */
export function priceOrderItems(
  items: OrderItemInput[],
  tax: number,
  deliveryFee: number,
): Pick<Order, 'items' | 'subtotal' | 'totalAmount'> {
  const priced = items.map((item) => ({
    ...item,
    subtotal: roundMoney(item.quantity * item.price),
  }));
  const subtotal = roundMoney(
    priced.reduce((sum, item) => sum + item.subtotal, 0),
  );
  return {
    items: priced,
    subtotal,
    totalAmount: roundMoney(subtotal + tax + deliveryFee),
  };
}

export function priceInvoiceItems(items: InvoiceItemInput[]): InvoiceItem[] {
  return items.map((item) => ({
    ...item,
    total: roundMoney(item.quantity * item.unitPrice),
  }));
}

/** PRD-001, ORD-014, ... skipping codes that are already taken. */
export async function nextSequentialCode(
  prefix: string,
  width: number,
  count: () => Promise<number>,
  exists: (code: string) => Promise<boolean>,
): Promise<string> {
  let sequence = (await count()) + 1;
  let code = `${prefix}-${String(sequence).padStart(width, '0')}`;
  while (await exists(code)) {
    sequence += 1;
    code = `${prefix}-${String(sequence).padStart(width, '0')}`;
  }
  return code;
}
