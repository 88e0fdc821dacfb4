import { InvoiceStatus, OrderStatus } from '../rental/rental.types';

export const SALE_ORDER_STATES = ['draft', 'sent', 'sale', 'done', 'cancel'] as const;
export type SaleOrderState = (typeof SALE_ORDER_STATES)[number];

export const MOVE_STATES = ['draft', 'posted', 'cancel'] as const;
export type MoveState = (typeof MOVE_STATES)[number];

export const PAYMENT_STATES = [
  'not_paid',
  'in_payment',
  'paid',
  'partial',
  'reversed',
  'invoicing_legacy',
] as const;
export type PaymentState = (typeof PAYMENT_STATES)[number];

const ORDER_STATE_BY_STATUS: Record<OrderStatus, SaleOrderState> = {
  pending: 'draft',
  confirmed: 'sent',
  in_progress: 'sale',
  completed: 'done',
  cancelled: 'cancel',
};

const ORDER_STATUS_BY_STATE: Record<SaleOrderState, OrderStatus> = {
  draft: 'pending',
  sent: 'confirmed',
  sale: 'in_progress',
  done: 'completed',
  cancel: 'cancelled',
};

const MOVE_STATE_BY_STATUS: Record<InvoiceStatus, MoveState> = {
  draft: 'draft',
  sent: 'posted',
  paid: 'posted',
  partial: 'posted',
  overdue: 'posted',
  refunded: 'posted',
  cancelled: 'cancel',
};

const POSTED_STATUS_BY_PAYMENT: Record<PaymentState, InvoiceStatus> = {
  not_paid: 'sent',
  in_payment: 'paid',
  paid: 'paid',
  partial: 'partial',
  reversed: 'refunded',
  invoicing_legacy: 'sent',
};

function isOneOf<T extends string>(values: readonly T[], value: string): value is T {
  return values.some((candidate) => candidate === value);
}

export function toSaleOrderState(status: OrderStatus): SaleOrderState {
  return ORDER_STATE_BY_STATUS[status];
}

/** Unknown states import as `pending`. */
export function fromSaleOrderState(state: string): OrderStatus {
  return isOneOf(SALE_ORDER_STATES, state) ? ORDER_STATUS_BY_STATE[state] : 'pending';
}

export function toMoveState(status: InvoiceStatus): MoveState {
  return MOVE_STATE_BY_STATUS[status];
}

/** Posted moves take their status from the payment state; unknown states import as `draft`. */
export function fromMoveState(state: string, paymentState: string): InvoiceStatus {
  if (!isOneOf(MOVE_STATES, state) || state === 'draft') return 'draft';
  if (state === 'cancel') return 'cancelled';
  return isOneOf(PAYMENT_STATES, paymentState)
    ? POSTED_STATUS_BY_PAYMENT[paymentState]
    : 'sent';
}
