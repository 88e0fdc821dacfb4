import {
  IntegrationConfig,
  odooMajorVersion,
} from '../../integrations/integration.types';
import { OdooCondition, OdooRecord } from '../../odoo/interfaces/odoo.interface';
import { Invoice, InvoiceItem, roundMoney } from '../../rental/rental.types';
import {
  parseOdooDate,
  readMany2One,
  readNumber,
  readOptionalString,
  readString,
  requireMany2One,
  toOdooDate,
} from '../odoo-fields';
import { MoveState, toMoveState } from '../status-translation';

export const ACCOUNT_MOVE = 'account.move';
export const ACCOUNT_MOVE_LINE = 'account.move.line';
export const CUSTOMER_INVOICE = 'out_invoice';

const DEFAULT_PAYMENT_TERM_DAYS = 30;
const DAY_MS = 24 * 60 * 60 * 1000;

export type AccountMoveValues = {
  partner_id: number;
  invoice_date: string;
  invoice_date_due: string;
  state: MoveState;
  ref: string;
  name: string;
  company_id: number;
  x_backoffice_id: string;
  x_backoffice_code: string;
  narration: string;
  invoice_origin?: string;
};

/** Marks a line as a product line; the field changed in Odoo 16. */
type ProductLineFlag =
  | { exclude_from_invoice_tab: false }
  | { display_type: 'product' };

export type AccountMoveLineValues = {
  move_id: number;
  name: string;
  quantity: number;
  price_unit: number;
  product_id?: number;
} & ProductLineFlag;

export const ACCOUNT_MOVE_FIELDS = [
  'id',
  'name',
  'partner_id',
  'invoice_date',
  'invoice_date_due',
  'state',
  'payment_state',
  'ref',
  'narration',
  'amount_total',
  'amount_residual',
  'invoice_origin',
  'x_backoffice_id',
  'write_date',
];

export const ACCOUNT_MOVE_LINE_FIELDS = [
  'id',
  'name',
  'quantity',
  'price_unit',
  'product_id',
];

export interface RemoteInvoice {
  id: number;
  name: string | null;
  partnerId: number;
  invoiceDate: Date;
  invoiceDateDue: Date;
  state: string;
  paymentState: string;
  ref: string | null;
  narration: string;
  amountTotal: number;
  paidAmount: number;
  invoiceOrigin: string | null;
  backofficeId: string | null;
}

export interface RemoteInvoiceLine {
  id: number;
  name: string;
  quantity: number;
  priceUnit: number;
  variantId: number | null;
}

function usesDisplayType(integration: IntegrationConfig): boolean {
  return odooMajorVersion(integration.connection.version) >= 16;
}

/** Domain condition selecting the product lines of a move. */
export function productLineCondition(integration: IntegrationConfig): OdooCondition {
  return usesDisplayType(integration)
    ? ['display_type', '=', 'product']
    : ['exclude_from_invoice_tab', '=', false];
}

export function toAccountMove(
  invoice: Invoice,
  partnerId: number,
  orderCode: string | null,
  integration: IntegrationConfig,
): AccountMoveValues {
  const values: AccountMoveValues = {
    partner_id: partnerId,
    invoice_date: toOdooDate(invoice.issueDate),
    invoice_date_due: toOdooDate(invoice.dueDate),
    state: toMoveState(invoice.status),
    ref: invoice.code,
    name: invoice.number,
    company_id: integration.connection.companyId,
    x_backoffice_id: invoice.id,
    x_backoffice_code: invoice.code,
    narration: invoice.notes,
  };
  if (orderCode !== null) {
    values.invoice_origin = orderCode;
  }
  return values;
}

export function toAccountMoveLine(
  item: InvoiceItem,
  moveId: number,
  variantId: number | null,
  integration: IntegrationConfig,
): AccountMoveLineValues {
  const flag: ProductLineFlag = usesDisplayType(integration)
    ? { display_type: 'product' }
    : { exclude_from_invoice_tab: false };

  const values: AccountMoveLineValues = {
    move_id: moveId,
    name: item.description || item.name,
    quantity: item.quantity,
    price_unit: item.unitPrice,
    ...flag,
  };
  if (variantId !== null) {
    values.product_id = variantId;
  }
  return values;
}

export function readAccountMove(record: OdooRecord): RemoteInvoice {
  const invoiceDate = readOptionalString(record, 'invoice_date');
  const issued = invoiceDate === null ? new Date() : parseOdooDate(invoiceDate);
  const dueDate = readOptionalString(record, 'invoice_date_due');
  const amountTotal = readNumber(record, 'amount_total');
  const name = readOptionalString(record, 'name');

  return {
    id: record.id,
    name: name === '/' ? null : name,
    partnerId: requireMany2One(record, 'partner_id'),
    invoiceDate: issued,
    invoiceDateDue:
      dueDate === null
        ? new Date(issued.getTime() + DEFAULT_PAYMENT_TERM_DAYS * DAY_MS)
        : parseOdooDate(dueDate),
    state: readString(record, 'state'),
    paymentState: readString(record, 'payment_state'),
    ref: readOptionalString(record, 'ref'),
    narration: readString(record, 'narration'),
    amountTotal,
    paidAmount: roundMoney(amountTotal - readNumber(record, 'amount_residual')),
    invoiceOrigin: readOptionalString(record, 'invoice_origin'),
    backofficeId: readOptionalString(record, 'x_backoffice_id'),
  };
}

export function readAccountMoveLine(record: OdooRecord): RemoteInvoiceLine {
  return {
    id: record.id,
    name: readString(record, 'name'),
    quantity: readNumber(record, 'quantity'),
    priceUnit: readNumber(record, 'price_unit'),
    variantId: readMany2One(record, 'product_id'),
  };
}
