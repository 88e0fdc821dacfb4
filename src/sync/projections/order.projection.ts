import type { IntegrationConfig } from '../../integrations/integration.types';
import { OdooRecord } from '../../odoo/interfaces/odoo.interface';
import { Order, OrderItem } from '../../rental/rental.types';
import {
  parseOdooDate,
  readNumber,
  readOptionalString,
  readString,
  requireMany2One,
  toOdooDateTime,
} from '../odoo-fields';
import { SaleOrderState, toSaleOrderState } from '../status-translation';

export const SALE_ORDER = 'sale.order';
export const SALE_ORDER_LINE = 'sale.order.line';

export type SaleOrderValues = {
  partner_id: number;
  date_order: string;
  state: SaleOrderState;
  client_order_ref: string;
  company_id: number;
  x_backoffice_id: string;
  x_backoffice_code: string;
  note: string;
};

export type SaleOrderLineValues = {
  order_id: number;
  product_id: number;
  name: string;
  product_uom_qty: number;
  price_unit: number;
};

export const SALE_ORDER_FIELDS = [
  'id',
  'name',
  'partner_id',
  'date_order',
  'state',
  'client_order_ref',
  'note',
  'x_backoffice_id',
  'write_date',
];

export const SALE_ORDER_LINE_FIELDS = [
  'id',
  'product_id',
  'name',
  'product_uom_qty',
  'price_unit',
];

export interface RemoteOrder {
  id: number;
  name: string;
  partnerId: number;
  dateOrder: Date;
  state: string;
  clientOrderRef: string | null;
  note: string;
  backofficeId: string | null;
}

export interface RemoteOrderLine {
  id: number;
  variantId: number;
  name: string;
  quantity: number;
  priceUnit: number;
}

export function toSaleOrder(
  order: Order,
  partnerId: number,
  integration: IntegrationConfig,
): SaleOrderValues {
  return {
    partner_id: partnerId,
    date_order: toOdooDateTime(order.orderDate),
    state: toSaleOrderState(order.status),
    client_order_ref: order.code,
    company_id: integration.connection.companyId,
    x_backoffice_id: order.id,
    x_backoffice_code: order.code,
    note: order.notes,
  };
}

export function toSaleOrderLine(
  item: OrderItem,
  orderId: number,
  variantId: number,
): SaleOrderLineValues {
  return {
    order_id: orderId,
    product_id: variantId,
    name: item.name,
    product_uom_qty: item.quantity,
    price_unit: item.price,
  };
}

export function readSaleOrder(record: OdooRecord): RemoteOrder {
  const dateOrder = readOptionalString(record, 'date_order');
  return {
    id: record.id,
    name: readString(record, 'name'),
    partnerId: requireMany2One(record, 'partner_id'),
    dateOrder: dateOrder === null ? new Date() : parseOdooDate(dateOrder),
    state: readString(record, 'state'),
    clientOrderRef: readOptionalString(record, 'client_order_ref'),
    note: readString(record, 'note'),
    backofficeId: readOptionalString(record, 'x_backoffice_id'),
  };
}

export function readSaleOrderLine(record: OdooRecord): RemoteOrderLine {
  return {
    id: record.id,
    variantId: requireMany2One(record, 'product_id'),
    name: readString(record, 'name'),
    quantity: readNumber(record, 'product_uom_qty'),
    priceUnit: readNumber(record, 'price_unit'),
  };
}
