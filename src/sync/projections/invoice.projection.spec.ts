import { integrationConfig } from '../../../test/fixtures';
import {
  productLineCondition,
  readAccountMove,
  toAccountMoveLine,
} from './invoice.projection';

describe('invoice projection', () => {
  const item = {
    productId: null,
    name: 'Chair rental',
    description: '',
    quantity: 4,
    unitPrice: 25,
    total: 100,
  };

  it('flags product lines with display_type from Odoo 16', () => {
    expect(toAccountMoveLine(item, 5, 9, integrationConfig('16.0'))).toEqual({
      move_id: 5,
      name: 'Chair rental',
      quantity: 4,
      price_unit: 25,
      product_id: 9,
      display_type: 'product',
    });
    expect(productLineCondition(integrationConfig('17.0'))).toEqual([
      'display_type',
      '=',
      'product',
    ]);
  });

  it('flags product lines with exclude_from_invoice_tab before Odoo 16', () => {
    expect(toAccountMoveLine(item, 5, null, integrationConfig('14.0'))).toEqual({
      move_id: 5,
      name: 'Chair rental',
      quantity: 4,
      price_unit: 25,
      exclude_from_invoice_tab: false,
    });
    expect(productLineCondition(integrationConfig('14.0'))).toEqual([
      'exclude_from_invoice_tab',
      '=',
      false,
    ]);
  });

  it('reads a draft move without a number or due date', () => {
    const move = readAccountMove({
      id: 30,
      name: '/',
      partner_id: [4, 'Ada Lovelace'],
      invoice_date: '2024-02-10',
      invoice_date_due: false,
      state: 'draft',
      payment_state: 'not_paid',
      amount_total: 80.1,
      amount_residual: 30.05,
      invoice_origin: false,
    });

    expect(move).toMatchObject({
      name: null,
      partnerId: 4,
      invoiceDate: new Date(Date.UTC(2024, 1, 10)),
      invoiceDateDue: new Date(Date.UTC(2024, 2, 11)),
      paidAmount: 50.05,
      invoiceOrigin: null,
      ref: null,
    });
  });
});
