import { carriesPatch } from './local-changes';

describe('carriesPatch', () => {
  const order = {
    id: 'order-1',
    orderDate: new Date(Date.UTC(2024, 2, 1, 10, 30)),
    status: 'confirmed',
    notes: '',
    items: [
      { productId: 'product-1', name: 'Folding chair', quantity: 10, price: 2.5, subtotal: 25 },
    ],
  };

  it('accepts a patch whose values the record already has', () => {
    expect(
      carriesPatch(order, {
        orderDate: new Date(Date.UTC(2024, 2, 1, 10, 30)),
        status: 'confirmed',
        items: [{ productId: 'product-1', name: 'Folding chair', quantity: 10, price: 2.5 }],
      }),
    ).toBe(true);
  });

  it('ignores keys the patch leaves undefined', () => {
    expect(carriesPatch(order, { notes: '', status: undefined })).toBe(true);
  });

  it('spots a changed scalar or date', () => {
    expect(carriesPatch(order, { status: 'cancelled' })).toBe(false);
    expect(carriesPatch(order, { orderDate: new Date(Date.UTC(2024, 2, 2)) })).toBe(false);
  });

  it('spots a changed, added or removed line', () => {
    const line = { productId: 'product-1', name: 'Folding chair', quantity: 10, price: 2.5 };

    expect(carriesPatch(order, { items: [{ ...line, quantity: 12 }] })).toBe(false);
    expect(carriesPatch(order, { items: [line, line] })).toBe(false);
    expect(carriesPatch(order, { items: [] })).toBe(false);
  });

  it('treats null as a value of its own', () => {
    expect(carriesPatch({ orderId: 'order-1' }, { orderId: null })).toBe(false);
    expect(carriesPatch({ orderId: null }, { orderId: null })).toBe(true);
  });
});
