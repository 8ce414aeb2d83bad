import { Order, OrderStatus } from '../../src';
import { createTestOrder } from '../../src/testing';

describe('Order', () => {
  it('writes one note carrying the status change', () => {
    const order = createTestOrder();

    expect(order.updateStatus(OrderStatus.PROCESSING, 'Paid.')).toBe(true);
    expect(order.status).toBe(OrderStatus.PROCESSING);
    expect(order.notes.map((n) => n.message)).toEqual([
      'Paid.\nOrder status changed from pending to processing.',
    ]);
  });

  it('still notes a move to the current status', () => {
    const order = createTestOrder({ status: OrderStatus.ON_HOLD });

    expect(order.updateStatus(OrderStatus.ON_HOLD, 'Authorized.')).toBe(false);
    expect(order.notes.map((n) => n.message)).toEqual(['Authorized.']);
  });

  it('considers processing and completed paid', () => {
    expect(createTestOrder({ status: OrderStatus.PROCESSING }).isPaid()).toBe(
      true,
    );
    expect(createTestOrder({ status: OrderStatus.COMPLETED }).isPaid()).toBe(
      true,
    );
    expect(createTestOrder({ status: OrderStatus.ON_HOLD }).isPaid()).toBe(
      false,
    );
  });

  it('survives a snapshot round trip', () => {
    const order = createTestOrder({
      lines: [{ name: 'Mug', total: 150000 }],
      paymentState: { payfacReference: 'P1' },
    });
    order.paymentState.recordEvent('P1:authorization::150000', { a: 1 });
    order.addNote('hello');

    const copy = Order.fromSnapshot(order.toSnapshot());

    expect(copy.total).toBe(150000);
    expect(copy.currency).toBe('ISK');
    expect(copy.lines).toEqual([{ name: 'Mug', total: 150000 }]);
    expect(copy.notes[0]?.message).toBe('hello');
    expect(copy.paymentState.payfacReference).toBe('P1');
    expect(
      copy.paymentState.processedEventKeys.has('P1:authorization::150000'),
    ).toBe(true);
    expect(copy.paymentState.hasProcessorReference()).toBe(true);
  });
});
