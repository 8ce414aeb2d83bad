import {
  Money,
  Order,
  OrderLine,
  OrderPaymentState,
  OrderStatus,
} from '../../core';

export interface OrderOptions {
  id?: number;
  reference?: string;
  status?: OrderStatus;
  total?: number;
  currency?: string;
  needsProcessing?: boolean;
  paymentState?: Partial<OrderPaymentState>;
  lines?: OrderLine[];
  shippingTotal?: number;
}

/**
 * Build an order for tests. Defaults to order 42, pending, 150000 ISK.
 */
export function createTestOrder(options: OrderOptions = {}): Order {
  const paymentState = new OrderPaymentState();
  Object.assign(paymentState, options.paymentState);

  return new Order(
    options.id ?? 42,
    options.reference ?? String(options.id ?? 42),
    options.status ?? OrderStatus.PENDING,
    new Money(options.total ?? 150000, options.currency ?? 'ISK'),
    options.needsProcessing ?? true,
    paymentState,
    [],
    options.lines ?? [],
    options.shippingTotal ?? 0,
  );
}
