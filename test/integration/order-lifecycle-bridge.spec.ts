import {
  BridgeOutcomeStatus,
  HostedCheckoutClient,
  HttpRequest,
  HttpResponse,
  HttpTransport,
  OrderLifecycleBridge,
  OrderStatus,
  SignatureVerifier,
  TEST_API_BASE_URL,
  WebhookProcessor,
  WebhookReconciler,
} from '../../src';
import {
  InMemoryOrderStore,
  InMemorySubscriptionGateway,
  MockHttpTransport,
  PaymentEventFactory,
  TEST_HMAC_SECRET,
  createTestOrder,
} from '../../src/testing';

function createLogger() {
  return { log: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() };
}

describe('OrderLifecycleBridge', () => {
  let orderStore: InMemoryOrderStore;
  let transport: MockHttpTransport;
  let subscriptions: InMemorySubscriptionGateway;
  let logger: ReturnType<typeof createLogger>;
  let bridge: OrderLifecycleBridge;

  const createClient = (httpTransport: HttpTransport) =>
    new HostedCheckoutClient(
      {
        apiKey: 'test-api-key',
        terminalIdentifier: 'term-1',
        tokenTerminalIdentifier: '',
        themeKey: '',
        manualCapture: true,
        sendItems: false,
        checkoutExpiryHours: 24,
        testMode: true,
        productionUrl: '',
      },
      httpTransport,
      logger,
    );

  const statusNote = (from: string, to: string, label: string) =>
    `Status changed by the merchant; sending ${label} to the processor.\nOrder status changed from ${from} to ${to}.`;

  const notesOf = async (orderId: number) =>
    ((await orderStore.findOrder(orderId))?.notes ?? []).map((n) => n.message);

  beforeEach(async () => {
    orderStore = new InMemoryOrderStore();
    transport = new MockHttpTransport();
    subscriptions = new InMemorySubscriptionGateway();
    logger = createLogger();
    bridge = new OrderLifecycleBridge(
      orderStore,
      createClient(transport),
      subscriptions,
      undefined,
      logger,
    );

    await orderStore.saveOrder(
      createTestOrder({
        status: OrderStatus.ON_HOLD,
        paymentState: { payfacReference: 'P1', isManualCapture: true },
      }),
    );
  });

  describe('capture', () => {
    it('requests capture of the order total', async () => {
      const outcome = await bridge.handleStatusTransition(
        42,
        OrderStatus.ON_HOLD,
        OrderStatus.PROCESSING,
      );

      expect(outcome).toEqual({
        orderId: 42,
        command: 'capture',
        status: BridgeOutcomeStatus.REQUESTED,
      });
      expect(transport.lastRequest()?.url).toBe(
        `${TEST_API_BASE_URL}modification/capture`,
      );
      expect(transport.bodyOf(0)).toEqual({
        reference: '42',
        payfacReference: 'P1',
        amount: 150000,
        currency: 'ISK',
      });
      expect(await notesOf(42)).toEqual([
        statusNote('on-hold', 'processing', 'capture'),
        'Capture of 1.500 ISK requested. Reference: P1.',
      ]);
      expect((await orderStore.findOrder(42))?.status).toBe(
        OrderStatus.PROCESSING,
      );
    });

    it('notes a capture the processor refused', async () => {
      transport.respondWith(422, { error: 'invalid state' });

      const outcome = await bridge.handleStatusTransition(
        42,
        OrderStatus.ON_HOLD,
        OrderStatus.COMPLETED,
      );

      expect(outcome.status).toBe(BridgeOutcomeStatus.FAILED);
      expect(await notesOf(42)).toEqual([
        statusNote('on-hold', 'completed', 'capture'),
        'Capture of 1.500 ISK failed. Reference: P1.',
      ]);
      expect(logger.error).toHaveBeenCalledWith(
        'Processor rejected capture for order 42',
      );
    });

    it('holds no order lock while the processor is called', async () => {
      const interleaving: HttpTransport = {
        send: async (_request: HttpRequest): Promise<HttpResponse> => {
          await orderStore.withOrderLock(42, (order) => {
            order.addNote('Written during the processor call.');
          });
          return { status: 200, body: '{"status":"received"}' };
        },
      };
      const interleavingBridge = new OrderLifecycleBridge(
        orderStore,
        createClient(interleaving),
        undefined,
        undefined,
        logger,
      );

      await interleavingBridge.handleStatusTransition(
        42,
        OrderStatus.ON_HOLD,
        OrderStatus.PROCESSING,
      );

      expect(await notesOf(42)).toEqual([
        statusNote('on-hold', 'processing', 'capture'),
        'Written during the processor call.',
        'Capture of 1.500 ISK requested. Reference: P1.',
      ]);
    });
  });

  describe('cancellation', () => {
    it('reverses the authorization and flags the order', async () => {
      transport.respondWith(200, { status: 'received' });

      const outcome = await bridge.handleStatusTransition(
        42,
        OrderStatus.ON_HOLD,
        OrderStatus.CANCELLED,
      );

      expect(outcome.status).toBe(BridgeOutcomeStatus.REQUESTED);
      expect(outcome.command).toBe('reverse');
      expect(transport.lastRequest()?.url).toBe(
        `${TEST_API_BASE_URL}modification/reverse`,
      );
      expect(await notesOf(42)).toEqual([
        statusNote('on-hold', 'cancelled', 'cancel'),
        'Cancellation requested. Reference: P1.',
      ]);
      expect(
        (await orderStore.findOrder(42))?.paymentState.cancelRequested,
      ).toBe(true);
    });

    it('keeps the flag raised when the reverse is rejected', async () => {
      const outcome = await bridge.handleStatusTransition(
        42,
        OrderStatus.ON_HOLD,
        OrderStatus.CANCELLED,
      );

      expect(outcome.status).toBe(BridgeOutcomeStatus.FAILED);
      expect(await notesOf(42)).toEqual([
        statusNote('on-hold', 'cancelled', 'cancel'),
        'Cancellation request failed. Reference: P1.',
      ]);
      expect(
        (await orderStore.findOrder(42))?.paymentState.cancelRequested,
      ).toBe(true);
    });

    it('is confirmed by the following refund notification', async () => {
      transport.respondWith(200, { status: 'received' });
      await bridge.handleStatusTransition(
        42,
        OrderStatus.ON_HOLD,
        OrderStatus.CANCELLED,
      );

      const processor = new WebhookProcessor({
        orderStore,
        signatureVerifier: new SignatureVerifier(TEST_HMAC_SECRET),
        reconciler: new WebhookReconciler(
          { completeOnPayment: false },
          subscriptions,
          undefined,
          logger,
        ),
        logger,
      });
      await processor.processWebhook(PaymentEventFactory.refund().body);

      const order = await orderStore.findOrder(42);
      expect(order?.paymentState.cancelRequested).toBe(false);
      expect(order?.status).toBe(OrderStatus.CANCELLED);
      expect(order?.notes.map((n) => n.message)).toEqual([
        statusNote('on-hold', 'cancelled', 'cancel'),
        'Cancellation requested. Reference: P1.',
        'Cancellation confirmed. Reference: P3.',
      ]);
    });
  });

  describe('refund', () => {
    beforeEach(async () => {
      await orderStore.saveOrder(
        createTestOrder({
          status: OrderStatus.PROCESSING,
          paymentState: { payfacReference: 'P1' },
        }),
      );
      subscriptions.linkSubscription(42, 'sub-1');
      subscriptions.linkSubscription(42, 'sub-2');
      await subscriptions.cancelSubscription('sub-2', 'Cancelled by shopper.');
    });

    it('refunds and cancels linked subscriptions', async () => {
      transport.respondWith(200, { status: 'received' });

      const outcome = await bridge.handleStatusTransition(
        42,
        OrderStatus.PROCESSING,
        OrderStatus.REFUNDED,
      );

      expect(outcome).toEqual({
        orderId: 42,
        command: 'refund',
        status: BridgeOutcomeStatus.REQUESTED,
        cancelledSubscriptions: ['sub-1'],
      });
      expect(transport.lastRequest()?.url).toBe(
        `${TEST_API_BASE_URL}modification/refund`,
      );
      expect(await notesOf(42)).toEqual([
        statusNote('processing', 'refunded', 'refund'),
        'Refund of 1.500 ISK requested. Reference: P1.',
        'Subscription sub-1 cancelled after refund.',
        'Subscription sub-2 could not be cancelled.',
      ]);
      expect(subscriptions.getSubscription('sub-1')).toMatchObject({
        status: 'cancelled',
        notes: ['Cancelled after refund of order 42.'],
      });
      expect(
        (await orderStore.findOrder(42))?.paymentState.refundRequested,
      ).toBe(true);
    });

    it('cancels nothing when the refund fails', async () => {
      transport.failWith(new Error('timeout'));

      const outcome = await bridge.handleStatusTransition(
        42,
        OrderStatus.PROCESSING,
        OrderStatus.REFUNDED,
      );

      expect(outcome.status).toBe(BridgeOutcomeStatus.FAILED);
      expect(await notesOf(42)).toEqual([
        statusNote('processing', 'refunded', 'refund'),
        'Refund of 1.500 ISK failed. Reference: P1.',
      ]);
      expect(subscriptions.getSubscription('sub-1')?.status).toBe('active');
    });

    it('sends a replayed refund notification only once', async () => {
      transport.setDefault(200, { status: 'received' });

      const first = await bridge.handleStatusTransition(
        42,
        OrderStatus.PROCESSING,
        OrderStatus.REFUNDED,
      );
      const second = await bridge.handleStatusTransition(
        42,
        OrderStatus.PROCESSING,
        OrderStatus.REFUNDED,
      );

      expect(first.status).toBe(BridgeOutcomeStatus.REQUESTED);
      expect(second).toEqual({
        orderId: 42,
        command: 'refund',
        status: BridgeOutcomeStatus.STALE,
      });
      expect(
        transport.requests.filter((request) =>
          request.url.endsWith('modification/refund'),
        ),
      ).toHaveLength(1);
      expect((await orderStore.findOrder(42))?.status).toBe(
        OrderStatus.REFUNDED,
      );
    });

    it('notes a subscription lookup that fails after the refund', async () => {
      transport.respondWith(200, { status: 'received' });
      const failing = new OrderLifecycleBridge(
        orderStore,
        createClient(transport),
        {
          savePaymentToken: async () => undefined,
          findSubscriptionsForOrder: async () => {
            throw new Error('subscriptions offline');
          },
          cancelSubscription: async () => true,
        },
        undefined,
        logger,
      );

      const outcome = await failing.handleStatusTransition(
        42,
        OrderStatus.PROCESSING,
        OrderStatus.REFUNDED,
      );

      expect(outcome).toEqual({
        orderId: 42,
        command: 'refund',
        status: BridgeOutcomeStatus.REQUESTED,
        cancelledSubscriptions: [],
      });
      expect(await notesOf(42)).toEqual([
        statusNote('processing', 'refunded', 'refund'),
        'Refund of 1.500 ISK requested. Reference: P1.',
        'Linked subscriptions could not be cancelled: subscriptions offline.',
      ]);
    });

    it('notes a subscription the gateway fails to cancel', async () => {
      transport.respondWith(200, { status: 'received' });
      const failing = new OrderLifecycleBridge(
        orderStore,
        createClient(transport),
        {
          savePaymentToken: async () => undefined,
          findSubscriptionsForOrder: async () => [
            { id: 'sub-1', status: 'active' },
          ],
          cancelSubscription: async () => {
            throw new Error('gateway down');
          },
        },
        undefined,
        logger,
      );

      const outcome = await failing.handleStatusTransition(
        42,
        OrderStatus.PROCESSING,
        OrderStatus.REFUNDED,
      );

      expect(outcome.cancelledSubscriptions).toEqual([]);
      expect(await notesOf(42)).toEqual([
        statusNote('processing', 'refunded', 'refund'),
        'Refund of 1.500 ISK requested. Reference: P1.',
        'Subscription sub-1 could not be cancelled.',
      ]);
      expect(logger.error).toHaveBeenCalledWith(
        'Cancelling subscription sub-1 failed: gateway down',
      );
    });
  });

  describe('without a processor reference', () => {
    beforeEach(async () => {
      await orderStore.saveOrder(
        createTestOrder({ status: OrderStatus.ON_HOLD }),
      );
    });

    it.each([
      [OrderStatus.PROCESSING, 'capture', 'capture'],
      [OrderStatus.CANCELLED, 'reverse', 'cancel'],
    ])('does not send a %s request', async (to, command, label) => {
      const outcome = await bridge.handleStatusTransition(
        42,
        OrderStatus.ON_HOLD,
        to,
      );

      expect(outcome).toEqual({
        orderId: 42,
        command,
        status: BridgeOutcomeStatus.MISSING_REFERENCE,
      });
      expect(transport.requests).toHaveLength(0);
      expect(await notesOf(42)).toEqual([
        `Unable to ${label} the payment: no processor reference is recorded on this order.\nOrder status changed from on-hold to ${to}.`,
      ]);
    });
  });

  it('sends nothing when the stored status is not the reported origin', async () => {
    await orderStore.saveOrder(
      createTestOrder({
        status: OrderStatus.COMPLETED,
        paymentState: { payfacReference: 'P1' },
      }),
    );

    const outcome = await bridge.handleStatusTransition(
      42,
      OrderStatus.ON_HOLD,
      OrderStatus.PROCESSING,
    );

    expect(outcome).toEqual({
      orderId: 42,
      command: 'capture',
      status: BridgeOutcomeStatus.STALE,
    });
    expect(transport.requests).toHaveLength(0);
    expect(await notesOf(42)).toEqual([]);
    expect((await orderStore.findOrder(42))?.status).toBe(OrderStatus.COMPLETED);
  });

  it('ignores status changes that need no processor command', async () => {
    const outcome = await bridge.handleStatusTransition(
      42,
      OrderStatus.PENDING,
      OrderStatus.PROCESSING,
    );

    expect(outcome).toEqual({ orderId: 42, status: BridgeOutcomeStatus.IGNORED });
    expect(transport.requests).toHaveLength(0);
    expect(await notesOf(42)).toEqual([]);
  });

  it('reports an unknown order', async () => {
    const outcome = await bridge.handleStatusTransition(
      99,
      OrderStatus.ON_HOLD,
      OrderStatus.PROCESSING,
    );

    expect(outcome).toEqual({
      orderId: 99,
      command: 'capture',
      status: BridgeOutcomeStatus.UNKNOWN_ORDER,
    });
    expect(transport.requests).toHaveLength(0);
  });
});
