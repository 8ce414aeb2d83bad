import {
  OrderStatus,
  OrderStore,
  PipelineError,
  ProcessingStatus,
  SignatureVerificationError,
  SignatureVerifier,
  WebhookFateEvent,
  WebhookProcessor,
  WebhookReconciler,
} from '../../src';
import {
  InMemoryOrderStore,
  PaymentEventFactory,
  TEST_HMAC_SECRET,
  createTestOrder,
} from '../../src/testing';

function createLogger() {
  return { log: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() };
}

describe('WebhookProcessor Integration Tests', () => {
  let orderStore: InMemoryOrderStore;
  let logger: ReturnType<typeof createLogger>;
  let reconciler: WebhookReconciler;
  let processor: WebhookProcessor;

  const createProcessor = (
    store: OrderStore,
    extra: Partial<ConstructorParameters<typeof WebhookProcessor>[0]> = {},
  ) =>
    new WebhookProcessor({
      orderStore: store,
      signatureVerifier: new SignatureVerifier(TEST_HMAC_SECRET),
      reconciler,
      logger,
      ...extra,
    });

  beforeEach(async () => {
    orderStore = new InMemoryOrderStore();
    logger = createLogger();
    reconciler = new WebhookReconciler(
      { completeOnPayment: false },
      undefined,
      undefined,
      logger,
    );
    processor = createProcessor(orderStore);

    await orderStore.saveOrder(createTestOrder());
  });

  afterEach(() => {
    orderStore.clear();
  });

  describe('End-to-End Processing', () => {
    it('applies a signed authorization to its order exactly once', async () => {
      const { body } = PaymentEventFactory.authorization();

      const result = await processor.processWebhook(body);

      expect(result.success).toBe(true);
      expect(result.processingStatus).toBe(ProcessingStatus.PROCESSED);
      expect(result.orderId).toBe(42);
      expect(result.eventKey).toBe('P1:authorization::150000');
      expect(result.metrics).toMatchObject({
        parsed: true,
        signatureVerified: true,
        normalized: true,
        reconciled: true,
      });

      const order = await orderStore.findOrder(42);
      expect(order?.status).toBe(OrderStatus.PROCESSING);
      expect(order?.notes).toHaveLength(1);
      expect(order?.notes[0]?.id).toBe(1);

      const redelivery = await processor.processWebhook(Buffer.from(body));

      expect(redelivery.processingStatus).toBe(ProcessingStatus.DUPLICATE);
      const afterRedelivery = await orderStore.findOrder(42);
      expect(afterRedelivery?.notes).toHaveLength(1);
      expect(afterRedelivery?.status).toBe(OrderStatus.PROCESSING);
    });

    it('applies concurrent deliveries of one event once', async () => {
      const slowStore = new InMemoryOrderStore({
        simulateLatency: true,
        latencyMs: 5,
      });
      await slowStore.saveOrder(createTestOrder());
      const slowProcessor = createProcessor(slowStore);
      const { body } = PaymentEventFactory.authorization();

      const results = await Promise.all(
        Array.from({ length: 5 }, () => slowProcessor.processWebhook(body)),
      );

      const statuses = results.map((r) => r.processingStatus);
      expect(
        statuses.filter((s) => s === ProcessingStatus.PROCESSED),
      ).toHaveLength(1);
      expect(
        statuses.filter((s) => s === ProcessingStatus.DUPLICATE),
      ).toHaveLength(4);
      expect((await slowStore.findOrder(42))?.notes).toHaveLength(1);
    });

    it('walks a manual-capture order through authorization and capture', async () => {
      await orderStore.saveOrder(
        createTestOrder({ id: 43, paymentState: { isManualCapture: true } }),
      );

      const authorized = await processor.processWebhook(
        PaymentEventFactory.authorization({ orderId: 43 }).body,
      );
      expect(authorized.processingStatus).toBe(ProcessingStatus.PROCESSED);
      expect((await orderStore.findOrder(43))?.status).toBe(OrderStatus.ON_HOLD);

      const captured = await processor.processWebhook(
        PaymentEventFactory.capture({ orderId: 43 }).body,
      );
      expect(captured.processingStatus).toBe(ProcessingStatus.PROCESSED);

      const order = await orderStore.findOrder(43);
      expect(order?.status).toBe(OrderStatus.PROCESSING);
      expect(order?.notes).toHaveLength(2);
      expect(order?.paymentState.processedEventKeys.toArray()).toEqual([
        'P1:authorization::150000',
        'P2:capture:P1:150000',
      ]);
    });
  });

  describe('Rejected deliveries', () => {
    it('does not touch the order when the signature is wrong', async () => {
      const { body } = PaymentEventFactory.authorization({
        signature: 'bm90LWEtc2lnbmF0dXJl',
      });

      const result = await processor.processWebhook(body);

      expect(result.success).toBe(false);
      expect(result.processingStatus).toBe(ProcessingStatus.SIGNATURE_FAILED);
      expect(result.error).toBeInstanceOf(SignatureVerificationError);
      expect(result.error).toMatchObject({ merchantReference: '42' });

      const order = await orderStore.findOrder(42);
      expect(order?.status).toBe(OrderStatus.PENDING);
      expect(order?.notes).toEqual([]);
      expect(logger.warn).toHaveBeenCalledWith(
        `Webhook signature_failed for delivery ${result.processingId}: Invalid HMAC signature for webhook`,
      );
    });

    it('rejects a body signed with another secret', async () => {
      const { body } = PaymentEventFactory.authorization({ secret: 'abcdef12' });

      const result = await processor.processWebhook(body);

      expect(result.processingStatus).toBe(ProcessingStatus.SIGNATURE_FAILED);
    });

    it.each(['not json', '[1,2,3]', '"text"', ''])(
      'classifies body %p as a parse error',
      async (body) => {
        const result = await processor.processWebhook(body);

        expect(result.processingStatus).toBe(ProcessingStatus.PARSE_ERROR);
        expect(result.metrics.parsed).toBe(false);
      },
    );

    it('classifies a signed body without a usable order id', async () => {
      const { body } = PaymentEventFactory.authorization({ orderId: 'ORD-42' });

      const result = await processor.processWebhook(body);

      expect(result.processingStatus).toBe(
        ProcessingStatus.NORMALIZATION_FAILED,
      );
      expect(result.context.signatureValid).toBe(true);
    });

    it('classifies an unknown order as unmatched', async () => {
      const { body } = PaymentEventFactory.authorization({ orderId: 99 });

      const result = await processor.processWebhook(body);

      expect(result.processingStatus).toBe(ProcessingStatus.UNMATCHED);
      expect(result.orderId).toBe(99);
    });
  });

  describe('Outcome classification', () => {
    it('reports a processor failure as recorded', async () => {
      const result = await processor.processWebhook(
        PaymentEventFactory.failure().body,
      );

      expect(result.processingStatus).toBe(ProcessingStatus.FAILURE_RECORDED);
    });

    it('reports a late authorization for a paid order as ignored', async () => {
      await orderStore.saveOrder(
        createTestOrder({ status: OrderStatus.COMPLETED }),
      );

      const result = await processor.processWebhook(
        PaymentEventFactory.authorization().body,
      );

      expect(result.processingStatus).toBe(ProcessingStatus.IGNORED);
    });

    it('reports an event for a refunded order as transition rejected', async () => {
      await orderStore.saveOrder(
        createTestOrder({ status: OrderStatus.REFUNDED }),
      );

      const result = await processor.processWebhook(
        PaymentEventFactory.authorization().body,
      );

      expect(result.processingStatus).toBe(
        ProcessingStatus.TRANSITION_REJECTED,
      );
      expect((await orderStore.findOrder(42))?.status).toBe(
        OrderStatus.REFUNDED,
      );
    });
  });

  describe('Hooks and failures', () => {
    const brokenStore: OrderStore = {
      findOrder: async () => null,
      withOrderLock: async () => {
        throw new Error('db down');
      },
      saveOrder: async (order) => order,
      isHealthy: async () => false,
    };

    it('reports every fate to the hook', async () => {
      const fates: WebhookFateEvent[] = [];
      const hooked = createProcessor(orderStore, {
        hooks: { onWebhookFate: (event) => void fates.push(event) },
      });

      await hooked.processWebhook(PaymentEventFactory.authorization().body);
      await hooked.processWebhook('not json');

      expect(fates).toHaveLength(2);
      expect(fates[0]).toMatchObject({
        processingStatus: ProcessingStatus.PROCESSED,
        orderId: 42,
        eventType: 'authorization',
        eventKey: 'P1:authorization::150000',
      });
      expect(fates[1]?.processingStatus).toBe(ProcessingStatus.PARSE_ERROR);
    });

    it('absorbs store failures as pipeline errors', async () => {
      const onError = jest.fn();
      const failing = createProcessor(brokenStore, { hooks: { onError } });

      const result = await failing.processWebhook(
        PaymentEventFactory.authorization().body,
      );

      expect(result.success).toBe(false);
      expect(result.processingStatus).toBe(ProcessingStatus.PIPELINE_ERROR);
      expect(result.error?.message).toBe(
        "Stage 'reconciliation' failed: db down",
      );
      expect(onError).toHaveBeenCalledWith(result.error, {
        operation: 'webhook-processing',
        processingId: result.processingId,
        orderId: 42,
      });
      expect(logger.error).toHaveBeenCalled();
    });

    it('rethrows when configured to', async () => {
      const throwing = createProcessor(brokenStore, { throwOnError: true });

      const delivery = throwing.processWebhook(
        PaymentEventFactory.authorization().body,
      );

      await expect(delivery).rejects.toBeInstanceOf(PipelineError);
      await expect(delivery).rejects.toThrow(
        "Pipeline failed: Stage 'reconciliation' failed: db down",
      );
    });

    it('gives up on a delivery that outlives the timeout', async () => {
      const hangingStore: OrderStore = {
        ...brokenStore,
        withOrderLock: () => new Promise<never>(() => undefined),
      };
      const slow = createProcessor(hangingStore, { timeoutMs: 20 });

      const result = await slow.processWebhook(
        PaymentEventFactory.authorization().body,
      );

      expect(result.processingStatus).toBe(ProcessingStatus.PIPELINE_ERROR);
      expect(result.error?.message).toBe('Pipeline timeout after 20ms');
    });
  });
});
