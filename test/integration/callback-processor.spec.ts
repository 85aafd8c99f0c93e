import {
  CallbackOutcome,
  CallbackProcessor,
  CallbackRequest,
  CallbackResult,
  MockNotificationFactory,
  MockOrderStore,
  NotificationFixture,
  OrderStatus,
  PaymentStatus,
  PipelineConfig,
  PipelineError,
  SettingsSource,
  SslcommerzValidationClient,
  StaticSettingsSource,
  StubResponse,
  TEST_STORE_ID,
  TEST_STORE_PASSWORD,
  createFailingHttp,
  createStubHttp,
} from '../../src';

describe('CallbackProcessor Integration', () => {
  let orderStore: MockOrderStore;
  let settingsSource: StaticSettingsSource;
  let fixture: NotificationFixture;
  let validationResponse: StubResponse;
  let handler: jest.Mock;

  const settings = {
    environment: 'sandbox',
    store_id: TEST_STORE_ID,
    store_password: TEST_STORE_PASSWORD,
  };

  const createProcessor = (overrides: Partial<PipelineConfig> = {}) =>
    new CallbackProcessor({
      orderStore,
      settingsSource,
      validationClient: new SslcommerzValidationClient({
        http: createStubHttp(handler),
      }),
      ...overrides,
    });

  const landing = (
    body: Record<string, string>,
    landingMode = 'success',
  ): CallbackRequest => ({ channel: 'landing', landingMode, payload: body });

  const ipn = (body: Record<string, string>): CallbackRequest => ({
    channel: 'ipn',
    payload: body,
  });

  beforeEach(() => {
    orderStore = new MockOrderStore();
    orderStore.seed(42);
    settingsSource = new StaticSettingsSource(settings);
    fixture = MockNotificationFactory.validPayment();
    validationResponse = {
      body: MockNotificationFactory.validationResponse(fixture),
    };
    handler = jest.fn(async () => validationResponse);
  });

  describe('successful payment', () => {
    it('should mark the order paid and completed from the success landing', async () => {
      const processor = createProcessor();

      const result = await processor.process(landing(fixture.body));

      expect(result.outcome).toBe(CallbackOutcome.RECONCILED);
      expect(result.channel).toBe('landing');
      expect(result.orderId).toBe(42);
      expect(result.tranId).toBe('ORDER-42-1700000000');
      expect(result.paymentStatus).toBe(PaymentStatus.PAID);
      expect(result.error).toBeUndefined();
      expect(orderStore.getSnapshot(42)).toMatchObject({
        paymentStatus: PaymentStatus.PAID,
        orderStatus: OrderStatus.COMPLETED,
        transactionId: 'ORDER-42-1700000000',
      });
      expect(handler).toHaveBeenCalledTimes(1);
    });

    it('should reconcile from an IPN delivery', async () => {
      const processor = createProcessor();

      const result = await processor.process(ipn(fixture.body));

      expect(result.outcome).toBe(CallbackOutcome.RECONCILED);
      expect(result.channel).toBe('ipn');
      expect(orderStore.getSnapshot(42)?.paymentStatus).toBe(
        PaymentStatus.PAID,
      );
    });

    it('should report the settlement split', async () => {
      const processor = createProcessor();

      const result = await processor.process(ipn(fixture.body));

      expect(result.settlement).toEqual({
        amount: '1500.00',
        storeAmount: '1462.50',
        gatewayFee: '37.50',
      });
    });

    it('should be idempotent across repeated deliveries', async () => {
      const processor = createProcessor();

      const first = await processor.process(landing(fixture.body));
      const second = await processor.process(ipn(fixture.body));

      expect(first.outcome).toBe(CallbackOutcome.RECONCILED);
      expect(second.outcome).toBe(CallbackOutcome.RECONCILED);
      expect(first.processingId).not.toBe(second.processingId);
      expect(orderStore.getSnapshot(42)).toMatchObject({
        paymentStatus: PaymentStatus.PAID,
        orderStatus: OrderStatus.COMPLETED,
        transactionId: 'ORDER-42-1700000000',
      });
    });

    it('should map the notification status once validation confirms it', async () => {
      fixture = MockNotificationFactory.validPayment({ status: 'PENDING' });
      const processor = createProcessor();

      const result = await processor.process(ipn(fixture.body));

      expect(result.outcome).toBe(CallbackOutcome.RECONCILED);
      expect(result.paymentStatus).toBe(PaymentStatus.PENDING);
      expect(orderStore.getSnapshot(42)).toMatchObject({
        paymentStatus: PaymentStatus.PENDING,
        orderStatus: OrderStatus.INCOMPLETE,
      });
    });

    it('should record every stage duration', async () => {
      const processor = createProcessor();

      const result = await processor.process(ipn(fixture.body));

      expect(Object.keys(result.stageDurations)).toEqual([
        'landing-filter',
        'extraction',
        'credentials',
        'verification',
        'validation',
        'reconciliation',
      ]);
      expect(result.durationMs).toBeGreaterThanOrEqual(0);
    });

    it('should accept settings stored in the host blob', async () => {
      settingsSource.update(
        JSON.stringify({
          payment_methods: [
            {
              name: 'sslcommerz',
              fields: [
                { name: 'environment', value: 'sandbox' },
                { name: 'store_id', value: TEST_STORE_ID },
                { name: 'store_password', value: TEST_STORE_PASSWORD },
              ],
            },
          ],
        }),
      );
      const processor = createProcessor();

      const result = await processor.process(ipn(fixture.body));

      expect(result.outcome).toBe(CallbackOutcome.RECONCILED);
    });
  });

  describe('landing filter', () => {
    it.each(['fail', 'cancel'])(
      'should ignore the %s landing',
      async (mode) => {
        const processor = createProcessor();

        const result = await processor.process(landing(fixture.body, mode));

        expect(result.outcome).toBe(CallbackOutcome.NOT_APPLICABLE);
        expect(result.reason).toBe(`Landing mode '${mode}' is not handled`);
        expect(handler).not.toHaveBeenCalled();
        expect(orderStore.getSnapshot(42)?.paymentStatus).toBe(
          PaymentStatus.PENDING,
        );
      },
    );

    it('should ignore a landing without a mode', async () => {
      const processor = createProcessor();

      const result = await processor.process({
        channel: 'landing',
        payload: fixture.body,
      });

      expect(result.outcome).toBe(CallbackOutcome.NOT_APPLICABLE);
      expect(result.reason).toBe("Landing mode '' is not handled");
    });

    it('should honour a custom success marker', async () => {
      const processor = createProcessor({ successMarker: 'paid' });

      const ignored = await processor.process(landing(fixture.body));
      const handled = await processor.process(landing(fixture.body, 'paid'));

      expect(ignored.outcome).toBe(CallbackOutcome.NOT_APPLICABLE);
      expect(handled.outcome).toBe(CallbackOutcome.RECONCILED);
    });
  });

  describe('invalid input', () => {
    it('should reject a body without tran_id', async () => {
      const { tran_id: _tranId, ...body } = fixture.body;
      const processor = createProcessor();

      const result = await processor.process(ipn(body));

      expect(result.outcome).toBe(CallbackOutcome.INVALID_INPUT);
      expect(result.reason).toBe('Missing tran_id');
      expect(handler).not.toHaveBeenCalled();
    });

    it.each(['', 'abc', '0', '-3', '4.5'])(
      'should reject order id %p',
      async (valueA) => {
        const processor = createProcessor();

        const result = await processor.process(
          ipn({ ...fixture.body, value_a: valueA }),
        );

        expect(result.outcome).toBe(CallbackOutcome.INVALID_INPUT);
        expect(result.reason).toBe('Missing or malformed order id (value_a)');
        expect(handler).not.toHaveBeenCalled();
      },
    );

    it('should treat a non-object payload as invalid input', async () => {
      const processor = createProcessor();

      const result = await processor.process({
        channel: 'ipn',
        payload: 'tran_id=1',
      });

      expect(result.outcome).toBe(CallbackOutcome.INVALID_INPUT);
    });
  });

  describe('configuration', () => {
    it('should stop when settings are absent', async () => {
      settingsSource.update(null);
      const processor = createProcessor();

      const result = await processor.process(ipn(fixture.body));

      expect(result.outcome).toBe(CallbackOutcome.UNCONFIGURED);
      expect(result.reason).toBe('Gateway settings not found');
      expect(handler).not.toHaveBeenCalled();
    });

    it('should stop when settings are incomplete', async () => {
      settingsSource.update({ ...settings, store_password: '' });
      const processor = createProcessor();

      const result = await processor.process(ipn(fixture.body));

      expect(result.outcome).toBe(CallbackOutcome.UNCONFIGURED);
      expect(result.reason).toBe('Gateway settings invalid: store_password');
    });

    it('should look up a custom gateway name', async () => {
      const processor = createProcessor({ gatewayName: 'sslcommerz_bd' });
      settingsSource.update({
        payment_methods: [
          {
            name: 'sslcommerz_bd',
            fields: [
              { name: 'environment', value: 'sandbox' },
              { name: 'store_id', value: TEST_STORE_ID },
              { name: 'store_password', value: TEST_STORE_PASSWORD },
            ],
          },
        ],
      });

      const result = await processor.process(ipn(fixture.body));

      expect(result.outcome).toBe(CallbackOutcome.RECONCILED);
    });
  });

  describe('validation failures', () => {
    it('should reject a tampered notification without calling the API', async () => {
      const tampered = MockNotificationFactory.tamperedAmount();
      const processor = createProcessor();

      const result = await processor.process(ipn(tampered.body));

      expect(result.outcome).toBe(CallbackOutcome.VALIDATION_FAILED);
      expect(result.reason).toBe('hash_mismatch');
      expect(handler).not.toHaveBeenCalled();
      expect(orderStore.getSnapshot(42)?.paymentStatus).toBe(
        PaymentStatus.PENDING,
      );
    });

    it('should reject a non-ASCII signature as a validation failure', async () => {
      const processor = createProcessor();

      const result = await processor.process(
        ipn({
          ...fixture.body,
          verify_sign: fixture.body.verify_sign.slice(0, -1) + 'é',
        }),
      );

      expect(result.outcome).toBe(CallbackOutcome.VALIDATION_FAILED);
      expect(result.reason).toBe('hash_mismatch');
      expect(handler).not.toHaveBeenCalled();
    });

    it('should reject a notification signed with another password', async () => {
      fixture = MockNotificationFactory.validPayment({
        storePassword: 'other-secret',
      });
      const processor = createProcessor();

      const result = await processor.process(ipn(fixture.body));

      expect(result.reason).toBe('hash_mismatch');
    });

    it('should leave the order untouched when the API is unreachable', async () => {
      const processor = createProcessor({
        validationClient: new SslcommerzValidationClient({
          http: createFailingHttp(),
        }),
      });

      const result = await processor.process(ipn(fixture.body));

      expect(result.outcome).toBe(CallbackOutcome.VALIDATION_FAILED);
      expect(result.reason).toBe('transport_error');
      expect(orderStore.getSnapshot(42)?.paymentStatus).toBe(
        PaymentStatus.PENDING,
      );
    });

    it('should reject an amount the processor did not confirm', async () => {
      validationResponse = {
        body: MockNotificationFactory.validationResponse(fixture, {
          amount: '10.00',
        }),
      };
      const processor = createProcessor();

      const result = await processor.process(ipn(fixture.body));

      expect(result.outcome).toBe(CallbackOutcome.VALIDATION_FAILED);
      expect(result.reason).toBe('amount_mismatch');
    });
  });

  describe('order lookup', () => {
    it('should report an unknown order after validation', async () => {
      orderStore.clear();
      const processor = createProcessor();

      const result = await processor.process(ipn(fixture.body));

      expect(result.outcome).toBe(CallbackOutcome.ORDER_NOT_FOUND);
      expect(result.reason).toBe('Order 42 not found');
      expect(handler).toHaveBeenCalledTimes(1);
    });
  });

  describe('rejection write-back', () => {
    beforeEach(() => {
      fixture = MockNotificationFactory.failedPayment();
      validationResponse = {
        body: MockNotificationFactory.validationResponse(fixture, {
          status: 'FAILED',
        }),
      };
    });

    it('should leave the order untouched by default', async () => {
      const processor = createProcessor();

      const result = await processor.process(ipn(fixture.body));

      expect(result.outcome).toBe(CallbackOutcome.VALIDATION_FAILED);
      expect(result.reason).toBe('status_not_confirmed');
      expect(orderStore.getSnapshot(42)?.paymentStatus).toBe(
        PaymentStatus.PENDING,
      );
    });

    it('should record a confirmed failure when enabled', async () => {
      const processor = createProcessor({ writeBackRejections: true });

      const result = await processor.process(ipn(fixture.body));

      expect(result.outcome).toBe(CallbackOutcome.REJECTION_RECORDED);
      expect(result.paymentStatus).toBe(PaymentStatus.FAILED);
      expect(orderStore.getSnapshot(42)).toMatchObject({
        paymentStatus: PaymentStatus.FAILED,
        orderStatus: OrderStatus.INCOMPLETE,
        transactionId: 'ORDER-42-1700000000',
      });
    });

    it('should record a confirmed cancellation when enabled', async () => {
      fixture = MockNotificationFactory.cancelledPayment();
      validationResponse = {
        body: MockNotificationFactory.validationResponse(fixture, {
          status: 'CANCELLED',
        }),
      };
      const processor = createProcessor({ writeBackRejections: true });

      const result = await processor.process(ipn(fixture.body));

      expect(result.outcome).toBe(CallbackOutcome.REJECTION_RECORDED);
      expect(orderStore.getSnapshot(42)?.paymentStatus).toBe(
        PaymentStatus.CANCELLED,
      );
    });

    it('should never overwrite a paid order', async () => {
      orderStore.seed(42, {
        paymentStatus: PaymentStatus.PAID,
        orderStatus: OrderStatus.COMPLETED,
        transactionId: 'ORDER-42-1690000000',
      });
      const processor = createProcessor({ writeBackRejections: true });

      const result = await processor.process(ipn(fixture.body));

      expect(result.outcome).toBe(CallbackOutcome.VALIDATION_FAILED);
      expect(result.reason).toBe('Order 42 already paid');
      expect(orderStore.getSnapshot(42)).toMatchObject({
        paymentStatus: PaymentStatus.PAID,
        transactionId: 'ORDER-42-1690000000',
      });
    });

    it('should not write back a rejection for another transaction', async () => {
      validationResponse = {
        body: MockNotificationFactory.validationResponse(fixture, {
          status: 'FAILED',
          tran_id: 'ORDER-99-1700000000',
        }),
      };
      const processor = createProcessor({ writeBackRejections: true });

      const result = await processor.process(ipn(fixture.body));

      expect(result.outcome).toBe(CallbackOutcome.VALIDATION_FAILED);
      expect(orderStore.getSnapshot(42)?.paymentStatus).toBe(
        PaymentStatus.PENDING,
      );
    });
  });

  describe('faults', () => {
    const failingSource: SettingsSource = {
      loadPaymentSettings: async () => {
        throw new Error('settings table unavailable');
      },
    };

    it('should turn a thrown error into an ERROR outcome', async () => {
      const processor = createProcessor({ settingsSource: failingSource });

      const result = await processor.process(ipn(fixture.body));

      expect(result.outcome).toBe(CallbackOutcome.ERROR);
      expect(result.reason).toBe(
        "Stage 'credentials' failed: settings table unavailable",
      );
      expect(result.error).toBeInstanceOf(PipelineError);
      expect(result.error).toMatchObject({ stage: 'credentials' });
    });

    it('should call the onError hook with the failure', async () => {
      const onError = jest.fn();
      const processor = createProcessor({
        settingsSource: failingSource,
        hooks: { onError },
      });

      await processor.process(ipn(fixture.body));

      expect(onError).toHaveBeenCalledTimes(1);
      expect(onError.mock.calls[0][0]).toBeInstanceOf(PipelineError);
    });

    it('should propagate store failures as an ERROR outcome', async () => {
      jest
        .spyOn(orderStore, 'updateOrder')
        .mockRejectedValue(new Error('write conflict'));
      const processor = createProcessor();

      const result = await processor.process(ipn(fixture.body));

      expect(result.outcome).toBe(CallbackOutcome.ERROR);
      expect(result.reason).toBe(
        "Stage 'reconciliation' failed: write conflict",
      );
    });
  });

  describe('hooks', () => {
    it('should report every outcome to onOutcome', async () => {
      const outcomes: CallbackResult[] = [];
      const processor = createProcessor({
        hooks: { onOutcome: (result) => void outcomes.push(result) },
      });

      await processor.process(landing(fixture.body, 'fail'));
      await processor.process(ipn(fixture.body));

      expect(outcomes.map((r) => r.outcome)).toEqual([
        CallbackOutcome.NOT_APPLICABLE,
        CallbackOutcome.RECONCILED,
      ]);
    });

    it('should not let a throwing hook change the result', async () => {
      const processor = createProcessor({
        hooks: {
          onOutcome: () => {
            throw new Error('listener broke');
          },
        },
      });

      const result = await processor.process(ipn(fixture.body));

      expect(result.outcome).toBe(CallbackOutcome.RECONCILED);
    });
  });

  describe('getStatistics', () => {
    it('should list stages and effective configuration', () => {
      const processor = createProcessor({ writeBackRejections: true });

      expect(processor.getStatistics()).toEqual({
        stages: [
          'landing-filter',
          'extraction',
          'credentials',
          'verification',
          'validation',
          'reconciliation',
        ],
        configuration: {
          gatewayName: 'sslcommerz',
          successMarker: 'success',
          writeBackRejections: true,
        },
      });
    });
  });
});
