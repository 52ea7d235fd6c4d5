import { Test, type TestingModule } from '@nestjs/testing';
import { OrderController } from './order.controller';
import { CheckoutService } from '@/infrastructure/checkout/checkout.service';
import { AppConfigService } from '@/config/app.config';
import { DiscountLedgerService } from '@/infrastructure/discount/discount-ledger.service';
import { DiscountCalculatorService } from '@/domain/services/discount-calculator.service';
import { RedsysService } from '@/infrastructure/redsys/redsys.service';
import { DiscountCodeRepository } from '@/infrastructure/persistence/discount-code.repository';
import { OrderRepository } from '@/infrastructure/persistence/order.repository';
import { TransactionManager } from '@/infrastructure/persistence/transaction-manager';
import { DiscountCodeInMemoryStore } from '@/infrastructure/persistence/in-memory/discount-code-in-memory-store';
import { OrderInMemoryStore } from '@/infrastructure/persistence/in-memory/order-in-memory-store';
import { InMemoryTransactionManager } from '@/infrastructure/persistence/in-memory/in-memory-transaction-manager';
import { PaymentNotificationRepository } from '@/infrastructure/persistence/payment-notification.repository';
import { PaymentNotificationInMemoryStore } from '@/infrastructure/persistence/in-memory/payment-notification-in-memory-store';
import { PaymentReconcilerService } from '@/infrastructure/payment/payment-reconciler.service';
import { createTestAppConfig, signedNotification } from '@/testing/redsys.fixtures';
import { FakeResponse } from '@/testing/http.fixtures';

describe('OrderController', () => {
  let controller: OrderController;
  let discountCodes: DiscountCodeInMemoryStore;
  let orders: OrderInMemoryStore;
  let notifications: PaymentNotificationInMemoryStore;
  let reconciler: PaymentReconcilerService;
  let res: FakeResponse;

  beforeEach(async () => {
    discountCodes = new DiscountCodeInMemoryStore();
    orders = new OrderInMemoryStore();
    notifications = new PaymentNotificationInMemoryStore();
    res = new FakeResponse();
    const appConfig = createTestAppConfig();

    const module: TestingModule = await Test.createTestingModule({
      controllers: [OrderController],
      providers: [
        CheckoutService,
        PaymentReconcilerService,
        DiscountLedgerService,
        DiscountCalculatorService,
        { provide: AppConfigService, useValue: appConfig },
        { provide: RedsysService, useValue: new RedsysService(appConfig) },
        { provide: DiscountCodeRepository, useValue: discountCodes },
        { provide: OrderRepository, useValue: orders },
        { provide: TransactionManager, useValue: new InMemoryTransactionManager(discountCodes, orders) },
        { provide: PaymentNotificationRepository, useValue: notifications },
      ],
    }).compile();

    controller = module.get<OrderController>(OrderController);
    reconciler = module.get<PaymentReconcilerService>(PaymentReconcilerService);
  });

  describe('POST /orders', () => {
    it('returns the order and the signed payment form', async () => {
      await discountCodes.create({ code: 'PROMO10', discountType: 'percentage', discountValue: 1000 });

      await controller.createOrder({ amount: '50.00', discountCode: 'PROMO10' }, res.asResponse());

      expect(res.statusCode).toBe(201);
      expect(res.body).toMatchObject({
        success: true,
        data: {
          order: { status: 'pending', totalAmount: '50.00', discountedAmount: '45.00', discountCode: 'PROMO10', currency: 'EUR' },
          discount: { code: 'PROMO10', discountAmount: '5.00', discountedAmount: '45.00' },
          payment: { url: 'https://sis-t.redsys.es:25443/sis/realizarPago', Ds_SignatureVersion: 'HMAC_SHA256_V1' },
        },
      });
    });

    it('answers 400 for an invalid e-mail', async () => {
      await controller.createOrder({ amount: '50.00', customerEmail: 'not-an-email' }, res.asResponse());

      expect(res.statusCode).toBe(400);
      expect(res.body).toMatchObject({ success: false, code: 'invalid_request' });
    });

    it('answers 400 for an unusable amount', async () => {
      await controller.createOrder({ amount: '12.345' }, res.asResponse());

      expect(res.statusCode).toBe(400);
      expect(res.body).toMatchObject({ success: false, code: 'invalid_amount' });
    });

    it('answers 400 for an amount above the storable range', async () => {
      await controller.createOrder({ amount: '30000000.00' }, res.asResponse());

      expect(res.statusCode).toBe(400);
      expect(res.body).toMatchObject({ success: false, code: 'invalid_amount' });
      expect(orders.rows.values()).toHaveLength(0);
    });

    it('answers 404 when the discount code does not exist', async () => {
      await controller.createOrder({ amount: '50.00', discountCode: 'NOPE' }, res.asResponse());

      expect(res.statusCode).toBe(404);
      expect(res.body).toMatchObject({ code: 'code_not_found' });
      expect(orders.rows.values()).toHaveLength(0);
    });
  });

  describe('GET /orders/:orderId', () => {
    it('returns the order status', async () => {
      const created = await orders.create({
        orderId: '012300000000',
        totalAmount: 5000,
        discountedAmount: 4500,
        discountCode: 'PROMO10',
        currency: 'EUR',
        customerEmail: null,
      });

      await controller.getOrder('012300000000', res.asResponse());

      expect(res.statusCode).toBe(200);
      expect(res.body).toEqual({
        success: true,
        data: {
          orderId: '012300000000',
          status: 'pending',
          totalAmount: '50.00',
          discountedAmount: '45.00',
          discountCode: 'PROMO10',
          currency: 'EUR',
          createdAt: created.createdAt.toISOString(),
          settledAt: null,
        },
      });
    });

    it.each(['999900000000', 'not-an-order'])('answers 404 for %s', async (orderId) => {
      await controller.getOrder(orderId, res.asResponse());

      expect(res.statusCode).toBe(404);
      expect(res.body).toEqual({ success: false, error: 'Order not found', code: 'order_not_found' });
    });
  });

  describe('GET /orders/:orderId/notifications', () => {
    it('lists the verified notifications of the order', async () => {
      await orders.create({
        orderId: '012300000000',
        totalAmount: 5000,
        discountedAmount: 4500,
        discountCode: null,
        currency: 'EUR',
        customerEmail: null,
      });
      await reconciler.handleCallback(signedNotification({ Ds_Order: '012300000000', Ds_Response: '0190', Ds_Amount: '4500' }));

      await controller.listNotifications('012300000000', res.asResponse());

      expect(res.statusCode).toBe(200);
      expect(res.body).toMatchObject({
        success: true,
        data: [
          {
            id: 1,
            responseCode: '0190',
            responseDescription: 'Operation denied',
            outcome: 'failure',
            processingError: null,
          },
        ],
      });
    });

    it('answers 404 for an unknown order', async () => {
      await controller.listNotifications('999900000000', res.asResponse());

      expect(res.statusCode).toBe(404);
      expect(res.body).toEqual({ success: false, error: 'Order not found', code: 'order_not_found' });
    });
  });
});
