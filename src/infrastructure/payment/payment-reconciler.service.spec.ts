import { Test, type TestingModule } from '@nestjs/testing';
import { PaymentReconcilerService } from './payment-reconciler.service';
import { RedsysService } from '@/infrastructure/redsys/redsys.service';
import { TransactionManager } from '@/infrastructure/persistence/transaction-manager';
import { PaymentNotificationRepository } from '@/infrastructure/persistence/payment-notification.repository';
import { DiscountCodeInMemoryStore } from '@/infrastructure/persistence/in-memory/discount-code-in-memory-store';
import { OrderInMemoryStore } from '@/infrastructure/persistence/in-memory/order-in-memory-store';
import { PaymentNotificationInMemoryStore } from '@/infrastructure/persistence/in-memory/payment-notification-in-memory-store';
import { InMemoryTransactionManager } from '@/infrastructure/persistence/in-memory/in-memory-transaction-manager';
import { createTestAppConfig, signedNotification } from '@/testing/redsys.fixtures';

const ORDER_ID = '012300000000';

const notification = (Ds_Response: string, overrides: Record<string, string> = {}) =>
  signedNotification({
    Ds_Order: ORDER_ID,
    Ds_Response,
    Ds_Amount: '4500',
    Ds_Currency: '978',
    Ds_AuthorisationCode: '123456',
    ...overrides,
  });

describe('PaymentReconcilerService', () => {
  let service: PaymentReconcilerService;
  let orders: OrderInMemoryStore;
  let notifications: PaymentNotificationInMemoryStore;

  const statusOf = async (orderId = ORDER_ID) => (await orders.getByOrderId(orderId))?.status;

  beforeEach(async () => {
    orders = new OrderInMemoryStore();
    notifications = new PaymentNotificationInMemoryStore();

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        PaymentReconcilerService,
        { provide: RedsysService, useValue: new RedsysService(createTestAppConfig()) },
        { provide: TransactionManager, useValue: new InMemoryTransactionManager(new DiscountCodeInMemoryStore(), orders) },
        { provide: PaymentNotificationRepository, useValue: notifications },
      ],
    }).compile();

    service = module.get<PaymentReconcilerService>(PaymentReconcilerService);

    await orders.create({
      orderId: ORDER_ID,
      totalAmount: 5000,
      discountedAmount: 4500,
      discountCode: 'PROMO10',
      currency: 'EUR',
      customerEmail: null,
    });
  });

  describe('verified notifications', () => {
    it('marks the order paid on an approval', async () => {
      const acknowledgment = await service.handleCallback(notification('0000'));

      expect(acknowledgment).toEqual({ ok: true, httpStatus: 200, body: 'OK', orderId: ORDER_ID, status: 'paid', duplicate: false });
      const order = await orders.getByOrderId(ORDER_ID);
      expect(order).toMatchObject({
        status: 'paid',
        gatewayResponseCode: '0000',
        gatewayAuthorisationCode: '123456',
      });
      expect(order?.settledAt).toBeInstanceOf(Date);
    });

    it.each([
      ['0099', 'paid'],
      ['9915', 'canceled'],
      ['0190', 'failed'],
      ['0101', 'failed'],
    ])('maps response %s to %s', async (responseCode, status) => {
      const acknowledgment = await service.handleCallback(notification(responseCode));

      expect(acknowledgment).toMatchObject({ ok: true, status });
      expect(await statusOf()).toBe(status);
    });

    it('fails an approval whose amount differs from the order', async () => {
      await service.handleCallback(notification('0000', { Ds_Amount: '5000' }));

      expect(await statusOf()).toBe('failed');
    });

    it('records the notification with its outcome', async () => {
      await service.handleCallback(notification('9915'));

      const [recorded] = await notifications.getByOrderId(ORDER_ID);
      expect(recorded).toMatchObject({ orderId: ORDER_ID, responseCode: '9915', outcome: 'cancel', processingError: null });
      expect(recorded?.processedAt).toBeInstanceOf(Date);
    });
  });

  describe('idempotence', () => {
    it('acknowledges a redelivered approval without a second transition', async () => {
      const body = notification('0000');

      await service.handleCallback(body);
      const settledAt = (await orders.getByOrderId(ORDER_ID))?.settledAt;
      const second = await service.handleCallback(body);

      expect(second).toEqual({ ok: true, httpStatus: 200, body: 'OK', orderId: ORDER_ID, status: 'paid', duplicate: true });
      expect((await orders.getByOrderId(ORDER_ID))?.settledAt).toEqual(settledAt);
      expect(await notifications.getByOrderId(ORDER_ID)).toHaveLength(2);
    });

    it('ignores a later failure for a paid order', async () => {
      await service.handleCallback(notification('0000'));
      const acknowledgment = await service.handleCallback(notification('0190'));

      expect(acknowledgment).toMatchObject({ ok: true, status: 'paid', duplicate: true });
      expect(await statusOf()).toBe('paid');
    });

    it('applies exactly one of two concurrent deliveries', async () => {
      const settle = jest.spyOn(orders, 'settlePending');

      const results = await Promise.all([service.handleCallback(notification('0000')), service.handleCallback(notification('0000'))]);

      expect(results.map((r) => r.ok && r.duplicate).sort()).toEqual([false, true]);
      expect(settle).toHaveBeenCalledTimes(1);
      expect(await statusOf()).toBe('paid');
    });
  });

  describe('rejections', () => {
    it('rejects a tampered signature without touching the order', async () => {
      const body = notification('0000');
      const flipped = body.Ds_Signature.startsWith('A') ? 'B' : 'A';

      const acknowledgment = await service.handleCallback({ ...body, Ds_Signature: `${flipped}${body.Ds_Signature.slice(1)}` });

      expect(acknowledgment).toEqual({ ok: false, httpStatus: 400, body: 'KO', error: 'invalid_signature' });
      expect(await statusOf()).toBe('pending');
      expect(await notifications.getByOrderId(ORDER_ID)).toHaveLength(0);
    });

    it('rejects a malformed callback', async () => {
      const acknowledgment = await service.handleCallback({ Ds_MerchantParameters: 'abc' });

      expect(acknowledgment).toEqual({ ok: false, httpStatus: 400, body: 'KO', error: 'malformed_callback' });
    });

    it('answers KO with 200 for an unknown order and creates nothing', async () => {
      const acknowledgment = await service.handleCallback(notification('0000', { Ds_Order: '999900000000' }));

      expect(acknowledgment).toEqual({ ok: false, httpStatus: 200, body: 'KO', error: 'order_not_found', orderId: '999900000000' });
      expect(await orders.getByOrderId('999900000000')).toBeNull();
      const [recorded] = await notifications.getByOrderId('999900000000');
      expect(recorded?.processingError).toBe('order_not_found');
    });
  });

  describe('failures while applying', () => {
    it('leaves the order pending and records the error when the update fails', async () => {
      jest.spyOn(orders, 'settlePending').mockRejectedValueOnce(new Error('connection lost'));

      const acknowledgment = await service.handleCallback(notification('0000'));

      expect(acknowledgment).toEqual({ ok: false, httpStatus: 200, body: 'KO', error: 'internal_error', orderId: ORDER_ID });
      expect(await statusOf()).toBe('pending');
      const [recorded] = await notifications.getByOrderId(ORDER_ID);
      expect(recorded).toMatchObject({ processingError: 'connection lost', processedAt: null });
    });

    it('still answers when the notification cannot be recorded', async () => {
      jest.spyOn(notifications, 'create').mockRejectedValueOnce(new Error('database unavailable'));
      const markError = jest.spyOn(notifications, 'markError');

      const acknowledgment = await service.handleCallback(notification('0000'));

      expect(acknowledgment).toMatchObject({ ok: false, httpStatus: 200, error: 'internal_error' });
      expect(markError).not.toHaveBeenCalled();
      expect(await statusOf()).toBe('pending');
    });

    it('acknowledges a committed settlement when the audit update fails', async () => {
      jest.spyOn(notifications, 'markProcessed').mockRejectedValueOnce(new Error('audit table locked'));

      const acknowledgment = await service.handleCallback(notification('0000'));

      expect(acknowledgment).toEqual({ ok: true, httpStatus: 200, body: 'OK', orderId: ORDER_ID, status: 'paid', duplicate: false });
      expect(await statusOf()).toBe('paid');
      const [recorded] = await notifications.getByOrderId(ORDER_ID);
      expect(recorded).toMatchObject({ processedAt: null, processingError: null });
    });

    it('lets a retry succeed after a failed attempt', async () => {
      jest.spyOn(orders, 'settlePending').mockRejectedValueOnce(new Error('connection lost'));
      const body = notification('0000');

      await service.handleCallback(body);
      const retry = await service.handleCallback(body);

      expect(retry).toMatchObject({ ok: true, status: 'paid', duplicate: false });
    });
  });

  describe('listNotifications', () => {
    it('returns the recorded notifications of an order, newest first', async () => {
      await service.handleCallback(notification('0190'));
      await service.handleCallback(notification('0000'));

      const listed = await service.listNotifications(ORDER_ID);

      expect(listed.map((row) => [row.responseCode, row.outcome])).toEqual([
        ['0000', null],
        ['0190', 'failure'],
      ]);
    });

    it('returns nothing for an order without notifications', async () => {
      expect(await service.listNotifications('999900000000')).toEqual([]);
    });
  });
});
