import { Injectable, Logger } from '@nestjs/common';
import { isLeft } from '@/lib/either';
import { TransactionManager } from '@/infrastructure/persistence/transaction-manager';
import type { OrderData } from '@/infrastructure/persistence/order.repository';
import {
  PaymentNotificationRepository,
  type PaymentNotificationData,
} from '@/infrastructure/persistence/payment-notification.repository';
import { RedsysService } from '@/infrastructure/redsys/redsys.service';
import {
  classifyResponseCode,
  describeResponseCode,
  type RedsysNotificationError,
  type RedsysNotificationParameters,
} from '@/infrastructure/redsys/redsys.types';
import {
  STATUS_BY_OUTCOME,
  isTerminalStatus,
  type OrderStatus,
  type PaymentOutcome,
} from '@/domain/types/order.types';

export type PaymentCallbackError = RedsysNotificationError | 'order_not_found' | 'internal_error';

/**
 * Response handed back to the gateway. Rejected input is answered with 400;
 * a verified notification that could not be applied still gets 200 so the
 * gateway stops retrying it.
 */
export type CallbackAcknowledgment =
  | { ok: true; httpStatus: 200; body: 'OK'; orderId: string; status: OrderStatus; duplicate: boolean }
  | { ok: false; httpStatus: 200 | 400; body: 'KO'; error: PaymentCallbackError; orderId?: string };

type Reconciliation =
  | { kind: 'order_not_found' }
  | { kind: 'already_settled'; order: OrderData }
  | { kind: 'settled'; order: OrderData; outcome: PaymentOutcome };

const rejected = (error: PaymentCallbackError, httpStatus: 200 | 400, orderId?: string): CallbackAcknowledgment => ({
  ok: false,
  httpStatus,
  body: 'KO',
  error,
  orderId,
});

@Injectable()
export class PaymentReconcilerService {
  private readonly logger = new Logger(PaymentReconcilerService.name);

  constructor(
    private readonly redsysService: RedsysService,
    private readonly transactionManager: TransactionManager,
    private readonly notificationRepository: PaymentNotificationRepository,
  ) {}

  /**
   * Applies a gateway notification to its order. Each order leaves `pending`
   * at most once; redelivered notifications are acknowledged without changes.
   */
  async handleCallback(body: unknown): Promise<CallbackAcknowledgment> {
    const verified = this.redsysService.verifyNotification(body);
    if (isLeft(verified)) {
      return rejected(verified[0], 400);
    }

    const { parameters, rawMerchantParameters } = verified[1];
    const orderId = parameters.Ds_Order;
    let notification: PaymentNotificationData | null = null;

    try {
      notification = await this.notificationRepository.create({
        orderId,
        responseCode: parameters.Ds_Response,
        rawParameters: rawMerchantParameters,
      });

      const reconciliation = await this.transactionManager.run(async ({ orders }): Promise<Reconciliation> => {
        const order = await orders.getByOrderId(orderId);
        if (!order) {
          return { kind: 'order_not_found' };
        }

        if (isTerminalStatus(order.status)) {
          return { kind: 'already_settled', order };
        }

        const outcome = this.resolveOutcome(parameters, order);
        const settled = await orders.settlePending(orderId, {
          status: STATUS_BY_OUTCOME[outcome],
          gatewayResponseCode: parameters.Ds_Response,
          gatewayAuthorisationCode: parameters.Ds_AuthorisationCode?.trim() || null,
          settledAt: new Date(),
        });

        if (!settled) {
          // A concurrent delivery settled the order between our read and the update
          const current = await orders.getByOrderId(orderId);
          return { kind: 'already_settled', order: current ?? order };
        }

        return { kind: 'settled', order: settled, outcome };
      });

      switch (reconciliation.kind) {
        case 'order_not_found':
          this.logger.warn(`Notification for unknown order ${orderId} (response ${parameters.Ds_Response})`);
          await this.updateAudit(notification.id, (id) => this.notificationRepository.markError(id, 'order_not_found'));
          return rejected('order_not_found', 200, orderId);

        case 'already_settled':
          this.logger.log(`Order ${orderId} already ${reconciliation.order.status}, ignoring redelivered notification`);
          await this.updateAudit(notification.id, (id) => this.notificationRepository.markProcessed(id, null));
          return {
            ok: true,
            httpStatus: 200,
            body: 'OK',
            orderId,
            status: reconciliation.order.status,
            duplicate: true,
          };

        case 'settled':
          this.logger.log(
            `Order ${orderId} -> ${reconciliation.order.status} (response ${parameters.Ds_Response}: ${describeResponseCode(parameters.Ds_Response)})`,
          );
          await this.updateAudit(notification.id, (id) => this.notificationRepository.markProcessed(id, reconciliation.outcome));
          return {
            ok: true,
            httpStatus: 200,
            body: 'OK',
            orderId,
            status: reconciliation.order.status,
            duplicate: false,
          };
      }
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to process notification for order ${orderId}: ${errorMessage}`);
      if (notification) {
        await this.updateAudit(notification.id, (id) => this.notificationRepository.markError(id, errorMessage));
      }
      return rejected('internal_error', 200, orderId);
    }
  }

  /**
   * A success whose amount differs from what the order should charge is not a payment of that order
   */
  private resolveOutcome(parameters: RedsysNotificationParameters, order: OrderData): PaymentOutcome {
    const outcome = classifyResponseCode(parameters.Ds_Response);
    if (outcome !== 'success' || parameters.Ds_Amount === undefined) {
      return outcome;
    }

    const paidAmount = Number.parseInt(parameters.Ds_Amount, 10);
    if (paidAmount !== order.discountedAmount) {
      this.logger.warn(
        `Amount mismatch for order ${order.orderId}: gateway reported ${paidAmount}, expected ${order.discountedAmount}`,
      );
      return 'failure';
    }
    return outcome;
  }

  /**
   * Verified notifications recorded for an order, newest first
   */
  listNotifications(orderId: string): Promise<PaymentNotificationData[]> {
    return this.notificationRepository.getByOrderId(orderId);
  }

  /**
   * Audit updates run after the order transaction has committed; a failure
   * here is logged and never changes the acknowledgment.
   */
  private async updateAudit(notificationId: number, update: (id: number) => Promise<void>): Promise<void> {
    try {
      await update(notificationId);
    } catch (error) {
      this.logger.error(
        `Could not update audit record of notification ${notificationId}: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
}
