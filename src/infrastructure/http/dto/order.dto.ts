import { z } from 'zod';
import { MoneyUtil } from '@/domain/utils/money.util';
import type { OrderData } from '@/infrastructure/persistence/order.repository';
import type { CheckoutResult } from '@/infrastructure/checkout/checkout.service';
import { describeResponseCode, type RedsysPaymentForm } from '@/infrastructure/redsys/redsys.types';
import type { OrderStatus, PaymentOutcome } from '@/domain/types/order.types';
import type { PaymentNotificationData } from '@/infrastructure/persistence/payment-notification.repository';
import { toDiscountQuoteResponse, type DiscountQuoteResponse } from './discount-code.dto';

export const CreateOrderSchema = z.object({
  amount: z.union([z.string(), z.number()]),
  discountCode: z.string().max(50).nullable().optional(),
  customerEmail: z.string().email().nullable().optional(),
});

export interface OrderResponse {
  orderId: string;
  status: OrderStatus;
  totalAmount: string;
  discountedAmount: string;
  discountCode: string | null;
  currency: string;
  createdAt: string;
  settledAt: string | null;
}

export interface CheckoutResponse {
  order: OrderResponse;
  discount: DiscountQuoteResponse | null;
  payment: RedsysPaymentForm;
}

export const toOrderResponse = (order: OrderData): OrderResponse => ({
  orderId: order.orderId,
  status: order.status,
  totalAmount: MoneyUtil.format(order.totalAmount),
  discountedAmount: MoneyUtil.format(order.discountedAmount),
  discountCode: order.discountCode,
  currency: order.currency,
  createdAt: order.createdAt.toISOString(),
  settledAt: order.settledAt?.toISOString() ?? null,
});

export const toCheckoutResponse = (result: CheckoutResult): CheckoutResponse => ({
  order: toOrderResponse(result.order),
  discount: result.discount ? toDiscountQuoteResponse(result.discount) : null,
  payment: result.payment,
});

export interface PaymentNotificationResponse {
  id: number;
  responseCode: string | null;
  responseDescription: string | null;
  outcome: PaymentOutcome | null;
  processedAt: string | null;
  processingError: string | null;
  receivedAt: string;
}

export const toPaymentNotificationResponse = (notification: PaymentNotificationData): PaymentNotificationResponse => ({
  id: notification.id,
  responseCode: notification.responseCode,
  responseDescription: notification.responseCode ? describeResponseCode(notification.responseCode) : null,
  outcome: notification.outcome,
  processedAt: notification.processedAt?.toISOString() ?? null,
  processingError: notification.processingError,
  receivedAt: notification.createdAt.toISOString(),
});
