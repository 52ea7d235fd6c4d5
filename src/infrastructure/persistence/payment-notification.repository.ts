import type { PaymentOutcome } from '@/domain/types/order.types';

/**
 * Payment notification data structure
 */
export interface PaymentNotificationData {
  id: number;
  orderId: string | null;
  responseCode: string | null;
  rawParameters: string;
  outcome: PaymentOutcome | null;
  processedAt: Date | null;
  processingError: string | null;
  createdAt: Date;
}

/**
 * Input for recording a verified notification
 */
export interface CreatePaymentNotificationInput {
  orderId: string;
  responseCode: string;
  rawParameters: string;
}

/**
 * Abstract repository for the payment notification audit log
 */
export abstract class PaymentNotificationRepository {
  abstract create(input: CreatePaymentNotificationInput): Promise<PaymentNotificationData>;
  abstract markProcessed(id: number, outcome: PaymentOutcome | null): Promise<void>;
  abstract markError(id: number, error: string): Promise<void>;
  abstract getByOrderId(orderId: string): Promise<PaymentNotificationData[]>;
}
