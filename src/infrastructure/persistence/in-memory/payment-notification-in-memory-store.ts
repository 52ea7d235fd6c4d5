import { Injectable } from '@nestjs/common';
import {
  PaymentNotificationRepository,
  type PaymentNotificationData,
  type CreatePaymentNotificationInput,
} from '../payment-notification.repository';
import type { PaymentOutcome } from '@/domain/types/order.types';
import { InMemoryStore } from './in-memory-store';

@Injectable()
export class PaymentNotificationInMemoryStore extends PaymentNotificationRepository {
  readonly rows = new InMemoryStore<PaymentNotificationData>();
  private nextId = 1;

  async create(input: CreatePaymentNotificationInput): Promise<PaymentNotificationData> {
    const row: PaymentNotificationData = {
      id: this.nextId++,
      orderId: input.orderId,
      responseCode: input.responseCode,
      rawParameters: input.rawParameters,
      outcome: null,
      processedAt: null,
      processingError: null,
      createdAt: new Date(),
    };
    this.rows.set(String(row.id), row);
    return row;
  }

  async markProcessed(id: number, outcome: PaymentOutcome | null): Promise<void> {
    const current = this.rows.get(String(id));
    if (current) {
      this.rows.set(String(id), { ...current, processedAt: new Date(), outcome });
    }
  }

  async markError(id: number, error: string): Promise<void> {
    const current = this.rows.get(String(id));
    if (current) {
      this.rows.set(String(id), { ...current, processingError: error });
    }
  }

  async getByOrderId(orderId: string): Promise<PaymentNotificationData[]> {
    return this.rows
      .values()
      .filter((row) => row.orderId === orderId)
      .sort((a, b) => b.id - a.id);
  }
}
