import { Injectable, Inject, Logger } from '@nestjs/common';
import { desc, eq } from 'drizzle-orm';
import {
  PaymentNotificationRepository,
  type PaymentNotificationData,
  type CreatePaymentNotificationInput,
} from '../payment-notification.repository';
import type { PaymentOutcome } from '@/domain/types/order.types';
import { paymentNotifications } from '@/infrastructure/database/schema';
import { DATABASE_CONNECTION, type DrizzleExecutor } from '@/infrastructure/database/database.module';

@Injectable()
export class PaymentNotificationDrizzleStore extends PaymentNotificationRepository {
  private readonly logger = new Logger(PaymentNotificationDrizzleStore.name);

  constructor(
    @Inject(DATABASE_CONNECTION)
    private readonly db: DrizzleExecutor,
  ) {
    super();
  }

  private mapToData(row: typeof paymentNotifications.$inferSelect): PaymentNotificationData {
    return {
      id: row.id,
      orderId: row.orderId,
      responseCode: row.responseCode,
      rawParameters: row.rawParameters,
      outcome: row.outcome,
      processedAt: row.processedAt,
      processingError: row.processingError,
      createdAt: row.createdAt,
    };
  }

  async create(input: CreatePaymentNotificationInput): Promise<PaymentNotificationData> {
    const result = await this.db
      .insert(paymentNotifications)
      .values({
        orderId: input.orderId,
        responseCode: input.responseCode,
        rawParameters: input.rawParameters,
      })
      .returning();

    this.logger.log(`Recorded payment notification for order ${input.orderId}`);
    return this.mapToData(result[0]);
  }

  async markProcessed(id: number, outcome: PaymentOutcome | null): Promise<void> {
    await this.db
      .update(paymentNotifications)
      .set({ processedAt: new Date(), outcome })
      .where(eq(paymentNotifications.id, id));
  }

  async markError(id: number, error: string): Promise<void> {
    await this.db
      .update(paymentNotifications)
      .set({ processingError: error })
      .where(eq(paymentNotifications.id, id));
  }

  async getByOrderId(orderId: string): Promise<PaymentNotificationData[]> {
    const result = await this.db
      .select()
      .from(paymentNotifications)
      .where(eq(paymentNotifications.orderId, orderId))
      .orderBy(desc(paymentNotifications.createdAt));

    return result.map((row) => this.mapToData(row));
  }
}
