import { Injectable, Inject, Logger } from '@nestjs/common';
import { and, eq } from 'drizzle-orm';
import {
  OrderRepository,
  type OrderData,
  type CreateOrderInput,
  type SettleOrderInput,
} from '../order.repository';
import { orders } from '@/infrastructure/database/schema';
import { DATABASE_CONNECTION, type DrizzleExecutor } from '@/infrastructure/database/database.module';

@Injectable()
export class OrderDrizzleStore extends OrderRepository {
  private readonly logger = new Logger(OrderDrizzleStore.name);

  constructor(
    @Inject(DATABASE_CONNECTION)
    private readonly db: DrizzleExecutor,
  ) {
    super();
  }

  private mapToOrderData(row: typeof orders.$inferSelect): OrderData {
    return {
      id: row.id,
      orderId: row.orderId,
      totalAmount: row.totalAmount,
      discountedAmount: row.discountedAmount,
      discountCode: row.discountCode,
      currency: row.currency,
      customerEmail: row.customerEmail,
      status: row.status,
      gatewayResponseCode: row.gatewayResponseCode,
      gatewayAuthorisationCode: row.gatewayAuthorisationCode,
      settledAt: row.settledAt,
      createdAt: row.createdAt,
      updatedAt: row.updatedAt,
    };
  }

  async create(input: CreateOrderInput): Promise<OrderData> {
    const result = await this.db
      .insert(orders)
      .values({
        orderId: input.orderId,
        totalAmount: input.totalAmount,
        discountedAmount: input.discountedAmount,
        discountCode: input.discountCode,
        currency: input.currency,
        customerEmail: input.customerEmail,
        status: 'pending',
      })
      .returning();

    this.logger.log(`Created pending order ${input.orderId}`);
    return this.mapToOrderData(result[0]);
  }

  async getByOrderId(orderId: string): Promise<OrderData | null> {
    const result = await this.db
      .select()
      .from(orders)
      .where(eq(orders.orderId, orderId))
      .limit(1);

    if (result.length === 0) {
      return null;
    }

    return this.mapToOrderData(result[0]);
  }

  async settlePending(orderId: string, input: SettleOrderInput): Promise<OrderData | null> {
    const result = await this.db
      .update(orders)
      .set({
        status: input.status,
        gatewayResponseCode: input.gatewayResponseCode,
        gatewayAuthorisationCode: input.gatewayAuthorisationCode,
        settledAt: input.settledAt,
        updatedAt: new Date(),
      })
      .where(and(eq(orders.orderId, orderId), eq(orders.status, 'pending')))
      .returning();

    if (result.length === 0) {
      return null;
    }

    this.logger.log(`Order ${orderId} settled as ${input.status}`);
    return this.mapToOrderData(result[0]);
  }
}
