import { randomUUID } from 'node:crypto';
import { Injectable } from '@nestjs/common';
import {
  OrderRepository,
  type OrderData,
  type CreateOrderInput,
  type SettleOrderInput,
} from '../order.repository';
import { InMemoryStore } from './in-memory-store';

@Injectable()
export class OrderInMemoryStore extends OrderRepository {
  readonly rows = new InMemoryStore<OrderData>();

  async create(input: CreateOrderInput): Promise<OrderData> {
    if (this.rows.get(input.orderId)) {
      throw new Error(`duplicate key value violates unique constraint on order_id ${input.orderId}`);
    }

    const now = new Date();
    const row: OrderData = {
      id: randomUUID(),
      orderId: input.orderId,
      totalAmount: input.totalAmount,
      discountedAmount: input.discountedAmount,
      discountCode: input.discountCode,
      currency: input.currency,
      customerEmail: input.customerEmail,
      status: 'pending',
      gatewayResponseCode: null,
      gatewayAuthorisationCode: null,
      settledAt: null,
      createdAt: now,
      updatedAt: now,
    };
    this.rows.set(row.orderId, row);
    return row;
  }

  async getByOrderId(orderId: string): Promise<OrderData | null> {
    return this.rows.get(orderId) ?? null;
  }

  async settlePending(orderId: string, input: SettleOrderInput): Promise<OrderData | null> {
    const current = this.rows.get(orderId);
    if (!current || current.status !== 'pending') {
      return null;
    }

    const updated: OrderData = {
      ...current,
      status: input.status,
      gatewayResponseCode: input.gatewayResponseCode,
      gatewayAuthorisationCode: input.gatewayAuthorisationCode,
      settledAt: input.settledAt,
      updatedAt: new Date(),
    };
    this.rows.set(orderId, updated);
    return updated;
  }
}
