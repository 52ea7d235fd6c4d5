import type { Cents } from '@/domain/types/discount.types';
import type { OrderStatus, TerminalOrderStatus } from '@/domain/types/order.types';

/**
 * Order data structure
 */
export interface OrderData {
  id: string;
  orderId: string;
  totalAmount: Cents;
  discountedAmount: Cents;
  discountCode: string | null;
  currency: string;
  customerEmail: string | null;
  status: OrderStatus;
  gatewayResponseCode: string | null;
  gatewayAuthorisationCode: string | null;
  settledAt: Date | null;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * Input for creating a pending order
 */
export interface CreateOrderInput {
  orderId: string;
  totalAmount: Cents;
  discountedAmount: Cents;
  discountCode: string | null;
  currency: string;
  customerEmail: string | null;
}

/**
 * Terminal transition applied from a verified gateway notification
 */
export interface SettleOrderInput {
  status: TerminalOrderStatus;
  gatewayResponseCode: string | null;
  gatewayAuthorisationCode: string | null;
  settledAt: Date;
}

/**
 * Abstract repository for order operations
 */
export abstract class OrderRepository {
  abstract create(input: CreateOrderInput): Promise<OrderData>;
  abstract getByOrderId(orderId: string): Promise<OrderData | null>;
  /**
   * Moves a pending order to a terminal status. Returns null when the order
   * was not pending anymore (another notification got there first).
   */
  abstract settlePending(orderId: string, input: SettleOrderInput): Promise<OrderData | null>;
}
