import { Injectable, Logger } from '@nestjs/common';
import { AppConfigService } from '@/config/app.config';
import { TransactionManager } from '@/infrastructure/persistence/transaction-manager';
import { OrderRepository, type OrderData } from '@/infrastructure/persistence/order.repository';
import { DiscountLedgerService } from '@/infrastructure/discount/discount-ledger.service';
import { RedsysService } from '@/infrastructure/redsys/redsys.service';
import type { RedsysPaymentForm } from '@/infrastructure/redsys/redsys.types';
import { MoneyUtil } from '@/domain/utils/money.util';
import { OrderIdUtil } from '@/domain/utils/order-id.util';
import type { DiscountQuote } from '@/domain/types/discount.types';

export type CheckoutErrorCode = 'invalid_amount' | 'zero_amount';

export class CheckoutError extends Error {
  constructor(
    message: string,
    public readonly code: CheckoutErrorCode,
  ) {
    super(message);
    this.name = 'CheckoutError';
  }
}

export interface CreateOrderRequest {
  amount: string | number;
  discountCode?: string | null;
  customerEmail?: string | null;
}

export interface CheckoutResult {
  order: OrderData;
  discount: DiscountQuote | null;
  payment: RedsysPaymentForm;
}

/**
 * Creates pending orders and the signed gateway form that pays for them.
 * A discount code is redeemed in the same transaction that inserts the order.
 */
@Injectable()
export class CheckoutService {
  private readonly logger = new Logger(CheckoutService.name);

  constructor(
    private readonly transactionManager: TransactionManager,
    private readonly orderRepository: OrderRepository,
    private readonly discountLedger: DiscountLedgerService,
    private readonly redsysService: RedsysService,
    private readonly appConfig: AppConfigService,
  ) {}

  /**
   * @throws CheckoutError for an unusable amount
   * @throws DiscountError when the discount code cannot be redeemed
   */
  async createOrder(request: CreateOrderRequest): Promise<CheckoutResult> {
    const amount = MoneyUtil.toCents(request.amount);
    if (amount === null || !MoneyUtil.isPositiveAmount(amount)) {
      throw new CheckoutError('Order amount must be a positive value with at most two decimals.', 'invalid_amount');
    }

    const discountCode = request.discountCode?.trim() || null;

    const { order, discount } = await this.transactionManager.run(async (repositories) => {
      const quote = discountCode ? await this.discountLedger.redeem(discountCode, amount, repositories) : null;
      const discountedAmount = quote ? quote.discountedAmount : amount;

      if (discountedAmount === 0) {
        throw new CheckoutError('The discounted order total is zero and cannot be charged.', 'zero_amount');
      }

      const created = await repositories.orders.create({
        orderId: OrderIdUtil.generate(),
        totalAmount: amount,
        discountedAmount,
        discountCode: quote ? quote.code : null,
        currency: this.appConfig.getRedsysCurrency(),
        customerEmail: request.customerEmail ?? null,
      });

      return { order: created, discount: quote };
    });

    this.logger.log(
      `Created order ${order.orderId}: ${MoneyUtil.format(order.totalAmount)} -> ${MoneyUtil.format(order.discountedAmount)} ${order.currency}${order.discountCode ? ` (code ${order.discountCode})` : ''}`,
    );

    return {
      order,
      discount,
      payment: this.redsysService.createPaymentForm(order),
    };
  }

  getOrder(orderId: string): Promise<OrderData | null> {
    return this.orderRepository.getByOrderId(orderId);
  }
}
