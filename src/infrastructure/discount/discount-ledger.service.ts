import { Injectable, Logger } from '@nestjs/common';
import { DiscountCodeRepository, type DiscountCodeData } from '@/infrastructure/persistence/discount-code.repository';
import type { TransactionalRepositories } from '@/infrastructure/persistence/transaction-manager';
import { DiscountCalculatorService } from '@/domain/services/discount-calculator.service';
import { MoneyUtil } from '@/domain/utils/money.util';
import type { Cents, DiscountQuote } from '@/domain/types/discount.types';

export type DiscountErrorCode =
  | 'code_not_found'
  | 'code_not_yet_active'
  | 'code_expired'
  | 'usage_limit_reached'
  | 'minimum_order_not_met'
  | 'invalid_resulting_amount'
  | 'invalid_amount'
  | 'duplicate_code'
  | 'discount_code_not_found'
  | 'invalid_discount_terms';

/**
 * Error types for discount code operations
 */
export class DiscountError extends Error {
  constructor(
    message: string,
    public readonly code: DiscountErrorCode,
  ) {
    super(message);
    this.name = 'DiscountError';
  }
}

export const normalizeDiscountCode = (code: string): string => code.trim().toUpperCase();

/**
 * Validates discount codes against an order amount.
 * `preview` never writes; `redeem` records one use, inside the caller's transaction.
 */
@Injectable()
export class DiscountLedgerService {
  private readonly logger = new Logger(DiscountLedgerService.name);

  constructor(
    private readonly discountCodeRepository: DiscountCodeRepository,
    private readonly discountCalculator: DiscountCalculatorService,
  ) {}

  /**
   * Quote the discounted amount without consuming a use.
   * @throws DiscountError if the code cannot be applied
   */
  async preview(code: string, amount: Cents): Promise<DiscountQuote> {
    this.assertAmount(amount);
    const discountCode = await this.discountCodeRepository.getActiveByCode(normalizeDiscountCode(code));
    return this.quote(this.requireFound(code, discountCode), amount);
  }

  /**
   * Apply the code and increment its usage counter. Pass the repositories of an
   * open transaction so the redemption commits or rolls back with the order.
   * @throws DiscountError if the code cannot be applied or its last use was taken concurrently
   */
  async redeem(
    code: string,
    amount: Cents,
    repositories: Pick<TransactionalRepositories, 'discountCodes'> = { discountCodes: this.discountCodeRepository },
  ): Promise<DiscountQuote> {
    this.assertAmount(amount);
    const discountCode = this.requireFound(code, await repositories.discountCodes.getActiveByCode(normalizeDiscountCode(code)));
    const quote = this.quote(discountCode, amount);

    const redeemed = await repositories.discountCodes.incrementUsesIfAvailable(discountCode.id);
    if (!redeemed) {
      this.logger.warn(`Discount code ${quote.code} lost its last use to a concurrent redemption`);
      throw new DiscountError('This discount code has reached its usage limit.', 'usage_limit_reached');
    }

    this.logger.log(
      `Redeemed discount code ${quote.code}: ${MoneyUtil.format(quote.discountAmount)} off (uses ${redeemed.uses}${redeemed.maxUses !== null ? `/${redeemed.maxUses}` : ''})`,
    );
    return quote;
  }

  private assertAmount(amount: Cents): void {
    if (!MoneyUtil.isPositiveAmount(amount)) {
      throw new DiscountError('Order amount must be a positive value with at most two decimals.', 'invalid_amount');
    }
  }

  private requireFound(rawCode: string, discountCode: DiscountCodeData | null): DiscountCodeData {
    if (!discountCode) {
      this.logger.warn(`Discount code '${rawCode}' not found`);
      throw new DiscountError('Invalid discount code.', 'code_not_found');
    }
    return discountCode;
  }

  private quote(discountCode: DiscountCodeData, amount: Cents): DiscountQuote {
    const now = new Date();

    if (discountCode.startsAt && discountCode.startsAt > now) {
      throw new DiscountError('This discount code is not active yet.', 'code_not_yet_active');
    }

    if (discountCode.expiresAt && now > discountCode.expiresAt) {
      throw new DiscountError('This discount code has expired.', 'code_expired');
    }

    if (discountCode.maxUses !== null && discountCode.uses >= discountCode.maxUses) {
      throw new DiscountError('This discount code has reached its usage limit.', 'usage_limit_reached');
    }

    const result = this.discountCalculator.calculate(amount, discountCode);

    if (!result.success) {
      if (result.reason === 'minimum_order_not_met') {
        throw new DiscountError(
          `A minimum order of ${MoneyUtil.format(discountCode.minOrderAmount ?? 0)} is required for this discount code.`,
          'minimum_order_not_met',
        );
      }
      this.logger.error(`Discount code ${discountCode.code} produced an invalid amount for ${amount}`);
      throw new DiscountError('The discount produced an invalid order amount.', 'invalid_resulting_amount');
    }

    return {
      code: discountCode.code,
      discountType: discountCode.discountType,
      discountValue: discountCode.discountValue,
      originalAmount: amount,
      discountAmount: result.discountAmount,
      discountedAmount: result.discountedAmount,
    };
  }
}
