import { Injectable } from '@nestjs/common';
import { MoneyUtil } from '../utils/money.util';
import {
  MAX_PERCENTAGE_HUNDREDTHS,
  type Cents,
  type DiscountCalculationResult,
  type DiscountTerms,
} from '../types/discount.types';

/**
 * Computes the amount charged after a discount.
 * Pure arithmetic on cents: knows nothing about codes, usage or expiry.
 */
@Injectable()
export class DiscountCalculatorService {
  private static errorResult(
    reason: 'minimum_order_not_met' | 'invalid_resulting_amount',
  ): DiscountCalculationResult {
    return { success: false, reason };
  }

  calculate(amount: Cents, terms: DiscountTerms): DiscountCalculationResult {
    if (terms.minOrderAmount !== null && amount < terms.minOrderAmount) {
      return DiscountCalculatorService.errorResult('minimum_order_not_met');
    }

    let discountedAmount = this.applyDiscount(amount, terms);

    if (terms.maxDiscountAmount !== null && amount - discountedAmount > terms.maxDiscountAmount) {
      discountedAmount = amount - terms.maxDiscountAmount;
    }

    if (!Number.isSafeInteger(discountedAmount) || discountedAmount < 0 || discountedAmount > amount) {
      return DiscountCalculatorService.errorResult('invalid_resulting_amount');
    }

    return {
      success: true,
      discountAmount: amount - discountedAmount,
      discountedAmount,
    };
  }

  private applyDiscount(amount: Cents, terms: DiscountTerms): Cents {
    if (terms.discountType === 'percentage') {
      // A stored value above 100% yields a negative remainder, reported as invalid by the caller
      const remaining = MAX_PERCENTAGE_HUNDREDTHS - terms.discountValue;
      if (remaining < 0) {
        return -1;
      }
      return MoneyUtil.multiplyRatio(amount, remaining, MAX_PERCENTAGE_HUNDREDTHS);
    }

    return amount - Math.min(terms.discountValue, amount);
  }
}
