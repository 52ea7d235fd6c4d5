/**
 * Money is always carried as integer cents.
 */
export type Cents = number;

/**
 * 'percentage' values are hundredths of a percent (10.00% -> 1000),
 * 'fixed' values are cents.
 */
export type DiscountType = 'percentage' | 'fixed';

export const MAX_PERCENTAGE_HUNDREDTHS = 10_000;

export interface DiscountTerms {
  discountType: DiscountType;
  discountValue: number;
  minOrderAmount: Cents | null;
  maxDiscountAmount: Cents | null;
}

export type DiscountCalculationResult =
  | { success: true; discountAmount: Cents; discountedAmount: Cents }
  | { success: false; reason: 'minimum_order_not_met' | 'invalid_resulting_amount' };

/**
 * Result of applying a discount code to an order amount
 */
export interface DiscountQuote {
  code: string;
  discountType: DiscountType;
  discountValue: number;
  originalAmount: Cents;
  discountAmount: Cents;
  discountedAmount: Cents;
}
