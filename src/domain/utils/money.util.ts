import type { Cents } from '../types/discount.types';

const AMOUNT_PATTERN = /^(\d{1,10})(?:\.(\d{1,2}))?$/;

/**
 * Largest amount the money columns hold (Postgres `integer`), 21474836.47
 */
export const MAX_AMOUNT_CENTS = 2_147_483_647;

/**
 * Fixed-point helpers for two-decimal currency amounts.
 * Amounts are parsed from their decimal text and never pass through a float.
 */
export class MoneyUtil {
  /**
   * Parses "45", "45.5" or "45.50" (or the equivalent number) into cents.
   * Returns null for negative values, more than two decimals, non-numeric input
   * or amounts above {@link MAX_AMOUNT_CENTS}.
   */
  static toCents(value: string | number): Cents | null {
    const text = typeof value === 'number' ? String(value) : value.trim();
    const match = AMOUNT_PATTERN.exec(text);
    if (!match) {
      return null;
    }

    const units = Number.parseInt(match[1], 10);
    const fraction = Number.parseInt((match[2] ?? '0').padEnd(2, '0'), 10);
    const cents = units * 100 + fraction;
    return cents <= MAX_AMOUNT_CENTS ? cents : null;
  }

  static format(cents: Cents): string {
    const sign = cents < 0 ? '-' : '';
    const absolute = Math.abs(cents);
    return `${sign}${Math.floor(absolute / 100)}.${String(absolute % 100).padStart(2, '0')}`;
  }

  /**
   * value * numerator / denominator, rounded half-up.
   * Intermediate products go through BigInt so large amounts stay exact.
   */
  static multiplyRatio(value: Cents, numerator: number, denominator: number): Cents {
    if (value < 0 || numerator < 0 || denominator <= 0) {
      throw new RangeError('multiplyRatio expects non-negative operands and a positive denominator');
    }

    const product = BigInt(value) * BigInt(numerator);
    const divisor = BigInt(denominator);
    return Number((product * 2n + divisor) / (divisor * 2n));
  }

  static isPositiveAmount(value: Cents): boolean {
    return Number.isSafeInteger(value) && value > 0 && value <= MAX_AMOUNT_CENTS;
  }
}
