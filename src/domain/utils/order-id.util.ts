import { randomInt } from 'node:crypto';

const ALPHABET = '0123456789ABCDEFGHIJKLMNOPQRSTUVWXYZ';
const RANDOM_SUFFIX_LENGTH = 8;

/**
 * Gateway order references: 4 leading digits, up to 8 more alphanumerics.
 */
export const ORDER_ID_PATTERN = /^\d{4}[0-9A-Za-z]{0,8}$/;

export class OrderIdUtil {
  static generate(now: Date = new Date(), nextInt: (max: number) => number = (max) => randomInt(max)): string {
    const prefix = String(Math.floor(now.getTime() / 1000) % 10_000).padStart(4, '0');

    let suffix = '';
    for (let i = 0; i < RANDOM_SUFFIX_LENGTH; i++) {
      suffix += ALPHABET[nextInt(ALPHABET.length)];
    }

    return `${prefix}${suffix}`;
  }

  static isValid(orderId: string): boolean {
    return ORDER_ID_PATTERN.test(orderId);
  }
}
