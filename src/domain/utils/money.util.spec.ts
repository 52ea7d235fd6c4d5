import { MAX_AMOUNT_CENTS, MoneyUtil } from './money.util';

describe('MoneyUtil', () => {
  describe('toCents', () => {
    it('parses whole and decimal strings', () => {
      expect(MoneyUtil.toCents('100')).toBe(10000);
      expect(MoneyUtil.toCents('45.5')).toBe(4550);
      expect(MoneyUtil.toCents('45.50')).toBe(4550);
      expect(MoneyUtil.toCents(' 12.30 ')).toBe(1230);
      expect(MoneyUtil.toCents('0')).toBe(0);
    });

    it('parses numbers through their decimal text', () => {
      expect(MoneyUtil.toCents(19.99)).toBe(1999);
      expect(MoneyUtil.toCents(0.1)).toBe(10);
      expect(MoneyUtil.toCents(50)).toBe(5000);
    });

    it('rejects negative values, extra decimals and non-numeric input', () => {
      expect(MoneyUtil.toCents('-5')).toBeNull();
      expect(MoneyUtil.toCents('1.234')).toBeNull();
      expect(MoneyUtil.toCents('abc')).toBeNull();
      expect(MoneyUtil.toCents('')).toBeNull();
      expect(MoneyUtil.toCents(0.1 + 0.2)).toBeNull();
      expect(MoneyUtil.toCents(1e21)).toBeNull();
    });

    it('accepts amounts up to the largest storable value', () => {
      expect(MoneyUtil.toCents('21474836.47')).toBe(MAX_AMOUNT_CENTS);
      expect(MoneyUtil.toCents('21474836.48')).toBeNull();
      expect(MoneyUtil.toCents('30000000.00')).toBeNull();
      expect(MoneyUtil.toCents('9999999999.99')).toBeNull();
    });
  });

  describe('format', () => {
    it('renders two decimal places', () => {
      expect(MoneyUtil.format(9000)).toBe('90.00');
      expect(MoneyUtil.format(4550)).toBe('45.50');
      expect(MoneyUtil.format(5)).toBe('0.05');
      expect(MoneyUtil.format(0)).toBe('0.00');
      expect(MoneyUtil.format(-150)).toBe('-1.50');
    });
  });

  describe('multiplyRatio', () => {
    it('is exact when the ratio divides evenly', () => {
      expect(MoneyUtil.multiplyRatio(10000, 9000, 10000)).toBe(9000);
    });

    it('rounds halves up', () => {
      expect(MoneyUtil.multiplyRatio(1, 1, 2)).toBe(1);
      expect(MoneyUtil.multiplyRatio(10, 8500, 10000)).toBe(9);
      expect(MoneyUtil.multiplyRatio(3, 1, 4)).toBe(1);
      expect(MoneyUtil.multiplyRatio(1, 1, 4)).toBe(0);
    });

    it('stays exact for amounts whose product exceeds the float range', () => {
      expect(MoneyUtil.multiplyRatio(999999999999, 3333, 10000)).toBe(333300000000);
    });

    it('rejects negative operands', () => {
      expect(() => MoneyUtil.multiplyRatio(-1, 1, 2)).toThrow(RangeError);
      expect(() => MoneyUtil.multiplyRatio(1, 1, 0)).toThrow(RangeError);
    });
  });

  describe('isPositiveAmount', () => {
    it('accepts positive integers only', () => {
      expect(MoneyUtil.isPositiveAmount(1)).toBe(true);
      expect(MoneyUtil.isPositiveAmount(0)).toBe(false);
      expect(MoneyUtil.isPositiveAmount(-100)).toBe(false);
      expect(MoneyUtil.isPositiveAmount(1.5)).toBe(false);
    });

    it('rejects amounts above the storable range', () => {
      expect(MoneyUtil.isPositiveAmount(MAX_AMOUNT_CENTS)).toBe(true);
      expect(MoneyUtil.isPositiveAmount(MAX_AMOUNT_CENTS + 1)).toBe(false);
    });
  });
});
