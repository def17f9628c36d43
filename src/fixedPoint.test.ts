/**
 * Fixed-Point Arithmetic Tests
 */

import {
  PRECISION,
  assertUnsigned,
  minBigInt,
  maxBigInt,
  mulDiv,
  parseUnits,
  formatUnits,
} from './fixedPoint';

describe('Fixed-Point Arithmetic', () => {
  it('should use 1e18 as accumulator precision', () => {
    expect(PRECISION).toBe(1_000_000_000_000_000_000n);
  });

  describe('assertUnsigned', () => {
    it('should accept zero and positive values', () => {
      expect(() => assertUnsigned(0n, 'Amount')).not.toThrow();
      expect(() => assertUnsigned(5n, 'Amount')).not.toThrow();
    });

    it('should reject negative values with the label', () => {
      expect(() => assertUnsigned(-1n, 'Stake')).toThrow('Stake cannot be negative: -1');
    });
  });

  describe('minBigInt / maxBigInt', () => {
    it('should pick the smaller and larger value', () => {
      expect(minBigInt(3n, 7n)).toBe(3n);
      expect(minBigInt(7n, 3n)).toBe(3n);
      expect(maxBigInt(3n, 7n)).toBe(7n);
      expect(maxBigInt(4n, 4n)).toBe(4n);
    });
  });

  describe('mulDiv', () => {
    it('should floor the scaled quotient', () => {
      expect(mulDiv(100n, 1n, 7n)).toBe(14n);
      expect(mulDiv(10n, PRECISION, 3n)).toBe(3_333_333_333_333_333_333n);
    });

    it('should not lose precision on large intermediates', () => {
      const big = 2n ** 200n;
      expect(mulDiv(big, big, big)).toBe(big);
    });

    it('should throw on a zero denominator', () => {
      expect(() => mulDiv(1n, 1n, 0n)).toThrow('Division by zero in mulDiv');
    });
  });

  describe('parseUnits', () => {
    it('should parse whole and fractional amounts', () => {
      expect(parseUnits('1', 18)).toBe(PRECISION);
      expect(parseUnits('1.5', 18)).toBe(1_500_000_000_000_000_000n);
      expect(parseUnits('0.000001', 6)).toBe(1n);
      expect(parseUnits(' 42 ', 0)).toBe(42n);
    });

    it('should reject malformed amounts', () => {
      expect(() => parseUnits('-1', 6)).toThrow('Invalid unsigned decimal amount');
      expect(() => parseUnits('1.', 6)).toThrow('Invalid unsigned decimal amount');
      expect(() => parseUnits('abc', 6)).toThrow('Invalid unsigned decimal amount');
    });

    it('should reject too many decimal places', () => {
      expect(() => parseUnits('0.1234567', 6)).toThrow('Too many decimal places');
    });

    it('should reject invalid decimals', () => {
      expect(() => parseUnits('1', -1)).toThrow('Invalid decimals: -1');
      expect(() => parseUnits('1', 1.5)).toThrow('Invalid decimals: 1.5');
    });
  });

  describe('formatUnits', () => {
    it('should format with trailing zeros trimmed', () => {
      expect(formatUnits(1_500_000_000_000_000_000n, 18)).toBe('1.5');
      expect(formatUnits(PRECISION, 18)).toBe('1');
      expect(formatUnits(1n, 6)).toBe('0.000001');
      expect(formatUnits(0n, 6)).toBe('0');
    });

    it('should return the integer for zero decimals', () => {
      expect(formatUnits(123n, 0)).toBe('123');
    });

    it('should reject negative amounts', () => {
      expect(() => formatUnits(-5n, 2)).toThrow('Amount cannot be negative: -5');
    });

    it('should invert parseUnits', () => {
      expect(formatUnits(parseUnits('1234.000567', 9), 9)).toBe('1234.000567');
    });
  });
});
