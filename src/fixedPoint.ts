/**
 * Fixed-Point Arithmetic for Reward Accounting
 *
 * All ledger quantities are unsigned integers held as bigint. The reward-per-token
 * accumulator is scaled by PRECISION so that per-unit rewards smaller than one
 * asset unit survive integer division.
 */

/**
 * Scale factor of the reward-per-token accumulator (1e18)
 */
export const PRECISION = 10n ** 18n;

/**
 * Largest number of decimals accepted by parseUnits/formatUnits
 */
export const MAX_DECIMALS = 36;

/**
 * Throw unless value is a non-negative bigint
 */
export function assertUnsigned(value: bigint, label: string): void {
  if (value < 0n) {
    throw new Error(`${label} cannot be negative: ${value}`);
  }
}

export function minBigInt(a: bigint, b: bigint): bigint {
  return a < b ? a : b;
}

export function maxBigInt(a: bigint, b: bigint): bigint {
  return a > b ? a : b;
}

/**
 * floor(a * b / denominator)
 *
 * @throws Error if denominator is zero
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new Error('Division by zero in mulDiv');
  }
  return (a * b) / denominator;
}

function assertDecimals(decimals: number): void {
  if (!Number.isInteger(decimals) || decimals < 0 || decimals > MAX_DECIMALS) {
    throw new Error(`Invalid decimals: ${decimals}`);
  }
}

/**
 * Parse a decimal string into base units
 *
 * Example (decimals = 18): "1.5" → 1_500_000_000_000_000_000n
 *
 * @throws Error on malformed input or more fractional digits than decimals
 */
export function parseUnits(value: string, decimals: number): bigint {
  assertDecimals(decimals);

  const trimmed = value.trim();
  if (!/^\d+(\.\d+)?$/.test(trimmed)) {
    throw new Error(`Invalid unsigned decimal amount: "${value}"`);
  }

  const [whole, fraction = ''] = trimmed.split('.');
  if (fraction.length > decimals) {
    throw new Error(`Too many decimal places in "${value}" (max ${decimals})`);
  }

  const scale = 10n ** BigInt(decimals);
  return BigInt(whole) * scale + BigInt(fraction.padEnd(decimals, '0') || '0');
}

/**
 * Format base units as a decimal string, trimming trailing zeros
 *
 * Example (decimals = 18): 1_500_000_000_000_000_000n → "1.5"
 */
export function formatUnits(value: bigint, decimals: number): string {
  assertDecimals(decimals);
  assertUnsigned(value, 'Amount');

  if (decimals === 0) {
    return value.toString();
  }

  const scale = 10n ** BigInt(decimals);
  const whole = value / scale;
  const fraction = (value % scale).toString().padStart(decimals, '0').replace(/0+$/, '');

  return fraction.length > 0 ? `${whole}.${fraction}` : whole.toString();
}
