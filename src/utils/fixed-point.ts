// Fixed-point helpers. Prices are WADs (integers scaled by 1e18).

import Big from 'big.js';

export const WAD_DECIMALS = 18;
export const WAD = 10n ** 18n;

// Stored prices must fit in 240 bits
export const MAX_STORED_PRICE = (1n << 240n) - 1n;

export function pow10(exponent: number): bigint {
  if (!Number.isInteger(exponent) || exponent < 0) {
    throw new RangeError(`pow10: exponent must be a non-negative integer, got ${exponent}`);
  }
  return 10n ** BigInt(exponent);
}

/**
 * a * b / denominator with the full-width intermediate product, truncating toward zero.
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  if (denominator === 0n) throw new RangeError('mulDiv: division by zero');
  return (a * b) / denominator;
}

/**
 * Rescale an amount between decimal precisions. Scaling down truncates the
 * dropped digits.
 */
export function scaleDecimals(amount: bigint, fromDecimals: number, toDecimals: number): bigint {
  if (fromDecimals === toDecimals) return amount;
  if (toDecimals > fromDecimals) return amount * pow10(toDecimals - fromDecimals);
  return amount / pow10(fromDecimals - toDecimals);
}

/** Decimal value (e.g. 1.0001 or "2500.5") to an integer with `decimals` digits, rounded down. */
export function toFixedPoint(value: number | string, decimals: number = WAD_DECIMALS): bigint {
  const scaled = new Big(value).times(new Big(10).pow(decimals)).round(0, Big.roundDown);
  return BigInt(scaled.toFixed(0));
}

/** Integer with `decimals` digits to a human string, for logs. */
export function formatFixedPoint(value: bigint, decimals: number = WAD_DECIMALS, dp = 6): string {
  return new Big(value.toString()).div(new Big(10).pow(decimals)).toFixed(dp);
}
