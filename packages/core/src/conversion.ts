/**
 * @tierpay/core: USD → native currency conversion
 *
 * All arithmetic is integer bigint, rounded up.
 */
import { NATIVE_UNIT } from './constants.js';

/**
 * Ceiling division for non-negative operands.
 * Returns 0 when `a` is 0, otherwise `1 + (a - 1) / b`.
 */
export function ceilDiv(a: bigint, b: bigint): bigint {
  if (b <= 0n) {
    throw new RangeError('ceilDiv divisor must be positive');
  }
  if (a < 0n) {
    throw new RangeError('ceilDiv dividend must be non-negative');
  }
  if (a === 0n) return 0n;
  return 1n + (a - 1n) / b;
}

/**
 * Native units owed for a whole-USD amount at a given feed price.
 *
 * @param usdBaseAmount - Whole USD
 * @param price - Price of one native coin, scaled by `feedDecimals`
 * @param feedDecimals - Decimals reported by the feed
 */
export function usdToNative(usdBaseAmount: bigint, price: bigint, feedDecimals: number): bigint {
  if (!Number.isInteger(feedDecimals) || feedDecimals < 0) {
    throw new RangeError(`Invalid feed decimals: ${feedDecimals}`);
  }
  const scaledUsd = usdBaseAmount * 10n ** BigInt(feedDecimals);
  return ceilDiv(scaledUsd * NATIVE_UNIT, price);
}
