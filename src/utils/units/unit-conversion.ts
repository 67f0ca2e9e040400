/**
 * Unit Conversion Utilities
 *
 * Converts integer amounts in wei into display floats in ether or gwei.
 * Conversion is best-effort: display values are non-critical, so malformed
 * or negative input yields 0 (and a warning) instead of an error.
 *
 * @module unit-conversion
 */

import { formatUnits } from 'viem';
import { createServiceLogger, log } from '../../logging/index.js';

export const ETHER_DECIMALS = 18;
export const GWEI_DECIMALS = 9;

/**
 * Upstream representation of an integer wei amount: a bigint, a safe
 * integer, or a decimal / 0x-hex string
 */
export type WeiAmount = bigint | number | string;

const logger = createServiceLogger('UnitConversion');

function toWei(amount: WeiAmount): bigint | null {
  try {
    if (typeof amount === 'bigint') {
      return amount;
    }
    if (typeof amount === 'number') {
      return Number.isSafeInteger(amount) ? BigInt(amount) : null;
    }
    const trimmed = amount.trim();
    return trimmed === '' ? null : BigInt(trimmed);
  } catch {
    // BigInt() throws SyntaxError on malformed strings
    return null;
  }
}

/**
 * Convert a wei amount to a float in the unit with the given decimals
 *
 * @returns the converted value, or 0 when the amount is malformed or negative
 */
export function convertWei(amount: WeiAmount, decimals: number): number {
  const wei = toWei(amount);

  if (wei === null || wei < 0n) {
    log.fallback(logger, 'convertWei', 0, {
      input: typeof amount === 'bigint' ? amount.toString() : amount,
      decimals,
    });
    return 0;
  }

  return Number(formatUnits(wei, decimals));
}

/**
 * @example
 * ```typescript
 * weiToEth(1_000_000_000_000_000_000n); // 1
 * weiToEth(42_000_000_000_000n);        // 0.000042
 * ```
 */
export function weiToEth(amount: WeiAmount): number {
  return convertWei(amount, ETHER_DECIMALS);
}

/**
 * @example
 * ```typescript
 * weiToGwei(30_000_000_000n); // 30
 * ```
 */
export function weiToGwei(amount: WeiAmount): number {
  return convertWei(amount, GWEI_DECIMALS);
}
