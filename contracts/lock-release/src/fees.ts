import { isI128 } from '@bridge-escrow/types';

export const FEE_DENOMINATOR = 100n;

export interface FeeSplit {
  /** Retained in the contract's own balance */
  fee: bigint;
  /** Forwarded to the admin */
  swappedAmount: bigint;
}

/**
 * Split a deposit into fee and forwarded amount with truncating division:
 * `fee = inAmount * feePercentage / 100`.
 *
 * Returns undefined when the intermediate product leaves the i128 range.
 *
 * @example
 * ```typescript
 * computeFeeSplit(100n, 3n); // { fee: 3n, swappedAmount: 97n }
 * computeFeeSplit(1n, 99n);  // { fee: 0n, swappedAmount: 1n }
 * ```
 */
export function computeFeeSplit(inAmount: bigint, feePercentage: bigint): FeeSplit | undefined {
  const product = inAmount * feePercentage;
  if (!isI128(product)) {
    return undefined;
  }
  const fee = product / FEE_DENOMINATOR;
  return { fee, swappedAmount: inAmount - fee };
}
