/**
 * Argument checks shared by contracts. Each throws ContractError
 * (InvalidAction) naming the offending argument.
 */

import { AddressSchema, AmountSchema } from '@bridge-escrow/config';
import { ContractError, isI128, type Address } from '@bridge-escrow/types';

export function parseAddressArg(value: string, field: string, contract: string): Address {
  const result = AddressSchema.safeParse(value);
  if (!result.success) {
    throw new ContractError(`${field} is not a valid address: ${value}`, 'InvalidAction', contract);
  }
  return result.data;
}

export function requireI128(value: bigint, field: string, contract: string): bigint {
  if (!isI128(value)) {
    throw new ContractError(`${field} exceeds the 128-bit range`, 'InvalidAction', contract);
  }
  return value;
}

/**
 * A transfer amount: at least one unit and within i128.
 */
export function parseAmountArg(value: bigint, field: string, contract: string): bigint {
  const result = AmountSchema.safeParse(value);
  if (result.success) {
    return result.data;
  }
  const message = value < 1n ? `${field} must be at least 1` : `${field} exceeds the 128-bit range`;
  throw new ContractError(message, 'InvalidAction', contract);
}
