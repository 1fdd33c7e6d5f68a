/**
 * Contract base class and the execution environment handed to every call.
 */

import type { Address, ScValue } from '@bridge-escrow/types';
import { InstanceStorage } from './storage';

/**
 * Type guard used when calling into another contract by address.
 */
export type ContractGuard<C extends LedgerContract> = (contract: LedgerContract) => contract is C;

/**
 * What a contract sees of the ledger during one invocation frame.
 */
export interface Env {
  /** Address of the contract executing this frame */
  readonly contractAddress: Address;
  /** Contract that called into this frame, undefined for a top-level call */
  readonly invoker: Address | undefined;

  /**
   * Succeeds if `address` signed the transaction or is the direct invoker of
   * this frame; otherwise throws AuthorizationError.
   */
  requireAuth(address: Address): void;

  /**
   * Queue an event. It reaches the ledger log only if the transaction commits.
   */
  publish(topics: readonly ScValue[], data: ScValue): void;

  /**
   * Call another contract in a nested frame of the same transaction.
   */
  invoke<C extends LedgerContract, R>(
    address: Address,
    guard: ContractGuard<C>,
    call: (contract: C, env: Env) => R
  ): R;
}

/**
 * A contract deployed on the ledger. State lives only in `storage`; fields on
 * subclasses must be storage slots or constants.
 */
export abstract class LedgerContract {
  /** Name used in errors and logs */
  abstract readonly name: string;

  readonly storage = new InstanceStorage();

  constructor(readonly address: Address) {}
}
