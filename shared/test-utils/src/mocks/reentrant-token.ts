/**
 * Token double whose transfer runs a caller-supplied hook first, the way a
 * token with sender callbacks would. Used to re-enter the escrow mid-lock.
 */

import { FungibleToken, type Env } from '@bridge-escrow/core';
import type { Address } from '@bridge-escrow/types';

export type TransferHook = (env: Env, from: Address, to: Address, amount: bigint) => void;

export class ReentrantToken extends FungibleToken {
  readonly name: string = 'reentrant-token';

  // Test configuration, not storage: survives rollbacks
  private hook: TransferHook | undefined;

  setTransferHook(hook: TransferHook): void {
    this.hook = hook;
  }

  clearTransferHook(): void {
    this.hook = undefined;
  }

  override transfer(env: Env, from: Address, to: Address, amount: bigint): void {
    this.hook?.(env, from, to, amount);
    super.transfer(env, from, to, amount);
  }
}
