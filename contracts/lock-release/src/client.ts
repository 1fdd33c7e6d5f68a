/**
 * Typed client for a deployed LockReleaseContract.
 *
 * Each mutating method is one ledger transaction signed by the client's
 * signers; views run as simulations and never commit.
 *
 * @example
 * ```typescript
 * const bridge = deployLockRelease(ledger, { owner, feePercentage: 3n });
 * bridge.connect(owner).addAdmin(operator);
 * bridge.connect(alice).lock({ userAddress: alice, fromToken, destToken, inAmount: 100n, destChain, recipientAddress });
 * bridge.connect(operator).release({ amount: 50n, user: bob, destinationToken: fromToken });
 * ```
 */

import type { Env, Ledger } from '@bridge-escrow/core';
import type { Address } from '@bridge-escrow/types';
import {
  LockReleaseEvents,
  decodeLockEvent,
  decodeReleaseEvent,
  type LockEventRecord,
  type ReleaseEventRecord,
} from './events';
import { LockReleaseContract } from './lock-release.contract';
import type { FeeConfig, LockData, LockRequest, ReleaseRequest } from './types';

export interface DeployLockReleaseOptions {
  owner: Address;
  /** Integer percentage, 0-100 */
  feePercentage: bigint | number;
}

export class LockReleaseClient {
  constructor(
    readonly ledger: Ledger,
    readonly contract: LockReleaseContract,
    readonly signers: readonly Address[] = []
  ) {}

  get address(): Address {
    return this.contract.address;
  }

  /**
   * Client whose transactions are authorized by `signers`.
   */
  connect(...signers: Address[]): LockReleaseClient {
    return new LockReleaseClient(this.ledger, this.contract, signers);
  }

  initialize(owner: Address, feePercentage: bigint | number): void {
    this.send((contract, env) => contract.initialize(env, owner, feePercentage));
  }

  addAdmin(admin: Address): void {
    this.send((contract, env) => contract.addAdmin(env, admin));
  }

  removeAdmin(): void {
    this.send((contract, env) => contract.removeAdmin(env));
  }

  pause(): void {
    this.send((contract, env) => contract.pause(env));
  }

  unpause(): void {
    this.send((contract, env) => contract.unpause(env));
  }

  lock(request: LockRequest): void {
    this.send((contract, env) => contract.lock(env, request));
  }

  release(request: ReleaseRequest): void {
    this.send((contract, env) => contract.release(env, request));
  }

  // Views

  isInitialized(): boolean {
    return this.read((contract, env) => contract.isInitialized(env));
  }

  getOwner(): Address | undefined {
    return this.read((contract, env) => contract.getOwner(env));
  }

  getAdmin(): Address | undefined {
    return this.read((contract, env) => contract.getAdmin(env));
  }

  getConfig(): FeeConfig | undefined {
    return this.read((contract, env) => contract.getConfig(env));
  }

  isPaused(): boolean {
    return this.read((contract, env) => contract.isPaused(env));
  }

  getLockData(): LockData | undefined {
    return this.read((contract, env) => contract.getLockData(env));
  }

  isReentrancyGuardHeld(): boolean {
    return this.read((contract, env) => contract.isReentrancyGuardHeld(env));
  }

  // Committed events of this contract

  lockEvents(): LockEventRecord[] {
    const records: LockEventRecord[] = [];
    for (const event of this.ledger.events({ contractId: this.address, name: LockReleaseEvents.Lock })) {
      const record = decodeLockEvent(event, this.address);
      if (record) records.push(record);
    }
    return records;
  }

  releaseEvents(): ReleaseEventRecord[] {
    const records: ReleaseEventRecord[] = [];
    for (const event of this.ledger.events({ contractId: this.address, name: LockReleaseEvents.Release })) {
      const record = decodeReleaseEvent(event, this.address);
      if (record) records.push(record);
    }
    return records;
  }

  private send(call: (contract: LockReleaseContract, env: Env) => void): void {
    this.ledger.invoke(this.contract, call, { signers: this.signers });
  }

  private read<R>(call: (contract: LockReleaseContract, env: Env) => R): R {
    return this.ledger.simulate(this.contract, call);
  }
}

/**
 * Deploy a LockReleaseContract and initialize it in one transaction each.
 */
export function deployLockRelease(ledger: Ledger, options: DeployLockReleaseOptions): LockReleaseClient {
  const contract = ledger.deploy((address) => new LockReleaseContract(address));
  const client = new LockReleaseClient(ledger, contract);
  client.initialize(options.owner, options.feePercentage);
  return client;
}
