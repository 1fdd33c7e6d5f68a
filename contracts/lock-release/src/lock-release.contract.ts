/**
 * Lock/Release Escrow Contract
 *
 * One side of a cross-chain bridge:
 * - lock: take a deposit into custody, keep the protocol fee, forward the rest
 *   to the admin and emit a LockEvent for the relayer
 * - release: let the admin pay out funds returning from the other chain
 *
 * Governance: an owner fixed at initialization manages a single admin and
 * the pause switch. The owner never moves funds.
 *
 * Every entry point is one atomic ledger transaction; a thrown ContractError
 * discards all of its writes, transfers and events.
 */

import { hexlify, isBytesLike } from 'ethers';
import { AddressSchema, FeePercentageSchema } from '@bridge-escrow/config';
import {
  LedgerContract,
  ReentrancyGuard,
  StoredFlag,
  StoredValue,
  TokenClient,
  parseAddressArg,
  parseAmountArg,
  requireI128,
  type Env,
} from '@bridge-escrow/core';
import { ContractError, type Address, type ContractErrorCode } from '@bridge-escrow/types';
import { LockReleaseEvents } from './events';
import { computeFeeSplit } from './fees';
import {
  AdminDataSchema,
  CONTRACT_NAME,
  DataKey,
  FeeConfigSchema,
  LockDataSchema,
  type AdminData,
  type FeeConfig,
  type LockData,
  type LockRequest,
  type ReleaseRequest,
} from './types';

export class LockReleaseContract extends LedgerContract {
  readonly name: string = CONTRACT_NAME;

  private readonly initialized = new StoredFlag(this.storage, DataKey.Init);
  private readonly owner = new StoredValue(this.storage, DataKey.Owner, AddressSchema);
  private readonly admin = new StoredValue(this.storage, DataKey.Admin, AdminDataSchema);
  private readonly config = new StoredValue(this.storage, DataKey.Config, FeeConfigSchema);
  private readonly paused = new StoredFlag(this.storage, DataKey.Paused);
  private readonly lastLock = new StoredValue(this.storage, DataKey.LockData, LockDataSchema);
  private readonly guard = new ReentrancyGuard(
    new StoredFlag(this.storage, DataKey.ReentrancyGuard),
    CONTRACT_NAME
  );

  // ===========================================================================
  // Governance
  // ===========================================================================

  /**
   * One-shot bootstrap. Whoever calls it first picks the owner; no
   * authorization is checked.
   */
  initialize(_env: Env, owner: Address, feePercentage: bigint | number): void {
    if (this.initialized.isSet()) {
      throw this.error('Contract already initialized', 'AlreadyInitialized');
    }

    const ownerAddress = parseAddressArg(owner, 'owner', this.name);
    const fee = FeePercentageSchema.safeParse(feePercentage);
    if (!fee.success) {
      throw this.error(
        `feePercentage must be an integer between 0 and 100, got ${feePercentage}`,
        'InvalidAction'
      );
    }

    this.owner.set(ownerAddress);
    this.config.set({ feePercentage: fee.data });
    this.initialized.set();
  }

  addAdmin(env: Env, admin: Address): void {
    this.requireNotPaused();
    env.requireAuth(this.requireOwner());

    if (this.admin.exists()) {
      throw this.error('An admin is already set', 'AlreadyExists');
    }

    const data: AdminData = { adminAddress: parseAddressArg(admin, 'admin', this.name) };
    this.admin.set(data);

    env.publish([LockReleaseEvents.AdminAdded, data.adminAddress], data);
  }

  removeAdmin(env: Env): void {
    this.requireNotPaused();
    env.requireAuth(this.requireOwner());

    if (!this.admin.exists()) {
      throw this.error('No admin is set', 'NotFound');
    }

    this.admin.remove();

    env.publish([LockReleaseEvents.AdminRemoved], null);
  }

  /**
   * Halt every mutating entry point except pause/unpause.
   */
  pause(env: Env): void {
    env.requireAuth(this.requireOwner());

    if (this.paused.isSet()) {
      throw this.error('Contract is already paused', 'AlreadyExists');
    }

    this.paused.set();

    env.publish([LockReleaseEvents.ContractPaused], null);
  }

  unpause(env: Env): void {
    env.requireAuth(this.requireOwner());

    if (!this.paused.isSet()) {
      throw this.error('Contract is not paused', 'NotFound');
    }

    this.paused.clear();

    env.publish([LockReleaseEvents.ContractUnpaused], null);
  }

  // ===========================================================================
  // Lock / Release
  // ===========================================================================

  /**
   * Deposit `inAmount` of `fromToken`, keep the fee in custody and forward the
   * rest to the admin.
   */
  lock(env: Env, request: LockRequest): void {
    this.requireNotPaused();
    this.guard.run(() => this.executeLock(env, request));
  }

  /**
   * Pay `amount` of `destinationToken` from the admin to `user`.
   *
   * Amount and recipient are trusted as given: nothing is matched against
   * LockData, the admin's authorization is the only check.
   */
  release(env: Env, request: ReleaseRequest): void {
    this.requireNotPaused();
    this.guard.run(() => this.executeRelease(env, request));
  }

  private executeLock(env: Env, request: LockRequest): void {
    const userAddress = parseAddressArg(request.userAddress, 'userAddress', this.name);
    env.requireAuth(userAddress);

    const inAmount = parseAmountArg(request.inAmount, 'inAmount', this.name);
    if (!isBytesLike(request.destChain)) {
      throw this.error('destChain must be a byte string', 'InvalidAction');
    }

    const adminData = this.admin.get();
    if (adminData === undefined) {
      throw this.error('No admin to forward funds to', 'MissingValue');
    }

    const fromToken = parseAddressArg(request.fromToken, 'fromToken', this.name);
    const token = new TokenClient(env, fromToken);
    const balance = token.balance(userAddress);
    if (balance < inAmount) {
      throw this.error(`Insufficient balance: ${balance} < ${inAmount}`, 'InvalidAction');
    }

    const split = computeFeeSplit(inAmount, this.requireConfig().feePercentage);
    if (split === undefined) {
      throw this.error('Fee computation overflows 128 bits', 'InvalidAction');
    }
    if (split.swappedAmount < 1n) {
      throw this.error('Nothing left to forward after the fee', 'InvalidAction');
    }

    const lockData: LockData = {
      userAddress,
      destToken: request.destToken,
      fromToken,
      inAmount,
      swappedAmount: split.swappedAmount,
      recipientAddress: request.recipientAddress,
      destChain: hexlify(request.destChain),
    };
    // Written before the transfers; a failing transfer rolls it back with the rest
    this.lastLock.set(lockData);

    token.transfer(userAddress, env.contractAddress, inAmount);
    token.transfer(env.contractAddress, adminData.adminAddress, split.swappedAmount);

    env.publish(
      [LockReleaseEvents.Lock, userAddress, request.destToken, inAmount, split.swappedAmount],
      lockData
    );
  }

  private executeRelease(env: Env, request: ReleaseRequest): void {
    const adminData = this.admin.get();
    if (adminData === undefined) {
      throw this.error('No admin is set', 'MissingValue');
    }
    const { adminAddress } = adminData;
    env.requireAuth(adminAddress);

    const user = parseAddressArg(request.user, 'user', this.name);
    const destinationToken = parseAddressArg(request.destinationToken, 'destinationToken', this.name);
    const amount = requireI128(request.amount, 'amount', this.name);

    const token = new TokenClient(env, destinationToken);
    const balance = token.balance(adminAddress);
    if (balance < amount) {
      throw this.error(`Insufficient admin balance: ${balance} < ${amount}`, 'InvalidAction');
    }

    token.transfer(adminAddress, user, amount);

    env.publish([LockReleaseEvents.Release, user, destinationToken, amount], null);
  }

  // ===========================================================================
  // Views
  // ===========================================================================

  isInitialized(_env: Env): boolean {
    return this.initialized.isSet();
  }

  getOwner(_env: Env): Address | undefined {
    return this.owner.get();
  }

  getAdmin(_env: Env): Address | undefined {
    return this.admin.get()?.adminAddress;
  }

  getConfig(_env: Env): FeeConfig | undefined {
    return this.config.get();
  }

  isPaused(_env: Env): boolean {
    return this.paused.isSet();
  }

  getLockData(_env: Env): LockData | undefined {
    return this.lastLock.get();
  }

  isReentrancyGuardHeld(_env: Env): boolean {
    return this.guard.held;
  }

  // ===========================================================================
  // Internal
  // ===========================================================================

  private requireNotPaused(): void {
    if (this.paused.isSet()) {
      throw this.error('Contract is paused', 'InvalidAction');
    }
  }

  private requireOwner(): Address {
    const owner = this.owner.get();
    if (owner === undefined) {
      throw this.error('Contract not initialized', 'MissingValue');
    }
    return owner;
  }

  private requireConfig(): FeeConfig {
    const config = this.config.get();
    if (config === undefined) {
      throw this.error('Contract not initialized', 'MissingValue');
    }
    return config;
  }

  private error(message: string, code: ContractErrorCode): ContractError {
    return new ContractError(message, code, this.name);
  }
}

export function isLockReleaseContract(contract: LedgerContract): contract is LockReleaseContract {
  return contract instanceof LockReleaseContract;
}
