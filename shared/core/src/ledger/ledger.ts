/**
 * In-Process Ledger Host
 *
 * Runs contract calls as atomic transactions:
 * - storage of every deployed contract is snapshotted before a top-level call
 *   and restored if the call throws
 * - events are buffered per transaction and appended to the log on commit
 * - authorization comes from the transaction's signers and the call stack
 *
 * Calls are synchronous and one top-level transaction runs at a time, so
 * statement-level interleaving between transactions cannot happen. Nested
 * calls from one contract into another go through `Env.invoke`.
 *
 * @example
 * ```typescript
 * const ledger = new Ledger({ logger: createLogger('ledger') });
 * const token = ledger.deploy((address) => new FungibleToken(address));
 * ledger.invoke(token, (t, env) => t.initialize(env, issuer, metadata));
 * ledger.invoke(token, (t, env) => t.mint(env, alice, 1_000n), { signers: [issuer] });
 * ```
 */

import { getAddress, getCreateAddress, isAddress, ZeroAddress } from 'ethers';
import { AddressSchema } from '@bridge-escrow/config';
import {
  AuthorizationError,
  ContractError,
  HostError,
  type Address,
  type LedgerEvent,
  type ScValue,
} from '@bridge-escrow/types';
import { NullLogger, type ILogger, type LogMeta } from '../logging';
import type { ContractGuard, Env, LedgerContract } from './contract';
import type { RestoreSnapshot } from './storage';

export interface LedgerOptions {
  logger?: ILogger;
  /** Sequence number of the first committed transaction (default 1) */
  startSequence?: number;
  /** Address contract addresses are derived from (default zero address) */
  deployer?: Address;
}

export interface InvokeOptions {
  /** Accounts that authorized this transaction */
  signers?: readonly Address[];
}

export interface EventFilter {
  contractId?: Address;
  /** Matches the first topic, the event name by convention */
  name?: string;
}

type PendingEvent = Pick<LedgerEvent, 'contractId' | 'topics' | 'data'>;

interface Transaction {
  readonly signers: ReadonlySet<Address>;
  readonly pendingEvents: PendingEvent[];
  depth: number;
}

function normalizeAddress(address: Address): Address {
  return isAddress(address) ? getAddress(address) : address;
}

function describeError(error: unknown): LogMeta {
  if (error instanceof ContractError || error instanceof HostError) {
    return { error: error.name, code: error.code, message: error.message };
  }
  if (error instanceof Error) {
    return { error: error.name, message: error.message };
  }
  return { error: String(error) };
}

export class Ledger {
  private readonly logger: ILogger;
  private readonly deployer: Address;
  private readonly contracts = new Map<Address, LedgerContract>();
  private readonly eventLog: LedgerEvent[] = [];
  private current: Transaction | undefined;
  private nextSequence: number;
  private deployNonce = 0;

  constructor(options: LedgerOptions = {}) {
    this.logger = options.logger ?? new NullLogger();
    this.deployer = getAddress(options.deployer ?? ZeroAddress);
    this.nextSequence = options.startSequence ?? 1;
  }

  /**
   * Sequence number of the last committed transaction.
   */
  get sequence(): number {
    return this.nextSequence - 1;
  }

  /**
   * Deploy a contract at the next address derived from the deployer.
   */
  deploy<C extends LedgerContract>(create: (address: Address) => C): C {
    const address = getCreateAddress({ from: this.deployer, nonce: this.deployNonce++ });
    const contract = create(address);
    this.contracts.set(address, contract);
    this.logger.info('Contract deployed', { contract: contract.name, address });
    return contract;
  }

  getContract(address: Address): LedgerContract | undefined {
    return this.contracts.get(normalizeAddress(address));
  }

  /**
   * Run one top-level call as a transaction. Commits on return, rolls back
   * every contract's storage and drops queued events on throw.
   */
  invoke<C extends LedgerContract, R>(
    contract: C,
    call: (contract: C, env: Env) => R,
    options: InvokeOptions = {}
  ): R {
    return this.execute(contract, call, options, true);
  }

  /**
   * Run a call and always roll it back. Used for read-only views.
   */
  simulate<C extends LedgerContract, R>(
    contract: C,
    call: (contract: C, env: Env) => R,
    options: InvokeOptions = {}
  ): R {
    return this.execute(contract, call, options, false);
  }

  /**
   * Committed events, oldest first.
   */
  events(filter: EventFilter = {}): LedgerEvent[] {
    const contractId = filter.contractId === undefined ? undefined : normalizeAddress(filter.contractId);
    return this.eventLog
      .filter((event) => contractId === undefined || event.contractId === contractId)
      .filter((event) => filter.name === undefined || event.topics[0] === filter.name)
      .map((event) => structuredClone(event));
  }

  private execute<C extends LedgerContract, R>(
    contract: C,
    call: (contract: C, env: Env) => R,
    options: InvokeOptions,
    commit: boolean
  ): R {
    if (this.current) {
      throw new HostError(
        `Cannot start a transaction on ${contract.name} while another is running`,
        'TransactionInProgress'
      );
    }
    if (this.contracts.get(contract.address) !== contract) {
      throw new HostError(`${contract.name} is not deployed on this ledger`, 'UnknownContract');
    }

    const signers = this.parseSigners(contract, options.signers ?? [], commit);
    const rollback = this.snapshotAll();
    const transaction: Transaction = { signers, pendingEvents: [], depth: 0 };

    this.logger.debug('Invoking contract', {
      contract: contract.name,
      address: contract.address,
      signers: [...signers],
      simulated: !commit,
    });

    this.current = transaction;
    let result: R;
    try {
      result = this.runFrame(transaction, contract, undefined, call);
    } catch (error) {
      rollback();
      if (commit) {
        this.logger.warn('Transaction reverted', { contract: contract.name, ...describeError(error) });
      }
      throw error;
    } finally {
      this.current = undefined;
    }

    if (!commit) {
      rollback();
      return result;
    }

    const sequence = this.nextSequence++;
    transaction.pendingEvents.forEach((event, index) => {
      this.eventLog.push({ id: `${sequence}-${index}`, ledgerSequence: sequence, ...event });
    });
    this.logger.info('Transaction committed', {
      contract: contract.name,
      sequence,
      events: transaction.pendingEvents.length,
    });
    return result;
  }

  private parseSigners(contract: LedgerContract, signers: readonly Address[], commit: boolean): Set<Address> {
    const parsed = new Set<Address>();
    for (const signer of signers) {
      const result = AddressSchema.safeParse(signer);
      if (!result.success) {
        const error = new HostError(`Invalid signer address: ${signer}`, 'InvalidSigner');
        if (commit) {
          this.logger.warn('Transaction reverted', { contract: contract.name, ...describeError(error) });
        }
        throw error;
      }
      parsed.add(result.data);
    }
    return parsed;
  }

  /**
   * Snapshot every deployed contract's storage; the returned function restores them all.
   */
  private snapshotAll(): RestoreSnapshot {
    const restores = [...this.contracts.values()].map((c) => c.storage.snapshot());
    return () => restores.forEach((restore) => restore());
  }

  private runFrame<C extends LedgerContract, R>(
    transaction: Transaction,
    contract: C,
    invoker: Address | undefined,
    call: (contract: C, env: Env) => R
  ): R {
    transaction.depth++;
    try {
      return call(contract, this.createEnv(transaction, contract, invoker));
    } finally {
      transaction.depth--;
    }
  }

  private createEnv(transaction: Transaction, contract: LedgerContract, invoker: Address | undefined): Env {
    return {
      contractAddress: contract.address,
      invoker,

      requireAuth: (address: Address): void => {
        const normalized = normalizeAddress(address);
        if (transaction.signers.has(normalized) || invoker === normalized) {
          return;
        }
        throw new AuthorizationError(address, contract.name);
      },

      publish: (topics: readonly ScValue[], data: ScValue): void => {
        transaction.pendingEvents.push({
          contractId: contract.address,
          topics: structuredClone(topics),
          data: structuredClone(data),
        });
      },

      invoke: <T extends LedgerContract, R>(
        address: Address,
        guard: ContractGuard<T>,
        call: (target: T, env: Env) => R
      ): R => {
        const target = this.contracts.get(normalizeAddress(address));
        if (!target) {
          throw new HostError(`No contract deployed at ${address}`, 'UnknownContract');
        }
        if (!guard(target)) {
          throw new HostError(
            `${target.name} at ${address} does not implement the requested interface`,
            'InterfaceMismatch'
          );
        }
        this.logger.debug('Nested invocation', {
          caller: contract.name,
          contract: target.name,
          depth: transaction.depth,
        });
        // A failed nested call is undone even when the caller catches it
        const rollback = this.snapshotAll();
        const eventCount = transaction.pendingEvents.length;
        try {
          return this.runFrame(transaction, target, contract.address, call);
        } catch (error) {
          rollback();
          transaction.pendingEvents.length = eventCount;
          throw error;
        }
      },
    };
  }
}
