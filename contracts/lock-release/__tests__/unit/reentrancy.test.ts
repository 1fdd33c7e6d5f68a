import { describe, it, expect, beforeEach } from '@jest/globals';
import { FungibleToken, isFungibleToken, type Ledger, type RecordingLogger } from '@bridge-escrow/core';
import { ContractError, I128_MAX, ReentrancyError } from '@bridge-escrow/types';
import {
  ADMIN,
  ALICE,
  BOB,
  OWNER,
  ReentrantToken,
  balanceOf,
  captureError,
  createTestLedger,
  deployTestToken,
  lockRequest,
  mintTo,
} from '@bridge-escrow/test-utils';
import { deployLockRelease, isLockReleaseContract, type LockReleaseClient } from '../../src';

describe('LockRelease: reentrancy', () => {
  let ledger: Ledger;
  let logger: RecordingLogger;
  let token: ReentrantToken;
  let bridge: LockReleaseClient;

  beforeEach(() => {
    ({ ledger, logger } = createTestLedger());
    token = deployTestToken(ledger, (address) => new ReentrantToken(address), 'RNT');
    bridge = deployLockRelease(ledger, { owner: OWNER, feePercentage: 3n });
    bridge.connect(OWNER).addAdmin(ADMIN);
    mintTo(ledger, token, ALICE, 1_000n);
    mintTo(ledger, token, ADMIN, 500n);
  });

  const snapshot = (): bigint[] => [
    balanceOf(ledger, token, ALICE),
    balanceOf(ledger, token, ADMIN),
    balanceOf(ledger, token, BOB),
    balanceOf(ledger, token, bridge.address),
  ];

  it('rejects a lock re-entered from the token transfer', () => {
    token.setTransferHook((env) => {
      env.invoke(bridge.address, isLockReleaseContract, (escrow, inner) =>
        escrow.lock(inner, lockRequest(token.address).withAmount(10n).build())
      );
    });

    const error = captureError(() => bridge.connect(ALICE).lock(lockRequest(token.address).build()));

    expect(error).toBeInstanceOf(ReentrancyError);
    expect(snapshot()).toEqual([1_000n, 500n, 0n, 0n]);
    expect(bridge.getLockData()).toBeUndefined();
    expect(bridge.lockEvents()).toEqual([]);
    expect(bridge.isReentrancyGuardHeld()).toBe(false);
  });

  it('rejects a release re-entered during a lock', () => {
    token.setTransferHook((env) => {
      env.invoke(bridge.address, isLockReleaseContract, (escrow, inner) =>
        escrow.release(inner, { amount: 1n, user: BOB, destinationToken: token.address })
      );
    });

    const error = captureError(() => bridge.connect(ALICE, ADMIN).lock(lockRequest(token.address).build()));

    expect(error).toBeInstanceOf(ReentrancyError);
    expect(snapshot()).toEqual([1_000n, 500n, 0n, 0n]);
  });

  it('rejects a lock re-entered during a release', () => {
    token.setTransferHook((env) => {
      env.invoke(bridge.address, isLockReleaseContract, (escrow, inner) =>
        escrow.lock(inner, lockRequest(token.address).build())
      );
    });

    const error = captureError(() =>
      bridge.connect(ADMIN, ALICE).release({ amount: 100n, user: BOB, destinationToken: token.address })
    );

    expect(error).toBeInstanceOf(ReentrancyError);
    expect(snapshot()).toEqual([1_000n, 500n, 0n, 0n]);
    expect(bridge.releaseEvents()).toEqual([]);
  });

  it('completes the outer lock when the token swallows the rejection', () => {
    const rejected: unknown[] = [];
    token.setTransferHook((env) => {
      try {
        env.invoke(bridge.address, isLockReleaseContract, (escrow, inner) =>
          escrow.lock(inner, lockRequest(token.address).withAmount(10n).build())
        );
      } catch (error) {
        rejected.push(error);
      }
    });

    bridge.connect(ALICE).lock(lockRequest(token.address).build());

    // Once per transfer: user to escrow, escrow to admin
    expect(rejected).toHaveLength(2);
    expect(rejected.every((error) => error instanceof ReentrancyError)).toBe(true);
    expect(snapshot()).toEqual([900n, 597n, 0n, 3n]);
    expect(bridge.lockEvents()).toHaveLength(1);
    expect(bridge.isReentrancyGuardHeld()).toBe(false);
  });

  it('undoes a nested token transfer that fails and is swallowed', () => {
    const other = deployTestToken(ledger, (address) => new FungibleToken(address), 'OTH');
    mintTo(ledger, other, ALICE, 10n);
    mintTo(ledger, other, BOB, I128_MAX);

    const rejected: unknown[] = [];
    token.setTransferHook((env) => {
      try {
        env.invoke(other.address, isFungibleToken, (otherToken, inner) =>
          otherToken.transfer(inner, ALICE, BOB, 5n)
        );
      } catch (error) {
        rejected.push(error);
      }
    });

    bridge.connect(ALICE).lock(lockRequest(token.address).build());

    expect(rejected).toHaveLength(2);
    expect(rejected[0]).toBeInstanceOf(ContractError);
    expect(rejected[0]).toHaveProperty('message', 'balance exceeds the 128-bit range');
    expect(balanceOf(ledger, other, ALICE)).toBe(10n);
    expect(balanceOf(ledger, other, BOB)).toBe(I128_MAX);
    expect(ledger.events({ contractId: other.address, name: 'transfer' })).toEqual([]);
    expect(snapshot()).toEqual([900n, 597n, 0n, 3n]);
  });

  it('rolls back the lock record and the first transfer when forwarding fails', () => {
    bridge.connect(ALICE).lock(lockRequest(token.address).withAmount(200n).build());
    const previous = bridge.getLockData();
    const eventsBefore = ledger.events().length;

    token.setTransferHook((_env, from) => {
      if (from === bridge.address) {
        throw new Error('forwarding blocked');
      }
    });

    expect(() => bridge.connect(ALICE).lock(lockRequest(token.address).build())).toThrow('forwarding blocked');

    expect(bridge.getLockData()).toEqual(previous);
    expect(snapshot()).toEqual([800n, 694n, 0n, 6n]);
    expect(ledger.events()).toHaveLength(eventsBefore);
    expect(bridge.isReentrancyGuardHeld()).toBe(false);
    expect(logger.hasLogWithMeta('warn', { contract: 'lock-release', error: 'Error', message: 'forwarding blocked' })).toBe(
      true
    );
  });

  it('accepts a new lock once the re-entering hook is removed', () => {
    token.setTransferHook((env) => {
      env.invoke(bridge.address, isLockReleaseContract, (escrow, inner) =>
        escrow.lock(inner, lockRequest(token.address).build())
      );
    });
    captureError(() => bridge.connect(ALICE).lock(lockRequest(token.address).build()));

    token.clearTransferHook();
    bridge.connect(ALICE).lock(lockRequest(token.address).build());

    expect(snapshot()).toEqual([900n, 597n, 0n, 3n]);
  });
});
