import { describe, it, expect } from '@jest/globals';
import { I128_MAX, type LedgerEvent } from '@bridge-escrow/types';
import { ALICE, BOB, DEST_CHAIN_HEX, DEST_TOKEN, FOREIGN_RECIPIENT, ISSUER } from '@bridge-escrow/test-utils';
import { computeFeeSplit, decodeLockEvent, decodeReleaseEvent, type LockData } from '../../src';

describe('computeFeeSplit', () => {
  it.each([
    [100n, 3n, 3n, 97n],
    [1n, 99n, 0n, 1n],
    [1n, 100n, 1n, 0n],
    [33n, 3n, 0n, 33n],
    [34n, 3n, 1n, 33n],
    [250n, 0n, 0n, 250n],
  ])('splits %p at %p%% into fee %p and forward %p', (inAmount, fee, expectedFee, expectedForward) => {
    expect(computeFeeSplit(inAmount, fee)).toEqual({ fee: expectedFee, swappedAmount: expectedForward });
  });

  it('returns undefined when the product leaves 128 bits', () => {
    expect(computeFeeSplit(I128_MAX, 2n)).toBeUndefined();
    expect(computeFeeSplit(I128_MAX / 100n, 100n)).toEqual({
      fee: I128_MAX / 100n,
      swappedAmount: 0n,
    });
  });
});

const ESCROW = ISSUER;

const lockData: LockData = {
  userAddress: ALICE,
  destToken: DEST_TOKEN,
  fromToken: BOB,
  inAmount: 100n,
  swappedAmount: 97n,
  recipientAddress: FOREIGN_RECIPIENT,
  destChain: DEST_CHAIN_HEX,
};

const event = (overrides: Partial<LedgerEvent>): LedgerEvent => ({
  id: '7-2',
  ledgerSequence: 7,
  contractId: ESCROW,
  topics: ['LockEvent', ALICE, DEST_TOKEN, 100n, 97n],
  data: lockData,
  ...overrides,
});

describe('decodeLockEvent', () => {
  it('decodes a lock event', () => {
    expect(decodeLockEvent(event({}), ESCROW)).toEqual({
      id: '7-2',
      ledgerSequence: 7,
      contractId: ESCROW,
      lock: lockData,
    });
  });

  it('ignores events from other contracts', () => {
    expect(decodeLockEvent(event({ contractId: BOB }), ESCROW)).toBeUndefined();
    expect(decodeLockEvent(event({ contractId: BOB }))).toBeDefined();
  });

  it('ignores other event names and malformed payloads', () => {
    expect(decodeLockEvent(event({ topics: ['transfer', ALICE, BOB] }))).toBeUndefined();
    expect(decodeLockEvent(event({ data: { ...lockData, destChain: '0xABCD' } }))).toBeUndefined();
    expect(decodeLockEvent(event({ data: null }))).toBeUndefined();
  });
});

describe('decodeReleaseEvent', () => {
  const release = (overrides: Partial<LedgerEvent>): LedgerEvent =>
    event({ topics: ['ReleaseEvent', BOB, ALICE, 40n], data: null, ...overrides });

  it('decodes a release event', () => {
    expect(decodeReleaseEvent(release({}), ESCROW)).toEqual({
      id: '7-2',
      ledgerSequence: 7,
      contractId: ESCROW,
      user: BOB,
      destinationToken: ALICE,
      amount: 40n,
    });
  });

  it('requires an empty payload', () => {
    expect(decodeReleaseEvent(release({ data: 40n }))).toBeUndefined();
  });

  it('ignores lock events', () => {
    expect(decodeReleaseEvent(event({}))).toBeUndefined();
  });
});
