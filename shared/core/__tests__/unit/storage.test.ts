import { describe, it, expect, beforeEach } from '@jest/globals';
import { z, ZodError } from 'zod';
import { ReentrancyError } from '@bridge-escrow/types';
import { InstanceStorage, ReentrancyGuard, StoredFlag, StoredValue } from '../../src';

describe('InstanceStorage', () => {
  let storage: InstanceStorage;

  beforeEach(() => {
    storage = new InstanceStorage();
  });

  it('stores and removes values', () => {
    storage.set('Config', { feePercentage: 3n });
    expect(storage.has('Config')).toBe(true);
    expect(storage.get('Config')).toEqual({ feePercentage: 3n });

    storage.remove('Config');
    expect(storage.has('Config')).toBe(false);
    expect(storage.get('Config')).toBeUndefined();
  });

  it('hands out copies', () => {
    const list = [1n, 2n];
    storage.set('List', list);
    list.push(3n);

    const read = storage.get('List');
    expect(read).toEqual([1n, 2n]);
    if (Array.isArray(read)) {
      read.push(4n);
    }
    expect(storage.get('List')).toEqual([1n, 2n]);
  });

  it('restores a snapshot', () => {
    storage.set('A', 1n);
    const restore = storage.snapshot();

    storage.set('A', 2n);
    storage.set('B', 'added');
    restore();

    expect(storage.get('A')).toBe(1n);
    expect(storage.has('B')).toBe(false);
  });
});

describe('StoredValue', () => {
  it('decodes through its schema', () => {
    const storage = new InstanceStorage();
    const slot = new StoredValue(storage, 'Amount', z.bigint());

    expect(slot.exists()).toBe(false);
    expect(slot.get()).toBeUndefined();

    slot.set(42n);
    expect(slot.get()).toBe(42n);

    slot.remove();
    expect(slot.exists()).toBe(false);
  });

  it('throws when the stored value does not match the schema', () => {
    const storage = new InstanceStorage();
    storage.set('Amount', 'not a bigint');
    const slot = new StoredValue(storage, 'Amount', z.bigint());

    expect(() => slot.get()).toThrow(ZodError);
  });
});

describe('StoredFlag', () => {
  it('stores a unit marker', () => {
    const storage = new InstanceStorage();
    const flag = new StoredFlag(storage, 'Paused');

    flag.set();
    expect(flag.isSet()).toBe(true);
    expect(storage.get('Paused')).toBeNull();

    flag.clear();
    expect(flag.isSet()).toBe(false);
  });
});

describe('ReentrancyGuard', () => {
  let flag: StoredFlag;
  let guard: ReentrancyGuard;

  beforeEach(() => {
    flag = new StoredFlag(new InstanceStorage(), 'ReentrancyGuard');
    guard = new ReentrancyGuard(flag, 'escrow');
  });

  it('holds the flag only while the body runs', () => {
    let heldInside = false;
    const result = guard.run(() => {
      heldInside = guard.held;
      return 'done';
    });

    expect(result).toBe('done');
    expect(heldInside).toBe(true);
    expect(guard.held).toBe(false);
  });

  it('releases the flag when the body throws', () => {
    expect(() =>
      guard.run(() => {
        throw new Error('transfer failed');
      })
    ).toThrow('transfer failed');
    expect(flag.isSet()).toBe(false);
  });

  it('rejects re-entry without releasing the outer hold', () => {
    let heldAfterRejection = false;

    guard.run(() => {
      expect(() => guard.run(() => 'inner')).toThrow(ReentrancyError);
      heldAfterRejection = guard.held;
    });

    expect(heldAfterRejection).toBe(true);
    expect(guard.held).toBe(false);
  });
});
