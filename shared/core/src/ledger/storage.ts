/**
 * Per-contract instance storage and typed slots on top of it.
 *
 * Values are structured-cloned on every write and read, so a caller holding a
 * returned object cannot mutate stored state, and a snapshot taken by the
 * ledger stays valid until it is restored.
 */

import type { z } from 'zod';
import type { ScValue } from '@bridge-escrow/types';

/**
 * Restores the storage to the moment the snapshot was taken.
 */
export type RestoreSnapshot = () => void;

export class InstanceStorage {
  private values = new Map<string, ScValue>();

  has(key: string): boolean {
    return this.values.has(key);
  }

  get(key: string): ScValue | undefined {
    const value = this.values.get(key);
    return value === undefined ? undefined : structuredClone(value);
  }

  set(key: string, value: ScValue): void {
    this.values.set(key, structuredClone(value));
  }

  remove(key: string): void {
    this.values.delete(key);
  }

  snapshot(): RestoreSnapshot {
    const saved = new Map(this.values);
    return () => {
      this.values = new Map(saved);
    };
  }
}

/**
 * A single storage key holding a value of type T.
 *
 * Reads decode through a zod schema; a stored value that no longer matches
 * the schema is a host invariant violation and throws ZodError.
 *
 * @example
 * ```typescript
 * const owner = new StoredValue(storage, 'Owner', AddressSchema);
 * owner.set(address);
 * owner.get(); // checksummed address or undefined
 * ```
 */
export class StoredValue<T extends ScValue> {
  constructor(
    private readonly storage: InstanceStorage,
    readonly key: string,
    private readonly schema: z.ZodType<T, z.ZodTypeDef, unknown>
  ) {}

  exists(): boolean {
    return this.storage.has(this.key);
  }

  get(): T | undefined {
    const raw = this.storage.get(this.key);
    return raw === undefined ? undefined : this.schema.parse(raw);
  }

  set(value: T): void {
    this.storage.set(this.key, value);
  }

  remove(): void {
    this.storage.remove(this.key);
  }
}

/**
 * A unit marker key: present or absent, stored as `null`.
 */
export class StoredFlag {
  constructor(private readonly storage: InstanceStorage, readonly key: string) {}

  isSet(): boolean {
    return this.storage.has(this.key);
  }

  set(): void {
    this.storage.set(this.key, null);
  }

  clear(): void {
    this.storage.remove(this.key);
  }
}
