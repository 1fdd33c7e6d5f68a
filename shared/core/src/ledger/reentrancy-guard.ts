import { ReentrancyError } from '@bridge-escrow/types';
import type { StoredFlag } from './storage';

/**
 * Scoped reentrancy guard over a storage flag.
 *
 * `run` takes the flag or throws ReentrancyError, then clears it on every exit
 * path of the callback. A rejected acquisition leaves the holder's flag alone.
 *
 * @example
 * ```typescript
 * private readonly guard = new ReentrancyGuard(
 *   new StoredFlag(this.storage, 'ReentrancyGuard'),
 *   this.name
 * );
 *
 * lock(env: Env, request: LockRequest): void {
 *   this.guard.run(() => this.executeLock(env, request));
 * }
 * ```
 */
export class ReentrancyGuard {
  constructor(private readonly flag: StoredFlag, private readonly contractName: string) {}

  get held(): boolean {
    return this.flag.isSet();
  }

  run<R>(body: () => R): R {
    if (this.flag.isSet()) {
      throw new ReentrancyError(this.contractName);
    }
    this.flag.set();
    try {
      return body();
    } finally {
      this.flag.clear();
    }
  }
}
