/**
 * Jest Setup File
 *
 * Runs before each test file (setupFilesAfterEnv in package.json).
 */

import { afterEach } from '@jest/globals';
import { resetLoggerCache } from '@bridge-escrow/core';

// Jest serializes values between workers and in failure messages with JSON;
// ledger amounts are bigint.
if (!Object.prototype.hasOwnProperty.call(BigInt.prototype, 'toJSON')) {
  Object.defineProperty(BigInt.prototype, 'toJSON', {
    value: function toJSON(this: bigint): string {
      return this.toString();
    },
    configurable: true,
    writable: true,
  });
}

afterEach(() => {
  resetLoggerCache();
});
