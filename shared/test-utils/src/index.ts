/**
 * Test Utilities for the Bridge Escrow
 *
 * ```typescript
 * import {
 *   createTestLedger, deployTestToken, mintTo, balanceOf,
 *   ReentrantToken, lockRequest,
 *   OWNER, ADMIN, ALICE, BOB,
 * } from '@bridge-escrow/test-utils';
 * ```
 */

export * from './fixtures/accounts';

export { createTestLedger, deployTestToken, mintTo, balanceOf } from './harnesses/ledger-harness';
export type { TestLedger } from './harnesses/ledger-harness';

export { ReentrantToken } from './mocks/reentrant-token';
export type { TransferHook } from './mocks/reentrant-token';

export { LockRequestBuilder, lockRequest } from './builders/lock-request.builder';

export { captureError, expectContractError } from './helpers/contract-errors';
