/**
 * Assertions for errors thrown by ledger calls.
 */

import { expect } from '@jest/globals';
import { ContractError, type ContractErrorCode } from '@bridge-escrow/types';

/**
 * Run `fn` and return what it threw. Fails the test if it returned normally.
 */
export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected call to throw, but it returned');
}

/**
 * Assert `fn` throws a ContractError with `code` (and `message`, when given).
 */
export function expectContractError(
  fn: () => unknown,
  code: ContractErrorCode,
  message?: string
): ContractError {
  const error = captureError(fn);
  if (!(error instanceof ContractError)) {
    throw new Error(`Expected ContractError(${code}), got: ${String(error)}`);
  }
  expect(error.code).toBe(code);
  if (message !== undefined) {
    expect(error.message).toBe(message);
  }
  return error;
}
