/**
 * Error classes for contract execution on the ledger.
 *
 * Every failed precondition inside a contract is a thrown ContractError; the
 * ledger catches it at the transaction boundary, rolls back the call and
 * rethrows it to the caller unchanged.
 */

/**
 * Categorized failure reported by a contract entry point.
 */
export type ContractErrorCode =
  | 'AlreadyInitialized'
  | 'AlreadyExists'
  | 'NotFound'
  | 'InvalidAction'
  | 'MissingValue';

/**
 * Base error for contract failures.
 *
 * @example
 * ```typescript
 * throw new ContractError('Admin already set', 'AlreadyExists', 'lock-release');
 * ```
 */
export class ContractError extends Error {
  constructor(
    message: string,
    public readonly code: ContractErrorCode,
    public readonly contract: string
  ) {
    super(message);
    this.name = 'ContractError';
    // Ensure instanceof works correctly across module boundaries
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Raised by `requireAuth` when the address did not authorize the call.
 */
export class AuthorizationError extends ContractError {
  constructor(public readonly address: string, contract: string) {
    super(`Missing authorization for ${address}`, 'InvalidAction', contract);
    this.name = 'AuthorizationError';
  }
}

/**
 * Raised when a guarded entry point is entered while its guard is held.
 */
export class ReentrancyError extends ContractError {
  constructor(contract: string) {
    super('Reentrant call rejected', 'InvalidAction', contract);
    this.name = 'ReentrancyError';
  }
}

export type HostErrorCode =
  | 'UnknownContract'
  | 'InterfaceMismatch'
  | 'TransactionInProgress'
  | 'InvalidSigner';

/**
 * Misuse of the ledger host itself rather than a contract precondition.
 */
export class HostError extends Error {
  constructor(message: string, public readonly code: HostErrorCode) {
    super(message);
    this.name = 'HostError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Narrow an unknown thrown value to a ContractError, optionally of one code.
 */
export function isContractError(
  error: unknown,
  code?: ContractErrorCode
): error is ContractError {
  return error instanceof ContractError && (code === undefined || error.code === code);
}
