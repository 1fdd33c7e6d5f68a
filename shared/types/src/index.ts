// Shared types for the bridge escrow ledger

export type { Address, ScValue, LedgerEvent } from './ledger';
export { I128_MIN, I128_MAX, isI128 } from './ledger';

export type { ContractErrorCode, HostErrorCode } from './errors';
export {
  ContractError,
  AuthorizationError,
  ReentrancyError,
  HostError,
  isContractError,
} from './errors';
