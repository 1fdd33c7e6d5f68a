export { Ledger } from './ledger';
export type { LedgerOptions, InvokeOptions, EventFilter } from './ledger';

export { LedgerContract } from './contract';
export type { Env, ContractGuard } from './contract';

export { InstanceStorage, StoredValue, StoredFlag } from './storage';
export type { RestoreSnapshot } from './storage';

export { ReentrancyGuard } from './reentrancy-guard';
export { parseAddressArg, parseAmountArg, requireI128 } from './arguments';

export { FungibleToken, TokenClient, TokenMetadataSchema, isFungibleToken } from './token';
export type { TokenMetadata } from './token';
