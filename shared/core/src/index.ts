/**
 * @bridge-escrow/core
 *
 * - logging: ILogger, pino implementation, recording/null loggers for tests
 * - ledger: in-process ledger host, storage slots, reentrancy guard,
 *   fungible token
 */

export {
  createLogger,
  getLogger,
  formatLogObject,
  resetLoggerCache,
  RecordingLogger,
  NullLogger,
} from './logging';
export type { ILogger, LoggerConfig, LogLevel, LogMeta, LogEntry } from './logging';

export {
  Ledger,
  LedgerContract,
  InstanceStorage,
  StoredValue,
  StoredFlag,
  ReentrancyGuard,
  parseAddressArg,
  parseAmountArg,
  requireI128,
  FungibleToken,
  TokenClient,
  TokenMetadataSchema,
  isFungibleToken,
} from './ledger';
export type {
  LedgerOptions,
  InvokeOptions,
  EventFilter,
  Env,
  ContractGuard,
  RestoreSnapshot,
  TokenMetadata,
} from './ledger';
