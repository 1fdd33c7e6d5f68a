/**
 * Shared Configuration for the Bridge Escrow
 *
 * - schemas/: zod schemas for addresses, amounts, fees and the bridge config
 * - utils/env-parsing.ts: non-throwing env value parsers
 * - bridge-config.ts: env loader
 */

export {
  AddressSchema,
  FeePercentageSchema,
  AmountSchema,
  LogLevelSchema,
  BridgeConfigSchema,
  validateWithDetails,
  validateOrThrow,
} from './schemas';
export type { BridgeConfig, ValidationResult } from './schemas';

export { readEnvString, safeParseInt, safeParseBigInt } from './utils/env-parsing';

export {
  loadBridgeConfig,
  DEFAULT_FEE_PERCENTAGE,
  DEFAULT_LEDGER_START_SEQUENCE,
} from './bridge-config';
export type { EnvSource } from './bridge-config';
