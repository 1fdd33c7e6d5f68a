/**
 * Bridge configuration loaded from environment variables.
 *
 * | Variable | Default | Meaning |
 * |---|---|---|
 * | BRIDGE_FEE_PERCENTAGE | 3 | protocol fee deducted by `lock`, 0-100 |
 * | LEDGER_START_SEQUENCE | 1 | sequence number of the first transaction |
 * | LOG_LEVEL | info | minimum pino level |
 * | BRIDGE_OWNER_ADDRESS | (none) | owner passed to `initialize` by deploy scripts |
 */

import { BridgeConfigSchema, validateOrThrow, type BridgeConfig } from './schemas';
import { readEnvString, safeParseBigInt, safeParseInt } from './utils/env-parsing';

export const DEFAULT_FEE_PERCENTAGE = 3n;
export const DEFAULT_LEDGER_START_SEQUENCE = 1;

export type EnvSource = Record<string, string | undefined>;

/**
 * Read and validate the bridge configuration.
 *
 * Unparseable numbers fall back to their defaults; parseable but out-of-range
 * values (a fee of 150, a malformed owner address) throw.
 */
export function loadBridgeConfig(env: EnvSource = process.env): BridgeConfig {
  return validateOrThrow(
    BridgeConfigSchema,
    {
      feePercentage: safeParseBigInt(
        env.BRIDGE_FEE_PERCENTAGE,
        DEFAULT_FEE_PERCENTAGE,
        'BRIDGE_FEE_PERCENTAGE'
      ),
      ledgerStartSequence: safeParseInt(
        env.LEDGER_START_SEQUENCE,
        DEFAULT_LEDGER_START_SEQUENCE,
        'LEDGER_START_SEQUENCE'
      ),
      logLevel: readEnvString(env.LOG_LEVEL) ?? 'info',
      ownerAddress: readEnvString(env.BRIDGE_OWNER_ADDRESS),
    },
    'bridge'
  );
}
