/**
 * Zod Schema Validation for Bridge Values and Config
 *
 * Runtime validation for everything that crosses into the ledger from the
 * outside: addresses, amounts, the fee percentage and the env-derived bridge
 * configuration. Schemas normalize as they validate (addresses come out
 * checksummed, fee percentages come out as bigint).
 */

import { getAddress, isAddress } from 'ethers';
import { z } from 'zod';
import { I128_MAX } from '@bridge-escrow/types';

// =============================================================================
// Primitive Schemas
// =============================================================================

/**
 * Ledger address schema (0x + 40 hex chars, any casing).
 * Output is the EIP-55 checksummed form so equality checks can use `===`.
 */
export const AddressSchema = z
  .string()
  .refine((value) => isAddress(value), 'Invalid address format')
  .transform((value) => getAddress(value));

/**
 * Protocol fee as an integer percentage (0-100), output as bigint.
 */
export const FeePercentageSchema = z
  .union([z.bigint(), z.number().int('Fee percentage must be an integer')])
  .transform((value) => BigInt(value))
  .pipe(
    z
      .bigint()
      .min(0n, 'Fee percentage cannot be negative')
      .max(100n, 'Fee percentage cannot exceed 100')
  );

/**
 * Transfer amount: at least one unit, within the signed 128-bit range.
 */
export const AmountSchema = z
  .bigint()
  .min(1n, 'Amount must be at least 1')
  .max(I128_MAX, 'Amount exceeds the 128-bit range');

export const LogLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']);

// =============================================================================
// Config Schemas
// =============================================================================

export const BridgeConfigSchema = z.object({
  feePercentage: FeePercentageSchema,
  ledgerStartSequence: z.number().int().min(0, 'Ledger sequence cannot be negative'),
  logLevel: LogLevelSchema,
  ownerAddress: AddressSchema.optional(),
});

export type BridgeConfig = z.output<typeof BridgeConfigSchema>;

// =============================================================================
// Validation Helpers
// =============================================================================

export interface ValidationResult<T> {
  success: boolean;
  data?: T;
  errors?: Array<{
    path: string;
    message: string;
  }>;
}

/**
 * Validate data against a schema and return a detailed result.
 * Does NOT throw.
 */
export function validateWithDetails<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown
): ValidationResult<T> {
  const result = schema.safeParse(data);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((e: z.ZodIssue) => ({
      path: e.path.join('.'),
      message: e.message,
    })),
  };
}

/**
 * Validate data and throw on failure.
 *
 * @param context - Label included in the error message
 * @throws Error listing every failed path
 */
export function validateOrThrow<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  data: unknown,
  context: string
): T {
  const result = schema.safeParse(data);

  if (result.success) {
    return result.data;
  }

  const errorDetails = result.error.errors
    .map((e: z.ZodIssue) => `  - ${e.path.join('.') || '(root)'}: ${e.message}`)
    .join('\n');

  throw new Error(`Config validation failed for ${context}:\n${errorDetails}`);
}
