/**
 * Environment variable parsing helpers.
 *
 * Value-based: each takes the raw string (usually straight from an env map)
 * and returns a parsed value or the provided default. None of them throw;
 * range and shape validation happens afterwards in the zod schemas.
 *
 * Conventions:
 * - `undefined` and blank strings fall back to the default
 * - A malformed value falls back to the default and, when a label is given,
 *   prints a `[CONFIG]` warning naming the variable
 */

/**
 * Return the trimmed value, or `undefined` when missing or blank.
 */
export function readEnvString(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

/**
 * Parse a base-10 integer.
 *
 * @example
 * ```typescript
 * const start = safeParseInt(env.LEDGER_START_SEQUENCE, 1, 'LEDGER_START_SEQUENCE');
 * ```
 */
export function safeParseInt(
  value: string | undefined,
  defaultValue: number,
  label?: string
): number {
  const raw = readEnvString(value);
  if (raw === undefined) return defaultValue;
  if (!/^-?\d+$/.test(raw)) {
    if (label) console.warn(`[CONFIG] Invalid integer value for ${label}: "${value}" - using default`);
    return defaultValue;
  }
  return parseInt(raw, 10);
}

/**
 * Parse an integer into a BigInt without losing precision above 2^53.
 */
export function safeParseBigInt(
  value: string | undefined,
  defaultValue: bigint,
  label?: string
): bigint {
  const raw = readEnvString(value);
  if (raw === undefined) return defaultValue;
  if (!/^-?\d+$/.test(raw)) {
    if (label) console.warn(`[CONFIG] Invalid BigInt value for ${label}: "${value}" - using default`);
    return defaultValue;
  }
  return BigInt(raw);
}
