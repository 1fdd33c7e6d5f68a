/**
 * Ledger value types shared by the host, the token and the escrow contract.
 */

/**
 * Checksummed 20-byte hex address of an account or contract on the ledger.
 */
export type Address = string;

/**
 * A value that can live in contract storage, event topics or event payloads.
 * `null` is the unit value used for marker keys and empty payloads.
 */
export type ScValue =
  | null
  | boolean
  | number
  | string
  | bigint
  | Uint8Array
  | readonly ScValue[]
  | { readonly [key: string]: ScValue };

/** Smallest signed 128-bit integer, the ledger's amount width. */
export const I128_MIN = -(2n ** 127n);

/** Largest signed 128-bit integer. */
export const I128_MAX = 2n ** 127n - 1n;

export function isI128(value: bigint): boolean {
  return value >= I128_MIN && value <= I128_MAX;
}

/**
 * An event appended to the ledger log when a transaction commits.
 */
export interface LedgerEvent {
  /** `<sequence>-<index>` */
  id: string;
  /** Sequence number of the transaction that emitted the event */
  ledgerSequence: number;
  /** Address of the emitting contract */
  contractId: Address;
  topics: readonly ScValue[];
  data: ScValue;
}
