/**
 * Deterministic ledger accounts for tests. All checksummed.
 */

import { getAddress } from 'ethers';

const account = (digit: string): string => getAddress(`0x${digit.repeat(40)}`);

export const OWNER = account('1');
export const ADMIN = account('2');
export const ALICE = account('3');
export const BOB = account('4');
export const MALLORY = account('5');
export const ISSUER = account('6');
/** A second operator for admin replacement tests */
export const NEXT_ADMIN = account('7');

/** A well-formed address with no contract deployed behind it */
export const UNDEPLOYED_CONTRACT = account('9');

/** Destination chain identifier used by lock fixtures ("ethereum" as UTF-8 bytes) */
export const DEST_CHAIN_HEX = '0x657468657265756d';
export const DEST_TOKEN = 'bUSD.e';
export const FOREIGN_RECIPIENT = '0x00000000000000000000000000000000000000fe';
