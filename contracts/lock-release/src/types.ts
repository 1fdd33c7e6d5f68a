/**
 * Storage layout and value types of the lock/release escrow.
 */

import type { BytesLike } from 'ethers';
import { z } from 'zod';
import { AddressSchema } from '@bridge-escrow/config';
import type { Address } from '@bridge-escrow/types';

export const CONTRACT_NAME = 'lock-release';

/**
 * Instance storage keys.
 */
export enum DataKey {
  Init = 'Init',
  Owner = 'Owner',
  Admin = 'Admin',
  LockData = 'LockData',
  Config = 'Config',
  ReentrancyGuard = 'ReentrancyGuard',
  Paused = 'Paused',
}

export const AdminDataSchema = z.object({
  adminAddress: AddressSchema,
});

export type AdminData = z.output<typeof AdminDataSchema>;

export const FeeConfigSchema = z.object({
  feePercentage: z.bigint(),
});

export type FeeConfig = z.output<typeof FeeConfigSchema>;

/**
 * Snapshot of the most recent lock. `destToken` and `recipientAddress` name
 * an asset and an account on the destination chain and are not interpreted
 * here; `destChain` is the chain identifier as lowercase hex.
 */
export const LockDataSchema = z.object({
  userAddress: AddressSchema,
  destToken: z.string(),
  fromToken: AddressSchema,
  inAmount: z.bigint(),
  swappedAmount: z.bigint(),
  recipientAddress: z.string(),
  destChain: z.string().regex(/^0x([0-9a-f]{2})*$/, 'destChain must be lowercase hex'),
});

export type LockData = z.output<typeof LockDataSchema>;

export interface LockRequest {
  userAddress: Address;
  fromToken: Address;
  destToken: string;
  inAmount: bigint;
  destChain: BytesLike;
  recipientAddress: string;
}

export interface ReleaseRequest {
  amount: bigint;
  user: Address;
  destinationToken: Address;
}
