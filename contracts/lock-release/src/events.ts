/**
 * Event names emitted by the escrow and decoders for off-ledger observers.
 *
 * | Event | Topics | Payload |
 * |---|---|---|
 * | AdminAddedEvent | name, admin | AdminData |
 * | AdminRemovedEvent | name | null |
 * | ContractPausedEvent | name | null |
 * | ContractUnpausedEvent | name | null |
 * | LockEvent | name, user, destToken, inAmount, swappedAmount | LockData |
 * | ReleaseEvent | name, user, destinationToken, amount | null |
 */

import { z } from 'zod';
import { AddressSchema } from '@bridge-escrow/config';
import type { Address, LedgerEvent } from '@bridge-escrow/types';
import { LockDataSchema, type LockData } from './types';

export const LockReleaseEvents = {
  AdminAdded: 'AdminAddedEvent',
  AdminRemoved: 'AdminRemovedEvent',
  ContractPaused: 'ContractPausedEvent',
  ContractUnpaused: 'ContractUnpausedEvent',
  Lock: 'LockEvent',
  Release: 'ReleaseEvent',
} as const;

export type LockReleaseEventName = (typeof LockReleaseEvents)[keyof typeof LockReleaseEvents];

interface DecodedEventBase {
  id: string;
  ledgerSequence: number;
  contractId: Address;
}

export interface LockEventRecord extends DecodedEventBase {
  lock: LockData;
}

export interface ReleaseEventRecord extends DecodedEventBase {
  user: Address;
  destinationToken: Address;
  amount: bigint;
}

const LockEventTopicsSchema = z.tuple([
  z.literal(LockReleaseEvents.Lock),
  AddressSchema,
  z.string(),
  z.bigint(),
  z.bigint(),
]);

const ReleaseEventTopicsSchema = z.tuple([
  z.literal(LockReleaseEvents.Release),
  AddressSchema,
  AddressSchema,
  z.bigint(),
]);

function fromContract(event: LedgerEvent, contractId: Address | undefined): boolean {
  return contractId === undefined || event.contractId === contractId;
}

/**
 * Decode a LockEvent, or return undefined for any other event (or one
 * emitted by a different contract when `contractId` is given).
 */
export function decodeLockEvent(event: LedgerEvent, contractId?: Address): LockEventRecord | undefined {
  if (!fromContract(event, contractId)) return undefined;

  const topics = LockEventTopicsSchema.safeParse(event.topics);
  const payload = LockDataSchema.safeParse(event.data);
  if (!topics.success || !payload.success) return undefined;

  return {
    id: event.id,
    ledgerSequence: event.ledgerSequence,
    contractId: event.contractId,
    lock: payload.data,
  };
}

export function decodeReleaseEvent(event: LedgerEvent, contractId?: Address): ReleaseEventRecord | undefined {
  if (!fromContract(event, contractId)) return undefined;

  const topics = ReleaseEventTopicsSchema.safeParse(event.topics);
  if (!topics.success || event.data !== null) return undefined;

  const [, user, destinationToken, amount] = topics.data;
  return {
    id: event.id,
    ledgerSequence: event.ledgerSequence,
    contractId: event.contractId,
    user,
    destinationToken,
    amount,
  };
}
