/**
 * Test Data Builder for LockRequest
 */

import type { LockRequest } from '@bridge-escrow/lock-release';
import type { Address } from '@bridge-escrow/types';
import type { BytesLike } from 'ethers';
import { ALICE, DEST_CHAIN_HEX, DEST_TOKEN, FOREIGN_RECIPIENT } from '../fixtures/accounts';

export class LockRequestBuilder {
  private request: LockRequest;

  constructor(fromToken: Address) {
    this.request = {
      userAddress: ALICE,
      fromToken,
      destToken: DEST_TOKEN,
      inAmount: 100n,
      destChain: DEST_CHAIN_HEX,
      recipientAddress: FOREIGN_RECIPIENT,
    };
  }

  from(userAddress: Address): this {
    this.request.userAddress = userAddress;
    return this;
  }

  withAmount(inAmount: bigint): this {
    this.request.inAmount = inAmount;
    return this;
  }

  withToken(fromToken: Address): this {
    this.request.fromToken = fromToken;
    return this;
  }

  toChain(destChain: BytesLike): this {
    this.request.destChain = destChain;
    return this;
  }

  toRecipient(recipientAddress: string, destToken: string = DEST_TOKEN): this {
    this.request.recipientAddress = recipientAddress;
    this.request.destToken = destToken;
    return this;
  }

  build(): LockRequest {
    return { ...this.request };
  }
}

export const lockRequest = (fromToken: Address): LockRequestBuilder => new LockRequestBuilder(fromToken);
