/**
 * Fungible token contract and the client other contracts use to call it.
 *
 * Balances are i128 per holder. `transfer` requires the sender's
 * authorization, which a contract moving its own funds gets implicitly by
 * being the direct invoker of the token frame.
 */

import { z } from 'zod';
import { AddressSchema } from '@bridge-escrow/config';
import { ContractError, type Address } from '@bridge-escrow/types';
import { parseAddressArg, requireI128 } from './arguments';
import { LedgerContract, type Env } from './contract';
import { StoredValue } from './storage';

export const TokenMetadataSchema = z.object({
  name: z.string().min(1),
  symbol: z.string().min(1),
  decimals: z.number().int().min(0).max(38),
});

export type TokenMetadata = z.output<typeof TokenMetadataSchema>;

const BalanceSchema = z.bigint();

export class FungibleToken extends LedgerContract {
  readonly name: string = 'fungible-token';

  private readonly admin = new StoredValue(this.storage, 'Admin', AddressSchema);
  private readonly metadata = new StoredValue(this.storage, 'Metadata', TokenMetadataSchema);

  initialize(_env: Env, admin: Address, metadata: TokenMetadata): void {
    if (this.admin.exists()) {
      throw new ContractError('Token already initialized', 'AlreadyInitialized', this.name);
    }
    const parsed = TokenMetadataSchema.safeParse(metadata);
    if (!parsed.success) {
      throw new ContractError('Invalid token metadata', 'InvalidAction', this.name);
    }
    this.admin.set(parseAddressArg(admin, 'admin', this.name));
    this.metadata.set(parsed.data);
  }

  /**
   * Issue new units to `to`. Requires the token admin's authorization.
   */
  mint(env: Env, to: Address, amount: bigint): void {
    const admin = this.admin.get();
    if (admin === undefined) {
      throw new ContractError('Token not initialized', 'MissingValue', this.name);
    }
    env.requireAuth(admin);
    if (amount < 1n) {
      throw new ContractError('Mint amount must be positive', 'InvalidAction', this.name);
    }

    const recipient = parseAddressArg(to, 'to', this.name);
    const slot = this.balanceSlot(recipient);
    slot.set(requireI128((slot.get() ?? 0n) + amount, 'balance', this.name));

    env.publish(['mint', admin, recipient], amount);
  }

  balance(_env: Env, id: Address): bigint {
    return this.balanceSlot(parseAddressArg(id, 'id', this.name)).get() ?? 0n;
  }

  transfer(env: Env, from: Address, to: Address, amount: bigint): void {
    const sender = parseAddressArg(from, 'from', this.name);
    const recipient = parseAddressArg(to, 'to', this.name);
    env.requireAuth(sender);

    if (amount < 0n) {
      throw new ContractError('Transfer amount cannot be negative', 'InvalidAction', this.name);
    }

    const senderSlot = this.balanceSlot(sender);
    const senderBalance = senderSlot.get() ?? 0n;
    if (senderBalance < amount) {
      throw new ContractError(
        `Insufficient balance: ${senderBalance} < ${amount}`,
        'InvalidAction',
        this.name
      );
    }
    if (sender !== recipient) {
      // Both balances are checked before either slot is written
      const recipientSlot = this.balanceSlot(recipient);
      const recipientBalance = requireI128((recipientSlot.get() ?? 0n) + amount, 'balance', this.name);
      senderSlot.set(senderBalance - amount);
      recipientSlot.set(recipientBalance);
    }

    env.publish(['transfer', sender, recipient], amount);
  }

  getMetadata(_env: Env): TokenMetadata | undefined {
    return this.metadata.get();
  }

  private balanceSlot(holder: Address): StoredValue<bigint> {
    return new StoredValue(this.storage, `Balance:${holder}`, BalanceSchema);
  }
}

export function isFungibleToken(contract: LedgerContract): contract is FungibleToken {
  return contract instanceof FungibleToken;
}

/**
 * Calls a token from inside another contract's frame.
 *
 * @example
 * ```typescript
 * const token = new TokenClient(env, fromToken);
 * if (token.balance(user) < amount) { ... }
 * token.transfer(user, env.contractAddress, amount);
 * ```
 */
export class TokenClient {
  constructor(private readonly env: Env, readonly address: Address) {}

  balance(id: Address): bigint {
    return this.env.invoke(this.address, isFungibleToken, (token, env) => token.balance(env, id));
  }

  transfer(from: Address, to: Address, amount: bigint): void {
    this.env.invoke(this.address, isFungibleToken, (token, env) => token.transfer(env, from, to, amount));
  }
}
