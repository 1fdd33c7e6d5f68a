/**
 * Ledger harness: a fresh ledger with a recording logger, plus token helpers
 * that hide the invoke boilerplate in tests.
 */

import { FungibleToken, Ledger, RecordingLogger } from '@bridge-escrow/core';
import type { Address } from '@bridge-escrow/types';
import { ISSUER } from '../fixtures/accounts';

export interface TestLedger {
  ledger: Ledger;
  logger: RecordingLogger;
}

export function createTestLedger(startSequence = 1): TestLedger {
  const logger = new RecordingLogger();
  return { ledger: new Ledger({ logger, startSequence }), logger };
}

/**
 * Deploy and initialize a token whose admin is `issuer`.
 */
export function deployTestToken<T extends FungibleToken>(
  ledger: Ledger,
  create: (address: Address) => T,
  symbol = 'TST',
  issuer: Address = ISSUER
): T {
  const token = ledger.deploy(create);
  ledger.invoke(token, (t, env) => t.initialize(env, issuer, { name: `${symbol} Token`, symbol, decimals: 7 }));
  return token;
}

export function mintTo(
  ledger: Ledger,
  token: FungibleToken,
  to: Address,
  amount: bigint,
  issuer: Address = ISSUER
): void {
  ledger.invoke(token, (t, env) => t.mint(env, to, amount), { signers: [issuer] });
}

export function balanceOf(ledger: Ledger, token: FungibleToken, holder: Address): bigint {
  return ledger.simulate(token, (t, env) => t.balance(env, holder));
}
