/**
 * Local Bridge Simulation
 *
 * Deploys a token and the lock/release escrow on an in-process ledger, then
 * walks through a lock (deposit leaving for the other chain) and a release
 * (funds coming back), logging balances after each step.
 *
 * Usage:
 *   npm run simulate
 *   BRIDGE_FEE_PERCENTAGE=5 LOG_LEVEL=debug npm run simulate
 *
 * Environment Variables:
 *   BRIDGE_FEE_PERCENTAGE - protocol fee, 0-100 (default 3)
 *   BRIDGE_OWNER_ADDRESS - owner account (default: a fresh random address)
 *   LEDGER_START_SEQUENCE - first transaction sequence (default 1)
 *   LOG_LEVEL - pino level (default info)
 */

import { Wallet, hexlify, toUtf8Bytes } from 'ethers';
import { loadBridgeConfig } from '@bridge-escrow/config';
import { FungibleToken, Ledger, createLogger } from '@bridge-escrow/core';
import type { Address } from '@bridge-escrow/types';
import { deployLockRelease } from '../src';

const DEPOSIT = 1_000_000n;
const RETURNED = 400_000n;

function main(): void {
  const config = loadBridgeConfig();
  const logger = createLogger({ name: 'simulate-bridge', level: config.logLevel });
  const ledger = new Ledger({
    logger: logger.child({ component: 'ledger' }),
    startSequence: config.ledgerStartSequence,
  });

  const owner = config.ownerAddress ?? Wallet.createRandom().address;
  const operator = Wallet.createRandom().address;
  const issuer = Wallet.createRandom().address;
  const alice = Wallet.createRandom().address;
  const bob = Wallet.createRandom().address;

  const token = ledger.deploy((address) => new FungibleToken(address));
  ledger.invoke(token, (t, env) => t.initialize(env, issuer, { name: 'Bridged USD', symbol: 'bUSD', decimals: 6 }));
  ledger.invoke(token, (t, env) => t.mint(env, alice, DEPOSIT), { signers: [issuer] });

  const bridge = deployLockRelease(ledger, { owner, feePercentage: config.feePercentage });
  bridge.connect(owner).addAdmin(operator);

  const balances = (): Record<string, string> => {
    const balanceOf = (holder: Address): string =>
      ledger.simulate(token, (t, env) => t.balance(env, holder)).toString();
    return {
      alice: balanceOf(alice),
      operator: balanceOf(operator),
      custody: balanceOf(bridge.address),
      bob: balanceOf(bob),
    };
  };

  logger.info('Bridge deployed', {
    bridge: bridge.address,
    token: token.address,
    feePercentage: config.feePercentage,
    balances: balances(),
  });

  bridge.connect(alice).lock({
    userAddress: alice,
    fromToken: token.address,
    destToken: 'bUSD.e',
    inAmount: DEPOSIT,
    destChain: hexlify(toUtf8Bytes('ethereum')),
    recipientAddress: bob,
  });

  const [lockEvent] = bridge.lockEvents();
  logger.info('Lock observed', { event: lockEvent, balances: balances() });

  bridge.connect(operator).release({ amount: RETURNED, user: bob, destinationToken: token.address });

  logger.info('Release complete', { releases: bridge.releaseEvents().length, balances: balances() });
}

try {
  main();
} catch (error) {
  createLogger('simulate-bridge').fatal('Simulation failed', { error });
  process.exitCode = 1;
}
