import { getAddress } from 'ethers';
import { EscrowLedger, hashSecret, ManualClock } from '@hashlock-swap/escrow-core';
import { NodeConfig } from '../types';

export const MAKER = getAddress('0x' + '11'.repeat(20));
export const RESOLVER = getAddress('0x' + '22'.repeat(20));
export const STRANGER = getAddress('0x' + '33'.repeat(20));

export const TOKEN = 'USDC';
export const NATIVE = 'NATIVE';

export const SECRET = '0x' + 'cd'.repeat(32);
export const HASHLOCK = hashSecret(SECRET);

export function testConfig(overrides: Partial<NodeConfig> = {}): NodeConfig {
  return {
    port: 3000,
    apiSecret: 'test-secret',
    dbPath: ':memory:',
    allowMint: true,
    monitorSchedule: '*/30 * * * * *',
    alertWindowMs: 200,
    escrow: {
      minSafetyDeposit: 2n,
      minOrderDeposit: 2n,
      finalityPeriodMs: 500,
      defaultTimelockMs: 1000,
      nativeAsset: NATIVE
    },
    ...overrides
  };
}

export function createTestLedger(config: NodeConfig = testConfig()): { ledger: EscrowLedger; clock: ManualClock } {
  const clock = new ManualClock(0);
  return { ledger: new EscrowLedger({ config: config.escrow, clock }), clock };
}

/** A funded maker and a source escrow locked at t=0: finality at 500, timelock at 1000. */
export function openSourceEscrow(ledger: EscrowLedger) {
  ledger.mint(MAKER, TOKEN, 100n);
  ledger.mint(MAKER, NATIVE, 3n);

  return ledger.createSourceEscrow({ sender: MAKER }, {
    order: { maker: MAKER, resolver: RESOLVER, value: 100n, expiry: 5000, hashlock: HASHLOCK, nonce: 1n },
    tokenAsset: TOKEN,
    safetyDeposit: 3n
  });
}
