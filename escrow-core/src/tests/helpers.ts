import { expect } from '@jest/globals';
import { getAddress } from 'ethers';
import { EscrowError, EscrowErrorCode } from '../errors';
import { EscrowLedger } from '../ledger';
import { ManualClock } from '../runtime/clock';
import { OrderCreationData } from '../types/order';
import { hashSecret } from '../utils/hashlock';

export const MAKER = getAddress('0x' + '11'.repeat(20));
export const RESOLVER = getAddress('0x' + '22'.repeat(20));
export const STRANGER = getAddress('0x' + '33'.repeat(20));
export const FACTORY_OWNER = getAddress('0x' + '44'.repeat(20));

export const TOKEN = 'USDC';
export const NATIVE = 'NATIVE';

export const SECRET = '0x' + 'ab'.repeat(32);
export const HASHLOCK = hashSecret(SECRET);

/** Small numbers so the timeline is easy to follow: finality at +500, timelock at +1000. */
export function createTestLedger(overrides: Partial<EscrowLedger['config']> = {}): {
  ledger: EscrowLedger;
  clock: ManualClock;
} {
  const clock = new ManualClock(0);
  const ledger = new EscrowLedger({
    clock,
    config: {
      minSafetyDeposit: 2n,
      minOrderDeposit: 2n,
      finalityPeriodMs: 500,
      defaultTimelockMs: 1000,
      nativeAsset: NATIVE,
      ...overrides
    }
  });
  return { ledger, clock };
}

export function orderData(overrides: Partial<OrderCreationData> = {}): OrderCreationData {
  return {
    maker: MAKER,
    resolver: RESOLVER,
    value: 100n,
    expiry: 5000,
    hashlock: HASHLOCK,
    nonce: 1n,
    ...overrides
  };
}

export function expectEscrowError(fn: () => unknown, code: EscrowErrorCode): void {
  let caught: unknown;
  try {
    fn();
  } catch (error) {
    caught = error;
  }
  expect(caught).toBeInstanceOf(EscrowError);
  expect(caught instanceof EscrowError ? caught.code : undefined).toBe(code);
}
