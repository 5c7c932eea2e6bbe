import { describe, it, expect, beforeEach } from '@jest/globals';
import { EscrowLedger } from '../ledger';
import { ManualClock } from '../runtime/clock';
import { EscrowEventMap } from '../types/events';
import { FusionOrder } from '../types/fusion-order';
import { deriveEscrowAddress } from '../utils/escrow-id';
import { tradeParamsDigest } from '../validators/fusion-order';
import {
  createTestLedger,
  expectEscrowError,
  MAKER,
  NATIVE,
  RESOLVER,
  STRANGER,
  TOKEN
} from './helpers';

describe('Fusion order', () => {
  let ledger: EscrowLedger;
  let clock: ManualClock;
  let order: FusionOrder;

  const terms = {
    resolver: RESOLVER,
    targetAsset: TOKEN,
    minOutput: 50n,
    routeData: '0xC0FFEE',
    expiry: 1000
  };

  beforeEach(() => {
    ({ ledger, clock } = createTestLedger());
    ledger.mint(MAKER, NATIVE, 10n);
    ledger.mint(RESOLVER, TOKEN, 80n);

    order = ledger.createOrder({ sender: MAKER }, { ...terms, deposit: 5n });
  });

  describe('create', () => {
    it('records the maker as the caller and holds the deposit', () => {
      expect(order.core.maker).toBe(MAKER);
      expect(order.core.value).toBe(5n);
      expect(order.core.deposit.value).toBe(5n);
      expect(order.resolver).toBe(RESOLVER);
      expect(order.version).toBe(1);
      expect(order.tradeParams.routeData).toBe('0xc0ffee');
      expect(ledger.balanceOf(MAKER, NATIVE)).toBe(5n);
    });

    it('derives its address from the terms and a per-maker nonce', () => {
      const expected = deriveEscrowAddress(
        {
          maker: MAKER,
          resolver: RESOLVER,
          value: 5n,
          expiry: 1000,
          hashlock: tradeParamsDigest({ targetAsset: TOKEN, minOutput: 50n, routeData: '0xc0ffee' }),
          nonce: 0n
        },
        'fusion'
      );

      expect(order.orderAddress).toBe(expected);
      expect(ledger.fusion.nextNonce(MAKER)).toBe(1n);

      const second = ledger.createOrder({ sender: MAKER }, { ...terms, deposit: 5n });
      expect(second.nonce).toBe(1n);
      expect(second.orderAddress).not.toBe(order.orderAddress);
    });

    it('rejects a deposit below the minimum', () => {
      expectEscrowError(() => ledger.createOrder({ sender: MAKER }, { ...terms, deposit: 1n }), 'INSUFFICIENT_DEPOSIT');
      expect(ledger.balanceOf(MAKER, NATIVE)).toBe(5n);
    });

    it('rejects an expiry in the past', () => {
      clock.set(1000);

      expectEscrowError(() => ledger.createOrder({ sender: MAKER }, { ...terms, deposit: 2n }), 'ORDER_EXPIRED');
    });

    it('rejects route data that is not hex bytes', () => {
      expectEscrowError(
        () => ledger.createOrder({ sender: MAKER }, { ...terms, routeData: 'route', deposit: 2n }),
        'INVALID_ROUTE_DATA'
      );
    });

    it('announces itself on the event bus', () => {
      const seen: Array<EscrowEventMap['orderCreated']> = [];
      ledger.events.subscribe('orderCreated', (event) => seen.push(event));

      const next = ledger.createOrder({ sender: MAKER }, { ...terms, deposit: 2n });

      expect(seen).toHaveLength(1);
      expect(seen[0].id).toBe(next.id);
      expect(seen[0].amount).toBe(2n);
      expect(seen[0].minOutput).toBe(50n);
    });
  });

  describe('resolve', () => {
    it('pays the proceeds to the maker and the deposit to the resolver', () => {
      clock.set(500);

      const settlement = ledger.resolveOrder({ sender: RESOLVER }, order.id, 60n);

      expect(settlement.outcome).toBe('filled');
      expect(settlement.payouts).toEqual([
        { recipient: MAKER, asset: TOKEN, value: 60n },
        { recipient: RESOLVER, asset: NATIVE, value: 5n }
      ]);
      expect(ledger.balanceOf(MAKER, TOKEN)).toBe(60n);
      expect(ledger.balanceOf(RESOLVER, TOKEN)).toBe(20n);
      expect(ledger.balanceOf(RESOLVER, NATIVE)).toBe(5n);
      expect(ledger.findOrder(order.id)).toBeUndefined();
    });

    it('requires the named resolver', () => {
      ledger.mint(STRANGER, TOKEN, 80n);

      expectEscrowError(() => ledger.resolveOrder({ sender: STRANGER }, order.id, 60n), 'INVALID_RESOLVER');
      expect(ledger.balanceOf(STRANGER, TOKEN)).toBe(80n);
    });

    it('lets anyone fill when the resolver policy is open', () => {
      const open = createTestLedger({ fusionResolverPolicy: 'open' });
      open.ledger.mint(MAKER, NATIVE, 5n);
      open.ledger.mint(STRANGER, TOKEN, 50n);
      const posted = open.ledger.createOrder({ sender: MAKER }, { ...terms, deposit: 5n });

      const settlement = open.ledger.resolveOrder({ sender: STRANGER }, posted.id, 50n);

      expect(settlement.payouts[1]).toEqual({ recipient: STRANGER, asset: NATIVE, value: 5n });
    });

    it('rejects proceeds below the minimum output', () => {
      expectEscrowError(() => ledger.resolveOrder({ sender: RESOLVER }, order.id, 49n), 'INSUFFICIENT_OUTPUT');
      expect(ledger.balanceOf(RESOLVER, TOKEN)).toBe(80n);
    });

    it('is refused at and after expiry', () => {
      clock.set(1000);

      expectEscrowError(() => ledger.resolveOrder({ sender: RESOLVER }, order.id, 60n), 'ORDER_EXPIRED');
    });

    it('fails cleanly when the resolver cannot cover the proceeds', () => {
      expectEscrowError(() => ledger.resolveOrder({ sender: RESOLVER }, order.id, 90n), 'INSUFFICIENT_BALANCE');
      expect(ledger.findOrder(order.id)).toBeDefined();
    });
  });

  describe('cancel', () => {
    it('returns the deposit to the maker after expiry', () => {
      clock.set(1000);

      const settlement = ledger.cancelOrder({ sender: MAKER }, order.id);

      expect(settlement.outcome).toBe('cancelled');
      expect(ledger.balanceOf(MAKER, NATIVE)).toBe(10n);
      expect(ledger.findOrder(order.id)).toBeUndefined();
    });

    it('is refused before expiry', () => {
      clock.set(999);

      expectEscrowError(() => ledger.cancelOrder({ sender: MAKER }, order.id), 'ORDER_NOT_EXPIRED');
    });

    it('is reserved to the maker', () => {
      clock.set(1000);

      expectEscrowError(() => ledger.cancelOrder({ sender: RESOLVER }, order.id), 'NOT_MAKER');
    });

    it('cannot follow a fill', () => {
      ledger.resolveOrder({ sender: RESOLVER }, order.id, 60n);
      clock.set(1000);

      expectEscrowError(() => ledger.cancelOrder({ sender: MAKER }, order.id), 'NOT_FOUND');
    });
  });
});
