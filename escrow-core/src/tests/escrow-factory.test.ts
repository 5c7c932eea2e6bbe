import { describe, it, expect, beforeEach } from '@jest/globals';
import { EscrowFactory } from '../builders/escrow-factory';
import { EscrowLedger } from '../ledger';
import { deriveEscrowAddress } from '../utils/escrow-id';
import {
  createTestLedger,
  expectEscrowError,
  FACTORY_OWNER,
  MAKER,
  NATIVE,
  orderData,
  RESOLVER,
  STRANGER,
  TOKEN
} from './helpers';

describe('EscrowFactory', () => {
  let ledger: EscrowLedger;
  let factory: EscrowFactory;

  const request = { order: orderData(), tokenAsset: TOKEN, safetyDeposit: 3n };

  beforeEach(() => {
    ({ ledger } = createTestLedger());
    factory = new EscrowFactory(ledger, FACTORY_OWNER, [MAKER]);
    ledger.mint(MAKER, TOKEN, 100n);
    ledger.mint(MAKER, NATIVE, 3n);
    ledger.mint(RESOLVER, TOKEN, 100n);
    ledger.mint(RESOLVER, NATIVE, 3n);
  });

  it('forwards creation for authorized creators', () => {
    const escrow = factory.createSourceEscrow({ sender: MAKER }, request);

    expect(ledger.getEscrow(escrow.id)).toBe(escrow);
    expect(escrow.creator).toBe(MAKER);
  });

  it('rejects unauthorized creators without touching their funds', () => {
    expectEscrowError(() => factory.createDestinationEscrow({ sender: RESOLVER }, request), 'UNAUTHORIZED_CREATOR');
    expect(ledger.balanceOf(RESOLVER, TOKEN)).toBe(100n);
    expect(ledger.listEscrows()).toHaveLength(0);
  });

  it('lets the owner grant and revoke creation rights', () => {
    factory.authorize({ sender: FACTORY_OWNER }, RESOLVER.toLowerCase());
    expect(factory.isAuthorized(RESOLVER)).toBe(true);
    expect(factory.listCreators()).toEqual([MAKER, RESOLVER]);

    const escrow = factory.createDestinationEscrow({ sender: RESOLVER }, request);
    expect(escrow.side).toBe('destination');

    factory.revoke({ sender: FACTORY_OWNER }, MAKER);
    expect(factory.listCreators()).toEqual([RESOLVER]);
    expectEscrowError(() => factory.createSourceEscrow({ sender: MAKER }, request), 'UNAUTHORIZED_CREATOR');
  });

  it('reserves creator management to the owner', () => {
    expectEscrowError(() => factory.authorize({ sender: MAKER }, STRANGER), 'NOT_FACTORY_OWNER');
    expectEscrowError(() => factory.revoke({ sender: STRANGER }, MAKER), 'NOT_FACTORY_OWNER');
    expect(factory.isAuthorized(STRANGER)).toBe(false);
  });

  it('leaves protocol rules to the escrow modules', () => {
    expectEscrowError(
      () => factory.createSourceEscrow({ sender: MAKER }, { ...request, safetyDeposit: 1n }),
      'INSUFFICIENT_DEPOSIT'
    );
  });

  it('predicts the addresses of both legs', () => {
    const predicted = factory.predictAddresses(orderData());

    expect(predicted).toEqual({
      source: deriveEscrowAddress(orderData(), 'source'),
      destination: deriveEscrowAddress(orderData(), 'destination')
    });

    const escrow = factory.createSourceEscrow({ sender: MAKER }, request);
    expect(escrow.escrowAddress).toBe(predicted.source);
  });
});
