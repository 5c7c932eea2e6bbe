import { describe, it, expect } from '@jest/globals';
import { AbiCoder, concat, dataSlice, getAddress, id, keccak256, toBeHex } from 'ethers';
import {
  counterpartRole,
  deriveCounterpartAddress,
  deriveEscrowAddress,
  encodeOrderCreationData
} from '../utils/escrow-id';
import { orderData, RESOLVER, STRANGER } from './helpers';

describe('Escrow identifier derivation', () => {
  const data = orderData();

  it('is deterministic for identical order data', () => {
    expect(deriveEscrowAddress(data, 'source')).toBe(deriveEscrowAddress({ ...data }, 'source'));
  });

  it('returns a checksummed 20-byte address', () => {
    const address = deriveEscrowAddress(data, 'source');

    expect(address).toMatch(/^0x[0-9a-fA-F]{40}$/);
    expect(getAddress(address)).toBe(address);
  });

  it('follows the two-pass keccak recipe with the nonce appended', () => {
    const encoded = AbiCoder.defaultAbiCoder().encode(
      ['bytes32', 'address', 'address', 'uint256', 'uint64', 'bytes32'],
      [id('hashlock-swap.source'), data.maker, data.resolver, data.value, data.expiry, data.hashlock]
    );
    const inner = keccak256(encoded);
    const expected = getAddress(dataSlice(keccak256(concat([inner, toBeHex(data.nonce, 32)])), 12));

    expect(encodeOrderCreationData(data, 'source')).toBe(encoded);
    expect(deriveEscrowAddress(data, 'source')).toBe(expected);
  });

  it('changes when any single field changes', () => {
    const base = deriveEscrowAddress(data, 'source');
    const variants = [
      orderData({ maker: STRANGER }),
      orderData({ resolver: STRANGER }),
      orderData({ value: 101n }),
      orderData({ expiry: 5001 }),
      orderData({ hashlock: '0x' + '00'.repeat(32) }),
      orderData({ nonce: 2n })
    ];

    const addresses = variants.map((variant) => deriveEscrowAddress(variant, 'source'));

    for (const address of addresses) {
      expect(address).not.toBe(base);
    }
    expect(new Set(addresses).size).toBe(variants.length);
  });

  it('gives each role its own address for the same order', () => {
    const source = deriveEscrowAddress(data, 'source');
    const destination = deriveEscrowAddress(data, 'destination');
    const fusion = deriveEscrowAddress(data, 'fusion');

    expect(new Set([source, destination, fusion]).size).toBe(3);
  });

  it('predicts the counterpart leg', () => {
    expect(counterpartRole('source')).toBe('destination');
    expect(deriveCounterpartAddress(data, 'source')).toBe(deriveEscrowAddress(data, 'destination'));
    expect(deriveCounterpartAddress(data, 'destination')).toBe(deriveEscrowAddress(data, 'source'));
  });

  it('accepts lower-case identities and normalises them into the same address', () => {
    const lower = orderData({ resolver: RESOLVER.toLowerCase() });

    expect(deriveEscrowAddress(lower, 'destination')).toBe(deriveEscrowAddress(data, 'destination'));
  });
});
