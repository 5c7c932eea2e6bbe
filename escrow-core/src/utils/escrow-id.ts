import { AbiCoder, concat, dataSlice, getAddress, id, keccak256, toBeHex } from 'ethers';
import { Address, OrderCreationData } from '../types/order';

export type EscrowRole = 'source' | 'destination' | 'fusion';

const ROLE_TAGS: Record<EscrowRole, string> = {
  source: id('hashlock-swap.source'),
  destination: id('hashlock-swap.destination'),
  fusion: id('hashlock-swap.fusion')
};

const ORDER_LAYOUT = ['bytes32', 'address', 'address', 'uint256', 'uint64', 'bytes32'];

/**
 * Fixed-order, fixed-width encoding of the order data for one role.
 * The nonce is deliberately left out; it enters in the second hash pass.
 */
export function encodeOrderCreationData(data: OrderCreationData, role: EscrowRole): string {
  return AbiCoder.defaultAbiCoder().encode(ORDER_LAYOUT, [
    ROLE_TAGS[role],
    data.maker,
    data.resolver,
    data.value,
    data.expiry,
    data.hashlock
  ]);
}

/**
 * Deterministic escrow address for one leg of a swap:
 *
 *   inner   = keccak256(encode(role, maker, resolver, value, expiry, hashlock))
 *   address = last20(keccak256(inner ++ uint256(nonce)))
 *
 * Anyone holding the order data and nonce can reproduce it off-ledger.
 */
export function deriveEscrowAddress(data: OrderCreationData, role: EscrowRole): Address {
  const inner = keccak256(encodeOrderCreationData(data, role));
  const salted = concat([inner, toBeHex(data.nonce, 32)]);
  return getAddress(dataSlice(keccak256(salted), 12));
}

export function counterpartRole(role: 'source' | 'destination'): 'source' | 'destination' {
  return role === 'source' ? 'destination' : 'source';
}

/** Address of the other leg built from the same order data. */
export function deriveCounterpartAddress(data: OrderCreationData, role: 'source' | 'destination'): Address {
  return deriveEscrowAddress(data, counterpartRole(role));
}
