/**
 * Hash-time-locked escrows for cross-chain atomic swaps.
 *
 * Two escrows, one per chain, share a hashlock. The resolver recovers its
 * source-side funds only by revealing the secret, and that same secret lets
 * the maker collect on the destination side. If nobody reveals it, both legs
 * time out back to whoever funded them.
 */

export * from './config';
export * from './errors';
export * from './ledger';
export * from './types/order';
export * from './types/escrow';
export * from './types/fusion-order';
export * from './types/events';
export * from './runtime/clock';
export * from './runtime/custody';
export * from './runtime/event-bus';
export * from './runtime/object-store';
export * from './runtime/vault';
export * from './utils/address';
export * from './utils/escrow-id';
export * from './utils/hashlock';
export * from './validators/escrow-base';
export * from './validators/escrow-src';
export * from './validators/escrow-dst';
export * from './validators/fusion-order';
export * from './builders/escrow-factory';
