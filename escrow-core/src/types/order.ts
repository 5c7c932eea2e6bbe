/** 0x-prefixed, 20-byte account identity in checksum form. */
export type Address = string;

/** 0x-prefixed, 32-byte digest committed at creation. */
export type Hashlock = string;

/** Preimage of a hashlock: raw bytes, or a string holding them. */
export type Secret = Uint8Array | string;

/**
 * Parameters of one swap leg. Both legs of a swap are created from the same
 * data, so either side can predict the other's escrow address.
 */
export interface OrderCreationData {
  readonly maker: Address;
  readonly resolver: Address;
  readonly value: bigint;
  /** Absolute order deadline (ms); creation is refused at or after it. */
  readonly expiry: number;
  readonly hashlock: Hashlock;
  /** Caller-chosen nonce that keeps repeated identical orders apart. */
  readonly nonce: bigint;
}

/**
 * Value object shared by escrows and fusion orders: what is owed, until when,
 * by whom, and the deposit held against it.
 */
export interface OrderRecord {
  readonly value: bigint;
  readonly expiry: number;
  readonly maker: Address;
  readonly deposit: AssetAmount;
}

export interface CallContext {
  readonly sender: Address;
}

/** Read-only quantity of one asset. */
export interface AssetAmount {
  readonly asset: string;
  readonly value: bigint;
}

export interface Payout extends AssetAmount {
  readonly recipient: Address;
}
