import { Address, AssetAmount, Hashlock, OrderCreationData, Payout } from './order';

export type EscrowSide = 'source' | 'destination';

export type EscrowOutcome = 'claimed' | 'refunded' | 'slashed';

/** Where an escrow sits on its timeline at a given instant. */
export type EscrowPhase = 'finality' | 'claimable' | 'expired';

export interface Escrow {
  readonly id: string;
  /** Deterministic address derived from the order data; see deriveEscrowAddress. */
  readonly escrowAddress: Address;
  readonly side: EscrowSide;
  readonly maker: Address;
  readonly resolver: Address;
  readonly creator: Address;
  readonly amount: bigint;
  readonly hashlock: Hashlock;
  readonly timelock: number;
  readonly finalitylock: number;
  readonly tokenBalance: AssetAmount;
  readonly safetyDeposit: AssetAmount;
  readonly isClaimed: boolean;
  readonly isRefunded: boolean;
  readonly expiry: number;
  readonly nonce: bigint;
  readonly createdAt: number;
}

export interface CreateEscrowParams {
  readonly order: OrderCreationData;
  /** Time from creation until the timeout path opens. Defaults to config.defaultTimelockMs. */
  readonly timelockDuration?: number;
}

export interface EscrowSettlement {
  readonly escrowId: string;
  readonly escrowAddress: Address;
  readonly side: EscrowSide;
  readonly outcome: EscrowOutcome;
  readonly payouts: Payout[];
  readonly timestamp: number;
}
