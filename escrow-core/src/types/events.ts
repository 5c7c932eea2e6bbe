import { Address, Payout } from './order';
import { EscrowSide } from './escrow';

interface LifecycleEvent {
  readonly id: string;
  readonly maker: Address;
  readonly resolver: Address;
  readonly amount: bigint;
  readonly timestamp: number;
}

export interface EscrowCreatedEvent extends LifecycleEvent {
  readonly escrowAddress: Address;
  readonly side: EscrowSide;
  readonly hashlock: string;
  readonly safetyDeposit: bigint;
  readonly timelock: number;
  readonly finalitylock: number;
}

export interface EscrowClaimedEvent extends LifecycleEvent {
  readonly escrowAddress: Address;
  readonly side: EscrowSide;
  /** The revealed preimage; the counterpart leg is completed with it. */
  readonly secret: string;
  readonly payouts: Payout[];
}

export interface EscrowTimedOutEvent extends LifecycleEvent {
  readonly escrowAddress: Address;
  readonly side: EscrowSide;
  readonly caller: Address;
  readonly payouts: Payout[];
}

export interface OrderCreatedEvent extends LifecycleEvent {
  readonly orderAddress: Address;
  readonly targetAsset: string;
  readonly minOutput: bigint;
  readonly expiry: number;
}

export interface OrderFilledEvent extends LifecycleEvent {
  readonly orderAddress: Address;
  readonly filledBy: Address;
  readonly proceeds: bigint;
  readonly payouts: Payout[];
}

export interface OrderCancelledEvent extends LifecycleEvent {
  readonly orderAddress: Address;
  readonly payouts: Payout[];
}

export interface EscrowEventMap {
  escrowCreated: EscrowCreatedEvent;
  escrowClaimed: EscrowClaimedEvent;
  escrowRefunded: EscrowTimedOutEvent;
  escrowSlashed: EscrowTimedOutEvent;
  orderCreated: OrderCreatedEvent;
  orderFilled: OrderFilledEvent;
  orderCancelled: OrderCancelledEvent;
}

export type EscrowEventName = keyof EscrowEventMap;

export const ESCROW_EVENT_NAMES: readonly EscrowEventName[] = [
  'escrowCreated',
  'escrowClaimed',
  'escrowRefunded',
  'escrowSlashed',
  'orderCreated',
  'orderFilled',
  'orderCancelled'
];
