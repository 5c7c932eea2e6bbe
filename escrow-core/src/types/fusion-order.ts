import { Address, OrderRecord, Payout } from './order';

export const FUSION_ORDER_VERSION = 1;

export interface TradeParams {
  /** Asset the maker wants to receive. */
  readonly targetAsset: string;
  /** Smallest acceptable amount of targetAsset. */
  readonly minOutput: bigint;
  /** Opaque routing payload for the execution venue (hex bytes). */
  readonly routeData: string;
}

export interface FusionOrder {
  readonly id: string;
  readonly orderAddress: Address;
  readonly core: OrderRecord;
  readonly resolver: Address;
  readonly tradeParams: TradeParams;
  readonly version: number;
  readonly nonce: bigint;
  readonly createdAt: number;
}

export interface CreateOrderParams extends TradeParams {
  readonly resolver: Address;
  readonly expiry: number;
}

export type OrderOutcome = 'filled' | 'cancelled';

export interface OrderSettlement {
  readonly orderId: string;
  readonly orderAddress: Address;
  readonly outcome: OrderOutcome;
  readonly payouts: Payout[];
  readonly timestamp: number;
}
