import { AbiCoder, isHexString, keccak256 } from 'ethers';
import { EscrowConfig } from '../config';
import { EscrowError } from '../errors';
import { logger } from '../logger';
import { AssetLedger, Coin } from '../runtime/custody';
import { EscrowEventBus } from '../runtime/event-bus';
import { newObjectId, ObjectStore } from '../runtime/object-store';
import { CoinVault, OrderHoldings, snapshot } from '../runtime/vault';
import {
  CreateOrderParams,
  FUSION_ORDER_VERSION,
  FusionOrder,
  OrderSettlement,
  TradeParams
} from '../types/fusion-order';
import { Address, AssetAmount, CallContext, Payout } from '../types/order';
import { toAddress } from '../utils/address';
import { deriveEscrowAddress } from '../utils/escrow-id';

export interface FusionRuntime {
  readonly config: Readonly<EscrowConfig>;
  readonly custody: AssetLedger;
  readonly orders: ObjectStore<FusionOrder>;
  readonly vault: CoinVault<OrderHoldings>;
  readonly events: EscrowEventBus;
}

/** Commitment to the trade parameters, bound into the order address. */
export function tradeParamsDigest(params: TradeParams): string {
  return keccak256(
    AbiCoder.defaultAbiCoder().encode(
      ['string', 'uint256', 'bytes'],
      [params.targetAsset, params.minOutput, params.routeData]
    )
  );
}

/**
 * Publicly discoverable order: the maker posts a deposit and the terms of a
 * swap; a resolver that delivers at least minOutput of the target asset
 * before expiry receives the deposit.
 *
 *   Open --resolve(now < expiry, proceeds >= minOutput)--> Filled
 *   Open --cancel(maker, now >= expiry)-------------------> Cancelled
 */
export class FusionOrderResolver {
  private nonces = new Map<Address, bigint>();

  constructor(private readonly runtime: FusionRuntime) {}

  assertCreatable(ctx: CallContext, params: CreateOrderParams, deposit: AssetAmount, now: number): void {
    const { config } = this.runtime;

    toAddress(ctx.sender);
    toAddress(params.resolver);

    if (deposit.asset !== config.nativeAsset) {
      throw new EscrowError('ASSET_MISMATCH', `Order deposit must be paid in ${config.nativeAsset}, got ${deposit.asset}`);
    }

    if (deposit.value < config.minOrderDeposit) {
      throw new EscrowError(
        'INSUFFICIENT_DEPOSIT',
        `Order deposit ${deposit.value} is below the minimum ${config.minOrderDeposit}`
      );
    }

    if (!params.targetAsset) {
      throw new EscrowError('ASSET_MISMATCH', 'Order must name a target asset');
    }

    if (params.minOutput < 0n) {
      throw new EscrowError('INVALID_AMOUNT', `Minimum output must not be negative: ${params.minOutput}`);
    }

    if (!isHexString(params.routeData, true)) {
      throw new EscrowError('INVALID_ROUTE_DATA', 'Route data must be 0x-prefixed hex bytes');
    }

    if (now >= params.expiry) {
      throw new EscrowError('ORDER_EXPIRED', `Order expiry ${params.expiry} is not in the future (now ${now})`);
    }
  }

  create(ctx: CallContext, params: CreateOrderParams, deposit: Coin, now: number): FusionOrder {
    this.assertCreatable(ctx, params, deposit, now);

    const maker = toAddress(ctx.sender);
    const resolver = toAddress(params.resolver);
    const nonce = this.nonces.get(maker) ?? 0n;
    const tradeParams: TradeParams = Object.freeze({
      targetAsset: params.targetAsset,
      minOutput: params.minOutput,
      routeData: params.routeData.toLowerCase()
    });
    const holdings: OrderHoldings = { deposit: deposit.withdrawAll() };
    const value = holdings.deposit.value;

    const order: FusionOrder = Object.freeze({
      id: newObjectId(),
      orderAddress: deriveEscrowAddress(
        { maker, resolver, value, expiry: params.expiry, hashlock: tradeParamsDigest(tradeParams), nonce },
        'fusion'
      ),
      core: Object.freeze({ value, expiry: params.expiry, maker, deposit: snapshot(holdings.deposit) }),
      resolver,
      tradeParams,
      version: FUSION_ORDER_VERSION,
      nonce,
      createdAt: now
    });

    this.runtime.orders.insert(order);
    this.runtime.vault.lock(order.id, holdings);
    this.nonces.set(maker, nonce + 1n);

    logger.info(`📝 Fusion order ${order.id} created by ${maker} for ${resolver}`);

    this.runtime.events.publish('orderCreated', {
      id: order.id,
      orderAddress: order.orderAddress,
      maker,
      resolver,
      amount: value,
      targetAsset: tradeParams.targetAsset,
      minOutput: tradeParams.minOutput,
      expiry: params.expiry,
      timestamp: now
    });

    return order;
  }

  /** Next nonce a maker's order will be created with. */
  nextNonce(maker: string): bigint {
    return this.nonces.get(toAddress(maker)) ?? 0n;
  }

  assertResolvable(ctx: CallContext, orderId: string, proceeds: AssetAmount, now: number): FusionOrder {
    const order = this.runtime.orders.borrow(orderId);
    const caller = toAddress(ctx.sender);

    if (now >= order.core.expiry) {
      throw new EscrowError('ORDER_EXPIRED', `Order ${order.id} expired at ${order.core.expiry}`);
    }

    if (this.runtime.config.fusionResolverPolicy === 'designated' && caller !== order.resolver) {
      throw new EscrowError('INVALID_RESOLVER', `${caller} is not the resolver of order ${order.id}`);
    }

    if (proceeds.asset !== order.tradeParams.targetAsset) {
      throw new EscrowError(
        'ASSET_MISMATCH',
        `Order ${order.id} wants ${order.tradeParams.targetAsset}, got ${proceeds.asset}`
      );
    }

    if (proceeds.value < order.tradeParams.minOutput) {
      throw new EscrowError(
        'INSUFFICIENT_OUTPUT',
        `Proceeds ${proceeds.value} are below the minimum output ${order.tradeParams.minOutput}`
      );
    }

    return order;
  }

  /** Pay the swapped proceeds to the maker and the deposit to the filler. */
  resolve(ctx: CallContext, orderId: string, proceeds: Coin, now: number): OrderSettlement {
    this.assertResolvable(ctx, orderId, proceeds, now);

    const caller = toAddress(ctx.sender);
    const order = this.runtime.orders.take(orderId);
    const { deposit } = this.runtime.vault.release(order.id);
    const proceedsValue = proceeds.value;
    const payouts = this.disburse([
      [order.core.maker, proceeds],
      [caller, deposit]
    ]);

    logger.info(`✅ Fusion order ${order.id} filled by ${caller}`);

    this.runtime.events.publish('orderFilled', {
      id: order.id,
      orderAddress: order.orderAddress,
      maker: order.core.maker,
      resolver: order.resolver,
      amount: order.core.value,
      filledBy: caller,
      proceeds: proceedsValue,
      payouts,
      timestamp: now
    });

    return { orderId: order.id, orderAddress: order.orderAddress, outcome: 'filled', payouts, timestamp: now };
  }

  cancel(ctx: CallContext, orderId: string, now: number): OrderSettlement {
    const order = this.runtime.orders.borrow(orderId);
    const caller = toAddress(ctx.sender);

    if (caller !== order.core.maker) {
      throw new EscrowError('NOT_MAKER', `${caller} is not the maker of order ${order.id}`);
    }

    if (now < order.core.expiry) {
      throw new EscrowError('ORDER_NOT_EXPIRED', `Order ${order.id} is open until ${order.core.expiry}`);
    }

    const cancelled = this.runtime.orders.take(order.id);
    const { deposit } = this.runtime.vault.release(cancelled.id);
    const payouts = this.disburse([[cancelled.core.maker, deposit]]);

    logger.info(`🚫 Fusion order ${cancelled.id} cancelled by its maker`);

    this.runtime.events.publish('orderCancelled', {
      id: cancelled.id,
      orderAddress: cancelled.orderAddress,
      maker: cancelled.core.maker,
      resolver: cancelled.resolver,
      amount: cancelled.core.value,
      payouts,
      timestamp: now
    });

    return {
      orderId: cancelled.id,
      orderAddress: cancelled.orderAddress,
      outcome: 'cancelled',
      payouts,
      timestamp: now
    };
  }

  private disburse(transfers: Array<[Address, Coin]>): Payout[] {
    return transfers.map(([recipient, coin]) => {
      const payout: Payout = { recipient, asset: coin.asset, value: coin.value };
      this.runtime.custody.deposit(recipient, coin);
      return payout;
    });
  }
}
