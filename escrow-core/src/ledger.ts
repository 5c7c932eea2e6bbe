import { EscrowConfig, resolveEscrowConfig } from './config';
import { EscrowError } from './errors';
import { AssetLedger } from './runtime/custody';
import { SystemClock, TrustedClock } from './runtime/clock';
import { EscrowEventBus } from './runtime/event-bus';
import { ObjectStore } from './runtime/object-store';
import { CoinVault, EscrowHoldings, OrderHoldings } from './runtime/vault';
import { CreateEscrowParams, Escrow, EscrowPhase, EscrowSettlement } from './types/escrow';
import { CreateOrderParams, FusionOrder, OrderSettlement } from './types/fusion-order';
import { CallContext, Secret } from './types/order';
import { toAddress } from './utils/address';
import { EscrowStateMachine, escrowPhase } from './validators/escrow-base';
import { DestinationEscrow } from './validators/escrow-dst';
import { SourceEscrow } from './validators/escrow-src';
import { FusionOrderResolver } from './validators/fusion-order';

export interface EscrowLedgerOptions {
  config?: Partial<EscrowConfig>;
  clock?: TrustedClock;
  events?: EscrowEventBus;
}

export interface CreateEscrowRequest extends CreateEscrowParams {
  /** Asset locked for the counterparty. */
  readonly tokenAsset: string;
  /** Token amount to lock; defaults to order.value. */
  readonly tokenAmount?: bigint;
  /** Native safety deposit. */
  readonly safetyDeposit: bigint;
}

export interface CreateOrderRequest extends CreateOrderParams {
  /** Native deposit paid to whoever fills the order. */
  readonly deposit: bigint;
}

/**
 * In-process host for the escrow protocol. Each entry operation reads the
 * clock once, validates, withdraws the caller's funds and runs one transition
 * to completion.
 */
export class EscrowLedger {
  readonly config: Readonly<EscrowConfig>;
  readonly clock: TrustedClock;
  readonly events: EscrowEventBus;
  readonly custody = new AssetLedger();

  readonly source: SourceEscrow;
  readonly destination: DestinationEscrow;
  readonly fusion: FusionOrderResolver;

  private readonly escrows = new ObjectStore<Escrow>('Escrow');
  private readonly orders = new ObjectStore<FusionOrder>('Fusion order');
  private readonly escrowVault = new CoinVault<EscrowHoldings>('Escrow');
  private readonly orderVault = new CoinVault<OrderHoldings>('Fusion order');

  constructor(options: EscrowLedgerOptions = {}) {
    this.config = resolveEscrowConfig(options.config);
    this.clock = options.clock ?? new SystemClock();
    this.events = options.events ?? new EscrowEventBus();

    const shared = { config: this.config, custody: this.custody, events: this.events };
    const escrowRuntime = { ...shared, escrows: this.escrows, vault: this.escrowVault };

    this.source = new SourceEscrow(escrowRuntime);
    this.destination = new DestinationEscrow(escrowRuntime);
    this.fusion = new FusionOrderResolver({ ...shared, orders: this.orders, vault: this.orderVault });
  }

  mint(owner: string, asset: string, amount: bigint): void {
    this.custody.mint(owner, asset, amount);
  }

  balanceOf(owner: string, asset: string): bigint {
    return this.custody.balanceOf(owner, asset);
  }

  balancesOf(owner: string): Record<string, bigint> {
    return this.custody.balancesOf(owner);
  }

  createSourceEscrow(ctx: CallContext, request: CreateEscrowRequest): Escrow {
    return this.openEscrow(this.source, ctx, request);
  }

  createDestinationEscrow(ctx: CallContext, request: CreateEscrowRequest): Escrow {
    return this.openEscrow(this.destination, ctx, request);
  }

  claim(ctx: CallContext, escrowId: string, secret: Secret): EscrowSettlement {
    const now = this.clock.now();
    const escrow = this.escrows.borrow(escrowId);
    const machine = escrow.side === 'source' ? this.source : this.destination;
    return machine.claim(ctx, escrowId, secret, now);
  }

  refund(ctx: CallContext, escrowId: string): EscrowSettlement {
    return this.source.refund(ctx, escrowId, this.clock.now());
  }

  slash(ctx: CallContext, escrowId: string): EscrowSettlement {
    return this.destination.slash(ctx, escrowId, this.clock.now());
  }

  /** Timeout path for either side: refund on source, slash on destination. */
  expire(ctx: CallContext, escrowId: string): EscrowSettlement {
    const escrow = this.escrows.borrow(escrowId);
    return escrow.side === 'source' ? this.refund(ctx, escrowId) : this.slash(ctx, escrowId);
  }

  createOrder(ctx: CallContext, request: CreateOrderRequest): FusionOrder {
    const now = this.clock.now();
    const { deposit, ...params } = request;

    this.fusion.assertCreatable(ctx, params, { asset: this.config.nativeAsset, value: deposit }, now);
    const coin = this.custody.withdraw(ctx.sender, this.config.nativeAsset, deposit);
    return this.fusion.create(ctx, params, coin, now);
  }

  resolveOrder(ctx: CallContext, orderId: string, proceeds: bigint): OrderSettlement {
    const now = this.clock.now();
    const order = this.orders.borrow(orderId);
    const asset = order.tradeParams.targetAsset;

    this.fusion.assertResolvable(ctx, orderId, { asset, value: proceeds }, now);
    const coin = this.custody.withdraw(ctx.sender, asset, proceeds);
    return this.fusion.resolve(ctx, orderId, coin, now);
  }

  cancelOrder(ctx: CallContext, orderId: string): OrderSettlement {
    return this.fusion.cancel(ctx, orderId, this.clock.now());
  }

  getEscrow(escrowId: string): Escrow {
    return this.escrows.borrow(escrowId);
  }

  findEscrow(escrowId: string): Escrow | undefined {
    return this.escrows.find(escrowId);
  }

  findEscrowByAddress(escrowAddress: string): Escrow | undefined {
    const address = toAddress(escrowAddress);
    return this.escrows.values().find((escrow) => escrow.escrowAddress === address);
  }

  listEscrows(): Escrow[] {
    return this.escrows.values();
  }

  getOrder(orderId: string): FusionOrder {
    return this.orders.borrow(orderId);
  }

  findOrder(orderId: string): FusionOrder | undefined {
    return this.orders.find(orderId);
  }

  listOrders(): FusionOrder[] {
    return this.orders.values();
  }

  escrowPhase(escrow: Escrow, now: number = this.clock.now()): EscrowPhase {
    return escrowPhase(escrow, now);
  }

  /** Value of one asset currently held by live escrows and orders. */
  totalLocked(asset: string): bigint {
    const coins = [
      ...this.escrowVault.values().flatMap(({ token, deposit }) => [token, deposit]),
      ...this.orderVault.values().map(({ deposit }) => deposit)
    ];
    let total = 0n;
    for (const coin of coins) {
      if (coin.asset === asset) {
        total += coin.value;
      }
    }
    return total;
  }

  private openEscrow(machine: EscrowStateMachine, ctx: CallContext, request: CreateEscrowRequest): Escrow {
    const now = this.clock.now();
    const tokenAmount = request.tokenAmount ?? request.order.value;
    const nativeAsset = this.config.nativeAsset;

    if (request.safetyDeposit < 0n || tokenAmount < 0n) {
      throw new EscrowError('INVALID_AMOUNT', 'Deposit amounts must not be negative');
    }

    machine.assertCreatable(
      request,
      { asset: request.tokenAsset, value: tokenAmount },
      { asset: nativeAsset, value: request.safetyDeposit },
      now
    );

    const [token, native] = this.custody.withdrawMany(ctx.sender, [
      { asset: request.tokenAsset, amount: tokenAmount },
      { asset: nativeAsset, amount: request.safetyDeposit }
    ]);

    return machine.create(ctx, request, token, native, now);
  }
}
