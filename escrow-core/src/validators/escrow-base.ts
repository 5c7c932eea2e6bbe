import { EscrowConfig } from '../config';
import { EscrowError, EscrowErrorCode } from '../errors';
import { logger } from '../logger';
import { Coin, AssetLedger } from '../runtime/custody';
import { EscrowEventBus } from '../runtime/event-bus';
import { newObjectId, ObjectStore } from '../runtime/object-store';
import { CoinVault, EscrowHoldings, snapshot } from '../runtime/vault';
import {
  CreateEscrowParams,
  Escrow,
  EscrowOutcome,
  EscrowPhase,
  EscrowSettlement,
  EscrowSide
} from '../types/escrow';
import { Address, AssetAmount, CallContext, Payout, Secret } from '../types/order';
import { toAddress } from '../utils/address';
import { deriveEscrowAddress } from '../utils/escrow-id';
import { isHashlock, secretMatches, secretToHex } from '../utils/hashlock';

export interface EscrowRuntime {
  readonly config: Readonly<EscrowConfig>;
  readonly custody: AssetLedger;
  readonly escrows: ObjectStore<Escrow>;
  readonly vault: CoinVault<EscrowHoldings>;
  readonly events: EscrowEventBus;
}

export interface PayoutRecipients {
  readonly token: Address;
  readonly deposit: Address;
}

export function escrowPhase(escrow: Escrow, now: number): EscrowPhase {
  if (now < escrow.finalitylock) {
    return 'finality';
  }
  return now < escrow.timelock ? 'claimable' : 'expired';
}

/**
 * Lifecycle shared by both legs of a swap:
 *
 *   Active --claim(secret, finalitylock <= now < timelock)--> Claimed
 *   Active --timeout(now >= timelock)-----------------------> Refunded / Slashed
 *
 * Each leg decides who may claim and where the two balances go.
 */
export abstract class EscrowStateMachine {
  protected abstract readonly side: EscrowSide;
  protected abstract readonly timeoutOutcome: Exclude<EscrowOutcome, 'claimed'>;
  protected abstract readonly notClaimantCode: EscrowErrorCode;

  constructor(protected readonly runtime: EscrowRuntime) {}

  /** The only party allowed to present the secret. */
  protected abstract claimant(escrow: Escrow): Address;

  protected abstract claimRecipients(escrow: Escrow, caller: Address): PayoutRecipients;

  protected abstract timeoutRecipients(escrow: Escrow, caller: Address): PayoutRecipients;

  /**
   * Every creation precondition, checked against quoted deposits so callers
   * can validate before they move any funds.
   */
  assertCreatable(
    params: CreateEscrowParams,
    tokenDeposit: AssetAmount,
    nativeDeposit: AssetAmount,
    now: number
  ): void {
    const { order } = params;
    const { config } = this.runtime;

    toAddress(order.maker);
    toAddress(order.resolver);

    if (!isHashlock(order.hashlock)) {
      throw new EscrowError('INVALID_HASHLOCK', `Hashlock must be 32 bytes of hex: ${order.hashlock}`);
    }

    if (order.value <= 0n) {
      throw new EscrowError('INVALID_AMOUNT', `Escrow value must be positive: ${order.value}`);
    }

    if (order.nonce < 0n) {
      throw new EscrowError('INVALID_AMOUNT', `Nonce must not be negative: ${order.nonce}`);
    }

    if (nativeDeposit.asset !== config.nativeAsset) {
      throw new EscrowError(
        'ASSET_MISMATCH',
        `Safety deposit must be paid in ${config.nativeAsset}, got ${nativeDeposit.asset}`
      );
    }

    if (nativeDeposit.value < config.minSafetyDeposit) {
      throw new EscrowError(
        'INSUFFICIENT_DEPOSIT',
        `Safety deposit ${nativeDeposit.value} is below the minimum ${config.minSafetyDeposit}`
      );
    }

    if (tokenDeposit.value < order.value) {
      throw new EscrowError(
        'INSUFFICIENT_DEPOSIT',
        `Token deposit ${tokenDeposit.value} does not cover the escrow value ${order.value}`
      );
    }

    if (now >= order.expiry) {
      throw new EscrowError('ORDER_EXPIRED', `Order expired at ${order.expiry}, now ${now}`);
    }

    const duration = params.timelockDuration ?? config.defaultTimelockMs;
    if (!Number.isInteger(duration) || duration <= config.finalityPeriodMs) {
      throw new EscrowError(
        'INVALID_TIMELOCK',
        `Timelock duration ${duration} must be an integer longer than the finality period ${config.finalityPeriodMs}`
      );
    }

    const escrowAddress = deriveEscrowAddress(order, this.side);
    if (this.runtime.escrows.values().some((escrow) => escrow.escrowAddress === escrowAddress)) {
      throw new EscrowError(
        'DUPLICATE_ESCROW',
        `A live ${this.side} escrow already exists at ${escrowAddress}; use a fresh nonce`
      );
    }
  }

  /** Move both deposits into a new escrow. The coins passed in are left empty. */
  create(
    ctx: CallContext,
    params: CreateEscrowParams,
    tokenDeposit: Coin,
    nativeDeposit: Coin,
    now: number
  ): Escrow {
    this.assertCreatable(params, tokenDeposit, nativeDeposit, now);

    const { order } = params;
    const { config } = this.runtime;
    const duration = params.timelockDuration ?? config.defaultTimelockMs;
    const holdings: EscrowHoldings = {
      token: tokenDeposit.withdrawAll(),
      deposit: nativeDeposit.withdrawAll()
    };

    const escrow: Escrow = Object.freeze({
      id: newObjectId(),
      escrowAddress: deriveEscrowAddress(order, this.side),
      side: this.side,
      maker: toAddress(order.maker),
      resolver: toAddress(order.resolver),
      creator: toAddress(ctx.sender),
      amount: order.value,
      hashlock: order.hashlock.toLowerCase(),
      timelock: now + duration,
      finalitylock: now + config.finalityPeriodMs,
      tokenBalance: snapshot(holdings.token),
      safetyDeposit: snapshot(holdings.deposit),
      isClaimed: false,
      isRefunded: false,
      expiry: order.expiry,
      nonce: order.nonce,
      createdAt: now
    });

    this.runtime.escrows.insert(escrow);
    this.runtime.vault.lock(escrow.id, holdings);

    logger.info(`🏗️ ${this.side} escrow ${escrow.id} created at ${escrow.escrowAddress}`);

    this.runtime.events.publish('escrowCreated', {
      id: escrow.id,
      escrowAddress: escrow.escrowAddress,
      side: escrow.side,
      maker: escrow.maker,
      resolver: escrow.resolver,
      amount: escrow.amount,
      hashlock: escrow.hashlock,
      safetyDeposit: escrow.safetyDeposit.value,
      timelock: escrow.timelock,
      finalitylock: escrow.finalitylock,
      timestamp: now
    });

    return escrow;
  }

  find(escrowId: string): Escrow | undefined {
    const escrow = this.runtime.escrows.find(escrowId);
    return escrow?.side === this.side ? escrow : undefined;
  }

  borrow(escrowId: string): Escrow {
    const escrow = this.runtime.escrows.borrow(escrowId);
    if (escrow.side !== this.side) {
      throw new EscrowError('WRONG_ESCROW_SIDE', `Escrow ${escrowId} is a ${escrow.side} escrow, not ${this.side}`);
    }
    return escrow;
  }

  /** Release the escrow to its claim recipients in exchange for the secret. */
  claim(ctx: CallContext, escrowId: string, secret: Secret, now: number): EscrowSettlement {
    const escrow = this.borrow(escrowId);
    const caller = toAddress(ctx.sender);

    if (caller !== this.claimant(escrow)) {
      throw new EscrowError(this.notClaimantCode, `${caller} may not claim ${this.side} escrow ${escrow.id}`);
    }

    if (escrow.isClaimed || escrow.isRefunded) {
      throw new EscrowError('ALREADY_RESOLVED', `Escrow ${escrow.id} is already resolved`);
    }

    if (!secretMatches(secret, escrow.hashlock)) {
      throw new EscrowError('INVALID_SECRET', `Secret does not match the hashlock of escrow ${escrow.id}`);
    }

    if (now >= escrow.timelock) {
      throw new EscrowError(
        'TIMELOCKED',
        `Claim window of escrow ${escrow.id} closed at ${escrow.timelock}; use the timeout path`
      );
    }

    if (now < escrow.finalitylock) {
      throw new EscrowError(
        'FINALITY_LOCK_ACTIVE',
        `Escrow ${escrow.id} cannot be claimed before ${escrow.finalitylock}`
      );
    }

    const settled = this.runtime.escrows.take(escrow.id);
    const payouts = this.disburse(settled, this.claimRecipients(settled, caller));

    logger.info(`🔓 ${this.side} escrow ${settled.id} claimed by ${caller}`);

    this.runtime.events.publish('escrowClaimed', {
      id: settled.id,
      escrowAddress: settled.escrowAddress,
      side: settled.side,
      maker: settled.maker,
      resolver: settled.resolver,
      amount: settled.amount,
      secret: secretToHex(secret),
      payouts,
      timestamp: now
    });

    return this.settlement(settled, 'claimed', payouts, now);
  }

  /** Unilateral timeout path. No secret; anyone may trigger it once the timelock has passed. */
  protected expire(ctx: CallContext, escrowId: string, now: number): EscrowSettlement {
    const escrow = this.borrow(escrowId);
    const caller = toAddress(ctx.sender);

    if (now < escrow.timelock) {
      throw new EscrowError(
        'TIMELOCK_NOT_EXPIRED',
        `Escrow ${escrow.id} is timelocked until ${escrow.timelock}, now ${now}`
      );
    }

    if (escrow.isClaimed) {
      throw new EscrowError('ALREADY_CLAIMED', `Escrow ${escrow.id} was already claimed`);
    }

    const settled = this.runtime.escrows.take(escrow.id);
    const payouts = this.disburse(settled, this.timeoutRecipients(settled, caller));

    logger.info(`⏰ ${this.side} escrow ${settled.id} ${this.timeoutOutcome} by ${caller}`);

    this.runtime.events.publish(this.timeoutOutcome === 'refunded' ? 'escrowRefunded' : 'escrowSlashed', {
      id: settled.id,
      escrowAddress: settled.escrowAddress,
      side: settled.side,
      maker: settled.maker,
      resolver: settled.resolver,
      amount: settled.amount,
      caller,
      payouts,
      timestamp: now
    });

    return this.settlement(settled, this.timeoutOutcome, payouts, now);
  }

  private disburse(escrow: Escrow, recipients: PayoutRecipients): Payout[] {
    const { custody, vault } = this.runtime;
    const { token, deposit } = vault.release(escrow.id);
    const payouts: Payout[] = [
      { recipient: recipients.token, asset: token.asset, value: token.value },
      { recipient: recipients.deposit, asset: deposit.asset, value: deposit.value }
    ];

    custody.deposit(recipients.token, token);
    custody.deposit(recipients.deposit, deposit);

    return payouts;
  }

  private settlement(
    escrow: Escrow,
    outcome: EscrowOutcome,
    payouts: Payout[],
    now: number
  ): EscrowSettlement {
    return {
      escrowId: escrow.id,
      escrowAddress: escrow.escrowAddress,
      side: escrow.side,
      outcome,
      payouts,
      timestamp: now
    };
  }
}
