import {
  Escrow,
  EscrowPhase,
  EscrowSettlement,
  FusionOrder,
  OrderSettlement,
  Payout
} from '@hashlock-swap/escrow-core';

export function serializePayouts(payouts: readonly Payout[]) {
  return payouts.map((payout) => ({
    recipient: payout.recipient,
    asset: payout.asset,
    value: payout.value.toString()
  }));
}

export function serializeEscrow(escrow: Escrow, phase: EscrowPhase) {
  return {
    id: escrow.id,
    escrowAddress: escrow.escrowAddress,
    side: escrow.side,
    phase,
    maker: escrow.maker,
    resolver: escrow.resolver,
    creator: escrow.creator,
    amount: escrow.amount.toString(),
    hashlock: escrow.hashlock,
    tokenBalance: { asset: escrow.tokenBalance.asset, value: escrow.tokenBalance.value.toString() },
    safetyDeposit: { asset: escrow.safetyDeposit.asset, value: escrow.safetyDeposit.value.toString() },
    finalitylock: escrow.finalitylock,
    timelock: escrow.timelock,
    expiry: escrow.expiry,
    nonce: escrow.nonce.toString(),
    createdAt: escrow.createdAt
  };
}

export function serializeOrder(order: FusionOrder) {
  return {
    id: order.id,
    orderAddress: order.orderAddress,
    maker: order.core.maker,
    resolver: order.resolver,
    value: order.core.value.toString(),
    expiry: order.core.expiry,
    deposit: { asset: order.core.deposit.asset, value: order.core.deposit.value.toString() },
    tradeParams: {
      targetAsset: order.tradeParams.targetAsset,
      minOutput: order.tradeParams.minOutput.toString(),
      routeData: order.tradeParams.routeData
    },
    version: order.version,
    nonce: order.nonce.toString(),
    createdAt: order.createdAt
  };
}

export function serializeEscrowSettlement(settlement: EscrowSettlement) {
  return { ...settlement, payouts: serializePayouts(settlement.payouts) };
}

export function serializeOrderSettlement(settlement: OrderSettlement) {
  return { ...settlement, payouts: serializePayouts(settlement.payouts) };
}

export function serializeBalances(balances: Record<string, bigint>): Record<string, string> {
  const view: Record<string, string> = {};
  for (const [asset, value] of Object.entries(balances)) {
    view[asset] = value.toString();
  }
  return view;
}
