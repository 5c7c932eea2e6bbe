import { AssetAmount } from '../types/order';
import { Coin } from './custody';

export interface EscrowHoldings {
  readonly token: Coin;
  readonly deposit: Coin;
}

export interface OrderHoldings {
  readonly deposit: Coin;
}

/** Frozen view of a coin's asset and value at this moment. */
export function snapshot(coin: Coin): AssetAmount {
  return Object.freeze({ asset: coin.asset, value: coin.value });
}

/**
 * Coins locked by live ledger objects, keyed by object id. Only the state
 * machines reach these; what callers get back are snapshots.
 */
export class CoinVault<H> {
  private holdings = new Map<string, H>();

  constructor(private readonly kind: string) {}

  lock(id: string, holding: H): void {
    if (this.holdings.has(id)) {
      throw new Error(`${this.kind} ${id} already holds funds`);
    }
    this.holdings.set(id, holding);
  }

  release(id: string): H {
    const holding = this.holdings.get(id);
    if (!holding) {
      throw new Error(`${this.kind} ${id} holds no funds`);
    }
    this.holdings.delete(id);
    return holding;
  }

  values(): H[] {
    return [...this.holdings.values()];
  }
}
