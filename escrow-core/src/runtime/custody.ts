import { EscrowError } from '../errors';
import { Address } from '../types/order';
import { toAddress } from '../utils/address';

/**
 * An owned quantity of one asset. Splitting or joining moves value between
 * coins; value is never created or destroyed outside AssetLedger.mint.
 */
export class Coin {
  private amount: bigint;

  constructor(readonly asset: string, value: bigint) {
    if (value < 0n) {
      throw new EscrowError('INVALID_AMOUNT', `Coin value must not be negative: ${value}`);
    }
    this.amount = value;
  }

  get value(): bigint {
    return this.amount;
  }

  split(value: bigint): Coin {
    if (value < 0n) {
      throw new EscrowError('INVALID_AMOUNT', `Cannot split a negative amount: ${value}`);
    }
    if (value > this.amount) {
      throw new EscrowError('INSUFFICIENT_BALANCE', `Cannot split ${value} from a coin of ${this.amount} ${this.asset}`);
    }
    this.amount -= value;
    return new Coin(this.asset, value);
  }

  /** Move the whole value into a fresh coin, leaving this one empty. */
  withdrawAll(): Coin {
    return this.split(this.amount);
  }

  join(other: Coin): void {
    if (other.asset !== this.asset) {
      throw new EscrowError('ASSET_MISMATCH', `Cannot join ${other.asset} into ${this.asset}`);
    }
    this.amount += other.withdrawAll().amount;
  }
}

export interface WithdrawalRequest {
  readonly asset: string;
  readonly amount: bigint;
}

/**
 * Account balances of the host ledger. Every operation validates fully before
 * it mutates, so a failed call leaves all balances as they were.
 */
export class AssetLedger {
  private accounts = new Map<Address, Map<string, bigint>>();

  balanceOf(owner: string, asset: string): bigint {
    return this.accounts.get(toAddress(owner))?.get(asset) ?? 0n;
  }

  balancesOf(owner: string): Record<string, bigint> {
    const balances: Record<string, bigint> = {};
    for (const [asset, value] of this.accounts.get(toAddress(owner)) ?? []) {
      if (value > 0n) {
        balances[asset] = value;
      }
    }
    return balances;
  }

  totalSupply(asset: string): bigint {
    let total = 0n;
    for (const balances of this.accounts.values()) {
      total += balances.get(asset) ?? 0n;
    }
    return total;
  }

  mint(owner: string, asset: string, amount: bigint): void {
    if (amount <= 0n) {
      throw new EscrowError('INVALID_AMOUNT', `Mint amount must be positive: ${amount}`);
    }
    this.deposit(owner, new Coin(asset, amount));
  }

  withdraw(owner: string, asset: string, amount: bigint): Coin {
    const [coin] = this.withdrawMany(owner, [{ asset, amount }]);
    return coin;
  }

  /**
   * Withdraw several coins in one step. Requests for the same asset are
   * checked against the balance together.
   */
  withdrawMany(owner: string, requests: readonly WithdrawalRequest[]): Coin[] {
    const account = toAddress(owner);
    const needed = new Map<string, bigint>();

    for (const { asset, amount } of requests) {
      if (amount < 0n) {
        throw new EscrowError('INVALID_AMOUNT', `Withdrawal amount must not be negative: ${amount}`);
      }
      needed.set(asset, (needed.get(asset) ?? 0n) + amount);
    }

    for (const [asset, amount] of needed) {
      const available = this.balanceOf(account, asset);
      if (available < amount) {
        throw new EscrowError(
          'INSUFFICIENT_BALANCE',
          `Account ${account} holds ${available} ${asset}, needs ${amount}`
        );
      }
    }

    const balances = this.accountBalances(account);
    return requests.map(({ asset, amount }) => {
      balances.set(asset, (balances.get(asset) ?? 0n) - amount);
      return new Coin(asset, amount);
    });
  }

  /** Credit the full value of a coin to an account, emptying the coin. */
  deposit(owner: string, coin: Coin): void {
    const balances = this.accountBalances(toAddress(owner));
    const value = coin.withdrawAll().value;
    balances.set(coin.asset, (balances.get(coin.asset) ?? 0n) + value);
  }

  private accountBalances(account: Address): Map<string, bigint> {
    let balances = this.accounts.get(account);
    if (!balances) {
      balances = new Map();
      this.accounts.set(account, balances);
    }
    return balances;
  }
}
