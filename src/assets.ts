import { assertUnsigned } from './fixedPoint';

/**
 * Fungible asset as seen by one holder. transferFrom moves funds the holder
 * has been approved to spend. A false return means nothing moved.
 */
export interface FungibleAsset {
  transfer(to: string, amount: bigint): boolean;
  transferFrom(from: string, to: string, amount: bigint): boolean;
  balanceOf(account: string): bigint;
}

export interface TransferRecord {
  from: string;
  to: string;
  amount: bigint;
  spender: string;
}

export type TransferHook = (transfer: TransferRecord) => void;

/**
 * Process-local fungible asset with balances and allowances
 */
export class InMemoryAsset {
  readonly symbol: string;
  private balances = new Map<string, bigint>();
  private allowances = new Map<string, bigint>();
  private supply = 0n;

  /** Runs after every successful movement, inside the caller's transfer */
  onTransfer?: TransferHook;

  constructor(symbol: string) {
    this.symbol = symbol;
  }

  mint(to: string, amount: bigint): void {
    assertUnsigned(amount, 'Mint amount');
    this.balances.set(to, this.balanceOf(to) + amount);
    this.supply += amount;
  }

  approve(owner: string, spender: string, amount: bigint): void {
    assertUnsigned(amount, 'Allowance');
    this.allowances.set(allowanceKey(owner, spender), amount);
  }

  allowance(owner: string, spender: string): bigint {
    return this.allowances.get(allowanceKey(owner, spender)) ?? 0n;
  }

  balanceOf(account: string): bigint {
    return this.balances.get(account) ?? 0n;
  }

  totalSupply(): bigint {
    return this.supply;
  }

  /**
   * FungibleAsset view acting as `holder`
   */
  connect(holder: string): FungibleAsset {
    return {
      transfer: (to, amount) => this.move(holder, to, amount, holder),
      transferFrom: (from, to, amount) => {
        const allowed = this.allowance(from, holder);
        if (amount < 0n || amount > allowed || amount > this.balanceOf(from)) {
          return false;
        }
        // Spend the allowance before the hook can observe the transfer
        this.allowances.set(allowanceKey(from, holder), allowed - amount);
        return this.move(from, to, amount, holder);
      },
      balanceOf: account => this.balanceOf(account),
    };
  }

  private move(from: string, to: string, amount: bigint, spender: string): boolean {
    if (amount < 0n) {
      return false;
    }
    const fromBalance = this.balanceOf(from);
    if (amount > fromBalance) {
      return false;
    }
    this.balances.set(from, fromBalance - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
    this.onTransfer?.({ from, to, amount, spender });
    return true;
  }
}

function allowanceKey(owner: string, spender: string): string {
  return `${owner}\u0000${spender}`;
}
