/**
 * Shared fixtures for ledger tests: two in-memory assets, a manual clock and
 * a single administrator.
 */

import { FungibleAsset, InMemoryAsset } from '../assets';
import { createAdminAuthorizer } from '../authorization';
import { ManualClock } from '../clock';
import { RewardLedger, RewardLedgerDeps } from '../rewardLedger';
import { LedgerState } from '../types';

export const ADMIN = 'admin';
export const LEDGER = 'ledger';

export interface LedgerFixture {
  clock: ManualClock;
  staking: InMemoryAsset;
  reward: InMemoryAsset;
  deps: RewardLedgerDeps;
  ledger: RewardLedger;
}

export function makeLedgerFixture(
  options: { rewardsDuration?: bigint; start?: bigint; initialState?: LedgerState } = {}
): LedgerFixture {
  const clock = new ManualClock(options.start ?? 0n);
  const staking = new InMemoryAsset('STK');
  const reward = new InMemoryAsset('RWD');
  const deps: RewardLedgerDeps = {
    stakingAsset: staking.connect(LEDGER),
    rewardAsset: reward.connect(LEDGER),
    authorizer: createAdminAuthorizer(ADMIN),
    clock,
    ledgerAccountId: LEDGER,
  };
  const ledger = new RewardLedger(deps, {
    rewardsDuration: options.rewardsDuration ?? 100n,
    initialState: options.initialState,
  });
  return { clock, staking, reward, deps, ledger };
}

/** Mint `amount` to `account`, approve the ledger, and stake it */
export function stakeFor(fx: LedgerFixture, account: string, amount: bigint): void {
  fx.staking.mint(account, amount);
  fx.staking.approve(account, LEDGER, fx.staking.allowance(account, LEDGER) + amount);
  fx.ledger.stake(account, amount);
}

/** Mint `amount` of the reward asset to the ledger and fund it */
export function fundWith(fx: LedgerFixture, amount: bigint): void {
  fx.reward.mint(LEDGER, amount);
  fx.ledger.fundRewards(ADMIN, amount);
}

/**
 * FungibleAsset wrapper whose movements can be switched to fail
 */
export class SwitchableAsset implements FungibleAsset {
  failing = false;

  constructor(private readonly inner: FungibleAsset) {}

  transfer(to: string, amount: bigint): boolean {
    return !this.failing && this.inner.transfer(to, amount);
  }

  transferFrom(from: string, to: string, amount: bigint): boolean {
    return !this.failing && this.inner.transferFrom(from, to, amount);
  }

  balanceOf(account: string): bigint {
    return this.inner.balanceOf(account);
  }
}
