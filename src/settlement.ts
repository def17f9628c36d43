/**
 * Reward Settlement
 *
 * The accumulator rewardPerTokenStored is the reward one unit of stake has
 * earned since the ledger started, scaled by PRECISION. An account's accrual
 * between two settlements is stake * (accumulator now - accumulator at last
 * settlement) / PRECISION, which is why the accumulator must be folded forward
 * (settleGlobal) before any stake, rate or window field changes, and each
 * touched account folded in (settleAccount) before its stake changes.
 *
 * Settlement functions write to the state they are given; callers pass a
 * draft they own (see cloneLedgerState).
 */

import { PRECISION, minBigInt, mulDiv } from './fixedPoint';
import { LedgerState, getAccountState } from './types';
import { LedgerError, LedgerErrorCodes } from './errors';

/**
 * min(now, finishAt): emission stops at the end of the window
 */
export function lastApplicableTime(state: LedgerState, now: bigint): bigint {
  return minBigInt(now, state.finishAt);
}

/**
 * Accumulator value as of `now`, without writing it
 *
 * With nothing staked the accumulator stays frozen and the emission for that
 * interval is not attributed to anyone.
 */
export function computeRewardPerToken(state: LedgerState, now: bigint): bigint {
  if (state.totalStaked === 0n) {
    return state.rewardPerTokenStored;
  }

  const elapsed = lastApplicableTime(state, now) - state.lastUpdateTime;
  if (elapsed <= 0n) {
    return state.rewardPerTokenStored;
  }

  return state.rewardPerTokenStored + mulDiv(state.rewardRate * elapsed, PRECISION, state.totalStaked);
}

/**
 * Owed rewards of `account` if it were settled against `rewardPerToken`
 */
export function computeEarned(state: LedgerState, account: string, rewardPerToken: bigint): bigint {
  const entry = getAccountState(state, account);
  return entry.rewardsOwed + mulDiv(entry.stake, rewardPerToken - entry.rewardPerTokenPaid, PRECISION);
}

/**
 * Fold elapsed emission into the accumulator and move lastUpdateTime forward.
 *
 * @throws LedgerError CLOCK_REGRESSION if `now` precedes lastUpdateTime
 */
export function settleGlobal(state: LedgerState, now: bigint): void {
  if (now < state.lastUpdateTime) {
    throw new LedgerError(
      LedgerErrorCodes.CLOCK_REGRESSION,
      `Clock went backwards: now ${now} < last update ${state.lastUpdateTime}`
    );
  }

  state.rewardPerTokenStored = computeRewardPerToken(state, now);
  state.lastUpdateTime = lastApplicableTime(state, now);
}

/**
 * Fold accumulator growth since the account's last settlement into its owed rewards.
 * Must follow settleGlobal.
 */
export function settleAccount(state: LedgerState, account: string): void {
  const entry = getAccountState(state, account);
  state.accounts.set(account, {
    ...entry,
    rewardsOwed: computeEarned(state, account, state.rewardPerTokenStored),
    rewardPerTokenPaid: state.rewardPerTokenStored,
  });
}

/**
 * settleGlobal, then settleAccount when an account is given
 */
export function settle(state: LedgerState, now: bigint, account?: string): void {
  settleGlobal(state, now);
  if (account !== undefined) {
    settleAccount(state, account);
  }
}
