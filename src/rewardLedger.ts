import { FungibleAsset } from './assets';
import { Authorizer } from './authorization';
import { Clock } from './clock';
import { LedgerError, LedgerErrorCodes, isLedgerError } from './errors';
import {
  computeEarned,
  computeRewardPerToken,
  lastApplicableTime,
  settle,
} from './settlement';
import {
  AccountState,
  ExitResult,
  LedgerState,
  cloneLedgerState,
  createEmptyLedgerState,
  getAccountState,
} from './types';

export interface RewardLedgerDeps {
  /** Both assets act as ledgerAccountId */
  stakingAsset: FungibleAsset;
  rewardAsset: FungibleAsset;
  authorizer: Authorizer;
  clock: Clock;
  ledgerAccountId: string;
}

export interface RewardLedgerOptions {
  rewardsDuration?: bigint; // Ignored when initialState is given
  initialState?: LedgerState;
}

/**
 * Time-weighted staking reward ledger.
 *
 * Stakers earn a share of linearly emitted rewards proportional to stake and
 * time staked. Every mutator settles first, validates, commits the new state,
 * and only then moves assets; if an asset movement fails the committed state is
 * rolled back to what it was before the call. Mutators called from inside an
 * asset movement are rejected with REENTRANT_CALL; queries are not.
 */
export class RewardLedger {
  private state: LedgerState;
  private readonly stakingAsset: FungibleAsset;
  private readonly rewardAsset: FungibleAsset;
  private readonly authorizer: Authorizer;
  private readonly clock: Clock;
  private interacting = false;
  readonly ledgerAccountId: string;

  constructor(deps: RewardLedgerDeps, options: RewardLedgerOptions = {}) {
    this.stakingAsset = deps.stakingAsset;
    this.rewardAsset = deps.rewardAsset;
    this.authorizer = deps.authorizer;
    this.clock = deps.clock;
    this.ledgerAccountId = deps.ledgerAccountId;
    this.state = options.initialState
      ? cloneLedgerState(options.initialState)
      : createEmptyLedgerState(options.rewardsDuration ?? 0n);
  }

  // ── Mutators ─────────────────────────────────────────────────────

  /**
   * Deposit `amount` of the staked asset. `account` must have approved the ledger.
   */
  stake(account: string, amount: bigint): void {
    this.requireIdle('stake');
    requirePositive(amount, 'Stake');

    const next = this.settledDraft(account);
    const entry = getAccountState(next, account);
    next.accounts.set(account, { ...entry, stake: entry.stake + amount });
    next.totalStaked += amount;

    this.commit(next, () => {
      this.move(this.stakingAsset.transferFrom(account, this.ledgerAccountId, amount), 'stake pull', amount);
    });
  }

  withdraw(account: string, amount: bigint): void {
    this.requireIdle('withdraw');
    requirePositive(amount, 'Withdrawal');

    const next = this.settledDraft(account);
    const entry = getAccountState(next, account);
    if (amount > entry.stake) {
      throw new LedgerError(
        LedgerErrorCodes.INSUFFICIENT_BALANCE,
        `Withdrawal of ${amount} exceeds stake of ${entry.stake} for ${account}`
      );
    }
    next.accounts.set(account, { ...entry, stake: entry.stake - amount });
    next.totalStaked -= amount;

    this.commit(next, () => {
      this.move(this.stakingAsset.transfer(account, amount), 'stake return', amount);
    });
  }

  /**
   * Pay out everything owed to `account`. Returns the amount paid (0 is a no-op).
   */
  claim(account: string): bigint {
    this.requireIdle('claim');
    const next = this.settledDraft(account);
    const entry = getAccountState(next, account);
    const reward = entry.rewardsOwed;

    if (reward === 0n) {
      this.commit(next);
      return 0n;
    }

    next.accounts.set(account, { ...entry, rewardsOwed: 0n });
    this.commit(next, () => {
      this.move(this.rewardAsset.transfer(account, reward), 'reward payout', reward);
    });
    return reward;
  }

  /**
   * Withdraw the whole stake, then claim. Each step commits on its own.
   *
   * @throws LedgerError from the claim step after the withdrawal has committed:
   *   the stake is already returned and the reward stays owed
   */
  exit(account: string): ExitResult {
    const withdrawn = getAccountState(this.state, account).stake;
    if (withdrawn > 0n) {
      this.withdraw(account, withdrawn);
    }
    const reward = this.claim(account);
    return { withdrawn, reward };
  }

  /**
   * Start a new emission window of rewardsDuration carrying `amount` plus
   * whatever the running window has not yet emitted. The reward asset must
   * already be held by the ledger.
   */
  fundRewards(caller: string, amount: bigint): void {
    this.requireIdle('fundRewards');
    this.requireAdmin(caller, 'fundRewards');
    if (amount < 0n) {
      throw new LedgerError(LedgerErrorCodes.INVALID_AMOUNT, `Funding amount cannot be negative: ${amount}`);
    }

    const now = this.clock.now();
    const next = cloneLedgerState(this.state);
    settle(next, now);

    const duration = next.rewardsDuration;
    if (duration === 0n) {
      throw new LedgerError(LedgerErrorCodes.INVALID_DURATION, 'Rewards duration is not set');
    }

    let rate: bigint;
    if (now >= next.finishAt) {
      rate = amount / duration;
    } else {
      const remaining = (next.finishAt - now) * next.rewardRate;
      rate = (amount + remaining) / duration;
    }

    if (rate === 0n) {
      throw new LedgerError(
        LedgerErrorCodes.ZERO_RATE,
        `Funding of ${amount} over ${duration}s yields a zero reward rate`
      );
    }

    const held = this.rewardAsset.balanceOf(this.ledgerAccountId);
    if (rate * duration > held) {
      throw new LedgerError(
        LedgerErrorCodes.INSUFFICIENT_FUNDING,
        `Window needs ${rate * duration} reward units but the ledger holds ${held}`
      );
    }

    next.rewardRate = rate;
    next.finishAt = now + duration;
    next.lastUpdateTime = now;
    this.commit(next);
  }

  setRewardsDuration(caller: string, duration: bigint): void {
    this.requireIdle('setRewardsDuration');
    this.requireAdmin(caller, 'setRewardsDuration');

    const now = this.clock.now();
    if (now < this.state.finishAt) {
      throw new LedgerError(
        LedgerErrorCodes.WINDOW_ACTIVE,
        `Emission window is active until ${this.state.finishAt}`
      );
    }
    if (duration <= 0n) {
      throw new LedgerError(LedgerErrorCodes.INVALID_DURATION, `Rewards duration must be positive: ${duration}`);
    }

    const next = cloneLedgerState(this.state);
    next.rewardsDuration = duration;
    this.commit(next);
  }

  // ── Queries ──────────────────────────────────────────────────────

  lastApplicableTime(): bigint {
    return lastApplicableTime(this.state, this.clock.now());
  }

  rewardPerToken(): bigint {
    return computeRewardPerToken(this.state, this.clock.now());
  }

  earned(account: string): bigint {
    return computeEarned(this.state, account, this.rewardPerToken());
  }

  /** Total emission of a full window at the current rate */
  rewardForDuration(): bigint {
    return this.state.rewardRate * this.state.rewardsDuration;
  }

  getAccount(account: string): AccountState {
    return { ...getAccountState(this.state, account) };
  }

  accountIds(): string[] {
    return [...this.state.accounts.keys()].sort();
  }

  /** Independent copy of the full state */
  getState(): LedgerState {
    return {
      ...this.state,
      accounts: new Map([...this.state.accounts].map(([id, entry]) => [id, { ...entry }])),
    };
  }

  // ── Internals ────────────────────────────────────────────────────

  private settledDraft(account: string): LedgerState {
    const next = cloneLedgerState(this.state);
    settle(next, this.clock.now(), account);
    return next;
  }

  /**
   * Install `next`, then run the asset interaction. Queries made from inside
   * the interaction see the committed state; mutators are refused, so nothing
   * else can commit before the interaction ends. If it throws, the state from
   * before this call is restored.
   */
  private commit(next: LedgerState, interaction?: () => void): void {
    const prior = this.state;
    this.state = next;
    if (!interaction) {
      return;
    }

    this.interacting = true;
    try {
      interaction();
    } catch (err) {
      this.state = prior;
      if (isLedgerError(err)) {
        throw err;
      }
      throw new LedgerError(LedgerErrorCodes.TRANSFER_FAILED, `Asset transfer threw: ${String(err)}`, { cause: err });
    } finally {
      this.interacting = false;
    }
  }

  private move(succeeded: boolean, purpose: string, amount: bigint): void {
    if (!succeeded) {
      throw new LedgerError(LedgerErrorCodes.TRANSFER_FAILED, `Asset transfer failed (${purpose} of ${amount})`);
    }
  }

  private requireIdle(operation: string): void {
    if (this.interacting) {
      throw new LedgerError(LedgerErrorCodes.REENTRANT_CALL, `${operation} called during an asset transfer`);
    }
  }

  private requireAdmin(caller: string, operation: string): void {
    if (!this.authorizer.isAdmin(caller)) {
      throw new LedgerError(LedgerErrorCodes.NOT_AUTHORIZED, `${caller} is not authorized to call ${operation}`);
    }
  }
}

function requirePositive(amount: bigint, label: string): void {
  if (amount <= 0n) {
    throw new LedgerError(LedgerErrorCodes.INVALID_AMOUNT, `${label} amount must be positive: ${amount}`);
  }
}
