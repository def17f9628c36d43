/**
 * Reward Ledger - Core Types
 */

/**
 * Per-account accounting entry
 */
export interface AccountState {
  stake: bigint; // Units of the staked asset currently deposited
  rewardPerTokenPaid: bigint; // Accumulator snapshot at the account's last settlement (scaled by PRECISION)
  rewardsOwed: bigint; // Settled reward units not yet claimed
}

/**
 * Whole ledger state. Owned by exactly one RewardLedger.
 *
 * Account entries are replaced on write, never mutated, so a shallow copy of
 * the accounts map is an independent snapshot.
 */
export interface LedgerState {
  totalStaked: bigint;
  rewardPerTokenStored: bigint; // Scaled by PRECISION
  rewardRate: bigint; // Reward units per second
  rewardsDuration: bigint; // Seconds
  finishAt: bigint; // Unix seconds; 0 until the first funding
  lastUpdateTime: bigint; // Unix seconds
  accounts: Map<string, AccountState>;
}

export const EMPTY_ACCOUNT: Readonly<AccountState> = Object.freeze({
  stake: 0n,
  rewardPerTokenPaid: 0n,
  rewardsOwed: 0n,
});

export function createEmptyLedgerState(rewardsDuration = 0n): LedgerState {
  return {
    totalStaked: 0n,
    rewardPerTokenStored: 0n,
    rewardRate: 0n,
    rewardsDuration,
    finishAt: 0n,
    lastUpdateTime: 0n,
    accounts: new Map(),
  };
}

/**
 * Shallow copy: new accounts map, shared (immutable) account entries
 */
export function cloneLedgerState(state: LedgerState): LedgerState {
  return { ...state, accounts: new Map(state.accounts) };
}

export function getAccountState(state: LedgerState, account: string): AccountState {
  return state.accounts.get(account) ?? EMPTY_ACCOUNT;
}

/**
 * Result of RewardLedger.exit()
 */
export interface ExitResult {
  withdrawn: bigint;
  reward: bigint;
}

/**
 * Runtime configuration (see config.ts)
 */
export type StoreBackend = 'sqlite' | 'memory';

export interface LedgerConfig {
  rewardsDuration: bigint; // Initial emission window length, seconds
  adminId: string; // Identity allowed to fund rewards and change the duration
  ledgerAccountId: string; // The ledger's own account on both assets
  storeBackend: StoreBackend;
  dbPath?: string; // SQLite file (sqlite backend only)
  checkpointCron?: string; // Periodic checkpoint schedule; none when unset
  checkpointTimezone: string;
}

/**
 * Default configuration: 7-day emission windows
 */
export const DEFAULT_LEDGER_CONFIG: LedgerConfig = {
  rewardsDuration: 604_800n,
  adminId: 'test-admin',
  ledgerAccountId: 'reward-ledger',
  storeBackend: 'sqlite',
  checkpointTimezone: 'UTC',
};
