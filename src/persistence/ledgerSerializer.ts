/**
 * LedgerState serializer for storage.
 * bigint → decimal string, accounts Map → entries sorted by account id.
 */

import { AccountState, LedgerState } from '../types';
import { canonicalStringify, computeHash } from './canonicalSerialize';

export const LEDGER_STATE_VERSION = 1;

// ── Serializable shapes ────────────────────────────────────────────

interface SerializedAccountState {
  stake: string;
  rewardPerTokenPaid: string;
  rewardsOwed: string;
}

export interface SerializedLedgerState {
  version: number;
  totalStaked: string;
  rewardPerTokenStored: string;
  rewardRate: string;
  rewardsDuration: string;
  finishAt: string;
  lastUpdateTime: string;
  accounts: Array<[string, SerializedAccountState]>;
}

// ── Serialize ──────────────────────────────────────────────────────

export function toSerializedLedgerState(state: LedgerState): SerializedLedgerState {
  return {
    version: LEDGER_STATE_VERSION,
    totalStaked: state.totalStaked.toString(),
    rewardPerTokenStored: state.rewardPerTokenStored.toString(),
    rewardRate: state.rewardRate.toString(),
    rewardsDuration: state.rewardsDuration.toString(),
    finishAt: state.finishAt.toString(),
    lastUpdateTime: state.lastUpdateTime.toString(),
    accounts: [...state.accounts.entries()]
      .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
      .map(([id, entry]) => [
        id,
        {
          stake: entry.stake.toString(),
          rewardPerTokenPaid: entry.rewardPerTokenPaid.toString(),
          rewardsOwed: entry.rewardsOwed.toString(),
        },
      ]),
  };
}

export function serializeLedgerState(state: LedgerState): string {
  return JSON.stringify(toSerializedLedgerState(state));
}

/**
 * sha256 over the canonical serialized form
 */
export function computeStateHash(state: LedgerState): string {
  return computeHash(canonicalStringify(toSerializedLedgerState(state)));
}

// ── Deserialize ────────────────────────────────────────────────────

/**
 * Parse and validate a serialized ledger state.
 *
 * @throws Error on malformed JSON, unknown version, non-integer amounts, or a
 *   totalStaked that does not match the account stakes
 */
export function deserializeLedgerState(json: string): LedgerState {
  const parsed: unknown = JSON.parse(json);
  if (!isRecord(parsed)) {
    throw new Error('Corrupt ledger state: expected an object');
  }
  if (parsed.version !== LEDGER_STATE_VERSION) {
    throw new Error(`Unsupported ledger state version: ${String(parsed.version)}`);
  }
  if (!Array.isArray(parsed.accounts)) {
    throw new Error('Corrupt ledger state: accounts must be an array');
  }

  const entries: unknown[] = parsed.accounts;
  const accounts = new Map<string, AccountState>();
  for (const item of entries) {
    const pair: unknown[] = Array.isArray(item) ? item : [];
    const [id, raw] = pair;
    if (pair.length !== 2 || typeof id !== 'string' || !isRecord(raw)) {
      throw new Error('Corrupt ledger state: malformed account entry');
    }
    accounts.set(id, {
      stake: readUint(raw, 'stake', id),
      rewardPerTokenPaid: readUint(raw, 'rewardPerTokenPaid', id),
      rewardsOwed: readUint(raw, 'rewardsOwed', id),
    });
  }

  const state: LedgerState = {
    totalStaked: readUint(parsed, 'totalStaked'),
    rewardPerTokenStored: readUint(parsed, 'rewardPerTokenStored'),
    rewardRate: readUint(parsed, 'rewardRate'),
    rewardsDuration: readUint(parsed, 'rewardsDuration'),
    finishAt: readUint(parsed, 'finishAt'),
    lastUpdateTime: readUint(parsed, 'lastUpdateTime'),
    accounts,
  };

  const stakeSum = [...accounts.values()].reduce((sum, entry) => sum + entry.stake, 0n);
  if (stakeSum !== state.totalStaked) {
    throw new Error(`Corrupt ledger state: totalStaked ${state.totalStaked} != sum of stakes ${stakeSum}`);
  }

  return state;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readUint(source: Record<string, unknown>, key: string, account?: string): bigint {
  const raw = source[key];
  if (typeof raw !== 'string' || !/^\d+$/.test(raw)) {
    const where = account === undefined ? key : `${account}.${key}`;
    throw new Error(`Corrupt ledger state: ${where} is not an unsigned integer string`);
  }
  return BigInt(raw);
}
