import { LedgerState } from '../types';

export interface LedgerCheckpoint {
  sequence: number; // 1-based, strictly increasing
  stateHash: string;
  state: LedgerState;
  createdAt: string; // ISO string
}

export interface CheckpointSummary {
  sequence: number;
  stateHash: string;
  totalStaked: bigint;
  accountCount: number;
  createdAt: string;
}

export interface ILedgerStore {
  /** Rejects a sequence that already exists */
  saveCheckpoint(checkpoint: LedgerCheckpoint): Promise<void>;
  loadCheckpoint(sequence: number): Promise<LedgerCheckpoint | undefined>;
  loadLatestCheckpoint(): Promise<LedgerCheckpoint | undefined>;
  /** Newest first */
  listCheckpoints(limit?: number): Promise<CheckpointSummary[]>;
  close(): void;
}
