import { CheckpointSummary, ILedgerStore, LedgerCheckpoint } from './interfaces';
import { deserializeLedgerState, serializeLedgerState } from './ledgerSerializer';

interface StoredCheckpoint {
  sequence: number;
  stateHash: string;
  stateJson: string;
  summary: CheckpointSummary;
  createdAt: string;
}

/**
 * Keeps checkpoints in serialized form so callers never share state objects with the store
 */
export class InMemoryLedgerStore implements ILedgerStore {
  private checkpoints = new Map<number, StoredCheckpoint>();

  async saveCheckpoint(checkpoint: LedgerCheckpoint): Promise<void> {
    if (this.checkpoints.has(checkpoint.sequence)) {
      throw new Error(`Checkpoint ${checkpoint.sequence} already exists`);
    }
    this.checkpoints.set(checkpoint.sequence, {
      sequence: checkpoint.sequence,
      stateHash: checkpoint.stateHash,
      stateJson: serializeLedgerState(checkpoint.state),
      createdAt: checkpoint.createdAt,
      summary: {
        sequence: checkpoint.sequence,
        stateHash: checkpoint.stateHash,
        totalStaked: checkpoint.state.totalStaked,
        accountCount: checkpoint.state.accounts.size,
        createdAt: checkpoint.createdAt,
      },
    });
  }

  async loadCheckpoint(sequence: number): Promise<LedgerCheckpoint | undefined> {
    const stored = this.checkpoints.get(sequence);
    return stored ? toCheckpoint(stored) : undefined;
  }

  async loadLatestCheckpoint(): Promise<LedgerCheckpoint | undefined> {
    const [latest] = this.sortedNewestFirst();
    return latest ? toCheckpoint(latest) : undefined;
  }

  async listCheckpoints(limit = 20): Promise<CheckpointSummary[]> {
    return this.sortedNewestFirst()
      .slice(0, limit)
      .map(c => ({ ...c.summary }));
  }

  close(): void {
    this.checkpoints.clear();
  }

  private sortedNewestFirst(): StoredCheckpoint[] {
    return [...this.checkpoints.values()].sort((a, b) => b.sequence - a.sequence);
  }
}

function toCheckpoint(stored: StoredCheckpoint): LedgerCheckpoint {
  return {
    sequence: stored.sequence,
    stateHash: stored.stateHash,
    state: deserializeLedgerState(stored.stateJson),
    createdAt: stored.createdAt,
  };
}
