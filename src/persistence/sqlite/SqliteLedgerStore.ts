import type Database from 'better-sqlite3';
import { CheckpointSummary, ILedgerStore, LedgerCheckpoint } from '../interfaces';
import { deserializeLedgerState, serializeLedgerState } from '../ledgerSerializer';

interface CheckpointRow {
  sequence: number;
  state_hash: string;
  state_json: string;
  total_staked: string;
  account_count: number;
  created_at: string;
}

type SummaryRow = Omit<CheckpointRow, 'state_json'>;

/**
 * Ledger checkpoints in SQLite. Amounts are stored as TEXT-encoded bigint.
 */
export class SqliteLedgerStore implements ILedgerStore {
  private readonly db: Database.Database;
  private stmtExists: Database.Statement;
  private stmtInsert: Database.Statement;
  private stmtLoad: Database.Statement;
  private stmtLatest: Database.Statement;
  private stmtList: Database.Statement;

  constructor(db: Database.Database) {
    this.db = db;
    this.stmtExists = db.prepare('SELECT 1 AS found FROM ledger_checkpoints WHERE sequence = ?');
    this.stmtInsert = db.prepare(`
      INSERT INTO ledger_checkpoints (sequence, state_hash, state_json, total_staked, account_count, created_at)
      VALUES (@sequence, @stateHash, @stateJson, @totalStaked, @accountCount, @createdAt)
    `);
    this.stmtLoad = db.prepare('SELECT * FROM ledger_checkpoints WHERE sequence = ?');
    this.stmtLatest = db.prepare('SELECT * FROM ledger_checkpoints ORDER BY sequence DESC LIMIT 1');
    this.stmtList = db.prepare(
      `SELECT sequence, state_hash, total_staked, account_count, created_at
       FROM ledger_checkpoints ORDER BY sequence DESC LIMIT ?`
    );
  }

  async saveCheckpoint(checkpoint: LedgerCheckpoint): Promise<void> {
    if (this.stmtExists.get(checkpoint.sequence) !== undefined) {
      throw new Error(`Checkpoint ${checkpoint.sequence} already exists`);
    }
    this.stmtInsert.run({
      sequence: checkpoint.sequence,
      stateHash: checkpoint.stateHash,
      stateJson: serializeLedgerState(checkpoint.state),
      totalStaked: checkpoint.state.totalStaked.toString(),
      accountCount: checkpoint.state.accounts.size,
      createdAt: checkpoint.createdAt,
    });
  }

  async loadCheckpoint(sequence: number): Promise<LedgerCheckpoint | undefined> {
    const row = this.stmtLoad.get(sequence) as CheckpointRow | undefined;
    return row ? rowToCheckpoint(row) : undefined;
  }

  async loadLatestCheckpoint(): Promise<LedgerCheckpoint | undefined> {
    const row = this.stmtLatest.get() as CheckpointRow | undefined;
    return row ? rowToCheckpoint(row) : undefined;
  }

  async listCheckpoints(limit = 20): Promise<CheckpointSummary[]> {
    const rows = this.stmtList.all(limit) as SummaryRow[];
    return rows.map(r => ({
      sequence: r.sequence,
      stateHash: r.state_hash,
      totalStaked: BigInt(r.total_staked),
      accountCount: r.account_count,
      createdAt: r.created_at,
    }));
  }

  close(): void {
    this.db.close();
  }
}

function rowToCheckpoint(row: CheckpointRow): LedgerCheckpoint {
  return {
    sequence: row.sequence,
    stateHash: row.state_hash,
    state: deserializeLedgerState(row.state_json),
    createdAt: row.created_at,
  };
}
