import { RewardLedger, RewardLedgerDeps } from '../rewardLedger';
import { ILedgerStore, LedgerCheckpoint } from './interfaces';
import { computeStateHash } from './ledgerSerializer';

/**
 * Persist the ledger's current state as the next checkpoint.
 *
 * Calls against one store must not overlap: each reads the latest sequence
 * before saving the next (openLedgerRuntime queues them).
 */
export async function checkpointLedger(
  ledger: RewardLedger,
  store: ILedgerStore,
  createdAt: Date = new Date()
): Promise<LedgerCheckpoint> {
  const [latest] = await store.listCheckpoints(1);
  const state = ledger.getState();

  const checkpoint: LedgerCheckpoint = {
    sequence: (latest?.sequence ?? 0) + 1,
    stateHash: computeStateHash(state),
    state,
    createdAt: createdAt.toISOString(),
  };

  await store.saveCheckpoint(checkpoint);
  return checkpoint;
}

/**
 * Rebuild a ledger from the latest checkpoint, or start an empty one with
 * `rewardsDuration` when the store has none.
 *
 * @throws Error if the stored state does not match its recorded hash
 */
export async function restoreLedger(
  store: ILedgerStore,
  deps: RewardLedgerDeps,
  rewardsDuration = 0n
): Promise<{ ledger: RewardLedger; checkpoint?: LedgerCheckpoint }> {
  const checkpoint = await store.loadLatestCheckpoint();

  if (!checkpoint) {
    return { ledger: new RewardLedger(deps, { rewardsDuration }) };
  }

  const actualHash = computeStateHash(checkpoint.state);
  if (actualHash !== checkpoint.stateHash) {
    throw new Error(
      `Checkpoint ${checkpoint.sequence} hash mismatch: stored ${checkpoint.stateHash}, computed ${actualHash}`
    );
  }

  return {
    ledger: new RewardLedger(deps, { initialState: checkpoint.state }),
    checkpoint,
  };
}
