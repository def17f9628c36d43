import { createAdminAuthorizer } from './authorization';
import { Clock, systemClock } from './clock';
import { RewardLedger, RewardLedgerDeps } from './rewardLedger';
import { LedgerConfig } from './types';
import { ILedgerStore, LedgerCheckpoint } from './persistence/interfaces';
import { InMemoryLedgerStore } from './persistence/inMemoryStores';
import { createSqliteLedgerStore } from './persistence/sqlite';
import { checkpointLedger, restoreLedger } from './persistence/checkpoint';
import { CheckpointScheduler } from './checkpointScheduler';

export type LedgerAssets = Pick<RewardLedgerDeps, 'stakingAsset' | 'rewardAsset'>;

export interface LedgerRuntime {
  ledger: RewardLedger;
  store: ILedgerStore;
  checkpoint(): Promise<LedgerCheckpoint>;
  scheduler?: CheckpointScheduler; // Present when config.checkpointCron is set
  close(): void;
}

export function createLedgerStore(config: LedgerConfig): ILedgerStore {
  return config.storeBackend === 'memory'
    ? new InMemoryLedgerStore()
    : createSqliteLedgerStore(config.dbPath);
}

/**
 * Open the configured store, restore the ledger from its latest checkpoint and
 * start periodic checkpoints when a schedule is configured
 */
export async function openLedgerRuntime(
  config: LedgerConfig,
  assets: LedgerAssets,
  clock: Clock = systemClock
): Promise<LedgerRuntime> {
  const store = createLedgerStore(config);

  let restored: Awaited<ReturnType<typeof restoreLedger>>;
  try {
    restored = await restoreLedger(
      store,
      {
        stakingAsset: assets.stakingAsset,
        rewardAsset: assets.rewardAsset,
        authorizer: createAdminAuthorizer(config.adminId),
        clock,
        ledgerAccountId: config.ledgerAccountId,
      },
      config.rewardsDuration
    );
  } catch (err) {
    console.error('Ledger restore failed:', err);
    store.close();
    throw err;
  }

  const { ledger, checkpoint: restoredFrom } = restored;
  if (restoredFrom) {
    const state = ledger.getState();
    console.log(
      `Ledger restored: checkpoint ${restoredFrom.sequence}, ${state.accounts.size} accounts, ` +
      `total staked ${state.totalStaked}`
    );
  } else {
    console.log(`Ledger initialized empty (${config.storeBackend} store, duration ${config.rewardsDuration}s)`);
  }

  const runCheckpoint = async (): Promise<LedgerCheckpoint> => {
    try {
      return await checkpointLedger(ledger, store);
    } catch (err) {
      console.error('Ledger checkpoint failed:', err);
      throw err;
    }
  };

  // One checkpoint at a time: each picks its sequence from the one before
  let pending: Promise<unknown> = Promise.resolve();
  const checkpoint = (): Promise<LedgerCheckpoint> => {
    const next = pending.then(runCheckpoint);
    // A failure reaches its own caller through `next`; the queue moves on
    pending = next.catch(() => undefined);
    return next;
  };

  let scheduler: CheckpointScheduler | undefined;
  if (config.checkpointCron) {
    scheduler = new CheckpointScheduler({ checkpoint }, {
      cron: config.checkpointCron,
      timezone: config.checkpointTimezone,
    });
    try {
      scheduler.start();
    } catch (err) {
      store.close();
      throw err;
    }
  }

  return {
    ledger,
    store,
    checkpoint,
    scheduler,
    close: () => {
      scheduler?.stop();
      store.close();
    },
  };
}
