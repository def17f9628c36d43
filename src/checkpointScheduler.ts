/**
 * Cron-based checkpoint scheduler.
 * Persists the ledger on a fixed schedule; overlapping runs are skipped.
 */

import * as cron from 'node-cron';
import { LedgerCheckpoint } from './persistence/interfaces';

export interface CheckpointSchedulerConfig {
  cron: string; // e.g. '*/15 * * * *'
  timezone: string; // e.g. 'UTC'
}

export interface CheckpointTarget {
  checkpoint(): Promise<LedgerCheckpoint>;
}

export class CheckpointScheduler {
  private job: cron.ScheduledTask | null = null;
  private running = false;

  constructor(
    private target: CheckpointTarget,
    private config: CheckpointSchedulerConfig
  ) {}

  start(): void {
    if (!cron.validate(this.config.cron)) {
      throw new Error(`Invalid checkpoint schedule: "${this.config.cron}"`);
    }
    this.job = cron.schedule(this.config.cron, () => this.tick(), { timezone: this.config.timezone });
    console.log(`Checkpoint scheduler: "${this.config.cron}" (${this.config.timezone})`);
  }

  stop(): void {
    this.job?.stop();
    this.job = null;
  }

  isRunning(): boolean {
    return this.job !== null;
  }

  /** One scheduled run. Never rejects. */
  tick(): Promise<void> {
    if (this.running) {
      console.log('Checkpoint scheduler: skip, previous checkpoint still running');
      return Promise.resolve();
    }

    this.running = true;
    return this.target
      .checkpoint()
      .then(checkpoint => {
        console.log(`Checkpoint scheduler: saved checkpoint ${checkpoint.sequence}`);
      })
      .catch(err => {
        console.error('Checkpoint scheduler: checkpoint failed:', err);
      })
      .finally(() => {
        this.running = false;
      });
  }
}
