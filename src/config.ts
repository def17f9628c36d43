import * as path from 'path';
import { DEFAULT_LEDGER_CONFIG, LedgerConfig, StoreBackend } from './types';

const STORE_BACKENDS: readonly StoreBackend[] = ['sqlite', 'memory'];

/**
 * Default SQLite location, relative to the working directory
 */
export function defaultDbPath(): string {
  return path.join(process.cwd(), 'data', 'reward-ledger.db');
}

/**
 * Build the ledger configuration from environment variables.
 *
 *   REWARDS_DURATION_SECS  initial emission window (default 604800)
 *   LEDGER_ADMIN_ID        administrator identity (default test-admin)
 *   LEDGER_ACCOUNT_ID      the ledger's own asset account (default reward-ledger)
 *   STORE_BACKEND          sqlite | memory (default sqlite)
 *   LEDGER_DB_PATH         SQLite file (default ./data/reward-ledger.db)
 *   CHECKPOINT_CRON        cron expression for periodic checkpoints (default: none)
 *   CHECKPOINT_TZ          timezone for CHECKPOINT_CRON (default UTC)
 */
export function loadLedgerConfig(env: NodeJS.ProcessEnv = process.env): LedgerConfig {
  const storeBackend = parseStoreBackend(env.STORE_BACKEND);

  return {
    rewardsDuration: env.REWARDS_DURATION_SECS
      ? parseDuration(env.REWARDS_DURATION_SECS)
      : DEFAULT_LEDGER_CONFIG.rewardsDuration,
    adminId: env.LEDGER_ADMIN_ID || DEFAULT_LEDGER_CONFIG.adminId,
    ledgerAccountId: env.LEDGER_ACCOUNT_ID || DEFAULT_LEDGER_CONFIG.ledgerAccountId,
    storeBackend,
    dbPath: storeBackend === 'sqlite' ? env.LEDGER_DB_PATH || defaultDbPath() : undefined,
    checkpointCron: env.CHECKPOINT_CRON || undefined,
    checkpointTimezone: env.CHECKPOINT_TZ || DEFAULT_LEDGER_CONFIG.checkpointTimezone,
  };
}

function parseDuration(raw: string): bigint {
  if (!/^\d+$/.test(raw.trim())) {
    throw new Error(`REWARDS_DURATION_SECS must be a non-negative integer, got "${raw}"`);
  }
  return BigInt(raw.trim());
}

function parseStoreBackend(raw: string | undefined): StoreBackend {
  if (!raw) {
    return DEFAULT_LEDGER_CONFIG.storeBackend;
  }
  const backend = STORE_BACKENDS.find(b => b === raw);
  if (!backend) {
    throw new Error(`STORE_BACKEND must be one of ${STORE_BACKENDS.join(', ')}, got "${raw}"`);
  }
  return backend;
}
