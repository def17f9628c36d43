// Core
export { RewardLedger, RewardLedgerDeps, RewardLedgerOptions } from './rewardLedger';
export {
  lastApplicableTime,
  computeRewardPerToken,
  computeEarned,
  settleGlobal,
  settleAccount,
  settle,
} from './settlement';
export {
  AccountState,
  LedgerState,
  ExitResult,
  LedgerConfig,
  StoreBackend,
  DEFAULT_LEDGER_CONFIG,
  createEmptyLedgerState,
} from './types';
export { LedgerError, LedgerErrorCode, LedgerErrorCodes, isLedgerError } from './errors';
export { PRECISION, mulDiv, parseUnits, formatUnits } from './fixedPoint';

// Collaborators
export { FungibleAsset, InMemoryAsset, TransferRecord, TransferHook } from './assets';
export { Authorizer, createAdminAuthorizer } from './authorization';
export { Clock, ManualClock, systemClock } from './clock';

// Configuration and runtime
export { loadLedgerConfig } from './config';
export { openLedgerRuntime, createLedgerStore, LedgerAssets, LedgerRuntime } from './runtime';
export { CheckpointScheduler, CheckpointSchedulerConfig, CheckpointTarget } from './checkpointScheduler';
export * from './persistence';
