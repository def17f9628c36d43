export { ILedgerStore, LedgerCheckpoint, CheckpointSummary } from './interfaces';
export { InMemoryLedgerStore } from './inMemoryStores';
export { canonicalStringify, computeHash } from './canonicalSerialize';
export {
  LEDGER_STATE_VERSION,
  SerializedLedgerState,
  serializeLedgerState,
  deserializeLedgerState,
  computeStateHash,
} from './ledgerSerializer';
export { checkpointLedger, restoreLedger } from './checkpoint';
export { openDatabase, SqliteLedgerStore, createSqliteLedgerStore } from './sqlite';
