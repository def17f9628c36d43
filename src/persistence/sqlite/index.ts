export { openDatabase, IN_MEMORY_DB } from './database';
export { SqliteLedgerStore } from './SqliteLedgerStore';

import { openDatabase } from './database';
import { SqliteLedgerStore } from './SqliteLedgerStore';

export function createSqliteLedgerStore(dbPath?: string): SqliteLedgerStore {
  return new SqliteLedgerStore(openDatabase(dbPath));
}
