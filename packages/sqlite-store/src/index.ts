export { openSqliteStore, type OpenSqliteStoreOptions, sqliteStore, type SqliteStoreOptions } from "./adapter.js";
export { checkSchema, DEFAULT_SCHEMA_PATH, openDatabase, type OpenDatabaseOptions, readSchema } from "./connection.js";
export {
	clearAll,
	countRows,
	insertDataset,
	maxId,
	selectDataset,
	selectNetWorth,
	selectWalletBalances,
	toMandatoryExpenseRow,
	toRecordRow,
	toTransferRow,
	toWalletRow,
} from "./queries.js";
export type { LedgerDatabase } from "./schema.js";
