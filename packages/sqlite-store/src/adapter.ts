// =============================================================================
// SQLITE STORE -- LedgerStore implementation backed by Kysely + better-sqlite3
// =============================================================================
// Single-record operations map to single statements. Anything that must see
// and change more than one row (id allocation, bulk replaces, the system
// wallet) runs inside `db.transaction()`, so a failure leaves the tables
// as they were.

import {
	createWallet,
	DEFAULT_BASE_CURRENCY,
	defaultSystemWallet,
	ensureSingleSystemWallet,
	LedgerError,
	type LedgerDataset,
	type LedgerLogger,
	type LedgerRecord,
	type LedgerStore,
	prepareDataset,
	silentLogger,
	SYSTEM_WALLET_ID,
	validateTransferIntegrity,
	type Wallet,
	withInitialBalance,
	withRecordId,
} from "@pocket-ledger/core";
import { type Kysely, sql } from "kysely";
import { openDatabase, type OpenDatabaseOptions } from "./connection.js";
import {
	clearAll,
	clearRecordsAndTransfers,
	deleteTransferCascade,
	idExists,
	insertDataset,
	maxId,
	selectDataset,
	selectWallets,
	toMandatoryExpenseRow,
	toRecordRow,
	toTransferRow,
	toWalletRow,
} from "./queries.js";
import type { LedgerDatabase } from "./schema.js";

export interface SqliteStoreOptions {
	/** Default: `"KZT"` */
	baseCurrency?: string;
	logger?: LedgerLogger;
}

// =============================================================================
// INTERNAL HELPERS
// =============================================================================

async function ensureWallet(db: Kysely<LedgerDatabase>, walletId: number, owner: string): Promise<void> {
	if (!(await idExists(db, "wallets", walletId))) {
		throw LedgerError.invalidArgument(`${owner} references missing wallet ${walletId}`);
	}
}

/** Keep the record's id when it is free, otherwise allocate max + 1. */
async function withFreeId<T extends LedgerRecord>(
	db: Kysely<LedgerDatabase>,
	table: "records" | "mandatory_expenses",
	record: T,
): Promise<T> {
	if (record.id > 0 && !(await idExists(db, table, record.id))) return record;
	return withRecordId(record, (await maxId(db, table)) + 1);
}

async function idAtIndex(
	db: Kysely<LedgerDatabase>,
	table: "records" | "mandatory_expenses",
	index: number,
): Promise<number | undefined> {
	if (!Number.isInteger(index) || index < 0) return undefined;
	const { rows } = await sql<{ id: number }>`select id from ${sql.table(table)} order by id limit 1 offset ${index}`.execute(db);
	return rows[0]?.id;
}

// =============================================================================
// STORE
// =============================================================================

/**
 * Wrap an open database in a LedgerStore. `close()` destroys the Kysely
 * instance and with it the underlying handle.
 *
 * @example
 * ```ts
 * const db = await openDatabase({ path: "ledger.db" });
 * const store = sqliteStore(db, { logger: createConsoleLogger() });
 * ```
 */
export function sqliteStore(db: Kysely<LedgerDatabase>, options: SqliteStoreOptions = {}): LedgerStore {
	const baseCurrency = options.baseCurrency ?? DEFAULT_BASE_CURRENCY;
	const logger = options.logger ?? silentLogger;

	async function readChecked(handle: Kysely<LedgerDatabase> = db): Promise<LedgerDataset> {
		const dataset = await selectDataset(handle, baseCurrency);
		validateTransferIntegrity(dataset.records, dataset.transfers);
		return dataset;
	}

	async function ensureSystemWallet(handle: Kysely<LedgerDatabase>): Promise<Wallet> {
		const existing = (await selectWallets(handle)).find((wallet) => wallet.system);
		if (existing) return existing;

		const base = defaultSystemWallet(0, baseCurrency);
		const wallet = (await idExists(handle, "wallets", SYSTEM_WALLET_ID))
			? createWallet({ ...base, id: (await maxId(handle, "wallets")) + 1 })
			: base;
		await handle.insertInto("wallets").values(toWalletRow(wallet)).execute();
		logger.info("Created system wallet", { walletId: wallet.id });
		return wallet;
	}

	async function writeRecordsAndTransfers(
		handle: Kysely<LedgerDatabase>,
		dataset: LedgerDataset,
	): Promise<void> {
		await clearRecordsAndTransfers(handle);
		await insertDataset(handle, { ...dataset, wallets: [], mandatoryExpenses: [] });
	}

	return {
		id: "sqlite",

		// --- Wallets ---

		async loadWallets() {
			return selectWallets(db);
		},

		async loadActiveWallets() {
			return (await selectWallets(db)).filter((wallet) => wallet.isActive);
		},

		async saveWallet(wallet) {
			await db.transaction().execute(async (trx) => {
				const others = (await selectWallets(trx)).filter((existing) => existing.id !== wallet.id);
				ensureSingleSystemWallet([...others, wallet]);
				const row = toWalletRow(wallet);
				await trx
					.insertInto("wallets")
					.values(row)
					.onConflict((oc) =>
						oc.column("id").doUpdateSet({
							name: row.name,
							currency: row.currency,
							initial_balance: row.initial_balance,
							system: row.system,
							allow_negative: row.allow_negative,
							is_active: row.is_active,
						}),
					)
					.execute();
			});
		},

		async createWallet(input) {
			return db.transaction().execute(async (trx) => {
				const wallet = createWallet({
					id: (await maxId(trx, "wallets")) + 1,
					name: input.name,
					currency: input.currency,
					initialBalance: input.initialBalance,
					allowNegative: input.allowNegative,
				});
				await trx.insertInto("wallets").values(toWalletRow(wallet)).execute();
				return wallet;
			});
		},

		async softDeleteWallet(walletId) {
			const row = await db.selectFrom("wallets").select("system").where("id", "=", walletId).executeTakeFirst();
			if (!row) return false;
			if (row.system === 1) {
				throw LedgerError.domainRule("System wallet cannot be deleted", { walletId });
			}
			await db.updateTable("wallets").set({ is_active: 0 }).where("id", "=", walletId).execute();
			return true;
		},

		async getSystemWallet() {
			return db.transaction().execute((trx) => ensureSystemWallet(trx));
		},

		// --- Records ---

		async loadAll() {
			return (await readChecked()).records;
		},

		async getById(recordId) {
			const record = (await readChecked()).records.find((existing) => existing.id === recordId);
			if (!record) {
				throw LedgerError.notFound(`Record ${recordId} not found`);
			}
			return record;
		},

		async save(record) {
			return db.transaction().execute(async (trx) => {
				await ensureWallet(trx, record.walletId, "Record");
				const stored = await withFreeId(trx, "records", record);
				await trx.insertInto("records").values(toRecordRow(stored)).execute();
				return stored;
			});
		},

		async replace(record) {
			await db.transaction().execute(async (trx) => {
				if (!(await idExists(trx, "records", record.id))) {
					throw LedgerError.notFound(`Record ${record.id} not found`);
				}
				await ensureWallet(trx, record.walletId, `Record ${record.id}`);
				const { id: _id, ...row } = toRecordRow(record);
				await trx.updateTable("records").set(row).where("id", "=", record.id).execute();
				await readChecked(trx);
			});
		},

		async deleteByIndex(index) {
			return db.transaction().execute(async (trx) => {
				const id = await idAtIndex(trx, "records", index);
				if (id === undefined) return false;
				const { transfer_id: transferId } = await trx
					.selectFrom("records")
					.select("transfer_id")
					.where("id", "=", id)
					.executeTakeFirstOrThrow();
				if (transferId === null) {
					await trx.deleteFrom("records").where("id", "=", id).execute();
					return true;
				}
				await deleteTransferCascade(trx, transferId);
				logger.debug("Deleted transfer through one of its legs", { transferId });
				return true;
			});
		},

		async deleteAll() {
			await db.transaction().execute((trx) => clearRecordsAndTransfers(trx));
		},

		// --- Transfers ---

		async loadTransfers() {
			return (await readChecked()).transfers;
		},

		async saveTransfer(transfer) {
			await db.transaction().execute(async (trx) => {
				await ensureWallet(trx, transfer.fromWalletId, `Transfer ${transfer.id}`);
				await ensureWallet(trx, transfer.toWalletId, `Transfer ${transfer.id}`);
				const { id: _id, ...row } = toTransferRow(transfer);
				await trx
					.insertInto("transfers")
					.values(toTransferRow(transfer))
					.onConflict((oc) => oc.column("id").doUpdateSet(row))
					.execute();
			});
		},

		// --- Mandatory expense templates ---

		async loadMandatoryExpenses() {
			return (await readChecked()).mandatoryExpenses;
		},

		async saveMandatoryExpense(expense) {
			return db.transaction().execute(async (trx) => {
				await ensureWallet(trx, expense.walletId, "Mandatory expense");
				const stored = await withFreeId(trx, "mandatory_expenses", expense);
				await trx.insertInto("mandatory_expenses").values(toMandatoryExpenseRow(stored)).execute();
				return stored;
			});
		},

		async deleteMandatoryExpenseByIndex(index) {
			const id = await idAtIndex(db, "mandatory_expenses", index);
			if (id === undefined) return false;
			await db.deleteFrom("mandatory_expenses").where("id", "=", id).execute();
			return true;
		},

		async deleteAllMandatoryExpenses() {
			await db.deleteFrom("mandatory_expenses").execute();
		},

		async replaceMandatoryExpenses(expenses) {
			await db.transaction().execute(async (trx) => {
				const current = await selectDataset(trx, baseCurrency);
				const prepared = prepareDataset({ ...current, mandatoryExpenses: expenses }, baseCurrency);
				await trx.deleteFrom("mandatory_expenses").execute();
				await insertDataset(trx, {
					wallets: [],
					records: [],
					transfers: [],
					mandatoryExpenses: prepared.mandatoryExpenses,
				});
			});
		},

		// --- Initial balance ---

		async saveInitialBalance(balance) {
			await db.transaction().execute(async (trx) => {
				const wallet = withInitialBalance(await ensureSystemWallet(trx), balance);
				await trx
					.updateTable("wallets")
					.set({ initial_balance: wallet.initialBalance })
					.where("id", "=", wallet.id)
					.execute();
			});
		},

		async loadInitialBalance() {
			const row = await db
				.selectFrom("wallets")
				.select("initial_balance")
				.where("system", "=", 1)
				.executeTakeFirst();
			return row?.initial_balance ?? 0;
		},

		// --- Bulk ---

		loadDataset: () => readChecked(),

		async replaceRecordsAndTransfers(records, transfers) {
			await db.transaction().execute(async (trx) => {
				const current = await selectDataset(trx, baseCurrency);
				const prepared = prepareDataset({ ...current, records, transfers }, baseCurrency);
				await writeRecordsAndTransfers(trx, prepared);
			});
			logger.debug("Replaced records and transfers", {
				records: records.length,
				transfers: transfers.length,
			});
		},

		async replaceAllData(data) {
			const prepared = prepareDataset(data, baseCurrency);
			await db.transaction().execute(async (trx) => {
				await clearAll(trx);
				await insertDataset(trx, prepared);
			});
			logger.info("Replaced all data", {
				wallets: prepared.wallets.length,
				records: prepared.records.length,
				transfers: prepared.transfers.length,
				mandatoryExpenses: prepared.mandatoryExpenses.length,
			});
		},

		async close() {
			await db.destroy();
		},
	};
}

export interface OpenSqliteStoreOptions extends OpenDatabaseOptions, SqliteStoreOptions {}

/** Open (or create) the database at `path` and return a store over it. */
export async function openSqliteStore(options: OpenSqliteStoreOptions): Promise<LedgerStore> {
	const db = await openDatabase({ path: options.path, schemaPath: options.schemaPath });
	options.logger?.debug("Opened SQLite database", { path: options.path });
	return sqliteStore(db, options);
}
