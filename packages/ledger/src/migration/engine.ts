// =============================================================================
// MIGRATION ENGINE -- JSON document into an empty SQLite database
// =============================================================================
// All inserts and the verification that follows them share one transaction.
// A thrown error anywhere inside it, including a failed verification, rolls
// the target back to empty.
//
// Ids are copied per table when the whole source collection has positive,
// unique ids. Otherwise SQLite assigns them and every foreign key pointing
// at that table is rewritten through the table's id map.

import {
	BALANCE_EPSILON,
	DEFAULT_BASE_CURRENCY,
	type DatasetCounts,
	datasetCounts,
	type LedgerDataset,
	LedgerError,
	type LedgerLogger,
	nearlyEqual,
	netWorth,
	silentLogger,
	walletBalance,
} from "@pocket-ledger/core";
import {
	checkSchema,
	countRows,
	DEFAULT_SCHEMA_PATH,
	type LedgerDatabase,
	openDatabase,
	readSchema,
	selectNetWorth,
	selectWalletBalances,
	toMandatoryExpenseRow,
	toRecordRow,
	toTransferRow,
	toWalletRow,
} from "@pocket-ledger/sqlite-store";
import type { Kysely } from "kysely";
import { loadMigrationSource } from "./source.js";

// =============================================================================
// TYPES
// =============================================================================

export interface IdMaps {
	/** Source wallet id to target wallet id. */
	wallets: Map<number, number>;
	transfers: Map<number, number>;
	/** Target id of each source record, by position. */
	records: number[];
	mandatoryExpenses: number[];
}

export interface MigrationExpectation {
	source: LedgerDataset;
	idMaps: IdMaps;
}

/**
 * Compares the target with the source after the inserts. Returns one
 * message per mismatch; any message rolls the migration back.
 */
export type MigrationVerifier = (
	db: Kysely<LedgerDatabase>,
	expected: MigrationExpectation,
) => Promise<string[]>;

export interface MigrationOptions {
	jsonPath: string;
	sqlitePath: string;
	/** Default: the schema shipped with `@pocket-ledger/sqlite-store` */
	schemaPath?: string;
	/** Default: `"KZT"` */
	baseCurrency?: string;
	logger?: LedgerLogger;
	/** Default: {@link verifyMigration} */
	verify?: MigrationVerifier;
}

export type MigrationStatus = "migrated" | "noop" | "dry_run";

export interface MigrationReport {
	status: MigrationStatus;
	source: DatasetCounts;
	/** Rows written by this run. All zero for a dry run or a no-op. */
	inserted: DatasetCounts;
	/** Null unless rows were written. */
	idMaps: IdMaps | null;
}

const NOTHING: DatasetCounts = { wallets: 0, records: 0, transfers: 0, mandatoryExpenses: 0 };

function messageOf(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

function asMigrationError(error: unknown): LedgerError {
	if (LedgerError.is(error, "MIGRATION_FAILED")) return error;
	return LedgerError.migrationFailed(messageOf(error), error);
}

function isEmpty(counts: DatasetCounts): boolean {
	return (
		counts.wallets === 0 &&
		counts.records === 0 &&
		counts.transfers === 0 &&
		counts.mandatoryExpenses === 0
	);
}

// =============================================================================
// VERIFICATION
// =============================================================================

/**
 * Default verifier: row counts, each wallet's balance as computed by SQLite
 * against the balance derived from the source, and net worth, all within
 * 1e-5. Also checks that every source row got a target id.
 */
export async function verifyMigration(
	db: Kysely<LedgerDatabase>,
	expected: MigrationExpectation,
): Promise<string[]> {
	const { source, idMaps } = expected;
	const errors: string[] = [];

	const want = datasetCounts(source);
	const got = await countRows(db);
	const tables: [keyof DatasetCounts, string][] = [
		["wallets", "wallets"],
		["records", "records"],
		["transfers", "transfers"],
		["mandatoryExpenses", "mandatory_expenses"],
	];
	for (const [key, table] of tables) {
		if (want[key] !== got[key]) {
			errors.push(`Count mismatch for ${table}: json=${want[key]}, sqlite=${got[key]}`);
		}
	}

	const balances = await selectWalletBalances(db);
	for (const wallet of source.wallets) {
		const targetId = idMaps.wallets.get(wallet.id);
		if (targetId === undefined) {
			errors.push(`Wallet #${wallet.id} has no target id`);
			continue;
		}
		const json = walletBalance(wallet, source.records);
		const sqlite = balances.get(targetId);
		if (sqlite === undefined || !nearlyEqual(json, sqlite, BALANCE_EPSILON)) {
			errors.push(
				`Wallet balance mismatch for wallet #${wallet.id} -> #${targetId}: json=${json}, sqlite=${sqlite ?? "missing"}`,
			);
		}
	}

	const jsonNetWorth = netWorth(source.wallets, source.records);
	const sqliteNetWorth = await selectNetWorth(db);
	if (!nearlyEqual(jsonNetWorth, sqliteNetWorth, BALANCE_EPSILON)) {
		errors.push(`Net worth mismatch: json=${jsonNetWorth}, sqlite=${sqliteNetWorth}`);
	}

	if (idMaps.wallets.size !== source.wallets.length) {
		errors.push("Wallet id mapping is incomplete");
	}
	if (idMaps.transfers.size !== source.transfers.length) {
		errors.push("Transfer id mapping is incomplete");
	}
	if (idMaps.records.length !== source.records.length) {
		errors.push("Record id mapping is incomplete");
	}
	if (idMaps.mandatoryExpenses.length !== source.mandatoryExpenses.length) {
		errors.push("Mandatory expense id mapping is incomplete");
	}

	return errors;
}

/** Maps for a target that already holds the source under the same ids. */
function identityMaps(source: LedgerDataset): IdMaps {
	return {
		wallets: new Map(source.wallets.map((wallet) => [wallet.id, wallet.id])),
		transfers: new Map(source.transfers.map((transfer) => [transfer.id, transfer.id])),
		records: source.records.map((record) => record.id),
		mandatoryExpenses: source.mandatoryExpenses.map((expense) => expense.id),
	};
}

// =============================================================================
// INSERTS
// =============================================================================

/** True when every id is positive and no two are equal. */
export function idsPreservable(items: readonly { id: number }[]): boolean {
	const seen = new Set<number>();
	for (const item of items) {
		if (!Number.isInteger(item.id) || item.id <= 0 || seen.has(item.id)) return false;
		seen.add(item.id);
	}
	return true;
}

function translate(map: ReadonlyMap<number, number>, id: number, what: string): number {
	const target = map.get(id);
	if (target === undefined) {
		throw LedgerError.migrationFailed(`No target id for ${what} #${id}`);
	}
	return target;
}

async function insertAll(
	trx: Kysely<LedgerDatabase>,
	source: LedgerDataset,
	logger: LedgerLogger,
): Promise<IdMaps> {
	const preserve = {
		wallets: idsPreservable(source.wallets),
		transfers: idsPreservable(source.transfers),
		records: idsPreservable(source.records),
		mandatoryExpenses: idsPreservable(source.mandatoryExpenses),
	};
	for (const [table, kept] of Object.entries(preserve)) {
		if (!kept) logger.debug("Assigning new ids", { table });
	}

	const maps: IdMaps = { wallets: new Map(), transfers: new Map(), records: [], mandatoryExpenses: [] };

	logger.info("Migrating wallets", { count: source.wallets.length });
	for (const wallet of source.wallets) {
		const { id: _id, ...row } = toWalletRow(wallet);
		const inserted = await trx
			.insertInto("wallets")
			.values(preserve.wallets ? { ...row, id: wallet.id } : row)
			.returning("id")
			.executeTakeFirstOrThrow();
		maps.wallets.set(wallet.id, inserted.id);
	}

	logger.info("Migrating transfers", { count: source.transfers.length });
	for (const transfer of source.transfers) {
		const { id: _id, ...row } = toTransferRow(transfer);
		const values = {
			...row,
			from_wallet_id: translate(maps.wallets, transfer.fromWalletId, "wallet"),
			to_wallet_id: translate(maps.wallets, transfer.toWalletId, "wallet"),
		};
		const inserted = await trx
			.insertInto("transfers")
			.values(preserve.transfers ? { ...values, id: transfer.id } : values)
			.returning("id")
			.executeTakeFirstOrThrow();
		maps.transfers.set(transfer.id, inserted.id);
	}

	logger.info("Migrating records", { count: source.records.length });
	for (const record of source.records) {
		const { id: _id, ...row } = toRecordRow(record);
		const values = {
			...row,
			wallet_id: translate(maps.wallets, record.walletId, "wallet"),
			transfer_id:
				record.transferId === null ? null : translate(maps.transfers, record.transferId, "transfer"),
			commission_for_transfer_id:
				record.commissionForTransferId === null
					? null
					: translate(maps.transfers, record.commissionForTransferId, "transfer"),
		};
		const inserted = await trx
			.insertInto("records")
			.values(preserve.records ? { ...values, id: record.id } : values)
			.returning("id")
			.executeTakeFirstOrThrow();
		maps.records.push(inserted.id);
	}

	logger.info("Migrating mandatory expenses", { count: source.mandatoryExpenses.length });
	for (const expense of source.mandatoryExpenses) {
		const { id: _id, ...row } = toMandatoryExpenseRow(expense);
		const values = { ...row, wallet_id: translate(maps.wallets, expense.walletId, "wallet") };
		const inserted = await trx
			.insertInto("mandatory_expenses")
			.values(preserve.mandatoryExpenses ? { ...values, id: expense.id } : values)
			.returning("id")
			.executeTakeFirstOrThrow();
		maps.mandatoryExpenses.push(inserted.id);
	}

	return maps;
}

// =============================================================================
// ENTRY POINTS
// =============================================================================

/**
 * Validate the source and confirm the schema applies to the target.
 * Writes nothing.
 */
export async function runDryRun(options: MigrationOptions): Promise<MigrationReport> {
	const logger = options.logger ?? silentLogger;
	try {
		const source = await loadMigrationSource(
			options.jsonPath,
			options.baseCurrency ?? DEFAULT_BASE_CURRENCY,
		);
		await checkSchema({
			path: options.sqlitePath,
			schemaPath: options.schemaPath ?? DEFAULT_SCHEMA_PATH,
		});
		const counts = datasetCounts(source);
		logger.info("Dry run passed", { ...counts });
		return { status: "dry_run", source: counts, inserted: NOTHING, idMaps: null };
	} catch (error) {
		const failure = asMigrationError(error);
		logger.error("Dry run failed", { error: failure.message });
		throw failure;
	}
}

/**
 * Copy the JSON document into the SQLite database. An empty target is
 * filled in one verified transaction; a target that already holds the same
 * data is left alone; any other target is refused.
 */
export async function runMigration(options: MigrationOptions): Promise<MigrationReport> {
	const logger = options.logger ?? silentLogger;
	const verify = options.verify ?? verifyMigration;
	const schemaPath = options.schemaPath ?? DEFAULT_SCHEMA_PATH;

	let db: Kysely<LedgerDatabase> | undefined;
	try {
		await readSchema(schemaPath);
		const source = await loadMigrationSource(
			options.jsonPath,
			options.baseCurrency ?? DEFAULT_BASE_CURRENCY,
		);
		const counts = datasetCounts(source);
		logger.info("Migration source loaded", { path: options.jsonPath, ...counts });

		const target = await openDatabase({ path: options.sqlitePath, schemaPath });
		db = target;

		if (!isEmpty(await countRows(target))) {
			const differences = await verify(target, { source, idMaps: identityMaps(source) });
			if (differences.length > 0) {
				throw LedgerError.migrationFailed(
					`Target SQLite is not empty and differs from source JSON: ${differences.slice(0, 3).join("; ")}`,
				);
			}
			logger.info("Target already holds the source data, nothing to do", {
				path: options.sqlitePath,
			});
			return { status: "noop", source: counts, inserted: NOTHING, idMaps: null };
		}

		const idMaps = await target.transaction().execute(async (trx) => {
			const maps = await insertAll(trx, source, logger);
			const errors = await verify(trx, { source, idMaps: maps });
			if (errors.length > 0) {
				for (const message of errors) {
					logger.error("Migration verification failed", { error: message });
				}
				throw LedgerError.migrationFailed(
					`Migration verification failed, rolled back: ${errors.slice(0, 3).join("; ")}`,
				);
			}
			return maps;
		});

		const inserted = await countRows(target);
		logger.info("Migration committed", { path: options.sqlitePath, ...inserted });
		return { status: "migrated", source: counts, inserted, idMaps };
	} catch (error) {
		const failure = asMigrationError(error);
		logger.error("Migration failed", { error: failure.message });
		throw failure;
	} finally {
		await db?.destroy();
	}
}
