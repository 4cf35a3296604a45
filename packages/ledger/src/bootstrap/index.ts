// =============================================================================
// STORAGE BOOTSTRAP -- pick the store and reconcile JSON with SQLite
// =============================================================================
// With SQLite selected, the JSON document is backed up, migrated once into
// an empty database, cross-checked against it, and finally rewritten from
// it so the two never drift. Any disagreement stops startup.

import {
	type DatasetCounts,
	LedgerError,
	type LedgerStore,
	nearlyEqual,
	netWorth,
	silentLogger,
} from "@pocket-ledger/core";
import { jsonFileStore } from "@pocket-ledger/file-store";
import {
	countRows,
	type LedgerDatabase,
	openDatabase,
	selectNetWorth,
	sqliteStore,
} from "@pocket-ledger/sqlite-store";
import type { Kysely } from "kysely";
import {
	type LedgerOptions,
	type ResolvedLedgerOptions,
	resolveLedgerOptions,
	type StorageKind,
} from "../config/index.js";
import { runMigration } from "../migration/engine.js";
import { createBackup, fileExists } from "./backup.js";

export { backupPathFor, backupStamp, createBackup } from "./backup.js";

export interface BootstrapOptions extends LedgerOptions {
	/** Default: `process.env` */
	env?: Record<string, string | undefined>;
	/** Clock for backup names. Default: `() => new Date()` */
	now?: () => Date;
}

export interface BootstrapResult {
	store: LedgerStore;
	storage: StorageKind;
	/** Copy of the JSON document taken before anything ran, if it existed. */
	backupPath: string | null;
	/** True when this run copied the JSON document into SQLite. */
	migrated: boolean;
}

function messageOf(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

async function sqliteHasData(options: ResolvedLedgerOptions): Promise<boolean> {
	const db = await openDatabase({ path: options.sqlitePath, schemaPath: options.schemaPath });
	try {
		const counts = await countRows(db);
		return Object.values(counts).some((count) => count > 0);
	} finally {
		await db.destroy();
	}
}

async function crossValidate(
	json: LedgerStore,
	db: Kysely<LedgerDatabase>,
): Promise<void> {
	const source = await json.loadDataset();
	const target = await countRows(db);

	const compared: (keyof DatasetCounts)[] = ["wallets", "records", "transfers"];
	for (const key of compared) {
		const expected = source[key].length;
		if (expected !== target[key]) {
			throw LedgerError.bootstrapFailed(`${key} mismatch JSON=${expected} SQLite=${target[key]}`);
		}
	}

	const jsonNetWorth = netWorth(source.wallets, source.records);
	const sqliteNetWorth = await selectNetWorth(db);
	if (!nearlyEqual(jsonNetWorth, sqliteNetWorth)) {
		throw LedgerError.bootstrapFailed(
			`net worth mismatch JSON=${jsonNetWorth} SQLite=${sqliteNetWorth}`,
		);
	}
}

/** Open the configured store, migrating and reconciling first when it is SQLite. */
export async function bootstrapStorage(options: BootstrapOptions = {}): Promise<BootstrapResult> {
	const resolved = resolveLedgerOptions(options, options.env);
	const logger = resolved.logger ?? silentLogger;
	const json = jsonFileStore({
		path: resolved.jsonPath,
		baseCurrency: resolved.baseCurrency,
		logger,
	});

	if (resolved.storage === "json") {
		logger.info("Storage selected", { storage: "json", path: resolved.jsonPath });
		return { store: json, storage: "json", backupPath: null, migrated: false };
	}

	logger.info("Storage selected", { storage: "sqlite", path: resolved.sqlitePath });
	const now = options.now ?? (() => new Date());

	let backupPath: string | null;
	let jsonExists: boolean;
	let hasData: boolean;
	try {
		backupPath = await createBackup(resolved.jsonPath, now());
		jsonExists = await fileExists(resolved.jsonPath);
		hasData = await sqliteHasData(resolved);
	} catch (error) {
		throw LedgerError.bootstrapFailed(`Cannot prepare storage: ${messageOf(error)}`, error);
	}
	if (backupPath) {
		logger.info("Backup created", { path: backupPath });
	}

	let migrated = false;
	if (!hasData && jsonExists) {
		try {
			const report = await runMigration({
				jsonPath: resolved.jsonPath,
				sqlitePath: resolved.sqlitePath,
				schemaPath: resolved.schemaPath,
				baseCurrency: resolved.baseCurrency,
				logger,
			});
			migrated = report.status === "migrated";
		} catch (error) {
			throw LedgerError.bootstrapFailed(`Migration to SQLite failed: ${messageOf(error)}`, error);
		}
	}

	let db: Kysely<LedgerDatabase>;
	try {
		db = await openDatabase({ path: resolved.sqlitePath, schemaPath: resolved.schemaPath });
	} catch (error) {
		throw LedgerError.bootstrapFailed(`Cannot open SQLite database: ${messageOf(error)}`, error);
	}
	const store = sqliteStore(db, { baseCurrency: resolved.baseCurrency, logger });
	try {
		if (jsonExists) {
			await crossValidate(json, db);
			logger.info("Integrity check passed");
		}
		await store.getSystemWallet();
		await json.replaceAllData(await store.loadDataset());
	} catch (error) {
		await store.close();
		if (LedgerError.is(error, "BOOTSTRAP_FAILED")) {
			logger.error("Bootstrap failed", { error: error.message });
			throw error;
		}
		throw LedgerError.bootstrapFailed(`Reconciliation failed: ${messageOf(error)}`, error);
	}

	return { store, storage: "sqlite", backupPath, migrated };
}
