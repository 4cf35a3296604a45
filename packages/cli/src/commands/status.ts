import { existsSync } from "node:fs";
import * as p from "@clack/prompts";
import { type DatasetCounts, datasetCounts, nearlyEqual, netWorth } from "@pocket-ledger/core";
import type { StorageKind } from "@pocket-ledger/ledger/config";
import { readDocument } from "@pocket-ledger/file-store";
import { countRows, openDatabase, selectNetWorth } from "@pocket-ledger/sqlite-store";
import { Command } from "commander";
import pc from "picocolors";
import { type GlobalFlags, type PathFlags, resolveCliOptions } from "../utils/resolve-options.js";

export interface StoreStatus {
	storage: StorageKind;
	path: string;
	exists: boolean;
	counts: DatasetCounts;
	netWorth: number;
}

const EMPTY_COUNTS: DatasetCounts = { wallets: 0, records: 0, transfers: 0, mandatoryExpenses: 0 };

/**
 * Counts and net worth of both stores. A store whose file does not exist
 * is reported as such and is not created.
 */
export async function collectStatus(options: {
	jsonPath: string;
	sqlitePath: string;
	schemaPath: string;
	baseCurrency: string;
}): Promise<[StoreStatus, StoreStatus]> {
	const json: StoreStatus = {
		storage: "json",
		path: options.jsonPath,
		exists: false,
		counts: EMPTY_COUNTS,
		netWorth: 0,
	};
	const { dataset, missing } = await readDocument(options.jsonPath, { baseCurrency: options.baseCurrency });
	if (!missing) {
		json.exists = true;
		json.counts = datasetCounts(dataset);
		json.netWorth = netWorth(dataset.wallets, dataset.records);
	}

	const sqlite: StoreStatus = {
		storage: "sqlite",
		path: options.sqlitePath,
		exists: false,
		counts: EMPTY_COUNTS,
		netWorth: 0,
	};
	if (existsSync(options.sqlitePath)) {
		const db = await openDatabase({ path: options.sqlitePath, schemaPath: options.schemaPath });
		try {
			sqlite.exists = true;
			sqlite.counts = await countRows(db);
			sqlite.netWorth = await selectNetWorth(db);
		} finally {
			await db.destroy();
		}
	}

	return [json, sqlite];
}

/** True when both stores exist and hold the same counts and net worth. */
export function storesAgree(json: StoreStatus, sqlite: StoreStatus): boolean {
	if (!json.exists || !sqlite.exists) return false;
	const keys: (keyof DatasetCounts)[] = ["wallets", "records", "transfers", "mandatoryExpenses"];
	return (
		keys.every((key) => json.counts[key] === sqlite.counts[key]) &&
		nearlyEqual(json.netWorth, sqlite.netWorth)
	);
}

function printStore(status: StoreStatus): void {
	p.log.step(pc.bold(status.storage === "json" ? "JSON document" : "SQLite database"));
	if (!status.exists) {
		p.log.warning(`  Path:          ${pc.yellow("missing")} ${pc.dim(status.path)}`);
		return;
	}
	const { wallets, records, transfers, mandatoryExpenses } = status.counts;
	p.log.info(`  Path:          ${pc.dim(status.path)}`);
	p.log.info(`  Wallets:       ${pc.cyan(String(wallets))}`);
	p.log.info(`  Records:       ${pc.cyan(String(records))}`);
	p.log.info(`  Transfers:     ${pc.cyan(String(transfers))}`);
	p.log.info(`  Mandatory:     ${pc.cyan(String(mandatoryExpenses))}`);
	p.log.info(`  Net worth:     ${pc.cyan(status.netWorth.toFixed(2))}`);
}

export const statusCommand = new Command("status")
	.description("Show counts and net worth of the JSON and SQLite stores")
	.option("--json-path <path>", "JSON document (default: data.json)")
	.option("--sqlite-path <path>", "SQLite database (default: finance.db)")
	.option("--schema-path <path>", "Schema applied when opening the database")
	.action(async (flags: PathFlags) => {
		const globals = statusCommand.parent?.opts<GlobalFlags>() ?? {};
		const { options, configFile } = await resolveCliOptions(globals, flags);

		p.intro(pc.bgCyan(pc.black(" pocket-ledger status ")));

		p.log.step(pc.bold("Configuration"));
		p.log.info(`  Config file:   ${configFile ? pc.dim(configFile) : pc.dim("none")}`);
		p.log.info(`  Storage:       ${pc.cyan(options.storage)}`);
		p.log.info(`  Currency:      ${pc.cyan(options.baseCurrency)}`);

		const [json, sqlite] = await collectStatus(options);
		printStore(json);
		printStore(sqlite);

		if (json.exists && sqlite.exists) {
			p.outro(storesAgree(json, sqlite) ? pc.green("Stores agree") : pc.yellow("Stores differ"));
		} else {
			p.outro(pc.dim("Only one store exists."));
		}
	});
