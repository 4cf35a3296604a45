// =============================================================================
// Config loader -- uses c12 (UnJS) to import the user's config file
// =============================================================================
// Accepts `export default { ... }`, `export default defineLedgerConfig({ ... })`
// or a named `ledger` export. Only the keys below are read, and a key with
// the wrong type is rejected.

import { existsSync } from "node:fs";
import { resolve } from "node:path";
import { isPlainObject, LedgerError } from "@pocket-ledger/core";
import { type LedgerOptions, validateConfig } from "@pocket-ledger/ledger/config";
import { loadConfig } from "c12";
import { possibleConfigPaths } from "./config-paths.js";

export interface ResolvedCliConfig {
	/** Options read from the config file. Paths are as written there. */
	options: LedgerOptions;
	/** Absolute path of the config file that was loaded */
	configFile: string;
}

/**
 * Find the config file path without loading it.
 */
export function findConfigFile(cwd: string, configPath?: string): string | null {
	if (configPath) {
		const resolved = resolve(cwd, configPath);
		return existsSync(resolved) ? resolved : null;
	}

	for (const candidate of possibleConfigPaths) {
		const fullPath = resolve(cwd, candidate);
		if (existsSync(fullPath)) return fullPath;
	}

	return null;
}

/**
 * Load the config file named by `configPath`, or the first one found in
 * `possibleConfigPaths`. Returns null when there is none.
 */
export async function getConfig({
	cwd,
	configPath,
}: {
	cwd: string;
	configPath?: string;
}): Promise<ResolvedCliConfig | null> {
	const configFile = findConfigFile(cwd, configPath);
	if (!configFile) {
		if (configPath) {
			throw LedgerError.invalidArgument(`Config file not found: ${resolve(cwd, configPath)}`);
		}
		return null;
	}

	let loaded: unknown;
	try {
		const { config } = await loadConfig({
			configFile,
			cwd,
			dotenv: false,
			rcFile: false,
			packageJson: false,
			globalRc: false,
		});
		loaded = config;
	} catch (error) {
		const message = error instanceof Error ? error.message : String(error);
		throw LedgerError.invalidArgument(`Failed to load config from ${configFile}: ${message}`, error);
	}

	if (!isPlainObject(loaded)) return null;
	const source = isPlainObject(loaded.ledger) ? loaded.ledger : loaded;
	return { options: readOptions(source, configFile), configFile };
}

// =============================================================================
// FIELD READERS
// =============================================================================

const PATH_KEYS = ["jsonPath", "sqlitePath", "schemaPath", "baseCurrency"] as const;

function configError(configFile: string, message: string): LedgerError {
	return LedgerError.invalidArgument(`Invalid config file ${configFile}: ${message}`);
}

function readOptions(value: Record<string, unknown>, configFile: string): LedgerOptions {
	const options: LedgerOptions = {};

	for (const key of PATH_KEYS) {
		const field = value[key];
		if (field === undefined) continue;
		if (typeof field !== "string") throw configError(configFile, `'${key}' must be a string`);
		options[key] = field;
	}

	const { storage, rates, maxImportRows } = value;
	if (storage === "json" || storage === "sqlite") {
		options.storage = storage;
	} else if (storage !== undefined) {
		throw configError(configFile, `'storage' must be "json" or "sqlite", got "${String(storage)}"`);
	}

	if (rates !== undefined) {
		if (!isPlainObject(rates)) throw configError(configFile, "'rates' must be an object");
		const table: Record<string, number> = {};
		for (const [code, rate] of Object.entries(rates)) {
			if (typeof rate !== "number") throw configError(configFile, `rate for ${code} must be a number`);
			table[code] = rate;
		}
		options.rates = table;
	}

	if (maxImportRows !== undefined) {
		if (typeof maxImportRows !== "number") {
			throw configError(configFile, "'maxImportRows' must be a number");
		}
		options.maxImportRows = maxImportRows;
	}

	validateConfig(options);
	return options;
}
