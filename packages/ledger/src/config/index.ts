import {
	DEFAULT_BASE_CURRENCY,
	DEFAULT_RATES,
	LedgerError,
	type LedgerLogger,
} from "@pocket-ledger/core";
import { DEFAULT_SCHEMA_PATH } from "@pocket-ledger/sqlite-store";

export type StorageKind = "json" | "sqlite";

export interface LedgerOptions {
	/** Which store is authoritative. Default: `"sqlite"` */
	storage?: StorageKind;
	/** Default: `"data.json"` */
	jsonPath?: string;
	/** Default: `"finance.db"` */
	sqlitePath?: string;
	/** Default: the schema shipped with `@pocket-ledger/sqlite-store` */
	schemaPath?: string;
	/** Default: `"KZT"` */
	baseCurrency?: string;
	/** Units of base currency per unit. Default: USD 500, EUR 590, RUB 6.5 */
	rates?: Record<string, number>;
	/** Default: `10000` */
	maxImportRows?: number;
	logger?: LedgerLogger;
}

export interface ResolvedLedgerOptions {
	storage: StorageKind;
	jsonPath: string;
	sqlitePath: string;
	schemaPath: string;
	baseCurrency: string;
	rates: Record<string, number>;
	maxImportRows: number;
	logger?: LedgerLogger;
}

export const DEFAULT_JSON_PATH = "data.json";
export const DEFAULT_SQLITE_PATH = "finance.db";
export const DEFAULT_MAX_IMPORT_ROWS = 10_000;

const ENV_PREFIX = "POCKET_LEDGER_";

function isStorageKind(value: unknown): value is StorageKind {
	return value === "json" || value === "sqlite";
}

function fail(message: string): never {
	throw LedgerError.invalidArgument(`Invalid ledger config: ${message}`);
}

function checkPath(value: unknown, key: string): void {
	if (value !== undefined && (typeof value !== "string" || value.trim() === "")) {
		fail(`'${key}' must be a non-empty string`);
	}
}

/**
 * Validate ledger options at runtime.
 * Throws `INVALID_ARGUMENT` with the offending key in the message.
 */
export function validateConfig(options: LedgerOptions): void {
	if (options.storage !== undefined && !isStorageKind(options.storage)) {
		fail(`'storage' must be "json" or "sqlite", got "${String(options.storage)}"`);
	}

	checkPath(options.jsonPath, "jsonPath");
	checkPath(options.sqlitePath, "sqlitePath");
	checkPath(options.schemaPath, "schemaPath");

	if (options.baseCurrency !== undefined && !/^[A-Z]{3}$/.test(options.baseCurrency)) {
		fail(`'baseCurrency' must be a three letter upper-case code, got "${options.baseCurrency}"`);
	}

	if (options.rates) {
		for (const [code, rate] of Object.entries(options.rates)) {
			if (!/^[A-Z]{3}$/.test(code)) {
				fail(`rate key "${code}" is not a currency code`);
			}
			if (!Number.isFinite(rate) || rate <= 0) {
				fail(`rate for ${code} must be a positive finite number`);
			}
		}
	}

	if (
		options.maxImportRows !== undefined &&
		(!Number.isInteger(options.maxImportRows) || options.maxImportRows <= 0)
	) {
		fail("'maxImportRows' must be a positive integer");
	}
}

function fromEnv(env: Record<string, string | undefined>): LedgerOptions {
	const read = (key: string): string | undefined => {
		const value = env[`${ENV_PREFIX}${key}`]?.trim();
		return value ? value : undefined;
	};

	const storage = read("STORAGE");
	if (storage !== undefined && !isStorageKind(storage)) {
		fail(`${ENV_PREFIX}STORAGE must be "json" or "sqlite", got "${storage}"`);
	}

	return {
		storage,
		jsonPath: read("JSON_PATH"),
		sqlitePath: read("SQLITE_PATH"),
		schemaPath: read("SCHEMA_PATH"),
		baseCurrency: read("BASE_CURRENCY")?.toUpperCase(),
	};
}

/**
 * Merge explicit options over `POCKET_LEDGER_*` environment variables over
 * the defaults, then validate the result.
 */
export function resolveLedgerOptions(
	overrides: LedgerOptions = {},
	env: Record<string, string | undefined> = process.env,
): ResolvedLedgerOptions {
	validateConfig(overrides);
	const fromEnvironment = fromEnv(env);

	const resolved: ResolvedLedgerOptions = {
		storage: overrides.storage ?? fromEnvironment.storage ?? "sqlite",
		jsonPath: overrides.jsonPath ?? fromEnvironment.jsonPath ?? DEFAULT_JSON_PATH,
		sqlitePath: overrides.sqlitePath ?? fromEnvironment.sqlitePath ?? DEFAULT_SQLITE_PATH,
		schemaPath: overrides.schemaPath ?? fromEnvironment.schemaPath ?? DEFAULT_SCHEMA_PATH,
		baseCurrency: overrides.baseCurrency ?? fromEnvironment.baseCurrency ?? DEFAULT_BASE_CURRENCY,
		rates: { ...(overrides.rates ?? DEFAULT_RATES) },
		maxImportRows: overrides.maxImportRows ?? DEFAULT_MAX_IMPORT_ROWS,
		logger: overrides.logger,
	};
	validateConfig(resolved);
	return resolved;
}

/**
 * Identity function for config files, with autocomplete support.
 * Validates at runtime before returning.
 *
 * @example
 * ```ts
 * import { defineLedgerConfig } from "@pocket-ledger/ledger/config";
 *
 * export default defineLedgerConfig({
 *   storage: "sqlite",
 *   sqlitePath: "./finance.db",
 * });
 * ```
 */
export function defineLedgerConfig(options: LedgerOptions): LedgerOptions {
	validateConfig(options);
	return options;
}
