import { isAbsolute, resolve } from "node:path";
import {
	type LedgerOptions,
	type ResolvedLedgerOptions,
	resolveLedgerOptions,
} from "@pocket-ledger/ledger/config";
import { getConfig } from "./get-config.js";

/** Options every command inherits from the root program. */
export interface GlobalFlags {
	cwd?: string;
	config?: string;
}

export interface PathFlags {
	jsonPath?: string;
	sqlitePath?: string;
	schemaPath?: string;
}

export interface CliOptions {
	options: ResolvedLedgerOptions;
	configFile: string | null;
}

/**
 * Flags over the config file over `POCKET_LEDGER_*` variables over the
 * defaults. Relative paths are taken from `cwd`.
 */
export async function resolveCliOptions(
	globals: GlobalFlags,
	flags: PathFlags,
	env: Record<string, string | undefined> = process.env,
): Promise<CliOptions> {
	const cwd = globals.cwd ?? process.cwd();
	const loaded = await getConfig({ cwd, configPath: globals.config });

	const overrides: LedgerOptions = { ...loaded?.options };
	if (flags.jsonPath) overrides.jsonPath = flags.jsonPath;
	if (flags.sqlitePath) overrides.sqlitePath = flags.sqlitePath;
	if (flags.schemaPath) overrides.schemaPath = flags.schemaPath;

	const resolved = resolveLedgerOptions(overrides, env);
	const fromCwd = (path: string) => (isAbsolute(path) ? path : resolve(cwd, path));

	return {
		options: {
			...resolved,
			jsonPath: fromCwd(resolved.jsonPath),
			sqlitePath: fromCwd(resolved.sqlitePath),
			schemaPath: fromCwd(resolved.schemaPath),
		},
		configFile: loaded?.configFile ?? null,
	};
}
