import * as p from "@clack/prompts";
import { createConsoleLogger, LedgerError, type LedgerLogger } from "@pocket-ledger/core";
import { type MigrationReport, runDryRun, runMigration } from "@pocket-ledger/ledger/migration";
import { Command } from "commander";
import pc from "picocolors";
import { type GlobalFlags, type PathFlags, resolveCliOptions } from "../utils/resolve-options.js";

export interface MigrateOptions {
	jsonPath: string;
	sqlitePath: string;
	schemaPath: string;
	dryRun: boolean;
	baseCurrency?: string;
	logger?: LedgerLogger;
}

function describeReport(report: MigrationReport): string {
	const { wallets, records, transfers, mandatoryExpenses } =
		report.status === "migrated" ? report.inserted : report.source;
	const counts = `${wallets} wallets, ${records} records, ${transfers} transfers, ${mandatoryExpenses} mandatory expenses`;

	switch (report.status) {
		case "dry_run":
			return `Dry run passed: ${counts} would be migrated`;
		case "noop":
			return `Target already holds the source data (${counts}), nothing to do`;
		case "migrated":
			return `Migrated ${counts}`;
	}
}

/**
 * Run one migration (or dry run) and map the outcome to an exit code:
 * 0 for migrated, no-op and a passing dry run; 1 for any failure.
 */
export async function runMigrate(options: MigrateOptions): Promise<number> {
	const run = options.dryRun ? runDryRun : runMigration;
	try {
		const report = await run({
			jsonPath: options.jsonPath,
			sqlitePath: options.sqlitePath,
			schemaPath: options.schemaPath,
			baseCurrency: options.baseCurrency,
			logger: options.logger,
		});
		p.log.success(describeReport(report));
		return 0;
	} catch (error) {
		if (!LedgerError.is(error)) throw error;
		p.log.error(pc.red(error.message));
		return 1;
	}
}

interface MigrateFlags extends PathFlags {
	dryRun: boolean;
	verbose: boolean;
}

export const migrateCommand = new Command("migrate")
	.description("Copy the JSON document into an empty SQLite database")
	.option("--json-path <path>", "Source JSON document (default: data.json)")
	.option("--sqlite-path <path>", "Target SQLite database (default: finance.db)")
	.option("--schema-path <path>", "Schema applied to the target")
	.option("--dry-run", "Validate the source and the schema without writing", false)
	.option("--verbose", "Log every migration step", false)
	.action(async (flags: MigrateFlags) => {
		const globals = migrateCommand.parent?.opts<GlobalFlags>() ?? {};
		const { options, configFile } = await resolveCliOptions(globals, flags);

		p.intro(pc.bgCyan(pc.black(flags.dryRun ? " pocket-ledger migrate --dry-run " : " pocket-ledger migrate ")));
		if (configFile) {
			p.log.info(`Config:  ${pc.dim(configFile)}`);
		}
		p.log.info(`Source:  ${pc.cyan(options.jsonPath)}`);
		p.log.info(`Target:  ${pc.cyan(options.sqlitePath)}`);

		const code = await runMigrate({
			jsonPath: options.jsonPath,
			sqlitePath: options.sqlitePath,
			schemaPath: options.schemaPath,
			dryRun: flags.dryRun,
			baseCurrency: options.baseCurrency,
			logger: createConsoleLogger({ prefix: "migrate", level: flags.verbose ? "debug" : "warn" }),
		});

		p.outro(code === 0 ? pc.green("Done") : pc.red("Migration failed, the target was left unchanged"));
		process.exitCode = code;
	});
