import { Command } from "commander";
import pc from "picocolors";
import { migrateCommand } from "./commands/migrate.js";
import { statusCommand } from "./commands/status.js";

export function createProgram(version: string): Command {
	const banner = `
  ${pc.bold(pc.cyan("pocket-ledger"))} ${pc.dim(`v${version}`)}
  ${pc.dim("Personal finance ledger on JSON and SQLite")}
`;

	const program = new Command()
		.name("pocket-ledger")
		.description("CLI for pocket-ledger: migrate and inspect ledger storage")
		.version(version, "-v, --version")
		.option("--cwd <dir>", "Working directory", process.cwd())
		.option("-c, --config <path>", "Path to a pocket-ledger config file")
		.action(() => {
			console.log(banner);
			program.help();
		});

	program.addCommand(migrateCommand);
	program.addCommand(statusCommand);
	return program;
}
