#!/usr/bin/env node
import "dotenv/config";
import { readFileSync } from "node:fs";
import { isPlainObject } from "@pocket-ledger/core";
import { CommanderError } from "commander";
import pc from "picocolors";
import { createProgram } from "./program.js";

process.on("SIGINT", () => process.exit(0));
process.on("SIGTERM", () => process.exit(0));

const FALLBACK_VERSION = "0.1.0";

function readVersion(): string {
	try {
		const pkg: unknown = JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"));
		return isPlainObject(pkg) && typeof pkg.version === "string" ? pkg.version : FALLBACK_VERSION;
	} catch {
		return FALLBACK_VERSION;
	}
}

const program = createProgram(readVersion());
program.exitOverride();

try {
	await program.parseAsync();
} catch (error) {
	// Commander has already printed its own output.
	if (error instanceof CommanderError) {
		process.exit(error.exitCode);
	}
	const message = error instanceof Error ? error.message : String(error);
	console.error(pc.red(message));
	process.exit(1);
}
