// =============================================================================
// CONSOLE LOGGER -- LedgerLogger for terminals
// =============================================================================
// One line per entry: `[time] LEVEL [prefix] message key=value ...`. The
// data bag is flat (counts, ids, paths), so it is rendered inline instead of
// as a trailing object. Lines go to stderr and leave stdout to the command.

import pc from "picocolors";
import type { LedgerLogger, LogLevel } from "../types/logger.js";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

const LEVEL_COLOR: Record<LogLevel, (s: string) => string> = {
	debug: pc.magenta,
	info: pc.blue,
	warn: pc.yellow,
	error: pc.red,
};

export interface ConsoleLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Shown in brackets before each message. Default: `"ledger"` */
	prefix?: string;
	/** Prefix each line with the local `HH:MM:SS` time. Default: `false` */
	timestamps?: boolean;
	/** Line sink. Default: `console.error` */
	write?: (line: string) => void;
}

function pad2(value: number): string {
	return String(value).padStart(2, "0");
}

function clock(now: Date): string {
	return `${pad2(now.getHours())}:${pad2(now.getMinutes())}:${pad2(now.getSeconds())}`;
}

function formatValue(value: unknown): string {
	if (typeof value === "number") return pc.cyan(String(value));
	if (typeof value === "string") return /\s/.test(value) || value === "" ? JSON.stringify(value) : value;
	if (value === null || value === undefined) return pc.dim(String(value));
	if (Array.isArray(value)) return value.map(formatValue).join(",");
	return JSON.stringify(value);
}

/** `key=value` pairs in insertion order. */
function formatFields(data: Record<string, unknown>): string {
	return Object.entries(data)
		.map(([key, value]) => `${pc.dim(`${key}=`)}${formatValue(value)}`)
		.join(" ");
}

/**
 * @example
 * ```ts
 * const logger = createConsoleLogger({ level: "debug", prefix: "migrate" });
 * logger.info("Inserted wallets", { count: 2 });
 * // INFO  [migrate] Inserted wallets count=2
 * ```
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): LedgerLogger {
	const { level = "info", prefix = "ledger", timestamps = false } = options;
	const minPriority = LEVEL_PRIORITY[level];
	const write = options.write ?? ((line: string) => console.error(line));

	function emit(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
		if (LEVEL_PRIORITY[lvl] < minPriority) return;

		const parts: string[] = [];
		if (timestamps) {
			parts.push(pc.dim(clock(new Date())));
		}
		parts.push(LEVEL_COLOR[lvl](pc.bold(lvl.toUpperCase().padEnd(5))));
		parts.push(pc.dim(`[${prefix}]`));
		parts.push(lvl === "error" ? pc.red(message) : message);
		if (data && Object.keys(data).length > 0) {
			parts.push(formatFields(data));
		}
		write(parts.join(" "));
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	};
}
