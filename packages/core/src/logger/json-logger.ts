// =============================================================================
// JSON LOGGER -- one JSON object per line
// =============================================================================

import type { LedgerLogger, LogLevel } from "../types/logger.js";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
	debug: 0,
	info: 1,
	warn: 2,
	error: 3,
};

export interface JsonLoggerOptions {
	/** Minimum log level to emit. Default: `"info"` */
	level?: LogLevel;
	/** Service name for structured output. Default: `"pocket-ledger"` */
	service?: string;
	/** Line sink. Default: `process.stdout` */
	write?: (line: string) => void;
}

export function createJsonLogger(options: JsonLoggerOptions = {}): LedgerLogger {
	const { level = "info", service = "pocket-ledger" } = options;
	const minPriority = LEVEL_PRIORITY[level];
	const write = options.write ?? ((line: string) => process.stdout.write(`${line}\n`));

	function emit(lvl: LogLevel, message: string, data?: Record<string, unknown>) {
		if (LEVEL_PRIORITY[lvl] < minPriority) return;

		const entry: Record<string, unknown> = {
			timestamp: new Date().toISOString(),
			level: lvl,
			service,
			message,
			...data,
		};
		write(JSON.stringify(entry));
	}

	return {
		debug: (message, data) => emit("debug", message, data),
		info: (message, data) => emit("info", message, data),
		warn: (message, data) => emit("warn", message, data),
		error: (message, data) => emit("error", message, data),
	};
}
