import type { LedgerLogger } from "../types/logger.js";

export { type ConsoleLoggerOptions, createConsoleLogger } from "./console-logger.js";
export { createJsonLogger, type JsonLoggerOptions } from "./json-logger.js";

/** Discards everything. Handy as a default in tests. */
export const silentLogger: LedgerLogger = {
	debug: () => {},
	info: () => {},
	warn: () => {},
	error: () => {},
};
