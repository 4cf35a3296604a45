// Storage port and wire codec
export * from "./db/index.js";

// Domain values, factories and balances
export * from "./domain/index.js";

// Errors
export {
	type ErrorKind,
	LEDGER_ERROR_CODES,
	LedgerError,
	type LedgerErrorCode,
	type RawErrorCode,
} from "./error/index.js";

// Integrity
export * from "./integrity/index.js";

// Logging
export {
	type ConsoleLoggerOptions,
	createConsoleLogger,
	createJsonLogger,
	type JsonLoggerOptions,
	silentLogger,
} from "./logger/index.js";

// Type definitions
export * from "./types/index.js";

// Utilities
export * from "./utils/index.js";
