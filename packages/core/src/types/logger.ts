/**
 * Sink for operational messages. `data` is a flat bag of structured fields
 * (counts, ids, paths) rendered after the message.
 */
export interface LedgerLogger {
	debug(message: string, data?: Record<string, unknown>): void;
	info(message: string, data?: Record<string, unknown>): void;
	warn(message: string, data?: Record<string, unknown>): void;
	error(message: string, data?: Record<string, unknown>): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";
