// =============================================================================
// TYPED ERROR CODES
// =============================================================================
// Registry of every failure the ledger can raise, with a default message and
// the category it belongs to. Row-level import problems are plain strings and
// never appear here.

export type ErrorKind =
	| "validation"
	| "integrity"
	| "domain"
	| "funds"
	| "migration"
	| "internal";

export type RawErrorCode = {
	message: string;
	kind: ErrorKind;
};

export const LEDGER_ERROR_CODES = {
	// Bad input: dates, currencies, periods, amounts, ids, config.
	INVALID_ARGUMENT: { message: "Invalid argument", kind: "validation" },
	UNSUPPORTED_CURRENCY: { message: "Unsupported currency", kind: "validation" },
	IMPORT_ROW_LIMIT: { message: "Import exceeds the maximum row count", kind: "validation" },
	IMPORT_REJECTED: { message: "Import aborted: invalid rows", kind: "validation" },

	// Dataset consistency. Load paths refuse to return data that fails these.
	DANGLING_TRANSFER_LINK: {
		message: "Record references a transfer that does not exist",
		kind: "integrity",
	},
	BROKEN_TRANSFER_PAIR: {
		message: "Transfer must have exactly one income and one expense record",
		kind: "integrity",
	},
	STORAGE_CORRUPT: { message: "Stored document is unreadable", kind: "integrity" },

	// Business rules.
	NOT_FOUND: { message: "Resource not found", kind: "domain" },
	DOMAIN_RULE_VIOLATION: { message: "Operation not allowed", kind: "domain" },
	INSUFFICIENT_FUNDS: { message: "Insufficient funds", kind: "funds" },

	// Store-to-store moves. Always paired with a full rollback.
	MIGRATION_FAILED: { message: "Migration failed", kind: "migration" },
	BOOTSTRAP_FAILED: { message: "Storage bootstrap failed", kind: "migration" },

	INTERNAL: { message: "Internal error", kind: "internal" },
} as const satisfies Record<string, RawErrorCode>;

export type LedgerErrorCode = keyof typeof LEDGER_ERROR_CODES;
