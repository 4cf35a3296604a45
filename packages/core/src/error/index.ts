import { type ErrorKind, LEDGER_ERROR_CODES, type LedgerErrorCode } from "./codes.js";

export { type ErrorKind, LEDGER_ERROR_CODES, type LedgerErrorCode, type RawErrorCode } from "./codes.js";

export class LedgerError extends Error {
	readonly code: LedgerErrorCode;
	readonly kind: ErrorKind;
	readonly details?: Record<string, unknown>;

	constructor(
		code: LedgerErrorCode,
		message?: string,
		options?: {
			cause?: unknown;
			details?: Record<string, unknown>;
		},
	) {
		const raw = LEDGER_ERROR_CODES[code];
		super(message ?? raw.message, { cause: options?.cause });
		this.code = code;
		this.kind = raw.kind;
		this.details = options?.details;
		this.name = "LedgerError";
	}

	/** Narrow an unknown thrown value, optionally to one code. */
	static is(error: unknown, code?: LedgerErrorCode): error is LedgerError {
		return error instanceof LedgerError && (code === undefined || error.code === code);
	}

	// --- Validation ---

	static invalidArgument(message = "Invalid argument", cause?: unknown) {
		return new LedgerError("INVALID_ARGUMENT", message, { cause });
	}

	static unsupportedCurrency(currency: string) {
		return new LedgerError("UNSUPPORTED_CURRENCY", `Unsupported currency: ${currency}`, {
			details: { currency },
		});
	}

	// --- Integrity ---

	static danglingTransferLink(message: string, details?: Record<string, unknown>) {
		return new LedgerError("DANGLING_TRANSFER_LINK", message, { details });
	}

	static brokenTransferPair(message: string, details?: Record<string, unknown>) {
		return new LedgerError("BROKEN_TRANSFER_PAIR", message, { details });
	}

	static storageCorrupt(message: string, cause?: unknown) {
		return new LedgerError("STORAGE_CORRUPT", message, { cause });
	}

	// --- Domain ---

	static notFound(message = "Resource not found", cause?: unknown) {
		return new LedgerError("NOT_FOUND", message, { cause });
	}

	static domainRule(message: string, details?: Record<string, unknown>) {
		return new LedgerError("DOMAIN_RULE_VIOLATION", message, { details });
	}

	static insufficientFunds(message = "Insufficient funds", details?: Record<string, unknown>) {
		return new LedgerError("INSUFFICIENT_FUNDS", message, { details });
	}

	// --- Migration ---

	static migrationFailed(message: string, cause?: unknown) {
		return new LedgerError("MIGRATION_FAILED", message, { cause });
	}

	static bootstrapFailed(message: string, cause?: unknown) {
		return new LedgerError("BOOTSTRAP_FAILED", message, { cause });
	}

	static internal(message = "Internal error", cause?: unknown) {
		return new LedgerError("INTERNAL", message, { cause });
	}
}
