// =============================================================================
// IMPORT ROW PARSER -- one flat row into a record, transfer or balance
// =============================================================================
// Rows come from spreadsheets and exports: keys in any case, numbers as
// strings with thousands separators, blanks meaning "missing". Problems with
// a single row are returned as a message, never thrown, so a batch can
// report every bad row at once.

import {
	checkTransferIntegrity,
	createExpenseRecord,
	createIncomeRecord,
	createRecord,
	createTransfer,
	DEFAULT_BASE_CURRENCY,
	type ExpenseRecord,
	type IncomeRecord,
	isMandatoryPeriod,
	type LedgerRecord,
	parseYmd,
	type RateProvider,
	type RecordType,
	SYSTEM_WALLET_ID,
	type Transfer,
} from "@pocket-ledger/core";

export type ImportPolicy = "full_backup" | "current_rate" | "legacy";

/** A row as read from a sheet or produced by `exportRows`. */
export type ImportRow = Readonly<Record<string, string | number | null | undefined>>;

export interface ParseRowOptions {
	policy: ImportPolicy;
	/** Required by the `current_rate` policy. */
	rates?: RateProvider;
	/** Prefix for error messages. Default: `"row"` */
	rowLabel?: string;
	/** Parse every row as a mandatory expense template; the date becomes optional. */
	mandatoryOnly?: boolean;
	/** Default: `"KZT"` */
	baseCurrency?: string;
}

export type ParsedRow =
	| { kind: "record"; record: LedgerRecord }
	| { kind: "initial_balance"; balance: number }
	| { kind: "error"; message: string };

export interface ParseTransferOptions extends ParseRowOptions {
	/** Id for a row without `transfer_id`. */
	nextTransferId: number;
	/** When given, both wallets must be in the set. */
	walletIds?: ReadonlySet<number>;
}

export type ParsedTransfer =
	| {
			kind: "transfer";
			transfer: Transfer;
			legs: [ExpenseRecord, IncomeRecord];
			nextTransferId: number;
	  }
	| { kind: "error"; message: string; nextTransferId: number };

// =============================================================================
// FIELD HELPERS
// =============================================================================

type NormalizedRow = ReadonlyMap<string, string>;

const MANDATORY_ALIASES = new Set([
	"mandatory",
	"mandatory_expense",
	"mandatory-expense",
	"mandatoryexpense",
	"mandatory_expenses",
]);

export function normalizeKey(key: string): string {
	return key.trim().toLowerCase().replace(/\s+/g, "_");
}

export function normalizeRow(row: ImportRow): NormalizedRow {
	const normalized = new Map<string, string>();
	for (const [key, value] of Object.entries(row)) {
		normalized.set(normalizeKey(key), value === null || value === undefined ? "" : String(value).trim());
	}
	return normalized;
}

export function isBlankRow(row: ImportRow): boolean {
	return [...normalizeRow(row).values()].every((value) => value === "");
}

/** `"1,250.50"` and `"(40)"` (negative) are accepted. Blank or garbage gives undefined. */
export function parseAmount(raw: string | undefined): number | undefined {
	if (raw === undefined) return undefined;
	let text = raw.trim().replace(/,/g, "");
	if (text === "") return undefined;
	if (text.startsWith("(") && text.endsWith(")")) {
		text = `-${text.slice(1, -1).trim()}`;
	}
	const value = Number(text);
	return Number.isFinite(value) ? value : undefined;
}

/** Row `type` into a record type, `"transfer"`, `"initial_balance"` or the raw value. */
export function normalizeRowType(raw: string): string {
	const value = normalizeKey(raw);
	return MANDATORY_ALIASES.has(value) ? "mandatory_expense" : value;
}

function isRecordType(value: string): value is RecordType {
	return value === "income" || value === "expense" || value === "mandatory_expense";
}

function field(row: NormalizedRow, key: string): string {
	return row.get(key) ?? "";
}

function messageOf(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/** Blank is null, a positive integer is itself, anything else is an error. */
function optionalId(row: NormalizedRow, key: string): number | null | { error: string } {
	const raw = field(row, key);
	if (raw === "") return null;
	const value = parseAmount(raw);
	if (value === undefined || !Number.isInteger(value) || value <= 0) {
		return { error: `invalid ${key} '${raw}'` };
	}
	return value;
}

interface Amounts {
	amountOriginal: number;
	currency: string;
	rateAtOperation: number;
	amountKzt: number;
}

/**
 * Apply the import policy to a row's money fields. Returns the error text
 * (without the row label) when the fields do not satisfy the policy.
 */
function resolveAmounts(
	row: NormalizedRow,
	options: ParseRowOptions,
	baseCurrency: string,
): Amounts | string {
	if (options.policy === "legacy") {
		const amount = parseAmount(field(row, "amount"));
		if (amount === undefined) return "invalid amount";
		return {
			amountOriginal: Math.abs(amount),
			currency: baseCurrency,
			rateAtOperation: 1,
			amountKzt: Math.abs(amount),
		};
	}

	const amountOriginal = parseAmount(field(row, "amount_original"));
	if (amountOriginal === undefined) return "invalid amount_original";

	const rawCurrency = field(row, "currency");
	const currency = (rawCurrency || baseCurrency).toUpperCase();
	if (!/^[A-Z]{3}$/.test(currency)) return `invalid currency '${rawCurrency}'`;

	let rateAtOperation = parseAmount(field(row, "rate_at_operation"));
	let amountKzt = parseAmount(field(row, "amount_kzt"));

	if (options.policy === "current_rate") {
		if (!options.rates) return "current-rate policy requires currency service";
		try {
			rateAtOperation = options.rates.getRate(currency);
			amountKzt = amountOriginal * rateAtOperation;
		} catch (error) {
			return `failed to get current rate for ${currency} (${messageOf(error)})`;
		}
	}

	if (rateAtOperation === undefined) return "missing required field 'rate_at_operation'";
	if (amountKzt === undefined) return "missing required field 'amount_kzt'";
	return { amountOriginal, currency, rateAtOperation, amountKzt };
}

// =============================================================================
// RECORD ROWS
// =============================================================================

export function parseImportRow(row: ImportRow, options: ParseRowOptions): ParsedRow {
	const label = options.rowLabel ?? "row";
	const baseCurrency = options.baseCurrency ?? DEFAULT_BASE_CURRENCY;
	const fail = (message: string): ParsedRow => ({ kind: "error", message: `${label}: ${message}` });

	const values = normalizeRow(row);
	const rawType = field(values, "type");
	const rowType = normalizeRowType(rawType);

	if (rowType === "initial_balance") {
		const balance =
			parseAmount(field(values, "amount_original")) ??
			parseAmount(field(values, "amount_kzt")) ??
			parseAmount(field(values, "amount")) ??
			0;
		return { kind: "initial_balance", balance };
	}

	const required = ["category", "type"];
	if (!options.mandatoryOnly) required.push("date");
	if (options.policy === "legacy") {
		required.push("amount");
	} else {
		required.push("amount_original", "currency");
	}
	const missing = required.find((key) => field(values, key) === "");
	if (missing) return fail(`missing required field '${missing}'`);

	const date = field(values, "date");
	if (date !== "") {
		try {
			parseYmd(date);
		} catch (error) {
			return fail(`invalid date '${date}' (${messageOf(error)})`);
		}
	}

	const type = options.mandatoryOnly ? "mandatory_expense" : rowType;
	if (!isRecordType(type)) return fail(`unsupported type '${rawType}'`);

	const amounts = resolveAmounts(values, options, baseCurrency);
	if (typeof amounts === "string") return fail(amounts);
	if (amounts.amountOriginal < 0) return fail("amount_original must be non-negative");

	const period = (field(values, "period") || "monthly").toLowerCase();
	if (type === "mandatory_expense" && !isMandatoryPeriod(period)) {
		return fail(`invalid mandatory period '${period}'`);
	}

	const walletId = optionalId(values, "wallet_id");
	const transferId = optionalId(values, "transfer_id");
	const commissionFor = optionalId(values, "commission_for_transfer_id");
	for (const id of [walletId, transferId, commissionFor]) {
		if (id !== null && typeof id === "object") return fail(id.error);
	}

	try {
		const record = createRecord(
			type,
			{
				date,
				walletId: typeof walletId === "number" ? walletId : SYSTEM_WALLET_ID,
				transferId: typeof transferId === "number" ? transferId : null,
				commissionForTransferId: typeof commissionFor === "number" ? commissionFor : null,
				amountOriginal: amounts.amountOriginal,
				currency: amounts.currency,
				rateAtOperation: amounts.rateAtOperation,
				// Expenses are stored unsigned; the factories take the absolute value.
				amountKzt: amounts.amountKzt,
				category: field(values, "category"),
				description: field(values, "description"),
				period,
			},
			{ baseCurrency, allowEmptyDate: options.mandatoryOnly },
		);
		return { kind: "record", record };
	} catch (error) {
		return fail(`invalid record (${messageOf(error)})`);
	}
}

// =============================================================================
// TRANSFER ROWS
// =============================================================================

/**
 * Expand a compact `transfer` row into the transfer and its two legs.
 * The counter in the result is advanced only when the row had no id.
 */
export function parseTransferRow(row: ImportRow, options: ParseTransferOptions): ParsedTransfer {
	const label = options.rowLabel ?? "row";
	const baseCurrency = options.baseCurrency ?? DEFAULT_BASE_CURRENCY;
	let nextTransferId = options.nextTransferId;
	const fail = (message: string): ParsedTransfer => ({
		kind: "error",
		message: `${label}: ${message}`,
		nextTransferId,
	});

	const values = normalizeRow(row);
	const date = field(values, "date");
	if (date === "") return fail("missing required field 'date'");
	try {
		parseYmd(date);
	} catch (error) {
		return fail(`invalid date '${date}' (${messageOf(error)})`);
	}

	const fromWalletId = parseAmount(field(values, "from_wallet_id")) ?? 0;
	const toWalletId = parseAmount(field(values, "to_wallet_id")) ?? 0;
	if (
		!Number.isInteger(fromWalletId) ||
		!Number.isInteger(toWalletId) ||
		fromWalletId <= 0 ||
		toWalletId <= 0
	) {
		return fail("invalid transfer wallets (from_wallet_id/to_wallet_id)");
	}
	if (fromWalletId === toWalletId) return fail("transfer wallets must be different");
	if (options.walletIds) {
		for (const walletId of [fromWalletId, toWalletId]) {
			if (!options.walletIds.has(walletId)) return fail(`wallet not found (${walletId})`);
		}
	}

	const amounts = resolveAmounts(values, options, baseCurrency);
	if (typeof amounts === "string") return fail(amounts);

	const rowId = optionalId(values, "transfer_id");
	if (rowId !== null && typeof rowId === "object") return fail(rowId.error);
	let transferId: number;
	if (rowId === null) {
		transferId = nextTransferId;
		nextTransferId += 1;
	} else {
		transferId = rowId;
	}

	const description = field(values, "description");
	const category = field(values, "category") || "Transfer";

	try {
		const transfer = createTransfer(
			{
				id: transferId,
				fromWalletId,
				toWalletId,
				date,
				amountOriginal: Math.abs(amounts.amountOriginal),
				currency: amounts.currency,
				rateAtOperation: amounts.rateAtOperation,
				amountKzt: Math.abs(amounts.amountKzt),
				description,
			},
			baseCurrency,
		);
		const legFields = {
			date,
			transferId: transfer.id,
			amountOriginal: transfer.amountOriginal,
			currency: transfer.currency,
			rateAtOperation: transfer.rateAtOperation,
			amountKzt: transfer.amountKzt,
			category,
			description,
		};
		const legs: [ExpenseRecord, IncomeRecord] = [
			createExpenseRecord({ ...legFields, walletId: fromWalletId }, { baseCurrency }),
			createIncomeRecord({ ...legFields, walletId: toWalletId }, { baseCurrency }),
		];

		const integrity = checkTransferIntegrity(legs, [transfer]);
		if (!integrity.ok) return fail(integrity.error.message);

		return { kind: "transfer", transfer, legs, nextTransferId };
	} catch (error) {
		return fail(`invalid transfer (${messageOf(error)})`);
	}
}
