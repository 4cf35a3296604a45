// =============================================================================
// RECORDS -- construction and pure updates
// =============================================================================
// Every record goes through `buildBase` so stores, the importer and the use
// cases all apply the same checks. Values are frozen; an "update" returns a
// new record with the same id.

import { LedgerError } from "../error/index.js";
import type {
	ExpenseRecord,
	IncomeRecord,
	LedgerRecord,
	MandatoryExpenseRecord,
	MandatoryPeriod,
	RecordType,
} from "../types/record.js";
import { parseYmd } from "../utils/date.js";
import { computeRate, DEFAULT_BASE_CURRENCY } from "../utils/money.js";
import {
	ensureFiniteAmount,
	ensureNonBlank,
	ensurePositiveId,
	ensureValidPeriod,
	normalizeCurrency,
} from "../utils/validate.js";
import { SYSTEM_WALLET_ID } from "./wallet.js";

export interface RecordInput {
	/** Omit (or 0) to let the store assign one. */
	id?: number;
	date: string;
	walletId?: number;
	transferId?: number | null;
	commissionForTransferId?: number | null;
	amountOriginal: number;
	currency: string;
	/** Only stored or imported rates are passed in; otherwise derived. */
	rateAtOperation?: number;
	/** Defaults to `amountOriginal` when the currency is the base currency. */
	amountKzt?: number;
	category: string;
	description?: string;
}

export interface MandatoryExpenseInput extends RecordInput {
	period: MandatoryPeriod | string;
}

export interface RecordOptions {
	baseCurrency?: string;
	/** Mandatory templates may be undated. */
	allowEmptyDate?: boolean;
}

type RecordBaseFields = Omit<LedgerRecord, "type" | "period">;

function optionalId(value: number | null | undefined, field: string): number | null {
	if (value === undefined || value === null) return null;
	return ensurePositiveId(value, field);
}

function buildBase(input: RecordInput, options: RecordOptions = {}): RecordBaseFields {
	const baseCurrency = options.baseCurrency ?? DEFAULT_BASE_CURRENCY;

	const date = input.date.trim();
	if (date.length > 0 || !options.allowEmptyDate) {
		parseYmd(date);
	}

	const id = input.id ?? 0;
	if (!Number.isInteger(id) || id < 0) {
		throw LedgerError.invalidArgument("Record id must be a non-negative integer");
	}

	const amountOriginal = ensureFiniteAmount(input.amountOriginal, "amountOriginal");
	if (amountOriginal < 0) {
		throw LedgerError.invalidArgument("amountOriginal must be non-negative");
	}

	const currency = normalizeCurrency(input.currency);
	let amountKzt: number;
	if (input.amountKzt !== undefined) {
		amountKzt = Math.abs(ensureFiniteAmount(input.amountKzt, "amountKzt"));
	} else if (currency === baseCurrency) {
		amountKzt = amountOriginal;
	} else {
		throw LedgerError.invalidArgument(`amountKzt is required for currency ${currency}`);
	}

	const rateAtOperation =
		input.rateAtOperation ?? computeRate(amountOriginal, amountKzt, currency, baseCurrency);
	if (!Number.isFinite(rateAtOperation) || rateAtOperation <= 0) {
		throw LedgerError.invalidArgument("rateAtOperation must be positive");
	}

	const transferId = optionalId(input.transferId, "transferId");
	const commissionForTransferId = optionalId(
		input.commissionForTransferId,
		"commissionForTransferId",
	);
	if (transferId !== null && commissionForTransferId !== null) {
		throw LedgerError.invalidArgument(
			"A transfer leg cannot also be a commission record",
		);
	}

	return {
		id,
		date,
		walletId: ensurePositiveId(input.walletId ?? SYSTEM_WALLET_ID, "walletId"),
		transferId,
		commissionForTransferId,
		amountOriginal,
		currency,
		rateAtOperation,
		amountKzt,
		category: ensureNonBlank(input.category, "category"),
		description: input.description ?? "",
	};
}

export function createIncomeRecord(input: RecordInput, options?: RecordOptions): IncomeRecord {
	return Object.freeze({ ...buildBase(input, options), type: "income" });
}

export function createExpenseRecord(input: RecordInput, options?: RecordOptions): ExpenseRecord {
	return Object.freeze({ ...buildBase(input, options), type: "expense" });
}

export function createMandatoryExpense(
	input: MandatoryExpenseInput,
	options?: RecordOptions,
): MandatoryExpenseRecord {
	if (input.transferId !== undefined && input.transferId !== null) {
		throw LedgerError.invalidArgument("Mandatory expenses cannot be transfer legs");
	}
	return Object.freeze({
		...buildBase(input, options),
		type: "mandatory_expense",
		period: ensureValidPeriod(input.period),
	});
}

export function createRecord(
	type: RecordType,
	input: RecordInput & { period?: string },
	options?: RecordOptions,
): LedgerRecord {
	switch (type) {
		case "income":
			return createIncomeRecord(input, options);
		case "expense":
			return createExpenseRecord(input, options);
		case "mandatory_expense":
			return createMandatoryExpense({ ...input, period: input.period ?? "monthly" }, options);
	}
}

export function withRecordId<T extends LedgerRecord>(record: T, id: number): T {
	const next: T = { ...record, id: ensurePositiveId(id, "Record id") };
	Object.freeze(next);
	return next;
}

/**
 * New value with a corrected base amount. The rate is re-derived from the
 * original amount so the rate property keeps holding.
 */
export function withAmountKzt<T extends LedgerRecord>(
	record: T,
	amountKzt: number,
	baseCurrency: string = DEFAULT_BASE_CURRENCY,
): T {
	const next = Math.abs(ensureFiniteAmount(amountKzt, "amountKzt"));
	const amountOriginal = record.currency === baseCurrency ? next : record.amountOriginal;
	const updated: T = {
		...record,
		amountOriginal,
		amountKzt: next,
		rateAtOperation: computeRate(amountOriginal, next, record.currency, baseCurrency),
	};
	Object.freeze(updated);
	return updated;
}

/** Turn an undated template into a dated record for the records collection. */
export function materializeMandatoryExpense(
	template: MandatoryExpenseRecord,
	date: string,
	walletId: number = template.walletId,
): MandatoryExpenseRecord {
	parseYmd(date);
	return Object.freeze({
		...template,
		id: 0,
		date,
		walletId: ensurePositiveId(walletId, "walletId"),
		transferId: null,
		commissionForTransferId: null,
	});
}
