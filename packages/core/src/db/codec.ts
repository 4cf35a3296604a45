// =============================================================================
// CODEC -- domain values <-> wire rows
// =============================================================================
// Decoding runs every row back through the domain factories, so a document
// edited by hand is held to the same rules as data created through the API.
// Any failure is reported as STORAGE_CORRUPT with the row's position.

import { createRecord, createMandatoryExpense } from "../domain/record.js";
import { createTransfer } from "../domain/transfer.js";
import { createWallet } from "../domain/wallet.js";
import { LedgerError } from "../error/index.js";
import type { LedgerDataset } from "../types/dataset.js";
import type { LedgerRecord, MandatoryExpenseRecord, RecordType } from "../types/record.js";
import type { Transfer } from "../types/transfer.js";
import type { Wallet } from "../types/wallet.js";
import type {
	LedgerDocument,
	RawMandatoryExpense,
	RawRecord,
	RawTransfer,
	RawWallet,
} from "./raw-types.js";

export interface DecodeOptions {
	baseCurrency?: string;
}

// =============================================================================
// FIELD READERS
// =============================================================================

export function isPlainObject(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readNumber(row: Record<string, unknown>, key: string, fallback?: number): number {
	const value = row[key];
	if (typeof value === "number") return value;
	if (typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value))) {
		return Number(value);
	}
	if ((value === undefined || value === null) && fallback !== undefined) return fallback;
	throw LedgerError.invalidArgument(`field '${key}' must be a number`);
}

function readOptionalId(row: Record<string, unknown>, key: string): number | null {
	const value = row[key];
	if (value === undefined || value === null || value === "") return null;
	return readNumber(row, key);
}

function readString(row: Record<string, unknown>, key: string, fallback?: string): string {
	const value = row[key];
	if (typeof value === "string") return value;
	if ((value === undefined || value === null) && fallback !== undefined) return fallback;
	throw LedgerError.invalidArgument(`field '${key}' must be a string`);
}

function readBoolean(row: Record<string, unknown>, key: string, fallback: boolean): boolean {
	const value = row[key];
	if (typeof value === "boolean") return value;
	if (value === 0 || value === 1) return value === 1;
	if (value === undefined || value === null) return fallback;
	throw LedgerError.invalidArgument(`field '${key}' must be a boolean`);
}

function readRecordType(row: Record<string, unknown>): RecordType {
	const value = row.type;
	if (value === "income" || value === "expense" || value === "mandatory_expense") {
		return value;
	}
	throw LedgerError.invalidArgument(`unsupported record type '${String(value)}'`);
}

function decodeAt<T>(where: string, value: unknown, decode: (row: Record<string, unknown>) => T): T {
	if (!isPlainObject(value)) {
		throw LedgerError.storageCorrupt(`${where}: expected an object`);
	}
	try {
		return decode(value);
	} catch (error) {
		if (error instanceof LedgerError) {
			throw LedgerError.storageCorrupt(`${where}: ${error.message}`, error);
		}
		throw error;
	}
}

// =============================================================================
// DECODE
// =============================================================================

export function decodeWallet(value: unknown, where = "wallet"): Wallet {
	return decodeAt(where, value, (row) =>
		createWallet({
			id: readNumber(row, "id"),
			name: readString(row, "name"),
			currency: readString(row, "currency"),
			initialBalance: readNumber(row, "initial_balance", 0),
			system: readBoolean(row, "system", false),
			allowNegative: readBoolean(row, "allow_negative", false),
			isActive: readBoolean(row, "is_active", true),
		}),
	);
}

export function decodeRecord(
	value: unknown,
	where = "record",
	options: DecodeOptions = {},
): LedgerRecord {
	return decodeAt(where, value, (row) =>
		createRecord(
			readRecordType(row),
			{
				id: readNumber(row, "id", 0),
				date: readString(row, "date"),
				walletId: readNumber(row, "wallet_id", 1),
				transferId: readOptionalId(row, "transfer_id"),
				commissionForTransferId: readOptionalId(row, "commission_for_transfer_id"),
				amountOriginal: readNumber(row, "amount_original"),
				currency: readString(row, "currency"),
				rateAtOperation: readNumber(row, "rate_at_operation"),
				amountKzt: readNumber(row, "amount_kzt"),
				category: readString(row, "category"),
				description: readString(row, "description", ""),
				period: readString(row, "period", "monthly"),
			},
			{ baseCurrency: options.baseCurrency },
		),
	);
}

export function decodeMandatoryExpense(
	value: unknown,
	where = "mandatory expense",
	options: DecodeOptions = {},
): MandatoryExpenseRecord {
	return decodeAt(where, value, (row) =>
		createMandatoryExpense(
			{
				id: readNumber(row, "id", 0),
				date: readString(row, "date", ""),
				walletId: readNumber(row, "wallet_id", 1),
				amountOriginal: readNumber(row, "amount_original"),
				currency: readString(row, "currency"),
				rateAtOperation: readNumber(row, "rate_at_operation"),
				amountKzt: readNumber(row, "amount_kzt"),
				category: readString(row, "category"),
				description: readString(row, "description", ""),
				period: readString(row, "period", "monthly"),
			},
			{ baseCurrency: options.baseCurrency, allowEmptyDate: true },
		),
	);
}

export function decodeTransfer(value: unknown, where = "transfer", options: DecodeOptions = {}): Transfer {
	return decodeAt(where, value, (row) =>
		createTransfer(
			{
				id: readNumber(row, "id"),
				fromWalletId: readNumber(row, "from_wallet_id"),
				toWalletId: readNumber(row, "to_wallet_id"),
				date: readString(row, "date"),
				amountOriginal: readNumber(row, "amount_original"),
				currency: readString(row, "currency"),
				rateAtOperation: readNumber(row, "rate_at_operation"),
				amountKzt: readNumber(row, "amount_kzt"),
				description: readString(row, "description", ""),
			},
			options.baseCurrency,
		),
	);
}

function readArray(doc: Record<string, unknown>, key: string): unknown[] {
	const value = doc[key];
	if (value === undefined || value === null) return [];
	if (!Array.isArray(value)) {
		throw LedgerError.storageCorrupt(`'${key}' must be an array`);
	}
	return value;
}

/** Decode a current-format document. Legacy shapes must be upgraded first. */
export function decodeDocument(value: unknown, options: DecodeOptions = {}): LedgerDataset {
	if (!isPlainObject(value)) {
		throw LedgerError.storageCorrupt("Document root must be an object");
	}
	return {
		wallets: readArray(value, "wallets").map((row, i) => decodeWallet(row, `wallets[${i}]`)),
		records: readArray(value, "records").map((row, i) =>
			decodeRecord(row, `records[${i}]`, options),
		),
		transfers: readArray(value, "transfers").map((row, i) =>
			decodeTransfer(row, `transfers[${i}]`, options),
		),
		mandatoryExpenses: readArray(value, "mandatory_expenses").map((row, i) =>
			decodeMandatoryExpense(row, `mandatory_expenses[${i}]`, options),
		),
	};
}

// =============================================================================
// ENCODE
// =============================================================================

export function encodeWallet(wallet: Wallet): RawWallet {
	return {
		id: wallet.id,
		name: wallet.name,
		currency: wallet.currency,
		initial_balance: wallet.initialBalance,
		system: wallet.system,
		allow_negative: wallet.allowNegative,
		is_active: wallet.isActive,
	};
}

export function encodeRecord(record: LedgerRecord): RawRecord {
	const raw: RawRecord = {
		id: record.id,
		type: record.type,
		date: record.date,
		wallet_id: record.walletId,
		transfer_id: record.transferId,
		commission_for_transfer_id: record.commissionForTransferId,
		amount_original: record.amountOriginal,
		currency: record.currency,
		rate_at_operation: record.rateAtOperation,
		amount_kzt: record.amountKzt,
		category: record.category,
		description: record.description,
	};
	if (record.type === "mandatory_expense") {
		raw.period = record.period;
	}
	return raw;
}

export function encodeMandatoryExpense(expense: MandatoryExpenseRecord): RawMandatoryExpense {
	return {
		id: expense.id,
		date: expense.date,
		wallet_id: expense.walletId,
		amount_original: expense.amountOriginal,
		currency: expense.currency,
		rate_at_operation: expense.rateAtOperation,
		amount_kzt: expense.amountKzt,
		category: expense.category,
		description: expense.description,
		period: expense.period,
	};
}

export function encodeTransfer(transfer: Transfer): RawTransfer {
	return {
		id: transfer.id,
		from_wallet_id: transfer.fromWalletId,
		to_wallet_id: transfer.toWalletId,
		date: transfer.date,
		amount_original: transfer.amountOriginal,
		currency: transfer.currency,
		rate_at_operation: transfer.rateAtOperation,
		amount_kzt: transfer.amountKzt,
		description: transfer.description,
	};
}

export function encodeDataset(dataset: LedgerDataset): LedgerDocument {
	return {
		wallets: dataset.wallets.map(encodeWallet),
		records: dataset.records.map(encodeRecord),
		transfers: dataset.transfers.map(encodeTransfer),
		mandatory_expenses: dataset.mandatoryExpenses.map(encodeMandatoryExpense),
	};
}
