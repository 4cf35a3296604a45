// =============================================================================
// DOCUMENT I/O -- reading, legacy upgrade and atomic writes
// =============================================================================
// A write never touches the target in place: the document is serialized to
// a temporary file in the same directory and renamed over the target, so a
// reader sees either the old or the new document. Two processes writing at
// once still race (last rename wins).

import { randomUUID } from "node:crypto";
import { mkdir, readFile, rename, rm, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import {
	computeRate,
	DEFAULT_BASE_CURRENCY,
	type DecodeOptions,
	decodeDocument,
	emptyDataset,
	isPlainObject,
	LedgerError,
	type LedgerDataset,
	type LedgerDocument,
	SYSTEM_WALLET_ID,
	SYSTEM_WALLET_NAME,
} from "@pocket-ledger/core";

const LEGACY_RECORD_TYPES = new Set(["income", "expense", "mandatory_expense"]);

export interface ReadResult {
	dataset: LedgerDataset;
	/** The file did not exist; `dataset` is empty. */
	missing: boolean;
	/** The file was in a legacy shape and was upgraded in memory. */
	upgraded: boolean;
	/** Legacy rows dropped because their type is unknown. */
	dropped: number;
}

export interface UpgradeResult {
	document: Record<string, unknown>;
	upgraded: boolean;
	dropped: number;
}

function toNumber(value: unknown): number | undefined {
	if (typeof value === "number") return value;
	if (typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value))) {
		return Number(value);
	}
	return undefined;
}

/**
 * Fill the fields current documents require from the old
 * `{type, date, amount, category}` row shape. Rows that already carry them
 * pass through unchanged.
 */
function upgradeLegacyRow(
	row: Record<string, unknown>,
	id: number,
	baseCurrency: string,
): Record<string, unknown> {
	const amount = toNumber(row.amount) ?? 0;
	const amountOriginal = toNumber(row.amount_original) ?? amount;
	const amountKzt = toNumber(row.amount_kzt) ?? amount;
	const currency = typeof row.currency === "string" && row.currency !== "" ? row.currency : baseCurrency;
	const { amount: _amount, ...rest } = row;
	return {
		...rest,
		id: toNumber(row.id) ?? id,
		wallet_id: toNumber(row.wallet_id) ?? SYSTEM_WALLET_ID,
		amount_original: amountOriginal,
		amount_kzt: amountKzt,
		currency,
		rate_at_operation:
			toNumber(row.rate_at_operation) ??
			computeRate(amountOriginal, amountKzt, currency.toUpperCase(), baseCurrency),
		category: typeof row.category === "string" && row.category.trim() !== "" ? row.category : "General",
		description: typeof row.description === "string" ? row.description : "",
	};
}

function upgradeLegacyRows(
	items: unknown,
	baseCurrency: string,
	typed: boolean,
): { rows: Record<string, unknown>[]; dropped: number } {
	if (!Array.isArray(items)) return { rows: [], dropped: 0 };

	const kept = items.filter(
		(item): item is Record<string, unknown> =>
			isPlainObject(item) && (!typed || LEGACY_RECORD_TYPES.has(String(item.type))),
	);
	let next =
		kept.reduce((max, row) => Math.max(max, toNumber(row.id) ?? 0), 0) + 1;
	const rows = kept.map((row) =>
		upgradeLegacyRow(row, toNumber(row.id) === undefined ? next++ : 0, baseCurrency),
	);
	return { rows, dropped: items.length - kept.length };
}

function legacySystemWallet(initialBalance: number, baseCurrency: string): Record<string, unknown> {
	return {
		id: SYSTEM_WALLET_ID,
		name: SYSTEM_WALLET_NAME,
		currency: baseCurrency,
		initial_balance: initialBalance,
		system: true,
		allow_negative: false,
		is_active: true,
	};
}

/**
 * Bring an old document up to the current shape:
 * - a bare array of records becomes the records of a one-wallet document;
 * - an object without `wallets` gets the system wallet, carrying the old
 *   top-level `initial_balance`.
 */
export function upgradeLegacyDocument(
	value: unknown,
	baseCurrency: string = DEFAULT_BASE_CURRENCY,
): UpgradeResult {
	if (Array.isArray(value)) {
		const { rows, dropped } = upgradeLegacyRows(value, baseCurrency, true);
		return {
			document: {
				wallets: [legacySystemWallet(0, baseCurrency)],
				records: rows,
				transfers: [],
				mandatory_expenses: [],
			},
			upgraded: true,
			dropped,
		};
	}

	if (!isPlainObject(value)) {
		throw LedgerError.storageCorrupt("Document root must be an object or an array");
	}
	if ("wallets" in value) {
		return { document: value, upgraded: false, dropped: 0 };
	}

	const records = upgradeLegacyRows(value.records, baseCurrency, true);
	const mandatory = upgradeLegacyRows(value.mandatory_expenses, baseCurrency, false);
	return {
		document: {
			wallets: [legacySystemWallet(toNumber(value.initial_balance) ?? 0, baseCurrency)],
			records: records.rows,
			transfers: Array.isArray(value.transfers) ? value.transfers : [],
			mandatory_expenses: mandatory.rows,
		},
		upgraded: true,
		dropped: records.dropped + mandatory.dropped,
	};
}

export async function readDocument(path: string, options: DecodeOptions = {}): Promise<ReadResult> {
	let text: string;
	try {
		text = await readFile(path, "utf-8");
	} catch (error) {
		if (error instanceof Error && "code" in error && error.code === "ENOENT") {
			return { dataset: emptyDataset(), missing: true, upgraded: false, dropped: 0 };
		}
		throw error;
	}

	if (text.trim() === "") {
		return { dataset: emptyDataset(), missing: false, upgraded: false, dropped: 0 };
	}

	let parsed: unknown;
	try {
		parsed = JSON.parse(text);
	} catch (error) {
		throw LedgerError.storageCorrupt(`${path} is not valid JSON`, error);
	}

	const { document, upgraded, dropped } = upgradeLegacyDocument(
		parsed,
		options.baseCurrency ?? DEFAULT_BASE_CURRENCY,
	);
	return { dataset: decodeDocument(document, options), missing: false, upgraded, dropped };
}

/** Serialize `document` next to `path`, then rename it into place. */
export async function writeDocumentAtomic(path: string, document: LedgerDocument): Promise<void> {
	const dir = dirname(path);
	await mkdir(dir, { recursive: true });

	const tmpPath = join(dir, `.${basename(path)}.${randomUUID()}.tmp`);
	try {
		await writeFile(tmpPath, `${JSON.stringify(document, null, 2)}\n`, "utf-8");
		await rename(tmpPath, path);
	} catch (error) {
		await rm(tmpPath, { force: true });
		throw error;
	}
}
