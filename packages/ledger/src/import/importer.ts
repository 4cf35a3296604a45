// =============================================================================
// BATCH IMPORTER -- rows in, dataset out (and back)
// =============================================================================
// `importRows` is pure: it parses and cross-checks a batch and reports what
// it could not take. `importDataset` is the all-or-nothing variant that
// replaces a store's records only when every row parsed.

import {
	checkTransferIntegrity,
	createTransfer,
	DEFAULT_BASE_CURRENCY,
	encodeRecord,
	type LedgerDataset,
	LedgerError,
	type LedgerLogger,
	type LedgerRecord,
	type MandatoryExpenseRecord,
	type RateProvider,
	silentLogger,
	SYSTEM_WALLET_ID,
	type Transfer,
	withInitialBalance,
} from "@pocket-ledger/core";
import type { LedgerContext } from "../context/context.js";
import {
	type ImportPolicy,
	type ImportRow,
	isBlankRow,
	normalizeRow,
	normalizeRowType,
	parseImportRow,
	parseTransferRow,
} from "./row-parser.js";

export interface ImportRowsOptions {
	policy: ImportPolicy;
	rates?: RateProvider;
	baseCurrency?: string;
	/** Wallets rows may reference. Unchecked when absent. */
	walletIds?: ReadonlySet<number>;
	/** Default: `10000` */
	maxRows?: number;
	/** Number used in the label of the first row. Default: `1` */
	firstRowNumber?: number;
	logger?: LedgerLogger;
}

export interface ImportSummary {
	imported: number;
	skipped: number;
	errors: string[];
	records: LedgerRecord[];
	transfers: Transfer[];
	/** From the first `initial_balance` row, or null when there was none. */
	initialBalance: number | null;
}

export const EXPORT_HEADERS = [
	"date",
	"type",
	"wallet_id",
	"category",
	"amount_original",
	"currency",
	"rate_at_operation",
	"amount_kzt",
	"description",
	"period",
	"transfer_id",
	"commission_for_transfer_id",
	"from_wallet_id",
	"to_wallet_id",
] as const;

export type ExportHeader = (typeof EXPORT_HEADERS)[number];
export type ExportRow = Record<ExportHeader, string | number>;

const DEFAULT_MAX_ROWS = 10_000;

// =============================================================================
// CROSS-ROW CHECKS
// =============================================================================

/** Rebuild a transfer that appeared only through its two legs. */
function restoreMissingTransfers(
	records: readonly LedgerRecord[],
	transfers: Map<number, Transfer>,
	baseCurrency: string,
): void {
	const byTransfer = new Map<number, LedgerRecord[]>();
	for (const record of records) {
		if (record.transferId === null) continue;
		byTransfer.set(record.transferId, [...(byTransfer.get(record.transferId) ?? []), record]);
	}

	for (const [transferId, linked] of byTransfer) {
		if (transfers.has(transferId)) continue;
		const expense = linked.find((record) => record.type === "expense");
		const income = linked.find((record) => record.type === "income");
		if (!expense || !income) continue;
		try {
			transfers.set(
				transferId,
				createTransfer(
					{
						id: transferId,
						fromWalletId: expense.walletId,
						toWalletId: income.walletId,
						date: expense.date,
						amountOriginal: expense.amountOriginal,
						currency: expense.currency,
						rateAtOperation: expense.rateAtOperation,
						amountKzt: expense.amountKzt,
						description: expense.description,
					},
					baseCurrency,
				),
			);
		} catch {
			// Left unrestored; reported below as a missing aggregate.
			continue;
		}
	}
}

interface TransferProblem {
	transferId: number;
	message: string;
}

function collectTransferProblems(
	records: readonly LedgerRecord[],
	transfers: ReadonlyMap<number, Transfer>,
	walletIds: ReadonlySet<number> | undefined,
): TransferProblem[] {
	const problems: TransferProblem[] = [];
	const byTransfer = new Map<number, LedgerRecord[]>();
	for (const record of records) {
		if (record.transferId !== null) {
			byTransfer.set(record.transferId, [...(byTransfer.get(record.transferId) ?? []), record]);
		}
		if (record.commissionForTransferId !== null && !transfers.has(record.commissionForTransferId)) {
			problems.push({
				transferId: record.commissionForTransferId,
				message: `Transfer #${record.commissionForTransferId}: commission references a missing transfer`,
			});
		}
	}

	for (const transferId of [...byTransfer.keys()].sort((a, b) => a - b)) {
		if (!transfers.has(transferId)) {
			problems.push({ transferId, message: `Transfer #${transferId}: missing transfer aggregate` });
		}
	}

	for (const transfer of [...transfers.values()].sort((a, b) => a.id - b.id)) {
		const linked = byTransfer.get(transfer.id) ?? [];
		const check = checkTransferIntegrity(linked, [transfer]);
		if (!check.ok) {
			problems.push({ transferId: transfer.id, message: check.error.message });
			continue;
		}
		if (walletIds) {
			for (const walletId of [transfer.fromWalletId, transfer.toWalletId]) {
				if (!walletIds.has(walletId)) {
					problems.push({
						transferId: transfer.id,
						message: `Transfer #${transfer.id}: wallet not found (${walletId})`,
					});
				}
			}
		}
	}
	return problems;
}

// =============================================================================
// IMPORT
// =============================================================================

/**
 * Parse a batch of rows. Rows that fail are counted in `skipped` with one
 * message each; transfers whose legs do not line up are dropped with
 * everything linked to them.
 */
export function importRows(rows: readonly ImportRow[], options: ImportRowsOptions): ImportSummary {
	const maxRows = options.maxRows ?? DEFAULT_MAX_ROWS;
	if (rows.length > maxRows) {
		throw new LedgerError(
			"IMPORT_ROW_LIMIT",
			`Import has ${rows.length} rows, the maximum is ${maxRows}`,
			{ details: { rows: rows.length, maxRows } },
		);
	}

	const logger = options.logger ?? silentLogger;
	const baseCurrency = options.baseCurrency ?? DEFAULT_BASE_CURRENCY;
	const firstRow = options.firstRowNumber ?? 1;

	const records: LedgerRecord[] = [];
	const transfers = new Map<number, Transfer>();
	const errors: string[] = [];
	let imported = 0;
	let skipped = 0;
	let initialBalance: number | null = null;
	let nextTransferId = 1;

	const reject = (message: string) => {
		skipped += 1;
		errors.push(message);
		logger.warn("Import row skipped", { error: message });
	};

	rows.forEach((row, i) => {
		if (isBlankRow(row)) return;
		const rowLabel = `row ${firstRow + i}`;
		const parseOptions = {
			policy: options.policy,
			rates: options.rates,
			baseCurrency,
			rowLabel,
		};

		if (normalizeRowType(normalizeRow(row).get("type") ?? "") === "transfer") {
			const parsed = parseTransferRow(row, {
				...parseOptions,
				nextTransferId,
				walletIds: options.walletIds,
			});
			nextTransferId = parsed.nextTransferId;
			if (parsed.kind === "error") {
				reject(parsed.message);
				return;
			}
			if (transfers.has(parsed.transfer.id)) {
				reject(`${rowLabel}: duplicate transfer_id #${parsed.transfer.id}`);
				return;
			}
			transfers.set(parsed.transfer.id, parsed.transfer);
			records.push(...parsed.legs);
			imported += 1;
			return;
		}

		const parsed = parseImportRow(row, parseOptions);
		switch (parsed.kind) {
			case "error":
				reject(parsed.message);
				return;
			case "initial_balance":
				if (initialBalance !== null) {
					reject(`${rowLabel}: duplicate initial_balance`);
					return;
				}
				initialBalance = parsed.balance;
				return;
			case "record": {
				const { record } = parsed;
				if (options.walletIds && !options.walletIds.has(record.walletId)) {
					reject(`${rowLabel}: wallet not found (${record.walletId})`);
					return;
				}
				records.push(record);
				imported += 1;
				if (record.transferId !== null) {
					nextTransferId = Math.max(nextTransferId, record.transferId + 1);
				}
				return;
			}
		}
	});

	restoreMissingTransfers(records, transfers, baseCurrency);
	const problems = collectTransferProblems(records, transfers, options.walletIds);
	const broken = new Set(problems.map((problem) => problem.transferId));
	for (const problem of problems) {
		reject(problem.message);
	}

	const summary: ImportSummary = {
		imported,
		skipped,
		errors,
		records: records.filter(
			(record) =>
				!(record.transferId !== null && broken.has(record.transferId)) &&
				!(record.commissionForTransferId !== null && broken.has(record.commissionForTransferId)),
		),
		transfers: [...transfers.values()].filter((transfer) => !broken.has(transfer.id)),
		initialBalance,
	};
	logger.info("Import parsed", { imported, skipped, transfers: summary.transfers.length });
	return summary;
}

function rejectedError(summary: ImportSummary): LedgerError {
	const preview = summary.errors.slice(0, 3).join("; ");
	return new LedgerError(
		"IMPORT_REJECTED",
		`Import aborted: ${summary.skipped} invalid rows. ${preview}`,
		{ details: { skipped: summary.skipped, errors: summary.errors } },
	);
}

/**
 * Replace the store's records and transfers with the rows. Wallets and
 * mandatory templates stay; an `initial_balance` row resets the system
 * wallet's opening balance. Nothing is written unless every row parsed.
 */
export async function importDataset(
	ctx: LedgerContext,
	rows: readonly ImportRow[],
	options: { policy: ImportPolicy },
): Promise<ImportSummary> {
	const current = await ctx.store.loadDataset();
	const walletIds = new Set(
		current.wallets.length > 0 ? current.wallets.map((wallet) => wallet.id) : [SYSTEM_WALLET_ID],
	);

	const summary = importRows(rows, {
		policy: options.policy,
		rates: ctx.rates,
		baseCurrency: ctx.baseCurrency,
		walletIds,
		maxRows: ctx.maxImportRows,
		logger: ctx.logger,
	});
	if (summary.skipped > 0) {
		throw rejectedError(summary);
	}

	const openingBalance = summary.initialBalance;
	const wallets =
		openingBalance === null
			? current.wallets
			: current.wallets.map((wallet) =>
					wallet.system ? withInitialBalance(wallet, openingBalance) : wallet,
				);

	await ctx.store.replaceAllData({
		wallets,
		records: summary.records,
		transfers: summary.transfers,
		mandatoryExpenses: current.mandatoryExpenses,
		initialBalance: openingBalance ?? undefined,
	});
	ctx.logger.info("Import applied", {
		records: summary.records.length,
		transfers: summary.transfers.length,
	});
	return summary;
}

/** Replace the mandatory templates with the rows, all or nothing. */
export async function importMandatoryExpenses(
	ctx: LedgerContext,
	rows: readonly ImportRow[],
	options: { policy: ImportPolicy },
): Promise<ImportSummary> {
	const maxRows = ctx.maxImportRows;
	if (rows.length > maxRows) {
		throw new LedgerError(
			"IMPORT_ROW_LIMIT",
			`Import has ${rows.length} rows, the maximum is ${maxRows}`,
			{ details: { rows: rows.length, maxRows } },
		);
	}

	const templates: MandatoryExpenseRecord[] = [];
	const errors: string[] = [];
	rows.forEach((row, i) => {
		if (isBlankRow(row)) return;
		const parsed = parseImportRow(row, {
			policy: options.policy,
			rates: ctx.rates,
			baseCurrency: ctx.baseCurrency,
			rowLabel: `row ${i + 1}`,
			mandatoryOnly: true,
		});
		if (parsed.kind === "error") {
			errors.push(parsed.message);
		} else if (parsed.kind === "record" && parsed.record.type === "mandatory_expense") {
			templates.push(parsed.record);
		}
	});

	const summary: ImportSummary = {
		imported: templates.length,
		skipped: errors.length,
		errors,
		records: templates,
		transfers: [],
		initialBalance: null,
	};
	if (summary.skipped > 0) {
		throw rejectedError(summary);
	}
	await ctx.store.replaceMandatoryExpenses(templates);
	return summary;
}

// =============================================================================
// EXPORT
// =============================================================================

const EMPTY_EXPORT_ROW: ExportRow = {
	date: "",
	type: "",
	wallet_id: "",
	category: "",
	amount_original: "",
	currency: "",
	rate_at_operation: "",
	amount_kzt: "",
	description: "",
	period: "",
	transfer_id: "",
	commission_for_transfer_id: "",
	from_wallet_id: "",
	to_wallet_id: "",
};

function emptyRow(): ExportRow {
	return { ...EMPTY_EXPORT_ROW };
}

/**
 * Row form of a dataset: the system wallet's opening balance, every record
 * that is not a transfer leg, then one row per transfer. Importing the
 * result with the `full_backup` policy gives back the same balances.
 */
export function exportRows(dataset: LedgerDataset): ExportRow[] {
	const rows: ExportRow[] = [];
	const system = dataset.wallets.find((wallet) => wallet.system);
	rows.push({
		...emptyRow(),
		type: "initial_balance",
		amount_original: system?.initialBalance ?? 0,
	});

	for (const record of dataset.records) {
		if (record.transferId !== null) continue;
		const raw = encodeRecord(record);
		rows.push({
			...emptyRow(),
			date: raw.date,
			type: raw.type,
			wallet_id: raw.wallet_id,
			category: raw.category,
			amount_original: raw.amount_original,
			currency: raw.currency,
			rate_at_operation: raw.rate_at_operation,
			amount_kzt: raw.amount_kzt,
			description: raw.description,
			period: raw.period ?? "",
			commission_for_transfer_id: raw.commission_for_transfer_id ?? "",
		});
	}

	for (const transfer of [...dataset.transfers].sort((a, b) => a.id - b.id)) {
		rows.push({
			...emptyRow(),
			date: transfer.date,
			type: "transfer",
			category: "Transfer",
			amount_original: transfer.amountOriginal,
			currency: transfer.currency,
			rate_at_operation: transfer.rateAtOperation,
			amount_kzt: transfer.amountKzt,
			description: transfer.description,
			transfer_id: transfer.id,
			from_wallet_id: transfer.fromWalletId,
			to_wallet_id: transfer.toWalletId,
		});
	}
	return rows;
}
