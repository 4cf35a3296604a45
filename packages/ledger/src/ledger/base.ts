// =============================================================================
// LEDGER -- Main entry point
// =============================================================================
// Creates the Ledger instance that groups the use cases by concern. Every
// method resolves the shared context and hands off to a manager function.

import type {
	CreateWalletInput,
	LedgerDataset,
	LedgerRecord,
	MandatoryExpenseRecord,
	Transfer,
	Wallet,
} from "@pocket-ledger/core";
import { buildContext, type ContextOptions, type LedgerContext } from "../context/context.js";
import {
	type ExportRow,
	exportRows,
	importDataset,
	importMandatoryExpenses,
	type ImportSummary,
} from "../import/importer.js";
import {
	type ImportPolicy,
	type ImportRow,
	type ParsedRow,
	parseImportRow,
} from "../import/row-parser.js";
import * as mandatory from "../managers/mandatory-manager.js";
import type { MandatoryExpenseParams } from "../managers/mandatory-manager.js";
import * as records from "../managers/record-manager.js";
import { generateReport, type ReportParams } from "../managers/report-manager.js";
import type { RecordParams } from "../managers/record-manager.js";
import * as transfers from "../managers/transfer-manager.js";
import type { TransferParams, TransferResult } from "../managers/transfer-manager.js";
import * as wallets from "../managers/wallet-manager.js";
import {
	filterByPeriodRange,
	fxDifference,
	type MonthlyIncomeExpense,
	monthlyIncomeExpense,
	type Report,
	totalCurrent,
} from "../reports/index.js";

// =============================================================================
// LEDGER INTERFACE
// =============================================================================

export interface Ledger {
	wallets: {
		create: (params: CreateWalletInput) => Promise<Wallet>;
		list: () => Promise<Wallet[]>;
		listActive: () => Promise<Wallet[]>;
		softDelete: (walletId: number) => Promise<Wallet>;
		balance: (walletId: number) => Promise<number>;
		netWorth: () => Promise<number>;
	};
	records: {
		createIncome: (params: RecordParams) => Promise<LedgerRecord>;
		createExpense: (params: RecordParams) => Promise<LedgerRecord>;
		list: () => Promise<LedgerRecord[]>;
		updateAmountKzt: (recordId: number, amountKzt: number) => Promise<LedgerRecord>;
		/** By position in `list()` order. A transfer leg deletes its transfer. */
		delete: (index: number) => Promise<boolean>;
		deleteAll: () => Promise<void>;
	};
	transfers: {
		create: (params: TransferParams) => Promise<TransferResult>;
		/** Returns the number of records removed with the transfer. */
		delete: (transferId: number) => Promise<number>;
		list: () => Promise<Transfer[]>;
	};
	mandatory: {
		create: (params: MandatoryExpenseParams) => Promise<MandatoryExpenseRecord>;
		list: () => Promise<MandatoryExpenseRecord[]>;
		delete: (index: number) => Promise<boolean>;
		deleteAll: () => Promise<void>;
		apply: (params: { index: number; date: string; walletId?: number }) => Promise<LedgerRecord>;
	};
	imports: {
		parse: (row: ImportRow, policy: ImportPolicy, rowLabel?: string) => ParsedRow;
		importDataset: (rows: readonly ImportRow[], policy: ImportPolicy) => Promise<ImportSummary>;
		importMandatory: (rows: readonly ImportRow[], policy: ImportPolicy) => Promise<ImportSummary>;
		exportRows: () => Promise<ExportRow[]>;
	};
	/** Context-bound report helpers; the rest of `reports/` is pure. */
	reports: {
		generate: (params?: ReportParams) => Promise<Report>;
		/** At the configured provider's rates. */
		totalCurrent: (report: Report) => number;
		fxDifference: (report: Report) => number;
		/** The range ends today when `end` is omitted. */
		filterByPeriodRange: (report: Report, start: string, end?: string) => Report;
		monthly: (report: Report, options?: { year?: number; upToMonth?: number }) => MonthlyIncomeExpense;
	};
	/** Full dataset in one read. */
	snapshot: () => Promise<LedgerDataset>;
	close: () => Promise<void>;
}

// =============================================================================
// CREATE LEDGER
// =============================================================================

export function createLedger(options: ContextOptions): Ledger {
	const ctx: LedgerContext = buildContext(options);

	return {
		wallets: {
			create: (params) => wallets.createWallet(ctx, params),
			list: () => wallets.listWallets(ctx),
			listActive: () => wallets.listActiveWallets(ctx),
			softDelete: (walletId) => wallets.softDeleteWallet(ctx, walletId),
			balance: (walletId) => wallets.getWalletBalance(ctx, walletId),
			netWorth: () => wallets.getNetWorth(ctx),
		},
		records: {
			createIncome: (params) => records.createIncome(ctx, params),
			createExpense: (params) => records.createExpense(ctx, params),
			list: () => records.listRecords(ctx),
			updateAmountKzt: (recordId, amountKzt) => records.updateAmountKzt(ctx, recordId, amountKzt),
			delete: (index) => records.deleteRecord(ctx, index),
			deleteAll: () => records.deleteAllRecords(ctx),
		},
		transfers: {
			create: (params) => transfers.createTransfer(ctx, params),
			delete: (transferId) => transfers.deleteTransfer(ctx, transferId),
			list: () => transfers.listTransfers(ctx),
		},
		mandatory: {
			create: (params) => mandatory.createMandatoryExpense(ctx, params),
			list: () => mandatory.listMandatoryExpenses(ctx),
			delete: (index) => mandatory.deleteMandatoryExpense(ctx, index),
			deleteAll: () => mandatory.deleteAllMandatoryExpenses(ctx),
			apply: (params) => mandatory.applyMandatoryExpense(ctx, params),
		},
		imports: {
			parse: (row, policy, rowLabel) =>
				parseImportRow(row, {
					policy,
					rates: ctx.rates,
					baseCurrency: ctx.baseCurrency,
					rowLabel,
				}),
			importDataset: (rows, policy) => importDataset(ctx, rows, { policy }),
			importMandatory: (rows, policy) => importMandatoryExpenses(ctx, rows, { policy }),
			exportRows: async () => exportRows(await ctx.store.loadDataset()),
		},
		reports: {
			generate: (params) => generateReport(ctx, params),
			totalCurrent: (report) => totalCurrent(report, ctx.rates),
			fxDifference: (report) => fxDifference(report, ctx.rates),
			filterByPeriodRange: (report, start, end) =>
				filterByPeriodRange(report, start, end, ctx.today()),
			monthly: (report, options = {}) => monthlyIncomeExpense(report, { ...options, today: ctx.today() }),
		},
		snapshot: () => ctx.store.loadDataset(),
		close: () => ctx.store.close(),
	};
}
