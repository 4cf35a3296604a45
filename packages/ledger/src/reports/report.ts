// =============================================================================
// REPORTS -- totals, period filters and grouping over a record list
// =============================================================================
// A report is a frozen value: a record list plus the balance it starts from.
// Every filter returns a new report. Nothing here touches a store; the facade
// loads the records and passes the rate provider in.

import {
	LedgerError,
	type LedgerRecord,
	parseYmd,
	type RateProvider,
	signedAmountKzt,
	todayYmd,
} from "@pocket-ledger/core";
import { periodBounds } from "./period.js";

export const INITIAL_BALANCE_LABEL = "Initial balance";
export const OPENING_BALANCE_LABEL = "Opening balance";

export interface Report {
	readonly records: readonly LedgerRecord[];
	/** Wallet initial balance, or the opening balance of a period report. */
	readonly initialBalance: number;
	/** `null` covers every wallet; transfer legs then cancel out and are left out of totals. */
	readonly walletId: number | null;
	readonly balanceLabel: string;
	readonly periodStart: string | null;
	readonly periodEnd: string | null;
}

export interface ReportOptions {
	initialBalance?: number;
	walletId?: number | null;
	balanceLabel?: string;
	periodStart?: string | null;
	periodEnd?: string | null;
}

export interface MonthlyRow {
	/** `YYYY-MM` */
	month: string;
	income: number;
	expense: number;
}

export interface MonthlyIncomeExpense {
	year: number;
	rows: MonthlyRow[];
}

export interface MonthlyOptions {
	/** Default: latest year with records, else the current year. */
	year?: number;
	/** Clamped to 1..12. Default: latest month with records in `year`. */
	upToMonth?: number;
	today?: string;
}

/** Wallet reports keep only that wallet's records. */
export function createReport(records: readonly LedgerRecord[], options: ReportOptions = {}): Report {
	const walletId = options.walletId ?? null;
	return Object.freeze({
		records: Object.freeze(
			walletId === null ? [...records] : records.filter((record) => record.walletId === walletId),
		),
		initialBalance: options.initialBalance ?? 0,
		walletId,
		balanceLabel: options.balanceLabel ?? INITIAL_BALANCE_LABEL,
		periodStart: options.periodStart ?? null,
		periodEnd: options.periodEnd ?? null,
	});
}

// =============================================================================
// TOTALS
// =============================================================================

/** Records that move the report's balance. */
export function profitRecords(report: Report): LedgerRecord[] {
	if (report.walletId !== null) return [...report.records];
	return report.records.filter((record) => record.transferId === null);
}

/** Signed sum of the fixed base-currency amounts. */
export function netProfitFixed(report: Report): number {
	return profitRecords(report).reduce((sum, record) => sum + signedAmountKzt(record), 0);
}

export function totalFixed(report: Report): number {
	return report.initialBalance + netProfitFixed(report);
}

/** Total with every record converted again at the provider's current rate. */
export function totalCurrent(report: Report, rates: RateProvider): number {
	let total = report.initialBalance;
	for (const record of profitRecords(report)) {
		const converted = Math.abs(rates.convert(record.amountOriginal, record.currency));
		total += record.type === "income" ? converted : -converted;
	}
	return total;
}

/** Gain (positive) or loss from rate changes since the records were booked. */
export function fxDifference(report: Report, rates: RateProvider): number {
	return totalCurrent(report, rates) - totalFixed(report);
}

/** Balance carried into `startDate`: everything dated strictly before it. */
export function openingBalance(report: Report, startDate: string): number {
	parseYmd(startDate);
	let total = report.initialBalance;
	for (const record of profitRecords(report)) {
		if (record.date !== "" && record.date < startDate) {
			total += signedAmountKzt(record);
		}
	}
	return total;
}

// =============================================================================
// FILTERS
// =============================================================================

function periodReport(report: Report, start: string, end: string): Report {
	const inRange = report.records.filter(
		(record) => record.date !== "" && record.date >= start && record.date <= end,
	);
	return createReport(inRange, {
		initialBalance: openingBalance(report, start),
		walletId: report.walletId,
		balanceLabel: OPENING_BALANCE_LABEL,
		periodStart: start,
		periodEnd: end,
	});
}

/** Records inside one `YYYY`, `YYYY-MM` or `YYYY-MM-DD` period, opened at the balance before it. */
export function filterByPeriod(report: Report, period: string): Report {
	const { start, end } = periodBounds(period);
	return periodReport(report, start, end);
}

/**
 * From the first day of `startPeriod` to the last day of `endPeriod`, or to
 * `today` when no end is given.
 */
export function filterByPeriodRange(
	report: Report,
	startPeriod: string,
	endPeriod?: string | null,
	today: string = todayYmd(),
): Report {
	const start = periodBounds(startPeriod).start;
	const end = endPeriod ? periodBounds(endPeriod).end : today;
	if (end < start) {
		throw LedgerError.invalidArgument("Period end date cannot be earlier than period start date");
	}
	return periodReport(report, start, end);
}

/** Category match is exact. The result starts from zero. */
export function filterByCategory(report: Report, category: string): Report {
	return createReport(
		report.records.filter((record) => record.category === category),
		{
			walletId: report.walletId,
			balanceLabel: report.balanceLabel,
			periodStart: report.periodStart,
			periodEnd: report.periodEnd,
		},
	);
}

/** One zero-based report per category, in order of first appearance. */
export function groupedByCategory(report: Report): Map<string, Report> {
	const buckets = new Map<string, LedgerRecord[]>();
	for (const record of profitRecords(report)) {
		const bucket = buckets.get(record.category);
		if (bucket) {
			bucket.push(record);
		} else {
			buckets.set(record.category, [record]);
		}
	}

	const groups = new Map<string, Report>();
	for (const [category, records] of buckets) {
		groups.set(category, createReport(records, { walletId: report.walletId }));
	}
	return groups;
}

/** Oldest first; undated records go last in their original order. */
export function sortedByDate(report: Report): LedgerRecord[] {
	const dated = report.records.filter((record) => record.date !== "");
	const undated = report.records.filter((record) => record.date === "");
	dated.sort((a, b) => (a.date < b.date ? -1 : a.date > b.date ? 1 : 0));
	return [...dated, ...undated];
}

export function statementTitle(report: Report): string {
	if (report.periodStart && report.periodEnd) {
		return `Transaction statement (${report.periodStart} - ${report.periodEnd})`;
	}
	return "Transaction statement";
}

// =============================================================================
// MONTHLY SUMMARY
// =============================================================================

/**
 * Income and expense per month of one year, January through `upToMonth`.
 * Months without records are zero rows.
 */
export function monthlyIncomeExpense(
	report: Report,
	options: MonthlyOptions = {},
): MonthlyIncomeExpense {
	const today = parseYmd(options.today ?? todayYmd());

	const seen: Array<{ year: number; month: number }> = [];
	for (const record of report.records) {
		if (record.date === "") continue;
		const { year, month } = parseYmd(record.date);
		seen.push({ year, month });
	}

	const year = options.year ?? (seen.length > 0 ? Math.max(...seen.map((ym) => ym.year)) : today.year);

	let upToMonth = options.upToMonth;
	if (upToMonth === undefined) {
		const monthsInYear = seen.filter((ym) => ym.year === year).map((ym) => ym.month);
		if (monthsInYear.length > 0) {
			upToMonth = Math.max(...monthsInYear);
		} else {
			upToMonth = year === today.year ? today.month : 12;
		}
	}
	upToMonth = Math.min(12, Math.max(1, Math.trunc(upToMonth)));

	const rows: MonthlyRow[] = [];
	for (let month = 1; month <= upToMonth; month++) {
		rows.push({ month: `${year}-${String(month).padStart(2, "0")}`, income: 0, expense: 0 });
	}

	for (const record of profitRecords(report)) {
		if (record.date === "") continue;
		const date = parseYmd(record.date);
		const row = date.year === year ? rows[date.month - 1] : undefined;
		if (!row) continue;
		if (record.type === "income") {
			row.income += record.amountKzt;
		} else {
			row.expense += Math.abs(record.amountKzt);
		}
	}
	return { year, rows };
}
