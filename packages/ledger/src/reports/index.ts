export { type PeriodBounds, periodBounds } from "./period.js";
export {
	createReport,
	filterByCategory,
	filterByPeriod,
	filterByPeriodRange,
	fxDifference,
	groupedByCategory,
	INITIAL_BALANCE_LABEL,
	type MonthlyIncomeExpense,
	monthlyIncomeExpense,
	type MonthlyOptions,
	type MonthlyRow,
	netProfitFixed,
	OPENING_BALANCE_LABEL,
	openingBalance,
	profitRecords,
	type Report,
	type ReportOptions,
	sortedByDate,
	statementTitle,
	totalCurrent,
	totalFixed,
} from "./report.js";
