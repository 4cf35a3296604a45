export type { RateProvider } from "./currency.js";
export type { DatasetCounts, LedgerDataset } from "./dataset.js";
export type { LedgerLogger, LogLevel } from "./logger.js";
export type {
	ExpenseRecord,
	IncomeRecord,
	LedgerRecord,
	MandatoryExpenseRecord,
	MandatoryPeriod,
	RecordType,
} from "./record.js";
export type { Transfer } from "./transfer.js";
export type { CreateWalletInput, Wallet } from "./wallet.js";
