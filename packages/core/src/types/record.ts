export type RecordType = "income" | "expense" | "mandatory_expense";

export type MandatoryPeriod = "daily" | "weekly" | "monthly" | "yearly";

interface RecordBase {
	/** 0 until the store assigns one. */
	readonly id: number;
	/** `YYYY-MM-DD`. Mandatory templates may carry an empty string. */
	readonly date: string;
	readonly walletId: number;
	/** Set only on the two legs of a transfer. */
	readonly transferId: number | null;
	/** Set only on the commission expense that accompanied a transfer. */
	readonly commissionForTransferId: number | null;
	readonly amountOriginal: number;
	readonly currency: string;
	/** Fixed when the record is created, never recomputed. */
	readonly rateAtOperation: number;
	/** Absolute amount in the base currency. The sign comes from `type`. */
	readonly amountKzt: number;
	readonly category: string;
	readonly description: string;
}

export interface IncomeRecord extends RecordBase {
	readonly type: "income";
}

export interface ExpenseRecord extends RecordBase {
	readonly type: "expense";
}

export interface MandatoryExpenseRecord extends RecordBase {
	readonly type: "mandatory_expense";
	readonly period: MandatoryPeriod;
}

export type LedgerRecord = IncomeRecord | ExpenseRecord | MandatoryExpenseRecord;
