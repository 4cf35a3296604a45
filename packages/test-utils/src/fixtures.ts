// =============================================================================
// FIXTURES -- small builders for wallets, records, transfers and datasets
// =============================================================================

import {
	createExpenseRecord,
	createIncomeRecord,
	createMandatoryExpense,
	createTransfer,
	createWallet,
	type ExpenseRecord,
	type IncomeRecord,
	type LedgerDataset,
	type MandatoryExpenseInput,
	type MandatoryExpenseRecord,
	type RecordInput,
	type Transfer,
	type Wallet,
	type WalletInput,
} from "@pocket-ledger/core";

export function buildWallet(overrides: Partial<WalletInput> = {}): Wallet {
	return createWallet({
		id: 1,
		name: "Main wallet",
		currency: "KZT",
		initialBalance: 0,
		system: overrides.id === undefined || overrides.id === 1,
		...overrides,
	});
}

const RECORD_DEFAULTS: RecordInput = {
	date: "2025-01-15",
	walletId: 1,
	amountOriginal: 100,
	currency: "KZT",
	category: "General",
};

export function buildIncome(overrides: Partial<RecordInput> = {}): IncomeRecord {
	return createIncomeRecord({ ...RECORD_DEFAULTS, category: "Salary", ...overrides });
}

export function buildExpense(overrides: Partial<RecordInput> = {}): ExpenseRecord {
	return createExpenseRecord({ ...RECORD_DEFAULTS, category: "Food", ...overrides });
}

export function buildMandatory(overrides: Partial<MandatoryExpenseInput> = {}): MandatoryExpenseRecord {
	return createMandatoryExpense(
		{
			...RECORD_DEFAULTS,
			date: "",
			category: "Mandatory",
			description: "Rent",
			period: "monthly",
			...overrides,
		},
		{ allowEmptyDate: true },
	);
}

export interface TransferPairInput {
	id: number;
	fromWalletId: number;
	toWalletId: number;
	amount: number;
	date?: string;
	currency?: string;
	amountKzt?: number;
	/** Ids of the expense and income legs. Default: 0 (store assigns). */
	legIds?: [number, number];
}

/** A transfer with its two legs, ready for a bulk replace. */
export function buildTransferPair(input: TransferPairInput): {
	transfer: Transfer;
	legs: [ExpenseRecord, IncomeRecord];
} {
	const date = input.date ?? "2025-02-01";
	const currency = input.currency ?? "KZT";
	const amountKzt = input.amountKzt ?? input.amount;
	const transfer = createTransfer({
		id: input.id,
		fromWalletId: input.fromWalletId,
		toWalletId: input.toWalletId,
		date,
		amountOriginal: input.amount,
		currency,
		amountKzt,
	});
	const leg = {
		date,
		transferId: input.id,
		amountOriginal: input.amount,
		currency,
		amountKzt,
		rateAtOperation: transfer.rateAtOperation,
		category: "Transfer",
	};
	const [expenseId, incomeId] = input.legIds ?? [0, 0];
	return {
		transfer,
		legs: [
			createExpenseRecord({ ...leg, id: expenseId, walletId: input.fromWalletId }),
			createIncomeRecord({ ...leg, id: incomeId, walletId: input.toWalletId }),
		],
	};
}

/**
 * Two wallets (Main 1000 / Card 500), one 100 KZT transfer Main → Card with
 * record ids 1 and 2, and one monthly "Rent" template of 50.
 */
export function buildSampleDataset(): LedgerDataset {
	const { transfer, legs } = buildTransferPair({
		id: 1,
		fromWalletId: 1,
		toWalletId: 2,
		amount: 100,
		legIds: [1, 2],
	});
	return {
		wallets: [
			buildWallet({ initialBalance: 1000 }),
			buildWallet({ id: 2, name: "Card", initialBalance: 500 }),
		],
		records: [...legs],
		transfers: [transfer],
		mandatoryExpenses: [buildMandatory({ id: 1, amountOriginal: 50 })],
	};
}
