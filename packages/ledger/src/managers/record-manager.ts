// =============================================================================
// RECORD MANAGER -- Income and expense entry, edits and deletion
// =============================================================================
// Amounts are converted into the base currency at the provider's current
// rate when the record is created. The rate is then fixed on the record.

import {
	createExpenseRecord,
	createIncomeRecord,
	ensureNotFuture,
	type LedgerRecord,
	LedgerError,
	SYSTEM_WALLET_ID,
	walletBalance,
	withAmountKzt,
} from "@pocket-ledger/core";
import type { LedgerContext } from "../context/context.js";
import { ensureSufficientFunds } from "./balance-check.js";
import { deleteTransfer } from "./transfer-manager.js";
import { findActiveWallet } from "./wallet-manager.js";

export interface RecordParams {
	date: string;
	/** Default: the system wallet (1) */
	walletId?: number;
	amount: number;
	currency: string;
	category: string;
	description?: string;
}

async function createRecordEntry(
	ctx: LedgerContext,
	type: "income" | "expense",
	params: RecordParams,
): Promise<LedgerRecord> {
	ensureNotFuture(params.date, ctx.today());
	const walletId = params.walletId ?? SYSTEM_WALLET_ID;
	const { wallets, records } = await ctx.store.loadDataset();
	const wallet = findActiveWallet(wallets, walletId);

	const input = {
		date: params.date,
		walletId,
		amountOriginal: params.amount,
		currency: params.currency,
		amountKzt: ctx.rates.convert(params.amount, params.currency),
		category: params.category,
		description: params.description,
	};
	const options = { baseCurrency: ctx.baseCurrency };
	const record =
		type === "income" ? createIncomeRecord(input, options) : createExpenseRecord(input, options);

	if (record.type === "expense") {
		ensureSufficientFunds({
			wallet,
			balance: walletBalance(wallet, records),
			amount: record.amountKzt,
		});
	}

	const stored = await ctx.store.save(record);
	ctx.logger.debug("Record created", { recordId: stored.id, type, walletId });
	return stored;
}

export async function createIncome(ctx: LedgerContext, params: RecordParams): Promise<LedgerRecord> {
	return createRecordEntry(ctx, "income", params);
}

export async function createExpense(ctx: LedgerContext, params: RecordParams): Promise<LedgerRecord> {
	return createRecordEntry(ctx, "expense", params);
}

export async function listRecords(ctx: LedgerContext): Promise<LedgerRecord[]> {
	return ctx.store.loadAll();
}

/**
 * Correct the base-currency amount of a record. Transfer legs are edited
 * only by deleting and re-creating the transfer.
 */
export async function updateAmountKzt(
	ctx: LedgerContext,
	recordId: number,
	amountKzt: number,
): Promise<LedgerRecord> {
	const record = await ctx.store.getById(recordId);
	if (record.transferId !== null) {
		throw LedgerError.domainRule(
			`Record ${recordId} belongs to transfer ${record.transferId} and cannot be edited`,
			{ recordId, transferId: record.transferId },
		);
	}
	const updated = withAmountKzt(record, amountKzt, ctx.baseCurrency);
	await ctx.store.replace(updated);
	return updated;
}

/**
 * Delete the record at `index` in `listRecords` order. A transfer leg takes
 * its whole transfer with it. Returns false when the index is out of range.
 */
export async function deleteRecord(ctx: LedgerContext, index: number): Promise<boolean> {
	const records = await ctx.store.loadAll();
	const record = Number.isInteger(index) ? records[index] : undefined;
	if (!record) return false;

	if (record.transferId !== null) {
		await deleteTransfer(ctx, record.transferId);
		return true;
	}
	return ctx.store.deleteByIndex(index);
}

/** Remove every record. Transfers go with their legs. */
export async function deleteAllRecords(ctx: LedgerContext): Promise<void> {
	await ctx.store.deleteAll();
	ctx.logger.info("All records deleted");
}
