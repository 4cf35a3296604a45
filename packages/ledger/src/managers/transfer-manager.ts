// =============================================================================
// TRANSFER MANAGER -- Wallet-to-wallet moves under the double-entry rule
// =============================================================================
// A transfer is written together with its two legs (and its commission, if
// any) in a single bulk replace, so a store never holds half of one.

import {
	createExpenseRecord,
	createIncomeRecord,
	createTransfer as buildTransfer,
	ensureNotFuture,
	type ExpenseRecord,
	type IncomeRecord,
	LedgerError,
	nextId,
	type Transfer,
	walletBalance,
	withoutTransfer,
} from "@pocket-ledger/core";
import type { LedgerContext } from "../context/context.js";
import { ensureSufficientFunds } from "./balance-check.js";
import { findActiveWallet } from "./wallet-manager.js";

export const TRANSFER_CATEGORY = "Transfer";
export const COMMISSION_CATEGORY = "Commission";

export interface TransferParams {
	fromWalletId: number;
	toWalletId: number;
	date: string;
	amount: number;
	currency: string;
	description?: string;
	/** Fee charged to the source wallet on top of the amount. */
	commission?: {
		amount: number;
		currency: string;
	};
}

export interface TransferResult {
	transfer: Transfer;
	legs: [ExpenseRecord, IncomeRecord];
	commission: ExpenseRecord | null;
}

// =============================================================================
// CREATE
// =============================================================================

export async function createTransfer(
	ctx: LedgerContext,
	params: TransferParams,
): Promise<TransferResult> {
	ensureNotFuture(params.date, ctx.today());
	const dataset = await ctx.store.loadDataset();
	const from = findActiveWallet(dataset.wallets, params.fromWalletId);
	findActiveWallet(dataset.wallets, params.toWalletId);

	const baseCurrency = ctx.baseCurrency;
	const transfer = buildTransfer(
		{
			id: nextId(dataset.transfers.map((t) => t.id)),
			fromWalletId: params.fromWalletId,
			toWalletId: params.toWalletId,
			date: params.date,
			amountOriginal: params.amount,
			currency: params.currency,
			amountKzt: ctx.rates.convert(params.amount, params.currency),
			description: params.description,
		},
		baseCurrency,
	);

	let recordId = nextId(dataset.records.map((r) => r.id));
	const legFields = {
		date: transfer.date,
		transferId: transfer.id,
		amountOriginal: transfer.amountOriginal,
		currency: transfer.currency,
		rateAtOperation: transfer.rateAtOperation,
		amountKzt: transfer.amountKzt,
		category: TRANSFER_CATEGORY,
		description: transfer.description,
	};
	const expenseLeg = createExpenseRecord(
		{ ...legFields, id: recordId++, walletId: transfer.fromWalletId },
		{ baseCurrency },
	);
	const incomeLeg = createIncomeRecord(
		{ ...legFields, id: recordId++, walletId: transfer.toWalletId },
		{ baseCurrency },
	);

	let commission: ExpenseRecord | null = null;
	if (params.commission && params.commission.amount > 0) {
		commission = createExpenseRecord(
			{
				id: recordId++,
				date: transfer.date,
				walletId: transfer.fromWalletId,
				commissionForTransferId: transfer.id,
				amountOriginal: params.commission.amount,
				currency: params.commission.currency,
				amountKzt: ctx.rates.convert(params.commission.amount, params.commission.currency),
				category: COMMISSION_CATEGORY,
				description: `Commission for transfer #${transfer.id}`,
			},
			{ baseCurrency },
		);
	}

	ensureSufficientFunds({
		wallet: from,
		balance: walletBalance(from, dataset.records),
		amount: transfer.amountKzt + (commission?.amountKzt ?? 0),
	});

	const added = commission ? [expenseLeg, incomeLeg, commission] : [expenseLeg, incomeLeg];
	await ctx.store.replaceRecordsAndTransfers(
		[...dataset.records, ...added],
		[...dataset.transfers, transfer],
	);

	ctx.logger.info("Transfer created", {
		transferId: transfer.id,
		fromWalletId: transfer.fromWalletId,
		toWalletId: transfer.toWalletId,
		amountKzt: transfer.amountKzt,
		commission: commission?.amountKzt ?? 0,
	});

	return { transfer, legs: [expenseLeg, incomeLeg], commission };
}

// =============================================================================
// DELETE / LIST
// =============================================================================

/**
 * Remove a transfer, both of its legs and its commission record.
 * Returns the number of records removed.
 */
export async function deleteTransfer(ctx: LedgerContext, transferId: number): Promise<number> {
	const dataset = await ctx.store.loadDataset();
	if (!dataset.transfers.some((t) => t.id === transferId)) {
		throw LedgerError.domainRule(`Transfer ${transferId} not found`, { transferId });
	}

	const { records, transfers } = withoutTransfer(dataset.records, dataset.transfers, transferId);
	await ctx.store.replaceRecordsAndTransfers(records, transfers);

	const removed = dataset.records.length - records.length;
	ctx.logger.info("Transfer deleted", { transferId, records: removed });
	return removed;
}

export async function listTransfers(ctx: LedgerContext): Promise<Transfer[]> {
	return ctx.store.loadTransfers();
}
