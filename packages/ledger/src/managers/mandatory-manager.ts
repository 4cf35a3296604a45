// =============================================================================
// MANDATORY MANAGER -- Recurring expense templates
// =============================================================================
// Templates live in their own collection and never affect a balance until
// one is applied, which writes a dated mandatory_expense record.

import {
	createMandatoryExpense as buildMandatoryExpense,
	type LedgerRecord,
	LedgerError,
	type MandatoryExpenseRecord,
	type MandatoryPeriod,
	materializeMandatoryExpense,
	parseYmd,
	SYSTEM_WALLET_ID,
	walletBalance,
} from "@pocket-ledger/core";
import type { LedgerContext } from "../context/context.js";
import { ensureSufficientFunds } from "./balance-check.js";
import { findActiveWallet, findWallet } from "./wallet-manager.js";

export interface MandatoryExpenseParams {
	amount: number;
	currency: string;
	category: string;
	description: string;
	period: MandatoryPeriod;
	/** Default: the system wallet (1) */
	walletId?: number;
	/** Optional; templates are usually undated. */
	date?: string;
}

export async function createMandatoryExpense(
	ctx: LedgerContext,
	params: MandatoryExpenseParams,
): Promise<MandatoryExpenseRecord> {
	const walletId = params.walletId ?? SYSTEM_WALLET_ID;
	findWallet(await ctx.store.loadWallets(), walletId);

	const template = buildMandatoryExpense(
		{
			date: params.date ?? "",
			walletId,
			amountOriginal: params.amount,
			currency: params.currency,
			amountKzt: ctx.rates.convert(params.amount, params.currency),
			category: params.category,
			description: params.description,
			period: params.period,
		},
		{ baseCurrency: ctx.baseCurrency, allowEmptyDate: true },
	);
	return ctx.store.saveMandatoryExpense(template);
}

export async function listMandatoryExpenses(ctx: LedgerContext): Promise<MandatoryExpenseRecord[]> {
	return ctx.store.loadMandatoryExpenses();
}

export async function deleteMandatoryExpense(ctx: LedgerContext, index: number): Promise<boolean> {
	return ctx.store.deleteMandatoryExpenseByIndex(index);
}

export async function deleteAllMandatoryExpenses(ctx: LedgerContext): Promise<void> {
	await ctx.store.deleteAllMandatoryExpenses();
}

/**
 * Write the template at `index` into the records collection as a dated
 * mandatory expense. The template itself stays in place.
 */
export async function applyMandatoryExpense(
	ctx: LedgerContext,
	params: { index: number; date: string; walletId?: number },
): Promise<LedgerRecord> {
	parseYmd(params.date);
	const dataset = await ctx.store.loadDataset();
	const template = Number.isInteger(params.index)
		? dataset.mandatoryExpenses[params.index]
		: undefined;
	if (!template) {
		throw LedgerError.notFound(`Mandatory expense at index ${params.index} not found`);
	}

	const walletId = params.walletId ?? template.walletId;
	const wallet = findActiveWallet(dataset.wallets, walletId);
	ensureSufficientFunds({
		wallet,
		balance: walletBalance(wallet, dataset.records),
		amount: template.amountKzt,
	});

	const stored = await ctx.store.save(materializeMandatoryExpense(template, params.date, walletId));
	ctx.logger.debug("Mandatory expense applied", {
		templateId: template.id,
		recordId: stored.id,
		walletId,
	});
	return stored;
}
