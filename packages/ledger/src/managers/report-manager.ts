// =============================================================================
// REPORT MANAGER -- builds reports from the stored dataset
// =============================================================================

import type { LedgerContext } from "../context/context.js";
import { createReport, type Report } from "../reports/index.js";
import { findWallet } from "./wallet-manager.js";

export interface ReportParams {
	/** Omit for a report over every wallet. */
	walletId?: number;
}

export async function generateReport(ctx: LedgerContext, params: ReportParams = {}): Promise<Report> {
	const { wallets, records } = await ctx.store.loadDataset();

	if (params.walletId === undefined) {
		const initialBalance = wallets.reduce((sum, wallet) => sum + wallet.initialBalance, 0);
		return createReport(records, { initialBalance });
	}

	// Soft-deleted wallets keep their history, so they can still be reported on.
	const wallet = findWallet(wallets, params.walletId);
	return createReport(records, { walletId: wallet.id, initialBalance: wallet.initialBalance });
}
