import type { DatasetCounts, LedgerDataset } from "../types/dataset.js";
import type { LedgerRecord } from "../types/record.js";
import type { Wallet } from "../types/wallet.js";
import { signedAmountKzt } from "../utils/money.js";

/** Balances are always derived, never stored. */
export function walletBalance(wallet: Wallet, records: readonly LedgerRecord[]): number {
	let balance = wallet.initialBalance;
	for (const record of records) {
		if (record.walletId === wallet.id) {
			balance += signedAmountKzt(record);
		}
	}
	return balance;
}

export function walletBalances(
	wallets: readonly Wallet[],
	records: readonly LedgerRecord[],
): Map<number, number> {
	const balances = new Map<number, number>();
	for (const wallet of wallets) {
		balances.set(wallet.id, wallet.initialBalance);
	}
	for (const record of records) {
		const current = balances.get(record.walletId);
		if (current !== undefined) {
			balances.set(record.walletId, current + signedAmountKzt(record));
		}
	}
	return balances;
}

/** Sum over every wallet, active or not. */
export function netWorth(wallets: readonly Wallet[], records: readonly LedgerRecord[]): number {
	let total = 0;
	for (const balance of walletBalances(wallets, records).values()) {
		total += balance;
	}
	return total;
}

export function datasetCounts(dataset: LedgerDataset): DatasetCounts {
	return {
		wallets: dataset.wallets.length,
		records: dataset.records.length,
		transfers: dataset.transfers.length,
		mandatoryExpenses: dataset.mandatoryExpenses.length,
	};
}
