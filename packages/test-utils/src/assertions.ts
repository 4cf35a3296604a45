import {
	type LedgerDataset,
	type LedgerStore,
	nearlyEqual,
	validateTransferIntegrity,
	walletBalances,
} from "@pocket-ledger/core";

/**
 * Assert the dataset satisfies the double-entry invariant: every transfer
 * has exactly one expense and one income leg, and no record points at a
 * missing transfer.
 */
export function assertDatasetBalanced(dataset: LedgerDataset): void {
	validateTransferIntegrity(dataset.records, dataset.transfers);
}

/**
 * Assert that a wallet in `store` has the expected derived balance,
 * within the cross-store tolerance.
 */
export async function assertWalletBalance(
	store: LedgerStore,
	walletId: number,
	expected: number,
): Promise<void> {
	const dataset = await store.loadDataset();
	const balance = walletBalances(dataset.wallets, dataset.records).get(walletId);
	if (balance === undefined) {
		throw new Error(`Wallet ${walletId}: not found in ${store.id} store`);
	}
	if (!nearlyEqual(balance, expected)) {
		throw new Error(`Wallet ${walletId}: expected balance ${expected}, got ${balance}`);
	}
}
