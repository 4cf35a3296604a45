// =============================================================================
// MIGRATION SOURCE -- load and vet the JSON document before touching SQL
// =============================================================================

import {
	type LedgerDataset,
	LedgerError,
	validateTransferIntegrity,
} from "@pocket-ledger/core";
import { type ReadResult, readDocument } from "@pocket-ledger/file-store";

function messageOf(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}

/**
 * Everything a migration refuses to start with. Throws `MIGRATION_FAILED`
 * naming the first problem found.
 */
export function validateMigrationSource(dataset: LedgerDataset): void {
	if (dataset.wallets.length === 0) {
		throw LedgerError.migrationFailed("Source JSON has no wallets");
	}

	const walletIds = new Set<number>();
	for (const wallet of dataset.wallets) {
		if (walletIds.has(wallet.id)) {
			throw LedgerError.migrationFailed(`Source JSON has duplicate wallet id ${wallet.id}`);
		}
		walletIds.add(wallet.id);
	}

	try {
		validateTransferIntegrity(dataset.records, dataset.transfers);
	} catch (error) {
		throw LedgerError.migrationFailed(`Source JSON fails transfer integrity: ${messageOf(error)}`, error);
	}

	const checkWallet = (walletId: number, owner: string) => {
		if (!walletIds.has(walletId)) {
			throw LedgerError.migrationFailed(`${owner}: wallet_id=${walletId} does not exist`);
		}
	};
	dataset.records.forEach((record, i) => checkWallet(record.walletId, `Record #${i + 1}`));
	dataset.mandatoryExpenses.forEach((expense, i) =>
		checkWallet(expense.walletId, `Mandatory expense #${i + 1}`),
	);
	for (const transfer of dataset.transfers) {
		checkWallet(transfer.fromWalletId, `Transfer #${transfer.id}`);
		checkWallet(transfer.toWalletId, `Transfer #${transfer.id}`);
	}
}

/** Read the JSON document (legacy shapes included) and validate it. */
export async function loadMigrationSource(
	jsonPath: string,
	baseCurrency: string,
): Promise<LedgerDataset> {
	let result: ReadResult;
	try {
		result = await readDocument(jsonPath, { baseCurrency });
	} catch (error) {
		throw LedgerError.migrationFailed(`Cannot read source JSON ${jsonPath}: ${messageOf(error)}`, error);
	}
	if (result.missing) {
		throw LedgerError.migrationFailed(`Source JSON not found: ${jsonPath}`);
	}
	validateMigrationSource(result.dataset);
	return result.dataset;
}
