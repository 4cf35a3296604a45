// =============================================================================
// STORE UTILITIES -- rules both LedgerStore implementations share
// =============================================================================
// Bulk writes in either backend go through `prepareDataset`, so the JSON
// document and the SQL tables accept exactly the same datasets and assign
// the same ids.

import { defaultSystemWallet } from "../domain/wallet.js";
import { withRecordId } from "../domain/record.js";
import { LedgerError } from "../error/index.js";
import { validateTransferIntegrity } from "../integrity/transfer-integrity.js";
import type { LedgerDataset } from "../types/dataset.js";
import type { LedgerRecord } from "../types/record.js";
import type { Transfer } from "../types/transfer.js";
import type { Wallet } from "../types/wallet.js";
import { DEFAULT_BASE_CURRENCY } from "../utils/money.js";
import type { ReplaceAllDataInput } from "./store.js";

/** Next free id: one past the largest in use, starting at 1. */
export function nextId(ids: Iterable<number>): number {
	let max = 0;
	for (const id of ids) {
		if (id > max) max = id;
	}
	return max + 1;
}

/**
 * Give every id-less (0) value a fresh id after the largest existing one.
 * Duplicate non-zero ids are rejected.
 */
export function assignIds<T extends LedgerRecord>(items: readonly T[], what: string): T[] {
	const seen = new Set<number>();
	for (const item of items) {
		if (item.id === 0) continue;
		if (seen.has(item.id)) {
			throw LedgerError.invalidArgument(`Duplicate ${what} id ${item.id}`);
		}
		seen.add(item.id);
	}
	let next = nextId(seen);
	return items.map((item) => (item.id === 0 ? withRecordId(item, next++) : item));
}

function ensureUniqueIds(items: readonly { id: number }[], what: string): void {
	const seen = new Set<number>();
	for (const item of items) {
		if (seen.has(item.id)) {
			throw LedgerError.invalidArgument(`Duplicate ${what} id ${item.id}`);
		}
		seen.add(item.id);
	}
}

export function ensureSingleSystemWallet(wallets: readonly Wallet[]): void {
	const systemWallets = wallets.filter((wallet) => wallet.system);
	if (systemWallets.length > 1) {
		throw LedgerError.invalidArgument(
			`Only one system wallet is allowed, found ${systemWallets.length}`,
		);
	}
}

export function ensureWalletExists(wallets: readonly Wallet[], walletId: number, owner: string): void {
	if (!wallets.some((wallet) => wallet.id === walletId)) {
		throw LedgerError.invalidArgument(`${owner} references missing wallet ${walletId}`);
	}
}

function ensureTransferWallets(wallets: readonly Wallet[], transfers: readonly Transfer[]): void {
	for (const transfer of transfers) {
		ensureWalletExists(wallets, transfer.fromWalletId, `Transfer ${transfer.id}`);
		ensureWalletExists(wallets, transfer.toWalletId, `Transfer ${transfer.id}`);
	}
}

/**
 * Validate a full replacement dataset and fill in what the stores derive:
 * the default system wallet when none is given, and ids for new records.
 */
export function prepareDataset(
	input: ReplaceAllDataInput,
	baseCurrency: string = DEFAULT_BASE_CURRENCY,
): LedgerDataset {
	const wallets =
		input.wallets && input.wallets.length > 0
			? [...input.wallets]
			: [defaultSystemWallet(input.initialBalance ?? 0, baseCurrency)];
	ensureUniqueIds(wallets, "wallet");
	ensureSingleSystemWallet(wallets);

	ensureUniqueIds(input.transfers, "transfer");
	ensureTransferWallets(wallets, input.transfers);

	const records = assignIds(input.records, "record");
	for (const record of records) {
		ensureWalletExists(wallets, record.walletId, `Record ${record.id}`);
	}
	validateTransferIntegrity(records, input.transfers);

	const mandatoryExpenses = assignIds(input.mandatoryExpenses, "mandatory expense");
	for (const expense of mandatoryExpenses) {
		ensureWalletExists(wallets, expense.walletId, `Mandatory expense ${expense.id}`);
	}

	return { wallets, records, transfers: [...input.transfers], mandatoryExpenses };
}

/** Drop a transfer together with its two legs and its commission records. */
export function withoutTransfer(
	records: readonly LedgerRecord[],
	transfers: readonly Transfer[],
	transferId: number,
): { records: LedgerRecord[]; transfers: Transfer[] } {
	return {
		records: records.filter(
			(record) => record.transferId !== transferId && record.commissionForTransferId !== transferId,
		),
		transfers: transfers.filter((transfer) => transfer.id !== transferId),
	};
}

export function emptyDataset(): LedgerDataset {
	return { wallets: [], records: [], transfers: [], mandatoryExpenses: [] };
}
