// =============================================================================
// LEDGER STORE INTERFACE
// =============================================================================
// The storage port. `jsonFileStore` and `sqliteStore` both implement it and
// are chosen by configuration; nothing above this interface knows which one
// is active.
//
// Contract shared by every implementation:
// - Loads that return records or transfers validate transfer integrity first
//   and throw instead of returning an inconsistent dataset.
// - Bulk replaces validate before writing and either apply fully or not at all.
// - Records are addressed by id, or by position in `loadAll()` order for the
//   `ByIndex` operations.

import type { LedgerDataset } from "../types/dataset.js";
import type { LedgerRecord, MandatoryExpenseRecord } from "../types/record.js";
import type { Transfer } from "../types/transfer.js";
import type { CreateWalletInput, Wallet } from "../types/wallet.js";

export interface ReplaceAllDataInput {
	wallets?: Wallet[];
	records: LedgerRecord[];
	transfers: Transfer[];
	mandatoryExpenses: MandatoryExpenseRecord[];
	/** Used for the default system wallet when `wallets` is empty or absent. */
	initialBalance?: number;
}

export interface LedgerStore {
	/** "json" or "sqlite". */
	readonly id: string;

	// Wallets
	loadWallets(): Promise<Wallet[]>;
	loadActiveWallets(): Promise<Wallet[]>;
	/** Upsert by id. */
	saveWallet(wallet: Wallet): Promise<void>;
	/** Allocates the next id (max + 1). */
	createWallet(input: CreateWalletInput): Promise<Wallet>;
	/** Marks the wallet inactive. Returns false when no such wallet exists. */
	softDeleteWallet(walletId: number): Promise<boolean>;
	/** The system wallet, created on first use. */
	getSystemWallet(): Promise<Wallet>;

	// Records
	loadAll(): Promise<LedgerRecord[]>;
	getById(recordId: number): Promise<LedgerRecord>;
	/** Stores the record, assigning a fresh id when it has none or its id is taken. */
	save(record: LedgerRecord): Promise<LedgerRecord>;
	/**
	 * Replaces the record with the same id. Throws NOT_FOUND otherwise, and
	 * writes nothing when the result would break transfer integrity.
	 */
	replace(record: LedgerRecord): Promise<void>;
	/** A transfer leg takes its transfer, the other leg and the commission with it. */
	deleteByIndex(index: number): Promise<boolean>;
	deleteAll(): Promise<void>;

	// Transfers
	loadTransfers(): Promise<Transfer[]>;
	/** Upsert by id. Legs are written separately or through a bulk replace. */
	saveTransfer(transfer: Transfer): Promise<void>;

	// Mandatory expense templates
	loadMandatoryExpenses(): Promise<MandatoryExpenseRecord[]>;
	saveMandatoryExpense(expense: MandatoryExpenseRecord): Promise<MandatoryExpenseRecord>;
	deleteMandatoryExpenseByIndex(index: number): Promise<boolean>;
	deleteAllMandatoryExpenses(): Promise<void>;
	replaceMandatoryExpenses(expenses: MandatoryExpenseRecord[]): Promise<void>;

	// Initial balance of the system wallet
	saveInitialBalance(balance: number): Promise<void>;
	loadInitialBalance(): Promise<number>;

	// Bulk
	loadDataset(): Promise<LedgerDataset>;
	replaceRecordsAndTransfers(records: LedgerRecord[], transfers: Transfer[]): Promise<void>;
	replaceAllData(data: ReplaceAllDataInput): Promise<void>;

	close(): Promise<void>;
}
